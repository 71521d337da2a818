import { describe, it, expect } from "vitest";
import type { Appearance, ExternalReference, Fog, Group, Texture2D, World } from "@m3gkit/scene";
import { createEmptyWorld, createMaterial, createSimpleWorld, createTriangleMesh } from "./__tests__/fixtures.js";
import { FieldReader, blockAt, parseFile, readTransformable } from "./__tests__/reader.js";
import { adler32 } from "./adler32.js";
import { FILE_IDENTIFIER } from "./constants.js";
import { assemble, checkReachability, encodeScene } from "./container.js";
import { IncompatibleFeatureError, OrphanedObjectError } from "./errors.js";
import { ObjectTable } from "./objectTable.js";

const IDENTITY = [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1];

function sceneWithFog(): World {
  const fog: Fog = { kind: "fog", color: 0x808080, mode: { type: "linear", near: 1, far: 50 } };
  const appearance: Appearance = { kind: "appearance", fog };
  return { kind: "world", children: [createTriangleMesh(appearance)] };
}

function readHeader(bytes: Uint8Array) {
  const header = blockAt(parseFile(bytes), 1);
  const reader = new FieldReader(header.data);
  return {
    type: header.type,
    version: [reader.byte(), reader.byte()],
    hasExternalReferences: reader.boolean(),
    totalFileSize: reader.uint32(),
    approximateContentSize: reader.uint32(),
    authoring: reader.string(),
  };
}

describe("encodeScene", () => {
  it("encodes the smallest valid scene", () => {
    const { bytes, report } = encodeScene(createEmptyWorld());
    expect(bytes.length).toBe(158);
    expect(Array.from(bytes.subarray(0, 12))).toEqual(Array.from(FILE_IDENTIFIER));

    const file = parseFile(bytes);
    expect(file.sections.map((section) => section.totalLength)).toEqual([30, 116]);
    expect(readHeader(bytes)).toEqual({
      type: 0,
      version: [1, 0],
      hasExternalReferences: false,
      totalFileSize: 158,
      approximateContentSize: 158,
      authoring: "",
    });

    const world = blockAt(file, 2);
    expect(world.type).toBe(22);
    expect(world.data.length).toBe(98);
    const reader = new FieldReader(world.data);
    expect(readTransformable(reader)).toEqual({ userId: 0, animationTracks: [], matrix: IDENTITY });
    expect(reader.boolean()).toBe(true);
    expect(reader.boolean()).toBe(true);
    expect(reader.byte()).toBe(255);
    expect(reader.uint32()).toBe(0xffffffff);
    expect(reader.boolean()).toBe(false);
    expect(reader.uint32()).toBe(0);
    expect(reader.uint32()).toBe(0);
    expect(reader.uint32()).toBe(0);
    expect(reader.remaining).toBe(0);

    expect(report).toEqual({
      version: "1.0",
      objectCount: 1,
      kinds: { world: 1 },
      sections: [
        { ordinal: 0, compressed: false, objectCount: 1, length: 30 },
        { ordinal: 1, compressed: false, objectCount: 1, length: 116 },
      ],
      totalSize: 158,
    });
  });

  it("is deterministic", () => {
    const first = encodeScene(createSimpleWorld(), { sourceUpAxis: "z" }).bytes;
    const second = encodeScene(createSimpleWorld(), { sourceUpAxis: "z" }).bytes;
    expect(second).toEqual(first);
    expect(assemble(createSimpleWorld(), { sourceUpAxis: "z" })).toEqual(first);
  });

  it("writes checksums that match every section", () => {
    const file = parseFile(encodeScene(createSimpleWorld(), { compress: true, maxObjectsPerSection: 3 }).bytes);
    expect(file.sections).toHaveLength(4);
    for (const section of file.sections) {
      expect(section.checksum).toBe(adler32(section.checked));
      expect(section.payload.length).toBe(section.uncompressedLength);
    }
  });

  it("only refers backwards to already written objects", () => {
    const file = parseFile(encodeScene(createSimpleWorld()).bytes);
    expect(file.blocks.map((block) => block.type)).toEqual([0, 5, 20, 21, 11, 13, 3, 14, 22]);

    const reader = new FieldReader(blockAt(file, 9).data);
    readTransformable(reader);
    reader.take(8);
    expect(reader.uint32()).toBe(2);
    expect([reader.uint32(), reader.uint32()]).toEqual([2, 8]);
    expect(reader.uint32()).toBe(2);
    expect(reader.uint32()).toBe(0);

    const mesh = new FieldReader(blockAt(file, 8).data);
    readTransformable(mesh);
    mesh.take(8);
    expect([mesh.uint32(), mesh.uint32(), mesh.uint32(), mesh.uint32()]).toEqual([4, 1, 5, 7]);
  });

  it("writes a shared material once and refers to it from both appearances", () => {
    const material = createMaterial();
    const first: Appearance = { kind: "appearance", material };
    const second: Appearance = { kind: "appearance", material };
    const world: World = { kind: "world", children: [createTriangleMesh(first, "A"), createTriangleMesh(second, "B")] };
    const file = parseFile(encodeScene(world).bytes);

    const materialIndices = file.blocks.flatMap((block, i) => (block.type === 13 ? [i + 1] : []));
    expect(materialIndices).toEqual([5]);
    const referenced = file.blocks
      .filter((block) => block.type === 3)
      .map((block) => {
        const reader = new FieldReader(block.data);
        reader.take(12);
        reader.int8();
        reader.take(12);
        return reader.uint32();
      });
    expect(referenced).toEqual([5, 5]);
  });

  it("records the real file size in the header", () => {
    const { bytes } = encodeScene(createSimpleWorld(), { authoring: "m3gkit test" });
    const header = readHeader(bytes);
    expect(header.totalFileSize).toBe(bytes.length);
    expect(header.authoring).toBe("m3gkit test");
  });

  it("converts the up axis once regardless of depth", () => {
    const mesh = createTriangleMesh();
    mesh.transform = { translation: [0, 0, 1] };
    const group: Group = { kind: "group", transform: { translation: [0, 0, 1] }, children: [mesh] };
    const world: World = { kind: "world", children: [group] };
    const file = parseFile(encodeScene(world, { sourceUpAxis: "z" }).bytes);

    const meshMatrix = readTransformable(new FieldReader(blockAt(file, 5).data)).matrix ?? [];
    const groupMatrix = readTransformable(new FieldReader(blockAt(file, 6).data)).matrix ?? [];
    expect([groupMatrix[3], groupMatrix[7], groupMatrix[11]]).toEqual([0, 1, 0]);
    expect([meshMatrix[3], meshMatrix[7], meshMatrix[11]]).toEqual([0, 0, 1]);
  });

  it("selects version 1.1 for fog", () => {
    const { bytes, report } = encodeScene(sceneWithFog());
    expect(report.version).toBe("1.1");
    expect(readHeader(bytes).version).toEqual([1, 1]);
  });

  it("refuses fog under a pinned 1.0", () => {
    expect(() => encodeScene(sceneWithFog(), { version: "1.0" })).toThrow(IncompatibleFeatureError);
  });

  it("writes external references into their own section after the header", () => {
    const image: ExternalReference = { kind: "externalReference", uri: "textures/wood.png" };
    const texture: Texture2D = { kind: "texture2D", image };
    const appearance: Appearance = { kind: "appearance", textures: [texture] };
    const world: World = { kind: "world", children: [createTriangleMesh(appearance)] };
    const { bytes, report } = encodeScene(world, { compress: true });

    const file = parseFile(bytes);
    expect(readHeader(bytes).hasExternalReferences).toBe(true);
    expect(file.sections[1]?.compression).toBe(0);
    expect(file.sections[2]?.compression).toBe(1);
    const reference = blockAt(file, 2);
    expect(reference.type).toBe(255);
    expect(reference.section).toBe(1);
    expect(new FieldReader(reference.data).string()).toBe("textures/wood.png");
    expect(report.sections.map((section) => section.objectCount)).toEqual([1, 1, 7]);
  });

  it("splits content into sections of bounded object count", () => {
    const { report } = encodeScene(createSimpleWorld(), { maxObjectsPerSection: 3 });
    expect(report.sections.map((section) => section.objectCount)).toEqual([1, 3, 3, 2]);
  });

  it("keeps the same blocks when compressed", () => {
    const plain = parseFile(encodeScene(createSimpleWorld()).bytes);
    const packed = parseFile(encodeScene(createSimpleWorld(), { compress: true, compressionLevel: 9 }).bytes);
    expect(packed.sections[1]?.compression).toBe(1);
    expect(packed.blocks.slice(1)).toEqual(plain.blocks.slice(1));
  });

  it("counts objects per kind", () => {
    expect(encodeScene(createSimpleWorld()).report.kinds).toEqual({
      camera: 1,
      vertexArray: 1,
      vertexBuffer: 1,
      triangleStripArray: 1,
      material: 1,
      appearance: 1,
      mesh: 1,
      world: 1,
    });
  });
});

describe("checkReachability", () => {
  it("reports objects no block refers to", () => {
    const table = ObjectTable.build(createSimpleWorld());
    const encoded = table.objects.map(() => ({ typeTag: 0, data: new Uint8Array(), references: [] }));
    try {
      checkReachability(table, encoded);
      throw new Error("expected an orphan");
    } catch (error) {
      expect(error).toBeInstanceOf(OrphanedObjectError);
      if (error instanceof OrphanedObjectError) {
        expect(error.context).toEqual({ kind: "camera", name: "Camera", index: 2 });
      }
    }
  });
});
