import { describe, it, expect } from "vitest";
import type {
  AnimationTrack,
  Appearance,
  Fog,
  Group,
  KeyframeSequence,
  Material,
  Mesh,
  SceneObject,
  Texture2D,
  TriangleStripArray,
  UpAxis,
  VertexArray,
  World,
} from "@m3gkit/scene";
import { createMaterial, createSimpleWorld, createTriangleBuffer, createTriangleMesh } from "../__tests__/fixtures.js";
import { FieldReader, readTransformable } from "../__tests__/reader.js";
import { encodeScene } from "../container.js";
import { FieldOverflowError, InputValidationError, UnsupportedInVersionError } from "../errors.js";
import { ObjectTable } from "../objectTable.js";
import { resolveTransforms } from "../transform.js";
import type { FormatVersion } from "../versionPolicy.js";
import { encodeObject } from "./index.js";
import type { EncodeContext } from "./objectWriter.js";

function contextFor(world: World, version: FormatVersion = "1.1", upAxis: UpAxis = "y"): EncodeContext {
  const table = ObjectTable.build(world);
  return { table, version, transforms: resolveTransforms(table, upAxis) };
}

/** Block data after an Object3D prefix with no tracks and no user parameters. */
function body(object: SceneObject, context: EncodeContext): number[] {
  return Array.from(encodeObject(object, context).data.subarray(12));
}

function worldWithStrips(indexBuffer: TriangleStripArray): World {
  const mesh: Mesh = { kind: "mesh", vertexBuffer: createTriangleBuffer(), submeshes: [{ indexBuffer }] };
  return { kind: "world", children: [mesh] };
}

function worldWithArray(array: VertexArray): World {
  const mesh = createTriangleMesh();
  mesh.vertexBuffer = { kind: "vertexBuffer", colors: array };
  return { kind: "world", children: [mesh] };
}

describe("material", () => {
  it("writes colors as R, G, B(, A) bytes", () => {
    const world = createSimpleWorld();
    const context = contextFor(world);
    const material = context.table.objects.find((object) => object.kind === "material");
    if (material === undefined) throw new Error("no material");
    expect(body(material, context)).toEqual([
      0x33, 0x33, 0x33,
      0xff, 0x00, 0x00, 0xff,
      0, 0, 0,
      0, 0, 0,
      0, 0, 0, 0,
      0,
    ]);
  });

  it("rejects shininess above 128", () => {
    const material: Material = { ...createMaterial(), shininess: 200 };
    const world: World = { kind: "world", children: [createTriangleMesh({ kind: "appearance", material })] };
    expect(() => encodeScene(world)).toThrowError(/shininess 200 is outside 0\.\.128/);
  });
});

describe("triangleStripArray", () => {
  it("writes a consecutive triangle list as an implicit byte start", () => {
    const strips: TriangleStripArray = { kind: "triangleStripArray", primitives: { type: "triangles", indices: [0, 1, 2] } };
    expect(body(strips, contextFor(worldWithStrips(strips)))).toEqual([1, 0, 1, 0, 0, 0, 3, 0, 0, 0]);
  });

  it("writes scattered small indices as bytes", () => {
    const strips: TriangleStripArray = { kind: "triangleStripArray", primitives: { type: "triangles", indices: [2, 1, 0] } };
    expect(body(strips, contextFor(worldWithStrips(strips)))).toEqual([
      129, 3, 0, 0, 0, 2, 1, 0,
      1, 0, 0, 0, 3, 0, 0, 0,
    ]);
  });

  it("widens to shorts past 255", () => {
    const strips: TriangleStripArray = {
      kind: "triangleStripArray",
      primitives: { type: "strips", indices: [0, 300, 1], stripLengths: [3] },
    };
    expect(body(strips, contextFor(worldWithStrips(strips)))).toEqual([
      130, 3, 0, 0, 0, 0, 0, 44, 1, 1, 0,
      1, 0, 0, 0, 3, 0, 0, 0,
    ]);
  });

  it("writes implicit strips with a short start index", () => {
    const strips: TriangleStripArray = {
      kind: "triangleStripArray",
      primitives: { type: "implicitStrips", firstIndex: 256, stripLengths: [4] },
    };
    expect(body(strips, contextFor(worldWithStrips(strips)))).toEqual([2, 0, 1, 1, 0, 0, 0, 4, 0, 0, 0]);
  });

  it("rejects strip lengths that do not cover the indices", () => {
    const strips: TriangleStripArray = {
      kind: "triangleStripArray",
      primitives: { type: "strips", indices: [0, 1, 2, 1], stripLengths: [3] },
    };
    expect(() => encodeObject(strips, contextFor(worldWithStrips(strips)))).toThrowError(
      /strip lengths sum to 3, index count is 4/,
    );
  });
});

describe("vertexArray", () => {
  it("writes raw shorts", () => {
    const world = createSimpleWorld();
    const context = contextFor(world);
    const array = context.table.objects.find((object) => object.kind === "vertexArray");
    if (array === undefined) throw new Error("no vertex array");
    expect(body(array, context)).toEqual([
      2, 3, 0, 3, 0,
      0, 0, 0, 0, 0, 0,
      100, 0, 0, 0, 0, 0,
      0, 0, 100, 0, 0, 0,
    ]);
  });

  it("writes byte deltas modulo 256", () => {
    const colors: VertexArray = {
      kind: "vertexArray",
      componentCount: 3,
      componentSize: 1,
      encoding: "delta",
      values: [10, 20, 30, 5, 25, 30, 255, 0, 0],
    };
    expect(body(colors, contextFor(worldWithArray(colors)))).toEqual([
      1, 3, 1, 3, 0,
      10, 20, 30,
      251, 5, 0,
      250, 231, 226,
    ]);
  });

  it("rejects components that do not fit", () => {
    const colors: VertexArray = { kind: "vertexArray", componentCount: 3, componentSize: 1, values: [300, 0, 0, 0, 0, 0, 0, 0, 0] };
    try {
      encodeObject(colors, contextFor(worldWithArray(colors)));
      throw new Error("expected an overflow");
    } catch (error) {
      expect(error).toBeInstanceOf(FieldOverflowError);
      if (error instanceof FieldOverflowError) {
        expect(error.context.field).toBe("values[0]");
      }
    }
  });
});

describe("mesh", () => {
  it("rejects indices beyond the vertex buffer", () => {
    const mesh = createTriangleMesh();
    const submesh = mesh.submeshes[0];
    if (submesh === undefined) throw new Error("no submesh");
    submesh.indexBuffer = { kind: "triangleStripArray", primitives: { type: "triangles", indices: [0, 1, 3] } };
    expect(() => encodeScene({ kind: "world", children: [mesh] })).toThrowError(
      /index 3 is outside the 3 vertices of the vertex buffer/,
    );
  });

  it("rejects a mesh without submeshes", () => {
    const mesh: Mesh = { kind: "mesh", vertexBuffer: createTriangleBuffer(), submeshes: [] };
    expect(() => encodeScene({ kind: "world", children: [mesh] })).toThrow(InputValidationError);
  });
});

describe("fog", () => {
  const fog: Fog = { kind: "fog", color: 0x102030, mode: { type: "exponential", density: 0.5 } };
  const appearance: Appearance = { kind: "appearance", fog };
  const world: World = { kind: "world", children: [createTriangleMesh(appearance)] };

  it("writes exponential fog", () => {
    expect(body(fog, contextFor(world))).toEqual([0x10, 0x20, 0x30, 80, 0, 0, 0, 0x3f]);
  });

  it("cannot be written in version 1.0", () => {
    expect(() => encodeObject(fog, contextFor(world, "1.0"))).toThrow(UnsupportedInVersionError);
  });
});

describe("texture2D", () => {
  it("writes image pixels with an empty palette", () => {
    const texture: Texture2D = {
      kind: "texture2D",
      image: { kind: "image2D", format: "rgb", width: 2, height: 1, pixels: [1, 2, 3, 4, 5, 6] },
    };
    const world: World = { kind: "world", children: [createTriangleMesh({ kind: "appearance", textures: [texture] })] };
    expect(body(texture.image, contextFor(world))).toEqual([
      99, 0, 2, 0, 0, 0, 1, 0, 0, 0,
      0, 0, 0, 0,
      6, 0, 0, 0, 1, 2, 3, 4, 5, 6,
    ]);
  });

  it("rejects images that are not a power of two", () => {
    const texture: Texture2D = {
      kind: "texture2D",
      image: { kind: "image2D", format: "alpha", width: 3, height: 4, pixels: new Array<number>(12).fill(0) },
    };
    const world: World = { kind: "world", children: [createTriangleMesh({ kind: "appearance", textures: [texture] })] };
    expect(() => encodeScene(world)).toThrowError(/texture image 3x4 is not a power of two/);
  });
});

describe("animation", () => {
  function animatedGroup(values: number[][], times: number[]): { world: World; sequence: KeyframeSequence; group: Group } {
    const sequence: KeyframeSequence = {
      kind: "keyframeSequence",
      interpolation: "linear",
      duration: 1000,
      componentCount: 3,
      keyframes: values.map((value, i) => ({ time: times[i] ?? 0, value })),
    };
    const track: AnimationTrack = {
      kind: "animationTrack",
      keyframeSequence: sequence,
      controller: { kind: "animationController" },
      property: "translation",
    };
    const group: Group = { kind: "group", transform: { translation: [0, 0, 1] }, animationTracks: [track], children: [] };
    return { world: { kind: "world", children: [group] }, sequence, group };
  }

  it("converts the keyframes of a z-up node below the World", () => {
    const { world, sequence } = animatedGroup([[0, 0, 1], [0, 0, 2]], [0, 1000]);
    const reader = new FieldReader(encodeObject(sequence, contextFor(world, "1.0", "z")).data);
    reader.take(12);
    expect([reader.byte(), reader.byte(), reader.byte()]).toEqual([176, 192, 0]);
    expect([reader.uint32(), reader.uint32(), reader.uint32(), reader.uint32(), reader.uint32()]).toEqual([1000, 0, 1, 3, 2]);
    expect(reader.int32()).toBe(0);
    expect(reader.floats(3)).toEqual([0, 1, 0]);
    expect(reader.int32()).toBe(1000);
    expect(reader.floats(3)).toEqual([0, 2, 0]);
    expect(reader.remaining).toBe(0);
  });

  it("writes a component transform and the axis conversion for the animated node", () => {
    const { world, group } = animatedGroup([[0, 0, 1]], [0]);
    const context = contextFor(world, "1.0", "z");
    const fields = readTransformable(new FieldReader(encodeObject(group, context).data));
    expect(fields.animationTracks).toEqual([4]);
    expect(fields.component?.translation).toEqual([0, 1, 0]);
    expect(fields.component?.scale).toEqual([1, 1, 1]);
    expect(fields.component?.angle).toBeCloseTo(0);
    expect(fields.matrix).toEqual([1, 0, 0, 0, 0, 0, 1, 0, 0, -1, 0, 0, 0, 0, 0, 1]);
  });

  it("rejects keyframes that go back in time", () => {
    const { world } = animatedGroup([[0, 0, 0], [0, 0, 1]], [500, 100]);
    expect(() => encodeScene(world)).toThrowError(/keyframe time 100 is before 500/);
  });

  it("rejects a sequence without keyframes", () => {
    const { world } = animatedGroup([], []);
    expect(() => encodeScene(world)).toThrowError(/keyframe sequence has no keyframes/);
  });

  it("rejects negative keyframe times", () => {
    const { world } = animatedGroup([[0, 0, 0], [0, 0, 1]], [-5, 100]);
    expect(() => encodeScene(world)).toThrowError(/keyframe time -5 is negative/);
  });

  it("rejects a zero duration", () => {
    const { world, sequence } = animatedGroup([[0, 0, 0]], [0]);
    sequence.duration = 0;
    expect(() => encodeScene(world)).toThrowError(/duration 0 is not a positive number of milliseconds/);
  });

  it("rejects a property the object cannot carry", () => {
    const { sequence } = animatedGroup([[0, 0, 0]], [0]);
    const material: Material = {
      ...createMaterial(),
      animationTracks: [{ kind: "animationTrack", keyframeSequence: sequence, property: "translation" }],
    };
    const world: World = { kind: "world", children: [createTriangleMesh({ kind: "appearance", material })] };
    expect(() => encodeScene(world)).toThrowError(/property translation cannot animate a material/);
  });
});

describe("user parameters", () => {
  it("rejects duplicate ids", () => {
    const mesh = createTriangleMesh();
    mesh.userParameters = [
      { id: 7, value: "a" },
      { id: 7, value: "b" },
    ];
    expect(() => encodeScene({ kind: "world", children: [mesh] })).toThrowError(/duplicate user parameter id 7/);
  });
});
