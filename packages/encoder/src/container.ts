import type { ObjectKind, UpAxis, World } from "@m3gkit/scene";
import { BlockWriter } from "./codec/blockWriter.js";
import { ByteWriter } from "./codec/byteWriter.js";
import { FILE_IDENTIFIER, FIRST_OBJECT_INDEX, HEADER_OBJECT_TYPE } from "./constants.js";
import { encodeObject, type EncodedObject } from "./encoders/index.js";
import { InputValidationError, OrphanedObjectError } from "./errors.js";
import { ObjectTable } from "./objectTable.js";
import { frameSection, type CompressionLevel } from "./section.js";
import { resolveTransforms } from "./transform.js";
import { VERSION_BYTES, detectFeatures, selectVersion, type FormatVersion, type VersionRequest } from "./versionPolicy.js";

export interface EncodeOptions {
  /** Defaults to "auto". */
  version?: VersionRequest;
  /** Up axis of the scene's transforms. Defaults to "y". */
  sourceUpAxis?: UpAxis;
  compress?: boolean;
  compressionLevel?: CompressionLevel;
  /** Split content into sections of at most this many objects. */
  maxObjectsPerSection?: number;
  maxSectionLength?: number;
  /** Written into the header's authoring field. */
  authoring?: string;
}

export interface SectionReport {
  ordinal: number;
  compressed: boolean;
  objectCount: number;
  /** Bytes of the framed section. */
  length: number;
}

export interface EncodeReport {
  version: FormatVersion;
  /** Objects after the header. */
  objectCount: number;
  kinds: Partial<Record<ObjectKind, number>>;
  sections: SectionReport[];
  totalSize: number;
}

export interface EncodeResult {
  bytes: Uint8Array;
  report: EncodeReport;
}

interface PendingSection {
  payload: Uint8Array;
  objectCount: number;
  compress: boolean;
}

/**
 * Encode a World and everything reachable from it into a complete file.
 *
 * The table is built and the version chosen before any object is encoded, so a scene that
 * cannot be written fails without producing partial output.
 */
export function encodeScene(world: World, options: EncodeOptions = {}): EncodeResult {
  const table = ObjectTable.build(world);
  const version = selectVersion(detectFeatures(table), options.version ?? "auto");
  const transforms = resolveTransforms(table, options.sourceUpAxis ?? "y");
  const context = { table, version, transforms };

  const encoded = table.objects.map((object) => encodeObject(object, context));
  checkReachability(table, encoded);

  const externalCount = table.objects.filter((object) => object.kind === "externalReference").length;
  const pending: PendingSection[] = [];
  if (externalCount > 0) {
    pending.push({ payload: blocks(encoded.slice(0, externalCount)), objectCount: externalCount, compress: false });
  }
  const content = encoded.slice(externalCount);
  const chunk = options.maxObjectsPerSection ?? content.length;
  if (!Number.isInteger(chunk) || chunk < 1) {
    throw new InputValidationError(`maxObjectsPerSection must be a positive integer, got ${chunk}`, {
      field: "maxObjectsPerSection",
    });
  }
  for (let start = 0; start < content.length; start += chunk) {
    const slice = content.slice(start, start + chunk);
    pending.push({ payload: blocks(slice), objectCount: slice.length, compress: options.compress ?? false });
  }

  const framed = pending.map((section, i) =>
    frameSection(section.payload, {
      compress: section.compress,
      level: options.compressionLevel,
      maxSectionLength: options.maxSectionLength,
      ordinal: i + 1,
    }));
  const bodySize = framed.reduce((sum, section) => sum + section.length, 0);

  const authoring = options.authoring ?? "";
  const probe = headerSection(version, externalCount > 0, 0, authoring);
  const totalSize = FILE_IDENTIFIER.length + probe.length + bodySize;
  const header = headerSection(version, externalCount > 0, totalSize, authoring);

  const out = new ByteWriter();
  out.writeBytes(FILE_IDENTIFIER);
  out.writeBytes(header);
  framed.forEach((section) => out.writeBytes(section));

  const kinds: Partial<Record<ObjectKind, number>> = {};
  for (const object of table.objects) {
    kinds[object.kind] = (kinds[object.kind] ?? 0) + 1;
  }
  return {
    bytes: out.toUint8Array(),
    report: {
      version,
      objectCount: table.size,
      kinds,
      sections: [
        { ordinal: 0, compressed: false, objectCount: 1, length: header.length },
        ...framed.map((section, i) => ({
          ordinal: i + 1,
          compressed: pending[i]?.compress ?? false,
          objectCount: pending[i]?.objectCount ?? 0,
          length: section.length,
        })),
      ],
      totalSize,
    },
  };
}

/** Encode a World into file bytes. */
export function assemble(world: World, options: EncodeOptions = {}): Uint8Array {
  return encodeScene(world, options).bytes;
}

function blocks(objects: readonly EncodedObject[]): Uint8Array {
  const out = new BlockWriter();
  objects.forEach((object, i) => {
    out.byte(`blocks[${i}].type`, object.typeTag);
    out.uint32(`blocks[${i}].length`, object.data.length);
    out.bytes(object.data);
  });
  return out.toUint8Array();
}

function headerSection(version: FormatVersion, hasExternalReferences: boolean, totalSize: number, authoring: string): Uint8Array {
  const data = new BlockWriter({ field: "header" });
  const [major, minor] = VERSION_BYTES[version];
  data.byte("version.major", major);
  data.byte("version.minor", minor);
  data.boolean("hasExternalReferences", hasExternalReferences);
  data.uint32("totalFileSize", totalSize);
  data.uint32("approximateContentSize", totalSize);
  data.string("authoringField", authoring);

  const block = new BlockWriter({ field: "header" });
  block.byte("type", HEADER_OBJECT_TYPE);
  block.uint32("length", data.length);
  block.bytes(data.toUint8Array());
  return frameSection(block.toUint8Array(), { compress: false, ordinal: 0 });
}

export function checkReachability(table: ObjectTable, encoded: readonly EncodedObject[]): void {
  const referenced = new Set<number>();
  encoded.forEach((object) => object.references.forEach((index) => referenced.add(index)));
  table.objects.forEach((object, position) => {
    const index = FIRST_OBJECT_INDEX + position;
    if (object !== table.world && !referenced.has(index)) {
      throw new OrphanedObjectError("object is not referenced by any other object", table.contextOf(object));
    }
  });
}
