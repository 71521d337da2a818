import { unzlibSync } from "fflate";

/** Sequential little-endian reader over one block's data. */
export class FieldReader {
  private readonly view: DataView;
  offset = 0;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  byte(): number {
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  int8(): number {
    const value = this.view.getInt8(this.offset);
    this.offset += 1;
    return value;
  }

  boolean(): boolean {
    return this.byte() !== 0;
  }

  uint16(): number {
    const value = this.view.getUint16(this.offset, true);
    this.offset += 2;
    return value;
  }

  int16(): number {
    const value = this.view.getInt16(this.offset, true);
    this.offset += 2;
    return value;
  }

  uint32(): number {
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  int32(): number {
    const value = this.view.getInt32(this.offset, true);
    this.offset += 4;
    return value;
  }

  float32(): number {
    const value = this.view.getFloat32(this.offset, true);
    this.offset += 4;
    return value;
  }

  floats(count: number): number[] {
    return Array.from({ length: count }, () => this.float32());
  }

  string(): string {
    const end = this.bytes.indexOf(0, this.offset);
    const value = new TextDecoder().decode(this.bytes.subarray(this.offset, end));
    this.offset = end + 1;
    return value;
  }

  take(length: number): Uint8Array {
    const value = this.bytes.subarray(this.offset, this.offset + length);
    this.offset += length;
    return value;
  }
}

export interface ParsedSection {
  offset: number;
  compression: number;
  totalLength: number;
  uncompressedLength: number;
  checksum: number;
  /** Bytes covered by the checksum. */
  checked: Uint8Array;
  payload: Uint8Array;
}

export interface ParsedBlock {
  section: number;
  type: number;
  data: Uint8Array;
}

export interface ParsedFile {
  identifier: Uint8Array;
  sections: ParsedSection[];
  /** Every object block in file order; position 0 is the header (index 1). */
  blocks: ParsedBlock[];
}

export function parseFile(bytes: Uint8Array): ParsedFile {
  const reader = new FieldReader(bytes);
  const identifier = reader.take(12);
  const sections: ParsedSection[] = [];
  const blocks: ParsedBlock[] = [];
  while (reader.remaining > 0) {
    const offset = reader.offset;
    const compression = reader.byte();
    const totalLength = reader.uint32();
    const uncompressedLength = reader.uint32();
    const stored = reader.take(totalLength - 13);
    const checked = bytes.subarray(offset, reader.offset);
    const checksum = reader.uint32();
    const payload = compression === 1 ? unzlibSync(stored) : stored;
    sections.push({ offset, compression, totalLength, uncompressedLength, checksum, checked, payload });

    const blockReader = new FieldReader(payload);
    while (blockReader.remaining > 0) {
      const type = blockReader.byte();
      const length = blockReader.uint32();
      blocks.push({ section: sections.length - 1, type, data: blockReader.take(length) });
    }
  }
  return { identifier, sections, blocks };
}

/** Block of the object at a table index (the header is index 1). */
export function blockAt(file: ParsedFile, index: number): ParsedBlock {
  const block = file.blocks[index - 1];
  if (!block) throw new Error(`no block at index ${index}`);
  return block;
}

export interface TransformableFields {
  userId: number;
  animationTracks: number[];
  component?: { translation: number[]; scale: number[]; angle: number; axis: number[] };
  matrix?: number[];
}

/** Reads the Object3D and Transformable prefix of a block. */
export function readTransformable(reader: FieldReader): TransformableFields {
  const userId = reader.uint32();
  const trackCount = reader.uint32();
  const animationTracks = Array.from({ length: trackCount }, () => reader.uint32());
  const parameterCount = reader.uint32();
  for (let i = 0; i < parameterCount; i += 1) {
    reader.uint32();
    reader.take(reader.uint32());
  }
  const fields: TransformableFields = { userId, animationTracks };
  if (reader.boolean()) {
    fields.component = {
      translation: reader.floats(3),
      scale: reader.floats(3),
      angle: reader.float32(),
      axis: reader.floats(3),
    };
  }
  if (reader.boolean()) {
    fields.matrix = reader.floats(16);
  }
  return fields;
}
