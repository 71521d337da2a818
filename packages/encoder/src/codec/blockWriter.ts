import { FieldOverflowError, type EncodeErrorContext } from "../errors.js";
import { ByteWriter } from "./byteWriter.js";

const FLOAT32_MAX = 3.4028234663852886e38;
const utf8 = new TextEncoder();

/**
 * Typed field writer for one object block. Every value is range-checked against its wire type;
 * a value that does not fit raises FieldOverflowError naming the field and the object.
 */
export class BlockWriter {
  private readonly out = new ByteWriter();

  constructor(readonly context: EncodeErrorContext = {}) {}

  get length(): number {
    return this.out.length;
  }

  toUint8Array(): Uint8Array {
    return this.out.toUint8Array();
  }

  overflow(field: string, message: string): FieldOverflowError {
    return new FieldOverflowError(message, { ...this.context, field });
  }

  private integer(field: string, value: number, min: number, max: number, type: string): number {
    if (!Number.isInteger(value) || value < min || value > max) {
      throw this.overflow(field, `value ${value} does not fit ${type}`);
    }
    return value;
  }

  byte(field: string, value: number): void {
    this.out.writeUint8(this.integer(field, value, 0, 0xff, "Byte"));
  }

  int8(field: string, value: number): void {
    this.out.writeUint8(this.integer(field, value, -0x80, 0x7f, "Int8"));
  }

  boolean(field: string, value: boolean): void {
    this.out.writeUint8(value ? 1 : 0);
  }

  int16(field: string, value: number): void {
    this.out.writeUint16(this.integer(field, value, -0x8000, 0x7fff, "Int16"));
  }

  uint16(field: string, value: number): void {
    this.out.writeUint16(this.integer(field, value, 0, 0xffff, "UInt16"));
  }

  int32(field: string, value: number): void {
    this.out.writeInt32(this.integer(field, value, -0x80000000, 0x7fffffff, "Int32"));
  }

  uint32(field: string, value: number): void {
    this.out.writeUint32(this.integer(field, value, 0, 0xffffffff, "UInt32"));
  }

  float32(field: string, value: number): void {
    if (!Number.isFinite(value) || Math.abs(value) > FLOAT32_MAX) {
      throw this.overflow(field, `value ${value} does not fit Float32`);
    }
    this.out.writeFloat32(value);
  }

  /** UTF-8, NUL-terminated. */
  string(field: string, value: string): void {
    if (value.includes("\0")) {
      throw this.overflow(field, "string contains a NUL character");
    }
    this.out.writeBytes(utf8.encode(value));
    this.out.writeUint8(0);
  }

  /** UInt32 count followed by the bytes. */
  byteArray(field: string, bytes: ArrayLike<number>): void {
    this.uint32(`${field}.length`, bytes.length);
    for (let i = 0; i < bytes.length; i += 1) {
      this.byte(`${field}[${i}]`, bytes[i] ?? 0);
    }
  }

  /** `0xRRGGBB` as three bytes R, G, B. */
  colorRGB(field: string, color: number): void {
    this.integer(field, color, 0, 0xffffff, "ColorRGB");
    this.out.writeUint8(color >>> 16);
    this.out.writeUint8(color >>> 8);
    this.out.writeUint8(color);
  }

  /** `0xAARRGGBB` as four bytes R, G, B, A. */
  colorRGBA(field: string, color: number): void {
    this.integer(field, color, 0, 0xffffffff, "ColorRGBA");
    this.out.writeUint8(color >>> 16);
    this.out.writeUint8(color >>> 8);
    this.out.writeUint8(color);
    this.out.writeUint8(color >>> 24);
  }

  vector3(field: string, vector: readonly number[]): void {
    this.floats(field, vector, 3);
  }

  /** 16 floats, row-major. */
  matrix(field: string, matrix: readonly number[]): void {
    this.floats(field, matrix, 16);
  }

  /** Fixed-length float run. */
  floats(field: string, values: readonly number[], count: number): void {
    if (values.length !== count) {
      throw this.overflow(field, `expected ${count} components, got ${values.length}`);
    }
    values.forEach((value, i) => this.float32(`${field}[${i}]`, value));
  }

  /** Table index of a referenced object; 0 is the null reference. */
  objectIndex(field: string, index: number): void {
    this.uint32(field, index);
  }

  bytes(data: Uint8Array): void {
    this.out.writeBytes(data);
  }
}
