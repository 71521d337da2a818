/**
 * Growable little-endian byte buffer.
 */
export class ByteWriter {
  private buf = new Uint8Array(256);
  private view = new DataView(this.buf.buffer);
  private used = 0;

  get length(): number {
    return this.used;
  }

  toUint8Array(): Uint8Array {
    return this.buf.slice(0, this.used);
  }

  private ensure(extra: number): void {
    const need = this.used + extra;
    if (need <= this.buf.length) return;
    let next = this.buf.length;
    while (next < need) next *= 2;
    const grown = new Uint8Array(next);
    grown.set(this.buf.subarray(0, this.used));
    this.buf = grown;
    this.view = new DataView(this.buf.buffer);
  }

  writeUint8(value: number): void {
    this.ensure(1);
    this.buf[this.used] = value & 0xff;
    this.used += 1;
  }

  writeUint16(value: number): void {
    this.ensure(2);
    this.view.setUint16(this.used, value & 0xffff, true);
    this.used += 2;
  }

  writeInt32(value: number): void {
    this.ensure(4);
    this.view.setInt32(this.used, value, true);
    this.used += 4;
  }

  writeUint32(value: number): void {
    this.ensure(4);
    this.view.setUint32(this.used, value >>> 0, true);
    this.used += 4;
  }

  writeFloat32(value: number): void {
    this.ensure(4);
    this.view.setFloat32(this.used, value, true);
    this.used += 4;
  }

  writeBytes(bytes: Uint8Array): void {
    this.ensure(bytes.length);
    this.buf.set(bytes, this.used);
    this.used += bytes.length;
  }
}
