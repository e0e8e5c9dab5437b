/**
 * Append-only byte buffer for encoding.
 */

export class ByteWriter {
  private buffer: Uint8Array;
  private view: DataView;
  private position = 0;

  constructor(initialCapacity = 64) {
    this.buffer = new Uint8Array(Math.max(initialCapacity, 8));
    this.view = new DataView(this.buffer.buffer);
  }

  get length(): number {
    return this.position;
  }

  private grow(n: number): void {
    if (this.position + n <= this.buffer.length) return;
    let capacity = this.buffer.length;
    while (capacity < this.position + n) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this.buffer.subarray(0, this.position));
    this.buffer = next;
    this.view = new DataView(next.buffer);
  }

  writeU8(value: number): void {
    this.grow(1);
    this.view.setUint8(this.position, value);
    this.position += 1;
  }

  writeU16(value: number, littleEndian = false): void {
    this.grow(2);
    this.view.setUint16(this.position, value, littleEndian);
    this.position += 2;
  }

  writeU32(value: number, littleEndian = false): void {
    this.grow(4);
    this.view.setUint32(this.position, value, littleEndian);
    this.position += 4;
  }

  writeI8(value: number): void {
    this.grow(1);
    this.view.setInt8(this.position, value);
    this.position += 1;
  }

  writeI16(value: number, littleEndian = false): void {
    this.grow(2);
    this.view.setInt16(this.position, value, littleEndian);
    this.position += 2;
  }

  writeI32(value: number, littleEndian = false): void {
    this.grow(4);
    this.view.setInt32(this.position, value, littleEndian);
    this.position += 4;
  }

  writeU64(value: bigint, littleEndian = false): void {
    this.grow(8);
    this.view.setBigUint64(this.position, value, littleEndian);
    this.position += 8;
  }

  writeI64(value: bigint, littleEndian = false): void {
    this.grow(8);
    this.view.setBigInt64(this.position, value, littleEndian);
    this.position += 8;
  }

  writeF32(value: number, littleEndian = false): void {
    this.grow(4);
    this.view.setFloat32(this.position, value, littleEndian);
    this.position += 4;
  }

  writeF64(value: number, littleEndian = false): void {
    this.grow(8);
    this.view.setFloat64(this.position, value, littleEndian);
    this.position += 8;
  }

  writeBytes(bytes: Uint8Array): void {
    this.grow(bytes.length);
    this.buffer.set(bytes, this.position);
    this.position += bytes.length;
  }

  writeZeros(count: number): void {
    this.grow(count);
    this.buffer.fill(0, this.position, this.position + count);
    this.position += count;
  }

  /**
   * Returns a copy of the bytes written so far.
   */
  finish(): Uint8Array {
    return this.buffer.slice(0, this.position);
  }
}
