/**
 * Forward-only reader over an encoded payload.
 *
 * Reads are bounded by a stack of windows. The outermost window is the whole
 * input; each length field opens a nested window that must be consumed
 * exactly before it is closed. Running past the input is
 * `UNEXPECTED_END_OF_INPUT`; running past a nested window while the input
 * still has bytes is `LENGTH_MISMATCH`.
 */

import { WireError } from "../diagnostic/index.js";

export class ByteReader {
  private readonly bytes: Uint8Array;
  private readonly view: DataView;
  private position = 0;
  private readonly windows: number[] = [];

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  /** Absolute read position. */
  get offset(): number {
    return this.position;
  }

  /** End of the current window. */
  get end(): number {
    return this.windows.length > 0 ? this.windows[this.windows.length - 1] : this.bytes.length;
  }

  /** Number of open nested windows. */
  get depth(): number {
    return this.windows.length;
  }

  remaining(): number {
    return this.end - this.position;
  }

  private ensure(n: number): void {
    const available = this.end - this.position;
    if (n <= available) return;
    if (this.windows.length === 0) {
      throw WireError.unexpectedEndOfInput(n, available, this.position);
    }
    throw WireError.lengthMismatch(
      `needed ${n} byte(s) but the enclosing length field leaves only ${available}`,
      this.position
    );
  }

  /**
   * Opens a window of `length` bytes starting at the current position.
   */
  openWindow(length: number): void {
    this.ensure(length);
    this.windows.push(this.position + length);
  }

  /**
   * Closes the current window, which must have been read to its end.
   */
  closeWindow(path?: string): void {
    const end = this.windows.pop();
    if (end === undefined) {
      throw new Error("closeWindow() called without an open window");
    }
    if (this.position !== end) {
      throw WireError.lengthMismatch(`${end - this.position} byte(s) left unread in a length-delimited value`, this.position, path);
    }
  }

  readU8(): number {
    this.ensure(1);
    const v = this.view.getUint8(this.position);
    this.position += 1;
    return v;
  }

  readU16(littleEndian = false): number {
    this.ensure(2);
    const v = this.view.getUint16(this.position, littleEndian);
    this.position += 2;
    return v;
  }

  readU32(littleEndian = false): number {
    this.ensure(4);
    const v = this.view.getUint32(this.position, littleEndian);
    this.position += 4;
    return v;
  }

  readI8(): number {
    this.ensure(1);
    const v = this.view.getInt8(this.position);
    this.position += 1;
    return v;
  }

  readI16(littleEndian = false): number {
    this.ensure(2);
    const v = this.view.getInt16(this.position, littleEndian);
    this.position += 2;
    return v;
  }

  readI32(littleEndian = false): number {
    this.ensure(4);
    const v = this.view.getInt32(this.position, littleEndian);
    this.position += 4;
    return v;
  }

  readU64(littleEndian = false): bigint {
    this.ensure(8);
    const v = this.view.getBigUint64(this.position, littleEndian);
    this.position += 8;
    return v;
  }

  readI64(littleEndian = false): bigint {
    this.ensure(8);
    const v = this.view.getBigInt64(this.position, littleEndian);
    this.position += 8;
    return v;
  }

  readF32(littleEndian = false): number {
    this.ensure(4);
    const v = this.view.getFloat32(this.position, littleEndian);
    this.position += 4;
    return v;
  }

  readF64(littleEndian = false): number {
    this.ensure(8);
    const v = this.view.getFloat64(this.position, littleEndian);
    this.position += 8;
    return v;
  }

  /**
   * Returns a view of the next `n` bytes without copying.
   */
  readBytes(n: number): Uint8Array {
    this.ensure(n);
    const slice = this.bytes.subarray(this.position, this.position + n);
    this.position += n;
    return slice;
  }

  skip(n: number): void {
    this.ensure(n);
    this.position += n;
  }
}
