/**
 * Length fields: unsigned big-endian byte counts of 0, 1, 2 or 4 bytes.
 */

import type { LengthFieldWidth } from "../config.js";
import { WireError } from "../diagnostic/index.js";
import type { ByteReader } from "./reader.js";
import type { ByteWriter } from "./writer.js";

const MAX_LENGTH: Readonly<Record<LengthFieldWidth, number>> = {
  0: Number.POSITIVE_INFINITY,
  1: 0xff,
  2: 0xffff,
  4: 0xffffffff,
};

/**
 * Smallest non-zero width that can hold `length`.
 */
export function smallestLengthFieldWidth(length: number): 1 | 2 | 4 {
  if (length <= MAX_LENGTH[1]) return 1;
  if (length <= MAX_LENGTH[2]) return 2;
  return 4;
}

/**
 * Writes a length field. Width 0 writes nothing.
 *
 * @throws WireError `VALUE_TOO_LARGE` if `length` does not fit
 */
export function writeLengthField(writer: ByteWriter, width: LengthFieldWidth, length: number, path: string): void {
  if (length > MAX_LENGTH[width]) {
    throw WireError.valueTooLarge(`${length} bytes do not fit in a ${width}-byte length field`, path);
  }
  switch (width) {
    case 0:
      return;
    case 1:
      writer.writeU8(length);
      return;
    case 2:
      writer.writeU16(length);
      return;
    case 4:
      writer.writeU32(length);
      return;
  }
}

/**
 * Writes `body` preceded by its length field.
 */
export function writeLengthPrefixed(writer: ByteWriter, width: LengthFieldWidth, body: Uint8Array, path: string): void {
  writeLengthField(writer, width, body.length, path);
  writer.writeBytes(body);
}

/**
 * Reads a non-zero width length field.
 */
export function readLengthField(reader: ByteReader, width: 1 | 2 | 4): number {
  switch (width) {
    case 1:
      return reader.readU8();
    case 2:
      return reader.readU16();
    case 4:
      return reader.readU32();
  }
}
