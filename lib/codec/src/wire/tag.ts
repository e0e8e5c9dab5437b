/**
 * TLV tags: a 4-bit wire type and a 12-bit data id in one big-endian u16.
 */

import { SchemaError } from "../diagnostic/index.js";

export const WireType = {
  FIXED_1: 0,
  FIXED_2: 1,
  FIXED_4: 2,
  FIXED_8: 3,
  LENGTH_1: 4,
  LENGTH_2: 5,
  LENGTH_4: 6,
  /** Statically sized value without a length field. */
  COMPLEX: 7,
} as const;

export type WireType = (typeof WireType)[keyof typeof WireType];

export const MAX_DATA_ID = 0x0fff;

export const TAG_SIZE = 2;

export interface Tag {
  /** Raw 4-bit wire type; values above 7 are reserved. */
  wireType: number;
  dataId: number;
}

/**
 * Packs a tag into two bytes, always big-endian.
 *
 * @throws SchemaError if the data id does not fit in 12 bits or the wire type is reserved
 */
export function packTag(wireType: WireType, dataId: number): Uint8Array {
  if (!isWireType(wireType)) {
    throw SchemaError.invalidSchema(`wire type ${String(wireType)} is reserved`);
  }
  if (!Number.isInteger(dataId) || dataId < 0 || dataId > MAX_DATA_ID) {
    throw SchemaError.dataIdOutOfRange(dataId);
  }
  const tag = (wireType << 12) | dataId;
  return new Uint8Array([tag >> 8, tag & 0xff]);
}

/**
 * Splits a 16-bit tag value into wire type and data id.
 */
export function splitTag(tag: number): Tag {
  return { wireType: (tag >> 12) & 0x0f, dataId: tag & MAX_DATA_ID };
}

/**
 * Unpacks the first two bytes of `bytes` as a tag.
 */
export function unpackTag(bytes: Uint8Array): Tag {
  if (bytes.length < TAG_SIZE) {
    throw new RangeError(`A tag needs ${TAG_SIZE} bytes, got ${bytes.length}`);
  }
  return splitTag((bytes[0] << 8) | bytes[1]);
}

export function isWireType(value: number): value is WireType {
  return Number.isInteger(value) && value >= WireType.FIXED_1 && value <= WireType.COMPLEX;
}

/**
 * Size of the value following a fixed wire type, or undefined for other wire types.
 */
export function fixedSizeOf(wireType: number): 1 | 2 | 4 | 8 | undefined {
  switch (wireType) {
    case WireType.FIXED_1:
      return 1;
    case WireType.FIXED_2:
      return 2;
    case WireType.FIXED_4:
      return 4;
    case WireType.FIXED_8:
      return 8;
    default:
      return undefined;
  }
}

/**
 * Width of the length field following a length-delimited wire type.
 */
export function lengthFieldWidthOf(wireType: number): 1 | 2 | 4 | undefined {
  switch (wireType) {
    case WireType.LENGTH_1:
      return 1;
    case WireType.LENGTH_2:
      return 2;
    case WireType.LENGTH_4:
      return 4;
    default:
      return undefined;
  }
}

export function wireTypeForFixedSize(size: 1 | 2 | 4 | 8): WireType {
  switch (size) {
    case 1:
      return WireType.FIXED_1;
    case 2:
      return WireType.FIXED_2;
    case 4:
      return WireType.FIXED_4;
    case 8:
      return WireType.FIXED_8;
  }
}

export function wireTypeForLengthField(width: 1 | 2 | 4): WireType {
  switch (width) {
    case 1:
      return WireType.LENGTH_1;
    case 2:
      return WireType.LENGTH_2;
    case 4:
      return WireType.LENGTH_4;
  }
}

/**
 * Describes a raw wire type for messages, e.g. `four bytes(2)`.
 */
export function describeWireType(wireType: number): string {
  switch (wireType) {
    case WireType.FIXED_1:
      return "one byte(0)";
    case WireType.FIXED_2:
      return "two bytes(1)";
    case WireType.FIXED_4:
      return "four bytes(2)";
    case WireType.FIXED_8:
      return "eight bytes(3)";
    case WireType.LENGTH_1:
      return "length delimited one byte(4)";
    case WireType.LENGTH_2:
      return "length delimited two bytes(5)";
    case WireType.LENGTH_4:
      return "length delimited four bytes(6)";
    case WireType.COMPLEX:
      return "complex(7)";
    default:
      return `reserved(${wireType})`;
  }
}
