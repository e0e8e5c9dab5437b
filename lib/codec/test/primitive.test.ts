/**
 * Primitive codec tests.
 */

import { describe, expect, it } from "vitest";
import {
  ErrorCode,
  bool,
  createOptions,
  decode,
  encode,
  f32,
  f64,
  i16,
  i64,
  i8,
  u16,
  u32,
  u64,
  u8,
} from "../src/index.js";
import { bytes, errorCode, hex } from "./helpers.js";

const LITTLE = createOptions({ byteOrder: "little-endian" });

describe("integers", () => {
  it("encodes in the configured byte order", () => {
    expect(hex(encode(0x1234, u16()))).toEqual([0x12, 0x34]);
    expect(hex(encode(0x1234, u16(), LITTLE))).toEqual([0x34, 0x12]);
    expect(hex(encode(0x01020304, u32(), LITTLE))).toEqual([4, 3, 2, 1]);
  });

  it("round-trips signed values", () => {
    expect(hex(encode(-2, i16()))).toEqual([0xff, 0xfe]);
    expect(decode(bytes(0xff, 0xfe), i16())).toBe(-2);
    expect(decode(bytes(0x80), i8())).toBe(-128);
  });

  it("rejects values outside the range of the type", () => {
    expect(errorCode(() => encode(256, u8()))).toBe(ErrorCode.VALUE_TOO_LARGE);
    expect(errorCode(() => encode(-1, u8()))).toBe(ErrorCode.VALUE_TOO_LARGE);
    expect(errorCode(() => encode(0x8000, i16()))).toBe(ErrorCode.VALUE_TOO_LARGE);
    expect(hex(encode(255, u8()))).toEqual([0xff]);
  });

  it("rejects values of the wrong kind", () => {
    expect(errorCode(() => encode(1.5, u8()))).toBe(ErrorCode.INVALID_VALUE);
    expect(errorCode(() => encode("7", u16()))).toBe(ErrorCode.INVALID_VALUE);
    expect(errorCode(() => encode(true, u32()))).toBe(ErrorCode.INVALID_VALUE);
  });
});

describe("64-bit integers", () => {
  it("encode bigints and safe integers", () => {
    expect(hex(encode(0x0102030405060708n, u64()))).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(hex(encode(5, u64()))).toEqual([0, 0, 0, 0, 0, 0, 0, 5]);
    expect(hex(encode(-1n, i64()))).toEqual([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff]);
  });

  it("decode to bigint", () => {
    expect(decode(bytes(0, 0, 0, 0, 0, 0, 0, 5), u64())).toBe(5n);
    expect(decode(bytes(0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xfe), i64())).toBe(-2n);
    expect(decode(bytes(5, 0, 0, 0, 0, 0, 0, 0), u64(), LITTLE)).toBe(5n);
  });

  it("rejects out-of-range values", () => {
    expect(errorCode(() => encode(2n ** 64n, u64()))).toBe(ErrorCode.VALUE_TOO_LARGE);
    expect(errorCode(() => encode(-1n, u64()))).toBe(ErrorCode.VALUE_TOO_LARGE);
    expect(errorCode(() => encode(2n ** 63n, i64()))).toBe(ErrorCode.VALUE_TOO_LARGE);
    expect(errorCode(() => encode(2 ** 60, u64()))).toBe(ErrorCode.INVALID_VALUE);
  });
});

describe("floats", () => {
  it("encode IEEE 754", () => {
    expect(hex(encode(1.5, f32()))).toEqual([0x3f, 0xc0, 0x00, 0x00]);
    expect(hex(encode(1, f64()))).toEqual([0x3f, 0xf0, 0, 0, 0, 0, 0, 0]);
    expect(hex(encode(1.5, f32(), LITTLE))).toEqual([0x00, 0x00, 0xc0, 0x3f]);
  });

  it("decode IEEE 754", () => {
    expect(decode(bytes(0xc0, 0x00, 0x00, 0x00), f32())).toBe(-2);
    expect(decode(bytes(0x3f, 0xf0, 0, 0, 0, 0, 0, 0), f64())).toBe(1);
  });
});

describe("bool", () => {
  it("encodes as 1 or 0", () => {
    expect(hex(encode(true, bool()))).toEqual([1]);
    expect(hex(encode(false, bool()))).toEqual([0]);
  });

  it("only accepts 0 and 1 on decode", () => {
    expect(decode(bytes(1), bool())).toBe(true);
    expect(errorCode(() => decode(bytes(2), bool()))).toBe(ErrorCode.INVALID_BOOLEAN_VALUE);
  });

  it("rejects non-boolean values", () => {
    expect(errorCode(() => encode(1, bool()))).toBe(ErrorCode.INVALID_VALUE);
  });
});

describe("input length", () => {
  it("fails on too few bytes", () => {
    expect(errorCode(() => decode(bytes(0, 0, 1), u32()))).toBe(ErrorCode.UNEXPECTED_END_OF_INPUT);
  });

  it("fails on bytes left over", () => {
    expect(errorCode(() => decode(bytes(0, 0, 0, 1, 9), u32()))).toBe(ErrorCode.LENGTH_MISMATCH);
  });
});
