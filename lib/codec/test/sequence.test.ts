/**
 * Sequence codec tests.
 */

import { describe, expect, it } from "vitest";
import { ErrorCode, SchemaError, decode, encode, field, sequence, string, struct, u16, u8 } from "../src/index.js";
import { bytes, errorCode, hex } from "./helpers.js";

describe("dynamic sequences", () => {
  const List = struct("List", [field("a", 0, sequence(u16()))]);

  it("prefixes the byte length of the elements", () => {
    expect(hex(encode({ a: [1, 2] }, List))).toEqual([0, 0, 0, 4, 0, 1, 0, 2]);
    expect(decode(bytes(0, 0, 0, 4, 0, 1, 0, 2), List)).toEqual({ a: [1, 2] });
  });

  it("handles empty sequences", () => {
    expect(hex(encode({ a: [] }, List))).toEqual([0, 0, 0, 0]);
    expect(decode(bytes(0, 0, 0, 0), List)).toEqual({ a: [] });
  });

  it("prefixes each length-delimited element", () => {
    const Names = struct("Names", [field("n", 0, sequence(string()))]);
    const expected = [0, 0, 0, 11, 0, 0, 0, 1, 0x61, 0, 0, 0, 2, 0x62, 0x63];
    expect(hex(encode({ n: ["a", "bc"] }, Names))).toEqual(expected);
    expect(decode(new Uint8Array(expected), Names)).toEqual({ n: ["a", "bc"] });
  });

  it("fails on a partial element", () => {
    expect(errorCode(() => decode(bytes(0, 0, 0, 3, 0, 1, 0), List))).toBe(ErrorCode.LENGTH_MISMATCH);
  });

  it("writes no length field at the root", () => {
    expect(hex(encode([1, 2], sequence(u8())))).toEqual([1, 2]);
    expect(decode(bytes(1, 2, 3), sequence(u8()))).toEqual([1, 2, 3]);
  });

  it("fails when the elements outgrow the length field", () => {
    const Short = struct("Short", [field("a", 0, sequence(u8(), { lengthFieldWidth: 1 }))]);
    const full = new Array<number>(255).fill(7);
    const longest = encode({ a: full }, Short);
    expect(longest.length).toBe(256);
    expect(longest[0]).toBe(255);
    expect(decode(longest, Short)).toEqual({ a: full });
    expect(errorCode(() => encode({ a: [...full, 7] }, Short))).toBe(ErrorCode.VALUE_TOO_LARGE);
  });

  it("rejects non-array values", () => {
    expect(errorCode(() => encode({ a: 5 }, List))).toBe(ErrorCode.INVALID_VALUE);
  });
});

describe("element bounds", () => {
  const Bounded = struct("Bounded", [field("a", 0, sequence(u8(), { minElements: 1, maxElements: 2 }))]);

  it("are checked on encode", () => {
    expect(errorCode(() => encode({ a: [1, 2, 3] }, Bounded))).toBe(ErrorCode.LENGTH_OUT_OF_BOUNDS);
    expect(errorCode(() => encode({ a: [] }, Bounded))).toBe(ErrorCode.LENGTH_OUT_OF_BOUNDS);
  });

  it("are checked on decode", () => {
    expect(errorCode(() => decode(bytes(0, 0, 0, 3, 1, 2, 3), Bounded))).toBe(ErrorCode.LENGTH_OUT_OF_BOUNDS);
    expect(decode(bytes(0, 0, 0, 2, 1, 2), Bounded)).toEqual({ a: [1, 2] });
  });
});

describe("static sequences", () => {
  it("may omit the length field when elements are statically sized", () => {
    const Pair = struct("Pair", [field("a", 0, sequence(u16(), { count: 2, lengthFieldWidth: 0 }))]);
    expect(hex(encode({ a: [1, 2] }, Pair))).toEqual([0, 1, 0, 2]);
    expect(decode(bytes(0, 1, 0, 2), Pair)).toEqual({ a: [1, 2] });
    expect(errorCode(() => encode({ a: [1, 2, 3] }, Pair))).toBe(ErrorCode.LENGTH_OUT_OF_BOUNDS);
  });

  it("must match the count inside a length field", () => {
    const Pair = struct("Pair", [field("a", 0, sequence(u16(), { count: 2 }))]);
    expect(hex(encode({ a: [1, 2] }, Pair))).toEqual([0, 0, 0, 4, 0, 1, 0, 2]);
    expect(errorCode(() => decode(bytes(0, 0, 0, 6, 0, 1, 0, 2, 0, 3), Pair))).toBe(ErrorCode.LENGTH_MISMATCH);
    expect(errorCode(() => decode(bytes(0, 0, 0, 2, 0, 1), Pair))).toBe(ErrorCode.LENGTH_MISMATCH);
  });

  it("need a length field for dynamic elements", () => {
    expect(() => sequence(string(), { count: 2, lengthFieldWidth: 0 })).toThrow(SchemaError);
  });
});
