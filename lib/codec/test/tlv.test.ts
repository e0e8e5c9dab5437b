/**
 * TLV struct tests.
 */

import { describe, expect, it } from "vitest";
import {
  ErrorCode,
  createOptions,
  decode,
  encode,
  enumeration,
  field,
  i32,
  sequence,
  string,
  struct,
  u16,
  u8,
} from "../src/index.js";
import { bytes, errorCode, hex } from "./helpers.js";

const Point = struct("Point", [field("x", 0, i32()), field("y", 1, i32())], { tlv: true });
const PointOptionalY = struct("Point", [field("x", 0, i32()), field("y", 1, i32(), { optional: true })], {
  tlv: true,
});

const POINT = [0x20, 0x00, 0x00, 0x00, 0x00, 0x01, 0x20, 0x01, 0x00, 0x00, 0x00, 0x02];

describe("TLV structs", () => {
  describe("encode", () => {
    it("tags every member in declaration order", () => {
      expect(hex(encode({ x: 1, y: 2 }, Point))).toEqual(POINT);
    });

    it("omits absent optional members", () => {
      expect(hex(encode({ x: 1 }, PointOptionalY))).toEqual([0x20, 0x00, 0x00, 0x00, 0x00, 0x01]);
      expect(hex(encode({ x: 1, y: undefined }, PointOptionalY))).toEqual([0x20, 0x00, 0x00, 0x00, 0x00, 0x01]);
    });

    it("fails on an absent mandatory member", () => {
      expect(errorCode(() => encode({ y: 2 }, Point))).toBe(ErrorCode.MISSING_MANDATORY_FIELD);
    });

    it("encodes treat-as unions as their fixed-size type", () => {
      const Gear = enumeration("Gear", u8(), { Park: 0, Drive: 3 });
      const Car = struct("Car", [field("gear", 2, Gear)], { tlv: true });
      expect(hex(encode({ gear: { variant: "Drive" } }, Car))).toEqual([0x00, 0x02, 0x03]);
      expect(decode(bytes(0x00, 0x02, 0x03), Car)).toEqual({ gear: { variant: "Drive" } });
    });
  });

  describe("decode", () => {
    it("decodes members in wire order", () => {
      expect(decode(new Uint8Array(POINT), Point)).toEqual({ x: 1, y: 2 });
    });

    it("accepts members in any order and keeps declaration order", () => {
      const value = decode(bytes(0x20, 0x01, 0, 0, 0, 2, 0x20, 0x00, 0, 0, 0, 1), Point);
      expect(value).toEqual({ x: 1, y: 2 });
      expect(Object.keys(value)).toEqual(["x", "y"]);
    });

    it("leaves absent optional members out", () => {
      const value = decode(bytes(0x20, 0x00, 0, 0, 0, 1), PointOptionalY);
      expect(value).toEqual({ x: 1 });
      expect(Object.keys(value)).toEqual(["x"]);
    });

    it("fails on an absent mandatory member", () => {
      expect(errorCode(() => decode(bytes(0x20, 0x00, 0, 0, 0, 1), Point))).toBe(ErrorCode.MISSING_MANDATORY_FIELD);
    });

    it("fails on a repeated member", () => {
      expect(errorCode(() => decode(bytes(0x20, 0x00, 0, 0, 0, 1, 0x20, 0x00, 0, 0, 0, 2), Point))).toBe(
        ErrorCode.DUPLICATE_FIELD
      );
    });

    it("fails when a known member has the wrong fixed wire type", () => {
      expect(errorCode(() => decode(bytes(0x10, 0x00, 0, 1, 0x20, 0x01, 0, 0, 0, 2), Point))).toBe(
        ErrorCode.WIRE_TYPE_MISMATCH
      );
    });

    it("fails when a known member has a reserved wire type", () => {
      expect(errorCode(() => decode(bytes(0x80, 0x00, 0, 0, 0, 1), Point))).toBe(ErrorCode.UNSUPPORTED_WIRE_TYPE);
    });

    it("fails on truncated entries", () => {
      expect(errorCode(() => decode(bytes(0x20, 0x00, 0, 0), Point))).toBe(ErrorCode.UNEXPECTED_END_OF_INPUT);
      expect(errorCode(() => decode(bytes(0x20), Point))).toBe(ErrorCode.UNEXPECTED_END_OF_INPUT);
    });
  });

  describe("unknown members", () => {
    it("skips every fixed and length-delimited wire type", () => {
      const payload = bytes(
        0x00, 0x10, 0xaa,
        0x10, 0x11, 0xaa, 0xbb,
        0x20, 0x00, 0, 0, 0, 1,
        0x20, 0x12, 1, 2, 3, 4,
        0x30, 0x13, 1, 2, 3, 4, 5, 6, 7, 8,
        0x40, 0x14, 0x02, 0xaa, 0xbb,
        0x50, 0x15, 0x00, 0x01, 0xff,
        0x60, 0x16, 0, 0, 0, 0,
        0x20, 0x01, 0, 0, 0, 2
      );
      expect(decode(payload, Point)).toEqual({ x: 1, y: 2 });
    });

    it("cannot skip wire type 7", () => {
      expect(errorCode(() => decode(bytes(0x70, 0x05, 0x01, 0x20, 0x00, 0, 0, 0, 1, 0x20, 0x01, 0, 0, 0, 2), Point))).toBe(
        ErrorCode.UNSUPPORTED_WIRE_TYPE
      );
    });

    it("cannot skip reserved wire types", () => {
      expect(errorCode(() => decode(bytes(0x90, 0x05, 0x20, 0x00, 0, 0, 0, 1), Point))).toBe(
        ErrorCode.UNSUPPORTED_WIRE_TYPE
      );
    });

    it("fails when a skipped length runs past the input", () => {
      expect(errorCode(() => decode(bytes(0x40, 0x06, 0x05, 0xaa), Point))).toBe(ErrorCode.UNEXPECTED_END_OF_INPUT);
    });
  });

  describe("length-delimited members", () => {
    const Named = struct("Named", [field("name", 3, string())], { tlv: true });

    it("use the configured length field width", () => {
      expect(hex(encode({ name: "ab" }, Named))).toEqual([0x60, 0x03, 0, 0, 0, 2, 0x61, 0x62]);
    });

    it("honor a field override", () => {
      const Short = struct("Short", [field("name", 3, string(), { lengthFieldWidth: 2 })], { tlv: true });
      expect(hex(encode({ name: "ab" }, Short))).toEqual([0x50, 0x03, 0, 2, 0x61, 0x62]);
    });

    it("use the smallest width when selected", () => {
      const options = createOptions({ tlvLengthSelection: "smallest" });
      expect(hex(encode({ name: "ab" }, Named, options))).toEqual([0x40, 0x03, 0x02, 0x61, 0x62]);
      expect(hex(encode({ name: "x".repeat(300) }, Named, options).subarray(0, 4))).toEqual([0x50, 0x03, 0x01, 0x2c]);
    });

    it("decode with whatever width the wire type announces", () => {
      expect(decode(bytes(0x40, 0x03, 0x02, 0x61, 0x62), Named)).toEqual({ name: "ab" });
      expect(decode(bytes(0x50, 0x03, 0x00, 0x02, 0x61, 0x62), Named)).toEqual({ name: "ab" });
      expect(decode(bytes(0x60, 0x03, 0, 0, 0, 2, 0x61, 0x62), Named)).toEqual({ name: "ab" });
    });

    it("reject a fixed wire type", () => {
      expect(errorCode(() => decode(bytes(0x10, 0x03, 0x61, 0x62), Named))).toBe(ErrorCode.WIRE_TYPE_MISMATCH);
    });

    it("fail when the value does not fit the configured width", () => {
      const Short = struct("Short", [field("name", 3, string(), { lengthFieldWidth: 1 })], { tlv: true });
      expect(errorCode(() => encode({ name: "x".repeat(300) }, Short))).toBe(ErrorCode.VALUE_TOO_LARGE);
    });

    it("carry sequences", () => {
      const List = struct("List", [field("items", 4, sequence(u16()))], { tlv: true });
      expect(hex(encode({ items: [1, 2] }, List))).toEqual([0x60, 0x04, 0, 0, 0, 4, 0, 1, 0, 2]);
      expect(decode(bytes(0x60, 0x04, 0, 0, 0, 4, 0, 1, 0, 2), List)).toEqual({ items: [1, 2] });
    });
  });

  describe("nested structs", () => {
    const Inner = struct("Inner", [field("a", 0, u8())]);
    const Holder = struct("Holder", [field("inner", 1, Inner)], { tlv: true });

    it("are length-delimited by default", () => {
      expect(hex(encode({ inner: { a: 7 } }, Holder))).toEqual([0x60, 0x01, 0, 0, 0, 1, 0x07]);
    });

    it("use wire type 7 without a length field", () => {
      const options = createOptions({ lengthFieldWidths: { struct: 0 } });
      expect(hex(encode({ inner: { a: 7 } }, Holder, options))).toEqual([0x70, 0x01, 0x07]);
      expect(decode(bytes(0x70, 0x01, 0x07), Holder, options)).toEqual({ inner: { a: 7 } });
    });

    it("reject wire type 7 where a length field is expected", () => {
      expect(errorCode(() => decode(bytes(0x70, 0x01, 0x07), Holder))).toBe(ErrorCode.WIRE_TYPE_MISMATCH);
    });

    it("nest TLV inside TLV", () => {
      const InnerTlv = struct("InnerTlv", [field("a", 0, u8())], { tlv: true });
      const Outer = struct("Outer", [field("inner", 1, InnerTlv)], { tlv: true });
      const encoded = [0x60, 0x01, 0, 0, 0, 3, 0x00, 0x00, 0x07];
      expect(hex(encode({ inner: { a: 7 } }, Outer))).toEqual(encoded);
      expect(decode(new Uint8Array(encoded), Outer)).toEqual({ inner: { a: 7 } });
    });

    it("keep inner entries inside their length window", () => {
      const InnerTlv = struct("InnerTlv", [field("a", 0, u8())], { tlv: true });
      const Outer = struct("Outer", [field("inner", 1, InnerTlv)], { tlv: true });
      expect(errorCode(() => decode(bytes(0x60, 0x01, 0, 0, 0, 2, 0x00, 0x00, 0x07), Outer))).toBe(
        ErrorCode.LENGTH_MISMATCH
      );
    });

    it("need a length field when not statically sized", () => {
      const InnerTlv = struct("InnerTlv", [field("a", 0, u8())], { tlv: true });
      expect(errorCode(() => struct("Outer", [field("inner", 1, InnerTlv, { lengthFieldWidth: 0 })], { tlv: true }))).toBe(
        ErrorCode.DYNAMIC_WITHOUT_LENGTH_FIELD
      );
    });
  });
});
