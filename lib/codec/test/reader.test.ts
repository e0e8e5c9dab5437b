/**
 * ByteReader and ByteWriter tests.
 */

import { describe, expect, it } from "vitest";
import { ByteReader, ByteWriter, ErrorCode } from "../src/index.js";
import { bytes, errorCode, hex } from "./helpers.js";

describe("ByteReader", () => {
  it("reads big-endian by default", () => {
    const reader = new ByteReader(bytes(0x12, 0x34, 0x56, 0x78));
    expect(reader.readU16()).toBe(0x1234);
    expect(reader.readU16(true)).toBe(0x7856);
    expect(reader.remaining()).toBe(0);
  });

  it("reports end of input at the outermost window", () => {
    const reader = new ByteReader(bytes(1, 2, 3));
    expect(errorCode(() => reader.readU32())).toBe(ErrorCode.UNEXPECTED_END_OF_INPUT);
    expect(errorCode(() => reader.openWindow(4))).toBe(ErrorCode.UNEXPECTED_END_OF_INPUT);
  });

  it("bounds reads by the innermost window", () => {
    const reader = new ByteReader(bytes(1, 2, 3, 4));
    reader.openWindow(2);
    expect(reader.readU8()).toBe(1);
    expect(reader.readU8()).toBe(2);
    expect(errorCode(() => reader.readU8())).toBe(ErrorCode.LENGTH_MISMATCH);
    reader.closeWindow();
    expect(reader.readU8()).toBe(3);
  });

  it("requires a window to be consumed before it closes", () => {
    const reader = new ByteReader(bytes(1, 2, 3, 4));
    reader.openWindow(3);
    reader.readU8();
    expect(errorCode(() => reader.closeWindow("Outer.inner"))).toBe(ErrorCode.LENGTH_MISMATCH);
  });

  it("rejects a nested window larger than its parent", () => {
    const reader = new ByteReader(bytes(1, 2, 3, 4));
    reader.openWindow(2);
    expect(errorCode(() => reader.openWindow(3))).toBe(ErrorCode.LENGTH_MISMATCH);
  });

  it("returns views for readBytes", () => {
    const reader = new ByteReader(bytes(9, 8, 7));
    reader.skip(1);
    expect(hex(reader.readBytes(2))).toEqual([8, 7]);
    expect(reader.offset).toBe(3);
  });
});

describe("ByteWriter", () => {
  it("grows past its initial capacity", () => {
    const writer = new ByteWriter(8);
    for (let i = 0; i < 100; i++) {
      writer.writeU8(i);
    }
    const out = writer.finish();
    expect(out.length).toBe(100);
    expect(out[99]).toBe(99);
  });

  it("writes multi-byte values in the requested order", () => {
    const writer = new ByteWriter();
    writer.writeU32(0x01020304);
    writer.writeU16(0x0506, true);
    writer.writeZeros(2);
    expect(hex(writer.finish())).toEqual([1, 2, 3, 4, 6, 5, 0, 0]);
  });
});
