/**
 * JSON value conversion tests.
 */

import { describe, expect, it } from "vitest";
import {
  ErrorCode,
  WireError,
  field,
  i32,
  sequence,
  string,
  struct,
  u64,
  union,
  variant,
} from "../../lib/codec/src/index.js";
import { valueFromJson, valueToJson } from "../../src/cli/utils/values.js";

const Item = struct(
  "Item",
  [
    field("id", 0, u64()),
    field("tags", 1, sequence(string())),
    field("score", 2, i32(), { optional: true }),
    field("kind", 3, union("Kind", [variant("Plain", 0), variant("Sized", 1, i32())]), { optional: true }),
  ],
  { tlv: true }
);

describe("valueFromJson", () => {
  it("converts decimal strings to bigints", () => {
    expect(valueFromJson({ id: "18446744073709551615", tags: [] }, Item, "$")).toEqual({
      id: 18446744073709551615n,
      tags: [],
    });
    expect(valueFromJson({ id: 7, tags: ["a"] }, Item, "$")).toEqual({ id: 7n, tags: ["a"] });
  });

  it("drops null members", () => {
    expect(valueFromJson({ id: "1", tags: [], score: null }, Item, "$")).toEqual({ id: 1n, tags: [] });
  });

  it("converts union objects", () => {
    expect(valueFromJson({ id: "1", tags: [], kind: { variant: "Sized", value: 3 } }, Item, "$")).toEqual({
      id: 1n,
      tags: [],
      kind: { variant: "Sized", value: 3 },
    });
  });

  it("reports the path of a mistyped member", () => {
    try {
      valueFromJson({ id: "1", tags: ["a", 2] }, Item, "$");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(WireError);
      expect(error instanceof WireError && error.code).toBe(ErrorCode.INVALID_VALUE);
      expect(error instanceof WireError && error.path).toBe("$.tags[1]");
    }
  });

  it("rejects unions without a variant name", () => {
    expect(() => valueFromJson({ id: "1", tags: [], kind: { value: 3 } }, Item, "$")).toThrow(WireError);
    expect(() => valueFromJson({ id: 1.5, tags: [] }, Item, "$")).toThrow(WireError);
  });
});

describe("valueToJson", () => {
  it("prints bigints as decimal strings", () => {
    expect(valueToJson({ id: 42n, tags: ["x"], kind: { variant: "Plain" } }, Item)).toEqual({
      id: "42",
      tags: ["x"],
      kind: { variant: "Plain" },
    });
  });

  it("leaves absent members out", () => {
    expect(valueToJson({ id: 1n, tags: [] }, Item)).toEqual({ id: "1", tags: [] });
  });
});
