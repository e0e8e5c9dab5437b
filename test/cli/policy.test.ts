/**
 * Policy flag tests.
 */

import { describe, expect, it } from "vitest";
import { ErrorCode, SchemaError } from "../../lib/codec/src/index.js";
import type { PolicyFlags } from "../../src/cli/args.js";
import { optionsFromFlags } from "../../src/cli/utils/policy.js";

const DEFAULT_FLAGS: PolicyFlags = { bom: false, terminator: false, smallest: false };

describe("optionsFromFlags", () => {
  it("keeps the reference policy without flags", () => {
    const options = optionsFromFlags(DEFAULT_FLAGS);
    expect(options.byteOrder()).toBe("big-endian");
    expect(options.stringEncoding()).toBe("utf-8");
    expect(options.lengthFieldWidth("string")).toBe(4);
    expect(options.tlvLengthSelection()).toBe("configured");
  });

  it("accepts short and long spellings", () => {
    expect(optionsFromFlags({ ...DEFAULT_FLAGS, byteOrder: "little" }).byteOrder()).toBe("little-endian");
    expect(optionsFromFlags({ ...DEFAULT_FLAGS, byteOrder: "Big-Endian" }).byteOrder()).toBe("big-endian");
    expect(optionsFromFlags({ ...DEFAULT_FLAGS, encoding: "UTF8" }).stringEncoding()).toBe("utf-8");
    expect(optionsFromFlags({ ...DEFAULT_FLAGS, encoding: "utf-16be" }).stringEncoding()).toBe("utf-16be");
  });

  it("applies the length width to every category", () => {
    const options = optionsFromFlags({ ...DEFAULT_FLAGS, lengthWidth: "2" });
    expect(options.toConfig().lengthFieldWidths).toEqual({ array: 2, string: 2, struct: 2, union: 2 });
  });

  it("maps boolean flags", () => {
    const options = optionsFromFlags({ bom: true, terminator: true, smallest: true });
    expect(options.stringBom()).toBe(true);
    expect(options.stringTerminator()).toBe(true);
    expect(options.tlvLengthSelection()).toBe("smallest");
  });

  it("rejects unknown values", () => {
    expect(() => optionsFromFlags({ ...DEFAULT_FLAGS, byteOrder: "middle" })).toThrow(SchemaError);
    expect(() => optionsFromFlags({ ...DEFAULT_FLAGS, encoding: "latin1" })).toThrow(SchemaError);
    try {
      optionsFromFlags({ ...DEFAULT_FLAGS, lengthWidth: "3" });
      expect.unreachable();
    } catch (error) {
      expect(error instanceof SchemaError && error.code).toBe(ErrorCode.INVALID_OPTIONS);
    }
  });
});
