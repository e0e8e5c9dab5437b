/**
 * Schema-less TLV listing tests.
 */

import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { ErrorCode, WireError } from "../../lib/codec/src/index.js";
import { inspect, listEntries } from "../../src/cli/commands/inspect.js";

describe("listEntries", () => {
  it("lists fixed and length-delimited entries", () => {
    const listing = listEntries(new Uint8Array([0x20, 0x00, 0, 0, 0, 1, 0x40, 0x05, 0x02, 0xaa, 0xbb]));
    expect(listing).toEqual({
      entries: [
        { offset: 0, wireType: 2, dataId: 0, length: 4 },
        { offset: 6, wireType: 4, dataId: 5, length: 2 },
      ],
    });
  });

  it("stops at entries without a length", () => {
    const listing = listEntries(new Uint8Array([0x00, 0x01, 0x09, 0x70, 0x03, 0x01]));
    expect(listing.entries).toEqual([{ offset: 0, wireType: 0, dataId: 1, length: 1 }]);
    expect(listing.stoppedAt).toEqual({ offset: 3, wireType: 7, dataId: 3 });
  });

  it("fails on entries that run past the end", () => {
    try {
      listEntries(new Uint8Array([0x60, 0x01, 0, 0, 0, 9, 0x01]));
      expect.unreachable();
    } catch (error) {
      expect(error instanceof WireError && error.code).toBe(ErrorCode.UNEXPECTED_END_OF_INPUT);
    }
  });
});

describe("inspect", () => {
  let log: MockInstance<typeof console.log>;

  beforeEach(() => {
    log = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    log.mockRestore();
  });

  it("prints one line per entry", async () => {
    await inspect({ hex: "20 00 00 00 00 01 70 03" });
    const lines = log.mock.calls.map((call) => String(call[0]));
    expect(lines).toContain("\x1b[36minfo\x1b[0m  8 byte(s), 1 entry");
    expect(lines).toContain("\x1b[2m  >\x1b[0m @0  id 0  four bytes(2)  4 byte(s)");
    expect(lines).toContain(
      "\x1b[33mwarn\x1b[0m  Stopped at byte 6: entry 3 has wire type complex(7) and no length"
    );
  });
});
