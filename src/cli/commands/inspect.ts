/**
 * someip-wire inspect - Lists the top-level TLV entries of a payload.
 */

import {
  ByteReader,
  describeWireType,
  fixedSizeOf,
  lengthFieldWidthOf,
  splitTag,
} from "../../../lib/codec/src/index.js";
import type { InspectOptions } from "../args.js";
import { parseHex } from "../utils/hex.js";
import { logger } from "../utils/logger.js";

export interface TlvEntry {
  /** Offset of the tag. */
  offset: number;
  wireType: number;
  dataId: number;
  /** Size of the value in bytes, without tag and length field. */
  length: number;
}

export interface TlvListing {
  entries: TlvEntry[];
  /** Set when listing stopped before the end of the payload. */
  stoppedAt?: { offset: number; wireType: number; dataId: number };
}

/**
 * Walks the tags of a TLV payload without a schema.
 *
 * Stops at the first entry of wire type 7 or a reserved wire type, whose
 * size cannot be known without a schema.
 *
 * @throws WireError if an entry runs past the end of the payload
 */
export function listEntries(bytes: Uint8Array): TlvListing {
  const reader = new ByteReader(bytes);
  const entries: TlvEntry[] = [];

  while (reader.remaining() > 0) {
    const offset = reader.offset;
    const { wireType, dataId } = splitTag(reader.readU16());

    const fixed = fixedSizeOf(wireType);
    const lengthField = lengthFieldWidthOf(wireType);
    let length: number;
    if (fixed !== undefined) {
      length = fixed;
    } else if (lengthField !== undefined) {
      length = lengthField === 1 ? reader.readU8() : lengthField === 2 ? reader.readU16() : reader.readU32();
    } else {
      return { entries, stoppedAt: { offset, wireType, dataId } };
    }

    reader.skip(length);
    entries.push({ offset, wireType, dataId, length });
  }

  return { entries };
}

export async function inspect(options: InspectOptions): Promise<void> {
  const bytes = parseHex(options.hex);
  const listing = listEntries(bytes);

  logger.header("someip-wire inspect");
  logger.info(`${bytes.length} byte(s), ${listing.entries.length} entr${listing.entries.length === 1 ? "y" : "ies"}`);
  logger.raw("");

  for (const entry of listing.entries) {
    logger.step(`@${entry.offset}  id ${entry.dataId}  ${describeWireType(entry.wireType)}  ${entry.length} byte(s)`);
  }

  if (listing.stoppedAt !== undefined) {
    const { offset, wireType, dataId } = listing.stoppedAt;
    logger.warn(`Stopped at byte ${offset}: entry ${dataId} has wire type ${describeWireType(wireType)} and no length`);
  }
}
