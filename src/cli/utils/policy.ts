/**
 * Builds an options bundle from command line policy flags.
 */

import {
  SchemaError,
  createOptions,
  type ByteOrder,
  type PartialOptionsConfig,
  type SomeIpOptions,
  type StringEncoding,
} from "../../../lib/codec/src/index.js";
import type { PolicyFlags } from "../args.js";

const BYTE_ORDERS: Readonly<Record<string, ByteOrder>> = {
  big: "big-endian",
  "big-endian": "big-endian",
  little: "little-endian",
  "little-endian": "little-endian",
};

const ENCODINGS: Readonly<Record<string, StringEncoding>> = {
  "utf-8": "utf-8",
  utf8: "utf-8",
  "utf-16be": "utf-16be",
  "utf-16le": "utf-16le",
};

/**
 * @throws SchemaError `INVALID_OPTIONS` for an unknown flag value
 */
export function optionsFromFlags(flags: PolicyFlags): SomeIpOptions {
  const config: PartialOptionsConfig = {
    stringBom: flags.bom,
    stringTerminator: flags.terminator,
    tlvLengthSelection: flags.smallest ? "smallest" : "configured",
  };

  if (flags.byteOrder !== undefined) {
    const byteOrder = BYTE_ORDERS[flags.byteOrder.toLowerCase()];
    if (byteOrder === undefined) {
      throw SchemaError.invalidOptions(`unknown byte order '${flags.byteOrder}' (use big or little)`);
    }
    config.byteOrder = byteOrder;
  }

  if (flags.encoding !== undefined) {
    const encoding = ENCODINGS[flags.encoding.toLowerCase()];
    if (encoding === undefined) {
      throw SchemaError.invalidOptions(`unknown string encoding '${flags.encoding}'`);
    }
    config.stringEncoding = encoding;
  }

  if (flags.lengthWidth !== undefined) {
    const width = Number(flags.lengthWidth);
    if (width !== 0 && width !== 1 && width !== 2 && width !== 4) {
      throw SchemaError.invalidOptions(`length field width must be 0, 1, 2 or 4, got '${flags.lengthWidth}'`);
    }
    config.lengthFieldWidths = { array: width, string: width, struct: width, union: width };
  }

  return createOptions(config);
}
