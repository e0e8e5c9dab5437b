/**
 * someip-wire decode - Decodes a hex payload and prints the value as JSON.
 */

import { resolve } from "node:path";
import { createCodec } from "../../../lib/codec/src/index.js";
import type { DecodeOptions } from "../args.js";
import { parseHex } from "../utils/hex.js";
import { logger } from "../utils/logger.js";
import { optionsFromFlags } from "../utils/policy.js";
import { loadSchemaFile } from "../utils/schema-file.js";
import { valueToJson } from "../utils/values.js";

export async function decode(options: DecodeOptions): Promise<void> {
  const schema = await loadSchemaFile(resolve(process.cwd(), options.schema));
  const codec = createCodec(schema, optionsFromFlags(options.policy));

  const value = codec.decode(parseHex(options.hex));
  logger.raw(JSON.stringify(valueToJson(value, schema), null, 2));
}
