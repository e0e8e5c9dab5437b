/**
 * someip-wire encode - Encodes a JSON value and prints the payload as hex.
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { createCodec } from "../../../lib/codec/src/index.js";
import type { EncodeOptions } from "../args.js";
import { formatHex } from "../utils/hex.js";
import { logger } from "../utils/logger.js";
import { optionsFromFlags } from "../utils/policy.js";
import { loadSchemaFile } from "../utils/schema-file.js";
import { valueFromJson } from "../utils/values.js";

/**
 * Reads the `--value` argument: inline JSON, or `@path` to a JSON file.
 */
export async function readValueArgument(argument: string, cwd: string = process.cwd()): Promise<unknown> {
  const text = argument.startsWith("@") ? await readFile(resolve(cwd, argument.slice(1)), "utf-8") : argument;
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (error) {
    throw new Error(`--value is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export async function encode(options: EncodeOptions): Promise<void> {
  const schema = await loadSchemaFile(resolve(process.cwd(), options.schema));
  const codec = createCodec(schema, optionsFromFlags(options.policy));
  const json = await readValueArgument(options.value);

  const bytes = codec.encode(valueFromJson(json, schema, "$"));
  logger.raw(formatHex(bytes));
}
