/**
 * Encode/decode entry points.
 */

import { REFERENCE_OPTIONS, type SomeIpOptions } from "./config.js";
import type { SchemaType, SomeIpValue } from "./schema/types.js";
import { WireError } from "./diagnostic/index.js";
import { validateSchema } from "./schema/validate.js";
import { ByteReader } from "./wire/reader.js";
import { ByteWriter } from "./wire/writer.js";
import { CodecContext, rootPath } from "./engine/context.js";
import { encodeBody } from "./engine/encoder.js";
import { decodeBody } from "./engine/decoder.js";

function encodeRoot(value: SomeIpValue, schema: SchemaType, options: SomeIpOptions): Uint8Array {
  const writer = new ByteWriter();
  encodeBody(writer, schema, value, new CodecContext(options), rootPath(schema));
  return writer.finish();
}

function decodeRoot(bytes: Uint8Array, schema: SchemaType, options: SomeIpOptions): SomeIpValue {
  const reader = new ByteReader(bytes);
  const path = rootPath(schema);
  const value = decodeBody(reader, schema, true, new CodecContext(options), path);
  if (reader.remaining() > 0) {
    throw WireError.lengthMismatch(`${reader.remaining()} byte(s) left after the value`, reader.offset, path);
  }
  return value;
}

/**
 * Encodes a value. The root value has no length field.
 *
 * @throws SchemaError if the schema is invalid
 * @throws WireError if the value does not fit the schema
 *
 * @example
 * ```ts
 * const Point = struct("Point", [field("x", 0, i32()), field("y", 1, i32())], { tlv: true });
 * encode({ x: 1, y: 2 }, Point);
 * // 20 00 00 00 00 01 20 01 00 00 00 02
 * ```
 */
export function encode(value: SomeIpValue, schema: SchemaType, options: SomeIpOptions = REFERENCE_OPTIONS): Uint8Array {
  validateSchema(schema);
  return encodeRoot(value, schema, options);
}

/**
 * Decodes a value that spans all of `bytes`.
 *
 * @throws SchemaError if the schema is invalid
 * @throws WireError if the bytes are malformed or do not match the schema
 */
export function decode(bytes: Uint8Array, schema: SchemaType, options: SomeIpOptions = REFERENCE_OPTIONS): SomeIpValue {
  validateSchema(schema);
  return decodeRoot(bytes, schema, options);
}

/**
 * A schema and options bundle, validated once and reused across calls.
 */
export class Codec {
  readonly schema: SchemaType;
  readonly options: SomeIpOptions;

  constructor(schema: SchemaType, options: SomeIpOptions = REFERENCE_OPTIONS) {
    validateSchema(schema);
    this.schema = schema;
    this.options = options;
  }

  encode(value: SomeIpValue): Uint8Array {
    return encodeRoot(value, this.schema, this.options);
  }

  decode(bytes: Uint8Array): SomeIpValue {
    return decodeRoot(bytes, this.schema, this.options);
  }
}

/**
 * Creates a codec for a schema.
 */
export function createCodec(schema: SchemaType, options?: SomeIpOptions): Codec {
  return new Codec(schema, options);
}
