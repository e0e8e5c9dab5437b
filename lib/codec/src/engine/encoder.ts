/**
 * Schema-driven encoder.
 *
 * `encodeBody` writes a value without its length field; `encodeNested`
 * resolves and writes the length field around it. Struct members in TLV
 * mode are additionally framed by a tag.
 */

import type { LengthFieldWidth } from "../config.js";
import type {
  SchemaField,
  SchemaType,
  SequenceType,
  SomeIpValue,
  StructType,
  UnionType,
} from "../schema/types.js";
import { SchemaError, WireError } from "../diagnostic/index.js";
import { encodedType, resolveLengthFieldWidth } from "../schema/layout.js";
import { ByteWriter } from "../wire/writer.js";
import { encodePrimitive } from "../wire/primitive.js";
import { encodeText } from "../wire/text.js";
import { smallestLengthFieldWidth, writeLengthPrefixed } from "../wire/length-field.js";
import { WireType, packTag, wireTypeForFixedSize, wireTypeForLengthField } from "../wire/tag.js";
import {
  type CodecContext,
  fieldPath,
  indexPath,
  isRecordValue,
  isSequenceValue,
  isUnionValue,
  variantPath,
} from "./context.js";

const DISCRIMINANT_MAX: Readonly<Record<1 | 2 | 4, number>> = { 1: 0xff, 2: 0xffff, 4: 0xffffffff };

/**
 * Writes the body of a value, without a length field.
 */
export function encodeBody(
  writer: ByteWriter,
  type: SchemaType,
  value: SomeIpValue | undefined,
  ctx: CodecContext,
  path: string
): void {
  switch (type.kind) {
    case "primitive":
      encodePrimitive(writer, type, value, ctx.littleEndian, path);
      return;
    case "string":
      if (typeof value !== "string") {
        throw WireError.invalidValue("a string", value, path);
      }
      writer.writeBytes(encodeText(value, type, ctx.options, path));
      return;
  }

  ctx.enter(path);
  try {
    if (type.kind === "sequence") {
      encodeSequence(writer, type, value, ctx, path);
    } else if (type.kind === "struct") {
      encodeStruct(writer, type, value, ctx, path);
    } else {
      encodeUnion(writer, type, value, ctx, path);
    }
  } finally {
    ctx.leave();
  }
}

/**
 * Writes a nested value preceded by its length field, if it has one.
 */
export function encodeNested(
  writer: ByteWriter,
  type: SchemaType,
  value: SomeIpValue | undefined,
  override: LengthFieldWidth | undefined,
  ctx: CodecContext,
  path: string
): void {
  const width = resolveLengthFieldWidth(type, override, ctx.options, path);
  if (width === undefined || width === 0) {
    encodeBody(writer, type, value, ctx, path);
    return;
  }
  const body = new ByteWriter();
  encodeBody(body, type, value, ctx, path);
  writeLengthPrefixed(writer, width, body.finish(), path);
}

function encodeSequence(
  writer: ByteWriter,
  type: SequenceType,
  value: SomeIpValue | undefined,
  ctx: CodecContext,
  path: string
): void {
  if (!isSequenceValue(value)) {
    throw WireError.invalidValue("an array", value, path);
  }
  if (type.size.kind === "static") {
    if (value.length !== type.size.count) {
      throw WireError.lengthOutOfBounds(value.length, type.size.count, type.size.count, "elements", path);
    }
  } else {
    const min = type.size.minElements ?? 0;
    const max = type.size.maxElements ?? Number.POSITIVE_INFINITY;
    if (value.length < min || value.length > max) {
      throw WireError.lengthOutOfBounds(value.length, min, max, "elements", path);
    }
  }
  for (let i = 0; i < value.length; i++) {
    encodeNested(writer, type.element, value[i], undefined, ctx, indexPath(path, i));
  }
}

function encodeStruct(
  writer: ByteWriter,
  type: StructType,
  value: SomeIpValue | undefined,
  ctx: CodecContext,
  path: string
): void {
  if (!isRecordValue(value)) {
    throw WireError.invalidValue(`a record for struct '${type.name}'`, value, path);
  }
  for (const f of type.fields) {
    const member = value[f.name];
    const memberPath = fieldPath(path, f.name);
    if (member === undefined) {
      if (f.optional) continue;
      throw WireError.missingMandatoryField(f.name, type.name, memberPath);
    }
    if (type.tlv) {
      encodeMember(writer, f, member, ctx, memberPath);
    } else {
      encodeNested(writer, f.type, member, f.lengthFieldWidth, ctx, memberPath);
    }
  }
}

/**
 * Writes one TLV entry: tag, optional length field, value.
 */
function encodeMember(writer: ByteWriter, f: SchemaField, value: SomeIpValue, ctx: CodecContext, path: string): void {
  const physical = encodedType(f.type);
  if (physical.kind === "primitive") {
    writer.writeBytes(packTag(wireTypeForFixedSize(physical.width), f.id));
    encodeBody(writer, f.type, value, ctx, path);
    return;
  }

  const width = resolveLengthFieldWidth(f.type, f.lengthFieldWidth, ctx.options, path);
  if (width === undefined || width === 0) {
    writer.writeBytes(packTag(WireType.COMPLEX, f.id));
    encodeBody(writer, f.type, value, ctx, path);
    return;
  }

  const body = new ByteWriter();
  encodeBody(body, f.type, value, ctx, path);
  const bytes = body.finish();
  const selected = ctx.options.tlvLengthSelection() === "smallest" ? smallestLengthFieldWidth(bytes.length) : width;
  writer.writeBytes(packTag(wireTypeForLengthField(selected), f.id));
  writeLengthPrefixed(writer, selected, bytes, path);
}

function encodeUnion(
  writer: ByteWriter,
  type: UnionType,
  value: SomeIpValue | undefined,
  ctx: CodecContext,
  path: string
): void {
  if (!isUnionValue(value)) {
    throw WireError.invalidValue(`a { variant } object for union '${type.name}'`, value, path);
  }
  const name = value.variant;
  const selected = type.variants.find((v) => v.name === name);
  if (selected === undefined) {
    throw WireError.unknownVariant(name, type.name, path);
  }

  if (type.treatAs !== undefined) {
    const mapped = type.treatAs.values.find((entry) => entry.variant === selected.name);
    if (mapped === undefined) {
      throw SchemaError.invalidTreatAs(`variant '${selected.name}' has no value`, type.name);
    }
    encodeBody(writer, type.treatAs.type, mapped.value, ctx, path);
    return;
  }

  const width = type.discriminantWidth ?? ctx.options.discriminantWidth();
  if (selected.discriminant > DISCRIMINANT_MAX[width]) {
    throw SchemaError.discriminantOutOfRange(selected.discriminant, width, type.name);
  }
  switch (width) {
    case 1:
      writer.writeU8(selected.discriminant);
      break;
    case 2:
      writer.writeU16(selected.discriminant, ctx.littleEndian);
      break;
    case 4:
      writer.writeU32(selected.discriminant, ctx.littleEndian);
      break;
  }

  if (selected.type !== undefined) {
    encodeNested(writer, selected.type, value.value, undefined, ctx, variantPath(path, selected.name));
  }
}
