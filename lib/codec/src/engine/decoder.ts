/**
 * Schema-driven decoder.
 *
 * A value is decoded either inside a window (its length field, a TLV entry,
 * or the whole input for the root) or, for statically sized values without a
 * length field, by reading exactly its static size.
 */

import type { LengthFieldWidth } from "../config.js";
import type {
  SchemaField,
  SchemaType,
  SequenceType,
  SomeIpValue,
  StringType,
  StructType,
  UnionType,
} from "../schema/types.js";
import { WireError } from "../diagnostic/index.js";
import { describeType, encodedType, memberWireType, resolveLengthFieldWidth } from "../schema/layout.js";
import type { ByteReader } from "../wire/reader.js";
import { decodePrimitive } from "../wire/primitive.js";
import { decodeText } from "../wire/text.js";
import { readLengthField } from "../wire/length-field.js";
import {
  WireType,
  describeWireType,
  fixedSizeOf,
  lengthFieldWidthOf,
  splitTag,
} from "../wire/tag.js";
import { type CodecContext, fieldPath, indexPath, variantPath } from "./context.js";

/**
 * Reads the body of a value.
 *
 * @param bounded - the value spans exactly the current window
 */
export function decodeBody(
  reader: ByteReader,
  type: SchemaType,
  bounded: boolean,
  ctx: CodecContext,
  path: string
): SomeIpValue {
  switch (type.kind) {
    case "primitive":
      return decodePrimitive(reader, type, ctx.littleEndian);
    case "string":
      return decodeString(reader, type, bounded, ctx, path);
  }

  ctx.enter(path);
  try {
    if (type.kind === "sequence") {
      return decodeSequence(reader, type, bounded, ctx, path);
    }
    if (type.kind === "struct") {
      return decodeStruct(reader, type, bounded, ctx, path);
    }
    return decodeUnion(reader, type, bounded, ctx, path);
  } finally {
    ctx.leave();
  }
}

/**
 * Reads a nested value and the length field in front of it, if it has one.
 */
export function decodeNested(
  reader: ByteReader,
  type: SchemaType,
  override: LengthFieldWidth | undefined,
  ctx: CodecContext,
  path: string
): SomeIpValue {
  const width = resolveLengthFieldWidth(type, override, ctx.options, path);
  if (width === undefined || width === 0) {
    return decodeBody(reader, type, false, ctx, path);
  }
  return decodeWindow(reader, type, readLengthField(reader, width), ctx, path);
}

function decodeWindow(reader: ByteReader, type: SchemaType, length: number, ctx: CodecContext, path: string): SomeIpValue {
  reader.openWindow(length);
  const value = decodeBody(reader, type, true, ctx, path);
  reader.closeWindow(path);
  return value;
}

function decodeString(
  reader: ByteReader,
  type: StringType,
  bounded: boolean,
  ctx: CodecContext,
  path: string
): string {
  const offset = reader.offset;
  let size: number;
  if (bounded) {
    size = reader.remaining();
    if (type.fixedSize !== undefined && size !== type.fixedSize) {
      throw WireError.lengthMismatch(`fixed-size string of ${type.fixedSize} bytes has ${size}`, offset, path);
    }
  } else if (type.fixedSize !== undefined) {
    size = type.fixedSize;
  } else {
    throw new Error(`${path}: string without a fixed size read outside a window`);
  }
  return decodeText(reader.readBytes(size), type, ctx.options, path, offset);
}

function decodeSequence(
  reader: ByteReader,
  type: SequenceType,
  bounded: boolean,
  ctx: CodecContext,
  path: string
): SomeIpValue[] {
  const out: SomeIpValue[] = [];

  if (type.size.kind === "static") {
    const count = type.size.count;
    if (!bounded) {
      for (let i = 0; i < count; i++) {
        out.push(decodeNested(reader, type.element, undefined, ctx, indexPath(path, i)));
      }
      return out;
    }
    while (reader.remaining() > 0 && out.length < count) {
      out.push(decodeNested(reader, type.element, undefined, ctx, indexPath(path, out.length)));
    }
    if (out.length !== count || reader.remaining() > 0) {
      throw WireError.lengthMismatch(
        `${describeType(type)} expects ${count} element(s) but the length field does not match`,
        reader.offset,
        path
      );
    }
    return out;
  }

  while (reader.remaining() > 0) {
    const start = reader.offset;
    out.push(decodeNested(reader, type.element, undefined, ctx, indexPath(path, out.length)));
    if (reader.offset === start) {
      throw WireError.lengthMismatch("elements of zero size cannot fill a length window", start, path);
    }
  }
  const min = type.size.minElements ?? 0;
  const max = type.size.maxElements ?? Number.POSITIVE_INFINITY;
  if (out.length < min || out.length > max) {
    throw WireError.lengthOutOfBounds(out.length, min, max, "elements", path);
  }
  return out;
}

function decodeStruct(
  reader: ByteReader,
  type: StructType,
  bounded: boolean,
  ctx: CodecContext,
  path: string
): SomeIpValue {
  if (!type.tlv) {
    const out: Record<string, SomeIpValue> = {};
    for (const f of type.fields) {
      out[f.name] = decodeNested(reader, f.type, f.lengthFieldWidth, ctx, fieldPath(path, f.name));
    }
    return out;
  }

  if (!bounded) {
    throw new Error(`${path}: TLV struct read outside a window`);
  }

  const byId = new Map<number, SchemaField>(type.fields.map((f) => [f.id, f]));
  const found = new Map<string, SomeIpValue>();

  while (reader.remaining() > 0) {
    const tagOffset = reader.offset;
    const tag = splitTag(reader.readU16());
    const f = byId.get(tag.dataId);

    if (f === undefined) {
      skipEntry(reader, tag.wireType, tag.dataId, tagOffset, path);
      continue;
    }

    const memberPath = fieldPath(path, f.name);
    if (found.has(f.name)) {
      throw WireError.duplicateField(tag.dataId, memberPath, tagOffset);
    }
    found.set(f.name, decodeMember(reader, f, tag.wireType, tagOffset, ctx, memberPath));
  }

  const out: Record<string, SomeIpValue> = {};
  for (const f of type.fields) {
    const value = found.get(f.name);
    if (value !== undefined) {
      out[f.name] = value;
    } else if (!f.optional) {
      throw WireError.missingMandatoryField(f.name, type.name, fieldPath(path, f.name));
    }
  }
  return out;
}

/**
 * Reads the value of a known TLV entry after checking its wire type.
 */
function decodeMember(
  reader: ByteReader,
  f: SchemaField,
  wireType: number,
  tagOffset: number,
  ctx: CodecContext,
  path: string
): SomeIpValue {
  if (wireType > WireType.COMPLEX) {
    throw WireError.unsupportedWireType(wireType, f.id, tagOffset, path);
  }

  const physical = encodedType(f.type);
  const width =
    physical.kind === "primitive" ? undefined : resolveLengthFieldWidth(f.type, f.lengthFieldWidth, ctx.options, path);
  const expected = memberWireType(f.type, width);
  const expectedLengthField = lengthFieldWidthOf(expected);
  const actualLengthField = lengthFieldWidthOf(wireType);

  if (expectedLengthField !== undefined && actualLengthField !== undefined) {
    return decodeWindow(reader, f.type, readLengthField(reader, actualLengthField), ctx, path);
  }
  if (wireType !== expected) {
    const want = expectedLengthField !== undefined ? "a length-delimited wire type" : describeWireType(expected);
    throw WireError.wireTypeMismatch(want, describeWireType(wireType), path, tagOffset);
  }
  return decodeBody(reader, f.type, false, ctx, path);
}

/**
 * Skips an entry whose data id the schema does not know.
 */
function skipEntry(reader: ByteReader, wireType: number, dataId: number, tagOffset: number, path: string): void {
  const fixed = fixedSizeOf(wireType);
  if (fixed !== undefined) {
    reader.skip(fixed);
    return;
  }
  const lengthField = lengthFieldWidthOf(wireType);
  if (lengthField !== undefined) {
    reader.skip(readLengthField(reader, lengthField));
    return;
  }
  throw WireError.unsupportedWireType(wireType, dataId, tagOffset, path);
}

function decodeUnion(
  reader: ByteReader,
  type: UnionType,
  bounded: boolean,
  ctx: CodecContext,
  path: string
): SomeIpValue {
  if (type.treatAs !== undefined) {
    const raw = decodeBody(reader, type.treatAs.type, bounded, ctx, path);
    const match = type.treatAs.values.find((entry) => entry.value === raw);
    if (match === undefined) {
      throw WireError.unknownTreatAsValue(String(raw), type.name, path);
    }
    return { variant: match.variant };
  }

  const discriminant = readDiscriminant(reader, type.discriminantWidth ?? ctx.options.discriminantWidth(), ctx);
  const selected = type.variants.find((v) => v.discriminant === discriminant);
  if (selected === undefined) {
    throw WireError.unknownDiscriminant(discriminant, type.name, path);
  }
  if (selected.type === undefined) {
    return { variant: selected.name };
  }
  const value = decodeNested(reader, selected.type, undefined, ctx, variantPath(path, selected.name));
  return { variant: selected.name, value };
}

function readDiscriminant(reader: ByteReader, width: 1 | 2 | 4, ctx: CodecContext): number {
  switch (width) {
    case 1:
      return reader.readU8();
    case 2:
      return reader.readU16(ctx.littleEndian);
    case 4:
      return reader.readU32(ctx.littleEndian);
  }
}
