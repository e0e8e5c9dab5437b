/**
 * Static layout facts about schema types: sizes, wire types and length fields.
 */

import type { LengthFieldCategory, LengthFieldWidth, SomeIpOptions } from "../config.js";
import type { PrimitiveKind, SchemaType } from "./types.js";
import { SchemaError } from "../diagnostic/index.js";
import { WireType, wireTypeForFixedSize, wireTypeForLengthField } from "../wire/tag.js";

/**
 * Whether the encoded body of a type has the same size for every value, so it
 * can be read back without a length field.
 */
export function isStaticallySized(type: SchemaType, visiting: Set<SchemaType> = new Set()): boolean {
  if (visiting.has(type)) {
    return false;
  }

  switch (type.kind) {
    case "primitive":
      return true;
    case "string":
      return type.fixedSize !== undefined;
    case "union":
      return type.treatAs !== undefined && isStaticallySized(type.treatAs.type, visiting);
    case "sequence":
    case "struct": {
      visiting.add(type);
      try {
        if (type.kind === "sequence") {
          return type.size.kind === "static" && isStaticallySized(type.element, visiting);
        }
        return !type.tlv && type.fields.every((f) => isStaticallySized(f.type, visiting));
      } finally {
        visiting.delete(type);
      }
    }
  }
}

/**
 * The type a value is physically encoded as: a treat-as union is its
 * treat-as type, everything else is itself.
 */
export function encodedType(type: SchemaType): SchemaType {
  return type.kind === "union" && type.treatAs !== undefined ? type.treatAs.type : type;
}

/**
 * Length field category of a type, or undefined if it never has one.
 */
export function lengthFieldCategory(type: SchemaType): LengthFieldCategory | undefined {
  const physical = encodedType(type);
  switch (physical.kind) {
    case "primitive":
      return undefined;
    case "string":
      return "string";
    case "sequence":
      return "array";
    case "struct":
      return "struct";
    case "union":
      return "union";
  }
}

/**
 * Resolves the length field width of a nested value: the field override,
 * then the type's own setting (for a treat-as union, the union's and then
 * its treat-as type's), then the options default for its category.
 *
 * Returns undefined for values that never carry a length field.
 *
 * @throws SchemaError if the result is 0 for a value without a static size
 */
export function resolveLengthFieldWidth(
  type: SchemaType,
  override: LengthFieldWidth | undefined,
  options: SomeIpOptions,
  path: string
): LengthFieldWidth | undefined {
  const category = lengthFieldCategory(type);
  if (category === undefined) {
    return undefined;
  }

  const physical = encodedType(type);
  const own = physical.kind === "primitive" ? undefined : physical.lengthFieldWidth;
  const outer = type.kind === "union" && type.treatAs !== undefined ? type.lengthFieldWidth : undefined;
  const width = override ?? outer ?? own ?? options.lengthFieldWidth(category);

  if (width === 0 && !isStaticallySized(physical)) {
    throw SchemaError.dynamicWithoutLengthField(describeType(physical), path);
  }
  return width;
}

/**
 * Wire type a TLV member is tagged with when it is encoded with the given
 * length field width. Primitives and treat-as unions ignore the width.
 */
export function memberWireType(type: SchemaType, width: LengthFieldWidth | undefined): WireType {
  const physical = encodedType(type);
  if (physical.kind === "primitive") {
    return wireTypeForFixedSize(physical.width);
  }
  if (width === undefined || width === 0) {
    return WireType.COMPLEX;
  }
  return wireTypeForLengthField(width);
}

const INTEGER_RANGES: Partial<Record<PrimitiveKind, readonly [number, number]>> = {
  u8: [0, 0xff],
  u16: [0, 0xffff],
  u32: [0, 0xffffffff],
  i8: [-0x80, 0x7f],
  i16: [-0x8000, 0x7fff],
  i32: [-0x80000000, 0x7fffffff],
};

/**
 * Inclusive range of an 8 to 32 bit integer primitive.
 */
export function integerRange(kind: PrimitiveKind): readonly [number, number] | undefined {
  return INTEGER_RANGES[kind];
}

/**
 * Short human-readable description of a type for messages.
 */
export function describeType(type: SchemaType): string {
  switch (type.kind) {
    case "primitive":
      return type.primitive;
    case "string":
      return type.fixedSize !== undefined ? `string[${type.fixedSize}]` : "string";
    case "sequence":
      return type.size.kind === "static"
        ? `${describeType(type.element)}[${type.size.count}]`
        : `${describeType(type.element)}[]`;
    case "struct":
      return `struct ${type.name}`;
    case "union":
      return `union ${type.name}`;
  }
}
