/**
 * Schema description types.
 *
 * A schema is a closed tree of `SchemaType` nodes. It is produced once (by the
 * builders below, a schema document, or generated code) and reused across
 * encode and decode calls.
 */

import type { DiscriminantWidth, LengthFieldWidth } from "../config.js";
import { SchemaError } from "../diagnostic/index.js";
import { validateStructLevel, validateUnionLevel, validateStringLevel, validateSequenceLevel } from "./validate.js";

export type PrimitiveKind = "bool" | "u8" | "u16" | "u32" | "u64" | "i8" | "i16" | "i32" | "i64" | "f32" | "f64";

export type PrimitiveWidth = 1 | 2 | 4 | 8;

export const PRIMITIVE_WIDTHS: Readonly<Record<PrimitiveKind, PrimitiveWidth>> = {
  bool: 1,
  u8: 1,
  i8: 1,
  u16: 2,
  i16: 2,
  u32: 4,
  i32: 4,
  f32: 4,
  u64: 8,
  i64: 8,
  f64: 8,
};

/**
 * Types that can be described in a schema.
 */
export type SchemaType = PrimitiveType | StringType | SequenceType | StructType | UnionType;

export interface PrimitiveType {
  readonly kind: "primitive";
  readonly primitive: PrimitiveKind;
  readonly width: PrimitiveWidth;
}

export interface StringType {
  readonly kind: "string";
  readonly lengthFieldWidth?: LengthFieldWidth;
  /** Encoded size in bytes; the payload is zero padded up to it. */
  readonly fixedSize?: number;
  /** Bounds on the encoded payload in bytes. */
  readonly minSize?: number;
  readonly maxSize?: number;
}

export type SequenceSize =
  | { readonly kind: "static"; readonly count: number }
  | { readonly kind: "dynamic"; readonly minElements?: number; readonly maxElements?: number };

export interface SequenceType {
  readonly kind: "sequence";
  readonly element: SchemaType;
  readonly size: SequenceSize;
  readonly lengthFieldWidth?: LengthFieldWidth;
}

export interface SchemaField {
  readonly name: string;
  /** Data id, 0..4095, unique within the struct. */
  readonly id: number;
  readonly type: SchemaType;
  readonly optional: boolean;
  /** Overrides the length field width of this field's value. */
  readonly lengthFieldWidth?: LengthFieldWidth;
}

export interface StructType {
  readonly kind: "struct";
  readonly name: string;
  readonly fields: readonly SchemaField[];
  readonly tlv: boolean;
  readonly lengthFieldWidth?: LengthFieldWidth;
}

export interface UnionVariant {
  readonly name: string;
  readonly discriminant: number;
  /** Payload type; absent for a variant that carries no data. */
  readonly type?: SchemaType;
}

export type TreatAsValue = number | bigint | boolean | string;

/**
 * Encodes the whole union as another type, bypassing the discriminant.
 */
export interface TreatAs {
  readonly type: PrimitiveType | StringType;
  readonly values: readonly { readonly variant: string; readonly value: TreatAsValue }[];
}

export interface UnionType {
  readonly kind: "union";
  readonly name: string;
  readonly variants: readonly UnionVariant[];
  readonly discriminantWidth?: DiscriminantWidth;
  readonly lengthFieldWidth?: LengthFieldWidth;
  readonly treatAs?: TreatAs;
}

// ===========================================================================
// Values
// ===========================================================================

/**
 * A struct value: field name to value. Absent optional fields are missing
 * or `undefined`.
 */
export interface SomeIpRecord {
  readonly [field: string]: SomeIpValue | undefined;
}

export interface UnionValue {
  readonly variant: string;
  readonly value?: SomeIpValue;
}

export type SomeIpValue = number | bigint | boolean | string | readonly SomeIpValue[] | SomeIpRecord | UnionValue;

// ===========================================================================
// Builders
// ===========================================================================

function primitive(kind: PrimitiveKind): PrimitiveType {
  return { kind: "primitive", primitive: kind, width: PRIMITIVE_WIDTHS[kind] };
}

export const bool = (): PrimitiveType => primitive("bool");
export const u8 = (): PrimitiveType => primitive("u8");
export const u16 = (): PrimitiveType => primitive("u16");
export const u32 = (): PrimitiveType => primitive("u32");
export const u64 = (): PrimitiveType => primitive("u64");
export const i8 = (): PrimitiveType => primitive("i8");
export const i16 = (): PrimitiveType => primitive("i16");
export const i32 = (): PrimitiveType => primitive("i32");
export const i64 = (): PrimitiveType => primitive("i64");
export const f32 = (): PrimitiveType => primitive("f32");
export const f64 = (): PrimitiveType => primitive("f64");

/**
 * Creates a primitive type by name.
 */
export function primitiveType(kind: PrimitiveKind): PrimitiveType {
  return primitive(kind);
}

export interface StringOptions {
  lengthFieldWidth?: LengthFieldWidth;
  fixedSize?: number;
  minSize?: number;
  maxSize?: number;
}

/**
 * Creates a string type.
 */
export function string(options: StringOptions = {}): StringType {
  const type: StringType = { kind: "string", ...options };
  validateStringLevel(type);
  return type;
}

export interface SequenceOptions {
  /** Exact element count; makes the sequence static. */
  count?: number;
  minElements?: number;
  maxElements?: number;
  lengthFieldWidth?: LengthFieldWidth;
}

/**
 * Creates a sequence type.
 */
export function sequence(element: SchemaType, options: SequenceOptions = {}): SequenceType {
  const size: SequenceSize =
    options.count !== undefined
      ? { kind: "static", count: options.count }
      : { kind: "dynamic", minElements: options.minElements, maxElements: options.maxElements };
  const type: SequenceType =
    options.lengthFieldWidth !== undefined
      ? { kind: "sequence", element, size, lengthFieldWidth: options.lengthFieldWidth }
      : { kind: "sequence", element, size };
  validateSequenceLevel(type);
  return type;
}

export interface FieldOptions {
  optional?: boolean;
  lengthFieldWidth?: LengthFieldWidth;
}

/**
 * Creates a struct field.
 */
export function field(name: string, id: number, type: SchemaType, options: FieldOptions = {}): SchemaField {
  const def: SchemaField = { name, id, type, optional: options.optional ?? false };
  return options.lengthFieldWidth !== undefined ? { ...def, lengthFieldWidth: options.lengthFieldWidth } : def;
}

export interface StructOptions {
  tlv?: boolean;
  lengthFieldWidth?: LengthFieldWidth;
}

/**
 * Creates a struct type.
 *
 * @throws SchemaError for bad ids, duplicate names, or optional fields without TLV
 */
export function struct(name: string, fields: readonly SchemaField[], options: StructOptions = {}): StructType {
  const base: StructType = { kind: "struct", name, fields, tlv: options.tlv ?? false };
  const type: StructType =
    options.lengthFieldWidth !== undefined ? { ...base, lengthFieldWidth: options.lengthFieldWidth } : base;
  validateStructLevel(type);
  return type;
}

/**
 * Creates a union variant.
 */
export function variant(name: string, discriminant: number, type?: SchemaType): UnionVariant {
  return type !== undefined ? { name, discriminant, type } : { name, discriminant };
}

export interface UnionOptions {
  discriminantWidth?: DiscriminantWidth;
  lengthFieldWidth?: LengthFieldWidth;
  treatAs?: TreatAs;
}

/**
 * Creates a union type.
 *
 * @throws SchemaError for duplicate variants or an incomplete treat-as mapping
 */
export function union(name: string, variants: readonly UnionVariant[], options: UnionOptions = {}): UnionType {
  const type: UnionType = { kind: "union", name, variants, ...options };
  validateUnionLevel(type);
  return type;
}

/**
 * Creates a closed enumeration: a payload-less union encoded as a bare
 * integer. Variants are numbered in declaration order; only the raw value
 * reaches the wire.
 *
 * @example
 * ```ts
 * const Gear = enumeration("Gear", u8(), { Park: 0, Reverse: 1, Neutral: 2, Drive: 3 });
 * encode({ variant: "Drive" }, Gear); // [0x03]
 * ```
 *
 * @throws SchemaError `INVALID_TREAT_AS` for a non-integer raw type or value
 */
export function enumeration(name: string, raw: PrimitiveType, values: Readonly<Record<string, number>>): UnionType {
  if (raw.primitive === "bool" || raw.primitive === "f32" || raw.primitive === "f64") {
    throw SchemaError.invalidTreatAs(`enumerations need an integer type, got ${raw.primitive}`, name);
  }
  const wide = raw.primitive === "u64" || raw.primitive === "i64";
  const entries = Object.entries(values);
  return union(
    name,
    entries.map(([variantName], index) => variant(variantName, index)),
    {
      treatAs: {
        type: raw,
        values: entries.map(([variantName, value]) => {
          if (!Number.isSafeInteger(value)) {
            throw SchemaError.invalidTreatAs(`value ${value} of '${variantName}' is not a safe integer`, name);
          }
          return { variant: variantName, value: wide ? BigInt(value) : value };
        }),
      },
    }
  );
}
