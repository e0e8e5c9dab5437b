/**
 * Schema validation.
 *
 * The builders check each node as it is created. `validateSchema` walks a
 * whole tree, which is what schemas assembled by hand or loaded from a
 * document need before first use.
 */

import type { PrimitiveType, SchemaType, SequenceType, StringType, StructType, TreatAsValue, UnionType } from "./types.js";
import { isLengthFieldWidth } from "../config.js";
import { SchemaError } from "../diagnostic/index.js";
import { MAX_DATA_ID } from "../wire/tag.js";
import { describeType, integerRange, isStaticallySized } from "./layout.js";

const DISCRIMINANT_LIMITS: Readonly<Record<number, number>> = {
  1: 0xff,
  2: 0xffff,
  4: 0xffffffff,
};

function isCount(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function checkLengthFieldWidth(type: SchemaType, width: unknown, path: string): void {
  if (width === undefined) return;
  if (!isLengthFieldWidth(width)) {
    throw SchemaError.invalidLengthFieldWidth(width, path);
  }
  if (width === 0 && !isStaticallySized(type)) {
    throw SchemaError.dynamicWithoutLengthField(describeType(type), path);
  }
}

function checkBounds(min: number | undefined, max: number | undefined, unit: string, path: string): void {
  if (min !== undefined && !isCount(min)) {
    throw SchemaError.invalidSizeBounds(`minimum ${unit} must be a non-negative integer, got ${String(min)}`, path);
  }
  if (max !== undefined && !isCount(max)) {
    throw SchemaError.invalidSizeBounds(`maximum ${unit} must be a non-negative integer, got ${String(max)}`, path);
  }
  if (min !== undefined && max !== undefined && min > max) {
    throw SchemaError.invalidSizeBounds(`minimum ${min} is above maximum ${max}`, path);
  }
}

export function validateStringLevel(type: StringType, path = "string"): void {
  checkLengthFieldWidth(type, type.lengthFieldWidth, path);
  if (type.fixedSize !== undefined) {
    if (!isCount(type.fixedSize)) {
      throw SchemaError.invalidSizeBounds(`fixedSize must be a non-negative integer, got ${String(type.fixedSize)}`, path);
    }
    if (type.minSize !== undefined || type.maxSize !== undefined) {
      throw SchemaError.invalidSizeBounds("fixedSize cannot be combined with minSize or maxSize", path);
    }
    return;
  }
  checkBounds(type.minSize, type.maxSize, "bytes", path);
}

export function validateSequenceLevel(type: SequenceType, path = "sequence"): void {
  checkLengthFieldWidth(type, type.lengthFieldWidth, path);
  if (type.size.kind === "static") {
    if (!isCount(type.size.count)) {
      throw SchemaError.invalidSizeBounds(`count must be a non-negative integer, got ${String(type.size.count)}`, path);
    }
    return;
  }
  checkBounds(type.size.minElements, type.size.maxElements, "elements", path);
}

export function validateStructLevel(type: StructType, path: string = type.name): void {
  if (typeof type.name !== "string" || type.name.length === 0) {
    throw SchemaError.invalidSchema("struct name must be a non-empty string", path);
  }
  checkLengthFieldWidth(type, type.lengthFieldWidth, path);

  const ids = new Set<number>();
  const names = new Set<string>();
  for (const f of type.fields) {
    const fieldPath = `${path}.${f.name}`;
    if (typeof f.name !== "string" || f.name.length === 0) {
      throw SchemaError.invalidSchema(`fields of struct '${type.name}' need a non-empty name`, path);
    }
    if (f.name === "__proto__") {
      throw SchemaError.invalidSchema(`'__proto__' cannot name a field of struct '${type.name}'`, fieldPath);
    }
    if (!Number.isInteger(f.id) || f.id < 0 || f.id > MAX_DATA_ID) {
      throw SchemaError.dataIdOutOfRange(f.id, fieldPath);
    }
    if (ids.has(f.id)) {
      throw SchemaError.duplicateDataId(f.id, type.name);
    }
    if (names.has(f.name)) {
      throw SchemaError.duplicateFieldName(f.name, type.name);
    }
    if (f.optional && !type.tlv) {
      throw SchemaError.optionalInFixedStruct(f.name, type.name);
    }
    checkLengthFieldWidth(f.type, f.lengthFieldWidth, fieldPath);
    ids.add(f.id);
    names.add(f.name);
  }
}

function matchesTreatType(type: PrimitiveType | StringType, value: TreatAsValue): boolean {
  if (type.kind === "string") {
    return typeof value === "string";
  }
  switch (type.primitive) {
    case "bool":
      return typeof value === "boolean";
    case "f32":
      return typeof value === "number" && !Number.isNaN(value) && Math.fround(value) === value;
    case "f64":
      return typeof value === "number" && !Number.isNaN(value);
    case "u64":
      return typeof value === "bigint" && value >= 0n && value <= 0xffffffffffffffffn;
    case "i64":
      return typeof value === "bigint" && value >= -0x8000000000000000n && value <= 0x7fffffffffffffffn;
    default: {
      const range = integerRange(type.primitive);
      return (
        typeof value === "number" &&
        Number.isInteger(value) &&
        range !== undefined &&
        value >= range[0] &&
        value <= range[1]
      );
    }
  }
}

function validateTreatAs(type: UnionType): void {
  const treatAs = type.treatAs;
  if (treatAs === undefined) return;

  if (treatAs.type.kind !== "primitive" && treatAs.type.kind !== "string") {
    throw SchemaError.invalidTreatAs("the treat-as type must be a primitive or a string", type.name);
  }
  if (treatAs.type.kind === "string") {
    validateStringLevel(treatAs.type, `${type.name}.treatAs`);
  } else if (type.lengthFieldWidth !== undefined) {
    throw SchemaError.invalidTreatAs("a union encoded as a primitive has no length field", type.name);
  }

  const mapped = new Set<string>();
  const seenValues = new Set<string>();
  for (const entry of treatAs.values) {
    if (!type.variants.some((v) => v.name === entry.variant)) {
      throw SchemaError.invalidTreatAs(`'${entry.variant}' is not a variant`, type.name);
    }
    if (mapped.has(entry.variant)) {
      throw SchemaError.invalidTreatAs(`variant '${entry.variant}' is mapped more than once`, type.name);
    }
    if (!matchesTreatType(treatAs.type, entry.value)) {
      throw SchemaError.invalidTreatAs(
        `value ${String(entry.value)} of '${entry.variant}' is not a valid ${describeType(treatAs.type)}`,
        type.name
      );
    }
    const key = `${typeof entry.value}:${String(entry.value)}`;
    if (seenValues.has(key)) {
      throw SchemaError.invalidTreatAs(`value ${String(entry.value)} is mapped more than once`, type.name);
    }
    mapped.add(entry.variant);
    seenValues.add(key);
  }

  for (const v of type.variants) {
    if (v.type !== undefined) {
      throw SchemaError.invalidTreatAs(`variant '${v.name}' carries a payload`, type.name);
    }
    if (!mapped.has(v.name)) {
      throw SchemaError.invalidTreatAs(`variant '${v.name}' has no value`, type.name);
    }
  }
}

export function validateUnionLevel(type: UnionType, path: string = type.name): void {
  if (typeof type.name !== "string" || type.name.length === 0) {
    throw SchemaError.invalidSchema("union name must be a non-empty string", path);
  }
  checkLengthFieldWidth(type, type.lengthFieldWidth, path);

  const width = type.discriminantWidth;
  if (width !== undefined && width !== 1 && width !== 2 && width !== 4) {
    throw SchemaError.invalidSchema(`discriminant width must be 1, 2 or 4, got ${String(width)}`, path);
  }
  const limit = DISCRIMINANT_LIMITS[width ?? 4];

  const names = new Set<string>();
  const discriminants = new Set<number>();
  for (const v of type.variants) {
    if (typeof v.name !== "string" || v.name.length === 0) {
      throw SchemaError.invalidSchema(`variants of union '${type.name}' need a non-empty name`, path);
    }
    if (names.has(v.name)) {
      throw SchemaError.duplicateVariant(`variant '${v.name}'`, type.name);
    }
    if (!Number.isInteger(v.discriminant) || v.discriminant < 0 || v.discriminant > limit) {
      throw SchemaError.discriminantOutOfRange(v.discriminant, width ?? 4, type.name);
    }
    if (discriminants.has(v.discriminant)) {
      throw SchemaError.duplicateVariant(`discriminant ${v.discriminant}`, type.name);
    }
    names.add(v.name);
    discriminants.add(v.discriminant);
  }

  validateTreatAs(type);
}

/**
 * Validates a schema tree.
 *
 * Shared and recursive nodes are visited once.
 *
 * @throws SchemaError describing the first problem found
 */
export function validateSchema(type: SchemaType): void {
  walk(type, rootPath(type), new Set());
}

function rootPath(type: SchemaType): string {
  return type.kind === "struct" || type.kind === "union" ? type.name : describeType(type);
}

function walk(type: SchemaType, path: string, seen: Set<SchemaType>): void {
  if (seen.has(type)) return;
  seen.add(type);

  switch (type.kind) {
    case "primitive":
      return;
    case "string":
      validateStringLevel(type, path);
      return;
    case "sequence":
      validateSequenceLevel(type, path);
      walk(type.element, `${path}[]`, seen);
      return;
    case "struct":
      validateStructLevel(type, path);
      for (const f of type.fields) {
        walk(f.type, `${path}.${f.name}`, seen);
      }
      return;
    case "union":
      validateUnionLevel(type, path);
      for (const v of type.variants) {
        if (v.type !== undefined) {
          walk(v.type, `${path}::${v.name}`, seen);
        }
      }
      return;
    default:
      throw SchemaError.invalidSchema("unknown type kind", path);
  }
}
