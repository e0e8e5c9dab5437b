/**
 * Conversion between JSON values and codec values.
 *
 * JSON has no 64-bit integers, so u64 and i64 travel as decimal strings.
 */

import {
  WireError,
  isRecordValue,
  isSequenceValue,
  isUnionValue,
  type SchemaType,
  type SomeIpValue,
} from "../../../lib/codec/src/index.js";

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Converts parsed JSON into a value of `type`. `null` marks an absent
 * optional field.
 *
 * @throws WireError `INVALID_VALUE` where the JSON does not have the shape of the type
 */
export function valueFromJson(json: unknown, type: SchemaType, path: string): SomeIpValue {
  switch (type.kind) {
    case "primitive": {
      if (type.primitive === "u64" || type.primitive === "i64") {
        if (typeof json === "string" && /^-?\d+$/.test(json)) return BigInt(json);
        if (typeof json === "number" && Number.isSafeInteger(json)) return BigInt(json);
        throw WireError.invalidValue("an integer or a decimal string", json, path);
      }
      if (typeof json === "number" || typeof json === "boolean") return json;
      throw WireError.invalidValue(type.primitive === "bool" ? "a boolean" : "a number", json, path);
    }

    case "string":
      if (typeof json === "string") return json;
      throw WireError.invalidValue("a string", json, path);

    case "sequence": {
      if (!Array.isArray(json)) {
        throw WireError.invalidValue("an array", json, path);
      }
      const element = type.element;
      return json.map((item: unknown, i) => valueFromJson(item, element, `${path}[${i}]`));
    }

    case "struct": {
      if (!isJsonObject(json)) {
        throw WireError.invalidValue("an object", json, path);
      }
      const out: Record<string, SomeIpValue> = {};
      for (const f of type.fields) {
        const member = json[f.name];
        if (member !== undefined && member !== null) {
          out[f.name] = valueFromJson(member, f.type, `${path}.${f.name}`);
        }
      }
      return out;
    }

    case "union": {
      if (!isJsonObject(json) || typeof json.variant !== "string") {
        throw WireError.invalidValue('an object with a "variant" name', json, path);
      }
      const name = json.variant;
      const selected = type.variants.find((v) => v.name === name);
      if (selected?.type === undefined || json.value === undefined) {
        return { variant: name };
      }
      return { variant: name, value: valueFromJson(json.value, selected.type, `${path}::${name}`) };
    }
  }
}

/**
 * Converts a decoded value to JSON.
 */
export function valueToJson(value: SomeIpValue, type: SchemaType): JsonValue {
  switch (type.kind) {
    case "primitive":
    case "string":
      return typeof value === "bigint" ? value.toString() : scalar(value);

    case "sequence": {
      const element = type.element;
      return isSequenceValue(value) ? value.map((item) => valueToJson(item, element)) : null;
    }

    case "struct": {
      if (!isRecordValue(value)) return null;
      const out: { [key: string]: JsonValue } = {};
      for (const f of type.fields) {
        const member = value[f.name];
        if (member !== undefined) {
          out[f.name] = valueToJson(member, f.type);
        }
      }
      return out;
    }

    case "union": {
      if (!isUnionValue(value)) return null;
      const name = value.variant;
      const selected = type.variants.find((v) => v.name === name);
      if (selected?.type === undefined || value.value === undefined) {
        return { variant: name };
      }
      return { variant: name, value: valueToJson(value.value, selected.type) };
    }
  }
}

function scalar(value: SomeIpValue): JsonValue {
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "string") {
    return value;
  }
  return null;
}
