/**
 * Fixed-width primitive codec.
 */

import type { PrimitiveType, SomeIpValue } from "../schema/types.js";
import { WireError } from "../diagnostic/index.js";
import { integerRange } from "../schema/layout.js";
import type { ByteReader } from "./reader.js";
import type { ByteWriter } from "./writer.js";

const U64_MAX = 0xffffffffffffffffn;
const I64_MIN = -0x8000000000000000n;
const I64_MAX = 0x7fffffffffffffffn;

function toBigInt(value: SomeIpValue | undefined, path: string): bigint {
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isSafeInteger(value)) return BigInt(value);
  throw WireError.invalidValue("a bigint or a safe integer", value, path);
}

function toInteger(value: SomeIpValue | undefined, path: string): number {
  if (typeof value === "number" && Number.isInteger(value)) return value;
  throw WireError.invalidValue("an integer", value, path);
}

/**
 * Writes a primitive value.
 *
 * @throws WireError `INVALID_VALUE` for a value of the wrong kind, `VALUE_TOO_LARGE` for an out-of-range integer
 */
export function encodePrimitive(
  writer: ByteWriter,
  type: PrimitiveType,
  value: SomeIpValue | undefined,
  littleEndian: boolean,
  path: string
): void {
  switch (type.primitive) {
    case "bool":
      if (typeof value !== "boolean") {
        throw WireError.invalidValue("a boolean", value, path);
      }
      writer.writeU8(value ? 1 : 0);
      return;

    case "f32":
    case "f64":
      if (typeof value !== "number") {
        throw WireError.invalidValue("a number", value, path);
      }
      if (type.primitive === "f32") {
        writer.writeF32(value, littleEndian);
      } else {
        writer.writeF64(value, littleEndian);
      }
      return;

    case "u64": {
      const v = toBigInt(value, path);
      if (v < 0n || v > U64_MAX) {
        throw WireError.valueTooLarge(`${v} does not fit in u64`, path);
      }
      writer.writeU64(v, littleEndian);
      return;
    }

    case "i64": {
      const v = toBigInt(value, path);
      if (v < I64_MIN || v > I64_MAX) {
        throw WireError.valueTooLarge(`${v} does not fit in i64`, path);
      }
      writer.writeI64(v, littleEndian);
      return;
    }

    default: {
      const v = toInteger(value, path);
      const range = integerRange(type.primitive);
      if (range !== undefined && (v < range[0] || v > range[1])) {
        throw WireError.valueTooLarge(`${v} does not fit in ${type.primitive}`, path);
      }
      writeInteger(writer, type, v, littleEndian);
    }
  }
}

function writeInteger(writer: ByteWriter, type: PrimitiveType, value: number, littleEndian: boolean): void {
  switch (type.primitive) {
    case "u8":
      writer.writeU8(value);
      return;
    case "u16":
      writer.writeU16(value, littleEndian);
      return;
    case "u32":
      writer.writeU32(value, littleEndian);
      return;
    case "i8":
      writer.writeI8(value);
      return;
    case "i16":
      writer.writeI16(value, littleEndian);
      return;
    case "i32":
      writer.writeI32(value, littleEndian);
      return;
    default:
      throw new Error(`writeInteger() called for ${type.primitive}`);
  }
}

/**
 * Reads a primitive value.
 *
 * @throws WireError `INVALID_BOOLEAN_VALUE` for a bool byte other than 0 or 1
 */
export function decodePrimitive(reader: ByteReader, type: PrimitiveType, littleEndian: boolean): SomeIpValue {
  switch (type.primitive) {
    case "bool": {
      const offset = reader.offset;
      const raw = reader.readU8();
      if (raw > 1) {
        throw WireError.invalidBooleanValue(raw, offset);
      }
      return raw === 1;
    }
    case "u8":
      return reader.readU8();
    case "u16":
      return reader.readU16(littleEndian);
    case "u32":
      return reader.readU32(littleEndian);
    case "u64":
      return reader.readU64(littleEndian);
    case "i8":
      return reader.readI8();
    case "i16":
      return reader.readI16(littleEndian);
    case "i32":
      return reader.readI32(littleEndian);
    case "i64":
      return reader.readI64(littleEndian);
    case "f32":
      return reader.readF32(littleEndian);
    case "f64":
      return reader.readF64(littleEndian);
  }
}
