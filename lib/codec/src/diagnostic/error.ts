/**
 * Codec error types.
 */

/**
 * Error codes for schema and wire errors.
 */
export const ErrorCode = {
  // Schema Errors
  DATA_ID_OUT_OF_RANGE: "someip::schema::data_id_out_of_range",
  DUPLICATE_DATA_ID: "someip::schema::duplicate_data_id",
  DUPLICATE_FIELD_NAME: "someip::schema::duplicate_field_name",
  OPTIONAL_IN_FIXED_STRUCT: "someip::schema::optional_in_fixed_struct",
  INVALID_LENGTH_FIELD_WIDTH: "someip::schema::invalid_length_field_width",
  DYNAMIC_WITHOUT_LENGTH_FIELD: "someip::schema::dynamic_without_length_field",
  INVALID_SIZE_BOUNDS: "someip::schema::invalid_size_bounds",
  DUPLICATE_VARIANT: "someip::schema::duplicate_variant",
  DISCRIMINANT_OUT_OF_RANGE: "someip::schema::discriminant_out_of_range",
  INVALID_TREAT_AS: "someip::schema::invalid_treat_as",
  INVALID_SCHEMA: "someip::schema::invalid_schema",
  INVALID_OPTIONS: "someip::schema::invalid_options",

  // Wire Errors
  UNEXPECTED_END_OF_INPUT: "someip::wire::unexpected_end_of_input",
  WIRE_TYPE_MISMATCH: "someip::wire::wire_type_mismatch",
  UNSUPPORTED_WIRE_TYPE: "someip::wire::unsupported_wire_type",
  MISSING_MANDATORY_FIELD: "someip::wire::missing_mandatory_field",
  DUPLICATE_FIELD: "someip::wire::duplicate_field",
  INVALID_STRING_ENCODING: "someip::wire::invalid_string_encoding",
  INVALID_BOOLEAN_VALUE: "someip::wire::invalid_boolean_value",
  VALUE_TOO_LARGE: "someip::wire::value_too_large",
  LENGTH_MISMATCH: "someip::wire::length_mismatch",
  LENGTH_OUT_OF_BOUNDS: "someip::wire::length_out_of_bounds",
  UNKNOWN_DISCRIMINANT: "someip::wire::unknown_discriminant",
  UNKNOWN_TREAT_AS_VALUE: "someip::wire::unknown_treat_as_value",
  SCHEMA_TOO_DEEP: "someip::wire::schema_too_deep",
  INVALID_VALUE: "someip::wire::invalid_value",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Location and hints attached to an error.
 */
export interface ErrorDetails {
  help?: string;
  /** Dotted path of the value being coded, e.g. `Vehicle.wheels[1]`. */
  path?: string;
  /** Absolute byte offset in the input. */
  offset?: number;
  cause?: unknown;
}

/**
 * Base class for all codec errors.
 */
export class SomeIpError extends Error {
  readonly code: ErrorCode;
  readonly help?: string;
  readonly path?: string;
  readonly offset?: number;

  constructor(message: string, code: ErrorCode, details?: ErrorDetails) {
    super(message, { cause: details?.cause });
    this.name = "SomeIpError";
    this.code = code;
    this.help = details?.help;
    this.path = details?.path;
    this.offset = details?.offset;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Formats the error for display.
   */
  format(): string {
    const parts: string[] = [];

    parts.push(`error[${this.code}]: ${this.message}`);

    if (this.path !== undefined || this.offset !== undefined) {
      const at = [this.path, this.offset !== undefined ? `byte ${this.offset}` : undefined]
        .filter((p) => p !== undefined)
        .join(" @ ");
      parts.push(`  --> ${at}`);
    }

    if (this.help) {
      parts.push("");
      parts.push(`  help: ${this.help}`);
    }

    return parts.join("\n");
  }
}

/**
 * Thrown while building or validating a schema or options bundle.
 *
 * These are programming errors: the schema or policy can never be used.
 */
export class SchemaError extends SomeIpError {
  constructor(message: string, code: ErrorCode, details?: ErrorDetails) {
    super(message, code, details);
    this.name = "SchemaError";
  }

  // =========================================================================
  // Factory methods
  // =========================================================================

  static dataIdOutOfRange(id: number, path?: string): SchemaError {
    return new SchemaError(`Data id ${id} does not fit in 12 bits`, ErrorCode.DATA_ID_OUT_OF_RANGE, {
      path,
      help: "Data ids must be integers between 0 and 4095.",
    });
  }

  static duplicateDataId(id: number, struct: string): SchemaError {
    return new SchemaError(`Data id ${id} is used more than once in struct '${struct}'`, ErrorCode.DUPLICATE_DATA_ID, {
      path: struct,
    });
  }

  static duplicateFieldName(name: string, struct: string): SchemaError {
    return new SchemaError(`Field '${name}' is declared more than once in struct '${struct}'`, ErrorCode.DUPLICATE_FIELD_NAME, {
      path: struct,
    });
  }

  static optionalInFixedStruct(field: string, struct: string): SchemaError {
    return new SchemaError(
      `Field '${field}' of struct '${struct}' is optional but the struct does not use TLV`,
      ErrorCode.OPTIONAL_IN_FIXED_STRUCT,
      {
        path: `${struct}.${field}`,
        help: "Only TLV structs can signal an absent value. Set tlv: true or make the field mandatory.",
      }
    );
  }

  static invalidLengthFieldWidth(width: unknown, path?: string): SchemaError {
    return new SchemaError(`Invalid length field width: ${String(width)}`, ErrorCode.INVALID_LENGTH_FIELD_WIDTH, {
      path,
      help: "Length fields are 0, 1, 2 or 4 bytes wide.",
    });
  }

  static dynamicWithoutLengthField(describe: string, path?: string): SchemaError {
    return new SchemaError(
      `${describe} has no statically known size and cannot use a zero-width length field`,
      ErrorCode.DYNAMIC_WITHOUT_LENGTH_FIELD,
      {
        path,
        help: "Give it a length field of 1, 2 or 4 bytes, or make its size static.",
      }
    );
  }

  static invalidSizeBounds(reason: string, path?: string): SchemaError {
    return new SchemaError(`Invalid size bounds: ${reason}`, ErrorCode.INVALID_SIZE_BOUNDS, { path });
  }

  static duplicateVariant(what: string, union: string): SchemaError {
    return new SchemaError(`Union '${union}' declares ${what} more than once`, ErrorCode.DUPLICATE_VARIANT, {
      path: union,
    });
  }

  static discriminantOutOfRange(discriminant: number, width: number, union: string): SchemaError {
    return new SchemaError(
      `Discriminant ${discriminant} of union '${union}' does not fit in ${width} byte(s)`,
      ErrorCode.DISCRIMINANT_OUT_OF_RANGE,
      { path: union }
    );
  }

  static invalidTreatAs(reason: string, union: string): SchemaError {
    return new SchemaError(`Invalid treat-as mapping for union '${union}': ${reason}`, ErrorCode.INVALID_TREAT_AS, {
      path: union,
    });
  }

  static invalidSchema(reason: string, path?: string): SchemaError {
    return new SchemaError(`Invalid schema: ${reason}`, ErrorCode.INVALID_SCHEMA, { path });
  }

  static invalidOptions(reason: string): SchemaError {
    return new SchemaError(`Invalid options: ${reason}`, ErrorCode.INVALID_OPTIONS);
  }
}

/**
 * Thrown when a value cannot be encoded or a buffer cannot be decoded.
 *
 * The schema is fine; the data is not. Callers may catch these and carry on.
 *
 * @example
 * ```ts
 * try {
 *   decode(bytes, schema);
 * } catch (error) {
 *   if (error instanceof WireError && error.code === ErrorCode.MISSING_MANDATORY_FIELD) {
 *     // reject the message
 *   }
 * }
 * ```
 */
export class WireError extends SomeIpError {
  constructor(message: string, code: ErrorCode, details?: ErrorDetails) {
    super(message, code, details);
    this.name = "WireError";
  }

  // =========================================================================
  // Factory methods
  // =========================================================================

  static unexpectedEndOfInput(needed: number, available: number, offset: number): WireError {
    return new WireError(
      `Ran out of bytes: needed ${needed} but only ${available} remain`,
      ErrorCode.UNEXPECTED_END_OF_INPUT,
      { offset }
    );
  }

  static lengthMismatch(reason: string, offset?: number, path?: string): WireError {
    return new WireError(`Length mismatch: ${reason}`, ErrorCode.LENGTH_MISMATCH, { offset, path });
  }

  static wireTypeMismatch(expected: string, actual: string, path: string, offset?: number): WireError {
    return new WireError(`Invalid wire type: expected ${expected} but got ${actual}`, ErrorCode.WIRE_TYPE_MISMATCH, {
      path,
      offset,
    });
  }

  static unsupportedWireType(wireType: number, dataId: number, offset?: number, path?: string): WireError {
    return new WireError(
      `Cannot handle wire type ${wireType} of the entry with data id ${dataId}`,
      ErrorCode.UNSUPPORTED_WIRE_TYPE,
      {
        offset,
        path,
        help: "Wire types 8-15 are reserved, and an unknown entry of wire type 7 has no length to skip.",
      }
    );
  }

  static missingMandatoryField(field: string, struct: string, path: string): WireError {
    return new WireError(`Mandatory field '${field}' of struct '${struct}' is missing`, ErrorCode.MISSING_MANDATORY_FIELD, {
      path,
    });
  }

  static duplicateField(dataId: number, path: string, offset?: number): WireError {
    return new WireError(`Data id ${dataId} appears more than once`, ErrorCode.DUPLICATE_FIELD, { path, offset });
  }

  static invalidStringEncoding(reason: string, path?: string, offset?: number, cause?: unknown): WireError {
    return new WireError(`Cannot en/decode string: ${reason}`, ErrorCode.INVALID_STRING_ENCODING, { path, offset, cause });
  }

  static invalidBooleanValue(value: number, offset?: number): WireError {
    return new WireError(`Invalid value for bool: ${value}`, ErrorCode.INVALID_BOOLEAN_VALUE, { offset });
  }

  static valueTooLarge(reason: string, path?: string): WireError {
    return new WireError(`Value too large: ${reason}`, ErrorCode.VALUE_TOO_LARGE, { path });
  }

  static lengthOutOfBounds(actual: number, min: number, max: number, unit: string, path?: string): WireError {
    const upper = Number.isFinite(max) ? String(max) : "unbounded";
    return new WireError(
      `Got ${actual} ${unit} but between ${min} and ${upper} are allowed`,
      ErrorCode.LENGTH_OUT_OF_BOUNDS,
      { path }
    );
  }

  static unknownDiscriminant(discriminant: number, union: string, path: string): WireError {
    return new WireError(`Discriminant ${discriminant} matches no variant of union '${union}'`, ErrorCode.UNKNOWN_DISCRIMINANT, {
      path,
    });
  }

  static unknownTreatAsValue(value: string, union: string, path: string): WireError {
    return new WireError(`Value ${value} matches no variant of union '${union}'`, ErrorCode.UNKNOWN_TREAT_AS_VALUE, {
      path,
    });
  }

  static schemaTooDeep(limit: number, path: string): WireError {
    return new WireError(`Nesting exceeds the maximum depth of ${limit}`, ErrorCode.SCHEMA_TOO_DEEP, {
      path,
      help: "Raise maxDepth in the options if this nesting is intended.",
    });
  }

  static unknownVariant(variant: string, union: string, path: string): WireError {
    return new WireError(`'${variant}' is not a variant of union '${union}'`, ErrorCode.INVALID_VALUE, { path });
  }

  static invalidValue(expected: string, actual: unknown, path: string): WireError {
    return new WireError(`Expected ${expected} but got ${describeValue(actual)}`, ErrorCode.INVALID_VALUE, { path });
  }
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
