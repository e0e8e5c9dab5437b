/**
 * Serializer options.
 *
 * SOME/IP leaves parts of the payload format (byte order, string encoding,
 * length field widths) to the project. An options bundle fixes those choices
 * and is usually defined once per project or OEM.
 */

import { SchemaError } from "./diagnostic/index.js";

export type ByteOrder = "big-endian" | "little-endian";

export type StringEncoding = "utf-8" | "utf-16be" | "utf-16le";

/** Width in bytes of a length field; 0 means no length field. */
export type LengthFieldWidth = 0 | 1 | 2 | 4;

/** Kinds of values that carry a length field. */
export type LengthFieldCategory = "array" | "string" | "struct" | "union";

export type DiscriminantWidth = 1 | 2 | 4;

/**
 * How length fields inside TLV structs are sized.
 *
 * - `configured`: always the resolved width; too long a payload is an error.
 * - `smallest`: the smallest width that holds the payload, announced by the wire type.
 */
export type LengthFieldSelection = "configured" | "smallest";

/**
 * Plain configuration for a {@link SomeIpOptions} bundle.
 */
export interface OptionsConfig {
  byteOrder: ByteOrder;
  stringEncoding: StringEncoding;

  /** Strings start with the byte order mark of their encoding. */
  stringBom: boolean;

  /** Strings end with a NUL code unit. */
  stringTerminator: boolean;

  lengthFieldWidths: Record<LengthFieldCategory, LengthFieldWidth>;
  discriminantWidth: DiscriminantWidth;
  tlvLengthSelection: LengthFieldSelection;

  /** Maximum nesting of structs, sequences and unions. */
  maxDepth: number;
}

/**
 * Partial configuration; `lengthFieldWidths` may name only some categories.
 */
export type PartialOptionsConfig = Partial<Omit<OptionsConfig, "lengthFieldWidths">> & {
  lengthFieldWidths?: Partial<Record<LengthFieldCategory, LengthFieldWidth>>;
};

export const LENGTH_FIELD_CATEGORIES: readonly LengthFieldCategory[] = ["array", "string", "struct", "union"];

const BYTE_ORDERS: readonly ByteOrder[] = ["big-endian", "little-endian"];
const STRING_ENCODINGS: readonly StringEncoding[] = ["utf-8", "utf-16be", "utf-16le"];
const SELECTIONS: readonly LengthFieldSelection[] = ["configured", "smallest"];

/**
 * Creates the default configuration.
 */
export function defaultConfig(): OptionsConfig {
  return {
    byteOrder: "big-endian",
    stringEncoding: "utf-8",
    stringBom: false,
    stringTerminator: false,
    lengthFieldWidths: { array: 4, string: 4, struct: 4, union: 4 },
    discriminantWidth: 4,
    tlvLengthSelection: "configured",
    maxDepth: 64,
  };
}

/**
 * Merges partial config with defaults.
 */
export function mergeConfig(partial: PartialOptionsConfig): OptionsConfig {
  const defaults = defaultConfig();
  return {
    ...defaults,
    ...partial,
    lengthFieldWidths: {
      ...defaults.lengthFieldWidths,
      ...partial.lengthFieldWidths,
    },
  };
}

export function isLengthFieldWidth(value: unknown): value is LengthFieldWidth {
  return value === 0 || value === 1 || value === 2 || value === 4;
}

function isOneOf<T>(values: readonly T[], value: unknown): value is T {
  return values.some((v) => v === value);
}

/**
 * Immutable options bundle passed to every encode and decode call.
 */
export class SomeIpOptions {
  private readonly config: Readonly<OptionsConfig>;

  constructor(config: OptionsConfig) {
    validateConfig(config);
    this.config = Object.freeze({
      ...config,
      lengthFieldWidths: Object.freeze({ ...config.lengthFieldWidths }),
    });
    Object.freeze(this);
  }

  byteOrder(): ByteOrder {
    return this.config.byteOrder;
  }

  littleEndian(): boolean {
    return this.config.byteOrder === "little-endian";
  }

  stringEncoding(): StringEncoding {
    return this.config.stringEncoding;
  }

  stringBom(): boolean {
    return this.config.stringBom;
  }

  stringTerminator(): boolean {
    return this.config.stringTerminator;
  }

  lengthFieldWidth(category: LengthFieldCategory): LengthFieldWidth {
    return this.config.lengthFieldWidths[category];
  }

  discriminantWidth(): DiscriminantWidth {
    return this.config.discriminantWidth;
  }

  tlvLengthSelection(): LengthFieldSelection {
    return this.config.tlvLengthSelection;
  }

  maxDepth(): number {
    return this.config.maxDepth;
  }

  /**
   * Returns a copy of the underlying configuration.
   */
  toConfig(): OptionsConfig {
    return { ...this.config, lengthFieldWidths: { ...this.config.lengthFieldWidths } };
  }

  /**
   * Derives a new bundle with some settings replaced.
   */
  with(partial: PartialOptionsConfig): SomeIpOptions {
    const current = this.toConfig();
    return new SomeIpOptions({
      ...current,
      ...partial,
      lengthFieldWidths: { ...current.lengthFieldWidths, ...partial.lengthFieldWidths },
    });
  }
}

/**
 * Creates an options bundle from defaults plus overrides.
 *
 * @throws SchemaError if any setting is out of range
 */
export function createOptions(partial: PartialOptionsConfig = {}): SomeIpOptions {
  return new SomeIpOptions(mergeConfig(partial));
}

function validateConfig(config: OptionsConfig): void {
  if (!isOneOf(BYTE_ORDERS, config.byteOrder)) {
    throw SchemaError.invalidOptions(`unknown byte order '${String(config.byteOrder)}'`);
  }
  if (!isOneOf(STRING_ENCODINGS, config.stringEncoding)) {
    throw SchemaError.invalidOptions(`unknown string encoding '${String(config.stringEncoding)}'`);
  }
  if (typeof config.stringBom !== "boolean" || typeof config.stringTerminator !== "boolean") {
    throw SchemaError.invalidOptions("stringBom and stringTerminator must be booleans");
  }
  for (const category of LENGTH_FIELD_CATEGORIES) {
    const width: unknown = config.lengthFieldWidths[category];
    if (!isLengthFieldWidth(width)) {
      throw SchemaError.invalidLengthFieldWidth(width, `lengthFieldWidths.${category}`);
    }
  }
  const discriminant: unknown = config.discriminantWidth;
  if (discriminant !== 1 && discriminant !== 2 && discriminant !== 4) {
    throw SchemaError.invalidOptions(`discriminant width must be 1, 2 or 4, got ${String(discriminant)}`);
  }
  if (!isOneOf(SELECTIONS, config.tlvLengthSelection)) {
    throw SchemaError.invalidOptions(`unknown length field selection '${String(config.tlvLengthSelection)}'`);
  }
  if (!Number.isInteger(config.maxDepth) || config.maxDepth < 1) {
    throw SchemaError.invalidOptions(`maxDepth must be a positive integer, got ${config.maxDepth}`);
  }
}

/**
 * Reference policy for conformance testing: big-endian, UTF-8 strings
 * without BOM or terminator, 4-byte length fields and discriminants.
 */
export const REFERENCE_OPTIONS: SomeIpOptions = createOptions();
