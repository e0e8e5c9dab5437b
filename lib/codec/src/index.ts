/**
 * SOME/IP payload codec
 *
 * Serializes values to and from SOME/IP payloads, driven by a schema and a
 * project-wide options bundle. Supports fixed-layout and TLV structs,
 * strings, sequences and unions.
 */

// Entry points
export { encode, decode, Codec, createCodec } from "./codec.js";

// Value guards
export { isSequenceValue, isRecordValue, isUnionValue } from "./engine/context.js";

// Options
export {
  type ByteOrder,
  type StringEncoding,
  type LengthFieldWidth,
  type LengthFieldCategory,
  type DiscriminantWidth,
  type LengthFieldSelection,
  type OptionsConfig,
  type PartialOptionsConfig,
  LENGTH_FIELD_CATEGORIES,
  SomeIpOptions,
  createOptions,
  defaultConfig,
  mergeConfig,
  REFERENCE_OPTIONS,
} from "./config.js";

// Diagnostic
export { SomeIpError, SchemaError, WireError, ErrorCode, type ErrorDetails } from "./diagnostic/index.js";

// Schema
export {
  type PrimitiveKind,
  type PrimitiveWidth,
  type SchemaType,
  type PrimitiveType,
  type StringType,
  type SequenceSize,
  type SequenceType,
  type SchemaField,
  type StructType,
  type UnionVariant,
  type TreatAsValue,
  type TreatAs,
  type UnionType,
  type SomeIpRecord,
  type UnionValue,
  type SomeIpValue,
  type StringOptions,
  type SequenceOptions,
  type FieldOptions,
  type StructOptions,
  type UnionOptions,
  PRIMITIVE_WIDTHS,
  bool,
  u8,
  u16,
  u32,
  u64,
  i8,
  i16,
  i32,
  i64,
  f32,
  f64,
  primitiveType,
  string,
  sequence,
  field,
  struct,
  variant,
  union,
  enumeration,
  validateSchema,
  isStaticallySized,
  describeType,
} from "./schema/index.js";

// Wire format
export {
  WireType,
  MAX_DATA_ID,
  TAG_SIZE,
  type Tag,
  packTag,
  splitTag,
  unpackTag,
  fixedSizeOf,
  lengthFieldWidthOf,
  wireTypeForLengthField,
  describeWireType,
  ByteReader,
  ByteWriter,
} from "./wire/index.js";
