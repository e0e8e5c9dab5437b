export type {
  PrimitiveKind,
  PrimitiveWidth,
  SchemaType,
  PrimitiveType,
  StringType,
  SequenceSize,
  SequenceType,
  SchemaField,
  StructType,
  UnionVariant,
  TreatAsValue,
  TreatAs,
  UnionType,
  SomeIpRecord,
  UnionValue,
  SomeIpValue,
  StringOptions,
  SequenceOptions,
  FieldOptions,
  StructOptions,
  UnionOptions,
} from "./types.js";
export {
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
} from "./types.js";
export { validateSchema } from "./validate.js";
export {
  isStaticallySized,
  encodedType,
  lengthFieldCategory,
  resolveLengthFieldWidth,
  memberWireType,
  integerRange,
  describeType,
} from "./layout.js";
