export {
  WireType,
  MAX_DATA_ID,
  TAG_SIZE,
  type Tag,
  packTag,
  splitTag,
  unpackTag,
  isWireType,
  fixedSizeOf,
  lengthFieldWidthOf,
  wireTypeForFixedSize,
  wireTypeForLengthField,
  describeWireType,
} from "./tag.js";
export { ByteReader } from "./reader.js";
export { ByteWriter } from "./writer.js";
export { encodePrimitive, decodePrimitive } from "./primitive.js";
export {
  smallestLengthFieldWidth,
  writeLengthField,
  writeLengthPrefixed,
  readLengthField,
} from "./length-field.js";
export { encodeText, decodeText } from "./text.js";
