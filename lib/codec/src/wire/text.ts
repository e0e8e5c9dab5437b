/**
 * String body codec: byte order mark, text, NUL terminator and fixed-size
 * padding. The length field around the body is handled by the caller.
 */

import type { SomeIpOptions, StringEncoding } from "../config.js";
import type { StringType } from "../schema/types.js";
import { SchemaError, WireError } from "../diagnostic/index.js";

const UTF8_BOM = [0xef, 0xbb, 0xbf] as const;

function bomOf(encoding: StringEncoding): readonly number[] {
  switch (encoding) {
    case "utf-8":
      return UTF8_BOM;
    case "utf-16be":
      return [0xfe, 0xff];
    case "utf-16le":
      return [0xff, 0xfe];
  }
}

function unitSize(encoding: StringEncoding): 1 | 2 {
  return encoding === "utf-8" ? 1 : 2;
}

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * A fixed size must hold whole code units of the configured encoding.
 */
function checkFixedSize(type: StringType, encoding: StringEncoding, path: string): void {
  const unit = unitSize(encoding);
  if (type.fixedSize !== undefined && type.fixedSize % unit !== 0) {
    throw SchemaError.invalidSizeBounds(
      `fixedSize ${type.fixedSize} is not a multiple of the ${unit}-byte ${encoding} code unit`,
      path
    );
  }
}

function findLoneSurrogate(text: string): number {
  for (let i = 0; i < text.length; i++) {
    const unit = text.charCodeAt(i);
    if (unit >= 0xd800 && unit <= 0xdbff) {
      const next = i + 1 < text.length ? text.charCodeAt(i + 1) : 0;
      if (next >= 0xdc00 && next <= 0xdfff) {
        i++;
        continue;
      }
      return i;
    }
    if (unit >= 0xdc00 && unit <= 0xdfff) {
      return i;
    }
  }
  return -1;
}

function encodeUtf16(text: string, littleEndian: boolean): Uint8Array {
  const out = new Uint8Array(text.length * 2);
  const view = new DataView(out.buffer);
  for (let i = 0; i < text.length; i++) {
    view.setUint16(i * 2, text.charCodeAt(i), littleEndian);
  }
  return out;
}

/**
 * Encodes a string body.
 *
 * @throws SchemaError `INVALID_SIZE_BOUNDS` for a fixed size that splits a code unit
 * @throws WireError `INVALID_STRING_ENCODING` for lone surrogates,
 *   `VALUE_TOO_LARGE` for text longer than a fixed size,
 *   `LENGTH_OUT_OF_BOUNDS` for a body outside `minSize`..`maxSize`
 */
export function encodeText(text: string, type: StringType, options: SomeIpOptions, path: string): Uint8Array {
  const lone = findLoneSurrogate(text);
  if (lone >= 0) {
    throw WireError.invalidStringEncoding(`lone surrogate at index ${lone}`, path);
  }

  const encoding = options.stringEncoding();
  checkFixedSize(type, encoding, path);
  const unit = unitSize(encoding);
  const content = encoding === "utf-8" ? utf8Encoder.encode(text) : encodeUtf16(text, encoding === "utf-16le");
  const bom = options.stringBom() ? bomOf(encoding) : [];
  const terminator = options.stringTerminator() ? unit : 0;

  const length = bom.length + content.length + terminator;
  const size = type.fixedSize ?? length;
  if (length > size) {
    throw WireError.valueTooLarge(`string needs ${length} bytes but its fixed size is ${size}`, path);
  }
  const min = type.minSize ?? 0;
  const max = type.maxSize ?? Number.POSITIVE_INFINITY;
  if (size < min || size > max) {
    throw WireError.lengthOutOfBounds(size, min, max, "bytes", path);
  }

  // terminator and padding are the zero fill after the content
  const out = new Uint8Array(size);
  out.set(bom, 0);
  out.set(content, bom.length);
  return out;
}

function invalid(reason: string, path: string, offset: number): WireError {
  return WireError.invalidStringEncoding(reason, path, offset);
}

function startsWith(bytes: Uint8Array, prefix: readonly number[]): boolean {
  return prefix.length <= bytes.length && prefix.every((b, i) => bytes[i] === b);
}

function decodeUtf16(bytes: Uint8Array, littleEndian: boolean, path: string, offset: number): string {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const units: number[] = [];
  for (let i = 0; i < bytes.length; i += 2) {
    units.push(view.getUint16(i, littleEndian));
  }
  let text = "";
  for (let i = 0; i < units.length; i++) {
    const unit = units[i];
    if (unit >= 0xd800 && unit <= 0xdbff) {
      const next = i + 1 < units.length ? units[i + 1] : 0;
      if (next < 0xdc00 || next > 0xdfff) {
        throw invalid(`unpaired high surrogate at code unit ${i}`, path, offset);
      }
      text += String.fromCharCode(unit, next);
      i++;
    } else if (unit >= 0xdc00 && unit <= 0xdfff) {
      throw invalid(`unpaired low surrogate at code unit ${i}`, path, offset);
    } else {
      text += String.fromCharCode(unit);
    }
  }
  return text;
}

/**
 * Decodes a string body that spans exactly `bytes`.
 *
 * @param offset - absolute offset of the body, for error reports
 */
export function decodeText(
  bytes: Uint8Array,
  type: StringType,
  options: SomeIpOptions,
  path: string,
  offset: number
): string {
  const min = type.minSize ?? 0;
  const max = type.maxSize ?? Number.POSITIVE_INFINITY;
  if (bytes.length < min || bytes.length > max) {
    throw WireError.lengthOutOfBounds(bytes.length, min, max, "bytes", path);
  }

  checkFixedSize(type, options.stringEncoding(), path);

  let encoding = options.stringEncoding();
  let body = bytes;

  if (options.stringBom()) {
    if (encoding === "utf-8") {
      if (!startsWith(body, UTF8_BOM)) {
        throw invalid("missing UTF-8 byte order mark", path, offset);
      }
      body = body.subarray(UTF8_BOM.length);
    } else if (startsWith(body, [0xfe, 0xff])) {
      encoding = "utf-16be";
      body = body.subarray(2);
    } else if (startsWith(body, [0xff, 0xfe])) {
      encoding = "utf-16le";
      body = body.subarray(2);
    } else {
      throw invalid("missing UTF-16 byte order mark", path, offset);
    }
  }

  const unit = unitSize(encoding);
  if (body.length % unit !== 0) {
    throw invalid(`odd number of bytes (${body.length}) for ${encoding}`, path, offset);
  }

  let end = body.length;
  const zeroUnitEndsAt = (at: number): boolean => at >= unit && body.subarray(at - unit, at).every((b) => b === 0);

  if (type.fixedSize !== undefined) {
    const before = end;
    while (zeroUnitEndsAt(end)) end -= unit;
    if (options.stringTerminator() && end === before) {
      throw invalid("missing NUL terminator", path, offset);
    }
  } else if (options.stringTerminator()) {
    if (!zeroUnitEndsAt(end)) {
      throw invalid("missing NUL terminator", path, offset);
    }
    end -= unit;
  }
  body = body.subarray(0, end);

  if (encoding === "utf-8") {
    try {
      return utf8Decoder.decode(body);
    } catch (error) {
      throw WireError.invalidStringEncoding("malformed UTF-8", path, offset, error);
    }
  }
  return decodeUtf16(body, encoding === "utf-16le", path, offset);
}
