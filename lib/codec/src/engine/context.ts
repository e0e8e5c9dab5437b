/**
 * Per-call state shared by the encoder and decoder.
 */

import type { SomeIpOptions } from "../config.js";
import type { SchemaType, SomeIpRecord, SomeIpValue, UnionValue } from "../schema/types.js";
import { WireError } from "../diagnostic/index.js";
import { describeType } from "../schema/layout.js";

export class CodecContext {
  readonly options: SomeIpOptions;
  readonly littleEndian: boolean;
  private depth = 0;

  constructor(options: SomeIpOptions) {
    this.options = options;
    this.littleEndian = options.littleEndian();
  }

  /**
   * Enters one nesting level.
   *
   * @throws WireError `SCHEMA_TOO_DEEP` past the configured maximum depth
   */
  enter(path: string): void {
    if (this.depth >= this.options.maxDepth()) {
      throw WireError.schemaTooDeep(this.options.maxDepth(), path);
    }
    this.depth++;
  }

  leave(): void {
    this.depth--;
  }
}

export function rootPath(type: SchemaType): string {
  return type.kind === "struct" || type.kind === "union" ? type.name : describeType(type);
}

export function fieldPath(parent: string, name: string): string {
  return `${parent}.${name}`;
}

export function indexPath(parent: string, index: number): string {
  return `${parent}[${index}]`;
}

export function variantPath(parent: string, variant: string): string {
  return `${parent}::${variant}`;
}

export function isSequenceValue(value: SomeIpValue | undefined): value is readonly SomeIpValue[] {
  return Array.isArray(value);
}

function isObjectValue(value: SomeIpValue | undefined): value is SomeIpRecord | UnionValue {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isRecordValue(value: SomeIpValue | undefined): value is SomeIpRecord {
  return isObjectValue(value);
}

export function isUnionValue(value: SomeIpValue | undefined): value is UnionValue {
  return isObjectValue(value) && typeof value.variant === "string";
}
