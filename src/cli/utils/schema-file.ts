/**
 * JSON schema documents.
 *
 * A document describes one root type. It is checked against the zod schema
 * below and then assembled through the library's builders, so every schema
 * rule applies to it as well.
 *
 * @example
 * ```json
 * {
 *   "kind": "struct",
 *   "name": "Point",
 *   "tlv": true,
 *   "fields": [
 *     { "name": "x", "id": 0, "type": { "kind": "primitive", "primitive": "i32" } },
 *     { "name": "y", "id": 1, "type": { "kind": "primitive", "primitive": "i32" }, "optional": true }
 *   ]
 * }
 * ```
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import {
  ErrorCode,
  SchemaError,
  field,
  primitiveType,
  sequence,
  string,
  struct,
  union,
  validateSchema,
  variant,
  type LengthFieldWidth,
  type PrimitiveKind,
  type SchemaType,
  type TreatAsValue,
} from "../../../lib/codec/src/index.js";

export type TypeNode =
  | { kind: "primitive"; primitive: PrimitiveKind }
  | {
      kind: "string";
      lengthFieldWidth?: LengthFieldWidth;
      fixedSize?: number;
      minSize?: number;
      maxSize?: number;
    }
  | {
      kind: "sequence";
      element: TypeNode;
      count?: number;
      minElements?: number;
      maxElements?: number;
      lengthFieldWidth?: LengthFieldWidth;
    }
  | {
      kind: "struct";
      name: string;
      tlv?: boolean;
      lengthFieldWidth?: LengthFieldWidth;
      fields: FieldNode[];
    }
  | {
      kind: "union";
      name: string;
      discriminantWidth?: 1 | 2 | 4;
      lengthFieldWidth?: LengthFieldWidth;
      variants: VariantNode[];
      treatAs?: TreatAsNode;
    };

export interface FieldNode {
  name: string;
  id: number;
  type: TypeNode;
  optional?: boolean;
  lengthFieldWidth?: LengthFieldWidth;
}

export interface VariantNode {
  name: string;
  discriminant: number;
  type?: TypeNode;
}

export interface TreatAsNode {
  type: TypeNode;
  values: { variant: string; value: number | string | boolean }[];
}

// ============================================================================
// ZOD SCHEMAS
// ============================================================================

const LengthFieldWidthSchema = z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(4)]);

const CountSchema = z.number().int().nonnegative();

const PrimitiveKindSchema = z.enum(["bool", "u8", "u16", "u32", "u64", "i8", "i16", "i32", "i64", "f32", "f64"]);

export const TypeNodeSchema: z.ZodType<TypeNode> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({
      kind: z.literal("primitive"),
      primitive: PrimitiveKindSchema,
    }),
    z.object({
      kind: z.literal("string"),
      lengthFieldWidth: LengthFieldWidthSchema.optional(),
      fixedSize: CountSchema.optional(),
      minSize: CountSchema.optional(),
      maxSize: CountSchema.optional(),
    }),
    z.object({
      kind: z.literal("sequence"),
      element: TypeNodeSchema,
      count: CountSchema.optional(),
      minElements: CountSchema.optional(),
      maxElements: CountSchema.optional(),
      lengthFieldWidth: LengthFieldWidthSchema.optional(),
    }),
    z.object({
      kind: z.literal("struct"),
      name: z.string().min(1),
      tlv: z.boolean().optional(),
      lengthFieldWidth: LengthFieldWidthSchema.optional(),
      fields: z.array(FieldNodeSchema),
    }),
    z.object({
      kind: z.literal("union"),
      name: z.string().min(1),
      discriminantWidth: z.union([z.literal(1), z.literal(2), z.literal(4)]).optional(),
      lengthFieldWidth: LengthFieldWidthSchema.optional(),
      variants: z.array(VariantNodeSchema),
      treatAs: TreatAsNodeSchema.optional(),
    }),
  ])
);

const FieldNodeSchema: z.ZodType<FieldNode> = z.lazy(() =>
  z.object({
    name: z.string().min(1),
    id: z.number().int(),
    type: TypeNodeSchema,
    optional: z.boolean().optional(),
    lengthFieldWidth: LengthFieldWidthSchema.optional(),
  })
);

const VariantNodeSchema: z.ZodType<VariantNode> = z.lazy(() =>
  z.object({
    name: z.string().min(1),
    discriminant: CountSchema,
    type: TypeNodeSchema.optional(),
  })
);

const TreatAsNodeSchema: z.ZodType<TreatAsNode> = z.lazy(() =>
  z.object({
    type: TypeNodeSchema,
    values: z.array(
      z.object({
        variant: z.string().min(1),
        value: z.union([z.number(), z.string(), z.boolean()]),
      })
    ),
  })
);

// ============================================================================
// BUILDING
// ============================================================================

/**
 * Parses and builds a schema from a JSON value.
 *
 * @throws SchemaError `INVALID_SCHEMA` if the document is malformed, or the
 *   builders' own errors
 */
export function parseSchemaDocument(document: unknown): SchemaType {
  const result = TypeNodeSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
      .join("; ");
    throw SchemaError.invalidSchema(issues);
  }
  const type = buildType(result.data);
  validateSchema(type);
  return type;
}

/**
 * Reads a schema document from a file.
 */
export async function loadSchemaFile(path: string): Promise<SchemaType> {
  const text = await readFile(path, "utf-8");
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new SchemaError(`Schema file ${path} is not valid JSON`, ErrorCode.INVALID_SCHEMA, {
      path,
      cause: error,
    });
  }
  return parseSchemaDocument(document);
}

/**
 * Assembles a type node through the builders.
 */
export function buildType(node: TypeNode): SchemaType {
  switch (node.kind) {
    case "primitive":
      return primitiveType(node.primitive);

    case "string":
      return string({
        lengthFieldWidth: node.lengthFieldWidth,
        fixedSize: node.fixedSize,
        minSize: node.minSize,
        maxSize: node.maxSize,
      });

    case "sequence":
      return sequence(buildType(node.element), {
        count: node.count,
        minElements: node.minElements,
        maxElements: node.maxElements,
        lengthFieldWidth: node.lengthFieldWidth,
      });

    case "struct":
      return struct(
        node.name,
        node.fields.map((f) =>
          field(f.name, f.id, buildType(f.type), {
            optional: f.optional,
            lengthFieldWidth: f.lengthFieldWidth,
          })
        ),
        { tlv: node.tlv, lengthFieldWidth: node.lengthFieldWidth }
      );

    case "union": {
      const name = node.name;
      const variants = node.variants.map((v) =>
        variant(v.name, v.discriminant, v.type !== undefined ? buildType(v.type) : undefined)
      );
      if (node.treatAs === undefined) {
        return union(node.name, variants, {
          discriminantWidth: node.discriminantWidth,
          lengthFieldWidth: node.lengthFieldWidth,
        });
      }

      const treatType = buildType(node.treatAs.type);
      if (treatType.kind !== "primitive" && treatType.kind !== "string") {
        throw SchemaError.invalidTreatAs("the treat-as type must be a primitive or a string", node.name);
      }
      const wide = treatType.kind === "primitive" && (treatType.primitive === "u64" || treatType.primitive === "i64");
      return union(node.name, variants, {
        discriminantWidth: node.discriminantWidth,
        lengthFieldWidth: node.lengthFieldWidth,
        treatAs: {
          type: treatType,
          values: node.treatAs.values.map((entry) => ({
            variant: entry.variant,
            value: wide ? toBigInt(entry.value, name) : entry.value,
          })),
        },
      });
    }
  }
}

function toBigInt(value: number | string | boolean, union: string): TreatAsValue {
  if (typeof value === "number" && Number.isSafeInteger(value)) {
    return BigInt(value);
  }
  if (typeof value === "string" && /^-?\d+$/.test(value)) {
    return BigInt(value);
  }
  throw SchemaError.invalidTreatAs(`${String(value)} is not a 64-bit integer`, union);
}
