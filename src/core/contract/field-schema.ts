/**
 * Structural schemas for layer inputs and outputs.
 *
 * Schemas are plain data (field name → shape) so they can travel with remote
 * adapters; they are compiled to zod schemas when a payload is checked.
 * Unknown fields are always passed through.
 */

import { z, ZodIssue } from "zod";

export type FieldType =
  | "string"
  | "number"
  | "integer"
  | "boolean"
  | "object"
  | "array"
  | "null"
  | "any";

export interface FieldDescriptor {
  type: FieldType;
  /** Fields are required unless marked optional */
  optional?: boolean;
  /** Element shape for arrays */
  items?: FieldShape;
  /** Nested fields for objects */
  properties?: FieldSchema;
  description?: string;
}

export type FieldShape = FieldType | FieldDescriptor;

export type FieldSchema = Readonly<Record<string, FieldShape>>;

export interface SchemaCheck {
  passed: boolean;
  issues: string[];
  detail: string;
}

export const FIELD_TYPES = [
  "string",
  "number",
  "integer",
  "boolean",
  "object",
  "array",
  "null",
  "any",
] as const satisfies readonly FieldType[];

const FieldTypeSchema = z.enum(FIELD_TYPES);

function toDescriptor(shape: FieldShape): FieldDescriptor {
  return typeof shape === "string" ? { type: shape } : shape;
}

/**
 * Compile a single field shape to a zod schema.
 */
export function compileFieldShape(shape: FieldShape): z.ZodTypeAny {
  const descriptor = toDescriptor(shape);
  let schema: z.ZodTypeAny;

  switch (descriptor.type) {
    case "string":
      schema = z.string();
      break;
    case "number":
      schema = z.number();
      break;
    case "integer":
      schema = z.number().int();
      break;
    case "boolean":
      schema = z.boolean();
      break;
    case "null":
      schema = z.null();
      break;
    case "object":
      schema = descriptor.properties
        ? compileFieldSchema(descriptor.properties)
        : z.record(z.string(), z.unknown());
      break;
    case "array":
      schema = z.array(descriptor.items ? compileFieldShape(descriptor.items) : z.unknown());
      break;
    case "any":
      // z.unknown() accepts a missing key, so presence is checked explicitly
      schema = z.unknown().refine((value) => value !== undefined, {
        message: "Required",
      });
      break;
  }

  return descriptor.optional ? schema.optional() : schema;
}

/**
 * Compile a field schema to a zod object schema that passes unknown keys through.
 */
export function compileFieldSchema(schema: FieldSchema): z.ZodTypeAny {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [name, field] of Object.entries(schema)) {
    shape[name] = compileFieldShape(field);
  }
  return z.object(shape).passthrough();
}

export function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

/**
 * Check a value against a field schema without throwing.
 */
export function checkFieldSchema(schema: FieldSchema, value: unknown): SchemaCheck {
  const result = compileFieldSchema(schema).safeParse(value);
  if (result.success) {
    const count = Object.keys(schema).length;
    return {
      passed: true,
      issues: [],
      detail: `payload matches schema (${count} declared field${count === 1 ? "" : "s"})`,
    };
  }

  const issues = result.error.issues.map(formatIssue);
  return { passed: false, issues, detail: issues.join("; ") };
}

/**
 * Zod schema for validating a FieldSchema definition itself.
 */
export const FieldShapeSchema: z.ZodType<FieldShape> = z.lazy(() =>
  z.union([
    FieldTypeSchema,
    z
      .object({
        type: FieldTypeSchema,
        optional: z.boolean().optional(),
        items: FieldShapeSchema.optional(),
        properties: z.record(z.string(), FieldShapeSchema).optional(),
        description: z.string().optional(),
      })
      .strict(),
  ])
);

export const FieldSchemaSchema = z.record(z.string(), FieldShapeSchema);
