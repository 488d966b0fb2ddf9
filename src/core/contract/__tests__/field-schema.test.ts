/**
 * Field schema tests
 */

import { describe, it, expect } from "@jest/globals";
import { FIELD_TYPES, FieldSchemaSchema, checkFieldSchema, compileFieldSchema } from "../field-schema";

describe("checkFieldSchema", () => {
  it("accepts a payload with every required field and passes unknown fields through", () => {
    const check = checkFieldSchema({ claim_count: "number" }, { claim_count: 2, note: "extra" });

    expect(check).toEqual({
      passed: true,
      issues: [],
      detail: "payload matches schema (1 declared field)",
    });
    expect(compileFieldSchema({ claim_count: "number" }).parse({ claim_count: 2, note: "extra" })).toEqual({
      claim_count: 2,
      note: "extra",
    });
  });

  it("reports a missing required field", () => {
    const check = checkFieldSchema({ claim_count: "number", text: "string" }, { text: "draft" });

    expect(check.passed).toBe(false);
    expect(check.issues).toEqual(["claim_count: Required"]);
    expect(check.detail).toBe("claim_count: Required");
  });

  it("reports a field of the wrong type", () => {
    const check = checkFieldSchema({ claim_count: "number" }, { claim_count: "two" });

    expect(check.issues).toEqual(["claim_count: Expected number, received string"]);
  });

  it("rejects fractional values for integer fields", () => {
    expect(checkFieldSchema({ claim_count: "integer" }, { claim_count: 1.5 }).passed).toBe(false);
    expect(checkFieldSchema({ claim_count: "integer" }, { claim_count: 3 }).passed).toBe(true);
  });

  it("checks nested object properties and array items", () => {
    const schema = {
      source: { type: "object", properties: { url: "string" } },
      tags: { type: "array", items: "string" },
    } as const;

    const check = checkFieldSchema(schema, { source: {}, tags: ["a", 1] });

    expect(check.issues).toEqual(["source.url: Required", "tags.1: Expected string, received number"]);
  });

  it("allows optional fields to be absent", () => {
    const check = checkFieldSchema(
      { summary: "string", citations: { type: "array", optional: true } },
      { summary: "ok" }
    );

    expect(check.passed).toBe(true);
    expect(check.detail).toBe("payload matches schema (2 declared fields)");
  });

  it("requires presence for fields of type any", () => {
    expect(checkFieldSchema({ evidence: "any" }, {}).issues).toEqual(["evidence: Required"]);
    expect(checkFieldSchema({ evidence: "any" }, { evidence: null }).passed).toBe(true);
  });

  it("reports non-object payloads at the root", () => {
    expect(checkFieldSchema({}, "plain text").issues).toEqual(["(root): Expected object, received string"]);
  });
});

describe("FieldSchemaSchema", () => {
  it("accepts every field type, bare or in a descriptor", () => {
    for (const type of FIELD_TYPES) {
      expect(FieldSchemaSchema.safeParse({ bare: type, described: { type, optional: true } }).success).toBe(true);
    }
  });

  it("rejects unknown field types", () => {
    expect(FieldSchemaSchema.safeParse({ when: "date" }).success).toBe(false);
    expect(FieldSchemaSchema.safeParse({ when: { type: "date" } }).success).toBe(false);
  });
});
