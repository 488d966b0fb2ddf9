/**
 * LayerExpectation - the contract a layer requires and promises.
 *
 * Expectations are immutable value objects: construction validates the
 * definition and returns a deeply frozen copy. Changing a contract means
 * building a new layer with a new expectation.
 */

import { z } from "zod";
import { LayerRole } from "../models/layer-role";
import { ExpectationDefinitionError } from "../errors/layer-errors";
import { deepFreeze, frozenCopy } from "../utils/immutability";
import { FieldSchema, FieldSchemaSchema, formatIssue } from "./field-schema";
import { ValidationRule } from "./validation-rule";

/** Well-known performance constraint names */
export const MAX_DURATION_SECONDS = "max_duration_seconds";
export const MAX_MEMORY_BYTES = "max_memory_bytes";

/** Metric name → minimum acceptable value */
export type QualityRequirements = Readonly<Record<string, number>>;

/** Resource name → upper bound */
export type PerformanceConstraints = Readonly<Record<string, number>>;

export interface LayerExpectation {
  readonly role: LayerRole;
  readonly inputSchema: FieldSchema;
  readonly outputSchema: FieldSchema;
  readonly validationRules: readonly ValidationRule[];
  readonly qualityRequirements: QualityRequirements;
  readonly performanceConstraints: PerformanceConstraints;
}

export interface LayerExpectationDefinition {
  role: LayerRole;
  inputSchema?: FieldSchema;
  outputSchema?: FieldSchema;
  /** Empty means "structural schema check only" */
  validationRules?: readonly ValidationRule[];
  qualityRequirements?: Readonly<Record<string, number>>;
  performanceConstraints?: Readonly<Record<string, number>>;
}

const ExpectationDataSchema = z.object({
  role: z.nativeEnum(LayerRole),
  inputSchema: FieldSchemaSchema,
  outputSchema: FieldSchemaSchema,
  qualityRequirements: z.record(z.string(), z.number().finite()),
  performanceConstraints: z.record(z.string(), z.number().finite().positive()),
});

function checkRules(rules: readonly ValidationRule[]): string[] {
  const issues: string[] = [];
  const seen = new Set<string>();

  rules.forEach((rule, index) => {
    if (typeof rule.name !== "string" || rule.name.trim() === "") {
      issues.push(`validationRules.${index}.name: must be a non-empty string`);
    } else if (seen.has(rule.name)) {
      issues.push(`validationRules.${index}.name: duplicate rule name "${rule.name}"`);
    } else {
      seen.add(rule.name);
    }
    if (typeof rule.check !== "function") {
      issues.push(`validationRules.${index}.check: must be a function`);
    }
  });

  return issues;
}

/**
 * Build an immutable expectation from a definition.
 *
 * @throws ExpectationDefinitionError if the definition is malformed
 */
export function createLayerExpectation(
  definition: LayerExpectationDefinition
): LayerExpectation {
  const data = {
    role: definition.role,
    inputSchema: definition.inputSchema ?? {},
    outputSchema: definition.outputSchema ?? {},
    qualityRequirements: definition.qualityRequirements ?? {},
    performanceConstraints: definition.performanceConstraints ?? {},
  };
  const rules = definition.validationRules ?? [];

  const parsed = ExpectationDataSchema.safeParse(data);
  const issues = [
    ...(parsed.success ? [] : parsed.error.issues.map(formatIssue)),
    ...checkRules(rules),
  ];

  if (issues.length > 0) {
    throw new ExpectationDefinitionError(
      `Invalid expectation for ${String(definition.role)}: ${issues.join("; ")}`,
      issues
    );
  }

  return deepFreeze({
    role: data.role,
    inputSchema: frozenCopy(data.inputSchema),
    outputSchema: frozenCopy(data.outputSchema),
    validationRules: rules.map(
      (rule): ValidationRule => ({
        name: rule.name,
        fatal: rule.fatal ?? false,
        description: rule.description,
        check: (payload) => rule.check(payload),
      })
    ),
    qualityRequirements: frozenCopy(data.qualityRequirements),
    performanceConstraints: frozenCopy(data.performanceConstraints),
  });
}

/**
 * Duration limit of an expectation in milliseconds, if it declares one.
 */
export function maxDurationMs(expectation: LayerExpectation): number | undefined {
  const seconds = expectation.performanceConstraints[MAX_DURATION_SECONDS];
  return seconds === undefined ? undefined : seconds * 1000;
}
