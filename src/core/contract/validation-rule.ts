/**
 * Named predicates evaluated over a buffer payload.
 */

export interface RuleCheck {
  passed: boolean;
  detail?: string;
}

export interface ValidationRule {
  /** Unique name within an expectation; shows up in the validation trail */
  name: string;

  /** A failed fatal rule stops evaluation of the remaining rules */
  fatal?: boolean;

  description?: string;

  check(payload: unknown): boolean | RuleCheck;
}

export interface RuleOptions {
  name?: string;
  fatal?: boolean;
  description?: string;
}

function readField(payload: unknown, field: string): unknown {
  if (payload === null || typeof payload !== "object") {
    return undefined;
  }
  let current: unknown = payload;
  for (const segment of field.split(".")) {
    if (current === null || typeof current !== "object") {
      return undefined;
    }
    current = Reflect.get(current, segment);
  }
  return current;
}

function describeValue(value: unknown): string {
  return value === undefined ? "missing" : JSON.stringify(value);
}

/**
 * Normalise whatever a rule's check returned.
 */
export function toRuleCheck(result: boolean | RuleCheck): RuleCheck {
  return typeof result === "boolean" ? { passed: result } : result;
}

/**
 * Built-in rule factories. Field names may use dots for nested fields.
 */
export const Rules = {
  /** Field must be a non-blank string or a non-empty array */
  requireNonEmpty(field: string, options: RuleOptions = {}): ValidationRule {
    return {
      name: options.name ?? `${field} is non-empty`,
      fatal: options.fatal,
      description: options.description,
      check(payload) {
        const value = readField(payload, field);
        const passed =
          (typeof value === "string" && value.trim().length > 0) ||
          (Array.isArray(value) && value.length > 0);
        return {
          passed,
          detail: passed ? `${field} is non-empty` : `${field} is ${describeValue(value)}`,
        };
      },
    };
  },

  /** Field must be a number >= min */
  minimum(field: string, min: number, options: RuleOptions = {}): ValidationRule {
    return {
      name: options.name ?? `${field} >= ${min}`,
      fatal: options.fatal,
      description: options.description,
      check(payload) {
        const value = readField(payload, field);
        const passed = typeof value === "number" && value >= min;
        return {
          passed,
          detail: `${field} = ${describeValue(value)}, expected >= ${min}`,
        };
      },
    };
  },

  /** Field must be a number <= max */
  maximum(field: string, max: number, options: RuleOptions = {}): ValidationRule {
    return {
      name: options.name ?? `${field} <= ${max}`,
      fatal: options.fatal,
      description: options.description,
      check(payload) {
        const value = readField(payload, field);
        const passed = typeof value === "number" && value <= max;
        return {
          passed,
          detail: `${field} = ${describeValue(value)}, expected <= ${max}`,
        };
      },
    };
  },

  /** Arbitrary predicate */
  predicate(
    name: string,
    fn: (payload: unknown) => boolean | RuleCheck,
    options: Omit<RuleOptions, "name"> = {}
  ): ValidationRule {
    return {
      name,
      fatal: options.fatal,
      description: options.description,
      check: fn,
    };
  },
};

export { readField };
