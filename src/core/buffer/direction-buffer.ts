/**
 * DirectionBuffer - the envelope carrying data from one layer to the next.
 *
 * The payload is copied and frozen at construction. validate() checks it
 * against the receiving layer's expectation and appends to an audit trail
 * that is never truncated; re-validating appends a new attempt.
 */

import { v4 as uuidv4 } from "uuid";
import { LayerRole, areAdjacent } from "../models/layer-role";
import { LayerExpectation } from "../contract/layer-expectation";
import { checkFieldSchema } from "../contract/field-schema";
import { toRuleCheck } from "../contract/validation-rule";
import { ContractViolationError, toErrorMessage } from "../errors/layer-errors";
import { deepFreeze, frozenCopy } from "../utils/immutability";
import {
  SCHEMA_CHECK,
  ValidationOutcome,
  ValidationRecord,
  qualityCheckName,
} from "./validation-record";

export interface BufferMetadata {
  readonly createdAt: string;
  readonly sourceRole: LayerRole;
  readonly targetRole: LayerRole;
  readonly correlationId: string;
  readonly [key: string]: unknown;
}

export interface DirectionBufferParams<T> {
  sourceRole: LayerRole;
  targetRole: LayerRole;
  payload: T;
  correlationId?: string;
  /** Extra provenance, merged under the standard fields */
  metadata?: Record<string, unknown>;
  createdAt?: Date;
}

/**
 * Read a quality metric reported in a payload: a numeric top-level field of
 * that name, or an entry of a `quality_metrics` object.
 */
export function readQualityMetric(payload: unknown, metric: string): number | undefined {
  if (payload === null || typeof payload !== "object") {
    return undefined;
  }
  const direct: unknown = Reflect.get(payload, metric);
  if (typeof direct === "number") {
    return direct;
  }
  const metrics: unknown = Reflect.get(payload, "quality_metrics");
  if (metrics !== null && typeof metrics === "object") {
    const nested: unknown = Reflect.get(metrics, metric);
    if (typeof nested === "number") {
      return nested;
    }
  }
  return undefined;
}

export class DirectionBuffer<T = unknown> {
  readonly id: string;
  readonly sourceRole: LayerRole;
  readonly targetRole: LayerRole;
  readonly payload: Readonly<T>;
  readonly metadata: BufferMetadata;

  private records: ValidationRecord[] = [];
  private attempts = 0;
  private last?: ValidationOutcome;

  constructor(params: DirectionBufferParams<T>) {
    if (!areAdjacent(params.sourceRole, params.targetRole)) {
      throw new ContractViolationError(
        `Buffers may only flow to the next layer: ${params.sourceRole} → ${params.targetRole} is not a valid hand-off`,
        { sourceRole: params.sourceRole, targetRole: params.targetRole }
      );
    }

    let payload: Readonly<T>;
    try {
      payload = frozenCopy(params.payload);
    } catch (error) {
      throw new ContractViolationError(
        `Payload from ${params.sourceRole} cannot be copied into a buffer: ${toErrorMessage(error)}`,
        { sourceRole: params.sourceRole, targetRole: params.targetRole }
      );
    }

    this.id = uuidv4();
    this.sourceRole = params.sourceRole;
    this.targetRole = params.targetRole;
    this.payload = payload;
    this.metadata = deepFreeze({
      ...(params.metadata ?? {}),
      createdAt: (params.createdAt ?? new Date()).toISOString(),
      sourceRole: params.sourceRole,
      targetRole: params.targetRole,
      correlationId: params.correlationId ?? uuidv4(),
    });
  }

  get correlationId(): string {
    return this.metadata.correlationId;
  }

  /** Full append-only trail across every validation attempt */
  get validationResults(): readonly ValidationRecord[] {
    return [...this.records];
  }

  get isValidated(): boolean {
    return this.last !== undefined;
  }

  get lastOutcome(): ValidationOutcome | undefined {
    return this.last;
  }

  /** True only when the most recent validation passed */
  get passed(): boolean {
    return this.last?.status === "passed";
  }

  /**
   * Validate the payload against the receiving layer's expectation.
   *
   * Every rule runs and is recorded even after a failure, except that a
   * failed fatal rule stops evaluation of later rules and quality checks.
   */
  validate(expectation: LayerExpectation): ValidationOutcome {
    if (expectation.role !== this.targetRole) {
      throw new ContractViolationError(
        `Buffer addressed to ${this.targetRole} cannot be validated against the ${expectation.role} expectation`,
        { sourceRole: this.sourceRole, targetRole: this.targetRole }
      );
    }

    const attempt = this.attempts + 1;
    const records: ValidationRecord[] = [];
    const record = (
      ruleName: string,
      kind: ValidationRecord["kind"],
      passed: boolean,
      detail: string,
      fatal = false
    ): void => {
      records.push({
        ruleName,
        kind,
        passed,
        fatal,
        detail,
        timestamp: new Date().toISOString(),
        attempt,
        targetRole: this.targetRole,
      });
    };

    const schema = checkFieldSchema(expectation.inputSchema, this.payload);
    record(SCHEMA_CHECK, "schema", schema.passed, schema.detail);

    let stoppedAt: string | undefined;
    for (const rule of expectation.validationRules) {
      const fatal = rule.fatal ?? false;
      let passed: boolean;
      let detail: string;
      try {
        const check = toRuleCheck(rule.check(this.payload));
        passed = check.passed;
        detail = check.detail ?? (passed ? "passed" : "failed");
      } catch (error) {
        passed = false;
        detail = `rule threw: ${toErrorMessage(error)}`;
      }
      record(rule.name, "rule", passed, detail, fatal);

      if (!passed && fatal) {
        stoppedAt = rule.name;
        break;
      }
    }

    if (stoppedAt === undefined) {
      for (const [metric, minimum] of Object.entries(expectation.qualityRequirements)) {
        const value = readQualityMetric(this.payload, metric);
        if (value === undefined) {
          record(qualityCheckName(metric), "quality", false, `${metric} not reported, expected >= ${minimum}`);
        } else {
          record(
            qualityCheckName(metric),
            "quality",
            value >= minimum,
            `${metric} = ${value}, expected >= ${minimum}`
          );
        }
      }
    }

    const failedRules = records.filter((r) => !r.passed).map((r) => r.ruleName);
    const outcome = deepFreeze<ValidationOutcome>({
      status: failedRules.length === 0 ? "passed" : "failed",
      attempt,
      records: records.map((r) => deepFreeze(r)),
      failedRules,
      stoppedAt,
    });

    // Trail is appended before the buffer counts as validated
    this.records.push(...outcome.records);
    this.attempts = attempt;
    this.last = outcome;
    return outcome;
  }

  toJSON(): Record<string, unknown> {
    return {
      id: this.id,
      sourceRole: this.sourceRole,
      targetRole: this.targetRole,
      payload: this.payload,
      metadata: this.metadata,
      validationResults: this.records,
    };
  }
}
