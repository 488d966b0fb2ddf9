/**
 * Error taxonomy for the layer framework.
 *
 * Orchestrator runs never surface these as raw faults: they are caught and
 * turned into an aborted ExecutionResult. They are thrown directly only by
 * layer and buffer operations called outside a run.
 */

import { LayerRole } from "../models/layer-role";
import type { ValidationRecord } from "../buffer/validation-record";

export type StageFailureReason =
  | "timeout"
  | "internal_error"
  | "remote_unreachable"
  | "invalid_output"
  | "quality_gate_failed"
  | "translation_failed"
  | "cancelled";

export type FrameworkErrorCode =
  | "precondition_failed"
  | "contract_violation"
  | "stage_failure"
  | "invalid_expectation"
  | "config_error";

/**
 * Base class for every error raised by the framework.
 */
export class LayerFrameworkError extends Error {
  constructor(
    public readonly code: FrameworkErrorCode,
    message: string
  ) {
    super(message);
    this.name = "LayerFrameworkError";
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, code: this.code, message: this.message };
  }
}

/**
 * A layer cannot meet the requirements it was asked to satisfy.
 */
export class PreconditionFailureError extends LayerFrameworkError {
  constructor(
    public readonly role: LayerRole,
    public readonly candidate: unknown,
    message?: string
  ) {
    super(
      "precondition_failed",
      message ?? `Layer ${role} cannot satisfy the requested requirements`
    );
    this.name = "PreconditionFailureError";
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), role: this.role };
  }
}

/**
 * A buffer failed validation, or a layer was handed a buffer it must not consume.
 */
export class ContractViolationError extends LayerFrameworkError {
  public readonly sourceRole?: LayerRole;
  public readonly targetRole?: LayerRole;
  public readonly validationResults: readonly ValidationRecord[];

  constructor(
    message: string,
    params: {
      sourceRole?: LayerRole;
      targetRole?: LayerRole;
      validationResults?: readonly ValidationRecord[];
    } = {}
  ) {
    super("contract_violation", message);
    this.name = "ContractViolationError";
    this.sourceRole = params.sourceRole;
    this.targetRole = params.targetRole;
    this.validationResults = params.validationResults ?? [];
  }

  /**
   * Only the failed records, formatted one per line.
   */
  format(): string {
    const lines = [this.message];
    for (const record of this.validationResults) {
      if (!record.passed) {
        lines.push(`  - ${record.ruleName}: ${record.detail}`);
      }
    }
    return lines.join("\n");
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      sourceRole: this.sourceRole,
      targetRole: this.targetRole,
      validationResults: this.validationResults,
    };
  }
}

/**
 * A layer's own processing failed.
 */
export class StageFailureError extends LayerFrameworkError {
  constructor(
    public readonly role: LayerRole,
    public readonly reason: StageFailureReason,
    message: string,
    public readonly originalError?: unknown
  ) {
    super("stage_failure", message);
    this.name = "StageFailureError";
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), role: this.role, reason: this.reason };
  }
}

/**
 * A remote response could not be mapped into the layer's output schema.
 */
export class AdapterTranslationError extends StageFailureError {
  constructor(
    role: LayerRole,
    message: string,
    public readonly rawResponse: unknown
  ) {
    super(role, "translation_failed", message);
    this.name = "AdapterTranslationError";
  }
}

/**
 * An expectation definition is malformed (bad numbers, duplicate rule names...).
 */
export class ExpectationDefinitionError extends LayerFrameworkError {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super("invalid_expectation", message);
    this.name = "ExpectationDefinitionError";
  }
}

export function isStageFailure(error: unknown): error is StageFailureError {
  return error instanceof StageFailureError;
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
