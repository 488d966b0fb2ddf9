/**
 * ExecutionResult - the record returned once per pipeline run.
 */

import { LayerRole } from "../models/layer-role";
import { StageFailureReason } from "../errors/layer-errors";
import { ValidationRecord } from "../buffer/validation-record";
import { OrchestratorPhase } from "./orchestrator-phase";

export type AbortReason =
  | "precondition_failed"
  | "contract_violation"
  | "layer_in_use"
  | StageFailureReason;

export type CompletedStatus = { type: "completed" };
export type AbortedStatus = { type: "aborted"; reason: AbortReason; message: string; role?: LayerRole };
export type ExecutionStatus = CompletedStatus | AbortedStatus;

/**
 * Helper functions to create execution statuses
 */
export const ExecutionStatus = {
  Completed: (): CompletedStatus => ({ type: "completed" }),

  /** role is left out entirely when unknown */
  Aborted: (reason: AbortReason, message: string, role?: LayerRole): AbortedStatus =>
    role === undefined ? { type: "aborted", reason, message } : { type: "aborted", reason, message, role },
};

export type StageStatus = "succeeded" | "failed" | "contract_violation";

/**
 * One entry per stage that was started.
 */
export interface StageRecord {
  role: LayerRole;
  layerName: string;
  startedAt: string;
  /** Measured wall-clock duration, including overruns */
  durationMs: number;
  status: StageStatus;
  qualityMetrics: Record<string, number>;
  /** Trail of the buffer this stage emitted to the next layer */
  validationResults: readonly ValidationRecord[];
  error?: { reason: string; message: string };
}

interface ExecutionResultBase {
  runId: string;
  correlationId: string;
  qualityScore: number | null;
  executionLog: readonly StageRecord[];
  /** Every validation record of the run, in order */
  validationTrail: readonly ValidationRecord[];
  phases: readonly OrchestratorPhase[];
  startedAt: string;
  completedAt: string;
  durationMs: number;
}

export type CompletedExecution<TOut = unknown> = ExecutionResultBase & {
  status: CompletedStatus;
  finalOutput: TOut;
};

export type AbortedExecution = ExecutionResultBase & {
  status: AbortedStatus;
  finalOutput: null;
};

export type ExecutionResult<TOut = unknown> = CompletedExecution<TOut> | AbortedExecution;

export function isCompleted<TOut>(result: ExecutionResult<TOut>): result is CompletedExecution<TOut> {
  return result.status.type === "completed";
}

export interface ExecutionSummary {
  status: ExecutionStatus["type"];
  totalStages: number;
  succeededStages: number;
  totalValidations: number;
  failedValidations: number;
  /** Validation records grouped by hand-off, e.g. "LEADING→INTERMEDIATE" */
  buffers: Record<string, readonly ValidationRecord[]>;
}

/**
 * Condense a result for logs and dashboards.
 */
export function summarizeExecution(result: ExecutionResult): ExecutionSummary {
  const buffers: Record<string, readonly ValidationRecord[]> = {};
  for (const record of result.executionLog) {
    if (record.validationResults.length > 0) {
      const target = record.validationResults[0].targetRole;
      buffers[`${record.role}→${target}`] = record.validationResults;
    }
  }

  return {
    status: result.status.type,
    totalStages: result.executionLog.length,
    succeededStages: result.executionLog.filter((r) => r.status === "succeeded").length,
    totalValidations: result.validationTrail.length,
    failedValidations: result.validationTrail.filter((r) => !r.passed).length,
    buffers,
  };
}
