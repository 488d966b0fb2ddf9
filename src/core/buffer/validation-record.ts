/**
 * Validation trail entries appended by DirectionBuffer.validate().
 */

import { LayerRole } from "../models/layer-role";

export type ValidationKind = "schema" | "rule" | "quality";

export interface ValidationRecord {
  readonly ruleName: string;
  readonly kind: ValidationKind;
  readonly passed: boolean;
  readonly fatal: boolean;
  readonly detail: string;
  /** ISO timestamp */
  readonly timestamp: string;
  /** 1 for the first validate() call on a buffer, 2 for the next... */
  readonly attempt: number;
  readonly targetRole: LayerRole;
}

export type ValidationStatus = "passed" | "failed";

export interface ValidationOutcome {
  readonly status: ValidationStatus;
  readonly attempt: number;
  /** Records appended by this attempt only */
  readonly records: readonly ValidationRecord[];
  readonly failedRules: readonly string[];
  /** Name of the fatal rule that stopped evaluation, if any */
  readonly stoppedAt?: string;
}

/** Name of the structural check record */
export const SCHEMA_CHECK = "input_schema";

export function qualityCheckName(metric: string): string {
  return `quality:${metric}`;
}
