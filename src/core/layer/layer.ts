/**
 * Layer - the contract every pipeline stage satisfies, local or remote.
 *
 * The orchestrator only ever talks to layers through this interface, so it
 * cannot tell an in-process stage from an adapter-backed one.
 */

import { LayerRole } from "../models/layer-role";
import { LayerExpectation } from "../contract/layer-expectation";
import { DirectionBuffer } from "../buffer/direction-buffer";
import { Logger } from "../logging/logger";

export enum LayerState {
  /** No input buffer bound yet */
  UNBOUND = "UNBOUND",
  /** Input bound, not processed yet */
  READY = "READY",
  /** Output produced; bind a new buffer to run again */
  PROCESSED = "PROCESSED",
}

/**
 * Per-invocation context handed to process().
 */
export interface LayerRunContext {
  runId: string;
  correlationId: string;
  /** Aborted on timeout or cancellation; release external resources when it fires */
  signal: AbortSignal;
  logger: Logger;
}

/**
 * Requirements a layer is asked to meet before a run starts.
 */
export interface CandidateRequirements {
  qualityRequirements?: Readonly<Record<string, number>>;
  performanceConstraints?: Readonly<Record<string, number>>;
}

/**
 * What a layer declares it can achieve; compared against candidate requirements.
 */
export interface LayerCapabilities {
  estimatedDurationSeconds?: number;
  estimatedMemoryBytes?: number;
  /** Metric name → value the layer expects to reach */
  expectedQuality?: Readonly<Record<string, number>>;
}

export interface BindOptions {
  /**
   * Bind a buffer whose last validation failed. Only used when the
   * orchestrator runs with the "continue" contract policy.
   */
  acceptFailed?: boolean;
}

export interface Layer<TIn = unknown, TOut = unknown> {
  readonly role: LayerRole;
  readonly name: string;
  readonly expectation: LayerExpectation;
  readonly inputBuffer: DirectionBuffer<TIn> | undefined;
  readonly state: LayerState;

  /**
   * Do the stage's work. Output is checked against the layer's own output
   * schema before it is returned.
   *
   * @throws StageFailureError on any failure
   */
  process(input: Readonly<TIn>, context?: Partial<LayerRunContext>): Promise<TOut>;

  /**
   * Pre-flight check: can this layer, as configured, meet the requirements?
   */
  validateRequirements(candidate: CandidateRequirements): boolean | Promise<boolean>;

  /**
   * Attach a validated buffer as this layer's input.
   *
   * @throws ContractViolationError if the buffer is unvalidated, failed or misaddressed
   */
  bindInput(buffer: DirectionBuffer<TIn>, options?: BindOptions): void;

  /**
   * Wrap data into a buffer addressed to the next layer, stamped with provenance.
   */
  emitOutput(targetRole: LayerRole, data: TOut): DirectionBuffer<TOut>;

  /**
   * Quality signals this layer contributes to the run's aggregate score.
   */
  reportQuality(output: TOut): Record<string, number>;
}
