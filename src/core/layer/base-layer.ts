/**
 * BaseLayer - shared implementation of the Layer contract.
 *
 * Concrete stages implement execute(); process() wraps it with cancellation,
 * error translation and the output-schema check. Layers keep no state across
 * invocations beyond the currently bound buffer.
 */

import { v4 as uuidv4 } from "uuid";
import { LayerRole } from "../models/layer-role";
import {
  LayerExpectation,
  LayerExpectationDefinition,
  MAX_DURATION_SECONDS,
  MAX_MEMORY_BYTES,
  createLayerExpectation,
} from "../contract/layer-expectation";
import { checkFieldSchema } from "../contract/field-schema";
import { DirectionBuffer, readQualityMetric } from "../buffer/direction-buffer";
import {
  ContractViolationError,
  ExpectationDefinitionError,
  StageFailureError,
  toErrorMessage,
} from "../errors/layer-errors";
import { Logger, createLogger } from "../logging/logger";
import {
  BindOptions,
  CandidateRequirements,
  Layer,
  LayerCapabilities,
  LayerRunContext,
  LayerState,
} from "./layer";

/** Output fields picked up as quality signals when present */
export const DEFAULT_QUALITY_FIELDS: readonly string[] = [
  "quality_score",
  "quality",
  "confidence_score",
];

/**
 * Expectation for a layer whose role is fixed by its class. A role, if
 * given, must match.
 */
export type LayerExpectationInput = Omit<LayerExpectationDefinition, "role"> & {
  role?: LayerRole;
};

export interface BaseLayerOptions {
  /** Defaults to the class name */
  name?: string;
  capabilities?: LayerCapabilities;
  logger?: Logger;
}

export abstract class BaseLayer<TIn = unknown, TOut = unknown> implements Layer<TIn, TOut> {
  readonly role: LayerRole;
  readonly name: string;
  readonly expectation: LayerExpectation;

  protected readonly capabilities: LayerCapabilities;
  protected readonly logger: Logger;

  /** Non-leading layers only consume input that arrived through a bound buffer */
  protected readonly requiresBoundInput: boolean = true;

  private bound?: DirectionBuffer<TIn>;
  private currentState: LayerState = LayerState.UNBOUND;
  private lastCorrelationId?: string;

  constructor(role: LayerRole, expectation: LayerExpectationInput, options: BaseLayerOptions = {}) {
    if (expectation.role !== undefined && expectation.role !== role) {
      throw new ExpectationDefinitionError(
        `Expectation for ${expectation.role} cannot be attached to a ${role} layer`,
        [`role: expected ${role}, got ${expectation.role}`]
      );
    }
    this.role = role;
    this.expectation = createLayerExpectation({ ...expectation, role });
    this.name = options.name ?? this.constructor.name;
    this.capabilities = options.capabilities ?? {};
    this.logger = options.logger ?? createLogger(this.name);
  }

  get inputBuffer(): DirectionBuffer<TIn> | undefined {
    return this.bound;
  }

  get state(): LayerState {
    return this.currentState;
  }

  /**
   * The stage's actual work.
   */
  protected abstract execute(input: Readonly<TIn>, context: LayerRunContext): Promise<TOut>;

  /**
   * Adjust the input before execute(). Identity by default.
   */
  protected prepareInput(input: Readonly<TIn>): Readonly<TIn> {
    return input;
  }

  /**
   * Extra checks on schema-conformant output. Throw StageFailureError to reject it.
   */
  protected verifyOutput(_output: TOut, _context: LayerRunContext): void {}

  async process(input: Readonly<TIn>, context: Partial<LayerRunContext> = {}): Promise<TOut> {
    if (this.requiresBoundInput && this.currentState !== LayerState.READY) {
      throw new ContractViolationError(
        `${this.name} (${this.role}) has no unconsumed validated input buffer`,
        { targetRole: this.role }
      );
    }

    const runContext = this.resolveContext(context);
    this.lastCorrelationId = runContext.correlationId;

    if (runContext.signal.aborted) {
      throw new StageFailureError(this.role, "cancelled", `${this.name} was cancelled before it started`);
    }

    let output: TOut;
    try {
      output = await this.execute(this.prepareInput(input), runContext);
    } catch (error) {
      if (error instanceof StageFailureError) {
        throw error;
      }
      if (runContext.signal.aborted) {
        throw new StageFailureError(this.role, "cancelled", `${this.name} was cancelled`, error);
      }
      throw new StageFailureError(
        this.role,
        "internal_error",
        `${this.name} failed: ${toErrorMessage(error)}`,
        error
      );
    }

    const check = checkFieldSchema(this.expectation.outputSchema, output);
    if (!check.passed) {
      throw new StageFailureError(
        this.role,
        "invalid_output",
        `${this.name} produced output that does not match its output schema: ${check.detail}`
      );
    }

    this.verifyOutput(output, runContext);
    this.currentState = LayerState.PROCESSED;
    return output;
  }

  validateRequirements(candidate: CandidateRequirements): boolean | Promise<boolean> {
    for (const [name, bound] of Object.entries(candidate.performanceConstraints ?? {})) {
      const promised = this.estimateFor(name) ?? this.expectation.performanceConstraints[name];
      if (promised !== undefined && promised > bound) {
        this.logger.warn(`Cannot meet ${name} <= ${bound}`, { promised });
        return false;
      }
    }

    for (const [metric, minimum] of Object.entries(candidate.qualityRequirements ?? {})) {
      const expected = this.capabilities.expectedQuality?.[metric];
      if (expected !== undefined && expected < minimum) {
        this.logger.warn(`Cannot meet ${metric} >= ${minimum}`, { expected });
        return false;
      }
    }

    return true;
  }

  bindInput(buffer: DirectionBuffer<TIn>, options: BindOptions = {}): void {
    if (buffer.targetRole !== this.role) {
      throw new ContractViolationError(
        `Buffer addressed to ${buffer.targetRole} cannot be bound to ${this.name} (${this.role})`,
        { sourceRole: buffer.sourceRole, targetRole: buffer.targetRole }
      );
    }
    if (!buffer.isValidated) {
      throw new ContractViolationError(
        `Buffer ${buffer.id} must be validated before ${this.name} can consume it`,
        { sourceRole: buffer.sourceRole, targetRole: buffer.targetRole }
      );
    }
    if (!buffer.passed && !options.acceptFailed) {
      throw new ContractViolationError(
        `Buffer ${buffer.id} failed validation for ${this.role}`,
        {
          sourceRole: buffer.sourceRole,
          targetRole: buffer.targetRole,
          validationResults: buffer.validationResults,
        }
      );
    }

    this.bound = buffer;
    this.currentState = LayerState.READY;
  }

  emitOutput(targetRole: LayerRole, data: TOut): DirectionBuffer<TOut> {
    const metadata: Record<string, unknown> = { layerName: this.name };
    if (this.bound) {
      metadata.inputBufferId = this.bound.id;
    }

    return new DirectionBuffer<TOut>({
      sourceRole: this.role,
      targetRole,
      payload: data,
      correlationId: this.bound?.correlationId ?? this.lastCorrelationId,
      metadata,
    });
  }

  reportQuality(output: TOut): Record<string, number> {
    const metrics: Record<string, number> = {};
    for (const name of DEFAULT_QUALITY_FIELDS) {
      const value = readQualityMetric(output, name);
      if (value !== undefined) {
        metrics[name] = value;
      }
    }
    return metrics;
  }

  private estimateFor(constraint: string): number | undefined {
    switch (constraint) {
      case MAX_DURATION_SECONDS:
        return this.capabilities.estimatedDurationSeconds;
      case MAX_MEMORY_BYTES:
        return this.capabilities.estimatedMemoryBytes;
      default:
        return undefined;
    }
  }

  private resolveContext(context: Partial<LayerRunContext>): LayerRunContext {
    return {
      runId: context.runId ?? "standalone",
      correlationId: context.correlationId ?? this.bound?.correlationId ?? uuidv4(),
      signal: context.signal ?? new AbortController().signal,
      logger: context.logger ?? this.logger,
    };
  }
}
