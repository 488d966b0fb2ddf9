/**
 * ThreeLayerOrchestrator - drives one request through leading, intermediate
 * and terminal layers.
 *
 * Each run is strictly sequential: a stage only starts once its
 * predecessor's output has been wrapped in a DirectionBuffer and validated
 * against its expectation. Every failure ends the run in ABORTED with the
 * partial execution log; executeWorkflow() never rejects.
 */

import { v4 as uuidv4 } from "uuid";
import { LayerRole } from "../models/layer-role";
import { maxDurationMs } from "../contract/layer-expectation";
import { armTimer } from "../utils/timers";
import { DirectionBuffer } from "../buffer/direction-buffer";
import { ValidationRecord } from "../buffer/validation-record";
import {
  ContractViolationError,
  LayerFrameworkError,
  PreconditionFailureError,
  StageFailureError,
  toErrorMessage,
} from "../errors/layer-errors";
import { EventBus, LayerEvent } from "../events/event-bus";
import { Logger, createLogger } from "../logging/logger";
import { CandidateRequirements, Layer } from "../layer/layer";
import {
  OrchestratorPhase,
  PhaseTracker,
  isTerminalPhase,
  runningPhaseFor,
  validatingPhaseFor,
} from "./orchestrator-phase";
import {
  DEFAULT_QUALITY_AGGREGATION,
  QualityAggregation,
  StageQuality,
  aggregateQuality,
} from "./quality-aggregation";
import {
  AbortReason,
  AbortedExecution,
  CompletedExecution,
  ExecutionResult,
  ExecutionStatus,
  StageRecord,
} from "./execution-result";

/** Builds a fresh layer instance for each run */
export type LayerFactory<TIn, TOut> = () => Layer<TIn, TOut>;

export type LayerSource<TIn, TOut> = Layer<TIn, TOut> | LayerFactory<TIn, TOut>;

/**
 * What happens when a buffer fails validation:
 * - abort: the run ends with reason contract_violation (default)
 * - continue: the failed buffer is bound anyway and the log keeps the failure
 */
export type ContractViolationPolicy = "abort" | "continue";

export type PhaseChangeHandler = (
  from: OrchestratorPhase,
  to: OrchestratorPhase,
  runId: string
) => void | Promise<void>;

export interface OrchestratorConfig<TRequest, TDirectives, TEnriched, TResult> {
  leading: LayerSource<TRequest, TDirectives>;
  intermediate: LayerSource<TDirectives, TEnriched>;
  terminal: LayerSource<TEnriched, TResult>;
  qualityAggregation?: QualityAggregation;
  contractViolationPolicy?: ContractViolationPolicy;
  /** Pre-flight requirements per role; defaults to each layer's own expectation */
  requirements?: Partial<Record<LayerRole, CandidateRequirements>>;
  onPhaseChange?: PhaseChangeHandler;
  eventBus?: EventBus;
  logger?: Logger;
}

export interface ExecuteOptions {
  /** Aborting cancels the run; the running stage sees it through its own signal */
  signal?: AbortSignal;
  correlationId?: string;
}

interface RunLayers<TRequest, TDirectives, TEnriched, TResult> {
  leading: Layer<TRequest, TDirectives>;
  intermediate: Layer<TDirectives, TEnriched>;
  terminal: Layer<TEnriched, TResult>;
}

interface RunState {
  runId: string;
  correlationId: string;
  signal?: AbortSignal;
  logger: Logger;
  tracker: PhaseTracker;
  log: StageRecord[];
  trail: ValidationRecord[];
  startedAt: Date;
}

function resolveLayer<TIn, TOut>(source: LayerSource<TIn, TOut>): Layer<TIn, TOut> {
  return typeof source === "function" ? source() : source;
}

function finiteMetrics(metrics: Record<string, number>): Record<string, number> {
  const result: Record<string, number> = {};
  for (const [name, value] of Object.entries(metrics)) {
    if (Number.isFinite(value)) {
      result[name] = value;
    }
  }
  return result;
}

export class ThreeLayerOrchestrator<
  TRequest = unknown,
  TDirectives = unknown,
  TEnriched = unknown,
  TResult = unknown,
> {
  private readonly sources: OrchestratorConfig<TRequest, TDirectives, TEnriched, TResult>;
  private readonly qualityAggregation: QualityAggregation;
  private readonly policy: ContractViolationPolicy;
  private readonly eventBus?: EventBus;
  private readonly logger: Logger;

  /** True when at least one layer is a shared instance rather than a factory */
  private readonly sharesInstances: boolean;
  private activeRuns = 0;

  constructor(config: OrchestratorConfig<TRequest, TDirectives, TEnriched, TResult>) {
    this.sources = config;
    this.qualityAggregation = config.qualityAggregation ?? DEFAULT_QUALITY_AGGREGATION;
    this.policy = config.contractViolationPolicy ?? "abort";
    this.eventBus = config.eventBus;
    this.logger = config.logger ?? createLogger("ThreeLayerOrchestrator");

    const instances: Array<[LayerRole, LayerSource<unknown, unknown>]> = [
      [LayerRole.LEADING, config.leading],
      [LayerRole.INTERMEDIATE, config.intermediate],
      [LayerRole.TERMINAL, config.terminal],
    ];
    this.sharesInstances = false;
    for (const [role, source] of instances) {
      if (typeof source === "function") {
        continue;
      }
      this.sharesInstances = true;
      if (source.role !== role) {
        throw new ContractViolationError(
          `${source.name} is a ${source.role} layer and cannot fill the ${role} slot`,
          { targetRole: role }
        );
      }
    }
  }

  /**
   * Run one request through the pipeline.
   *
   * Resolves with a completed result carrying the terminal output and the
   * aggregated quality score, or an aborted result carrying the reason and
   * everything logged up to the failure.
   */
  async executeWorkflow(
    initialRequest: TRequest,
    options: ExecuteOptions = {}
  ): Promise<ExecutionResult<TResult>> {
    const runId = uuidv4();
    const run: RunState = {
      runId,
      correlationId: options.correlationId ?? uuidv4(),
      signal: options.signal,
      logger: this.logger.child(runId.slice(0, 8)),
      tracker: new PhaseTracker(),
      log: [],
      trail: [],
      startedAt: new Date(),
    };

    run.logger.info("Starting workflow", { runId, correlationId: run.correlationId });
    this.emit({ type: "workflow_started", runId, timestamp: new Date(), correlationId: run.correlationId });

    if (this.sharesInstances && this.activeRuns > 0) {
      return this.abort(
        run,
        "layer_in_use",
        "Another run is using this orchestrator's layer instances; supply layer factories to run concurrently"
      );
    }

    this.activeRuns++;
    try {
      this.throwIfCancelled(run, LayerRole.LEADING);
      const layers = this.resolveLayers();
      await this.preflight(run, layers);

      await this.enter(run, runningPhaseFor(LayerRole.LEADING));
      const directives = await this.runStage(run, layers.leading, initialRequest);

      await this.enter(run, validatingPhaseFor(LayerRole.INTERMEDIATE));
      const intermediateInput = this.handOff(run, layers.leading, layers.intermediate, directives);

      await this.enter(run, runningPhaseFor(LayerRole.INTERMEDIATE));
      const enriched = await this.runStage(run, layers.intermediate, intermediateInput);

      await this.enter(run, validatingPhaseFor(LayerRole.TERMINAL));
      const terminalInput = this.handOff(run, layers.intermediate, layers.terminal, enriched);

      await this.enter(run, runningPhaseFor(LayerRole.TERMINAL));
      const finalOutput = await this.runStage(run, layers.terminal, terminalInput);

      return await this.complete(run, finalOutput);
    } catch (error) {
      const [reason, message] = this.classify(error);
      return this.abort(run, reason, message, error);
    } finally {
      this.activeRuns--;
    }
  }

  private resolveLayers(): RunLayers<TRequest, TDirectives, TEnriched, TResult> {
    const layers = {
      leading: resolveLayer(this.sources.leading),
      intermediate: resolveLayer(this.sources.intermediate),
      terminal: resolveLayer(this.sources.terminal),
    };
    for (const [role, layer] of [
      [LayerRole.LEADING, layers.leading],
      [LayerRole.INTERMEDIATE, layers.intermediate],
      [LayerRole.TERMINAL, layers.terminal],
    ] as const) {
      if (layer.role !== role) {
        throw new ContractViolationError(
          `Factory for the ${role} slot built a ${layer.role} layer (${layer.name})`,
          { targetRole: role }
        );
      }
    }
    return layers;
  }

  /**
   * Ask every layer whether it can meet its requirements before any work starts.
   */
  private async preflight(
    run: RunState,
    layers: RunLayers<TRequest, TDirectives, TEnriched, TResult>
  ): Promise<void> {
    for (const layer of [layers.leading, layers.intermediate, layers.terminal]) {
      const candidate = this.sources.requirements?.[layer.role] ?? {
        qualityRequirements: layer.expectation.qualityRequirements,
        performanceConstraints: layer.expectation.performanceConstraints,
      };

      let satisfied: boolean;
      try {
        satisfied = await layer.validateRequirements(candidate);
      } catch (error) {
        throw new PreconditionFailureError(
          layer.role,
          candidate,
          `${layer.name} (${layer.role}) requirement check threw: ${toErrorMessage(error)}`
        );
      }

      if (!satisfied) {
        throw new PreconditionFailureError(
          layer.role,
          candidate,
          `${layer.name} (${layer.role}) cannot meet its requirements`
        );
      }
      run.logger.debug(`Pre-flight passed for ${layer.name}`, { role: layer.role });
    }
  }

  private async runStage<TIn, TOut>(
    run: RunState,
    layer: Layer<TIn, TOut>,
    input: Readonly<TIn>
  ): Promise<TOut> {
    const { role, name } = layer;
    this.throwIfCancelled(run, role);

    const limitMs = maxDurationMs(layer.expectation);
    const controller = new AbortController();
    const forwardCancel = (): void => controller.abort(run.signal?.reason);
    run.signal?.addEventListener("abort", forwardCancel, { once: true });

    const deadline: { expired: boolean; timer?: ReturnType<typeof setTimeout> } = { expired: false };
    const startedAt = new Date();
    const start = Date.now();
    let durationMs = 0;
    let output: TOut;
    let qualityMetrics: Record<string, number>;

    run.logger.info(`Running ${name}`, { role, maxDurationMs: limitMs });
    this.emit({ type: "stage_started", runId: run.runId, timestamp: startedAt, role, layerName: name });

    try {
      // Rejects on timeout or caller cancellation, including an abort that
      // lands before process() yields
      const interrupted = new Promise<never>((_, reject) => {
        if (controller.signal.aborted) {
          reject(controller.signal.reason);
          return;
        }
        controller.signal.addEventListener("abort", () => reject(controller.signal.reason), {
          once: true,
        });
      });
      if (limitMs !== undefined) {
        deadline.timer = armTimer(limitMs, () => {
          deadline.expired = true;
          controller.abort();
        });
      }

      const work = layer.process(input, {
        runId: run.runId,
        correlationId: run.correlationId,
        signal: controller.signal,
        logger: run.logger.child(name),
      });
      output = await Promise.race([work, interrupted]);

      durationMs = Date.now() - start;
      if (limitMs !== undefined && durationMs > limitMs) {
        throw new StageFailureError(
          role,
          "timeout",
          `${name} returned after ${durationMs} ms, limit is ${limitMs} ms`
        );
      }
      qualityMetrics = finiteMetrics(layer.reportQuality(output));
    } catch (error) {
      durationMs = Date.now() - start;
      const failure = this.toStageError(layer, error, deadline.expired, run);
      const reason = failure instanceof StageFailureError ? failure.reason : failure.code;

      run.log.push({
        role,
        layerName: name,
        startedAt: startedAt.toISOString(),
        durationMs,
        status: failure instanceof StageFailureError ? "failed" : "contract_violation",
        qualityMetrics: {},
        validationResults: [],
        error: { reason, message: failure.message },
      });
      run.logger.error(`${name} failed`, { role, reason, durationMs, error: failure.message });
      this.emit({
        type: "stage_failed",
        runId: run.runId,
        timestamp: new Date(),
        role,
        layerName: name,
        durationMs,
        reason,
        message: failure.message,
      });
      throw failure;
    } finally {
      clearTimeout(deadline.timer);
      run.signal?.removeEventListener("abort", forwardCancel);
    }

    run.log.push({
      role,
      layerName: name,
      startedAt: startedAt.toISOString(),
      durationMs,
      status: "succeeded",
      qualityMetrics,
      validationResults: [],
    });
    run.logger.info(`${name} completed`, { role, durationMs, qualityMetrics });
    this.emit({
      type: "stage_completed",
      runId: run.runId,
      timestamp: new Date(),
      role,
      layerName: name,
      durationMs,
      qualityMetrics,
    });
    return output;
  }

  private toStageError(
    layer: Layer<unknown, unknown>,
    error: unknown,
    expired: boolean,
    run: RunState
  ): StageFailureError | ContractViolationError {
    if (expired) {
      return error instanceof StageFailureError && error.reason === "timeout"
        ? error
        : new StageFailureError(
            layer.role,
            "timeout",
            `${layer.name} exceeded max_duration_seconds (${maxDurationMs(layer.expectation)} ms)`,
            error
          );
    }
    if (run.signal?.aborted) {
      return error instanceof StageFailureError && error.reason === "cancelled"
        ? error
        : new StageFailureError(layer.role, "cancelled", `${layer.name} was cancelled`, error);
    }
    if (error instanceof StageFailureError || error instanceof ContractViolationError) {
      return error;
    }
    return new StageFailureError(
      layer.role,
      "internal_error",
      `${layer.name} failed: ${toErrorMessage(error)}`,
      error
    );
  }

  /**
   * Wrap a stage's output, validate it against the next layer's expectation
   * and bind it. Returns the frozen payload the next layer consumes.
   */
  private handOff<TPrev, TData, TNext>(
    run: RunState,
    source: Layer<TPrev, TData>,
    target: Layer<TData, TNext>,
    output: TData
  ): Readonly<TData> {
    const record = run.log[run.log.length - 1];

    let buffer: DirectionBuffer<TData>;
    try {
      buffer = source.emitOutput(target.role, output);
    } catch (error) {
      record.status = "contract_violation";
      record.error = { reason: "contract_violation", message: toErrorMessage(error) };
      throw error;
    }

    const outcome = buffer.validate(target.expectation);
    run.trail.push(...outcome.records);
    record.validationResults = buffer.validationResults;

    run.logger.info(`Validated ${source.role} → ${target.role} hand-off`, {
      status: outcome.status,
      failedRules: outcome.failedRules,
    });
    this.emit({
      type: "buffer_validated",
      runId: run.runId,
      timestamp: new Date(),
      sourceRole: source.role,
      targetRole: target.role,
      status: outcome.status,
      failedRules: outcome.failedRules,
    });

    if (outcome.status === "failed") {
      record.status = "contract_violation";
      if (this.policy === "abort") {
        const violation = new ContractViolationError(
          `Output of ${source.name} failed validation for ${target.role}: ${outcome.failedRules.join(", ")}`,
          {
            sourceRole: source.role,
            targetRole: target.role,
            validationResults: buffer.validationResults,
          }
        );
        record.error = { reason: "contract_violation", message: violation.message };
        throw violation;
      }
      run.logger.warn(`Continuing past failed validation for ${target.role}`, {
        failedRules: outcome.failedRules,
      });
    }

    target.bindInput(buffer, { acceptFailed: this.policy === "continue" });
    return buffer.payload;
  }

  private async complete(run: RunState, finalOutput: TResult): Promise<CompletedExecution<TResult>> {
    await this.enter(run, OrchestratorPhase.COMPLETED);

    const stages: StageQuality[] = run.log.map((r) => ({ role: r.role, metrics: r.qualityMetrics }));
    const qualityScore = aggregateQuality(stages, this.qualityAggregation);
    const completedAt = new Date();
    const durationMs = completedAt.getTime() - run.startedAt.getTime();

    run.logger.info("Workflow completed", { qualityScore, durationMs });
    this.emit({ type: "workflow_completed", runId: run.runId, timestamp: completedAt, qualityScore, durationMs });

    return {
      ...this.resultBase(run, completedAt),
      status: ExecutionStatus.Completed(),
      finalOutput,
      qualityScore,
    };
  }

  private async abort(
    run: RunState,
    reason: AbortReason,
    message: string,
    error?: unknown
  ): Promise<AbortedExecution> {
    if (!isTerminalPhase(run.tracker.phase)) {
      await this.enter(run, OrchestratorPhase.ABORTED);
    }

    const completedAt = new Date();
    const role =
      error instanceof StageFailureError || error instanceof PreconditionFailureError
        ? error.role
        : error instanceof ContractViolationError
          ? error.targetRole
          : undefined;

    run.logger.error("Workflow aborted", { reason, message, role });
    if (error instanceof ContractViolationError && error.validationResults.length > 0) {
      run.logger.error(error.format());
    }
    this.emit({ type: "workflow_aborted", runId: run.runId, timestamp: completedAt, reason, message });

    return {
      ...this.resultBase(run, completedAt),
      status: ExecutionStatus.Aborted(reason, message, role),
      finalOutput: null,
      qualityScore: null,
    };
  }

  private classify(error: unknown): [AbortReason, string] {
    if (error instanceof StageFailureError) {
      return [error.reason, error.message];
    }
    if (error instanceof PreconditionFailureError) {
      return ["precondition_failed", error.message];
    }
    if (error instanceof ContractViolationError) {
      return ["contract_violation", error.message];
    }
    if (error instanceof LayerFrameworkError) {
      return ["internal_error", error.message];
    }
    return ["internal_error", `Unexpected orchestrator error: ${toErrorMessage(error)}`];
  }

  private resultBase(run: RunState, completedAt: Date) {
    return {
      runId: run.runId,
      correlationId: run.correlationId,
      executionLog: run.log,
      validationTrail: run.trail,
      phases: run.tracker.history,
      startedAt: run.startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - run.startedAt.getTime(),
    };
  }

  private throwIfCancelled(run: RunState, role: LayerRole): void {
    if (run.signal?.aborted) {
      throw new StageFailureError(role, "cancelled", `Run ${run.runId} was cancelled`);
    }
  }

  private async enter(run: RunState, to: OrchestratorPhase): Promise<void> {
    const from = run.tracker.transition(to);
    run.logger.debug(`Phase ${from} → ${to}`);
    this.emit({ type: "phase_changed", runId: run.runId, timestamp: new Date(), from, to });

    if (this.sources.onPhaseChange) {
      try {
        await this.sources.onPhaseChange(from, to, run.runId);
      } catch (error) {
        run.logger.warn("onPhaseChange handler failed", { to, error: toErrorMessage(error) });
      }
    }
  }

  private emit(event: LayerEvent): void {
    this.eventBus?.emit(event);
  }
}
