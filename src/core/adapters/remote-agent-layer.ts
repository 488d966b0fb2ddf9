/**
 * Remote layers - pipeline stages backed by an agent behind a
 * RemoteAgentConnection.
 *
 * Each invocation opens its own remote session and always closes it. The
 * orchestrator sees an ordinary Layer.
 */

import { LayerRole } from "../models/layer-role";
import { LayerExpectation, maxDurationMs } from "../contract/layer-expectation";
import { checkFieldSchema } from "../contract/field-schema";
import {
  AdapterTranslationError,
  StageFailureError,
  toErrorMessage,
} from "../errors/layer-errors";
import { Logger } from "../logging/logger";
import { CandidateRequirements, Layer, LayerRunContext } from "../layer/layer";
import { BaseLayerOptions, LayerExpectationInput } from "../layer/base-layer";
import { LeadingLayer } from "../layer/leading-layer";
import { IntermediateLayer, IntermediateLayerOptions } from "../layer/intermediate-layer";
import { TerminalLayer, TerminalLayerOptions } from "../layer/terminal-layer";
import { RemoteAgentConnection, RemoteCallError } from "./remote-agent-connection";
import { AgentTranslation } from "./agent-translation";

export interface RemoteBackendOptions<TIn, TOut> {
  connection: RemoteAgentConnection;
  translation: AgentTranslation<TIn, TOut>;
  /** Upper bound for the agent call; the layer's max_duration_seconds wins when smaller */
  timeoutMs?: number;
}

export type RemoteLayerOptions<TIn, TOut> = RemoteBackendOptions<TIn, TOut> &
  BaseLayerOptions & {
    expectation: LayerExpectationInput;
  };

/**
 * Scoped use of a remote agent for one layer: session open, invoke, close.
 */
export class RemoteAgentBackend<TIn, TOut> {
  readonly connection: RemoteAgentConnection;
  private readonly translation: AgentTranslation<TIn, TOut>;
  private readonly timeoutMs?: number;

  constructor(
    private readonly role: LayerRole,
    private readonly layerName: string,
    private readonly expectation: LayerExpectation,
    options: RemoteBackendOptions<TIn, TOut>
  ) {
    this.connection = options.connection;
    this.translation = options.translation;
    this.timeoutMs = options.timeoutMs;
  }

  /** Timeout for the agent call, if any bound applies */
  get effectiveTimeoutMs(): number | undefined {
    const limit = maxDurationMs(this.expectation);
    if (limit === undefined) {
      return this.timeoutMs;
    }
    return this.timeoutMs === undefined ? limit : Math.min(limit, this.timeoutMs);
  }

  async call(input: Readonly<TIn>, context: LayerRunContext): Promise<TOut> {
    const params = this.toParams(input, context);
    const timeoutMs = this.effectiveTimeoutMs;

    let sessionId: string;
    try {
      await this.connection.initialize({ timeoutMs, signal: context.signal });
      sessionId = await this.connection.openSession(
        { role: this.role, layer: this.layerName, correlationId: context.correlationId },
        { timeoutMs, signal: context.signal }
      );
    } catch (error) {
      throw this.toStageFailure(error);
    }

    try {
      const result = await this.connection.invoke(sessionId, this.translation.method, params, {
        timeoutMs,
        signal: context.signal,
      });
      return this.fromResult(result);
    } catch (error) {
      if (context.signal.aborted || (error instanceof RemoteCallError && error.kind === "timeout")) {
        await this.cancelSession(sessionId, context);
      }
      throw this.toStageFailure(error);
    } finally {
      await this.closeSession(sessionId, context);
    }
  }

  /**
   * Whether the endpoint is one this backend can talk to at all.
   */
  hasUsableEndpoint(): boolean {
    try {
      const { protocol } = new URL(this.connection.baseUrl);
      return protocol === "http:" || protocol === "https:";
    } catch {
      return false;
    }
  }

  private toParams(input: Readonly<TIn>, context: LayerRunContext): Record<string, unknown> {
    try {
      return this.translation.toParams(input, context);
    } catch (error) {
      throw new AdapterTranslationError(
        this.role,
        `${this.layerName} could not translate its input for ${this.translation.method}: ${toErrorMessage(error)}`,
        input
      );
    }
  }

  private fromResult(result: unknown): TOut {
    let output: TOut;
    try {
      output = this.translation.fromResult(result);
    } catch (error) {
      throw new AdapterTranslationError(
        this.role,
        `${this.layerName} could not translate the agent's answer: ${toErrorMessage(error)}`,
        result
      );
    }

    const check = checkFieldSchema(this.expectation.outputSchema, output);
    if (!check.passed) {
      throw new AdapterTranslationError(
        this.role,
        `${this.layerName} received an answer that does not match its output schema: ${check.detail}`,
        result
      );
    }
    return output;
  }

  private toStageFailure(error: unknown): StageFailureError {
    if (error instanceof StageFailureError) {
      return error;
    }
    if (error instanceof RemoteCallError) {
      switch (error.kind) {
        case "unreachable":
          return new StageFailureError(this.role, "remote_unreachable", error.message, error);
        case "timeout":
          return new StageFailureError(this.role, "timeout", error.message, error);
        case "aborted":
          return new StageFailureError(this.role, "cancelled", error.message, error);
        case "invalid_response":
          return new AdapterTranslationError(this.role, error.message, error.body);
        case "remote_error":
          return new StageFailureError(this.role, "internal_error", error.message, error);
      }
    }
    return new StageFailureError(
      this.role,
      "internal_error",
      `${this.layerName} failed: ${toErrorMessage(error)}`,
      error
    );
  }

  private async cancelSession(sessionId: string, context: LayerRunContext): Promise<void> {
    try {
      await this.connection.cancel(sessionId);
    } catch (error) {
      context.logger.warn(`Could not cancel remote session ${sessionId}`, { error: toErrorMessage(error) });
    }
  }

  private async closeSession(sessionId: string, context: LayerRunContext): Promise<void> {
    try {
      await this.connection.closeSession(sessionId);
    } catch (error) {
      context.logger.warn(`Could not close remote session ${sessionId}`, { error: toErrorMessage(error) });
    }
  }
}

function checkEndpoint<TIn, TOut>(
  backend: RemoteAgentBackend<TIn, TOut>,
  layerName: string,
  logger: Logger
): boolean {
  if (!backend.hasUsableEndpoint()) {
    logger.warn(`${layerName} has no usable http(s) endpoint`, { baseUrl: backend.connection.baseUrl });
    return false;
  }
  return true;
}

export class RemoteLeadingLayer<TIn = unknown, TOut = unknown> extends LeadingLayer<TIn, TOut> {
  private readonly backend: RemoteAgentBackend<TIn, TOut>;

  constructor(options: RemoteLayerOptions<TIn, TOut>) {
    super(options.expectation, options);
    this.backend = new RemoteAgentBackend(this.role, this.name, this.expectation, options);
  }

  protected execute(input: Readonly<TIn>, context: LayerRunContext): Promise<TOut> {
    return this.backend.call(input, context);
  }

  override validateRequirements(candidate: CandidateRequirements): boolean | Promise<boolean> {
    return checkEndpoint(this.backend, this.name, this.logger) && super.validateRequirements(candidate);
  }
}

export class RemoteIntermediateLayer<TIn = unknown, TOut = unknown> extends IntermediateLayer<TIn, TOut> {
  private readonly backend: RemoteAgentBackend<TIn, TOut>;

  constructor(options: RemoteLayerOptions<TIn, TOut> & IntermediateLayerOptions) {
    super(options.expectation, options);
    this.backend = new RemoteAgentBackend(this.role, this.name, this.expectation, options);
  }

  protected execute(input: Readonly<TIn>, context: LayerRunContext): Promise<TOut> {
    return this.backend.call(input, context);
  }

  override validateRequirements(candidate: CandidateRequirements): boolean | Promise<boolean> {
    return checkEndpoint(this.backend, this.name, this.logger) && super.validateRequirements(candidate);
  }
}

export class RemoteTerminalLayer<TIn = unknown, TOut = unknown> extends TerminalLayer<TIn, TOut> {
  private readonly backend: RemoteAgentBackend<TIn, TOut>;

  constructor(options: RemoteLayerOptions<TIn, TOut> & TerminalLayerOptions<TIn>) {
    super(options.expectation, options);
    this.backend = new RemoteAgentBackend(this.role, this.name, this.expectation, options);
  }

  protected execute(input: Readonly<TIn>, context: LayerRunContext): Promise<TOut> {
    return this.backend.call(input, context);
  }

  override validateRequirements(candidate: CandidateRequirements): boolean | Promise<boolean> {
    return checkEndpoint(this.backend, this.name, this.logger) && super.validateRequirements(candidate);
  }
}

export function createRemoteLayer<TIn = unknown, TOut = unknown>(
  role: LayerRole,
  options: RemoteLayerOptions<TIn, TOut> & IntermediateLayerOptions & TerminalLayerOptions<TIn>
): Layer<TIn, TOut> {
  switch (role) {
    case LayerRole.LEADING:
      return new RemoteLeadingLayer(options);
    case LayerRole.INTERMEDIATE:
      return new RemoteIntermediateLayer(options);
    case LayerRole.TERMINAL:
      return new RemoteTerminalLayer(options);
  }
}
