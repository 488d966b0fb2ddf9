/**
 * Layer framework - wires configuration, logging, events and the
 * orchestrator together.
 *
 * ```typescript
 * const framework = createLayerFramework({ leading, intermediate, terminal });
 * framework.eventBus.on("stage_failed", (e) => alert(e.message));
 * const result = await framework.executeWorkflow({ text: "..." });
 * ```
 */

import { EventBus } from "./events/event-bus";
import { Logger, createLogger } from "./logging/logger";
import { ConfigError, FrameworkConfig, loadFrameworkConfig } from "./config/framework-config";
import { RemoteAgentConnection, RemoteAgentConnectionConfig } from "./adapters/remote-agent-connection";
import {
  ExecuteOptions,
  LayerSource,
  OrchestratorConfig,
  ThreeLayerOrchestrator,
} from "./orchestrator/three-layer-orchestrator";
import { ExecutionResult } from "./orchestrator/execution-result";

export interface LayerFrameworkOptions<TRequest, TDirectives, TEnriched, TResult>
  extends Pick<
    OrchestratorConfig<TRequest, TDirectives, TEnriched, TResult>,
    "requirements" | "onPhaseChange"
  > {
  leading: LayerSource<TRequest, TDirectives>;
  intermediate: LayerSource<TDirectives, TEnriched>;
  terminal: LayerSource<TEnriched, TResult>;
  /** Defaults to loadFrameworkConfig() */
  config?: FrameworkConfig;
  eventBus?: EventBus;
  logger?: Logger;
}

export interface LayerFramework<TRequest, TDirectives, TEnriched, TResult> {
  config: FrameworkConfig;
  eventBus: EventBus;
  orchestrator: ThreeLayerOrchestrator<TRequest, TDirectives, TEnriched, TResult>;
  executeWorkflow(
    initialRequest: TRequest,
    options?: ExecuteOptions
  ): Promise<ExecutionResult<TResult>>;
}

export function createLayerFramework<
  TRequest = unknown,
  TDirectives = unknown,
  TEnriched = unknown,
  TResult = unknown,
>(
  options: LayerFrameworkOptions<TRequest, TDirectives, TEnriched, TResult>
): LayerFramework<TRequest, TDirectives, TEnriched, TResult> {
  const config = options.config ?? loadFrameworkConfig();
  const logger = options.logger ?? createLogger("LayerFramework", { level: config.logLevel });
  const eventBus = options.eventBus ?? new EventBus(logger.child("EventBus"));

  const orchestrator = new ThreeLayerOrchestrator<TRequest, TDirectives, TEnriched, TResult>({
    leading: options.leading,
    intermediate: options.intermediate,
    terminal: options.terminal,
    qualityAggregation: config.qualityAggregation,
    contractViolationPolicy: config.contractViolationPolicy,
    requirements: options.requirements,
    onPhaseChange: options.onPhaseChange,
    eventBus,
    logger: logger.child("ThreeLayerOrchestrator"),
  });

  return {
    config,
    eventBus,
    orchestrator,
    executeWorkflow: (initialRequest, executeOptions) =>
      orchestrator.executeWorkflow(initialRequest, executeOptions),
  };
}

/**
 * One-shot helper: build a framework for these layers and run one request.
 */
export function executeWorkflow<TRequest, TDirectives, TEnriched, TResult>(
  layers: LayerFrameworkOptions<TRequest, TDirectives, TEnriched, TResult>,
  initialRequest: TRequest,
  options?: ExecuteOptions
): Promise<ExecutionResult<TResult>> {
  return createLayerFramework(layers).executeWorkflow(initialRequest, options);
}

/**
 * Connection to the remote agent named by LAYER_REMOTE_URL.
 *
 * @throws ConfigError when no remote URL is configured
 */
export function connectRemoteAgent(
  config: FrameworkConfig,
  overrides: Partial<RemoteAgentConnectionConfig> = {}
): RemoteAgentConnection {
  const baseUrl = overrides.baseUrl ?? config.remoteUrl;
  if (baseUrl === undefined) {
    throw new ConfigError(["LAYER_REMOTE_URL: required to connect to a remote agent"]);
  }
  return new RemoteAgentConnection({
    ...overrides,
    baseUrl,
    timeoutMs: overrides.timeoutMs ?? config.remoteTimeoutMs,
  });
}
