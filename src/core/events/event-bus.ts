/**
 * EventBus - publish/subscribe for pipeline run lifecycle events.
 *
 * Handlers are observers only: a throwing or rejecting handler is logged
 * and never affects the run that emitted the event.
 */

import { LayerRole } from "../models/layer-role";
import { Logger, createLogger } from "../logging/logger";
import type { OrchestratorPhase } from "../orchestrator/orchestrator-phase";
import type { ValidationStatus } from "../buffer/validation-record";

interface EventBase {
  runId: string;
  timestamp: Date;
}

export type LayerEvent = EventBase &
  (
    | { type: "workflow_started"; correlationId: string }
    | { type: "phase_changed"; from: OrchestratorPhase; to: OrchestratorPhase }
    | { type: "stage_started"; role: LayerRole; layerName: string }
    | {
        type: "stage_completed";
        role: LayerRole;
        layerName: string;
        durationMs: number;
        qualityMetrics: Record<string, number>;
      }
    | {
        type: "stage_failed";
        role: LayerRole;
        layerName: string;
        durationMs: number;
        reason: string;
        message: string;
      }
    | {
        type: "buffer_validated";
        sourceRole: LayerRole;
        targetRole: LayerRole;
        status: ValidationStatus;
        failedRules: readonly string[];
      }
    | { type: "workflow_completed"; qualityScore: number | null; durationMs: number }
    | { type: "workflow_aborted"; reason: string; message: string }
  );

export type LayerEventType = LayerEvent["type"];

type EventHandler = (event: LayerEvent) => void | Promise<void>;

export class EventBus {
  private handlers = new Map<number, EventHandler>();
  private nextKey = 0;
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger("EventBus");
  }

  /**
   * Subscribe to every event.
   * @returns Unsubscribe function
   */
  subscribe(handler: EventHandler): () => void {
    const key = this.nextKey++;
    this.handlers.set(key, handler);
    return () => {
      this.handlers.delete(key);
    };
  }

  /**
   * Subscribe to one event type.
   * @returns Unsubscribe function
   */
  on<T extends LayerEventType>(
    type: T,
    handler: (event: Extract<LayerEvent, { type: T }>) => void | Promise<void>
  ): () => void {
    return this.subscribe((event) => {
      if (isEventOfType(event, type)) {
        return handler(event);
      }
    });
  }

  /**
   * Publish an event to all subscribed handlers
   */
  emit(event: LayerEvent): void {
    for (const handler of this.handlers.values()) {
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          result.catch((err: unknown) => {
            this.logger.error("Async handler error", { type: event.type, error: String(err) });
          });
        }
      } catch (err) {
        this.logger.error("Handler error", { type: event.type, error: String(err) });
      }
    }
  }

  get listenerCount(): number {
    return this.handlers.size;
  }
}

function isEventOfType<T extends LayerEventType>(
  event: LayerEvent,
  type: T
): event is Extract<LayerEvent, { type: T }> {
  return event.type === type;
}
