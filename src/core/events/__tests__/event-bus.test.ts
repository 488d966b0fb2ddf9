/**
 * EventBus tests
 */

import { describe, it, expect } from "@jest/globals";
import { LayerRole } from "../../models/layer-role";
import { createLogger } from "../../logging/logger";
import { EventBus, LayerEvent } from "../event-bus";

const started: LayerEvent = {
  type: "stage_started",
  runId: "run-1",
  timestamp: new Date("2026-01-01T00:00:00.000Z"),
  role: LayerRole.LEADING,
  layerName: "extractor",
};

const aborted: LayerEvent = {
  type: "workflow_aborted",
  runId: "run-1",
  timestamp: new Date("2026-01-01T00:00:01.000Z"),
  reason: "timeout",
  message: "too slow",
};

function capturingBus() {
  const lines: string[] = [];
  const bus = new EventBus(createLogger("EventBus", { sink: (_level, line) => lines.push(line) }));
  return { bus, lines };
}

describe("EventBus", () => {
  it("delivers events until the handler unsubscribes", () => {
    const { bus } = capturingBus();
    const seen: string[] = [];
    const unsubscribe = bus.subscribe((event) => {
      seen.push(event.type);
    });

    bus.emit(started);
    unsubscribe();
    bus.emit(aborted);

    expect(seen).toEqual(["stage_started"]);
    expect(bus.listenerCount).toBe(0);
  });

  it("filters by event type", () => {
    const { bus } = capturingBus();
    const reasons: string[] = [];
    bus.on("workflow_aborted", (event) => {
      reasons.push(event.reason);
    });

    bus.emit(started);
    bus.emit(aborted);

    expect(reasons).toEqual(["timeout"]);
  });

  it("keeps delivering when a handler throws", () => {
    const { bus, lines } = capturingBus();
    const seen: string[] = [];
    bus.subscribe(() => {
      throw new Error("broken handler");
    });
    bus.subscribe((event) => {
      seen.push(event.type);
    });

    bus.emit(started);

    expect(seen).toEqual(["stage_started"]);
    expect(lines).toEqual(['[EventBus] Handler error {"type":"stage_started","error":"Error: broken handler"}']);
  });

  it("logs rejected async handlers", async () => {
    const { bus, lines } = capturingBus();
    bus.subscribe(async () => {
      throw new Error("late failure");
    });

    bus.emit(aborted);
    await new Promise((resolve) => setImmediate(resolve));

    expect(lines).toEqual([
      '[EventBus] Async handler error {"type":"workflow_aborted","error":"Error: late failure"}',
    ]);
  });
});
