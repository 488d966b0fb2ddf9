/**
 * Logger tests
 */

import { describe, it, expect } from "@jest/globals";
import { LogLevel, createLogger, isLogLevel } from "../logger";

function capture(level?: LogLevel) {
  const lines: Array<[LogLevel, string]> = [];
  const logger = createLogger("ThreeLayerOrchestrator", {
    level,
    sink: (lineLevel, line) => lines.push([lineLevel, line]),
  });
  return { logger, lines };
}

describe("createLogger", () => {
  it("prefixes the scope and appends context as JSON", () => {
    const { logger, lines } = capture();

    logger.info("Running reviser", { role: "TERMINAL", maxDurationMs: 100 });
    logger.warn("No context");

    expect(lines).toEqual([
      ["info", '[ThreeLayerOrchestrator] Running reviser {"role":"TERMINAL","maxDurationMs":100}'],
      ["warn", "[ThreeLayerOrchestrator] No context"],
    ]);
  });

  it("still logs context that JSON cannot encode", () => {
    const { logger, lines } = capture();
    const cyclic: Record<string, unknown> = { name: "session" };
    cyclic.self = cyclic;

    logger.info("Initialized", { tokens: BigInt(12), id: "run-1" });
    logger.info("Opened", { session: cyclic });

    expect(lines).toEqual([
      ["info", "[ThreeLayerOrchestrator] Initialized {tokens=12, id=run-1}"],
      ["info", "[ThreeLayerOrchestrator] Opened {session=[object Object]}"],
    ]);
  });

  it("drops lines below the configured level", () => {
    const { logger, lines } = capture("warn");

    logger.debug("hidden");
    logger.info("hidden");
    logger.error("shown");

    expect(lines).toEqual([["error", "[ThreeLayerOrchestrator] shown"]]);
  });

  it("nests child scopes and keeps the level", () => {
    const { logger, lines } = capture("info");
    const child = logger.child("run-1").child("reviser");

    child.debug("hidden");
    child.info("done");

    expect(lines).toEqual([["info", "[ThreeLayerOrchestrator:run-1:reviser] done"]]);
  });
});

describe("isLogLevel", () => {
  it("accepts only known levels", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
