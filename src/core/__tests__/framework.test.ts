/**
 * Layer framework wiring tests
 */

import { describe, it, expect } from "@jest/globals";
import { LayerRole } from "../models/layer-role";
import { Rules } from "../contract/validation-rule";
import { defineLayer } from "../layer/function-layer";
import { silentLogger } from "../logging/logger";
import { ConfigError, FrameworkConfig, loadFrameworkConfig } from "../config/framework-config";
import { LayerEvent } from "../events/event-bus";
import { connectRemoteAgent, createLayerFramework, executeWorkflow } from "../framework";

interface Request {
  text: string;
}

interface Draft {
  words: number;
  quality: number;
}

interface Report {
  summary: string;
  quality_score: number;
}

function layers(draftQuality = 0.9) {
  return {
    leading: defineLayer<Request, Request>(LayerRole.LEADING, {
      name: "normalizer",
      logger: silentLogger,
      expectation: { outputSchema: { text: "string" } },
      execute: async (input) => ({ text: input.text.trim() }),
    }),
    intermediate: defineLayer<Request, Draft>(LayerRole.INTERMEDIATE, {
      name: "drafter",
      logger: silentLogger,
      expectation: { inputSchema: { text: "string" }, outputSchema: { words: "integer" } },
      execute: async (input) => ({ words: input.text.split(/\s+/).length, quality: draftQuality }),
    }),
    terminal: defineLayer<Draft, Report>(LayerRole.TERMINAL, {
      name: "reporter",
      logger: silentLogger,
      expectation: {
        inputSchema: { words: "integer" },
        validationRules: [Rules.minimum("quality", 0.8)],
      },
      execute: async (input) => ({ summary: `${input.words} words`, quality_score: 0.5 }),
    }),
  };
}

function config(overrides: Partial<FrameworkConfig> = {}): FrameworkConfig {
  return { ...loadFrameworkConfig({}), ...overrides };
}

// ── createLayerFramework ─────────────────────────────────────────────────────

describe("createLayerFramework", () => {
  it("aggregates quality with the configured strategy and weights", async () => {
    const framework = createLayerFramework({
      ...layers(),
      logger: silentLogger,
      config: config({
        qualityAggregation: {
          strategy: "weighted_average",
          weights: { [LayerRole.INTERMEDIATE]: 3, [LayerRole.TERMINAL]: 1 },
        },
      }),
    });
    const completed: LayerEvent[] = [];
    framework.eventBus.on("workflow_completed", (event) => {
      completed.push(event);
    });

    const result = await framework.executeWorkflow({ text: "  three small words " });

    expect(result.finalOutput).toEqual({ summary: "3 words", quality_score: 0.5 });
    expect(result.qualityScore).toBeCloseTo(0.8, 10);
    expect(completed).toHaveLength(1);
  });

  it("uses the minimum strategy by default", async () => {
    const framework = createLayerFramework({ ...layers(), logger: silentLogger, config: config() });

    const result = await framework.executeWorkflow({ text: "one two" });

    expect(result.qualityScore).toBe(0.5);
  });

  it("passes the configured contract policy to the orchestrator", async () => {
    const strict = createLayerFramework({ ...layers(0.6), logger: silentLogger, config: config() });
    const lenient = createLayerFramework({
      ...layers(0.6),
      logger: silentLogger,
      config: config({ contractViolationPolicy: "continue" }),
    });

    const aborted = await strict.executeWorkflow({ text: "one two" });
    const continued = await lenient.executeWorkflow({ text: "one two" });

    expect(aborted.status).toMatchObject({ type: "aborted", reason: "contract_violation" });
    expect(continued.status).toEqual({ type: "completed" });
    expect(continued.executionLog.map((stage) => stage.status)).toEqual([
      "succeeded",
      "contract_violation",
      "succeeded",
    ]);
  });

  it("reports phase changes through onPhaseChange", async () => {
    const phases: string[] = [];
    const framework = createLayerFramework({
      ...layers(),
      logger: silentLogger,
      config: config(),
      onPhaseChange: (_from, to) => {
        phases.push(to);
      },
    });

    await framework.executeWorkflow({ text: "one" });

    expect(phases).toEqual([
      "RUNNING_LEADING",
      "VALIDATING_TO_INTERMEDIATE",
      "RUNNING_INTERMEDIATE",
      "VALIDATING_TO_TERMINAL",
      "RUNNING_TERMINAL",
      "COMPLETED",
    ]);
  });
});

// ── executeWorkflow ──────────────────────────────────────────────────────────

describe("executeWorkflow", () => {
  it("runs a single request end to end", async () => {
    const result = await executeWorkflow(
      { ...layers(), logger: silentLogger, config: config() },
      { text: "a b c d" },
      { correlationId: "corr-42" }
    );

    expect(result.status).toEqual({ type: "completed" });
    expect(result.correlationId).toBe("corr-42");
    expect(result.finalOutput).toEqual({ summary: "4 words", quality_score: 0.5 });
  });
});

// ── connectRemoteAgent ───────────────────────────────────────────────────────

describe("connectRemoteAgent", () => {
  it("requires a remote URL", () => {
    expect(() => connectRemoteAgent(config())).toThrow(ConfigError);
    expect(() => connectRemoteAgent(config())).toThrow(
      "Invalid configuration: LAYER_REMOTE_URL: required to connect to a remote agent"
    );
  });

  it("connects to the configured URL", () => {
    const connection = connectRemoteAgent(config({ remoteUrl: "https://agents.example.test/rpc/" }), {
      logger: silentLogger,
    });

    expect(connection.baseUrl).toBe("https://agents.example.test/rpc");
    expect(connection.displayName).toBe("https://agents.example.test/rpc");
  });

  it("lets an override replace the configured URL", () => {
    const connection = connectRemoteAgent(config({ remoteUrl: "https://agents.example.test" }), {
      baseUrl: "http://localhost:4000",
      displayName: "local-agent",
      logger: silentLogger,
    });

    expect(connection.baseUrl).toBe("http://localhost:4000");
    expect(connection.displayName).toBe("local-agent");
  });
});
