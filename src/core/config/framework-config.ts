/**
 * Framework configuration read from environment variables.
 *
 *   LAYER_QUALITY_STRATEGY   minimum | weighted_average     (default: minimum)
 *   LAYER_QUALITY_WEIGHTS    e.g. "INTERMEDIATE=2,TERMINAL=1" (weighted_average only)
 *   LAYER_CONTRACT_POLICY    abort | continue               (default: abort)
 *   LAYER_LOG_LEVEL          debug | info | warn | error    (default: info)
 *   LAYER_REMOTE_TIMEOUT_MS  positive integer               (default: 30000)
 *   LAYER_REMOTE_URL         http(s) URL of a remote agent  (optional)
 *
 * Empty values count as unset.
 */

import { z } from "zod";
import { LayerRole, isLayerRole } from "../models/layer-role";
import { LayerFrameworkError } from "../errors/layer-errors";
import { LogLevel } from "../logging/logger";
import { formatIssue } from "../contract/field-schema";
import { DEFAULT_REMOTE_TIMEOUT_MS } from "../adapters/remote-agent-connection";
import type { QualityAggregation } from "../orchestrator/quality-aggregation";
import type { ContractViolationPolicy } from "../orchestrator/three-layer-orchestrator";

export interface FrameworkConfig {
  qualityAggregation: QualityAggregation;
  contractViolationPolicy: ContractViolationPolicy;
  logLevel: LogLevel;
  remoteTimeoutMs: number;
  remoteUrl?: string;
}

export class ConfigError extends LayerFrameworkError {
  constructor(public readonly issues: readonly string[]) {
    super("config_error", `Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }

  format(): string {
    return ["Invalid configuration:", ...this.issues.map((issue) => `  - ${issue}`)].join("\n");
  }
}

const WeightsSchema = z.string().transform((value, ctx) => {
  const weights: Partial<Record<LayerRole, number>> = {};
  for (const entry of value.split(",")) {
    const [role, weight] = entry.split("=").map((part) => part.trim());
    const parsed = Number(weight);
    if (!isLayerRole(role)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown layer role "${role}"` });
    } else if (weight === undefined || weight === "" || !Number.isFinite(parsed) || parsed < 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `weight for ${role} must be a non-negative number` });
    } else {
      weights[role] = parsed;
    }
  }
  return weights;
});

const EnvSchema = z.object({
  LAYER_QUALITY_STRATEGY: z.enum(["minimum", "weighted_average"]).default("minimum"),
  LAYER_QUALITY_WEIGHTS: WeightsSchema.optional(),
  LAYER_CONTRACT_POLICY: z.enum(["abort", "continue"]).default("abort"),
  LAYER_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  LAYER_REMOTE_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_REMOTE_TIMEOUT_MS),
  LAYER_REMOTE_URL: z
    .string()
    .url()
    .refine((url) => /^https?:\/\//.test(url), { message: "must be an http(s) URL" })
    .optional(),
});

const ENV_KEYS = Object.keys(EnvSchema.shape);

/**
 * Read and validate the framework configuration.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadFrameworkConfig(
  env: Record<string, string | undefined> = process.env
): FrameworkConfig {
  const input: Record<string, string> = {};
  for (const key of ENV_KEYS) {
    const value = env[key]?.trim();
    if (value) {
      input[key] = value;
    }
  }

  const parsed = EnvSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(formatIssue));
  }

  const vars = parsed.data;
  const qualityAggregation: QualityAggregation =
    vars.LAYER_QUALITY_STRATEGY === "weighted_average"
      ? { strategy: "weighted_average", weights: vars.LAYER_QUALITY_WEIGHTS ?? {} }
      : { strategy: "minimum" };

  return {
    qualityAggregation,
    contractViolationPolicy: vars.LAYER_CONTRACT_POLICY,
    logLevel: vars.LAYER_LOG_LEVEL,
    remoteTimeoutMs: vars.LAYER_REMOTE_TIMEOUT_MS,
    remoteUrl: vars.LAYER_REMOTE_URL,
  };
}
