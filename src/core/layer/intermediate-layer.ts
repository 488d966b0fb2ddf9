/**
 * IntermediateLayer - core processing with mid-pipeline quality gates.
 */

import { LayerRole } from "../models/layer-role";
import { StageFailureError } from "../errors/layer-errors";
import { BaseLayer, BaseLayerOptions, LayerExpectationInput } from "./base-layer";
import { LayerRunContext } from "./layer";

export type QualityGateMode = "enforce" | "warn";

export interface IntermediateLayerOptions extends BaseLayerOptions {
  /** Metric name → minimum the layer's own output must report */
  qualityGates?: Readonly<Record<string, number>>;
  /** enforce (default) fails the stage; warn only logs */
  qualityGateMode?: QualityGateMode;
}

export abstract class IntermediateLayer<TIn = unknown, TOut = unknown> extends BaseLayer<TIn, TOut> {
  readonly qualityGates: Readonly<Record<string, number>>;
  readonly qualityGateMode: QualityGateMode;

  constructor(expectation: LayerExpectationInput, options: IntermediateLayerOptions = {}) {
    super(LayerRole.INTERMEDIATE, expectation, options);
    this.qualityGates = Object.freeze({ ...(options.qualityGates ?? {}) });
    this.qualityGateMode = options.qualityGateMode ?? "enforce";
  }

  protected override verifyOutput(output: TOut, context: LayerRunContext): void {
    const reported = this.reportQuality(output);
    const failures: string[] = [];

    for (const [metric, minimum] of Object.entries(this.qualityGates)) {
      const value = reported[metric];
      if (value === undefined) {
        failures.push(`${metric} not reported (expected >= ${minimum})`);
      } else if (!(value >= minimum)) {
        failures.push(`${metric} = ${value} (expected >= ${minimum})`);
      }
    }

    if (failures.length === 0) {
      return;
    }
    if (this.qualityGateMode === "warn") {
      context.logger.warn(`Quality gates failed: ${failures.join("; ")}`);
      return;
    }
    throw new StageFailureError(
      this.role,
      "quality_gate_failed",
      `${this.name} failed quality gates: ${failures.join("; ")}`
    );
  }

  override reportQuality(output: TOut): Record<string, number> {
    const metrics = super.reportQuality(output);
    if (output !== null && typeof output === "object") {
      for (const metric of Object.keys(this.qualityGates)) {
        const value: unknown = Reflect.get(output, metric);
        if (typeof value === "number") {
          metrics[metric] = value;
        }
      }
    }
    return metrics;
  }
}
