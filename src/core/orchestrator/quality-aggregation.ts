/**
 * Quality aggregation - folds per-stage quality signals into one score.
 *
 * minimum: the lowest metric reported by any stage (default).
 * weighted_average: each reporting stage contributes the mean of its metrics,
 * weighted by its role weight (1 when unset). Stages that report nothing are
 * skipped. Both return null when no stage reports a metric.
 */

import { LayerRole } from "../models/layer-role";

export type QualityAggregation =
  | { strategy: "minimum" }
  | { strategy: "weighted_average"; weights?: Partial<Record<LayerRole, number>> };

export interface StageQuality {
  role: LayerRole;
  metrics: Readonly<Record<string, number>>;
}

export const DEFAULT_QUALITY_AGGREGATION: QualityAggregation = { strategy: "minimum" };

export function aggregateQuality(
  stages: readonly StageQuality[],
  aggregation: QualityAggregation = DEFAULT_QUALITY_AGGREGATION
): number | null {
  switch (aggregation.strategy) {
    case "minimum": {
      const values = stages.flatMap((stage) => Object.values(stage.metrics));
      return values.length > 0 ? Math.min(...values) : null;
    }
    case "weighted_average": {
      let weightedSum = 0;
      let totalWeight = 0;
      for (const stage of stages) {
        const values = Object.values(stage.metrics);
        if (values.length === 0) {
          continue;
        }
        const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
        const weight = aggregation.weights?.[stage.role] ?? 1;
        weightedSum += weight * mean;
        totalWeight += weight;
      }
      return totalWeight > 0 ? weightedSum / totalWeight : null;
    }
  }
}
