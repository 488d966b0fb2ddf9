/**
 * LayerRole - the three fixed positions of the pipeline.
 */

export enum LayerRole {
  /** Turns the raw request into directives for the rest of the pipeline */
  LEADING = "LEADING",
  /** Core processing; the only stage that applies quality gates mid-pipeline */
  INTERMEDIATE = "INTERMEDIATE",
  /** Produces the final output; nothing runs after it */
  TERMINAL = "TERMINAL",
}

export const PIPELINE_ORDER: readonly LayerRole[] = [
  LayerRole.LEADING,
  LayerRole.INTERMEDIATE,
  LayerRole.TERMINAL,
];

/**
 * The role that receives this role's output, if any.
 */
export function nextRole(role: LayerRole): LayerRole | undefined {
  return PIPELINE_ORDER[PIPELINE_ORDER.indexOf(role) + 1];
}

/**
 * The role that feeds this role, if any.
 */
export function previousRole(role: LayerRole): LayerRole | undefined {
  const index = PIPELINE_ORDER.indexOf(role);
  return index > 0 ? PIPELINE_ORDER[index - 1] : undefined;
}

/**
 * Only LEADING → INTERMEDIATE and INTERMEDIATE → TERMINAL are valid hand-offs.
 */
export function areAdjacent(source: LayerRole, target: LayerRole): boolean {
  return nextRole(source) === target;
}

export function isLayerRole(value: unknown): value is LayerRole {
  return PIPELINE_ORDER.some((role) => role === value);
}
