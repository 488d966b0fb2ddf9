/**
 * Orchestrator module - the run state machine and its results
 */

export * from "./orchestrator-phase";
export * from "./quality-aggregation";
export * from "./execution-result";
export * from "./three-layer-orchestrator";
