/**
 * Core - three-layer agent pipeline
 */

export * from "./models/layer-role";
export * from "./errors/layer-errors";
export * from "./contract";
export * from "./buffer";
export * from "./layer";
export * from "./orchestrator";
export * from "./events/event-bus";
export * from "./adapters";
export * from "./config/framework-config";
export * from "./logging/logger";
export * from "./framework";
export { deepFreeze, frozenCopy } from "./utils/immutability";
