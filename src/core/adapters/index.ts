/**
 * Adapter module - remote agents behind the Layer contract
 */

export * from "./remote-agent-connection";
export * from "./agent-translation";
export * from "./remote-agent-layer";
