/**
 * Layer module - the stage contract and its role variants
 */

export * from "./layer";
export * from "./base-layer";
export * from "./leading-layer";
export * from "./intermediate-layer";
export * from "./terminal-layer";
export * from "./function-layer";
