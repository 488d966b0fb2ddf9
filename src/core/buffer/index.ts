/**
 * Buffer module - inter-layer transport and its validation trail
 */

export * from "./validation-record";
export * from "./direction-buffer";
