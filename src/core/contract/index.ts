/**
 * Contract module - expectations, field schemas and validation rules
 */

export * from "./field-schema";
export * from "./validation-rule";
export * from "./layer-expectation";
