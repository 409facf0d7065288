/**
 * Core type definitions.
 */

export * from "./artifact.js";
export * from "./pipeline.js";
