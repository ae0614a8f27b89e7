/**
 * Pipeline Module
 * Exports all pipeline components
 */

export * from "./analyzer.js";
export * from "./explanation.js";
export * from "./token-cache.js";
export * from "./operators.js";
export * from "./walker.js";
