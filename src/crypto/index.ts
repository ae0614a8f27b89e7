/**
 * Crypto Module
 * Exports value encryption and hashing
 */

export * from "./value-crypto.js";
