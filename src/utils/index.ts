/**
 * Utils Module
 * Exports utility functions
 */

export * from "./luhn.js";
export * from "./iban-checksum.js";
export * from "./offsets.js";
export * from "./logger.js";
