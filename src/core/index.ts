/**
 * Core Module Exports
 */

export {
  Anonymizer,
  createAnonymizer,
  type AnonymizerConfig,
  type StructureOptions,
} from "./anonymizer.js";
