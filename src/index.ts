/**
 * piiveil
 * Main entry point for PII anonymization of JSON payloads and free text
 */

// Re-export types
export * from "./types/index.js";

// Re-export errors
export {
  AnonymizationError,
  UnsupportedTypeError,
  InvalidOperatorError,
  InvalidOperatorParamsError,
  MissingKeyError,
  DetectionEngineError,
  DepthExceededError,
  ConfigurationError,
  RegistryFrozenError,
  isClientError,
  getErrorMessage,
  type AnonymizationErrorCode,
} from "./errors.js";

// Re-export recognizers
export {
  PatternRecognizer,
  createPatternRecognizer,
  ModelRecognizer,
  DenyListRecognizer,
  RecognizerRegistry,
  createRegistry,
  createDefaultRegistry,
  BUILT_IN_RECOGNIZERS,
  PhoneRecognizer,
  phoneRecognizer,
  PHONE_PATTERNS,
  PHONE_CONTEXT_WORDS,
  emailRecognizer,
  creditCardRecognizer,
  ibanRecognizer,
  usSsnRecognizer,
  ipAddressRecognizer,
  urlRecognizer,
  type Recognizer,
  type PatternRule,
  type PatternRecognizerOptions,
  type EntityModel,
  type EntityPrediction,
  type DefaultRegistryOptions,
} from "./recognizers/index.js";

// Re-export pipeline components
export {
  Analyzer,
  assembleExplanation,
  TokenCache,
  formatToken,
  parseOperatorSpec,
  applyOperator,
  resolveTextConflicts,
  annotateText,
  anonymizeStructure,
  describeStructure,
  type DetectFn,
  type StructureStats,
  type WalkOptions,
  type WalkResult,
} from "./pipeline/index.js";

// Re-export crypto
export {
  encryptValue,
  hashValue,
  parseEncryptionKey,
  uint8ArrayToBase64,
  base64ToUint8Array,
} from "./crypto/index.js";

// Re-export config
export { loadSettings, type Settings } from "./config/index.js";

// Re-export logging
export { createLogger, silentLogger, type Logger, type LogLevel } from "./utils/logger.js";

// Main anonymizer
export {
  Anonymizer,
  createAnonymizer,
  type AnonymizerConfig,
  type StructureOptions,
} from "./core/index.js";
