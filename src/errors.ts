/**
 * Error Taxonomy
 * Every failure raised by the core is a typed AnonymizationError
 */

export type AnonymizationErrorCode =
  | "UNSUPPORTED_TYPE"
  | "INVALID_OPERATOR"
  | "INVALID_OPERATOR_PARAMS"
  | "MISSING_KEY"
  | "DETECTION_ENGINE"
  | "DEPTH_EXCEEDED"
  | "CONFIGURATION"
  | "REGISTRY_FROZEN";

/**
 * Base class for all core errors
 */
export abstract class AnonymizationError extends Error {
  abstract readonly code: AnonymizationErrorCode;

  /** Whether the fault lies in caller input rather than in the engine */
  abstract readonly clientError: boolean;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The structure walker met a value that has no JSON representation
 */
export class UnsupportedTypeError extends AnonymizationError {
  readonly code = "UNSUPPORTED_TYPE";
  readonly clientError = true;

  constructor(
    readonly valueType: string,
    readonly path: string
  ) {
    super(`Unsupported value of type ${valueType} at ${path}`);
  }
}

/**
 * Operator kind is not one of the supported operators
 */
export class InvalidOperatorError extends AnonymizationError {
  readonly code = "INVALID_OPERATOR";
  readonly clientError = true;

  constructor(
    readonly operator: string,
    readonly supported: readonly string[]
  ) {
    super(
      `Invalid operator "${operator}". Must be one of: ${supported.join(", ")}`
    );
  }
}

/**
 * Operator parameters failed validation
 */
export class InvalidOperatorParamsError extends AnonymizationError {
  readonly code = "INVALID_OPERATOR_PARAMS";
  readonly clientError = true;
}

/**
 * The encrypt operator was requested without a key
 */
export class MissingKeyError extends AnonymizationError {
  readonly code = "MISSING_KEY";
  readonly clientError = true;

  constructor() {
    super("A key is required for the encrypt operator");
  }
}

/**
 * A recognizer or entity model failed
 */
export class DetectionEngineError extends AnonymizationError {
  readonly code = "DETECTION_ENGINE";
  readonly clientError = false;
}

/**
 * Nesting went past the configured maximum depth
 */
export class DepthExceededError extends AnonymizationError {
  readonly code = "DEPTH_EXCEEDED";
  readonly clientError = true;

  constructor(
    readonly maxDepth: number,
    readonly path: string
  ) {
    super(`Maximum nesting depth of ${maxDepth} exceeded at ${path}`);
  }
}

/**
 * Settings or per-call configuration is invalid
 */
export class ConfigurationError extends AnonymizationError {
  readonly code = "CONFIGURATION";
  readonly clientError = true;
}

/**
 * The recognizer registry was modified after being frozen
 */
export class RegistryFrozenError extends AnonymizationError {
  readonly code = "REGISTRY_FROZEN";
  readonly clientError = false;

  constructor() {
    super("Recognizer registry is frozen and can no longer be modified");
  }
}

/**
 * Tells caller-input faults from engine faults
 */
export function isClientError(error: unknown): boolean {
  return error instanceof AnonymizationError && error.clientError;
}

/**
 * Extracts a message from an unknown thrown value
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
