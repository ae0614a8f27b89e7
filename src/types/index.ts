import { normalizeEntityType } from "./pii-types.js";

export * from "./pii-types.js";

// ============================================================================
// JSON values
// ============================================================================

/**
 * Any value with a JSON representation
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// ============================================================================
// Findings and explanations
// ============================================================================

/**
 * Character range in a source text (0-based, end exclusive)
 */
export interface Span {
  start: number;
  end: number;
}

/**
 * Value carried by an explanation field
 */
export type ExplanationValue =
  | string
  | number
  | boolean
  | readonly ExplanationValue[]
  | { readonly [field: string]: ExplanationValue };

/**
 * Why a recognizer reported a finding
 *
 * Only populated fields are present. Recognizers may add fields beyond the
 * known ones; they are carried through unchanged.
 */
export interface Explanation {
  /** Name of the recognizer that produced the finding */
  readonly recognizer?: string;
  /** Score before validation and context adjustment */
  readonly originalScore?: number;
  readonly textualExplanation?: string;
  /** Name of the pattern rule that matched */
  readonly patternName?: string;
  /** Source of the regular expression that matched */
  readonly pattern?: string;
  /** Score after validation, before context adjustment */
  readonly score?: number;
  /** Result of the checksum validator, when the recognizer has one */
  readonly validationResult?: boolean;
  /** Score gained from a context word */
  readonly scoreContextImprovement?: number;
  /** Context word that raised the score */
  readonly supportiveContextWord?: string;
  readonly [field: string]: ExplanationValue | undefined;
}

/**
 * Explanation as produced by a recognizer, before assembly
 */
export type RawExplanation = Readonly<Record<string, unknown>>;

/**
 * A detected PII occurrence
 */
export interface Finding extends Span {
  /** Entity type (e.g. PERSON, PHONE_NUMBER) */
  entityType: string;
  /** The detected text, equal to source.slice(start, end) */
  text: string;
  /** Detection confidence (0.0 to 1.0) */
  score: number;
  /** Present only when explanations were requested */
  explanation?: Explanation;
}

/**
 * A finding located inside a JSON structure
 */
export interface StructureFinding extends Finding {
  /** Path of the string leaf, e.g. $.users[0] */
  path: string;
}

/**
 * Raw recognizer output (before thresholding and assembly)
 */
export interface RecognizerResult extends Span {
  entityType: string;
  score: number;
  explanation: RawExplanation;
}

/**
 * Finding count per entity type
 */
export type EntitySummary = Record<string, number>;

// ============================================================================
// Detection configuration
// ============================================================================

/**
 * Per-call detection configuration
 */
export interface RecognizerConfig {
  /** Entity types to detect, null for every registered type */
  entities: ReadonlySet<string> | null;
  /** Findings scoring below this are dropped (deny-list matches excepted) */
  scoreThreshold: number;
  /** Exact, case-sensitive texts that are never reported */
  allowList: ReadonlySet<string>;
  /** Texts always reported as GENERIC_PII wherever they occur */
  denyList: ReadonlySet<string>;
  /** Attach an explanation to each finding */
  returnExplanation: boolean;
}

/**
 * Caller-facing form of RecognizerConfig; every field is optional
 */
export interface RecognizerConfigInput {
  entities?: readonly string[] | ReadonlySet<string> | null;
  scoreThreshold?: number;
  allowList?: readonly string[] | ReadonlySet<string>;
  denyList?: readonly string[] | ReadonlySet<string>;
  returnExplanation?: boolean;
}

/**
 * Default minimum score
 */
export const DEFAULT_SCORE_THRESHOLD = 0.35;

/**
 * Creates the default detection configuration
 */
export function createDefaultConfig(): RecognizerConfig {
  return {
    entities: null,
    scoreThreshold: DEFAULT_SCORE_THRESHOLD,
    allowList: new Set(),
    denyList: new Set(),
    returnExplanation: false,
  };
}

/**
 * Merges a partial configuration over a base
 * Provided collections replace the base ones rather than extending them
 */
export function mergeConfig(
  base: RecognizerConfig,
  partial: RecognizerConfigInput = {}
): RecognizerConfig {
  let entities = base.entities;
  if (partial.entities === null) {
    entities = null;
  } else if (partial.entities !== undefined) {
    entities = new Set(Array.from(partial.entities, normalizeEntityType));
  }

  return {
    entities,
    scoreThreshold: partial.scoreThreshold ?? base.scoreThreshold,
    allowList:
      partial.allowList !== undefined
        ? new Set(partial.allowList)
        : base.allowList,
    denyList:
      partial.denyList !== undefined ? new Set(partial.denyList) : base.denyList,
    returnExplanation: partial.returnExplanation ?? base.returnExplanation,
  };
}

// ============================================================================
// Operators
// ============================================================================

/**
 * Supported operator kinds
 */
export const OPERATOR_KINDS = [
  "redact",
  "replace",
  "mask",
  "hash",
  "encrypt",
  "highlight",
] as const;

export type OperatorKind = (typeof OPERATOR_KINDS)[number];

/**
 * How detected spans are transformed
 */
export type OperatorSpec =
  | { kind: "redact" }
  | { kind: "replace" }
  | {
      kind: "mask";
      /** Single masking character (default: "*") */
      maskChar?: string;
      /** Length of the mask, independent of the matched length (default: 15) */
      numberOfChars?: number;
    }
  | { kind: "hash" }
  | {
      kind: "encrypt";
      /** AES key: 16, 24 or 32 bytes, or a string of that many UTF-8 bytes */
      key?: string | Uint8Array;
    }
  | { kind: "highlight" };

/**
 * Operator spec after validation and defaulting
 */
export type ResolvedOperator =
  | { kind: "redact" }
  | { kind: "replace" }
  | { kind: "mask"; maskChar: string; numberOfChars: number }
  | { kind: "hash" }
  | { kind: "encrypt"; key: Uint8Array }
  | { kind: "highlight" };

/**
 * Token strategy for structure anonymization
 * - replace: request-scoped counter tokens (<PERSON_1>)
 * - hash: digest tokens (<PERSON_1a2b3c4d>)
 */
export type StructureStrategy = "replace" | "hash";

// ============================================================================
// Results
// ============================================================================

/**
 * Result of analyzing text without transforming it
 */
export interface AnalysisResult {
  text: string;
  findings: Finding[];
  summary: EntitySummary;
}

/**
 * Result of anonymizing free text
 */
export interface TextAnonymizationResult {
  anonymizedText: string;
  operator: OperatorKind;
  findings: Finding[];
  summary: EntitySummary;
}

/**
 * Result of anonymizing a JSON value
 */
export interface StructureAnonymizationResult {
  anonymizedValue: JsonValue;
  findings: StructureFinding[];
  summary: EntitySummary;
}

/**
 * A contiguous piece of annotated text
 */
export interface Annotation extends Span {
  text: string;
  /** Entity type, or null for text that is not PII */
  entityType: string | null;
}

/**
 * Result of annotating text for highlighting
 */
export interface AnnotationResult {
  text: string;
  annotations: Annotation[];
  summary: EntitySummary;
}

/**
 * Counts findings per entity type
 */
export function summarizeFindings(
  findings: readonly Finding[]
): EntitySummary {
  const summary: EntitySummary = {};
  for (const finding of findings) {
    summary[finding.entityType] = (summary[finding.entityType] ?? 0) + 1;
  }
  return summary;
}
