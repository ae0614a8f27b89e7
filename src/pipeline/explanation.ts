/**
 * Explanation Assembler
 * Turns a recognizer's raw explanation into the public Explanation shape
 */

import type {
  Explanation,
  ExplanationValue,
  RawExplanation,
} from "../types/index.js";

function toExplanationValue(value: unknown): ExplanationValue | undefined {
  if (typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (Array.isArray(value)) {
    const items: ExplanationValue[] = [];
    for (const item of value) {
      const converted = toExplanationValue(item);
      if (converted !== undefined) {
        items.push(converted);
      }
    }
    return items;
  }
  if (typeof value === "object" && value !== null) {
    return copyFields(value);
  }
  return undefined;
}

type MutableExplanation = { -readonly [K in keyof Explanation]: Explanation[K] };

/** Known fields and the only type each may carry */
const KNOWN_FIELD_TYPES: ReadonlyMap<string, "string" | "number" | "boolean"> = new Map([
  ["recognizer", "string"],
  ["originalScore", "number"],
  ["textualExplanation", "string"],
  ["patternName", "string"],
  ["pattern", "string"],
  ["score", "number"],
  ["validationResult", "boolean"],
  ["scoreContextImprovement", "number"],
  ["supportiveContextWord", "string"],
]);

function copyFields(source: object): Record<string, ExplanationValue> {
  const fields: Record<string, ExplanationValue> = {};
  for (const [key, value] of Object.entries(source)) {
    const converted = toExplanationValue(value);
    if (converted !== undefined) {
      fields[key] = converted;
    }
  }
  return fields;
}

/**
 * Describes a finding in one sentence
 */
export function describeFinding(
  entityType: string,
  recognizer: string,
  patternName?: string
): string {
  const base = `Identified as ${entityType} by ${recognizer}`;
  return patternName !== undefined ? `${base} using pattern \`${patternName}\`` : base;
}

/**
 * Builds an explanation from a recognizer's raw fields
 *
 * Every own field with a JSON-like value is copied, including fields this
 * module does not know about. null and undefined fields are omitted, as are
 * known fields holding a value of the wrong type. When the recognizer gave
 * no textual explanation one is composed from the recognizer and pattern
 * names.
 */
export function assembleExplanation(
  raw: RawExplanation,
  entityType?: string
): Explanation {
  const explanation: MutableExplanation = {};
  for (const [key, value] of Object.entries(copyFields(raw))) {
    const expected = KNOWN_FIELD_TYPES.get(key);
    if (expected === undefined || typeof value === expected) {
      explanation[key] = value;
    }
  }

  const { recognizer, patternName } = explanation;
  if (
    explanation.textualExplanation === undefined &&
    recognizer !== undefined &&
    entityType !== undefined
  ) {
    explanation.textualExplanation = describeFinding(entityType, recognizer, patternName);
  }

  return explanation;
}
