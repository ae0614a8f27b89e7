/**
 * Operator Engine
 * Applies an operator (redact, replace, mask, hash, encrypt, highlight) to
 * the detected spans of a text
 */

import {
  InvalidOperatorError,
  InvalidOperatorParamsError,
  MissingKeyError,
} from "../errors.js";
import { formatIssues, operatorSpecSchema } from "../config/schemas.js";
import { encryptValue, parseEncryptionKey } from "../crypto/value-crypto.js";
import {
  OPERATOR_KINDS,
  type Annotation,
  type Finding,
  type OperatorKind,
  type ResolvedOperator,
} from "../types/index.js";
import { sortSpansByPosition, sortSpansByPositionDescending } from "../utils/offsets.js";
import type { TokenCache } from "./token-cache.js";

function isOperatorKind(value: unknown): value is OperatorKind {
  return OPERATOR_KINDS.some((kind) => kind === value);
}

/**
 * Validates an operator spec and fills in defaults
 * @throws InvalidOperatorError for an unknown kind
 * @throws MissingKeyError for encrypt without a key
 * @throws InvalidOperatorParamsError for bad parameters
 */
export function parseOperatorSpec(input: unknown): ResolvedOperator {
  const kind: unknown =
    typeof input === "object" && input !== null && "kind" in input ? input.kind : undefined;
  if (!isOperatorKind(kind)) {
    throw new InvalidOperatorError(String(kind), OPERATOR_KINDS);
  }

  if (
    kind === "encrypt" &&
    typeof input === "object" &&
    input !== null &&
    (!("key" in input) || input.key === undefined || input.key === null || input.key === "")
  ) {
    throw new MissingKeyError();
  }

  const parsed = operatorSpecSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidOperatorParamsError(
      `Invalid ${kind} operator parameters: ${formatIssues(parsed.error)}`
    );
  }

  const spec = parsed.data;
  if (spec.kind === "encrypt") {
    return { kind: "encrypt", key: parseEncryptionKey(spec.key) };
  }
  return spec;
}

/**
 * Makes findings safe to splice: no two kept spans overlap
 *
 * Identical spans keep the higher score, contained spans are dropped and a
 * partial overlap is trimmed to start where the previous kept span ends.
 */
export function resolveTextConflicts(
  text: string,
  findings: readonly Finding[]
): Finding[] {
  const kept: Finding[] = [];

  for (const finding of sortSpansByPosition(findings)) {
    const previous = kept[kept.length - 1];
    if (previous === undefined || finding.start >= previous.end) {
      kept.push(finding);
      continue;
    }

    if (finding.start === previous.start && finding.end === previous.end) {
      if (finding.score > previous.score) {
        kept[kept.length - 1] = finding;
      }
      continue;
    }

    if (finding.end <= previous.end) {
      continue;
    }

    kept.push({
      ...finding,
      start: previous.end,
      text: text.slice(previous.end, finding.end),
    });
  }

  return kept;
}

async function replacementFor(
  finding: Finding,
  operator: ResolvedOperator,
  cache: TokenCache
): Promise<string> {
  switch (operator.kind) {
    case "redact":
      return "";
    case "replace":
      return cache.tokenFor(finding.entityType, finding.text);
    case "mask":
      return operator.maskChar.repeat(operator.numberOfChars);
    case "hash":
      return cache.hashTokenFor(finding.entityType, finding.text);
    case "encrypt":
      return encryptValue(finding.text, operator.key);
    case "highlight":
      return finding.text;
  }
}

/**
 * Applies an operator to every finding in text
 *
 * Replacements are computed in reading order, so counter tokens number
 * values as they appear, then spliced from the end of the text backwards.
 */
export async function applyOperator(
  text: string,
  findings: readonly Finding[],
  spec: unknown,
  cache: TokenCache
): Promise<string> {
  const operator = parseOperatorSpec(spec);
  if (operator.kind === "highlight" || findings.length === 0) {
    return text;
  }

  const spans = resolveTextConflicts(text, findings);

  const replacements: Array<{ start: number; end: number; value: string }> = [];
  for (const finding of spans) {
    replacements.push({
      start: finding.start,
      end: finding.end,
      value: await replacementFor(finding, operator, cache),
    });
  }

  let result = text;
  for (const replacement of sortSpansByPositionDescending(replacements)) {
    result = result.slice(0, replacement.start) + replacement.value + result.slice(replacement.end);
  }
  return result;
}

/**
 * Splits text into consecutive segments, tagging the ones that are findings
 */
export function annotateText(text: string, findings: readonly Finding[]): Annotation[] {
  const annotations: Annotation[] = [];
  let cursor = 0;

  for (const finding of resolveTextConflicts(text, findings)) {
    if (finding.start > cursor) {
      annotations.push({
        text: text.slice(cursor, finding.start),
        entityType: null,
        start: cursor,
        end: finding.start,
      });
    }
    annotations.push({
      text: finding.text,
      entityType: finding.entityType,
      start: finding.start,
      end: finding.end,
    });
    cursor = finding.end;
  }

  if (cursor < text.length) {
    annotations.push({
      text: text.slice(cursor),
      entityType: null,
      start: cursor,
      end: text.length,
    });
  }

  return annotations;
}
