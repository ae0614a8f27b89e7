/**
 * Context Boost
 * Raises a pattern score when a supporting word appears near the match
 */

/** Words inspected on each side of a match */
export const CONTEXT_WINDOW = 5;

/** Score added when a context word is present */
export const CONTEXT_SIMILARITY_FACTOR = 0.35;

/** Floor for a context-boosted score */
export const MIN_SCORE_WITH_CONTEXT = 0.4;

const WORD_PATTERN = /[\p{L}]+/gu;

/**
 * Splits text into lower-cased word tokens (letters only)
 */
export function tokenizeWords(text: string): string[] {
  return Array.from(text.matchAll(WORD_PATTERN), (m) => m[0].toLowerCase());
}

/**
 * Normalizes context terms ("Tel:" -> ["tel"], "phone number" -> ["phone", "number"])
 * and drops duplicates and terms with no letters
 */
export function normalizeContextWords(words: readonly string[]): string[][] {
  const seen = new Set<string>();
  const terms: string[][] = [];
  for (const word of words) {
    const tokens = tokenizeWords(word);
    const key = tokens.join(" ");
    if (tokens.length === 0 || seen.has(key)) {
      continue;
    }
    seen.add(key);
    terms.push(tokens);
  }
  return terms;
}

function containsSequence(haystack: readonly string[], needle: readonly string[]): boolean {
  for (let i = 0; i + needle.length <= haystack.length; i++) {
    if (needle.every((token, offset) => haystack[i + offset] === token)) {
      return true;
    }
  }
  return false;
}

/**
 * Finds the first context term present within the window around a span
 * @returns The matched term joined by spaces, or null
 */
export function findSupportiveContextWord(
  text: string,
  start: number,
  end: number,
  terms: readonly (readonly string[])[],
  window: number = CONTEXT_WINDOW
): string | null {
  if (terms.length === 0) {
    return null;
  }

  const before = tokenizeWords(text.slice(0, start)).slice(-window);
  const after = tokenizeWords(text.slice(end)).slice(0, window);

  for (const term of terms) {
    if (containsSequence(before, term) || containsSequence(after, term)) {
      return term.join(" ");
    }
  }
  return null;
}

/** Decimal places kept in boosted scores */
export const SCORE_PRECISION = 3;

/**
 * Rounds a score to SCORE_PRECISION decimals
 */
export function roundScore(score: number): number {
  const factor = 10 ** SCORE_PRECISION;
  return Math.round(score * factor) / factor;
}

/**
 * Score after a context boost
 */
export function boostScore(score: number): number {
  return roundScore(
    Math.min(1, Math.max(score + CONTEXT_SIMILARITY_FACTOR, MIN_SCORE_WITH_CONTEXT))
  );
}
