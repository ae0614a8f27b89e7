/**
 * Offset Utilities
 * Span arithmetic shared by detection and the operator engine
 */

import type { Span } from "../types/index.js";

/**
 * Checks if two spans overlap (touching spans do not)
 */
export function spansOverlap(a: Span, b: Span): boolean {
  return a.start < b.end && b.start < a.end;
}

export function spanLength(span: Span): number {
  return span.end - span.start;
}

/**
 * Sorts spans by start ascending; longer spans first on equal starts
 * Returns a new array
 */
export function sortSpansByPosition<T extends Span>(spans: readonly T[]): T[] {
  return [...spans].sort((a, b) => {
    if (a.start !== b.start) {
      return a.start - b.start;
    }
    return spanLength(b) - spanLength(a);
  });
}

/**
 * Sorts spans by start descending (for splicing right to left)
 * Returns a new array
 */
export function sortSpansByPositionDescending<T extends Span>(
  spans: readonly T[]
): T[] {
  return [...spans].sort((a, b) => b.start - a.start);
}

/**
 * Keeps the best spans of an overlapping set
 *
 * Candidates are ranked first, then each is accepted unless it overlaps one
 * already accepted. A span that loses to a span which is itself dropped can
 * still be kept.
 * @param prefer - Positive when a should win over b, negative when b should win
 */
export function removeOverlappingSpans<T extends Span>(
  spans: readonly T[],
  prefer: (a: T, b: T) => number
): T[] {
  const ranked = [...spans].sort((a, b) => prefer(b, a));
  const kept: T[] = [];

  for (const span of ranked) {
    if (!kept.some((existing) => spansOverlap(existing, span))) {
      kept.push(span);
    }
  }

  return sortSpansByPosition(kept);
}
