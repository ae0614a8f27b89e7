/**
 * Recognizer Base
 * Contract between the detection adapter and entity detectors, plus the
 * pattern recognizer every built-in detector is made from
 */

import type { RecognizerResult, RawExplanation } from "../types/index.js";
import {
  boostScore,
  findSupportiveContextWord,
  normalizeContextWords,
  roundScore,
} from "./context.js";

/**
 * Anything that reports entity spans in text
 */
export interface Recognizer {
  /** Recognizer name (reported in explanations) */
  readonly name: string;
  /** Entity types this recognizer can report */
  readonly supportedEntities: readonly string[];
  /**
   * Finds entities in text
   * @param entities - Requested subset of supportedEntities
   */
  analyze(
    text: string,
    entities: readonly string[]
  ): RecognizerResult[] | Promise<RecognizerResult[]>;
}

/**
 * A named regular expression with a base score
 */
export interface PatternRule {
  name: string;
  regex: RegExp;
  score: number;
}

/**
 * Regex-based recognizer for a single entity type
 */
export abstract class PatternRecognizer implements Recognizer {
  abstract readonly entityType: string;
  abstract readonly name: string;
  /** Evaluated in order; overlapping matches are deduplicated */
  protected abstract readonly patterns: readonly PatternRule[];
  /** Words that raise the score when found near a match */
  protected readonly contextWords: readonly string[] = [];

  private normalizedContext: string[][] | undefined;

  get supportedEntities(): readonly string[] {
    return [this.entityType];
  }

  /**
   * Checksum validation. true sets the score to 1.0, false drops the match
   */
  validate?(match: string): boolean;

  /**
   * Rejects matches known to be invalid even when the pattern fits
   */
  invalidate?(match: string): boolean;

  analyze(text: string, entities: readonly string[]): RecognizerResult[] {
    if (!entities.includes(this.entityType)) {
      return [];
    }

    const results: RecognizerResult[] = [];
    for (const rule of this.patterns) {
      results.push(...this.matchRule(text, rule));
    }

    return this.deduplicateMatches(results).map((result) =>
      this.applyContext(text, result)
    );
  }

  private matchRule(text: string, rule: PatternRule): RecognizerResult[] {
    const flags = rule.regex.flags.includes("g")
      ? rule.regex.flags
      : rule.regex.flags + "g";
    const regex = new RegExp(rule.regex.source, flags);
    const results: RecognizerResult[] = [];

    let match: RegExpExecArray | null;
    while ((match = regex.exec(text)) !== null) {
      const matched = match[0];
      if (matched.length === 0) {
        regex.lastIndex++;
        continue;
      }

      if (this.invalidate?.(matched) === true) {
        continue;
      }

      let score = rule.score;
      let validationResult: boolean | undefined;
      if (this.validate !== undefined) {
        validationResult = this.validate(matched);
        if (!validationResult) {
          continue;
        }
        score = 1.0;
      }

      const explanation: RawExplanation = {
        recognizer: this.name,
        patternName: rule.name,
        pattern: rule.regex.source,
        originalScore: rule.score,
        score,
        validationResult,
      };

      results.push({
        entityType: this.entityType,
        start: match.index,
        end: match.index + matched.length,
        score,
        explanation,
      });
    }

    return results;
  }

  private applyContext(text: string, result: RecognizerResult): RecognizerResult {
    if (result.score >= 1) {
      return result;
    }

    this.normalizedContext ??= normalizeContextWords(this.contextWords);
    const word = findSupportiveContextWord(
      text,
      result.start,
      result.end,
      this.normalizedContext
    );
    if (word === null) {
      return result;
    }

    const boosted = boostScore(result.score);
    return {
      ...result,
      score: boosted,
      explanation: {
        ...result.explanation,
        supportiveContextWord: word,
        scoreContextImprovement: roundScore(boosted - result.score),
      },
    };
  }

  /**
   * Removes duplicate and contained matches
   * Identical spans keep the higher score
   */
  protected deduplicateMatches(matches: readonly RecognizerResult[]): RecognizerResult[] {
    const sorted = [...matches].sort((a, b) => {
      if (a.start !== b.start) {
        return a.start - b.start;
      }
      return b.end - a.end;
    });

    const kept: RecognizerResult[] = [];
    for (const match of sorted) {
      const sameIndex = kept.findIndex(
        (existing) => existing.start === match.start && existing.end === match.end
      );
      if (sameIndex !== -1) {
        const existing = kept[sameIndex];
        if (existing !== undefined && match.score > existing.score) {
          kept[sameIndex] = match;
        }
        continue;
      }

      const contained = kept.some(
        (existing) => existing.start <= match.start && match.end <= existing.end
      );
      if (!contained) {
        kept.push(match);
      }
    }

    return kept;
  }
}

/**
 * Options for an ad-hoc pattern recognizer
 */
export interface PatternRecognizerOptions {
  entityType: string;
  name: string;
  patterns: readonly PatternRule[];
  contextWords?: readonly string[];
  validate?: (match: string) => boolean;
  invalidate?: (match: string) => boolean;
}

/**
 * Creates a pattern recognizer from plain options
 */
export function createPatternRecognizer(
  options: PatternRecognizerOptions
): PatternRecognizer {
  class CustomPatternRecognizer extends PatternRecognizer {
    readonly entityType = options.entityType;
    readonly name = options.name;
    protected readonly patterns = options.patterns;
    protected readonly contextWords = options.contextWords ?? [];
  }

  const recognizer = new CustomPatternRecognizer();
  if (options.validate !== undefined) {
    recognizer.validate = options.validate;
  }
  if (options.invalidate !== undefined) {
    recognizer.invalidate = options.invalidate;
  }
  return recognizer;
}
