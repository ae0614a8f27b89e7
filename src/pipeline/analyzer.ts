/**
 * Analyzer
 * Runs the registered recognizers over text and turns their raw results into
 * findings: type filter, threshold, deny-list, overlap resolution, allow-list
 */

import { AnonymizationError, DetectionEngineError, getErrorMessage } from "../errors.js";
import { DenyListRecognizer } from "../recognizers/deny-list.js";
import type { RecognizerRegistry } from "../recognizers/registry.js";
import type {
  Finding,
  RecognizerConfig,
  RecognizerResult,
} from "../types/index.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { removeOverlappingSpans, sortSpansByPosition, spanLength } from "../utils/offsets.js";
import { assembleExplanation } from "./explanation.js";

/**
 * Function that detects findings in a piece of text
 */
export type DetectFn = (text: string) => Promise<Finding[]>;

/**
 * Ranks two results of the same type: higher score, then longer, then earlier
 */
function compareResults(a: RecognizerResult, b: RecognizerResult): number {
  if (a.score !== b.score) {
    return a.score - b.score;
  }
  if (spanLength(a) !== spanLength(b)) {
    return spanLength(a) - spanLength(b);
  }
  return b.start - a.start;
}

/**
 * Keeps one result per overlapping group within each entity type
 * Results of different types may still overlap
 */
export function resolveSameTypeOverlaps(
  results: readonly RecognizerResult[]
): RecognizerResult[] {
  const byType = new Map<string, RecognizerResult[]>();
  for (const result of results) {
    const list = byType.get(result.entityType) ?? [];
    list.push(result);
    byType.set(result.entityType, list);
  }

  const resolved: RecognizerResult[] = [];
  for (const list of byType.values()) {
    resolved.push(...removeOverlappingSpans(list, compareResults));
  }
  return resolved;
}

export class Analyzer {
  private readonly logger: Logger;

  constructor(
    private readonly registry: RecognizerRegistry,
    logger: Logger = silentLogger
  ) {
    this.logger = logger.child("Analyzer");
  }

  /**
   * Detects findings in text
   * @throws DetectionEngineError when a recognizer fails
   */
  async detect(text: string, config: RecognizerConfig): Promise<Finding[]> {
    if (text.length === 0) {
      return [];
    }

    const raw = await this.runRecognizers(text, config.entities);

    // Only requested types, above threshold
    const wanted = config.entities;
    const scored = raw.filter(
      (result) =>
        (wanted === null || wanted.has(result.entityType)) &&
        result.score >= config.scoreThreshold
    );

    // Deny-list matches bypass the threshold
    if (config.denyList.size > 0) {
      scored.push(...new DenyListRecognizer(config.denyList).analyze(text));
    }

    const resolved = resolveSameTypeOverlaps(scored).filter(
      (result) => !config.allowList.has(text.slice(result.start, result.end))
    );

    const findings = sortSpansByPosition(resolved).map((result) =>
      this.toFinding(text, result, config.returnExplanation)
    );

    this.logger.debug("Detection complete", {
      recognizerResults: raw.length,
      findings: findings.length,
    });

    return findings;
  }

  private async runRecognizers(
    text: string,
    entities: ReadonlySet<string> | null
  ): Promise<RecognizerResult[]> {
    const results: RecognizerResult[] = [];

    for (const { recognizer, entities: subset } of this.registry.resolve(entities)) {
      try {
        results.push(...(await recognizer.analyze(text, subset)));
      } catch (error) {
        if (error instanceof AnonymizationError) {
          throw error;
        }
        this.logger.error("Recognizer failed", { recognizer: recognizer.name });
        throw new DetectionEngineError(
          `Recognizer ${recognizer.name} failed: ${getErrorMessage(error)}`,
          { cause: error }
        );
      }
    }

    return results;
  }

  private toFinding(
    text: string,
    result: RecognizerResult,
    withExplanation: boolean
  ): Finding {
    const finding: Finding = {
      entityType: result.entityType,
      text: text.slice(result.start, result.end),
      start: result.start,
      end: result.end,
      score: result.score,
    };
    if (withExplanation) {
      finding.explanation = assembleExplanation(result.explanation, result.entityType);
    }
    return finding;
  }
}
