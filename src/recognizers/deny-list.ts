/**
 * Deny-List Recognizer
 * Every case-sensitive occurrence of a listed term is GENERIC_PII
 */

import { PIIType, type RecognizerResult } from "../types/index.js";
import type { Recognizer } from "./base.js";

export class DenyListRecognizer implements Recognizer {
  readonly name = "DenyListRecognizer";
  readonly supportedEntities: readonly string[] = [PIIType.GENERIC_PII];
  private readonly terms: readonly string[];

  constructor(terms: Iterable<string>) {
    this.terms = Array.from(new Set(terms)).filter((term) => term.length > 0);
  }

  analyze(text: string): RecognizerResult[] {
    const results: RecognizerResult[] = [];

    for (const term of this.terms) {
      let index = text.indexOf(term);
      while (index !== -1) {
        results.push({
          entityType: PIIType.GENERIC_PII,
          start: index,
          end: index + term.length,
          score: 1.0,
          explanation: {
            recognizer: this.name,
            patternName: "deny_list",
            originalScore: 1.0,
            score: 1.0,
          },
        });
        index = text.indexOf(term, index + 1);
      }
    }

    return results;
  }
}
