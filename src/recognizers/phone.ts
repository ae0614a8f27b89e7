/**
 * Phone Number Recognizer
 * Structurally distinct phone formats, boosted by nearby context words
 *
 * No bare digit-run rule: order IDs and card numbers are not phone numbers.
 */

import { PIIType } from "../types/index.js";
import { PatternRecognizer, type PatternRule } from "./base.js";

/** Fewest digits in an international number, country code included */
export const MIN_INTERNATIONAL_DIGITS = 8;

export const PHONE_PATTERNS: readonly PatternRule[] = [
  {
    // (555) 123-4567
    name: "phone_parenthesized_area_code",
    regex: /\(\d{3}\)[-.\s]?\d{3}[-.\s]\d{4}\b/,
    score: 0.7,
  },
  {
    // +44 20 7123 4567, +1-555-123-4567
    name: "phone_international_plus",
    regex: /\+\d{1,3}[-\s.]?\(?\d{1,4}\)?[-\s.]?\d{1,4}[-\s.]?\d{1,9}(?!\d)/,
    score: 0.7,
  },
  {
    // 555-123-4567 ext. 89
    name: "phone_with_extension",
    regex:
      /(?:\(\d{3}\)\s?|\b\d{3}[-.\s])?\d{3}[-.\s]\d{4}\s?(?:x|ext\.?|extension)\s?\d{1,5}\b/i,
    score: 0.7,
  },
  {
    // 1-800-FLOWERS
    name: "phone_tollfree_alpha",
    regex: /\b1[-.\s]?(?:800|888|877|866)[-.\s]?[A-Z]{3,7}\b/,
    score: 0.6,
  },
  {
    // 555-1234, 555 123 4567
    name: "phone_seven_digit",
    regex: /(?<![\d(+-])(?:\d{3}[-. ])?\d{3}[-. ]\d{4}(?![\d-])/,
    score: 0.4,
  },
];

export const PHONE_CONTEXT_WORDS: readonly string[] = [
  "phone",
  "telephone",
  "cell",
  "mobile",
  "fax",
  "call",
  "number",
  "contact",
  "cellphone",
  "tel",
  "phone number",
  "tel.",
  "tel:",
  "phone:",
  "mobile:",
  "cell:",
  "fax:",
  "ph",
  "ph.",
  "ph:",
  "mob",
  "mob.",
  "mob:",
];

export class PhoneRecognizer extends PatternRecognizer {
  readonly entityType = PIIType.PHONE_NUMBER;
  readonly name = "PhoneRecognizer";
  protected readonly patterns = PHONE_PATTERNS;
  protected readonly contextWords = PHONE_CONTEXT_WORDS;

  /**
   * Rejects "+" matches that read as signed amounts (+1000, +12.50)
   */
  invalidate(match: string): boolean {
    if (!match.startsWith("+")) {
      return false;
    }
    const digits = match.replace(/\D/g, "").length;
    return digits < MIN_INTERNATIONAL_DIGITS || /\.\d{1,2}$/.test(match);
  }
}

export const phoneRecognizer = new PhoneRecognizer();
