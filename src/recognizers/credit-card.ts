/**
 * Credit Card Recognizer
 * Low base score; a passing Luhn check raises it to 1.0
 */

import { PIIType } from "../types/index.js";
import { validateLuhn } from "../utils/luhn.js";
import { PatternRecognizer, type PatternRule } from "./base.js";

export class CreditCardRecognizer extends PatternRecognizer {
  readonly entityType = PIIType.CREDIT_CARD;
  readonly name = "CreditCardRecognizer";
  protected readonly patterns: readonly PatternRule[] = [
    {
      name: "credit_card_all_issuers",
      regex: /\b(?:4\d{3}|5[0-5]\d{2}|6\d{3}|3\d{3}|1\d{3})[- ]?\d{3,4}[- ]?\d{3,4}[- ]?\d{3,5}\b/,
      score: 0.3,
    },
  ];
  protected readonly contextWords = [
    "credit",
    "card",
    "visa",
    "mastercard",
    "amex",
    "discover",
    "cc",
    "payment",
  ];

  validate(match: string): boolean {
    return validateLuhn(match);
  }
}

export const creditCardRecognizer = new CreditCardRecognizer();
