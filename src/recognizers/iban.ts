/**
 * IBAN Recognizer
 * Compact or space-grouped IBANs, validated by mod-97
 */

import { PIIType } from "../types/index.js";
import { validateIBAN } from "../utils/iban-checksum.js";
import { PatternRecognizer, type PatternRule } from "./base.js";

export class IBANRecognizer extends PatternRecognizer {
  readonly entityType = PIIType.IBAN;
  readonly name = "IbanRecognizer";
  protected readonly patterns: readonly PatternRule[] = [
    {
      name: "iban_generic",
      regex: /\b[A-Z]{2}\d{2}(?:[ ]?[A-Z0-9]{4}){2,7}(?:[ ]?[A-Z0-9]{1,4})?\b/,
      score: 0.5,
    },
  ];
  protected readonly contextWords = ["iban", "bank", "account", "transaction"];

  validate(match: string): boolean {
    return validateIBAN(match);
  }
}

export const ibanRecognizer = new IBANRecognizer();
