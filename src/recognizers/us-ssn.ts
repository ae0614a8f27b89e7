/**
 * US Social Security Number Recognizer
 */

import { PIIType } from "../types/index.js";
import { PatternRecognizer, type PatternRule } from "./base.js";

export class UsSsnRecognizer extends PatternRecognizer {
  readonly entityType = PIIType.US_SSN;
  readonly name = "UsSsnRecognizer";
  protected readonly patterns: readonly PatternRule[] = [
    {
      // Same delimiter on both sides: 123-45-6789, 123 45 6789, 123.45.6789
      name: "ssn_delimited",
      regex: /\b\d{3}([-. ])\d{2}\1\d{4}\b/,
      score: 0.5,
    },
  ];
  protected readonly contextWords = ["social", "security", "ssn", "ssns", "ssn#", "ss#", "ssid"];

  /**
   * Area 000, 666 and 9xx, group 00 and serial 0000 are never issued
   */
  invalidate(match: string): boolean {
    const digits = match.replace(/\D/g, "");
    const area = digits.slice(0, 3);
    const group = digits.slice(3, 5);
    const serial = digits.slice(5);

    return (
      area === "000" ||
      area === "666" ||
      area.startsWith("9") ||
      group === "00" ||
      serial === "0000" ||
      /^(\d)\1{8}$/.test(digits)
    );
  }
}

export const usSsnRecognizer = new UsSsnRecognizer();
