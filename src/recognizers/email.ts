/**
 * Email Recognizer
 */

import { PIIType } from "../types/index.js";
import { PatternRecognizer, type PatternRule } from "./base.js";

export class EmailRecognizer extends PatternRecognizer {
  readonly entityType = PIIType.EMAIL_ADDRESS;
  readonly name = "EmailRecognizer";
  protected readonly patterns: readonly PatternRule[] = [
    {
      name: "email_address",
      regex: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?(?:\.[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?)*\.[A-Za-z]{2,}\b/,
      score: 0.95,
    },
  ];
  protected readonly contextWords = ["email", "e-mail", "mail", "contact"];
}

export const emailRecognizer = new EmailRecognizer();
