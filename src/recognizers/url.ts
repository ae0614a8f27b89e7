/**
 * URL Recognizer
 * Detects http(s), ftp and www. URLs; trailing punctuation is never part of a match
 */

import { PIIType } from "../types/index.js";
import { PatternRecognizer, type PatternRule } from "./base.js";

/**
 * Extracts the host from a URL match
 */
export function extractDomain(url: string): string {
  const withoutScheme = url.replace(/^[a-z]+:\/\//i, "");
  return (withoutScheme.split(/[/?#:]/)[0] ?? "").toLowerCase();
}

export class UrlRecognizer extends PatternRecognizer {
  readonly entityType = PIIType.URL;
  readonly name = "UrlRecognizer";
  protected readonly patterns: readonly PatternRule[] = [
    {
      name: "url_with_scheme",
      regex: /\b(?:https?|ftp):\/\/[^\s<>"'()]*[^\s<>"'().,;:!?]/i,
      score: 0.5,
    },
    {
      name: "url_www",
      regex: /\bwww\.[^\s<>"'()]*[^\s<>"'().,;:!?]/i,
      score: 0.5,
    },
  ];
  protected readonly contextWords = ["url", "website", "link", "site", "visit"];

  /**
   * Rejects hosts without a dotted name ending in a TLD of two or more
   * letters, unless the host is an IPv4 address
   */
  invalidate(match: string): boolean {
    const host = extractDomain(match);
    if (/^\d{1,3}(?:\.\d{1,3}){3}$/.test(host)) {
      return false;
    }
    const labels = host.split(".");
    const tld = labels[labels.length - 1] ?? "";
    return labels.length < 2 || !/^[a-z]{2,}$/.test(tld);
  }
}

export const urlRecognizer = new UrlRecognizer();
