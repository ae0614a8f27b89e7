/**
 * IP Address Recognizer
 * Dotted IPv4 and full-form IPv6
 */

import { PIIType } from "../types/index.js";
import { PatternRecognizer, type PatternRule } from "./base.js";

const OCTET = "(?:25[0-5]|2[0-4]\\d|1\\d\\d|[1-9]?\\d)";

export class IpAddressRecognizer extends PatternRecognizer {
  readonly entityType = PIIType.IP_ADDRESS;
  readonly name = "IpRecognizer";
  protected readonly patterns: readonly PatternRule[] = [
    {
      name: "ipv4",
      regex: new RegExp(`\\b(?:${OCTET}\\.){3}${OCTET}\\b`),
      score: 0.6,
    },
    {
      name: "ipv6",
      regex: /\b(?:[0-9A-Fa-f]{1,4}:){7}[0-9A-Fa-f]{1,4}\b/,
      score: 0.6,
    },
  ];
  protected readonly contextWords = ["ip", "ipv4", "ipv6", "address", "host"];
}

export const ipAddressRecognizer = new IpAddressRecognizer();
