/**
 * IBAN Checksum
 * ISO 13616 mod-97 validation
 */

/**
 * Strips spaces and upper-cases an IBAN
 */
export function normalizeIBAN(iban: string): string {
  return iban.replace(/\s+/g, "").toUpperCase();
}

/**
 * Validates an IBAN's structure and mod-97 check digits
 */
export function validateIBAN(iban: string): boolean {
  const normalized = normalizeIBAN(iban);
  if (!/^[A-Z]{2}\d{2}[A-Z0-9]{11,30}$/.test(normalized)) {
    return false;
  }

  const rearranged = normalized.slice(4) + normalized.slice(0, 4);

  // Letters expand to two digits (A = 10 ... Z = 35); fold piecewise to stay
  // within safe integer range
  let remainder = 0;
  for (const char of rearranged) {
    const code = char.charCodeAt(0);
    const chunk = code >= 65 ? String(code - 55) : char;
    for (const digit of chunk) {
      remainder = (remainder * 10 + (digit.charCodeAt(0) - 48)) % 97;
    }
  }

  return remainder === 1;
}
