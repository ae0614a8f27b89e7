import { describe, it, expect } from 'vitest';
import { validateLuhn } from '../../src/utils/luhn.js';
import { validateIBAN, normalizeIBAN } from '../../src/utils/iban-checksum.js';

describe('validateLuhn', () => {
  it('should accept valid card numbers', () => {
    expect(validateLuhn('4111111111111111')).toBe(true);
    expect(validateLuhn('5500000000000004')).toBe(true);
    expect(validateLuhn('378282246310005')).toBe(true);
  });

  it('should ignore spaces and dashes', () => {
    expect(validateLuhn('4111 1111 1111 1111')).toBe(true);
    expect(validateLuhn('4111-1111-1111-1111')).toBe(true);
  });

  it('should reject a wrong check digit', () => {
    expect(validateLuhn('4111111111111112')).toBe(false);
  });

  it('should reject non-digit input', () => {
    expect(validateLuhn('4111a11111111111')).toBe(false);
    expect(validateLuhn('')).toBe(false);
  });
});

describe('normalizeIBAN', () => {
  it('should strip spaces and upper-case', () => {
    expect(normalizeIBAN('de89 3704 0044 0532 0130 00')).toBe('DE89370400440532013000');
  });
});

describe('validateIBAN', () => {
  it('should accept valid IBANs', () => {
    expect(validateIBAN('DE89370400440532013000')).toBe(true);
    expect(validateIBAN('GB82WEST12345698765432')).toBe(true);
    expect(validateIBAN('DE89 3704 0044 0532 0130 00')).toBe(true);
  });

  it('should reject a wrong check number', () => {
    expect(validateIBAN('DE88370400440532013000')).toBe(false);
  });

  it('should reject malformed input', () => {
    expect(validateIBAN('DE89')).toBe(false);
    expect(validateIBAN('1234370400440532013000')).toBe(false);
  });
});
