import { describe, it, expect } from 'vitest';
import { webcrypto } from 'node:crypto';
import {
  annotateText,
  applyOperator,
  parseOperatorSpec,
  resolveTextConflicts,
} from '../../src/pipeline/operators.js';
import { TokenCache } from '../../src/pipeline/token-cache.js';
import { base64ToUint8Array } from '../../src/crypto/value-crypto.js';
import {
  InvalidOperatorError,
  InvalidOperatorParamsError,
  MissingKeyError,
} from '../../src/errors.js';
import type { Finding } from '../../src/types/index.js';

const KEY = 'test-secret-key!';

function finding(entityType: string, text: string, source: string, score = 0.9): Finding {
  const start = source.indexOf(text);
  return { entityType, text, start, end: start + text.length, score };
}

function span(entityType: string, source: string, start: number, end: number, score = 0.9): Finding {
  return { entityType, text: source.slice(start, end), start, end, score };
}

async function decrypt(encoded: string, key: string): Promise<string> {
  const bytes = base64ToUint8Array(encoded);
  const cryptoKey = await webcrypto.subtle.importKey(
    'raw',
    new TextEncoder().encode(key),
    { name: 'AES-CBC' },
    false,
    ['decrypt']
  );
  const plain = await webcrypto.subtle.decrypt(
    { name: 'AES-CBC', iv: bytes.slice(0, 16) },
    cryptoKey,
    bytes.slice(16)
  );
  return new TextDecoder().decode(plain);
}

const SSN_TEXT = 'My SSN is 123-45-6789';
const ssn = () => [finding('US_SSN', '123-45-6789', SSN_TEXT)];

describe('parseOperatorSpec', () => {
  it('should fill in mask defaults', () => {
    expect(parseOperatorSpec({ kind: 'mask' })).toEqual({
      kind: 'mask',
      maskChar: '*',
      numberOfChars: 15,
    });
  });

  it('should reject unknown operators', () => {
    expect(() => parseOperatorSpec({ kind: 'shout' })).toThrow(InvalidOperatorError);
    expect(() => parseOperatorSpec({ kind: 'shout' })).toThrow(
      'Invalid operator "shout". Must be one of: redact, replace, mask, hash, encrypt, highlight'
    );
    expect(() => parseOperatorSpec('replace')).toThrow(InvalidOperatorError);
  });

  it('should require a key for encrypt', () => {
    expect(() => parseOperatorSpec({ kind: 'encrypt' })).toThrow(MissingKeyError);
    expect(() => parseOperatorSpec({ kind: 'encrypt', key: '' })).toThrow(MissingKeyError);
  });

  it('should reject keys of the wrong length', () => {
    expect(() => parseOperatorSpec({ kind: 'encrypt', key: 'short' })).toThrow(
      'Encryption key must be 16, 24 or 32 bytes, got 5'
    );
  });

  it('should accept raw key bytes', () => {
    const key = new Uint8Array(32).fill(7);

    expect(parseOperatorSpec({ kind: 'encrypt', key })).toEqual({ kind: 'encrypt', key });
  });

  it('should reject bad mask parameters', () => {
    expect(() => parseOperatorSpec({ kind: 'mask', maskChar: '**' })).toThrow(
      'Invalid mask operator parameters: maskChar: maskChar must be a single character'
    );
    expect(() => parseOperatorSpec({ kind: 'mask', numberOfChars: -1 })).toThrow(
      InvalidOperatorParamsError
    );
    expect(() => parseOperatorSpec({ kind: 'mask', numberOfChars: 2.5 })).toThrow(
      InvalidOperatorParamsError
    );
  });
});

describe('applyOperator', () => {
  it('should redact findings', async () => {
    expect(await applyOperator(SSN_TEXT, ssn(), { kind: 'redact' }, new TokenCache())).toBe(
      'My SSN is '
    );
  });

  it('should mask with a fixed-length mask', async () => {
    expect(await applyOperator(SSN_TEXT, ssn(), { kind: 'mask' }, new TokenCache())).toBe(
      'My SSN is ***************'
    );
  });

  it('should mask with custom parameters', async () => {
    const spec = { kind: 'mask', maskChar: '#', numberOfChars: 4 };
    expect(await applyOperator(SSN_TEXT, ssn(), spec, new TokenCache())).toBe('My SSN is ####');
  });

  it('should accept a single non-BMP mask character', async () => {
    const spec = { kind: 'mask', maskChar: '🔒', numberOfChars: 3 };
    expect(await applyOperator(SSN_TEXT, ssn(), spec, new TokenCache())).toBe('My SSN is 🔒🔒🔒');
  });

  it('should replace repeated values with the same token', async () => {
    const text = 'Alice Johnson met Bob Smith and Alice Johnson';
    const findings = [
      span('PERSON', text, 0, 13),
      span('PERSON', text, 18, 27),
      span('PERSON', text, 32, 45),
    ];

    expect(await applyOperator(text, findings, { kind: 'replace' }, new TokenCache())).toBe(
      '<PERSON_1> met <PERSON_2> and <PERSON_1>'
    );
  });

  it('should continue numbering from a shared cache', async () => {
    const cache = new TokenCache();
    cache.tokenFor('PERSON', 'Alice Johnson');
    const text = 'Hi Bob Smith';

    expect(
      await applyOperator(text, [finding('PERSON', 'Bob Smith', text)], { kind: 'replace' }, cache)
    ).toBe('Hi <PERSON_2>');
  });

  it('should hash findings', async () => {
    const text = 'Call 555-1234';
    expect(
      await applyOperator(text, [finding('PHONE_NUMBER', '555-1234', text)], { kind: 'hash' }, new TokenCache())
    ).toBe('Call <PHONE_NUMBER_24886b1e>');
  });

  it('should encrypt findings so the key holder can decrypt them', async () => {
    const text = 'Hi Bob Smith';
    const findings = [finding('PERSON', 'Bob Smith', text)];

    const result = await applyOperator(text, findings, { kind: 'encrypt', key: KEY }, new TokenCache());

    expect(result.startsWith('Hi ')).toBe(true);
    expect(await decrypt(result.slice(3), KEY)).toBe('Bob Smith');
  });

  it('should use a fresh IV for every encryption', async () => {
    const text = 'Bob Smith';
    const findings = [finding('PERSON', 'Bob Smith', text)];

    const first = await applyOperator(text, findings, { kind: 'encrypt', key: KEY }, new TokenCache());
    const second = await applyOperator(text, findings, { kind: 'encrypt', key: KEY }, new TokenCache());

    expect(first).not.toBe(second);
  });

  it('should leave text unchanged for highlight', async () => {
    expect(await applyOperator(SSN_TEXT, ssn(), { kind: 'highlight' }, new TokenCache())).toBe(
      SSN_TEXT
    );
  });

  it('should leave text unchanged without findings', async () => {
    expect(await applyOperator(SSN_TEXT, [], { kind: 'redact' }, new TokenCache())).toBe(SSN_TEXT);
  });

  it('should validate the spec even without findings', async () => {
    await expect(applyOperator('x', [], { kind: 'encrypt' }, new TokenCache())).rejects.toThrow(
      MissingKeyError
    );
  });

  it('should splice overlapping findings without corrupting text', async () => {
    const text = 'abcdefghij';
    const findings = [span('PERSON', text, 0, 5), span('LOCATION', text, 3, 8)];

    expect(await applyOperator(text, findings, { kind: 'replace' }, new TokenCache())).toBe(
      '<PERSON_1><LOCATION_1>ij'
    );
  });
});

describe('resolveTextConflicts', () => {
  const text = 'abcdefghij';

  it('should keep the higher score of identical spans', () => {
    const resolved = resolveTextConflicts(text, [
      span('PERSON', text, 0, 4, 0.6),
      span('DATE_TIME', text, 0, 4, 0.7),
    ]);

    expect(resolved).toEqual([span('DATE_TIME', text, 0, 4, 0.7)]);
  });

  it('should drop contained spans', () => {
    const resolved = resolveTextConflicts(text, [
      span('PERSON', text, 2, 4),
      span('LOCATION', text, 0, 8),
    ]);

    expect(resolved).toEqual([span('LOCATION', text, 0, 8)]);
  });

  it('should trim partial overlaps', () => {
    const resolved = resolveTextConflicts(text, [
      span('PERSON', text, 0, 5),
      span('LOCATION', text, 3, 8),
    ]);

    expect(resolved).toEqual([span('PERSON', text, 0, 5), span('LOCATION', text, 5, 8)]);
    expect(resolved[1]?.text).toBe('fgh');
  });
});

describe('annotateText', () => {
  it('should split text into plain and PII segments', () => {
    const text = 'Hi Bob Smith!';

    expect(annotateText(text, [finding('PERSON', 'Bob Smith', text)])).toEqual([
      { text: 'Hi ', entityType: null, start: 0, end: 3 },
      { text: 'Bob Smith', entityType: 'PERSON', start: 3, end: 12 },
      { text: '!', entityType: null, start: 12, end: 13 },
    ]);
  });

  it('should return one plain segment without findings', () => {
    expect(annotateText('plain', [])).toEqual([
      { text: 'plain', entityType: null, start: 0, end: 5 },
    ]);
  });

  it('should return nothing for empty text', () => {
    expect(annotateText('', [])).toEqual([]);
  });
});
