import { describe, it, expect } from 'vitest';
import { phoneRecognizer, PHONE_PATTERNS } from '../../src/recognizers/phone.js';
import { PIIType } from '../../src/types/index.js';

function find(text: string) {
  return phoneRecognizer.analyze(text, [PIIType.PHONE_NUMBER]);
}

describe('Phone Recognizer', () => {
  describe('patterns', () => {
    it('should define the structural phone formats in order', () => {
      expect(PHONE_PATTERNS.map((p) => [p.name, p.score])).toEqual([
        ['phone_parenthesized_area_code', 0.7],
        ['phone_international_plus', 0.7],
        ['phone_with_extension', 0.7],
        ['phone_tollfree_alpha', 0.6],
        ['phone_seven_digit', 0.4],
      ]);
    });
  });

  describe('analyze', () => {
    it('should detect a parenthesized area code', () => {
      const text = 'Office: (555) 123-4567';
      const results = find(text);

      expect(results).toHaveLength(1);
      expect(text.slice(results[0]!.start, results[0]!.end)).toBe('(555) 123-4567');
      expect(results[0]?.explanation['patternName']).toBe('phone_parenthesized_area_code');
      expect(results[0]?.score).toBe(0.7);
    });

    it('should detect international numbers', () => {
      const text = 'London +44 20 7123 4567 or US +1-555-123-4567';
      const results = find(text);

      expect(results.map((r) => text.slice(r.start, r.end))).toEqual([
        '+44 20 7123 4567',
        '+1-555-123-4567',
      ]);
      expect(results.every((r) => r.explanation['patternName'] === 'phone_international_plus')).toBe(true);
    });

    it('should detect numbers with an extension', () => {
      const text = 'Desk 555-123-4567 ext. 89 today';
      const results = find(text);

      expect(results).toHaveLength(1);
      expect(text.slice(results[0]!.start, results[0]!.end)).toBe('555-123-4567 ext. 89');
      expect(results[0]?.explanation['patternName']).toBe('phone_with_extension');
    });

    it('should not treat signed amounts as international numbers', () => {
      expect(find('Price +12.50 each')).toEqual([]);
      expect(find('x +1000 y')).toEqual([]);
    });

    it('should detect space-separated numbers', () => {
      const short = 'Call me at 555 1234';
      const long = 'phone 555 123 4567';

      expect(find(short).map((r) => short.slice(r.start, r.end))).toEqual(['555 1234']);
      expect(find(long).map((r) => long.slice(r.start, r.end))).toEqual(['555 123 4567']);
      expect(find(long)[0]?.score).toBeCloseTo(0.75);
    });

    it('should detect toll-free vanity numbers', () => {
      const text = 'Order at 1-800-FLOWERS today';
      const results = find(text);

      expect(results).toHaveLength(1);
      expect(text.slice(results[0]!.start, results[0]!.end)).toBe('1-800-FLOWERS');
      expect(results[0]?.score).toBe(0.6);
    });

    it('should detect seven-digit numbers at a low score', () => {
      const text = 'Try 555-1234 later';
      const results = find(text);

      expect(results).toHaveLength(1);
      expect(results[0]).toMatchObject({ start: 4, end: 12, score: 0.4 });
      expect(results[0]?.explanation['patternName']).toBe('phone_seven_digit');
    });

    it('should boost a score when a context word is nearby', () => {
      const text = 'Call 555-1234 later';
      const results = find(text);

      expect(results).toHaveLength(1);
      expect(results[0]?.score).toBeCloseTo(0.75);
      expect(results[0]?.explanation['supportiveContextWord']).toBe('call');
      expect(results[0]?.explanation['scoreContextImprovement']).toBe(0.35);
    });

    it('should cap boosted scores at 1.0', () => {
      const results = find('Phone: (555) 123-4567');

      expect(results[0]?.score).toBe(1);
      expect(results[0]?.explanation['scoreContextImprovement']).toBe(0.3);
    });

    it('should match abbreviated context words', () => {
      const results = find('Mob: 555-1234');

      expect(results[0]?.explanation['supportiveContextWord']).toBe('mob');
    });

    it('should not report a shorter rule inside a longer match', () => {
      const results = find('(555) 123-4567');

      expect(results).toHaveLength(1);
      expect(results[0]).toMatchObject({ start: 0, end: 14 });
    });

    it('should not treat long digit runs as phone numbers', () => {
      expect(find('Order 12345678901234 shipped')).toEqual([]);
      expect(find('Card 4111-1111-1111-1111')).toEqual([]);
      expect(find('Card 4111 1111 1111 1111')).toEqual([]);
    });

    it('should not match digits glued to other digits', () => {
      expect(find('Ref 1555-12345')).toEqual([]);
    });
  });
});
