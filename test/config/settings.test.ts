import { describe, it, expect } from 'vitest';
import { loadSettings } from '../../src/config/settings.js';
import { ConfigurationError } from '../../src/errors.js';

describe('loadSettings', () => {
  it('should use defaults for an empty environment', () => {
    expect(loadSettings({})).toEqual({
      defaultEntities: null,
      scoreThreshold: 0.35,
      maxDepth: 100,
      logLevel: 'info',
    });
  });

  it('should parse every variable', () => {
    const settings = loadSettings({
      ANONYMIZER_DEFAULT_ENTITIES: 'person, email_address,,PHONE_NUMBER',
      ANONYMIZER_SCORE_THRESHOLD: '0.6',
      ANONYMIZER_MAX_DEPTH: '20',
      ANONYMIZER_LOG_LEVEL: ' DEBUG ',
    });

    expect(settings).toEqual({
      defaultEntities: ['PERSON', 'EMAIL_ADDRESS', 'PHONE_NUMBER'],
      scoreThreshold: 0.6,
      maxDepth: 20,
      logLevel: 'debug',
    });
  });

  it('should treat blank variables as unset', () => {
    const settings = loadSettings({
      ANONYMIZER_SCORE_THRESHOLD: '  ',
      ANONYMIZER_DEFAULT_ENTITIES: '',
    });

    expect(settings.scoreThreshold).toBe(0.35);
    expect(settings.defaultEntities).toBeNull();
  });

  it('should ignore unrelated variables', () => {
    expect(loadSettings({ HOME: '/home/test', LOG_LEVEL: 'nope' }).logLevel).toBe('info');
  });

  it('should map a list of only separators to all entities', () => {
    expect(loadSettings({ ANONYMIZER_DEFAULT_ENTITIES: ' , ,' }).defaultEntities).toBeNull();
  });

  it.each([
    ['ANONYMIZER_SCORE_THRESHOLD', '1.5'],
    ['ANONYMIZER_SCORE_THRESHOLD', 'high'],
    ['ANONYMIZER_MAX_DEPTH', '0'],
    ['ANONYMIZER_MAX_DEPTH', '2.5'],
    ['ANONYMIZER_LOG_LEVEL', 'verbose'],
  ])('should reject %s=%s', (name, value) => {
    expect(() => loadSettings({ [name]: value })).toThrow(ConfigurationError);
  });

  it('should name the failing variable', () => {
    expect(() => loadSettings({ ANONYMIZER_MAX_DEPTH: '0' })).toThrow(
      /^Invalid settings: ANONYMIZER_MAX_DEPTH: /
    );
  });
});
