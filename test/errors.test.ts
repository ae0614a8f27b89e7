import { describe, it, expect } from 'vitest';
import {
  AnonymizationError,
  ConfigurationError,
  DepthExceededError,
  DetectionEngineError,
  InvalidOperatorError,
  MissingKeyError,
  RegistryFrozenError,
  UnsupportedTypeError,
  getErrorMessage,
  isClientError,
} from '../src/errors.js';

describe('errors', () => {
  it('should carry a stable code and the class name', () => {
    const error = new UnsupportedTypeError('Date', '$.when');

    expect(error).toBeInstanceOf(AnonymizationError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('UNSUPPORTED_TYPE');
    expect(error.name).toBe('UnsupportedTypeError');
    expect(error.message).toBe('Unsupported value of type Date at $.when');
  });

  it('should list supported operators', () => {
    const error = new InvalidOperatorError('shout', ['redact', 'mask']);

    expect(error.message).toBe('Invalid operator "shout". Must be one of: redact, mask');
    expect(error.supported).toEqual(['redact', 'mask']);
  });

  it('should keep the cause of engine failures', () => {
    const cause = new Error('model offline');
    const error = new DetectionEngineError('Recognizer Ner failed: model offline', { cause });

    expect(error.cause).toBe(cause);
  });

  describe('isClientError', () => {
    it('should flag caller-input faults', () => {
      expect(isClientError(new MissingKeyError())).toBe(true);
      expect(isClientError(new DepthExceededError(100, '$.a'))).toBe(true);
      expect(isClientError(new ConfigurationError('bad'))).toBe(true);
    });

    it('should not flag engine faults or foreign errors', () => {
      expect(isClientError(new DetectionEngineError('down'))).toBe(false);
      expect(isClientError(new RegistryFrozenError())).toBe(false);
      expect(isClientError(new TypeError('x'))).toBe(false);
    });
  });

  describe('getErrorMessage', () => {
    it('should read messages from errors and other values', () => {
      expect(getErrorMessage(new Error('boom'))).toBe('boom');
      expect(getErrorMessage('plain')).toBe('plain');
      expect(getErrorMessage(42)).toBe('42');
    });
  });
});
