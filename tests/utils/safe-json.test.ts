import { jest, describe, it, expect } from '@jest/globals';
import { safeJSONParse, SafeJSONError } from '../../src/utils/safe-json.js';

jest.mock('../../src/logger.js', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

function isRecord(data: unknown): data is Record<string, unknown> {
  return typeof data === 'object' && data !== null && !Array.isArray(data);
}

describe('Safe JSON Utilities', () => {
  describe('safeJSONParse', () => {
    it('should parse valid JSON through the guard', () => {
      expect(safeJSONParse('{"name": "test", "value": 123}', isRecord)).toEqual({ name: 'test', value: 123 });
    });

    it('should block __proto__ in JSON', () => {
      const result = safeJSONParse('{"__proto__": {"polluted": true}, "safe": "value"}', isRecord);

      expect(result).toEqual({ safe: 'value' });
      expect(Object.hasOwn(result, '__proto__')).toBe(false);
      expect(Object.prototype).not.toHaveProperty('polluted');
    });

    it('should block constructor and prototype keys at any depth', () => {
      const result = safeJSONParse(
        '{"level1": {"constructor": {"polluted": true}, "prototype": 1, "safe": "value"}}',
        isRecord
      );

      expect(result).toEqual({ level1: { safe: 'value' } });
    });

    it('should report malformed JSON as a parse failure', () => {
      expect.assertions(2);
      try {
        safeJSONParse('{"broken": ', isRecord);
      } catch (error) {
        expect(error).toBeInstanceOf(SafeJSONError);
        expect(error instanceof SafeJSONError && error.reason).toBe('parse');
      }
    });

    it('should report guard rejection as a validation failure', () => {
      expect.assertions(2);
      try {
        safeJSONParse('[1, 2, 3]', isRecord);
      } catch (error) {
        expect(error).toBeInstanceOf(SafeJSONError);
        expect(error instanceof SafeJSONError && error.reason).toBe('validation');
      }
    });
  });
});
