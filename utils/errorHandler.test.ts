/**
 * Error Handler Tests
 * Unit tests for formatter error types and helpers
 */

import {
  DateParseError,
  InvalidArgumentError,
  isDateFormatterError,
  serializeError
} from './errorHandler';

describe('errorHandler', () => {
  describe('InvalidArgumentError', () => {
    it('should carry the argument name and code', () => {
      const error = new InvalidArgumentError('Pattern provided should not be empty', 'pattern');

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('InvalidArgumentError');
      expect(error.code).toBe('INVALID_ARGUMENT');
      expect(error.argument).toBe('pattern');
      expect(error.message).toBe('Pattern provided should not be empty');
    });
  });

  describe('DateParseError', () => {
    it('should use the explanation as its message', () => {
      const error = new DateParseError('13-45-2020', 'MM-dd-yyyy', 'unit out of range', 'month 13 is invalid');

      expect(error.name).toBe('DateParseError');
      expect(error.code).toBe('DATE_PARSE_FAILURE');
      expect(error.message).toBe('month 13 is invalid');
    });

    it('should build a message when there is no explanation', () => {
      const error = new DateParseError('nope', 'MM-dd-yyyy', null, null);

      expect(error.message).toBe('Text "nope" could not be parsed with pattern "MM-dd-yyyy"');
      expect(error.reason).toBeNull();
    });
  });

  describe('isDateFormatterError', () => {
    it('should recognize both error kinds', () => {
      expect(isDateFormatterError(new InvalidArgumentError('bad', 'text'))).toBe(true);
      expect(isDateFormatterError(new DateParseError('x', 'MM', null, null))).toBe(true);
    });

    it('should reject other values', () => {
      expect(isDateFormatterError(new Error('other'))).toBe(false);
      expect(isDateFormatterError('error')).toBe(false);
      expect(isDateFormatterError(null)).toBe(false);
    });
  });

  describe('serializeError', () => {
    it('should return null for empty values', () => {
      expect(serializeError(null)).toBeNull();
      expect(serializeError(undefined)).toBeNull();
    });

    it('should return strings as-is', () => {
      expect(serializeError('boom')).toBe('boom');
    });

    it('should copy error fields', () => {
      const error = new DateParseError('2017/04/19', 'MM-dd-yyyy', 'unparsable', 'cannot parse');

      expect(serializeError(error)).toMatchObject({
        name: 'DateParseError',
        message: 'cannot parse',
        code: 'DATE_PARSE_FAILURE',
        text: '2017/04/19',
        pattern: 'MM-dd-yyyy',
        reason: 'unparsable',
        explanation: 'cannot parse'
      });
    });

    it('should wrap other values in a message', () => {
      expect(serializeError(42)).toEqual({ message: '42' });
    });
  });
});
