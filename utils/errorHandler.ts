/**
 * Error types and helpers for date formatting and parsing
 */

/**
 * Serialized error structure
 */
export interface SerializedError {
  name?: string;
  message?: string;
  stack?: string;
  [key: string]: unknown;
}

/**
 * A required argument was absent, empty or malformed.
 * Always a caller programming error; thrown before any formatting or parsing work.
 */
export class InvalidArgumentError extends Error {
  code: 'INVALID_ARGUMENT';
  argument: string;

  constructor(message: string, argument: string) {
    super(message);
    this.name = 'InvalidArgumentError';
    this.code = 'INVALID_ARGUMENT';
    this.argument = argument;
  }
}

/**
 * Text did not conform to the pattern it was parsed against
 */
export class DateParseError extends Error {
  code: 'DATE_PARSE_FAILURE';
  text: string;
  pattern: string;
  reason: string | null;
  explanation: string | null;

  constructor(text: string, pattern: string, reason: string | null, explanation: string | null) {
    super(explanation || `Text "${text}" could not be parsed with pattern "${pattern}"`);
    this.name = 'DateParseError';
    this.code = 'DATE_PARSE_FAILURE';
    this.text = text;
    this.pattern = pattern;
    this.reason = reason;
    this.explanation = explanation;
  }
}

export type DateFormatterError = InvalidArgumentError | DateParseError;

/**
 * Check whether a caught value was raised by the formatter
 */
export function isDateFormatterError(error: unknown): error is DateFormatterError {
  return error instanceof InvalidArgumentError || error instanceof DateParseError;
}

/**
 * Serialize an error into a plain object for log metadata
 * @param error - Error to serialize
 * @returns Plain object, the string itself, or null for empty values
 */
export function serializeError(error: unknown): SerializedError | string | null {
  if (!error) {
    return null;
  }

  if (typeof error === 'string') {
    return error;
  }

  if (error instanceof Error) {
    const serialized: SerializedError = {
      name: error.name,
      message: error.message,
      stack: error.stack
    };

    // Own properties carry the error's extra fields (code, text, pattern...)
    Object.getOwnPropertyNames(error).forEach(key => {
      if (!Object.prototype.hasOwnProperty.call(serialized, key)) {
        const value: unknown = Reflect.get(error, key);
        if (typeof value !== 'function') {
          serialized[key] = value;
        }
      }
    });

    return serialized;
  }

  return { message: String(error) };
}
