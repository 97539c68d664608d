/**
 * Date Patterns
 *
 * Format and parse date/time values with a small set of named patterns.
 */

export {
  DateFormatter,
  FormatPattern,
  compilePattern,
  formatDate,
  getPattern,
  parseDate,
  tokenizePattern,
} from './services/date';
export type {
  FormatPatternName,
  OptionalPattern,
  PatternArgument,
  PatternToken,
} from './services/date';
export type { DateTimeValue } from './schemas/dateFormatter.schema';
export {
  DateParseError,
  InvalidArgumentError,
  isDateFormatterError,
  serializeError,
} from './utils/errorHandler';
export type { DateFormatterError, SerializedError } from './utils/errorHandler';
export { config, validateConfig } from './config';
export type { Config } from './config';
