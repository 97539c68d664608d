/**
 * Date Formatter
 *
 * Formats and parses date/time values with a default pattern, a named
 * pattern or a caller-supplied pattern. Rendering and reading are done by Luxon.
 *
 * Usage:
 *   import { formatDate, parseDate, FormatPattern } from './services/date';
 *
 *   formatDate(DateTime.local(2017, 4, 19, 9, 5));          // "Apr 19 2017 09:05"
 *   formatDate(value, FormatPattern.DATEONLY);              // "04-19-2017"
 *   parseDate('04-19-2017', FormatPattern.DATEONLY);        // 2017-04-19T00:00
 */

import { DateTime, Info, type LocaleOptions } from 'luxon';
import type { ZodType } from 'zod';
import { config } from '../../config';
import logger from '../../utils/logger';
import { DateParseError, InvalidArgumentError, serializeError } from '../../utils/errorHandler';
import { dateTextSchema, dateTimeValueSchema, patternSchema, type DateTimeValue } from '../../schemas/dateFormatter.schema';
import { CLOCK_HOUR_RANGE } from '../../utils/constants';
import { FormatPattern, tokenizePattern, type PatternToken } from './formatPatterns';

/**
 * A named pattern or any literal pattern string
 */
export type PatternArgument = FormatPattern | string;

/**
 * Optional trailing pattern argument. Leaving it out selects the default pattern;
 * passing null or undefined is an unset pattern and is rejected.
 */
export type OptionalPattern = [] | [pattern: PatternArgument | null | undefined];

function validateArgument<T>(schema: ZodType<T>, value: unknown, argument: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const message = result.error.issues[0]?.message || `Invalid ${argument}`;
    throw new InvalidArgumentError(message, argument);
  }
  return result.data;
}

interface ResolvedPattern {
  pattern: string;
  tokens: PatternToken[];
}

function resolvePattern(pattern: OptionalPattern): ResolvedPattern {
  const candidate = pattern.length === 0 ? FormatPattern.DEFAULT : pattern[0];
  const resolved = validateArgument(patternSchema, candidate, 'pattern');
  return { pattern: resolved, tokens: tokenizePattern(resolved) };
}

// Gregorian calendar and Latin digits, whatever the caller's DateTime carries
function localeOptions(): LocaleOptions {
  return {
    locale: config.formatting.locale,
    numberingSystem: 'latn',
    outputCalendar: 'gregory',
  };
}

function failParse(error: DateParseError): never {
  logger.debug('Date parse failed', { error: serializeError(error) });
  throw error;
}

/**
 * Re-read the 12-hour clock field exactly as written.
 * The engine takes any hour 0-23 for h/hh and only adjusts 1-12 by the AM/PM
 * marker, so the written value is recovered by reading it as a 24-hour field,
 * with the marker pinned to the one the first pass resolved.
 * @returns The written hour, or null when the text only matched through the adjustment
 */
function readWrittenClockHour(input: string, tokens: PatternToken[], parsed: DateTime): number | null {
  const [am, pm] = Info.meridiems({ locale: config.formatting.locale });
  const marker = parsed.hour < 12 ? am : pm;

  const pattern = tokens.map((token) => {
    if (token.kind !== 'field') return token.text;
    if (token.text === 'h' || token.text === 'hh') return token.text.toUpperCase();
    if (token.text === 'a') return `'${marker}'`;
    return token.text;
  }).join('');

  const reread = DateTime.fromFormat(input, pattern, { zone: 'utc', ...localeOptions() });
  return reread.isValid ? reread.hour : null;
}

function toDateTime(value: DateTimeValue): DateTime {
  return value instanceof Date ? DateTime.fromJSDate(value) : value;
}

/**
 * Format a date/time value.
 * Only the value's wall-clock fields are rendered; its zone is not converted.
 * @param value - Date or Luxon DateTime
 * @param pattern - Named or literal pattern; defaults to FormatPattern.DEFAULT when omitted
 * @throws {InvalidArgumentError} If the value is absent or invalid, or the pattern is absent, empty or malformed
 */
export function formatDate(value: DateTimeValue | null | undefined, ...pattern: OptionalPattern): string {
  const dateTime = toDateTime(validateArgument(dateTimeValueSchema, value, 'value'));
  const { pattern: resolved } = resolvePattern(pattern);

  return dateTime.reconfigure(localeOptions()).toFormat(resolved);
}

/**
 * Parse text into a date/time value.
 * The whole text must match the pattern. Fields the pattern leaves out take
 * their defaults (midnight, first day, January). The result is placed in UTC
 * so that daylight-saving transitions cannot shift its wall-clock fields.
 * Month names, weekday names and the AM/PM marker match in any letter case.
 * A 12-hour field (h, hh) must hold 1-12.
 * @param text - Text to parse
 * @param pattern - Named or literal pattern; defaults to FormatPattern.DEFAULT when omitted
 * @throws {InvalidArgumentError} If the text is absent or empty, or the pattern is absent, empty or malformed
 * @throws {DateParseError} If the text does not conform to the pattern
 */
export function parseDate(text: string | null | undefined, ...pattern: OptionalPattern): DateTime {
  const input = validateArgument(dateTextSchema, text, 'text');
  const { pattern: resolved, tokens } = resolvePattern(pattern);

  const parsed = DateTime.fromFormat(input, resolved, { zone: 'utc', ...localeOptions() });

  if (!parsed.isValid) {
    return failParse(new DateParseError(input, resolved, parsed.invalidReason, parsed.invalidExplanation));
  }

  const hasClockHour = tokens.some((token) => token.kind === 'field' && token.text.startsWith('h'));
  if (hasClockHour) {
    const written = readWrittenClockHour(input, tokens, parsed);
    if (written === null || written < CLOCK_HOUR_RANGE.min || written > CLOCK_HOUR_RANGE.max) {
      const shown = written === null ? 'the written hour' : `${written}`;
      return failParse(new DateParseError(
        input,
        resolved,
        'unit out of range',
        `you specified ${shown} as a 12-hour clock hour, which must be ${CLOCK_HOUR_RANGE.min}-${CLOCK_HOUR_RANGE.max}`
      ));
    }
  }

  return parsed;
}

/**
 * Process-wide formatter façade over formatDate and parseDate.
 * Holds no state of its own.
 */
export class DateFormatter {
  private static instance: DateFormatter | null = null;

  private constructor() {}

  /**
   * Get the single process-wide instance, creating it on first call
   */
  public static getInstance(): DateFormatter {
    if (!DateFormatter.instance) {
      DateFormatter.instance = new DateFormatter();
      logger.debug('DateFormatter instance created', { locale: config.formatting.locale });
    }

    return DateFormatter.instance;
  }

  public format(value: DateTimeValue | null | undefined, ...pattern: OptionalPattern): string {
    return formatDate(value, ...pattern);
  }

  public parse(text: string | null | undefined, ...pattern: OptionalPattern): DateTime {
    return parseDate(text, ...pattern);
  }
}

export default DateFormatter;
