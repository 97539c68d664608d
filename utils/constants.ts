/**
 * Library-wide constants
 * SSOT (Single Source of Truth) for log levels and pattern tokens
 */

/**
 * Winston log levels (lower number = more severe)
 */
export const LOG_LEVELS = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
} as const;

/**
 * Colors used by the console transport, per level
 */
export const LOG_COLORS = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'white',
} as const;

/**
 * Pattern tokens accepted when formatting and parsing.
 * Zone and offset tokens are left out: values carry no offset.
 * Single "E" (a weekday number) and "S" (an unpadded millisecond) are left out
 * because the usual token set reads them as weekday text and a second fraction.
 */
export const SUPPORTED_PATTERN_TOKENS: ReadonlySet<string> = new Set([
  // Year
  'y', 'yy', 'yyyy',
  // Month (format and stand-alone forms)
  'M', 'MM', 'MMM', 'MMMM',
  'L', 'LL', 'LLL', 'LLLL',
  // Day of month
  'd', 'dd',
  // Weekday
  'EEE', 'EEEE',
  // Hour (12-hour and 24-hour clocks)
  'h', 'hh', 'H', 'HH',
  // Minute, second, millisecond
  'm', 'mm', 's', 'ss', 'SSS',
  // AM/PM marker
  'a',
]);

/**
 * Default locale for month names and the AM/PM marker
 */
export const DEFAULT_LOCALE = 'en-US';

/**
 * Valid range of a 12-hour clock field (h, hh)
 */
export const CLOCK_HOUR_RANGE = { min: 1, max: 12 } as const;
