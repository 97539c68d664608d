import { z } from 'zod';
import { DateTime } from 'luxon';

/**
 * Schema for a pattern argument (named or literal)
 */
export const patternSchema = z.string({
  required_error: 'Pattern provided should not be null',
  invalid_type_error: 'Pattern provided should be a string',
}).min(1, 'Pattern provided should not be empty');

/**
 * Schema for the text handed to parse
 */
export const dateTextSchema = z.string({
  required_error: 'DateTime string provided should not be null',
  invalid_type_error: 'DateTime string provided should be a string',
}).min(1, 'DateTime string provided should not be empty');

/**
 * Schema for a value to format: a valid Date or a valid Luxon DateTime
 */
export const dateTimeValueSchema = z.union([
  z.instanceof(Date).refine(
    (date) => !Number.isNaN(date.getTime()),
    'Date provided is an invalid date'
  ),
  z.custom<DateTime>(
    (value) => DateTime.isDateTime(value),
    'Date provided should be a Date or a DateTime'
  ).refine(
    (dateTime) => dateTime.isValid,
    'DateTime provided is invalid'
  ),
], {
  errorMap: (issue, ctx) => ctx.data == null
    ? { message: 'Date provided should not be null' }
    : { message: issue.code === 'invalid_union' ? 'Date provided should be a Date or a DateTime' : ctx.defaultError },
});

export type DateTimeValue = z.infer<typeof dateTimeValueSchema>;
