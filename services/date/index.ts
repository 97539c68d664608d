export { DateFormatter, formatDate, parseDate } from './dateFormatter';
export type { OptionalPattern, PatternArgument } from './dateFormatter';
export { FormatPattern, compilePattern, getPattern, tokenizePattern } from './formatPatterns';
export type { FormatPatternName, PatternToken } from './formatPatterns';
