import { InvalidArgumentError } from '../../utils/errorHandler';
import { SUPPORTED_PATTERN_TOKENS } from '../../utils/constants';

/**
 * Named format patterns
 */
export const FormatPattern = {
  DEFAULT: 'MMM d yyyy hh:mm',
  DATEONLY: 'MM-dd-yyyy',
  LONGDATE: 'MM dd yyyy hh:mm:ss a',
} as const;

export type FormatPatternName = keyof typeof FormatPattern;
export type FormatPattern = (typeof FormatPattern)[FormatPatternName];

/**
 * One piece of a pattern: a field token ("yyyy"), a quoted literal ("'at'")
 * or a run of plain literal characters ("-", ", ")
 */
export interface PatternToken {
  kind: 'field' | 'quoted' | 'literal';
  text: string;
}

/**
 * Get the pattern string for a named pattern
 */
export function getPattern(name: FormatPatternName): FormatPattern {
  return FormatPattern[name];
}

/**
 * Split a pattern into tokens. Joining the tokens' text gives the pattern back.
 * @throws {InvalidArgumentError} On an unsupported token or an unterminated quoted literal
 */
export function tokenizePattern(pattern: string): PatternToken[] {
  const tokens: PatternToken[] = [];
  let index = 0;

  while (index < pattern.length) {
    const char = pattern[index];

    if (char === "'") {
      const closing = pattern.indexOf("'", index + 1);
      if (closing === -1) {
        throw new InvalidArgumentError(
          `Pattern "${pattern}" ends with an unterminated quoted literal`,
          'pattern'
        );
      }
      tokens.push({ kind: 'quoted', text: pattern.slice(index, closing + 1) });
      index = closing + 1;
      continue;
    }

    if (!/[A-Za-z]/.test(char)) {
      let end = index + 1;
      while (end < pattern.length && pattern[end] !== "'" && !/[A-Za-z]/.test(pattern[end])) {
        end += 1;
      }
      tokens.push({ kind: 'literal', text: pattern.slice(index, end) });
      index = end;
      continue;
    }

    // Runs of the same letter form one token ("yyyy", "MMM")
    let end = index + 1;
    while (end < pattern.length && pattern[end] === char) {
      end += 1;
    }

    const token = pattern.slice(index, end);
    if (!SUPPORTED_PATTERN_TOKENS.has(token)) {
      throw new InvalidArgumentError(
        `Unknown pattern token "${token}" at position ${index} in "${pattern}"`,
        'pattern'
      );
    }
    tokens.push({ kind: 'field', text: token });
    index = end;
  }

  return tokens;
}

/**
 * Check a pattern's tokens before it reaches the formatting engine.
 * The engine echoes letters it does not know as literal text; here they are rejected instead.
 * @param pattern - Non-empty pattern string
 * @throws {InvalidArgumentError} On an unsupported token or an unterminated quoted literal
 */
export function compilePattern(pattern: string): string {
  tokenizePattern(pattern);
  return pattern;
}
