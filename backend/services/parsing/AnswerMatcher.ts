/**
 * Resolves a raw answer token ("④", "4", "④ DDP") to the exact option string it names.
 */

import { createLogger } from '../../utils/LoggerUtils.js';

const logger = createLogger('ANSWER MATCH');

export const CIRCLED_DIGITS: Record<string, string> = {
  '1': '①', '2': '②', '3': '③', '4': '④', '5': '⑤',
  '6': '⑥', '7': '⑦', '8': '⑧', '9': '⑨', '10': '⑩'
};

export const CIRCLED_DIGIT_SET: ReadonlySet<string> = new Set(Object.values(CIRCLED_DIGITS));

function matchExactOrPrefix(token: string, options: readonly string[]): string {
  if (options.includes(token)) {
    return token;
  }
  return options.find(option => option.trim().startsWith(token)) ?? '';
}

/**
 * Returns the matching element of `options`, or '' when nothing matches.
 */
export function matchAnswerToOption(rawAnswer: string, options: readonly string[]): string {
  const token = rawAnswer.trim();
  if (!token) {
    return '';
  }

  const direct = matchExactOrPrefix(token, options);
  if (direct) {
    return direct;
  }

  const digits = token.match(/\d+/);
  const glyph = digits ? CIRCLED_DIGITS[digits[0]] : undefined;
  if (glyph) {
    const converted = matchExactOrPrefix(glyph, options);
    if (converted) {
      return converted;
    }
  }

  logger.debug('No option matched', { answer: token });
  return '';
}
