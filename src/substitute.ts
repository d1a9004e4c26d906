import { countOccurrences, DEFAULT_DELIMITERS, placeholderToken } from './placeholder';
import type { Delimiters, TextContainer } from './types';

const replaceToken = (text: string, token: string, value: string): string => text.split(token).join(value);

/**
 * Replaces a placeholder in one text container.
 *
 * When a single run holds the whole token, only that run is edited and every
 * run keeps its formatting. When the token crosses run boundaries, the
 * container collapses into its first run carrying the fully replaced text;
 * the formatting of the other runs is lost.
 *
 * @returns Whether the container changed
 */
export const substitute = (
  container: TextContainer,
  name: string,
  value: string,
  delimiters: Delimiters = DEFAULT_DELIMITERS
): boolean => {
  const token = placeholderToken(name, delimiters);
  const fullText = container.text;
  if (!fullText.includes(token)) {
    return false;
  }

  const runs = container.runs;
  for (const run of runs) {
    if (run.text.includes(token)) {
      run.text = replaceToken(run.text, token, value);
      return true;
    }
  }

  const [first, ...rest] = runs;
  if (!first) {
    return false;
  }
  for (const run of rest) {
    run.remove();
  }
  first.text = replaceToken(fullText, token, value);
  return true;
};

/**
 * Applies {@link substitute} until no occurrence of the placeholder is left.
 * Stops early when a pass does not reduce the number of occurrences, which
 * happens when the value itself contains the token.
 *
 * @returns Number of successful passes
 */
export const substituteAll = (
  container: TextContainer,
  name: string,
  value: string,
  delimiters: Delimiters = DEFAULT_DELIMITERS
): number => {
  const token = placeholderToken(name, delimiters);
  let remaining = countOccurrences(container.text, token);
  let passes = 0;
  while (remaining > 0 && substitute(container, name, value, delimiters)) {
    passes++;
    const next = countOccurrences(container.text, token);
    if (next >= remaining) break;
    remaining = next;
  }
  return passes;
};
