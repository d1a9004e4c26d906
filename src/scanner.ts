import type { Document } from './document';
import { DEFAULT_DELIMITERS, placeholderPattern } from './placeholder';
import type { Delimiters, TraversalOptions } from './types';

/**
 * Extracts distinct placeholder names from plain text, in first-seen order
 */
export const extractPlaceholders = (text: string, delimiters: Delimiters = DEFAULT_DELIMITERS): string[] => {
  const names = new Set<string>();
  for (const match of text.matchAll(placeholderPattern(delimiters))) {
    names.add(match[1]);
  }
  return [...names];
};

/**
 * Lists the distinct placeholder names used in a document.
 *
 * Paragraph texts are joined with line breaks before matching, so a
 * placeholder must sit inside a single paragraph or table cell paragraph.
 */
export const scanPlaceholders = (document: Document, options: TraversalOptions = {}): string[] => {
  const text = document
    .textContainers({ includeHeadersFooters: options.includeHeadersFooters })
    .map((paragraph) => paragraph.text)
    .join('\n');
  return extractPlaceholders(text, options.delimiters);
};
