import type { Document } from './document';
import { DEFAULT_DELIMITERS, resolveField } from './placeholder';
import { substituteAll } from './substitute';
import type { DataRecord, PlaceholderMapping, TraversalOptions } from './types';

/**
 * Fills a copy of `template` with one record.
 *
 * Every paragraph of the copy (body, table cells at any depth, headers and
 * footers) gets each mapped placeholder replaced by its field value. Fields
 * missing from the record resolve to an empty string. The template itself is
 * never modified.
 */
export const render = (
  template: Document,
  record: DataRecord,
  mapping: PlaceholderMapping,
  options: TraversalOptions = {}
): Document => {
  const delimiters = options.delimiters ?? DEFAULT_DELIMITERS;
  const document = template.clone();
  const entries = Object.entries(mapping);
  if (entries.length === 0) {
    return document;
  }

  for (const paragraph of document.textContainers({ includeHeadersFooters: options.includeHeadersFooters })) {
    if (!paragraph.text.includes(delimiters.open)) continue;
    for (const [placeholder, field] of entries) {
      substituteAll(paragraph, placeholder, resolveField(record, field), delimiters);
    }
  }

  return document;
};
