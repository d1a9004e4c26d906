import { normalizeFilename } from './normalize';
import { resolveField } from './placeholder';
import type { DataRecord } from './types';

export const DEFAULT_IDENTIFIER_FIELDS: readonly string[] = [
  'PI Name (Ucalgary System)',
  'Nominee name',
  'Nomination Type',
];

/**
 * Builds the output name of a record, e.g. `[Smith] [Doe] [Postdoc]`.
 *
 * Each non-blank designated field contributes one bracketed, normalized
 * component. A record with none of them falls back to `row_<position>`.
 * Names are not unique: two records with equal fields get the same name.
 *
 * @param position - 1-based index of the record in its source
 */
export const buildOutputIdentifier = (
  record: DataRecord,
  position: number,
  fields: readonly string[] = DEFAULT_IDENTIFIER_FIELDS
): string => {
  const parts = fields
    .map((field) => resolveField(record, field).trim())
    .filter((value) => value.length > 0)
    .map((value) => `[${normalizeFilename(value)}]`);

  return parts.length > 0 ? parts.join(' ') : `row_${position}`;
};
