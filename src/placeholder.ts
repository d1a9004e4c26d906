import type { DataRecord, Delimiters } from './types';

export const DEFAULT_DELIMITERS: Readonly<Delimiters> = { open: '«', close: '»' };

const escapeRegExp = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * The literal token a placeholder name is written as in template text
 */
export const placeholderToken = (name: string, delimiters: Delimiters = DEFAULT_DELIMITERS): string => {
  return `${delimiters.open}${name}${delimiters.close}`;
};

/**
 * Global pattern capturing the name between an open marker and the next
 * close marker. Names are non-empty and never contain a line break.
 */
export const placeholderPattern = (delimiters: Delimiters = DEFAULT_DELIMITERS): RegExp => {
  const open = escapeRegExp(delimiters.open);
  const close = escapeRegExp(delimiters.close);
  return new RegExp(`${open}((?:(?!${close})[^\\n])+)${close}`, 'g');
};

/**
 * Counts non-overlapping occurrences of `token` in `text`
 */
export const countOccurrences = (text: string, token: string): number => {
  if (token.length === 0) return 0;
  return text.split(token).length - 1;
};

/**
 * Looks up a field, treating absent fields as empty
 */
export const resolveField = (record: DataRecord, field: string): string => {
  return Object.hasOwn(record, field) ? record[field] : '';
};
