// Characters not allowed in file names on common file systems
const INVALID_FILENAME_CHARS = /[<>:"/\\|?*]/g;

/**
 * Turns arbitrary text into a file-name-safe ASCII string.
 *
 * Accented letters are decomposed and lose their marks (`é` -> `e`),
 * characters outside 7-bit ASCII are dropped, and path or shell
 * sensitive characters become `_`.
 */
export const normalizeFilename = (text: string): string => {
  return text
    .normalize('NFKD')
    .replace(/[^\x00-\x7F]/g, '')
    .replace(INVALID_FILENAME_CHARS, '_');
};
