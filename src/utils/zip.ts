import { unzipSync, zipSync, strFromU8, strToU8 } from 'fflate';

/** Package entries keyed by path inside the archive */
export type ZipFiles = Map<string, Uint8Array>;

/**
 * Reads a ZIP archive into a map of path -> content.
 * Directory entries and empty entries are dropped.
 */
export const readZip = (data: Uint8Array): Promise<ZipFiles> => {
  const result = unzipSync(data);
  const files: ZipFiles = new Map();
  for (const [path, content] of Object.entries(result)) {
    if (!path.endsWith('/') && content.length > 0) {
      files.set(path, content);
    }
  }
  return Promise.resolve(files);
};

/**
 * Builds a ZIP archive from a map of path -> content
 */
export const writeZip = (files: ZipFiles): Promise<Uint8Array> => {
  const zipData: Record<string, Uint8Array> = {};
  for (const [path, content] of files) {
    if (path.endsWith('/') || content.length === 0) {
      continue;
    }
    zipData[path] = content;
  }
  return Promise.resolve(zipSync(zipData));
};

/**
 * Reads an entry as a UTF-8 string
 */
export const readZipText = (files: ZipFiles, path: string): string | undefined => {
  const data = files.get(path);
  if (!data) return undefined;
  return strFromU8(data);
};

/**
 * Writes a UTF-8 string entry
 */
export const writeZipText = (files: ZipFiles, path: string, content: string): void => {
  files.set(path, strToU8(content));
};
