import { Document } from '../src';
import { readZip, writeZip, writeZipText } from '../src/utils/zip';

const W_NS = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';
const R_NS = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';

const DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

export const documentXml = (body: string): string =>
  `${DECLARATION}\n<w:document xmlns:w="${W_NS}" xmlns:r="${R_NS}"><w:body>${body}<w:sectPr/></w:body></w:document>`;

export const headerXml = (body: string): string => `${DECLARATION}\n<w:hdr xmlns:w="${W_NS}">${body}</w:hdr>`;

export const footerXml = (body: string): string => `${DECLARATION}\n<w:ftr xmlns:w="${W_NS}">${body}</w:ftr>`;

/** `<w:r>` with optional run properties markup, e.g. `<w:b/>` */
export const run = (text: string, props = ''): string =>
  `<w:r>${props ? `<w:rPr>${props}</w:rPr>` : ''}<w:t xml:space="preserve">${text}</w:t></w:r>`;

/** `<w:p>`; plain strings become unformatted runs */
export const paragraph = (...runs: string[]): string =>
  `<w:p>${runs.map((r) => (r.startsWith('<') ? r : run(r))).join('')}</w:p>`;

/** `<w:tbl>` from rows of cell contents (block markup) */
export const table = (rows: string[][]): string =>
  `<w:tbl>${rows.map((cells) => `<w:tr>${cells.map((cell) => `<w:tc>${cell}</w:tc>`).join('')}</w:tr>`).join('')}</w:tbl>`;

/**
 * Builds a .docx package whose body is `body`, plus extra parts keyed by path
 */
export const buildDocx = async (body: string, parts: Record<string, string> = {}): Promise<Uint8Array> => {
  const files = await readZip(await Document.create().toBuffer());
  writeZipText(files, 'word/document.xml', documentXml(body));
  for (const [path, xml] of Object.entries(parts)) {
    writeZipText(files, path, xml);
  }
  return writeZip(files);
};

export const loadDocx = async (body: string, parts: Record<string, string> = {}): Promise<Document> =>
  Document.fromBuffer(await buildDocx(body, parts));

export const textsOf = (doc: Document, includeHeadersFooters = true): string[] =>
  doc.textContainers({ includeHeadersFooters }).map((p) => p.text);
