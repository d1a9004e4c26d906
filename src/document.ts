import { readFile, writeFile } from 'fs/promises';
import { TemplateError } from './errors';
import { iterParagraphs, Paragraph, Table } from './model';
import { readZip, writeZip, readZipText, writeZipText } from './utils/zip';
import type { ZipFiles } from './utils/zip';
import {
  parseXml,
  stringifyXml,
  addXmlDeclaration,
  findElement,
  findElements,
  getChildren,
  createElement,
  cloneNodes,
} from './utils/xml';
import type { XmlNode } from './utils/xml';

// WordprocessingML namespace
const W_NS = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';
const R_NS = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';
const PKG_NS = 'http://schemas.openxmlformats.org/package/2006/relationships';
const CT_NS = 'http://schemas.openxmlformats.org/package/2006/content-types';

const MAIN_PART = 'word/document.xml';
const HEADER_FOOTER_PART = /^word\/(header|footer)\d*\.xml$/;

type PartKind = 'document' | 'header' | 'footer';

const kindOf = (path: string): PartKind => (path.startsWith('word/header') ? 'header' : 'footer');

/**
 * A parsed XML part of the package holding paragraphs
 */
interface Part {
  path: string;
  kind: PartKind;
  tree: XmlNode[];
  /** Live block-level children of `<w:body>`, `<w:hdr>` or `<w:ftr>` */
  blocks: XmlNode[];
}

const ROOT_TAGS: Record<PartKind, [root: string, container?: string]> = {
  document: ['w:document', 'w:body'],
  header: ['w:hdr'],
  footer: ['w:ftr'],
};

const resolveBlocks = (kind: PartKind, tree: XmlNode[]): XmlNode[] | undefined => {
  const [rootTag, containerTag] = ROOT_TAGS[kind];
  const root = findElement(tree, rootTag);
  if (!root) return undefined;
  if (!containerTag) return getChildren(root, rootTag);
  const container = findElement(getChildren(root, rootTag), containerTag);
  return container ? getChildren(container, containerTag) : undefined;
};

const parsePart = (path: string, kind: PartKind, xml: string): Part | undefined => {
  const tree = parseXml(xml);
  const blocks = resolveBlocks(kind, tree);
  return blocks ? { path, kind, tree, blocks } : undefined;
};

/**
 * Represents a Word document (.docx file)
 */
export class Document {
  private _files: ZipFiles = new Map();
  /** Main document part first, then headers and footers sorted by path */
  private _parts: Part[] = [];

  private constructor() {}

  /**
   * Create a new document with an empty body
   */
  static create(): Document {
    const doc = new Document();
    writeZipText(doc._files, '[Content_Types].xml', createContentTypes());
    writeZipText(doc._files, '_rels/.rels', createRootRels());
    writeZipText(doc._files, 'word/_rels/document.xml.rels', createDocumentRels());
    writeZipText(doc._files, MAIN_PART, createEmptyDocument());
    doc._parseParts();
    return doc;
  }

  /**
   * Load a document from a file path
   * @param path - Path to the .docx file
   * @throws {TemplateError} If the file is missing or is not a Word document
   */
  static async fromFile(path: string): Promise<Document> {
    let data: Buffer;
    try {
      data = await readFile(path);
    } catch (error) {
      throw TemplateError.notFound(path, error);
    }
    return Document.fromBuffer(new Uint8Array(data), path);
  }

  /**
   * Load a document from a buffer
   * @param data - DOCX file as Uint8Array
   * @param label - Name used in error messages
   */
  static async fromBuffer(data: Uint8Array, label = 'buffer'): Promise<Document> {
    const doc = new Document();
    try {
      doc._files = await readZip(data);
    } catch (error) {
      throw TemplateError.invalid(label, 'not a ZIP archive', error);
    }
    if (!doc._files.has(MAIN_PART)) {
      throw TemplateError.invalid(label, `${MAIN_PART} is missing`);
    }
    doc._parseParts();
    return doc;
  }

  /**
   * Returns an independent copy: parsed parts are deep-cloned, untouched
   * package entries are shared read-only.
   */
  clone(): Document {
    const copy = new Document();
    copy._files = new Map(this._files);
    for (const part of this._parts) {
      const tree = cloneNodes(part.tree);
      const blocks = resolveBlocks(part.kind, tree);
      if (blocks) {
        copy._parts.push({ ...part, tree, blocks });
      }
    }
    return copy;
  }

  /**
   * Top-level body paragraphs
   */
  get paragraphs(): Paragraph[] {
    return findElements(this._mainPart().blocks, 'w:p').map((p) => new Paragraph(p));
  }

  /**
   * Top-level body tables
   */
  get tables(): Table[] {
    return findElements(this._mainPart().blocks, 'w:tbl').map((t) => new Table(t));
  }

  /**
   * Every paragraph of the document in document order: body paragraphs and
   * table-cell paragraphs, then header and footer paragraphs.
   */
  textContainers(options: { includeHeadersFooters?: boolean } = {}): Paragraph[] {
    const includeHeadersFooters = options.includeHeadersFooters ?? true;
    const paragraphs: Paragraph[] = [];
    for (const part of this._parts) {
      if (part.kind !== 'document' && !includeHeadersFooters) continue;
      paragraphs.push(...iterParagraphs(part.blocks));
    }
    return paragraphs;
  }

  /**
   * Save the document to a file
   * @param path - Path to save the .docx file
   */
  async toFile(path: string): Promise<void> {
    const buffer = await this.toBuffer();
    await writeFile(path, buffer);
  }

  /**
   * Save the document to a buffer
   * @returns DOCX file as Uint8Array
   */
  async toBuffer(): Promise<Uint8Array> {
    for (const part of this._parts) {
      writeZipText(this._files, part.path, stringifyXml(part.tree));
    }
    return writeZip(this._files);
  }

  private _mainPart(): Part {
    const main = this._parts[0];
    if (!main || main.kind !== 'document') {
      throw TemplateError.invalid(MAIN_PART, 'document body not found');
    }
    return main;
  }

  /**
   * Parse document.xml and every header/footer part
   */
  private _parseParts(): void {
    const mainXml = readZipText(this._files, MAIN_PART);
    const main = mainXml === undefined ? undefined : parsePart(MAIN_PART, 'document', mainXml);
    if (!main) {
      throw TemplateError.invalid(MAIN_PART, 'document body not found');
    }
    this._parts = [main];

    // headers first, then footers, each in part name order
    const extraPaths = [...this._files.keys()]
      .filter((path) => HEADER_FOOTER_PART.test(path))
      .sort((a, b) => Number(kindOf(a) === 'footer') - Number(kindOf(b) === 'footer') || a.localeCompare(b));
    for (const path of extraPaths) {
      const xml = readZipText(this._files, path);
      const kind = kindOf(path);
      const part = xml === undefined ? undefined : parsePart(path, kind, xml);
      if (part) {
        this._parts.push(part);
      }
    }
  }
}

/**
 * Create [Content_Types].xml
 */
const createContentTypes = (): string => {
  const types = createElement('Types', { xmlns: CT_NS }, [
    createElement('Default', { Extension: 'rels', ContentType: 'application/vnd.openxmlformats-package.relationships+xml' }),
    createElement('Default', { Extension: 'xml', ContentType: 'application/xml' }),
    createElement('Override', {
      PartName: '/word/document.xml',
      ContentType: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml',
    }),
  ]);
  return addXmlDeclaration(stringifyXml([types]));
};

/**
 * Create _rels/.rels
 */
const createRootRels = (): string => {
  const rels = createElement('Relationships', { xmlns: PKG_NS }, [
    createElement('Relationship', {
      Id: 'rId1',
      Type: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument',
      Target: 'word/document.xml',
    }),
  ]);
  return addXmlDeclaration(stringifyXml([rels]));
};

/**
 * Create word/_rels/document.xml.rels
 */
const createDocumentRels = (): string => {
  const rels = createElement('Relationships', { xmlns: PKG_NS }, []);
  return addXmlDeclaration(stringifyXml([rels]));
};

/**
 * Create word/document.xml with an empty body and Letter-size section properties
 */
const createEmptyDocument = (): string => {
  const sectPr = createElement('w:sectPr', {}, [
    createElement('w:pgSz', { 'w:w': '12240', 'w:h': '15840' }),
    createElement('w:pgMar', {
      'w:top': '1440',
      'w:right': '1440',
      'w:bottom': '1440',
      'w:left': '1440',
      'w:header': '720',
      'w:footer': '720',
      'w:gutter': '0',
    }),
  ]);
  const body = createElement('w:body', {}, [sectPr]);
  const document = createElement('w:document', { 'xmlns:w': W_NS, 'xmlns:r': R_NS }, [body]);
  return addXmlDeclaration(stringifyXml([document]));
};
