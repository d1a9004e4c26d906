import type { TextContainer, TextRun } from './types';
import { cloneNode, createElement, createText, findElement, findElements, getAttr, getChildren, getText, tagNameOf } from './utils/xml';
import type { XmlNode } from './utils/xml';

// Inline wrappers whose runs belong to the enclosing paragraph
const RUN_WRAPPERS = new Set(['w:hyperlink', 'w:ins', 'w:smartTag', 'w:customXml']);

const NON_BREAKING_HYPHEN = '\u2011';

/**
 * Character of a `<w:sym>` element, from its hexadecimal `w:char`
 */
const symbolChar = (node: XmlNode): string | undefined => {
  const code = Number.parseInt(getAttr(node, 'w:char') ?? '', 16);
  return Number.isNaN(code) ? undefined : String.fromCharCode(code);
};

/**
 * Initial content of a run built in code
 */
export interface RunInit {
  text: string;

  /** `<w:rPr>` element to copy onto the run */
  style?: XmlNode;
}

/**
 * A `<w:r>` element: one span of uniformly formatted text
 */
export class Run implements TextRun {
  /**
   * @param node - The `<w:r>` element
   * @param siblings - Live children array of the element holding the run
   */
  constructor(
    readonly node: XmlNode,
    private readonly _siblings: XmlNode[]
  ) {}

  /**
   * Creates a detached run
   */
  static create(init: RunInit | string, siblings: XmlNode[] = []): Run {
    const { text, style } = typeof init === 'string' ? { text: init, style: undefined } : init;
    const run = new Run(createElement('w:r', {}, style ? [cloneNode(style)] : []), siblings);
    run.text = text;
    return run;
  }

  /**
   * Run properties (`<w:rPr>`), undefined for an unformatted run
   */
  get style(): XmlNode | undefined {
    return findElement(getChildren(this.node, 'w:r'), 'w:rPr');
  }

  /**
   * Visible text: `<w:t>` content, `<w:tab/>` and `<w:ptab/>` as a tab,
   * text-wrapping `<w:br/>` and `<w:cr/>` as line breaks,
   * `<w:noBreakHyphen/>` as U+2011 and `<w:sym>` as its character
   */
  get text(): string {
    let text = '';
    for (const child of getChildren(this.node, 'w:r')) {
      switch (tagNameOf(child)) {
        case 'w:t':
          text += getText(child, 'w:t');
          break;
        case 'w:tab':
          text += '\t';
          break;
        case 'w:br': {
          const type = getAttr(child, 'w:type');
          if (type === undefined || type === 'textWrapping') {
            text += '\n';
          }
          break;
        }
        case 'w:cr':
          text += '\n';
          break;
        case 'w:ptab':
          text += '\t';
          break;
        case 'w:noBreakHyphen':
          text += NON_BREAKING_HYPHEN;
          break;
        case 'w:sym':
          text += symbolChar(child) ?? '';
          break;
      }
    }
    return text;
  }

  /**
   * Replaces the run content with `value`, keeping its properties.
   * Symbols of the previous content are written back as `<w:sym>` wherever
   * their character is still present.
   */
  set text(value: string) {
    const style = this.style;
    const symbols = new Map<string, XmlNode>();
    for (const child of getChildren(this.node, 'w:r')) {
      const char = tagNameOf(child) === 'w:sym' ? symbolChar(child) : undefined;
      if (char !== undefined) {
        symbols.set(char, child);
      }
    }

    const content: XmlNode[] = style ? [style] : [];
    let pending = '';
    const chars = [...value];
    for (const [index, char] of chars.entries()) {
      if (char === '\r' && chars[index + 1] === '\n') continue;
      const element = specialElement(char, symbols);
      if (element === undefined) {
        pending += char;
        continue;
      }
      if (pending.length > 0) {
        content.push(textElement(pending));
        pending = '';
      }
      content.push(element);
    }
    if (pending.length > 0) {
      content.push(textElement(pending));
    }
    this.node['w:r'] = content;
  }

  remove(): void {
    const index = this._siblings.indexOf(this.node);
    if (index >= 0) {
      this._siblings.splice(index, 1);
    }
  }
}

const specialElement = (char: string, symbols: Map<string, XmlNode>): XmlNode | undefined => {
  switch (char) {
    case '\t':
      return createElement('w:tab');
    case '\n':
      return createElement('w:br');
    case NON_BREAKING_HYPHEN:
      return createElement('w:noBreakHyphen');
  }
  const symbol = symbols.get(char);
  return symbol ? cloneNode(symbol) : undefined;
};

const textElement = (text: string): XmlNode => {
  const attrs: Record<string, string> = /^\s|\s$/.test(text) ? { 'xml:space': 'preserve' } : {};
  return createElement('w:t', attrs, [createText(text)]);
};

const collectRuns = (children: XmlNode[], runs: Run[]): Run[] => {
  for (const child of children) {
    const tagName = tagNameOf(child);
    if (tagName === 'w:r') {
      runs.push(new Run(child, children));
    } else if (tagName !== undefined && RUN_WRAPPERS.has(tagName)) {
      collectRuns(getChildren(child, tagName), runs);
    }
  }
  return runs;
};

/**
 * A `<w:p>` element
 */
export class Paragraph implements TextContainer<Run> {
  constructor(readonly node: XmlNode) {}

  /**
   * Creates a detached paragraph from run contents
   */
  static create(runs: Array<RunInit | string>): Paragraph {
    const children: XmlNode[] = [];
    for (const init of runs) {
      children.push(Run.create(init, children).node);
    }
    return new Paragraph(createElement('w:p', {}, children));
  }

  /**
   * Runs in document order, including runs inside hyperlinks and
   * tracked insertions
   */
  get runs(): Run[] {
    return collectRuns(getChildren(this.node, 'w:p'), []);
  }

  get text(): string {
    return this.runs.map((run) => run.text).join('');
  }
}

/**
 * A `<w:tc>` element
 */
export class TableCell {
  constructor(readonly node: XmlNode) {}

  get paragraphs(): Paragraph[] {
    return findElements(getChildren(this.node, 'w:tc'), 'w:p').map((p) => new Paragraph(p));
  }

  /** Tables nested directly in this cell */
  get tables(): Table[] {
    return findElements(getChildren(this.node, 'w:tc'), 'w:tbl').map((t) => new Table(t));
  }

  get text(): string {
    return this.paragraphs.map((p) => p.text).join('\n');
  }
}

/**
 * A `<w:tr>` element
 */
export class TableRow {
  constructor(readonly node: XmlNode) {}

  get cells(): TableCell[] {
    return findElements(getChildren(this.node, 'w:tr'), 'w:tc').map((c) => new TableCell(c));
  }
}

/**
 * A `<w:tbl>` element
 */
export class Table {
  constructor(readonly node: XmlNode) {}

  get rows(): TableRow[] {
    return findElements(getChildren(this.node, 'w:tbl'), 'w:tr').map((r) => new TableRow(r));
  }
}

/**
 * Yields every paragraph under a list of block-level elements in document
 * order: top-level paragraphs, paragraphs in table cells at any nesting
 * depth and paragraphs inside block content controls.
 */
export function* iterParagraphs(blocks: XmlNode[]): Generator<Paragraph> {
  for (const block of blocks) {
    const tagName = tagNameOf(block);
    if (tagName === 'w:p') {
      yield new Paragraph(block);
    } else if (tagName === 'w:tbl') {
      for (const row of new Table(block).rows) {
        for (const cell of row.cells) {
          yield* iterParagraphs(getChildren(cell.node, 'w:tc'));
        }
      }
    } else if (tagName === 'w:sdt') {
      const content = findElement(getChildren(block, 'w:sdt'), 'w:sdtContent');
      if (content) {
        yield* iterParagraphs(getChildren(content, 'w:sdtContent'));
      }
    }
  }
}
