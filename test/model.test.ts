import { describe, it, expect } from 'vitest';
import { Paragraph, Run } from '../src';
import { createElement, getAttr, getChildren, tagNameOf } from '../src/utils/xml';
import { loadDocx, paragraph, run } from './helpers';

const bold = () => createElement('w:rPr', {}, [createElement('w:b')]);

describe('Run', () => {
  it('reads tabs and line breaks as characters', async () => {
    const doc = await loadDocx(
      '<w:p><w:r><w:t>a</w:t><w:tab/><w:t>b</w:t><w:br/><w:t>c</w:t><w:br w:type="page"/><w:cr/></w:r></w:p>'
    );
    expect(doc.paragraphs[0].runs[0].text).toBe('a\tb\nc\n');
  });

  it('reads positional tabs, non-breaking hyphens and symbols', async () => {
    const doc = await loadDocx(
      '<w:p><w:r><w:t>a</w:t><w:ptab w:relativeTo="margin" w:alignment="right" w:leader="none"/>' +
        '<w:t>x</w:t><w:noBreakHyphen/><w:t>y</w:t><w:sym w:font="Symbol" w:char="03A9"/></w:r></w:p>'
    );
    expect(doc.paragraphs[0].runs[0].text).toBe('a\tx\u2011y\u03A9');
  });

  it('ignores deleted text', async () => {
    const doc = await loadDocx('<w:p><w:r><w:delText>gone</w:delText><w:t>kept</w:t></w:r></w:p>');
    expect(doc.paragraphs[0].text).toBe('kept');
  });

  it('writes text as w:t, w:tab and w:br after the run properties', () => {
    const [target] = Paragraph.create([{ text: 'x', style: bold() }]).runs;
    target.text = ' lead\tmid\nend';

    expect(getChildren(target.node, 'w:r').map((child) => tagNameOf(child))).toEqual([
      'w:rPr',
      'w:t',
      'w:tab',
      'w:t',
      'w:br',
      'w:t',
    ]);
    expect(target.text).toBe(' lead\tmid\nend');
    expect(target.style).toEqual(bold());
  });

  it('writes U+2011 as a non-breaking hyphen element', () => {
    const target = Run.create('co\u2011op');
    expect(getChildren(target.node, 'w:r').map((child) => tagNameOf(child))).toEqual(['w:t', 'w:noBreakHyphen', 'w:t']);
    expect(target.text).toBe('co\u2011op');
  });

  it('marks leading and trailing whitespace as preserved', () => {
    const [paddedText] = getChildren(Run.create(' padded ').node, 'w:r');
    const [plainText] = getChildren(Run.create('plain').node, 'w:r');
    expect(getAttr(paddedText, 'xml:space')).toBe('preserve');
    expect(getAttr(plainText, 'xml:space')).toBeUndefined();
  });

  it('has no style when unformatted', () => {
    expect(Run.create('plain').style).toBeUndefined();
  });
});

describe('Paragraph', () => {
  it('joins run texts', () => {
    const p = Paragraph.create(['Hello ', { text: 'World', style: bold() }]);
    expect(p.runs).toHaveLength(2);
    expect(p.text).toBe('Hello World');
  });

  it('includes runs inside hyperlinks and tracked insertions', async () => {
    const doc = await loadDocx(
      paragraph(
        run('See '),
        `<w:hyperlink r:id="rId9">${run('the link')}</w:hyperlink>`,
        `<w:ins w:id="1" w:author="A">${run(' now')}</w:ins>`,
        run('.')
      )
    );
    const p = doc.paragraphs[0];
    expect(p.runs.map((r) => r.text)).toEqual(['See ', 'the link', ' now', '.']);
    expect(p.text).toBe('See the link now.');
  });

  it('removes a run from the wrapper that holds it', async () => {
    const doc = await loadDocx(paragraph(run('See '), `<w:hyperlink r:id="rId9">${run('the link')}</w:hyperlink>`, run('.')));
    const p = doc.paragraphs[0];
    p.runs[1].remove();
    expect(p.text).toBe('See .');
    expect(p.runs).toHaveLength(2);
  });

  it('removes a detached run only once', () => {
    const p = Paragraph.create(['a', 'b']);
    const [first] = p.runs;
    first.remove();
    first.remove();
    expect(p.text).toBe('b');
  });
});
