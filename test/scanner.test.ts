import { describe, it, expect } from 'vitest';
import { extractPlaceholders, scanPlaceholders } from '../src';
import { footerXml, headerXml, loadDocx, paragraph, run, table } from './helpers';

describe('extractPlaceholders', () => {
  it('collapses duplicates in first-seen order', () => {
    expect(extractPlaceholders('«B» then «A» then «B»')).toEqual(['B', 'A']);
  });

  it('ignores empty markers', () => {
    expect(extractPlaceholders('«» and «Name»')).toEqual(['Name']);
  });

  it('stops at the first close marker', () => {
    expect(extractPlaceholders('«A» x «B»')).toEqual(['A', 'B']);
  });

  it('supports custom delimiters', () => {
    expect(extractPlaceholders('Dear {{first}} {{last}}', { open: '{{', close: '}}' })).toEqual(['first', 'last']);
  });
});

describe('scanPlaceholders', () => {
  it('finds each placeholder once across paragraphs and table cells', async () => {
    const doc = await loadDocx(
      paragraph('Dear «Name» of «City»') +
        table([[paragraph('«Name»'), paragraph('«City»')]])
    );

    const names = scanPlaceholders(doc);
    expect(names).toHaveLength(2);
    expect(new Set(names)).toEqual(new Set(['Name', 'City']));
  });

  it('finds placeholders split across runs', async () => {
    const doc = await loadDocx(paragraph(run('Hello «Na'), run('me', '<w:b/>'), run('», welcome')));
    expect(scanPlaceholders(doc)).toEqual(['Name']);
  });

  it('does not match across paragraph boundaries', async () => {
    const doc = await loadDocx(paragraph('«Open') + paragraph('Close»'));
    expect(scanPlaceholders(doc)).toEqual([]);
  });

  it('scans headers and footers unless disabled', async () => {
    const doc = await loadDocx(paragraph('«Body»'), {
      'word/header1.xml': headerXml(paragraph('«Head»')),
      'word/footer1.xml': footerXml(paragraph('«Foot»')),
    });

    expect(scanPlaceholders(doc)).toEqual(['Body', 'Head', 'Foot']);
    expect(scanPlaceholders(doc, { includeHeadersFooters: false })).toEqual(['Body']);
  });

  it('returns nothing for a template without placeholders', async () => {
    const doc = await loadDocx(paragraph('No fields here'));
    expect(scanPlaceholders(doc)).toEqual([]);
  });
});
