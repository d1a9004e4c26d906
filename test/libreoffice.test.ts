import { existsSync } from 'fs';
import { mkdir, rm, writeFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import { describe, it, expect, beforeAll, afterEach, vi } from 'vitest';
import {
  ConversionError,
  ConverterNotFoundError,
  convertBatch,
  convertDirectory,
  createLogger,
  findLibreOffice,
  LibreOfficeConverter,
  resolveConverter,
} from '../src';
import type { Converter } from '../src';
import { KNOWN_LOCATIONS } from '../src/convert/libreoffice';

const outputDir = 'test/output/libreoffice';

/** Converts every file except those named `bad*` without touching the disk */
const fakeConverter = (): Converter & { calls: string[] } => {
  const calls: string[] = [];
  return {
    calls,
    async convert(docxPath, outDir) {
      calls.push(docxPath);
      const name = basename(docxPath);
      if (name.startsWith('bad')) {
        throw new ConversionError(`LibreOffice conversion failed for ${name}`);
      }
      return join(outDir, `${basename(docxPath, extname(docxPath))}.pdf`);
    },
  };
};

const processError = (fields: Record<string, unknown>) => Object.assign(new Error('Command failed'), fields);

describe('findLibreOffice', () => {
  it('prefers soffice on PATH', () => {
    const which = (name: string) => `/usr/bin/${name}`;
    expect(findLibreOffice({ which, exists: () => false })).toBe('/usr/bin/soffice');
  });

  it('falls back to libreoffice on PATH', () => {
    const which = (name: string) => (name === 'libreoffice' ? '/usr/bin/libreoffice' : null);
    expect(findLibreOffice({ which, exists: () => false })).toBe('/usr/bin/libreoffice');
  });

  it('checks the known install locations last', () => {
    const exists = (path: string) => path === KNOWN_LOCATIONS[1];
    expect(findLibreOffice({ which: () => null, exists })).toBe('/usr/local/bin/soffice');
  });

  it('returns null when nothing is installed', () => {
    expect(findLibreOffice({ which: () => null, exists: () => false })).toBeNull();
  });
});

describe('LibreOfficeConverter', () => {
  const pdfDir = join(outputDir, 'pdf');
  const pdfPath = join(pdfDir, 'letter.pdf');

  it('runs a headless conversion into the output directory', async () => {
    const run = vi.fn().mockResolvedValue({ stdout: 'convert ok', stderr: '' });
    const converter = new LibreOfficeConverter('/opt/soffice', {
      timeoutMs: 500,
      deps: { run, exists: (path) => path === pdfPath },
    });

    await expect(converter.convert('docs/letter.docx', pdfDir)).resolves.toBe(pdfPath);
    expect(run).toHaveBeenCalledWith(
      '/opt/soffice',
      ['--headless', '--convert-to', 'pdf', '--outdir', pdfDir, 'docs/letter.docx'],
      { timeout: 500 }
    );
    expect(existsSync(pdfDir)).toBe(true);
  });

  it('reports the process output of a failed conversion', async () => {
    const run = vi.fn().mockRejectedValue(processError({ code: 1, stdout: 'out', stderr: 'source file could not be loaded' }));
    const converter = new LibreOfficeConverter('soffice', { deps: { run, exists: () => true } });

    await expect(converter.convert('letter.docx', pdfDir)).rejects.toMatchObject({
      message: 'LibreOffice conversion failed for letter.docx',
      code: 'conversion_failed',
      exitCode: 1,
      details: { stdout: 'out', stderr: 'source file could not be loaded' },
    });
  });

  it('reports a timeout', async () => {
    const run = vi.fn().mockRejectedValue(processError({ killed: true, signal: 'SIGTERM', stdout: '', stderr: '' }));
    const converter = new LibreOfficeConverter('soffice', { timeoutMs: 500, deps: { run, exists: () => true } });

    await expect(converter.convert('letter.docx', pdfDir)).rejects.toMatchObject({
      message: 'LibreOffice timed out after 500 ms converting letter.docx',
      code: 'conversion_timeout',
      exitCode: 8,
    });
  });

  it('fails when no PDF appears', async () => {
    const run = vi.fn().mockResolvedValue({ stdout: '', stderr: 'Error: no export filter' });
    const converter = new LibreOfficeConverter('soffice', { deps: { run, exists: () => false } });

    await expect(converter.convert('letter.docx', pdfDir)).rejects.toThrow('PDF was not created for letter.docx');
  });
});

describe('resolveConverter', () => {
  const missing = { which: () => null, exists: () => false };

  it('uses a configured executable without searching', () => {
    const which = vi.fn(() => null);
    expect(resolveConverter({ executable: '/opt/lo/soffice', deps: { which } }).executable).toBe('/opt/lo/soffice');
    expect(which).not.toHaveBeenCalled();
  });

  it('uses the located executable', () => {
    expect(resolveConverter({ deps: { which: (name) => `/bin/${name}` } }).executable).toBe('/bin/soffice');
  });

  it('explains how to install LibreOffice', () => {
    expect(() => resolveConverter({ deps: missing })).toThrow(ConverterNotFoundError);

    let caught: unknown;
    try {
      resolveConverter({ deps: missing, afterGeneration: true });
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({
      message: 'LibreOffice not found.',
      code: 'converter_not_found',
      exitCode: 1,
      hint: expect.stringContaining('Then re-run with --pdf-only to convert the existing files.'),
    });
  });
});

describe('convertBatch', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('keeps converting after a failure', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const converter = fakeConverter();

    const result = await convertBatch(
      ['out/a.docx', 'out/bad.docx', 'out/c.docx'],
      'pdf',
      converter,
      createLogger('convert', { colors: false, level: 'info' })
    );

    expect(converter.calls).toEqual(['out/a.docx', 'out/bad.docx', 'out/c.docx']);
    expect(result.attempted).toBe(3);
    expect(result.converted).toBe(2);
    expect(result.outputs).toEqual([join('pdf', 'a.pdf'), join('pdf', 'c.pdf')]);
    expect(result.failures.map((failure) => failure.file)).toEqual(['out/bad.docx']);

    expect(log.mock.calls.map(([line]) => line)).toEqual([
      '[info] (convert) Converting 3 documents to PDF...',
      '[info] (convert) Output PDF directory: pdf',
      '[info] (convert) [1/3] Converted: a.pdf',
      '[info] (convert) [3/3] Converted: c.pdf',
      '[success] (convert) Converted 2/3 files to PDF.',
    ]);
    expect(errors).toHaveBeenCalledWith('[error] (convert) [2/3] FAILED: LibreOffice conversion failed for bad.docx');
  });

  it('does nothing for an empty list', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const converter = fakeConverter();

    const result = await convertBatch([], 'pdf', converter, createLogger('convert', { colors: false }));

    expect(result).toEqual({ attempted: 0, converted: 0, outputs: [], failures: [] });
    expect(converter.calls).toEqual([]);
    expect(log).not.toHaveBeenCalled();
  });
});

describe('convertDirectory', () => {
  const sourceDir = join(outputDir, 'docx');

  beforeAll(async () => {
    await rm(sourceDir, { recursive: true, force: true });
    await mkdir(sourceDir, { recursive: true });
    for (const name of ['b.docx', 'a.docx', '~$a.docx', 'notes.txt']) {
      await writeFile(join(sourceDir, name), 'x');
    }
  });

  it('converts the .docx files in name order, skipping lock files', async () => {
    const converter = fakeConverter();
    const result = await convertDirectory(sourceDir, 'pdf', converter, createLogger('convert', { silent: true }));

    expect(converter.calls).toEqual([join(sourceDir, 'a.docx'), join(sourceDir, 'b.docx')]);
    expect(result.converted).toBe(2);
  });

  it('reports a directory without documents', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const missingDir = join(outputDir, 'missing');

    const result = await convertDirectory(missingDir, 'pdf', fakeConverter(), createLogger('convert', { colors: false }));

    expect(result.attempted).toBe(0);
    expect(log.mock.calls).toEqual([[`[info] (convert) No .docx files found in ${missingDir}`]]);
    log.mockRestore();
  });
});
