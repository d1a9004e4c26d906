import { execFile } from 'child_process';
import { accessSync, constants, existsSync } from 'fs';
import { mkdir, readdir } from 'fs/promises';
import { basename, delimiter, extname, join } from 'path';
import { promisify } from 'util';
import { ConversionError, ConverterNotFoundError, ErrorCode, ExitCode } from '../errors';
import { createLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';

const execFileAsync = promisify(execFile);

/** Per-document conversion timeout (2 minutes) */
export const DEFAULT_CONVERSION_TIMEOUT_MS = 120_000;

/** Install locations checked when `soffice` is not on PATH */
export const KNOWN_LOCATIONS = ['/Applications/LibreOffice.app/Contents/MacOS/soffice', '/usr/local/bin/soffice'];

/**
 * Turns a document into a fixed-layout rendering
 */
export interface Converter {
  /**
   * @returns Path of the produced PDF
   * @throws {ConversionError} When the document cannot be converted
   */
  convert(docxPath: string, outDir: string): Promise<string>;
}

export interface ProcessOutput {
  stdout: string;
  stderr: string;
}

/**
 * Runs an executable without a shell. Rejects on non-zero exit or timeout.
 */
export type ProcessRunner = (file: string, args: string[], options: { timeout: number }) => Promise<ProcessOutput>;

/**
 * Dependencies of the LibreOffice converter (for testing)
 */
export interface LibreOfficeDeps {
  run: ProcessRunner;
  exists: (path: string) => boolean;
  which: (name: string) => string | null;
}

/**
 * Find an executable in PATH (no shell execution)
 */
export const findExecutable = (name: string): string | null => {
  const pathDirs = process.env.PATH?.split(delimiter) ?? [];
  const extensions = process.platform === 'win32' ? ['.exe', ''] : [''];

  for (const dir of pathDirs) {
    if (!dir) continue;
    for (const ext of extensions) {
      const fullPath = join(dir, name + ext);
      try {
        accessSync(fullPath, constants.X_OK);
        return fullPath;
      } catch {
        // not here, keep looking
      }
    }
  }
  return null;
};

const defaultDeps: LibreOfficeDeps = {
  run: async (file, args, options) => {
    const { stdout, stderr } = await execFileAsync(file, args, { timeout: options.timeout, encoding: 'utf8' });
    return { stdout, stderr };
  },
  exists: existsSync,
  which: findExecutable,
};

/**
 * Locates the LibreOffice executable: `soffice` or `libreoffice` on PATH,
 * then the known install locations.
 */
export const findLibreOffice = (deps: Partial<LibreOfficeDeps> = {}): string | null => {
  const which = deps.which ?? defaultDeps.which;
  const exists = deps.exists ?? defaultDeps.exists;

  const inPath = which('soffice') ?? which('libreoffice');
  if (inPath) return inPath;

  return KNOWN_LOCATIONS.find((location) => exists(location)) ?? null;
};

const outputOf = (error: unknown): Partial<ProcessOutput> => {
  if (typeof error !== 'object' || error === null) return {};
  const stdout = 'stdout' in error && typeof error.stdout === 'string' ? error.stdout : undefined;
  const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr : undefined;
  return { stdout, stderr };
};

const wasKilled = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'killed' in error && error.killed === true;

/**
 * Converts documents with `soffice --headless --convert-to pdf`
 */
export class LibreOfficeConverter implements Converter {
  private readonly deps: LibreOfficeDeps;
  private readonly timeoutMs: number;

  constructor(
    readonly executable: string,
    options: { timeoutMs?: number; deps?: Partial<LibreOfficeDeps> } = {}
  ) {
    this.deps = { ...defaultDeps, ...options.deps };
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CONVERSION_TIMEOUT_MS;
  }

  async convert(docxPath: string, outDir: string): Promise<string> {
    await mkdir(outDir, { recursive: true });
    const name = basename(docxPath);

    let output: ProcessOutput;
    try {
      output = await this.deps.run(
        this.executable,
        ['--headless', '--convert-to', 'pdf', '--outdir', outDir, docxPath],
        { timeout: this.timeoutMs }
      );
    } catch (error) {
      const timedOut = wasKilled(error);
      throw new ConversionError(
        timedOut
          ? `LibreOffice timed out after ${this.timeoutMs} ms converting ${name}`
          : `LibreOffice conversion failed for ${name}`,
        {
          code: timedOut ? ErrorCode.CONVERSION_TIMEOUT : ErrorCode.CONVERSION_FAILED,
          exitCode: timedOut ? ExitCode.TIMEOUT : ExitCode.ERROR,
          details: { ...outputOf(error) },
          cause: error,
        }
      );
    }

    const pdfPath = join(outDir, `${basename(docxPath, extname(docxPath))}.pdf`);
    if (!this.deps.exists(pdfPath)) {
      throw new ConversionError(`PDF was not created for ${name}`, {
        details: { stdout: output.stdout, stderr: output.stderr },
      });
    }
    return pdfPath;
  }
}

/**
 * Builds the LibreOffice converter, or fails with installation guidance
 *
 * @param afterGeneration - Point the hint at `--pdf-only` for documents
 * that were already generated
 */
export const resolveConverter = (
  options: { executable?: string; timeoutMs?: number; afterGeneration?: boolean; deps?: Partial<LibreOfficeDeps> } = {}
): LibreOfficeConverter => {
  const executable = options.executable ?? findLibreOffice(options.deps);
  if (!executable) {
    throw new ConverterNotFoundError({ afterGeneration: options.afterGeneration });
  }
  return new LibreOfficeConverter(executable, { timeoutMs: options.timeoutMs, deps: options.deps });
};

export interface ConversionFailure {
  file: string;
  error: Error;
}

export interface ConversionResult {
  attempted: number;
  converted: number;
  /** PDF paths in input order */
  outputs: string[];
  failures: ConversionFailure[];
}

/**
 * Converts files one after another. A failing file is logged and counted;
 * the remaining files are still converted.
 */
export const convertBatch = async (
  files: string[],
  outDir: string,
  converter: Converter,
  logger: Logger = createLogger('convert')
): Promise<ConversionResult> => {
  const result: ConversionResult = { attempted: files.length, converted: 0, outputs: [], failures: [] };
  if (files.length === 0) {
    return result;
  }

  logger.info(`Converting ${files.length} documents to PDF...`);
  logger.info(`Output PDF directory: ${outDir}`);

  for (const [index, file] of files.entries()) {
    const progress = `[${index + 1}/${files.length}]`;
    try {
      const pdfPath = await converter.convert(file, outDir);
      result.outputs.push(pdfPath);
      result.converted++;
      logger.info(`${progress} Converted: ${basename(pdfPath)}`);
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      result.failures.push({ file, error: failure });
      logger.error(`${progress} FAILED: ${failure.message}`);
    }
  }

  logger.success(`Converted ${result.converted}/${result.attempted} files to PDF.`);
  return result;
};

/**
 * Converts every `.docx` file of a directory, in name order
 */
export const convertDirectory = async (
  sourceDir: string,
  outDir: string,
  converter: Converter,
  logger: Logger = createLogger('convert')
): Promise<ConversionResult> => {
  const names = existsSync(sourceDir) ? await readdir(sourceDir) : [];
  const files = names
    .filter((name) => name.toLowerCase().endsWith('.docx') && !name.startsWith('~$'))
    .sort()
    .map((name) => join(sourceDir, name));

  if (files.length === 0) {
    logger.info(`No .docx files found in ${sourceDir}`);
  }
  return convertBatch(files, outDir, converter, logger);
};
