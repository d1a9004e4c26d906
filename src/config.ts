import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { z } from 'zod';
import { DEFAULT_CONVERSION_TIMEOUT_MS } from './convert/libreoffice';
import { ConfigError, ErrorCode, ExitCode } from './errors';
import { DEFAULT_IDENTIFIER_FIELDS } from './identifier';
import { DEFAULT_DELIMITERS } from './placeholder';

export const DEFAULT_CONFIG_FILE = 'docgen.config.json';

export const ConfigSchema = z
  .object({
    source: z
      .object({
        file: z.string().min(1).default('dataset.xlsx'),
        sheet: z.string().min(1).optional(),
      })
      .strict()
      .default({}),
    template: z.string().min(1).default('template.docx'),
    outputDir: z.string().min(1).default('output'),
    pdfOutputDir: z.string().min(1).default('output_pdf'),
    delimiters: z
      .object({
        open: z.string().min(1).default(DEFAULT_DELIMITERS.open),
        close: z.string().min(1).default(DEFAULT_DELIMITERS.close),
      })
      .strict()
      .default({}),
    mapping: z.record(z.string()).default({}),
    identifierFields: z.array(z.string()).default([...DEFAULT_IDENTIFIER_FIELDS]),
    includeHeadersFooters: z.boolean().default(true),
    conversion: z
      .object({
        executable: z.string().min(1).optional(),
        timeoutMs: z.number().int().positive().default(DEFAULT_CONVERSION_TIMEOUT_MS),
      })
      .strict()
      .default({}),
  })
  .strict();

export type DocgenConfig = z.output<typeof ConfigSchema>;

/**
 * Validates raw configuration and resolves its paths against `baseDir`
 */
export const resolveConfig = (raw: unknown, baseDir: string): DocgenConfig => {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError('Invalid configuration', { details: { issues } });
  }

  const config = result.data;
  const executable = config.conversion.executable;
  return {
    ...config,
    source: { ...config.source, file: resolve(baseDir, config.source.file) },
    template: resolve(baseDir, config.template),
    outputDir: resolve(baseDir, config.outputDir),
    pdfOutputDir: resolve(baseDir, config.pdfOutputDir),
    conversion: {
      ...config.conversion,
      // bare command names are looked up on PATH
      executable: executable && /[\\/]/.test(executable) ? resolve(baseDir, executable) : executable,
    },
  };
};

/**
 * Loads the JSON configuration file
 *
 * @param path - Config file; `docgen.config.json` in `cwd` when omitted
 */
export const loadConfig = async (path?: string, cwd: string = process.cwd()): Promise<DocgenConfig> => {
  const configPath = resolve(cwd, path ?? DEFAULT_CONFIG_FILE);
  if (!existsSync(configPath)) {
    throw new ConfigError(`Configuration file not found: ${configPath}`, {
      code: ErrorCode.CONFIG_NOT_FOUND,
      exitCode: ExitCode.NOT_FOUND,
      hint: `Create ${DEFAULT_CONFIG_FILE} or pass --config <path>.`,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(configPath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Cannot parse configuration file: ${configPath}`, {
      code: ErrorCode.CONFIG_PARSE_ERROR,
      cause: error,
    });
  }

  return resolveConfig(raw, dirname(configPath));
};
