import { Command, CommanderError } from 'commander';
import { loadConfig } from './config';
import { convertDirectory, resolveConverter } from './convert/libreoffice';
import { DocgenError, ExitCode } from './errors';
import { generateDocuments } from './generate';
import { formatInspection, inspect } from './inspect';
import { createLogger } from './utils/logger';
import type { Logger } from './utils/logger';

export interface CliOptions {
  config?: string;
  inspect?: boolean;
  dryRun?: boolean;
  pdf?: boolean;
  pdfOnly?: boolean;
  verbose?: boolean;
}

export type CliMode = 'inspect' | 'pdf-only' | 'dry-run' | 'generate';

/**
 * Picks the single mode a flag combination selects.
 * Precedence: inspect, pdf-only, dry-run, generate.
 */
export const resolveMode = (options: CliOptions): CliMode => {
  if (options.inspect) return 'inspect';
  if (options.pdfOnly) return 'pdf-only';
  if (options.dryRun) return 'dry-run';
  return 'generate';
};

const execute = async (options: CliOptions, logger: Logger): Promise<void> => {
  const config = await loadConfig(options.config);
  logger.debug('Loaded configuration', { template: config.template, source: config.source.file });

  switch (resolveMode(options)) {
    case 'inspect': {
      const report = await inspect(config);
      for (const line of formatInspection(report)) {
        logger.log(line);
      }
      break;
    }
    case 'pdf-only': {
      const converter = resolveConverter({
        executable: config.conversion.executable,
        timeoutMs: config.conversion.timeoutMs,
      });
      logger.info(`Using LibreOffice: ${converter.executable}`);
      await convertDirectory(config.outputDir, config.pdfOutputDir, converter, logger.child('pdf'));
      break;
    }
    case 'dry-run':
      await generateDocuments(config, { dryRun: true, pdf: options.pdf, logger });
      break;
    case 'generate':
      await generateDocuments(config, { pdf: options.pdf, logger });
      break;
  }
};

export const createProgram = (action: (options: CliOptions) => Promise<void>): Command => {
  return new Command()
    .name('docx-mailmerge')
    .description('Generate one Word document per spreadsheet row from a «placeholder» template')
    .option('-c, --config <path>', 'configuration file (default: docgen.config.json)')
    .option('--inspect', 'show source columns, template placeholders and mapping status; generate nothing')
    .option('--dry-run', 'show what would be generated without creating files')
    .option('--pdf', 'convert generated documents to PDF after creation')
    .option('--pdf-only', 'convert existing documents of the output directory to PDF, no generation')
    .option('-v, --verbose', 'debug logging')
    .exitOverride()
    .action(action);
};

/**
 * Runs the CLI and returns the process exit code
 */
export const run = async (argv: string[]): Promise<number> => {
  let logger = createLogger('docgen');
  const program = createProgram(async (options) => {
    if (options.verbose) {
      logger = createLogger('docgen', { level: 'debug' });
    }
    await execute(options, logger);
  });

  try {
    await program.parseAsync(argv);
    return ExitCode.SUCCESS;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof DocgenError) {
      logger.error(error.format(logger.colors));
      return error.exitCode;
    }
    logger.error(error instanceof Error ? error.message : String(error));
    return ExitCode.ERROR;
  }
};
