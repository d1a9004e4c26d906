import { mkdir } from 'fs/promises';
import { join } from 'path';
import type { DocgenConfig } from './config';
import { convertBatch, resolveConverter } from './convert/libreoffice';
import type { ConversionResult, Converter } from './convert/libreoffice';
import { Document } from './document';
import { buildOutputIdentifier } from './identifier';
import { render } from './renderer';
import { readRecords } from './sources/workbook';
import { createLogger } from './utils/logger';
import type { Logger } from './utils/logger';

export interface GenerateOptions {
  /** Plan and log only; nothing is written */
  dryRun?: boolean;

  /** Convert generated documents to PDF afterwards */
  pdf?: boolean;

  /** Converter to use instead of locating LibreOffice */
  converter?: Converter;

  logger?: Logger;
}

export interface PlannedDocument {
  /** 1-based record position */
  position: number;
  identifier: string;
  docxPath: string;
  pdfPath: string;
}

export interface GenerationResult {
  planned: PlannedDocument[];
  /** Written .docx paths, in record order */
  generated: string[];
  conversion?: ConversionResult;
}

/**
 * Generates one document per data record.
 *
 * Output names come from the identifier fields. Records sharing a name
 * overwrite each other's output; the last one wins.
 */
export const generateDocuments = async (config: DocgenConfig, options: GenerateOptions = {}): Promise<GenerationResult> => {
  const logger = options.logger ?? createLogger('generate');
  const dryRun = options.dryRun ?? false;
  const { records } = await readRecords(config.source.file, { sheet: config.source.sheet });

  logger.info(`Generating ${records.length} documents...`);
  logger.info(`Output directory: ${config.outputDir}`);

  const planned = records.map((record, index): PlannedDocument => {
    const identifier = buildOutputIdentifier(record, index + 1, config.identifierFields);
    return {
      position: index + 1,
      identifier,
      docxPath: join(config.outputDir, `${identifier}.docx`),
      pdfPath: join(config.pdfOutputDir, `${identifier}.pdf`),
    };
  });

  if (dryRun) {
    logger.info('[DRY RUN - No files will be created]');
    for (const item of planned) {
      logger.log(`  Would create: ${item.docxPath}`);
      if (options.pdf) {
        logger.log(`  Would convert to: ${item.pdfPath}`);
      }
    }
    return { planned, generated: [] };
  }

  const template = await Document.fromFile(config.template);
  await mkdir(config.outputDir, { recursive: true });

  const generated: string[] = [];
  for (const [index, record] of records.entries()) {
    const item = planned[index];
    const document = render(template, record, config.mapping, {
      delimiters: config.delimiters,
      includeHeadersFooters: config.includeHeadersFooters,
    });
    await document.toFile(item.docxPath);
    logger.log(`  Created: ${item.docxPath}`);
    generated.push(item.docxPath);
  }
  logger.success(`Generated ${generated.length} documents in ${config.outputDir}`);

  if (!options.pdf || generated.length === 0) {
    return { planned, generated };
  }

  const converter =
    options.converter ??
    resolveConverter({
      executable: config.conversion.executable,
      timeoutMs: config.conversion.timeoutMs,
      afterGeneration: true,
    });
  const conversion = await convertBatch(generated, config.pdfOutputDir, converter, logger.child('pdf'));
  return { planned, generated, conversion };
};
