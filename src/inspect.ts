import type { DocgenConfig } from './config';
import { Document } from './document';
import { placeholderToken } from './placeholder';
import { scanPlaceholders } from './scanner';
import { readRecords } from './sources/workbook';
import type { Delimiters } from './types';

const SAMPLE_WIDTH = 60;
const RULE = '='.repeat(60);

export type MappingStatus = 'mapped' | 'column-missing' | 'unmapped';

export interface MappingCheck {
  placeholder: string;
  column?: string;
  status: MappingStatus;
}

export interface InspectionReport {
  source: string;
  sheet: string;
  rowCount: number;
  columns: string[];
  /** First record, values truncated for display */
  sample: Array<{ column: string; value: string }>;
  template: string;
  delimiters: Delimiters;
  /** Sorted placeholder names found in the template */
  placeholders: string[];
  mapping: MappingCheck[];
}

const truncate = (value: string): string => (value.length > SAMPLE_WIDTH ? `${value.slice(0, SAMPLE_WIDTH)}...` : value);

/**
 * Checks every template placeholder against the mapping and the source columns
 */
export const checkMapping = (
  placeholders: string[],
  mapping: Readonly<Record<string, string>>,
  columns: string[]
): MappingCheck[] => {
  const known = new Set(columns);
  return placeholders.map((placeholder): MappingCheck => {
    if (!Object.hasOwn(mapping, placeholder)) {
      return { placeholder, status: 'unmapped' };
    }
    const column = mapping[placeholder];
    return { placeholder, column, status: known.has(column) ? 'mapped' : 'column-missing' };
  });
};

/**
 * Collects what the data source and the template contain, without generating
 */
export const inspect = async (config: DocgenConfig): Promise<InspectionReport> => {
  const table = await readRecords(config.source.file, { sheet: config.source.sheet });
  const template = await Document.fromFile(config.template);
  const placeholders = scanPlaceholders(template, {
    delimiters: config.delimiters,
    includeHeadersFooters: config.includeHeadersFooters,
  }).sort();

  const first = table.records[0];
  return {
    source: config.source.file,
    sheet: table.sheet,
    rowCount: table.records.length,
    columns: table.columns,
    sample: first ? table.columns.map((column) => ({ column, value: truncate(first[column] ?? '') })) : [],
    template: config.template,
    delimiters: config.delimiters,
    placeholders,
    mapping: checkMapping(placeholders, config.mapping, table.columns),
  };
};

/**
 * Renders a report as console lines
 */
export const formatInspection = (report: InspectionReport): string[] => {
  const token = (name: string) => placeholderToken(name, report.delimiters);
  const lines = [RULE, 'DATA SOURCE INSPECTION', RULE, ''];

  lines.push(`File: ${report.source}`, `Sheet: ${report.sheet}`, `Total rows: ${report.rowCount}`, '');
  lines.push(`Columns (${report.columns.length}):`);
  report.columns.forEach((column, index) => lines.push(`  ${String(index + 1).padStart(2)}. ${column}`));

  if (report.sample.length > 0) {
    lines.push('', 'First row sample:');
    for (const { column, value } of report.sample) {
      lines.push(`  ${column}: ${value}`);
    }
  }

  lines.push('', RULE, 'TEMPLATE INSPECTION', RULE, '', `File: ${report.template}`, '');
  lines.push(`Placeholders found (${report.placeholders.length}):`);
  for (const placeholder of report.placeholders) {
    lines.push(`  ${token(placeholder)}`);
  }

  lines.push('', RULE, 'PLACEHOLDER MAPPING', RULE);
  for (const check of report.mapping) {
    switch (check.status) {
      case 'mapped':
        lines.push(`  ✓ ${token(check.placeholder)} -> '${check.column}'`);
        break;
      case 'column-missing':
        lines.push(`  ✗ ${token(check.placeholder)} -> '${check.column}' (COLUMN NOT FOUND!)`);
        break;
      case 'unmapped':
        lines.push(`  ✗ ${token(check.placeholder)} -> NOT MAPPED`);
        break;
    }
  }

  return lines;
};
