import { existsSync } from 'fs';
import { extname } from 'path';
import ExcelJS from 'exceljs';
import type { CellValue, Worksheet } from 'exceljs';
import { SourceError } from '../errors';
import type { DataRecord, TabularData } from '../types';

export interface ReadRecordsOptions {
  /** Worksheet name; the first sheet when omitted. Ignored for CSV files. */
  sheet?: string;
}

/**
 * Converts a cell value to the text used for substitution
 */
export const cellText = (value: CellValue): string => {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  if (value instanceof Date) return value.toISOString();
  if ('richText' in value) return value.richText.map((part) => part.text).join('');
  if ('hyperlink' in value) return typeof value.text === 'string' ? value.text : cellText(value.text);
  if ('formula' in value || 'sharedFormula' in value) return cellText(value.result);
  if ('error' in value) return value.error;
  return '';
};

/**
 * Header names with blanks replaced by `Unnamed: <index>` and repeated
 * names suffixed `.1`, `.2`, ...
 */
const headerNames = (raw: string[]): string[] => {
  const seen = new Map<string, number>();
  return raw.map((value, index) => {
    const base = value.length > 0 ? value : `Unnamed: ${index}`;
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}.${count}`;
  });
};

const loadWorksheet = async (path: string, options: ReadRecordsOptions): Promise<Worksheet> => {
  const workbook = new ExcelJS.Workbook();
  try {
    if (extname(path).toLowerCase() === '.csv') {
      // Keep raw strings instead of exceljs' number and date detection
      return await workbook.csv.readFile(path, { map: (value: string) => value });
    }
    await workbook.xlsx.readFile(path);
  } catch (error) {
    throw new SourceError(`Cannot read data source: ${path}`, { cause: error });
  }

  const worksheet = options.sheet === undefined ? workbook.worksheets[0] : workbook.getWorksheet(options.sheet);
  if (!worksheet) {
    throw SourceError.sheetNotFound(
      options.sheet ?? '(first sheet)',
      workbook.worksheets.map((sheet) => sheet.name)
    );
  }
  return worksheet;
};

/**
 * Reads a spreadsheet (.xlsx) or CSV file into text records.
 * The first row holds the field names; rows without any value are skipped.
 */
export const readRecords = async (path: string, options: ReadRecordsOptions = {}): Promise<TabularData> => {
  if (!existsSync(path)) {
    throw SourceError.notFound(path);
  }
  const worksheet = await loadWorksheet(path, options);

  const headerRow = worksheet.getRow(1);
  const rawHeaders: string[] = [];
  for (let col = 1; col <= headerRow.cellCount; col++) {
    rawHeaders.push(cellText(headerRow.getCell(col).value));
  }
  const columns = headerNames(rawHeaders);

  const records: DataRecord[] = [];
  worksheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    if (rowNumber === 1) return;
    const record: Record<string, string> = {};
    let hasValue = false;
    columns.forEach((column, index) => {
      const text = cellText(row.getCell(index + 1).value);
      if (text.length > 0) hasValue = true;
      record[column] = text;
    });
    if (hasValue) {
      records.push(record);
    }
  });

  return { sheet: worksheet.name, columns, records };
};
