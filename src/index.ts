// Document model
export { Document } from './document';
export { Paragraph, Run, Table, TableCell, TableRow } from './model';
export type { RunInit } from './model';

// Placeholder engine
export { normalizeFilename } from './normalize';
export { extractPlaceholders, scanPlaceholders } from './scanner';
export { substitute, substituteAll } from './substitute';
export { render } from './renderer';
export { buildOutputIdentifier, DEFAULT_IDENTIFIER_FIELDS } from './identifier';
export { DEFAULT_DELIMITERS, placeholderToken } from './placeholder';

// Pipeline
export { readRecords, cellText } from './sources/workbook';
export {
  convertBatch,
  convertDirectory,
  findLibreOffice,
  LibreOfficeConverter,
  resolveConverter,
} from './convert/libreoffice';
export type { Converter, ConversionResult, ConversionFailure, LibreOfficeDeps } from './convert/libreoffice';
export { generateDocuments } from './generate';
export type { GenerateOptions, GenerationResult, PlannedDocument } from './generate';
export { inspect, formatInspection, checkMapping } from './inspect';
export type { InspectionReport, MappingCheck, MappingStatus } from './inspect';
export { loadConfig, resolveConfig, ConfigSchema } from './config';
export type { DocgenConfig } from './config';

// Errors and logging
export {
  DocgenError,
  ConfigError,
  SourceError,
  TemplateError,
  ConverterNotFoundError,
  ConversionError,
  ErrorCode,
  ExitCode,
} from './errors';
export { Logger, createLogger } from './utils/logger';

// Type exports
export type {
  DataRecord,
  Delimiters,
  PlaceholderMapping,
  TabularData,
  TextContainer,
  TextRun,
  TraversalOptions,
} from './types';
