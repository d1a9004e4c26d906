/**
 * Error hierarchy for document generation.
 *
 * Rendering itself never throws; these errors come from the edges:
 * configuration, the data source, the template file and PDF conversion.
 *
 * Exit codes:
 * - 0: Success
 * - 1: General error
 * - 2: Misuse (invalid arguments/options)
 * - 7: Resource not found
 * - 8: Timeout
 * - 10: Configuration error
 */

export const ExitCode = {
  SUCCESS: 0,
  ERROR: 1,
  MISUSE: 2,
  NOT_FOUND: 7,
  TIMEOUT: 8,
  CONFIG_ERROR: 10,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export const ErrorCode = {
  UNKNOWN: 'unknown_error',

  CONFIG_NOT_FOUND: 'config_not_found',
  CONFIG_INVALID: 'config_invalid',
  CONFIG_PARSE_ERROR: 'config_parse_error',

  SOURCE_NOT_FOUND: 'source_not_found',
  SHEET_NOT_FOUND: 'sheet_not_found',
  SOURCE_UNREADABLE: 'source_unreadable',

  TEMPLATE_NOT_FOUND: 'template_not_found',
  TEMPLATE_INVALID: 'template_invalid',

  CONVERTER_NOT_FOUND: 'converter_not_found',
  CONVERSION_FAILED: 'conversion_failed',
  CONVERSION_TIMEOUT: 'conversion_timeout',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface DocgenErrorOptions {
  code?: ErrorCodeValue;
  exitCode?: ExitCodeValue;
  details?: Record<string, unknown>;
  hint?: string;
  cause?: unknown;
}

/**
 * Base class for all errors raised by this package
 */
export class DocgenError extends Error {
  readonly code: ErrorCodeValue;
  readonly exitCode: ExitCodeValue;
  readonly details?: Record<string, unknown>;
  readonly hint?: string;

  constructor(message: string, options: DocgenErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'DocgenError';
    this.code = options.code ?? ErrorCode.UNKNOWN;
    this.exitCode = options.exitCode ?? ExitCode.ERROR;
    this.details = options.details;
    this.hint = options.hint;
  }

  /**
   * Human-readable form: message, then hint and details when present
   */
  format(useColors = false): string {
    const red = useColors ? '\x1b[31m' : '';
    const dim = useColors ? '\x1b[2m' : '';
    const reset = useColors ? '\x1b[0m' : '';

    let output = `${red}Error:${reset} ${this.message}`;

    if (this.hint) {
      output += `\n${dim}Hint: ${this.hint}${reset}`;
    }

    if (this.details && Object.keys(this.details).length > 0) {
      const detailsStr = Object.entries(this.details)
        .map(([k, v]) => `  ${k}: ${typeof v === 'string' ? v : JSON.stringify(v)}`)
        .join('\n');
      output += `\n${dim}Details:\n${detailsStr}${reset}`;
    }

    return output;
  }
}

/**
 * Missing, unparsable or invalid configuration file
 */
export class ConfigError extends DocgenError {
  constructor(message: string, options: DocgenErrorOptions = {}) {
    super(message, {
      ...options,
      code: options.code ?? ErrorCode.CONFIG_INVALID,
      exitCode: options.exitCode ?? ExitCode.CONFIG_ERROR,
    });
    this.name = 'ConfigError';
  }
}

/**
 * The tabular data source cannot be read
 */
export class SourceError extends DocgenError {
  constructor(message: string, options: DocgenErrorOptions = {}) {
    super(message, { ...options, code: options.code ?? ErrorCode.SOURCE_UNREADABLE });
    this.name = 'SourceError';
  }

  static notFound(path: string): SourceError {
    return new SourceError(`Data source not found: ${path}`, {
      code: ErrorCode.SOURCE_NOT_FOUND,
      exitCode: ExitCode.NOT_FOUND,
      hint: 'Check source.file in the configuration.',
    });
  }

  static sheetNotFound(sheet: string, available: string[]): SourceError {
    return new SourceError(`Sheet not found: ${sheet}`, {
      code: ErrorCode.SHEET_NOT_FOUND,
      exitCode: ExitCode.NOT_FOUND,
      details: { available: available.join(', ') },
    });
  }
}

/**
 * The template cannot be loaded as a Word document
 */
export class TemplateError extends DocgenError {
  constructor(message: string, options: DocgenErrorOptions = {}) {
    super(message, { ...options, code: options.code ?? ErrorCode.TEMPLATE_INVALID });
    this.name = 'TemplateError';
  }

  static notFound(path: string, cause?: unknown): TemplateError {
    return new TemplateError(`Template not found: ${path}`, {
      code: ErrorCode.TEMPLATE_NOT_FOUND,
      exitCode: ExitCode.NOT_FOUND,
      cause,
    });
  }

  static invalid(label: string, reason: string, cause?: unknown): TemplateError {
    return new TemplateError(`Invalid Word document (${label}): ${reason}`, { cause });
  }
}

/**
 * No LibreOffice executable could be located
 */
export class ConverterNotFoundError extends DocgenError {
  constructor(options: { afterGeneration?: boolean } = {}) {
    const rerun = options.afterGeneration
      ? 'Then re-run with --pdf-only to convert the existing files.'
      : 'Then re-run this command.';
    super('LibreOffice not found.', {
      code: ErrorCode.CONVERTER_NOT_FOUND,
      exitCode: ExitCode.ERROR,
      hint: `Install it (macOS: brew install --cask libreoffice, Debian/Ubuntu: apt install libreoffice-writer). ${rerun}`,
    });
    this.name = 'ConverterNotFoundError';
  }
}

/**
 * Conversion of a single document failed
 */
export class ConversionError extends DocgenError {
  constructor(message: string, options: DocgenErrorOptions = {}) {
    super(message, { ...options, code: options.code ?? ErrorCode.CONVERSION_FAILED });
    this.name = 'ConversionError';
  }
}
