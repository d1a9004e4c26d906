/**
 * Console logger with levels and a context prefix.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'success';

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
  silent?: boolean;
  colors?: boolean;
}

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
};

const icons: Record<LogLevel, string> = {
  debug: colors.gray + '[debug]' + colors.reset,
  info: colors.blue + '[info]' + colors.reset,
  warn: colors.yellow + '[warn]' + colors.reset,
  error: colors.red + '[error]' + colors.reset,
  success: colors.green + '[ok]' + colors.reset,
};

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  success: 1,
};

export class Logger {
  private level: LogLevel;
  private context: string;
  private silent: boolean;
  private useColors: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? (process.env.DEBUG ? 'debug' : 'info');
    this.context = options.context ?? '';
    this.silent = options.silent ?? false;
    this.useColors = options.colors ?? process.stdout.isTTY ?? false;
  }

  get colors(): boolean {
    return this.useColors;
  }

  private format(level: LogLevel, message: string, data?: Record<string, unknown>): string {
    const icon = this.useColors ? icons[level] : `[${level}]`;
    const ctx = this.context ? (this.useColors ? `${colors.dim}(${this.context})${colors.reset} ` : `(${this.context}) `) : '';

    let output = `${icon} ${ctx}${message}`;

    if (data) {
      const dataStr = JSON.stringify(data, null, 2);
      output += this.useColors ? `\n${colors.dim}${dataStr}${colors.reset}` : `\n${dataStr}`;
    }

    return output;
  }

  private shouldLog(level: LogLevel): boolean {
    return !this.silent && levelPriority[level] >= levelPriority[this.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      console.log(this.format('debug', message, data));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.log(this.format('info', message, data));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      console.warn(this.format('warn', message, data));
    }
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      console.error(this.format('error', message, data));
    }
  }

  success(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('success')) {
      console.log(this.format('success', message, data));
    }
  }

  /**
   * Plain output without level or context
   */
  log(message: string): void {
    if (!this.silent) {
      console.log(message);
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(context: string): Logger {
    return new Logger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      silent: this.silent,
      colors: this.useColors,
    });
  }
}

export const createLogger = (context?: string, options?: Omit<LoggerOptions, 'context'>): Logger => {
  return new Logger({ ...options, context });
};
