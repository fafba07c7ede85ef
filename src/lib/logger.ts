/**
 * Logger for guestsmith
 *
 * Operational log lines (driver commands, dry-run notices, hook output)
 * go to stderr so command results on stdout stay machine-readable.
 */

/**
 * Log level for messages
 */
export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warning: 30,
  error: 40,
};

const SYMBOLS: Record<LogLevel, string> = {
  debug: '·',
  info: '→',
  warning: '⚠',
  error: '✗',
};

/**
 * Destination for formatted log lines
 */
export type LogWriter = (line: string) => void;

/**
 * Options for constructing a Logger
 */
export interface LoggerOptions {
  /** Minimum level written (default: info) */
  level?: LogLevel;
  /** Line sink (default: process.stderr) */
  write?: LogWriter;
  /** Prefix prepended to every line, e.g. "[101]" */
  prefix?: string;
}

const stderrWriter: LogWriter = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Leveled logger with an optional scope prefix.
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly write: LogWriter;
  private readonly prefix: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.write = options.write ?? stderrWriter;
    this.prefix = options.prefix ?? '';
  }

  debug(message: string): void {
    this.log('debug', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  warning(message: string): void {
    this.log('warning', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  /**
   * Whether a message at `level` would be written.
   */
  isEnabled(level: LogLevel): boolean {
    return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.level];
  }

  /**
   * Create a logger sharing this sink and level, with an added prefix.
   */
  child(prefix: string): Logger {
    return new Logger({
      level: this.level,
      write: this.write,
      prefix: this.prefix ? `${this.prefix} ${prefix}` : prefix,
    });
  }

  private log(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const scope = this.prefix ? `${this.prefix} ` : '';
    this.write(`${SYMBOLS[level]} ${scope}${message}`);
  }

  /**
   * Create a logger from CLI options.
   */
  static fromOptions(options: { verbose?: boolean; json?: boolean }): Logger {
    if (options.json) {
      // JSON mode keeps stderr for warnings and errors only
      return new Logger({ level: options.verbose ? 'debug' : 'warning' });
    }
    return new Logger({ level: options.verbose ? 'debug' : 'info' });
  }
}

/**
 * Logger that discards everything.
 */
export function silentLogger(): Logger {
  return new Logger({ write: () => undefined });
}
