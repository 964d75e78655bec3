/**
 * Structured JSON logger shared by every Cloakroom component.
 *
 * Entries carry a level, a message, a timestamp, an optional component
 * path and arbitrary context fields. Fields whose names are listed as
 * sensitive are replaced with `"[redacted]"` before output, so a
 * stray plaintext or serialized ciphertext never reaches a log sink.
 *
 * @packageDocumentation
 */

// ─── Log levels ─────────────────────────────────────────────────────────────────

/** Numeric log levels; an entry is emitted when its level is >= the threshold. */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  /** Suppress all output. */
  SILENT = 4,
}

/** Lowercase level names accepted in configuration files. */
export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

// ─── Types ──────────────────────────────────────────────────────────────────────

/** A single structured log entry. */
export interface LogEntry {
  /** Uppercase level name, e.g. "INFO". */
  level: string;
  message: string;
  /** ISO 8601 timestamp. */
  timestamp: string;
  /** Dotted component path, e.g. "engine.reveal". */
  component?: string;
  [key: string]: unknown;
}

/** Receives each formatted {@link LogEntry}. */
export type LogOutput = (entry: LogEntry) => void;

/** Field names that are never written to a log sink. */
export const DEFAULT_SENSITIVE_FIELDS: readonly string[] = [
  'plaintext',
  'ciphertext',
  'payload',
  'proof',
  'privateKey',
  'value',
  'values',
];

const REDACTED = '[redacted]';

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

const defaultOutput: LogOutput = (entry: LogEntry): void => {
  console.log(JSON.stringify(entry));
};

/**
 * Map a configuration level name to a {@link LogLevel}.
 * Returns `undefined` for names that are not recognised.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  const key = name.toLowerCase();
  return isLogLevelName(key) ? LEVELS_BY_NAME[key] : undefined;
}

function isLogLevelName(name: string): name is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LEVELS_BY_NAME, name);
}

// ─── Logger ─────────────────────────────────────────────────────────────────────

/** Options accepted by the {@link Logger} constructor. */
export interface LoggerOptions {
  /** Minimum level to emit. Defaults to {@link LogLevel.INFO}. */
  level?: LogLevel;
  component?: string;
  /** Defaults to JSON via `console.log`. */
  output?: LogOutput;
  /** Field names to redact. Defaults to {@link DEFAULT_SENSITIVE_FIELDS}. */
  sensitiveFields?: readonly string[];
}

/**
 * Structured logger with level filtering, redaction and child loggers.
 *
 * ```ts
 * const log = new Logger({ level: LogLevel.DEBUG, component: 'engine' });
 * log.info('team optimized', { team: 'platform', members: 4 });
 * log.child('reveal').warn('proof rejected', { requestId });
 * ```
 */
export class Logger {
  private level: LogLevel;
  private readonly component: string | undefined;
  private readonly output: LogOutput;
  private readonly sensitive: ReadonlySet<string>;

  constructor(options?: LoggerOptions) {
    this.level = options?.level ?? LogLevel.INFO;
    this.component = options?.component;
    this.output = options?.output ?? defaultOutput;
    this.sensitive = new Set(options?.sensitiveFields ?? DEFAULT_SENSITIVE_FIELDS);
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, fields);
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, fields);
  }

  /**
   * Create a child logger sharing this logger's level, output and
   * redaction list. Its component is `parent.child` when the parent has one.
   */
  child(component: string): Logger {
    return new Logger({
      level: this.level,
      component: this.component ? `${this.component}.${component}` : component,
      output: this.output,
      sensitiveFields: [...this.sensitive],
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (level < this.level) {
      return;
    }

    const entry: LogEntry = {
      level: LEVEL_NAMES[level],
      message,
      timestamp: new Date().toISOString(),
      ...(this.component !== undefined ? { component: this.component } : {}),
    };

    if (fields) {
      for (const [key, value] of Object.entries(fields)) {
        if (key === 'level' || key === 'message' || key === 'timestamp' || key === 'component') {
          continue;
        }
        entry[key] = this.sensitive.has(key) ? REDACTED : value;
      }
    }

    this.output(entry);
  }
}

/** Convenience wrapper around `new Logger(options)`. */
export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}

/** Process-wide logger at {@link LogLevel.INFO}; components derive children from it. */
export const defaultLogger: Logger = createLogger({ component: 'cloakroom' });
