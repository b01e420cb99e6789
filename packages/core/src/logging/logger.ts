/**
 * Structured Logger
 *
 * One JSON line per entry on stdout. Bearer tokens and Authorization headers
 * are redacted before anything is written.
 *
 * @module @dicom-it/core/logging
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface for dependency injection
 */
export interface ILogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): ILogger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const REDACTION_PATTERNS: RegExp[] = [
  /Bearer\s+[a-zA-Z0-9\-._~+/]+=*/gi,
  /Authorization:\s*[^\s,;]+/gi,
  /ya29\.[a-zA-Z0-9_-]+/g,
];

/**
 * Replace credentials in a serialized log line
 */
export function redact(line: string): string {
  let result = line;
  for (const pattern of REDACTION_PATTERNS) {
    pattern.lastIndex = 0;
    result = result.replace(pattern, '[REDACTED]');
  }
  return result;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export interface ConsoleLoggerOptions {
  /** Minimum level written (default: info) */
  minLevel?: LogLevel;
  /** Line sink, stdout by default */
  write?: (line: string) => void;
}

/**
 * Console logger writing JSON lines
 */
export class ConsoleLogger implements ILogger {
  private readonly minLevel: LogLevel;
  private readonly write: (line: string) => void;

  constructor(
    private readonly context: Record<string, unknown> = {},
    options: ConsoleLoggerOptions = {}
  ) {
    this.minLevel = options.minLevel ?? 'info';
    this.write = options.write ?? ((line) => console.log(line));
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  child(context: Record<string, unknown>): ILogger {
    return new ConsoleLogger(
      { ...this.context, ...context },
      { minLevel: this.minLevel, write: this.write }
    );
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const entry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...this.context,
      ...meta,
    };

    this.write(redact(JSON.stringify(entry)));
  }
}

/**
 * Logger that drops everything
 */
export class NoOpLogger implements ILogger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(): ILogger {
    return this;
  }
}

/**
 * Create the default logger, honoring DICOM_IT_LOG_LEVEL
 */
export function createLogger(
  context: Record<string, unknown> = {},
  env: NodeJS.ProcessEnv = process.env,
  write?: (line: string) => void
): ILogger {
  const requested = env.DICOM_IT_LOG_LEVEL?.toLowerCase();
  const minLevel = requested && isLogLevel(requested) ? requested : 'info';
  return new ConsoleLogger({ service: 'dicom-it', ...context }, { minLevel, write });
}
