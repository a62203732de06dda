/**
 * Structured logging for the tract lookup service
 *
 * Every line carries a timestamp, level, logger name and the context bound
 * through `child()` (request id, catalog generation). JSON lines in
 * production, a single readable line otherwise.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface LoggerOptions {
  readonly level: LogLevel;
  readonly name: string;
  readonly pretty: boolean;
  readonly context?: LogMetadata;
  /** Line sink per level; console by default */
  readonly write?: (level: LogLevel, line: string) => void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function writeToConsole(level: LogLevel, line: string): void {
  switch (level) {
    case 'debug':
      console.debug(line);
      return;
    case 'info':
      console.info(line);
      return;
    case 'warn':
      console.warn(line);
      return;
    case 'error':
      console.error(line);
      return;
  }
}

export class Logger {
  private readonly context: LogMetadata;
  private readonly write: (level: LogLevel, line: string) => void;

  constructor(private readonly options: LoggerOptions) {
    this.context = options.context ?? {};
    this.write = options.write ?? writeToConsole;
  }

  /**
   * Logger that adds `context` to every line. Per-call metadata wins on
   * key collisions.
   */
  child(context: LogMetadata): Logger {
    return new Logger({ ...this.options, context: { ...this.context, ...context } });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.options.level];
  }

  format(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const fields: LogMetadata = { ...this.context, ...metadata };
    const hasFields = Object.keys(fields).length > 0;

    if (this.options.pretty) {
      const suffix = hasFields ? ` ${JSON.stringify(fields)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.options.name}: ${message}${suffix}`;
    }

    return JSON.stringify({
      ...fields,
      timestamp,
      level,
      logger: this.options.name,
      message,
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.isLevelEnabled(level)) return;
    this.write(level, this.format(level, message, metadata));
  }
}

export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const level = env.LOG_LEVEL?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return 'info';
}

const SERVICE_NAME = 'tract-lookup';

export const logger = new Logger({
  level: getLogLevel(),
  name: SERVICE_NAME,
  pretty: process.env.NODE_ENV !== 'production',
});

/**
 * Logger named `tract-lookup:<module>`
 */
export function createLogger(context: { readonly module: string }): Logger {
  return new Logger({
    level: getLogLevel(),
    name: `${SERVICE_NAME}:${context.module}`,
    pretty: process.env.NODE_ENV !== 'production',
  });
}
