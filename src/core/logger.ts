export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export class Logger {
  constructor(
    private readonly level: LogLevel = 'info',
    private scope?: string
  ) {}

  child(scope: string): Logger {
    return new Logger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
  }

  debug(message: string, ...meta: unknown[]): void {
    this.write('debug', message, meta);
  }

  info(message: string, ...meta: unknown[]): void {
    this.write('info', message, meta);
  }

  warn(message: string, ...meta: unknown[]): void {
    this.write('warn', message, meta);
  }

  error(message: string, ...meta: unknown[]): void {
    this.write('error', message, meta);
  }

  private write(level: LogLevel, message: string, meta: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }
    const prefix = `${new Date().toISOString()} [${level.toUpperCase()}]${
      this.scope ? ` [${this.scope}]` : ''
    }`;
    const details = meta.map(formatMeta);
    const sink =
      level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
    sink(`${prefix} ${message}`, ...details);
  }
}

function formatMeta(value: unknown): unknown {
  if (value instanceof Error) {
    return value.stack ?? value.message;
  }
  return value;
}

/**
 * Normalize any thrown value into a message string.
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
