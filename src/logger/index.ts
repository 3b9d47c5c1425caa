export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(scope: string): Logger;
}

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const ICONS: Record<LogLevel, string> = {
  debug: '🐛',
  info: 'ℹ️ ',
  warn: '⚠️ ',
  error: '❌',
};

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  /** Defaults to console; tests pass a recorder. */
  sink?: (level: LogLevel, line: string, details: unknown[]) => void;
}

function consoleSink(level: LogLevel, line: string, details: unknown[]): void {
  switch (level) {
    case 'error':
      console.error(line, ...details);
      break;
    case 'warn':
      console.warn(line, ...details);
      break;
    default:
      console.log(line, ...details);
  }
}

class ConsoleLogger implements Logger {
  constructor(
    private readonly threshold: number,
    private readonly scope: string | undefined,
    private readonly sink: NonNullable<LoggerOptions['sink']>,
  ) {}

  debug(message: string, ...details: unknown[]): void {
    this.write('debug', message, details);
  }

  info(message: string, ...details: unknown[]): void {
    this.write('info', message, details);
  }

  warn(message: string, ...details: unknown[]): void {
    this.write('warn', message, details);
  }

  error(message: string, ...details: unknown[]): void {
    this.write('error', message, details);
  }

  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new ConsoleLogger(this.threshold, nested, this.sink);
  }

  private write(level: LogLevel, message: string, details: unknown[]): void {
    if (LEVELS[level] < this.threshold) return;
    const scope = this.scope ? ` [${this.scope}]` : '';
    this.sink(level, `${new Date().toISOString()} ${ICONS[level]}${scope} ${message}`, details);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new ConsoleLogger(LEVELS[options.level ?? 'info'], options.scope, options.sink ?? consoleSink);
}

export function silentLogger(): Logger {
  return createLogger({ sink: () => undefined });
}
