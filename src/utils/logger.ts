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

/**
 * Console logger filtered by level.
 * info/debug go to stdout, warn/error to stderr.
 */
export class Logger {
  private level: LogLevel;

  constructor(level: string = 'info') {
    this.level = isLogLevel(level) ? level : 'info';
  }

  setLevel(level: string): void {
    if (isLogLevel(level)) {
      this.level = level;
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  debug(message: string): void {
    if (this.enabled('debug')) {
      console.log(`[debug] ${message}`);
    }
  }

  info(message: string): void {
    if (this.enabled('info')) {
      console.log(message);
    }
  }

  warn(message: string): void {
    if (this.enabled('warn')) {
      console.warn(`Warning: ${message}`);
    }
  }

  error(message: string): void {
    if (this.enabled('error')) {
      console.error(`Error: ${message}`);
    }
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }
}

export const logger = new Logger(process.env.LOG_LEVEL || 'info');
