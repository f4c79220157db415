/**
 * Leveled logger used by the CLI, the REPL and the interpreter.
 *
 * Every level goes to stderr so that program output on stdout stays
 * clean. Levels: silent < error < warn < info < debug.
 */

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface LogSink {
  (line: string): void;
}

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  sink?: LogSink;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export class Logger {
  private readonly name: string;
  private level: LogLevel;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.name = options.name ?? 'aki';
    this.level = options.level ?? 'warn';
    this.sink = options.sink ?? ((line: string) => console.error(line));
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.level];
  }

  error(message: string, payload?: unknown): void {
    this.log('error', message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log('warn', message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log('info', message, payload);
  }

  debug(message: string, payload?: unknown): void {
    this.log('debug', message, payload);
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, payload?: unknown): void {
    if (!this.isEnabled(level)) return;
    let line = `[${this.name}] ${level.toUpperCase()} ${message}`;
    if (payload !== undefined) {
      line += ' ' + safeJson(payload);
    }
    this.sink(line);
  }
}

function safeJson(payload: unknown): string {
  try {
    return JSON.stringify(payload);
  } catch {
    return String(payload);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}
