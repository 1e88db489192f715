import chalk, { Chalk, type ChalkInstance } from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/** Anything log lines can be written to. */
export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  readonly level?: LogLevel;
  /** Destination of every level. Default: `process.stderr`, keeping stdout free for CSV. */
  readonly sink?: LogSink;
  /** Colour output with chalk. Default: `true` (chalk still drops colours on a non-TTY). */
  readonly colors?: boolean;
}

/**
 * Leveled logger for the CLI.
 */
export class Logger {
  private level: LogLevel;
  private readonly sink: LogSink;
  private readonly paint: ChalkInstance;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.sink = options.sink ?? process.stderr;
    this.paint = options.colors === false ? new Chalk({ level: 0 }) : chalk;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private line(text: string): void {
    this.sink.write(`${text}\n`);
  }

  debug(message: string): void {
    if (!this.shouldLog('debug')) return;
    this.line(this.paint.gray(`[DEBUG] ${message}`));
  }

  info(message: string): void {
    if (!this.shouldLog('info')) return;
    this.line(this.paint.blue(`[INFO] ${message}`));
  }

  warn(message: string): void {
    if (!this.shouldLog('warn')) return;
    this.line(this.paint.yellow(`[WARN] ${message}`));
  }

  error(message: string): void {
    if (!this.shouldLog('error')) return;
    this.line(this.paint.red(`[ERROR] ${message}`));
  }

  /**
   * Log a success message (shown at `info` and below).
   */
  success(message: string): void {
    if (!this.shouldLog('info')) return;
    this.line(this.paint.green(`✓ ${message}`));
  }
}

export const logger = new Logger();
