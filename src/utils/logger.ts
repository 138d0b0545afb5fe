/**
 * Leveled logging to stderr.
 *
 * Normal command output goes to stdout and is often piped into a selector or
 * a pager, so every diagnostic is written to stderr instead.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

type ActiveLevel = Exclude<LogLevel, 'silent'>;

export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LEVEL_STYLE: Record<ActiveLevel, (text: string) => string> = {
  debug: chalk.dim,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

let currentLevel: LogLevel = 'warn';

type Sink = (line: string) => void;

let sink: Sink = line => {
  process.stderr.write(line + '\n');
};

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Redirect log output. Returns the previous sink so callers can restore it.
 */
export function setLogSink(next: Sink): Sink {
  const previous = sink;
  sink = next;
  return previous;
}

function format(level: ActiveLevel, message: string, meta?: Record<string, unknown>): string {
  let output = `${LEVEL_STYLE[level](level.toUpperCase().padEnd(5))} ${message}`;

  if (meta && Object.keys(meta).length > 0) {
    const metaStr = Object.entries(meta)
      .map(([k, v]) => `${k}=${typeof v === 'object' ? JSON.stringify(v) : String(v)}`)
      .join(' ');
    output += chalk.dim(` (${metaStr})`);
  }

  return output;
}

function log(level: ActiveLevel, msg: string, meta?: Record<string, unknown>): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentLevel]) return;
  sink(format(level, msg, meta));
}

export function createLogger(prefix: string): Logger {
  return {
    debug: (msg, meta) => log('debug', `[${prefix}] ${msg}`, meta),
    info: (msg, meta) => log('info', `[${prefix}] ${msg}`, meta),
    warn: (msg, meta) => log('warn', `[${prefix}] ${msg}`, meta),
    error: (msg, meta) => log('error', `[${prefix}] ${msg}`, meta),
  };
}
