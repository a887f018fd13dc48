/**
 * AclKit — Logging.
 * Single-line, chalk-coloured records on stderr. Library code takes a
 * `Logger` so callers can route or silence output.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_COLOR: Record<Exclude<LogLevel, 'silent'>, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

export interface CreateLoggerOptions {
  level?: LogLevel;
  /** Where records are written (default: process.stderr) */
  stream?: { write(chunk: string): unknown };
}

function formatContext(context?: LogContext): string {
  if (!context) return '';
  const parts = Object.entries(context)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`);
  return parts.length > 0 ? ' ' + chalk.dim(parts.join(' ')) : '';
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const stream = options.stream ?? process.stderr;

  const write = (level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext) => {
    if (LEVEL_ORDER[level] < threshold) return;
    stream.write(`${LEVEL_COLOR[level](level.padEnd(5))} ${message}${formatContext(context)}\n`);
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
