import type { LogLevel } from '../types/config.js';

export type LogContext = Record<string, string | number | boolean | undefined>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export interface ConsoleLoggerOptions {
  /** Printed in brackets before each line. Default: authrag */
  prefix?: string;
  level?: LogLevel;
  /** Line sink, stderr by default so stdout stays clean for command output. */
  write?: (line: string) => void;
}

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function formatValue(value: string | number | boolean): string {
  if (typeof value !== 'string') return String(value);
  return /[\s="]/.test(value) ? JSON.stringify(value) : value;
}

export function formatContext(context: LogContext | undefined): string {
  if (!context) return '';
  const parts: string[] = [];
  for (const [key, value] of Object.entries(context)) {
    if (value === undefined) continue;
    parts.push(`${key}=${formatValue(value)}`);
  }
  return parts.length > 0 ? ` ${parts.join(' ')}` : '';
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const prefix = options.prefix ?? 'authrag';
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  // eslint-disable-next-line no-console
  const write = options.write ?? ((line: string) => console.error(line));

  const emit = (level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void => {
    if (LEVEL_ORDER[level] < threshold) return;
    write(`[${prefix}] ${level}: ${message}${formatContext(context)}`);
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
