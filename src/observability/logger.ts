/**
 * Structured logging
 *
 * The engine never requires a logger: every call site uses optional
 * chaining (`logger?.debug(...)`), so an absent logger changes nothing but
 * output. ConsoleLogger writes JSONL (one JSON object per line) to stderr,
 * leaving stdout to the host application.
 */

import { z } from 'zod';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  warning(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export const LogLevelSchema = z.enum(['debug', 'warning', 'error', 'silent']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  warning: 20,
  error: 30,
  silent: 100,
};

export interface ConsoleLoggerOptions {
  /** Minimum level written (default: warning) */
  level?: LogLevel;
  /** Added to every entry, e.g. { component: 'api-chain' } */
  baseFields?: LogFields;
  /** Output sink (default: console.error) */
  write?: (line: string) => void;
}

/**
 * JSONL logger on stderr
 *
 * Values that JSON cannot represent (Errors, bigints, cycles) are converted
 * so a log call never throws.
 */
export class ConsoleLogger implements Logger {
  private readonly threshold: number;
  private readonly baseFields: LogFields;
  private readonly write: (line: string) => void;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.threshold = LEVEL_ORDER[options.level ?? 'warning'];
    this.baseFields = options.baseFields ?? {};
    this.write = options.write ?? ((line) => console.error(line));
  }

  debug(message: string, fields?: LogFields): void {
    this.log('debug', message, fields);
  }

  warning(message: string, fields?: LogFields): void {
    this.log('warning', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.log('error', message, fields);
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < this.threshold) {
      return;
    }
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.baseFields,
      ...fields,
    };
    this.write(safeStringify(entry));
  }
}

function safeStringify(entry: LogFields): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(entry, (_key, value: unknown) => {
    if (value instanceof Error) {
      return { name: value.name, message: value.message };
    }
    if (typeof value === 'bigint') {
      return value.toString();
    }
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    return value;
  });
}

/**
 * Creates a child logger that adds fixed fields to every entry
 */
export function withFields(logger: Logger | undefined, fields: LogFields): Logger | undefined {
  if (!logger) {
    return undefined;
  }
  return {
    debug: (message, extra) => logger.debug(message, { ...fields, ...extra }),
    warning: (message, extra) => logger.warning(message, { ...fields, ...extra }),
    error: (message, extra) => logger.error(message, { ...fields, ...extra }),
  };
}
