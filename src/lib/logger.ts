import { appendFileSync, mkdirSync } from 'fs';
import path from 'path';

interface LogFields {
  [key: string]: unknown;
}

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export interface Logger {
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
}

export interface LoggerOptions {
  /** Also append every entry to this file. */
  filePath?: string;
  now?: () => Date;
  console?: Pick<Console, 'log' | 'error'>;
}

function serializeField(value: unknown): unknown {
  return value instanceof Error ? { name: value.name, message: value.message } : value;
}

export function formatLogLine(level: LogLevel, message: string, fields: LogFields, time: Date): string {
  const payload: LogFields = { time: time.toISOString(), level, message };
  for (const [key, value] of Object.entries(fields)) {
    payload[key] = serializeField(value);
  }
  return JSON.stringify(payload);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const now = options.now ?? (() => new Date());
  const sink = options.console ?? console;

  if (options.filePath) {
    mkdirSync(path.dirname(options.filePath), { recursive: true });
  }

  function write(level: LogLevel, message: string, fields: LogFields = {}): void {
    const line = formatLogLine(level, message, fields, now());
    if (level === 'error') {
      sink.error(line);
    } else {
      sink.log(line);
    }
    if (options.filePath) {
      appendFileSync(options.filePath, `${line}\n`, 'utf8');
    }
  }

  return {
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
    debug: (message, fields) => write('debug', message, fields)
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined
};
