import { resolve } from 'node:path';
import pino from 'pino';
import type { LevelWithSilent, Logger } from 'pino';
import { StringCharSource } from '../src/infrastructure/json/char-source.js';
import { TokenCursor } from '../src/infrastructure/json/token-cursor.js';

/** Path of the three-record sample log. */
export const SAMPLE_LOG = resolve(process.cwd(), 'tests', 'fixtures', 'sample-log.json');

/** Cursor over an in-memory document, optionally split into tiny chunks. */
export function cursorOver(json: string, chunkSize?: number): TokenCursor {
  return new TokenCursor(new StringCharSource(json, chunkSize));
}

/** Wraps record texts in the `{"Records":[...]}` envelope. */
export function logOf(...records: string[]): string {
  return `{"Records":[${records.join(',')}]}`;
}

export interface LogEntry {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/**
 * Real pino logger writing into memory.
 * pino writes synchronously to plain `{ write }` destinations.
 */
export function captureLogger(level: LevelWithSilent = 'debug'): {
  log: Logger;
  entries: () => LogEntry[];
} {
  const lines: string[] = [];
  const log = pino({ level }, {
    write: (line: string) => {
      lines.push(line);
    },
  });

  return {
    log,
    entries: () => lines.map((line): LogEntry => JSON.parse(line)),
  };
}

export const WARN = 40;

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
