import { z } from 'zod';
import type { LevelWithSilent } from 'pino';
import { SUPPORTED_EVENT_VERSION } from './application/record-builders.js';
import { RECORDS_FIELD } from './application/event-serializer.js';
import { DEFAULT_CHUNK_SIZE } from './infrastructure/json/char-source.js';

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const flagSchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

/**
 * Environment variables read by the decoder.
 * Every variable is optional; unset ones take the defaults below.
 */
export const envSchema = z.object({
  LOG_LEVEL: logLevelSchema.default('info'),
  SUPPORTED_EVENT_VERSION: z.coerce.number().positive().default(SUPPORTED_EVENT_VERSION),
  READ_CHUNK_SIZE: z.coerce.number().int().min(1).default(DEFAULT_CHUNK_SIZE),
  RAW_EVENT_INFO: flagSchema.default('false'),
  RECORDS_FIELD: z.string().min(1).default(RECORDS_FIELD),
});

export interface DecoderConfig {
  logLevel: LevelWithSilent;
  supportedEventVersion: number;
  readChunkSize: number;
  rawEventInfo: boolean;
  recordsField: string;
}

export class ConfigError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    super(
      `Invalid configuration: ${issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
    );
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Reads and validates the decoder configuration. Throws `ConfigError` on invalid values. */
export function loadDecoderConfig(
  env: Record<string, string | undefined> = process.env,
): DecoderConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }

  return {
    logLevel: parsed.data.LOG_LEVEL,
    supportedEventVersion: parsed.data.SUPPORTED_EVENT_VERSION,
    readChunkSize: parsed.data.READ_CHUNK_SIZE,
    rawEventInfo: parsed.data.RAW_EVENT_INFO,
    recordsField: parsed.data.RECORDS_FIELD,
  };
}
