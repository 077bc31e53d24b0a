/**
 * Public API of the audit trail decoder.
 *
 * Typical use:
 *
 *   for (const { data, metadata } of streamLogFile(path, { log })) { ... }
 */
export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/json/index.js';
export { createLogger } from './infrastructure/logger.js';
export { loadDecoderConfig, ConfigError, envSchema } from './config.js';
export type { DecoderConfig } from './config.js';
