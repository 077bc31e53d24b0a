#!/usr/bin/env node
import { loadDecoderConfig } from './config.js';
import { createLogger } from './infrastructure/logger.js';
import { runDecodeCommand } from './interfaces/cli/decode-command.js';

/**
 * Command-line entry point: decodes audit log files to NDJSON on stdout.
 * Logs go to stderr; see `src/config.ts` for the environment variables.
 */
function main(): number {
  const config = loadDecoderConfig();
  const log = createLogger(config.logLevel);

  return runDecodeCommand(process.argv.slice(2), {
    config,
    log,
    write: (line) => {
      process.stdout.write(`${line}\n`);
    },
  });
}

try {
  process.exitCode = main();
} catch (err: unknown) {
  console.error('Fatal: failed to start decoder', err);
  process.exitCode = 1;
}
