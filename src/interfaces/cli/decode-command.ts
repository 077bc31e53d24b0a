import { readFileSync } from 'node:fs';
import type { Logger } from 'pino';
import type { DecoderConfig } from '../../config.js';
import type { DecodedEvent, LogDeliveryInfo } from '../../domain/index.js';
import { openLogText, streamLogFile } from '../../application/index.js';

export const USAGE = 'Usage: audit-trail-decode <log-file> [log-file...]';

export interface DecodeCommandDeps {
  config: DecoderConfig;
  log: Logger;
  /** Receives one NDJSON line (without the newline) per decoded event. */
  write: (line: string) => void;
}

/**
 * Decodes each log file and writes its events as NDJSON.
 *
 * Files are processed independently: a failure in one is logged and the
 * remaining files are still decoded.
 *
 * @returns process exit code (0 ok, 1 some file failed, 2 usage error)
 */
export function runDecodeCommand(
  paths: readonly string[],
  deps: DecodeCommandDeps,
): number {
  const { config, log, write } = deps;

  if (paths.length === 0) {
    log.error(USAGE);
    return 2;
  }

  let failures = 0;

  for (const path of paths) {
    const fileLog = log.child({ logName: path });
    let decoded = 0;

    try {
      for (const event of readEvents(path, config, fileLog)) {
        write(JSON.stringify({ metadata: event.metadata, event: event.data }));
        decoded++;
      }
      fileLog.info({ decoded }, 'Log decoded');
    } catch (err: unknown) {
      failures++;
      fileLog.error({ err, decoded }, 'Failed to decode log');
    }
  }

  return failures > 0 ? 1 : 0;
}

/**
 * Raw event info needs the whole text to slice records from, so the file is
 * read up front in that mode and streamed otherwise.
 */
function* readEvents(
  path: string,
  config: DecoderConfig,
  log: Logger,
): Generator<DecodedEvent<LogDeliveryInfo>, void, undefined> {
  const options = {
    log,
    logName: path,
    supportedEventVersion: config.supportedEventVersion,
    recordsField: config.recordsField,
    chunkSize: config.readChunkSize,
  };

  if (!config.rawEventInfo) {
    yield* streamLogFile(path, options);
    return;
  }

  const serializer = openLogText(readFileSync(path, 'utf-8'), { ...options, rawEventInfo: true });
  try {
    yield* serializer;
  } finally {
    serializer.close();
  }
}
