import type { Logger } from 'pino';
import type { DecodedEvent, LogDeliveryInfo } from '../domain/event.js';
import { FileCharSource, StringCharSource } from '../infrastructure/json/char-source.js';
import { TokenCursor } from '../infrastructure/json/token-cursor.js';
import { EventSerializer } from './event-serializer.js';
import { createLogDeliveryMetadataFactory } from './metadata.js';
import type { MetadataFactory } from './metadata.js';

export interface DecodeLogOptions {
  log: Logger;
  /** Name recorded in each event's metadata. */
  logName?: string | undefined;
  supportedEventVersion?: number | undefined;
  recordsField?: string | undefined;
  /** Characters (text input) or bytes (file input) read per chunk. */
  chunkSize?: number | undefined;
}

export interface DecodeLogTextOptions extends DecodeLogOptions {
  /** Attach each record's source text to its metadata. */
  rawEventInfo?: boolean | undefined;
}

/**
 * Opens a serializer over in-memory log text with the envelope already
 * consumed. The caller owns the returned serializer and must close it.
 */
export function openLogText(
  text: string,
  options: DecodeLogTextOptions,
): EventSerializer<LogDeliveryInfo> {
  const cursor = new TokenCursor(new StringCharSource(text, options.chunkSize));
  const metadataFactory = createLogDeliveryMetadataFactory(
    options.rawEventInfo === true
      ? { logName: options.logName ?? '<text>', rawText: text }
      : { logName: options.logName ?? '<text>' },
  );
  return openSerializer(cursor, metadataFactory, options);
}

/**
 * Opens a serializer that reads the file incrementally. The caller owns the
 * returned serializer and must close it.
 */
export function openLogFile(
  path: string,
  options: DecodeLogOptions,
): EventSerializer<LogDeliveryInfo> {
  const cursor = new TokenCursor(new FileCharSource(path, options.chunkSize));
  const metadataFactory = createLogDeliveryMetadataFactory({ logName: options.logName ?? path });
  return openSerializer(cursor, metadataFactory, options);
}

/** Decodes every record of a log held in memory. */
export function decodeLogText(
  text: string,
  options: DecodeLogTextOptions,
): DecodedEvent<LogDeliveryInfo>[] {
  const serializer = openLogText(text, options);
  try {
    return [...serializer];
  } finally {
    serializer.close();
  }
}

/**
 * Yields the records of a log file one at a time. The file is closed when
 * the generator finishes, throws, or is abandoned through `return()`
 * (as `break` in a `for...of` loop does).
 */
export function* streamLogFile(
  path: string,
  options: DecodeLogOptions,
): Generator<DecodedEvent<LogDeliveryInfo>, void, undefined> {
  const serializer = openLogFile(path, options);
  try {
    yield* serializer;
  } finally {
    serializer.close();
  }
}

function openSerializer(
  cursor: TokenCursor,
  metadataFactory: MetadataFactory<LogDeliveryInfo>,
  options: DecodeLogOptions,
): EventSerializer<LogDeliveryInfo> {
  const serializer = new EventSerializer(cursor, {
    metadataFactory,
    log: options.log,
    supportedEventVersion: options.supportedEventVersion,
    recordsField: options.recordsField,
  });

  try {
    serializer.openEnvelope();
  } catch (err: unknown) {
    serializer.close();
    throw err;
  }
  return serializer;
}
