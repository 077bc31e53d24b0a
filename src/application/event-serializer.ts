import type { Logger } from 'pino';
import { resolveAccountId } from '../domain/account-resolver.js';
import {
  MalformedEnvelopeError,
  MalformedRecordError,
  SerializerClosedError,
} from '../domain/errors.js';
import type { DecodedEvent, EventMetadata, EventRecord } from '../domain/event.js';
import type { TokenCursor } from '../infrastructure/json/token-cursor.js';
import type { MetadataFactory } from './metadata.js';
import { createEventRecordBuilder } from './record-builders.js';

export const RECORDS_FIELD = 'Records';

export interface EventSerializerOptions<M extends EventMetadata> {
  metadataFactory: MetadataFactory<M>;
  log: Logger;
  supportedEventVersion?: number | undefined;
  /** Name of the array field wrapping the records. */
  recordsField?: string | undefined;
}

/**
 * Walks `{ "Records": [ {...}, ... ] }` one record at a time.
 *
 * Usage:
 * 1. `openEnvelope()` once
 * 2. `hasMore()` / `next()` in alternation, or iterate the serializer
 * 3. `close()` on every exit path
 *
 * The serializer exclusively owns its cursor. Only the current record is
 * held in memory.
 */
export class EventSerializer<M extends EventMetadata = EventMetadata>
implements Iterable<DecodedEvent<M>> {
  private readonly metadataFactory: MetadataFactory<M>;
  private readonly log: Logger;
  private readonly recordsField: string;
  private readonly buildRecord: (cursor: TokenCursor) => EventRecord;
  private closed = false;

  constructor(
    private readonly cursor: TokenCursor,
    options: EventSerializerOptions<M>,
  ) {
    this.metadataFactory = options.metadataFactory;
    this.log = options.log;
    this.recordsField = options.recordsField ?? RECORDS_FIELD;
    this.buildRecord = createEventRecordBuilder({
      log: options.log,
      supportedEventVersion: options.supportedEventVersion,
    });
  }

  /** Consumes `{`, the records field name and `[`. */
  openEnvelope(): void {
    this.assertOpen();
    const cursor = this.cursor;

    if (cursor.nextToken() !== 'START_OBJECT') {
      throw new MalformedEnvelopeError('Not a JSON object', cursor.tokenOffset);
    }

    if (cursor.nextToken() !== 'FIELD_NAME' || cursor.currentName !== this.recordsField) {
      throw new MalformedEnvelopeError(
        `Not an audit log: expected "${this.recordsField}" as the first field`,
        cursor.tokenOffset,
      );
    }

    if (cursor.nextToken() !== 'START_ARRAY') {
      throw new MalformedEnvelopeError(
        `Not an audit log: "${this.recordsField}" is not an array`,
        cursor.tokenOffset,
      );
    }
  }

  /**
   * Advances one token and reports whether another record follows.
   *
   * This consumes a token: call it exactly once before each `next()`.
   * A scalar or `null` array element is rejected as a malformed record
   * instead of ending the iteration, so a damaged log is never silently
   * truncated.
   */
  hasMore(): boolean {
    this.assertOpen();
    const token = this.cursor.nextToken();
    if (token === 'START_OBJECT' || token === 'START_ARRAY') return true;

    if (token !== null && token.startsWith('VALUE_')) {
      throw new MalformedRecordError('Record is not an object', this.cursor.tokenOffset);
    }
    return false;
  }

  /** Decodes the record whose opening token `hasMore()` just consumed. */
  next(): DecodedEvent<M> {
    this.assertOpen();
    const cursor = this.cursor;

    const charStart = cursor.tokenOffset;
    const data = this.buildRecord(cursor);
    const charEnd = cursor.offset;

    resolveAccountId(data);

    this.log.debug(
      { charStart, charEnd, eventID: data.eventID?.value },
      'Event decoded',
    );

    return { data, metadata: this.metadataFactory.create(charStart, charEnd) };
  }

  *[Symbol.iterator](): Generator<DecodedEvent<M>, void, undefined> {
    while (this.hasMore()) {
      yield this.next();
    }
  }

  /** Releases the cursor. Further calls are no-ops. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.cursor.close();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new SerializerClosedError();
    }
  }
}
