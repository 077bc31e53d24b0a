import type { EventMetadata, LogDeliveryInfo } from '../domain/event.js';

/**
 * Produces the provenance attached to each decoded event from the record's
 * `[charStart, charEnd)` span in the source document.
 */
export interface MetadataFactory<M extends EventMetadata = EventMetadata> {
  create(charStart: number, charEnd: number): M;
}

/** Metadata carrying only the span. */
export function createSpanMetadataFactory(): MetadataFactory<EventMetadata> {
  return {
    create: (charStart, charEnd) => ({ charStart, charEnd }),
  };
}

export interface LogDeliveryOptions {
  /** Name of the delivered log (file path, object key). */
  logName: string;
  /**
   * Full text of the log. When given, each event's metadata includes its
   * exact source text as `rawEvent`.
   */
  rawText?: string;
}

export function createLogDeliveryMetadataFactory(
  options: LogDeliveryOptions,
): MetadataFactory<LogDeliveryInfo> {
  const { logName, rawText } = options;

  return {
    create(charStart, charEnd) {
      if (rawText === undefined) {
        return { logName, charStart, charEnd };
      }
      return { logName, charStart, charEnd, rawEvent: rawText.slice(charStart, charEnd) };
    },
  };
}
