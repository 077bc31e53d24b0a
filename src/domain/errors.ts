/**
 * Error hierarchy raised while decoding an audit log.
 *
 * Every decode failure extends `DecodeError` so callers can catch the whole
 * family at once. `offset` is the character offset in the source document at
 * which the problem was detected, when known.
 */
export class DecodeError extends Error {
  readonly offset: number | undefined;

  constructor(message: string, offset?: number, options?: { cause?: unknown }) {
    super(offset === undefined ? message : `${message} (at offset ${offset})`, options);
    this.name = 'DecodeError';
    this.offset = offset;
  }
}

/** The document does not open with `{ "<records field>": [`. Fatal to the session. */
export class MalformedEnvelopeError extends DecodeError {
  constructor(message: string, offset?: number) {
    super(message, offset);
    this.name = 'MalformedEnvelopeError';
  }
}

/**
 * A record or one of its nested structures is not the expected container.
 * The cursor is not guaranteed to be resumable afterwards.
 */
export class MalformedRecordError extends DecodeError {
  constructor(message: string, offset?: number) {
    super(message, offset);
    this.name = 'MalformedRecordError';
  }
}

export class DateParseError extends DecodeError {
  readonly text: string;

  constructor(text: string, cause: unknown, offset?: number) {
    super(`Cannot parse "${text}" as an event time`, offset, { cause });
    this.name = 'DateParseError';
    this.text = text;
  }
}

export class IdentifierFormatError extends DecodeError {
  readonly text: string | null;

  constructor(text: string | null, offset?: number) {
    super(
      text === null ? 'Missing event identifier' : `"${text}" is not a valid UUID`,
      offset,
    );
    this.name = 'IdentifierFormatError';
    this.text = text;
  }
}

/** Raised by the tokenizer when the input is not well-formed JSON. */
export class JsonSyntaxError extends DecodeError {
  constructor(message: string, offset: number) {
    super(message, offset);
    this.name = 'JsonSyntaxError';
  }
}

export class SerializerClosedError extends Error {
  constructor() {
    super('Event serializer is closed');
    this.name = 'SerializerClosedError';
  }
}
