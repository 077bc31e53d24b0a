import type { Logger } from 'pino';
import { MalformedRecordError, IdentifierFormatError } from '../domain/errors.js';
import { putOpaqueField } from '../domain/event.js';
import type {
  AttributeMap,
  EventRecord,
  OpenFields,
  Resource,
  SessionContext,
  SessionIssuer,
  UserIdentity,
  WebIdentitySessionContext,
} from '../domain/event.js';
import type { TokenCursor } from '../infrastructure/json/token-cursor.js';
import { readOpaqueValue, toEventTime, toUuid } from './value-coercion.js';

/**
 * Builders for the nested structures of an audit event.
 *
 * Every builder consumes exactly one JSON value. Recognized keys are
 * dispatched through a per-structure table; any other key is kept as an
 * opaque value so schema additions degrade instead of failing.
 */

export const SUPPORTED_EVENT_VERSION = 1.06;

type FieldHandler<T> = (cursor: TokenCursor, target: T, key: string) => void;
type FieldTable<T> = ReadonlyMap<string, FieldHandler<T>>;

// ---------------------------------------------------------------------------
// Shared helpers
// ---------------------------------------------------------------------------

/** Advances to the next token: `false` for null, `true` for an object start. */
function openObject(cursor: TokenCursor, shape: string): boolean {
  const token = cursor.nextToken();
  if (token === 'VALUE_NULL') return false;
  if (token !== 'START_OBJECT') {
    throw new MalformedRecordError(`Not a ${shape} object`, cursor.tokenOffset);
  }
  return true;
}

function fieldName(cursor: TokenCursor): string {
  const name = cursor.currentName;
  if (cursor.currentToken !== 'FIELD_NAME' || name === null) {
    throw new MalformedRecordError('Expected a field name', cursor.tokenOffset);
  }
  return name;
}

/** Reads fields until the current object closes. */
function readFields<T extends OpenFields>(
  cursor: TokenCursor,
  target: T,
  table: FieldTable<T>,
): T {
  while (cursor.nextToken() !== 'END_OBJECT') {
    const key = fieldName(cursor);
    const handler = table.get(key);
    if (handler) {
      handler(cursor, target, key);
    } else {
      putOpaqueField(target, key, readOpaqueValue(cursor));
    }
  }
  return target;
}

/**
 * Reads a value that must be textual. Numbers and booleans keep their
 * text; a nested object or array is rejected.
 */
function readText(cursor: TokenCursor): string | null {
  const token = cursor.nextToken();
  switch (token) {
    case 'VALUE_NULL':
      return null;
    case 'VALUE_STRING':
    case 'VALUE_NUMBER':
    case 'VALUE_TRUE':
    case 'VALUE_FALSE':
      return cursor.text;
    default:
      throw new MalformedRecordError(
        `Field "${cursor.currentName ?? '?'}" must be a string`,
        cursor.tokenOffset,
      );
  }
}

/** Boolean-or-null leaf. */
function readFlag(cursor: TokenCursor): boolean | null {
  const token = cursor.nextToken();
  if (token === 'VALUE_NULL') return null;
  if (token === 'VALUE_TRUE' || token === 'VALUE_FALSE') {
    return cursor.getBooleanValue();
  }
  throw new MalformedRecordError(
    `Field "${cursor.currentName ?? '?'}" must be a boolean or null`,
    cursor.tokenOffset,
  );
}

const textField: FieldHandler<OpenFields> = (cursor, target, key) => {
  putOpaqueField(target, key, readText(cursor));
};

// ---------------------------------------------------------------------------
// Dispatch tables
// ---------------------------------------------------------------------------

const SESSION_ISSUER_FIELDS: FieldTable<SessionIssuer> = new Map<string, FieldHandler<SessionIssuer>>([
  ['type', textField],
  ['principalId', textField],
  ['arn', textField],
  ['accountId', textField],
  ['userName', textField],
]);

const WEB_IDENTITY_FIELDS: FieldTable<WebIdentitySessionContext> = new Map<string, FieldHandler<WebIdentitySessionContext>>([
  ['attributes', (cursor, target) => { target.attributes = buildAttributes(cursor); }],
  ['federatedProvider', textField],
]);

const SESSION_CONTEXT_FIELDS: FieldTable<SessionContext> = new Map<string, FieldHandler<SessionContext>>([
  ['attributes', (cursor, target) => { target.attributes = buildAttributes(cursor); }],
  ['sessionIssuer', (cursor, target) => { target.sessionIssuer = buildSessionIssuer(cursor); }],
  ['webIdFederationData', (cursor, target) => { target.webIdFederationData = buildWebIdentitySessionContext(cursor); }],
]);

const USER_IDENTITY_FIELDS: FieldTable<UserIdentity> = new Map<string, FieldHandler<UserIdentity>>([
  ['type', textField],
  ['principalId', textField],
  ['arn', textField],
  ['accountId', textField],
  ['accessKeyId', textField],
  ['userName', textField],
  ['sessionContext', (cursor, target) => { target.sessionContext = buildSessionContext(cursor); }],
  ['invokedBy', textField],
  ['identityProvider', textField],
]);

const RESOURCE_FIELDS: FieldTable<Resource> = new Map<string, FieldHandler<Resource>>();

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

export function buildSessionIssuer(cursor: TokenCursor): SessionIssuer | null {
  if (!openObject(cursor, 'SessionIssuer')) return null;
  return readFields<SessionIssuer>(cursor, {}, SESSION_ISSUER_FIELDS);
}

export function buildWebIdentitySessionContext(cursor: TokenCursor): WebIdentitySessionContext | null {
  if (!openObject(cursor, 'WebIdentitySessionContext')) return null;
  return readFields<WebIdentitySessionContext>(cursor, {}, WEB_IDENTITY_FIELDS);
}

export function buildSessionContext(cursor: TokenCursor): SessionContext | null {
  if (!openObject(cursor, 'SessionContext')) return null;
  return readFields<SessionContext>(cursor, {}, SESSION_CONTEXT_FIELDS);
}

export function buildUserIdentity(cursor: TokenCursor): UserIdentity | null {
  if (!openObject(cursor, 'UserIdentity')) return null;
  return readFields<UserIdentity>(cursor, {}, USER_IDENTITY_FIELDS);
}

/** Flat string map; a nested value is rejected. */
export function buildAttributes(cursor: TokenCursor): AttributeMap | null {
  if (!openObject(cursor, 'Attributes')) return null;

  const attributes: AttributeMap = {};
  while (cursor.nextToken() !== 'END_OBJECT') {
    const key = fieldName(cursor);
    putOpaqueField(attributes, key, readText(cursor));
  }
  return attributes;
}

/** Reads one resource whose opening `{` is the current token. */
export function buildResource(cursor: TokenCursor): Resource {
  if (cursor.currentToken !== 'START_OBJECT') {
    throw new MalformedRecordError('Not a Resource object', cursor.tokenOffset);
  }
  return readFields<Resource>(cursor, {}, RESOURCE_FIELDS);
}

export function buildResources(cursor: TokenCursor): Resource[] | null {
  const token = cursor.nextToken();
  if (token === 'VALUE_NULL') return null;
  if (token !== 'START_ARRAY') {
    throw new MalformedRecordError('Not a list of resources', cursor.tokenOffset);
  }

  const resources: Resource[] = [];
  while (cursor.nextToken() !== 'END_ARRAY') {
    resources.push(buildResource(cursor));
  }
  return resources;
}

// ---------------------------------------------------------------------------
// Event record
// ---------------------------------------------------------------------------

export interface EventRecordBuilderOptions {
  log: Logger;
  /** Highest eventVersion whose semantics are known. */
  supportedEventVersion?: number | undefined;
}

/**
 * Creates the builder for a whole event record. The returned function
 * expects the record's opening `{` to be the current token and leaves the
 * cursor on its closing `}`.
 */
export function createEventRecordBuilder(
  options: EventRecordBuilderOptions,
): (cursor: TokenCursor) => EventRecord {
  const { log } = options;
  const supportedEventVersion = options.supportedEventVersion ?? SUPPORTED_EVENT_VERSION;

  const eventFields: FieldTable<EventRecord> = new Map<string, FieldHandler<EventRecord>>([
    ['eventVersion', (cursor, target) => {
      const eventVersion = readText(cursor);
      target.eventVersion = eventVersion;
      if (eventVersion === null) return;

      const numeric = Number(eventVersion);
      if (eventVersion.trim() === '' || Number.isNaN(numeric)) {
        log.warn({ eventVersion }, 'eventVersion is not a decimal number');
      } else if (numeric > supportedEventVersion) {
        log.warn(
          { eventVersion, supportedEventVersion },
          `eventVersion ${eventVersion} is newer than ${supportedEventVersion} and may use unrecognized semantics`,
        );
      }
    }],
    ['userIdentity', (cursor, target) => { target.userIdentity = buildUserIdentity(cursor); }],
    ['eventTime', (cursor, target) => {
      const text = readText(cursor);
      target.eventTime = toEventTime(text, cursor.tokenOffset);
    }],
    ['eventID', (cursor, target) => {
      const text = readText(cursor);
      if (text === null) {
        throw new IdentifierFormatError(null, cursor.tokenOffset);
      }
      target.eventID = toUuid(text, cursor.tokenOffset);
    }],
    ['readOnly', (cursor, target) => { target.readOnly = readFlag(cursor); }],
    ['resources', (cursor, target) => { target.resources = buildResources(cursor); }],
    ['managementEvent', (cursor, target) => { target.managementEvent = readFlag(cursor); }],
  ]);

  return (cursor) => {
    if (cursor.currentToken !== 'START_OBJECT') {
      throw new MalformedRecordError('Not an event record object', cursor.tokenOffset);
    }
    return readFields<EventRecord>(cursor, {}, eventFields);
  };
}
