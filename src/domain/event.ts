import type { Uuid } from './uuid.js';

/**
 * Core domain types for decoded audit events.
 *
 * Each structure exposes its recognized keys as optional properties and
 * keeps every other key under the index signature. A key that never appeared
 * in the document is not set; a JSON `null` sets it to `null`.
 */

/**
 * Raw textual form of a field outside the recognized schema.
 * Scalars keep their text; objects and arrays are compact JSON.
 */
export type OpaqueValue = string | null;

/** Flat string map shared by session and web-identity contexts. */
export type AttributeMap = Record<string, string | null>;

export interface SessionIssuer {
  type?: string | null;
  principalId?: string | null;
  arn?: string | null;
  accountId?: string | null;
  userName?: string | null;
  [field: string]: OpaqueValue | undefined;
}

export interface WebIdentitySessionContext {
  attributes?: AttributeMap | null;
  federatedProvider?: string | null;
  [field: string]: OpaqueValue | AttributeMap | undefined;
}

/** Present only under a UserIdentity issued temporary credentials. */
export interface SessionContext {
  attributes?: AttributeMap | null;
  sessionIssuer?: SessionIssuer | null;
  webIdFederationData?: WebIdentitySessionContext | null;
  [field: string]: OpaqueValue | AttributeMap | SessionIssuer | WebIdentitySessionContext | undefined;
}

export interface UserIdentity {
  type?: string | null;
  principalId?: string | null;
  arn?: string | null;
  accountId?: string | null;
  accessKeyId?: string | null;
  userName?: string | null;
  invokedBy?: string | null;
  identityProvider?: string | null;
  sessionContext?: SessionContext | null;
  [field: string]: OpaqueValue | SessionContext | undefined;
}

/** Resources carry no fixed schema; every field is opaque. */
export type Resource = Record<string, OpaqueValue>;

export type EventFieldValue =
  | OpaqueValue
  | boolean
  | Date
  | Uuid
  | UserIdentity
  | Resource[];

/**
 * One decoded audit event.
 *
 * `accountId` is never copied from the document: it is derived by
 * `resolveAccountId()` after the record is built.
 */
export interface EventRecord {
  eventVersion?: string | null;
  userIdentity?: UserIdentity | null;
  eventTime?: Date | null;
  eventID?: Uuid;
  readOnly?: boolean | null;
  resources?: Resource[] | null;
  managementEvent?: boolean | null;
  recipientAccountId?: string | null;
  accountId?: string;
  [field: string]: EventFieldValue | undefined;
}

/** Minimum provenance every metadata value carries. */
export interface EventMetadata {
  readonly charStart: number;
  readonly charEnd: number;
}

/** Metadata describing where an event was delivered from. */
export interface LogDeliveryInfo extends EventMetadata {
  readonly logName: string;
  /** Exact source text of the record; set only when raw event info is enabled. */
  readonly rawEvent?: string;
}

export interface DecodedEvent<M extends EventMetadata = EventMetadata> {
  readonly data: EventRecord;
  readonly metadata: M;
}

/** Any decoded structure: every index signature admits an `OpaqueValue`. */
export type OpenFields = { [field: string]: unknown };

/**
 * Stores a textual field under an arbitrary key as an own, enumerable
 * property. Keys such as `__proto__` become ordinary fields instead of
 * touching the object's prototype.
 */
export function putOpaqueField(target: OpenFields, key: string, value: OpaqueValue): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}
