export type {
  OpaqueValue,
  AttributeMap,
  SessionIssuer,
  WebIdentitySessionContext,
  SessionContext,
  UserIdentity,
  Resource,
  EventFieldValue,
  EventRecord,
  EventMetadata,
  LogDeliveryInfo,
  DecodedEvent,
  OpenFields,
} from './event.js';
export { putOpaqueField } from './event.js';
export { Uuid } from './uuid.js';
export { resolveAccountId } from './account-resolver.js';
export {
  DecodeError,
  MalformedEnvelopeError,
  MalformedRecordError,
  DateParseError,
  IdentifierFormatError,
  JsonSyntaxError,
  SerializerClosedError,
} from './errors.js';
