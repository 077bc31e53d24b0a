export { EventSerializer, RECORDS_FIELD } from './event-serializer.js';
export type { EventSerializerOptions } from './event-serializer.js';
export {
  SUPPORTED_EVENT_VERSION,
  createEventRecordBuilder,
  buildUserIdentity,
  buildSessionContext,
  buildSessionIssuer,
  buildWebIdentitySessionContext,
  buildAttributes,
  buildResources,
  buildResource,
} from './record-builders.js';
export type { EventRecordBuilderOptions } from './record-builders.js';
export { readOpaqueValue, toEventTime, toUuid, eventTimeSchema, uuidSchema } from './value-coercion.js';
export { createSpanMetadataFactory, createLogDeliveryMetadataFactory } from './metadata.js';
export type { MetadataFactory, LogDeliveryOptions } from './metadata.js';
export { openLogText, openLogFile, decodeLogText, streamLogFile } from './decode-log.js';
export type { DecodeLogOptions, DecodeLogTextOptions } from './decode-log.js';
