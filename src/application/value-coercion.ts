import { z } from 'zod';
import { Uuid } from '../domain/uuid.js';
import { DateParseError, IdentifierFormatError } from '../domain/errors.js';
import type { OpaqueValue } from '../domain/event.js';
import type { TokenCursor } from '../infrastructure/json/token-cursor.js';

const UTC_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;

/**
 * Event time in the single UTC format audit logs use: `yyyy-MM-ddTHH:mm:ssZ`.
 * Out-of-range components (month 13, 31 April, hour 24) are rejected rather
 * than rolled over.
 */
export const eventTimeSchema = z
  .string()
  .regex(UTC_TIMESTAMP, { message: 'Must match yyyy-MM-ddTHH:mm:ssZ' })
  .transform((text, ctx) => {
    const year = Number(text.slice(0, 4));
    const month = Number(text.slice(5, 7));
    const day = Number(text.slice(8, 10));
    const hour = Number(text.slice(11, 13));
    const minute = Number(text.slice(14, 16));
    const second = Number(text.slice(17, 19));

    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    date.setUTCHours(hour, minute, second, 0);

    const exact =
      date.getUTCFullYear() === year &&
      date.getUTCMonth() === month - 1 &&
      date.getUTCDate() === day &&
      date.getUTCHours() === hour &&
      date.getUTCMinutes() === minute &&
      date.getUTCSeconds() === second;

    if (!exact) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Not a valid calendar date and time' });
      return z.NEVER;
    }
    return date;
  });

export const uuidSchema = z.string().uuid();

/**
 * Parses an event time. A missing value (`null`) is not an error and
 * yields `null`.
 */
export function toEventTime(text: string | null, offset?: number): Date | null {
  if (text === null) return null;

  const parsed = eventTimeSchema.safeParse(text);
  if (!parsed.success) {
    throw new DateParseError(text, parsed.error, offset);
  }
  return parsed.data;
}

/** Parses a hyphenated UUID. Callers handle a missing value before calling. */
export function toUuid(text: string, offset?: number): Uuid {
  if (!uuidSchema.safeParse(text).success) {
    throw new IdentifierFormatError(text, offset);
  }
  return new Uuid(text);
}

/**
 * Consumes one value of a field outside the recognized schema.
 *
 * - JSON null → `null`
 * - object or array → the whole subtree as compact JSON
 * - scalar → its text
 */
export function readOpaqueValue(cursor: TokenCursor): OpaqueValue {
  const token = cursor.nextToken();
  if (token === 'VALUE_NULL') return null;
  if (token === 'START_OBJECT' || token === 'START_ARRAY') {
    return cursor.readSubtreeAsJson();
  }
  return cursor.getValueAsString();
}
