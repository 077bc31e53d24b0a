import type { EventRecord } from './event.js';

/**
 * Derives the effective account of an event.
 *
 * Precedence, first match wins:
 * 1. `recipientAccountId` on the record
 * 2. `userIdentity.accountId`
 * 3. `userIdentity.sessionContext.sessionIssuer.accountId`, only when
 *    `userIdentity.accountId` is missing
 *
 * When none is present `accountId` stays unset. Any `accountId` already on
 * the record is discarded first, so the result depends only on the source
 * fields and running the resolver again changes nothing.
 */
export function resolveAccountId(record: EventRecord): void {
  delete record.accountId;

  const recipientAccountId = record.recipientAccountId;
  if (typeof recipientAccountId === 'string') {
    record.accountId = recipientAccountId;
    return;
  }

  const identity = record.userIdentity;
  if (identity === null || identity === undefined) return;

  if (typeof identity.accountId === 'string') {
    record.accountId = identity.accountId;
    return;
  }

  const issuerAccountId = identity.sessionContext?.sessionIssuer?.accountId;
  if (typeof issuerAccountId === 'string') {
    record.accountId = issuerAccountId;
  }
}
