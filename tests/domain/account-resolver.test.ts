import { describe, it, expect } from 'vitest';
import { resolveAccountId } from '../../src/domain/account-resolver.js';
import type { EventRecord } from '../../src/domain/event.js';

describe('resolveAccountId', () => {
  it('prefers recipientAccountId over the identity account', () => {
    const record: EventRecord = {
      recipientAccountId: '111111111111',
      userIdentity: { accountId: '222222222222' },
    };

    resolveAccountId(record);

    expect(record.accountId).toBe('111111111111');
  });

  it('falls back to the identity account', () => {
    const record: EventRecord = {
      userIdentity: {
        accountId: '222222222222',
        sessionContext: { sessionIssuer: { accountId: '333333333333' } },
      },
    };

    resolveAccountId(record);

    expect(record.accountId).toBe('222222222222');
  });

  it('uses the session issuer account when the identity has none', () => {
    const record: EventRecord = {
      userIdentity: {
        sessionContext: { sessionIssuer: { accountId: '333333333333' } },
      },
    };

    resolveAccountId(record);

    expect(record.accountId).toBe('333333333333');
  });

  it('treats a null recipientAccountId as missing', () => {
    const record: EventRecord = {
      recipientAccountId: null,
      userIdentity: { accountId: '222222222222' },
    };

    resolveAccountId(record);

    expect(record.accountId).toBe('222222222222');
  });

  it.each<[string, EventRecord]>([
    ['no identity', {}],
    ['a null identity', { userIdentity: null }],
    ['a null session context', { userIdentity: { sessionContext: null } }],
    ['a null session issuer', { userIdentity: { sessionContext: { sessionIssuer: null } } }],
    ['a null issuer account', { userIdentity: { sessionContext: { sessionIssuer: { accountId: null } } } }],
  ])('leaves accountId unset with %s', (_label, record) => {
    resolveAccountId(record);

    expect('accountId' in record).toBe(false);
  });

  it('discards an accountId already on the record', () => {
    const overridden: EventRecord = { accountId: '999999999999', recipientAccountId: '111111111111' };
    const removed: EventRecord = { accountId: '999999999999' };

    resolveAccountId(overridden);
    resolveAccountId(removed);

    expect(overridden.accountId).toBe('111111111111');
    expect('accountId' in removed).toBe(false);
  });

  it('gives the same result when run twice', () => {
    const record: EventRecord = {
      userIdentity: { sessionContext: { sessionIssuer: { accountId: '333333333333' } } },
    };

    resolveAccountId(record);
    const first = { ...record };
    resolveAccountId(record);

    expect(record).toEqual(first);
  });
});
