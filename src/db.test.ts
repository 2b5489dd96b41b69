import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { MemorySync } from 'lowdb';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createStore, openStore, type Store } from './db';
import type { DBSchema } from './models';
import { ConflictError, DuplicateSentRecordError } from './errors';

const WEBHOOK = 'https://discord.com/api/webhooks/1/test-token';

function memoryStore(): Store {
  return createStore(new MemorySync<DBSchema>());
}

describe('store', () => {
  let store: Store;

  beforeEach(() => {
    store = memoryStore();
  });

  it('rejects duplicate channel names', () => {
    store.createChannel('news', WEBHOOK);
    expect(() => store.createChannel('news', WEBHOOK)).toThrow(ConflictError);
  });

  it('counts only active accounts per channel', () => {
    const channel = store.createChannel('news', WEBHOOK);
    store.addAccount('alice', channel.id, null);
    store.addAccount('bob', channel.id, null);
    store.setAccountInactive('bob');
    expect(store.listChannels().map((c) => [c.name, c.accountCount])).toEqual([['news', 1]]);
  });

  it('rejects re-adding an active account and reactivates an inactive one', () => {
    const news = store.createChannel('news', WEBHOOK);
    const alerts = store.createChannel('alerts', WEBHOOK);
    store.addAccount('alice', news.id, '50');
    expect(() => store.addAccount('alice', alerts.id, null)).toThrow(ConflictError);

    store.setAccountInactive('alice');
    const { account, reactivated } = store.addAccount('alice', alerts.id, '70');
    expect(reactivated).toBe(true);
    expect(account.active).toBe(true);
    expect(account.channelId).toBe(alerts.id);
    expect(account.lastSeenId).toBe('70');
    expect(store.listAccounts()).toHaveLength(1);
  });

  it('keeps the newer cursor when reactivating an account', () => {
    const news = store.createChannel('news', WEBHOOK);
    store.addAccount('alice', news.id, '500');

    store.setAccountInactive('alice');
    expect(store.addAccount('alice', news.id, null).account.lastSeenId).toBe('500');

    store.setAccountInactive('alice');
    expect(store.addAccount('alice', news.id, '400').account.lastSeenId).toBe('500');

    store.setAccountInactive('alice');
    expect(store.addAccount('alice', news.id, '1000').account.lastSeenId).toBe('1000');
  });

  it('moves the cursor forward only', () => {
    const channel = store.createChannel('news', WEBHOOK);
    store.addAccount('alice', channel.id, null);

    expect(store.advanceCursor('alice', '5')).toBe(true);
    expect(store.advanceCursor('alice', '4')).toBe(false);
    expect(store.advanceCursor('alice', '5')).toBe(false);
    expect(store.advanceCursor('alice', '10')).toBe(true);
    expect(store.getAccount('alice')?.lastSeenId).toBe('10');
    expect(store.advanceCursor('nobody', '11')).toBe(false);
  });

  it('refuses a second ledger row for the same post and channel', () => {
    const news = store.createChannel('news', WEBHOOK);
    const alerts = store.createChannel('alerts', WEBHOOK);
    const row = { postId: '42', channelId: news.id, handle: 'alice', text: 'hi', postedAt: 0 };

    store.recordSent(row);
    expect(() => store.recordSent(row)).toThrow(DuplicateSentRecordError);
    store.recordSent({ ...row, channelId: alerts.id });

    expect(store.isSent('42', news.id)).toBe(true);
    expect(store.isSent('42', alerts.id)).toBe(true);
    expect(store.isSent('43', news.id)).toBe(false);
  });

  it('deletes a channel with its accounts and keeps its ledger rows', () => {
    const news = store.createChannel('news', WEBHOOK);
    const other = store.createChannel('other', WEBHOOK);
    store.addAccount('alice', news.id, '1');
    store.addAccount('bob', news.id, '1');
    store.addAccount('carol', other.id, '1');
    store.recordSent({ postId: '2', channelId: news.id, handle: 'alice', text: 'x', postedAt: 0 });

    const result = store.deleteChannel('news');

    expect(result?.removedAccounts).toEqual(['alice', 'bob']);
    expect(store.listAccounts().map((a) => a.handle)).toEqual(['carol']);
    expect(store.listSent(news.id)).toHaveLength(1);
    expect(store.deleteChannel('news')).toBeNull();
  });

  it('deactivates every account of a channel', () => {
    const news = store.createChannel('news', WEBHOOK);
    store.addAccount('alice', news.id, null);
    store.addAccount('bob', news.id, null);

    expect(store.deactivateChannelAccounts(news.id)).toBe(2);
    expect(store.getActiveAccountsWithChannels()).toEqual([]);
  });

  it('filters accounts by channel name', () => {
    const news = store.createChannel('news', WEBHOOK);
    const other = store.createChannel('other', WEBHOOK);
    store.addAccount('bob', news.id, null);
    store.addAccount('alice', other.id, null);

    expect(store.listAccounts('news').map((a) => a.handle)).toEqual(['bob']);
    expect(store.listAccounts().map((a) => `${a.channelName}/${a.handle}`)).toEqual(['news/bob', 'other/alice']);
  });
});

describe('openStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'post-relay-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('persists to a JSON file shared between instances', () => {
    const first = openStore(join(dir, 'data'));
    const channel = first.createChannel('news', WEBHOOK);
    first.addAccount('alice', channel.id, '9');

    const second = openStore(join(dir, 'data'));
    expect(second.getAccount('alice')?.lastSeenId).toBe('9');
    expect(second.counts()).toEqual({ channels: 1, accounts: 1, activeAccounts: 1, sent: 0 });
  });
});
