import { LowSync, type SyncAdapter } from 'lowdb';
import { JSONFileSync } from 'lowdb/node';
import { nanoid } from 'nanoid';
import { join } from 'path';
import { existsSync, mkdirSync } from 'fs';
import type { AccountWithChannel, Channel, DBSchema, SentRecord, TrackedAccount } from './models';
import { ConflictError, DuplicateSentRecordError } from './errors';
import { compareIds } from './monitor/ids';

export interface ChannelView extends Channel {
  accountCount: number;
}

export interface AccountView extends TrackedAccount {
  channelName: string;
}

export type Store = ReturnType<typeof createStore>;

function emptySchema(): DBSchema {
  return { channels: [], accounts: [], sent: [] };
}

// Every operation re-reads the document so the CLI and the server can share one file.
// Writes are synchronous, so no operation interleaves with another in this process.
// Cursors never move back, not even when a reactivated account brings an older baseline.
function laterCursor(current: string | null, candidate: string | null): string | null {
  if (current === null) return candidate;
  if (candidate === null) return current;
  return compareIds(candidate, current) > 0 ? candidate : current;
}

export function createStore(adapter: SyncAdapter<DBSchema>) {
  const db = new LowSync<DBSchema>(adapter, emptySchema());
  db.read();
  db.data.channels ??= [];
  db.data.accounts ??= [];
  db.data.sent ??= [];
  db.write();

  function load(): DBSchema {
    db.read();
    return db.data;
  }

  function findAccount(data: DBSchema, handle: string) {
    return data.accounts.find((a) => a.handle === handle);
  }

  return {
    createChannel(name: string, webhookUrl: string): Channel {
      const data = load();
      if (data.channels.some((c) => c.name === name)) {
        throw new ConflictError(`channel "${name}" already exists`);
      }
      const channel: Channel = { id: nanoid(), name, webhookUrl, createdAt: Date.now() };
      data.channels.push(channel);
      db.write();
      return channel;
    },

    getChannelByName(name: string): Channel | undefined {
      return load().channels.find((c) => c.name === name);
    },

    listChannels(): ChannelView[] {
      const data = load();
      return data.channels
        .map((c) => ({
          ...c,
          accountCount: data.accounts.filter((a) => a.channelId === c.id && a.active).length,
        }))
        .sort((a, b) => a.createdAt - b.createdAt);
    },

    // Accounts go with their channel; ledger rows stay behind for audit.
    deleteChannel(name: string): { channel: Channel; removedAccounts: string[] } | null {
      const data = load();
      const channel = data.channels.find((c) => c.name === name);
      if (!channel) return null;
      const removedAccounts = data.accounts.filter((a) => a.channelId === channel.id).map((a) => a.handle);
      data.channels = data.channels.filter((c) => c.id !== channel.id);
      data.accounts = data.accounts.filter((a) => a.channelId !== channel.id);
      db.write();
      return { channel, removedAccounts };
    },

    addAccount(
      handle: string,
      channelId: string,
      lastSeenId: string | null,
    ): { account: TrackedAccount; reactivated: boolean } {
      const data = load();
      const existing = findAccount(data, handle);
      if (existing?.active) {
        throw new ConflictError(`account @${handle} is already tracked`);
      }
      if (existing) {
        existing.channelId = channelId;
        existing.lastSeenId = laterCursor(existing.lastSeenId, lastSeenId);
        existing.active = true;
        db.write();
        return { account: { ...existing }, reactivated: true };
      }
      const account: TrackedAccount = {
        id: nanoid(),
        handle,
        channelId,
        lastSeenId,
        active: true,
        addedAt: Date.now(),
      };
      data.accounts.push(account);
      db.write();
      return { account: { ...account }, reactivated: false };
    },

    getAccount(handle: string): TrackedAccount | undefined {
      const account = findAccount(load(), handle);
      return account ? { ...account } : undefined;
    },

    removeAccount(handle: string): boolean {
      const data = load();
      const before = data.accounts.length;
      data.accounts = data.accounts.filter((a) => a.handle !== handle);
      if (data.accounts.length === before) return false;
      db.write();
      return true;
    },

    listAccounts(channelName?: string): AccountView[] {
      const data = load();
      const names = new Map(data.channels.map((c) => [c.id, c.name]));
      return data.accounts
        .map((a) => ({ ...a, channelName: names.get(a.channelId) ?? '' }))
        .filter((a) => !channelName || a.channelName === channelName)
        .sort((a, b) => a.channelName.localeCompare(b.channelName) || a.handle.localeCompare(b.handle));
    },

    getActiveAccountsWithChannels(): AccountWithChannel[] {
      const data = load();
      const result: AccountWithChannel[] = [];
      for (const account of data.accounts) {
        if (!account.active) continue;
        const channel = data.channels.find((c) => c.id === account.channelId);
        if (channel) result.push({ ...account, channel: { ...channel } });
      }
      return result;
    },

    // Moves the cursor forward only; returns false when the id is not ahead of it.
    advanceCursor(handle: string, id: string): boolean {
      const data = load();
      const account = findAccount(data, handle);
      if (!account) return false;
      if (account.lastSeenId !== null && compareIds(id, account.lastSeenId) <= 0) return false;
      account.lastSeenId = id;
      db.write();
      return true;
    },

    setAccountInactive(handle: string): boolean {
      const data = load();
      const account = findAccount(data, handle);
      if (!account || !account.active) return false;
      account.active = false;
      db.write();
      return true;
    },

    deactivateChannelAccounts(channelId: string): number {
      const data = load();
      let count = 0;
      for (const account of data.accounts) {
        if (account.channelId === channelId && account.active) {
          account.active = false;
          count++;
        }
      }
      if (count) db.write();
      return count;
    },

    isSent(postId: string, channelId: string): boolean {
      return load().sent.some((r) => r.postId === postId && r.channelId === channelId);
    },

    recordSent(record: Omit<SentRecord, 'sentAt'>): SentRecord {
      const data = load();
      if (data.sent.some((r) => r.postId === record.postId && r.channelId === record.channelId)) {
        throw new DuplicateSentRecordError(record.postId, record.channelId);
      }
      const row: SentRecord = { ...record, sentAt: Date.now() };
      data.sent.push(row);
      db.write();
      return row;
    },

    listSent(channelId?: string): SentRecord[] {
      return load().sent.filter((r) => !channelId || r.channelId === channelId);
    },

    counts(): { channels: number; accounts: number; activeAccounts: number; sent: number } {
      const data = load();
      return {
        channels: data.channels.length,
        accounts: data.accounts.length,
        activeAccounts: data.accounts.filter((a) => a.active).length,
        sent: data.sent.length,
      };
    },
  };
}

// store JSON in <dataDir>/db.json
export function openStore(dataDir: string): Store {
  if (!existsSync(dataDir)) mkdirSync(dataDir, { recursive: true });
  return createStore(new JSONFileSync<DBSchema>(join(dataDir, 'db.json')));
}
