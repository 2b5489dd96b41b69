import type { Store } from '../db';
import type { Channel, SentRecord, TrackedAccount } from '../models';
import { ConflictError, NotFoundError, errorMessage } from '../errors';
import type { SourceFetcher } from '../social/fetcher';
import { parseHandle, parseLimit, parseWebhookUrl, requireString } from '../validation';
import { maxId } from './ids';

export type BaselineResult = 'set' | 'empty' | 'deferred';

export interface AddAccountResult {
  account: TrackedAccount;
  baseline: BaselineResult;
  reactivated: boolean;
}

// Management operations shared by the HTTP API and the CLI.
export class RelayService {
  constructor(
    private readonly store: Store,
    private readonly fetcher: SourceFetcher,
    private readonly fetchLimit = 20,
  ) {}

  createChannel(nameInput: unknown, webhookInput: unknown): Channel {
    const name = requireString(nameInput, 'name');
    const webhookUrl = parseWebhookUrl(webhookInput);
    return this.store.createChannel(name, webhookUrl);
  }

  deleteChannel(nameInput: unknown): { channel: Channel; removedAccounts: string[] } {
    const name = requireString(nameInput, 'name');
    const result = this.store.deleteChannel(name);
    if (!result) throw new NotFoundError(`channel "${name}" not found`);
    return result;
  }

  // Polls the account once so its cursor starts at the newest post and nothing old gets relayed.
  async addAccount(handleInput: unknown, channelInput: unknown): Promise<AddAccountResult> {
    const handle = parseHandle(handleInput);
    const channelName = requireString(channelInput, 'channelName');
    const channel = this.store.getChannelByName(channelName);
    if (!channel) throw new NotFoundError(`channel "${channelName}" not found`);
    if (this.store.getAccount(handle)?.active) {
      throw new ConflictError(`account @${handle} is already tracked`);
    }

    let lastSeenId: string | null = null;
    let baseline: BaselineResult;
    try {
      const posts = await this.fetcher.fetchRecent(handle, this.fetchLimit);
      lastSeenId = maxId(posts.map((p) => p.id));
      baseline = lastSeenId === null ? 'empty' : 'set';
    } catch (err: unknown) {
      console.warn(`[API] baseline for @${handle} deferred to next cycle: ${errorMessage(err)}`);
      baseline = 'deferred';
    }

    const { account, reactivated } = this.store.addAccount(handle, channel.id, lastSeenId);
    console.log(`[API] tracking @${handle} in ${channel.name} (baseline ${baseline})`);
    return { account, baseline, reactivated };
  }

  removeAccount(handleInput: unknown): void {
    const handle = parseHandle(handleInput);
    if (!this.store.removeAccount(handle)) {
      throw new NotFoundError(`account @${handle} not found`);
    }
  }

  // Newest deliveries first, optionally for one channel.
  recentSent(channelInput?: unknown, limitInput?: unknown): SentRecord[] {
    let channelId: string | undefined;
    if (channelInput !== undefined && channelInput !== '') {
      const name = requireString(channelInput, 'channel');
      const channel = this.store.getChannelByName(name);
      if (!channel) throw new NotFoundError(`channel "${name}" not found`);
      channelId = channel.id;
    }
    const limit = parseLimit(limitInput, 50);
    return this.store
      .listSent(channelId)
      .reverse()
      .sort((a, b) => b.sentAt - a.sentAt)
      .slice(0, limit);
  }
}
