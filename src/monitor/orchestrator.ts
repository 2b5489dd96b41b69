import type { Store } from '../db';
import type { AccountWithChannel, CycleSummary, Post } from '../models';
import { CancelledError, DuplicateSentRecordError, FetchError, errorMessage } from '../errors';
import type { SourceFetcher } from '../social/fetcher';
import type { NotificationSender } from '../notify/discord';
import { type Sleep, sleep as realSleep } from '../social/rateLimiter';
import { compareIds, isNewer, maxId } from './ids';

export interface OrchestratorOptions {
  store: Store;
  fetcher: SourceFetcher;
  sender: NotificationSender;
  fetchLimit?: number;
  sendDelayMs?: number;
  maxConcurrency?: number;
  sleep?: Sleep;
  now?: () => number;
}

type AccountOutcome = 'succeeded' | 'failed' | 'deactivated' | 'cancelled';

// State shared by every worker of one cycle.
interface Cycle {
  summary: CycleSummary;
  controller: AbortController;
  // Earliest time the next send to each channel may start.
  nextSendAt: Map<string, number>;
}

export function emptySummary(startedAt: number): CycleSummary {
  return {
    startedAt,
    finishedAt: startedAt,
    accountsProcessed: 0,
    accountsSucceeded: 0,
    accountsFailed: 0,
    accountsDeactivated: 0,
    accountsBaselined: 0,
    postsSent: 0,
    postsSkipped: 0,
    sendFailures: 0,
    aborted: false,
    abortReason: null,
  };
}

// Oldest first; equal timestamps fall back to id order.
export function chronological(posts: Post[]): Post[] {
  return [...posts].sort((a, b) => a.createdAt - b.createdAt || compareIds(a.id, b.id));
}

/**
 * One pass over every active tracked account. Failures stay with the account
 * that caused them, except a rejected credential, which ends the cycle since
 * every account shares it: fetches still queued are cancelled and no further
 * account is started. Sends to one channel are spaced by `sendDelayMs` across
 * all workers. Delivery is best effort: the cursor moves past a batch even when
 * some of its sends failed.
 */
export class PollCycleOrchestrator {
  private readonly store: Store;
  private readonly fetcher: SourceFetcher;
  private readonly sender: NotificationSender;
  private readonly fetchLimit: number;
  private readonly sendDelayMs: number;
  private readonly maxConcurrency: number;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(options: OrchestratorOptions) {
    this.store = options.store;
    this.fetcher = options.fetcher;
    this.sender = options.sender;
    this.fetchLimit = options.fetchLimit ?? 20;
    this.sendDelayMs = options.sendDelayMs ?? 1000;
    this.maxConcurrency = Math.max(1, options.maxConcurrency ?? 3);
    this.sleep = options.sleep ?? realSleep;
    this.now = options.now ?? Date.now;
  }

  async runCycle(): Promise<CycleSummary> {
    const cycle: Cycle = {
      summary: emptySummary(this.now()),
      controller: new AbortController(),
      nextSendAt: new Map(),
    };
    const { summary } = cycle;
    try {
      const accounts = this.store.getActiveAccountsWithChannels();
      if (accounts.length === 0) {
        console.log('[Cycle] no active accounts to poll');
      } else {
        console.log(`[Cycle] polling ${accounts.length} account(s)`);
        let next = 0;
        const worker = async () => {
          while (!cycle.controller.signal.aborted && next < accounts.length) {
            const account = accounts[next++];
            const outcome = await this.processAccount(account, cycle);
            if (outcome === 'cancelled') continue;
            summary.accountsProcessed++;
            if (outcome === 'succeeded') summary.accountsSucceeded++;
            else if (outcome === 'failed') summary.accountsFailed++;
            else summary.accountsDeactivated++;
          }
        };
        const workers = Math.min(this.maxConcurrency, accounts.length);
        await Promise.all(Array.from({ length: workers }, worker));
      }
    } catch (err: unknown) {
      summary.aborted = true;
      summary.abortReason = errorMessage(err);
      console.error('[Cycle] cycle failed:', summary.abortReason);
    }
    summary.finishedAt = this.now();
    console.log(
      `[Cycle] done: ${summary.postsSent} sent, ${summary.accountsSucceeded} ok, ` +
        `${summary.accountsFailed} failed${summary.aborted ? ' (aborted)' : ''}`,
    );
    return summary;
  }

  private async processAccount(account: AccountWithChannel, cycle: Cycle): Promise<AccountOutcome> {
    let posts: Post[];
    try {
      posts = await this.fetcher.fetchRecent(account.handle, this.fetchLimit, cycle.controller.signal);
    } catch (err: unknown) {
      if (err instanceof CancelledError) return 'cancelled';
      return this.handleFetchError(account, err, cycle);
    }

    try {
      if (account.lastSeenId === null) {
        this.baseline(account, posts, cycle.summary);
      } else {
        await this.deliverNew(account, account.lastSeenId, posts, cycle);
      }
      return 'succeeded';
    } catch (err: unknown) {
      console.error(`[Cycle] @${account.handle} failed:`, errorMessage(err));
      return 'failed';
    }
  }

  private baseline(account: AccountWithChannel, posts: Post[], summary: CycleSummary): void {
    const newest = maxId(posts.map((p) => p.id));
    if (newest === null) {
      console.log(`[Cycle] @${account.handle} has no posts yet, baseline deferred`);
      return;
    }
    this.store.advanceCursor(account.handle, newest);
    summary.accountsBaselined++;
    console.log(`[Cycle] baseline for @${account.handle} set to ${newest}, nothing sent`);
  }

  private async deliverNew(
    account: AccountWithChannel,
    cursor: string,
    posts: Post[],
    cycle: Cycle,
  ): Promise<void> {
    const { summary } = cycle;
    const fresh = chronological(posts.filter((p) => isNewer(p.id, cursor)));
    if (fresh.length === 0) return;
    console.log(`[Cycle] ${fresh.length} new post(s) from @${account.handle}`);

    const { channel } = account;
    for (const post of fresh) {
      if (this.store.isSent(post.id, channel.id)) {
        summary.postsSkipped++;
        continue;
      }
      await this.waitForSendSlot(channel.id, cycle);

      const result = await this.sender.send(channel, account.handle, post);
      if (!result.ok) {
        summary.sendFailures++;
        console.error(`[Cycle] post ${post.id} from @${account.handle} not delivered: ${result.error}`);
        if (result.status === 404) {
          const count = this.store.deactivateChannelAccounts(channel.id);
          console.error(`[Cycle] webhook for ${channel.name} is gone, deactivated ${count} account(s)`);
          break;
        }
        continue;
      }

      summary.postsSent++;
      try {
        this.store.recordSent({
          postId: post.id,
          channelId: channel.id,
          handle: account.handle,
          text: post.text,
          postedAt: post.createdAt,
        });
      } catch (err: unknown) {
        if (!(err instanceof DuplicateSentRecordError)) throw err;
        console.warn(`[Cycle] post ${post.id} was recorded by an overlapping run`);
      }
    }

    const newest = maxId(fresh.map((p) => p.id));
    if (newest !== null) this.store.advanceCursor(account.handle, newest);
  }

  // Reserves the channel's next slot before waiting, so parallel workers queue.
  private async waitForSendSlot(channelId: string, cycle: Cycle): Promise<void> {
    if (this.sendDelayMs <= 0) return;
    const current = this.now();
    const slot = Math.max(current, cycle.nextSendAt.get(channelId) ?? current);
    cycle.nextSendAt.set(channelId, slot + this.sendDelayMs);
    if (slot > current) await this.sleep(slot - current);
  }

  private handleFetchError(account: AccountWithChannel, err: unknown, cycle: Cycle): AccountOutcome {
    const { summary } = cycle;
    if (!(err instanceof FetchError)) {
      console.error(`[Cycle] fetching @${account.handle} failed:`, errorMessage(err));
      return 'failed';
    }
    switch (err.kind) {
      case 'not-found':
        this.store.setAccountInactive(account.handle);
        console.warn(`[Cycle] @${account.handle} no longer exists, deactivated`);
        return 'deactivated';
      case 'unauthorized':
        summary.aborted = true;
        summary.abortReason = err.message;
        cycle.controller.abort();
        console.error(`[Cycle] credential rejected, aborting cycle: ${err.message}`);
        return 'failed';
      case 'rate-limited':
        console.warn(`[Cycle] @${account.handle} skipped this cycle: ${err.message}`);
        return 'failed';
      case 'transient-network':
        console.warn(`[Cycle] @${account.handle} will be retried next cycle: ${err.message}`);
        return 'failed';
    }
  }
}
