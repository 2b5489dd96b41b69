import type { Channel, Post } from '../models';
import { FetchError } from '../errors';
import type { SourceFetcher } from './fetcher';
import type { RateLimiter } from './rateLimiter';
import type { DeliveryResult, NotificationSender } from '../notify/discord';

// In-memory stand-ins for the content API and the webhook, used by the tests.

let clock = Date.parse('2024-01-01T00:00:00Z');

export function makePost(id: string, overrides: Partial<Post> = {}): Post {
  clock += 60_000;
  return {
    id,
    text: `post ${id}`,
    createdAt: clock,
    likeCount: 0,
    repostCount: 0,
    replyCount: 0,
    mediaUrls: [],
    url: `https://twitter.com/i/web/status/${id}`,
    ...overrides,
  };
}

export class MockSource implements SourceFetcher {
  readonly calls: string[] = [];
  private readonly posts = new Map<string, Post[]>();
  private readonly failures = new Map<string, FetchError>();

  // With a limiter, fetches queue on it like the HTTP fetcher's do.
  constructor(private readonly limiter?: RateLimiter) {}

  setPosts(handle: string, posts: Post[]): this {
    this.posts.set(handle, posts);
    return this;
  }

  failWith(handle: string, err: FetchError): this {
    this.failures.set(handle, err);
    return this;
  }

  async fetchRecent(handle: string, limit: number, signal?: AbortSignal): Promise<Post[]> {
    await this.limiter?.acquire(signal);
    this.calls.push(handle);
    const failure = this.failures.get(handle);
    if (failure) throw failure;
    return (this.posts.get(handle) ?? []).slice(0, limit);
  }
}

export interface SentMessage {
  channel: string;
  handle: string;
  postId: string;
}

export class RecordingSender implements NotificationSender {
  readonly sent: SentMessage[] = [];
  private readonly results = new Map<string, DeliveryResult>();

  // Makes delivery of one post id fail with the given result.
  failPost(postId: string, result: DeliveryResult): this {
    this.results.set(postId, result);
    return this;
  }

  async send(channel: Channel, handle: string, post: Post): Promise<DeliveryResult> {
    const result = this.results.get(post.id) ?? { ok: true };
    if (result.ok) this.sent.push({ channel: channel.name, handle, postId: post.id });
    return result;
  }
}
