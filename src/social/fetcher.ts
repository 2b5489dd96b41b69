import axios, { type AxiosInstance } from 'axios';
import type { Post } from '../models';
import { CancelledError, FetchError, errorMessage } from '../errors';
import { isPostId } from '../monitor/ids';
import { RateLimiter } from './rateLimiter';

export interface SourceFetcher {
  // Rejects with CancelledError when `signal` fires before the request goes out.
  fetchRecent(handle: string, limit: number, signal?: AbortSignal): Promise<Post[]>;
}

export interface HttpFetcherOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
  limiter?: RateLimiter;
  http?: AxiosInstance;
  backoffMs?: number[];
}

export const DEFAULT_BACKOFF_MS = [2000, 4000, 8000];

type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function num(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function str(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

// The API nests the list under data.tweets, tweets, or data depending on the endpoint version.
function extractItems(body: unknown): unknown[] {
  if (Array.isArray(body)) return body;
  if (!isObject(body)) return [];
  const data = body.data ?? body;
  if (Array.isArray(data)) return data;
  if (isObject(data) && Array.isArray(data.tweets)) return data.tweets;
  if (Array.isArray(body.tweets)) return body.tweets;
  return [];
}

function extractMedia(item: Json): string[] {
  const entities = isObject(item.extendedEntities) ? item.extendedEntities : item.entities;
  if (!isObject(entities) || !Array.isArray(entities.media)) return [];
  const urls: string[] = [];
  for (const media of entities.media) {
    if (!isObject(media)) continue;
    const url =
      media.type === 'photo'
        ? str(media.media_url_https) || str(media.url)
        : media.type === 'video' || media.type === 'animated_gif'
          ? str(media.preview_image_url) || str(media.media_url_https)
          : '';
    if (url) urls.push(url);
  }
  return urls;
}

export function parsePost(item: unknown, now: () => number = Date.now): Post | null {
  if (!isObject(item)) return null;
  const id = typeof item.id === 'number' || typeof item.id === 'bigint' ? String(item.id) : str(item.id);
  const text = str(item.text);
  if (!isPostId(id) || !text) return null;

  const parsedAt = Date.parse(str(item.createdAt) || str(item.created_at));
  const metrics: Json = isObject(item.public_metrics) ? item.public_metrics : {};

  return {
    id,
    text,
    createdAt: Number.isNaN(parsedAt) ? now() : parsedAt,
    likeCount: num(metrics.like_count ?? item.likeCount),
    repostCount: num(metrics.retweet_count ?? item.retweetCount),
    replyCount: num(metrics.reply_count ?? item.replyCount),
    mediaUrls: extractMedia(item),
    url: str(item.url) || `https://twitter.com/i/web/status/${id}`,
  };
}

export function parsePosts(body: unknown): Post[] {
  const posts: Post[] = [];
  for (const item of extractItems(body)) {
    const post = parsePost(item);
    if (post) posts.push(post);
    else console.warn('[Fetch] dropping unparseable post item');
  }
  return posts;
}

export class HttpSourceFetcher implements SourceFetcher {
  private readonly http: AxiosInstance;
  private readonly limiter: RateLimiter;
  private readonly backoffMs: number[];

  constructor(options: HttpFetcherOptions) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs ?? 30_000,
        headers: { 'x-api-key': options.apiKey, Accept: 'application/json' },
      });
    this.limiter = options.limiter ?? new RateLimiter(0);
    this.backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS;
  }

  async fetchRecent(handle: string, limit: number, signal?: AbortSignal): Promise<Post[]> {
    for (let attempt = 0; ; attempt++) {
      await this.limiter.acquire(signal);

      let status: number;
      let body: unknown;
      try {
        const resp = await this.http.get('/twitter/user/last_tweets', {
          params: { userName: handle, max_results: limit },
          validateStatus: () => true,
          signal,
        });
        status = resp.status;
        body = resp.data;
      } catch (err: unknown) {
        if (signal?.aborted) throw new CancelledError(`request for @${handle} cancelled`);
        throw new FetchError('transient-network', `request for @${handle} failed: ${errorMessage(err)}`);
      }

      if (status >= 200 && status < 300) {
        return parsePosts(body).slice(0, limit);
      }
      if (status === 404) {
        throw new FetchError('not-found', `account @${handle} not found`, status);
      }
      if (status === 401 || status === 403) {
        throw new FetchError('unauthorized', `content API rejected the credential (${status})`, status);
      }
      if (status === 429) {
        const delay = this.backoffMs[attempt];
        if (delay === undefined) {
          throw new FetchError('rate-limited', `rate limited after ${attempt} retries`, status);
        }
        console.warn(`[Fetch] rate limited on @${handle}, retrying in ${delay}ms`);
        this.limiter.penalize(delay);
        continue;
      }
      throw new FetchError('transient-network', `content API answered ${status} for @${handle}`, status);
    }
  }
}
