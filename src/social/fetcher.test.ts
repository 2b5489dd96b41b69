import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it, vi } from 'vitest';
import { HttpSourceFetcher, parsePost, parsePosts } from './fetcher';
import { RateLimiter } from './rateLimiter';
import { CancelledError, FetchError } from '../errors';

type Reply = { status: number; data?: unknown } | Error;

// An axios instance whose adapter replays canned replies in order.
function scriptedHttp(replies: Reply[]) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    baseURL: 'https://source.test',
    adapter: async (config): Promise<AxiosResponse> => {
      requests.push(config);
      const reply = replies.shift();
      if (!reply) throw new Error('no scripted reply left');
      if (reply instanceof Error) throw reply;
      return { status: reply.status, statusText: '', data: reply.data ?? {}, headers: {}, config };
    },
  });
  return { http, requests };
}

function fetcherFor(replies: Reply[], waits: number[] = []) {
  const { http, requests } = scriptedHttp(replies);
  const limiter = new RateLimiter(
    0,
    async (ms) => {
      waits.push(ms);
    },
    () => 0,
  );
  return { fetcher: new HttpSourceFetcher({ baseUrl: '', apiKey: 'test-key', http, limiter }), requests };
}

async function kindOf(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
    return 'resolved';
  } catch (err: unknown) {
    return err instanceof FetchError ? err.kind : 'other';
  }
}

const apiTweet = {
  id: 1234567,
  text: 'hello',
  createdAt: '2024-03-05T10:00:00.000Z',
  likeCount: 3,
  retweetCount: 2,
  replyCount: 1,
  url: 'https://x.com/alice/status/1',
};

describe('parsePost', () => {
  it('reads public_metrics and media entities', () => {
    const post = parsePost({
      id: '77',
      text: 'with media',
      created_at: '2024-03-01T12:00:00Z',
      public_metrics: { like_count: 10, retweet_count: 4, reply_count: 2 },
      entities: {
        media: [
          { type: 'photo', media_url_https: 'https://img.test/a.jpg' },
          { type: 'video', preview_image_url: 'https://img.test/v.jpg' },
          { type: 'unknown', url: 'https://img.test/ignored.jpg' },
        ],
      },
    });
    expect(post).toEqual({
      id: '77',
      text: 'with media',
      createdAt: Date.parse('2024-03-01T12:00:00Z'),
      likeCount: 10,
      repostCount: 4,
      replyCount: 2,
      mediaUrls: ['https://img.test/a.jpg', 'https://img.test/v.jpg'],
      url: 'https://twitter.com/i/web/status/77',
    });
  });

  it('drops items without a decimal id or text', () => {
    expect(parsePost({ id: 'abc', text: 'x' })).toBeNull();
    expect(parsePost({ id: '1', text: '' })).toBeNull();
    expect(parsePost('nope')).toBeNull();
  });

  it('falls back to now for an unparseable timestamp', () => {
    expect(parsePost({ id: '1', text: 'x', created_at: 'yesterday' }, () => 1234)?.createdAt).toBe(1234);
  });
});

describe('parsePosts', () => {
  it('finds posts in each response shape', () => {
    const item = { id: '5', text: 'x' };
    expect(parsePosts({ data: { tweets: [item] } }).map((p) => p.id)).toEqual(['5']);
    expect(parsePosts({ tweets: [item] }).map((p) => p.id)).toEqual(['5']);
    expect(parsePosts({ data: [item] }).map((p) => p.id)).toEqual(['5']);
    expect(parsePosts({ status: 'success' })).toEqual([]);
  });
});

describe('HttpSourceFetcher', () => {
  it('requests the handle and parses the response', async () => {
    const { fetcher, requests } = fetcherFor([{ status: 200, data: { status: 'success', data: { tweets: [apiTweet] } } }]);

    const posts = await fetcher.fetchRecent('alice', 20);

    expect(requests[0].url).toBe('/twitter/user/last_tweets');
    expect(requests[0].params).toEqual({ userName: 'alice', max_results: 20 });
    expect(posts).toHaveLength(1);
    expect(posts[0].id).toBe('1234567');
    expect(posts[0].likeCount).toBe(3);
    expect(posts[0].repostCount).toBe(2);
    expect(posts[0].url).toBe('https://x.com/alice/status/1');
  });

  it('caps the result at the requested limit', async () => {
    const tweets = ['1', '2', '3'].map((id) => ({ id, text: `t${id}` }));
    const { fetcher } = fetcherFor([{ status: 200, data: { tweets } }]);
    expect((await fetcher.fetchRecent('alice', 2)).map((p) => p.id)).toEqual(['1', '2']);
  });

  it('classifies failures by status', async () => {
    expect(await kindOf(fetcherFor([{ status: 404 }]).fetcher.fetchRecent('gone', 20))).toBe('not-found');
    expect(await kindOf(fetcherFor([{ status: 401 }]).fetcher.fetchRecent('a', 20))).toBe('unauthorized');
    expect(await kindOf(fetcherFor([{ status: 403 }]).fetcher.fetchRecent('a', 20))).toBe('unauthorized');
    expect(await kindOf(fetcherFor([{ status: 502 }]).fetcher.fetchRecent('a', 20))).toBe('transient-network');
  });

  it('treats a request that never got a response as transient', async () => {
    const err = new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED');
    expect(await kindOf(fetcherFor([err]).fetcher.fetchRecent('a', 20))).toBe('transient-network');
  });

  it('backs off 2s, 4s, 8s on rate limiting before succeeding', async () => {
    const waits: number[] = [];
    const { fetcher, requests } = fetcherFor(
      [{ status: 429 }, { status: 429 }, { status: 429 }, { status: 200, data: { tweets: [{ id: '9', text: 'ok' }] } }],
      waits,
    );
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const posts = await fetcher.fetchRecent('alice', 20);

    expect(posts.map((p) => p.id)).toEqual(['9']);
    expect(waits).toEqual([2000, 4000, 8000]);
    expect(requests).toHaveLength(4);
    warn.mockRestore();
  });

  it('sends nothing once the signal has fired', async () => {
    const { fetcher, requests } = fetcherFor([{ status: 200, data: { tweets: [] } }]);
    const controller = new AbortController();
    controller.abort();

    await expect(fetcher.fetchRecent('alice', 20, controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(requests).toHaveLength(0);
  });

  it('passes the signal to the request', async () => {
    const { fetcher, requests } = fetcherFor([{ status: 200, data: { tweets: [] } }]);
    const controller = new AbortController();

    await fetcher.fetchRecent('alice', 20, controller.signal);

    expect(requests[0].signal).toBe(controller.signal);
  });

  it('gives up with rate-limited after three retries', async () => {
    const { fetcher, requests } = fetcherFor([{ status: 429 }, { status: 429 }, { status: 429 }, { status: 429 }]);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(await kindOf(fetcher.fetchRecent('alice', 20))).toBe('rate-limited');
    expect(requests).toHaveLength(4);
    warn.mockRestore();
  });
});
