import axios, { type AxiosInstance } from 'axios';
import type { Channel, Post } from '../models';
import { errorMessage } from '../errors';

export type DeliveryResult = { ok: true } | { ok: false; status?: number; error: string };

export interface NotificationSender {
  send(channel: Channel, handle: string, post: Post): Promise<DeliveryResult>;
}

export const MAX_TEXT_LENGTH = 3900;
const EMBED_COLOR = 1942002;
const TRUNCATION_NOTE = '\n\n... *(truncated, open the link for the full post)*';

export interface WebhookEmbed {
  description: string;
  color: number;
  timestamp: string;
  url: string;
  footer: { text: string };
  image?: { url: string };
}

export interface WebhookPayload {
  username: string;
  avatar_url: string;
  content: string;
  embeds: WebhookEmbed[];
}

export function formatCount(n: number): string {
  if (n >= 1_000_000) return `${(n / 1_000_000).toFixed(1)}M`;
  if (n >= 1000) return `${(n / 1000).toFixed(1)}k`;
  return String(n);
}

export function formatEngagement(post: Post): string {
  return `❤️ ${formatCount(post.likeCount)} | 🔁 ${formatCount(post.repostCount)} | 💬 ${formatCount(post.replyCount)}`;
}

export function formatPostText(text: string): string {
  let out = text;

  // "RT @someone: body" reads better with the header on its own line
  if (out.startsWith('RT @')) {
    const sep = out.indexOf(': ');
    if (sep !== -1) out = `🔁 **${out.slice(0, sep)}**\n\n${out.slice(sep + 2)}`;
  }

  if (out.length > MAX_TEXT_LENGTH) {
    let cut = out.slice(0, MAX_TEXT_LENGTH - 50);
    const lastSpace = cut.lastIndexOf(' ');
    if (lastSpace > MAX_TEXT_LENGTH - 100) cut = cut.slice(0, lastSpace);
    out = cut + TRUNCATION_NOTE;
  }
  return out;
}

export function buildPayload(handle: string, post: Post): WebhookPayload {
  const link = post.url;
  const embed: WebhookEmbed = {
    description: formatPostText(post.text),
    color: EMBED_COLOR,
    timestamp: new Date(post.createdAt).toISOString(),
    url: link,
    footer: { text: `@${handle} | ${formatEngagement(post)}` },
  };
  if (post.mediaUrls.length > 0) embed.image = { url: post.mediaUrls[0] };

  return {
    username: `@${handle}`,
    avatar_url: `https://unavatar.io/twitter/${handle}`,
    content: `🔗 [View post](${link})`,
    embeds: [embed],
  };
}

// One POST per call. Retrying is the caller's decision.
export class DiscordWebhookSender implements NotificationSender {
  private readonly http: AxiosInstance;

  constructor(options: { timeoutMs?: number; http?: AxiosInstance } = {}) {
    this.http =
      options.http ??
      axios.create({ timeout: options.timeoutMs ?? 10_000, headers: { 'Content-Type': 'application/json' } });
  }

  async send(channel: Channel, handle: string, post: Post): Promise<DeliveryResult> {
    try {
      const resp = await this.http.post(channel.webhookUrl, buildPayload(handle, post), {
        validateStatus: () => true,
      });
      if (resp.status >= 200 && resp.status < 300) return { ok: true };
      console.error(`[Discord] ${channel.name} answered ${resp.status} for post ${post.id}`);
      return { ok: false, status: resp.status, error: `webhook answered ${resp.status}` };
    } catch (err: unknown) {
      console.error(`[Discord] delivery to ${channel.name} failed:`, errorMessage(err));
      return { ok: false, error: errorMessage(err) };
    }
  }
}
