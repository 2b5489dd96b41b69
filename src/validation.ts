import { ValidationError } from './errors';

const HANDLE = /^[a-z0-9_]{1,50}$/;
const WEBHOOK_HOSTS = new Set(['discord.com', 'discordapp.com', 'canary.discord.com', 'ptb.discord.com']);
const WEBHOOK_PATH = /^\/api\/webhooks\/\d+\/[\w-]+\/?$/;

export function normalizeHandle(input: string): string {
  let handle = input.trim().toLowerCase();
  if (handle.startsWith('@')) handle = handle.slice(1);
  return handle;
}

export function parseHandle(input: unknown): string {
  const raw = requireString(input, 'handle');
  const handle = normalizeHandle(raw);
  if (!HANDLE.test(handle)) {
    throw new ValidationError(`"${raw}" is not a valid account handle`);
  }
  return handle;
}

export function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`${field} is required`);
  }
  return value.trim();
}

export function parseWebhookUrl(input: unknown): string {
  const raw = requireString(input, 'webhookUrl');
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ValidationError(`webhookUrl is not a valid URL: ${raw}`);
  }
  if (url.protocol !== 'https:' || !WEBHOOK_HOSTS.has(url.hostname) || !WEBHOOK_PATH.test(url.pathname)) {
    throw new ValidationError('webhookUrl must look like https://discord.com/api/webhooks/<id>/<token>');
  }
  return raw;
}

export function parseIntervalSeconds(input: unknown): number | undefined {
  if (input === undefined || input === null || input === '') return undefined;
  const value = typeof input === 'number' ? input : Number(input);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError('interval must be a positive whole number of seconds');
  }
  return value;
}

export function parseLimit(input: unknown, fallback: number): number {
  if (input === undefined || input === null || input === '') return fallback;
  const value = typeof input === 'number' ? input : Number(input);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError('limit must be a positive whole number');
  }
  return value;
}
