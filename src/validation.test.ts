import { describe, expect, it } from 'vitest';
import { normalizeHandle, parseHandle, parseIntervalSeconds, parseLimit, parseWebhookUrl } from './validation';
import { ValidationError } from './errors';

const WEBHOOK = 'https://discord.com/api/webhooks/123456/test-token';

describe('normalizeHandle', () => {
  it('lowercases and strips the leading @', () => {
    expect(normalizeHandle('  @SomeUser ')).toBe('someuser');
    expect(normalizeHandle('plain')).toBe('plain');
  });
});

describe('parseHandle', () => {
  it('rejects handles with characters outside [a-z0-9_]', () => {
    expect(() => parseHandle('bad handle')).toThrow(ValidationError);
    expect(() => parseHandle('@')).toThrow(ValidationError);
    expect(() => parseHandle(42)).toThrow('handle is required');
  });

  it('returns the normalized handle', () => {
    expect(parseHandle('@Dev_Team')).toBe('dev_team');
  });
});

describe('parseWebhookUrl', () => {
  it('accepts discord webhook urls', () => {
    expect(parseWebhookUrl(WEBHOOK)).toBe(WEBHOOK);
    expect(parseWebhookUrl('https://discordapp.com/api/webhooks/1/abc_DEF')).toBe(
      'https://discordapp.com/api/webhooks/1/abc_DEF',
    );
  });

  it('rejects other urls', () => {
    expect(() => parseWebhookUrl('not a url')).toThrow('webhookUrl is not a valid URL: not a url');
    expect(() => parseWebhookUrl('http://discord.com/api/webhooks/1/abc')).toThrow(ValidationError);
    expect(() => parseWebhookUrl('https://example.com/api/webhooks/1/abc')).toThrow(ValidationError);
    expect(() => parseWebhookUrl('https://discord.com/channels/1/2')).toThrow(ValidationError);
    expect(() => parseWebhookUrl(undefined)).toThrow('webhookUrl is required');
  });
});

describe('parseIntervalSeconds', () => {
  it('treats missing values as unset', () => {
    expect(parseIntervalSeconds(undefined)).toBeUndefined();
    expect(parseIntervalSeconds('')).toBeUndefined();
  });

  it('accepts positive integers given as numbers or strings', () => {
    expect(parseIntervalSeconds(60)).toBe(60);
    expect(parseIntervalSeconds('300')).toBe(300);
  });

  it('rejects zero, negatives and fractions', () => {
    expect(() => parseIntervalSeconds(0)).toThrow(ValidationError);
    expect(() => parseIntervalSeconds(-5)).toThrow(ValidationError);
    expect(() => parseIntervalSeconds('1.5')).toThrow(ValidationError);
  });
});

describe('parseLimit', () => {
  it('falls back when absent and parses query strings', () => {
    expect(parseLimit(undefined, 50)).toBe(50);
    expect(parseLimit('', 50)).toBe(50);
    expect(parseLimit('5', 50)).toBe(5);
  });

  it('rejects non-positive and fractional limits', () => {
    expect(() => parseLimit('0', 50)).toThrow(ValidationError);
    expect(() => parseLimit('2.5', 50)).toThrow(ValidationError);
  });
});
