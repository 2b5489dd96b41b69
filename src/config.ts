import { ConfigError } from './errors';

export interface Config {
  port: number;
  sourceApiKey: string;
  sourceApiBaseUrl: string;
  sourceApiTimeoutMs: number;
  checkIntervalSeconds: number;
  maxPostsPerCheck: number;
  maxConcurrentAccounts: number;
  sendDelayMs: number;
  apiMinIntervalMs: number;
  webhookTimeoutMs: number;
  dataDir: string;
  autostartMonitor: boolean;
}

type Env = Record<string, string | undefined>;

function intVar(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function boolVar(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new ConfigError(`${name} must be a boolean, got "${raw}"`);
}

export function loadConfig(env: Env = process.env): Config {
  return {
    port: intVar(env, 'PORT', 3000, 1),
    sourceApiKey: env.SOURCE_API_KEY?.trim() ?? '',
    sourceApiBaseUrl: (env.SOURCE_API_BASE_URL?.trim() || 'https://api.twitterapi.io').replace(/\/+$/, ''),
    sourceApiTimeoutMs: intVar(env, 'SOURCE_API_TIMEOUT_MS', 30_000, 1),
    checkIntervalSeconds: intVar(env, 'CHECK_INTERVAL_SECONDS', 300, 1),
    maxPostsPerCheck: intVar(env, 'MAX_POSTS_PER_CHECK', 20, 1),
    maxConcurrentAccounts: intVar(env, 'MAX_CONCURRENT_ACCOUNTS', 3, 1),
    sendDelayMs: intVar(env, 'SEND_DELAY_MS', 1000),
    apiMinIntervalMs: intVar(env, 'API_MIN_INTERVAL_MS', 0),
    webhookTimeoutMs: intVar(env, 'WEBHOOK_TIMEOUT_MS', 10_000, 1),
    dataDir: env.DATA_DIR?.trim() || './data',
    autostartMonitor: boolVar(env, 'AUTOSTART_MONITOR', false),
  };
}

// The key is only needed once something actually polls.
export function requireApiKey(config: Config): string {
  if (!config.sourceApiKey) {
    throw new ConfigError('SOURCE_API_KEY is not set');
  }
  return config.sourceApiKey;
}
