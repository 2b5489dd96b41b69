import type { Config } from './config';
import { openStore, type Store } from './db';
import { HttpSourceFetcher } from './social/fetcher';
import { RateLimiter } from './social/rateLimiter';
import { DiscordWebhookSender } from './notify/discord';
import { PollCycleOrchestrator } from './monitor/orchestrator';
import { RelayService } from './monitor/service';
import { MonitorScheduler } from './scheduler';

export interface Runtime {
  store: Store;
  service: RelayService;
  orchestrator: PollCycleOrchestrator;
  scheduler: MonitorScheduler;
}

// Wires the long-lived pieces; the limiter is shared so every fetch draws on one budget.
export function createRuntime(config: Config, store: Store = openStore(config.dataDir)): Runtime {
  const limiter = new RateLimiter(config.apiMinIntervalMs);
  const fetcher = new HttpSourceFetcher({
    baseUrl: config.sourceApiBaseUrl,
    apiKey: config.sourceApiKey,
    timeoutMs: config.sourceApiTimeoutMs,
    limiter,
  });
  const sender = new DiscordWebhookSender({ timeoutMs: config.webhookTimeoutMs });
  const orchestrator = new PollCycleOrchestrator({
    store,
    fetcher,
    sender,
    fetchLimit: config.maxPostsPerCheck,
    sendDelayMs: config.sendDelayMs,
    maxConcurrency: config.maxConcurrentAccounts,
  });
  const service = new RelayService(store, fetcher, config.maxPostsPerCheck);
  const scheduler = new MonitorScheduler(orchestrator, config.checkIntervalSeconds);
  return { store, service, orchestrator, scheduler };
}
