import express, { type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import type { Store } from './db';
import type { MonitorScheduler } from './scheduler';
import type { RelayService } from './monitor/service';
import { ConfigError, ValidationError } from './errors';
import { parseIntervalSeconds } from './validation';

export interface RouteDeps {
  store: Store;
  service: RelayService;
  scheduler: MonitorScheduler;
}

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

// express 4 does not forward rejected promises to the error middleware on its own
function wrap(handler: AsyncHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

function optionalQuery(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

export function createRouter({ store, service, scheduler }: RouteDeps) {
  const router = express.Router();

  router.get('/health', (req, res) => {
    res.send({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  router.get('/status', (req, res) => {
    const state = scheduler.getState();
    const counts = store.counts();
    res.send({
      running: state.running,
      interval: state.intervalSeconds,
      cycleInFlight: state.cycleInFlight,
      nextRunAt: state.nextRunAt,
      trackedAccounts: counts.activeAccounts,
      channels: counts.channels,
      creditsRemaining: null, // the content API does not report it
      lastCycle: state.lastCycle,
    });
  });

  // --- channels -------------------------------------------------------------
  router.get('/channels', (req, res) => {
    res.send(store.listChannels());
  });

  router.post('/channels', (req, res) => {
    const { name, webhookUrl } = req.body ?? {};
    const channel = service.createChannel(name, webhookUrl);
    res.status(201).send({ success: true, channel });
  });

  router.delete('/channels/:name', (req, res) => {
    const { channel, removedAccounts } = service.deleteChannel(req.params.name);
    res.send({ success: true, channel: channel.name, removedAccounts });
  });

  // --- accounts -------------------------------------------------------------
  router.get('/accounts', (req, res) => {
    res.send(store.listAccounts(optionalQuery(req.query.channel)));
  });

  router.post(
    '/accounts',
    wrap(async (req, res) => {
      const { handle, channelName } = req.body ?? {};
      const result = await service.addAccount(handle, channelName);
      res.status(201).send({ success: true, ...result });
    }),
  );

  router.delete('/accounts/:handle', (req, res) => {
    service.removeAccount(req.params.handle);
    res.send({ success: true });
  });

  router.get('/sent', (req, res) => {
    res.send(service.recentSent(req.query.channel, req.query.limit));
  });

  // --- monitor control ------------------------------------------------------
  router.post('/monitor/start', (req, res) => {
    const interval = parseIntervalSeconds(req.body?.interval);
    if (scheduler.getState().running) {
      return res.send({ success: false, message: 'monitor already running', state: scheduler.getState() });
    }
    try {
      res.send({ success: true, state: scheduler.start(interval) });
    } catch (err: unknown) {
      if (err instanceof ConfigError) throw new ValidationError(err.message);
      throw err;
    }
  });

  router.post('/monitor/stop', (req, res) => {
    const wasRunning = scheduler.getState().running;
    const state = scheduler.stop();
    res.send({ success: wasRunning, message: wasRunning ? 'monitor stopped' : 'monitor not running', state });
  });

  router.post('/monitor/run-once', (req, res) => {
    // the cycle runs detached from the request; results show up in /status
    scheduler.runOnce().catch((e) => console.error('[API] run-once failed', e));
    res.status(202).send({ success: true, message: 'cycle started' });
  });

  return router;
}
