import { CronJob } from 'cron';
import type { CycleSummary } from './models';
import { ConfigError } from './errors';

export interface CycleRunner {
  runCycle(): Promise<CycleSummary>;
}

export interface SchedulerState {
  running: boolean;
  intervalSeconds: number;
  cycleInFlight: boolean;
  lastCycle: CycleSummary | null;
  nextRunAt: number | null; // epoch ms
}

// The cron job only provides a one-second heartbeat; the interval itself is
// tracked here so any whole number of seconds can be used.
const HEARTBEAT = '* * * * * *';

export function checkInterval(seconds: number): number {
  if (!Number.isInteger(seconds) || seconds <= 0) {
    throw new ConfigError(`interval must be a positive whole number of seconds, got ${seconds}`);
  }
  return seconds;
}

/**
 * Owns the recurring monitor job. At most one cron job exists and at most one
 * cycle runs at a time: a tick that lands on a running cycle is dropped, and
 * runOnce hands back the running cycle instead of starting another. stop()
 * only cancels future ticks.
 */
export class MonitorScheduler {
  private job: CronJob | null = null;
  private nextRunAt: number | null = null;
  private inFlight: Promise<CycleSummary> | null = null;
  private lastCycle: CycleSummary | null = null;
  private intervalSeconds: number;

  constructor(
    private readonly runner: CycleRunner,
    defaultIntervalSeconds: number,
  ) {
    this.intervalSeconds = defaultIntervalSeconds;
  }

  start(intervalSeconds?: number): SchedulerState {
    if (this.job) {
      console.log('[Scheduler] already running, start ignored');
      return this.getState();
    }
    const interval = checkInterval(intervalSeconds ?? this.intervalSeconds);
    this.intervalSeconds = interval;
    this.nextRunAt = Date.now() + interval * 1000;
    this.job = new CronJob(HEARTBEAT, () => this.heartbeat(), null, false);
    this.job.start();
    console.log(`[Scheduler] started, polling every ${interval}s`);
    return this.getState();
  }

  stop(): SchedulerState {
    if (this.job) {
      this.job.stop();
      this.job = null;
      this.nextRunAt = null;
      console.log(
        this.inFlight ? '[Scheduler] stopped, current cycle will finish' : '[Scheduler] stopped',
      );
    }
    return this.getState();
  }

  runOnce(): Promise<CycleSummary> {
    return this.inFlight ?? this.launch();
  }

  // Resolves once no cycle is running; used on shutdown.
  async idle(): Promise<void> {
    while (this.inFlight) await this.inFlight;
  }

  getState(): SchedulerState {
    return {
      running: this.job !== null,
      intervalSeconds: this.intervalSeconds,
      cycleInFlight: this.inFlight !== null,
      lastCycle: this.lastCycle,
      nextRunAt: this.nextRunAt,
    };
  }

  private heartbeat(): void {
    const now = Date.now();
    if (this.nextRunAt === null || now < this.nextRunAt) return;
    const step = this.intervalSeconds * 1000;
    while (this.nextRunAt <= now) this.nextRunAt += step;
    this.tick();
  }

  private tick(): void {
    if (this.inFlight) {
      console.warn('[Scheduler] previous cycle still running, tick skipped');
      return;
    }
    this.launch().catch((e) => console.error('[Scheduler] cycle error', e));
  }

  private launch(): Promise<CycleSummary> {
    const cycle = this.runner
      .runCycle()
      .then((summary) => {
        this.lastCycle = summary;
        return summary;
      })
      .finally(() => {
        this.inFlight = null;
      });
    this.inFlight = cycle;
    return cycle;
  }
}
