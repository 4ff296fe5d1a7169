import { Config, ConfigStore, normalizeInterval } from '../config/config';
import { runtimeConfig } from '../config/runtime';
import { OutcomeSummary, SiteOutcome, summarizeOutcome } from '../backup/runner';
import { nowISO } from '../time/timeUtils';
import { describeError, handleError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { BackupEvent, EventChannel } from './eventChannel';
import { RunState } from './runState';
import { intervalTicker, Ticker, TickerFactory } from './ticker';

export type SchedulerState = 'disabled' | 'idle' | 'running' | 'stopped';
export type RunReason = 'ticker' | 'run-now';

/** What the orchestrator needs from the download runner. */
export interface BackupPass {
  runAll(snapshot: Config, signal?: AbortSignal): Promise<SiteOutcome[]>;
}

export interface RunSummary {
  reason: RunReason;
  startedAt: string;
  finishedAt: string;
  ok: number;
  failed: number;
  skipped: number;
  sites: OutcomeSummary[];
}

export interface OrchestratorStatus {
  state: SchedulerState;
  intervalMinutes: number;
  lastRun: RunSummary | null;
}

export interface OrchestratorOptions {
  store: ConfigStore;
  runner: BackupPass;
  events: EventChannel<BackupEvent>;
  /** Config loaded at startup; also the fallback when a reload fails. */
  initialConfig: Config;
  tickerFactory?: TickerFactory;
  /** Length of one interval minute. Defaults to 60s. */
  minuteMs?: number;
}

type LoopInput = { kind: 'tick' } | { kind: 'event'; event: BackupEvent };

function summarizeRun(reason: RunReason, startedAt: string, outcomes: SiteOutcome[]): RunSummary {
  const sites = outcomes.map(summarizeOutcome);
  return {
    reason,
    startedAt,
    finishedAt: nowISO(),
    ok: sites.filter((s) => s.status === 'ok').length,
    failed: sites.filter((s) => s.status === 'failed').length,
    skipped: sites.filter((s) => s.status === 'skipped').length,
    sites,
  };
}

/**
 * Decides when backup passes run.
 *
 * A single control loop consumes timer ticks and channel events one at a
 * time. Passes are launched without being awaited so the loop keeps
 * reacting to config changes and shutdown while one is in flight; a tick or
 * run-now that arrives during a pass is dropped. The orchestrator is the only
 * owner of the run flag and of the ticker.
 */
export class Orchestrator {
  private readonly runState = new RunState();
  private readonly cancellation = new AbortController();
  private readonly tickerFactory: TickerFactory;
  private readonly minuteMs: number;

  private ticker: Ticker | null = null;
  private intervalMinutes: number;
  private lastGood: Config;
  private lastRun: RunSummary | null = null;

  private tickPending = false;
  private stopRequested = false;
  private wakeLoop: (() => void) | null = null;
  private watchingEvents = false;
  private loop: Promise<void> | null = null;
  private activeRun: Promise<void> | null = null;

  constructor(private readonly options: OrchestratorOptions) {
    this.lastGood = options.initialConfig;
    this.intervalMinutes = normalizeInterval(options.initialConfig.IntervalMinutes);
    this.tickerFactory = options.tickerFactory ?? intervalTicker;
    this.minuteMs = options.minuteMs ?? runtimeConfig.scheduler.minuteMs;
  }

  get state(): SchedulerState {
    if (this.stopRequested) return 'stopped';
    if (this.runState.isRunning) return 'running';
    return this.intervalMinutes > 0 ? 'idle' : 'disabled';
  }

  getStatus(): OrchestratorStatus {
    return {
      state: this.state,
      intervalMinutes: this.intervalMinutes,
      lastRun: this.lastRun,
    };
  }

  start(): void {
    if (this.loop) {
      logger.warn('Scheduler is already running');
      return;
    }
    if (this.stopRequested) {
      throw new Error('Scheduler has been shut down');
    }

    this.armTimer(this.intervalMinutes);
    if (this.intervalMinutes > 0) {
      logger.info(`Scheduler started (interval_minutes=${this.intervalMinutes})`);
    } else {
      logger.info('Scheduler disabled (IntervalMinutes=0)');
    }

    this.loop = this.controlLoop();
  }

  /**
   * Stops consuming ticks and events, signals cancellation to the active pass
   * and waits for it to wind down.
   */
  async shutdown(): Promise<void> {
    if (!this.stopRequested) {
      logger.info('Scheduler shutting down');
      this.stopRequested = true;
      this.disarmTimer();
      this.cancellation.abort();
      this.notify();
    }

    await this.loop;
    await this.whenIdle();
  }

  /** Resolves once no pass is running. */
  async whenIdle(): Promise<void> {
    while (this.activeRun) {
      await this.activeRun;
    }
  }

  private async controlLoop(): Promise<void> {
    while (!this.stopRequested) {
      const input = this.nextInput();
      if (!input) {
        await this.waitForInput();
        continue;
      }

      try {
        await this.dispatch(input);
      } catch (error) {
        handleError(error, 'scheduler');
      }
    }
    logger.info('Scheduler stopped');
  }

  private nextInput(): LoopInput | null {
    if (this.tickPending) {
      this.tickPending = false;
      return { kind: 'tick' };
    }
    const event = this.options.events.tryReceive();
    return event ? { kind: 'event', event } : null;
  }

  private waitForInput(): Promise<void> {
    const woken = new Promise<void>((resolve) => {
      this.wakeLoop = resolve;
    });
    this.watchEvents();
    return woken;
  }

  /**
   * Keeps at most one pending subscription on the channel; it survives wake-ups
   * caused by ticks. A closed channel stays readable, so it is not watched.
   */
  private watchEvents(): void {
    const { events } = this.options;
    if (this.watchingEvents || events.isClosed) return;

    this.watchingEvents = true;
    void events.readable().then(() => {
      this.watchingEvents = false;
      this.notify();
    });
  }

  private notify(): void {
    const wake = this.wakeLoop;
    this.wakeLoop = null;
    wake?.();
  }

  private async dispatch(input: LoopInput): Promise<void> {
    if (input.kind === 'tick') {
      this.triggerRun('ticker');
      return;
    }

    switch (input.event.type) {
      case 'config-changed':
        logger.info('Event: config changed, reloading scheduler');
        await this.reloadSchedule();
        return;
      case 'run-now':
        logger.info('Event: run now');
        this.triggerRun('run-now');
        return;
    }
  }

  private armTimer(minutes: number): void {
    this.disarmTimer();
    this.intervalMinutes = minutes;
    if (minutes <= 0) return;

    const ticker: Ticker = this.tickerFactory(minutes * this.minuteMs, () => {
      // Ticks from a replaced ticker are ignored
      if (this.ticker !== ticker || this.stopRequested) return;
      this.tickPending = true;
      this.notify();
    });
    this.ticker = ticker;
  }

  private disarmTimer(): void {
    this.ticker?.stop();
    this.ticker = null;
    this.tickPending = false;
  }

  private async reloadSchedule(): Promise<void> {
    let config: Config;
    try {
      config = await this.options.store.load();
      this.lastGood = config;
    } catch (error) {
      logger.error(`Failed to reload config, keeping current schedule: ${describeError(error)}`);
      return;
    }
    if (this.stopRequested) return;

    const previous = this.intervalMinutes;
    const next = normalizeInterval(config.IntervalMinutes);
    if (next === previous) {
      logger.debug(`Scheduler interval unchanged (interval_minutes=${previous})`);
      return;
    }

    this.armTimer(next);
    if (next === 0) {
      logger.info('Scheduler disabled (IntervalMinutes=0)');
    } else if (previous === 0) {
      logger.info(`Scheduler enabled (interval_minutes=${next})`);
    } else {
      logger.info(`Scheduler interval updated (interval_minutes=${next})`);
    }
  }

  private triggerRun(reason: RunReason): void {
    if (this.stopRequested) return;
    if (!this.runState.tryBegin()) {
      logger.warn(`Run skipped: already running (reason=${reason})`);
      return;
    }

    this.activeRun = this.executeRun(reason).finally(() => {
      this.runState.finish();
      this.activeRun = null;
    });
  }

  private async executeRun(reason: RunReason): Promise<void> {
    const startedAt = nowISO();
    try {
      const snapshot = await this.loadSnapshot();
      if (this.cancellation.signal.aborted) {
        logger.info(`Run abandoned before start (reason=${reason})`);
        return;
      }

      const outcomes = await this.options.runner.runAll(snapshot, this.cancellation.signal);
      this.lastRun = summarizeRun(reason, startedAt, outcomes);
      logger.info(
        `Run finished (reason=${reason}): ${this.lastRun.ok} ok, ${this.lastRun.failed} failed, ${this.lastRun.skipped} skipped`
      );
    } catch (error) {
      handleError(error, `run:${reason}`);
    }
  }

  /**
   * Fresh config for a pass. Falls back to the last config that loaded.
   */
  private async loadSnapshot(): Promise<Config> {
    try {
      const config = await this.options.store.load();
      this.lastGood = config;
      return config;
    } catch (error) {
      logger.warn(`Failed to reload config, using last good snapshot: ${describeError(error)}`);
      return this.lastGood;
    }
  }
}
