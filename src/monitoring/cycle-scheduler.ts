/**
 * Fixed-period polling loop: inventory, dispatch, persist, track.
 * A tick that fires while a cycle is still running is dropped, not queued.
 */

import { EventEmitter } from 'events';
import {
  AlertEvent,
  CycleSummary,
  Device,
  InventorySource,
  Logger,
  ProbeFunction,
  ProbeResult,
  TrackingOutcome
} from '../types';
import { ErrorHandler, errorMessage } from '../error-handling';
import { selectPollableDevices } from '../inventory/device-validator';
import { logger as rootLogger } from '../utils/logger';
import { computeStatistics, dispatch } from './dispatcher';
import { icmpProbe } from './probe';

export type SchedulerState = 'idle' | 'running' | 'stopping' | 'stopped';

export interface SchedulerStatus {
  state: SchedulerState;
  interval_ms: number;
  cycle_count: number;
  skipped_ticks: number;
  cycle_in_progress: boolean;
  last_summary: CycleSummary | null;
  next_tick_at: Date | null;
}

export interface ResultSink {
  append(results: ProbeResult[]): Promise<number>;
}

export interface SnapshotSink {
  record(totalTimeoutDevices: number, at: Date): Promise<void>;
}

export interface CycleTracker {
  applyCycle(results: ProbeResult[], devices: Device[]): Promise<TrackingOutcome>;
  on(event: 'alert', listener: (event: AlertEvent) => void): unknown;
}

export interface CycleSchedulerOptions {
  inventory: InventorySource;
  store: ResultSink;
  tracker?: CycleTracker;
  analytics?: SnapshotSink;
  intervalMs: number;
  probeTimeoutMs: number;
  maxConcurrency: number;
  probe?: ProbeFunction;
  logger?: Logger;
  errorHandler?: ErrorHandler;
  clock?: () => Date;
}

export interface CycleFailedEvent {
  cycle_number: number;
  error: string;
}

export interface CycleSkippedEvent {
  cycle_number: number;
  skipped_ticks: number;
}

export class CycleScheduler extends EventEmitter {
  private inventory: InventorySource;
  private store: ResultSink;
  private tracker: CycleTracker | undefined;
  private analytics: SnapshotSink | undefined;
  private intervalMs: number;
  private probeTimeoutMs: number;
  private maxConcurrency: number;
  private probe: ProbeFunction;
  private logger: Logger;
  private errorHandler: ErrorHandler | undefined;
  private clock: () => Date;

  private state: SchedulerState = 'idle';
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<CycleSummary | null> | null = null;
  private cycleCount = 0;
  private skippedTicks = 0;
  private lastSummary: CycleSummary | null = null;
  private nextTickAt: Date | null = null;

  constructor(options: CycleSchedulerOptions) {
    super();
    this.inventory = options.inventory;
    this.store = options.store;
    this.tracker = options.tracker;
    this.analytics = options.analytics;
    this.intervalMs = options.intervalMs;
    this.probeTimeoutMs = options.probeTimeoutMs;
    this.maxConcurrency = options.maxConcurrency;
    this.probe = options.probe ?? icmpProbe;
    this.logger = options.logger ?? rootLogger.child('Scheduler');
    this.errorHandler = options.errorHandler;
    this.clock = options.clock ?? (() => new Date());

    this.tracker?.on('alert', (event: AlertEvent) => {
      this.emit('alert', event);
    });
  }

  /**
   * Start polling. Runs the first cycle immediately; calling it again is a no-op.
   */
  start(): SchedulerStatus {
    if (this.state === 'running') {
      this.logger.warn('Scheduler is already running');
      return this.status();
    }
    if (this.state === 'stopping') {
      this.logger.warn('Scheduler is stopping; start ignored');
      return this.status();
    }

    this.state = 'running';
    this.logger.info(`Starting polling every ${this.intervalMs}ms (concurrency ${this.maxConcurrency}, timeout ${this.probeTimeoutMs}ms)`);

    this.timer = setInterval(() => this.onTimer(), this.intervalMs);
    this.nextTickAt = new Date(Date.now() + this.intervalMs);
    this.dispatchTick();

    return this.status();
  }

  /**
   * Cancel the timer and wait for the in-flight cycle to finish
   */
  async stop(): Promise<SchedulerStatus> {
    if (this.state !== 'running') {
      if (this.state === 'idle') {
        this.state = 'stopped';
      }
      if (this.inFlight) {
        await this.inFlight;
      }
      return this.status();
    }

    this.state = 'stopping';
    this.logger.info('Stopping scheduler');

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.nextTickAt = null;

    if (this.inFlight) {
      this.logger.info(`Waiting for cycle #${this.cycleCount} to finish`);
      await this.inFlight;
    }

    this.state = 'stopped';
    this.logger.info('Scheduler stopped');
    return this.status();
  }

  /**
   * One timer tick: start a cycle, or drop the tick if one is still running
   */
  tick(): Promise<CycleSummary | null> {
    if (this.inFlight) {
      this.skippedTicks++;
      this.logger.warn(`Cycle #${this.cycleCount} still running; tick skipped (${this.skippedTicks} skipped so far)`);
      const event: CycleSkippedEvent = { cycle_number: this.cycleCount, skipped_ticks: this.skippedTicks };
      this.emit('cycle:skipped', event);
      return Promise.resolve(null);
    }

    return this.beginCycle();
  }

  /**
   * Force a cycle now. Resolves null if one is already running or the scheduler is stopping.
   */
  runOnce(): Promise<CycleSummary | null> {
    if (this.inFlight || this.state === 'stopping') {
      return Promise.resolve(null);
    }
    return this.beginCycle();
  }

  status(): SchedulerStatus {
    return {
      state: this.state,
      interval_ms: this.intervalMs,
      cycle_count: this.cycleCount,
      skipped_ticks: this.skippedTicks,
      cycle_in_progress: this.inFlight !== null,
      last_summary: this.lastSummary,
      next_tick_at: this.nextTickAt
    };
  }

  private onTimer(): void {
    this.nextTickAt = new Date(Date.now() + this.intervalMs);
    this.dispatchTick();
  }

  private dispatchTick(): void {
    this.tick().catch((error: unknown) => {
      this.logger.error(`Unexpected scheduler failure: ${errorMessage(error)}`);
    });
  }

  private beginCycle(): Promise<CycleSummary | null> {
    this.cycleCount++;
    const cycle = this.runCycle(this.cycleCount).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  private async runCycle(cycleNumber: number): Promise<CycleSummary | null> {
    const startedAt = this.clock();
    this.emit('cycle:start', { cycle_number: cycleNumber, started_at: startedAt });

    let devices: Device[];
    try {
      devices = await this.inventory.listDevices();
      this.errorHandler?.markComponentHealthy('Inventory');
    } catch (error) {
      this.logger.error(`Cycle #${cycleNumber} aborted: inventory fetch failed: ${errorMessage(error)}`);
      this.errorHandler?.handleInventoryFailure(error, cycleNumber);
      this.emitFailure(cycleNumber, error);
      return null;
    }

    try {
      const selected = selectPollableDevices(devices, this.logger);
      const results = await dispatch(selected.devices, this.maxConcurrency, this.probeTimeoutMs, this.probe, {
        logger: this.logger,
        clock: this.clock
      });

      const storeError = await this.persistResults(cycleNumber, results);
      const tracking = await this.trackResults(cycleNumber, results, selected.devices);
      if (tracking.outcome) {
        await this.recordSnapshot(cycleNumber, tracking.outcome.failing);
      }

      const finishedAt = this.clock();
      const statistics = computeStatistics(results);
      const summary: CycleSummary = {
        cycle_number: cycleNumber,
        started_at: startedAt,
        finished_at: finishedAt,
        duration_ms: finishedAt.getTime() - startedAt.getTime(),
        device_count: selected.devices.length,
        skipped_devices: selected.skipped,
        statistics,
        store_error: storeError,
        tracker_error: tracking.error,
        alerts_sent: tracking.outcome?.alerts_sent ?? 0,
        alerts_failed: tracking.outcome?.alerts_failed ?? 0,
        recoveries: tracking.outcome?.recoveries ?? 0
      };

      this.lastSummary = summary;
      this.errorHandler?.markComponentHealthy('Scheduler');
      this.logger.info(
        `Cycle #${cycleNumber}: ${statistics.successful}/${statistics.total} reachable ` +
        `(${statistics.success_rate}%) in ${summary.duration_ms}ms`
      );
      this.emit('cycle:complete', summary);
      return summary;
    } catch (error) {
      this.logger.error(`Cycle #${cycleNumber} failed: ${errorMessage(error)}`);
      this.errorHandler?.handleError(error, { component: 'Scheduler', details: { cycleNumber } });
      this.emitFailure(cycleNumber, error);
      return null;
    }
  }

  private async persistResults(cycleNumber: number, results: ProbeResult[]): Promise<string | null> {
    try {
      await this.store.append(results);
      this.errorHandler?.markComponentHealthy('ResultStore');
      return null;
    } catch (error) {
      this.logger.error(`Cycle #${cycleNumber}: result store append failed: ${errorMessage(error)}`);
      this.errorHandler?.handlePersistenceFailure('ResultStore', error);
      return errorMessage(error);
    }
  }

  private async trackResults(
    cycleNumber: number,
    results: ProbeResult[],
    devices: Device[]
  ): Promise<{ outcome: TrackingOutcome | null; error: string | null }> {
    if (!this.tracker) {
      return { outcome: null, error: null };
    }

    try {
      const outcome = await this.tracker.applyCycle(results, devices);
      if (outcome.persist_error === null) {
        this.errorHandler?.markComponentHealthy('TimeoutTracker');
      }
      return { outcome, error: outcome.persist_error };
    } catch (error) {
      this.logger.error(`Cycle #${cycleNumber}: timeout tracking failed: ${errorMessage(error)}`);
      this.errorHandler?.handleError(error, { component: 'TimeoutTracker' });
      return { outcome: null, error: errorMessage(error) };
    }
  }

  private async recordSnapshot(cycleNumber: number, failing: number): Promise<void> {
    if (!this.analytics) {
      return;
    }
    try {
      await this.analytics.record(failing, this.clock());
      this.errorHandler?.markComponentHealthy('TimeoutAnalytics');
    } catch (error) {
      this.logger.error(`Cycle #${cycleNumber}: timeout snapshot failed: ${errorMessage(error)}`);
      this.errorHandler?.handlePersistenceFailure('TimeoutAnalytics', error);
    }
  }

  private emitFailure(cycleNumber: number, error: unknown): void {
    const event: CycleFailedEvent = { cycle_number: cycleNumber, error: errorMessage(error) };
    this.emit('cycle:failed', event);
  }
}
