/**
 * Tests for the polling control loop
 */

import { CycleScheduler, CycleSchedulerOptions, CycleTracker } from './cycle-scheduler';
import { TimeoutTracker, TimeoutStateStore } from './timeout-tracker';
import {
  AlertEvent,
  CycleSummary,
  Device,
  InventorySource,
  Logger,
  ProbeOutcome,
  ProbeResult,
  TimeoutRecord,
  TrackingOutcome
} from '../types';
import { ErrorHandler, PersistenceError } from '../error-handling';

function device(id: string, address: string, condition: Device['condition'] = 'ok'): Device {
  return { id, address, hostname: `host-${id}`, brand: 'acme', os: 'linux', condition };
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

const NO_TRACKING: TrackingOutcome = {
  failing: 0,
  recoveries: 0,
  pruned: 0,
  alerts_sent: 0,
  alerts_failed: 0,
  persist_error: null
};

class MemoryStateStore implements TimeoutStateStore {
  async read(): Promise<TimeoutRecord[]> {
    return [];
  }

  async write(): Promise<void> {
    return undefined;
  }
}

describe('CycleScheduler', () => {
  let logger: Logger;
  let listDevices: jest.Mock<Promise<Device[]>, []>;
  let inventory: InventorySource;
  let append: jest.Mock<Promise<number>, [ProbeResult[]]>;
  let applyCycle: jest.Mock<Promise<TrackingOutcome>, [ProbeResult[], Device[]]>;
  let tracker: CycleTracker;
  let probe: jest.Mock<Promise<ProbeOutcome>, [string, number]>;
  let scheduler: CycleScheduler | null;

  const makeScheduler = (overrides: Partial<CycleSchedulerOptions> = {}): CycleScheduler => {
    scheduler = new CycleScheduler({
      inventory,
      store: { append },
      tracker,
      intervalMs: 60000,
      probeTimeoutMs: 1000,
      maxConcurrency: 4,
      probe,
      logger,
      ...overrides
    });
    return scheduler;
  };

  beforeEach(() => {
    scheduler = null;
    logger = { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() };
    listDevices = jest.fn(async () => [device('1', '10.0.0.1'), device('2', '10.0.0.2')]);
    inventory = { listDevices };
    append = jest.fn(async (results: ProbeResult[]) => results.length);
    applyCycle = jest.fn(async (_results: ProbeResult[], _devices: Device[]) => NO_TRACKING);
    tracker = { applyCycle, on: jest.fn() };
    probe = jest.fn(async (address: string, _timeoutMs: number): Promise<ProbeOutcome> =>
      address === '10.0.0.2' ? { success: false, reason: 'timeout' } : { success: true, latency_ms: 2 }
    );
  });

  afterEach(async () => {
    if (scheduler) {
      await scheduler.stop();
    }
  });

  describe('cycles', () => {
    it('should hand the same results to the store and the tracker', async () => {
      const s = makeScheduler();

      const summary = await s.runOnce();

      expect(append).toHaveBeenCalledTimes(1);
      expect(applyCycle).toHaveBeenCalledTimes(1);
      const stored = append.mock.calls[0]?.[0];
      const tracked = applyCycle.mock.calls[0]?.[0];
      expect(tracked).toBe(stored);
      expect(stored?.map(r => [r.address, r.success])).toEqual([['10.0.0.1', true], ['10.0.0.2', false]]);
      expect(summary?.cycle_number).toBe(1);
      expect(summary?.statistics.success_rate).toBe(50);
      expect(summary?.store_error).toBeNull();
      expect(summary?.tracker_error).toBeNull();
    });

    it('should resolve earlier scheduler errors once a cycle completes', async () => {
      const errorHandler = new ErrorHandler({ logger });
      errorHandler.handleError(new Error('dispatch failed'), { component: 'Scheduler' });
      const s = makeScheduler({ errorHandler });

      await s.runOnce();

      expect(errorHandler.getSystemHealth().active_errors).toEqual([]);
    });

    it('should filter missing devices and duplicate addresses before probing', async () => {
      listDevices.mockResolvedValueOnce([
        device('1', '10.0.0.1'),
        device('2', '10.0.0.1'),
        device('3', '10.0.0.3', 'missing'),
        device('4', '10.0.0.4', 'maintenance')
      ]);
      const s = makeScheduler();

      const summary = await s.runOnce();

      expect(probe.mock.calls.map(call => call[0])).toEqual(['10.0.0.1', '10.0.0.4']);
      expect(summary?.device_count).toBe(2);
      expect(summary?.skipped_devices).toBe(2);
      expect(applyCycle.mock.calls[0]?.[1].map(d => d.id)).toEqual(['1', '4']);
    });

    it('should abort the cycle when the inventory fails', async () => {
      listDevices.mockRejectedValueOnce(new Error('inventory offline'));
      const s = makeScheduler();
      const failures: unknown[] = [];
      s.on('cycle:failed', event => failures.push(event));

      await expect(s.runOnce()).resolves.toBeNull();

      expect(failures).toEqual([{ cycle_number: 1, error: 'inventory offline' }]);
      expect(append).not.toHaveBeenCalled();
      expect(applyCycle).not.toHaveBeenCalled();

      await expect(s.runOnce()).resolves.not.toBeNull();
      expect(s.status().cycle_count).toBe(2);
    });

    it('should still track results when the store fails', async () => {
      append.mockRejectedValueOnce(new PersistenceError('disk full', 'ResultStore'));
      const s = makeScheduler();

      const summary = await s.runOnce();

      expect(summary?.store_error).toBe('disk full');
      expect(applyCycle).toHaveBeenCalledTimes(1);
    });

    it('should still store results when the tracker fails', async () => {
      applyCycle.mockRejectedValueOnce(new Error('tracker exploded'));
      const s = makeScheduler();

      const summary = await s.runOnce();

      expect(summary?.tracker_error).toBe('tracker exploded');
      expect(summary?.store_error).toBeNull();
      expect(append).toHaveBeenCalledTimes(1);
    });

    it('should report a tracker persistence failure in the summary', async () => {
      applyCycle.mockResolvedValueOnce({ ...NO_TRACKING, persist_error: 'read-only file system' });
      const s = makeScheduler();

      const summary = await s.runOnce();

      expect(summary?.tracker_error).toBe('read-only file system');
    });

    it('should record the failing-device count after tracking', async () => {
      const at = new Date(2024, 2, 1, 8, 0, 0);
      const record = jest.fn(async (_total: number, _at: Date) => undefined);
      applyCycle.mockResolvedValueOnce({ ...NO_TRACKING, failing: 3 });
      const s = makeScheduler({ analytics: { record }, clock: () => at });

      await s.runOnce();

      expect(record).toHaveBeenCalledWith(3, at);
    });

    it('should complete the cycle when the snapshot cannot be recorded', async () => {
      const errorHandler = new ErrorHandler({ logger });
      const record = jest.fn(async () => {
        throw new PersistenceError('disk full', 'TimeoutAnalytics');
      });
      const s = makeScheduler({ analytics: { record }, errorHandler });

      const summary = await s.runOnce();

      expect(summary?.cycle_number).toBe(1);
      expect(errorHandler.getSystemHealth().active_errors.map(e => e.component)).toEqual(['TimeoutAnalytics']);
    });

    it('should not record a snapshot without a tracker', async () => {
      const record = jest.fn(async () => undefined);
      const s = makeScheduler({ tracker: undefined, analytics: { record } });

      await s.runOnce();

      expect(record).not.toHaveBeenCalled();
    });

    it('should skip tracking when no tracker is configured', async () => {
      const s = makeScheduler({ tracker: undefined });

      const summary = await s.runOnce();

      expect(summary?.alerts_sent).toBe(0);
      expect(applyCycle).not.toHaveBeenCalled();
    });

    it('should emit cycle events', async () => {
      const s = makeScheduler();
      const events: string[] = [];
      s.on('cycle:start', () => events.push('start'));
      s.on('cycle:complete', (summary: CycleSummary) => events.push(`complete:${summary.cycle_number}`));

      await s.runOnce();

      expect(events).toEqual(['start', 'complete:1']);
      expect(s.status().last_summary?.cycle_number).toBe(1);
    });

    it('should forward tracker alerts', async () => {
      const realTracker = new TimeoutTracker({
        stateStore: new MemoryStateStore(),
        notifier: { send: jest.fn(async () => true) },
        recipients: ['ops'],
        alertThreshold: 1,
        logger
      });
      const s = makeScheduler({ tracker: realTracker });
      const alerts: AlertEvent[] = [];
      s.on('alert', (event: AlertEvent) => alerts.push(event));

      const summary = await s.runOnce();

      expect(alerts.map(a => [a.kind, a.record.address, a.delivered])).toEqual([['timeout', '10.0.0.2', true]]);
      expect(summary?.alerts_sent).toBe(1);
    });
  });

  describe('overlap and lifecycle', () => {
    it('should skip a tick while a cycle is still running', async () => {
      const gate = deferred();
      probe.mockImplementation(async () => {
        await gate.promise;
        return { success: true, latency_ms: 1 };
      });
      const s = makeScheduler();
      const skipped: unknown[] = [];
      s.on('cycle:skipped', event => skipped.push(event));

      const first = s.tick();
      await expect(s.tick()).resolves.toBeNull();
      await expect(s.runOnce()).resolves.toBeNull();

      expect(s.status().cycle_count).toBe(1);
      expect(s.status().skipped_ticks).toBe(1);
      expect(s.status().cycle_in_progress).toBe(true);
      expect(skipped).toEqual([{ cycle_number: 1, skipped_ticks: 1 }]);

      gate.resolve();
      const summary = await first;
      expect(summary?.cycle_number).toBe(1);
      expect(s.status().cycle_in_progress).toBe(false);

      await s.tick();
      expect(s.status().cycle_count).toBe(2);
    });

    it('should finish the in-flight cycle before reporting stopped', async () => {
      const gate = deferred();
      probe.mockImplementation(async () => {
        await gate.promise;
        return { success: true, latency_ms: 1 };
      });
      const s = makeScheduler();
      const events: string[] = [];
      s.on('cycle:complete', () => events.push('complete'));

      expect(s.start().state).toBe('running');
      const stopping = s.stop().then(status => {
        events.push(`stopped:${status.state}`);
        return status;
      });
      expect(s.status().state).toBe('stopping');

      gate.resolve();
      const status = await stopping;

      expect(events).toEqual(['complete', 'stopped:stopped']);
      expect(status.cycle_count).toBe(1);
      expect(status.last_summary?.statistics.total).toBe(2);
      expect(append).toHaveBeenCalledTimes(1);
      expect(status.next_tick_at).toBeNull();
    });

    it('should treat a second start as a no-op', async () => {
      const s = makeScheduler();

      s.start();
      const second = s.start();

      expect(second.state).toBe('running');
      await s.stop();
      expect(listDevices).toHaveBeenCalledTimes(1);
    });

    it('should run cycles on the interval', async () => {
      const s = makeScheduler({ intervalMs: 40 });

      s.start();
      await new Promise(resolve => setTimeout(resolve, 250));
      const status = await s.stop();

      expect(status.cycle_count).toBeGreaterThanOrEqual(3);
      expect(status.state).toBe('stopped');
    });

    it('should allow a restart after stop', async () => {
      const s = makeScheduler();

      s.start();
      await s.stop();
      expect(s.start().state).toBe('running');
      await s.stop();

      expect(listDevices).toHaveBeenCalledTimes(2);
    });

    it('should report stopped when stopped before starting', async () => {
      const s = makeScheduler();

      await expect(s.stop()).resolves.toMatchObject({ state: 'stopped', cycle_count: 0 });
    });
  });
});
