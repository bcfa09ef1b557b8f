/**
 * Per-device consecutive-timeout tracking with threshold and cooldown alerting
 */

import { EventEmitter } from 'events';
import {
  AlertEvent,
  AlertState,
  Device,
  Logger,
  Notifier,
  ProbeResult,
  TimeoutRecord,
  TimeoutReport,
  TimeoutSummary,
  TrackingOutcome
} from '../types';
import { ErrorHandler, errorMessage } from '../error-handling';
import { formatRecoveryNotice, formatTimeoutAlert } from '../alerts/alert-formatter';
import { compareTimeoutRecords } from '../storage/timeout-state-file';
import { logger as rootLogger } from '../utils/logger';

/** Streak length above which a device counts as a high-timeout device in summaries */
export const HIGH_TIMEOUT_COUNT = 10;

export interface TimeoutStateStore {
  read(): Promise<TimeoutRecord[]>;
  write(records: TimeoutRecord[]): Promise<void>;
}

export interface TimeoutTrackerOptions {
  stateStore: TimeoutStateStore;
  notifier?: Notifier;
  recipients?: string[];
  alertThreshold?: number;
  alertCooldownMs?: number;
  alertingEnabled?: boolean;
  recoveryNotices?: boolean;
  clock?: () => Date;
  logger?: Logger;
  errorHandler?: ErrorHandler;
}

function cloneRecord(record: TimeoutRecord): TimeoutRecord {
  return {
    ...record,
    first_timeout: new Date(record.first_timeout.getTime()),
    last_timeout: new Date(record.last_timeout.getTime()),
    last_updated: new Date(record.last_updated.getTime())
  };
}

export class TimeoutTracker extends EventEmitter {
  private records: Map<string, TimeoutRecord> = new Map();
  private alertStates: Map<string, AlertState> = new Map();
  private stateStore: TimeoutStateStore;
  private notifier: Notifier | undefined;
  private recipients: string[];
  private alertThreshold: number;
  private alertCooldownMs: number;
  private alertingEnabled: boolean;
  private recoveryNotices: boolean;
  private clock: () => Date;
  private logger: Logger;
  private errorHandler: ErrorHandler | undefined;

  constructor(options: TimeoutTrackerOptions) {
    super();
    this.stateStore = options.stateStore;
    this.notifier = options.notifier;
    this.recipients = options.recipients ?? [];
    this.alertThreshold = options.alertThreshold ?? 5;
    this.alertCooldownMs = options.alertCooldownMs ?? 60 * 60 * 1000;
    this.alertingEnabled = options.alertingEnabled ?? true;
    this.recoveryNotices = options.recoveryNotices ?? true;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? rootLogger.child('TimeoutTracker');
    this.errorHandler = options.errorHandler;
  }

  /**
   * Restore failing devices from the persisted state file
   */
  async initialize(): Promise<void> {
    const restored = await this.stateStore.read();
    this.records = new Map(restored.map(record => [record.address, record]));
    this.alertStates = new Map();
    this.logger.info(`Restored ${restored.length} timeout record(s)`);
  }

  /**
   * Fold one cycle's results into the streak table, persist it and send due alerts
   */
  async applyCycle(results: ProbeResult[], devices: Device[] = []): Promise<TrackingOutcome> {
    const now = this.clock();
    const deviceByAddress = new Map(devices.map(device => [device.address, device]));
    const next = new Map<string, TimeoutRecord>();
    const seen = new Set<string>();
    const recovered: TimeoutRecord[] = [];

    for (const result of results) {
      if (seen.has(result.address)) {
        continue;
      }
      seen.add(result.address);

      const previous = this.records.get(result.address);
      if (result.success) {
        if (previous) {
          recovered.push(previous);
        }
        continue;
      }

      const device = deviceByAddress.get(result.address);
      next.set(result.address, {
        address: result.address,
        hostname: result.hostname,
        device_id: result.device_id,
        brand: device?.brand ?? previous?.brand ?? '',
        os: device?.os ?? previous?.os ?? '',
        condition: device?.condition ?? previous?.condition ?? 'ok',
        consecutive_timeouts: (previous?.consecutive_timeouts ?? 0) + 1,
        first_timeout: previous?.first_timeout ?? result.timestamp,
        last_timeout: result.timestamp,
        last_updated: now
      });
    }

    const pruned: string[] = [];
    for (const address of this.records.keys()) {
      if (!seen.has(address)) {
        pruned.push(address);
      }
    }

    // Swap in one step so readers never see a half-applied cycle
    const previousAlerts = this.alertStates;
    this.records = next;
    this.alertStates = new Map(
      Array.from(previousAlerts.entries()).filter(([address]) => next.has(address))
    );

    if (pruned.length > 0) {
      this.logger.debug(`Pruned ${pruned.length} address(es) no longer polled: ${pruned.join(', ')}`);
    }

    let persistError: string | null = null;
    try {
      await this.stateStore.write(Array.from(next.values()));
    } catch (error) {
      persistError = errorMessage(error);
      this.logger.error(`Failed to persist timeout state: ${persistError}`);
      this.errorHandler?.handlePersistenceFailure('TimeoutTracker', error);
    }

    const outcome: TrackingOutcome = {
      failing: next.size,
      recoveries: recovered.length,
      pruned: pruned.length,
      alerts_sent: 0,
      alerts_failed: 0,
      persist_error: persistError
    };

    if (this.alertingEnabled) {
      await this.sendDueAlerts(now, outcome);
      if (this.recoveryNotices) {
        await this.sendRecoveryNotices(recovered, previousAlerts, now);
      }
    }

    if (next.size > 0) {
      const max = Math.max(...Array.from(next.values()).map(r => r.consecutive_timeouts));
      this.logger.info(`Timeout tracking updated: ${next.size} failing device(s), max consecutive: ${max}`);
    }

    return outcome;
  }

  summary(): TimeoutSummary {
    const counts = Array.from(this.records.values()).map(r => r.consecutive_timeouts);
    if (counts.length === 0) {
      return {
        total_timeout_devices: 0,
        max_consecutive_timeouts: 0,
        average_consecutive_timeouts: 0,
        devices_with_high_timeouts: 0,
        critical_devices: 0
      };
    }

    const total = counts.reduce((sum, count) => sum + count, 0);
    return {
      total_timeout_devices: counts.length,
      max_consecutive_timeouts: Math.max(...counts),
      average_consecutive_timeouts: Math.round((total / counts.length) * 100) / 100,
      devices_with_high_timeouts: counts.filter(count => count > HIGH_TIMEOUT_COUNT).length,
      critical_devices: counts.filter(count => count >= this.alertThreshold).length
    };
  }

  /**
   * Failing devices with at least `minConsecutive` timeouts, longest streak first
   */
  list(minConsecutive: number = 1): TimeoutRecord[] {
    return Array.from(this.records.values())
      .filter(record => record.consecutive_timeouts >= minConsecutive)
      .sort(compareTimeoutRecords)
      .map(cloneRecord);
  }

  critical(threshold: number = this.alertThreshold): TimeoutRecord[] {
    return this.list(threshold);
  }

  report(): TimeoutReport {
    return {
      summary: this.summary(),
      critical_devices: this.critical(),
      all_timeout_devices: this.list(),
      report_generated: this.clock()
    };
  }

  alertState(address: string): AlertState | null {
    const state = this.alertStates.get(address);
    if (!state) {
      return null;
    }
    return {
      ...state,
      last_alert_sent_at: state.last_alert_sent_at ? new Date(state.last_alert_sent_at.getTime()) : null
    };
  }

  /**
   * Forget every streak and alert state. Returns the number of records cleared.
   */
  async reset(): Promise<number> {
    const cleared = this.records.size;
    this.records = new Map();
    this.alertStates = new Map();
    await this.stateStore.write([]);
    this.logger.info(`Timeout tracking reset (${cleared} record(s) cleared)`);
    return cleared;
  }

  private isAlertDue(record: TimeoutRecord, now: Date): boolean {
    if (record.consecutive_timeouts < this.alertThreshold) {
      return false;
    }
    const state = this.alertStates.get(record.address);
    if (!state || state.last_alert_sent_at === null) {
      return true;
    }
    return now.getTime() - state.last_alert_sent_at.getTime() >= this.alertCooldownMs;
  }

  private async sendDueAlerts(now: Date, outcome: TrackingOutcome): Promise<void> {
    const due = Array.from(this.records.values())
      .filter(record => this.isAlertDue(record, now))
      .sort(compareTimeoutRecords);

    for (const record of due) {
      const message = formatTimeoutAlert(record, now);
      const delivered = await this.deliver('timeout', record.address, message);

      if (delivered) {
        const state = this.alertStates.get(record.address);
        this.alertStates.set(record.address, {
          address: record.address,
          last_alert_sent_at: now,
          alert_count: (state?.alert_count ?? 0) + 1
        });
        outcome.alerts_sent++;
        this.logger.warn(`Timeout alert sent for ${record.address} (${record.consecutive_timeouts} consecutive timeouts)`);
      } else {
        outcome.alerts_failed++;
      }

      this.emitAlert({ kind: 'timeout', record: cloneRecord(record), message, delivered, timestamp: now });
    }
  }

  private async sendRecoveryNotices(
    recovered: TimeoutRecord[],
    previousAlerts: Map<string, AlertState>,
    now: Date
  ): Promise<void> {
    for (const record of recovered) {
      const state = previousAlerts.get(record.address);
      if (!state || state.alert_count === 0) {
        continue;
      }

      const message = formatRecoveryNotice(record, now);
      const delivered = await this.deliver('recovery', record.address, message);
      this.logger.info(`Device ${record.address} recovered after ${record.consecutive_timeouts} consecutive timeouts`);
      this.emitAlert({ kind: 'recovery', record: cloneRecord(record), message, delivered, timestamp: now });
    }
  }

  /**
   * Without a notifier the message is only logged and counts as undelivered
   */
  private async deliver(kind: 'timeout' | 'recovery', address: string, message: string): Promise<boolean> {
    if (!this.notifier) {
      this.logger.warn(`No notifier configured, ${kind} message for ${address} not delivered:\n${message}`);
      return false;
    }
    try {
      const delivered = await this.notifier.send({ kind, address, recipients: [...this.recipients] }, message);
      if (delivered) {
        this.errorHandler?.markComponentHealthy('Notifier');
      } else {
        this.errorHandler?.handleNotifierFailure(address, kind);
      }
      return delivered;
    } catch (error) {
      this.logger.error(`Notifier threw while sending ${kind} message for ${address}: ${errorMessage(error)}`);
      this.errorHandler?.handleNotifierFailure(address, kind, error);
      return false;
    }
  }

  private emitAlert(event: AlertEvent): void {
    this.emit('alert', event);
  }
}
