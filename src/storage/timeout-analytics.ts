/**
 * Time series of the failing-device count, one row per cycle in
 * `timeout_analytics_YYYYMMDD.csv` partitions beside the results
 */

import * as fs from 'fs/promises';
import path from 'path';
import { Logger, TimeoutAnalyticsSummary, TimeoutSnapshot } from '../types';
import { PersistenceError, errorMessage } from '../error-handling';
import { AsyncLock } from '../utils/async-lock';
import { partitionKey, startOfLocalDay } from '../utils/time';
import { encodeRow, parseCsv } from './csv';
import { appendPrefix, listPartitionKeys, readIfExists, sizeOf } from './partition-file';

export const ANALYTICS_COLUMNS = ['timestamp', 'total_timeout_devices'] as const;

const HEADER_LINE = encodeRow([...ANALYTICS_COLUMNS]);
const PARTITION_PATTERN = /^timeout_analytics_(\d{8})\.csv$/;
const HOUR_MS = 60 * 60 * 1000;

export function analyticsFilename(key: string): string {
  return `timeout_analytics_${key}.csv`;
}

function decodeSnapshot(fields: string[]): TimeoutSnapshot | null {
  const [timestamp, count] = fields;
  if (fields.length !== ANALYTICS_COLUMNS.length || timestamp === undefined || count === undefined) {
    return null;
  }
  const parsedTime = new Date(timestamp);
  const parsedCount = Number(count);
  if (timestamp === '' || Number.isNaN(parsedTime.getTime())) {
    return null;
  }
  if (count === '' || !Number.isInteger(parsedCount) || parsedCount < 0) {
    return null;
  }
  return { timestamp: parsedTime, total_timeout_devices: parsedCount };
}

export class TimeoutAnalyticsStore {
  private outputDir: string;
  private logger: Logger;
  private clock: () => Date;
  private lock = new AsyncLock();

  constructor(logger: Logger, outputDir: string, clock: () => Date = () => new Date()) {
    this.logger = logger;
    this.outputDir = outputDir;
    this.clock = clock;
  }

  /**
   * Append one snapshot to the partition of `at`
   */
  async record(totalTimeoutDevices: number, at: Date = this.clock()): Promise<void> {
    const filePath = this.partitionPath(partitionKey(at));
    const row = encodeRow([at.toISOString(), String(totalTimeoutDevices)]);

    await this.lock.run(async () => {
      let previousSize: number | null | undefined;
      try {
        await fs.mkdir(this.outputDir, { recursive: true });
        previousSize = await sizeOf(filePath);
        const prefix = await appendPrefix(filePath, previousSize, HEADER_LINE);
        await fs.appendFile(filePath, prefix + row, 'utf-8');
      } catch (error) {
        if (previousSize !== undefined) {
          await this.rollback(filePath, previousSize);
        }
        throw new PersistenceError(`Failed to record timeout snapshot: ${errorMessage(error)}`, 'TimeoutAnalytics', filePath);
      }
    });

    this.logger.debug(`Recorded timeout snapshot: ${totalTimeoutDevices} device(s)`);
  }

  /**
   * Snapshots from the last `hours` hours, oldest first
   */
  async recent(hours: number = 24): Promise<TimeoutSnapshot[]> {
    const end = this.clock();
    return this.between(new Date(end.getTime() - hours * HOUR_MS), end);
  }

  /**
   * Snapshots from the start of the day `days - 1` days ago until now, oldest first
   */
  async multiDay(days: number = 7): Promise<TimeoutSnapshot[]> {
    const end = this.clock();
    const start = startOfLocalDay(end);
    start.setDate(start.getDate() - (days - 1));
    return this.between(start, end);
  }

  async summary(hours: number = 24): Promise<TimeoutAnalyticsSummary> {
    const snapshots = await this.recent(hours);
    const counts = snapshots.map(s => s.total_timeout_devices);
    const total = counts.reduce((sum, count) => sum + count, 0);

    return {
      total_records: snapshots.length,
      time_range_hours: hours,
      avg_timeout_devices: counts.length === 0 ? 0 : Math.round((total / counts.length) * 100) / 100,
      peak_timeout_devices: counts.length === 0 ? 0 : Math.max(...counts),
      first_record: snapshots[0]?.timestamp ?? null,
      last_record: snapshots[snapshots.length - 1]?.timestamp ?? null
    };
  }

  /**
   * Delete partitions older than the retention window. Returns deleted filenames.
   */
  async cleanup(retentionDays: number): Promise<string[]> {
    const cutoff = startOfLocalDay(this.clock());
    cutoff.setDate(cutoff.getDate() - retentionDays);
    const cutoffKey = partitionKey(cutoff);

    return this.lock.run(async () => {
      const deleted: string[] = [];
      for (const key of await listPartitionKeys(this.outputDir, PARTITION_PATTERN)) {
        if (key < cutoffKey) {
          await fs.unlink(this.partitionPath(key));
          deleted.push(analyticsFilename(key));
        }
      }
      if (deleted.length > 0) {
        this.logger.info(`Removed ${deleted.length} analytics partition(s) older than ${retentionDays} days`);
      }
      return deleted;
    });
  }

  private between(start: Date, end: Date): Promise<TimeoutSnapshot[]> {
    return this.lock.run(async () => {
      const firstKey = partitionKey(start);
      const lastKey = partitionKey(end);
      const keys = (await listPartitionKeys(this.outputDir, PARTITION_PATTERN))
        .filter(key => key >= firstKey && key <= lastKey);

      const snapshots: TimeoutSnapshot[] = [];
      for (const key of keys) {
        const content = await readIfExists(this.partitionPath(key));
        if (content === null) {
          continue;
        }
        for (const fields of parseCsv(content)) {
          const snapshot = decodeSnapshot(fields);
          if (snapshot && snapshot.timestamp >= start && snapshot.timestamp <= end) {
            snapshots.push(snapshot);
          }
        }
      }

      return snapshots.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
    });
  }

  private async rollback(filePath: string, previousSize: number | null): Promise<void> {
    try {
      if (previousSize === null) {
        await fs.rm(filePath, { force: true });
      } else {
        await fs.truncate(filePath, previousSize);
      }
    } catch (error) {
      this.logger.error(`Rollback of ${filePath} failed: ${errorMessage(error)}`);
    }
  }

  private partitionPath(key: string): string {
    return path.join(this.outputDir, analyticsFilename(key));
  }
}
