/**
 * Tests for the per-cycle failing-device time series
 */

import * as fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { TimeoutAnalyticsStore } from './timeout-analytics';
import { Logger } from '../types';

describe('TimeoutAnalyticsStore', () => {
  const now = new Date(2024, 2, 2, 1, 0, 0);
  const morning = new Date(2024, 2, 1, 10, 0, 0);
  const lateEvening = new Date(2024, 2, 1, 23, 30, 0);
  const afterMidnight = new Date(2024, 2, 2, 0, 30, 0);
  let outputDir: string;
  let logger: Logger;
  let analytics: TimeoutAnalyticsStore;

  const counts = (snapshots: Array<{ total_timeout_devices: number }>): number[] =>
    snapshots.map(s => s.total_timeout_devices);

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'timeout-analytics-'));
    logger = { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() };
    analytics = new TimeoutAnalyticsStore(logger, outputDir, () => now);
  });

  afterEach(async () => {
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  it('should append one row per snapshot under a header', async () => {
    await analytics.record(3, lateEvening);
    await analytics.record(0, lateEvening);

    const content = await fs.readFile(path.join(outputDir, 'timeout_analytics_20240301.csv'), 'utf-8');
    const iso = lateEvening.toISOString();
    expect(content).toBe(`timestamp,total_timeout_devices\n${iso},3\n${iso},0\n`);
  });

  it('should return recent snapshots across midnight, oldest first', async () => {
    await analytics.record(1, afterMidnight);
    await analytics.record(5, morning);
    await analytics.record(3, lateEvening);

    expect(counts(await analytics.recent(2))).toEqual([3, 1]);
    expect(counts(await analytics.recent())).toEqual([5, 3, 1]);
  });

  it('should cover whole calendar days for multi-day queries', async () => {
    await analytics.record(5, morning);
    await analytics.record(1, afterMidnight);

    expect(counts(await analytics.multiDay(1))).toEqual([1]);
    expect(counts(await analytics.multiDay(2))).toEqual([5, 1]);
  });

  it('should summarize the window', async () => {
    await analytics.record(5, morning);
    await analytics.record(3, lateEvening);
    await analytics.record(1, afterMidnight);

    await expect(analytics.summary(24)).resolves.toEqual({
      total_records: 3,
      time_range_hours: 24,
      avg_timeout_devices: 3,
      peak_timeout_devices: 5,
      first_record: morning,
      last_record: afterMidnight
    });
  });

  it('should summarize an empty window as zeros', async () => {
    await expect(analytics.summary(6)).resolves.toEqual({
      total_records: 0,
      time_range_hours: 6,
      avg_timeout_devices: 0,
      peak_timeout_devices: 0,
      first_record: null,
      last_record: null
    });
  });

  it('should skip malformed rows and terminate a torn last row before appending', async () => {
    const filePath = path.join(outputDir, 'timeout_analytics_20240301.csv');
    await fs.writeFile(
      filePath,
      `timestamp,total_timeout_devices\nnot-a-date,4\n${morning.toISOString()},-1\n${morning.toISOString()},2`,
      'utf-8'
    );

    await analytics.record(4, lateEvening);

    expect(counts(await analytics.recent())).toEqual([2, 4]);
  });

  it('should delete partitions older than the retention window', async () => {
    await analytics.record(2, new Date(2024, 1, 28, 12, 0, 0));
    await analytics.record(5, morning);

    await expect(analytics.cleanup(1)).resolves.toEqual(['timeout_analytics_20240228.csv']);
    expect(await fs.readdir(outputDir)).toEqual(['timeout_analytics_20240301.csv']);
  });
});
