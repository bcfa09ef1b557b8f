/**
 * Append-only result store with one CSV partition per local calendar day
 */

import * as fs from 'fs/promises';
import path from 'path';
import { Logger, PartitionInfo, ProbeResult, RebuildReport, StoreStatistics, TimeRange } from '../types';
import { PersistenceError, errorMessage, isNotFound } from '../error-handling';
import { AsyncLock } from '../utils/async-lock';
import { partitionKey, partitionKeyToIsoDate, startOfLocalDay } from '../utils/time';
import { encodeRow, parseCsv } from './csv';
import { appendPrefix, listPartitionKeys, readIfExists, sizeOf } from './partition-file';

export const RESULT_COLUMNS = [
  'timestamp',
  'device_id',
  'address',
  'hostname',
  'success',
  'latency_ms',
  'error_message'
] as const;

const HEADER_LINE = encodeRow([...RESULT_COLUMNS]);
const PARTITION_PATTERN = /^ping_results_(\d{8})\.csv$/;

export function partitionFilename(key: string): string {
  return `ping_results_${key}.csv`;
}

export function encodeResult(result: ProbeResult): string {
  return encodeRow([
    result.timestamp.toISOString(),
    result.device_id,
    result.address,
    result.hostname,
    result.success ? 'true' : 'false',
    result.latency_ms === null ? '' : String(result.latency_ms),
    result.error_message ?? ''
  ]);
}

/**
 * Decode one data row, or null if it is malformed
 */
export function decodeResult(fields: string[]): ProbeResult | null {
  if (fields.length !== RESULT_COLUMNS.length) {
    return null;
  }

  const [timestamp, deviceId, address, hostname, success, latency, errorText] = fields;
  if (
    timestamp === undefined || deviceId === undefined || address === undefined ||
    hostname === undefined || success === undefined || latency === undefined || errorText === undefined
  ) {
    return null;
  }

  const parsedTime = new Date(timestamp);
  if (timestamp === '' || Number.isNaN(parsedTime.getTime()) || address === '') {
    return null;
  }
  if (success !== 'true' && success !== 'false') {
    return null;
  }

  const ok = success === 'true';
  const latencyValue = latency === '' ? null : Number(latency);
  if (latencyValue !== null && !Number.isFinite(latencyValue)) {
    return null;
  }
  if (ok !== (latencyValue !== null)) {
    return null;
  }

  return {
    timestamp: parsedTime,
    device_id: deviceId,
    address,
    hostname,
    success: ok,
    latency_ms: latencyValue,
    error_message: ok ? null : errorText
  };
}

function isHeader(fields: string[]): boolean {
  return fields.length === RESULT_COLUMNS.length && fields.every((field, i) => field === RESULT_COLUMNS[i]);
}

interface TouchedPartition {
  filePath: string;
  previousSize: number | null;
}

export class ResultStore {
  private outputDir: string;
  private logger: Logger;
  private retentionDays: number;
  private clock: () => Date;
  private lock = new AsyncLock();

  constructor(logger: Logger, outputDir: string = 'ping_results', retentionDays: number = 30, clock: () => Date = () => new Date()) {
    this.logger = logger;
    this.outputDir = outputDir;
    this.retentionDays = retentionDays;
    this.clock = clock;
  }

  /**
   * Create the output directory if needed
   */
  async initialize(): Promise<void> {
    await fs.mkdir(this.outputDir, { recursive: true });
    this.logger.info(`Result store ready at ${path.resolve(this.outputDir)}`);
  }

  getOutputDir(): string {
    return this.outputDir;
  }

  /**
   * Append a batch. Every partition touched is rolled back if any write fails.
   */
  async append(results: ProbeResult[]): Promise<number> {
    if (results.length === 0) {
      return 0;
    }

    const batches = new Map<string, string[]>();
    for (const result of results) {
      const key = partitionKey(result.timestamp);
      const rows = batches.get(key) ?? [];
      rows.push(encodeResult(result));
      batches.set(key, rows);
    }

    return this.lock.run(async () => {
      const touched: TouchedPartition[] = [];

      try {
        await fs.mkdir(this.outputDir, { recursive: true });

        for (const [key, rows] of batches) {
          const filePath = this.partitionPath(key);
          const previousSize = await sizeOf(filePath);
          touched.push({ filePath, previousSize });

          const prefix = await appendPrefix(filePath, previousSize, HEADER_LINE);
          await fs.appendFile(filePath, prefix + rows.join(''), 'utf-8');
        }
      } catch (error) {
        await this.rollback(touched);
        throw new PersistenceError(
          `Failed to append ${results.length} results: ${errorMessage(error)}`,
          'ResultStore',
          this.outputDir,
          { partitions: Array.from(batches.keys()) }
        );
      }

      this.logger.debug(`Appended ${results.length} results to ${batches.size} partition(s)`);
      return results.length;
    });
  }

  /**
   * All valid results from the partition holding `date`
   */
  async read(date: Date): Promise<ProbeResult[]> {
    return this.lock.run(() => this.readPartition(partitionKey(date)));
  }

  /**
   * Results within `[start, end]`, oldest first, optionally for one address
   */
  async range(timeRange: TimeRange, address?: string): Promise<ProbeResult[]> {
    const { start, end } = timeRange;
    if (start.getTime() > end.getTime()) {
      return [];
    }

    return this.lock.run(async () => {
      const firstKey = partitionKey(start);
      const lastKey = partitionKey(end);
      const keys = (await this.partitionKeys()).filter(key => key >= firstKey && key <= lastKey);

      const matches: ProbeResult[] = [];
      for (const key of keys) {
        const rows = await this.readPartition(key);
        for (const row of rows) {
          const time = row.timestamp.getTime();
          if (time < start.getTime() || time > end.getTime()) {
            continue;
          }
          if (address !== undefined && row.address !== address) {
            continue;
          }
          matches.push(row);
        }
      }

      return matches.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
    });
  }

  /**
   * Newest result per address from today's partition, newest first
   */
  async latest(limit?: number): Promise<ProbeResult[]> {
    const rows = await this.read(this.clock());
    const newest = new Map<string, ProbeResult>();

    for (const row of rows) {
      const current = newest.get(row.address);
      if (!current || row.timestamp.getTime() >= current.timestamp.getTime()) {
        newest.set(row.address, row);
      }
    }

    const sorted = Array.from(newest.values())
      .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
    return limit !== undefined ? sorted.slice(0, limit) : sorted;
  }

  /**
   * Partition files on disk, newest first
   */
  async listPartitions(): Promise<PartitionInfo[]> {
    return this.lock.run(async () => {
      const partitions: PartitionInfo[] = [];

      for (const key of await this.partitionKeys()) {
        const filePath = this.partitionPath(key);
        const stat = await fs.stat(filePath);
        const content = await fs.readFile(filePath, 'utf-8');
        const rows = parseCsv(content).filter(fields => !isHeader(fields));

        partitions.push({
          filename: partitionFilename(key),
          date: partitionKeyToIsoDate(key),
          size_bytes: stat.size,
          record_count: rows.length,
          last_modified: stat.mtime
        });
      }

      return partitions.sort((a, b) => b.date.localeCompare(a.date));
    });
  }

  async statistics(): Promise<StoreStatistics> {
    const partitions = await this.listPartitions();
    const dates = partitions.map(p => p.date).sort();

    return {
      partition_count: partitions.length,
      total_records: partitions.reduce((sum, p) => sum + p.record_count, 0),
      total_size_bytes: partitions.reduce((sum, p) => sum + p.size_bytes, 0),
      oldest_partition: dates[0] ?? null,
      newest_partition: dates[dates.length - 1] ?? null
    };
  }

  /**
   * Delete partitions older than the retention window. Returns deleted filenames.
   */
  async cleanup(retentionDays: number = this.retentionDays): Promise<string[]> {
    const cutoff = startOfLocalDay(this.clock());
    cutoff.setDate(cutoff.getDate() - retentionDays);
    const cutoffKey = partitionKey(cutoff);

    return this.lock.run(async () => {
      const deleted: string[] = [];
      for (const key of await this.partitionKeys()) {
        if (key < cutoffKey) {
          await fs.unlink(this.partitionPath(key));
          deleted.push(partitionFilename(key));
        }
      }

      if (deleted.length > 0) {
        this.logger.info(`Removed ${deleted.length} partition(s) older than ${retentionDays} days`);
      }
      return deleted;
    });
  }

  /**
   * Maintenance only: drop malformed and duplicate rows, rewriting each partition atomically
   */
  async rebuild(date?: Date): Promise<RebuildReport[]> {
    return this.lock.run(async () => {
      const keys = date !== undefined ? [partitionKey(date)] : await this.partitionKeys();
      const reports: RebuildReport[] = [];

      for (const key of keys) {
        const filePath = this.partitionPath(key);
        let content: string;
        try {
          content = await fs.readFile(filePath, 'utf-8');
        } catch (error) {
          if (isNotFound(error)) {
            continue;
          }
          throw new PersistenceError(`Failed to read ${filePath}: ${errorMessage(error)}`, 'ResultStore', filePath);
        }

        const rows = parseCsv(content);
        const seen = new Set<string>();
        const kept: string[] = [];
        let total = 0;

        rows.forEach((fields, index) => {
          if (index === 0 && isHeader(fields)) {
            return;
          }
          total++;
          const result = decodeResult(fields);
          if (!result) {
            return;
          }
          const line = encodeResult(result);
          if (seen.has(line)) {
            return;
          }
          seen.add(line);
          kept.push(line);
        });

        const tempPath = `${filePath}.tmp`;
        try {
          await fs.writeFile(tempPath, HEADER_LINE + kept.join(''), 'utf-8');
          await fs.rename(tempPath, filePath);
        } catch (error) {
          throw new PersistenceError(`Failed to rewrite ${filePath}: ${errorMessage(error)}`, 'ResultStore', filePath);
        }

        const report: RebuildReport = { filename: partitionFilename(key), kept: kept.length, dropped: total - kept.length };
        this.logger.info(`Rebuilt ${report.filename}: kept ${report.kept}, dropped ${report.dropped}`);
        reports.push(report);
      }

      return reports;
    });
  }

  private partitionPath(key: string): string {
    return path.join(this.outputDir, partitionFilename(key));
  }

  private partitionKeys(): Promise<string[]> {
    return listPartitionKeys(this.outputDir, PARTITION_PATTERN);
  }

  private async readPartition(key: string): Promise<ProbeResult[]> {
    const content = await readIfExists(this.partitionPath(key));
    if (content === null) {
      return [];
    }

    const results: ProbeResult[] = [];
    for (const fields of parseCsv(content)) {
      if (isHeader(fields)) {
        continue;
      }
      const result = decodeResult(fields);
      if (result) {
        results.push(result);
      }
    }
    return results;
  }

  private async rollback(touched: TouchedPartition[]): Promise<void> {
    for (const { filePath, previousSize } of touched) {
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
  }
}
