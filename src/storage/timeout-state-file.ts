/**
 * Persisted snapshot of failing devices (`timeout_tracking.csv`)
 */

import * as fs from 'fs/promises';
import path from 'path';
import { Logger, TimeoutRecord } from '../types';
import { PersistenceError, errorMessage, isNotFound } from '../error-handling';
import { isDeviceCondition } from '../inventory/device-validator';
import { AsyncLock } from '../utils/async-lock';
import { encodeRow, parseCsv } from './csv';

export const TIMEOUT_STATE_FILENAME = 'timeout_tracking.csv';

export const TIMEOUT_COLUMNS = [
  'address',
  'hostname',
  'device_id',
  'brand',
  'os',
  'condition',
  'consecutive_timeouts',
  'first_timeout',
  'last_timeout',
  'last_updated'
] as const;

/**
 * Most persistent failures first, ties by address
 */
export function compareTimeoutRecords(a: TimeoutRecord, b: TimeoutRecord): number {
  return b.consecutive_timeouts - a.consecutive_timeouts || a.address.localeCompare(b.address);
}

function encodeRecord(record: TimeoutRecord): string {
  return encodeRow([
    record.address,
    record.hostname,
    record.device_id,
    record.brand,
    record.os,
    record.condition,
    String(record.consecutive_timeouts),
    record.first_timeout.toISOString(),
    record.last_timeout.toISOString(),
    record.last_updated.toISOString()
  ]);
}

function parseDate(value: string): Date | null {
  const date = new Date(value);
  return value === '' || Number.isNaN(date.getTime()) ? null : date;
}

function decodeRecord(fields: string[]): TimeoutRecord | null {
  if (fields.length !== TIMEOUT_COLUMNS.length) {
    return null;
  }

  const [address, hostname, deviceId, brand, os, condition, count, first, last, updated] = fields;
  if (
    address === undefined || address === '' || hostname === undefined || deviceId === undefined ||
    brand === undefined || os === undefined || count === undefined ||
    first === undefined || last === undefined || updated === undefined
  ) {
    return null;
  }

  const consecutive = Number(count);
  const firstTimeout = parseDate(first);
  const lastTimeout = parseDate(last);
  const lastUpdated = parseDate(updated);
  if (!Number.isInteger(consecutive) || consecutive < 1 || !isDeviceCondition(condition)) {
    return null;
  }
  if (!firstTimeout || !lastTimeout || !lastUpdated) {
    return null;
  }

  return {
    address,
    hostname,
    device_id: deviceId,
    brand,
    os,
    condition,
    consecutive_timeouts: consecutive,
    first_timeout: firstTimeout,
    last_timeout: lastTimeout,
    last_updated: lastUpdated
  };
}

export class TimeoutStateFile {
  private filePath: string;
  private logger: Logger;
  private lock = new AsyncLock();

  constructor(filePath: string, logger: Logger) {
    this.filePath = filePath;
    this.logger = logger;
  }

  getPath(): string {
    return this.filePath;
  }

  /**
   * Load persisted records. A missing file is an empty state; bad rows are skipped.
   */
  async read(): Promise<TimeoutRecord[]> {
    return this.lock.run(async () => {
      let content: string;
      try {
        content = await fs.readFile(this.filePath, 'utf-8');
      } catch (error) {
        if (isNotFound(error)) {
          return [];
        }
        throw new PersistenceError(`Failed to read ${this.filePath}: ${errorMessage(error)}`, 'TimeoutTracker', this.filePath);
      }

      const records: TimeoutRecord[] = [];
      let skipped = 0;
      parseCsv(content).forEach((fields, index) => {
        if (index === 0 && fields[0] === TIMEOUT_COLUMNS[0]) {
          return;
        }
        const record = decodeRecord(fields);
        if (record) {
          records.push(record);
        } else {
          skipped++;
        }
      });

      if (skipped > 0) {
        this.logger.warn(`Skipped ${skipped} malformed row(s) in ${this.filePath}`);
      }
      return records;
    });
  }

  /**
   * Replace the file with `records` via write-to-temp and rename
   */
  async write(records: TimeoutRecord[]): Promise<void> {
    const body = encodeRow([...TIMEOUT_COLUMNS]) + [...records].sort(compareTimeoutRecords).map(encodeRecord).join('');

    await this.lock.run(async () => {
      const tempPath = `${this.filePath}.tmp`;
      try {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.writeFile(tempPath, body, 'utf-8');
        await fs.rename(tempPath, this.filePath);
      } catch (error) {
        throw new PersistenceError(`Failed to write ${this.filePath}: ${errorMessage(error)}`, 'TimeoutTracker', this.filePath);
      }
    });
  }
}
