/**
 * Tests for the persisted timeout state file
 */

import * as fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { TimeoutStateFile, TIMEOUT_STATE_FILENAME } from './timeout-state-file';
import { Logger, TimeoutRecord } from '../types';

const HEADER = 'address,hostname,device_id,brand,os,condition,consecutive_timeouts,first_timeout,last_timeout,last_updated';

function record(address: string, consecutive: number): TimeoutRecord {
  const at = new Date('2024-03-01T08:00:00.000Z');
  return {
    address,
    hostname: `host ${address}`,
    device_id: `dev-${address}`,
    brand: 'acme, inc',
    os: 'ios',
    condition: 'maintenance',
    consecutive_timeouts: consecutive,
    first_timeout: at,
    last_timeout: new Date('2024-03-01T08:05:00.000Z'),
    last_updated: new Date('2024-03-01T08:05:01.000Z')
  };
}

describe('TimeoutStateFile', () => {
  let dir: string;
  let filePath: string;
  let logger: Logger;
  let stateFile: TimeoutStateFile;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'timeout-state-'));
    filePath = path.join(dir, TIMEOUT_STATE_FILENAME);
    logger = { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() };
    stateFile = new TimeoutStateFile(filePath, logger);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should write records sorted by streak, longest first', async () => {
    await stateFile.write([record('10.0.0.1', 2), record('10.0.0.2', 9), record('10.0.0.3', 2)]);

    const lines = (await fs.readFile(filePath, 'utf-8')).trim().split('\n');
    expect(lines[0]).toBe(HEADER);
    expect(lines.slice(1).map(line => line.split(',')[0])).toEqual(['10.0.0.2', '10.0.0.1', '10.0.0.3']);
    expect(lines[1]).toBe(
      '10.0.0.2,host 10.0.0.2,dev-10.0.0.2,"acme, inc",ios,maintenance,9,' +
      '2024-03-01T08:00:00.000Z,2024-03-01T08:05:00.000Z,2024-03-01T08:05:01.000Z'
    );
  });

  it('should read back what it wrote', async () => {
    await stateFile.write([record('10.0.0.1', 2), record('10.0.0.2', 9)]);

    await expect(stateFile.read()).resolves.toEqual([record('10.0.0.2', 9), record('10.0.0.1', 2)]);
  });

  it('should leave no temporary file behind', async () => {
    await stateFile.write([record('10.0.0.1', 1)]);

    await expect(fs.readdir(dir)).resolves.toEqual([TIMEOUT_STATE_FILENAME]);
  });

  it('should treat a missing file as empty state', async () => {
    await expect(stateFile.read()).resolves.toEqual([]);
  });

  it('should skip malformed rows with a warning', async () => {
    await stateFile.write([record('10.0.0.1', 3)]);
    await fs.appendFile(filePath, '10.0.0.9,host,dev,brand,os,broken,zero,,,\nshort,row\n');

    const records = await stateFile.read();

    expect(records.map(r => r.address)).toEqual(['10.0.0.1']);
    expect(logger.warn).toHaveBeenCalledWith(`Skipped 2 malformed row(s) in ${filePath}`);
  });

  it('should replace previous content on each write', async () => {
    await stateFile.write([record('10.0.0.1', 3), record('10.0.0.2', 1)]);
    await stateFile.write([]);

    await expect(fs.readFile(filePath, 'utf-8')).resolves.toBe(`${HEADER}\n`);
  });
});
