/**
 * Validation of loosely-typed inventory records into Device snapshots
 */

import { isIP } from 'net';
import { Device, DeviceCondition, DEVICE_CONDITIONS, Logger } from '../types';

export interface DeviceValidationError {
  index: number;
  field: string;
  message: string;
  value?: unknown;
}

export type DeviceParseResult =
  | { ok: true; device: Device }
  | { ok: false; errors: DeviceValidationError[] };

function optionalText(value: unknown): string {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return '';
}

export function isDeviceCondition(value: unknown): value is DeviceCondition {
  return typeof value === 'string' && DEVICE_CONDITIONS.some(condition => condition === value);
}

export function isValidAddress(address: string): boolean {
  return isIP(address) !== 0;
}

/**
 * Parse one raw inventory record. `condition` defaults to `ok` when absent.
 */
export function parseDevice(raw: unknown, index = 0): DeviceParseResult {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { ok: false, errors: [{ index, field: 'record', message: 'record must be an object', value: raw }] };
  }

  const record: Record<string, unknown> = Object.fromEntries(Object.entries(raw));
  const errors: DeviceValidationError[] = [];

  const id = optionalText(record.id);
  if (id === '') {
    errors.push({ index, field: 'id', message: 'id must be a non-empty string or a number', value: record.id });
  }

  const address = optionalText(record.address ?? record.ip);
  if (address === '') {
    errors.push({ index, field: 'address', message: 'address must be a non-empty string', value: record.address });
  } else if (!isValidAddress(address)) {
    errors.push({ index, field: 'address', message: 'address must be an IPv4 or IPv6 literal', value: address });
  }

  const rawCondition = record.condition === undefined || record.condition === null
    ? 'ok'
    : optionalText(record.condition).toLowerCase();
  if (!isDeviceCondition(rawCondition)) {
    errors.push({ index, field: 'condition', message: `condition must be one of ${DEVICE_CONDITIONS.join(', ')}`, value: record.condition });
  }

  if (errors.length > 0 || !isDeviceCondition(rawCondition)) {
    return { ok: false, errors };
  }

  const hostname = optionalText(record.hostname);

  return {
    ok: true,
    device: {
      id,
      address,
      hostname: hostname === '' ? address : hostname,
      brand: optionalText(record.brand),
      os: optionalText(record.os),
      condition: rawCondition
    }
  };
}

/**
 * Parse a raw inventory payload, skipping invalid records with a warning
 */
export function parseDeviceList(payload: unknown, logger: Logger): Device[] {
  if (!Array.isArray(payload)) {
    throw new Error('Inventory payload must be an array of device records');
  }

  const devices: Device[] = [];
  payload.forEach((raw: unknown, index: number) => {
    const parsed = parseDevice(raw, index);
    if (parsed.ok) {
      devices.push(parsed.device);
    } else {
      const reasons = parsed.errors.map(err => `${err.field}: ${err.message}`).join('; ');
      logger.warn(`Skipping inventory record ${index}: ${reasons}`);
    }
  });

  return devices;
}

/**
 * Devices eligible for polling this cycle: not missing, deduplicated by address (first wins)
 */
export function selectPollableDevices(devices: Device[], logger?: Logger): { devices: Device[]; skipped: number } {
  const seen = new Set<string>();
  const pollable: Device[] = [];
  let skipped = 0;

  for (const device of devices) {
    if (device.condition === 'missing' || !isValidAddress(device.address)) {
      skipped++;
      continue;
    }
    if (seen.has(device.address)) {
      skipped++;
      logger?.debug(`Duplicate address ${device.address} (device ${device.id}) skipped`);
      continue;
    }
    seen.add(device.address);
    pollable.push(device);
  }

  return { devices: pollable, skipped };
}
