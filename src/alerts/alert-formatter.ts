/**
 * Plain-text message bodies for timeout alerts and recovery notices
 */

import { TimeoutRecord } from '../types';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local wall-clock time, e.g. `2024-03-01 10:05:00`
 */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

function orUnknown(value: string): string {
  return value === '' ? 'unknown' : value;
}

export function formatTimeoutAlert(record: TimeoutRecord, sentAt: Date): string {
  return [
    'DEVICE TIMEOUT ALERT',
    '',
    `Device ${record.hostname} (${record.address}) is not responding.`,
    '',
    'Device:',
    `- Address: ${record.address}`,
    `- Hostname: ${orUnknown(record.hostname)}`,
    `- Device ID: ${orUnknown(record.device_id)}`,
    `- Brand: ${orUnknown(record.brand)}`,
    `- Condition: ${record.condition}`,
    '',
    'Timeouts:',
    `- Consecutive timeouts: ${record.consecutive_timeouts}`,
    `- First timeout: ${formatTimestamp(record.first_timeout)}`,
    `- Last check: ${formatTimestamp(record.last_timeout)}`,
    '',
    'Check power and network connectivity of the device.',
    '',
    `Sent at ${formatTimestamp(sentAt)}`
  ].join('\n');
}

export function formatRecoveryNotice(record: TimeoutRecord, sentAt: Date): string {
  return [
    'DEVICE RECOVERED',
    '',
    `Device ${record.hostname} (${record.address}) is reachable again after ${record.consecutive_timeouts} consecutive timeouts.`,
    `- Device ID: ${orUnknown(record.device_id)}`,
    `- Down since: ${formatTimestamp(record.first_timeout)}`,
    '',
    `Sent at ${formatTimestamp(sentAt)}`
  ].join('\n');
}
