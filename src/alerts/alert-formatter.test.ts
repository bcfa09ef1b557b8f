/**
 * Tests for alert message formatting
 */

import { formatRecoveryNotice, formatTimeoutAlert, formatTimestamp } from './alert-formatter';
import { TimeoutRecord } from '../types';

describe('alert formatter', () => {
  const record: TimeoutRecord = {
    address: '10.0.0.5',
    hostname: 'gate-cam-05',
    device_id: '42',
    brand: '',
    os: 'linux',
    condition: 'ok',
    consecutive_timeouts: 7,
    first_timeout: new Date(2024, 2, 1, 9, 0, 0),
    last_timeout: new Date(2024, 2, 1, 9, 0, 30),
    last_updated: new Date(2024, 2, 1, 9, 0, 31)
  };

  it('should format local timestamps', () => {
    expect(formatTimestamp(new Date(2024, 2, 1, 9, 5, 7))).toBe('2024-03-01 09:05:07');
  });

  it('should describe the device and its timeout streak', () => {
    const lines = formatTimeoutAlert(record, new Date(2024, 2, 1, 9, 1, 0)).split('\n');

    expect(lines[0]).toBe('DEVICE TIMEOUT ALERT');
    expect(lines).toContain('Device gate-cam-05 (10.0.0.5) is not responding.');
    expect(lines).toContain('- Device ID: 42');
    expect(lines).toContain('- Brand: unknown');
    expect(lines).toContain('- Condition: ok');
    expect(lines).toContain('- Consecutive timeouts: 7');
    expect(lines).toContain('- First timeout: 2024-03-01 09:00:00');
    expect(lines).toContain('- Last check: 2024-03-01 09:00:30');
    expect(lines[lines.length - 1]).toBe('Sent at 2024-03-01 09:01:00');
  });

  it('should describe a recovery', () => {
    const lines = formatRecoveryNotice(record, new Date(2024, 2, 1, 9, 10, 0)).split('\n');

    expect(lines[0]).toBe('DEVICE RECOVERED');
    expect(lines).toContain('Device gate-cam-05 (10.0.0.5) is reachable again after 7 consecutive timeouts.');
    expect(lines).toContain('- Down since: 2024-03-01 09:00:00');
  });
});
