/**
 * Timeout tracking interfaces
 */

import { DeviceCondition } from './devices';

export interface TimeoutRecord {
  address: string;
  hostname: string;
  device_id: string;
  brand: string;
  os: string;
  condition: DeviceCondition;
  consecutive_timeouts: number;
  first_timeout: Date;
  last_timeout: Date;
  last_updated: Date;
}

export interface AlertState {
  address: string;
  last_alert_sent_at: Date | null;
  alert_count: number;
}

export interface TimeoutSummary {
  total_timeout_devices: number;
  max_consecutive_timeouts: number;
  average_consecutive_timeouts: number;
  devices_with_high_timeouts: number;
  critical_devices: number;
}

export interface TimeoutReport {
  summary: TimeoutSummary;
  critical_devices: TimeoutRecord[];
  all_timeout_devices: TimeoutRecord[];
  report_generated: Date;
}

export interface TrackingOutcome {
  failing: number;
  recoveries: number;
  pruned: number;
  alerts_sent: number;
  alerts_failed: number;
  persist_error: string | null;
}

/**
 * Failing-device count recorded after one cycle
 */
export interface TimeoutSnapshot {
  timestamp: Date;
  total_timeout_devices: number;
}

export interface TimeoutAnalyticsSummary {
  total_records: number;
  time_range_hours: number;
  avg_timeout_devices: number;
  peak_timeout_devices: number;
  first_record: Date | null;
  last_record: Date | null;
}
