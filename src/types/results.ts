/**
 * Result interfaces for probe and cycle operations
 */

export type ProbeFailureReason = 'timeout' | 'unreachable' | 'invalid address' | 'internal error';

export type ProbeOutcome =
  | { success: true; latency_ms: number }
  | { success: false; reason: ProbeFailureReason };

/**
 * A probe must settle promptly once `signal` aborts; the dispatcher aborts it at the deadline.
 */
export type ProbeFunction = (address: string, timeoutMs: number, signal?: AbortSignal) => Promise<ProbeOutcome>;

export interface ProbeResult {
  timestamp: Date;
  device_id: string;
  address: string;
  hostname: string;
  success: boolean;
  latency_ms: number | null;
  error_message: string | null;
}

export interface CycleStatistics {
  total: number;
  successful: number;
  failed: number;
  success_rate: number;
  average_latency_ms: number | null;
  min_latency_ms: number | null;
  max_latency_ms: number | null;
}

export interface CycleSummary {
  cycle_number: number;
  started_at: Date;
  finished_at: Date;
  duration_ms: number;
  device_count: number;
  skipped_devices: number;
  statistics: CycleStatistics;
  store_error: string | null;
  tracker_error: string | null;
  alerts_sent: number;
  alerts_failed: number;
  recoveries: number;
}

export interface TimeRange {
  start: Date;
  end: Date;
}

export interface PartitionInfo {
  filename: string;
  date: string;
  size_bytes: number;
  record_count: number;
  last_modified: Date;
}

export interface RebuildReport {
  filename: string;
  kept: number;
  dropped: number;
}

export interface StoreStatistics {
  partition_count: number;
  total_records: number;
  total_size_bytes: number;
  oldest_partition: string | null;
  newest_partition: string | null;
}
