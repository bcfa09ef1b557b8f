/**
 * Configuration interfaces for the reachability monitor
 */

export interface PollingConfig {
  interval_seconds: number;
  probe_timeout_ms: number;
  max_concurrency: number;
}

export interface StorageConfig {
  output_dir: string;
  retention_days: number;
}

export interface TrackingConfig {
  enabled: boolean;
}

export interface AlertConfig {
  enabled: boolean;
  threshold: number;
  cooldown_minutes: number;
  recovery_notices: boolean;
}

export interface InventoryConfig {
  source: 'http' | 'file';
  url?: string;
  file?: string;
  timeout_ms: number;
}

export interface NotifierConfig {
  url?: string;
  api_key?: string;
  sender_key?: string;
  recipients: string[];
}

export interface ApiConfig {
  port: number;
  host: string;
}

export interface MonitorConfig {
  polling: PollingConfig;
  storage: StorageConfig;
  tracking: TrackingConfig;
  alerts: AlertConfig;
  inventory: InventoryConfig;
  notifier: NotifierConfig;
  api: ApiConfig;
}
