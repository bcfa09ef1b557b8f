/**
 * Configuration manager for the reachability monitor
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  MonitorConfig,
  InventoryConfig,
  NotifierConfig
} from '../types';
import { Logger } from '../utils/logger';
import { ConfigurationError } from '../error-handling';

export interface ConfigValidationError {
  field: string;
  message: string;
  value?: unknown;
}

type Environment = Record<string, string | undefined>;

type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(config: RawObject, key: string): RawObject {
  const value = config[key];
  return isObject(value) ? value : {};
}

export class ConfigManager {
  private logger: Logger;
  private configPath: string;
  private env: Environment;

  constructor(configPath?: string, env: Environment = process.env) {
    this.logger = new Logger('ConfigManager');
    this.env = env;
    this.configPath = configPath || env.CONFIG_PATH || path.join('data', 'config.json');
  }

  async loadConfig(): Promise<MonitorConfig> {
    this.logger.info(`Loading configuration from ${this.configPath}...`);

    let parsedConfig: unknown;
    try {
      if (!(await this.fileExists(this.configPath))) {
        this.logger.info('Config file not found, creating default configuration');
        await this.writeConfigFile(this.getDefaultConfig());
      }

      const configData = await fs.readFile(this.configPath, 'utf-8');
      parsedConfig = JSON.parse(configData);
    } catch (error) {
      this.logger.error('Failed to load configuration:', error);
      throw new ConfigurationError(`Configuration loading failed: ${error instanceof Error ? error.message : String(error)}`);
    }

    const withOverrides = this.applyEnvironmentOverrides(parsedConfig);
    const validatedConfig = this.validateConfig(withOverrides);
    this.logger.info('Configuration loaded and validated successfully');

    return validatedConfig;
  }

  /**
   * Overlay environment variables on top of a parsed config file
   */
  applyEnvironmentOverrides(config: unknown): unknown {
    if (!isObject(config)) {
      return config;
    }

    const env = this.env;
    const polling = { ...section(config, 'polling') };
    const storage = { ...section(config, 'storage') };
    const tracking = { ...section(config, 'tracking') };
    const alerts = { ...section(config, 'alerts') };
    const inventory = { ...section(config, 'inventory') };
    const notifier = { ...section(config, 'notifier') };
    const api = { ...section(config, 'api') };

    const setNumber = (target: RawObject, key: string, variable: string, scale = 1): void => {
      const raw = env[variable];
      if (raw !== undefined && raw.trim() !== '') {
        target[key] = Number(raw) * scale;
      }
    };
    const setBoolean = (target: RawObject, key: string, variable: string): void => {
      const raw = env[variable];
      if (raw !== undefined && raw.trim() !== '') {
        target[key] = raw.trim().toLowerCase() === 'true';
      }
    };
    const setString = (target: RawObject, key: string, variable: string): void => {
      const raw = env[variable];
      if (raw !== undefined && raw.trim() !== '') {
        target[key] = raw.trim();
      }
    };

    setNumber(polling, 'interval_seconds', 'PING_INTERVAL');
    // PING_TIMEOUT is given in seconds
    setNumber(polling, 'probe_timeout_ms', 'PING_TIMEOUT', 1000);
    setNumber(polling, 'max_concurrency', 'MAX_PING_WORKERS');
    setString(storage, 'output_dir', 'CSV_OUTPUT_DIR');
    setNumber(storage, 'retention_days', 'RETENTION_DAYS');
    setBoolean(tracking, 'enabled', 'ENABLE_TIMEOUT_TRACKING');
    setBoolean(alerts, 'enabled', 'ENABLE_ALERTS');
    setNumber(alerts, 'threshold', 'TIMEOUT_CRITICAL_THRESHOLD');
    setNumber(alerts, 'cooldown_minutes', 'ALERT_COOLDOWN_MINUTES');
    setString(inventory, 'url', 'INVENTORY_URL');
    setString(inventory, 'file', 'INVENTORY_FILE');
    setString(notifier, 'url', 'NOTIFIER_URL');
    setString(notifier, 'api_key', 'NOTIFIER_API_KEY');
    setString(notifier, 'sender_key', 'NOTIFIER_SENDER_KEY');
    setNumber(api, 'port', 'PORT');

    if (env.INVENTORY_URL && !env.INVENTORY_FILE) {
      inventory.source = 'http';
    } else if (env.INVENTORY_FILE && !env.INVENTORY_URL) {
      inventory.source = 'file';
    }

    const recipients = env.NOTIFIER_RECIPIENTS;
    if (recipients !== undefined && recipients.trim() !== '') {
      notifier.recipients = recipients.split(',').map(r => r.trim()).filter(r => r !== '');
    }

    return { ...config, polling, storage, tracking, alerts, inventory, notifier, api };
  }

  validateConfig(config: unknown): MonitorConfig {
    if (!isObject(config)) {
      throw new ConfigurationError('Configuration must be an object');
    }

    const errors: ConfigValidationError[] = [];
    const defaults = this.getDefaultConfig();

    const polling = section(config, 'polling');
    const storage = section(config, 'storage');
    const tracking = section(config, 'tracking');
    const alerts = section(config, 'alerts');
    const inventory = section(config, 'inventory');
    const notifier = section(config, 'notifier');
    const api = section(config, 'api');

    const validated: MonitorConfig = {
      polling: {
        interval_seconds: this.numberInRange(errors, 'polling.interval_seconds', polling.interval_seconds, 1, 3600, defaults.polling.interval_seconds),
        probe_timeout_ms: this.numberInRange(errors, 'polling.probe_timeout_ms', polling.probe_timeout_ms, 100, 30000, defaults.polling.probe_timeout_ms),
        max_concurrency: this.integerInRange(errors, 'polling.max_concurrency', polling.max_concurrency, 1, 500, defaults.polling.max_concurrency)
      },
      storage: {
        output_dir: this.nonEmptyString(errors, 'storage.output_dir', storage.output_dir, defaults.storage.output_dir),
        retention_days: this.integerInRange(errors, 'storage.retention_days', storage.retention_days, 1, 365, defaults.storage.retention_days)
      },
      tracking: {
        enabled: this.boolean(errors, 'tracking.enabled', tracking.enabled, defaults.tracking.enabled)
      },
      alerts: {
        enabled: this.boolean(errors, 'alerts.enabled', alerts.enabled, defaults.alerts.enabled),
        threshold: this.integerInRange(errors, 'alerts.threshold', alerts.threshold, 1, 1000, defaults.alerts.threshold),
        cooldown_minutes: this.numberInRange(errors, 'alerts.cooldown_minutes', alerts.cooldown_minutes, 0, 10080, defaults.alerts.cooldown_minutes),
        recovery_notices: this.boolean(errors, 'alerts.recovery_notices', alerts.recovery_notices, defaults.alerts.recovery_notices)
      },
      inventory: this.validateInventory(errors, inventory, defaults.inventory),
      notifier: this.validateNotifier(errors, notifier),
      api: {
        port: this.integerInRange(errors, 'api.port', api.port, 0, 65535, defaults.api.port),
        host: this.nonEmptyString(errors, 'api.host', api.host, defaults.api.host)
      }
    };

    if (errors.length > 0) {
      const errorMessage = errors.map(err => `${err.field}: ${err.message}`).join('; ');
      throw new ConfigurationError(`Configuration validation failed: ${errorMessage}`, { errors });
    }

    return validated;
  }

  getDefaultConfig(): MonitorConfig {
    return {
      polling: {
        interval_seconds: 5,
        probe_timeout_ms: 3000,
        max_concurrency: 20
      },
      storage: {
        output_dir: 'ping_results',
        retention_days: 30
      },
      tracking: {
        enabled: true
      },
      alerts: {
        enabled: true,
        threshold: 5,
        cooldown_minutes: 60,
        recovery_notices: true
      },
      inventory: {
        source: 'file',
        file: path.join('data', 'devices.json'),
        timeout_ms: 10000
      },
      notifier: {
        recipients: []
      },
      api: {
        port: 8080,
        host: '0.0.0.0'
      }
    };
  }

  private validateInventory(errors: ConfigValidationError[], inventory: RawObject, defaults: InventoryConfig): InventoryConfig {
    const source = inventory.source ?? defaults.source;
    if (source !== 'http' && source !== 'file') {
      errors.push({ field: 'inventory.source', message: "source must be 'http' or 'file'", value: source });
    }

    const result: InventoryConfig = {
      source: source === 'http' ? 'http' : 'file',
      timeout_ms: this.numberInRange(errors, 'inventory.timeout_ms', inventory.timeout_ms, 100, 120000, defaults.timeout_ms)
    };

    if (source === 'http') {
      result.url = this.url(errors, 'inventory.url', inventory.url, true);
    } else {
      result.file = this.nonEmptyString(errors, 'inventory.file', inventory.file, defaults.file ?? '');
    }

    return result;
  }

  private validateNotifier(errors: ConfigValidationError[], notifier: RawObject): NotifierConfig {
    const result: NotifierConfig = { recipients: [] };

    const recipients = notifier.recipients ?? [];
    if (!Array.isArray(recipients)) {
      errors.push({ field: 'notifier.recipients', message: 'recipients must be an array of strings', value: recipients });
    } else {
      recipients.forEach((recipient: unknown, index: number) => {
        if (typeof recipient !== 'string' || recipient.trim() === '') {
          errors.push({ field: `notifier.recipients[${index}]`, message: 'recipient must be a non-empty string', value: recipient });
        } else {
          result.recipients.push(recipient.trim());
        }
      });
    }

    const url = this.url(errors, 'notifier.url', notifier.url, false);
    if (url !== undefined) {
      result.url = url;
    }
    for (const key of ['api_key', 'sender_key'] as const) {
      const value = notifier[key];
      if (value === undefined) {
        continue;
      }
      if (typeof value !== 'string') {
        errors.push({ field: `notifier.${key}`, message: `${key} must be a string`, value });
      } else {
        result[key] = value;
      }
    }

    return result;
  }

  private numberInRange(errors: ConfigValidationError[], field: string, value: unknown, min: number, max: number, fallback: number): number {
    if (value === undefined) {
      return fallback;
    }
    if (typeof value !== 'number' || !Number.isFinite(value) || value < min || value > max) {
      errors.push({ field, message: `must be a number between ${min} and ${max}`, value });
      return fallback;
    }
    return value;
  }

  private integerInRange(errors: ConfigValidationError[], field: string, value: unknown, min: number, max: number, fallback: number): number {
    if (value !== undefined && (typeof value !== 'number' || !Number.isInteger(value))) {
      errors.push({ field, message: `must be an integer between ${min} and ${max}`, value });
      return fallback;
    }
    return this.numberInRange(errors, field, value, min, max, fallback);
  }

  private boolean(errors: ConfigValidationError[], field: string, value: unknown, fallback: boolean): boolean {
    if (value === undefined) {
      return fallback;
    }
    if (typeof value !== 'boolean') {
      errors.push({ field, message: 'must be a boolean', value });
      return fallback;
    }
    return value;
  }

  private nonEmptyString(errors: ConfigValidationError[], field: string, value: unknown, fallback: string): string {
    if (value === undefined) {
      return fallback;
    }
    if (typeof value !== 'string' || value.trim() === '') {
      errors.push({ field, message: 'must be a non-empty string', value });
      return fallback;
    }
    return value;
  }

  private url(errors: ConfigValidationError[], field: string, value: unknown, required: boolean): string | undefined {
    if (value === undefined || value === '') {
      if (required) {
        errors.push({ field, message: 'is required', value });
      }
      return undefined;
    }
    if (typeof value !== 'string' || !/^https?:\/\/\S+$/.test(value)) {
      errors.push({ field, message: 'must be an http(s) URL', value });
      return undefined;
    }
    return value;
  }

  private async writeConfigFile(config: MonitorConfig): Promise<void> {
    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, JSON.stringify(config, null, 2), 'utf-8');
  }

  private async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }
}
