/**
 * Main application class for the reachability monitor
 */

import path from 'path';
import { InventoryConfig, InventorySource, MonitorConfig, Notifier, NotifierConfig, ProbeFunction } from './types';
import { Logger } from './utils/logger';
import { ConfigManager } from './config/config-manager';
import { ResultStore } from './storage/result-store';
import { TimeoutStateFile, TIMEOUT_STATE_FILENAME } from './storage/timeout-state-file';
import { TimeoutAnalyticsStore } from './storage/timeout-analytics';
import { CycleFailedEvent, CycleScheduler, SchedulerStatus, TimeoutTracker } from './monitoring';
import { GatewayNotificationService } from './alerts/gateway-notification-service';
import { FileInventorySource, HttpInventorySource } from './inventory';
import { APIServer } from './api';
import { ConfigurationError, ErrorHandler, SystemHealth } from './error-handling';

const CLEANUP_INTERVAL_MS = 24 * 60 * 60 * 1000;

export interface ReachabilityMonitorAppOptions {
  configPath?: string;
  env?: Record<string, string | undefined>;
  probe?: ProbeFunction;
  inventory?: InventorySource;
  notifier?: Notifier;
}

export interface AppStatus {
  running: boolean;
  initialized: boolean;
  config: MonitorConfig | null;
  scheduler: SchedulerStatus | null;
  api_port: number | null;
  components: {
    store: boolean;
    tracker: boolean;
    notifier: boolean;
    scheduler: boolean;
    apiServer: boolean;
  };
}

export class ReachabilityMonitorApp {
  private logger: Logger;
  private configManager: ConfigManager;
  private errorHandler: ErrorHandler;
  private options: ReachabilityMonitorAppOptions;
  private config: MonitorConfig | null = null;
  private store: ResultStore | null = null;
  private tracker: TimeoutTracker | null = null;
  private analytics: TimeoutAnalyticsStore | null = null;
  private notifier: Notifier | null = null;
  private scheduler: CycleScheduler | null = null;
  private apiServer: APIServer | null = null;
  private isRunning = false;
  private isInitialized = false;
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(options: ReachabilityMonitorAppOptions = {}) {
    this.options = options;
    this.logger = new Logger('ReachabilityMonitorApp');
    this.configManager = new ConfigManager(options.configPath, options.env);
    this.errorHandler = new ErrorHandler();
  }

  /**
   * Initialize all components
   */
  async initialize(): Promise<void> {
    if (this.isInitialized) {
      this.logger.warn('App is already initialized');
      return;
    }

    this.logger.info('Initializing reachability monitor...');

    try {
      const config = await this.configManager.loadConfig();
      this.config = config;
      this.logger.info('Configuration loaded successfully');

      const store = new ResultStore(
        this.logger.child('ResultStore'),
        config.storage.output_dir,
        config.storage.retention_days
      );
      await store.initialize();
      this.store = store;
      this.logger.info(`Result store initialized at ${store.getOutputDir()}`);

      this.notifier = this.options.notifier ?? this.createNotifier(config.notifier);

      if (config.tracking.enabled) {
        const stateFile = new TimeoutStateFile(
          path.join(config.storage.output_dir, TIMEOUT_STATE_FILENAME),
          this.logger.child('TimeoutState')
        );
        const tracker = new TimeoutTracker({
          stateStore: stateFile,
          ...(this.notifier !== null && { notifier: this.notifier }),
          recipients: config.notifier.recipients,
          alertThreshold: config.alerts.threshold,
          alertCooldownMs: config.alerts.cooldown_minutes * 60 * 1000,
          alertingEnabled: config.alerts.enabled,
          recoveryNotices: config.alerts.recovery_notices,
          logger: this.logger.child('TimeoutTracker'),
          errorHandler: this.errorHandler
        });
        await tracker.initialize();
        this.tracker = tracker;
        this.analytics = new TimeoutAnalyticsStore(this.logger.child('TimeoutAnalytics'), config.storage.output_dir);
        this.logger.info('Timeout tracker initialized');
      } else {
        this.logger.info('Timeout tracking is disabled');
      }

      const scheduler = new CycleScheduler({
        inventory: this.options.inventory ?? this.createInventory(config.inventory),
        store,
        ...(this.tracker !== null && { tracker: this.tracker }),
        ...(this.analytics !== null && { analytics: this.analytics }),
        intervalMs: config.polling.interval_seconds * 1000,
        probeTimeoutMs: config.polling.probe_timeout_ms,
        maxConcurrency: config.polling.max_concurrency,
        ...(this.options.probe !== undefined && { probe: this.options.probe }),
        logger: this.logger.child('Scheduler'),
        errorHandler: this.errorHandler
      });
      this.scheduler = scheduler;
      this.logger.info('Cycle scheduler initialized');

      this.apiServer = new APIServer(
        {
          scheduler,
          store,
          tracker: this.tracker,
          analytics: this.analytics,
          errorHandler: this.errorHandler,
          logger: this.logger.child('API')
        },
        {
          port: config.api.port,
          host: config.api.host,
          enableCors: true
        }
      );
      this.logger.info('API server initialized');

      this.setupEventHandlers(scheduler);

      this.isInitialized = true;
      this.logger.info('App initialization completed successfully');
    } catch (error) {
      this.logger.error('Failed to initialize app:', error);
      throw error;
    }
  }

  private setupEventHandlers(scheduler: CycleScheduler): void {
    scheduler.on('cycle:failed', (event: CycleFailedEvent) => {
      this.logger.warn(`Cycle ${event.cycle_number} aborted: ${event.error}`);
    });

    this.errorHandler.on('criticalError', (health: SystemHealth) => {
      this.logger.error(`System health is critical, ${health.active_errors.length} active error(s)`);
    });
  }

  private createNotifier(config: NotifierConfig): Notifier | null {
    if (!config.url || !config.api_key || !config.sender_key) {
      this.logger.info('Notifier gateway not configured, alerts will only be logged');
      return null;
    }
    if (config.recipients.length === 0) {
      this.logger.warn('Notifier gateway configured without recipients');
    }
    return new GatewayNotificationService({
      url: config.url,
      apiKey: config.api_key,
      senderKey: config.sender_key,
      logger: this.logger.child('Notifier')
    });
  }

  private createInventory(config: InventoryConfig): InventorySource {
    if (config.source === 'http') {
      if (!config.url) {
        throw new ConfigurationError('inventory.url is required when inventory.source is http', { field: 'inventory.url' });
      }
      return new HttpInventorySource({
        url: config.url,
        timeoutMs: config.timeout_ms,
        logger: this.logger.child('Inventory')
      });
    }
    if (!config.file) {
      throw new ConfigurationError('inventory.file is required when inventory.source is file', { field: 'inventory.file' });
    }
    return new FileInventorySource(config.file, this.logger.child('Inventory'));
  }

  /**
   * Start the API server, the scheduler and retention cleanup
   */
  async start(): Promise<void> {
    if (!this.isInitialized || !this.scheduler || !this.apiServer) {
      throw new Error('App must be initialized before starting');
    }

    if (this.isRunning) {
      this.logger.warn('App is already running');
      return;
    }

    this.logger.info('Starting reachability monitor...');

    try {
      await this.apiServer.start();
      this.logger.info('API server started');

      this.errorHandler.start();

      this.scheduler.start();
      this.logger.info('Polling started');

      this.startPeriodicCleanup();

      this.isRunning = true;
      this.logger.info('Reachability monitor started successfully');
    } catch (error) {
      this.logger.error('Failed to start app:', error);
      throw error;
    }
  }

  /**
   * Stop polling, wait for the running cycle, then close the API server
   */
  async stop(): Promise<void> {
    if (!this.isRunning) {
      this.logger.warn('App is not running');
      return;
    }

    this.logger.info('Stopping reachability monitor...');

    try {
      if (this.cleanupInterval) {
        clearInterval(this.cleanupInterval);
        this.cleanupInterval = null;
      }

      if (this.scheduler) {
        await this.scheduler.stop();
        this.logger.info('Polling stopped');
      }

      if (this.apiServer) {
        await this.apiServer.stop();
        this.logger.info('API server stopped');
      }

      this.errorHandler.stop();

      this.isRunning = false;
      this.logger.info('Reachability monitor stopped successfully');
    } catch (error) {
      this.logger.error('Failed to stop app gracefully:', error);
      throw error;
    }
  }

  /**
   * Delete result partitions older than the retention window
   */
  async runCleanup(): Promise<string[]> {
    if (!this.store || !this.config) {
      return [];
    }
    try {
      this.logger.info('Running retention cleanup...');
      const deleted = await this.store.cleanup(this.config.storage.retention_days);
      if (this.analytics) {
        deleted.push(...await this.analytics.cleanup(this.config.storage.retention_days));
      }
      this.logger.info(`Retention cleanup completed, ${deleted.length} partition(s) deleted`);
      return deleted;
    } catch (error) {
      this.errorHandler.handlePersistenceFailure('ResultStore', error);
      return [];
    }
  }

  private startPeriodicCleanup(): void {
    const cleanup = (): void => {
      this.runCleanup().catch(error => this.logger.error('Retention cleanup failed:', error));
    };

    this.cleanupInterval = setInterval(cleanup, CLEANUP_INTERVAL_MS);
    this.cleanupInterval.unref();
    cleanup();
  }

  getApiPort(): number | null {
    return this.apiServer?.getPort() ?? null;
  }

  /**
   * Get application status
   */
  getStatus(): AppStatus {
    return {
      running: this.isRunning,
      initialized: this.isInitialized,
      config: this.config,
      scheduler: this.scheduler?.status() ?? null,
      api_port: this.getApiPort(),
      components: {
        store: this.store !== null,
        tracker: this.tracker !== null,
        notifier: this.notifier !== null,
        scheduler: this.scheduler !== null,
        apiServer: this.apiServer !== null
      }
    };
  }
}
