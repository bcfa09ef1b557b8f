/**
 * Error handler for the polling engine
 * Records categorized failures, tracks component health and reports system health
 */

import { EventEmitter } from 'events';
import { Logger } from '../types';
import { Logger as ConsoleLogger } from '../utils/logger';
import {
  MonitorErrorRecord,
  ErrorCategory,
  ErrorSeverity,
  SystemHealth,
  ComponentHealth,
  MonitorError,
  ErrorDetails,
  errorMessage
} from './error-types';

export interface ErrorHandlerOptions {
  logger?: Logger;
  healthCheckIntervalMs?: number;
  maxErrorAgeMs?: number;
}

export class ErrorHandler extends EventEmitter {
  private logger: Logger;
  private errors: Map<string, MonitorErrorRecord> = new Map();
  private componentHealth: Map<string, ComponentHealth> = new Map();
  private healthCheckInterval: NodeJS.Timeout | null = null;
  private healthCheckIntervalMs: number;
  private maxErrorAgeMs: number;

  constructor(options: ErrorHandlerOptions = {}) {
    super();
    this.logger = options.logger ?? new ConsoleLogger('ErrorHandler');
    this.healthCheckIntervalMs = options.healthCheckIntervalMs ?? 60000;
    this.maxErrorAgeMs = options.maxErrorAgeMs ?? 24 * 60 * 60 * 1000;
  }

  /**
   * Record an error, log it and update component health
   */
  handleError(error: unknown, context: { component?: string; target?: string; details?: ErrorDetails } = {}): MonitorErrorRecord {
    const classified = error instanceof MonitorError ? error : undefined;
    const component = classified?.component ?? context.component ?? 'unknown';
    const target = classified?.target ?? context.target;
    const details = classified?.details ?? context.details;
    const record: MonitorErrorRecord = {
      id: `${component}-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`,
      timestamp: new Date(),
      category: classified?.category ?? ErrorCategory.INTERNAL,
      severity: classified?.severity ?? ErrorSeverity.HIGH,
      component,
      message: errorMessage(error),
      resolved: false,
      ...(target !== undefined && { target }),
      ...(details !== undefined && { details })
    };

    this.errors.set(record.id, record);
    this.logError(record);
    this.updateComponentHealth(record);
    this.emit('monitorError', record);

    const systemHealth = this.getSystemHealth();
    if (systemHealth.overall_status === 'critical') {
      this.emit('criticalError', systemHealth);
    }

    return record;
  }

  /**
   * Inventory could not be fetched; the current cycle is aborted
   */
  handleInventoryFailure(error: unknown, cycleNumber: number): MonitorErrorRecord {
    return this.handleError(new MonitorError(
      `Device inventory fetch failed: ${errorMessage(error)}`,
      ErrorCategory.INVENTORY,
      ErrorSeverity.MEDIUM,
      'Inventory',
      undefined,
      { cycleNumber }
    ));
  }

  /**
   * A sink could not persist a cycle's data
   */
  handlePersistenceFailure(component: string, error: unknown, target?: string): MonitorErrorRecord {
    return this.handleError(new MonitorError(
      `Persistence failed in '${component}': ${errorMessage(error)}`,
      ErrorCategory.PERSISTENCE,
      ErrorSeverity.HIGH,
      component,
      target
    ));
  }

  /**
   * The notifier could not deliver a message
   */
  handleNotifierFailure(target: string, kind: string, error?: unknown): MonitorErrorRecord {
    const reason = error === undefined ? 'delivery rejected' : errorMessage(error);
    return this.handleError(new MonitorError(
      `Notification '${kind}' for '${target}' failed: ${reason}`,
      ErrorCategory.NOTIFIER,
      ErrorSeverity.LOW,
      'Notifier',
      target,
      { kind }
    ));
  }

  /**
   * Mark a component as healthy again and resolve its open errors
   */
  markComponentHealthy(component: string): void {
    const health = this.componentHealth.get(component);
    if (health) {
      const wasUnhealthy = health.status !== 'healthy';
      health.consecutive_failures = 0;
      health.last_success = new Date();
      health.status = 'healthy';
      if (wasUnhealthy) {
        this.logger.info(`Component ${component} recovered`);
      }
    }

    for (const error of this.errors.values()) {
      if (error.component === component && !error.resolved) {
        error.resolved = true;
        this.emit('errorResolved', error);
      }
    }
  }

  /**
   * Get current system health status
   */
  getSystemHealth(): SystemHealth {
    const activeErrors = Array.from(this.errors.values()).filter(error => !error.resolved);
    const componentHealthArray = Array.from(this.componentHealth.values()).map(health => ({ ...health }));

    let overallStatus: SystemHealth['overall_status'] = 'healthy';

    const criticalErrors = activeErrors.filter(e => e.severity === ErrorSeverity.CRITICAL);
    const failedComponents = componentHealthArray.filter(c => c.status === 'failed');

    if (criticalErrors.length > 0 || (componentHealthArray.length > 0 && failedComponents.length > componentHealthArray.length * 0.5)) {
      overallStatus = 'critical';
    } else if (activeErrors.length > 0) {
      overallStatus = 'degraded';
    }

    return {
      overall_status: overallStatus,
      component_health: componentHealthArray,
      active_errors: activeErrors
    };
  }

  /**
   * Get error statistics
   */
  getErrorStatistics(): {
    total_errors: number;
    active_errors: number;
    resolved_errors: number;
    errors_by_category: Record<ErrorCategory, number>;
    errors_by_severity: Record<ErrorSeverity, number>;
  } {
    const allErrors = Array.from(this.errors.values());

    const errorsByCategory: Record<ErrorCategory, number> = {
      [ErrorCategory.PROBE]: 0,
      [ErrorCategory.INVENTORY]: 0,
      [ErrorCategory.PERSISTENCE]: 0,
      [ErrorCategory.NOTIFIER]: 0,
      [ErrorCategory.CONFIGURATION]: 0,
      [ErrorCategory.INTERNAL]: 0
    };
    const errorsBySeverity: Record<ErrorSeverity, number> = {
      [ErrorSeverity.LOW]: 0,
      [ErrorSeverity.MEDIUM]: 0,
      [ErrorSeverity.HIGH]: 0,
      [ErrorSeverity.CRITICAL]: 0
    };

    for (const error of allErrors) {
      errorsByCategory[error.category]++;
      errorsBySeverity[error.severity]++;
    }

    return {
      total_errors: allErrors.length,
      active_errors: allErrors.filter(e => !e.resolved).length,
      resolved_errors: allErrors.filter(e => e.resolved).length,
      errors_by_category: errorsByCategory,
      errors_by_severity: errorsBySeverity
    };
  }

  /**
   * Drop errors older than `maxAge`, resolved or not. A component left without
   * open errors is healthy again.
   */
  clearOldErrors(maxAge: number = this.maxErrorAgeMs): number {
    const cutoffTime = Date.now() - maxAge;
    let clearedCount = 0;

    for (const [id, error] of this.errors) {
      if (error.timestamp.getTime() < cutoffTime) {
        this.errors.delete(id);
        clearedCount++;
      }
    }

    if (clearedCount === 0) {
      return 0;
    }

    const stillFailing = new Set<string>();
    for (const error of this.errors.values()) {
      if (!error.resolved) {
        stillFailing.add(error.component);
      }
    }
    for (const health of this.componentHealth.values()) {
      if (!stillFailing.has(health.component) && health.consecutive_failures > 0) {
        health.consecutive_failures = 0;
        health.status = 'healthy';
      }
    }

    this.logger.info(`Cleared ${clearedCount} old errors`);
    return clearedCount;
  }

  /**
   * Start periodic health checks
   */
  start(): void {
    if (this.healthCheckInterval) {
      return;
    }
    this.healthCheckInterval = setInterval(() => {
      this.performHealthCheck();
    }, this.healthCheckIntervalMs);
    this.healthCheckInterval.unref();
  }

  /**
   * Stop periodic health checks
   */
  stop(): void {
    if (this.healthCheckInterval) {
      clearInterval(this.healthCheckInterval);
      this.healthCheckInterval = null;
    }
  }

  private performHealthCheck(): void {
    const systemHealth = this.getSystemHealth();
    this.emit('healthCheck', systemHealth);
    this.clearOldErrors();

    this.logger.debug(`Health check completed. Status: ${systemHealth.overall_status}, Active errors: ${systemHealth.active_errors.length}`);
  }

  /**
   * Log error with appropriate level
   */
  private logError(error: MonitorErrorRecord): void {
    const logMessage = `[${error.category}] ${error.component}: ${error.message}`;
    const details = error.details ?? '';

    switch (error.severity) {
      case ErrorSeverity.CRITICAL:
        this.logger.error(`CRITICAL ERROR - ${logMessage}`, details);
        break;
      case ErrorSeverity.HIGH:
        this.logger.error(`HIGH SEVERITY - ${logMessage}`, details);
        break;
      case ErrorSeverity.MEDIUM:
        this.logger.warn(`MEDIUM SEVERITY - ${logMessage}`, details);
        break;
      case ErrorSeverity.LOW:
        this.logger.info(`LOW SEVERITY - ${logMessage}`, details);
        break;
    }
  }

  /**
   * Update component health based on error
   */
  private updateComponentHealth(error: MonitorErrorRecord): void {
    const component = error.component;
    const health: ComponentHealth = this.componentHealth.get(component) ?? {
      component,
      status: 'healthy',
      last_success: new Date(0),
      consecutive_failures: 0
    };

    health.consecutive_failures++;

    if (error.severity === ErrorSeverity.CRITICAL || health.consecutive_failures > 5) {
      health.status = 'failed';
    } else if (error.severity === ErrorSeverity.HIGH || health.consecutive_failures > 2) {
      health.status = 'degraded';
    }

    this.componentHealth.set(component, health);
  }
}
