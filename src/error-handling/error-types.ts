/**
 * Error types and classifications for the polling engine
 */

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  PROBE = 'probe',
  INVENTORY = 'inventory',
  PERSISTENCE = 'persistence',
  NOTIFIER = 'notifier',
  CONFIGURATION = 'configuration',
  INTERNAL = 'internal'
}

export type ErrorDetails = Record<string, unknown>;

export interface MonitorErrorRecord {
  id: string;
  timestamp: Date;
  category: ErrorCategory;
  severity: ErrorSeverity;
  component: string;
  target?: string;
  message: string;
  details?: ErrorDetails;
  resolved: boolean;
}

export interface ComponentHealth {
  component: string;
  status: 'healthy' | 'degraded' | 'failed';
  last_success: Date;
  consecutive_failures: number;
}

export interface SystemHealth {
  overall_status: 'healthy' | 'degraded' | 'critical';
  component_health: ComponentHealth[];
  active_errors: MonitorErrorRecord[];
}

/**
 * A classified failure. The error handler turns it into a `MonitorErrorRecord`.
 */
export class MonitorError extends Error {
  constructor(
    message: string,
    public readonly category: ErrorCategory,
    public readonly severity: ErrorSeverity,
    public readonly component: string,
    public readonly target?: string,
    public readonly details?: ErrorDetails
  ) {
    super(message);
    this.name = 'MonitorError';
  }
}

/**
 * Invalid configuration or a broken call contract. Fatal at startup.
 */
export class ConfigurationError extends MonitorError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, ErrorCategory.CONFIGURATION, ErrorSeverity.CRITICAL, 'Configuration', undefined, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * A batch or snapshot could not be written durably
 */
export class PersistenceError extends MonitorError {
  constructor(message: string, component: string, target?: string, details?: ErrorDetails) {
    super(message, ErrorCategory.PERSISTENCE, ErrorSeverity.HIGH, component, target, details);
    this.name = 'PersistenceError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * ENOENT from fs. Checked structurally: errors raised in another realm fail `instanceof Error`.
 */
export function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
