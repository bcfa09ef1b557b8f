/**
 * Main types export file for the reachability monitor
 */

// Device types
export * from './devices';

// Result types
export * from './results';

// Tracking types
export * from './tracking';

// Alert types
export * from './alerts';

// Configuration types
export * from './config';

// API types
export * from './api';

// Common utility types
export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}
