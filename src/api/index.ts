/**
 * API exports
 */

export * from './api-server';
