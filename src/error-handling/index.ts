/**
 * Error handling module exports
 */

export * from './error-types';
export { ErrorHandler, ErrorHandlerOptions } from './error-handler';
