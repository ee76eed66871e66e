/**
 * Error handling module.
 * Provides error codes, error types, formatting and the HTTP error middleware.
 */

export * from './codes';
export * from './types';
export * from './formatter';
export * from './handler';
