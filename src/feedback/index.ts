/**
 * Feedback module exports
 */

export * from './validation';
export * from './form-service';
export * from './analysis-orchestrator';
