/**
 * Data module exports
 */

export * from './types';
export * from './dynamodb';
export * from './mappers';
export * from './form-repository';
export * from './response-repository';
export * from './analysis-repository';
export * from './error-handler';
