/**
 * Database Error Handler
 *
 * Two layers handle entity store failures:
 *
 * 1. **Retry layer (DynamoDBClientWrapper)**: retries transient errors
 *    (throttling, timeouts, network resets) with exponential backoff.
 * 2. **Reporting layer (this module)**: logs the failure with its context and
 *    rethrows it as a `DatabaseError` (STORAGE_ERROR) so the HTTP boundary can
 *    map it. Store failures are reported, never recovered locally.
 *
 * ```typescript
 * const form = await withDatabaseErrorHandling(
 *   () => dynamoClient.getItem(TABLES.forms, { formId }),
 *   { operationName: 'getForm', formId }
 * );
 * ```
 */

import { getLogger } from '../monitoring/logger';
import { DatabaseError, FeedbackError } from '../errors/types';
import { isRetryableError } from './dynamodb';

const logger = getLogger();

export interface DatabaseOperationOptions {
  operationName: string;
  formId?: string;
}

/**
 * Run a database operation, translating failures into `DatabaseError`.
 * Errors that already belong to the taxonomy pass through unchanged.
 */
export async function withDatabaseErrorHandling<T>(
  operation: () => Promise<T>,
  options: DatabaseOperationOptions
): Promise<T> {
  const { operationName, formId } = options;

  try {
    return await operation();
  } catch (error) {
    if (error instanceof FeedbackError) {
      throw error;
    }

    const errorMessage = error instanceof Error ? error.message : String(error);
    const errorName = error instanceof Error ? error.name : 'UnknownError';
    const isTransient = error instanceof Error && isRetryableError(error);

    logger.error(`Database operation failed: ${operationName}`, {
      ...(formId ? { formId } : {}),
      operation: operationName,
      error: errorMessage,
      errorName,
      isTransient,
    });

    throw new DatabaseError(`Database operation failed: ${operationName}`, {
      operation: operationName,
      errorName,
      isTransient,
      ...(formId ? { formId } : {}),
    });
  }
}
