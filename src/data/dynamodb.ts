/**
 * DynamoDB Client Wrapper
 *
 * Simplified interface over the DynamoDB API with retry logic, connection
 * pooling, conditional writes and transactions.
 */

import {
  DynamoDBClient,
  PutItemCommand,
  GetItemCommand,
  UpdateItemCommand,
  DeleteItemCommand,
  QueryCommand,
  TransactWriteItemsCommand,
  ConditionalCheckFailedException,
  TransactionCanceledException,
  PutItemCommandInput,
  GetItemCommandInput,
  UpdateItemCommandInput,
  DeleteItemCommandInput,
  QueryCommandInput,
  TransactWriteItem,
  AttributeValue,
} from '@aws-sdk/client-dynamodb';
import { marshall, unmarshall } from '@aws-sdk/util-dynamodb';
import { NodeHttpHandler } from '@smithy/node-http-handler';
import { getLogger } from '../monitoring/logger';
import { getMetricsEmitter } from '../monitoring/metrics';
import { sleep } from '../utils/sleep';

const logger = getLogger();

/**
 * DynamoDB allows at most 100 actions in one TransactWriteItems call.
 */
export const MAX_TRANSACTION_ITEMS = 100;

export type DynamoItem = Record<string, unknown>;

export interface DynamoDBClientConfig {
  region: string;
  tablePrefix?: string;
  endpoint?: string;
  maxConnections?: number;
  requestTimeout?: number;
  connectionTimeout?: number;
}

/**
 * Condition attached to a write.
 */
export interface WriteCondition {
  conditionExpression: string;
  expressionAttributeNames?: Record<string, string>;
  expressionAttributeValues?: DynamoItem;
}

export interface QueryOptions {
  expressionAttributeNames?: Record<string, string>;
  scanIndexForward?: boolean;
}

export type TransactionItem =
  | { type: 'Put'; tableName: string; item: DynamoItem; condition?: WriteCondition }
  | { type: 'Delete'; tableName: string; key: DynamoItem; condition?: WriteCondition }
  | { type: 'ConditionCheck'; tableName: string; key: DynamoItem; condition: WriteCondition };

/**
 * Operations the repositories need from the store.
 */
export interface DynamoTableClient {
  putItem(tableName: string, item: DynamoItem, condition?: WriteCondition): Promise<void>;
  getItem(tableName: string, key: DynamoItem): Promise<DynamoItem | null>;
  /**
   * SET for every non-null value, REMOVE for every null value.
   * Resolves with the item as it is after the update.
   */
  updateItem(
    tableName: string,
    key: DynamoItem,
    updates: DynamoItem,
    condition?: WriteCondition
  ): Promise<DynamoItem>;
  deleteItem(tableName: string, key: DynamoItem, condition?: WriteCondition): Promise<void>;
  query(
    tableName: string,
    keyConditionExpression: string,
    expressionAttributeValues: DynamoItem,
    options?: QueryOptions
  ): Promise<DynamoItem[]>;
  transactWrite(items: TransactionItem[]): Promise<void>;
}

/**
 * A write condition evaluated to false. `failedIndexes` lists the positions
 * of the failing actions; a single-item write reports `[0]`.
 */
export class ConditionalWriteError extends Error {
  public readonly failedIndexes: number[];

  constructor(message: string, failedIndexes: number[] = [0]) {
    super(message);
    this.name = 'ConditionalWriteError';
    this.failedIndexes = failedIndexes;
  }

  failedAt(index: number): boolean {
    return this.failedIndexes.includes(index);
  }
}

const RETRYABLE_ERROR_NAMES = [
  'ThrottlingException',
  'ProvisionedThroughputExceededException',
  'RequestLimitExceeded',
  'ServiceUnavailable',
  'InternalServerError',
  'NetworkingError',
  'TimeoutError',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
];

/**
 * Check if an error is a transient failure worth retrying
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof TransactionCanceledException) {
    const reasons = error.CancellationReasons ?? [];
    return (
      reasons.some((reason) => reason.Code === 'TransactionConflict') &&
      !reasons.some((reason) => reason.Code === 'ConditionalCheckFailed')
    );
  }

  return RETRYABLE_ERROR_NAMES.some(
    (name) =>
      error.name === name ||
      error.message.includes(name) ||
      ('code' in error && error.code === name)
  );
}

function toDynamoItem(item: Record<string, AttributeValue>): DynamoItem {
  return unmarshall(item);
}

export class DynamoDBClientWrapper implements DynamoTableClient {
  private client: DynamoDBClient;
  private tablePrefix: string;
  private maxRetries: number;
  private baseDelay: number;
  private maxDelay: number;

  constructor(config: DynamoDBClientConfig) {
    const {
      region,
      tablePrefix = 'feedback-',
      endpoint,
      maxConnections = 50,
      requestTimeout = 30000,
      connectionTimeout = 5000,
    } = config;

    // Connection pooling is handled by the http(s).Agent maxSockets
    const requestHandler = new NodeHttpHandler({
      requestTimeout,
      connectionTimeout,
      httpAgent: {
        maxSockets: maxConnections,
      },
      httpsAgent: {
        maxSockets: maxConnections,
      },
    });

    this.client = new DynamoDBClient({
      region,
      requestHandler,
      ...(endpoint ? { endpoint } : {}),
    });

    this.tablePrefix = tablePrefix;
    this.maxRetries = 3;
    this.baseDelay = 100;
    this.maxDelay = 10000;

    logger.info('DynamoDB client initialized', {
      region,
      tablePrefix,
      endpoint: endpoint ?? 'default',
      maxConnections,
      requestTimeout,
      connectionTimeout,
    });
  }

  /**
   * Get full table name with prefix
   */
  getTableName(tableName: string): string {
    return `${this.tablePrefix}${tableName}`;
  }

  /**
   * Retry operation with exponential backoff
   *
   * - Attempt 1: 100ms delay
   * - Attempt 2: 200ms delay
   * - Max delay capped at 10 seconds
   */
  private async retryOperation<T>(
    operation: () => Promise<T>,
    operationName: string,
    tableName?: string
  ): Promise<T> {
    let lastError: Error | undefined;
    const startTime = Date.now();

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      try {
        const result = await operation();

        const metricsEmitter = getMetricsEmitter();
        if (metricsEmitter) {
          await metricsEmitter.emitDatabaseLatency(Date.now() - startTime, operationName, tableName);
        }

        if (attempt > 0) {
          logger.info(`${operationName} succeeded after retry`, {
            attempt: attempt + 1,
            totalAttempts: this.maxRetries,
          });
        }

        return result;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        const isLastAttempt = attempt === this.maxRetries - 1;
        const retryable = isRetryableError(lastError);

        if (isLastAttempt || !retryable) {
          // Failed conditions are answers, not faults
          if (!(lastError instanceof ConditionalWriteError)) {
            logger.error(`${operationName} failed`, {
              attempt: attempt + 1,
              maxRetries: this.maxRetries,
              isRetryable: retryable,
              error: lastError.message,
              errorName: lastError.name,
            });
          }
          throw lastError;
        }

        const delay = Math.min(Math.pow(2, attempt) * this.baseDelay, this.maxDelay);

        logger.warn(`${operationName} failed, retrying`, {
          attempt: attempt + 1,
          maxRetries: this.maxRetries,
          delay,
          error: lastError.message,
          errorName: lastError.name,
        });

        await sleep(delay);
      }
    }

    throw lastError || new Error('Max retries exceeded');
  }

  private conditionParams(condition?: WriteCondition): {
    ConditionExpression?: string;
    ExpressionAttributeNames?: Record<string, string>;
    ExpressionAttributeValues?: Record<string, AttributeValue>;
  } {
    if (!condition) {
      return {};
    }

    return {
      ConditionExpression: condition.conditionExpression,
      ...(condition.expressionAttributeNames
        ? { ExpressionAttributeNames: condition.expressionAttributeNames }
        : {}),
      ...(condition.expressionAttributeValues
        ? {
            ExpressionAttributeValues: marshall(condition.expressionAttributeValues, {
              removeUndefinedValues: true,
            }),
          }
        : {}),
    };
  }

  async putItem(tableName: string, item: DynamoItem, condition?: WriteCondition): Promise<void> {
    const fullTableName = this.getTableName(tableName);

    await this.retryOperation(async () => {
      const params: PutItemCommandInput = {
        TableName: fullTableName,
        Item: marshall(item, { removeUndefinedValues: true }),
        ...this.conditionParams(condition),
      };

      try {
        await this.client.send(new PutItemCommand(params));
      } catch (error) {
        if (error instanceof ConditionalCheckFailedException) {
          throw new ConditionalWriteError(`Condition failed for PutItem on ${fullTableName}`);
        }
        throw error;
      }
      logger.debug('Item put successfully', { tableName: fullTableName });
    }, `PutItem to ${fullTableName}`, tableName);
  }

  async getItem(tableName: string, key: DynamoItem): Promise<DynamoItem | null> {
    const fullTableName = this.getTableName(tableName);

    return await this.retryOperation(async () => {
      const params: GetItemCommandInput = {
        TableName: fullTableName,
        Key: marshall(key),
        ConsistentRead: true,
      };

      const result = await this.client.send(new GetItemCommand(params));

      if (!result.Item) {
        return null;
      }

      return toDynamoItem(result.Item);
    }, `GetItem from ${fullTableName}`, tableName);
  }

  async updateItem(
    tableName: string,
    key: DynamoItem,
    updates: DynamoItem,
    condition?: WriteCondition
  ): Promise<DynamoItem> {
    const fullTableName = this.getTableName(tableName);

    return await this.retryOperation(async () => {
      const setExpressions: string[] = [];
      const removeExpressions: string[] = [];
      const expressionAttributeNames: Record<string, string> = {
        ...condition?.expressionAttributeNames,
      };
      const expressionAttributeValues: DynamoItem = {
        ...condition?.expressionAttributeValues,
      };

      Object.entries(updates).forEach(([field, value], index) => {
        const attrName = `#attr${index}`;
        expressionAttributeNames[attrName] = field;

        if (value === null) {
          removeExpressions.push(attrName);
          return;
        }

        const attrValue = `:val${index}`;
        setExpressions.push(`${attrName} = ${attrValue}`);
        expressionAttributeValues[attrValue] = value;
      });

      const clauses: string[] = [];
      if (setExpressions.length > 0) {
        clauses.push(`SET ${setExpressions.join(', ')}`);
      }
      if (removeExpressions.length > 0) {
        clauses.push(`REMOVE ${removeExpressions.join(', ')}`);
      }

      const params: UpdateItemCommandInput = {
        TableName: fullTableName,
        Key: marshall(key),
        UpdateExpression: clauses.join(' '),
        ExpressionAttributeNames: expressionAttributeNames,
        ReturnValues: 'ALL_NEW',
        ...(condition ? { ConditionExpression: condition.conditionExpression } : {}),
        ...(Object.keys(expressionAttributeValues).length > 0
          ? {
              ExpressionAttributeValues: marshall(expressionAttributeValues, {
                removeUndefinedValues: true,
              }),
            }
          : {}),
      };

      try {
        const result = await this.client.send(new UpdateItemCommand(params));
        logger.debug('Item updated successfully', { tableName: fullTableName });
        return toDynamoItem(result.Attributes ?? {});
      } catch (error) {
        if (error instanceof ConditionalCheckFailedException) {
          throw new ConditionalWriteError(`Condition failed for UpdateItem on ${fullTableName}`);
        }
        throw error;
      }
    }, `UpdateItem in ${fullTableName}`, tableName);
  }

  async deleteItem(tableName: string, key: DynamoItem, condition?: WriteCondition): Promise<void> {
    const fullTableName = this.getTableName(tableName);

    await this.retryOperation(async () => {
      const params: DeleteItemCommandInput = {
        TableName: fullTableName,
        Key: marshall(key),
        ...this.conditionParams(condition),
      };

      try {
        await this.client.send(new DeleteItemCommand(params));
      } catch (error) {
        if (error instanceof ConditionalCheckFailedException) {
          throw new ConditionalWriteError(`Condition failed for DeleteItem on ${fullTableName}`);
        }
        throw error;
      }
      logger.debug('Item deleted successfully', { tableName: fullTableName });
    }, `DeleteItem from ${fullTableName}`, tableName);
  }

  /**
   * Query every page of a partition.
   */
  async query(
    tableName: string,
    keyConditionExpression: string,
    expressionAttributeValues: DynamoItem,
    options: QueryOptions = {}
  ): Promise<DynamoItem[]> {
    const fullTableName = this.getTableName(tableName);

    return await this.retryOperation(async () => {
      const items: DynamoItem[] = [];
      let exclusiveStartKey: Record<string, AttributeValue> | undefined;

      do {
        const params: QueryCommandInput = {
          TableName: fullTableName,
          KeyConditionExpression: keyConditionExpression,
          ExpressionAttributeValues: marshall(expressionAttributeValues, {
            removeUndefinedValues: true,
          }),
          ConsistentRead: true,
          ScanIndexForward: options.scanIndexForward ?? true,
          ...(options.expressionAttributeNames
            ? { ExpressionAttributeNames: options.expressionAttributeNames }
            : {}),
          ...(exclusiveStartKey ? { ExclusiveStartKey: exclusiveStartKey } : {}),
        };

        const result = await this.client.send(new QueryCommand(params));

        for (const item of result.Items ?? []) {
          items.push(toDynamoItem(item));
        }

        exclusiveStartKey = result.LastEvaluatedKey;
      } while (exclusiveStartKey);

      return items;
    }, `Query ${fullTableName}`, tableName);
  }

  /**
   * Apply up to 100 writes atomically.
   */
  async transactWrite(items: TransactionItem[]): Promise<void> {
    if (items.length === 0) {
      return;
    }

    if (items.length > MAX_TRANSACTION_ITEMS) {
      throw new Error(
        `A transaction accepts at most ${MAX_TRANSACTION_ITEMS} items, got ${items.length}`
      );
    }

    const transactItems: TransactWriteItem[] = items.map((item) => this.toTransactWriteItem(item));

    await this.retryOperation(async () => {
      try {
        await this.client.send(new TransactWriteItemsCommand({ TransactItems: transactItems }));
      } catch (error) {
        if (error instanceof TransactionCanceledException) {
          const failedIndexes = (error.CancellationReasons ?? [])
            .map((reason, index) => (reason.Code === 'ConditionalCheckFailed' ? index : -1))
            .filter((index) => index >= 0);

          if (failedIndexes.length > 0) {
            throw new ConditionalWriteError('Transaction condition failed', failedIndexes);
          }
        }
        throw error;
      }
      logger.debug('Transaction committed', { itemCount: items.length });
    }, 'TransactWriteItems');
  }

  private toTransactWriteItem(item: TransactionItem): TransactWriteItem {
    const TableName = this.getTableName(item.tableName);

    switch (item.type) {
      case 'Put':
        return {
          Put: {
            TableName,
            Item: marshall(item.item, { removeUndefinedValues: true }),
            ...this.conditionParams(item.condition),
          },
        };
      case 'Delete':
        return {
          Delete: {
            TableName,
            Key: marshall(item.key),
            ...this.conditionParams(item.condition),
          },
        };
      case 'ConditionCheck':
        return {
          ConditionCheck: {
            TableName,
            Key: marshall(item.key),
            ConditionExpression: item.condition.conditionExpression,
            ...(item.condition.expressionAttributeNames
              ? { ExpressionAttributeNames: item.condition.expressionAttributeNames }
              : {}),
            ...(item.condition.expressionAttributeValues
              ? {
                  ExpressionAttributeValues: marshall(item.condition.expressionAttributeValues, {
                    removeUndefinedValues: true,
                  }),
                }
              : {}),
          },
        };
    }
  }

  destroy(): void {
    this.client.destroy();
    logger.info('DynamoDB client destroyed');
  }
}

let clientInstance: DynamoDBClientWrapper | null = null;

/**
 * Get singleton DynamoDB client instance, configured from the environment
 * when not initialized explicitly.
 */
export function getDynamoDBClient(): DynamoDBClientWrapper {
  if (!clientInstance) {
    const endpoint = process.env.DYNAMODB_ENDPOINT;
    clientInstance = new DynamoDBClientWrapper({
      region: process.env.AWS_REGION || 'us-east-1',
      tablePrefix: process.env.DYNAMODB_TABLE_PREFIX || 'feedback-',
      ...(endpoint ? { endpoint } : {}),
      maxConnections: parseInt(process.env.DYNAMODB_MAX_CONNECTIONS || '50', 10),
      requestTimeout: parseInt(process.env.DYNAMODB_REQUEST_TIMEOUT || '30000', 10),
      connectionTimeout: parseInt(process.env.DYNAMODB_CONNECTION_TIMEOUT || '5000', 10),
    });
  }
  return clientInstance;
}

/**
 * Initialize DynamoDB client with explicit configuration
 */
export function initializeDynamoDBClient(config: DynamoDBClientConfig): DynamoDBClientWrapper {
  if (clientInstance) {
    clientInstance.destroy();
  }
  clientInstance = new DynamoDBClientWrapper(config);
  return clientInstance;
}
