/**
 * Form Repository
 *
 * Persists feedback forms to the forms table and owns the cascade that
 * removes a form together with its responses and analysis.
 */

import {
  ConditionalWriteError,
  DynamoItem,
  DynamoTableClient,
  MAX_TRANSACTION_ITEMS,
  TransactionItem,
  getDynamoDBClient,
} from './dynamodb';
import { Clock, CreateFormInput, FormRecord, TABLES, UpdateFormInput, systemClock } from './types';
import { toFormRecord } from './mappers';
import { withDatabaseErrorHandling } from './error-handler';
import { getLogger } from '../monitoring/logger';
import { generateId } from '../utils/uuid';

const logger = getLogger();

const FORM_EXISTS = { conditionExpression: 'attribute_exists(formId)' };
const FORM_ABSENT = { conditionExpression: 'attribute_not_exists(formId)' };

export class FormRepository {
  private tableName = TABLES.forms;

  constructor(
    private readonly dynamoClient: DynamoTableClient = getDynamoDBClient(),
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Insert a new form. The id is generated here and never overwrites an
   * existing item.
   */
  async createForm(input: CreateFormInput): Promise<FormRecord> {
    const now = this.clock().toISOString();
    const form: FormRecord = {
      formId: generateId(),
      eventName: input.eventName,
      ...(input.eventDate !== undefined ? { eventDate: input.eventDate } : {}),
      ...(input.description !== undefined ? { description: input.description } : {}),
      createdAt: now,
      updatedAt: now,
    };

    await withDatabaseErrorHandling(
      () => this.dynamoClient.putItem(this.tableName, { ...form }, FORM_ABSENT),
      { operationName: 'createForm', formId: form.formId }
    );

    logger.info('Form created', { formId: form.formId, event: 'form_created' });
    return form;
  }

  /**
   * Fetch a form. Absence is reported as null, not as an error.
   */
  async getForm(formId: string): Promise<FormRecord | null> {
    return withDatabaseErrorHandling(
      async () => {
        const item = await this.dynamoClient.getItem(this.tableName, { formId });
        return item ? toFormRecord(item) : null;
      },
      { operationName: 'getForm', formId }
    );
  }

  /**
   * Apply a partial update. Only supplied fields are written, `null` removes an
   * optional field, and `updatedAt` is always refreshed.
   *
   * @returns the updated form, or null when the form does not exist
   */
  async updateForm(formId: string, input: UpdateFormInput): Promise<FormRecord | null> {
    const updates: DynamoItem = {};

    if (input.eventName !== undefined) {
      updates.eventName = input.eventName;
    }
    if (input.eventDate !== undefined) {
      updates.eventDate = input.eventDate;
    }
    if (input.description !== undefined) {
      updates.description = input.description;
    }
    updates.updatedAt = this.clock().toISOString();

    return withDatabaseErrorHandling(
      async () => {
        try {
          const item = await this.dynamoClient.updateItem(
            this.tableName,
            { formId },
            updates,
            FORM_EXISTS
          );
          logger.info('Form updated', {
            formId,
            event: 'form_updated',
            fields: Object.keys(updates),
          });
          return toFormRecord(item);
        } catch (error) {
          if (error instanceof ConditionalWriteError) {
            return null;
          }
          throw error;
        }
      },
      { operationName: 'updateForm', formId }
    );
  }

  /**
   * Delete a form together with its analysis and every response.
   *
   * The form row is removed in the last transaction, conditioned on its
   * existence, so a response can never outlive the form it references. When
   * there are more children than one transaction takes, responses go first in
   * earlier batches.
   *
   * @returns false when the form did not exist
   */
  async deleteForm(formId: string): Promise<boolean> {
    return withDatabaseErrorHandling(
      async () => {
        const existing = await this.dynamoClient.getItem(this.tableName, { formId });
        if (!existing) {
          return false;
        }

        const responseDeletes = await this.listResponseDeletes(formId);

        const finalItems: TransactionItem[] = [
          { type: 'Delete', tableName: this.tableName, key: { formId }, condition: FORM_EXISTS },
          { type: 'Delete', tableName: TABLES.analyses, key: { formId } },
        ];
        const finalCapacity = MAX_TRANSACTION_ITEMS - finalItems.length;
        const leadingCount = Math.max(0, responseDeletes.length - finalCapacity);

        for (const batch of chunk(responseDeletes.slice(0, leadingCount), MAX_TRANSACTION_ITEMS)) {
          await this.dynamoClient.transactWrite(batch);
        }

        try {
          await this.dynamoClient.transactWrite([
            ...finalItems,
            ...responseDeletes.slice(leadingCount),
          ]);
        } catch (error) {
          if (error instanceof ConditionalWriteError && error.failedAt(0)) {
            logger.warn('Form disappeared during cascade delete', { formId });
            return false;
          }
          throw error;
        }

        // Responses committed between the listing and the final transaction
        const stragglers = await this.listResponseDeletes(formId);
        for (const batch of chunk(stragglers, MAX_TRANSACTION_ITEMS)) {
          await this.dynamoClient.transactWrite(batch);
        }

        logger.info('Form deleted', {
          formId,
          event: 'form_deleted',
          responsesDeleted: responseDeletes.length + stragglers.length,
        });
        return true;
      },
      { operationName: 'deleteForm', formId }
    );
  }

  private async listResponseDeletes(formId: string): Promise<TransactionItem[]> {
    const items = await this.dynamoClient.query(
      TABLES.responses,
      'formId = :formId',
      { ':formId': formId }
    );

    return items.map((item): TransactionItem => ({
      type: 'Delete',
      tableName: TABLES.responses,
      key: { formId, submissionKey: item.submissionKey },
    }));
  }
}

function chunk<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}
