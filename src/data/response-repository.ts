/**
 * Response Repository
 *
 * Handles persistence of attendee responses to the responses table.
 *
 * Items are keyed by formId with a `submissionKey` sort key of
 * `<submittedAt>#<responseId>`, so a partition query returns responses in
 * submission order, oldest first.
 */

import { DynamoTableClient, ConditionalWriteError, getDynamoDBClient } from './dynamodb';
import { Clock, CreateResponseInput, ResponseRecord, TABLES, systemClock } from './types';
import { submissionKey, toResponseRecord } from './mappers';
import { withDatabaseErrorHandling } from './error-handler';
import { getLogger } from '../monitoring/logger';
import { generateId } from '../utils/uuid';

const logger = getLogger();

export class ResponseRepository {
  private tableName = TABLES.responses;

  constructor(
    private readonly dynamoClient: DynamoTableClient = getDynamoDBClient(),
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Save a response for a form.
   *
   * The put runs in one transaction with a check that the form exists, so a
   * response is never stored against a deleted form.
   *
   * @returns the stored response, or null when the form does not exist
   */
  async createResponse(
    formId: string,
    input: CreateResponseInput
  ): Promise<ResponseRecord | null> {
    const response: ResponseRecord = {
      responseId: generateId(),
      formId,
      ...(input.attendeeName !== undefined ? { attendeeName: input.attendeeName } : {}),
      rating: input.rating,
      ...(input.comment !== undefined ? { comment: input.comment } : {}),
      submittedAt: this.clock().toISOString(),
    };

    return withDatabaseErrorHandling(
      async () => {
        try {
          await this.dynamoClient.transactWrite([
            {
              type: 'ConditionCheck',
              tableName: TABLES.forms,
              key: { formId },
              condition: { conditionExpression: 'attribute_exists(formId)' },
            },
            {
              type: 'Put',
              tableName: this.tableName,
              item: {
                ...response,
                submissionKey: submissionKey(response.submittedAt, response.responseId),
              },
            },
          ]);
        } catch (error) {
          if (error instanceof ConditionalWriteError && error.failedAt(0)) {
            return null;
          }
          throw error;
        }

        logger.info('Response saved', {
          formId,
          event: 'response_saved',
          responseId: response.responseId,
          rating: response.rating,
        });
        return response;
      },
      { operationName: 'createResponse', formId }
    );
  }

  /**
   * Get every response for a form, oldest first.
   */
  async listResponses(formId: string): Promise<ResponseRecord[]> {
    return withDatabaseErrorHandling(
      async () => {
        const items = await this.dynamoClient.query(
          this.tableName,
          'formId = :formId',
          { ':formId': formId },
          { scanIndexForward: true }
        );

        logger.debug('Responses retrieved', { formId, count: items.length });
        return items.map(toResponseRecord);
      },
      { operationName: 'listResponses', formId }
    );
  }
}
