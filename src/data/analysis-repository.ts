/**
 * Analysis Repository
 *
 * Stores the single sentiment analysis a form may have. The analyses table is
 * keyed by formId alone, and inserts are conditioned on the key being free, so
 * the one-analysis-per-form rule holds in the store itself even when two
 * requests race.
 */

import { ConditionalWriteError, DynamoTableClient, getDynamoDBClient } from './dynamodb';
import {
  AnalysisRecord,
  Clock,
  CreateAnalysisInput,
  CreateAnalysisResult,
  TABLES,
  systemClock,
} from './types';
import { toAnalysisRecord } from './mappers';
import { withDatabaseErrorHandling } from './error-handler';
import { getLogger } from '../monitoring/logger';
import { generateId } from '../utils/uuid';

const logger = getLogger();

export class AnalysisRepository {
  private tableName = TABLES.analyses;

  constructor(
    private readonly dynamoClient: DynamoTableClient = getDynamoDBClient(),
    private readonly clock: Clock = systemClock
  ) {}

  async getAnalysis(formId: string): Promise<AnalysisRecord | null> {
    return withDatabaseErrorHandling(
      async () => {
        const item = await this.dynamoClient.getItem(this.tableName, { formId });
        return item ? toAnalysisRecord(item) : null;
      },
      { operationName: 'getAnalysis', formId }
    );
  }

  /**
   * Insert the analysis for a form.
   *
   * Transaction items:
   * 0. the form must exist
   * 1. no analysis may exist for the form yet
   */
  async createAnalysis(
    formId: string,
    input: CreateAnalysisInput
  ): Promise<CreateAnalysisResult> {
    const analysis: AnalysisRecord = {
      analysisId: generateId(),
      formId,
      overallSentiment: input.overallSentiment,
      positiveHighlights: input.positiveHighlights,
      commonComplaints: input.commonComplaints,
      executiveSummary: input.executiveSummary,
      analyzedAt: this.clock().toISOString(),
    };

    return withDatabaseErrorHandling(
      async (): Promise<CreateAnalysisResult> => {
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
              item: { ...analysis },
              condition: { conditionExpression: 'attribute_not_exists(formId)' },
            },
          ]);
        } catch (error) {
          if (error instanceof ConditionalWriteError) {
            if (error.failedAt(0)) {
              return { status: 'form_missing' };
            }
            logger.info('Analysis already stored by another request', {
              formId,
              event: 'analysis_exists',
            });
            return { status: 'exists' };
          }
          throw error;
        }

        logger.info('Analysis saved', {
          formId,
          event: 'analysis_saved',
          analysisId: analysis.analysisId,
          overallSentiment: analysis.overallSentiment,
        });
        return { status: 'created', analysis };
      },
      { operationName: 'createAnalysis', formId }
    );
  }
}
