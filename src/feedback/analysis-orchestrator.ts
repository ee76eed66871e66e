/**
 * Analysis Orchestrator
 *
 * Computes a form's sentiment analysis at most once and serves the stored
 * copy afterwards. Instances hold no state of their own and are built per
 * request around injected collaborators.
 *
 * The check for an existing analysis and the insert are not atomic. The
 * analyses table rejects a second insert for the same form, and a request
 * that loses that race returns the analysis the winner stored.
 */

import { AnalysisRepository } from '../data/analysis-repository';
import { FormRepository } from '../data/form-repository';
import { ResponseRepository } from '../data/response-repository';
import { AnalysisRecord } from '../data/types';
import {
  AIServiceError,
  AnalysisNotFoundError,
  DatabaseError,
  FormNotFoundError,
  NoResponsesError,
} from '../errors/types';
import { getLogger } from '../monitoring/logger';
import { MetricsEmitter } from '../monitoring/metrics';
import { FeedbackAnalyzer, FeedbackRecord, SentimentResult } from '../nlp/types';

const logger = getLogger();

export interface AnalysisOrchestratorDependencies {
  forms: FormRepository;
  responses: ResponseRepository;
  analyses: AnalysisRepository;
  analyzer: FeedbackAnalyzer;
  metricsEmitter?: MetricsEmitter | null;
}

export class AnalysisOrchestrator {
  private readonly deps: AnalysisOrchestratorDependencies;

  constructor(deps: AnalysisOrchestratorDependencies) {
    this.deps = deps;
  }

  /**
   * Return the form's analysis, computing and storing it on first request.
   *
   * @throws FormNotFoundError when the form does not exist
   * @throws NoResponsesError when the form has no responses
   * @throws AIServiceError when the analyzer fails
   */
  async requestAnalysis(formId: string): Promise<AnalysisRecord> {
    const { forms, responses, analyses, analyzer } = this.deps;

    const form = await forms.getForm(formId);
    if (!form) {
      throw new FormNotFoundError(formId);
    }

    const existing = await analyses.getAnalysis(formId);
    if (existing) {
      logger.info('Returning stored analysis', { formId, event: 'analysis_cache_hit' });
      await this.recordRequest(true);
      return existing;
    }

    const formResponses = await responses.listResponses(formId);
    if (formResponses.length === 0) {
      throw new NoResponsesError(formId);
    }

    const records: FeedbackRecord[] = formResponses.map((response) => ({
      rating: response.rating,
      ...(response.comment !== undefined ? { comment: response.comment } : {}),
    }));

    logger.info('Running analysis', {
      formId,
      event: 'analysis_started',
      responseCount: records.length,
    });

    let sentiment: SentimentResult;
    try {
      sentiment = await analyzer.analyzeFeedback(records);
    } catch (error) {
      throw AIServiceError.fromError(error);
    }
    const outcome = await analyses.createAnalysis(formId, sentiment);

    switch (outcome.status) {
      case 'created':
        await this.recordRequest(false);
        return outcome.analysis;
      case 'form_missing':
        throw new FormNotFoundError(formId);
      case 'exists': {
        const stored = await analyses.getAnalysis(formId);
        if (!stored) {
          throw new DatabaseError('Analysis reported as stored but could not be read', {
            formId,
          });
        }
        await this.recordRequest(true);
        return stored;
      }
    }
  }

  /**
   * Return the stored analysis without ever calling the analyzer.
   *
   * @throws FormNotFoundError when the form does not exist
   * @throws AnalysisNotFoundError when no analysis has been run
   */
  async getAnalysis(formId: string): Promise<AnalysisRecord> {
    const form = await this.deps.forms.getForm(formId);
    if (!form) {
      throw new FormNotFoundError(formId);
    }

    const analysis = await this.deps.analyses.getAnalysis(formId);
    if (!analysis) {
      throw new AnalysisNotFoundError(formId);
    }
    return analysis;
  }

  private async recordRequest(cacheHit: boolean): Promise<void> {
    if (this.deps.metricsEmitter) {
      await this.deps.metricsEmitter.emitAnalysisRequested(cacheHit);
    }
  }
}
