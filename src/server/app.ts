/**
 * Express application factory.
 *
 * Everything the routes touch is passed in, so tests can build an app around
 * in-process collaborators.
 */

import express, { Express } from 'express';
import { AnalysisRepository, FormRepository, ResponseRepository } from '../data';
import { ErrorHandler } from '../errors';
import { AnalysisOrchestrator, FormService } from '../feedback';
import { HealthCheck, Logger, MetricsEmitter } from '../monitoring';
import type { FeedbackAnalyzer } from '../nlp';
import { createFormsRouter } from './routes/forms';

export const API_PREFIX = '/api/v1';

export const SERVICE_NAME = 'Event Feedback Analyzer API';

export interface AppDependencies {
  forms: FormRepository;
  responses: ResponseRepository;
  analyses: AnalysisRepository;
  analyzer: FeedbackAnalyzer;
  healthCheck: HealthCheck;
  logger: Logger;
  metricsEmitter?: MetricsEmitter | null;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(express.json({ limit: '100kb' }));

  const formService = new FormService({ forms: deps.forms, responses: deps.responses });

  const createOrchestrator = (): AnalysisOrchestrator =>
    new AnalysisOrchestrator({
      forms: deps.forms,
      responses: deps.responses,
      analyses: deps.analyses,
      analyzer: deps.analyzer,
      metricsEmitter: deps.metricsEmitter ?? null,
    });

  app.get('/', (_req, res) => {
    res.status(200).json({
      message: SERVICE_NAME,
      status: 'running',
      apiPrefix: API_PREFIX,
    });
  });

  // Returns 200 when healthy, 503 when unhealthy or during shutdown
  app.get('/health', async (req, res, next) => {
    try {
      await deps.healthCheck.handleHealthCheck(req, res);
    } catch (error) {
      next(error);
    }
  });

  app.use(API_PREFIX, createFormsRouter({ formService, createOrchestrator }));

  const errorHandler = new ErrorHandler({
    logger: deps.logger,
    ...(deps.metricsEmitter ? { metricsEmitter: deps.metricsEmitter } : {}),
  });

  app.use(errorHandler.notFound());
  app.use(errorHandler.middleware());

  return app;
}
