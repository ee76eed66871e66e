/**
 * REST API routes for feedback forms, responses and analyses.
 *
 * Handlers validate input, call the services and shape the reply. Failures
 * are thrown and reach the error middleware, which maps them to statuses.
 */

import { Router, Request, Response } from 'express';
import { getLogger } from '../../monitoring';
import {
  AnalysisOrchestrator,
  assertValid,
  FormService,
  validateCreateForm,
  validateCreateResponse,
  validateFormId,
  validateUpdateForm,
} from '../../feedback';
import { asyncHandler } from '../../errors';

const logger = getLogger();

export interface FormsRouterDependencies {
  formService: FormService;
  /** Builds a fresh orchestrator for each analysis request */
  createOrchestrator: () => AnalysisOrchestrator;
}

export function createFormsRouter(deps: FormsRouterDependencies): Router {
  const router = Router();
  const { formService, createOrchestrator } = deps;

  /**
   * POST /forms
   */
  router.post(
    '/forms',
    asyncHandler(async (req: Request, res: Response) => {
      const input = assertValid(validateCreateForm(req.body));
      const form = await formService.createForm(input);
      res.status(201).json(form);
    })
  );

  /**
   * GET /forms/:formId
   */
  router.get(
    '/forms/:formId',
    asyncHandler(async (req: Request, res: Response) => {
      const formId = validateFormId(req.params.formId);
      res.status(200).json(await formService.getForm(formId));
    })
  );

  /**
   * PUT /forms/:formId
   *
   * Only supplied fields change.
   */
  router.put(
    '/forms/:formId',
    asyncHandler(async (req: Request, res: Response) => {
      const formId = validateFormId(req.params.formId);
      const input = assertValid(validateUpdateForm(req.body));
      res.status(200).json(await formService.updateForm(formId, input));
    })
  );

  /**
   * DELETE /forms/:formId
   *
   * Removes the form with all of its responses and its analysis.
   */
  router.delete(
    '/forms/:formId',
    asyncHandler(async (req: Request, res: Response) => {
      const formId = validateFormId(req.params.formId);
      await formService.deleteForm(formId);
      res.status(204).end();
    })
  );

  /**
   * POST /forms/:formId/responses
   */
  router.post(
    '/forms/:formId/responses',
    asyncHandler(async (req: Request, res: Response) => {
      const formId = validateFormId(req.params.formId);
      const input = assertValid(validateCreateResponse(req.body));
      const response = await formService.submitResponse(formId, input);
      res.status(201).json(response);
    })
  );

  /**
   * GET /forms/:formId/responses
   *
   * Oldest first.
   */
  router.get(
    '/forms/:formId/responses',
    asyncHandler(async (req: Request, res: Response) => {
      const formId = validateFormId(req.params.formId);
      res.status(200).json(await formService.listResponses(formId));
    })
  );

  /**
   * POST /forms/:formId/analyze
   *
   * Runs the analysis on first call; later calls return the stored result.
   */
  router.post(
    '/forms/:formId/analyze',
    asyncHandler(async (req: Request, res: Response) => {
      const startTime = Date.now();
      const formId = validateFormId(req.params.formId);
      const analysis = await createOrchestrator().requestAnalysis(formId);

      logger.info('Analysis request served', {
        formId,
        event: 'analysis_served',
        analysisId: analysis.analysisId,
        duration: Date.now() - startTime,
      });
      res.status(200).json(analysis);
    })
  );

  /**
   * GET /forms/:formId/analysis
   */
  router.get(
    '/forms/:formId/analysis',
    asyncHandler(async (req: Request, res: Response) => {
      const formId = validateFormId(req.params.formId);
      res.status(200).json(await createOrchestrator().getAnalysis(formId));
    })
  );

  return router;
}
