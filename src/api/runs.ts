/**
 * Run API routes.
 *
 * POST /workflows/:workflowId/runs — Create and start a run
 * GET /runs/:runId — Get run status with jobs and step results
 * POST /runs/:runId/cancel — Cancel an in-flight run
 */

import { Router } from 'express';
import { validationError } from '../domain/errors';
import { ExecutorError, WorkflowExecutor } from '../engine/executor';
import { isRecord, optionalString } from './middleware';
import { parseTriggerInput } from './trigger-input';

export function createRunRoutes(executor: WorkflowExecutor): Router {
  const router = Router();

  /**
   * POST /workflows/:workflowId/runs
   * Body: { trigger?, workflowVersion? }. The run executes in the
   * background; poll GET /runs/:runId for its status.
   */
  router.post('/workflows/:workflowId/runs', async (req, res, next) => {
    try {
      const body: unknown = req.body ?? {};
      if (!isRecord(body)) throw new ExecutorError(validationError('Request body must be an object'));

      const { workflowVersion } = body;
      if (workflowVersion !== undefined && (typeof workflowVersion !== 'number' || !Number.isInteger(workflowVersion))) {
        throw new ExecutorError(validationError('workflowVersion must be an integer', { field: 'workflowVersion' }));
      }

      const run = await executor.createRun({
        workflowId: req.params.workflowId,
        trigger: parseTriggerInput(body.trigger),
        workflowVersion,
      });
      executor.startRun(run.id);

      res.status(201).json({ run });
    } catch (err) {
      next(err);
    }
  });

  router.get('/runs/:runId', async (req, res, next) => {
    try {
      const run = await executor.getRun(req.params.runId);
      res.json({ run });
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /runs/:runId/cancel
   * Body: { reason?, canceledBy? }.
   */
  router.post('/runs/:runId/cancel', async (req, res, next) => {
    try {
      const body: unknown = req.body ?? {};
      const fields = isRecord(body) ? body : {};
      const canceledBy = optionalString(fields, 'canceledBy') ?? req.get('x-identity-id') ?? 'api';
      const run = await executor.cancelRun(req.params.runId, canceledBy, optionalString(fields, 'reason'));
      res.json({ run });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
