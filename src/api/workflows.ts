/**
 * Workflow API routes.
 *
 * POST /workflows — Register a workflow document
 * GET /workflows — List registered workflows
 * GET /workflows/:workflowId — Fetch a workflow (latest, or ?version=)
 * GET /workflows/:workflowId/plan — Expanded job plan
 */

import { Router } from 'express';
import { validationError } from '../domain/errors';
import { ExecutorError, WorkflowExecutor } from '../engine/executor';
import { Store } from '../storage/store';
import { isRecord, optionalString, queryInt } from './middleware';

function versionParam(value: unknown): number | undefined {
  if (typeof value !== 'string') return undefined;
  const version = parseInt(value, 10);
  if (Number.isNaN(version) || version < 1) {
    throw new ExecutorError(validationError('version must be a positive integer', { version: value }));
  }
  return version;
}

export function createWorkflowRoutes(store: Store, executor: WorkflowExecutor): Router {
  const router = Router();

  /**
   * POST /workflows
   * Body: { source, repository?, path? }. Registering the same repository
   * and path again stores a new version.
   */
  router.post('/', async (req, res, next) => {
    try {
      const body: unknown = req.body;
      if (!isRecord(body) || typeof body.source !== 'string' || body.source.trim() === '') {
        throw new ExecutorError(validationError('"source" (workflow YAML text) is required'));
      }

      const result = await executor.registerWorkflow({
        source: body.source,
        repository: optionalString(body, 'repository'),
        path: optionalString(body, 'path'),
      });
      res.status(201).json(result);
    } catch (err) {
      next(err);
    }
  });

  router.get('/', async (req, res, next) => {
    try {
      const repository = typeof req.query.repository === 'string' ? req.query.repository : undefined;
      const result = await store.workflows.list({
        repository,
        limit: queryInt(req.query.limit, 50, 500),
        offset: queryInt(req.query.offset, 0),
      });
      res.json(result);
    } catch (err) {
      next(err);
    }
  });

  router.get('/:workflowId', async (req, res, next) => {
    try {
      const workflow = await executor.getWorkflow(req.params.workflowId, versionParam(req.query.version));
      res.json({ workflow });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /workflows/:workflowId/plan
   * The compiled plan: jobs in dependency order with their matrix instances.
   */
  router.get('/:workflowId/plan', async (req, res, next) => {
    try {
      const plan = await executor.getPlan(req.params.workflowId, versionParam(req.query.version));
      res.json({ plan });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
