/**
 * Event stream API routes.
 *
 * GET /runs/:runId/events — List events for a run (optional ?types=a,b)
 */

import { Router } from 'express';
import { validationError } from '../domain/errors';
import { DataPlaneEventType, isDataPlaneEventType } from '../domain/events';
import { ExecutorError, WorkflowExecutor } from '../engine/executor';

function parseTypes(raw: unknown): DataPlaneEventType[] | undefined {
  if (typeof raw !== 'string' || raw.trim() === '') return undefined;
  const types: DataPlaneEventType[] = [];
  for (const type of raw.split(',').map((t) => t.trim())) {
    if (!isDataPlaneEventType(type)) {
      throw new ExecutorError(validationError(`Unknown event type "${type}"`, { field: 'types' }));
    }
    types.push(type);
  }
  return types;
}

export function createEventRoutes(executor: WorkflowExecutor): Router {
  const router = Router();

  router.get('/runs/:runId/events', async (req, res, next) => {
    try {
      const events = await executor.getEvents(req.params.runId, parseTypes(req.query.types));
      res.json({ events, total: events.length });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
