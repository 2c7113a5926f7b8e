/**
 * Artifact API routes.
 *
 * GET /runs/:runId/artifacts — List artifacts produced by a run
 * GET /artifacts/:artifactId — Artifact record
 * GET /artifacts/:artifactId/files/* — Download one file of an artifact
 */

import path from 'path';
import { Router } from 'express';
import { WorkflowExecutor } from '../engine/executor';

export function createArtifactRoutes(executor: WorkflowExecutor): Router {
  const router = Router();

  router.get('/runs/:runId/artifacts', async (req, res, next) => {
    try {
      const artifacts = await executor.listArtifacts(req.params.runId);
      res.json({ artifacts });
    } catch (err) {
      next(err);
    }
  });

  router.get('/artifacts/:artifactId', async (req, res, next) => {
    try {
      const artifact = await executor.getArtifact(req.params.artifactId);
      res.json({ artifact });
    } catch (err) {
      next(err);
    }
  });

  router.get('/artifacts/:artifactId/files/*', async (req, res, next) => {
    try {
      const marker = '/files/';
      const filePath = decodeURIComponent(req.path.slice(req.path.indexOf(marker) + marker.length));
      const stream = await executor.openArtifactFile(req.params.artifactId, filePath);
      res.setHeader('Content-Type', filePath.endsWith('.xml') ? 'application/xml' : 'application/octet-stream');
      res.setHeader('Content-Disposition', `attachment; filename="${path.basename(filePath)}"`);
      stream.on('error', next);
      stream.pipe(res);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
