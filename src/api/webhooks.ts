/**
 * GitHub webhook receiver.
 *
 * POST /webhooks/github — starts a run for every registered workflow of
 * the repository whose `on:` matches the delivered event.
 */

import { createHmac, timingSafeEqual } from 'crypto';
import express, { Router } from 'express';
import { apiError, authError, validationError } from '../domain/errors';
import { WorkflowExecutor } from '../engine/executor';
import { logger } from '../logger';
import { triggerFromGitHubEvent } from './trigger-input';

const log = logger.child({ module: 'webhooks' });

export interface WebhookOptions {
  /** Shared secret; unset skips signature verification. */
  secret?: string;
}

/** Verify an `X-Hub-Signature-256` header ("sha256=<hex>") against the raw body. */
export function verifySignature(payload: Buffer, signature: string | undefined, secret: string): boolean {
  if (!signature) return false;
  const [algorithm, provided] = signature.split('=');
  if (algorithm !== 'sha256' || !provided || !/^[0-9a-f]+$/i.test(provided)) return false;

  const expected = createHmac('sha256', secret).update(payload).digest();
  const actual = Buffer.from(provided, 'hex');
  return actual.length === expected.length && timingSafeEqual(actual, expected);
}

/** `sha256=<hex>` signature of a payload. */
export function signPayload(payload: string | Buffer, secret: string): string {
  return `sha256=${createHmac('sha256', secret).update(payload).digest('hex')}`;
}

export function createWebhookRoutes(executor: WorkflowExecutor, options: WebhookOptions = {}): Router {
  const router = Router();

  router.post('/github', express.raw({ type: '*/*', limit: '5mb' }), async (req, res, next) => {
    try {
      const body: unknown = req.body;
      const raw = Buffer.isBuffer(body) ? body : Buffer.alloc(0);

      if (options.secret && !verifySignature(raw, req.get('x-hub-signature-256'), options.secret)) {
        log.warn('Rejected webhook with invalid signature', { delivery: req.get('x-github-delivery') });
        res.status(401).json(apiError(authError('Invalid webhook signature')));
        return;
      }

      let payload: unknown;
      try {
        payload = JSON.parse(raw.toString('utf8'));
      } catch (err) {
        res.status(400).json(apiError(validationError(`Malformed webhook payload: ${err instanceof Error ? err.message : String(err)}`)));
        return;
      }

      const eventName = req.get('x-github-event') ?? '';
      const trigger = triggerFromGitHubEvent(eventName, payload);
      if (!trigger) {
        log.debug('Ignoring webhook event', { event: eventName });
        res.status(200).json({ runs: [] });
        return;
      }

      const runs = await executor.createRunsForEvent(trigger);
      if (runs.length === 0) {
        res.status(200).json({ runs: [] });
        return;
      }
      for (const run of runs) {
        executor.startRun(run.id);
      }
      log.info('Webhook started runs', { event: eventName, repository: trigger.repository, runs: runs.length });
      res.status(202).json({ runs: runs.map((run) => run.id) });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
