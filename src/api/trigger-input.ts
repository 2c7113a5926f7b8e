/**
 * Trigger events from request bodies and GitHub webhook payloads.
 */

import { validationError } from '../domain/errors';
import { SourceLocation, TriggerEvent } from '../domain/trigger';
import { isPullRequestActivity, isTriggerEventName } from '../dsl/schema';
import { ExecutorError } from '../engine/executor';
import { isRecord } from './middleware';

function invalid(message: string, field: string): ExecutorError {
  return new ExecutorError(validationError(message, { field }));
}

function stringField(obj: Record<string, unknown>, field: string, path: string): string | undefined {
  const value = obj[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw invalid(`${path}.${field} must be a string`, `${path}.${field}`);
  return value;
}

function requiredString(obj: Record<string, unknown>, field: string, path: string): string {
  const value = stringField(obj, field, path);
  if (!value) throw invalid(`${path}.${field} is required`, `${path}.${field}`);
  return value;
}

function parseSource(raw: unknown): SourceLocation {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) throw invalid('trigger.source must be an object', 'trigger.source');
  return {
    cloneUrl: stringField(raw, 'cloneUrl', 'trigger.source'),
    localPath: stringField(raw, 'localPath', 'trigger.source'),
    sha: stringField(raw, 'sha', 'trigger.source'),
    ref: stringField(raw, 'ref', 'trigger.source'),
  };
}

/**
 * Parse the `trigger` field of a run request. Absent means a manual
 * dispatch with no source.
 */
export function parseTriggerInput(raw: unknown, sender = 'api'): TriggerEvent {
  if (raw === undefined || raw === null) {
    return { event: 'workflow_dispatch', source: {}, sender };
  }
  if (!isRecord(raw)) throw invalid('trigger must be an object', 'trigger');

  const event = requiredString(raw, 'event', 'trigger');
  if (!isTriggerEventName(event)) throw invalid(`Unsupported trigger event "${event}"`, 'trigger.event');

  const repository = stringField(raw, 'repository', 'trigger');
  const source = parseSource(raw.source);
  const actor = stringField(raw, 'sender', 'trigger') ?? sender;

  switch (event) {
    case 'pull_request': {
      const action = stringField(raw, 'action', 'trigger') ?? 'opened';
      if (!isPullRequestActivity(action)) throw invalid(`Unknown pull_request action "${action}"`, 'trigger.action');
      const number = raw.number ?? 0;
      if (typeof number !== 'number' || !Number.isInteger(number)) {
        throw invalid('trigger.number must be an integer', 'trigger.number');
      }
      return {
        event,
        action,
        number,
        baseRef: requiredString(raw, 'baseRef', 'trigger'),
        headRef: requiredString(raw, 'headRef', 'trigger'),
        headSha: stringField(raw, 'headSha', 'trigger'),
        repository,
        source,
        sender: actor,
      };
    }
    case 'push':
      return {
        event,
        branch: requiredString(raw, 'branch', 'trigger'),
        sha: stringField(raw, 'sha', 'trigger'),
        repository,
        source,
        sender: actor,
      };
    case 'workflow_dispatch':
      return { event, ref: stringField(raw, 'ref', 'trigger'), repository, source, sender: actor };
  }
}

function nested(obj: Record<string, unknown>, ...keys: string[]): unknown {
  let current: unknown = obj;
  for (const key of keys) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function text(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Trigger for a GitHub `pull_request` or `push` delivery; null for every
 * other event, for deliveries without `repository.full_name` and for
 * pushes that are not to a branch.
 */
export function triggerFromGitHubEvent(eventName: string, payload: unknown): TriggerEvent | null {
  if (!isRecord(payload)) return null;
  const repository = text(nested(payload, 'repository', 'full_name'));
  if (!repository) return null;
  const cloneUrl = text(nested(payload, 'repository', 'clone_url'));
  const sender = text(nested(payload, 'sender', 'login'));

  if (eventName === 'pull_request') {
    const action = text(payload.action);
    const number = nested(payload, 'pull_request', 'number');
    const baseRef = text(nested(payload, 'pull_request', 'base', 'ref'));
    const headRef = text(nested(payload, 'pull_request', 'head', 'ref'));
    if (!action || !isPullRequestActivity(action) || typeof number !== 'number' || !baseRef || !headRef) {
      return null;
    }
    const headSha = text(nested(payload, 'pull_request', 'head', 'sha'));
    return {
      event: 'pull_request',
      action,
      number,
      baseRef,
      headRef,
      headSha,
      repository,
      source: { cloneUrl, sha: headSha, ref: headRef },
      sender,
    };
  }

  if (eventName === 'push') {
    const ref = text(payload.ref);
    if (!ref?.startsWith('refs/heads/')) return null;
    const branch = ref.slice('refs/heads/'.length);
    const sha = text(payload.after);
    return { event: 'push', branch, sha, repository, source: { cloneUrl, sha, ref: branch }, sender };
  }

  return null;
}
