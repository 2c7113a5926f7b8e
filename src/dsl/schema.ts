/**
 * Workflow document schema constants.
 *
 * The document shape the parser and validator accept.
 */

import { PullRequestActivity, TRIGGER_EVENT_NAMES, TriggerEventName } from '../domain/workflow';

/** Top-level keys of a workflow document. */
export const WORKFLOW_KEYS = ['name', 'on', 'env', 'jobs', 'concurrency', 'permissions', 'defaults', 'run-name'] as const;

/** Keys ignored with a warning because they have no effect here. */
export const IGNORED_WORKFLOW_KEYS = ['concurrency', 'permissions', 'defaults', 'run-name'] as const;

/** Keys of a job. */
export const JOB_KEYS = [
  'name',
  'runs-on',
  'needs',
  'if',
  'env',
  'timeout-minutes',
  'continue-on-error',
  'strategy',
  'steps',
] as const;

/** Keys of a step. */
export const STEP_KEYS = [
  'id',
  'name',
  'uses',
  'run',
  'shell',
  'working-directory',
  'with',
  'env',
  'if',
  'timeout-minutes',
  'continue-on-error',
] as const;

/** Keys of `strategy`. */
export const STRATEGY_KEYS = ['matrix', 'fail-fast', 'max-parallel'] as const;

/** Keys of a trigger filter under `on.<event>`. */
export const TRIGGER_FILTER_KEYS = ['branches', 'branches-ignore', 'types', 'paths', 'paths-ignore', 'inputs'] as const;

export const VALID_SHELLS = ['bash', 'sh'] as const;

export const VALID_PULL_REQUEST_TYPES = [
  'opened',
  'synchronize',
  'reopened',
  'closed',
  'edited',
  'labeled',
  'unlabeled',
] as const;

export function isTriggerEventName(value: string): value is TriggerEventName {
  return (TRIGGER_EVENT_NAMES as readonly string[]).includes(value);
}

export function isPullRequestActivity(value: string): value is PullRequestActivity {
  return (VALID_PULL_REQUEST_TYPES as readonly string[]).includes(value);
}

/** Activity types a pull_request trigger matches when `types` is omitted. */
export const DEFAULT_PULL_REQUEST_TYPES = ['opened', 'synchronize', 'reopened'] as const;

/** `owner/name@ref`, `owner/name/path@ref`, or a local `./path`. */
export const ACTION_REFERENCE_PATTERN = /^(?:\.\/[^@\s]+|[A-Za-z0-9_.-]+\/[A-Za-z0-9_./-]+@[A-Za-z0-9_./-]+)$/;

export const JOB_ID_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*$/;

export const STEP_ID_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*$/;

/** Validation constraints. */
export const SCHEMA_CONSTRAINTS = {
  maxJobs: 256,
  maxStepsPerJob: 1000,
  maxMatrixCombinations: 256,
  maxNameLength: 256,
  /** Maximum timeout in minutes for jobs and steps (72 hours). */
  maxTimeoutMinutes: 4320,
} as const;
