/**
 * Run, job and step state machines.
 *
 * Enforces valid state transitions, producing typed errors on invalid
 * transitions.
 */

import {
  JobRunStatus,
  RunStatus,
  StepRunStatus,
  VALID_JOB_TRANSITIONS,
  VALID_RUN_TRANSITIONS,
  VALID_STEP_TRANSITIONS,
} from '../domain/run';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

function transition<S extends string>(
  kind: 'RUN' | 'JOB' | 'STEP',
  table: Record<S, S[]>,
  current: S,
  target: S,
): TransitionResult<S> {
  const validTargets = table[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: `${kind}.INVALID_TRANSITION`,
        message: `Invalid ${kind.toLowerCase()} state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Attempt a run state transition. */
export function transitionRunStatus(current: RunStatus, target: RunStatus): TransitionResult<RunStatus> {
  return transition('RUN', VALID_RUN_TRANSITIONS, current, target);
}

/** Attempt a job run state transition. */
export function transitionJobStatus(current: JobRunStatus, target: JobRunStatus): TransitionResult<JobRunStatus> {
  return transition('JOB', VALID_JOB_TRANSITIONS, current, target);
}

/** Attempt a step state transition. */
export function transitionStepStatus(current: StepRunStatus, target: StepRunStatus): TransitionResult<StepRunStatus> {
  return transition('STEP', VALID_STEP_TRANSITIONS, current, target);
}

export function isTerminalRunStatus(status: RunStatus): boolean {
  return VALID_RUN_TRANSITIONS[status].length === 0;
}

export function isTerminalJobStatus(status: JobRunStatus): boolean {
  return VALID_JOB_TRANSITIONS[status].length === 0;
}

export function isTerminalStepStatus(status: StepRunStatus): boolean {
  return VALID_STEP_TRANSITIONS[status].length === 0;
}
