/**
 * Run domain model.
 *
 * A run is one execution of a workflow for one trigger event. It holds
 * one JobRun per matrix instance; each JobRun holds its step results in
 * execution order.
 */

import { TypedError } from './errors';
import { TriggerEvent } from './trigger';
import { MatrixCombination } from './workflow';

/** Workflow run lifecycle states. */
export enum RunStatus {
  Created = 'created',
  Queued = 'queued',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Canceled = 'canceled',
}

/** Job (matrix instance) lifecycle states. */
export enum JobRunStatus {
  Pending = 'pending',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Canceled = 'canceled',
  Skipped = 'skipped',
}

/** Step-level run states. */
export enum StepRunStatus {
  Pending = 'pending',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  TimedOut = 'timed_out',
  Canceled = 'canceled',
  Skipped = 'skipped',
}

/** Valid state transitions for runs. */
export const VALID_RUN_TRANSITIONS: Record<RunStatus, RunStatus[]> = {
  [RunStatus.Created]: [RunStatus.Queued, RunStatus.Canceled],
  [RunStatus.Queued]: [RunStatus.Running, RunStatus.Canceled],
  [RunStatus.Running]: [RunStatus.Succeeded, RunStatus.Failed, RunStatus.Canceled],
  [RunStatus.Succeeded]: [],
  [RunStatus.Failed]: [],
  [RunStatus.Canceled]: [],
};

/** Valid state transitions for job runs. */
export const VALID_JOB_TRANSITIONS: Record<JobRunStatus, JobRunStatus[]> = {
  [JobRunStatus.Pending]: [JobRunStatus.Running, JobRunStatus.Skipped, JobRunStatus.Canceled, JobRunStatus.Failed],
  [JobRunStatus.Running]: [JobRunStatus.Succeeded, JobRunStatus.Failed, JobRunStatus.Canceled],
  [JobRunStatus.Succeeded]: [],
  [JobRunStatus.Failed]: [],
  [JobRunStatus.Canceled]: [],
  [JobRunStatus.Skipped]: [],
};

/** Valid state transitions for step runs. */
export const VALID_STEP_TRANSITIONS: Record<StepRunStatus, StepRunStatus[]> = {
  [StepRunStatus.Pending]: [StepRunStatus.Running, StepRunStatus.Skipped, StepRunStatus.Canceled],
  [StepRunStatus.Running]: [
    StepRunStatus.Succeeded,
    StepRunStatus.Failed,
    StepRunStatus.TimedOut,
    StepRunStatus.Canceled,
  ],
  [StepRunStatus.Succeeded]: [],
  [StepRunStatus.Failed]: [],
  [StepRunStatus.TimedOut]: [],
  [StepRunStatus.Canceled]: [],
  [StepRunStatus.Skipped]: [],
};

/** What a step's result means for the job, before continue-on-error is applied. */
export type StepOutcome = 'success' | 'failure' | 'cancelled' | 'skipped';

/** Result of a single step execution. */
export interface StepRunResult {
  index: number;
  /** Step id from the document, if any. */
  id?: string;
  name: string;
  /** The `uses` reference, or "run" for script steps. */
  action: string;
  status: StepRunStatus;
  outcome?: StepOutcome;
  /** True when the step's condition contains always(). */
  unconditional: boolean;
  startedAt?: string;
  completedAt?: string;
  durationMs?: number;
  outputs: Record<string, string>;
  /** Tail of the step's log output. */
  log: string[];
  error?: TypedError;
}

/** One matrix instance of a job. */
export interface JobRun {
  id: string;
  /** Job id from the document. */
  jobId: string;
  /** Instance key in the run plan. */
  key: string;
  /** Display name, with matrix values substituted. */
  name: string;
  matrix: MatrixCombination;
  runsOn: string;
  /** Frozen job-level environment bindings. */
  env: Record<string, string>;
  status: JobRunStatus;
  steps: StepRunResult[];
  artifactIds: string[];
  startedAt?: string;
  completedAt?: string;
  durationMs?: number;
  /** Error of the first failing step that counts toward the job status. */
  error?: TypedError;
}

/** A single execution of a workflow. */
export interface Run {
  id: string;
  workflowId: string;
  workflowVersion: number;
  workflowName: string;
  repository?: string;
  trigger: TriggerEvent;
  status: RunStatus;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
  /** Job runs indexed by job run id, in plan order. */
  jobs: Record<string, JobRun>;
  error?: TypedError;
  canceledBy?: string;
  canceledAt?: string;
  cancelReason?: string;
}

/** Input for creating a new run. */
export interface CreateRunInput {
  workflowId: string;
  trigger: TriggerEvent;
  /** Optional: pin to a specific workflow version. */
  workflowVersion?: number;
}
