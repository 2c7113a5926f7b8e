/**
 * Job runner: executes one matrix instance of a job.
 *
 * Steps run strictly in sequence inside a private workspace. Each step's
 * condition is evaluated against the current job status, so steps calling
 * always() run on every exit path: success, failure, timeout and
 * cancellation.
 */

import fs from 'fs/promises';
import path from 'path';
import { Artifact } from '../domain/artifact';
import { TypedError, createTypedError, jobCanceledError, jobTimeoutError, runnerUnavailableError } from '../domain/errors';
import { DataPlaneEventType } from '../domain/events';
import { JobRun, JobRunStatus, StepRunResult, StepRunStatus } from '../domain/run';
import { TriggerEvent } from '../domain/trigger';
import { CompiledStep, PlannedJobInstance } from '../dsl/compiler';
import { ExprValue, ExpressionError, JobStatusView, evaluateCondition } from '../dsl/expressions';
import { Logger } from '../logger';
import { PersistArtifactInput } from '../storage/artifact-storage';
import { transitionJobStatus } from './state-machine';
import {
  RUN_ACTION,
  StepExecutionContext,
  StepInterruption,
  executeStep,
  stepExpressionContext,
} from './step-runner';

/** Callbacks the executor provides for persistence and events. */
export interface JobRunHooks {
  /** Called after every job or step transition with the updated record. */
  onTransition(job: JobRun, type: DataPlaneEventType, stepIndex?: number): Promise<void>;
  /** Persist artifact files and record them. */
  saveArtifact(input: PersistArtifactInput): Promise<Artifact>;
}

export interface RunJobOptions {
  runId: string;
  trigger: TriggerEvent;
  instance: PlannedJobInstance;
  /** The job record; updated in place. */
  job: JobRun;
  workspaceRoot: string;
  keepWorkspaces: boolean;
  stepLogLines: number;
  /** Runner labels served here; undefined accepts every label. */
  runnerLabels?: string[];
  /** Run-level cancellation (cancelRun, fail-fast). */
  signal?: AbortSignal;
  /** Reason given when `signal` fires. */
  cancelReason?(): string | undefined;
  hooks: JobRunHooks;
  logger: Logger;
}

/** A step record before it runs. */
export function pendingStep(step: CompiledStep): StepRunResult {
  return {
    index: step.index,
    id: step.id,
    name: step.name,
    action: step.uses ?? RUN_ACTION,
    status: StepRunStatus.Pending,
    unconditional: step.unconditional,
    outputs: {},
    log: [],
  };
}

function setJobStatus(job: JobRun, target: JobRunStatus): void {
  const result = transitionJobStatus(job.status, target);
  if (!result.success) {
    throw new JobRunnerError(
      result.error ??
        createTypedError({ code: 'JOB.INVALID_TRANSITION', message: `${job.status} -> ${target}`, retryable: false }),
    );
  }
  job.status = target;
}

function stepEventType(status: StepRunStatus): DataPlaneEventType {
  switch (status) {
    case StepRunStatus.Succeeded:
      return 'step.succeeded';
    case StepRunStatus.TimedOut:
      return 'step.timed_out';
    case StepRunStatus.Canceled:
      return 'step.canceled';
    case StepRunStatus.Skipped:
      return 'step.skipped';
    default:
      return 'step.failed';
  }
}

function jobEventType(status: JobRunStatus): DataPlaneEventType {
  switch (status) {
    case JobRunStatus.Succeeded:
      return 'job.succeeded';
    case JobRunStatus.Canceled:
      return 'job.canceled';
    case JobRunStatus.Skipped:
      return 'job.skipped';
    default:
      return 'job.failed';
  }
}

/** Run one job instance to completion. Resolves with the final job record. */
export async function runJob(options: RunJobOptions): Promise<JobRun> {
  const { instance, job, hooks } = options;
  const log = options.logger.child({ jobRunId: job.id, job: job.name });
  const startMs = Date.now();

  setJobStatus(job, JobRunStatus.Running);
  job.startedAt = new Date().toISOString();
  job.steps = instance.steps.map(pendingStep);
  await hooks.onTransition(job, 'job.started');
  log.info('Job started', { runsOn: job.runsOn, matrix: job.matrix });

  const finishJob = async (status: JobRunStatus, error?: TypedError): Promise<JobRun> => {
    setJobStatus(job, status);
    job.error = error;
    job.completedAt = new Date().toISOString();
    job.durationMs = Date.now() - startMs;
    await hooks.onTransition(job, jobEventType(status));
    log.info('Job finished', { status, durationMs: job.durationMs, code: error?.code });
    return job;
  };

  if (options.runnerLabels && !options.runnerLabels.includes(job.runsOn)) {
    const error = { ...runnerUnavailableError(job.runsOn, options.runnerLabels), runId: options.runId, jobRunId: job.id };
    await skipRemaining(job, 0, hooks);
    return finishJob(JobRunStatus.Failed, error);
  }

  const workspace = path.join(options.workspaceRoot, options.runId, job.id);
  try {
    await fs.mkdir(workspace, { recursive: true });
  } catch (err) {
    await skipRemaining(job, 0, hooks);
    return finishJob(
      JobRunStatus.Failed,
      createTypedError({
        code: 'SYSTEM.WORKSPACE',
        message: `Cannot create workspace ${workspace}: ${err instanceof Error ? err.message : String(err)}`,
        runId: options.runId,
        jobRunId: job.id,
        retryable: true,
      }),
    );
  }

  // Job-level stop: run cancellation or the job timeout.
  const controller = new AbortController();
  const state: { interruption?: StepInterruption } = {};
  const onRunAbort = (): void => {
    if (state.interruption) return;
    state.interruption = { status: StepRunStatus.Canceled, error: jobCanceledError(job.id, options.cancelReason?.()) };
    controller.abort();
  };
  if (options.signal?.aborted) onRunAbort();
  else options.signal?.addEventListener('abort', onRunAbort, { once: true });
  const timer = setTimeout(() => {
    if (state.interruption) return;
    state.interruption = { status: StepRunStatus.TimedOut, error: jobTimeoutError(job.id, instance.timeoutMs) };
    log.warn('Job timed out', { timeoutMs: instance.timeoutMs });
    controller.abort();
  }, instance.timeoutMs);

  const status: JobStatusView = { failed: false, canceled: false };
  const addedPath: string[] = [];
  const stepsContext: Record<string, ExprValue> = {};
  let jobError: TypedError | undefined;

  const noteInterruption = (): void => {
    const interruption = state.interruption;
    if (interruption?.status === StepRunStatus.Canceled) status.canceled = true;
    else if (interruption) {
      status.failed = true;
      jobError ??= { ...interruption.error, runId: options.runId };
    }
  };

  try {
    for (const step of instance.steps) {
      noteInterruption();

      const context: StepExecutionContext = {
        runId: options.runId,
        jobRunId: job.id,
        workspace,
        env: Object.freeze({ ...job.env }),
        matrix: job.matrix,
        runsOn: job.runsOn,
        trigger: options.trigger,
        steps: stepsContext,
        status: { ...status },
        addedPath,
        // Steps that run after the job was stopped get no job signal.
        signal: state.interruption ? undefined : controller.signal,
        interruption: () => state.interruption,
        uploadArtifact: async (stepIndex, name, files) => {
          const artifact = await hooks.saveArtifact({
            runId: options.runId,
            jobRunId: job.id,
            stepIndex,
            name,
            baseDir: workspace,
            files,
          });
          job.artifactIds.push(artifact.id);
          return artifact;
        },
        logLines: options.stepLogLines,
        logger: log,
      };

      let shouldRun: boolean;
      try {
        shouldRun = evaluateCondition(step.condition, stepExpressionContext(context, job.env));
      } catch (err) {
        if (!(err instanceof ExpressionError)) throw err;
        const result: StepRunResult = {
          ...pendingStep(step),
          status: StepRunStatus.Failed,
          outcome: 'failure',
          error: createTypedError({
            code: 'STEP.EXPRESSION_ERROR',
            message: `Cannot evaluate condition "${step.condition ?? ''}": ${err.message}`,
            runId: options.runId,
            jobRunId: job.id,
            stepIndex: step.index,
          }),
        };
        job.steps[step.index] = result;
        await hooks.onTransition(job, 'step.failed', step.index);
        status.failed = true;
        jobError ??= result.error;
        continue;
      }

      if (!shouldRun) {
        job.steps[step.index] = { ...pendingStep(step), status: StepRunStatus.Skipped, outcome: 'skipped' };
        if (step.id) stepsContext[step.id] = { outputs: {}, outcome: 'skipped', conclusion: 'skipped' };
        await hooks.onTransition(job, 'step.skipped', step.index);
        log.debug('Step skipped', { stepIndex: step.index, condition: step.condition });
        continue;
      }

      job.steps[step.index] = { ...pendingStep(step), status: StepRunStatus.Running, startedAt: new Date().toISOString() };
      await hooks.onTransition(job, 'step.started', step.index);

      const result = await executeStep(step, context);
      job.steps[step.index] = result;
      await hooks.onTransition(job, stepEventType(result.status), step.index);

      const failed = result.status !== StepRunStatus.Succeeded;
      if (step.id) {
        stepsContext[step.id] = {
          outputs: { ...result.outputs },
          outcome: result.outcome ?? 'success',
          conclusion: failed && step.continueOnError ? 'success' : (result.outcome ?? 'success'),
        };
      }
      if (!failed || step.continueOnError) continue;

      if (step.unconditional) {
        // always() steps are best-effort: recorded, but the job status stands.
        log.warn('Unconditional step failed', { stepIndex: step.index, code: result.error?.code });
        continue;
      }
      if (result.status === StepRunStatus.Canceled) {
        status.canceled = true;
      } else {
        status.failed = true;
        jobError ??= result.error;
      }
    }
    noteInterruption();
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onRunAbort);
    await removeWorkspace(workspace, options.keepWorkspaces, log);
  }

  if (status.canceled) {
    const interruption = state.interruption;
    const canceled = interruption?.status === StepRunStatus.Canceled ? interruption.error : jobCanceledError(job.id);
    return finishJob(JobRunStatus.Canceled, { ...canceled, runId: options.runId });
  }
  if (status.failed) return finishJob(JobRunStatus.Failed, jobError);
  return finishJob(JobRunStatus.Succeeded);
}

async function skipRemaining(job: JobRun, from: number, hooks: JobRunHooks): Promise<void> {
  for (let i = from; i < job.steps.length; i++) {
    if (job.steps[i].status !== StepRunStatus.Pending) continue;
    job.steps[i] = { ...job.steps[i], status: StepRunStatus.Skipped, outcome: 'skipped' };
    await hooks.onTransition(job, 'step.skipped', i);
  }
}

async function removeWorkspace(workspace: string, keep: boolean, log: Logger): Promise<void> {
  if (keep) {
    log.info('Workspace kept', { workspace });
    return;
  }
  try {
    await fs.rm(workspace, { recursive: true, force: true });
  } catch (err) {
    log.warn('Failed to remove workspace', {
      workspace,
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

/** Job runner error wrapper. */
export class JobRunnerError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'JobRunnerError';
  }
}
