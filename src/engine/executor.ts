/**
 * Workflow Executor: the core orchestration engine.
 *
 * Registers workflows, creates runs for trigger events, and executes them:
 * jobs in `needs` order, the matrix instances of each job in parallel
 * (bounded by `max-parallel` and the global job limit), steps in sequence.
 * Every transition is persisted and published as a data plane event.
 */

import { Readable } from 'stream';
import { v4 as uuid } from 'uuid';
import { AppConfig, loadConfig } from '../config';
import { Artifact } from '../domain/artifact';
import {
  TypedError,
  createTypedError,
  notFoundError,
  runAlreadyRunningError,
  runCanceledError,
  runInvalidStateTransition,
  runNotFoundError,
  triggerNotMatchedError,
  validationError,
  workflowCompilationError,
} from '../domain/errors';
import { DataPlaneEvent, DataPlaneEventType } from '../domain/events';
import { CreateRunInput, JobRun, JobRunStatus, Run, RunStatus, StepRunStatus } from '../domain/run';
import { TriggerEvent, githubContext } from '../domain/trigger';
import { RegisterWorkflowInput, StoredWorkflow } from '../domain/workflow';
import { PlannedJob, RunPlan, compileWorkflow } from '../dsl/compiler';
import { ExprValue, ExpressionError, evaluateCondition, isUnconditional } from '../dsl/expressions';
import { parseWorkflow } from '../dsl/parser';
import { matchesTrigger } from '../dsl/trigger';
import { DataPlanePublisher } from '../data-plane/publisher';
import { logger } from '../logger';
import { ArtifactStorage, PersistArtifactInput } from '../storage/artifact-storage';
import { Store } from '../storage/store';
import { JobRunHooks, pendingStep, runJob } from './job-runner';
import { Semaphore } from './semaphore';
import { isTerminalRunStatus, transitionJobStatus, transitionRunStatus } from './state-machine';

/** Executor configuration. */
export type ExecutorConfig = Pick<
  AppConfig,
  'workspaceDir' | 'keepWorkspaces' | 'maxConcurrentJobs' | 'defaultJobTimeoutMinutes' | 'stepLogLines' | 'runnerLabels'
>;

/** Result of a job for `needs` and the run outcome. */
type JobResult = 'success' | 'failure' | 'cancelled' | 'skipped';

/** A job whose scheduling threw instead of producing a result. */
interface JobCrash {
  jobId: string;
  message: string;
}

export interface RegisterWorkflowResult {
  workflow: StoredWorkflow;
  warnings: string[];
}

/** Who canceled a run, and why. */
type CancelRequest = Pick<Run, 'canceledBy' | 'cancelReason' | 'canceledAt'>;

/** A run executing in this process. */
interface ActiveRun {
  controller: AbortController;
  /** The in-memory run record, once loaded. */
  run?: Run;
  cancel?: CancelRequest;
}

const log = logger.child({ module: 'executor' });

/** The workflow executor. */
export class WorkflowExecutor {
  private config: ExecutorConfig;
  private jobSlots: Semaphore;
  private activeRuns = new Map<string, ActiveRun>();
  /** Guard against concurrent executeRun calls on the same run. */
  private runningRuns = new Map<string, Promise<Run>>();

  constructor(
    private store: Store,
    private publisher: DataPlanePublisher,
    private artifacts: ArtifactStorage,
    config?: Partial<ExecutorConfig>,
  ) {
    const defaults = loadConfig({});
    this.config = {
      workspaceDir: defaults.workspaceDir,
      keepWorkspaces: defaults.keepWorkspaces,
      maxConcurrentJobs: defaults.maxConcurrentJobs,
      defaultJobTimeoutMinutes: defaults.defaultJobTimeoutMinutes,
      stepLogLines: defaults.stepLogLines,
      ...config,
    };
    this.jobSlots = new Semaphore(this.config.maxConcurrentJobs);
  }

  // --- Workflows ---

  /**
   * Parse, validate and store a workflow. Registering the same repository
   * and path again stores a new version under the same id.
   */
  async registerWorkflow(input: RegisterWorkflowInput): Promise<RegisterWorkflowResult> {
    const parsed = parseWorkflow(input.source, input.path);
    if (!parsed.definition) {
      throw new ExecutorError(
        validationError('Workflow document is invalid', { errors: parsed.errors }, [
          { type: 'FIX_DOCUMENT', params: { count: parsed.errors.length } },
        ]),
      );
    }

    const compilation = compileWorkflow(parsed.definition);
    if (!compilation.success) {
      throw new ExecutorError(
        createTypedError({
          code: 'WORKFLOW.COMPILATION',
          message: 'Workflow compilation failed',
          retryable: false,
          details: { errors: compilation.errors },
        }),
      );
    }

    const now = new Date().toISOString();
    const existing =
      input.repository && input.path ? await this.store.workflows.getByLocation(input.repository, input.path) : null;

    if (existing) {
      const updated: StoredWorkflow = {
        ...existing,
        name: parsed.definition.name,
        version: existing.version + 1,
        source: input.source,
        definition: parsed.definition,
        updatedAt: now,
      };
      await this.store.workflows.update(existing.id, updated);
      log.info('Workflow updated', { workflowId: updated.id, version: updated.version });
      return { workflow: updated, warnings: parsed.warnings };
    }

    const workflow: StoredWorkflow = {
      id: `wf_${uuid()}`,
      name: parsed.definition.name,
      version: 1,
      repository: input.repository,
      path: input.path,
      source: input.source,
      definition: parsed.definition,
      createdAt: now,
      updatedAt: now,
    };
    await this.store.workflows.create(workflow);
    log.info('Workflow registered', { workflowId: workflow.id, name: workflow.name });
    return { workflow, warnings: parsed.warnings };
  }

  async getWorkflow(workflowId: string, version?: number): Promise<StoredWorkflow> {
    const workflow =
      version === undefined
        ? await this.store.workflows.getById(workflowId)
        : await this.store.workflows.getByIdAndVersion(workflowId, version);
    if (!workflow) {
      throw new ExecutorError(
        notFoundError('Workflow', version === undefined ? workflowId : `${workflowId}@${version}`),
      );
    }
    return workflow;
  }

  /** Compile a stored workflow into its run plan. */
  async getPlan(workflowId: string, version?: number): Promise<RunPlan> {
    const workflow = await this.getWorkflow(workflowId, version);
    return this.compile(workflow);
  }

  private compile(workflow: StoredWorkflow): RunPlan {
    const compilation = compileWorkflow(workflow.definition, {
      defaultJobTimeoutMinutes: this.config.defaultJobTimeoutMinutes,
    });
    if (!compilation.plan) {
      throw new ExecutorError({
        ...workflowCompilationError('Workflow compilation failed'),
        details: { errors: compilation.errors },
      });
    }
    return compilation.plan;
  }

  // --- Runs ---

  /** Create a run with one pending job record per planned matrix instance. */
  async createRun(input: CreateRunInput): Promise<Run> {
    const workflow = await this.getWorkflow(input.workflowId, input.workflowVersion);

    if (!matchesTrigger(workflow.definition, input.trigger)) {
      throw new ExecutorError(triggerNotMatchedError(workflow.name, input.trigger.event));
    }

    const plan = this.compile(workflow);
    const now = new Date().toISOString();
    const run: Run = {
      id: `run_${uuid()}`,
      workflowId: workflow.id,
      workflowVersion: workflow.version,
      workflowName: workflow.name,
      repository: input.trigger.repository ?? workflow.repository,
      trigger: input.trigger,
      status: RunStatus.Created,
      createdAt: now,
      updatedAt: now,
      jobs: {},
    };

    for (const jobId of plan.jobOrder) {
      for (const instance of plan.jobs[jobId].instances) {
        const job: JobRun = {
          id: `job_${uuid()}`,
          jobId,
          key: instance.key,
          name: instance.name,
          matrix: instance.matrix,
          runsOn: instance.runsOn,
          env: instance.env,
          status: JobRunStatus.Pending,
          steps: instance.steps.map(pendingStep),
          artifactIds: [],
        };
        run.jobs[job.id] = job;
      }
    }

    await this.store.runs.create(run);
    await this.safePublishRunEvent(run, 'run.created');
    log.info('Run created', { runId: run.id, workflowId: run.workflowId, jobs: Object.keys(run.jobs).length });
    return run;
  }

  /** Create a run for every registered workflow of the event's repository whose trigger matches. */
  async createRunsForEvent(trigger: TriggerEvent): Promise<Run[]> {
    if (!trigger.repository) {
      throw new ExecutorError(validationError('Trigger event names no repository', { event: trigger.event }));
    }
    const { items } = await this.store.workflows.list({ repository: trigger.repository, limit: Number.MAX_SAFE_INTEGER });
    const runs: Run[] = [];
    for (const workflow of items) {
      if (!matchesTrigger(workflow.definition, trigger)) continue;
      runs.push(await this.createRun({ workflowId: workflow.id, trigger }));
    }
    return runs;
  }

  async getRun(runId: string): Promise<Run> {
    const run = await this.store.runs.getById(runId);
    if (!run) throw new ExecutorError(runNotFoundError(runId));
    return run;
  }

  /**
   * Execute a run (moves through queued -> running -> terminal).
   * Resolves with the final run record.
   */
  async executeRun(runId: string): Promise<Run> {
    if (this.runningRuns.has(runId)) {
      throw new ExecutorError(runAlreadyRunningError(runId));
    }
    const active: ActiveRun = { controller: new AbortController() };
    this.activeRuns.set(runId, active);
    const execution = this.executeRunInternal(runId, active);
    this.runningRuns.set(runId, execution);
    try {
      return await execution;
    } finally {
      this.runningRuns.delete(runId);
      this.activeRuns.delete(runId);
    }
  }

  /** Start executing a run without waiting for it. Failures are logged. */
  startRun(runId: string): void {
    this.executeRun(runId).catch((err: unknown) => {
      log.error('Run execution failed', {
        runId,
        error: err instanceof ExecutorError ? err.typedError : err instanceof Error ? err.message : String(err),
      });
    });
  }

  /** Wait for a run executing in this process; resolves immediately with the stored run otherwise. */
  async waitForRun(runId: string): Promise<Run> {
    const execution = this.runningRuns.get(runId);
    if (execution) {
      try {
        await execution;
      } catch (err) {
        log.debug('Awaited run ended with an error', { runId, error: err instanceof Error ? err.message : String(err) });
      }
    }
    return this.getRun(runId);
  }

  private async executeRunInternal(runId: string, active: ActiveRun): Promise<Run> {
    let run = await this.getRun(runId);
    active.run = run;
    if (active.cancel) Object.assign(run, active.cancel);

    run = await this.transitionRun(run, RunStatus.Queued);
    await this.safePublishRunEvent(run, 'run.queued');

    const workflow = await this.getWorkflow(run.workflowId, run.workflowVersion);
    let plan: RunPlan;
    try {
      plan = this.compile(workflow);
    } catch (err) {
      if (!(err instanceof ExecutorError)) throw err;
      run = await this.transitionRun(run, RunStatus.Running);
      return this.failRun(run, err.typedError);
    }

    run = await this.transitionRun(run, RunStatus.Running);
    run.startedAt = new Date().toISOString();
    await this.persistRun(run);
    await this.safePublishRunEvent(run, 'run.started');
    log.info('Run started', { runId: run.id, workflow: run.workflowName, jobs: Object.keys(run.jobs).length });

    const { signal } = active.controller;
    const { results, crashes } = await this.scheduleJobs(run, plan, signal);

    if (crashes.length > 0) {
      const [first] = crashes;
      return this.failRun(
        run,
        createTypedError({
          code: 'SYSTEM.INTERNAL',
          message: `Job "${first.jobId}" could not be scheduled: ${first.message}`,
          runId: run.id,
          retryable: true,
          details: { crashes },
        }),
      );
    }
    if (signal.aborted) {
      return this.finishRun(run, RunStatus.Canceled, runCanceledError(run.id, run.cancelReason));
    }
    if (Object.values(results).every((r) => r === 'success' || r === 'skipped')) {
      return this.finishRun(run, RunStatus.Succeeded);
    }
    const failedJob = Object.values(run.jobs).find(
      (job) => job.status === JobRunStatus.Failed || job.status === JobRunStatus.Canceled,
    );
    return this.failRun(
      run,
      failedJob?.error ??
        createTypedError({ code: 'RUN.JOB_FAILED', message: 'One or more jobs failed', runId: run.id, retryable: false }),
    );
  }

  /**
   * Run every job of the plan once its needs are settled. A job whose
   * bookkeeping throws counts as failed for its dependents and is reported
   * in `crashes`; the other jobs still run to completion.
   */
  private async scheduleJobs(
    run: Run,
    plan: RunPlan,
    signal: AbortSignal,
  ): Promise<{ results: Record<string, JobResult>; crashes: JobCrash[] }> {
    const results: Record<string, JobResult> = {};
    const crashes: JobCrash[] = [];
    const pending = new Map<string, Promise<JobResult>>();

    for (const jobId of plan.jobOrder) {
      const planned = plan.jobs[jobId];
      const needs = planned.needs.map((need) => pending.get(need) ?? Promise.resolve<JobResult>('skipped'));
      const promise = Promise.all(needs)
        .then((needResults) => this.runPlannedJob(run, planned, needResults, signal))
        .catch((err: unknown): JobResult => {
          const message = err instanceof Error ? err.message : String(err);
          log.error('Job scheduling failed', { runId: run.id, jobId, error: message });
          crashes.push({ jobId, message });
          return 'failure';
        })
        .then((result) => {
          results[jobId] = result;
          return result;
        });
      pending.set(jobId, promise);
    }

    await Promise.allSettled(pending.values());
    return { results, crashes };
  }

  private async runPlannedJob(
    run: Run,
    planned: PlannedJob,
    needResults: JobResult[],
    runSignal: AbortSignal,
  ): Promise<JobResult> {
    const jobs = Object.values(run.jobs).filter((job) => job.jobId === planned.jobId);
    const condition = planned.instances[0]?.condition;
    const needsOk = needResults.every((r) => r === 'success');

    let shouldRun: boolean;
    try {
      const needsContext: Record<string, ExprValue> = {};
      planned.needs.forEach((need, i) => {
        needsContext[need] = { result: needResults[i], outputs: {} };
      });
      shouldRun = evaluateCondition(condition, {
        contexts: { github: githubContext(run.trigger), needs: needsContext },
        status: { failed: !needsOk, canceled: runSignal.aborted },
      });
    } catch (err) {
      if (!(err instanceof ExpressionError)) throw err;
      const error = createTypedError({
        code: 'JOB.EXPRESSION_ERROR',
        message: `Cannot evaluate condition of job "${planned.jobId}": ${err.message}`,
        runId: run.id,
        retryable: false,
      });
      for (const job of jobs) {
        await this.closePendingJob(run, job, JobRunStatus.Failed, error);
      }
      return 'failure';
    }

    if (!shouldRun) {
      const status = runSignal.aborted && !isUnconditional(condition) ? JobRunStatus.Canceled : JobRunStatus.Skipped;
      for (const job of jobs) {
        await this.closePendingJob(run, job, status);
      }
      return status === JobRunStatus.Canceled ? 'cancelled' : 'skipped';
    }

    // fail-fast scope: canceled by the run or by a failing sibling.
    const group = new AbortController();
    let groupReason: string | undefined;
    const onRunAbort = (): void => {
      groupReason = run.cancelReason ?? 'run canceled';
      group.abort();
    };
    if (runSignal.aborted) onRunAbort();
    else runSignal.addEventListener('abort', onRunAbort, { once: true });

    const local = planned.maxParallel ? new Semaphore(planned.maxParallel) : undefined;
    const instances = new Map(planned.instances.map((instance) => [instance.key, instance]));

    const runInstance = async (job: JobRun): Promise<void> => {
      const instance = instances.get(job.key);
      if (!instance) return;
      if (group.signal.aborted && !isUnconditional(instance.condition)) {
        await this.closePendingJob(run, job, JobRunStatus.Canceled);
        return;
      }
      try {
        await runJob({
          runId: run.id,
          trigger: run.trigger,
          instance,
          job,
          workspaceRoot: this.config.workspaceDir,
          keepWorkspaces: this.config.keepWorkspaces,
          stepLogLines: this.config.stepLogLines,
          runnerLabels: this.config.runnerLabels,
          signal: group.signal,
          cancelReason: () => groupReason,
          hooks: this.jobHooks(run),
          logger: log.child({ runId: run.id }),
        });
      } catch (err) {
        log.error('Job runner raised', { runId: run.id, jobRunId: job.id, error: err instanceof Error ? err.message : String(err) });
        job.status = JobRunStatus.Failed;
        job.error = createTypedError({
          code: 'SYSTEM.INTERNAL',
          message: err instanceof Error ? err.message : String(err),
          runId: run.id,
          jobRunId: job.id,
          retryable: false,
        });
        job.completedAt = new Date().toISOString();
        await this.persistRun(run);
      }

      if (job.status === JobRunStatus.Failed && planned.failFast && !instance.continueOnError && !group.signal.aborted) {
        groupReason = `fail-fast: "${job.name}" failed`;
        log.info('Canceling sibling jobs', { runId: run.id, jobId: planned.jobId, failedJob: job.name });
        group.abort();
      }
    };

    // max-parallel first, so waiting instances hold no global slot.
    let settled: PromiseSettledResult<void>[];
    try {
      settled = await Promise.allSettled(
        jobs.map((job) =>
          local ? local.use(() => this.jobSlots.use(() => runInstance(job))) : this.jobSlots.use(() => runInstance(job)),
        ),
      );
    } finally {
      runSignal.removeEventListener('abort', onRunAbort);
    }
    const rejected = settled.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
    if (rejected) throw rejected.reason;

    let result: JobResult = 'success';
    for (const job of jobs) {
      const instance = instances.get(job.key);
      if (job.status === JobRunStatus.Succeeded) continue;
      if (job.status === JobRunStatus.Failed && instance?.continueOnError) continue;
      if (job.status === JobRunStatus.Skipped) continue;
      if (job.status === JobRunStatus.Canceled && result === 'success') result = 'cancelled';
      if (job.status === JobRunStatus.Failed) result = 'failure';
    }
    return result;
  }

  /** Close a job that never started (skipped, canceled, or failed before running). */
  private async closePendingJob(run: Run, job: JobRun, status: JobRunStatus, error?: TypedError): Promise<void> {
    if (!transitionJobStatus(job.status, status).success) return;
    job.status = status;
    job.error = error;
    job.completedAt = new Date().toISOString();
    job.steps = job.steps.map((step) =>
      step.status === StepRunStatus.Pending ? { ...step, status: StepRunStatus.Skipped, outcome: 'skipped' } : step,
    );
    await this.persistRun(run);
    const type: DataPlaneEventType =
      status === JobRunStatus.Skipped ? 'job.skipped' : status === JobRunStatus.Canceled ? 'job.canceled' : 'job.failed';
    await this.safePublish(() => this.publisher.publishJobEvent(run, job, type));
  }

  private jobHooks(run: Run): JobRunHooks {
    return {
      onTransition: async (job, type, stepIndex) => {
        run.jobs[job.id] = job;
        await this.persistRun(run);
        if (stepIndex === undefined) {
          await this.safePublish(() => this.publisher.publishJobEvent(run, job, type));
        } else {
          await this.safePublish(() => this.publisher.publishStepEvent(run, job, stepIndex, type));
        }
      },
      saveArtifact: async (input: PersistArtifactInput) => {
        const artifact = await this.artifacts.persist(input);
        await this.store.artifacts.create(artifact);
        await this.safePublish(() => this.publisher.publishArtifactEvent(run, artifact));
        log.info('Artifact stored', { runId: run.id, jobRunId: input.jobRunId, artifactId: artifact.id, name: artifact.name });
        return artifact;
      },
    };
  }

  /**
   * Cancel a run. A running run is stopped through its abort signal; steps
   * and jobs whose condition calls always() still run. A run that has not
   * started is canceled at once.
   */
  async cancelRun(runId: string, canceledBy: string, reason?: string): Promise<Run> {
    const run = await this.getRun(runId);
    if (isTerminalRunStatus(run.status)) {
      throw new ExecutorError(runInvalidStateTransition(runId, run.status, RunStatus.Canceled));
    }
    const request: CancelRequest = { canceledBy, cancelReason: reason, canceledAt: new Date().toISOString() };

    const active = this.activeRuns.get(runId);
    if (active) {
      if (active.controller.signal.aborted) return run;
      active.cancel = request;
      if (active.run) Object.assign(active.run, request);
      active.controller.abort();
      log.info('Run cancel requested', { runId, canceledBy, reason });
      return { ...run, ...request };
    }

    Object.assign(run, request);
    for (const job of Object.values(run.jobs)) {
      if (job.status !== JobRunStatus.Pending) continue;
      job.status = JobRunStatus.Canceled;
      job.steps = job.steps.map((step) => ({ ...step, status: StepRunStatus.Skipped, outcome: 'skipped' }));
    }
    return this.finishRun(run, RunStatus.Canceled, runCanceledError(run.id, reason));
  }

  // --- Artifacts and events ---

  async listArtifacts(runId: string): Promise<Artifact[]> {
    await this.getRun(runId);
    return this.store.artifacts.listByRun(runId);
  }

  async getArtifact(artifactId: string): Promise<Artifact> {
    const artifact = await this.store.artifacts.getById(artifactId);
    if (!artifact) throw new ExecutorError(notFoundError('Artifact', artifactId));
    return artifact;
  }

  async openArtifactFile(artifactId: string, filePath: string): Promise<Readable> {
    const artifact = await this.getArtifact(artifactId);
    const stream = await this.artifacts.openFile(artifact, filePath);
    if (!stream) throw new ExecutorError(notFoundError('Artifact file', `${artifactId}/${filePath}`));
    return stream;
  }

  async getEvents(runId: string, eventTypes?: DataPlaneEventType[]): Promise<DataPlaneEvent[]> {
    await this.getRun(runId);
    return this.publisher.getEventsByRun(runId, eventTypes);
  }

  // --- Internals ---

  /** Event publishing never changes the outcome of a run; failures are logged. */
  private async safePublish(publish: () => Promise<DataPlaneEvent>): Promise<void> {
    try {
      await publish();
    } catch (err) {
      log.warn('Event publication failed', { error: err instanceof Error ? err.message : String(err) });
    }
  }

  private async safePublishRunEvent(run: Run, eventType: DataPlaneEventType): Promise<void> {
    await this.safePublish(() => this.publisher.publishRunEvent(run, eventType));
  }

  private async persistRun(run: Run): Promise<void> {
    await this.store.runs.update(run.id, run);
  }

  private async transitionRun(run: Run, target: RunStatus): Promise<Run> {
    if (!transitionRunStatus(run.status, target).success) {
      throw new ExecutorError(runInvalidStateTransition(run.id, run.status, target));
    }
    run.status = target;
    run.updatedAt = new Date().toISOString();
    await this.persistRun(run);
    return run;
  }

  private async failRun(run: Run, error: TypedError): Promise<Run> {
    return this.finishRun(run, RunStatus.Failed, error);
  }

  private async finishRun(run: Run, status: RunStatus, error?: TypedError): Promise<Run> {
    run.status = status;
    run.error = error;
    run.completedAt = new Date().toISOString();
    run.updatedAt = run.completedAt;
    await this.persistRun(run);
    const type: DataPlaneEventType =
      status === RunStatus.Succeeded ? 'run.succeeded' : status === RunStatus.Canceled ? 'run.canceled' : 'run.failed';
    await this.safePublishRunEvent(run, type);
    log.info('Run finished', { runId: run.id, status, code: error?.code });
    return run;
  }
}

/** Executor-specific error wrapper. */
export class ExecutorError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'ExecutorError';
  }
}
