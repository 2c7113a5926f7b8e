/**
 * Workflow compiler.
 *
 * Compiles a validated workflow definition into a run plan: jobs in
 * dependency order, each expanded into its matrix instances with every
 * `${{ matrix.* }}` expression already substituted. Expressions over the
 * other contexts are left in place for the job runner.
 */

import { createHash } from 'crypto';
import { TypedError, createTypedError, workflowCompilationError } from '../domain/errors';
import { JobDefinition, MatrixCombination, StepDefinition, WorkflowDefinition } from '../domain/workflow';
import { ExpressionContext, ExpressionError, interpolate, interpolateRecord, isUnconditional } from './expressions';
import { MatrixTooLargeError, expandMatrix, matrixJobName } from './matrix';

/** Default job timeout when neither the document nor the caller sets one. */
export const DEFAULT_JOB_TIMEOUT_MINUTES = 360;

/** A step ready to execute. */
export interface CompiledStep {
  index: number;
  id?: string;
  name: string;
  uses?: string;
  run?: string;
  shell?: 'bash' | 'sh';
  workingDirectory?: string;
  with: Record<string, string>;
  env: Record<string, string>;
  /** The `if:` text; undefined means `success()`. */
  condition?: string;
  /** Condition calls always(). */
  unconditional: boolean;
  timeoutMs?: number;
  continueOnError: boolean;
}

/** One matrix instance of a job. */
export interface PlannedJobInstance {
  /** Stable key within the plan: "<jobId>" or "<jobId>:<n>". */
  key: string;
  name: string;
  matrix: MatrixCombination;
  runsOn: string;
  /** Workflow env merged with job env. */
  env: Record<string, string>;
  condition?: string;
  timeoutMs: number;
  continueOnError: boolean;
  steps: CompiledStep[];
}

export interface PlannedJob {
  jobId: string;
  needs: string[];
  failFast: boolean;
  maxParallel?: number;
  instances: PlannedJobInstance[];
}

/** The compiled plan for one workflow. */
export interface RunPlan {
  workflowName: string;
  /** sha256 of the compiled jobs. */
  planHash: string;
  /** Job ids in dependency order. */
  jobOrder: string[];
  jobs: Record<string, PlannedJob>;
}

export interface CompilationResult {
  success: boolean;
  plan?: RunPlan;
  errors: TypedError[];
}

export interface CompileOptions {
  defaultJobTimeoutMinutes?: number;
}

/** Compile a workflow definition into a run plan. */
export function compileWorkflow(definition: WorkflowDefinition, options: CompileOptions = {}): CompilationResult {
  const jobOrder = topologicalSort(definition.jobs);
  if (!jobOrder) {
    return {
      success: false,
      errors: [workflowCompilationError('Failed to determine job order: cycle detected in "needs"')],
    };
  }

  const defaultTimeoutMinutes = options.defaultJobTimeoutMinutes ?? DEFAULT_JOB_TIMEOUT_MINUTES;
  const jobs: Record<string, PlannedJob> = {};
  const errors: TypedError[] = [];

  for (const job of definition.jobs) {
    try {
      jobs[job.id] = planJob(job, definition.env, defaultTimeoutMinutes);
    } catch (err) {
      if (err instanceof MatrixTooLargeError) {
        errors.push(
          createTypedError({
            code: 'WORKFLOW.MATRIX_TOO_LARGE',
            message: `Job "${job.id}": ${err.message}`,
            retryable: false,
            details: { jobId: job.id, size: err.size },
            suggestedFixes: [{ type: 'REDUCE_MATRIX', params: { jobId: job.id }, description: 'Remove axis values or add exclusions' }],
          }),
        );
      } else if (err instanceof ExpressionError) {
        errors.push(workflowCompilationError(`Job "${job.id}": ${err.message}`));
      } else {
        throw err;
      }
    }
  }

  if (errors.length > 0) {
    return { success: false, errors };
  }

  return {
    success: true,
    plan: {
      workflowName: definition.name,
      planHash: computeHash(JSON.stringify({ jobOrder, jobs })),
      jobOrder,
      jobs,
    },
    errors: [],
  };
}

/**
 * Expanded job instances of every job, in dependency order. Throws the
 * first compilation error as a WorkflowCompileError.
 */
export function planJobs(definition: WorkflowDefinition, options: CompileOptions = {}): PlannedJobInstance[] {
  const result = compileWorkflow(definition, options);
  if (!result.plan) {
    throw new WorkflowCompileError(result.errors);
  }
  const plan = result.plan;
  return plan.jobOrder.flatMap((jobId) => plan.jobs[jobId].instances);
}

/** Thrown by planJobs when the definition does not compile. */
export class WorkflowCompileError extends Error {
  constructor(public readonly errors: TypedError[]) {
    super(errors.map((e) => e.message).join('; '));
    this.name = 'WorkflowCompileError';
  }
}

function planJob(job: JobDefinition, workflowEnv: Record<string, string>, defaultTimeoutMinutes: number): PlannedJob {
  const combinations = expandMatrix(job.strategy?.matrix);
  const instances = combinations.map((matrix, i) =>
    planInstance(job, workflowEnv, matrix, job.strategy ? `${job.id}:${i}` : job.id, defaultTimeoutMinutes),
  );
  return {
    jobId: job.id,
    needs: [...job.needs],
    failFast: job.strategy?.failFast ?? true,
    maxParallel: job.strategy?.maxParallel,
    instances,
  };
}

function planInstance(
  job: JobDefinition,
  workflowEnv: Record<string, string>,
  matrix: MatrixCombination,
  key: string,
  defaultTimeoutMinutes: number,
): PlannedJobInstance {
  const ctx: ExpressionContext = { contexts: { matrix } };
  const onlyMatrix = { onlyContexts: ['matrix'] };

  return {
    key,
    name: matrixJobName(job, matrix),
    matrix: { ...matrix },
    runsOn: interpolate(job.runsOn, ctx, onlyMatrix),
    env: { ...interpolateRecord(workflowEnv, ctx, onlyMatrix), ...interpolateRecord(job.env, ctx, onlyMatrix) },
    condition: job.if,
    timeoutMs: minutesToMs(jobTimeoutMinutes(job, defaultTimeoutMinutes)),
    continueOnError: job.continueOnError,
    steps: job.steps.map((step, index) => compileStep(step, index, ctx)),
  };
}

function compileStep(step: StepDefinition, index: number, ctx: ExpressionContext): CompiledStep {
  const onlyMatrix = { onlyContexts: ['matrix'] };
  const run = step.run === undefined ? undefined : interpolate(step.run, ctx, onlyMatrix);
  const name = step.name !== undefined ? interpolate(step.name, ctx, onlyMatrix) : defaultStepName(step);

  return {
    index,
    id: step.id,
    name,
    uses: step.uses,
    run,
    shell: step.shell,
    workingDirectory: step.workingDirectory,
    with: interpolateRecord(step.with, ctx, onlyMatrix),
    env: interpolateRecord(step.env, ctx, onlyMatrix),
    condition: step.if,
    unconditional: isUnconditional(step.if),
    timeoutMs: step.timeoutMinutes === undefined ? undefined : minutesToMs(step.timeoutMinutes),
    continueOnError: step.continueOnError,
  };
}

/** "Run actions/checkout@v4", or the first line of the script. */
export function defaultStepName(step: Pick<StepDefinition, 'uses' | 'run'>): string {
  if (step.uses) return `Run ${step.uses}`;
  const firstLine = (step.run ?? '').split('\n').find((line) => line.trim() !== '');
  return firstLine ? firstLine.trim() : 'Run script';
}

/**
 * A declared `timeout-minutes` wins. Otherwise the default is extended by
 * every declared step bound, so no step is cut short by the job timer.
 */
export function jobTimeoutMinutes(job: Pick<JobDefinition, 'timeoutMinutes' | 'steps'>, defaultTimeoutMinutes: number): number {
  if (job.timeoutMinutes !== undefined) return job.timeoutMinutes;
  const declaredSteps = job.steps.reduce((sum, step) => sum + (step.timeoutMinutes ?? 0), 0);
  return defaultTimeoutMinutes + declaredSteps;
}

function minutesToMs(minutes: number): number {
  return Math.round(minutes * 60_000);
}

/**
 * Topological sort of jobs by `needs`. Among jobs that are ready at the
 * same time, declaration order wins. Returns null if a cycle is detected.
 */
export function topologicalSort(jobs: Pick<JobDefinition, 'id' | 'needs'>[]): string[] | null {
  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const job of jobs) {
    inDegree.set(job.id, 0);
    dependents.set(job.id, []);
  }

  // If B needs A, then A -> B
  for (const job of jobs) {
    for (const need of new Set(job.needs)) {
      dependents.get(need)?.push(job.id);
      inDegree.set(job.id, (inDegree.get(job.id) ?? 0) + 1);
    }
  }

  const position = new Map(jobs.map((job, i) => [job.id, i]));
  const ready = jobs.filter((job) => inDegree.get(job.id) === 0).map((job) => job.id);
  const order: string[] = [];

  let current = ready.shift();
  while (current !== undefined) {
    order.push(current);
    for (const dependent of dependents.get(current) ?? []) {
      const degree = (inDegree.get(dependent) ?? 0) - 1;
      inDegree.set(dependent, degree);
      if (degree === 0) {
        ready.push(dependent);
        ready.sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
      }
    }
    current = ready.shift();
  }

  return order.length === jobs.length ? order : null;
}

function computeHash(data: string): string {
  return createHash('sha256').update(data).digest('hex');
}
