/**
 * Step runner: executes a single step of a job.
 *
 * Steps are dispatched to action handlers looked up by their `uses`
 * reference (without the `@ref`) or to the `run` handler for scripts.
 * A step is bounded by its own timeout and by the job's abort signal;
 * it is never retried.
 */

import path from 'path';
import { Artifact } from '../domain/artifact';
import {
  TypedError,
  createTypedError,
  noHandlerError,
  stepCanceledError,
  stepTimeoutError,
} from '../domain/errors';
import { StepOutcome, StepRunResult, StepRunStatus } from '../domain/run';
import { TriggerEvent, githubContext } from '../domain/trigger';
import { MatrixCombination } from '../domain/workflow';
import { CompiledStep } from '../dsl/compiler';
import {
  ExprValue,
  ExpressionContext,
  ExpressionError,
  JobStatusView,
  interpolate,
  interpolateRecord,
} from '../dsl/expressions';
import { Logger } from '../logger';

/** Handler key used for `run:` steps. */
export const RUN_ACTION = 'run';

/** Time an interrupted handler gets to wind down before the step is closed. */
const ABORT_GRACE_MS = 5_000;

/** A step with every expression resolved, as handed to its action handler. */
export interface ResolvedStep {
  index: number;
  name: string;
  /** `uses` reference, or "run". */
  action: string;
  uses?: string;
  run?: string;
  shell?: 'bash' | 'sh';
  with: Record<string, string>;
}

/** What an action handler can see and do. */
export interface ActionContext {
  runId: string;
  jobRunId: string;
  stepIndex: number;
  /** Root of the job workspace. */
  workspace: string;
  /** Directory the step runs in. */
  workingDirectory: string;
  /** Job environment merged with the step's `env`. */
  env: Readonly<Record<string, string>>;
  /** Directories prepended to PATH, in order. */
  addedPath: readonly string[];
  /** Prepend a directory to PATH for this and every later step of the job. */
  addPath(dir: string): void;
  matrix: Readonly<MatrixCombination>;
  runsOn: string;
  trigger: TriggerEvent;
  /** Fires when the step times out or the job is canceled. */
  signal: AbortSignal;
  /** Append text to the step log. */
  log(text: string): void;
  /** Persist files from the workspace as a named artifact. */
  uploadArtifact(name: string, files: string[]): Promise<Artifact>;
  logger: Logger;
}

export interface ActionResult {
  outputs?: Record<string, string>;
}

/** Action handler interface: pluggable step implementations. */
export interface ActionHandler {
  /** `owner/name` (matched case-insensitively, `@ref` ignored), or "run". */
  action: string;
  description?: string;
  execute(step: ResolvedStep, context: ActionContext): Promise<ActionResult>;
}

/** Error that action handlers throw to report a categorised failure. */
export class ActionError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'ActionError';
  }
}

/** Shorthand for throwing a categorised action failure. */
export function actionFailure(code: string, message: string, details?: Record<string, unknown>): ActionError {
  return new ActionError(createTypedError({ code, message, retryable: false, details }));
}

/** Registry of action handlers by key. */
const actionHandlers = new Map<string, ActionHandler>();

/** Lookup key of a `uses` reference: "Actions/Checkout@v4" -> "actions/checkout". */
export function actionKey(uses: string): string {
  const at = uses.indexOf('@');
  return (at === -1 ? uses : uses.slice(0, at)).toLowerCase();
}

/** Register an action handler. Replaces any handler with the same key. */
export function registerActionHandler(handler: ActionHandler): void {
  actionHandlers.set(actionKey(handler.action), handler);
}

export function unregisterActionHandler(action: string): boolean {
  return actionHandlers.delete(actionKey(action));
}

/** Get the handler for a `uses` reference or "run". */
export function getActionHandler(usesOrRun: string): ActionHandler | undefined {
  return actionHandlers.get(actionKey(usesOrRun));
}

export function getRegisteredActions(): string[] {
  return [...actionHandlers.keys()].sort();
}

/** Why a step was stopped from outside. */
export interface StepInterruption {
  status: StepRunStatus.TimedOut | StepRunStatus.Canceled;
  error: TypedError;
}

/** Job-level state the job runner provides to each step. */
export interface StepExecutionContext {
  runId: string;
  jobRunId: string;
  workspace: string;
  /** Frozen job environment (workflow env + job env). */
  env: Readonly<Record<string, string>>;
  matrix: Readonly<MatrixCombination>;
  runsOn: string;
  trigger: TriggerEvent;
  /** `steps` expression context built from earlier steps. */
  steps: Record<string, ExprValue>;
  status: JobStatusView;
  /** PATH additions owned by the job. */
  addedPath: string[];
  /** Job-level abort signal; absent for steps that run after the job was stopped. */
  signal?: AbortSignal;
  /** Reason the job-level signal fired. */
  interruption(): StepInterruption | undefined;
  uploadArtifact(stepIndex: number, name: string, files: string[]): Promise<Artifact>;
  /** Number of log lines kept. */
  logLines: number;
  logger: Logger;
}

/** Keeps the last `max` lines written to it. */
export class LogTail {
  private lines: string[] = [];

  constructor(private readonly max: number) {}

  push(text: string): void {
    for (const line of text.replace(/\r?\n$/, '').split(/\r?\n/)) {
      this.lines.push(line);
    }
    if (this.lines.length > this.max) {
      this.lines = this.lines.slice(this.lines.length - this.max);
    }
  }

  toArray(): string[] {
    return [...this.lines];
  }
}

/** `runner.os` value for a runner label. */
export function runnerOs(label: string): string {
  const lower = label.toLowerCase();
  if (lower.startsWith('ubuntu') || lower.includes('linux')) return 'Linux';
  if (lower.startsWith('macos')) return 'macOS';
  if (lower.startsWith('windows')) return 'Windows';
  return label;
}

function jobStatusText(status: JobStatusView): string {
  if (status.canceled) return 'cancelled';
  return status.failed ? 'failure' : 'success';
}

/** Expression context a step's expressions are evaluated in. */
export function stepExpressionContext(
  context: StepExecutionContext,
  env: Readonly<Record<string, string>>,
): ExpressionContext {
  return {
    contexts: {
      matrix: { ...context.matrix },
      env: { ...env },
      github: githubContext(context.trigger),
      runner: { os: runnerOs(context.runsOn), name: context.runsOn, workspace: context.workspace },
      steps: context.steps,
      job: { status: jobStatusText(context.status) },
    },
    status: context.status,
  };
}

function resolveStep(step: CompiledStep, context: StepExecutionContext): { resolved: ResolvedStep; env: Record<string, string> } {
  const stepEnv = interpolateRecord(step.env, stepExpressionContext(context, context.env));
  const env = { ...context.env, ...stepEnv };
  const ctx = stepExpressionContext(context, env);
  return {
    env,
    resolved: {
      index: step.index,
      name: interpolate(step.name, ctx),
      action: step.uses ?? RUN_ACTION,
      uses: step.uses,
      run: step.run === undefined ? undefined : interpolate(step.run, ctx),
      shell: step.shell,
      with: interpolateRecord(step.with, ctx),
    },
  };
}

type Settled =
  | { kind: 'completed'; result: ActionResult }
  | { kind: 'threw'; error: unknown }
  | { kind: 'aborted' };

function waitAtMost(promise: Promise<unknown>, ms: number): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(resolve, ms);
    void promise.then(() => {
      clearTimeout(timer);
      resolve();
    });
  });
}

/** Execute a single step. Never throws; failures are returned on the result. */
export async function executeStep(step: CompiledStep, context: StepExecutionContext): Promise<StepRunResult> {
  const startedAt = new Date().toISOString();
  const startMs = Date.now();
  const tail = new LogTail(context.logLines);
  const log = context.logger.child({ stepIndex: step.index, step: step.name });

  const finish = (
    status: StepRunStatus,
    outcome: StepOutcome,
    extra: { outputs?: Record<string, string>; error?: TypedError; name?: string } = {},
  ): StepRunResult => {
    const completedAt = new Date().toISOString();
    return {
      index: step.index,
      id: step.id,
      name: extra.name ?? step.name,
      action: step.uses ?? RUN_ACTION,
      status,
      outcome,
      unconditional: step.unconditional,
      startedAt,
      completedAt,
      durationMs: Date.now() - startMs,
      outputs: extra.outputs ?? {},
      log: tail.toArray(),
      error: extra.error ? { ...extra.error, runId: context.runId, jobRunId: context.jobRunId, stepIndex: step.index } : undefined,
    };
  };

  let resolved: ResolvedStep;
  let env: Record<string, string>;
  try {
    ({ resolved, env } = resolveStep(step, context));
  } catch (err) {
    if (!(err instanceof ExpressionError)) throw err;
    return finish(StepRunStatus.Failed, 'failure', {
      error: createTypedError({
        code: 'STEP.EXPRESSION_ERROR',
        message: `Cannot evaluate expression "${err.source}": ${err.message}`,
        retryable: false,
      }),
    });
  }

  const handler = getActionHandler(resolved.action);
  if (!handler) {
    log.error('No handler for action', { action: resolved.action });
    return finish(StepRunStatus.Failed, 'failure', { name: resolved.name, error: noHandlerError(step.index, resolved.action) });
  }

  const controller = new AbortController();
  const state: { interruption?: StepInterruption } = {};
  const stop = (reason: StepInterruption): void => {
    if (state.interruption) return;
    state.interruption = reason;
    controller.abort();
  };
  const onJobAbort = (): void => {
    const cause = context.interruption();
    if (cause?.status === StepRunStatus.TimedOut) stop(cause);
    else stop({ status: StepRunStatus.Canceled, error: stepCanceledError(step.index, cause?.error.message) });
  };

  const aborted = new Promise<Settled>((resolve) => {
    controller.signal.addEventListener('abort', () => resolve({ kind: 'aborted' }), { once: true });
  });
  if (context.signal?.aborted) onJobAbort();
  else context.signal?.addEventListener('abort', onJobAbort, { once: true });

  const timeoutMs = step.timeoutMs;
  const timer =
    timeoutMs === undefined
      ? undefined
      : setTimeout(() => stop({ status: StepRunStatus.TimedOut, error: stepTimeoutError(step.index, timeoutMs) }), timeoutMs);

  const actionContext: ActionContext = {
    runId: context.runId,
    jobRunId: context.jobRunId,
    stepIndex: step.index,
    workspace: context.workspace,
    workingDirectory: path.resolve(context.workspace, step.workingDirectory ?? '.'),
    env,
    addedPath: [...context.addedPath],
    addPath: (dir) => {
      context.addedPath.unshift(dir);
    },
    matrix: context.matrix,
    runsOn: context.runsOn,
    trigger: context.trigger,
    signal: controller.signal,
    log: (text) => tail.push(text),
    uploadArtifact: (name, files) => context.uploadArtifact(step.index, name, files),
    logger: log,
  };

  log.info('Step started', { action: resolved.action });

  try {
    const settled: Promise<Settled> = state.interruption
      ? aborted
      : handler.execute(resolved, actionContext).then(
          (result): Settled => ({ kind: 'completed', result }),
          (error: unknown): Settled => ({ kind: 'threw', error }),
        );
    const first = await Promise.race([settled, aborted]);

    const interruption = state.interruption;
    if (interruption) {
      if (first.kind === 'aborted') await waitAtMost(settled, ABORT_GRACE_MS);
      log.warn('Step interrupted', { status: interruption.status, code: interruption.error.code });
      const outcome: StepOutcome = interruption.status === StepRunStatus.Canceled ? 'cancelled' : 'failure';
      return finish(interruption.status, outcome, { name: resolved.name, error: interruption.error });
    }

    if (first.kind === 'completed') {
      log.info('Step succeeded');
      return finish(StepRunStatus.Succeeded, 'success', { name: resolved.name, outputs: first.result.outputs });
    }

    const error =
      first.kind === 'threw' && first.error instanceof ActionError
        ? first.error.typedError
        : createTypedError({
            code: 'STEP.EXECUTION_ERROR',
            message: first.kind === 'threw' && first.error instanceof Error ? first.error.message : 'Unknown step execution error',
            retryable: false,
          });
    log.warn('Step failed', { code: error.code, error: error.message });
    return finish(StepRunStatus.Failed, 'failure', { name: resolved.name, error });
  } finally {
    if (timer) clearTimeout(timer);
    context.signal?.removeEventListener('abort', onJobAbort);
  }
}
