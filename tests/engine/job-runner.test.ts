import fs from 'fs';
import os from 'os';
import path from 'path';
import { Artifact } from '../../src/domain/artifact';
import { DataPlaneEventType } from '../../src/domain/events';
import { JobRun, JobRunStatus, StepRunStatus } from '../../src/domain/run';
import { CompiledStep, PlannedJobInstance } from '../../src/dsl/compiler';
import { JobRunHooks, RunJobOptions, pendingStep, runJob } from '../../src/engine/job-runner';
import { actionFailure, registerActionHandler, unregisterActionHandler } from '../../src/engine/step-runner';
import { LogLevel, createLogger, setLogLevel } from '../../src/logger';
import { PersistArtifactInput } from '../../src/storage/artifact-storage';

function step(index: number, uses: string, overrides: Partial<CompiledStep> = {}): CompiledStep {
  return {
    index,
    name: `step ${index}`,
    uses,
    with: {},
    env: {},
    unconditional: false,
    continueOnError: false,
    ...overrides,
  };
}

const archive = (index: number): CompiledStep =>
  step(index, 'test/archive@v1', { condition: 'always()', unconditional: true });

function makeInstance(steps: CompiledStep[], overrides: Partial<PlannedJobInstance> = {}): PlannedJobInstance {
  return {
    key: 'build:0',
    name: 'build (ubuntu-18.04, 3.7)',
    matrix: { os: 'ubuntu-18.04', 'python-version': '3.7' },
    runsOn: 'ubuntu-18.04',
    env: { TEST_TYPE: 'dbutils', CI: 'true' },
    timeoutMs: 60_000,
    continueOnError: false,
    steps,
    ...overrides,
  };
}

function makeJob(instance: PlannedJobInstance): JobRun {
  return {
    id: 'job_1',
    jobId: 'build',
    key: instance.key,
    name: instance.name,
    matrix: instance.matrix,
    runsOn: instance.runsOn,
    env: instance.env,
    status: JobRunStatus.Pending,
    steps: instance.steps.map(pendingStep),
    artifactIds: [],
  };
}

interface Recorded {
  events: Array<{ type: DataPlaneEventType; stepIndex?: number }>;
  persisted: PersistArtifactInput[];
}

let workspaceRoot: string;

function options(instance: PlannedJobInstance, recorded: Recorded, overrides: Partial<RunJobOptions> = {}): RunJobOptions {
  const hooks: JobRunHooks = {
    onTransition: async (_job, type, stepIndex) => {
      recorded.events.push({ type, stepIndex });
    },
    saveArtifact: async (input) => {
      recorded.persisted.push(input);
      const artifact: Artifact = {
        id: `art_${recorded.persisted.length}`,
        runId: input.runId,
        jobRunId: input.jobRunId,
        stepIndex: input.stepIndex,
        name: input.name,
        files: [],
        pointer: { kind: 'file-system', uri: '/dev/null' },
        sizeBytes: 0,
        createdAt: new Date().toISOString(),
      };
      return artifact;
    },
  };
  return {
    runId: 'run_1',
    trigger: { event: 'pull_request', action: 'opened', number: 1, baseRef: 'main', headRef: 'topic', source: {} },
    instance,
    job: makeJob(instance),
    workspaceRoot,
    keepWorkspaces: false,
    stepLogLines: 50,
    hooks,
    logger: createLogger({ test: 'job-runner' }),
    ...overrides,
  };
}

function newRecorded(): Recorded {
  return { events: [], persisted: [] };
}

/** Environment each step saw, by step index. */
const seenEnv: Record<number, Record<string, string>> = {};

/** Called once when the next test/hang step starts. */
const onHangStart: Array<() => void> = [];

beforeAll(() => {
  setLogLevel(LogLevel.Error);
  workspaceRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'job-runner-'));
  registerActionHandler({
    action: 'test/ok',
    execute: async (resolved, ctx) => {
      seenEnv[resolved.index] = { ...ctx.env };
      return { outputs: { workspace: ctx.workspace } };
    },
  });
  registerActionHandler({
    action: 'test/fail',
    execute: async () => {
      throw actionFailure('TEST.FAILED', 'pytest exited with 1');
    },
  });
  registerActionHandler({
    action: 'test/hang',
    execute: (_resolved, ctx) =>
      new Promise((resolve) => {
        ctx.signal.addEventListener('abort', () => resolve({}), { once: true });
        onHangStart.splice(0).forEach((fn) => fn());
      }),
  });
  registerActionHandler({
    action: 'test/archive',
    execute: async (resolved, ctx) => {
      seenEnv[resolved.index] = { ...ctx.env };
      const artifact = await ctx.uploadArtifact('pytest-report', [path.join(ctx.workspace, 'output', 'report.xml')]);
      return { outputs: { 'artifact-id': artifact.id } };
    },
  });
});

afterAll(() => {
  setLogLevel(LogLevel.Info);
  ['test/ok', 'test/fail', 'test/hang', 'test/archive'].forEach(unregisterActionHandler);
  fs.rmSync(workspaceRoot, { recursive: true, force: true });
});

describe('runJob', () => {
  test('runs every step in order and succeeds', async () => {
    const recorded = newRecorded();
    const instance = makeInstance([step(0, 'test/ok@v1'), step(1, 'test/ok@v1'), archive(2)]);
    const job = await runJob(options(instance, recorded));

    expect(job.status).toBe(JobRunStatus.Succeeded);
    expect(job.steps.map((s) => s.status)).toEqual([
      StepRunStatus.Succeeded,
      StepRunStatus.Succeeded,
      StepRunStatus.Succeeded,
    ]);
    expect(job.artifactIds).toEqual(['art_1']);
    expect(recorded.events.map((e) => e.type)).toEqual([
      'job.started',
      'step.started',
      'step.succeeded',
      'step.started',
      'step.succeeded',
      'step.started',
      'step.succeeded',
      'job.succeeded',
    ]);
  });

  test('every step sees the job environment', async () => {
    const instance = makeInstance([step(0, 'test/ok@v1'), archive(1)]);
    await runJob(options(instance, newRecorded()));
    expect(seenEnv[0]).toEqual({ TEST_TYPE: 'dbutils', CI: 'true' });
    expect(seenEnv[1]).toEqual({ TEST_TYPE: 'dbutils', CI: 'true' });
  });

  test('the workspace is per job and removed afterwards', async () => {
    const instance = makeInstance([step(0, 'test/ok@v1')]);
    const job = await runJob(options(instance, newRecorded()));
    const workspace = path.join(workspaceRoot, 'run_1', 'job_1');
    expect(job.steps[0].outputs.workspace).toBe(workspace);
    expect(fs.existsSync(workspace)).toBe(false);
  });

  test('keepWorkspaces leaves the workspace in place', async () => {
    const instance = makeInstance([step(0, 'test/ok@v1')]);
    await runJob(options(instance, newRecorded(), { keepWorkspaces: true, runId: 'run_keep' }));
    expect(fs.existsSync(path.join(workspaceRoot, 'run_keep', 'job_1'))).toBe(true);
  });

  test('a failing step skips the rest but the archival step still runs', async () => {
    const recorded = newRecorded();
    const instance = makeInstance([step(0, 'test/fail@v1'), step(1, 'test/ok@v1'), archive(2)]);
    const job = await runJob(options(instance, recorded));

    expect(job.status).toBe(JobRunStatus.Failed);
    expect(job.error?.code).toBe('TEST.FAILED');
    expect(job.steps.map((s) => s.status)).toEqual([
      StepRunStatus.Failed,
      StepRunStatus.Skipped,
      StepRunStatus.Succeeded,
    ]);
    expect(recorded.persisted.map((p) => p.name)).toEqual(['pytest-report']);
  });

  test('continue-on-error steps do not fail the job', async () => {
    const instance = makeInstance([step(0, 'test/fail@v1', { continueOnError: true }), step(1, 'test/ok@v1')]);
    const job = await runJob(options(instance, newRecorded()));
    expect(job.status).toBe(JobRunStatus.Succeeded);
    expect(job.steps[0].status).toBe(StepRunStatus.Failed);
    expect(job.steps[1].status).toBe(StepRunStatus.Succeeded);
  });

  test('a failing always() step leaves the job status alone', async () => {
    const instance = makeInstance([
      step(0, 'test/ok@v1'),
      step(1, 'test/fail@v1', { condition: 'always()', unconditional: true }),
    ]);
    const job = await runJob(options(instance, newRecorded()));
    expect(job.status).toBe(JobRunStatus.Succeeded);
    expect(job.steps[1].status).toBe(StepRunStatus.Failed);
  });

  test('a step timeout fails the job and archival still runs', async () => {
    const recorded = newRecorded();
    const instance = makeInstance([step(0, 'test/hang@v1', { timeoutMs: 20 }), step(1, 'test/ok@v1'), archive(2)]);
    const job = await runJob(options(instance, recorded));

    expect(job.status).toBe(JobRunStatus.Failed);
    expect(job.error?.code).toBe('STEP.TIMEOUT');
    expect(job.steps.map((s) => s.status)).toEqual([
      StepRunStatus.TimedOut,
      StepRunStatus.Skipped,
      StepRunStatus.Succeeded,
    ]);
    expect(recorded.events.map((e) => e.type)).toContain('step.timed_out');
  });

  test('the job timeout interrupts the running step', async () => {
    const instance = makeInstance([step(0, 'test/hang@v1'), archive(1)], { timeoutMs: 200 });
    const job = await runJob(options(instance, newRecorded()));

    expect(job.status).toBe(JobRunStatus.Failed);
    expect(job.error?.code).toBe('JOB.TIMEOUT');
    expect(job.steps[0].status).toBe(StepRunStatus.TimedOut);
    expect(job.steps[1].status).toBe(StepRunStatus.Succeeded);
  });

  test('run cancellation cancels the job and archival still runs', async () => {
    const controller = new AbortController();
    const instance = makeInstance([step(0, 'test/hang@v1'), step(1, 'test/ok@v1'), archive(2)]);
    onHangStart.push(() => controller.abort());
    const job = await runJob(
      options(instance, newRecorded(), { signal: controller.signal, cancelReason: () => 'superseded' }),
    );

    expect(job.status).toBe(JobRunStatus.Canceled);
    expect(job.error?.code).toBe('JOB.CANCELED');
    expect(job.error?.message).toBe('Job canceled: superseded');
    expect(job.steps.map((s) => s.status)).toEqual([
      StepRunStatus.Canceled,
      StepRunStatus.Skipped,
      StepRunStatus.Succeeded,
    ]);
  });

  test('step conditions see matrix values', async () => {
    const instance = makeInstance([
      step(0, 'test/ok@v1', { condition: "matrix.os == 'macos-latest'" }),
      step(1, 'test/ok@v1', { condition: "matrix.python-version == '3.7'" }),
    ]);
    const job = await runJob(options(instance, newRecorded()));
    expect(job.steps.map((s) => s.status)).toEqual([StepRunStatus.Skipped, StepRunStatus.Succeeded]);
  });

  test('unknown runner labels fail the job without running steps', async () => {
    const instance = makeInstance([step(0, 'test/ok@v1'), archive(1)]);
    const job = await runJob(options(instance, newRecorded(), { runnerLabels: ['ubuntu-22.04'] }));
    expect(job.status).toBe(JobRunStatus.Failed);
    expect(job.error?.code).toBe('RUNNER.UNAVAILABLE');
    expect(job.steps.map((s) => s.status)).toEqual([StepRunStatus.Skipped, StepRunStatus.Skipped]);
  });
});
