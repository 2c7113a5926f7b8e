import { JobRunStatus, RunStatus, StepRunStatus } from '../../src/domain/run';
import { RunPlan } from '../../src/dsl/compiler';
import { formatPlan, formatRunSummary } from '../../src/cli/output';
import { createMockJob, createMockRun } from '../fixtures';

describe('formatPlan', () => {
  test('one aligned line per instance', () => {
    const instance = (name: string, os: string) => ({
      key: name,
      name,
      matrix: { os, 'python-version': 3.7 },
      runsOn: os,
      env: {},
      timeoutMs: 1000,
      continueOnError: false,
      steps: [],
    });
    const plan: RunPlan = {
      workflowName: 'Testing dbutils directory',
      planHash: 'abc',
      jobOrder: ['build', 'lint'],
      jobs: {
        build: {
          jobId: 'build',
          needs: [],
          failFast: false,
          instances: [instance('build (ubuntu-18.04, 3.7)', 'ubuntu-18.04'), instance('build (macos-latest, 3.7)', 'macos-latest')],
        },
        lint: { jobId: 'lint', needs: ['build'], failFast: true, instances: [instance('lint', 'ubuntu-latest')] },
      },
    };

    expect(formatPlan(plan)).toEqual([
      'build (ubuntu-18.04, 3.7)  ubuntu-18.04   {"os":"ubuntu-18.04","python-version":3.7}',
      'build (macos-latest, 3.7)  macos-latest   {"os":"macos-latest","python-version":3.7}',
      'lint                       ubuntu-latest  {"os":"ubuntu-latest","python-version":3.7}',
    ]);
  });
});

describe('formatRunSummary', () => {
  test('lists jobs, steps and the run error', () => {
    const failure = { code: 'TEST.FAILED', message: 'pytest exited with 1', retryable: false, suggestedFixes: [] };
    const failed = createMockJob({
      status: JobRunStatus.Failed,
      durationMs: 1500,
      error: failure,
      steps: [
        { index: 0, name: 'Run pytest', action: 'matrix-ci/pytest@v1', status: StepRunStatus.Failed, unconditional: false, outputs: {}, log: [], error: failure },
        { index: 1, name: 'Archive test results', action: 'actions/upload-artifact@v2', status: StepRunStatus.Succeeded, unconditional: true, outputs: {}, log: [] },
      ],
    });
    const passed = createMockJob({
      id: 'job_2',
      name: 'build (macos-latest, 3.7)',
      status: JobRunStatus.Succeeded,
      durationMs: 250,
      steps: [],
    });
    const run = createMockRun({
      status: RunStatus.Failed,
      error: failure,
      jobs: { job_1: failed, job_2: passed },
    });

    expect(formatRunSummary(run)).toEqual([
      'FAILED    build (ubuntu-18.04, 3.7) (1.5s)',
      '  ✗ Run pytest: TEST.FAILED pytest exited with 1',
      '  ✓ Archive test results',
      'SUCCEEDED build (macos-latest, 3.7) (250ms)',
      '',
      'Run run_1 failed: 1 failed, 1 succeeded',
      '  TEST.FAILED: pytest exited with 1',
    ]);
  });
});
