import { JobRun, JobRunStatus, Run, RunStatus, StepRunStatus } from '../src/domain/run';
import { StoredWorkflow } from '../src/domain/workflow';

export function createMockWorkflow(overrides?: Partial<StoredWorkflow>): StoredWorkflow {
  return {
    id: 'wf_1',
    name: 'Testing dbutils directory',
    version: 1,
    repository: 'octo/dbutils',
    path: '.github/workflows/pytest-dbutils.yml',
    source: 'on: pull_request\n',
    definition: {
      name: 'Testing dbutils directory',
      on: [{ event: 'pull_request' }],
      env: {},
      jobs: [],
    },
    createdAt: '2024-01-01T00:00:00Z',
    updatedAt: '2024-01-01T00:00:00Z',
    ...overrides,
  };
}

export function createMockJob(overrides?: Partial<JobRun>): JobRun {
  return {
    id: 'job_1',
    jobId: 'build',
    key: 'build:0',
    name: 'build (ubuntu-18.04, 3.7)',
    matrix: { os: 'ubuntu-18.04', 'python-version': '3.7' },
    runsOn: 'ubuntu-18.04',
    env: { TEST_TYPE: 'dbutils', CI: 'true' },
    status: JobRunStatus.Running,
    steps: [
      {
        index: 0,
        name: 'Run pytest',
        action: 'matrix-ci/pytest@v1',
        status: StepRunStatus.Running,
        unconditional: false,
        outputs: {},
        log: [],
      },
    ],
    artifactIds: [],
    ...overrides,
  };
}

export function createMockRun(overrides?: Partial<Run>): Run {
  const job = createMockJob();
  return {
    id: 'run_1',
    workflowId: 'wf_1',
    workflowVersion: 1,
    workflowName: 'Testing dbutils directory',
    repository: 'octo/dbutils',
    trigger: { event: 'pull_request', action: 'opened', number: 5, baseRef: 'main', headRef: 'topic', source: {} },
    status: RunStatus.Running,
    createdAt: '2024-01-01T00:00:00Z',
    updatedAt: '2024-01-01T00:00:00Z',
    jobs: { [job.id]: job },
    ...overrides,
  };
}
