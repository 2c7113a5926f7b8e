import fs from 'fs';
import os from 'os';
import path from 'path';
import { AppContext, createApp, createAppContext } from '../../src/server';
import { LogLevel, setLogLevel } from '../../src/logger';
import { PYTEST_WORKFLOW, registerFakeActions } from './fake-actions';
import { TestServer, field, listen, request, stringField } from './request';

const PR_TRIGGER = { event: 'pull_request', action: 'opened', number: 9, baseRef: 'main', headRef: 'feature/dbutils' };

describe('Run API', () => {
  let root: string;
  let ctx: AppContext;
  let server: TestServer;
  let workflowId: string;

  beforeAll(() => setLogLevel(LogLevel.Error));
  afterAll(() => setLogLevel(LogLevel.Info));

  beforeEach(async () => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'api-runs-'));
    ctx = createAppContext({
      config: { workspaceDir: path.join(root, 'ws'), artifactDir: path.join(root, 'artifacts'), webhookSecret: undefined },
    });
    registerFakeActions();
    server = await listen(createApp(ctx));
    const { workflow } = await ctx.executor.registerWorkflow({ source: PYTEST_WORKFLOW, repository: 'octo/dbutils' });
    workflowId = workflow.id;
  });

  afterEach(async () => {
    await server.close();
    fs.rmSync(root, { recursive: true, force: true });
  });

  /** Start a run over HTTP and wait for it to finish. */
  async function completedRun(): Promise<string> {
    const res = await request(server, 'POST', `/api/workflows/${workflowId}/runs`, { json: { trigger: PR_TRIGGER } });
    const runId = stringField(res.body, 'run', 'id');
    await ctx.executor.waitForRun(runId);
    return runId;
  }

  it('POST /api/workflows/:id/runs creates one job per combination', async () => {
    const res = await request(server, 'POST', `/api/workflows/${workflowId}/runs`, { json: { trigger: PR_TRIGGER } });

    expect(res.status).toBe(201);
    expect(field(res.body, 'run', 'status')).toBe('created');
    const jobs = field(res.body, 'run', 'jobs');
    expect(Object.keys(typeof jobs === 'object' && jobs !== null ? jobs : {})).toHaveLength(2);

    await ctx.executor.waitForRun(stringField(res.body, 'run', 'id'));
  });

  it('GET /api/runs/:id reports the finished run', async () => {
    const runId = await completedRun();
    const res = await request(server, 'GET', `/api/runs/${runId}`);
    expect(res.status).toBe(200);
    expect(field(res.body, 'run', 'status')).toBe('succeeded');
    expect(field(res.body, 'run', 'trigger', 'baseRef')).toBe('main');
  });

  it('unknown runs are 404', async () => {
    const res = await request(server, 'GET', '/api/runs/run_missing');
    expect(res.status).toBe(404);
    expect(field(res.body, 'error', 'code')).toBe('RUN.NOT_FOUND');
  });

  it('a trigger the workflow does not listen to is 422', async () => {
    const res = await request(server, 'POST', `/api/workflows/${workflowId}/runs`, {
      json: { trigger: { event: 'push', branch: 'main' } },
    });
    expect(res.status).toBe(422);
    expect(field(res.body, 'error', 'code')).toBe('TRIGGER.NOT_MATCHED');
  });

  it('a dispatch is assumed when no trigger is given', async () => {
    const res = await request(server, 'POST', `/api/workflows/${workflowId}/runs`, { json: {} });
    expect(res.status).toBe(422);
    expect(field(res.body, 'error', 'code')).toBe('TRIGGER.NOT_MATCHED');
  });

  it('incomplete triggers are 400', async () => {
    const res = await request(server, 'POST', `/api/workflows/${workflowId}/runs`, {
      json: { trigger: { event: 'pull_request', headRef: 'topic' } },
    });
    expect(res.status).toBe(400);
    expect(field(res.body, 'error', 'message')).toBe('trigger.baseRef is required');
  });

  it('workflowVersion must be an integer', async () => {
    const res = await request(server, 'POST', `/api/workflows/${workflowId}/runs`, {
      json: { trigger: PR_TRIGGER, workflowVersion: '1' },
    });
    expect(res.status).toBe(400);
    expect(field(res.body, 'error', 'message')).toBe('workflowVersion must be an integer');
  });

  it('POST /api/runs/:id/cancel on a finished run is 409', async () => {
    const runId = await completedRun();
    const res = await request(server, 'POST', `/api/runs/${runId}/cancel`, { json: { reason: 'too late' } });
    expect(res.status).toBe(409);
    expect(field(res.body, 'error', 'code')).toBe('RUN.INVALID_STATE_TRANSITION');
  });

  describe('artifacts', () => {
    it('lists one report per combination and serves its file', async () => {
      const runId = await completedRun();
      const list = await request(server, 'GET', `/api/runs/${runId}/artifacts`);
      expect(list.status).toBe(200);

      const artifacts = field(list.body, 'artifacts');
      const paths = Array.isArray(artifacts) ? artifacts.map((a) => field(a, 'files', 0, 'path')) : [];
      expect(paths.sort()).toEqual([
        'output/dbutils-macos-latest-3.7-results.xml',
        'output/dbutils-ubuntu-18.04-3.7-results.xml',
      ]);

      const ubuntu = Array.isArray(artifacts)
        ? artifacts.find((a) => field(a, 'files', 0, 'path') === 'output/dbutils-ubuntu-18.04-3.7-results.xml')
        : undefined;
      const artifactId = stringField(ubuntu, 'id');

      const record = await request(server, 'GET', `/api/artifacts/${artifactId}`);
      expect(field(record.body, 'artifact', 'name')).toBe('pytest-report');

      const file = await request(server, 'GET', `/api/artifacts/${artifactId}/files/output/dbutils-ubuntu-18.04-3.7-results.xml`);
      expect(file.status).toBe(200);
      expect(file.headers.get('content-type')).toContain('application/xml');
      expect(file.text).toBe('<testsuite name="ubuntu-18.04"/>');
    });

    it('missing files are 404', async () => {
      const runId = await completedRun();
      const list = await request(server, 'GET', `/api/runs/${runId}/artifacts`);
      const artifactId = stringField(list.body, 'artifacts', 0, 'id');
      const res = await request(server, 'GET', `/api/artifacts/${artifactId}/files/output/other.xml`);
      expect(res.status).toBe(404);
    });
  });

  describe('events', () => {
    it('GET /api/runs/:id/events filters by type', async () => {
      const runId = await completedRun();
      const res = await request(server, 'GET', `/api/runs/${runId}/events?types=run.created,run.succeeded`);
      expect(res.status).toBe(200);
      expect(field(res.body, 'total')).toBe(2);
      const events = field(res.body, 'events');
      expect(Array.isArray(events) ? events.map((e) => field(e, 'type')) : events).toEqual([
        'run.created',
        'run.succeeded',
      ]);
    });

    it('each job publishes its lifecycle', async () => {
      const runId = await completedRun();
      const res = await request(server, 'GET', `/api/runs/${runId}/events?types=job.succeeded,artifact.created`);
      expect(field(res.body, 'total')).toBe(4);
    });

    it('unknown event types are 400', async () => {
      const runId = await completedRun();
      const res = await request(server, 'GET', `/api/runs/${runId}/events?types=run.exploded`);
      expect(res.status).toBe(400);
      expect(field(res.body, 'error', 'message')).toBe('Unknown event type "run.exploded"');
    });
  });
});
