/**
 * DataPlanePublisher: persistence, payloads and subscriptions.
 */

import { createMemoryStore } from '../../src/storage/memory-store';
import { DataPlanePublisher, EVENT_SCHEMA_VERSION } from '../../src/data-plane/publisher';
import { RunStatus } from '../../src/domain/run';
import type { DataPlaneEvent } from '../../src/domain/events';
import { LogLevel, setLogLevel } from '../../src/logger';
import { createMockJob, createMockRun } from '../fixtures';

beforeAll(() => setLogLevel(LogLevel.Error));
afterAll(() => setLogLevel(LogLevel.Info));

describe('DataPlanePublisher', () => {
  it('persists run events with status and trigger', async () => {
    const store = createMemoryStore();
    const publisher = new DataPlanePublisher(store);

    const event = await publisher.publishRunEvent(createMockRun(), 'run.started');

    expect(event.id).toMatch(/^evt_/);
    expect(event.schemaVersion).toBe(EVENT_SCHEMA_VERSION);
    expect(event.repository).toBe('octo/dbutils');
    expect(event.payload).toEqual({ status: RunStatus.Running, workflowVersion: 1, trigger: 'pull_request', error: undefined });

    const stored = await store.events.listByRun('run_1');
    expect(stored.map((e) => e.id)).toEqual([event.id]);
  });

  it('job events carry the matrix combination', async () => {
    const publisher = new DataPlanePublisher(createMemoryStore());
    const event = await publisher.publishJobEvent(createMockRun(), createMockJob(), 'job.started');

    expect(event.jobRunId).toBe('job_1');
    expect(event.payload.name).toBe('build (ubuntu-18.04, 3.7)');
    expect(event.payload.matrix).toEqual({ os: 'ubuntu-18.04', 'python-version': '3.7' });
  });

  it('step events describe the step', async () => {
    const publisher = new DataPlanePublisher(createMemoryStore());
    const event = await publisher.publishStepEvent(createMockRun(), createMockJob(), 0, 'step.started');

    expect(event.stepIndex).toBe(0);
    expect(event.payload.name).toBe('Run pytest');
    expect(event.payload.action).toBe('matrix-ci/pytest@v1');
  });

  it('artifact events list file paths', async () => {
    const publisher = new DataPlanePublisher(createMemoryStore());
    const event = await publisher.publishArtifactEvent(createMockRun(), {
      id: 'art_1',
      runId: 'run_1',
      jobRunId: 'job_1',
      stepIndex: 3,
      name: 'pytest-report',
      files: [{ path: 'output/dbutils-ubuntu-18.04-3.7-results.xml', sizeBytes: 12, sha256: 'abc' }],
      pointer: { kind: 'file-system', uri: '/tmp/art_1' },
      sizeBytes: 12,
      createdAt: '2024-01-01T00:00:00Z',
    });

    expect(event.type).toBe('artifact.created');
    expect(event.artifactId).toBe('art_1');
    expect(event.payload).toEqual({
      name: 'pytest-report',
      files: ['output/dbutils-ubuntu-18.04-3.7-results.xml'],
      sizeBytes: 12,
    });
  });

  it('delivers events to subscribers filtered by run and type', async () => {
    const publisher = new DataPlanePublisher(createMemoryStore());
    const all: DataPlaneEvent[] = [];
    const failures: DataPlaneEvent[] = [];
    publisher.subscribe({ id: 'all', runId: 'run_1', callback: (e) => all.push(e) });
    publisher.subscribe({ id: 'failures', eventTypes: ['run.failed'], callback: (e) => failures.push(e) });

    await publisher.publishRunEvent(createMockRun(), 'run.started');
    await publisher.publishRunEvent(createMockRun({ id: 'run_2' }), 'run.failed');

    expect(all.map((e) => e.type)).toEqual(['run.started']);
    expect(failures.map((e) => e.runId)).toEqual(['run_2']);
  });

  it('a throwing subscriber does not stop publishing', async () => {
    const store = createMemoryStore();
    const publisher = new DataPlanePublisher(store);
    const received: string[] = [];
    publisher.subscribe({
      id: 'bad',
      callback: () => {
        throw new Error('subscriber exploded');
      },
    });
    publisher.subscribe({ id: 'good', callback: (e) => received.push(e.type) });

    await expect(publisher.publishRunEvent(createMockRun(), 'run.succeeded')).resolves.toBeDefined();
    expect(received).toEqual(['run.succeeded']);
    expect(await store.events.listByRun('run_1')).toHaveLength(1);
  });

  it('unsubscribe stops delivery', async () => {
    const publisher = new DataPlanePublisher(createMemoryStore());
    const received: string[] = [];
    const unsubscribe = publisher.subscribe({ id: 'sub', callback: (e) => received.push(e.type) });

    await publisher.publishRunEvent(createMockRun(), 'run.started');
    unsubscribe();
    await publisher.publishRunEvent(createMockRun(), 'run.succeeded');

    expect(received).toEqual(['run.started']);
  });

  it('getEventsByRun filters by type', async () => {
    const publisher = new DataPlanePublisher(createMemoryStore());
    await publisher.publishRunEvent(createMockRun(), 'run.started');
    await publisher.publishJobEvent(createMockRun(), createMockJob(), 'job.started');

    const jobs = await publisher.getEventsByRun('run_1', ['job.started']);
    expect(jobs.map((e) => e.type)).toEqual(['job.started']);
  });
});
