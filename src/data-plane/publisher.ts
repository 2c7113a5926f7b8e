/**
 * Run-time Data Plane Publisher.
 *
 * Emits versioned run, job, step and artifact events, persists them, and
 * delivers them to in-process subscribers.
 */

import { v4 as uuid } from 'uuid';
import { Artifact } from '../domain/artifact';
import { DataPlaneEvent, DataPlaneEventType, EventSubscription } from '../domain/events';
import { JobRun, Run } from '../domain/run';
import { logger } from '../logger';
import { Store } from '../storage/store';

export const EVENT_SCHEMA_VERSION = '1.0.0';

const log = logger.child({ module: 'data-plane' });

/** The data plane publisher. */
export class DataPlanePublisher {
  private subscriptions: EventSubscription[] = [];

  constructor(private store: Store) {}

  private baseEvent(run: Run, type: DataPlaneEventType): Omit<DataPlaneEvent, 'payload'> {
    return {
      id: `evt_${uuid()}`,
      type,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      runId: run.id,
      workflowId: run.workflowId,
      repository: run.repository,
    };
  }

  /** Publish a run lifecycle event. */
  async publishRunEvent(run: Run, eventType: DataPlaneEventType): Promise<DataPlaneEvent> {
    return this.publishEvent({
      ...this.baseEvent(run, eventType),
      payload: {
        status: run.status,
        workflowVersion: run.workflowVersion,
        trigger: run.trigger.event,
        error: run.error,
      },
    });
  }

  /** Publish a job lifecycle event. */
  async publishJobEvent(run: Run, job: JobRun, eventType: DataPlaneEventType): Promise<DataPlaneEvent> {
    return this.publishEvent({
      ...this.baseEvent(run, eventType),
      jobRunId: job.id,
      payload: {
        jobId: job.jobId,
        name: job.name,
        matrix: job.matrix,
        status: job.status,
        durationMs: job.durationMs,
        error: job.error,
      },
    });
  }

  /** Publish a step lifecycle event. */
  async publishStepEvent(
    run: Run,
    job: JobRun,
    stepIndex: number,
    eventType: DataPlaneEventType,
  ): Promise<DataPlaneEvent> {
    const step = job.steps[stepIndex];
    return this.publishEvent({
      ...this.baseEvent(run, eventType),
      jobRunId: job.id,
      stepIndex,
      payload: {
        name: step?.name,
        action: step?.action,
        stepStatus: step?.status,
        outcome: step?.outcome,
        durationMs: step?.durationMs,
        error: step?.error,
      },
    });
  }

  /** Publish an artifact.created event. */
  async publishArtifactEvent(run: Run, artifact: Artifact): Promise<DataPlaneEvent> {
    return this.publishEvent({
      ...this.baseEvent(run, 'artifact.created'),
      jobRunId: artifact.jobRunId,
      stepIndex: artifact.stepIndex,
      artifactId: artifact.id,
      payload: {
        name: artifact.name,
        files: artifact.files.map((f) => f.path),
        sizeBytes: artifact.sizeBytes,
      },
    });
  }

  /** Persist an event and deliver it to matching subscribers. */
  async publishEvent(event: DataPlaneEvent): Promise<DataPlaneEvent> {
    await this.store.events.create(event);

    for (const sub of this.subscriptions) {
      if (!this.matchesSubscription(event, sub)) continue;
      try {
        sub.callback(event);
      } catch (err) {
        log.warn('Event subscriber threw', {
          subscriptionId: sub.id,
          eventType: event.type,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    return event;
  }

  /** Subscribe to events. Returns an unsubscribe function. */
  subscribe(subscription: EventSubscription): () => void {
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  /** Query events of a run, optionally filtered by type. */
  async getEventsByRun(runId: string, eventTypes?: DataPlaneEventType[]): Promise<DataPlaneEvent[]> {
    return this.store.events.listByRun(runId, { eventTypes });
  }

  private matchesSubscription(event: DataPlaneEvent, sub: EventSubscription): boolean {
    if (sub.runId && event.runId !== sub.runId) return false;
    if (sub.eventTypes?.length && !sub.eventTypes.includes(event.type)) return false;
    return true;
  }
}
