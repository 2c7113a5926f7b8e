/**
 * Run-time event domain model.
 *
 * Every run, job and step transition is published as a versioned event
 * for downstream consumers.
 */

/** Event types emitted by the data plane. */
export type DataPlaneEventType =
  | 'run.created'
  | 'run.queued'
  | 'run.started'
  | 'run.succeeded'
  | 'run.failed'
  | 'run.canceled'
  | 'job.started'
  | 'job.succeeded'
  | 'job.failed'
  | 'job.canceled'
  | 'job.skipped'
  | 'step.started'
  | 'step.succeeded'
  | 'step.failed'
  | 'step.timed_out'
  | 'step.skipped'
  | 'step.canceled'
  | 'artifact.created';

export const DATA_PLANE_EVENT_TYPES: readonly DataPlaneEventType[] = [
  'run.created', 'run.queued', 'run.started', 'run.succeeded', 'run.failed', 'run.canceled',
  'job.started', 'job.succeeded', 'job.failed', 'job.canceled', 'job.skipped',
  'step.started', 'step.succeeded', 'step.failed', 'step.timed_out', 'step.skipped', 'step.canceled',
  'artifact.created',
];

export function isDataPlaneEventType(value: string): value is DataPlaneEventType {
  return (DATA_PLANE_EVENT_TYPES as readonly string[]).includes(value);
}

/** A data plane event with stable schema. */
export interface DataPlaneEvent {
  id: string;
  type: DataPlaneEventType;
  /** Event schema version for forward compatibility. */
  schemaVersion: string;
  timestamp: string;
  runId: string;
  workflowId: string;
  repository?: string;
  jobRunId?: string;
  stepIndex?: number;
  artifactId?: string;
  /** Event-specific payload. */
  payload: Record<string, unknown>;
}

/** Event stream subscription. */
export interface EventSubscription {
  id: string;
  /** Only deliver events of this run. */
  runId?: string;
  /** Filter by event types. */
  eventTypes?: DataPlaneEventType[];
  /** Callback for event delivery. */
  callback: (event: DataPlaneEvent) => void;
}
