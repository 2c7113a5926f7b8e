/**
 * Storage layer interfaces.
 *
 * Defines the contract for data persistence with pluggable backends.
 */

import { Artifact } from '../domain/artifact';
import { DataPlaneEvent, DataPlaneEventType } from '../domain/events';
import { Run, RunStatus } from '../domain/run';
import { StoredWorkflow } from '../domain/workflow';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Paginated list result with metadata. */
export interface ListResult<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

/**
 * Store interface for workflows. Every registration is kept as its own
 * version; `getById` returns the latest.
 */
export interface WorkflowStore {
  create(workflow: StoredWorkflow): Promise<StoredWorkflow>;
  getById(id: string): Promise<StoredWorkflow | null>;
  getByIdAndVersion(id: string, version: number): Promise<StoredWorkflow | null>;
  /** Latest workflow registered for a repository path. */
  getByLocation(repository: string, path: string): Promise<StoredWorkflow | null>;
  /** Store a new version of an existing workflow. */
  update(id: string, workflow: StoredWorkflow): Promise<StoredWorkflow | null>;
  list(options?: ListOptions & { repository?: string }): Promise<ListResult<StoredWorkflow>>;
  /** Delete a workflow and all its versioned copies. */
  delete(id: string): Promise<boolean>;
}

export interface RunStore {
  create(run: Run): Promise<Run>;
  getById(id: string): Promise<Run | null>;
  update(id: string, run: Partial<Run>): Promise<Run | null>;
  listByWorkflow(workflowId: string, options?: ListOptions & { status?: RunStatus }): Promise<Run[]>;
  delete(id: string): Promise<boolean>;
}

export interface ArtifactStore {
  create(artifact: Artifact): Promise<Artifact>;
  getById(id: string): Promise<Artifact | null>;
  listByRun(runId: string): Promise<Artifact[]>;
}

export interface EventStore {
  create(event: DataPlaneEvent): Promise<DataPlaneEvent>;
  listByRun(runId: string, options?: { eventTypes?: DataPlaneEventType[] }): Promise<DataPlaneEvent[]>;
}

/** Combined store interface. */
export interface Store {
  workflows: WorkflowStore;
  runs: RunStore;
  artifacts: ArtifactStore;
  events: EventStore;
}
