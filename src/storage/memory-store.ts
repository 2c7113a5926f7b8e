/**
 * In-memory storage implementation.
 *
 * Used by the CLI, the default server context and tests. Every read and
 * write goes through deepCopy so callers never share nested objects
 * (job runs, step results) with the store.
 */

import { Artifact } from '../domain/artifact';
import { DataPlaneEvent, DataPlaneEventType } from '../domain/events';
import { Run, RunStatus } from '../domain/run';
import { StoredWorkflow } from '../domain/workflow';
import {
  ArtifactStore,
  EventStore,
  ListOptions,
  ListResult,
  RunStore,
  Store,
  WorkflowStore,
} from './store';

const DEFAULT_LIMIT = 100;

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? DEFAULT_LIMIT;
  return items.slice(offset, offset + limit);
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

class MemoryWorkflowStore implements WorkflowStore {
  private data = new Map<string, StoredWorkflow>();
  /** Track all versions: key = `${id}:${version}` */
  private versions = new Map<string, StoredWorkflow>();

  async create(workflow: StoredWorkflow): Promise<StoredWorkflow> {
    const copy = deepCopy(workflow);
    this.data.set(workflow.id, copy);
    this.versions.set(`${workflow.id}:${workflow.version}`, deepCopy(copy));
    return deepCopy(copy);
  }

  async getById(id: string): Promise<StoredWorkflow | null> {
    const wf = this.data.get(id);
    return wf ? deepCopy(wf) : null;
  }

  async getByIdAndVersion(id: string, version: number): Promise<StoredWorkflow | null> {
    const wf = this.versions.get(`${id}:${version}`);
    return wf ? deepCopy(wf) : null;
  }

  async getByLocation(repository: string, path: string): Promise<StoredWorkflow | null> {
    for (const wf of this.data.values()) {
      if (wf.repository === repository && wf.path === path) return deepCopy(wf);
    }
    return null;
  }

  async update(id: string, workflow: StoredWorkflow): Promise<StoredWorkflow | null> {
    if (!this.data.has(id)) return null;
    const copy = deepCopy(workflow);
    this.data.set(id, copy);
    this.versions.set(`${id}:${workflow.version}`, deepCopy(copy));
    return deepCopy(copy);
  }

  async list(options?: ListOptions & { repository?: string }): Promise<ListResult<StoredWorkflow>> {
    const all = [...this.data.values()].filter(
      (wf) => options?.repository === undefined || wf.repository === options.repository,
    );
    const items = applyListOptions(all, options).map(deepCopy);
    const offset = options?.offset ?? 0;
    const limit = options?.limit ?? DEFAULT_LIMIT;
    return {
      items,
      total: all.length,
      limit,
      offset,
      hasMore: offset + items.length < all.length,
    };
  }

  async delete(id: string): Promise<boolean> {
    if (!this.data.has(id)) return false;
    // Remove all versioned copies
    for (const key of this.versions.keys()) {
      if (key.startsWith(`${id}:`)) {
        this.versions.delete(key);
      }
    }
    return this.data.delete(id);
  }
}

class MemoryRunStore implements RunStore {
  private data = new Map<string, Run>();

  async create(run: Run): Promise<Run> {
    this.data.set(run.id, deepCopy(run));
    return deepCopy(run);
  }

  async getById(id: string): Promise<Run | null> {
    const run = this.data.get(id);
    return run ? deepCopy(run) : null;
  }

  async update(id: string, updates: Partial<Run>): Promise<Run | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated = { ...deepCopy(existing), ...deepCopy(updates), updatedAt: new Date().toISOString() };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async listByWorkflow(workflowId: string, options?: ListOptions & { status?: RunStatus }): Promise<Run[]> {
    const items = [...this.data.values()].filter(
      (r) => r.workflowId === workflowId && (options?.status === undefined || r.status === options.status),
    );
    return applyListOptions(items.map(deepCopy), options);
  }

  async delete(id: string): Promise<boolean> {
    return this.data.delete(id);
  }
}

class MemoryArtifactStore implements ArtifactStore {
  private data = new Map<string, Artifact>();

  async create(artifact: Artifact): Promise<Artifact> {
    this.data.set(artifact.id, deepCopy(artifact));
    return deepCopy(artifact);
  }

  async getById(id: string): Promise<Artifact | null> {
    const art = this.data.get(id);
    return art ? deepCopy(art) : null;
  }

  async listByRun(runId: string): Promise<Artifact[]> {
    return [...this.data.values()].filter((a) => a.runId === runId).map(deepCopy);
  }
}

/** Events are indexed by runId. */
class MemoryEventStore implements EventStore {
  private data: DataPlaneEvent[] = [];
  private runIdIndex = new Map<string, number[]>();

  async create(event: DataPlaneEvent): Promise<DataPlaneEvent> {
    const idx = this.data.length;
    this.data.push(deepCopy(event));
    const indices = this.runIdIndex.get(event.runId) ?? [];
    indices.push(idx);
    this.runIdIndex.set(event.runId, indices);
    return deepCopy(event);
  }

  async listByRun(runId: string, options?: { eventTypes?: DataPlaneEventType[] }): Promise<DataPlaneEvent[]> {
    const indices = this.runIdIndex.get(runId);
    if (!indices) return [];
    const types = options?.eventTypes;
    return indices
      .map((i) => this.data[i])
      .filter((e) => !types?.length || types.includes(e.type))
      .map(deepCopy);
  }
}

/** Create a new in-memory store instance. */
export function createMemoryStore(): Store {
  return {
    workflows: new MemoryWorkflowStore(),
    runs: new MemoryRunStore(),
    artifacts: new MemoryArtifactStore(),
    events: new MemoryEventStore(),
  };
}
