/**
 * Workflow definition domain model.
 *
 * A declarative CI document: which events trigger it, and which jobs run.
 * A job may carry a matrix strategy; every combination of its axis values
 * becomes an independent job instance running the same steps.
 */

/** Events a workflow can be triggered by. */
export type TriggerEventName = 'pull_request' | 'push' | 'workflow_dispatch';

export const TRIGGER_EVENT_NAMES: readonly TriggerEventName[] = ['pull_request', 'push', 'workflow_dispatch'];

/** Pull request activity types. */
export type PullRequestActivity = 'opened' | 'synchronize' | 'reopened' | 'closed' | 'edited' | 'labeled' | 'unlabeled';

/** Filter attached to one trigger event under `on:`. */
export interface TriggerFilter {
  event: TriggerEventName;
  /** Branch globs; base branch for pull_request, pushed branch for push. */
  branches?: string[];
  branchesIgnore?: string[];
  /** pull_request activity types. */
  types?: PullRequestActivity[];
}

/** A single matrix axis value as written in the document. */
export type MatrixValue = string | number | boolean;

/** One matrix entry: axis name -> value. */
export type MatrixCombination = Record<string, MatrixValue>;

export interface MatrixDefinition {
  /** Axis name -> ordered values. Axis order is declaration order. */
  axes: Record<string, MatrixValue[]>;
  include: MatrixCombination[];
  exclude: MatrixCombination[];
}

export interface StrategyDefinition {
  matrix: MatrixDefinition;
  /** When true, the first failing instance cancels its siblings. */
  failFast: boolean;
  maxParallel?: number;
}

/** A single step of a job: either an action (`uses`) or a shell script (`run`). */
export interface StepDefinition {
  id?: string;
  name?: string;
  uses?: string;
  run?: string;
  shell?: 'bash' | 'sh';
  workingDirectory?: string;
  with: Record<string, string>;
  env: Record<string, string>;
  if?: string;
  timeoutMinutes?: number;
  continueOnError: boolean;
}

export interface JobDefinition {
  id: string;
  name?: string;
  runsOn: string;
  needs: string[];
  if?: string;
  env: Record<string, string>;
  timeoutMinutes?: number;
  continueOnError: boolean;
  strategy?: StrategyDefinition;
  steps: StepDefinition[];
}

/** The parsed workflow document. */
export interface WorkflowDefinition {
  name: string;
  on: TriggerFilter[];
  env: Record<string, string>;
  /** Jobs in declaration order. */
  jobs: JobDefinition[];
}

/** A workflow registered with the service. */
export interface StoredWorkflow {
  id: string;
  name: string;
  /** Incremented each time the same repository + path is registered again. */
  version: number;
  /** "owner/name" of the repository this workflow belongs to. */
  repository?: string;
  /** Path of the document inside the repository. */
  path?: string;
  /** Original YAML text. */
  source: string;
  definition: WorkflowDefinition;
  createdAt: string;
  updatedAt: string;
}

/** Input for registering a workflow. */
export interface RegisterWorkflowInput {
  source: string;
  repository?: string;
  path?: string;
}
