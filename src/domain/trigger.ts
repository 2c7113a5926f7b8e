/**
 * Trigger events (runtime).
 *
 * The event that caused a run. Pull requests are the primary trigger;
 * push and manual dispatch are accepted for completeness.
 */

import { PullRequestActivity } from './workflow';

/** Where the source for checkout comes from. */
export interface SourceLocation {
  /** Git URL to clone. */
  cloneUrl?: string;
  /** Local directory to copy when no clone URL is given. */
  localPath?: string;
  /** Commit to check out. */
  sha?: string;
  /** Branch or ref name. */
  ref?: string;
}

export interface PullRequestTrigger {
  event: 'pull_request';
  action: PullRequestActivity;
  number: number;
  /** Branch the PR targets. */
  baseRef: string;
  /** Branch the PR comes from. */
  headRef: string;
  headSha?: string;
  repository?: string;
  source: SourceLocation;
  sender?: string;
}

export interface PushTrigger {
  event: 'push';
  /** Pushed branch name (without refs/heads/). */
  branch: string;
  sha?: string;
  repository?: string;
  source: SourceLocation;
  sender?: string;
}

export interface DispatchTrigger {
  event: 'workflow_dispatch';
  ref?: string;
  repository?: string;
  source: SourceLocation;
  sender?: string;
}

export type TriggerEvent = PullRequestTrigger | PushTrigger | DispatchTrigger;

/** The branch a trigger is evaluated against for `branches:` filters. */
export function triggerBranch(trigger: TriggerEvent): string | undefined {
  switch (trigger.event) {
    case 'pull_request':
      return trigger.baseRef;
    case 'push':
      return trigger.branch;
    case 'workflow_dispatch':
      return trigger.ref;
  }
}

/** Build the `github` expression context for a trigger. */
export function githubContext(trigger: TriggerEvent): Record<string, string> {
  const ctx: Record<string, string> = {
    event_name: trigger.event,
    repository: trigger.repository ?? '',
    actor: trigger.sender ?? '',
  };
  switch (trigger.event) {
    case 'pull_request':
      ctx.ref = `refs/pull/${trigger.number}/merge`;
      ctx.head_ref = trigger.headRef;
      ctx.base_ref = trigger.baseRef;
      ctx.sha = trigger.headSha ?? trigger.source.sha ?? '';
      break;
    case 'push':
      ctx.ref = `refs/heads/${trigger.branch}`;
      ctx.sha = trigger.sha ?? trigger.source.sha ?? '';
      break;
    case 'workflow_dispatch':
      ctx.ref = trigger.ref ? `refs/heads/${trigger.ref}` : '';
      ctx.sha = trigger.source.sha ?? '';
      break;
  }
  return ctx;
}
