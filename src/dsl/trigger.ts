/**
 * Trigger matching: does an incoming event start this workflow?
 */

import { minimatch } from 'minimatch';
import { TriggerEvent, triggerBranch } from '../domain/trigger';
import { TriggerFilter, WorkflowDefinition } from '../domain/workflow';
import { DEFAULT_PULL_REQUEST_TYPES } from './schema';

/**
 * Match a branch against an ordered glob list. Patterns prefixed with `!`
 * un-match; the last matching pattern decides.
 */
export function matchesBranchPatterns(branch: string, patterns: string[]): boolean {
  let matched = false;
  for (const pattern of patterns) {
    if (pattern.startsWith('!')) {
      if (minimatch(branch, pattern.slice(1))) matched = false;
    } else if (minimatch(branch, pattern)) {
      matched = true;
    }
  }
  return matched;
}

function matchesFilter(filter: TriggerFilter, event: TriggerEvent): boolean {
  if (filter.event !== event.event) return false;

  if (event.event === 'pull_request') {
    const types: readonly string[] = filter.types ?? DEFAULT_PULL_REQUEST_TYPES;
    if (!types.includes(event.action)) return false;
  }

  const branch = triggerBranch(event);
  if (filter.branches) {
    if (branch === undefined || !matchesBranchPatterns(branch, filter.branches)) return false;
  }
  if (filter.branchesIgnore && branch !== undefined) {
    if (matchesBranchPatterns(branch, filter.branchesIgnore)) return false;
  }
  return true;
}

/** True when any of the workflow's `on` filters accepts the event. */
export function matchesTrigger(definition: Pick<WorkflowDefinition, 'on'>, event: TriggerEvent): boolean {
  return definition.on.some((filter) => matchesFilter(filter, event));
}
