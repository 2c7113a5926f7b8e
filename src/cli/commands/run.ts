import fs from 'fs/promises';
import path from 'path';
import { Command } from 'commander';
import { RunStatus } from '../../domain/run';
import { TriggerEvent } from '../../domain/trigger';
import { isTriggerEventName } from '../../dsl/schema';
import { ExecutorError } from '../../engine/executor';
import { createAppContext } from '../../server';
import { formatRunSummary } from '../output';
import { ErrorSummary, logToStderr, printErrors } from './shared';

export interface LocalTriggerOptions {
  source: string;
  base: string;
  head: string;
}

/** A trigger for running against a local checkout. */
export function localTrigger(event: string, options: LocalTriggerOptions): TriggerEvent {
  if (!isTriggerEventName(event)) {
    throw new Error(`Unsupported event "${event}" (expected pull_request, push or workflow_dispatch)`);
  }
  const source = { localPath: path.resolve(options.source) };
  switch (event) {
    case 'pull_request':
      return { event, action: 'opened', number: 0, baseRef: options.base, headRef: options.head, source, sender: 'local' };
    case 'push':
      return { event, branch: options.base, source, sender: 'local' };
    case 'workflow_dispatch':
      return { event, ref: options.base, source, sender: 'local' };
  }
}

interface RunOptions {
  event: string;
  source: string;
  base: string;
  head: string;
  json?: boolean;
  keepWorkspaces?: boolean;
  verbose?: boolean;
}

export const runCommand = new Command('run')
  .description('Run a workflow locally against a source directory')
  .argument('<workflow>', 'path to the workflow YAML file')
  .option('--event <name>', 'triggering event', 'pull_request')
  .option('--source <dir>', 'source directory checked out into each job', process.cwd())
  .option('--base <branch>', 'base branch (pull_request) or branch (push)', 'main')
  .option('--head <branch>', 'head branch of the pull request', 'local')
  .option('--keep-workspaces', 'keep job workspaces after the run')
  .option('--json', 'print the finished run as JSON')
  .option('--verbose', 'debug logging on stderr')
  .action(async (file: string, options: RunOptions) => {
    logToStderr(options.verbose ?? false);
    const source = await fs.readFile(file, 'utf8');
    const ctx = createAppContext({
      config: options.keepWorkspaces ? { keepWorkspaces: true } : {},
    });

    try {
      const { workflow, warnings } = await ctx.executor.registerWorkflow({ source, path: file });
      warnings.forEach((warning) => console.error(`warning: ${warning}`));

      const run = await ctx.executor.createRun({
        workflowId: workflow.id,
        trigger: localTrigger(options.event, options),
      });
      const finished = await ctx.executor.executeRun(run.id);

      if (options.json) {
        console.log(JSON.stringify(finished, null, 2));
      } else {
        formatRunSummary(finished).forEach((line) => console.log(line));
      }
      process.exitCode = finished.status === RunStatus.Succeeded ? 0 : 1;
    } catch (err) {
      if (!(err instanceof ExecutorError)) throw err;
      const details = err.typedError.details?.errors;
      printErrors(Array.isArray(details) ? details.filter(isErrorSummary) : [err.typedError]);
      process.exitCode = 2;
    }
  });

function isErrorSummary(value: unknown): value is ErrorSummary {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    typeof value.code === 'string' &&
    'message' in value &&
    typeof value.message === 'string'
  );
}
