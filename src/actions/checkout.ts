/**
 * actions/checkout: places the triggering revision in the job workspace.
 *
 * A trigger with a clone URL is cloned with git and checked out at its
 * head SHA (or ref). A trigger with only a local path is copied.
 */

import fs from 'fs/promises';
import path from 'path';
import { SourceLocation } from '../domain/trigger';
import { ActionContext, ActionError, ActionHandler, ActionResult, ResolvedStep, actionFailure } from '../engine/step-runner';
import { optionalInput } from './inputs';
import { processEnv, runProcess } from './process';

const SKIPPED_ON_COPY = new Set(['.git', 'node_modules']);

export const checkoutAction: ActionHandler = {
  action: 'actions/checkout',
  description: 'Check out the repository into the workspace',

  async execute(step: ResolvedStep, ctx: ActionContext): Promise<ActionResult> {
    const target = path.resolve(ctx.workspace, optionalInput(step, 'path') ?? '.');
    if (path.relative(ctx.workspace, target).startsWith('..')) {
      throw actionFailure('SOURCE.CHECKOUT_FAILED', `Checkout path "${step.with.path}" is outside the workspace`);
    }

    const source = resolveSource(step, ctx.trigger.source);
    const revision = optionalInput(step, 'ref') ?? source.sha ?? source.ref;

    try {
      if (source.cloneUrl) {
        await cloneRepository(source.cloneUrl, target, revision, ctx);
        ctx.log(`Checked out ${source.cloneUrl}${revision ? ` at ${revision}` : ''}`);
      } else if (source.localPath) {
        await copySource(source.localPath, target);
        ctx.log(`Copied ${source.localPath} into ${target}`);
      } else {
        throw actionFailure('SOURCE.CHECKOUT_FAILED', 'The trigger carries no clone URL or local source path');
      }
    } catch (err) {
      if (err instanceof ActionError) throw err;
      throw actionFailure('SOURCE.CHECKOUT_FAILED', `Checkout failed: ${err instanceof Error ? err.message : String(err)}`, {
        cloneUrl: source.cloneUrl,
        localPath: source.localPath,
        revision,
      });
    }

    return { outputs: { ref: revision ?? '', path: target } };
  },
};

/** `repository:` input overrides the trigger's source. */
function resolveSource(step: ResolvedStep, source: SourceLocation): SourceLocation {
  const repository = optionalInput(step, 'repository');
  if (!repository) return source;
  const cloneUrl = repository.includes('://') || repository.startsWith('git@') ? repository : `https://github.com/${repository}.git`;
  return { cloneUrl };
}

async function git(args: string[], cwd: string, ctx: ActionContext): Promise<void> {
  const result = await runProcess({
    command: 'git',
    args,
    cwd,
    env: processEnv(ctx, { GIT_TERMINAL_PROMPT: '0' }),
    signal: ctx.signal,
    onLine: (line) => ctx.log(line),
  });
  if (result.exitCode !== 0) {
    throw actionFailure('SOURCE.CHECKOUT_FAILED', `git ${args[0]} exited with ${result.exitCode ?? result.signal}`, {
      args,
      exitCode: result.exitCode,
    });
  }
}

async function cloneRepository(cloneUrl: string, target: string, revision: string | undefined, ctx: ActionContext): Promise<void> {
  await fs.mkdir(target, { recursive: true });
  await git(['clone', '--no-tags', '--quiet', cloneUrl, target], ctx.workspace, ctx);
  if (revision) {
    await git(['checkout', '--quiet', '--detach', revision], target, ctx);
  }
}

async function copySource(localPath: string, target: string): Promise<void> {
  const stat = await fs.stat(localPath);
  if (!stat.isDirectory()) {
    throw actionFailure('SOURCE.CHECKOUT_FAILED', `Source path "${localPath}" is not a directory`);
  }
  await fs.cp(localPath, target, {
    recursive: true,
    filter: (src) => !SKIPPED_ON_COPY.has(path.basename(src)) || src === localPath,
  });
}
