/**
 * actions/setup-python: finds an interpreter for `python-version` and puts
 * its directory on PATH for the remaining steps of the job.
 */

import path from 'path';
import { ActionContext, ActionHandler, ResolvedStep, actionFailure } from '../engine/step-runner';
import { requireInput } from './inputs';
import { findExecutable, processEnv, runProcess } from './process';

/** Executable names tried for a version, most specific first. */
export function interpreterCandidates(version: string): string[] {
  const major = version.split('.')[0];
  const names = [`python${version}`, `python${major}`, 'python3', 'python'];
  return [...new Set(names)];
}

/** "3.7" matches "3.7.12" and "3.7", not "3.70.1". */
export function versionMatches(requested: string, reported: string): boolean {
  return reported === requested || reported.startsWith(`${requested}.`);
}

/** The version printed by `python --version` ("Python 3.7.12"). */
export function parseVersionOutput(output: string): string | undefined {
  return /Python\s+(\d+(?:\.\d+)*)/.exec(output)?.[1];
}

async function interpreterVersion(file: string, ctx: ActionContext): Promise<string | undefined> {
  const output: string[] = [];
  const result = await runProcess({
    command: file,
    args: ['--version'],
    cwd: ctx.workspace,
    env: processEnv(ctx),
    signal: ctx.signal,
    onLine: (line) => output.push(line),
  });
  if (result.exitCode !== 0) return undefined;
  return parseVersionOutput(output.join('\n'));
}

export const setupPythonAction: ActionHandler = {
  action: 'actions/setup-python',
  description: 'Select a Python interpreter by version',

  async execute(step: ResolvedStep, ctx: ActionContext) {
    const requested = requireInput(step, 'python-version');
    const searchPath = processEnv(ctx).PATH;
    const tried: string[] = [];

    for (const name of interpreterCandidates(requested)) {
      const file = await findExecutable([name], searchPath);
      if (!file || tried.includes(file)) continue;
      tried.push(file);

      const reported = await interpreterVersion(file, ctx);
      if (reported && versionMatches(requested, reported)) {
        ctx.addPath(path.dirname(file));
        ctx.log(`Using Python ${reported} at ${file}`);
        return { outputs: { 'python-version': reported, 'python-path': file } };
      }
      ctx.log(`${file} reports ${reported ?? 'no version'}, not ${requested}`);
    }

    throw actionFailure('PROVISION.INTERPRETER_NOT_FOUND', `No Python ${requested} interpreter found on PATH`, {
      requested,
      tried,
    });
  },
};
