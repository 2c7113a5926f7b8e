/**
 * matrix-ci/pytest: runs the test suite for one matrix combination and
 * writes a JUnit XML report named after it.
 */

import fs from 'fs/promises';
import path from 'path';
import { ActionHandler, ResolvedStep, ActionContext, actionFailure } from '../engine/step-runner';
import { optionalInput, requireInput } from './inputs';
import { ProcessResult, findExecutable, processEnv, runProcess, splitArgs } from './process';
import { interpreterCandidates } from './setup-python';

export const REPORT_DIR = 'output';

/** `output/{suffix}-{os}-{pythonVersion}-results.xml` */
export function reportPath(suffix: string, os: string, pythonVersion: string): string {
  return `${REPORT_DIR}/${suffix}-${os}-${pythonVersion}-results.xml`;
}

async function resolvePython(step: ResolvedStep, ctx: ActionContext, version: string): Promise<string> {
  const explicit = optionalInput(step, 'python');
  if (explicit) return explicit;
  return (await findExecutable(interpreterCandidates(version), processEnv(ctx).PATH)) ?? 'python';
}

export const pytestAction: ActionHandler = {
  action: 'matrix-ci/pytest',
  description: 'Run pytest and write a JUnit XML report per matrix combination',

  async execute(step, ctx) {
    const pythonVersion = requireInput(step, 'python_version');
    const os = requireInput(step, 'os');
    const testPath = requireInput(step, 'test_path');
    const suffix = requireInput(step, 'test_output_suffix');

    const report = reportPath(suffix, os, pythonVersion);
    await fs.mkdir(path.join(ctx.workingDirectory, path.dirname(report)), { recursive: true });

    const python = await resolvePython(step, ctx, pythonVersion);
    const args = ['-m', 'pytest', testPath, `--junitxml=${report}`, ...splitArgs(step.with.args)];
    ctx.logger.info('Running tests', { python, testPath, report });

    let result: ProcessResult;
    try {
      result = await runProcess({
        command: python,
        args,
        cwd: ctx.workingDirectory,
        env: processEnv(ctx),
        signal: ctx.signal,
        onLine: (line) => ctx.log(line),
      });
    } catch (err) {
      throw actionFailure('TEST.FAILED', `Cannot start ${python}: ${err instanceof Error ? err.message : String(err)}`, {
        python,
      });
    }

    if (result.aborted) {
      throw actionFailure('TEST.ABORTED', 'Test run was stopped', { reportPath: report });
    }
    if (result.exitCode !== 0) {
      throw actionFailure('TEST.FAILED', `pytest exited with ${result.exitCode ?? result.signal}`, {
        exitCode: result.exitCode,
        reportPath: report,
      });
    }
    return { outputs: { 'report-path': report } };
  },
};
