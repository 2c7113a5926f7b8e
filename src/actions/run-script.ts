/**
 * `run:` steps: the script runs in a fresh shell in the step's working
 * directory. Lines the script appends to the file named by `$GITHUB_OUTPUT`
 * (`key=value`) become step outputs.
 */

import fs from 'fs/promises';
import path from 'path';
import { ActionHandler, RUN_ACTION, actionFailure } from '../engine/step-runner';
import { processEnv, runProcess } from './process';

/** Shell invocation for a script. */
export function shellCommand(shell: 'bash' | 'sh', script: string): { command: string; args: string[] } {
  if (shell === 'sh') {
    return { command: 'sh', args: ['-e', '-c', script] };
  }
  return { command: 'bash', args: ['--noprofile', '--norc', '-e', '-o', 'pipefail', '-c', script] };
}

/** Parse `key=value` lines of an outputs file. */
export function parseOutputFile(content: string): Record<string, string> {
  const outputs: Record<string, string> = {};
  for (const line of content.split(/\r?\n/)) {
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    outputs[line.slice(0, eq).trim()] = line.slice(eq + 1);
  }
  return outputs;
}

export const runScriptAction: ActionHandler = {
  action: RUN_ACTION,
  description: 'Run a shell script',

  async execute(step, ctx) {
    const script = step.run ?? '';
    const stateDir = path.join(ctx.workspace, '.matrix-ci');
    await fs.mkdir(stateDir, { recursive: true });
    const outputFile = path.join(stateDir, `output-${ctx.stepIndex}`);
    await fs.writeFile(outputFile, '');

    const { command, args } = shellCommand(step.shell ?? 'bash', script);
    const result = await runProcess({
      command,
      args,
      cwd: ctx.workingDirectory,
      env: processEnv(ctx, { GITHUB_OUTPUT: outputFile }),
      signal: ctx.signal,
      onLine: (line) => ctx.log(line),
    }).catch((err: unknown) => {
      throw actionFailure('STEP.SCRIPT_FAILED', `Cannot start ${command}: ${err instanceof Error ? err.message : String(err)}`, {
        shell: command,
      });
    });

    if (result.exitCode !== 0) {
      throw actionFailure(
        'STEP.SCRIPT_FAILED',
        result.aborted ? 'Script was stopped' : `Process completed with exit code ${result.exitCode ?? result.signal}`,
        { exitCode: result.exitCode, signal: result.signal },
      );
    }

    return { outputs: parseOutputFile(await fs.readFile(outputFile, 'utf8')) };
  },
};
