import fs from 'fs';
import os from 'os';
import path from 'path';
import { parseOutputFile, runScriptAction, shellCommand } from '../../src/actions';
import { makeActionContext, resolvedStep } from './context';

let workspace: string;

beforeEach(() => {
  workspace = fs.mkdtempSync(path.join(os.tmpdir(), 'run-script-'));
});

afterEach(() => fs.rmSync(workspace, { recursive: true, force: true }));

const script = (run: string) => resolvedStep('run', {}, { uses: undefined, run, shell: 'sh' });

describe('shellCommand', () => {
  test('bash runs with pipefail and no profile', () => {
    expect(shellCommand('bash', 'pytest')).toEqual({
      command: 'bash',
      args: ['--noprofile', '--norc', '-e', '-o', 'pipefail', '-c', 'pytest'],
    });
  });

  test('sh runs with -e', () => {
    expect(shellCommand('sh', 'pytest')).toEqual({ command: 'sh', args: ['-e', '-c', 'pytest'] });
  });
});

describe('parseOutputFile', () => {
  test('reads key=value lines and skips the rest', () => {
    expect(parseOutputFile('report=output/a.xml\nnoise\n=empty\ncount=a=b\r\n')).toEqual({
      report: 'output/a.xml',
      count: 'a=b',
    });
  });
});

describe('run steps', () => {
  test('logs output and collects GITHUB_OUTPUT values', async () => {
    const { ctx, log } = makeActionContext(workspace);
    const result = await runScriptAction.execute(
      script('echo hello\necho "type=$TEST_TYPE" >> "$GITHUB_OUTPUT"\necho "ci=$CI" >> "$GITHUB_OUTPUT"'),
      ctx,
    );
    expect(log).toEqual(['hello']);
    expect(result.outputs).toEqual({ type: 'dbutils', ci: 'true' });
  });

  test('runs in the working directory', async () => {
    const { ctx } = makeActionContext(workspace);
    await runScriptAction.execute(script('echo done > marker.txt'), ctx);
    expect(fs.readFileSync(path.join(workspace, 'marker.txt'), 'utf8')).toBe('done\n');
  });

  test('a non-zero exit fails the step', async () => {
    const { ctx } = makeActionContext(workspace);
    await expect(runScriptAction.execute(script('exit 3'), ctx)).rejects.toMatchObject({
      typedError: { code: 'STEP.SCRIPT_FAILED', message: 'Process completed with exit code 3' },
    });
  });

  test('-e stops at the first failing command', async () => {
    const { ctx, log } = makeActionContext(workspace);
    await expect(runScriptAction.execute(script('false\necho unreachable'), ctx)).rejects.toMatchObject({
      typedError: { code: 'STEP.SCRIPT_FAILED' },
    });
    expect(log).toEqual([]);
  });
});
