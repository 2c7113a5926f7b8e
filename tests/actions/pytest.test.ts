import fs from 'fs';
import os from 'os';
import path from 'path';
import { pytestAction, reportPath, splitArgs } from '../../src/actions';
import { LogLevel, setLogLevel } from '../../src/logger';
import { makeActionContext, resolvedStep } from './context';

/** Stands in for python: writes the --junitxml report, echoes its test path and exits with $FAKE_EXIT. */
const FAKE_PYTHON = [
  '#!/bin/sh',
  'for arg in "$@"; do',
  '  case "$arg" in',
  '    --junitxml=*) report="${arg#--junitxml=}" ;;',
  '  esac',
  'done',
  'echo "<testsuite/>" > "$report"',
  'echo "collected $3"',
  'exit "${FAKE_EXIT:-0}"',
  '',
].join('\n');

let workspace: string;
let python: string;

const INPUTS = {
  python_version: '3.7',
  os: 'ubuntu-18.04',
  test_path: 'tests/dbutils',
  test_output_suffix: 'dbutils',
};

beforeAll(() => setLogLevel(LogLevel.Error));
afterAll(() => setLogLevel(LogLevel.Info));

beforeEach(() => {
  workspace = fs.mkdtempSync(path.join(os.tmpdir(), 'pytest-'));
  python = path.join(workspace, 'fake-python');
  fs.writeFileSync(python, FAKE_PYTHON);
  fs.chmodSync(python, 0o755);
});

afterEach(() => fs.rmSync(workspace, { recursive: true, force: true }));

describe('reportPath', () => {
  test('names the report after the combination', () => {
    expect(reportPath('dbutils', 'ubuntu-18.04', '3.7')).toBe('output/dbutils-ubuntu-18.04-3.7-results.xml');
    expect(reportPath('unit', 'macos-latest', '3.10')).toBe('output/unit-macos-latest-3.10-results.xml');
  });
});

describe('splitArgs', () => {
  test('keeps quoted groups together', () => {
    expect(splitArgs('-x -k "not slow" --maxfail=2')).toEqual(['-x', '-k', 'not slow', '--maxfail=2']);
    expect(splitArgs(undefined)).toEqual([]);
  });
});

describe('matrix-ci/pytest', () => {
  test('writes the report for the combination', async () => {
    const { ctx, log } = makeActionContext(workspace);
    const result = await pytestAction.execute(resolvedStep('matrix-ci/pytest@v1', { ...INPUTS, python }), ctx);

    expect(result.outputs).toEqual({ 'report-path': 'output/dbutils-ubuntu-18.04-3.7-results.xml' });
    expect(fs.readFileSync(path.join(workspace, 'output/dbutils-ubuntu-18.04-3.7-results.xml'), 'utf8')).toBe(
      '<testsuite/>\n',
    );
    expect(log).toEqual(['collected tests/dbutils']);
  });

  test('test failures fail the step but keep the report', async () => {
    const { ctx } = makeActionContext(workspace, { env: { TEST_TYPE: 'dbutils', CI: 'true', FAKE_EXIT: '1' } });
    await expect(
      pytestAction.execute(resolvedStep('matrix-ci/pytest@v1', { ...INPUTS, python }), ctx),
    ).rejects.toMatchObject({
      typedError: { code: 'TEST.FAILED', message: 'pytest exited with 1' },
    });
    expect(fs.existsSync(path.join(workspace, 'output/dbutils-ubuntu-18.04-3.7-results.xml'))).toBe(true);
  });

  test('a missing interpreter fails the step', async () => {
    const { ctx } = makeActionContext(workspace);
    const missing = path.join(workspace, 'no-such-python');
    await expect(
      pytestAction.execute(resolvedStep('matrix-ci/pytest@v1', { ...INPUTS, python: missing }), ctx),
    ).rejects.toMatchObject({
      typedError: { code: 'TEST.FAILED' },
    });
  });

  test('every combination input is required', async () => {
    const { ctx } = makeActionContext(workspace);
    const withoutOs = { python_version: '3.7', test_path: 'tests/dbutils', test_output_suffix: 'dbutils' };
    await expect(pytestAction.execute(resolvedStep('matrix-ci/pytest@v1', withoutOs), ctx)).rejects.toMatchObject({
      typedError: { code: 'STEP.INVALID_INPUT', message: 'Input "os" is required for matrix-ci/pytest@v1' },
    });
  });
});
