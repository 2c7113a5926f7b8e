import fs from 'fs';
import path from 'path';
import { reportPath } from '../../src/actions';
import { ActionHandler, registerActionHandler } from '../../src/engine/step-runner';

const noop = (action: string): ActionHandler => ({ action, execute: async () => ({}) });

/** Writes the report pytest would write and passes. */
const fakePytest: ActionHandler = {
  action: 'matrix-ci/pytest',
  execute: async (step, ctx) => {
    const report = reportPath(step.with.test_output_suffix, step.with.os, step.with.python_version);
    await fs.promises.mkdir(path.join(ctx.workingDirectory, 'output'), { recursive: true });
    await fs.promises.writeFile(path.join(ctx.workingDirectory, report), `<testsuite name="${step.with.os}"/>`);
    return { outputs: { 'report-path': report } };
  },
};

/** Replace the actions that need git or python; upload-artifact stays real. */
export function registerFakeActions(): void {
  registerActionHandler(noop('actions/checkout'));
  registerActionHandler(noop('actions/setup-python'));
  registerActionHandler(fakePytest);
}

export const PYTEST_WORKFLOW = [
  'name: Testing dbutils directory',
  'on: [pull_request]',
  'jobs:',
  '  build:',
  '    strategy:',
  '      fail-fast: false',
  '      matrix:',
  '        os: [ubuntu-18.04, macos-latest]',
  "        python-version: ['3.7']",
  '    runs-on: ${{ matrix.os }}',
  '    env:',
  '      TEST_TYPE: dbutils',
  '      CI: true',
  '    steps:',
  '      - uses: actions/checkout@v2',
  '      - uses: actions/setup-python@v2',
  '        with:',
  '          python-version: ${{ matrix.python-version }}',
  '      - uses: matrix-ci/pytest@v1',
  '        timeout-minutes: 600',
  '        with:',
  '          python_version: ${{ matrix.python-version }}',
  '          os: ${{ matrix.os }}',
  '          test_path: tests/${{ env.TEST_TYPE }}',
  '          test_output_suffix: ${{ env.TEST_TYPE }}',
  '      - name: Archive test results',
  '        uses: actions/upload-artifact@v2',
  '        if: always()',
  '        with:',
  '          name: pytest-report',
  '          path: output/${{ env.TEST_TYPE }}-${{ matrix.os }}-${{ matrix.python-version }}-results.xml',
  '',
].join('\n');
