import path from 'path';
import { localTrigger } from '../../src/cli/commands/run';
import { planCommand } from '../../src/cli/commands/plan';

describe('localTrigger', () => {
  test('pull_request uses base and head', () => {
    expect(localTrigger('pull_request', { source: '.', base: 'main', head: 'topic' })).toEqual({
      event: 'pull_request',
      action: 'opened',
      number: 0,
      baseRef: 'main',
      headRef: 'topic',
      source: { localPath: path.resolve('.') },
      sender: 'local',
    });
  });

  test('push uses base as the branch', () => {
    expect(localTrigger('push', { source: '/src', base: 'release', head: 'local' })).toEqual({
      event: 'push',
      branch: 'release',
      source: { localPath: '/src' },
      sender: 'local',
    });
  });

  test('unknown events are rejected', () => {
    expect(() => localTrigger('schedule', { source: '.', base: 'main', head: 'local' })).toThrow(
      'Unsupported event "schedule" (expected pull_request, push or workflow_dispatch)',
    );
  });
});

describe('plan command', () => {
  afterEach(() => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
  });

  test('prints one line per matrix job', async () => {
    const lines: string[] = [];
    jest.spyOn(console, 'log').mockImplementation((line: string) => {
      lines.push(line);
    });

    await planCommand.parseAsync([path.join(__dirname, '../../examples/pytest-dbutils.yml')], { from: 'user' });

    expect(lines).toEqual(['build (ubuntu-18.04, 3.7)  ubuntu-18.04  {"os":"ubuntu-18.04","python-version":3.7}']);
  });
});
