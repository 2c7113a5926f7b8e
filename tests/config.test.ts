import path from 'path';
import { ConfigError, loadConfig } from '../src/config';
import { LogLevel } from '../src/logger';

describe('loadConfig', () => {
  test('defaults with an empty environment', () => {
    const config = loadConfig({});
    expect(config.port).toBe(5000);
    expect(config.logLevel).toBe(LogLevel.Info);
    expect(config.keepWorkspaces).toBe(false);
    expect(config.maxConcurrentJobs).toBe(4);
    expect(config.defaultJobTimeoutMinutes).toBe(360);
    expect(config.stepLogLines).toBe(500);
    expect(config.artifactDir).toBe(path.join(process.cwd(), '.matrix-ci', 'artifacts'));
    expect(config.webhookSecret).toBeUndefined();
    expect(config.runnerLabels).toBeUndefined();
  });

  test('reads every variable', () => {
    const config = loadConfig({
      PORT: '8080',
      MATRIX_CI_LOG_LEVEL: 'DEBUG',
      MATRIX_CI_WORKSPACE_DIR: '/srv/ws',
      MATRIX_CI_ARTIFACT_DIR: '/srv/artifacts',
      MATRIX_CI_KEEP_WORKSPACES: 'yes',
      MATRIX_CI_MAX_CONCURRENT_JOBS: '8',
      MATRIX_CI_DEFAULT_JOB_TIMEOUT_MINUTES: '90.5',
      MATRIX_CI_STEP_LOG_LINES: '50',
      MATRIX_CI_WEBHOOK_SECRET: 'test-secret',
      MATRIX_CI_RUNNER_LABELS: 'ubuntu-18.04, macos-latest,,',
    });
    expect(config).toEqual({
      port: 8080,
      logLevel: LogLevel.Debug,
      workspaceDir: '/srv/ws',
      artifactDir: '/srv/artifacts',
      keepWorkspaces: true,
      maxConcurrentJobs: 8,
      defaultJobTimeoutMinutes: 90.5,
      stepLogLines: 50,
      webhookSecret: 'test-secret',
      runnerLabels: ['ubuntu-18.04', 'macos-latest'],
    });
  });

  test('an empty webhook secret means no verification', () => {
    expect(loadConfig({ MATRIX_CI_WEBHOOK_SECRET: '' }).webhookSecret).toBeUndefined();
  });

  test.each([
    ['PORT', 'abc', 'Invalid value for PORT: "abc" (expected an integer >= 0)'],
    ['MATRIX_CI_MAX_CONCURRENT_JOBS', '0', 'Invalid value for MATRIX_CI_MAX_CONCURRENT_JOBS: "0" (expected an integer >= 1)'],
    ['MATRIX_CI_DEFAULT_JOB_TIMEOUT_MINUTES', '-5', 'Invalid value for MATRIX_CI_DEFAULT_JOB_TIMEOUT_MINUTES: "-5" (expected a positive number)'],
    ['MATRIX_CI_KEEP_WORKSPACES', 'maybe', 'Invalid value for MATRIX_CI_KEEP_WORKSPACES: "maybe" (expected true or false)'],
    ['MATRIX_CI_LOG_LEVEL', 'loud', 'Invalid value for MATRIX_CI_LOG_LEVEL: "loud" (expected debug, info, warn or error)'],
  ])('rejects %s=%s', (name, value, message) => {
    expect(() => loadConfig({ [name]: value })).toThrow(ConfigError);
    expect(() => loadConfig({ [name]: value })).toThrow(message);
  });

  test('ConfigError carries SYSTEM.CONFIG', () => {
    try {
      loadConfig({ PORT: '-1' });
      throw new Error('expected loadConfig to throw');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) expect(err.typedError.code).toBe('SYSTEM.CONFIG');
    }
  });
});
