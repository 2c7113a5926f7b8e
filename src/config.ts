/**
 * Application configuration.
 *
 * Read once from environment variables; every value has a default so the
 * service and CLI start with no configuration at all.
 */

import os from 'os';
import path from 'path';
import { TypedError, configError } from './domain/errors';
import { LogLevel, parseLogLevel } from './logger';

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  /** Root under which each job gets its own workspace directory. */
  workspaceDir: string;
  /** Root under which artifacts are persisted. */
  artifactDir: string;
  /** Keep job workspaces after the job finishes (debugging). */
  keepWorkspaces: boolean;
  /** Upper bound on job instances running at once, across all runs. */
  maxConcurrentJobs: number;
  /** Job timeout when the document sets none. */
  defaultJobTimeoutMinutes: number;
  /** Number of log lines kept per step. */
  stepLogLines: number;
  /** Secret for verifying GitHub webhook signatures. Unset: not verified. */
  webhookSecret?: string;
  /** Runner labels this instance serves. Unset: every label. */
  runnerLabels?: string[];
}

/** Configuration error carrying a typed error. */
export class ConfigError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(configError(name, raw, `an integer >= ${min}`));
  }
  return value;
}

function readPositiveNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(configError(name, raw, 'a positive number'));
  }
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes'].includes(normalized)) return true;
  if (['0', 'false', 'no'].includes(normalized)) return false;
  throw new ConfigError(configError(name, raw, 'true or false'));
}

function readList(env: Env, name: string): string[] | undefined {
  const raw = env[name];
  if (raw === undefined) return undefined;
  const items = raw.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
  return items.length > 0 ? items : undefined;
}

/** Build the configuration from an environment map (process.env by default). */
export function loadConfig(env: Env = process.env): AppConfig {
  const rawLevel = env.MATRIX_CI_LOG_LEVEL ?? 'info';
  const logLevel = parseLogLevel(rawLevel);
  if (!logLevel) {
    throw new ConfigError(configError('MATRIX_CI_LOG_LEVEL', rawLevel, 'debug, info, warn or error'));
  }

  return {
    port: readInt(env, 'PORT', 5000, 0),
    logLevel,
    workspaceDir: env.MATRIX_CI_WORKSPACE_DIR ?? path.join(os.tmpdir(), 'matrix-ci', 'workspaces'),
    artifactDir: env.MATRIX_CI_ARTIFACT_DIR ?? path.join(process.cwd(), '.matrix-ci', 'artifacts'),
    keepWorkspaces: readBool(env, 'MATRIX_CI_KEEP_WORKSPACES', false),
    maxConcurrentJobs: readInt(env, 'MATRIX_CI_MAX_CONCURRENT_JOBS', 4, 1),
    defaultJobTimeoutMinutes: readPositiveNumber(env, 'MATRIX_CI_DEFAULT_JOB_TIMEOUT_MINUTES', 360),
    stepLogLines: readInt(env, 'MATRIX_CI_STEP_LOG_LINES', 500, 1),
    webhookSecret: env.MATRIX_CI_WEBHOOK_SECRET || undefined,
    runnerLabels: readList(env, 'MATRIX_CI_RUNNER_LABELS'),
  };
}
