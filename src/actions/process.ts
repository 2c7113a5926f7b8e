/**
 * Child process plumbing shared by the built-in actions.
 */

import { spawn } from 'child_process';
import fs from 'fs/promises';
import path from 'path';
import { ActionContext, runnerOs } from '../engine/step-runner';

/** Time a process gets between SIGTERM and SIGKILL once aborted. */
export const KILL_GRACE_MS = 2_000;

export interface RunProcessOptions {
  command: string;
  args: string[];
  cwd: string;
  env: Record<string, string>;
  /** Terminates the process group when aborted: SIGTERM, then SIGKILL. */
  signal?: AbortSignal;
  /** Delay before SIGKILL follows SIGTERM. Defaults to KILL_GRACE_MS. */
  killGraceMs?: number;
  /** Receives stdout and stderr, one line at a time. */
  onLine(line: string): void;
}

export interface ProcessResult {
  exitCode: number | null;
  /** Signal that terminated the process, if any. */
  signal: NodeJS.Signals | null;
  /** True when the process was killed through the abort signal. */
  aborted: boolean;
}

/** Spawn a process and resolve when it exits. Rejects if it cannot be started. */
export function runProcess(options: RunProcessOptions): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    if (options.signal?.aborted) {
      resolve({ exitCode: null, signal: null, aborted: true });
      return;
    }

    // Own process group on POSIX, so pytest workers go down with it.
    const group = process.platform !== 'win32';
    const child = spawn(options.command, options.args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: group,
    });

    const killGroup = (signal: NodeJS.Signals): void => {
      if (group && child.pid !== undefined) {
        try {
          process.kill(-child.pid, signal);
          return;
        } catch (err) {
          // ESRCH: the group is already gone.
          if (isErrnoException(err) && err.code === 'ESRCH') return;
        }
      }
      child.kill(signal);
    };

    let aborted = false;
    let killTimer: NodeJS.Timeout | undefined;
    const onAbort = (): void => {
      aborted = true;
      killGroup('SIGTERM');
      killTimer = setTimeout(() => killGroup('SIGKILL'), options.killGraceMs ?? KILL_GRACE_MS);
    };
    options.signal?.addEventListener('abort', onAbort, { once: true });

    const stdout = lineSplitter(options.onLine);
    const stderr = lineSplitter(options.onLine);
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (text: string) => stdout.push(text));
    child.stderr.on('data', (text: string) => stderr.push(text));

    const settle = (): void => {
      options.signal?.removeEventListener('abort', onAbort);
      if (killTimer) clearTimeout(killTimer);
    };
    child.once('error', (err) => {
      settle();
      reject(err);
    });
    child.once('close', (exitCode, signal) => {
      settle();
      stdout.flush();
      stderr.flush();
      resolve({ exitCode, signal, aborted });
    });
  });
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

function lineSplitter(onLine: (line: string) => void): { push(text: string): void; flush(): void } {
  let buffer = '';
  return {
    push(text) {
      buffer += text;
      const lines = buffer.split(/\r?\n/);
      buffer = lines.pop() ?? '';
      lines.forEach(onLine);
    },
    flush() {
      if (buffer !== '') onLine(buffer);
      buffer = '';
    },
  };
}

/**
 * Environment for a process started by a step: the host environment, the
 * step's env bindings, and the job's added PATH entries in front.
 */
export function processEnv(ctx: ActionContext, extra: Record<string, string> = {}): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value;
  }
  Object.assign(env, ctx.env, extra);
  env.PATH = [...ctx.addedPath, env.PATH ?? ''].filter((entry) => entry !== '').join(path.delimiter);
  env.GITHUB_WORKSPACE = ctx.workspace;
  env.RUNNER_OS = runnerOs(ctx.runsOn);
  return env;
}

/** First `candidates` entry found as an executable file on `searchPath`. */
export async function findExecutable(candidates: string[], searchPath: string): Promise<string | undefined> {
  const dirs = searchPath.split(path.delimiter).filter((dir) => dir !== '');
  for (const name of candidates) {
    for (const dir of dirs) {
      const file = path.join(dir, name);
      if (await isExecutableFile(file)) return file;
    }
  }
  return undefined;
}

async function isExecutableFile(file: string): Promise<boolean> {
  const stat = await fs.stat(file).catch(() => null);
  if (!stat?.isFile()) return false;
  return fs.access(file, fs.constants.X_OK).then(
    () => true,
    () => false,
  );
}

/** Split an `args` input on whitespace, keeping single- or double-quoted groups together. */
export function splitArgs(input: string | undefined): string[] {
  if (!input) return [];
  const args: string[] = [];
  const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g;
  let match = pattern.exec(input);
  while (match) {
    args.push(match[1] ?? match[2] ?? match[3]);
    match = pattern.exec(input);
  }
  return args;
}
