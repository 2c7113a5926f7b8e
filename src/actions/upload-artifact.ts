/**
 * actions/upload-artifact: persists files from the workspace as a named
 * artifact.
 *
 * `path` holds one entry per line: a file, a directory (taken whole) or a
 * glob relative to the working directory. Entries starting with `!`
 * exclude matches of the entries before them.
 */

import fs from 'fs/promises';
import path from 'path';
import { minimatch } from 'minimatch';
import { ActionHandler, actionFailure } from '../engine/step-runner';
import { inputLines, optionalInput, requireInput } from './inputs';

export type IfNoFilesFound = 'error' | 'warn' | 'ignore';

const IF_NO_FILES_FOUND: readonly IfNoFilesFound[] = ['error', 'warn', 'ignore'];

function isIfNoFilesFound(value: string): value is IfNoFilesFound {
  return (IF_NO_FILES_FOUND as readonly string[]).includes(value);
}

const GLOB_CHARS = /[*?[\]{}]/;

async function walk(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) files.push(...(await walk(full)));
    else if (entry.isFile()) files.push(full);
  }
  return files;
}

async function statOrNull(file: string): Promise<Awaited<ReturnType<typeof fs.stat>> | null> {
  return fs.stat(file).catch(() => null);
}

/**
 * Absolute files selected by the `path` entries, in discovery order
 * without duplicates.
 */
export async function resolveUploadFiles(entries: string[], baseDir: string): Promise<string[]> {
  const selected = new Set<string>();
  let all: string[] | undefined;

  for (const entry of entries) {
    const negated = entry.startsWith('!');
    const pattern = negated ? entry.slice(1) : entry;

    if (negated) {
      for (const file of [...selected]) {
        const rel = path.relative(baseDir, file).split(path.sep).join('/');
        if (minimatch(rel, pattern, { dot: true })) selected.delete(file);
      }
      continue;
    }

    if (GLOB_CHARS.test(pattern)) {
      all ??= await walk(baseDir);
      for (const file of all) {
        const rel = path.relative(baseDir, file).split(path.sep).join('/');
        if (minimatch(rel, pattern, { dot: true })) selected.add(file);
      }
      continue;
    }

    const full = path.resolve(baseDir, pattern);
    const stat = await statOrNull(full);
    if (stat?.isDirectory()) {
      for (const file of await walk(full)) selected.add(file);
    } else if (stat?.isFile()) {
      selected.add(full);
    }
  }
  return [...selected];
}

export const uploadArtifactAction: ActionHandler = {
  action: 'actions/upload-artifact',
  description: 'Persist workspace files as a named artifact',

  async execute(step, ctx) {
    const name = optionalInput(step, 'name') ?? 'artifact';
    const entries = inputLines(requireInput(step, 'path'));
    const mode = optionalInput(step, 'if-no-files-found') ?? 'error';
    if (!isIfNoFilesFound(mode)) {
      throw actionFailure('STEP.INVALID_INPUT', `if-no-files-found must be one of ${IF_NO_FILES_FOUND.join(', ')}`, {
        input: 'if-no-files-found',
        value: mode,
      });
    }

    const files = await resolveUploadFiles(entries, ctx.workingDirectory);
    if (files.length === 0) {
      const message = `No files were found with the provided path: ${entries.join(', ')}`;
      if (mode === 'error') {
        throw actionFailure('ARTIFACT.FILE_MISSING', message, { name, path: entries });
      }
      if (mode === 'warn') {
        ctx.log(`Warning: ${message}. No artifacts will be uploaded.`);
        ctx.logger.warn('No files to upload', { name, path: entries });
      }
      return { outputs: { 'artifact-id': '' } };
    }

    const artifact = await ctx.uploadArtifact(name, files);
    ctx.log(`Uploaded ${files.length} file(s) as "${name}" (${artifact.sizeBytes} bytes)`);
    return { outputs: { 'artifact-id': artifact.id } };
  },
};
