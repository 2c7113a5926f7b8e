/**
 * Artifact file storage.
 *
 * Artifact files are copied out of the job workspace into
 * `{root}/{runId}/{jobRunId}/{name}/{path}` so they outlive the workspace.
 * Metadata records go to the ArtifactStore; this class only handles bytes.
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { Readable } from 'stream';
import { v4 as uuid } from 'uuid';
import { Artifact, ArtifactFile } from '../domain/artifact';

export interface PersistArtifactInput {
  runId: string;
  jobRunId: string;
  stepIndex: number;
  name: string;
  /** Directory the file paths are relative to. */
  baseDir: string;
  /** Absolute paths of the files to persist. */
  files: string[];
}

/** Byte storage for artifacts. */
export interface ArtifactStorage {
  persist(input: PersistArtifactInput): Promise<Artifact>;
  /** Open one file of an artifact; null if it does not exist. */
  openFile(artifact: Artifact, filePath: string): Promise<Readable | null>;
}

/** Path of a file inside an artifact: relative to the base dir, or its basename when outside it. */
export function artifactRelativePath(baseDir: string, file: string): string {
  const relative = path.relative(baseDir, file);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    return path.basename(file);
  }
  return relative.split(path.sep).join('/');
}

async function hashFile(file: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(file)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

export class FileArtifactStorage implements ArtifactStorage {
  constructor(private readonly root: string) {}

  private artifactDir(runId: string, jobRunId: string, name: string): string {
    return path.join(this.root, runId, jobRunId, name);
  }

  async persist(input: PersistArtifactInput): Promise<Artifact> {
    const dir = this.artifactDir(input.runId, input.jobRunId, input.name);
    await fs.mkdir(dir, { recursive: true });

    const files: ArtifactFile[] = [];
    for (const file of input.files) {
      const relative = artifactRelativePath(input.baseDir, file);
      const target = path.join(dir, relative);
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.copyFile(file, target);
      const stat = await fs.stat(target);
      files.push({ path: relative, sizeBytes: stat.size, sha256: await hashFile(target) });
    }

    return {
      id: `art_${uuid()}`,
      runId: input.runId,
      jobRunId: input.jobRunId,
      stepIndex: input.stepIndex,
      name: input.name,
      files,
      pointer: { kind: 'file-system', uri: dir },
      sizeBytes: files.reduce((sum, f) => sum + f.sizeBytes, 0),
      createdAt: new Date().toISOString(),
    };
  }

  async openFile(artifact: Artifact, filePath: string): Promise<Readable | null> {
    if (!artifact.files.some((f) => f.path === filePath)) return null;
    const base = path.resolve(artifact.pointer.uri);
    const target = path.resolve(base, filePath);
    if (!target.startsWith(base + path.sep)) return null;
    try {
      await fs.access(target);
    } catch {
      return null;
    }
    return createReadStream(target);
  }
}
