import fs from 'fs';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import { FileArtifactStorage, artifactRelativePath } from '../../src/storage/artifact-storage';

async function readAll(stream: Readable): Promise<string> {
  let text = '';
  for await (const chunk of stream) text += String(chunk);
  return text;
}

let root: string;
let workspace: string;
let storage: FileArtifactStorage;

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), 'artifacts-'));
  workspace = path.join(root, 'workspace');
  fs.mkdirSync(path.join(workspace, 'output'), { recursive: true });
  fs.writeFileSync(path.join(workspace, 'output', 'dbutils-ubuntu-18.04-3.7-results.xml'), '<testsuite/>');
  storage = new FileArtifactStorage(path.join(root, 'store'));
});

afterEach(() => fs.rmSync(root, { recursive: true, force: true }));

describe('artifactRelativePath', () => {
  it('uses forward slashes relative to the base', () => {
    expect(artifactRelativePath('/ws', '/ws/output/a.xml')).toBe('output/a.xml');
  });

  it('falls back to the basename outside the base', () => {
    expect(artifactRelativePath('/ws', '/tmp/a.xml')).toBe('a.xml');
  });
});

describe('FileArtifactStorage', () => {
  it('copies files out of the workspace', async () => {
    const artifact = await storage.persist({
      runId: 'run_1',
      jobRunId: 'job_1',
      stepIndex: 3,
      name: 'pytest-report',
      baseDir: workspace,
      files: [path.join(workspace, 'output', 'dbutils-ubuntu-18.04-3.7-results.xml')],
    });

    expect(artifact.id).toMatch(/^art_/);
    expect(artifact.stepIndex).toBe(3);
    expect(artifact.pointer).toEqual({ kind: 'file-system', uri: path.join(root, 'store', 'run_1', 'job_1', 'pytest-report') });
    expect(artifact.files).toEqual([
      {
        path: 'output/dbutils-ubuntu-18.04-3.7-results.xml',
        sizeBytes: 12,
        sha256: '55a2c4dabbdd641e56e0ce28262e1d43b8fff7534ced8580f39ba573eca56f2c',
      },
    ]);
    expect(artifact.sizeBytes).toBe(12);

    fs.rmSync(workspace, { recursive: true });
    const stream = await storage.openFile(artifact, 'output/dbutils-ubuntu-18.04-3.7-results.xml');
    expect(stream).not.toBeNull();
    if (stream) expect(await readAll(stream)).toBe('<testsuite/>');
  });

  it('openFile returns null for files not in the artifact', async () => {
    const artifact = await storage.persist({
      runId: 'run_1',
      jobRunId: 'job_1',
      stepIndex: 0,
      name: 'pytest-report',
      baseDir: workspace,
      files: [path.join(workspace, 'output', 'dbutils-ubuntu-18.04-3.7-results.xml')],
    });
    expect(await storage.openFile(artifact, 'output/other.xml')).toBeNull();
    expect(await storage.openFile(artifact, '../../../etc/passwd')).toBeNull();
  });
});
