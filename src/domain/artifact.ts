/**
 * Artifact domain model.
 *
 * Artifacts are files a job persisted for later retrieval, referenced by
 * storage pointers rather than embedded payloads.
 */

/** Artifact storage pointer kinds. */
export type ArtifactPointerKind = 'file-system' | 'memory';

/** Storage pointer for artifact location. */
export interface ArtifactPointer {
  kind: ArtifactPointerKind;
  uri: string;
}

/** One file inside an artifact. */
export interface ArtifactFile {
  /** Path relative to the job workspace, forward slashes. */
  path: string;
  sizeBytes: number;
  sha256: string;
}

/** A named output persisted by a job. */
export interface Artifact {
  id: string;
  runId: string;
  jobRunId: string;
  /** Index of the upload step within the job. */
  stepIndex: number;
  name: string;
  files: ArtifactFile[];
  pointer: ArtifactPointer;
  sizeBytes: number;
  createdAt: string;
}
