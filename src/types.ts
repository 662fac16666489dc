/**
 * Terminal status reported to the coordinator for a processed job.
 */
export type JobStatus = 'Done' | 'Failed'

/**
 * Application reference of a job, split from its `name:tag` form.
 */
export type AppRef = {
  /** Full reference as declared by the coordinator (e.g., `bids-fsl:1.2`) */
  id: string;
  name: string;
  tag: string;
}

/**
 * One artifact to fetch before the container runs.
 */
export type InputDescriptor = {
  /** Fetch route, relative to the coordinator API */
  url: string;
  /** Query/filter parameters passed through to the coordinator unmodified */
  payload: unknown;
}

/**
 * Labels attached to every produced file whose extension matches `fext`.
 * `kinds`, `state` and `type` are JSON values owned by the coordinator,
 * carried through as sent; `null` when absent.
 */
export type OutputLabels = {
  fext: string;
  kinds: unknown;
  state: unknown;
  type: unknown;
}

export type OutputExpectation = {
  /** Upload route, relative to the coordinator API */
  url: string;
  payload: OutputLabels;
}

/**
 * Unit of work claimed from the coordinator.
 */
export type Job = {
  id: string;
  group: string;
  project: {
    id?: string;
    name: string;
  };
  app: AppRef;
  inputs: InputDescriptor[];
  outputs: OutputExpectation[];
  /** The job document exactly as the coordinator sent it */
  document: Record<string, unknown>;
}

/**
 * Scope filter sent with every claim. Unset values are sent as null.
 */
export type JobScope = {
  group?: string;
  project?: string;
}

/**
 * Terminal status and human-readable activity of a processed job.
 */
export type JobOutcome = {
  status: JobStatus;
  activity: string;
}

/**
 * Per-file metadata sent with a result submission.
 * Absent labels are `null` so that every record serializes with the same keys.
 */
export type OutputArtifactRecord = {
  name: string;
  ext: string;
  kinds: unknown;
  state: unknown;
  type: unknown;
  sha1: string;
  size: number;
  flavor: 'file';
}

export type IntegrityEntry = {name: string; sha1: string} | {metadata: string}
