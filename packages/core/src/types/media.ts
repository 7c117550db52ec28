/**
 * Media item and action types shared by the engine, executor and reporter.
 */

export type Classification =
  | 'Unclassified'
  | 'NeedsEncode'
  | 'AlreadyLowRes'
  | 'Encoded'
  | 'Orphaned'
  | 'ProbeFailed';

/** Result of the resolution classifier for one source file */
export type ResolutionVerdict = 'NeedsEncode' | 'AlreadyLowRes' | 'ProbeFailed';

export type ActionKind = 'Encode' | 'Delete' | 'Skip' | 'Noop';

/** Which tree an observation belongs to */
export type TreeSide = 'source' | 'destination';

/**
 * One side of a media item as last seen on disk.
 * `sequence` orders observations coming from live events and scans.
 */
export interface FileObservation {
  relativePath: string;
  size: number;
  mtimeMs: number;
  sequence: number;
}

export interface MediaItem {
  identity: string;
  source?: FileObservation;
  destination?: FileObservation;
  classification: Classification;
  stale: boolean;
  attempt: number;
  inFlight?: ActionRecord;
  /** Last probe verdict with the source fingerprint it was computed for */
  verdict?: { result: ResolutionVerdict; fingerprint: string; detail?: string };
  /** Fingerprint a Skip was settled for */
  skippedFingerprint?: string;
  /** Kind of the last action that failed; not re-issued until the next corrective scan */
  blocked?: ActionKind;
  lastError?: string;
  /** Highest absence sequence seen per side, so older presence observations lose */
  sourceRemovedAt: number;
  destinationRemovedAt: number;
}

export interface ActionRecord {
  identity: string;
  kind: ActionKind;
  attempt: number;
  sourcePath?: string;
  destinationPath?: string;
  /** Fingerprint of the source the action was decided for */
  fingerprint?: string;
  issuedAt: Date;
}

export type ActionStatus = 'succeeded' | 'failed' | 'abandoned';

export interface ActionOutcome {
  identity: string;
  attempt: number;
  kind: ActionKind;
  status: ActionStatus;
  /** Destination as observed after the action; null when it is now absent */
  destination?: FileObservation | null;
  error?: string;
}

/** Observation change produced by a watcher */
export interface TreeEvent {
  type: 'added' | 'removed';
  side: TreeSide;
  relativePath: string;
  size?: number;
  mtimeMs?: number;
  /** Taken when the file was stat'ed; the engine assigns one when absent */
  sequence?: number;
}

/** Full enumeration of both trees taken by a corrective scan */
export interface TreeSnapshot {
  /** Sequence taken before the walk started; absences are dated to it */
  startedAt: number;
  source: FileObservation[];
  destination: FileObservation[];
  /** Source paths modified too recently to trust; left for a later scan */
  deferred?: string[];
}

export type ClassificationCounts = Record<Classification, number>;

/**
 * Stable fingerprint of a source file's content state
 */
export function fingerprintOf(observation: Pick<FileObservation, 'mtimeMs' | 'size'>): string {
  return `${Math.trunc(observation.mtimeMs)}:${observation.size}`;
}
