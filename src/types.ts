export type TimestampSource = 'created' | 'modified';

export interface FileRecord {
  readonly path: string;
  readonly name: string;
  readonly size: number;
  readonly timestamp: Date;
  readonly timestampNs: bigint;
  readonly timestampSource: TimestampSource;
}

export interface EntryMetadata {
  isFile: boolean;
  size: number;
  created?: Date;
  modified?: Date;
  // Nanosecond precision where the platform provides it.
  createdNs?: bigint;
  modifiedNs?: bigint;
}

/**
 * One raw entry as produced by the directory lister.
 * `name` is missing when the filename is not valid UTF-8,
 * `error` is set when the metadata could not be read.
 */
export interface DirectoryEntry {
  path: string;
  name?: string;
  metadata?: EntryMetadata;
  error?: string;
}

export interface DuplicateSet {
  readonly key: string;
  readonly size: number;
  readonly files: readonly FileRecord[];
  readonly keeper: FileRecord;
  readonly toDelete: readonly FileRecord[];
}

export interface CollectOptions {
  ignoredPaths?: string[];
  minSize?: number;
  onSkip?: (entry: DirectoryEntry, reason: string) => void;
}

export interface CollectResult {
  records: FileRecord[];
  warnings: string[];
}

export interface ScanResult {
  directory: string;
  records: FileRecord[];
  duplicateSets: DuplicateSet[];
  warnings: string[];
}

export type RunState =
  | 'SCANNING'
  | 'GROUPING'
  | 'REPORTING'
  | 'DRY_RUN_DONE'
  | 'AWAITING_CONFIRMATION'
  | 'CANCELLED'
  | 'DELETING'
  | 'DONE'
  | 'FAILED';

export interface DedupeOutcome {
  state: RunState;
  trail: RunState[];
  setsFound: number;
  filesToDelete: number;
  deleted: number;
  errors: number;
  warnings: number;
}

export interface RemoveResult {
  success: boolean;
  error?: string;
}
