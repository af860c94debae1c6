/**
 * Types for the tree builder
 */

export interface FolderEntry {
  /** 1-based position in the run */
  index: number;
  /** Random word shared by the folder and every file in it */
  word: string;
  /** `NNNN_<word>` */
  name: string;
  /** Absolute or base-relative directory path */
  path: string;
}

export interface FileEntry {
  folder: FolderEntry;
  /** 1-based position within the folder */
  index: number;
  timestamp: string;
  uuid: string;
  /** `<folder name>_<timestamp>.txt` */
  name: string;
  path: string;
}

/**
 * Outcome of one folder iteration
 */
export interface FolderOutcome {
  folder: FolderEntry;
  created: boolean;
  filesWritten: number;
  filesSkipped: number;
}

/**
 * Counters for a whole run
 */
export interface RunSummary {
  foldersCreated: number;
  foldersSkipped: number;
  filesWritten: number;
  filesSkipped: number;
  checkpointsAttempted: number;
  checkpointsFailed: number;
  /** The run was asked to stop before every folder was started */
  interrupted: boolean;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}
