/**
 * Checkpoint contract between the tree builder and version control
 */

export interface CheckpointResult {
  success: boolean;
  hash?: string;
  error?: string;
  /** True when checkpoints are disabled and nothing was attempted */
  skipped?: boolean;
  /** True if a stale lock (>30s old) was detected during retries */
  staleLockDetected?: boolean;
  /** Age of the lock file in milliseconds (if detected) */
  lockAgeMs?: number;
}

/**
 * Records the current state of the working tree under a message.
 * Implementations report failure in the result rather than throwing.
 */
export interface Checkpointer {
  checkpoint(message: string): Promise<CheckpointResult>;
}
