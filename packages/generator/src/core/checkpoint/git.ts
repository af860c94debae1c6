/**
 * Git checkpoint adapter
 *
 * Each checkpoint stages every pending change in the working tree and commits
 * it with the caller's message. Lock contention is retried; every other
 * failure is returned as a result and never thrown.
 *
 * The hash comes from git's `[branch hash] message` summary line, so commits
 * run without `--quiet`.
 */

import { simpleGit, CheckRepoActions } from 'simple-git';
import path from 'path';
import fs from 'fs/promises';
import type { Checkpointer, CheckpointResult } from './types.js';

/**
 * The slice of simple-git the adapter relies on
 */
export interface GitClient {
  add(files: string | string[]): Promise<unknown>;
  commit(message: string): Promise<{ commit: string }>;
  checkIsRepo(action?: CheckRepoActions): Promise<boolean>;
  revparse(options: string[]): Promise<string>;
}

/**
 * Configuration for retry logic on lock contention
 */
export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: boolean;
}

export const DEFAULT_RETRY: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 100,
  maxDelayMs: 500,
  jitter: true,
};

const STALE_LOCK_THRESHOLD_MS = 30_000; // 30 seconds

export interface GitCheckpointerOptions {
  /** Client to use instead of simple-git on repoPath */
  git?: GitClient;
  retry?: RetryConfig;
}

/**
 * Check if the path is the root of a git repository
 */
export async function isGitRepo(repoPath: string, git?: GitClient): Promise<boolean> {
  try {
    // simple-git throws straight away for a directory that does not exist
    const client: GitClient = git ?? simpleGit(repoPath);
    return await client.checkIsRepo(CheckRepoActions.IS_REPO_ROOT);
  } catch {
    return false;
  }
}

/**
 * Top level of the working tree containing `startPath`. Outside a repository
 * (or without git) this is `startPath` itself.
 */
export async function findRepoRoot(startPath: string = process.cwd(), git?: GitClient): Promise<string> {
  const fallback = path.resolve(startPath);
  try {
    const client: GitClient = git ?? simpleGit(fallback);
    const root = (await client.revparse(['--show-toplevel'])).trim();
    return root || fallback;
  } catch {
    return fallback;
  }
}

/**
 * Check if the git index lock file exists and get its age
 * @returns null if no lock exists
 */
async function checkLockFile(repoPath: string): Promise<{ stale: boolean; ageMs: number } | null> {
  const lockPath = path.join(repoPath, '.git/index.lock');
  try {
    const stat = await fs.stat(lockPath);
    const ageMs = Date.now() - stat.mtimeMs;
    return { stale: ageMs > STALE_LOCK_THRESHOLD_MS, ageMs };
  } catch {
    return null; // No lock exists
  }
}

interface LockObservation {
  stale: boolean;
  ageMs?: number;
}

/**
 * Record the current lock age into `into`; staleness is sticky across attempts
 */
async function observeLock(repoPath: string, into: LockObservation): Promise<void> {
  const lockInfo = await checkLockFile(repoPath);
  if (lockInfo) {
    into.ageMs = lockInfo.ageMs;
    if (lockInfo.stale) {
      into.stale = true;
    }
  }
}

/**
 * Check if an error is a lock contention error
 */
export function isLockContentionError(error: unknown): boolean {
  if (error instanceof Error) {
    const msg = error.message.toLowerCase();
    return msg.includes('index.lock') ||
           msg.includes('unable to create') ||
           msg.includes('could not obtain lock');
  }
  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Exponential backoff with optional jitter
 */
export function calculateDelay(attempt: number, config: RetryConfig): number {
  let delay = config.baseDelayMs * Math.pow(2, attempt);
  delay = Math.min(delay, config.maxDelayMs);

  if (config.jitter) {
    // Up to 50% extra so competing writers spread out
    delay = delay + Math.random() * delay * 0.5;
  }

  return Math.round(delay);
}

export class GitCheckpointer implements Checkpointer {
  private readonly git: GitClient;
  private readonly retry: RetryConfig;
  private repoCheck: Promise<boolean> | null = null;

  constructor(readonly repoPath: string, options: GitCheckpointerOptions = {}) {
    this.git = options.git ?? simpleGit(repoPath);
    this.retry = options.retry ?? DEFAULT_RETRY;
  }

  async checkpoint(message: string): Promise<CheckpointResult> {
    // The working tree is a precondition of the run; look once
    this.repoCheck ??= isGitRepo(this.repoPath, this.git);
    if (!(await this.repoCheck)) {
      return { success: false, error: 'Not a git repository' };
    }

    let lastError: Error | undefined;
    const lock: LockObservation = { stale: false };

    for (let attempt = 0; attempt < this.retry.maxAttempts; attempt++) {
      try {
        // Check lock status before each attempt (for reporting)
        await observeLock(this.repoPath, lock);

        await this.git.add('.');
        const result = await this.git.commit(message);

        if (!result.commit) {
          return { success: false, error: 'Nothing to commit' };
        }

        return {
          success: true,
          hash: result.commit,
          ...(lock.stale && { staleLockDetected: true, lockAgeMs: lock.ageMs }),
        };
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        // Only retry on lock contention errors
        if (!isLockContentionError(error)) {
          return { success: false, error: lastError.message };
        }

        await observeLock(this.repoPath, lock);

        if (attempt < this.retry.maxAttempts - 1) {
          await sleep(calculateDelay(attempt, this.retry));
        }
      }
    }

    return {
      success: false,
      error: lastError?.message ?? 'Lock contention - all retries exhausted',
      ...(lock.stale && { staleLockDetected: true }),
      ...(lock.ageMs !== undefined && { lockAgeMs: lock.ageMs }),
    };
  }
}
