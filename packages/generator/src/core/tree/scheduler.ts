/**
 * Folder scheduling strategies
 *
 * sequential: one folder at a time, in index order.
 * parallel:   a fixed pool of async workers; each takes the next index from a
 *             shared counter and owns that folder until it is done.
 *
 * `shouldStop` is polled before each folder is handed out. A folder already
 * started always runs to the end.
 */

import type { ExecutionMode } from '../config.js';

export interface ScheduleOptions {
  mode: ExecutionMode;
  /** Worker count for parallel mode; 0 means one worker per folder */
  concurrency?: number;
}

export type FolderTask = (index: number) => Promise<void>;

export type StopCheck = () => boolean;

const never: StopCheck = () => false;

export async function runSequential(
  folderCount: number,
  task: FolderTask,
  shouldStop: StopCheck = never
): Promise<void> {
  for (let index = 1; index <= folderCount && !shouldStop(); index++) {
    await task(index);
  }
}

export async function runParallel(
  folderCount: number,
  concurrency: number,
  task: FolderTask,
  shouldStop: StopCheck = never
): Promise<void> {
  const workerCount = concurrency > 0 ? Math.min(concurrency, folderCount) : folderCount;
  let next = 1;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (!failed && !shouldStop() && next <= folderCount) {
      const index = next++;
      try {
        await task(index);
      } catch (error) {
        // Fatal for the run: other workers finish their current folder and stop
        failed = true;
        throw error;
      }
    }
  };

  const results = await Promise.allSettled(Array.from({ length: workerCount }, () => worker()));
  const rejected = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
  if (rejected) {
    throw rejected.reason;
  }
}

export function runFolders(
  folderCount: number,
  schedule: ScheduleOptions,
  task: FolderTask,
  shouldStop: StopCheck = never
): Promise<void> {
  if (schedule.mode === 'parallel') {
    return runParallel(folderCount, schedule.concurrency ?? 0, task, shouldStop);
  }
  return runSequential(folderCount, task, shouldStop);
}
