import type { Checkpointer, CheckpointResult } from './types.js';

/**
 * Keeps at most one checkpoint in flight. Calls run in arrival order.
 *
 * Folder workers share one repository; two concurrent `git add`/`git commit`
 * pairs would fight over the index lock.
 */
export class SerialCheckpointer implements Checkpointer {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private readonly inner: Checkpointer) {}

  checkpoint(message: string): Promise<CheckpointResult> {
    const run = this.tail.then(() => this.inner.checkpoint(message));
    // The queue keeps moving after a rejection; the caller still receives it from `run`
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

/**
 * Used when checkpoints are turned off in configuration
 */
export class NoopCheckpointer implements Checkpointer {
  async checkpoint(): Promise<CheckpointResult> {
    return { success: true, skipped: true };
  }
}
