/**
 * Tree builder
 *
 * Walks folders 1..folderCount and files 1..filesPerFolder, names each one from
 * fresh identifiers, writes it, and waits for a checkpoint before moving on.
 * Failures on a single folder or file are logged and skipped; identifier
 * failures end the run.
 */

import fs from 'fs/promises';
import type { IdentifierGenerator } from '@treeforge/core';
import { runLog } from '../runLog.js';
import { SerialCheckpointer } from '../checkpoint/serial.js';
import type { Checkpointer } from '../checkpoint/types.js';
import {
  createFileEntry,
  createFolderEntry,
  fileCheckpointMessage,
  folderCheckpointMessage,
  renderFileBody,
} from './naming.js';
import { runFolders, type ScheduleOptions } from './scheduler.js';
import type { FileEntry, FolderEntry, FolderOutcome, RunSummary } from './types.js';

export interface TreeBuilderOptions {
  baseDir: string;
  folderCount: number;
  filesPerFolder: number;
  wordLength?: number;
  author: string;
  identifiers: IdentifierGenerator;
  /** Wrapped in a SerialCheckpointer when the schedule is parallel */
  checkpointer: Checkpointer;
  schedule?: ScheduleOptions;
}

interface Counters {
  foldersCreated: number;
  foldersSkipped: number;
  filesWritten: number;
  filesSkipped: number;
  checkpointsAttempted: number;
  checkpointsFailed: number;
}

function emptyCounters(): Counters {
  return {
    foldersCreated: 0,
    foldersSkipped: 0,
    filesWritten: 0,
    filesSkipped: 0,
    checkpointsAttempted: 0,
    checkpointsFailed: 0,
  };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Write through an explicit handle so it is closed on every path
 */
async function writeTextFile(filePath: string, body: string): Promise<void> {
  const handle = await fs.open(filePath, 'w');
  try {
    await handle.writeFile(body, 'utf-8');
  } finally {
    await handle.close();
  }
}

export class TreeBuilder {
  private readonly checkpointer: Checkpointer;
  private readonly schedule: ScheduleOptions;
  private readonly wordLength: number | undefined;
  private counters: Counters = emptyCounters();
  private stopRequested = false;

  constructor(private readonly options: TreeBuilderOptions) {
    this.schedule = options.schedule ?? { mode: 'sequential' };
    this.wordLength = options.wordLength;
    this.checkpointer = this.schedule.mode === 'parallel'
      ? new SerialCheckpointer(options.checkpointer)
      : options.checkpointer;
  }

  /**
   * Create the base directory and any missing parents. Safe to repeat.
   */
  async ensureBaseDir(): Promise<void> {
    await fs.mkdir(this.options.baseDir, { recursive: true });
  }

  /**
   * Ask a running build to stop. Folders in progress finish, with their
   * checkpoints; no further folder is started and `run()` resolves with
   * the partial summary.
   */
  stop(): void {
    this.stopRequested = true;
  }

  async run(): Promise<RunSummary> {
    const startedAt = new Date();
    this.counters = emptyCounters();
    let folderStarts = 0;

    await this.ensureBaseDir();
    await runFolders(
      this.options.folderCount,
      this.schedule,
      async (index) => {
        folderStarts++;
        await this.buildFolder(index);
      },
      () => this.stopRequested
    );

    const finishedAt = new Date();
    return {
      ...this.counters,
      interrupted: folderStarts < this.options.folderCount,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
    };
  }

  async buildFolder(index: number): Promise<FolderOutcome> {
    const { baseDir, folderCount, filesPerFolder, identifiers } = this.options;
    const folder = createFolderEntry(baseDir, index, identifiers.randomWord(this.wordLength));

    try {
      await fs.mkdir(folder.path, { recursive: true });
    } catch (error) {
      this.counters.foldersSkipped++;
      runLog('tree', `Skipping folder ${folder.name}: ${describeError(error)}`, 'warn');
      return { folder, created: false, filesWritten: 0, filesSkipped: 0 };
    }
    this.counters.foldersCreated++;

    await this.emitCheckpoint(folderCheckpointMessage(folder));

    let filesWritten = 0;
    let filesSkipped = 0;
    for (let fileIndex = 1; fileIndex <= filesPerFolder; fileIndex++) {
      if (await this.buildFile(folder, fileIndex)) {
        filesWritten++;
      } else {
        filesSkipped++;
      }
    }

    runLog('tree', `Completed folder ${index}/${folderCount}: ${folder.name}`);
    return { folder, created: true, filesWritten, filesSkipped };
  }

  /**
   * @returns whether the file was written (and checkpointed)
   */
  async buildFile(folder: FolderEntry, index: number): Promise<boolean> {
    const { identifiers, author } = this.options;
    const file: FileEntry = createFileEntry(folder, index, identifiers.timestamp(), identifiers.uuid());

    try {
      await writeTextFile(file.path, renderFileBody(file, author));
    } catch (error) {
      this.counters.filesSkipped++;
      runLog('tree', `Skipping file ${file.name}: ${describeError(error)}`, 'warn');
      return false;
    }
    this.counters.filesWritten++;

    await this.emitCheckpoint(fileCheckpointMessage(file));
    return true;
  }

  private async emitCheckpoint(message: string): Promise<void> {
    let error: string | undefined;
    try {
      const result = await this.checkpointer.checkpoint(message);
      if (result.skipped) {
        return;
      }
      if (!result.success) {
        error = result.error ?? 'unknown error';
      }
      if (result.staleLockDetected) {
        runLog('checkpoint', `Stale git index lock (${result.lockAgeMs ?? '?'}ms old) while recording "${message}"`, 'warn');
      }
    } catch (thrown) {
      error = describeError(thrown);
    }

    this.counters.checkpointsAttempted++;
    if (error !== undefined) {
      this.counters.checkpointsFailed++;
      runLog('checkpoint', `Checkpoint failed for "${message}": ${error}`, 'warn');
    }
  }
}
