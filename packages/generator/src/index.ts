#!/usr/bin/env node
/**
 * Tree Forge - batch tree generator with a git checkpoint per creation
 *
 * Configuration comes from TREEFORGE_* environment variables (see core/config.ts).
 * The working tree is expected to be an initialised git repository already.
 * SIGINT/SIGTERM stop the run after the folders in progress; a second signal
 * kills the process.
 */

import fs from 'fs/promises';
import path from 'path';
import { IdentifierGenerator, SeededRandom, systemClock } from '@treeforge/core';
import { parseGeneratorConfig } from './core/config.js';
import { runLog } from './core/runLog.js';
import { GitCheckpointer, findRepoRoot, isGitRepo } from './core/checkpoint/git.js';
import { NoopCheckpointer } from './core/checkpoint/serial.js';
import type { Checkpointer } from './core/checkpoint/types.js';
import { TreeBuilder } from './core/tree/builder.js';
import type { RunSummary } from './core/tree/types.js';

async function main(): Promise<void> {
  const config = parseGeneratorConfig();
  const repoPath = config.repoPath ?? (await findRepoRoot());

  let checkpointer: Checkpointer;
  if (config.checkpoints) {
    if (!(await isGitRepo(repoPath))) {
      runLog('checkpoint', `${repoPath} is not the root of a git repository; checkpoints will fail`, 'warn');
    }
    checkpointer = new GitCheckpointer(repoPath);
  } else {
    runLog('config', 'Checkpoints disabled');
    checkpointer = new NoopCheckpointer();
  }

  const random = new SeededRandom(config.seed);
  const builder = new TreeBuilder({
    baseDir: config.baseDir,
    folderCount: config.folderCount,
    filesPerFolder: config.filesPerFolder,
    wordLength: config.wordLength,
    author: config.author,
    identifiers: new IdentifierGenerator(random, systemClock),
    checkpointer,
    schedule: { mode: config.mode, concurrency: config.concurrency },
  });

  runLog(
    'generator',
    `Starting generation of ${config.folderCount} folders x ${config.filesPerFolder} files in ${config.baseDir} ` +
      `(${config.mode}, seed ${random.seed})`
  );

  const onSignal = (signal: NodeJS.Signals): void => {
    runLog('generator', `Received ${signal}; stopping after the folders in progress`, 'warn');
    builder.stop();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  let summary: RunSummary;
  try {
    summary = await builder.run();
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }

  if (summary.interrupted) {
    runLog('generator', 'Generation interrupted before all folders were created', 'warn');
  } else {
    runLog('generator', 'Successfully created all folders and files with checkpoints!');
  }
  runLog(
    'generator',
    `Folders: ${summary.foldersCreated} created, ${summary.foldersSkipped} skipped; ` +
      `files: ${summary.filesWritten} written, ${summary.filesSkipped} skipped; ` +
      `checkpoints: ${summary.checkpointsAttempted} attempted, ${summary.checkpointsFailed} failed; ` +
      `${(summary.durationMs / 1000).toFixed(2)}s`
  );

  if (config.statsFile) {
    await fs.mkdir(path.dirname(path.resolve(config.statsFile)), { recursive: true });
    await fs.writeFile(config.statsFile, JSON.stringify(summary, null, 2) + '\n', 'utf-8');
    runLog('generator', `Statistics saved to ${config.statsFile}`);
  }
}

main().catch((error: unknown) => {
  runLog('generator', `An error occurred: ${error instanceof Error ? error.message : String(error)}`, 'error');
  process.exit(1);
});
