/**
 * Generator configuration
 *
 * Every setting has a constant default; TREEFORGE_* environment variables
 * override them. The merged values are validated with zod before a run starts.
 */

import { z } from 'zod';

export const DEFAULT_BASE_DIR = 'generated_folders';
export const DEFAULT_AUTHOR = 'Tree Forge Generator';

/**
 * Folder indices are padded to four digits, so 9999 is the largest
 * count that keeps names fixed-width.
 */
export const MAX_FOLDER_COUNT = 9999;

const ExecutionModeSchema = z.enum(['sequential', 'parallel']);

export type ExecutionMode = z.infer<typeof ExecutionModeSchema>;

export const GeneratorConfigSchema = z.object({
  baseDir: z.string().min(1, 'baseDir must not be empty').default(DEFAULT_BASE_DIR),
  folderCount: z.number().int().min(1).max(MAX_FOLDER_COUNT).default(1000),
  filesPerFolder: z.number().int().min(1).default(100),
  wordLength: z.number().int().min(1).default(8),
  author: z.string().min(1, 'author must not be empty').default(DEFAULT_AUTHOR),
  mode: ExecutionModeSchema.default('sequential'),
  /** Folder workers in parallel mode; 0 means one worker per folder */
  concurrency: z.number().int().min(0).default(4),
  checkpoints: z.boolean().default(true),
  repoPath: z.string().min(1).optional(),
  seed: z.number().int().optional(),
  statsFile: z.string().min(1).optional(),
});

export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

function stringFromEnv(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** Unset stays undefined; anything unparsable becomes NaN and fails validation */
function numberFromEnv(value: string | undefined): number | undefined {
  const trimmed = stringFromEnv(value);
  return trimmed === undefined ? undefined : Number(trimmed);
}

function booleanFromEnv(value: string | undefined): boolean | string | undefined {
  const trimmed = stringFromEnv(value)?.toLowerCase();
  if (trimmed === 'true') return true;
  if (trimmed === 'false') return false;
  return trimmed;
}

/**
 * Build and validate the configuration from environment variables
 */
export function parseGeneratorConfig(env: NodeJS.ProcessEnv = process.env): GeneratorConfig {
  const raw: Record<string, unknown> = {
    baseDir: stringFromEnv(env.TREEFORGE_BASE_DIR),
    folderCount: numberFromEnv(env.TREEFORGE_FOLDER_COUNT),
    filesPerFolder: numberFromEnv(env.TREEFORGE_FILES_PER_FOLDER),
    wordLength: numberFromEnv(env.TREEFORGE_WORD_LENGTH),
    author: stringFromEnv(env.TREEFORGE_AUTHOR),
    mode: stringFromEnv(env.TREEFORGE_MODE)?.toLowerCase(),
    concurrency: numberFromEnv(env.TREEFORGE_CONCURRENCY),
    checkpoints: booleanFromEnv(env.TREEFORGE_CHECKPOINTS),
    repoPath: stringFromEnv(env.TREEFORGE_REPO_PATH),
    seed: numberFromEnv(env.TREEFORGE_SEED),
    statsFile: stringFromEnv(env.TREEFORGE_STATS_FILE),
  };

  const result = GeneratorConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}
