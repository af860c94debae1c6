/**
 * Tests for environment-driven configuration
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  DEFAULT_AUTHOR,
  DEFAULT_BASE_DIR,
  parseGeneratorConfig,
} from '../../src/core/config.js';

describe('parseGeneratorConfig', () => {
  it('should fall back to the built-in constants', () => {
    expect(parseGeneratorConfig({})).toEqual({
      baseDir: DEFAULT_BASE_DIR,
      folderCount: 1000,
      filesPerFolder: 100,
      wordLength: 8,
      author: DEFAULT_AUTHOR,
      mode: 'sequential',
      concurrency: 4,
      checkpoints: true,
    });
  });

  it('should read overrides from the environment', () => {
    const config = parseGeneratorConfig({
      TREEFORGE_BASE_DIR: 'out/tree',
      TREEFORGE_FOLDER_COUNT: '2',
      TREEFORGE_FILES_PER_FOLDER: '3',
      TREEFORGE_WORD_LENGTH: '12',
      TREEFORGE_AUTHOR: 'Test Author',
      TREEFORGE_MODE: 'Parallel',
      TREEFORGE_CONCURRENCY: '0',
      TREEFORGE_CHECKPOINTS: 'FALSE',
      TREEFORGE_REPO_PATH: '/work/repo',
      TREEFORGE_SEED: '42',
      TREEFORGE_STATS_FILE: 'stats.json',
    });

    expect(config).toEqual({
      baseDir: 'out/tree',
      folderCount: 2,
      filesPerFolder: 3,
      wordLength: 12,
      author: 'Test Author',
      mode: 'parallel',
      concurrency: 0,
      checkpoints: false,
      repoPath: '/work/repo',
      seed: 42,
      statsFile: 'stats.json',
    });
  });

  it('should treat blank variables as unset', () => {
    const config = parseGeneratorConfig({ TREEFORGE_BASE_DIR: '   ', TREEFORGE_FOLDER_COUNT: '' });
    expect(config.baseDir).toBe(DEFAULT_BASE_DIR);
    expect(config.folderCount).toBe(1000);
  });

  it('should accept the largest four-digit folder count', () => {
    expect(parseGeneratorConfig({ TREEFORGE_FOLDER_COUNT: '9999' }).folderCount).toBe(9999);
  });

  it.each([
    ['TREEFORGE_FOLDER_COUNT', '0', 'folderCount'],
    ['TREEFORGE_FOLDER_COUNT', '10000', 'folderCount'],
    ['TREEFORGE_FOLDER_COUNT', 'many', 'folderCount'],
    ['TREEFORGE_FILES_PER_FOLDER', '2.5', 'filesPerFolder'],
    ['TREEFORGE_WORD_LENGTH', '-1', 'wordLength'],
    ['TREEFORGE_MODE', 'turbo', 'mode'],
    ['TREEFORGE_CONCURRENCY', '-2', 'concurrency'],
    ['TREEFORGE_CHECKPOINTS', 'maybe', 'checkpoints'],
    ['TREEFORGE_SEED', '1.5', 'seed'],
  ])('should reject %s=%s', (variable, value, field) => {
    let caught: unknown;
    try {
      parseGeneratorConfig({ [variable]: value });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues).toHaveLength(1);
      expect(caught.issues[0].startsWith(`${field}: `)).toBe(true);
      expect(caught.message.startsWith('Invalid configuration: ')).toBe(true);
    }
  });

  it('should list every invalid field', () => {
    expect(() =>
      parseGeneratorConfig({ TREEFORGE_FOLDER_COUNT: '0', TREEFORGE_MODE: 'turbo' })
    ).toThrow(/folderCount: .*; mode: /);
  });
});
