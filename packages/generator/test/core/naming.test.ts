/**
 * Tests for folder/file naming and file bodies
 */

import { describe, it, expect } from 'vitest';
import path from 'path';
import {
  createFileEntry,
  createFolderEntry,
  fileCheckpointMessage,
  folderCheckpointMessage,
  formatFileName,
  formatFolderName,
  renderFileBody,
} from '../../src/core/tree/naming.js';

const TS = '2024-03-14_09-26-53-000250';
const UUID = '3f2b8c1a-9d4e-4a7b-8c6d-0e1f2a3b4c5d';

describe('formatFolderName', () => {
  it('should pad the index to four digits', () => {
    expect(formatFolderName(1, 'aB3dE5gH')).toBe('0001_aB3dE5gH');
    expect(formatFolderName(42, 'aB3dE5gH')).toBe('0042_aB3dE5gH');
    expect(formatFolderName(1000, 'aB3dE5gH')).toBe('1000_aB3dE5gH');
  });
});

describe('formatFileName', () => {
  it('should embed the folder name and timestamp', () => {
    expect(formatFileName('0007_aB3dE5gH', TS)).toBe(`0007_aB3dE5gH_${TS}.txt`);
  });
});

describe('entries', () => {
  it('should place the folder under the base directory', () => {
    const folder = createFolderEntry('generated_folders', 3, 'zZ9yY8xX');
    expect(folder).toEqual({
      index: 3,
      word: 'zZ9yY8xX',
      name: '0003_zZ9yY8xX',
      path: path.join('generated_folders', '0003_zZ9yY8xX'),
    });
  });

  it('should place the file inside its folder', () => {
    const folder = createFolderEntry('generated_folders', 3, 'zZ9yY8xX');
    const file = createFileEntry(folder, 2, TS, UUID);

    expect(file.name).toBe(`0003_zZ9yY8xX_${TS}.txt`);
    expect(file.path).toBe(path.join('generated_folders', '0003_zZ9yY8xX', `0003_zZ9yY8xX_${TS}.txt`));
    expect(file.index).toBe(2);
    expect(file.folder).toBe(folder);
  });
});

describe('renderFileBody', () => {
  it('should render six newline-terminated lines', () => {
    const folder = createFolderEntry('out', 12, 'Q1w2E3r4');
    const file = createFileEntry(folder, 1, TS, UUID);

    expect(renderFileBody(file, 'Test Author')).toBe(
      `Timestamp: ${TS}\n` +
      'Date: 2024-03-14\n' +
      'Created by: Test Author\n' +
      'Folder: 0012_Q1w2E3r4\n' +
      `File: 0012_Q1w2E3r4_${TS}.txt\n` +
      `UUID: ${UUID}\n`
    );
  });
});

describe('checkpoint messages', () => {
  it('should describe folder and file creation', () => {
    const folder = createFolderEntry('out', 12, 'Q1w2E3r4');
    const file = createFileEntry(folder, 1, TS, UUID);

    expect(folderCheckpointMessage(folder)).toBe('Created folder: 0012_Q1w2E3r4');
    expect(fileCheckpointMessage(file)).toBe(`Created file in 0012_Q1w2E3r4: 0012_Q1w2E3r4_${TS}.txt`);
  });
});
