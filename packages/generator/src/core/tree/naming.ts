/**
 * Names, file bodies and checkpoint messages derived from identifiers
 */

import path from 'path';
import type { FileEntry, FolderEntry } from './types.js';

export function formatFolderName(index: number, word: string): string {
  return `${String(index).padStart(4, '0')}_${word}`;
}

export function formatFileName(folderName: string, timestamp: string): string {
  return `${folderName}_${timestamp}.txt`;
}

export function createFolderEntry(baseDir: string, index: number, word: string): FolderEntry {
  const name = formatFolderName(index, word);
  return { index, word, name, path: path.join(baseDir, name) };
}

export function createFileEntry(
  folder: FolderEntry,
  index: number,
  timestamp: string,
  uuid: string
): FileEntry {
  const name = formatFileName(folder.name, timestamp);
  return { folder, index, timestamp, uuid, name, path: path.join(folder.path, name) };
}

/**
 * Six lines, each newline-terminated
 */
export function renderFileBody(file: FileEntry, author: string): string {
  return [
    `Timestamp: ${file.timestamp}`,
    `Date: ${file.timestamp.slice(0, 10)}`,
    `Created by: ${author}`,
    `Folder: ${file.folder.name}`,
    `File: ${file.name}`,
    `UUID: ${file.uuid}`,
  ].map(line => `${line}\n`).join('');
}

export function folderCheckpointMessage(folder: FolderEntry): string {
  return `Created folder: ${folder.name}`;
}

export function fileCheckpointMessage(file: FileEntry): string {
  return `Created file in ${file.folder.name}: ${file.name}`;
}
