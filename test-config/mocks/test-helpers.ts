/**
 * Consolidated Test Helpers
 *
 * Fixture trees are real directories under the OS temp dir, so the walker
 * runs against the actual filesystem.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { StatefulFileInfo } from '../../src/interfaces/file-walker';

/**
 * Map of relative file path to content. A trailing slash creates an empty
 * directory instead of a file.
 */
export type TreeLayout = Record<string, string>;

export function createTempTree(layout: TreeLayout = {}): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'unique-files-'));
  for (const [relativePath, content] of Object.entries(layout)) {
    const target = path.join(root, relativePath);
    if (relativePath.endsWith('/')) {
      fs.mkdirSync(target, { recursive: true });
      continue;
    }
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  }
  return root;
}

export function removeTempTree(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}

/**
 * Replaces process.stdout.write until the returned restore function is called
 */
export function captureStdout(): { output: string[]; restore: () => void } {
  const originalWrite = process.stdout.write;
  const output: string[] = [];

  process.stdout.write = function (chunk: string | Uint8Array): boolean {
    output.push(String(chunk));
    return true;
  } as typeof process.stdout.write;

  return {
    output,
    restore: () => {
      process.stdout.write = originalWrite;
    },
  };
}

/**
 * Builds a result record without touching the filesystem
 */
export function createMockFileInfo(
  overrides: Partial<StatefulFileInfo> & { size?: number } = {},
): StatefulFileInfo {
  const { size = 100, ...rest } = overrides;
  const stats = new fs.Stats();
  stats.size = size;

  return {
    alreadySeen: false,
    previousFilePath: '',
    filePath: '/search/file.txt',
    parentDirPath: '/search',
    hash: 'abc123',
    info: stats,
    absSearchDirPath: '/search',
    ...rest,
  };
}
