/**
 * Include filters for the walker: glob patterns and hidden-file handling
 */

import path from 'node:path';
import picomatch from 'picomatch';
import type { IncludeFileFn } from '../interfaces/file-walker';

const MATCH_OPTIONS: picomatch.PicomatchOptions = {
  basename: true,
  dot: true,
};

/**
 * Matches a path against a glob pattern. Patterns without a slash are
 * matched against the basename.
 */
export function matchPattern(filePath: string, pattern: string): boolean {
  return picomatch.isMatch(filePath, pattern, MATCH_OPTIONS);
}

/**
 * True when any segment of the path starts with a dot
 */
export function isHiddenPath(relativePath: string): boolean {
  return relativePath
    .split(/[\\/]/)
    .some(
      (segment) =>
        segment.startsWith('.') && segment !== '.' && segment !== '..',
    );
}

export interface IncludeFilterOptions {
  patterns?: string[];
  includeHidden?: boolean;
}

export function createIncludeFilter(
  rootDir: string,
  options: IncludeFilterOptions = {},
): IncludeFileFn {
  const absRootDir = path.resolve(rootDir);
  const patterns = options.patterns ?? [];
  const matchers = patterns.map((pattern) =>
    picomatch(pattern, MATCH_OPTIONS),
  );

  return (fullFilePath: string): boolean => {
    const relativePath = path
      .relative(absRootDir, fullFilePath)
      .split(path.sep)
      .join('/');

    if (!options.includeHidden && isHiddenPath(relativePath)) {
      return false;
    }

    if (matchers.length === 0) {
      return true;
    }

    return matchers.some((isMatch) => isMatch(relativePath));
  };
}
