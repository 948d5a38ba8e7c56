/**
 * Stateful walker related interfaces and types
 */

import type fs from 'node:fs';

/**
 * A streaming digest accumulator. Node's crypto.Hash satisfies this.
 */
export interface Hasher {
  update(data: Uint8Array): unknown;
  digest(): Uint8Array;
}

/**
 * Returns a fresh hasher for every file that gets hashed
 */
export type HasherFn = () => Hasher;

/**
 * Decides whether a regular file found during the walk is reported
 */
export type IncludeFileFn = (fullFilePath: string) => boolean;

/**
 * Receives every included file. Returning or throwing an Error aborts the
 * walk and that error propagates out of search() unchanged.
 */
export type FoundFileFn = (info: StatefulFileInfo) => Error | void;

/**
 * Configures a single walk
 */
export interface FindUniqueFilesConfig {
  /** Directory to search. Resolved to an absolute path before use. */
  targetDirPath: string;
  /** Descend into subdirectories of targetDirPath. */
  recursive?: boolean;
  /**
   * Skip hashing entirely. Every file is then reported as never seen,
   * with an empty hash.
   */
  allowDupes?: boolean;
  /** Defaults to SHA-256. */
  hasherFn?: HasherFn;
  includeFileFn: IncludeFileFn;
  foundFileFn: FoundFileFn;
}

/**
 * File metadata plus what the walk knows about the file's content
 */
export interface StatefulFileInfo {
  /** Always false when allowDupes is set. */
  alreadySeen: boolean;
  filePath: string;
  /**
   * Path, relative to the search root, of the first file seen with the
   * same content. Empty when the content has not been seen before.
   */
  previousFilePath: string;
  parentDirPath: string;
  /** Lowercase hex digest. Empty when allowDupes is set. */
  hash: string;
  info: fs.Stats;
  absSearchDirPath: string;
}
