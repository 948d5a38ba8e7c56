import path from 'node:path';
import { PathResolutionError, ValidationError } from './errors';
import { defaultHasherFn, hashFileSync } from './hash/file-hasher';
import { SKIP_DIR, walkSync, type WalkEntry } from './walk';
import type {
  FindUniqueFilesConfig,
  HasherFn,
} from '../interfaces/file-walker';

/**
 * Throws a ValidationError when a required field is missing.
 */
export function validateConfig(
  config: Partial<FindUniqueFilesConfig>,
): asserts config is FindUniqueFilesConfig {
  if (typeof config.targetDirPath !== 'string') {
    throw new ValidationError('targetDirPath must be a string');
  }
  if (typeof config.includeFileFn !== 'function') {
    throw new ValidationError('includeFileFn must be a function');
  }
  if (typeof config.foundFileFn !== 'function') {
    throw new ValidationError('foundFileFn must be a function');
  }
}

function resolveSearchDir(targetDirPath: string): string {
  try {
    return path.resolve(targetDirPath);
  } catch (error) {
    throw new PathResolutionError(targetDirPath, error);
  }
}

export function createStatefulWalker(config: FindUniqueFilesConfig) {
  validateConfig(config);

  const absSearchDirPath = resolveSearchDir(config.targetDirPath);
  const hasherFn: HasherFn = config.hasherFn ?? defaultHasherFn;
  const fileHashesToPrevious = new Map<string, string>();

  const visit = (entry: WalkEntry): typeof SKIP_DIR | void => {
    if (entry.error !== null) {
      throw entry.error;
    }

    const { path: filePath, stats } = entry;

    if (
      !config.recursive &&
      stats.isDirectory() &&
      filePath !== absSearchDirPath
    ) {
      return SKIP_DIR;
    }

    // Symbolic links, devices, FIFOs and sockets are not supported.
    if (stats.isDirectory() || !stats.isFile()) {
      return;
    }

    if (!config.includeFileFn(filePath)) {
      return;
    }

    let alreadySeen = false;
    let hash = '';
    let previousFilePath = '';

    if (!config.allowDupes) {
      hash = hashFileSync(filePath, hasherFn());

      const previous = fileHashesToPrevious.get(hash);
      if (previous === undefined) {
        fileHashesToPrevious.set(
          hash,
          path.relative(absSearchDirPath, filePath),
        );
      } else {
        alreadySeen = true;
        previousFilePath = previous;
      }
    }

    const failure = config.foundFileFn({
      alreadySeen,
      previousFilePath,
      filePath,
      parentDirPath: path.dirname(filePath),
      hash,
      info: stats,
      absSearchDirPath,
    });
    if (failure instanceof Error) {
      throw failure;
    }
  };

  /**
   * Walks the search directory once, reporting every included file.
   * The first error of any kind ends the walk and is thrown.
   */
  const search = (): void => {
    fileHashesToPrevious.clear();
    walkSync(absSearchDirPath, visit);
  };

  return {
    absSearchDirPath,
    search,
    get seenHashes() {
      return fileHashesToPrevious.size;
    },
  };
}

export type StatefulWalker = ReturnType<typeof createStatefulWalker>;

/**
 * Searches config.targetDirPath, reporting each included file to
 * config.foundFileFn along with whether its content was already seen.
 */
export function findUniqueFiles(config: FindUniqueFilesConfig): void {
  createStatefulWalker(config).search();
}
