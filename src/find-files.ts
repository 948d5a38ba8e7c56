import path from 'node:path';
import * as logger from './utils/logger';
import { Verbosity } from './interfaces/logger';
import { findUniqueFiles } from './core/stateful-walker';
import { createHasherFn, DEFAULT_ALGORITHM } from './core/hash/file-hasher';
import {
  createDuplicateReport,
  type ReportSummary,
} from './core/report/duplicate-report';
import { createIncludeFilter } from './utils/pattern-utils';
import type { StatefulFileInfo } from './interfaces/file-walker';

export interface FindOptions {
  recursive?: boolean;
  allowDupes?: boolean;
  algorithm?: string;
  patterns?: string[];
  hidden?: boolean;
  all?: boolean;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

export interface FindDependencies {
  findUniqueFiles?: typeof findUniqueFiles;
  createDuplicateReport?: typeof createDuplicateReport;
  write?: (line: string) => void;
}

export interface FileRecord {
  path: string;
  alreadySeen: boolean;
  previousPath: string;
  hash: string;
  size: number;
}

export function toFileRecord(file: StatefulFileInfo): FileRecord {
  return {
    path: path.relative(file.absSearchDirPath, file.filePath),
    alreadySeen: file.alreadySeen,
    previousPath: file.previousFilePath,
    hash: file.hash,
    size: file.info.size,
  };
}

/**
 * Walks targetDir and prints what was found: duplicates by default, every
 * file with `all`, or one JSON line per file with `json`.
 */
export function findFiles(
  targetDir: string,
  options: FindOptions,
  dependencies: FindDependencies = {},
): ReportSummary {
  const walk = dependencies.findUniqueFiles ?? findUniqueFiles;
  const makeReport =
    dependencies.createDuplicateReport ?? createDuplicateReport;
  const write = dependencies.write ?? logger.always;

  const verbosity = options.quiet
    ? Verbosity.Quiet
    : options.verbose
      ? Verbosity.Verbose
      : Verbosity.Normal;

  const algorithm = options.algorithm ?? DEFAULT_ALGORITHM;
  const hasherFn = createHasherFn(algorithm);
  const report = makeReport(verbosity);

  if (!options.json) {
    logger.info(
      `Searching ${path.resolve(targetDir)}${options.recursive ? ' recursively' : ''}...`,
      verbosity,
    );
  }

  walk({
    targetDirPath: targetDir,
    recursive: options.recursive,
    allowDupes: options.allowDupes,
    hasherFn,
    includeFileFn: createIncludeFilter(targetDir, {
      patterns: options.patterns,
      includeHidden: options.hidden,
    }),
    foundFileFn: (file) => {
      report.record(file);
      const record = toFileRecord(file);

      if (options.json) {
        write(JSON.stringify(record));
        return;
      }

      if (record.alreadySeen) {
        write(`${record.path} duplicates ${record.previousPath}`);
      } else if (options.all) {
        write(record.path);
      } else {
        logger.verbose(`Unique: ${record.path}`, verbosity);
      }
    },
  });

  if (!options.json) {
    report.displaySummary();
  }

  return report.getSummary();
}
