/**
 * DuplicateReport
 * Aggregates walk results into totals and duplicate groups
 */

import path from 'node:path';
import chalk from 'chalk';
import * as logger from '../../utils/logger';
import type { StatefulFileInfo } from '../../interfaces/file-walker';

export interface DuplicateGroup {
  original: string;
  duplicates: string[];
}

export interface ReportSummary {
  totalFiles: number;
  uniqueFiles: number;
  duplicateFiles: number;
  totalBytes: number;
  duplicateBytes: number;
}

export function formatMegabytes(bytes: number): string {
  return (bytes / (1024 * 1024)).toFixed(2);
}

export class DuplicateReport {
  verbosity: number;
  totalFiles: number;
  uniqueFiles: number;
  duplicateFiles: number;
  totalBytes: number;
  duplicateBytes: number;
  private groups: Map<string, string[]>;

  constructor(verbosity: number = logger.Verbosity.Normal) {
    this.verbosity = verbosity;
    this.totalFiles = 0;
    this.uniqueFiles = 0;
    this.duplicateFiles = 0;
    this.totalBytes = 0;
    this.duplicateBytes = 0;
    this.groups = new Map();
  }

  /**
   * Count a reported file; duplicates are grouped under the relative path
   * of the first file seen with the same content
   */
  record(file: StatefulFileInfo) {
    this.totalFiles++;
    this.totalBytes += file.info.size;

    if (!file.alreadySeen) {
      this.uniqueFiles++;
      return;
    }

    this.duplicateFiles++;
    this.duplicateBytes += file.info.size;

    const relativePath = path.relative(file.absSearchDirPath, file.filePath);
    const duplicates = this.groups.get(file.previousFilePath);
    if (duplicates) {
      duplicates.push(relativePath);
    } else {
      this.groups.set(file.previousFilePath, [relativePath]);
    }
  }

  /**
   * Duplicate groups in the order their first duplicate was found
   */
  getDuplicateGroups(): DuplicateGroup[] {
    return Array.from(this.groups, ([original, duplicates]) => ({
      original,
      duplicates: [...duplicates],
    }));
  }

  getSummary(): ReportSummary {
    return {
      totalFiles: this.totalFiles,
      uniqueFiles: this.uniqueFiles,
      duplicateFiles: this.duplicateFiles,
      totalBytes: this.totalBytes,
      duplicateBytes: this.duplicateBytes,
    };
  }

  /**
   * Print the final summary, regardless of verbosity
   */
  displaySummary() {
    if (this.duplicateFiles === 0) {
      logger.always(
        chalk.green(`No duplicates found among ${this.totalFiles} files.`),
      );
      return;
    }

    logger.always(
      chalk.yellow(
        `Found ${this.duplicateFiles} duplicate files (${formatMegabytes(this.duplicateBytes)} MB reclaimable) among ${this.totalFiles} files.`,
      ),
    );

    for (const group of this.getDuplicateGroups()) {
      logger.verbose(
        `${group.original}: ${group.duplicates.length} duplicate(s)`,
        this.verbosity,
      );
    }
  }
}

export function createDuplicateReport(
  verbosity: number = logger.Verbosity.Normal,
) {
  return new DuplicateReport(verbosity);
}
