import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  createDuplicateReport,
  DuplicateReport,
  formatMegabytes,
} from './duplicate-report';
import { Verbosity } from '../../interfaces/logger';
import {
  captureStdout,
  createMockFileInfo,
} from '../../../test-config/mocks/test-helpers';

describe('DuplicateReport', () => {
  let report: DuplicateReport;

  beforeEach(() => {
    report = createDuplicateReport(Verbosity.Normal);
  });

  const recordSample = () => {
    report.record(createMockFileInfo({ filePath: '/search/a.txt', size: 10 }));
    report.record(
      createMockFileInfo({
        filePath: '/search/b.txt',
        alreadySeen: true,
        previousFilePath: 'a.txt',
        size: 10,
      }),
    );
    report.record(
      createMockFileInfo({ filePath: '/search/docs/c.md', size: 30 }),
    );
    report.record(
      createMockFileInfo({
        filePath: '/search/docs/copy.txt',
        alreadySeen: true,
        previousFilePath: 'a.txt',
        size: 10,
      }),
    );
  };

  it('should start empty', () => {
    expect(report.getSummary()).toEqual({
      totalFiles: 0,
      uniqueFiles: 0,
      duplicateFiles: 0,
      totalBytes: 0,
      duplicateBytes: 0,
    });
    expect(report.getDuplicateGroups()).toEqual([]);
  });

  it('should count unique and duplicate files', () => {
    recordSample();

    expect(report.getSummary()).toEqual({
      totalFiles: 4,
      uniqueFiles: 2,
      duplicateFiles: 2,
      totalBytes: 60,
      duplicateBytes: 20,
    });
  });

  it('should group duplicates under the first occurrence', () => {
    recordSample();

    expect(report.getDuplicateGroups()).toEqual([
      { original: 'a.txt', duplicates: ['b.txt', 'docs/copy.txt'] },
    ]);
  });

  describe('displaySummary', () => {
    let capture: ReturnType<typeof captureStdout>;

    beforeEach(() => {
      capture = captureStdout();
    });

    afterEach(() => {
      capture.restore();
    });

    it('should say when no duplicates were found', () => {
      report.record(createMockFileInfo());

      report.displaySummary();

      expect(capture.output).toHaveLength(1);
      expect(capture.output[0]).toContain(
        'No duplicates found among 1 files.',
      );
    });

    it('should show the duplicate count and reclaimable size', () => {
      recordSample();

      report.displaySummary();

      expect(capture.output).toHaveLength(1);
      expect(capture.output[0]).toContain(
        'Found 2 duplicate files (0.00 MB reclaimable) among 4 files.',
      );
    });

    it('should list groups at verbose level', () => {
      report = createDuplicateReport(Verbosity.Verbose);
      recordSample();

      report.displaySummary();

      expect(capture.output[1]).toBe('a.txt: 2 duplicate(s)\n');
    });

    it('should print the summary even when quiet', () => {
      report = createDuplicateReport(Verbosity.Quiet);
      recordSample();

      report.displaySummary();

      expect(capture.output).toHaveLength(1);
    });
  });
});

describe('formatMegabytes', () => {
  it('should render two decimals', () => {
    expect(formatMegabytes(0)).toBe('0.00');
    expect(formatMegabytes(1024 * 1024)).toBe('1.00');
    expect(formatMegabytes(1.5 * 1024 * 1024)).toBe('1.50');
  });
});
