import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  SKIP_DIR,
  walkSync,
  type WalkEntry,
  type WalkVisitor,
} from './walk';
import {
  createTempTree,
  removeTempTree,
} from '../../test-config/mocks/test-helpers';

describe('walkSync', () => {
  let root: string;

  beforeEach(() => {
    root = createTempTree({
      'b.txt': 'b',
      'a/inner.txt': 'inner',
      'a/nested/deep.txt': 'deep',
      'empty/': '',
    });
  });

  afterEach(() => {
    removeTempTree(root);
  });

  const visitedPaths = (visit?: WalkVisitor) => {
    const seen: string[] = [];
    walkSync(root, (entry) => {
      seen.push(path.relative(root, entry.path) || '.');
      return visit?.(entry);
    });
    return seen;
  };

  it('should visit parents before children in name order', () => {
    expect(visitedPaths()).toEqual([
      '.',
      'a',
      path.join('a', 'inner.txt'),
      path.join('a', 'nested'),
      path.join('a', 'nested', 'deep.txt'),
      'b.txt',
      'empty',
    ]);
  });

  it('should not read a directory the visitor skips', () => {
    const seen = visitedPaths((entry) =>
      entry.path === path.join(root, 'a') ? SKIP_DIR : undefined,
    );

    expect(seen).toEqual(['.', 'a', 'b.txt', 'empty']);
  });

  it('should report symbolic links without following them', () => {
    fs.symlinkSync(path.join(root, 'a'), path.join(root, 'c-link'));
    const links: string[] = [];

    const seen = visitedPaths((entry) => {
      if (entry.error === null && entry.stats.isSymbolicLink()) {
        links.push(path.basename(entry.path));
      }
    });

    expect(links).toEqual(['c-link']);
    expect(seen).not.toContain(path.join('c-link', 'inner.txt'));
  });

  it('should report a symlinked root as a link without reading its target', () => {
    const linkedRoot = `${root}-link`;
    fs.symlinkSync(root, linkedRoot);
    const visited: string[] = [];

    try {
      walkSync(linkedRoot, (entry) => {
        visited.push(entry.path);
        expect(entry.error).toBeNull();
        expect(entry.stats?.isSymbolicLink()).toBe(true);
      });
    } finally {
      fs.unlinkSync(linkedRoot);
    }

    expect(visited).toEqual([linkedRoot]);
  });

  it('should hand a missing root to the visitor as an error', () => {
    const missing = path.join(root, 'missing');
    const visit = vi.fn((_entry: WalkEntry) => undefined);

    walkSync(missing, visit);

    expect(visit).toHaveBeenCalledTimes(1);
    const [entry] = visit.mock.calls[0];
    expect(entry.path).toBe(missing);
    expect(entry.stats).toBeNull();
    expect(entry.error).toMatchObject({ code: 'ENOENT' });
  });

  it('should hand directory listing failures to the visitor and move on', () => {
    const readdirSpy = vi
      .spyOn(fs, 'readdirSync')
      .mockImplementationOnce(() => {
        throw new Error('EACCES: permission denied');
      });
    const errors: string[] = [];

    try {
      walkSync(root, (entry) => {
        if (entry.error !== null) {
          errors.push(entry.error.message);
        }
      });
    } finally {
      readdirSpy.mockRestore();
    }

    expect(errors).toEqual(['EACCES: permission denied']);
  });

  it('should stop as soon as the visitor throws', () => {
    const failure = new Error('abort');
    const seen: string[] = [];

    expect(() =>
      walkSync(root, (entry) => {
        seen.push(entry.path);
        if (entry.path.endsWith('inner.txt')) {
          throw failure;
        }
      }),
    ).toThrow(failure);
    expect(seen).toHaveLength(3);
  });
});
