import fs from 'node:fs';
import path from 'node:path';
import { toError } from './errors';

/**
 * Returned by a visitor to keep the walk out of a directory's contents
 */
export const SKIP_DIR = Symbol('skipDir');

export type WalkEntry =
  | { path: string; stats: fs.Stats; error: null }
  | { path: string; stats: fs.Stats | null; error: Error };

export type WalkVisitor = (entry: WalkEntry) => typeof SKIP_DIR | void;

/**
 * Depth-first, synchronous walk of the tree under root. Entries are lstat'ed,
 * so symbolic links are reported but never followed. That includes the root:
 * a root that is a symbolic link to a directory is reported as a link and its
 * target is not read. Children are visited in name order after their parent.
 *
 * Failures to stat an entry or list a directory are handed to the visitor,
 * which decides whether to carry on or throw. Anything the visitor throws
 * ends the walk.
 */
export function walkSync(root: string, visit: WalkVisitor): void {
  let stats: fs.Stats;
  try {
    stats = fs.lstatSync(root);
  } catch (error) {
    visit({ path: root, stats: null, error: toError(error) });
    return;
  }

  walkEntry(root, stats, visit);
}

function walkEntry(entryPath: string, stats: fs.Stats, visit: WalkVisitor) {
  const action = visit({ path: entryPath, stats, error: null });
  if (!stats.isDirectory() || action === SKIP_DIR) {
    return;
  }

  let names: string[];
  try {
    names = fs.readdirSync(entryPath).sort();
  } catch (error) {
    visit({ path: entryPath, stats, error: toError(error) });
    return;
  }

  for (const name of names) {
    const childPath = path.join(entryPath, name);
    let childStats: fs.Stats;
    try {
      childStats = fs.lstatSync(childPath);
    } catch (error) {
      visit({ path: childPath, stats: null, error: toError(error) });
      continue;
    }

    walkEntry(childPath, childStats, visit);
  }
}
