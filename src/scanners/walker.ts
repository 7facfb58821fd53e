import { readdir, stat } from 'fs/promises';
import type { Dirent, Stats } from 'fs';
import { join, relative, resolve, sep } from 'path';
import type { FileRecord, ScanWarning } from '../types.js';
import { InvalidRootError, errorMessage } from './errors.js';

export interface WalkOptions {
  ignoredFolders?: string[];
  ignoredPaths?: string[];
  onWarning?: (warning: ScanWarning) => void;
}

interface WalkContext {
  root: string;
  ignoredFolders: Set<string>;
  ignoredPaths: Set<string>;
  warn: (warning: ScanWarning) => void;
}

/**
 * Resolve the scan root and make sure it is a directory we can list.
 * Returns the absolute path.
 */
export async function assertValidRoot(root: string): Promise<string> {
  if (!root || root.trim() === '') {
    throw new InvalidRootError(root, 'no directory given');
  }

  const absolute = resolve(root);
  let stats: Stats;
  try {
    stats = await stat(absolute);
  } catch (error) {
    throw new InvalidRootError(root, errorMessage(error));
  }

  if (!stats.isDirectory()) {
    throw new InvalidRootError(root, 'not a directory');
  }

  try {
    await readdir(absolute);
  } catch (error) {
    throw new InvalidRootError(root, errorMessage(error));
  }

  return absolute;
}

export function toRelativePath(root: string, absolutePath: string): string {
  return relative(root, absolutePath).split(sep).join('/');
}

function byName(a: Dirent, b: Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

async function* walkDirectory(dir: string, ctx: WalkContext): AsyncGenerator<FileRecord> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    ctx.warn({ kind: 'walk', path: toRelativePath(ctx.root, dir) || '.', message: errorMessage(error) });
    return;
  }

  entries.sort(byName);

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (!ctx.ignoredFolders.has(fullPath)) {
        yield* walkDirectory(fullPath, ctx);
      }
      continue;
    }

    if (ctx.ignoredPaths.has(fullPath)) continue;
    if (!entry.isFile() && !entry.isSymbolicLink()) continue;

    // stat follows links: a link to a file reads as that file, a link to a directory is skipped
    let stats: Stats;
    try {
      stats = await stat(fullPath);
    } catch (error) {
      ctx.warn({ kind: 'walk', path: toRelativePath(ctx.root, fullPath), message: errorMessage(error) });
      continue;
    }

    if (!stats.isFile()) continue;

    yield {
      absolutePath: fullPath,
      relativePath: toRelativePath(ctx.root, fullPath),
      size: stats.size,
    };
  }
}

/**
 * Lazily enumerate every regular file under `root`, depth first, entries in name order.
 * Unreadable directories are reported through `onWarning` and skipped.
 */
export function walkFiles(root: string, options: WalkOptions = {}): AsyncGenerator<FileRecord> {
  const absoluteRoot = resolve(root);
  return walkDirectory(absoluteRoot, {
    root: absoluteRoot,
    ignoredFolders: new Set((options.ignoredFolders ?? []).map((p) => resolve(p))),
    ignoredPaths: new Set((options.ignoredPaths ?? []).map((p) => resolve(p))),
    warn: options.onWarning ?? (() => {}),
  });
}

/**
 * Pre-pass used for progress totals. Warnings are left to the hashing walk.
 */
export async function countFiles(
  root: string,
  options: Omit<WalkOptions, 'onWarning'> = {},
  shouldStop: () => boolean = () => false
): Promise<number> {
  let count = 0;
  for await (const _record of walkFiles(root, options)) {
    if (shouldStop()) break;
    count++;
  }
  return count;
}
