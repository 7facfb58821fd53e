import type { DuplicateGroup } from '../types.js';

/**
 * Drop zero-byte groups (and groups under `minSize`), then order by size,
 * largest first. The sort is stable: equal sizes keep their input order.
 */
export function rankGroups(groups: readonly DuplicateGroup[], minSize = 0): DuplicateGroup[] {
  const threshold = Math.max(1, minSize);
  return groups
    .filter((group) => group.paths.length >= 2 && group.size >= threshold)
    .sort((a, b) => b.size - a.size);
}

export function wastedBytes(groups: readonly DuplicateGroup[]): number {
  return groups.reduce((sum, group) => sum + group.size * (group.paths.length - 1), 0);
}
