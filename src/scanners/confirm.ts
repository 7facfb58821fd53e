import type { DuplicateGroup, FileRecord, Hasher, ProgressCallback } from '../types.js';
import { runWithConcurrency } from './pool.js';

export interface ConfirmOptions {
  hasher: Hasher;
  concurrency?: number;
  shouldStop?: () => boolean;
  onFileError?: (record: FileRecord, error: unknown) => void;
  onProgress?: ProgressCallback;
}

export interface ConfirmResult {
  groups: DuplicateGroup[];
  /** Full digests successfully computed */
  filesConfirmed: number;
  stopped: boolean;
}

/**
 * Split one bucket into groups of equal full digest, keeping member order.
 * Members without a digest (failed reads) are left out; singletons are dropped.
 */
export function partitionByDigest(
  bucket: readonly FileRecord[],
  digests: readonly (string | null)[]
): DuplicateGroup[] {
  const byDigest = new Map<string, FileRecord[]>();

  bucket.forEach((record, index) => {
    const digest = digests[index];
    if (digest === null || digest === undefined) return;
    const members = byDigest.get(digest);
    if (members) {
      members.push(record);
    } else {
      byDigest.set(digest, [record]);
    }
  });

  const groups: DuplicateGroup[] = [];
  for (const [digest, members] of byDigest) {
    if (members.length < 2) continue;
    groups.push({
      digest,
      size: members[0].size,
      paths: members.map((m) => m.relativePath),
    });
  }
  return groups;
}

/**
 * Full-hash every member of every candidate bucket and emit the exact
 * duplicate groups. Bucket members are all re-verified, including the first.
 */
export async function confirmDuplicates(
  buckets: readonly (readonly FileRecord[])[],
  options: ConfirmOptions
): Promise<ConfirmResult> {
  const shouldStop = options.shouldStop ?? (() => false);
  const candidates = buckets.filter((bucket) => bucket.length >= 2);
  const total = candidates.reduce((sum, bucket) => sum + bucket.length, 0);

  const groups: DuplicateGroup[] = [];
  let processed = 0;
  let filesConfirmed = 0;

  for (const bucket of candidates) {
    if (shouldStop()) {
      return { groups: [], filesConfirmed, stopped: true };
    }

    const digests = new Array<string | null>(bucket.length).fill(null);

    await runWithConcurrency(
      bucket.entries(),
      options.concurrency ?? 1,
      async ([index, record]) => {
        try {
          digests[index] = await options.hasher.fullHash(record.absolutePath);
          filesConfirmed++;
        } catch (error) {
          options.onFileError?.(record, error);
        }
        processed++;
        options.onProgress?.(processed, total);
      },
      shouldStop
    );

    if (shouldStop()) {
      return { groups: [], filesConfirmed, stopped: true };
    }

    groups.push(...partitionByDigest(bucket, digests));
  }

  return { groups, filesConfirmed, stopped: false };
}
