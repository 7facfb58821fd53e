import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import type { Hasher, ScanOutcome, ScanState } from '../types.js';
import { DuplicatesScanner, findDuplicates } from './duplicates.js';
import { FileReadError } from './errors.js';
import { xxhashHasher } from './hasher.js';

const blocked = vi.hoisted(() => new Set<string>());

vi.mock('fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs/promises')>();
  return {
    ...actual,
    readdir: (...args: Parameters<typeof actual.readdir>) => {
      const target = String(args[0]);
      if (blocked.has(target)) {
        return Promise.reject(
          Object.assign(new Error(`EACCES: permission denied, scandir '${target}'`), { code: 'EACCES' })
        );
      }
      return actual.readdir(...args);
    },
  };
});

async function writeTree(root: string, files: Record<string, string | Buffer>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = join(root, relativePath);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, content);
  }
}

interface RecordingHasher extends Hasher {
  prefixCalls: string[];
  fullCalls: string[];
}

/** Real hashing, with call tracking and optional per-file failures */
function recordingHasher(failing: { prefix?: string[]; full?: string[] } = {}): RecordingHasher {
  const hasher: RecordingHasher = {
    prefixCalls: [],
    fullCalls: [],
    async prefixHash(path, limit) {
      hasher.prefixCalls.push(path);
      if (failing.prefix?.some((suffix) => path.endsWith(suffix))) {
        throw new FileReadError(path, 'prefix', new Error('EMFILE: too many open files'));
      }
      return xxhashHasher.prefixHash(path, limit);
    },
    async fullHash(path) {
      hasher.fullCalls.push(path);
      if (failing.full?.some((suffix) => path.endsWith(suffix))) {
        throw new FileReadError(path, 'full', new Error('ENOENT: no such file or directory'));
      }
      return xxhashHasher.fullHash(path);
    },
  };
  return hasher;
}

function completed(outcome: ScanOutcome): Extract<ScanOutcome, { status: 'completed' }> {
  if (outcome.status !== 'completed') {
    throw new Error(`Expected a completed scan, got ${outcome.status}`);
  }
  return outcome;
}

const X = 'x'.repeat(1000);
const Y = 'y'.repeat(1000);

describe('DuplicatesScanner', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'dupescan-scan-'));
  });

  afterEach(async () => {
    blocked.clear();
    await rm(root, { recursive: true, force: true });
  });

  describe('scan', () => {
    it('should group identical files and leave out unique and empty ones', async () => {
      await writeTree(root, { 'a.txt': X, 'b/b.txt': X, 'c.txt': Y, 'empty.txt': '' });

      const outcome = completed(await new DuplicatesScanner().scan(root));

      expect(outcome.groups).toHaveLength(1);
      expect(outcome.groups[0]).toMatchObject({ size: 1000, paths: ['a.txt', 'b/b.txt'] });
      expect(outcome.groups[0].digest).toMatch(/^[0-9a-f]{32}$/);
      expect(outcome.warnings).toEqual([]);
      expect(outcome.stats).toEqual({
        filesScanned: 4,
        filesHashed: 4,
        filesConfirmed: 2,
        hashErrors: 0,
        duplicateGroups: 1,
        duplicateFiles: 2,
        wastedBytes: 1000,
      });
    });

    it('should not group files that only share their first 256 KiB', async () => {
      const base = Buffer.alloc(300 * 1024, 0x41);
      const changed = Buffer.from(base);
      changed[270_000] = 0x42;
      await writeTree(root, { 'one.bin': base, 'two.bin': changed });

      const outcome = completed(await new DuplicatesScanner().scan(root));

      expect(outcome.groups).toEqual([]);
      expect(outcome.stats.filesConfirmed).toBe(2);
    });

    it('should not group 300 KB files that differ early in the prefix', async () => {
      const base = Buffer.alloc(300 * 1024, 0x41);
      const changed = Buffer.from(base);
      changed[256_000] = 0x42;
      await writeTree(root, { 'one.bin': base, 'two.bin': changed });

      const outcome = completed(await new DuplicatesScanner().scan(root));

      expect(outcome.groups).toEqual([]);
    });

    it('should never report zero-byte files', async () => {
      const files: Record<string, string> = {};
      for (let i = 0; i < 20; i++) files[`empty-${i}.txt`] = '';

      await writeTree(root, files);

      const outcome = completed(await new DuplicatesScanner().scan(root));

      expect(outcome.groups).toEqual([]);
      expect(outcome.stats.filesConfirmed).toBe(20);
      expect(outcome.stats.duplicateGroups).toBe(0);
    });

    it('should order groups by size, largest first', async () => {
      await writeTree(root, {
        'big-1': 'b'.repeat(2000),
        'big-2': 'b'.repeat(2000),
        'mid-1': 'm'.repeat(500),
        'mid-2': 'm'.repeat(500),
        'small-1': 's'.repeat(10),
        'small-2': 's'.repeat(10),
        'small-3': 's'.repeat(10),
      });

      const outcome = completed(await new DuplicatesScanner().scan(root));

      expect(outcome.groups.map((g) => [g.size, g.paths.length])).toEqual([
        [2000, 2],
        [500, 2],
        [10, 3],
      ]);
    });

    it('should put every copy in exactly one group', async () => {
      await writeTree(root, { 'a/1': X, 'b/2': X, 'c/3': X, 'd/4': Y, 'e/5': Y });

      const outcome = completed(await new DuplicatesScanner().scan(root));

      expect(outcome.groups.map((g) => g.paths)).toEqual([
        ['a/1', 'b/2', 'c/3'],
        ['d/4', 'e/5'],
      ]);
    });

    it('should drop groups below the minimum size', async () => {
      await writeTree(root, { 'a': X, 'b': X, 'c': 'tiny', 'd': 'tiny' });

      const outcome = completed(await new DuplicatesScanner().scan(root, { minSize: 100 }));

      expect(outcome.groups.map((g) => g.paths)).toEqual([['a', 'b']]);
    });

    it('should give the same result on a second run', async () => {
      await writeTree(root, { 'a.txt': X, 'b/b.txt': X, 'c.txt': Y, 'd.txt': Y });
      const scanner = new DuplicatesScanner();

      const first = completed(await scanner.scan(root));
      const second = completed(await scanner.scan(root));

      expect(second.groups).toEqual(first.groups);
    });

    it('should find the same groups when hashing in parallel', async () => {
      await writeTree(root, { 'a': X, 'b': X, 'c': Y, 'd': Y, 'e': 'unique', 'f': X });

      const outcome = completed(await new DuplicatesScanner().scan(root, { concurrency: 4 }));

      const memberships = outcome.groups.map((g) => [...g.paths].sort()).sort((x, y) => x[0].localeCompare(y[0]));

      expect(memberships).toEqual([
        ['a', 'b', 'f'],
        ['c', 'd'],
      ]);
    });

    it('should read each file at most once per pass', async () => {
      await writeTree(root, { 'a': X, 'b': X, 'c': Y, 'd': 'unique' });
      const hasher = recordingHasher();

      await new DuplicatesScanner().scan(root, { hasher });

      expect(hasher.prefixCalls).toEqual([join(root, 'a'), join(root, 'b'), join(root, 'c'), join(root, 'd')]);
      expect(hasher.fullCalls).toEqual([join(root, 'a'), join(root, 'b')]);
    });

    it('should pass the configured prefix size to the hasher', async () => {
      await writeTree(root, { 'a': X });
      const prefixHash = vi.fn(async () => 'digest');

      await new DuplicatesScanner().scan(root, {
        prefixBytes: 4096,
        hasher: { prefixHash, fullHash: async () => 'digest' },
      });

      expect(prefixHash).toHaveBeenCalledWith(join(root, 'a'), 4096);
    });

    it('should reject an invalid prefix size', async () => {
      await expect(new DuplicatesScanner().scan(root, { prefixBytes: 0 })).rejects.toBeInstanceOf(RangeError);
    });

    it('should report progress after every hashed file', async () => {
      await writeTree(root, { 'a.txt': X, 'b/b.txt': X, 'c.txt': Y, 'empty.txt': '' });
      const onProgress = vi.fn();

      await new DuplicatesScanner().scan(root, { onProgress });

      expect(onProgress.mock.calls).toEqual([
        [1, 4],
        [2, 4],
        [3, 4],
        [4, 4],
      ]);
    });

    it('should move through the scan states in order', async () => {
      await writeTree(root, { 'a': X, 'b': X });
      const scanner = new DuplicatesScanner();
      const states: ScanState[] = [];

      await scanner.scan(root, { onStateChange: (state) => states.push(state) });

      expect(states).toEqual(['counting', 'hashing', 'confirming', 'ranking', 'done']);
      expect(scanner.state).toBe('done');
    });

    it('should log each stage through the given logger', async () => {
      await writeTree(root, { 'a': X, 'b': X });
      const logger = vi.fn();

      await new DuplicatesScanner().scan(root, { logger });

      expect(logger).toHaveBeenCalledWith(`[Scanner] Found 2 files under ${root}`);
      expect(logger).toHaveBeenCalledWith('[Scanner] 2 files share a prefix digest with another file');
    });
  });

  describe('errors', () => {
    it('should fail fast on a missing root', async () => {
      const hasher = recordingHasher();
      const states: ScanState[] = [];

      const outcome = await new DuplicatesScanner().scan(join(root, 'missing'), {
        hasher,
        onStateChange: (state) => states.push(state),
      });

      expect(outcome.status).toBe('failed');
      expect(outcome).toMatchObject({ error: { kind: 'invalid-root' } });
      expect(states).toEqual(['failed']);
      expect(hasher.prefixCalls).toEqual([]);
    });

    it('should fail on a root that is a file', async () => {
      await writeTree(root, { 'file.txt': X });

      const outcome = await findDuplicates(join(root, 'file.txt'));

      expect(outcome).toEqual({
        status: 'failed',
        root: join(root, 'file.txt'),
        error: { kind: 'invalid-root', message: `Invalid scan root "${join(root, 'file.txt')}": not a directory` },
        warnings: [],
      });
    });

    it('should fail on an empty root', async () => {
      const outcome = await findDuplicates('');

      expect(outcome.status).toBe('failed');
    });

    it('should report an unreadable folder and still find duplicates beside it', async () => {
      await writeTree(root, {
        'locked/hidden.txt': X,
        'open/one.txt': Y,
        'open/two.txt': Y,
      });
      blocked.add(join(root, 'locked'));

      const outcome = completed(await new DuplicatesScanner().scan(root));

      expect(outcome.groups.map((g) => g.paths)).toEqual([['open/one.txt', 'open/two.txt']]);
      expect(outcome.warnings).toEqual([
        { kind: 'walk', path: 'locked', message: `EACCES: permission denied, scandir '${join(root, 'locked')}'` },
      ]);
    });

    it('should exclude a file whose prefix read fails', async () => {
      await writeTree(root, { 'a.txt': X, 'b.txt': X, 'c.txt': X });
      const warnings = vi.fn();

      const outcome = completed(
        await new DuplicatesScanner().scan(root, { hasher: recordingHasher({ prefix: ['c.txt'] }), onWarning: warnings })
      );

      expect(outcome.groups.map((g) => g.paths)).toEqual([['a.txt', 'b.txt']]);
      expect(outcome.warnings).toEqual([
        {
          kind: 'io',
          path: 'c.txt',
          phase: 'prefix',
          message: `Cannot read ${join(root, 'c.txt')}: EMFILE: too many open files`,
        },
      ]);
      expect(outcome.stats.hashErrors).toBe(1);
      expect(outcome.stats.filesHashed).toBe(2);
      expect(warnings).toHaveBeenCalledTimes(1);
    });

    it('should shrink a group when a member fails its full read', async () => {
      await writeTree(root, { 'a.txt': X, 'b.txt': X, 'c.txt': X });

      const outcome = completed(
        await new DuplicatesScanner().scan(root, { hasher: recordingHasher({ full: ['b.txt'] }) })
      );

      expect(outcome.groups.map((g) => g.paths)).toEqual([['a.txt', 'c.txt']]);
      expect(outcome.warnings).toMatchObject([{ kind: 'io', path: 'b.txt', phase: 'full' }]);
    });

    it('should drop a pair when one member fails its full read', async () => {
      await writeTree(root, { 'a.txt': X, 'b.txt': X });

      const outcome = completed(
        await new DuplicatesScanner().scan(root, { hasher: recordingHasher({ full: ['a.txt'] }) })
      );

      expect(outcome.groups).toEqual([]);
      expect(outcome.stats.hashErrors).toBe(1);
    });
  });

  describe('cancellation', () => {
    it('should stop during hashing without any confirmation reads', async () => {
      await writeTree(root, { 'a': X, 'b': X, 'c': Y, 'd': Y, 'e': X, 'f': Y });
      const scanner = new DuplicatesScanner();
      const hasher = recordingHasher();

      const outcome = await scanner.scan(root, {
        hasher,
        onProgress: (processed) => {
          if (processed === 2) scanner.cancel();
        },
      });

      expect(outcome.status).toBe('cancelled');
      expect(outcome).not.toHaveProperty('groups');
      expect(hasher.prefixCalls).toHaveLength(2);
      expect(hasher.fullCalls).toEqual([]);
      expect(scanner.state).toBe('cancelled');
    });

    it('should stop while counting before any file is read', async () => {
      await writeTree(root, { 'a': X, 'b': X });
      const scanner = new DuplicatesScanner();
      const hasher = recordingHasher();
      const states: ScanState[] = [];

      const outcome = await scanner.scan(root, {
        hasher,
        onStateChange: (state) => {
          states.push(state);
          if (state === 'counting') scanner.cancel();
        },
      });

      expect(outcome.status).toBe('cancelled');
      expect(states).toEqual(['counting', 'cancelled']);
      expect(hasher.prefixCalls).toEqual([]);
    });

    it('should stop during confirmation', async () => {
      await writeTree(root, { 'a': X, 'b': X, 'c': Y, 'd': Y });
      const scanner = new DuplicatesScanner();
      const hasher = recordingHasher();

      const outcome = await scanner.scan(root, {
        hasher,
        onConfirmProgress: (processed) => {
          if (processed === 1) scanner.cancel();
        },
      });

      expect(outcome.status).toBe('cancelled');
      expect(hasher.fullCalls).toEqual([join(root, 'a')]);
    });

    it('should clear an earlier cancel when a new scan starts', async () => {
      await writeTree(root, { 'a': X, 'b': X });
      const scanner = new DuplicatesScanner();

      scanner.cancel();
      const outcome = await scanner.scan(root);

      expect(outcome.status).toBe('completed');
    });

    it('should refuse a second scan on a busy scanner', async () => {
      await writeTree(root, { 'a': X, 'b': X });
      const scanner = new DuplicatesScanner();

      const first = scanner.scan(root);
      await expect(scanner.scan(root)).rejects.toThrow('A scan is already running on this scanner');

      expect((await first).status).toBe('completed');
      expect(scanner.isRunning).toBe(false);
    });

    it('should keep separate scanners independent', async () => {
      await writeTree(root, { 'a': X, 'b': X });
      const cancelled = new DuplicatesScanner();
      const other = new DuplicatesScanner();

      const [first, second] = await Promise.all([
        cancelled.scan(root, { onStateChange: (state) => state === 'counting' && cancelled.cancel() }),
        other.scan(root),
      ]);

      expect(first.status).toBe('cancelled');
      expect(second.status).toBe('completed');
    });
  });
});
