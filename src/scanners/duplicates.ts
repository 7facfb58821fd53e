import type {
  FileRecord,
  HashPhase,
  ScanOutcome,
  ScanState,
  ScanStats,
  ScanWarning,
  ScannerOptions,
} from '../types.js';
import { CandidateIndex } from './candidate-index.js';
import { confirmDuplicates } from './confirm.js';
import { InvalidRootError, errorMessage } from './errors.js';
import { DEFAULT_PREFIX_BYTES, xxhashHasher } from './hasher.js';
import { runWithConcurrency } from './pool.js';
import { rankGroups, wastedBytes } from './ranker.js';
import { assertValidRoot, countFiles, walkFiles } from './walker.js';

function emptyStats(): ScanStats {
  return {
    filesScanned: 0,
    filesHashed: 0,
    filesConfirmed: 0,
    hashErrors: 0,
    duplicateGroups: 0,
    duplicateFiles: 0,
    wastedBytes: 0,
  };
}

function ioWarning(record: FileRecord, phase: HashPhase, error: unknown): ScanWarning {
  return { kind: 'io', path: record.relativePath, phase, message: errorMessage(error) };
}

/**
 * Runs the staged duplicate search: count, prefix hash into the candidate
 * index, confirm candidates by full hash, rank.
 *
 * One scan at a time per instance. `cancel()` is cooperative and is observed
 * between files, never in the middle of a read.
 */
export class DuplicatesScanner {
  private cancelRequested = false;
  private running = false;
  private currentState: ScanState = 'idle';
  private processed = 0;
  private total = 0;

  get state(): ScanState {
    return this.currentState;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get progress(): { processed: number; total: number } {
    return { processed: this.processed, total: this.total };
  }

  cancel(): void {
    this.cancelRequested = true;
  }

  async scan(root: string, options: ScannerOptions = {}): Promise<ScanOutcome> {
    if (this.running) {
      throw new Error('A scan is already running on this scanner');
    }

    const prefixBytes = options.prefixBytes ?? DEFAULT_PREFIX_BYTES;
    if (!Number.isInteger(prefixBytes) || prefixBytes <= 0) {
      throw new RangeError(`prefixBytes must be a positive integer, got ${prefixBytes}`);
    }

    this.running = true;
    this.cancelRequested = false;
    this.processed = 0;
    this.total = 0;

    try {
      return await this.run(root, prefixBytes, options);
    } finally {
      this.running = false;
    }
  }

  private setState(state: ScanState, options: ScannerOptions): void {
    this.currentState = state;
    options.onStateChange?.(state);
  }

  private async run(root: string, prefixBytes: number, options: ScannerOptions): Promise<ScanOutcome> {
    const log = options.logger ?? (options.verbose ? (message: string) => console.log(message) : () => {});
    const hasher = options.hasher ?? xxhashHasher;
    const concurrency = options.concurrency ?? 1;
    const shouldStop = (): boolean => this.cancelRequested;

    const warnings: ScanWarning[] = [];
    const stats = emptyStats();
    const warn = (warning: ScanWarning): void => {
      warnings.push(warning);
      options.onWarning?.(warning);
      log(`[Scanner] Skipped ${warning.path}: ${warning.message}`);
    };

    let absoluteRoot: string;
    try {
      absoluteRoot = await assertValidRoot(root);
    } catch (error) {
      if (error instanceof InvalidRootError) {
        log(`[Scanner] ${error.message}`);
        this.setState('failed', options);
        return { status: 'failed', root, error: { kind: error.kind, message: error.message }, warnings };
      }
      throw error;
    }

    const cancelled = (): ScanOutcome => {
      log(`[Scanner] Scan of ${absoluteRoot} cancelled`);
      this.setState('cancelled', options);
      return { status: 'cancelled', root: absoluteRoot, warnings, stats };
    };

    const start = Date.now();
    const walkOptions = { ignoredFolders: options.ignoredFolders, ignoredPaths: options.ignoredPaths };

    this.setState('counting', options);
    this.total = await countFiles(absoluteRoot, walkOptions, shouldStop);
    stats.filesScanned = this.total;
    if (shouldStop()) return cancelled();
    log(`[Scanner] Found ${this.total} files under ${absoluteRoot}`);

    this.setState('hashing', options);
    const index = new CandidateIndex();
    await runWithConcurrency(
      walkFiles(absoluteRoot, { ...walkOptions, onWarning: warn }),
      concurrency,
      async (record) => {
        try {
          const digest = await hasher.prefixHash(record.absolutePath, prefixBytes);
          index.insert(digest, record);
          stats.filesHashed++;
        } catch (error) {
          stats.hashErrors++;
          warn(ioWarning(record, 'prefix', error));
        }
        this.processed++;
        // the tree may have grown since it was counted
        this.total = Math.max(this.total, this.processed);
        options.onProgress?.(this.processed, this.total);
      },
      shouldStop
    );
    if (shouldStop()) return cancelled();
    log(`[Scanner] ${index.candidateCount()} files share a prefix digest with another file`);

    this.setState('confirming', options);
    const confirmation = await confirmDuplicates(index.candidates(), {
      hasher,
      concurrency,
      shouldStop,
      onProgress: options.onConfirmProgress,
      onFileError: (record, error) => {
        stats.hashErrors++;
        warn(ioWarning(record, 'full', error));
      },
    });
    stats.filesConfirmed = confirmation.filesConfirmed;
    if (confirmation.stopped) return cancelled();

    this.setState('ranking', options);
    const groups = rankGroups(confirmation.groups, options.minSize);
    stats.duplicateGroups = groups.length;
    stats.duplicateFiles = groups.reduce((sum, group) => sum + group.paths.length, 0);
    stats.wastedBytes = wastedBytes(groups);

    log(`[Scanner] Duplicates: ${absoluteRoot} took ${Date.now() - start}ms, ${groups.length} groups`);
    this.setState('done', options);
    return { status: 'completed', root: absoluteRoot, groups, warnings, stats };
  }
}

/**
 * One-shot helper around a fresh scanner.
 */
export function findDuplicates(root: string, options?: ScannerOptions): Promise<ScanOutcome> {
  return new DuplicatesScanner().scan(root, options);
}
