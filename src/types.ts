export interface FileRecord {
  absolutePath: string;
  /** Path relative to the scan root, always `/`-separated */
  relativePath: string;
  size: number;
}

export interface DuplicateGroup {
  digest: string;
  size: number;
  /** Relative paths, at least two */
  paths: string[];
}

export type ScanState =
  | 'idle'
  | 'counting'
  | 'hashing'
  | 'confirming'
  | 'ranking'
  | 'done'
  | 'cancelled'
  | 'failed';

export type HashPhase = 'prefix' | 'full';

export type ScanWarning =
  | { kind: 'walk'; path: string; message: string }
  | { kind: 'io'; path: string; phase: HashPhase; message: string };

export interface ScanStats {
  /** Files found by the counting pass */
  filesScanned: number;
  /** Files whose prefix digest was computed */
  filesHashed: number;
  /** Files whose full digest was computed */
  filesConfirmed: number;
  hashErrors: number;
  duplicateGroups: number;
  duplicateFiles: number;
  /** Sum of size × (members - 1) over all groups */
  wastedBytes: number;
}

export type ScanOutcome =
  | { status: 'completed'; root: string; groups: DuplicateGroup[]; warnings: ScanWarning[]; stats: ScanStats }
  | { status: 'cancelled'; root: string; warnings: ScanWarning[]; stats: ScanStats }
  | { status: 'failed'; root: string; error: { kind: 'invalid-root'; message: string }; warnings: ScanWarning[] };

export type ProgressCallback = (processed: number, total: number) => void;

export interface Hasher {
  prefixHash(path: string, limitBytes: number): Promise<string>;
  fullHash(path: string): Promise<string>;
}

export interface ScannerOptions {
  verbose?: boolean;
  logger?: (message: string) => void;
  /** Groups smaller than this many bytes are dropped; zero-byte groups always are */
  minSize?: number;
  prefixBytes?: number;
  concurrency?: number;
  /** Absolute paths of directories to leave out of the walk */
  ignoredFolders?: string[];
  /** Absolute paths of files to leave out of the walk */
  ignoredPaths?: string[];
  hasher?: Hasher;
  onProgress?: ProgressCallback;
  onConfirmProgress?: ProgressCallback;
  onStateChange?: (state: ScanState) => void;
  onWarning?: (warning: ScanWarning) => void;
}
