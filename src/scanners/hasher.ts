import xxhash from 'xxhash-wasm';
import { open, type FileHandle } from 'fs/promises';
import type { HashPhase, Hasher } from '../types.js';
import { FileReadError } from './errors.js';

type XXHashApi = Awaited<ReturnType<typeof xxhash>>;

/** 256 KiB */
export const DEFAULT_PREFIX_BYTES = 8 ** 6;

const CHUNK_SIZE = 64 * 1024;

// Two independently seeded xxh64 streams give a 128-bit digest
const SEED_LOW = 0n;
const SEED_HIGH = 0x9e3779b97f4a7c15n;

let api: Promise<XXHashApi> | null = null;

function loadXXHash(): Promise<XXHashApi> {
  api ??= xxhash();
  return api;
}

function toHex(value: bigint): string {
  return value.toString(16).padStart(16, '0');
}

async function digestFile(path: string, phase: HashPhase, limit: number): Promise<string> {
  const { create64 } = await loadXXHash();
  const low = create64(SEED_LOW);
  const high = create64(SEED_HIGH);

  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (error) {
    throw new FileReadError(path, phase, error);
  }

  try {
    const buffer = Buffer.alloc(Math.min(CHUNK_SIZE, limit));
    let remaining = limit;
    while (remaining > 0) {
      const { bytesRead } = await handle.read(buffer, 0, Math.min(buffer.length, remaining), null);
      if (bytesRead === 0) break;
      const chunk = buffer.subarray(0, bytesRead);
      low.update(chunk);
      high.update(chunk);
      remaining -= bytesRead;
    }
  } catch (error) {
    throw new FileReadError(path, phase, error);
  } finally {
    await handle.close();
  }

  return toHex(low.digest()) + toHex(high.digest());
}

/**
 * Digest of at most the first `limitBytes` bytes. A file shorter than the
 * limit is hashed whole.
 */
export async function prefixHash(path: string, limitBytes: number = DEFAULT_PREFIX_BYTES): Promise<string> {
  if (!Number.isInteger(limitBytes) || limitBytes <= 0) {
    throw new RangeError(`Prefix limit must be a positive integer, got ${limitBytes}`);
  }
  return digestFile(path, 'prefix', limitBytes);
}

export function fullHash(path: string): Promise<string> {
  return digestFile(path, 'full', Number.POSITIVE_INFINITY);
}

export const xxhashHasher: Hasher = { prefixHash, fullHash };
