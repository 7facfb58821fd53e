import type { FileRecord } from '../types.js';

/**
 * Prefix digest -> files sharing it, in insertion order.
 * Built once per scan and consumed once by the confirmation pass.
 */
export class CandidateIndex {
  private readonly buckets = new Map<string, FileRecord[]>();

  insert(prefixDigest: string, record: FileRecord): void {
    const bucket = this.buckets.get(prefixDigest);
    if (bucket) {
      bucket.push(record);
    } else {
      this.buckets.set(prefixDigest, [record]);
    }
  }

  get size(): number {
    return this.buckets.size;
  }

  get(prefixDigest: string): readonly FileRecord[] | undefined {
    return this.buckets.get(prefixDigest);
  }

  /** Buckets with two or more members, in order of first insertion */
  candidates(): FileRecord[][] {
    const result: FileRecord[][] = [];
    for (const bucket of this.buckets.values()) {
      if (bucket.length >= 2) {
        result.push(bucket);
      }
    }
    return result;
  }

  candidateCount(): number {
    let count = 0;
    for (const bucket of this.buckets.values()) {
      if (bucket.length >= 2) count += bucket.length;
    }
    return count;
  }
}
