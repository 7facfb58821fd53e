import { access } from 'fs/promises';
import { posix } from 'path';

export async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Directory part of a root-relative, `/`-separated path; "." for top-level files.
 */
export function parentFolder(relativePath: string): string {
  return posix.dirname(relativePath);
}
