import type { Stats } from 'fs';
import fs from 'fs-extra';
import { isErrnoException } from '../lib/types';

// Errors that mean "nothing usable here": dangling links, link loops, a file used as a directory
const MISSING_ENTRY_CODES = ['ENOENT', 'ENOTDIR', 'ELOOP'];

/**
 * Stat an entry, following symlinks. Returns null for a dangling or looping
 * link; any other failure is thrown.
 */
export async function statOrNull(entryPath: string): Promise<Stats | null> {
  try {
    return await fs.stat(entryPath);
  } catch (error: unknown) {
    if (isErrnoException(error) && error.code !== undefined && MISSING_ENTRY_CODES.includes(error.code)) {
      return null;
    }
    throw error;
  }
}

export async function isSymlink(entryPath: string): Promise<boolean> {
  return (await fs.lstat(entryPath)).isSymbolicLink();
}
