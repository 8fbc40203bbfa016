import fs from 'fs-extra';
import path from 'path';
import { ROM_EXTENSIONS } from '../../../src/lib/constants';
import { compareNames, hasExtension, isHidden } from '../../../src/lib/utils';
import { statOrNull } from '../../utils/fs-entries';

export type EntryKind = 'folder' | 'rom';

export interface ConsoleEntry {
  kind: EntryKind;
  name: string;
  path: string;
}

export interface ConsoleDir {
  name: string;
  path: string;
}

/**
 * Non-hidden subdirectories of the library root, sorted case-insensitively
 */
export async function listConsoleDirs(libraryDir: string): Promise<ConsoleDir[]> {
  const root = path.resolve(libraryDir);
  const consoles: ConsoleDir[] = [];

  for (const name of await fs.readdir(root)) {
    if (isHidden(name)) continue;
    const consolePath = path.join(root, name);
    const stat = await statOrNull(consolePath);
    if (stat?.isDirectory()) {
      consoles.push({ name, path: consolePath });
    }
  }

  return consoles.sort((a, b) => compareNames(a.name, b.name));
}

/**
 * Game entries of one console: every non-hidden subdirectory, plus files whose
 * extension is on the ROM allow-list. Sorted case-insensitively by name.
 */
export async function findConsoleEntries(
  consoleDir: string,
  romExtensions: readonly string[] = ROM_EXTENSIONS
): Promise<ConsoleEntry[]> {
  const entries: ConsoleEntry[] = [];

  for (const name of await fs.readdir(consoleDir)) {
    if (isHidden(name)) continue;
    const entryPath = path.join(consoleDir, name);
    const stat = await statOrNull(entryPath);
    if (!stat) continue;

    if (stat.isDirectory()) {
      entries.push({ kind: 'folder', name, path: entryPath });
    } else if (stat.isFile() && hasExtension(name, romExtensions)) {
      entries.push({ kind: 'rom', name, path: entryPath });
    }
  }

  return entries.sort((a, b) => compareNames(a.name, b.name));
}
