import fs from 'fs-extra';
import path from 'path';
import {
  IMAGE_EXTENSIONS,
  PREFERRED_COVER_STEMS,
  PREFERRED_VIDEO_STEMS,
  VIDEO_EXTENSIONS,
} from '../../../src/lib/constants';
import { compareNames, fileStem, hasExtension, isHidden, toPosixPath } from '../../../src/lib/utils';
import { isSymlink, statOrNull } from '../../utils/fs-entries';

/**
 * Files under `dir` with one of `extensions`, in traversal order: depth-first,
 * each directory's entries sorted case-insensitively. Hidden files are skipped
 * wherever they sit; dangling links and symlinked directories are not followed.
 */
export async function listMediaCandidates(dir: string, extensions: readonly string[]): Promise<string[]> {
  const found: string[] = [];
  const names = (await fs.readdir(dir)).sort(compareNames);

  for (const name of names) {
    const itemPath = path.join(dir, name);
    const stat = await statOrNull(itemPath);
    if (!stat) continue;

    if (stat.isDirectory()) {
      if (await isSymlink(itemPath)) continue;
      found.push(...(await listMediaCandidates(itemPath, extensions)));
    } else if (stat.isFile() && !isHidden(name) && hasExtension(name, extensions)) {
      found.push(itemPath);
    }
  }

  return found;
}

/**
 * Pick a media file for a game folder: the first candidate whose stem is one of
 * `preferredStems` (case-insensitive), else the first candidate at all.
 * Returns the path relative to `gameDir` with POSIX separators, or null.
 */
export async function selectMediaFile(
  gameDir: string,
  extensions: readonly string[],
  preferredStems: readonly string[]
): Promise<string | null> {
  const candidates = await listMediaCandidates(gameDir, extensions);
  const preferred = candidates.find((candidate) =>
    preferredStems.includes(fileStem(candidate).toLowerCase())
  );
  const chosen = preferred ?? candidates[0];

  return chosen ? toPosixPath(path.relative(gameDir, chosen)) : null;
}

export function selectCover(gameDir: string): Promise<string | null> {
  return selectMediaFile(gameDir, IMAGE_EXTENSIONS, PREFERRED_COVER_STEMS);
}

export function selectVideo(gameDir: string): Promise<string | null> {
  return selectMediaFile(gameDir, VIDEO_EXTENSIONS, PREFERRED_VIDEO_STEMS);
}
