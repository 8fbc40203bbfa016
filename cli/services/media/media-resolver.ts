import fs from 'fs-extra';
import path from 'path';
import { toPosixPath } from '../../../src/lib/utils';
import { statOrNull } from '../../utils/fs-entries';
import { logger } from '../../utils/logger';

function isInside(parentDir: string, candidate: string): boolean {
  const relative = path.relative(parentDir, candidate);
  return (
    relative !== '' &&
    relative !== '..' &&
    !relative.startsWith(`..${path.sep}`) &&
    !path.isAbsolute(relative)
  );
}

/**
 * Resolve a sidecar media reference against its game folder.
 * Returns null when the value is empty, points outside the folder, or names
 * something that is not an existing regular file.
 */
export async function resolveMediaPath(
  gameDir: string,
  mediaValue: string | null | undefined
): Promise<string | null> {
  if (!mediaValue) {
    return null;
  }

  const root = path.resolve(gameDir);
  const mediaPath = path.resolve(root, mediaValue);
  if (!isInside(root, mediaPath)) {
    logger.warn('Media reference leaves the game folder, ignoring it', { gameDir: root, media: mediaValue });
    return null;
  }

  const stat = await statOrNull(mediaPath);
  if (!stat) {
    logger.debug('Media file not found', { media: mediaPath });
    return null;
  }
  return stat.isFile() ? mediaPath : null;
}

/**
 * Copy a media file into `assetsDir`, keeping its path relative to the game
 * folder and its timestamps. Returns the destination path.
 */
export async function copyMedia(mediaPath: string, gameDir: string, assetsDir: string): Promise<string> {
  const relPath = path.relative(path.resolve(gameDir), mediaPath);
  const destPath = path.join(assetsDir, relPath);
  await fs.ensureDir(path.dirname(destPath));
  await fs.copy(mediaPath, destPath, { overwrite: true, preserveTimestamps: true, dereference: true });
  return destPath;
}

/**
 * Resolve, copy, and express the copy relative to the output root (POSIX separators)
 */
export async function publishMedia(
  gameDir: string,
  mediaValue: string | null | undefined,
  assetsDir: string,
  outDir: string
): Promise<string | null> {
  const mediaPath = await resolveMediaPath(gameDir, mediaValue);
  if (!mediaPath) {
    return null;
  }

  const destPath = await copyMedia(mediaPath, gameDir, assetsDir);
  return toPosixPath(path.relative(path.resolve(outDir), destPath));
}
