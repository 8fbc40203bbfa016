import fs from 'fs-extra';
import path from 'path';
import { IMAGE_EXTENSIONS, SIDECAR_FILE_NAME, UNKNOWN_GAME_TITLE, VIDEO_EXTENSIONS } from '../../../src/lib/constants';
import { getConsoleDir } from '../../../src/lib/paths';
import { ImportedSidecar } from '../../../src/lib/types';
import { compareNames, isHidden } from '../../../src/lib/utils';
import { ImportOptions, ImportSourceError, ImportSummary, isErrnoException } from '../../lib/types';
import { statOrNull } from '../../utils/fs-entries';
import { writeJsonFile } from '../../utils/json-file';
import { logger } from '../../utils/logger';
import { listMediaCandidates, selectCover, selectVideo } from '../media';

const MEDIA_EXTENSIONS: readonly string[] = [...IMAGE_EXTENSIONS, ...VIDEO_EXTENSIONS];

export function safeGameTitle(folderName: string): string {
  return folderName.trim() || UNKNOWN_GAME_TITLE;
}

/**
 * Copy the image and video files of one game folder into the library. Linked
 * files are copied as regular files.
 *
 * An existing destination is left untouched unless `overwrite` is set, in which
 * case it is removed and rebuilt. Returns false when the copy was skipped.
 */
export async function copyGameFolder(src: string, dest: string, overwrite: boolean): Promise<boolean> {
  if (await fs.pathExists(dest)) {
    if (!overwrite) {
      return false;
    }
    await fs.remove(dest);
  }
  await fs.ensureDir(dest);

  for (const item of await listMediaCandidates(src, MEDIA_EXTENSIONS)) {
    const target = path.join(dest, path.relative(src, item));
    await fs.ensureDir(path.dirname(target));
    await fs.copy(item, target, { preserveTimestamps: true, dereference: true });
  }

  return true;
}

/**
 * Write a sidecar for a game folder that has none, picking cover and video by
 * filename. Returns the written sidecar, or null when one already existed.
 */
export async function ensureGameJson(
  gameDir: string,
  sidecarFileName: string = SIDECAR_FILE_NAME
): Promise<ImportedSidecar | null> {
  const jsonPath = path.join(gameDir, sidecarFileName);
  if (await fs.pathExists(jsonPath)) {
    return null;
  }

  const cover = await selectCover(gameDir);
  const video = await selectVideo(gameDir);

  const data: ImportedSidecar = { title: safeGameTitle(path.basename(gameDir)) };
  if (cover) data.cover = cover;
  if (video) data.video = video;

  await writeJsonFile(jsonPath, data);
  return data;
}

async function assertSourceDir(sourceDir: string): Promise<void> {
  try {
    const stat = await fs.stat(sourceDir);
    if (stat.isDirectory()) return;
  } catch (error: unknown) {
    if (!isErrnoException(error) || error.code !== 'ENOENT') {
      throw error;
    }
  }
  throw new ImportSourceError(`Source directory not found: ${sourceDir}`, sourceDir);
}

/**
 * Import every non-hidden game folder of `sourceDir` into `library/<console>/`
 */
export async function importRoms(options: ImportOptions): Promise<ImportSummary> {
  await assertSourceDir(options.sourceDir);

  const consoleDir = getConsoleDir(options.libraryDir, options.consoleName);
  await fs.ensureDir(consoleDir);

  const summary: ImportSummary = { consoleDir, imported: [], skipped: [], sidecarsWritten: [] };
  const names = (await fs.readdir(options.sourceDir)).sort(compareNames);

  for (const name of names) {
    if (isHidden(name)) continue;
    const gameDir = path.join(options.sourceDir, name);
    const stat = await statOrNull(gameDir);
    if (!stat?.isDirectory()) continue;

    const destDir = path.join(consoleDir, name);
    const copied = await copyGameFolder(gameDir, destDir, options.overwrite ?? false);
    if (copied) {
      logger.info(`Imported ${name}`, { dest: destDir });
      summary.imported.push(name);
    } else {
      logger.info(`Skipped ${name} (already in library)`, { dest: destDir });
      summary.skipped.push(name);
    }

    const sidecar = await ensureGameJson(destDir, options.sidecarFileName);
    if (sidecar) {
      logger.debug('Wrote sidecar', { game: name, ...sidecar });
      summary.sidecarsWritten.push(name);
    }
  }

  return summary;
}
