import fs from 'fs-extra';
import path from 'path';
import { ensureOutputDirs, getGameAssetsDir, OutputPaths } from '../../../src/lib/paths';
import { Game, GameConsole, Library } from '../../../src/lib/types';
import { fileStem, slugify, toPosixPath } from '../../../src/lib/utils';
import { BuildOptions, GenerateOptions } from '../../lib/types';
import { writeJsonFile } from '../../utils/json-file';
import { logger } from '../../utils/logger';
import { countGames, renderHtml } from './html-renderer';
import { publishMedia, selectCover, selectVideo } from '../media';
import { ConsoleDir, ConsoleEntry, findConsoleEntries, listConsoleDirs } from './scanner';
import { readGameMetadata } from './sidecar';

export interface GenerateResult {
  library: Library;
  paths: OutputPaths;
  gameCount: number;
}

function sourcePath(libraryDir: string, entryPath: string): string {
  return toPosixPath(path.relative(path.resolve(libraryDir), entryPath));
}

function romGame(entry: ConsoleEntry, libraryDir: string): Game {
  return {
    title: fileStem(entry.name),
    year: null,
    publisher: null,
    region: null,
    tags: [],
    notes: null,
    cover: null,
    video: null,
    source: sourcePath(libraryDir, entry.path),
  };
}

async function folderGame(
  entry: ConsoleEntry,
  consoleDir: ConsoleDir,
  libraryDir: string,
  outDir: string,
  options: BuildOptions
): Promise<Game> {
  const data = await readGameMetadata(entry.path, options.sidecar);
  const title = data.title || entry.name;
  const assetsDir = getGameAssetsDir(outDir, consoleDir.name, title);

  // Without a sidecar reference, fall back to picking media by filename
  const detect = options.detectMedia ?? true;
  const coverRef = data.cover ?? (detect ? await selectCover(entry.path) : null);
  const videoRef = data.video ?? (detect ? await selectVideo(entry.path) : null);

  const cover = await publishMedia(entry.path, coverRef, assetsDir, outDir);
  const video = await publishMedia(entry.path, videoRef, assetsDir, outDir);

  return {
    title,
    year: data.year ?? null,
    publisher: data.publisher ?? null,
    region: data.region ?? null,
    tags: data.tags ?? [],
    notes: data.notes ?? null,
    cover,
    video,
    source: sourcePath(libraryDir, entry.path),
  };
}

/**
 * Scan the library and copy referenced media under `<out>/assets`.
 * Consoles and games come out in case-insensitive name order.
 */
export async function buildLibrary(
  libraryDir: string,
  outDir: string,
  options: BuildOptions = {}
): Promise<Library> {
  ensureOutputDirs(outDir);
  const consoles: GameConsole[] = [];

  for (const consoleDir of await listConsoleDirs(libraryDir)) {
    const games: Game[] = [];

    for (const entry of await findConsoleEntries(consoleDir.path, options.romExtensions)) {
      const game = entry.kind === 'folder'
        ? await folderGame(entry, consoleDir, libraryDir, outDir, options)
        : romGame(entry, libraryDir);
      logger.debug('Catalogued game', { console: consoleDir.name, title: game.title, source: game.source });
      games.push(game);
    }

    consoles.push({
      name: consoleDir.name,
      slug: slugify(consoleDir.name),
      games,
    });
  }

  const now = options.now ?? (() => new Date());
  return { generated_at: now().toISOString(), consoles };
}

/**
 * Full run: ensure directories, scan, write library.json and index.html
 */
export async function generateCatalog(options: GenerateOptions): Promise<GenerateResult> {
  await fs.ensureDir(options.libraryDir);
  const paths = ensureOutputDirs(options.outDir);

  const library = await buildLibrary(options.libraryDir, options.outDir, options);
  await writeJsonFile(paths.libraryJson, library);
  await fs.writeFile(paths.indexHtml, renderHtml(library, options), 'utf-8');

  const gameCount = countGames(library);
  logger.info('Catalog written', {
    consoles: library.consoles.length,
    games: gameCount,
    out: paths.root,
  });

  return { library, paths, gameCount };
}
