#!/usr/bin/env node
/**
 * Catalog Builder Tests
 * Scans temp library trees and checks library.json, index.html and assets
 */

import { afterEach, before, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import * as path from 'path';
import * as fs from 'fs-extra';
import { buildLibrary, generateCatalog } from '../cli/services/catalog';
import { SidecarParseError } from '../cli/lib/types';
import { logger } from '../cli/utils/logger';
import { Game, LibrarySchema } from '../src/lib/types';
import {
  createWorkspace,
  FIXED_DATE,
  fixedClock,
  listFiles,
  removeWorkspace,
  TestWorkspace,
  writeTree,
} from './helpers/library-fixtures';

let workspace: TestWorkspace;

before(() => {
  logger.setLevel('error');
});

beforeEach(async () => {
  workspace = await createWorkspace('builder');
});

afterEach(async () => {
  await removeWorkspace(workspace);
});

function findGame(games: Game[], title: string): Game {
  const game = games.find((g) => g.title === title);
  assert.ok(game, `expected a game titled ${title}`);
  return game;
}

describe('buildLibrary', () => {
  it('catalogues a game folder with sidecar and cover', async () => {
    await writeTree(workspace.library, {
      'SNES/Chrono Trigger/game.json': { title: 'Chrono Trigger', year: 1995 },
      'SNES/Chrono Trigger/cover.png': 'png-bytes',
    });

    const library = await buildLibrary(workspace.library, workspace.out, { now: fixedClock });

    assert.strictEqual(library.generated_at, FIXED_DATE.toISOString());
    assert.deepStrictEqual(library.consoles, [
      {
        name: 'SNES',
        slug: 'snes',
        games: [
          {
            title: 'Chrono Trigger',
            year: 1995,
            publisher: null,
            region: null,
            tags: [],
            notes: null,
            cover: 'assets/snes/chrono-trigger/cover.png',
            video: null,
            source: 'SNES/Chrono Trigger',
          },
        ],
      },
    ]);
    const copied = path.join(workspace.out, 'assets', 'snes', 'chrono-trigger', 'cover.png');
    assert.strictEqual(await fs.readFile(copied, 'utf-8'), 'png-bytes');
  });

  it('turns a bare ROM file into a minimal game', async () => {
    await writeTree(workspace.library, { 'NES/Contra.zip': 'rom' });

    const library = await buildLibrary(workspace.library, workspace.out);

    assert.deepStrictEqual(library.consoles[0].games, [
      {
        title: 'Contra',
        year: null,
        publisher: null,
        region: null,
        tags: [],
        notes: null,
        cover: null,
        video: null,
        source: 'NES/Contra.zip',
      },
    ]);
  });

  it('uses the folder name exactly when there is no sidecar', async () => {
    await writeTree(workspace.library, {
      'NES/ Mega Man 2 (USA) /notes.txt': 'x',
      'NES/duck_hunt/notes.txt': 'x',
    });

    const library = await buildLibrary(workspace.library, workspace.out);

    assert.deepStrictEqual(
      library.consoles[0].games.map((g) => g.title),
      [' Mega Man 2 (USA) ', 'duck_hunt']
    );
  });

  it('orders consoles and games case-insensitively and skips hidden entries', async () => {
    await writeTree(workspace.library, {
      'snes/b-game.sfc': 'rom',
      'NES/zelda/notes.txt': 'x',
      'NES/Adventure Island.nes': 'rom',
      'NES/.DS_Store': 'x',
      'NES/manual.pdf': 'x',
      '.trash/Old.nes': 'rom',
    });

    const library = await buildLibrary(workspace.library, workspace.out);

    assert.deepStrictEqual(
      library.consoles.map((c) => [c.name, c.games.map((g) => g.source)]),
      [
        ['NES', ['NES/Adventure Island.nes', 'NES/zelda']],
        ['snes', ['snes/b-game.sfc']],
      ]
    );
  });

  it('copies sidecar media into an asset folder named after the title', async () => {
    await writeTree(workspace.library, {
      'SNES/ct_usa/game.json': {
        title: 'Chrono Trigger',
        cover: 'scans/front.jpg',
        video: 'media/intro.webm',
        tags: ['rpg'],
        publisher: 'Square',
        region: 'USA',
        notes: 'Classic',
      },
      'SNES/ct_usa/scans/front.jpg': 'jpg',
      'SNES/ct_usa/media/intro.webm': 'webm',
    });

    const library = await buildLibrary(workspace.library, workspace.out);
    const game = findGame(library.consoles[0].games, 'Chrono Trigger');

    assert.strictEqual(game.cover, 'assets/snes/chrono-trigger/scans/front.jpg');
    assert.strictEqual(game.video, 'assets/snes/chrono-trigger/media/intro.webm');
    assert.deepStrictEqual(game.tags, ['rpg']);
    assert.strictEqual(game.publisher, 'Square');
    assert.strictEqual(game.source, 'SNES/ct_usa');
    assert.deepStrictEqual(await listFiles(workspace.out), [
      'assets/snes/chrono-trigger/media/intro.webm',
      'assets/snes/chrono-trigger/scans/front.jpg',
    ]);
  });

  it('leaves media out when the sidecar names a missing file', async () => {
    await writeTree(workspace.library, {
      'SNES/Earthbound/game.json': { cover: 'missing.png' },
      'SNES/Earthbound/cover.png': 'png',
    });

    const library = await buildLibrary(workspace.library, workspace.out);

    assert.strictEqual(library.consoles[0].games[0].cover, null);
    assert.deepStrictEqual(await listFiles(workspace.out), []);
  });

  it('does not pick media by filename when detection is off', async () => {
    await writeTree(workspace.library, { 'SNES/Earthbound/box.png': 'png' });

    const detected = await buildLibrary(workspace.library, workspace.out);
    assert.strictEqual(detected.consoles[0].games[0].cover, 'assets/snes/earthbound/box.png');

    const plain = await buildLibrary(workspace.library, workspace.out, { detectMedia: false });
    assert.strictEqual(plain.consoles[0].games[0].cover, null);
  });

  it('ignores dangling links and copies linked media as files', async () => {
    await writeTree(workspace.library, { 'SNES/CT/real/box.png': 'png-bytes' });
    const gameDir = path.join(workspace.library, 'SNES', 'CT');
    await fs.symlink(path.join(workspace.root, 'gone.png'), path.join(gameDir, 'broken.png'));
    await fs.symlink('real/box.png', path.join(gameDir, 'cover.png'));

    const library = await buildLibrary(workspace.library, workspace.out);

    assert.strictEqual(library.consoles[0].games[0].cover, 'assets/snes/ct/cover.png');
    const copied = path.join(workspace.out, 'assets', 'snes', 'ct', 'cover.png');
    assert.strictEqual((await fs.lstat(copied)).isSymbolicLink(), false);
    assert.strictEqual(await fs.readFile(copied, 'utf-8'), 'png-bytes');
  });

  it('aborts on a malformed sidecar unless told to skip', async () => {
    await writeTree(workspace.library, {
      'SNES/Broken/game.json': '{ "title": ',
      'SNES/Fine/game.json': { title: 'Fine' },
    });

    await assert.rejects(buildLibrary(workspace.library, workspace.out), SidecarParseError);

    const library = await buildLibrary(workspace.library, workspace.out, {
      sidecar: { onMalformed: 'skip' },
    });
    assert.deepStrictEqual(
      library.consoles[0].games.map((g) => g.title),
      ['Broken', 'Fine']
    );
  });
});

describe('generateCatalog', () => {
  it('creates missing directories and writes an empty catalog', async () => {
    const result = await generateCatalog({
      libraryDir: workspace.library,
      outDir: workspace.out,
      now: fixedClock,
    });

    assert.ok((await fs.stat(workspace.library)).isDirectory());
    assert.ok((await fs.stat(path.join(workspace.out, 'assets'))).isDirectory());
    assert.strictEqual(result.gameCount, 0);
    assert.strictEqual(
      await fs.readFile(result.paths.libraryJson, 'utf-8'),
      '{\n  "generated_at": "2024-05-01T12:00:00.000Z",\n  "consoles": []\n}'
    );
    assert.ok((await fs.readFile(result.paths.indexHtml, 'utf-8')).includes('<p class="empty">'));
  });

  it('writes a library.json that matches the schema', async () => {
    await writeTree(workspace.library, {
      'SNES/Chrono Trigger/game.json': { title: 'Chrono Trigger', year: 1995 },
      'SNES/Chrono Trigger/cover.png': 'png',
      'NES/Contra.zip': 'rom',
    });

    const result = await generateCatalog({ libraryDir: workspace.library, outDir: workspace.out });
    const written = LibrarySchema.parse(JSON.parse(await fs.readFile(result.paths.libraryJson, 'utf-8')));

    assert.deepStrictEqual(written, result.library);
    assert.strictEqual(result.gameCount, 2);
    assert.ok(await fs.pathExists(path.join(workspace.out, 'assets', 'snes', 'chrono-trigger', 'cover.png')));
  });

  it('writes non-ASCII titles as escapes', async () => {
    await writeTree(workspace.library, { 'SNES/Pokémon Stadium/game.json': { title: 'Pokémon' } });

    const result = await generateCatalog({ libraryDir: workspace.library, outDir: workspace.out });
    const text = await fs.readFile(result.paths.libraryJson, 'utf-8');

    assert.ok(text.includes('"title": "Pok\\u00e9mon"'));
    assert.strictEqual(result.library.consoles[0].games[0].title, 'Pokémon');
  });

  it('is byte-identical across runs apart from generated_at', async () => {
    await writeTree(workspace.library, {
      'SNES/Chrono Trigger/game.json': { title: 'Chrono Trigger', year: 1995, tags: ['rpg'] },
      'SNES/Chrono Trigger/cover.png': 'png',
      'SNES/Chrono Trigger/trailer.mp4': 'mp4',
      'NES/Contra.zip': 'rom',
      'NES/Mega Man/box.jpg': 'jpg',
    });

    const first = await generateCatalog({
      libraryDir: workspace.library,
      outDir: workspace.out,
      now: () => new Date('2024-01-01T00:00:00.000Z'),
    });
    const firstJson = await fs.readFile(first.paths.libraryJson, 'utf-8');
    const firstHtml = await fs.readFile(first.paths.indexHtml, 'utf-8');

    const second = await generateCatalog({
      libraryDir: workspace.library,
      outDir: workspace.out,
      now: () => new Date('2024-06-30T23:59:59.000Z'),
    });
    const secondJson = await fs.readFile(second.paths.libraryJson, 'utf-8');
    const secondHtml = await fs.readFile(second.paths.indexHtml, 'utf-8');

    assert.strictEqual(secondHtml, firstHtml);
    assert.strictEqual(
      secondJson.replace('2024-06-30T23:59:59.000Z', 'TIMESTAMP'),
      firstJson.replace('2024-01-01T00:00:00.000Z', 'TIMESTAMP')
    );
  });
});
