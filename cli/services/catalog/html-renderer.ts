import { DEFAULT_SITE_LANG, DEFAULT_SITE_TITLE } from '../../../src/lib/constants';
import { Game, GameConsole, Library } from '../../../src/lib/types';
import { escapeHtml } from '../../../src/lib/utils';
import { RenderOptions } from '../../lib/types';

const STYLES = [
  'body { font-family: Arial, sans-serif; margin: 24px; }',
  'header { margin-bottom: 24px; }',
  '.console { margin-bottom: 32px; }',
  '.games { display: grid; gap: 12px; grid-template-columns: repeat(auto-fill, minmax(220px, 1fr)); }',
  '.game { border: 1px solid #ddd; border-radius: 8px; padding: 12px; }',
  '.game h3 { margin: 8px 0 6px; font-size: 16px; }',
  '.meta { color: #555; font-size: 13px; margin: 4px 0; }',
  '.tags { color: #666; font-size: 12px; }',
  'img.cover { width: 100%; height: auto; border-radius: 6px; }',
  'video.preview { width: 100%; border-radius: 6px; }',
];

export const EMPTY_LIBRARY_MESSAGE =
  'No games yet. Add console folders under library/ and run the generator again.';

export function countGames(library: Library): number {
  return library.consoles.reduce((sum, c) => sum + c.games.length, 0);
}

// year - publisher - region, skipping empty parts
function metaLine(game: Game): string | null {
  const parts = [game.year, game.publisher, game.region]
    .filter((value) => Boolean(value))
    .map((value) => escapeHtml(String(value)));
  return parts.length > 0 ? parts.join(' - ') : null;
}

function renderGame(game: Game): string[] {
  const lines = ['      <article class="game">'];

  if (game.cover) {
    lines.push(`        <img class="cover" src="${escapeHtml(game.cover)}" alt="${escapeHtml(game.title)}">`);
  }
  if (game.video) {
    lines.push(
      '        <video class="preview" controls preload="metadata">' +
        `<source src="${escapeHtml(game.video)}"></video>`
    );
  }
  lines.push(`        <h3>${escapeHtml(game.title)}</h3>`);

  const meta = metaLine(game);
  if (meta) {
    lines.push(`        <div class="meta">${meta}</div>`);
  }
  if (game.tags.length > 0) {
    lines.push(`        <div class="tags">${game.tags.map(escapeHtml).join(', ')}</div>`);
  }
  if (game.notes) {
    lines.push(`        <p class="meta">${escapeHtml(String(game.notes))}</p>`);
  }

  lines.push('      </article>');
  return lines;
}

function renderConsole(gameConsole: GameConsole): string[] {
  return [
    `  <section class="console" id="${escapeHtml(gameConsole.slug)}">`,
    `    <h2>${escapeHtml(gameConsole.name)} (${gameConsole.games.length})</h2>`,
    '    <div class="games">',
    ...gameConsole.games.flatMap(renderGame),
    '    </div>',
    '  </section>',
  ];
}

/**
 * Render the catalog page. Pure: the same library gives the same document,
 * and `generated_at` is not part of it.
 */
export function renderHtml(library: Library, options: RenderOptions = {}): string {
  const title = escapeHtml(options.siteTitle ?? DEFAULT_SITE_TITLE);
  const lang = escapeHtml(options.lang ?? DEFAULT_SITE_LANG);

  const lines = [
    '<!doctype html>',
    `<html lang="${lang}">`,
    '<head>',
    '  <meta charset="utf-8">',
    '  <meta name="viewport" content="width=device-width, initial-scale=1">',
    `  <title>${title}</title>`,
    '  <style>',
    ...STYLES.map((rule) => `    ${rule}`),
    '  </style>',
    '</head>',
    '<body>',
    '  <header>',
    `    <h1>${title}</h1>`,
    `    <p>Total: ${countGames(library)} games</p>`,
    '  </header>',
  ];

  if (library.consoles.length === 0) {
    lines.push(`  <p class="empty">${EMPTY_LIBRARY_MESSAGE}</p>`);
  }

  for (const gameConsole of library.consoles) {
    lines.push(...renderConsole(gameConsole));
  }

  lines.push('</body>', '</html>');
  return lines.join('\n');
}
