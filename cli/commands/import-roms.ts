#!/usr/bin/env node
/**
 * ROM import
 *
 * Copies cover/video media from a folder of game folders into
 * library/<console>/ and writes game.json where a game has none.
 * Usage: npm run import -- <console> <source> [--library <dir>] [--overwrite]
 */

import * as dotenv from 'dotenv';

dotenv.config({ path: '.env.local' });
dotenv.config(); // Fallback to .env
import { ConfigManager } from '../lib/config';
import { importRoms } from '../services/importer';
import { errorMessage, ImportSourceError } from '../lib/types';
import { logger } from '../utils/logger';

export interface ImportArgs {
  consoleName?: string;
  sourceDir?: string;
  libraryDir?: string;
  overwrite: boolean;
  missingValues: string[]; // flags given without a value
}

const USAGE = 'Usage: npm run import -- <console> <source> [--library <dir>] [--overwrite]';

export function parseImportArgs(args: string[]): ImportArgs {
  const positional: string[] = [];
  let libraryDir: string | undefined;
  let overwrite = false;
  const missingValues: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--overwrite') {
      overwrite = true;
    } else if (arg === '--library') {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        missingValues.push(arg);
      } else {
        libraryDir = value;
        i++;
      }
    } else {
      positional.push(arg);
    }
  }

  return {
    consoleName: positional[0],
    sourceDir: positional[1],
    libraryDir,
    overwrite,
    missingValues,
  };
}

async function main(args: ImportArgs) {
  try {
    if (args.missingValues.length > 0) {
      console.error(`[IMPORT] ✗ Error: Missing value for ${args.missingValues.join(', ')}`);
      console.log(`[IMPORT] ${USAGE}`);
      process.exit(1);
    }
    if (!args.consoleName || !args.sourceDir) {
      console.error('[IMPORT] ✗ Error: Missing required arguments <console> <source>');
      console.log(`[IMPORT] ${USAGE}`);
      process.exit(1);
    }

    const config = await ConfigManager.loadCatalogConfig();
    const libraryDir = args.libraryDir ?? config.paths.library;
    console.log(`[IMPORT] Importing ${args.sourceDir} as ${args.consoleName} into ${libraryDir}...`);

    const summary = await importRoms({
      consoleName: args.consoleName,
      sourceDir: args.sourceDir,
      libraryDir,
      overwrite: args.overwrite,
      sidecarFileName: config.sidecar.fileName,
    });

    console.log(`[IMPORT] ✓ Imported ${summary.imported.length} game(s), skipped ${summary.skipped.length}`);
    console.log(`[IMPORT] ✓ Wrote ${summary.sidecarsWritten.length} sidecar file(s)`);
    console.log(`[IMPORT] ✓ Output: ${summary.consoleDir}`);

    process.exit(0);
  } catch (error: unknown) {
    console.error('[IMPORT] ✗ Error:', errorMessage(error));
    if (!(error instanceof ImportSourceError) && error instanceof Error && error.stack) {
      logger.error(error.stack);
    }
    process.exit(1);
  }
}

// Run if called directly
if (require.main === module) {
  void main(parseImportArgs(process.argv.slice(2)));
}

export default main;
