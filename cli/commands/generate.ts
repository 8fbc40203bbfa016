#!/usr/bin/env node
/**
 * Catalog generation
 *
 * Scans library/<console>/<game> and writes the static catalog.
 * Outputs: <out>/library.json, <out>/index.html, <out>/assets/
 */

import * as dotenv from 'dotenv';

dotenv.config({ path: '.env.local' });
dotenv.config(); // Fallback to .env
import { ConfigManager } from '../lib/config';
import { generateCatalog, GenerateOverrides, generateOptionsFromConfig } from '../services/catalog';
import { errorMessage } from '../lib/types';
import { logger } from '../utils/logger';

export interface GenerateArgs extends GenerateOverrides {
  missingValues: string[]; // flags given without a value
}

const USAGE = 'Usage: npm run generate -- [--library <dir>] [--out <dir>]';

export function parseGenerateArgs(args: string[]): GenerateArgs {
  const missingValues: string[] = [];

  const flagValue = (flag: string): string | undefined => {
    const index = args.indexOf(flag);
    if (index === -1) return undefined;
    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      missingValues.push(flag);
      return undefined;
    }
    return value;
  };

  return {
    libraryDir: flagValue('--library'),
    outDir: flagValue('--out'),
    missingValues,
  };
}

async function main(args: GenerateArgs = { missingValues: [] }) {
  try {
    if (args.missingValues.length > 0) {
      console.error(`[GENERATE] ✗ Error: Missing value for ${args.missingValues.join(', ')}`);
      console.log(`[GENERATE] ${USAGE}`);
      process.exit(1);
    }

    console.log('[GENERATE] Starting catalog generation...');

    const config = await ConfigManager.loadCatalogConfig();
    const options = generateOptionsFromConfig(config, args);
    console.log(`[GENERATE] Library: ${options.libraryDir}`);
    console.log(`[GENERATE] Output: ${options.outDir}`);

    const result = await generateCatalog(options);

    console.log(`[GENERATE] ✓ ${result.library.consoles.length} console(s), ${result.gameCount} game(s)`);
    console.log(`[GENERATE] ✓ Output: ${result.paths.indexHtml}`);
    console.log(`[GENERATE] ✓ Output: ${result.paths.libraryJson}`);

    process.exit(0);
  } catch (error: unknown) {
    console.error('[GENERATE] ✗ Error:', errorMessage(error));
    if (error instanceof Error && error.stack) {
      logger.error(error.stack);
    }
    process.exit(1);
  }
}

// Run if called directly
if (require.main === module) {
  void main(parseGenerateArgs(process.argv.slice(2)));
}

export default main;
