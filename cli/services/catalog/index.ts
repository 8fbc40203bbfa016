/**
 * Catalog services exports
 */

export * from './scanner';
export * from './sidecar';
export * from './html-renderer';
export * from './builder';

import { CatalogConfig } from '../../lib/config';
import { GenerateOptions } from '../../lib/types';

export interface GenerateOverrides {
  libraryDir?: string;
  outDir?: string;
}

/**
 * Map catalog configuration plus command-line overrides onto generator options
 */
export function generateOptionsFromConfig(
  config: CatalogConfig,
  overrides: GenerateOverrides = {}
): GenerateOptions {
  return {
    libraryDir: overrides.libraryDir ?? config.paths.library,
    outDir: overrides.outDir ?? config.paths.out,
    sidecar: {
      fileName: config.sidecar.fileName,
      onMalformed: config.sidecar.onMalformed,
    },
    romExtensions: config.romExtensions,
    detectMedia: config.media.autoDetect,
    siteTitle: config.site.title,
    lang: config.site.lang,
  };
}
