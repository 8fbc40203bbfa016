import fs from "fs";
import path from "path";
import {
  ASSETS_DIR_NAME,
  INDEX_HTML_FILE_NAME,
  LIBRARY_JSON_FILE_NAME,
} from "./constants";
import { slugify } from "./utils";

/**
 * Centralized path management for generated catalogs.
 * Uses the `<out>/{index.html,library.json,assets/<console>/<title>/}` layout.
 */

export interface OutputPaths {
  root: string;
  indexHtml: string;
  libraryJson: string;
  assets: string;
}

export function getOutputPaths(outDir: string): OutputPaths {
  const root = path.resolve(outDir);

  return {
    root,
    indexHtml: path.join(root, INDEX_HTML_FILE_NAME),
    libraryJson: path.join(root, LIBRARY_JSON_FILE_NAME),
    assets: path.join(root, ASSETS_DIR_NAME),
  };
}

/**
 * Asset directory of one game. Both segments go through `slugify`, whatever
 * the caller passes.
 */
export function getGameAssetsDir(outDir: string, consoleName: string, title: string): string {
  return path.join(getOutputPaths(outDir).assets, slugify(consoleName), slugify(title));
}

/**
 * Ensure the output root and its assets directory exist
 */
export function ensureOutputDirs(outDir: string): OutputPaths {
  const paths = getOutputPaths(outDir);
  fs.mkdirSync(paths.assets, { recursive: true });
  return paths;
}

export function getConsoleDir(libraryDir: string, consoleName: string): string {
  return path.join(path.resolve(libraryDir), consoleName);
}
