import { z } from 'zod';

/**
 * What to do with a sidecar that is not a JSON object
 */
export type MalformedSidecarPolicy = 'abort' | 'skip';

export interface SidecarOptions {
  fileName?: string; // defaults to game.json
  onMalformed?: MalformedSidecarPolicy; // defaults to 'abort'
}

/**
 * Options for a catalog scan
 */
export interface BuildOptions {
  sidecar?: SidecarOptions;
  romExtensions?: readonly string[];
  detectMedia?: boolean; // pick cover/video by filename when the sidecar names none
  now?: () => Date; // clock for generated_at
}

/**
 * Options for the HTML page
 */
export interface RenderOptions {
  siteTitle?: string;
  lang?: string;
}

export interface GenerateOptions extends BuildOptions, RenderOptions {
  libraryDir: string;
  outDir: string;
}

export interface ImportOptions {
  consoleName: string;
  sourceDir: string;
  libraryDir: string;
  overwrite?: boolean;
  sidecarFileName?: string;
}

export interface ImportSummary {
  consoleDir: string;
  imported: string[]; // game folders copied on this run
  skipped: string[]; // game folders left as they were
  sidecarsWritten: string[];
}

/**
 * Error thrown when a sidecar file cannot be parsed
 */
export class SidecarParseError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'SidecarParseError';
  }
}

/**
 * Error thrown when the importer source is missing or not a directory
 */
export class ImportSourceError extends Error {
  constructor(
    message: string,
    public readonly sourcePath: string
  ) {
    super(message);
    this.name = 'ImportSourceError';
  }
}

/**
 * Error thrown when a configuration file cannot be loaded
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configName: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Format Zod errors into a human-readable string
 */
export function formatZodErrors(error: z.ZodError): string {
  return error.errors
    .map((e) => {
      const path = e.path.join('.');
      return `  - ${path || 'root'}: ${e.message}`;
    })
    .join('\n');
}
