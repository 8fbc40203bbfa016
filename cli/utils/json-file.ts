import fs from 'fs-extra';
import { stringifyAsciiJson } from '../../src/lib/utils';
import { isErrnoException } from '../lib/types';

export type JsonReadResult =
  | { found: false }
  | { found: true; data: unknown };

/**
 * Read and parse a JSON file. A missing file is reported as `found: false`;
 * a JSON syntax error is thrown as-is.
 */
export async function readJsonIfExists(filePath: string): Promise<JsonReadResult> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return { found: false };
    }
    throw error;
  }

  const data: unknown = JSON.parse(content);
  return { found: true, data };
}

/**
 * Write JSON (two-space, ASCII-escaped, no trailing newline), creating parents
 */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await fs.outputFile(filePath, stringifyAsciiJson(data), 'utf-8');
}
