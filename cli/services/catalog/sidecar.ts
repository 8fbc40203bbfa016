import * as path from 'path';
import { SIDECAR_FILE_NAME } from '../../../src/lib/constants';
import { GameMetadata, GameMetadataSchema } from '../../../src/lib/types';
import { errorMessage, SidecarOptions, SidecarParseError } from '../../lib/types';
import { readJsonIfExists } from '../../utils/json-file';
import { logger } from '../../utils/logger';

export function getSidecarPath(gameDir: string, fileName: string = SIDECAR_FILE_NAME): string {
  return path.join(gameDir, fileName);
}

/**
 * Read a game folder's sidecar metadata.
 *
 * A missing sidecar is empty metadata. A file that is not valid JSON, or whose
 * top level is not an object, throws `SidecarParseError` unless the policy is
 * 'skip', in which case it is logged and read as empty. Individual fields of
 * the wrong type are dropped.
 */
export async function readGameMetadata(
  gameDir: string,
  options: SidecarOptions = {}
): Promise<GameMetadata> {
  const sidecarPath = getSidecarPath(gameDir, options.fileName);
  const policy = options.onMalformed ?? 'abort';

  let problem: string;
  let cause: Error | undefined;
  try {
    const result = await readJsonIfExists(sidecarPath);
    if (!result.found) {
      return {};
    }

    const parsed = GameMetadataSchema.safeParse(result.data);
    if (parsed.success) {
      return parsed.data;
    }
    problem = 'top-level value is not an object';
  } catch (error: unknown) {
    if (!(error instanceof SyntaxError)) {
      throw error;
    }
    problem = errorMessage(error);
    cause = error;
  }

  if (policy === 'skip') {
    logger.warn('Ignoring malformed sidecar', { path: sidecarPath, problem });
    return {};
  }
  throw new SidecarParseError(`Malformed sidecar ${sidecarPath}: ${problem}`, sidecarPath, cause);
}
