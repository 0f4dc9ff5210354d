import { mkdir, rm } from 'fs/promises';
import { SiteWriteError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Delete `outputRoot` with everything below it, then recreate it empty
 */
export async function resetOutputRoot(outputRoot: string): Promise<void> {
  getLogger().debug(`Clearing output root ${outputRoot}`);
  try {
    await rm(outputRoot, { recursive: true, force: true });
    await mkdir(outputRoot, { recursive: true });
  } catch (error) {
    throw SiteWriteError.fromFsError(outputRoot, error);
  }
}
