import { randomUUID } from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import lockfile from 'proper-lockfile';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'OutputWriter' });

const LOCK_STALE_MS = 30_000;

/**
 * Write a file so readers only ever see the old or the complete new content
 */
export async function writeFileAtomic(filePath: string, data: Buffer | string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${randomUUID().slice(0, 8)}.tmp`);

  try {
    await fs.writeFile(tmpPath, data);
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw error;
  }
}

/**
 * Take an exclusive lock on a pack directory so two builds cannot write into it
 *
 * @returns the release function
 */
export async function lockDirectory(dir: string): Promise<() => Promise<void>> {
  await fs.mkdir(dir, { recursive: true });

  const release = await lockfile.lock(dir, {
    realpath: false,
    stale: LOCK_STALE_MS,
    retries: {
      retries: 3,
      minTimeout: 100,
      maxTimeout: 1000
    },
    onCompromised: (err) => {
      logger.error({ dir, error: err.message }, 'Output lock compromised');
    }
  });
  logger.debug({ dir }, 'Output directory locked');

  return async () => {
    await release();
    logger.debug({ dir }, 'Output directory unlocked');
  };
}
