import AdmZip from 'adm-zip';
import fs from 'fs/promises';
import path from 'path';
import { compareIds } from '../models/BuildReport';
import { createLogger } from '../utils/logger';
import { writeFileAtomic } from './OutputWriter';

const logger = createLogger({ service: 'ArchiveService' });

// fixed entry time so identical files give an identical archive
const ENTRY_TIME = new Date(2000, 0, 1);

export class ArchiveService {
  /**
   * Zip pack files into `archivePath`. Entry names are relative to the pack
   * directory, so extracting onto an SD card root yields SOUNDS/...
   *
   * @param relPaths - files to include, relative to packDir, using '/'
   */
  async createArchive(packDir: string, relPaths: readonly string[], archivePath: string): Promise<void> {
    const zip = new AdmZip();

    for (const relPath of [...relPaths].sort(compareIds)) {
      zip.addFile(relPath, await fs.readFile(path.join(packDir, ...relPath.split('/'))));
      const entry = zip.getEntry(relPath);
      if (entry) entry.header.time = ENTRY_TIME;
    }

    await writeFileAtomic(archivePath, zip.toBuffer());
    logger.info({ archivePath, entries: relPaths.length }, 'Archive written');
  }
}
