import { createHash } from 'crypto';
import path from 'path';
import { CHECKSUM_MANIFEST } from '../config/constants';
import { compareIds } from '../models/BuildReport';
import { writeFileAtomic } from './OutputWriter';

export function sha256(data: Buffer | string): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * `<hash>  <path>` lines in path order, the format `sha256sum -c` reads
 */
export function renderManifest(files: Readonly<Record<string, string>>): string {
  return Object.keys(files)
    .sort(compareIds)
    .map((relPath) => `${files[relPath]}  ${relPath}\n`)
    .join('');
}

export interface ManifestSummary {
  /** sha256 of the manifest text */
  checksum: string;
  manifestPath: string;
}

export class ChecksumService {
  /**
   * Write the manifest into the pack directory
   *
   * @param files - sha256 per file, keyed by path relative to packDir
   */
  async writeManifest(packDir: string, files: Readonly<Record<string, string>>): Promise<ManifestSummary> {
    const manifest = renderManifest(files);
    const manifestPath = path.join(packDir, CHECKSUM_MANIFEST);
    await writeFileAtomic(manifestPath, manifest);
    return { checksum: sha256(manifest), manifestPath };
  }
}
