/**
 * Piper Voice Downloader
 *
 * Installs published Piper voices into the voices directory the provider
 * scans. The published catalog (`voices.json`) maps each voice key to its
 * files with size and md5; both are checked before a file is written.
 */

import { createHash } from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { VoiceCatalogError, errorMessage } from '../../errors';
import { writeFileAtomic } from '../../services/OutputWriter';
import { createLogger } from '../../utils/logger';

const logger = createLogger({ service: 'PiperVoiceDownloader' });

const VOICES_CATALOG = 'voices.json';
const DEFAULT_TIMEOUT_MS = 120_000;

const VoiceFileSchema = z
  .object({
    size_bytes: z.number().int().nonnegative().optional(),
    md5_digest: z.string().optional()
  })
  .passthrough();

const VoicesCatalogSchema = z.record(
  z
    .object({
      files: z.record(VoiceFileSchema)
    })
    .passthrough()
);

type VoiceFile = z.infer<typeof VoiceFileSchema>;

export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export interface PiperVoiceDownloaderOptions {
  voicesDir: string;
  baseUrl: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export interface DownloadResult {
  voice: string;
  /** Local paths of the model and its config */
  files: string[];
  /** Both files were already installed */
  skipped: boolean;
}

function joinUrl(base: string, relPath: string): string {
  const b = base.replace(/\/+$/, '');
  const p = relPath.replace(/^\/+/, '').split('/').map(encodeURIComponent).join('/');
  return `${b}/${p}`;
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

export class PiperVoiceDownloader {
  private readonly fetch: FetchLike;
  private readonly timeoutMs: number;

  constructor(private opts: PiperVoiceDownloaderOptions) {
    this.fetch = opts.fetch ?? ((url, init) => fetch(url, init));
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Voice keys in the published catalog, sorted
   */
  async listAvailable(): Promise<string[]> {
    return Object.keys(await this.catalog()).sort();
  }

  /**
   * Install `<voice>.onnx` and `<voice>.onnx.json`. The config is written
   * last, so an interrupted download is never picked up by a catalog scan.
   */
  async download(voice: string, options: { force?: boolean } = {}): Promise<DownloadResult> {
    const modelPath = path.join(this.opts.voicesDir, `${voice}.onnx`);
    const configPath = `${modelPath}.json`;

    if (!options.force && (await exists(modelPath)) && (await exists(configPath))) {
      logger.info({ voice }, 'Piper voice already installed');
      return { voice, files: [modelPath, configPath], skipped: true };
    }

    const entry = (await this.catalog())[voice];
    if (!entry) {
      throw new VoiceCatalogError(`Piper voice '${voice}' is not in the download catalog`);
    }

    const model = findFile(entry.files, `${voice}.onnx`);
    const config = findFile(entry.files, `${voice}.onnx.json`);
    if (!model || !config) {
      throw new VoiceCatalogError(`Piper voice '${voice}' has no model and config in the download catalog`);
    }

    const downloads: Array<[[string, VoiceFile], string]> = [
      [model, modelPath],
      [config, configPath]
    ];
    for (const [[remotePath, meta], localPath] of downloads) {
      const data = await this.fetchBuffer(remotePath);
      verify(remotePath, data, meta);
      await writeFileAtomic(localPath, data);
      logger.info({ voice, file: path.basename(localPath), bytes: data.length }, 'Downloaded piper voice file');
    }

    return { voice, files: [modelPath, configPath], skipped: false };
  }

  private async catalog(): Promise<z.infer<typeof VoicesCatalogSchema>> {
    const data = await this.fetchBuffer(VOICES_CATALOG);
    let json: unknown;
    try {
      json = JSON.parse(data.toString('utf-8'));
    } catch (error) {
      throw new VoiceCatalogError(`Piper voice catalog is not valid JSON: ${errorMessage(error)}`, { cause: error });
    }
    const parsed = VoicesCatalogSchema.safeParse(json);
    if (!parsed.success) {
      throw new VoiceCatalogError('Piper voice catalog has an unexpected shape', { cause: parsed.error });
    }
    return parsed.data;
  }

  private async fetchBuffer(relPath: string): Promise<Buffer> {
    const url = joinUrl(this.opts.baseUrl, relPath);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetch(url, { signal: controller.signal });
      if (!response.ok) {
        throw new VoiceCatalogError(`Download of ${url} failed: ${response.status} ${response.statusText}`.trim());
      }
      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      if (error instanceof VoiceCatalogError) throw error;
      if (error instanceof Error && error.name === 'AbortError') {
        throw new VoiceCatalogError(`Download of ${url} timed out`, { cause: error });
      }
      throw new VoiceCatalogError(`Download of ${url} failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }
}

function findFile(files: Record<string, VoiceFile>, name: string): [string, VoiceFile] | undefined {
  return Object.entries(files).find(([remotePath]) => path.posix.basename(remotePath) === name);
}

function verify(remotePath: string, data: Buffer, meta: VoiceFile): void {
  if (meta.size_bytes !== undefined && meta.size_bytes !== data.length) {
    throw new VoiceCatalogError(`${remotePath}: expected ${meta.size_bytes} bytes, got ${data.length}`);
  }
  if (meta.md5_digest !== undefined) {
    const digest = createHash('md5').update(data).digest('hex');
    if (digest !== meta.md5_digest) {
      throw new VoiceCatalogError(`${remotePath}: md5 mismatch`);
    }
  }
}
