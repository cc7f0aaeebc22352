import fs from 'fs/promises';
import path from 'path';
import type { AudioFormat } from '../models/Audio';
import type { Phrase } from '../models/Phrase';
import type { VoiceModel } from '../models/VoiceModel';
import { createLogger } from '../utils/logger';
import { sha256 } from './ChecksumService';
import { writeFileAtomic } from './OutputWriter';

const logger = createLogger({ service: 'SynthesisCache' });

const CACHE_VERSION = 1;

export function normalizeText(s: string): string {
  return s
    .replace(/\r\n/g, '\n')
    .replace(/[ \t]+/g, ' ')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export interface CacheKeyInput {
  phrase: Pick<Phrase, 'text' | 'markup'>;
  voice: VoiceModel;
  format: AudioFormat;
  normalize: boolean;
}

/**
 * Hash of everything that shapes the converted audio of one phrase
 */
export function cacheFingerprint({ phrase, voice, format, normalize }: CacheKeyInput): string {
  const parameters = Object.keys(voice.parameters)
    .sort()
    .map((name) => [name, voice.parameters[name]]);

  const stable = {
    v: CACHE_VERSION,
    provider: voice.provider,
    voice: voice.voice,
    language: voice.language,
    parameters,
    text: normalizeText(phrase.text),
    markup: phrase.markup,
    format: [format.sampleRate, format.channels, format.bitDepth],
    normalize
  };

  return sha256(JSON.stringify(stable));
}

/**
 * On-disk store of converted phrase audio, keyed by fingerprint
 */
export class SynthesisCache {
  constructor(readonly dir: string) {}

  async get(fingerprint: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(this.pathFor(fingerprint));
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  async put(fingerprint: string, wav: Buffer): Promise<void> {
    await writeFileAtomic(this.pathFor(fingerprint), wav);
    logger.debug({ fingerprint }, 'Cached phrase audio');
  }

  pathFor(fingerprint: string): string {
    return path.join(this.dir, fingerprint.slice(0, 2), `${fingerprint}.wav`);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
