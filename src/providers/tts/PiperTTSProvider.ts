/**
 * Piper TTS Provider
 *
 * Local inference with Piper ONNX voices.
 * @see https://github.com/rhasspy/piper
 *
 * The voice catalog is every `<voice>.onnx` in the voices directory that has
 * a `<voice>.onnx.json` config beside it. Noise scales are pinned to 0 unless
 * a voice overrides them, which makes output repeatable for a given model.
 *
 * Each catalog voice carries a `revision` parameter derived from the model
 * file's size and mtime and the config text, so a replaced model never
 * matches audio synthesized with the old one.
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { SynthesisFailedError, VoiceCatalogError, errorMessage } from '../../errors';
import type { AudioEncoding } from '../../models/Audio';
import type { MarkupKind, Phrase } from '../../models/Phrase';
import { failure, success } from '../../models/SynthesisResult';
import type { SynthesisResult } from '../../models/SynthesisResult';
import { createVoiceModel, numberParameter, stringParameter, underscoreLanguage } from '../../models/VoiceModel';
import type { VoiceModel } from '../../models/VoiceModel';
import { sha256 } from '../../services/ChecksumService';
import { createLogger } from '../../utils/logger';
import type { ITTSProvider, ProviderLimits } from '../ITTSProvider';
import { checkRequest } from '../validation';
import { PiperProcessEngine } from './PiperEngine';
import type { IPiperEngine, PiperEngineOptions } from './PiperEngine';

const logger = createLogger({ service: 'PiperTTSProvider' });

const PiperVoiceConfigSchema = z
  .object({
    audio: z.object({
      sample_rate: z.number().int().positive(),
      quality: z.string().optional()
    }),
    language: z.object({ code: z.string().min(1) }).optional(),
    num_speakers: z.number().int().optional(),
    dataset: z.string().optional()
  })
  .passthrough();

/** voice parameter -> piper CLI flag */
const PARAMETER_FLAGS: Record<string, string> = {
  length_scale: '--length_scale',
  noise_scale: '--noise_scale',
  noise_w: '--noise_w',
  sentence_silence: '--sentence_silence',
  speaker: '--speaker'
};

export const PIPER_QUALITIES = ['x_low', 'low', 'medium', 'high'] as const;

const PINNED_NOISE: Partial<Record<string, number>> = { noise_scale: 0, noise_w: 0 };

interface PiperModelEntry {
  voice: VoiceModel;
  modelPath: string;
  configPath: string;
  sampleRate: number;
}

export interface PiperTTSProviderOptions {
  binPath: string;
  voicesDir: string;
  timeoutMs: number;
  limits: ProviderLimits;
  engineFactory?: (options: PiperEngineOptions) => IPiperEngine;
}

export class PiperTTSProvider implements ITTSProvider {
  readonly name = 'piper';
  readonly markup: readonly MarkupKind[] = ['plaintext'];
  readonly outputEncoding: AudioEncoding = { container: 'wav', sampleRate: 22050, channels: 1, bitDepth: 16 };
  readonly limits: ProviderLimits;

  private models = new Map<string, PiperModelEntry>();
  private engines = new Map<string, IPiperEngine>();
  private readonly engineFactory: (options: PiperEngineOptions) => IPiperEngine;

  constructor(private opts: PiperTTSProviderOptions) {
    this.limits = opts.limits;
    this.engineFactory = opts.engineFactory ?? ((options) => new PiperProcessEngine(options));
  }

  async listVoices(): Promise<VoiceModel[]> {
    const models = await this.scan();
    return Array.from(models.values()).map((entry) => entry.voice);
  }

  async synthesize(phrase: Phrase, voice: VoiceModel): Promise<SynthesisResult> {
    const rejected = checkRequest(this, phrase, voice);
    if (rejected) return rejected;

    let entry = this.models.get(voice.voice);
    if (!entry) {
      try {
        entry = (await this.scan()).get(voice.voice);
      } catch (error) {
        return failure(new SynthesisFailedError(errorMessage(error), { cause: error }));
      }
    }
    if (!entry) {
      return failure(new SynthesisFailedError(`Piper voice '${voice.voice}' is not installed in ${this.opts.voicesDir}`));
    }

    try {
      const wav = await this.engineFor(entry, voice).synthesize(phrase.text);
      logger.debug({ phrase: phrase.id, bytes: wav.length }, 'Synthesized phrase');
      return success(wav, { ...this.outputEncoding, sampleRate: entry.sampleRate });
    } catch (error) {
      return failure(new SynthesisFailedError(`Piper synthesis failed: ${errorMessage(error)}`, { cause: error }));
    }
  }

  validateVoice(voice: VoiceModel): string | null {
    const quality = stringParameter(voice, 'quality');
    if (quality === undefined) return null;
    if (!PIPER_QUALITIES.some((known) => known === quality)) {
      return `unknown Piper quality '${quality}' (qualities: ${PIPER_QUALITIES.join(', ')})`;
    }
    const installed = this.models.get(voice.voice)?.voice.parameters.quality;
    if (installed !== undefined && installed !== quality) {
      return `Piper voice '${voice.voice}' is ${String(installed)} quality, not ${quality}`;
    }
    return null;
  }

  isDeterministic(voice: VoiceModel): boolean {
    return Object.entries(PINNED_NOISE).every(
      ([name, pinned]) => (numberParameter(voice, name) ?? pinned) === 0
    );
  }

  async dispose(): Promise<void> {
    const engines = Array.from(this.engines.values());
    this.engines.clear();
    await Promise.all(engines.map((engine) => engine.close()));
  }

  private engineFor(entry: PiperModelEntry, voice: VoiceModel): IPiperEngine {
    const args = engineArgs(voice);
    const key = `${entry.modelPath}\0${args.join(' ')}`;
    let engine = this.engines.get(key);
    if (!engine) {
      engine = this.engineFactory({
        binPath: this.opts.binPath,
        modelPath: entry.modelPath,
        configPath: entry.configPath,
        timeoutMs: this.opts.timeoutMs,
        args
      });
      this.engines.set(key, engine);
    }
    return engine;
  }

  private async scan(): Promise<Map<string, PiperModelEntry>> {
    let files: string[];
    try {
      files = await fs.readdir(this.opts.voicesDir);
    } catch (error) {
      throw new VoiceCatalogError(`Piper voices directory '${this.opts.voicesDir}' cannot be read`, {
        cause: error
      });
    }

    const available = new Set(files);
    const models = new Map<string, PiperModelEntry>();

    for (const file of files.filter((f) => f.endsWith('.onnx')).sort()) {
      const configFile = `${file}.json`;
      if (!available.has(configFile)) {
        logger.warn({ model: file }, 'Skipping piper model without config');
        continue;
      }
      const id = file.slice(0, -'.onnx'.length);
      const configPath = path.join(this.opts.voicesDir, configFile);
      const modelPath = path.join(this.opts.voicesDir, file);
      const read = await readVoiceConfig(configPath);
      if (!read) {
        logger.warn({ model: file }, 'Skipping piper model with unreadable config');
        continue;
      }

      const { config, text } = read;
      const language = config.language?.code ?? id.split('-')[0];
      const parameters: Record<string, string> = {};
      if (config.audio.quality) parameters.quality = config.audio.quality;
      try {
        const stat = await fs.stat(modelPath);
        parameters.revision = sha256(`${stat.size}:${stat.mtimeMs}:${text}`).slice(0, 16);
      } catch (error) {
        logger.warn({ model: file, error: errorMessage(error) }, 'Skipping unreadable piper model');
        continue;
      }

      try {
        models.set(id, {
          voice: createVoiceModel({ provider: this.name, voice: id, language: underscoreLanguage(language), parameters }),
          modelPath,
          configPath,
          sampleRate: config.audio.sample_rate
        });
      } catch (error) {
        logger.warn({ model: file, error: errorMessage(error) }, 'Skipping piper model with invalid language');
      }
    }

    if (models.size === 0) {
      throw new VoiceCatalogError(`No piper voices found in '${this.opts.voicesDir}'`);
    }

    this.models = models;
    logger.debug({ voices: models.size }, 'Scanned piper voices');
    return models;
  }
}

async function readVoiceConfig(
  configPath: string
): Promise<{ config: z.infer<typeof PiperVoiceConfigSchema>; text: string } | null> {
  try {
    const text = await fs.readFile(configPath, 'utf-8');
    const parsed = PiperVoiceConfigSchema.safeParse(JSON.parse(text));
    return parsed.success ? { config: parsed.data, text } : null;
  } catch {
    return null;
  }
}

function engineArgs(voice: VoiceModel): string[] {
  const args: string[] = [];
  for (const [name, flag] of Object.entries(PARAMETER_FLAGS)) {
    const value = numberParameter(voice, name) ?? PINNED_NOISE[name];
    if (value !== undefined) {
      args.push(flag, String(value));
    }
  }
  return args;
}
