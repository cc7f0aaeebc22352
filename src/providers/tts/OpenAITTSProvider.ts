import OpenAI from 'openai';
import { ProviderUnavailableError, SynthesisFailedError, ThrottledError, errorMessage } from '../../errors';
import type { PhraseError } from '../../errors';
import type { AudioEncoding } from '../../models/Audio';
import type { MarkupKind, Phrase } from '../../models/Phrase';
import { failure, success } from '../../models/SynthesisResult';
import type { SynthesisResult } from '../../models/SynthesisResult';
import { createVoiceModel, numberParameter } from '../../models/VoiceModel';
import type { VoiceModel } from '../../models/VoiceModel';
import { createLogger } from '../../utils/logger';
import type { ITTSProvider, ProviderLimits } from '../ITTSProvider';
import { checkRequest } from '../validation';

const logger = createLogger({ service: 'OpenAITTSProvider' });

/** response_format 'pcm' is 24kHz 16-bit mono little-endian */
export const OPENAI_PCM_SAMPLE_RATE = 24000;

export const OPENAI_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;

export type OpenAIVoice = (typeof OPENAI_VOICES)[number];

// voices are multilingual; this is the language they are listed under
const CATALOG_LANGUAGE = 'en_US';

export function isOpenAIVoice(value: string): value is OpenAIVoice {
  return OPENAI_VOICES.some((voice) => voice === value);
}

export interface SpeechRequest {
  model: string;
  voice: OpenAIVoice;
  input: string;
  speed: number;
}

/**
 * The slice of the OpenAI API this provider uses
 */
export interface SpeechClient {
  /** @throws if the model does not exist or the key is rejected */
  retrieveModel(model: string): Promise<void>;
  /** @returns raw PCM */
  createSpeech(request: SpeechRequest): Promise<Buffer>;
}

/**
 * SpeechClient backed by the openai SDK. The SDK reads OPENAI_API_KEY itself.
 */
export class SdkSpeechClient implements SpeechClient {
  private openai: OpenAI;

  constructor() {
    // the orchestrator owns retries
    this.openai = new OpenAI({ maxRetries: 0 });
  }

  async retrieveModel(model: string): Promise<void> {
    await this.openai.models.retrieve(model);
  }

  async createSpeech(request: SpeechRequest): Promise<Buffer> {
    const response = await this.openai.audio.speech.create({
      model: request.model,
      voice: request.voice,
      input: request.input,
      speed: request.speed,
      response_format: 'pcm'
    });
    return Buffer.from(await response.arrayBuffer());
  }
}

export interface OpenAITTSProviderOptions {
  model: string;
  limits: ProviderLimits;
  client?: SpeechClient;
}

/**
 * OpenAI Text-to-Speech Provider
 */
export class OpenAITTSProvider implements ITTSProvider {
  readonly name = 'openai';
  readonly markup: readonly MarkupKind[] = ['plaintext'];
  readonly outputEncoding: AudioEncoding = {
    container: 'pcm',
    sampleRate: OPENAI_PCM_SAMPLE_RATE,
    channels: 1,
    bitDepth: 16
  };
  readonly limits: ProviderLimits;

  private client: SpeechClient | null;
  private readonly model: string;

  constructor(opts: OpenAITTSProviderOptions) {
    this.model = opts.model;
    this.limits = opts.limits;
    this.client = opts.client ?? null;
  }

  async listVoices(): Promise<VoiceModel[]> {
    try {
      await this.getClient().retrieveModel(this.model);
    } catch (error) {
      throw classifyError(error);
    }

    return OPENAI_VOICES.map((voice) =>
      createVoiceModel({
        provider: this.name,
        voice,
        language: CATALOG_LANGUAGE,
        parameters: { model: this.model }
      })
    );
  }

  async synthesize(phrase: Phrase, voice: VoiceModel): Promise<SynthesisResult> {
    const rejected = checkRequest(this, phrase, voice);
    if (rejected) return rejected;

    const problem = this.validateVoice(voice);
    if (problem !== null || !isOpenAIVoice(voice.voice)) {
      return failure(new SynthesisFailedError(problem ?? `Unknown OpenAI voice '${voice.voice}'`));
    }
    const speed = numberParameter(voice, 'speed') ?? 1.0;

    try {
      const audio = await this.getClient().createSpeech({
        model: this.model,
        voice: voice.voice,
        input: phrase.text,
        speed
      });
      if (audio.length === 0) {
        return failure(new SynthesisFailedError('OpenAI returned no audio'));
      }
      logger.debug({ phrase: phrase.id, bytes: audio.length }, 'Synthesized phrase');
      return success(audio, this.outputEncoding);
    } catch (error) {
      logger.warn({ phrase: phrase.id, error: errorMessage(error) }, 'OpenAI TTS synthesis failed');
      return failure(classifyError(error));
    }
  }

  validateVoice(voice: VoiceModel): string | null {
    if (!isOpenAIVoice(voice.voice)) {
      return `Unknown OpenAI voice '${voice.voice}' (voices: ${OPENAI_VOICES.join(', ')})`;
    }
    const speed = numberParameter(voice, 'speed') ?? 1.0;
    if (speed < 0.25 || speed > 4.0) {
      return `speed must be between 0.25 and 4.0, got ${speed}`;
    }
    return null;
  }

  isDeterministic(): boolean {
    return false;
  }

  private getClient(): SpeechClient {
    if (!this.client) {
      this.client = new SdkSpeechClient();
    }
    return this.client;
  }
}

/**
 * Map SDK errors onto the phrase-level taxonomy
 */
export function classifyError(error: unknown): PhraseError {
  if (error instanceof OpenAI.RateLimitError) {
    const retryAfter = Number(error.headers?.['retry-after']);
    return new ThrottledError('openai', Number.isFinite(retryAfter) ? retryAfter * 1000 : undefined, {
      cause: error
    });
  }
  if (error instanceof OpenAI.AuthenticationError || error instanceof OpenAI.PermissionDeniedError) {
    return new ProviderUnavailableError('openai', error.message, { retryable: false, cause: error });
  }
  if (error instanceof OpenAI.APIConnectionError || error instanceof OpenAI.InternalServerError) {
    return new ProviderUnavailableError('openai', error.message, { retryable: true, cause: error });
  }
  if (error instanceof OpenAI.OpenAIError && error.message.includes('OPENAI_API_KEY')) {
    // thrown by the constructor when no key is configured
    return new ProviderUnavailableError('openai', error.message, { retryable: false, cause: error });
  }
  return new SynthesisFailedError(`OpenAI rejected the request: ${errorMessage(error)}`, { cause: error });
}
