/**
 * AWS Polly TTS Provider
 *
 * Cloud synthesis through Amazon Polly. Credentials and region are resolved
 * by the AWS SDK's default provider chain (environment, shared config,
 * SSO, instance roles); this provider never sees them.
 *
 * Polly voices are updated server-side, so output is not guaranteed to be
 * byte-identical between runs.
 */

import {
  DescribeVoicesCommand,
  Engine,
  LanguageCode,
  PollyClient,
  SynthesizeSpeechCommand,
  VoiceId
} from '@aws-sdk/client-polly';
import type { Voice } from '@aws-sdk/client-polly';
import {
  ProviderUnavailableError,
  SynthesisFailedError,
  ThrottledError,
  errorMessage
} from '../../errors';
import type { PhraseError } from '../../errors';
import type { AudioEncoding } from '../../models/Audio';
import type { MarkupKind, Phrase } from '../../models/Phrase';
import { failure, success } from '../../models/SynthesisResult';
import type { SynthesisResult } from '../../models/SynthesisResult';
import { createVoiceModel, hyphenLanguage, stringParameter, underscoreLanguage } from '../../models/VoiceModel';
import type { VoiceModel } from '../../models/VoiceModel';
import { createLogger } from '../../utils/logger';
import type { ITTSProvider, ProviderLimits } from '../ITTSProvider';
import { checkRequest } from '../validation';

const logger = createLogger({ service: 'PollyTTSProvider' });

export const POLLY_SAMPLE_RATE = 16000;

export interface PollyVoiceInfo {
  id: string;
  languageCode: string;
  engines: string[];
}

export interface PollySpeechRequest {
  text: string;
  textType: 'text' | 'ssml';
  voiceId: string;
  languageCode: string;
  engine: string;
}

/**
 * The slice of the Polly API this provider uses
 */
export interface PollyGateway {
  describeVoices(): Promise<PollyVoiceInfo[]>;
  /** @returns raw 16-bit mono PCM at POLLY_SAMPLE_RATE */
  synthesizeSpeech(request: PollySpeechRequest): Promise<Uint8Array>;
}

const voiceIds: readonly string[] = Object.values(VoiceId);
const languageCodes: readonly string[] = Object.values(LanguageCode);
const engines: readonly string[] = Object.values(Engine);

function isVoiceId(value: string): value is VoiceId {
  return voiceIds.includes(value);
}

function isLanguageCode(value: string): value is LanguageCode {
  return languageCodes.includes(value);
}

function isEngine(value: string): value is Engine {
  return engines.includes(value);
}

/**
 * PollyGateway backed by the AWS SDK
 */
export class SdkPollyGateway implements PollyGateway {
  private client: PollyClient;

  constructor() {
    // the orchestrator owns retries
    this.client = new PollyClient({ maxAttempts: 1 });
  }

  async describeVoices(): Promise<PollyVoiceInfo[]> {
    const voices: Voice[] = [];
    let nextToken: string | undefined;
    do {
      const page = await this.client.send(new DescribeVoicesCommand({ NextToken: nextToken }));
      voices.push(...(page.Voices ?? []));
      nextToken = page.NextToken;
    } while (nextToken);

    return voices.flatMap((voice) =>
      voice.Id && voice.LanguageCode
        ? [{ id: voice.Id, languageCode: voice.LanguageCode, engines: voice.SupportedEngines ?? [] }]
        : []
    );
  }

  async synthesizeSpeech(request: PollySpeechRequest): Promise<Uint8Array> {
    if (!isVoiceId(request.voiceId)) {
      throw new SynthesisFailedError(`Unknown Polly voice '${request.voiceId}'`);
    }
    if (!isLanguageCode(request.languageCode)) {
      throw new SynthesisFailedError(`Unsupported Polly language '${request.languageCode}'`);
    }
    if (!isEngine(request.engine)) {
      throw new SynthesisFailedError(`Unknown Polly engine '${request.engine}'`);
    }

    const response = await this.client.send(
      new SynthesizeSpeechCommand({
        Text: request.text,
        TextType: request.textType,
        VoiceId: request.voiceId,
        LanguageCode: request.languageCode,
        Engine: request.engine,
        OutputFormat: 'pcm',
        SampleRate: String(POLLY_SAMPLE_RATE)
      })
    );
    if (!response.AudioStream) {
      throw new SynthesisFailedError('Polly returned no audio stream');
    }
    return response.AudioStream.transformToByteArray();
  }
}

export interface PollyTTSProviderOptions {
  limits: ProviderLimits;
  defaultEngine?: string;
  gateway?: PollyGateway;
}

export class PollyTTSProvider implements ITTSProvider {
  readonly name = 'polly';
  readonly markup: readonly MarkupKind[] = ['plaintext', 'ssml'];
  readonly outputEncoding: AudioEncoding = {
    container: 'pcm',
    sampleRate: POLLY_SAMPLE_RATE,
    channels: 1,
    bitDepth: 16
  };
  readonly limits: ProviderLimits;

  private gateway: PollyGateway | null;
  private readonly defaultEngine: string;
  /** voice id -> engines from the last listVoices() */
  private supportedEngines = new Map<string, readonly string[]>();

  constructor(opts: PollyTTSProviderOptions) {
    this.limits = opts.limits;
    this.gateway = opts.gateway ?? null;
    this.defaultEngine = opts.defaultEngine ?? 'standard';
  }

  async listVoices(): Promise<VoiceModel[]> {
    let voices: PollyVoiceInfo[];
    try {
      voices = await this.getGateway().describeVoices();
    } catch (error) {
      throw classifyError(error);
    }

    this.supportedEngines = new Map(voices.map((voice) => [voice.id, voice.engines]));
    return voices.map((voice) =>
      createVoiceModel({
        provider: this.name,
        voice: voice.id,
        language: underscoreLanguage(voice.languageCode),
        parameters: {
          engine: voice.engines.includes(this.defaultEngine) ? this.defaultEngine : (voice.engines[0] ?? this.defaultEngine)
        }
      })
    );
  }

  async synthesize(phrase: Phrase, voice: VoiceModel): Promise<SynthesisResult> {
    const rejected = checkRequest(this, phrase, voice);
    if (rejected) return rejected;

    try {
      const audio = await this.getGateway().synthesizeSpeech({
        text: phrase.markup === 'ssml' ? wrapSsml(phrase.text) : phrase.text,
        textType: phrase.markup === 'ssml' ? 'ssml' : 'text',
        voiceId: voice.voice,
        languageCode: hyphenLanguage(voice.language),
        engine: stringParameter(voice, 'engine') ?? this.defaultEngine
      });
      logger.debug({ phrase: phrase.id, bytes: audio.length }, 'Synthesized phrase');
      return success(Buffer.from(audio), this.outputEncoding);
    } catch (error) {
      return failure(classifyError(error));
    }
  }

  validateVoice(voice: VoiceModel): string | null {
    const engine = stringParameter(voice, 'engine') ?? this.defaultEngine;
    if (!isEngine(engine)) {
      return `unknown Polly engine '${engine}' (engines: ${[...engines].sort().join(', ')})`;
    }
    const supported = this.supportedEngines.get(voice.voice) ?? [];
    if (supported.length > 0 && !supported.includes(engine)) {
      return `Polly voice '${voice.voice}' does not support the ${engine} engine (supports: ${supported.join(', ')})`;
    }
    return null;
  }

  isDeterministic(): boolean {
    return false;
  }

  private getGateway(): PollyGateway {
    if (!this.gateway) {
      this.gateway = new SdkPollyGateway();
    }
    return this.gateway;
  }
}

/**
 * Polly only accepts SSML inside a <speak> root
 */
export function wrapSsml(text: string): string {
  const trimmed = text.trim();
  return trimmed.startsWith('<speak') ? trimmed : `<speak>${trimmed}</speak>`;
}

const THROTTLING_ERRORS = new Set(['ThrottlingException', 'TooManyRequestsException', 'Throttling']);
const CREDENTIAL_ERRORS = new Set([
  'CredentialsProviderError',
  'UnrecognizedClientException',
  'InvalidSignatureException',
  'AccessDeniedException',
  'ExpiredTokenException'
]);
const NETWORK_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'EAI_AGAIN']);

interface AwsErrorShape {
  name?: unknown;
  code?: unknown;
  $metadata?: { httpStatusCode?: number };
}

function isAwsErrorShape(value: unknown): value is AwsErrorShape {
  return typeof value === 'object' && value !== null;
}

/**
 * Map SDK errors onto the phrase-level taxonomy
 */
export function classifyError(error: unknown): PhraseError {
  if (error instanceof SynthesisFailedError) return error;
  if (!isAwsErrorShape(error)) {
    return new SynthesisFailedError(`Polly synthesis failed: ${errorMessage(error)}`);
  }

  const name = typeof error.name === 'string' ? error.name : '';
  const code = typeof error.code === 'string' ? error.code : '';
  const status = error.$metadata?.httpStatusCode;

  if (THROTTLING_ERRORS.has(name) || status === 429) {
    return new ThrottledError('polly', undefined, { cause: error });
  }
  if (CREDENTIAL_ERRORS.has(name) || status === 401 || status === 403) {
    return new ProviderUnavailableError('polly', errorMessage(error), { retryable: false, cause: error });
  }
  if (NETWORK_CODES.has(code) || name === 'TimeoutError' || (status !== undefined && status >= 500)) {
    return new ProviderUnavailableError('polly', errorMessage(error), { retryable: true, cause: error });
  }
  return new SynthesisFailedError(`Polly rejected the request: ${errorMessage(error)}`, { cause: error });
}
