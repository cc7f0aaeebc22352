import type { PhraseError } from '../../errors';
import type { AudioEncoding } from '../../models/Audio';
import type { MarkupKind, Phrase } from '../../models/Phrase';
import { failure, success } from '../../models/SynthesisResult';
import type { SynthesisResult } from '../../models/SynthesisResult';
import { createVoiceModel } from '../../models/VoiceModel';
import type { VoiceModel } from '../../models/VoiceModel';
import type { ITTSProvider, ProviderLimits } from '../../providers/ITTSProvider';
import { checkRequest } from '../../providers/validation';
import { toneWav } from './audio';

export interface FakeProviderOptions {
  name?: string;
  voices?: VoiceModel[];
  markup?: MarkupKind[];
  deterministic?: boolean;
  limits?: ProviderLimits;
  /** Errors returned for a phrase id, one per call, before it succeeds */
  failures?: Record<string, PhraseError[]>;
  /** Phrase ids that come back as undecodable bytes */
  corrupt?: string[];
  /** Phrase ids whose synthesize() throws */
  throws?: string[];
  listError?: Error;
  delayMs?: number;
  /** Per-phrase delay, overrides delayMs */
  delays?: Record<string, number>;
}

export const FAKE_SAMPLE_RATE = 22050;

/**
 * In-process provider producing a short tone per phrase
 */
export class FakeTTSProvider implements ITTSProvider {
  readonly name: string;
  readonly markup: readonly MarkupKind[];
  readonly outputEncoding: AudioEncoding = {
    container: 'wav',
    sampleRate: FAKE_SAMPLE_RATE,
    channels: 1,
    bitDepth: 16
  };
  readonly limits: ProviderLimits;

  readonly calls: string[] = [];
  disposed = false;
  inFlight = 0;
  maxInFlight = 0;

  private readonly voices: VoiceModel[];
  private readonly failures: Map<string, PhraseError[]>;

  constructor(private opts: FakeProviderOptions = {}) {
    this.name = opts.name ?? 'fake';
    this.markup = opts.markup ?? ['plaintext'];
    this.limits = opts.limits ?? { concurrency: 4, minDelayMs: 0 };
    this.voices = opts.voices ?? [
      createVoiceModel({ provider: this.name, voice: 'test-voice', language: 'en_GB', parameters: { quality: 'low' } })
    ];
    this.failures = new Map(Object.entries(opts.failures ?? {}).map(([id, errors]) => [id, [...errors]]));
  }

  async listVoices(): Promise<VoiceModel[]> {
    if (this.opts.listError) throw this.opts.listError;
    return this.voices;
  }

  async synthesize(phrase: Phrase, voice: VoiceModel): Promise<SynthesisResult> {
    const rejected = checkRequest(this, phrase, voice);
    if (rejected) return rejected;

    this.calls.push(phrase.id);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      const delayMs = this.opts.delays?.[phrase.id] ?? this.opts.delayMs;
      if (delayMs) {
        await new Promise((resolve) => setTimeout(resolve, delayMs));
      }
      if (this.opts.throws?.includes(phrase.id)) {
        throw new Error(`engine crashed on ${phrase.id}`);
      }
      const queued = this.failures.get(phrase.id)?.shift();
      if (queued) return failure(queued);
      if (this.opts.corrupt?.includes(phrase.id)) {
        return success(Buffer.from('not audio at all'), this.outputEncoding);
      }

      // pitch follows the text so phrases differ
      const frequency = 200 + phrase.text.length * 10;
      return success(toneWav(this.outputEncoding, 250, frequency, 0.3), this.outputEncoding);
    } finally {
      this.inFlight--;
    }
  }

  isDeterministic(): boolean {
    return this.opts.deterministic ?? true;
  }

  async dispose(): Promise<void> {
    this.disposed = true;
  }
}
