/**
 * Text-to-Speech Provider Interface
 *
 * Every backend (local model, cloud API) implements the same two operations,
 * plus a declaration of what it accepts and returns.
 */

import type { AudioEncoding } from '../models/Audio';
import type { MarkupKind, Phrase } from '../models/Phrase';
import type { SynthesisResult } from '../models/SynthesisResult';
import type { VoiceModel } from '../models/VoiceModel';

export interface ProviderLimits {
  /** Maximum number of synthesize() calls in flight */
  concurrency: number;
  /** Minimum spacing between the start of two calls */
  minDelayMs: number;
}

export interface ITTSProvider {
  /**
   * Provider id, matches VoiceModel.provider
   */
  readonly name: string;

  /**
   * Input kinds synthesize() accepts
   */
  readonly markup: readonly MarkupKind[];

  /**
   * Encoding of the audio synthesize() returns
   */
  readonly outputEncoding: AudioEncoding;

  readonly limits: ProviderLimits;

  /**
   * Enumerate the voices this backend can synthesize with
   * @throws ProviderUnavailableError | VoiceCatalogError
   */
  listVoices(): Promise<VoiceModel[]>;

  /**
   * Synthesize one phrase. Expected failures (markup mismatch, throttling,
   * remote rejections) are returned, not thrown.
   */
  synthesize(phrase: Phrase, voice: VoiceModel): Promise<SynthesisResult>;

  /**
   * Check a resolved voice's parameters against the catalog before any
   * phrase is dispatched. Call after listVoices().
   *
   * @returns the problem, or null if the voice can be used
   */
  validateVoice?(voice: VoiceModel): string | null;

  /**
   * Whether identical input is expected to produce identical bytes
   */
  isDeterministic(voice: VoiceModel): boolean;

  /**
   * Release resources held for the build (loaded models, child processes)
   */
  dispose?(): Promise<void>;
}
