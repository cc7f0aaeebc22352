import type { PhraseError } from '../errors';
import type { AudioEncoding } from './Audio';

export type SynthesisSuccess = {
  ok: true;
  audio: Buffer;
  encoding: AudioEncoding;
};

export type SynthesisFailure = {
  ok: false;
  error: PhraseError;
};

/**
 * Outcome of one synthesize() call. Lives only for the duration of a build.
 */
export type SynthesisResult = SynthesisSuccess | SynthesisFailure;

export function success(audio: Buffer, encoding: AudioEncoding): SynthesisSuccess {
  return { ok: true, audio, encoding };
}

export function failure(error: PhraseError): SynthesisFailure {
  return { ok: false, error };
}
