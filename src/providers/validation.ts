import { SynthesisFailedError, UnsupportedMarkupError } from '../errors';
import type { Phrase } from '../models/Phrase';
import { failure } from '../models/SynthesisResult';
import type { SynthesisFailure } from '../models/SynthesisResult';
import type { VoiceModel } from '../models/VoiceModel';
import type { ITTSProvider } from './ITTSProvider';

/**
 * Checks shared by every provider before it dispatches a request
 *
 * @returns a failure to hand back to the caller, or null if the request may proceed
 */
export function checkRequest(
  provider: Pick<ITTSProvider, 'name' | 'markup'>,
  phrase: Phrase,
  voice: VoiceModel
): SynthesisFailure | null {
  if (phrase.text.trim().length === 0) {
    return failure(new SynthesisFailedError('Text must be a non-empty string'));
  }
  if (voice.provider !== provider.name) {
    return failure(
      new SynthesisFailedError(
        `Voice '${voice.voice}' belongs to provider '${voice.provider}', expected '${provider.name}'`
      )
    );
  }
  if (!provider.markup.includes(phrase.markup)) {
    return failure(new UnsupportedMarkupError(provider.name, phrase.markup, provider.markup));
  }
  return null;
}
