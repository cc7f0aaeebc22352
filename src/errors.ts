/**
 * Error taxonomy
 *
 * Build-level errors (BuildAbortedError, BuildCancelledError) end a build.
 * Phrase-level errors (PhraseError subclasses) are recorded in the BuildReport
 * and never interrupt the rest of the batch.
 */

export type FailureKind =
  | 'provider_unavailable'
  | 'throttled'
  | 'unsupported_markup'
  | 'synthesis_failed'
  | 'audio_decode'
  | 'write_failed';

export abstract class PhraseError extends Error {
  abstract readonly kind: FailureKind;
  readonly retryable: boolean;

  constructor(message: string, retryable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.retryable = retryable;
  }
}

export class ProviderUnavailableError extends PhraseError {
  readonly kind = 'provider_unavailable';

  constructor(provider: string, detail: string, options?: { retryable?: boolean; cause?: unknown }) {
    super(`${provider} is unavailable: ${detail}`, options?.retryable ?? true, options);
    this.name = 'ProviderUnavailableError';
  }
}

export class ThrottledError extends PhraseError {
  readonly kind = 'throttled';
  readonly retryAfterMs: number | undefined;

  constructor(provider: string, retryAfterMs?: number, options?: { cause?: unknown }) {
    super(`${provider} throttled the request`, true, options);
    this.name = 'ThrottledError';
    this.retryAfterMs = retryAfterMs;
  }
}

export class UnsupportedMarkupError extends PhraseError {
  readonly kind = 'unsupported_markup';

  constructor(provider: string, markup: string, supported: readonly string[]) {
    super(`${provider} does not accept ${markup} input (accepts: ${supported.join(', ')})`, false);
    this.name = 'UnsupportedMarkupError';
  }
}

export class SynthesisFailedError extends PhraseError {
  readonly kind = 'synthesis_failed';

  constructor(message: string, options?: { retryable?: boolean; cause?: unknown }) {
    super(message, options?.retryable ?? false, options);
    this.name = 'SynthesisFailedError';
  }
}

export class AudioDecodeError extends PhraseError {
  readonly kind = 'audio_decode';

  constructor(message: string) {
    super(message, false);
    this.name = 'AudioDecodeError';
  }
}

export class OutputWriteError extends PhraseError {
  readonly kind = 'write_failed';

  constructor(filePath: string, options?: { cause?: unknown }) {
    super(`Could not write ${filePath}: ${errorMessage(options?.cause)}`, false, options);
    this.name = 'OutputWriteError';
  }
}

export class VoiceCatalogError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'VoiceCatalogError';
  }
}

export class VoicepackConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'VoicepackConfigError';
    this.issues = issues;
  }
}

export class BuildAbortedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BuildAbortedError';
  }
}

export class BuildCancelledError extends Error {
  constructor() {
    super('Build was cancelled');
    this.name = 'BuildCancelledError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return error === undefined ? 'unknown error' : String(error);
}
