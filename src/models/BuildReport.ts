import type { FailureKind } from '../errors';

export enum BuildState {
  PENDING = 'pending',
  RESOLVING = 'resolving',
  SYNTHESIZING = 'synthesizing',
  CONVERTING = 'converting',
  WRITING = 'writing',
  FINALIZING = 'finalizing',
  COMPLETED = 'completed',
  COMPLETED_WITH_FAILURES = 'completed_with_failures'
}

export type BuildStatus = BuildState.COMPLETED | BuildState.COMPLETED_WITH_FAILURES;

export interface PhraseFailure {
  kind: FailureKind;
  message: string;
  attempts: number;
}

export interface FinalizeFailure {
  stage: 'checksum' | 'archive';
  message: string;
}

export interface BuildReport {
  readonly name: string;
  readonly status: BuildStatus;
  readonly dryRun: boolean;
  /** Phrase ids, sorted */
  readonly succeeded: readonly string[];
  /** Keyed by phrase id, keys sorted */
  readonly failed: Readonly<Record<string, PhraseFailure>>;
  readonly finalizeFailures: readonly FinalizeFailure[];
  /** Pack directory, null for dry runs */
  readonly outputPath: string | null;
  /** sha256 per written file, keyed by path relative to outputPath */
  readonly files: Readonly<Record<string, string>>;
  /** sha256 of the checksum manifest */
  readonly checksum: string | null;
  readonly archivePath: string | null;
  /** Whether identical input is expected to reproduce identical checksums */
  readonly deterministic: boolean;
  readonly cacheHits: number;
  readonly durationMs: number;
}

export function sortedRecord<T>(entries: Iterable<[string, T]>): Record<string, T> {
  const record: Record<string, T> = {};
  for (const [key, value] of [...entries].sort(([a], [b]) => compareIds(a, b))) {
    record[key] = value;
  }
  return record;
}

export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
