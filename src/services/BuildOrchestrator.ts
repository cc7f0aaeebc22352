/**
 * Build Orchestrator
 *
 * Turns a VoicepackConfig into a directory of firmware-ready WAV files:
 * Pending -> Resolving -> Synthesizing -> Converting -> Writing -> Finalizing
 * -> Completed | CompletedWithFailures.
 *
 * A phrase that fails at any stage is recorded in the report and the rest of
 * the batch carries on. Only problems that make the whole build meaningless
 * (invalid config, unknown provider or voice, voice settings the provider
 * rejects, locked output) abort it.
 *
 * Events:
 * - 'state' (BuildState)
 * - 'phrase' (PhraseEvent)
 */

import { EventEmitter } from 'events';
import path from 'path';
import { AudioProcessor } from '../audio/AudioProcessor';
import { CHECKSUM_MANIFEST, SOUNDS_DIR, SOUND_FILE_EXTENSION } from '../config/constants';
import { env } from '../config/env';
import {
  BuildAbortedError,
  BuildCancelledError,
  OutputWriteError,
  PhraseError,
  SynthesisFailedError,
  errorMessage
} from '../errors';
import { BuildState, compareIds, sortedRecord } from '../models/BuildReport';
import type { BuildReport, BuildStatus, FinalizeFailure, PhraseFailure } from '../models/BuildReport';
import type { Phrase } from '../models/Phrase';
import { failure } from '../models/SynthesisResult';
import type { SynthesisResult, SynthesisSuccess } from '../models/SynthesisResult';
import { primaryLanguage, withParameters } from '../models/VoiceModel';
import type { VoiceModel } from '../models/VoiceModel';
import { targetFormat, validateVoicepackConfig } from '../models/VoicepackConfig';
import type { VoicepackConfig, VoicepackConfigInput } from '../models/VoicepackConfig';
import type { ITTSProvider } from '../providers/ITTSProvider';
import type { ProviderRegistry } from '../providers/ProviderRegistry';
import { createLogger } from '../utils/logger';
import { ArchiveService } from './ArchiveService';
import { ChecksumService, sha256 } from './ChecksumService';
import { ConcurrencyLimiter } from './ConcurrencyLimiter';
import { lockDirectory, writeFileAtomic } from './OutputWriter';
import { retrySynthesis } from './retry';
import { cacheFingerprint } from './SynthesisCache';
import type { SynthesisCache } from './SynthesisCache';

const logger = createLogger({ service: 'BuildOrchestrator' });

export interface BuildOptions {
  outputDir: string;
  /** Synthesize and convert without touching the disk */
  dryRun?: boolean;
  /** Upper bound on synthesize() calls in flight; the provider's own limit also applies */
  concurrency?: number;
  maxRetries?: number;
  retryBaseMs?: number;
  signal?: AbortSignal;
}

export interface BuildOrchestratorDeps {
  registry: ProviderRegistry;
  audio?: AudioProcessor;
  cache?: SynthesisCache | null;
  checksums?: ChecksumService;
  archive?: ArchiveService;
}

export interface PhraseEvent {
  id: string;
  ok: boolean;
  cached: boolean;
  attempts: number;
  failure?: PhraseFailure;
}

type Synthesized =
  | { source: 'provider'; result: SynthesisSuccess; fingerprint: string; attempts: number }
  | { source: 'cache'; wav: Buffer };

interface Converted {
  wav: Buffer;
  cached: boolean;
  attempts: number;
}

interface BuildContext {
  config: VoicepackConfig;
  provider: ITTSProvider;
  voice: VoiceModel;
  options: BuildOptions;
  failed: Map<string, PhraseFailure>;
}

export class BuildOrchestrator extends EventEmitter {
  private readonly registry: ProviderRegistry;
  private readonly audio: AudioProcessor;
  private readonly cache: SynthesisCache | null;
  private readonly checksums: ChecksumService;
  private readonly archive: ArchiveService;
  private state: BuildState = BuildState.PENDING;

  constructor(deps: BuildOrchestratorDeps) {
    super();
    this.registry = deps.registry;
    this.audio = deps.audio ?? new AudioProcessor();
    this.cache = deps.cache ?? null;
    this.checksums = deps.checksums ?? new ChecksumService();
    this.archive = deps.archive ?? new ArchiveService();
  }

  get currentState(): BuildState {
    return this.state;
  }

  /**
   * Run one build
   * @throws BuildAbortedError | BuildCancelledError
   */
  async build(input: VoicepackConfig | VoicepackConfigInput, options: BuildOptions): Promise<BuildReport> {
    const started = Date.now();
    const dryRun = options.dryRun ?? false;
    const failed = new Map<string, PhraseFailure>();
    let provider: ITTSProvider | null = null;
    let release: (() => Promise<void>) | null = null;

    this.setState(BuildState.PENDING);

    try {
      this.setState(BuildState.RESOLVING);
      const config = this.resolveConfig(input);
      provider = this.resolveProvider(config);
      const voice = await this.resolveVoice(provider, config.voice);
      const packDir = path.resolve(options.outputDir, config.packname);
      if (!dryRun) {
        release = await this.lock(packDir);
      }
      throwIfAborted(options.signal);

      const ctx: BuildContext = { config, provider, voice, options, failed };
      logger.info(
        { name: config.name, provider: provider.name, voice: voice.voice, phrases: config.phrases.length, dryRun },
        'Build started'
      );

      this.setState(BuildState.SYNTHESIZING);
      const synthesized = await this.synthesizeAll(ctx);
      throwIfAborted(options.signal);

      this.setState(BuildState.CONVERTING);
      const converted = await this.convertAll(ctx, synthesized);
      throwIfAborted(options.signal);

      const files = new Map<string, string>();
      const finalizeFailures: FinalizeFailure[] = [];
      let checksum: string | null = null;
      let archivePath: string | null = null;

      if (dryRun) {
        for (const [id, item] of converted) {
          this.emitPhrase({ id, ok: true, cached: item.cached, attempts: item.attempts });
        }
      } else {
        this.setState(BuildState.WRITING);
        await this.writeAll(ctx, packDir, converted, files);

        this.setState(BuildState.FINALIZING);
        const written = sortedRecord(files);
        const archived = Object.keys(written);
        if (config.output.checksum) {
          try {
            checksum = (await this.checksums.writeManifest(packDir, written)).checksum;
            archived.push(CHECKSUM_MANIFEST);
          } catch (error) {
            finalizeFailures.push({ stage: 'checksum', message: errorMessage(error) });
            logger.error({ error: errorMessage(error) }, 'Checksum manifest failed');
          }
        }
        if (config.output.zip) {
          const target = path.resolve(options.outputDir, `${config.packname}.zip`);
          try {
            await this.archive.createArchive(packDir, archived, target);
            archivePath = target;
          } catch (error) {
            finalizeFailures.push({ stage: 'archive', message: errorMessage(error) });
            logger.error({ error: errorMessage(error) }, 'Archive failed');
          }
        }
      }

      const status: BuildStatus =
        failed.size === 0 && finalizeFailures.length === 0 ? BuildState.COMPLETED : BuildState.COMPLETED_WITH_FAILURES;
      const succeeded = config.phrases
        .map((phrase) => phrase.id)
        .filter((id) => !failed.has(id))
        .sort(compareIds);

      const report: BuildReport = Object.freeze({
        name: config.name,
        status,
        dryRun,
        succeeded: Object.freeze(succeeded),
        failed: Object.freeze(sortedRecord(failed)),
        finalizeFailures: Object.freeze(finalizeFailures),
        outputPath: dryRun ? null : packDir,
        files: Object.freeze(sortedRecord(files)),
        checksum,
        archivePath,
        deterministic: provider.isDeterministic(voice),
        cacheHits: Array.from(converted.values()).filter((item) => item.cached).length,
        durationMs: Date.now() - started
      });

      this.setState(status);
      logger.info(
        { name: config.name, status, succeeded: succeeded.length, failed: failed.size, durationMs: report.durationMs },
        'Build finished'
      );
      return report;
    } finally {
      await this.cleanup(provider, release);
    }
  }

  private resolveConfig(input: VoicepackConfig | VoicepackConfigInput): VoicepackConfig {
    const result = validateVoicepackConfig(input);
    if (!result.ok) {
      throw new BuildAbortedError(`Invalid voicepack configuration:\n  - ${result.issues.join('\n  - ')}`);
    }
    return result.config;
  }

  private resolveProvider(config: VoicepackConfig): ITTSProvider {
    try {
      return this.registry.get(config.voice.provider);
    } catch (error) {
      throw new BuildAbortedError(errorMessage(error), { cause: error });
    }
  }

  /**
   * Find the configured voice in the provider's catalog. The catalog entry's
   * parameters are the base; configured parameters and language win.
   */
  private async resolveVoice(provider: ITTSProvider, wanted: VoiceModel): Promise<VoiceModel> {
    let catalog: VoiceModel[];
    try {
      catalog = await provider.listVoices();
    } catch (error) {
      throw new BuildAbortedError(`Cannot list ${provider.name} voices: ${errorMessage(error)}`, { cause: error });
    }

    const match =
      catalog.find((voice) => voice.voice === wanted.voice) ??
      catalog.find((voice) => voice.voice.toLowerCase() === wanted.voice.toLowerCase());
    if (!match) {
      throw new BuildAbortedError(`Voice '${wanted.voice}' is not offered by ${provider.name}`);
    }

    const resolved = withParameters(
      { provider: match.provider, voice: match.voice, language: wanted.language, parameters: match.parameters },
      wanted.parameters
    );
    const problem = provider.validateVoice?.(resolved) ?? null;
    if (problem) {
      throw new BuildAbortedError(`Voice '${resolved.voice}' cannot be used: ${problem}`);
    }
    logger.debug({ voice: resolved }, 'Resolved voice');
    return resolved;
  }

  private async lock(packDir: string): Promise<() => Promise<void>> {
    try {
      return await lockDirectory(packDir);
    } catch (error) {
      throw new BuildAbortedError(`Cannot lock ${packDir}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async synthesizeAll(ctx: BuildContext): Promise<Map<string, Synthesized>> {
    const { provider, options } = ctx;
    const limiter = new ConcurrencyLimiter(
      Math.max(1, Math.min(options.concurrency ?? env.BUILD_CONCURRENCY, provider.limits.concurrency)),
      provider.limits.minDelayMs
    );
    const results = new Map<string, Synthesized>();

    await Promise.all(
      ctx.config.phrases.map(async (phrase) => {
        const item = await this.synthesizeOne(ctx, limiter, phrase);
        if (item) results.set(phrase.id, item);
      })
    );

    return results;
  }

  private async synthesizeOne(
    ctx: BuildContext,
    limiter: ConcurrencyLimiter,
    phrase: Phrase
  ): Promise<Synthesized | null> {
    const { provider, voice, options, config } = ctx;
    const fingerprint = cacheFingerprint({
      phrase,
      voice,
      format: targetFormat(config.output),
      normalize: config.output.normalize
    });

    const cached = await this.readCache(fingerprint);
    if (cached) {
      logger.debug({ phrase: phrase.id }, 'Cache hit');
      return { source: 'cache', wav: cached };
    }

    const { result, attempts } = await retrySynthesis(
      () => limiter.schedule(() => this.dispatch(provider, phrase, voice, options.signal)),
      {
        maxRetries: options.maxRetries ?? env.BUILD_MAX_RETRIES,
        baseDelayMs: options.retryBaseMs ?? env.BUILD_RETRY_BASE_MS,
        signal: options.signal,
        onRetry: (attempt, delayMs, failed) => {
          logger.warn(
            { phrase: phrase.id, attempt, delayMs, error: failed.ok ? undefined : failed.error.message },
            'Retrying phrase'
          );
        }
      }
    );

    if (!result.ok) {
      if (!options.signal?.aborted) {
        this.recordFailure(ctx, phrase.id, result.error, attempts);
      }
      return null;
    }
    return { source: 'provider', result, fingerprint, attempts };
  }

  /**
   * One provider call; a thrown error is turned into a failed result
   */
  private async dispatch(
    provider: ITTSProvider,
    phrase: Phrase,
    voice: VoiceModel,
    signal: AbortSignal | undefined
  ): Promise<SynthesisResult> {
    if (signal?.aborted) {
      return failure(new SynthesisFailedError('Build was cancelled'));
    }
    try {
      return await provider.synthesize(phrase, voice);
    } catch (error) {
      if (error instanceof PhraseError) return failure(error);
      return failure(new SynthesisFailedError(`${provider.name} threw: ${errorMessage(error)}`, { cause: error }));
    }
  }

  private async convertAll(ctx: BuildContext, synthesized: Map<string, Synthesized>): Promise<Map<string, Converted>> {
    const { config, options } = ctx;
    const target = targetFormat(config.output);
    const converted = new Map<string, Converted>();

    for (const phrase of config.phrases) {
      const item = synthesized.get(phrase.id);
      if (!item) continue;

      if (item.source === 'cache') {
        converted.set(phrase.id, { wav: item.wav, cached: true, attempts: 0 });
        continue;
      }

      let wav: Buffer;
      try {
        wav = this.audio.convert(item.result.audio, item.result.encoding, target);
        if (config.output.normalize) {
          wav = this.audio.normalize(wav);
        }
      } catch (error) {
        this.recordFailure(ctx, phrase.id, error, item.attempts);
        continue;
      }

      converted.set(phrase.id, { wav, cached: false, attempts: item.attempts });
      if (!options.dryRun) {
        await this.writeCache(item.fingerprint, wav);
      }
    }

    return converted;
  }

  private async writeAll(
    ctx: BuildContext,
    packDir: string,
    converted: Map<string, Converted>,
    files: Map<string, string>
  ): Promise<void> {
    const languageDir = ctx.config.output.languageDir ?? primaryLanguage(ctx.voice.language);

    for (const id of Array.from(converted.keys()).sort(compareIds)) {
      throwIfAborted(ctx.options.signal);
      const item = converted.get(id);
      if (!item) continue;

      const relPath = `${SOUNDS_DIR}/${languageDir}/${id}${SOUND_FILE_EXTENSION}`;
      const filePath = path.join(packDir, ...relPath.split('/'));
      try {
        await writeFileAtomic(filePath, item.wav);
      } catch (error) {
        this.recordFailure(ctx, id, new OutputWriteError(filePath, { cause: error }), item.attempts);
        continue;
      }

      files.set(relPath, sha256(item.wav));
      this.emitPhrase({ id, ok: true, cached: item.cached, attempts: item.attempts });
    }
  }

  private recordFailure(ctx: BuildContext, id: string, error: unknown, attempts: number): void {
    const entry: PhraseFailure =
      error instanceof PhraseError
        ? { kind: error.kind, message: error.message, attempts }
        : { kind: 'synthesis_failed', message: errorMessage(error), attempts };
    ctx.failed.set(id, entry);
    logger.warn({ phrase: id, kind: entry.kind, attempts, error: entry.message }, 'Phrase failed');
    this.emitPhrase({ id, ok: false, cached: false, attempts, failure: entry });
  }

  private async readCache(fingerprint: string): Promise<Buffer | null> {
    if (!this.cache) return null;
    try {
      return await this.cache.get(fingerprint);
    } catch (error) {
      logger.warn({ fingerprint, error: errorMessage(error) }, 'Cache read failed, synthesizing');
      return null;
    }
  }

  private async writeCache(fingerprint: string, wav: Buffer): Promise<void> {
    if (!this.cache) return;
    try {
      await this.cache.put(fingerprint, wav);
    } catch (error) {
      logger.warn({ fingerprint, error: errorMessage(error) }, 'Cache write failed');
    }
  }

  private async cleanup(provider: ITTSProvider | null, release: (() => Promise<void>) | null): Promise<void> {
    if (provider?.dispose) {
      try {
        await provider.dispose();
      } catch (error) {
        logger.warn({ provider: provider.name, error: errorMessage(error) }, 'Provider dispose failed');
      }
    }
    if (release) {
      try {
        await release();
      } catch (error) {
        logger.warn({ error: errorMessage(error) }, 'Output lock release failed');
      }
    }
  }

  private setState(state: BuildState): void {
    this.state = state;
    logger.debug({ state }, 'Build state');
    this.emit('state', state);
  }

  private emitPhrase(event: PhraseEvent): void {
    this.emit('phrase', event);
  }
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new BuildCancelledError();
  }
}
