#!/usr/bin/env node
/**
 * voicepack CLI
 *
 * @example
 * ```bash
 * # Build the pack described by a YAML file into ./dist-packs
 * voicepack build packs/en_gb.yml -o dist-packs --zip
 *
 * # Build a community CSV sheet with a Piper voice
 * voicepack build en.csv --provider piper --voice en_GB-alba-medium --language en_GB --name "English Alba"
 *
 * # List the voices a provider offers
 * voicepack voices polly --language en_GB
 *
 * # Install a published Piper voice into PIPER_VOICES_DIR
 * voicepack download en_GB-alba-medium
 * ```
 */

import fs from 'fs';
import path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { z } from 'zod';
import { env } from './config/env';
import { BuildAbortedError, BuildCancelledError, VoicepackConfigError, errorMessage } from './errors';
import { BuildState } from './models/BuildReport';
import type { BuildReport } from './models/BuildReport';
import { underscoreLanguage } from './models/VoiceModel';
import { createProviderRegistry } from './providers/ProviderFactory';
import { PiperVoiceDownloader } from './providers/tts/PiperVoiceDownloader';
import { BuildOrchestrator } from './services/BuildOrchestrator';
import type { PhraseEvent } from './services/BuildOrchestrator';
import { SynthesisCache } from './services/SynthesisCache';
import { VoicepackLoader } from './services/VoicepackLoader';
import type { LoaderOverrides } from './services/VoicepackLoader';

export const EXIT_OK = 0;
export const EXIT_ABORTED = 1;
export const EXIT_PARTIAL = 2;

interface BuildCommandOptions {
  output: string;
  dryRun?: boolean;
  zip?: boolean;
  checksum: boolean;
  normalize: boolean;
  concurrency?: number;
  provider?: string;
  voice?: string;
  language?: string;
  name?: string;
}

interface VoicesCommandOptions {
  language?: string;
}

interface DownloadCommandOptions {
  force?: boolean;
  list?: boolean;
}

function readVersion(): string {
  const pkg = z.object({ version: z.string() }).safeParse(
    JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf-8'))
  );
  return pkg.success ? pkg.data.version : '0.0.0';
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return parsed;
}

export function buildOverrides(opts: BuildCommandOptions): LoaderOverrides {
  const overrides: LoaderOverrides = {
    name: opts.name,
    output: {
      zip: opts.zip ? true : undefined,
      checksum: opts.checksum ? undefined : false,
      normalize: opts.normalize ? undefined : false
    }
  };

  const voiceFlags = [opts.provider, opts.voice, opts.language].filter((v) => v !== undefined);
  if (voiceFlags.length > 0) {
    if (!opts.provider || !opts.voice || !opts.language) {
      throw new InvalidArgumentError('--provider, --voice and --language must be given together');
    }
    overrides.voice = { provider: opts.provider, voice: opts.voice, language: opts.language };
  }
  return overrides;
}

export function formatReport(report: BuildReport): string {
  const lines = [
    `${report.name}: ${report.status}${report.dryRun ? ' (dry run)' : ''}`,
    `  succeeded: ${report.succeeded.length}`,
    `  failed:    ${Object.keys(report.failed).length}`
  ];
  for (const [id, failure] of Object.entries(report.failed)) {
    lines.push(`    ${id}: [${failure.kind}] ${failure.message}`);
  }
  for (const failure of report.finalizeFailures) {
    lines.push(`  ${failure.stage} failed: ${failure.message}`);
  }
  if (report.cacheHits > 0) lines.push(`  cache hits: ${report.cacheHits}`);
  if (report.outputPath) lines.push(`  output:   ${report.outputPath}`);
  if (report.archivePath) lines.push(`  archive:  ${report.archivePath}`);
  if (report.checksum) {
    lines.push(`  checksum: ${report.checksum}${report.deterministic ? '' : ' (provider output may vary between runs)'}`);
  }
  lines.push(`  took ${(report.durationMs / 1000).toFixed(1)}s`);
  return lines.join('\n');
}

async function runBuild(file: string, opts: BuildCommandOptions): Promise<number> {
  const config = await new VoicepackLoader().load(file, buildOverrides(opts));
  const registry = createProviderRegistry();
  const orchestrator = new BuildOrchestrator({
    registry,
    cache: env.CACHE_ENABLED ? new SynthesisCache(env.CACHE_DIR) : null
  });

  const controller = new AbortController();
  const onSigint = () => {
    console.error('\nCancelling build...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  let done = 0;
  const total = config.phrases.length;
  orchestrator.on('state', (state: BuildState) => {
    console.error(`[${state}]`);
  });
  orchestrator.on('phrase', (event: PhraseEvent) => {
    done++;
    const mark = event.ok ? (event.cached ? 'cached' : 'ok') : `FAILED ${event.failure?.kind ?? ''}`;
    console.error(`  (${done}/${total}) ${event.id} ${mark}`);
  });

  try {
    const report = await orchestrator.build(config, {
      outputDir: opts.output,
      dryRun: opts.dryRun,
      concurrency: opts.concurrency,
      signal: controller.signal
    });
    console.log(formatReport(report));
    return report.status === BuildState.COMPLETED ? EXIT_OK : EXIT_PARTIAL;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

async function runVoices(provider: string, opts: VoicesCommandOptions): Promise<number> {
  const registry = createProviderRegistry();
  try {
    const wanted = opts.language ? underscoreLanguage(opts.language).toLowerCase() : null;
    const voices = (await registry.get(provider).listVoices()).filter(
      (voice) => !wanted || underscoreLanguage(voice.language).toLowerCase() === wanted
    );
    for (const voice of voices) {
      const params = Object.entries(voice.parameters)
        .map(([k, v]) => `${k}=${String(v)}`)
        .join(' ');
      console.log(`${voice.voice.padEnd(32)} ${voice.language.padEnd(8)} ${params}`);
    }
    return EXIT_OK;
  } finally {
    await registry.disposeAll();
  }
}

async function runDownload(voice: string | undefined, opts: DownloadCommandOptions): Promise<number> {
  const downloader = new PiperVoiceDownloader({ voicesDir: env.PIPER_VOICES_DIR, baseUrl: env.PIPER_VOICES_URL });
  if (opts.list || !voice) {
    for (const key of await downloader.listAvailable()) {
      console.log(key);
    }
    return EXIT_OK;
  }
  const result = await downloader.download(voice, { force: opts.force });
  console.log(`${voice}: ${result.skipped ? 'already installed' : 'installed'} in ${env.PIPER_VOICES_DIR}`);
  return EXIT_OK;
}

function report(error: unknown): number {
  if (error instanceof BuildCancelledError) {
    console.error(error.message);
  } else if (error instanceof VoicepackConfigError || error instanceof BuildAbortedError) {
    console.error(`Build aborted: ${error.message}`);
  } else {
    console.error(`Error: ${errorMessage(error)}`);
  }
  return EXIT_ABORTED;
}

export function createProgram(): Command {
  const program = new Command();

  program.name('voicepack').description('Build EdgeTX/OpenTX voice packs from text').version(readVersion());

  program
    .command('build')
    .description('Synthesize a voicepack from a YAML, JSON or CSV definition')
    .argument('<file>', 'voicepack definition (.yml, .yaml, .json or .csv)')
    .option('-o, --output <dir>', 'output directory', 'output')
    .option('--dry-run', 'synthesize and convert without writing files')
    .option('--zip', 'also write <packname>.zip')
    .option('--no-checksum', 'skip the checksum manifest')
    .option('--no-normalize', 'skip loudness normalization')
    .option('-c, --concurrency <n>', 'maximum synthesis calls in flight', parsePositiveInt)
    .option('--provider <name>', 'TTS provider (required for CSV)')
    .option('--voice <id>', 'voice id (required for CSV)')
    .option('--language <code>', 'voice language, e.g. en_GB (required for CSV)')
    .option('--name <name>', 'pack name')
    .action(async (file: string, opts: BuildCommandOptions) => {
      try {
        process.exitCode = await runBuild(file, opts);
      } catch (error) {
        process.exitCode = report(error);
      }
    });

  program
    .command('voices')
    .description('List the voices a provider offers')
    .argument('<provider>', 'provider name (piper, polly, openai)')
    .option('--language <code>', 'only voices for this language, e.g. de_DE')
    .action(async (provider: string, opts: VoicesCommandOptions) => {
      try {
        process.exitCode = await runVoices(provider, opts);
      } catch (error) {
        process.exitCode = report(error);
      }
    });

  program
    .command('download')
    .description('Install a published Piper voice, or list the installable ones')
    .argument('[voice]', 'voice key, e.g. en_GB-alba-medium')
    .option('--force', 'download even if the voice is installed')
    .option('--list', 'list the installable voices')
    .action(async (voice: string | undefined, opts: DownloadCommandOptions) => {
      try {
        process.exitCode = await runDownload(voice, opts);
      } catch (error) {
        process.exitCode = report(error);
      }
    });

  program
    .command('version')
    .description('Print the version')
    .action(() => {
      console.log(readVersion());
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      process.exitCode = report(error);
    });
}
