import AdmZip from 'adm-zip';
import { createHash } from 'crypto';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { BuildAbortedError, BuildCancelledError, SynthesisFailedError, ThrottledError } from '../errors';
import { BuildState } from '../models/BuildReport';
import type { VoicepackConfigInput } from '../models/VoicepackConfig';
import { ProviderRegistry } from '../providers/ProviderRegistry';
import { PollyTTSProvider } from '../providers/tts/PollyTTSProvider';
import type { PollyGateway, PollySpeechRequest, PollyVoiceInfo } from '../providers/tts/PollyTTSProvider';
import { BuildOrchestrator } from '../services/BuildOrchestrator';
import type { PhraseEvent } from '../services/BuildOrchestrator';
import { SynthesisCache } from '../services/SynthesisCache';
import { FakeTTSProvider } from './helpers/FakeTTSProvider';
import type { FakeProviderOptions } from './helpers/FakeTTSProvider';
import { readHeader } from './helpers/audio';

const pack: VoicepackConfigInput = {
  name: 'Test Pack',
  voice: { provider: 'fake', voice: 'test-voice', language: 'en_GB' },
  phrases: [
    { id: 'batt_low', text: 'Battery low' },
    { id: 'armed', text: 'Armed' }
  ]
};

function sha256(data: Buffer | string): string {
  return createHash('sha256').update(data).digest('hex');
}

class StubPollyGateway implements PollyGateway {
  readonly requests: PollySpeechRequest[] = [];

  async describeVoices(): Promise<PollyVoiceInfo[]> {
    return [{ id: 'Amy', languageCode: 'en-GB', engines: ['neural', 'standard'] }];
  }

  async synthesizeSpeech(request: PollySpeechRequest): Promise<Uint8Array> {
    this.requests.push(request);
    return new Uint8Array([0, 0, 0, 0]);
  }
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

describe('BuildOrchestrator', () => {
  let outputDir: string;
  let provider: FakeTTSProvider;
  let orchestrator: BuildOrchestrator;

  function setup(options: FakeProviderOptions = {}, cache: SynthesisCache | null = null): void {
    provider = new FakeTTSProvider(options);
    const registry = new ProviderRegistry();
    registry.register(provider);
    orchestrator = new BuildOrchestrator({ registry, cache });
  }

  function build(config: VoicepackConfigInput = pack, dryRun = false) {
    return orchestrator.build(config, { outputDir, dryRun, maxRetries: 2, retryBaseMs: 1 });
  }

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'voicepack-build-'));
    setup();
  });

  afterEach(async () => {
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  describe('successful builds', () => {
    it('should write firmware WAVs under SOUNDS/<language>', async () => {
      const report = await build();

      const packDir = path.join(outputDir, 'Test_Pack');
      expect(report.status).toBe(BuildState.COMPLETED);
      expect(report.succeeded).toEqual(['armed', 'batt_low']);
      expect(report.failed).toEqual({});
      expect(report.outputPath).toBe(packDir);
      expect(Object.keys(report.files)).toEqual(['SOUNDS/en/armed.wav', 'SOUNDS/en/batt_low.wav']);

      for (const id of ['armed', 'batt_low']) {
        const wav = await fs.readFile(path.join(packDir, 'SOUNDS', 'en', `${id}.wav`));
        expect(readHeader(wav)).toMatchObject({ formatTag: 1, sampleRate: 16000, channels: 1, bitsPerSample: 16 });
        expect(report.files[`SOUNDS/en/${id}.wav`]).toBe(sha256(wav));
      }
    });

    it('should write a sorted checksum manifest and report its hash', async () => {
      const report = await build();

      const manifest = await fs.readFile(path.join(outputDir, 'Test_Pack', 'checksums.sha256'), 'utf-8');
      expect(manifest).toBe(
        `${report.files['SOUNDS/en/armed.wav']}  SOUNDS/en/armed.wav\n` +
          `${report.files['SOUNDS/en/batt_low.wav']}  SOUNDS/en/batt_low.wav\n`
      );
      expect(report.checksum).toBe(sha256(manifest));
      expect(report.deterministic).toBe(true);
    });

    it('should reproduce the same checksum for the same input', async () => {
      const first = await build();
      const second = await build();

      expect(second.checksum).toBe(first.checksum);
      expect(second.files).toEqual(first.files);
    });

    it('should skip the manifest when checksums are disabled', async () => {
      const report = await build({ ...pack, output: { checksum: false } });

      expect(report.checksum).toBeNull();
      expect(await exists(path.join(outputDir, 'Test_Pack', 'checksums.sha256'))).toBe(false);
      expect(Object.keys(report.files)).toHaveLength(2);
    });

    it('should honour the language directory and nested ids', async () => {
      const report = await build({
        ...pack,
        phrases: [{ id: 'SYSTEM/armed', text: 'Armed' }],
        output: { languageDir: 'gb' }
      });

      expect(Object.keys(report.files)).toEqual(['SOUNDS/gb/SYSTEM/armed.wav']);
      expect(await exists(path.join(outputDir, 'Test_Pack', 'SOUNDS', 'gb', 'SYSTEM', 'armed.wav'))).toBe(true);
    });

    it('should zip the pack with sorted entries', async () => {
      const report = await build({ ...pack, output: { zip: true } });

      expect(report.archivePath).toBe(path.join(outputDir, 'Test_Pack.zip'));
      const zip = new AdmZip(path.join(outputDir, 'Test_Pack.zip'));
      expect(zip.getEntries().map((entry) => entry.entryName)).toEqual([
        'SOUNDS/en/armed.wav',
        'SOUNDS/en/batt_low.wav',
        'checksums.sha256'
      ]);
      expect(sha256(zip.readFile('SOUNDS/en/armed.wav') ?? Buffer.alloc(0))).toBe(report.files['SOUNDS/en/armed.wav']);
    });

    it('should resolve the voice case-insensitively and merge parameters', async () => {
      const report = await build({
        ...pack,
        voice: { provider: 'fake', voice: 'TEST-VOICE', language: 'en_GB', parameters: { speed: 1.1 } }
      });

      expect(report.status).toBe(BuildState.COMPLETED);
    });

    it('should emit states in order and one event per phrase', async () => {
      const states: BuildState[] = [];
      const phrases: PhraseEvent[] = [];
      orchestrator.on('state', (state: BuildState) => states.push(state));
      orchestrator.on('phrase', (event: PhraseEvent) => phrases.push(event));

      await build();

      expect(states).toEqual([
        BuildState.PENDING,
        BuildState.RESOLVING,
        BuildState.SYNTHESIZING,
        BuildState.CONVERTING,
        BuildState.WRITING,
        BuildState.FINALIZING,
        BuildState.COMPLETED
      ]);
      expect(phrases.map((event) => [event.id, event.ok])).toEqual([
        ['armed', true],
        ['batt_low', true]
      ]);
      expect(orchestrator.currentState).toBe(BuildState.COMPLETED);
    });

    it('should release the output lock and dispose the provider', async () => {
      await build();

      expect(provider.disposed).toBe(true);
      expect(await exists(path.join(outputDir, 'Test_Pack.lock'))).toBe(false);
    });
  });

  describe('partial failures', () => {
    it('should keep going when one phrase fails', async () => {
      setup({ failures: { armed: [new SynthesisFailedError('remote rejected text')] } });

      const report = await build();

      expect(report.status).toBe(BuildState.COMPLETED_WITH_FAILURES);
      expect(report.succeeded).toEqual(['batt_low']);
      expect(report.failed).toEqual({
        armed: { kind: 'synthesis_failed', message: 'remote rejected text', attempts: 1 }
      });
      expect(await exists(path.join(outputDir, 'Test_Pack', 'SOUNDS', 'en', 'armed.wav'))).toBe(false);
      expect(Object.keys(report.files)).toEqual(['SOUNDS/en/batt_low.wav']);
    });

    it('should retry throttled requests', async () => {
      setup({ failures: { armed: [new ThrottledError('fake')] } });

      const report = await build();

      expect(report.status).toBe(BuildState.COMPLETED);
      expect(provider.calls.filter((id) => id === 'armed')).toHaveLength(2);
    });

    it('should record throttling once retries run out', async () => {
      const throttled = () => new ThrottledError('fake');
      setup({ failures: { armed: [throttled(), throttled(), throttled()] } });

      const report = await build();

      expect(report.failed).toEqual({ armed: { kind: 'throttled', message: 'fake throttled the request', attempts: 3 } });
    });

    it('should record unsupported markup for that phrase only', async () => {
      const report = await build({
        ...pack,
        phrases: [...pack.phrases, { id: 'hello', text: '<speak>Hello</speak>', markup: 'ssml' }]
      });

      expect(report.succeeded).toEqual(['armed', 'batt_low']);
      expect(report.failed).toEqual({
        hello: { kind: 'unsupported_markup', message: 'fake does not accept ssml input (accepts: plaintext)', attempts: 1 }
      });
      expect(provider.calls).not.toContain('hello');
    });

    it('should record undecodable audio', async () => {
      setup({ corrupt: ['armed'] });

      const report = await build();

      expect(report.failed).toEqual({
        armed: { kind: 'audio_decode', message: 'Invalid WAV file: missing RIFF header', attempts: 1 }
      });
    });

    it('should record a provider that throws', async () => {
      setup({ throws: ['armed'] });

      const report = await build();

      expect(report.failed).toEqual({
        armed: { kind: 'synthesis_failed', message: 'fake threw: engine crashed on armed', attempts: 1 }
      });
    });

    it('should record a file that cannot be written and keep the others', async () => {
      await fs.mkdir(path.join(outputDir, 'Test_Pack', 'SOUNDS', 'en', 'armed.wav'), { recursive: true });

      const report = await build();

      expect(report.status).toBe(BuildState.COMPLETED_WITH_FAILURES);
      expect(report.succeeded).toEqual(['batt_low']);
      expect(Object.keys(report.failed)).toEqual(['armed']);
      expect(report.failed.armed).toMatchObject({ kind: 'write_failed', attempts: 1 });
      expect(report.failed.armed.message).toContain(
        `Could not write ${path.join(outputDir, 'Test_Pack', 'SOUNDS', 'en', 'armed.wav')}: `
      );
      expect(Object.keys(report.files)).toEqual(['SOUNDS/en/batt_low.wav']);
      expect(await exists(path.join(outputDir, 'Test_Pack', 'SOUNDS', 'en', 'batt_low.wav'))).toBe(true);
      expect((await fs.readdir(path.join(outputDir, 'Test_Pack', 'SOUNDS', 'en'))).sort()).toEqual(['armed.wav', 'batt_low.wav']);
    });

    it('should report a failed checksum manifest without losing the files', async () => {
      await fs.mkdir(path.join(outputDir, 'Test_Pack', 'checksums.sha256'), { recursive: true });

      const report = await build();

      expect(report.status).toBe(BuildState.COMPLETED_WITH_FAILURES);
      expect(report.failed).toEqual({});
      expect(report.succeeded).toEqual(['armed', 'batt_low']);
      expect(report.checksum).toBeNull();
      expect(report.finalizeFailures.map((f) => f.stage)).toEqual(['checksum']);
      expect(Object.keys(report.files)).toEqual(['SOUNDS/en/armed.wav', 'SOUNDS/en/batt_low.wav']);
    });

    it('should sort failures by id whatever order they finish in', async () => {
      setup({
        failures: {
          z: [new SynthesisFailedError('z rejected')],
          a: [new SynthesisFailedError('a rejected')]
        },
        delays: { a: 30 }
      });
      const events: PhraseEvent[] = [];
      orchestrator.on('phrase', (event: PhraseEvent) => events.push(event));

      const report = await build({
        ...pack,
        phrases: [
          { id: 'z', text: 'Zed' },
          { id: 'm', text: 'Em' },
          { id: 'a', text: 'Ay' }
        ]
      });

      expect(events.filter((event) => !event.ok).map((event) => event.id)).toEqual(['z', 'a']);
      expect(Object.keys(report.failed)).toEqual(['a', 'z']);
      expect(report.succeeded).toEqual(['m']);
    });

    it('should report a failed archive without losing the files', async () => {
      await fs.mkdir(path.join(outputDir, 'Test_Pack.zip'));

      const report = await build({ ...pack, output: { zip: true } });

      expect(report.status).toBe(BuildState.COMPLETED_WITH_FAILURES);
      expect(report.failed).toEqual({});
      expect(report.succeeded).toEqual(['armed', 'batt_low']);
      expect(report.archivePath).toBeNull();
      expect(report.finalizeFailures.map((f) => f.stage)).toEqual(['archive']);
    });
  });

  describe('dry runs', () => {
    it('should synthesize everything and write nothing', async () => {
      const report = await build(pack, true);

      expect(report.dryRun).toBe(true);
      expect(report.status).toBe(BuildState.COMPLETED);
      expect(report.succeeded).toEqual(['armed', 'batt_low']);
      expect(report.outputPath).toBeNull();
      expect(report.checksum).toBeNull();
      expect(report.files).toEqual({});
      expect(await fs.readdir(outputDir)).toEqual([]);
    });

    it('should skip writing and finalizing states', async () => {
      const states: BuildState[] = [];
      orchestrator.on('state', (state: BuildState) => states.push(state));

      await build({ ...pack, output: { zip: true } }, true);

      expect(states).not.toContain(BuildState.WRITING);
      expect(states).not.toContain(BuildState.FINALIZING);
    });
  });

  describe('aborts', () => {
    it('should abort on an unknown voice', async () => {
      await expect(build({ ...pack, voice: { ...pack.voice, voice: 'missing' } })).rejects.toThrow(
        new BuildAbortedError("Voice 'missing' is not offered by fake")
      );
      expect(provider.disposed).toBe(true);
      expect(provider.calls).toEqual([]);
    });

    it('should abort on voice settings the provider rejects', async () => {
      const gateway = new StubPollyGateway();
      const registry = new ProviderRegistry();
      registry.register(new PollyTTSProvider({ limits: { concurrency: 2, minDelayMs: 0 }, gateway }));
      orchestrator = new BuildOrchestrator({ registry });

      await expect(
        build({
          ...pack,
          voice: { provider: 'polly', voice: 'Amy', language: 'en_GB', parameters: { engine: 'generative' } }
        })
      ).rejects.toThrow(
        new BuildAbortedError(
          "Voice 'Amy' cannot be used: Polly voice 'Amy' does not support the generative engine (supports: neural, standard)"
        )
      );
      expect(gateway.requests).toEqual([]);
      expect(await fs.readdir(outputDir)).toEqual([]);
    });

    it('should abort on an unknown provider', async () => {
      await expect(build({ ...pack, voice: { ...pack.voice, provider: 'nowhere' } })).rejects.toThrow(
        BuildAbortedError
      );
    });

    it('should abort when the catalog cannot be listed', async () => {
      setup({ listError: new Error('voices directory missing') });

      await expect(build()).rejects.toThrow('Cannot list fake voices: voices directory missing');
    });

    it('should abort on duplicate phrase ids', async () => {
      const config = {
        ...pack,
        phrases: [
          { id: 'armed', text: 'Armed' },
          { id: 'Armed', text: 'Armed' }
        ]
      };

      await expect(build(config)).rejects.toThrow(BuildAbortedError);
      expect(await fs.readdir(outputDir)).toEqual([]);
    });

    it('should stop with BuildCancelledError when the signal aborts', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        orchestrator.build(pack, { outputDir, signal: controller.signal, maxRetries: 0 })
      ).rejects.toThrow(BuildCancelledError);
      expect(provider.calls).toEqual([]);
      expect(await exists(path.join(outputDir, 'Test_Pack', 'SOUNDS'))).toBe(false);
    });

    it('should cancel mid-synthesis without leaving partial files', async () => {
      setup({ delayMs: 50 });
      const controller = new AbortController();
      orchestrator.on('state', (state: BuildState) => {
        if (state === BuildState.SYNTHESIZING) {
          setTimeout(() => controller.abort(), 10);
        }
      });

      await expect(
        orchestrator.build(pack, { outputDir, signal: controller.signal, maxRetries: 0 })
      ).rejects.toThrow(BuildCancelledError);

      expect(provider.calls).toHaveLength(2);
      const left = await fs.readdir(outputDir, { recursive: true });
      expect(left.filter((file) => file.endsWith('.tmp') || file.endsWith('.wav'))).toEqual([]);
      expect(await exists(path.join(outputDir, 'Test_Pack.lock'))).toBe(false);
      expect(provider.disposed).toBe(true);
    });
  });

  describe('limits', () => {
    it('should respect the provider concurrency limit', async () => {
      setup({ limits: { concurrency: 2, minDelayMs: 0 }, delayMs: 10 });
      const phrases = Array.from({ length: 6 }, (_, i) => ({ id: `p${i}`, text: `Phrase ${i}` }));

      const report = await orchestrator.build({ ...pack, phrases }, { outputDir, concurrency: 8 });

      expect(report.succeeded).toHaveLength(6);
      expect(provider.maxInFlight).toBe(2);
    });

    it('should respect the build concurrency when it is lower', async () => {
      setup({ limits: { concurrency: 8, minDelayMs: 0 }, delayMs: 10 });
      const phrases = Array.from({ length: 6 }, (_, i) => ({ id: `p${i}`, text: `Phrase ${i}` }));

      await orchestrator.build({ ...pack, phrases }, { outputDir, concurrency: 1, dryRun: true });

      expect(provider.maxInFlight).toBe(1);
    });
  });

  describe('synthesis cache', () => {
    it('should serve repeated phrases from the cache', async () => {
      const cacheDir = path.join(outputDir, 'cache');
      setup({}, new SynthesisCache(cacheDir));

      const first = await build();
      const second = await build();

      expect(first.cacheHits).toBe(0);
      expect(second.cacheHits).toBe(2);
      expect(provider.calls).toHaveLength(2);
      expect(second.checksum).toBe(first.checksum);
    });

    it('should not write the cache during a dry run', async () => {
      const cacheDir = path.join(outputDir, 'cache');
      setup({}, new SynthesisCache(cacheDir));

      await build(pack, true);

      expect(await exists(cacheDir)).toBe(false);
    });
  });
});
