import { describe, it, expect } from 'vitest';
import { env } from '../config/env';
import { createProviderRegistry } from '../providers/ProviderFactory';
import { ProviderNotFoundError, ProviderRegistry } from '../providers/ProviderRegistry';
import { FakeTTSProvider } from './helpers/FakeTTSProvider';

describe('ProviderRegistry', () => {
  it('should look providers up by name', () => {
    const registry = new ProviderRegistry();
    const fake = new FakeTTSProvider();

    registry.register(fake);

    expect(registry.has('fake')).toBe(true);
    expect(registry.get('fake')).toBe(fake);
  });

  it('should name the available providers when one is missing', () => {
    const registry = new ProviderRegistry();
    registry.register(new FakeTTSProvider({ name: 'zeta' }));
    registry.register(new FakeTTSProvider({ name: 'alpha' }));

    expect(() => registry.get('polly')).toThrow(ProviderNotFoundError);
    expect(() => registry.get('polly')).toThrow("TTS provider 'polly' not found. Available providers: alpha, zeta");
  });

  it('should dispose every provider', async () => {
    const registry = new ProviderRegistry();
    const a = new FakeTTSProvider({ name: 'a' });
    const b = new FakeTTSProvider({ name: 'b' });
    registry.register(a);
    registry.register(b);

    await registry.disposeAll();

    expect([a.disposed, b.disposed]).toEqual([true, true]);
  });
});

describe('createProviderRegistry()', () => {
  it('should register only the enabled providers', () => {
    const registry = createProviderRegistry({
      ...env,
      PIPER_ENABLED: true,
      POLLY_ENABLED: false,
      OPENAI_TTS_ENABLED: true
    });

    expect(registry.getAvailableProviders()).toEqual(['openai', 'piper']);
  });

  it('should pass the configured limits to each provider', () => {
    const registry = createProviderRegistry({
      ...env,
      PIPER_ENABLED: true,
      POLLY_ENABLED: true,
      OPENAI_TTS_ENABLED: false,
      TTS_POLLY_CONCURRENCY: 3,
      TTS_POLLY_MIN_DELAY_MS: 250
    });

    expect(registry.get('polly').limits).toEqual({ concurrency: 3, minDelayMs: 250 });
    expect(registry.has('openai')).toBe(false);
  });
});
