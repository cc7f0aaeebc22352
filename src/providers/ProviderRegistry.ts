/**
 * Provider Registry
 *
 * Central registry for TTS providers, keyed by provider id.
 */

import { createLogger } from '../utils/logger';
import type { ITTSProvider } from './ITTSProvider';

const logger = createLogger({ service: 'ProviderRegistry' });

export class ProviderNotFoundError extends Error {
  constructor(name: string, available: string[]) {
    super(
      `TTS provider '${name}' not found. Available providers: ${available.length > 0 ? available.join(', ') : 'none'}`
    );
    this.name = 'ProviderNotFoundError';
  }
}

export class ProviderRegistry {
  private ttsProviders = new Map<string, ITTSProvider>();

  /**
   * Register a TTS provider under its own name
   */
  register(provider: ITTSProvider): void {
    this.ttsProviders.set(provider.name, provider);
    logger.debug({ provider: provider.name }, 'Registered TTS provider');
  }

  /**
   * Get a TTS provider by name
   * @throws ProviderNotFoundError if provider not registered
   */
  get(name: string): ITTSProvider {
    const provider = this.ttsProviders.get(name);
    if (!provider) {
      throw new ProviderNotFoundError(name, this.getAvailableProviders());
    }
    return provider;
  }

  has(name: string): boolean {
    return this.ttsProviders.has(name);
  }

  getAvailableProviders(): string[] {
    return Array.from(this.ttsProviders.keys()).sort();
  }

  /**
   * Dispose every provider that holds resources
   */
  async disposeAll(): Promise<void> {
    await Promise.all(
      Array.from(this.ttsProviders.values()).map(async (provider) => {
        if (provider.dispose) await provider.dispose();
      })
    );
  }
}
