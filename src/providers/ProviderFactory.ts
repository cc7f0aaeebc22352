/**
 * Provider Factory
 *
 * Creates TTS provider instances based on environment configuration.
 */

import { env } from '../config/env';
import type { Env } from '../config/env';
import { createLogger } from '../utils/logger';
import { ProviderRegistry } from './ProviderRegistry';
import { OpenAITTSProvider } from './tts/OpenAITTSProvider';
import { PiperTTSProvider } from './tts/PiperTTSProvider';
import { PollyTTSProvider } from './tts/PollyTTSProvider';

const logger = createLogger({ service: 'ProviderFactory' });

/**
 * Create Provider Registry with all enabled providers
 */
export function createProviderRegistry(config: Env = env): ProviderRegistry {
  const registry = new ProviderRegistry();

  if (config.PIPER_ENABLED) {
    registry.register(
      new PiperTTSProvider({
        binPath: config.PIPER_BIN,
        voicesDir: config.PIPER_VOICES_DIR,
        timeoutMs: config.PIPER_TIMEOUT_MS,
        limits: { concurrency: config.TTS_PIPER_CONCURRENCY, minDelayMs: config.TTS_PIPER_MIN_DELAY_MS }
      })
    );
  }
  if (config.POLLY_ENABLED) {
    registry.register(
      new PollyTTSProvider({
        limits: { concurrency: config.TTS_POLLY_CONCURRENCY, minDelayMs: config.TTS_POLLY_MIN_DELAY_MS }
      })
    );
  }
  if (config.OPENAI_TTS_ENABLED) {
    registry.register(
      new OpenAITTSProvider({
        model: config.OPENAI_TTS_MODEL,
        limits: { concurrency: config.TTS_OPENAI_CONCURRENCY, minDelayMs: config.TTS_OPENAI_MIN_DELAY_MS }
      })
    );
  }

  logger.debug({ providers: registry.getAvailableProviders() }, 'Registered TTS providers');
  return registry;
}
