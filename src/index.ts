export * from './errors';
export * from './models/Audio';
export * from './models/BuildReport';
export * from './models/Phrase';
export * from './models/SynthesisResult';
export * from './models/VoiceModel';
export * from './models/VoicepackConfig';
export { AudioProcessor } from './audio/AudioProcessor';
export type { LoudnessOptions } from './audio/AudioProcessor';
export type { ITTSProvider, ProviderLimits } from './providers/ITTSProvider';
export { ProviderRegistry, ProviderNotFoundError } from './providers/ProviderRegistry';
export { createProviderRegistry } from './providers/ProviderFactory';
export { PiperTTSProvider } from './providers/tts/PiperTTSProvider';
export type { PiperTTSProviderOptions } from './providers/tts/PiperTTSProvider';
export { PiperVoiceDownloader } from './providers/tts/PiperVoiceDownloader';
export type { DownloadResult, FetchLike, PiperVoiceDownloaderOptions } from './providers/tts/PiperVoiceDownloader';
export { PollyTTSProvider } from './providers/tts/PollyTTSProvider';
export type { PollyGateway, PollyTTSProviderOptions } from './providers/tts/PollyTTSProvider';
export { OpenAITTSProvider } from './providers/tts/OpenAITTSProvider';
export type { OpenAITTSProviderOptions, SpeechClient } from './providers/tts/OpenAITTSProvider';
export { BuildOrchestrator } from './services/BuildOrchestrator';
export type { BuildOptions, BuildOrchestratorDeps, PhraseEvent } from './services/BuildOrchestrator';
export { ConcurrencyLimiter } from './services/ConcurrencyLimiter';
export { SynthesisCache, cacheFingerprint } from './services/SynthesisCache';
export { VoicepackLoader } from './services/VoicepackLoader';
export type { LoaderOverrides } from './services/VoicepackLoader';
