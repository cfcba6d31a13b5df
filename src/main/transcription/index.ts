/**
 * Transcription Module
 *
 * Batch speech-to-text over four cloud providers:
 * - Groq (Whisper)
 * - Deepgram
 * - ElevenLabs
 * - Sarvam AI
 *
 * The ProviderRegistry picks primary/fallback per session and the
 * FallbackPipeline runs at most two attempts.
 */

// ============================================================================
// Pipeline
// ============================================================================

export { ProviderRegistry, type RegistrySettings } from './ProviderRegistry';
export {
  FallbackPipeline,
  type PipelineHooks,
  type PipelineRequest,
  type PipelineResult,
} from './FallbackPipeline';

// ============================================================================
// Providers
// ============================================================================

export {
  createProviderClients,
  GroqClient,
  DeepgramClient,
  ElevenLabsClient,
  SarvamClient,
  GROQ_TRANSCRIPTIONS_URL,
  ELEVENLABS_STT_URL,
  SARVAM_STT_URL,
  type ApiKeyClientOptions,
  type DeepgramClientOptions,
} from './providers';
export { PROVIDER_CATALOG, AUTO_LANGUAGE, getProviderName } from './providerCatalog';

// ============================================================================
// Errors and types
// ============================================================================

export {
  TranscriptionError,
  isTranscriptionError,
  isTransientKind,
  classifyHttpStatus,
  normalizeProviderError,
  formatErrorMessage,
} from './errors';

export type {
  CapturedAudio,
  ProviderClient,
  ProviderConfig,
  ProviderEntry,
  ProviderStatus,
  RegistrySnapshot,
  TranscribeOptions,
} from './types';
