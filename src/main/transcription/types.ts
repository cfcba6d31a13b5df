/**
 * Shared Types for Transcription Providers
 *
 * Every remote speech-to-text service is reached through the same
 * ProviderClient capability. The registry decides which clients are in
 * play for a session; the clients never know about each other.
 */

import type { ProviderId, ProviderRole } from '../../shared/types';

// ============================================================================
// Audio
// ============================================================================

/**
 * Audio handed from capture to providers. The bytes are an in-memory copy;
 * any temporary file has already been deleted.
 */
export interface CapturedAudio {
  data: Buffer;
  mimeType: string;
  fileName: string;
  durationMs: number;
}

// ============================================================================
// Provider Capability
// ============================================================================

export interface ProviderConfig {
  model: string;
  /** BCP-47 code, or 'auto' to let the provider detect the language */
  language: string;
}

export interface TranscribeOptions extends ProviderConfig {
  /** Aborted when the attempt times out or the session is cancelled */
  signal?: AbortSignal;
}

/**
 * A remote speech-to-text service.
 * `transcribe` resolves with the text or rejects with a TranscriptionError.
 */
export interface ProviderClient {
  readonly id: ProviderId;
  readonly displayName: string;
  isConfigured(): boolean;
  transcribe(audio: CapturedAudio, options: TranscribeOptions): Promise<string>;
}

// ============================================================================
// Registry
// ============================================================================

export interface ProviderEntry {
  role: ProviderRole;
  providerId: ProviderId;
  client: ProviderClient;
  isConfigured: boolean;
  config: ProviderConfig;
}

/**
 * Resolved providers for one session. `primary` is null when nothing
 * usable is configured.
 */
export interface RegistrySnapshot {
  primary: ProviderEntry | null;
  fallback: ProviderEntry | null;
  /** Configured primary was unusable and the fallback took its place */
  promoted: boolean;
  /** Providers as selected in settings, before configuration checks */
  requested: { primary: ProviderId; fallback: ProviderId | null };
}

export interface ProviderStatus {
  providerId: ProviderId;
  displayName: string;
  configured: boolean;
  reason?: string;
}

export interface ProviderDefaults {
  name: string;
  displayName: string;
  defaultModel: string;
  credentialEnvVar: string;
}
