/**
 * Shared types for voxrelay
 *
 * Single source of truth for session states, activation events and the
 * outcome types that cross the boundary between the orchestrator and its
 * consumers (CLI, presentation layers, tests).
 */

// =============================================================================
// Session State Machine
// =============================================================================

/**
 * Session lifecycle states.
 *
 * idle -> capturing -> awaiting-primary -> [awaiting-fallback] -> delivering -> idle
 * Any non-terminal state can move to cancelled; processing states can fail.
 */
export type SessionState =
  | 'idle'
  | 'capturing'
  | 'awaiting-primary'
  | 'awaiting-fallback'
  | 'delivering'
  | 'cancelled'
  | 'failed';

/**
 * How a session's capture is ended.
 * - toggle: a second activation press stops capture
 * - hold: releasing the activation key stops capture
 */
export type ActivationMode = 'toggle' | 'hold';

export const ACTIVATION_MODES: readonly ActivationMode[] = ['toggle', 'hold'] as const;

// =============================================================================
// Activation Events
// =============================================================================

export type ActivationEvent =
  | { type: 'activate'; mode: ActivationMode }
  | { type: 'stop'; mode: ActivationMode }
  | { type: 'cancel' };

// =============================================================================
// Providers
// =============================================================================

export type ProviderId = 'groq' | 'deepgram' | 'elevenlabs' | 'sarvam';

export const PROVIDER_IDS: readonly ProviderId[] = ['groq', 'deepgram', 'elevenlabs', 'sarvam'] as const;

export type ProviderRole = 'primary' | 'fallback';

// =============================================================================
// Failures
// =============================================================================

/**
 * Classified provider error kinds. Providers never surface anything else.
 */
export type ProviderErrorKind =
  | 'MissingCredential'
  | 'InvalidRequest'
  | 'InvalidResponse'
  | 'RateLimited'
  | 'ServerError'
  | 'NetworkError'
  | 'Timeout'
  | 'EmptyTranscription';

/**
 * Session-level failure kinds: capture problems plus every provider kind.
 */
export type FailureKind = 'CaptureError' | 'EmptyAudio' | 'DeliveryError' | ProviderErrorKind;

export interface TranscriptionFailure {
  kind: FailureKind;
  message: string;
  providerId?: ProviderId;
  statusCode?: number;
}

// =============================================================================
// Attempts and Outcomes
// =============================================================================

export type AttemptOutcome =
  | { status: 'pending' }
  | { status: 'success'; text: string }
  | { status: 'transient-failure'; kind: ProviderErrorKind; message: string }
  | { status: 'fatal-failure'; kind: ProviderErrorKind; message: string };

export interface ProviderAttempt {
  role: ProviderRole;
  providerId: ProviderId;
  outcome: AttemptOutcome;
  startedAt: number;
  finishedAt: number | null;
}

export type SessionOutcome =
  | { status: 'delivered'; text: string; providerId: ProviderId; pasted: boolean }
  | { status: 'cancelled' }
  | { status: 'failed'; error: TranscriptionFailure; message: string };

/**
 * Read-only view of the live session handed to observers.
 */
export interface SessionSnapshot {
  id: string;
  state: SessionState;
  activationMode: ActivationMode;
  startedAt: number;
  stateEnteredAt: number;
  audioDurationMs: number | null;
  attempts: ProviderAttempt[];
  text: string | null;
  error: TranscriptionFailure | null;
}
