/**
 * TranscriptionOrchestrator - Session state machine for voxrelay
 *
 * Implements the finite state machine for one utterance:
 *   idle -> capturing -> awaiting-primary -> [awaiting-fallback] -> delivering -> idle
 * with cancelled and failed as terminal states that immediately reset to idle.
 *
 * Responsibilities:
 * - Own the single live session (a second Activate is rejected, not queued)
 * - Drive capture, the provider pipeline and the output sink
 * - Stop capture automatically at the maximum capture duration
 * - Make Cancel win every race with a late capture or provider result
 * - Emit an ordered stateChange stream plus session outcome events
 *
 * Every await resumes through the session's CancellationToken, and the
 * session identity is re-checked before any mutation or side effect.
 */

import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import type {
  ActivationEvent,
  ActivationMode,
  FailureKind,
  ProviderAttempt,
  ProviderErrorKind,
  ProviderId,
  SessionOutcome,
  SessionSnapshot,
  SessionState,
  TranscriptionFailure,
} from '../shared/types';
import { CancellationToken, isCancelledError } from './cancellation/CancellationToken';
import type { AudioCapture, CaptureHandle } from './audio/AudioCapture';
import type { OutputSink } from './output/ClipboardService';
import { FallbackPipeline } from './transcription/FallbackPipeline';
import type { CapturedAudio, RegistrySnapshot } from './transcription/types';
import { ErrorHandler, errorHandler as defaultErrorHandler } from './ErrorHandler';
import { DEFAULT_SETTINGS } from './settings/SettingsManager';
import { createLogger } from './logger';

const logger = createLogger('Orchestrator');

// =============================================================================
// Types
// =============================================================================

/**
 * Read at the start of every session so settings changes apply to the
 * next utterance.
 */
export interface SessionLimits {
  providerTimeoutMs: number;
  minAudioDurationMs: number;
  maxCaptureDurationMs: number;
}

export interface OrchestratorEvents {
  stateChange: { oldState: SessionState; newState: SessionState; sessionId: string };
  attempt: { sessionId: string; attempt: ProviderAttempt };
  fallbackUsed: { sessionId: string; primary: ProviderId; fallback: ProviderId; reason: ProviderErrorKind };
  delivered: { sessionId: string; text: string; providerId: ProviderId; pasted: boolean };
  sessionEnded: { sessionId: string; outcome: SessionOutcome };
}

export type OrchestratorEventName = keyof OrchestratorEvents;

export interface OrchestratorDependencies {
  capture: AudioCapture;
  registry: { snapshot(): RegistrySnapshot };
  sink: OutputSink;
  limits?: () => SessionLimits;
  pipeline?: FallbackPipeline;
  errorHandler?: ErrorHandler;
  now?: () => number;
}

interface Session {
  id: string;
  state: SessionState;
  activationMode: ActivationMode;
  startedAt: number;
  stateEnteredAt: number;
  audioDurationMs: number | null;
  attempts: ProviderAttempt[];
  text: string | null;
  error: TranscriptionFailure | null;
  limits: SessionLimits;
  token: CancellationToken;
  captureHandle: CaptureHandle | null;
  stopRequested: boolean;
  requestStop: () => void;
  stopped: Promise<void>;
  maxDurationTimer: ReturnType<typeof setTimeout> | null;
  deliveryStarted: boolean;
  done: Promise<void>;
}

/**
 * Valid state transitions.
 * cancelled and failed only ever lead back to idle.
 */
const STATE_TRANSITIONS: Record<SessionState, SessionState[]> = {
  idle: ['capturing'],
  capturing: ['awaiting-primary', 'cancelled', 'failed'],
  'awaiting-primary': ['awaiting-fallback', 'delivering', 'cancelled', 'failed'],
  'awaiting-fallback': ['delivering', 'cancelled', 'failed'],
  delivering: ['idle'],
  cancelled: ['idle'],
  failed: ['idle'],
};

const DEFAULT_LIMITS: SessionLimits = {
  providerTimeoutMs: DEFAULT_SETTINGS.providerTimeoutMs,
  minAudioDurationMs: DEFAULT_SETTINGS.minAudioDurationMs,
  maxCaptureDurationMs: DEFAULT_SETTINGS.maxCaptureDurationMs,
};

// =============================================================================
// TranscriptionOrchestrator
// =============================================================================

export class TranscriptionOrchestrator {
  private state: SessionState = 'idle';
  private session: Session | null = null;
  private readonly emitter = new EventEmitter();

  private readonly capture: AudioCapture;
  private readonly registry: { snapshot(): RegistrySnapshot };
  private readonly sink: OutputSink;
  private readonly limits: () => SessionLimits;
  private readonly pipeline: FallbackPipeline;
  private readonly errorHandler: ErrorHandler;
  private readonly now: () => number;

  constructor(deps: OrchestratorDependencies) {
    this.capture = deps.capture;
    this.registry = deps.registry;
    this.sink = deps.sink;
    this.limits = deps.limits ?? (() => DEFAULT_LIMITS);
    this.now = deps.now ?? Date.now;
    this.pipeline = deps.pipeline ?? new FallbackPipeline({ now: this.now });
    this.errorHandler = deps.errorHandler ?? defaultErrorHandler;
  }

  // ===========================================================================
  // Activation
  // ===========================================================================

  /**
   * Start a new session. Rejected (returns false) unless the orchestrator
   * is idle.
   */
  activate(mode: ActivationMode): boolean {
    if (this.session) {
      logger.warn(`Activate ignored: session ${this.session.id} is ${this.state}`);
      return false;
    }

    const startedAt = this.now();
    let requestStop: () => void = () => undefined;
    const stopped = new Promise<void>((resolve) => {
      requestStop = resolve;
    });

    const session: Session = {
      id: randomUUID(),
      state: 'idle',
      activationMode: mode,
      startedAt,
      stateEnteredAt: startedAt,
      audioDurationMs: null,
      attempts: [],
      text: null,
      error: null,
      limits: this.limits(),
      token: new CancellationToken(),
      captureHandle: null,
      stopRequested: false,
      requestStop,
      stopped,
      maxDurationTimer: null,
      deliveryStarted: false,
      done: Promise.resolve(),
    };

    this.session = session;
    logger.info(`Session ${session.id} activated (${mode})`);
    this.transition(session, 'capturing');

    session.maxDurationTimer = setTimeout(() => {
      if (this.isCurrent(session) && session.state === 'capturing' && !session.stopRequested) {
        logger.info(`Maximum capture duration (${session.limits.maxCaptureDurationMs}ms) reached, stopping`);
        this.requestStop(session);
      }
    }, session.limits.maxCaptureDurationMs);

    session.done = this.runSession(session).catch((error: unknown) => {
      logger.error(`Session ${session.id} crashed:`, error);
      this.forceIdle(session);
    });

    return true;
  }

  /**
   * End capture. Only meaningful while capturing and only for the mode the
   * session was started with.
   */
  stopSignal(mode: ActivationMode): boolean {
    const session = this.session;
    if (!session || session.state !== 'capturing') {
      logger.debug(`StopSignal ignored in state ${this.state}`);
      return false;
    }
    if (session.activationMode !== mode) {
      logger.debug(`StopSignal(${mode}) ignored: session started in ${session.activationMode} mode`);
      return false;
    }
    if (session.stopRequested) {
      return false;
    }

    this.requestStop(session);
    return true;
  }

  /**
   * Cancel the live session. Accepted while capturing or waiting on a
   * provider; once delivery has started the text is already on its way.
   */
  cancel(): boolean {
    const session = this.session;
    if (!session) {
      logger.debug('Cancel ignored: no active session');
      return false;
    }
    if (session.state === 'delivering') {
      logger.info('Cancel ignored: delivery already in progress');
      return false;
    }
    if (session.token.isCancelled || session.state === 'cancelled' || session.state === 'failed') {
      return false;
    }

    logger.info(`Cancelling session ${session.id} in state ${session.state}`);
    session.token.cancel('user');
    this.clearMaxDurationTimer(session);
    this.transition(session, 'cancelled');
    return true;
  }

  dispatch(event: ActivationEvent): boolean {
    switch (event.type) {
      case 'activate':
        return this.activate(event.mode);
      case 'stop':
        return this.stopSignal(event.mode);
      case 'cancel':
        return this.cancel();
    }
  }

  // ===========================================================================
  // Observation
  // ===========================================================================

  getState(): SessionState {
    return this.state;
  }

  getSession(): SessionSnapshot | null {
    const session = this.session;
    if (!session) return null;
    return {
      id: session.id,
      state: session.state,
      activationMode: session.activationMode,
      startedAt: session.startedAt,
      stateEnteredAt: session.stateEnteredAt,
      audioDurationMs: session.audioDurationMs,
      attempts: session.attempts.map((attempt) => ({ ...attempt })),
      text: session.text,
      error: session.error ? { ...session.error } : null,
    };
  }

  isBusy(): boolean {
    return this.session !== null;
  }

  /**
   * Resolves once the current session (if any) has returned to idle.
   */
  whenIdle(): Promise<void> {
    return this.session?.done ?? Promise.resolve();
  }

  on<K extends OrchestratorEventName>(event: K, listener: (payload: OrchestratorEvents[K]) => void): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  /**
   * Cancel the live session, wait for its cleanup and drop all listeners.
   */
  async destroy(): Promise<void> {
    this.cancel();
    await this.whenIdle();
    this.emitter.removeAllListeners();
  }

  // ===========================================================================
  // Session Lifecycle
  // ===========================================================================

  private async runSession(session: Session): Promise<void> {
    const handle = await this.startCapture(session);
    if (!handle) return;

    try {
      await session.token.race(session.stopped);
    } catch (error) {
      await this.discardCapture(session, handle);
      this.finishCancelled(session, error);
      return;
    }

    this.clearMaxDurationTimer(session);
    this.transition(session, 'awaiting-primary');

    const audio = await this.stopCapture(session, handle);
    if (!audio) return;

    session.audioDurationMs = audio.durationMs;
    if (audio.data.byteLength === 0 || audio.durationMs < session.limits.minAudioDurationMs) {
      this.fail(session, {
        kind: 'EmptyAudio',
        message: `Recording too short (${audio.durationMs}ms, minimum ${session.limits.minAudioDurationMs}ms)`,
      });
      return;
    }

    const text = await this.transcribe(session, audio);
    if (text === null) return;

    await this.deliver(session, text.text, text.providerId);
  }

  private async startCapture(session: Session): Promise<CaptureHandle | null> {
    const starting = this.capture.start();

    try {
      const handle = await session.token.race(starting);
      session.captureHandle = handle;
      return handle;
    } catch (error) {
      if (session.token.isCancelled) {
        // The capture may still come up after the cancel; release it then
        void starting
          .then((lateHandle) => this.capture.discard(lateHandle))
          .catch((discardError: unknown) => {
            logger.debug('Late capture start after cancel did not complete:', discardError);
          });
        this.finishCancelled(session, error);
        return null;
      }

      this.fail(session, this.errorHandler.toFailure(error, 'CaptureError'));
      return null;
    }
  }

  private async discardCapture(session: Session, handle: CaptureHandle): Promise<void> {
    session.captureHandle = null;
    try {
      await this.capture.discard(handle);
    } catch (error) {
      this.errorHandler.log('warn', 'Failed to discard capture', {
        component: 'Orchestrator',
        operation: 'discardCapture',
        data: { sessionId: session.id, error: error instanceof Error ? error.message : String(error) },
      });
    }
  }

  private async stopCapture(session: Session, handle: CaptureHandle): Promise<CapturedAudio | null> {
    session.captureHandle = null;
    try {
      return await session.token.race(this.capture.stop(handle));
    } catch (error) {
      if (session.token.isCancelled) {
        this.finishCancelled(session, error);
      } else {
        this.fail(session, this.errorHandler.toFailure(error, 'CaptureError'));
      }
      return null;
    }
  }

  private async transcribe(
    session: Session,
    audio: CapturedAudio
  ): Promise<{ text: string; providerId: ProviderId } | null> {
    const snapshot = this.registry.snapshot();

    try {
      const result = await this.pipeline.run({
        snapshot,
        audio,
        token: session.token,
        timeoutMs: session.limits.providerTimeoutMs,
        hooks: {
          onAttempt: (attempt) => this.recordAttempt(session, attempt),
          onFallback: (primaryError, fallback) => {
            if (!this.isCurrent(session)) return;
            this.transition(session, 'awaiting-fallback');
            this.emit('fallbackUsed', {
              sessionId: session.id,
              primary: primaryError.providerId,
              fallback: fallback.providerId,
              reason: primaryError.kind,
            });
          },
        },
      });

      if (!this.isCurrent(session)) {
        this.finishCancelled(session, null);
        return null;
      }

      if (result.status === 'failed') {
        this.fail(session, this.errorHandler.toFailure(result.error, result.error.kind));
        return null;
      }

      return { text: result.text, providerId: result.entry.providerId };
    } catch (error) {
      if (isCancelledError(error) || session.token.isCancelled) {
        this.finishCancelled(session, error);
        return null;
      }
      throw error;
    }
  }

  private async deliver(session: Session, text: string, providerId: ProviderId): Promise<void> {
    if (!this.isCurrent(session) || session.deliveryStarted) {
      return;
    }

    session.deliveryStarted = true;
    session.text = text;
    this.transition(session, 'delivering');

    let pasted: boolean;
    try {
      ({ pasted } = await this.sink.deliver(text));
    } catch (error) {
      const failure = this.errorHandler.toFailure(error, 'DeliveryError');
      session.error = failure;
      const message = this.errorHandler.handleFailure(failure, {
        component: 'Orchestrator',
        operation: 'deliver',
        data: { sessionId: session.id },
      });
      this.emit('sessionEnded', { sessionId: session.id, outcome: { status: 'failed', error: failure, message } });
      this.transition(session, 'idle');
      return;
    }

    logger.info(`Session ${session.id} delivered ${text.length} characters via ${providerId}`);
    this.emit('delivered', { sessionId: session.id, text, providerId, pasted });
    this.emit('sessionEnded', { sessionId: session.id, outcome: { status: 'delivered', text, providerId, pasted } });
    this.transition(session, 'idle');
  }

  // ===========================================================================
  // Terminal states
  // ===========================================================================

  private finishCancelled(session: Session, reason: unknown): void {
    if (this.session !== session) return;

    if (reason !== null && !isCancelledError(reason)) {
      logger.debug('Late result after cancel dropped:', reason);
    }

    this.clearMaxDurationTimer(session);
    if (session.state !== 'cancelled') {
      this.transition(session, 'cancelled');
    }
    this.emit('sessionEnded', { sessionId: session.id, outcome: { status: 'cancelled' } });
    this.transition(session, 'idle');
  }

  private fail(session: Session, failure: TranscriptionFailure): void {
    if (this.session !== session) return;
    if (session.token.isCancelled) {
      this.finishCancelled(session, null);
      return;
    }

    this.clearMaxDurationTimer(session);
    session.error = failure;
    this.transition(session, 'failed');

    const message = this.errorHandler.handleFailure(failure, {
      component: 'Orchestrator',
      operation: 'session',
      data: { sessionId: session.id },
    });
    this.emit('sessionEnded', { sessionId: session.id, outcome: { status: 'failed', error: failure, message } });
    this.transition(session, 'idle');
  }

  /**
   * Last-resort reset when the session loop itself threw.
   */
  private forceIdle(session: Session): void {
    if (this.session !== session) return;

    session.token.cancel('crashed');
    this.clearMaxDurationTimer(session);
    if (session.captureHandle) {
      const handle = session.captureHandle;
      session.captureHandle = null;
      void this.capture.discard(handle).catch((error: unknown) => {
        logger.warn('Failed to discard capture during recovery:', error);
      });
    }

    const oldState = this.state;
    const kind: FailureKind = oldState === 'capturing' ? 'CaptureError' : 'NetworkError';
    const failure: TranscriptionFailure = { kind, message: 'Session ended unexpectedly. See the log for details.' };
    session.error = failure;
    logger.error(`Force recovery from state: ${oldState}`);

    // Bypass the transition table: the session may be in any state here
    this.state = 'idle';
    session.state = 'idle';
    this.session = null;
    this.emit('sessionEnded', {
      sessionId: session.id,
      outcome: { status: 'failed', error: failure, message: failure.message },
    });
    this.emit('stateChange', { oldState, newState: 'idle', sessionId: session.id });
  }

  // ===========================================================================
  // State Machine
  // ===========================================================================

  /**
   * Transition the live session to a new state with validation.
   */
  private transition(session: Session, newState: SessionState): boolean {
    if (this.session !== session) {
      return false;
    }

    const validTransitions = STATE_TRANSITIONS[this.state];
    if (!validTransitions.includes(newState)) {
      logger.error(`Invalid state transition: ${this.state} -> ${newState}`);
      return false;
    }

    const oldState = this.state;
    this.state = newState;
    session.state = newState;
    session.stateEnteredAt = this.now();

    if (newState === 'idle') {
      this.session = null;
    }

    logger.info(`State: ${oldState} -> ${newState}`);
    this.emit('stateChange', { oldState, newState, sessionId: session.id });
    return true;
  }

  private isCurrent(session: Session): boolean {
    return this.session === session && !session.token.isCancelled;
  }

  private requestStop(session: Session): void {
    session.stopRequested = true;
    session.requestStop();
  }

  private clearMaxDurationTimer(session: Session): void {
    if (session.maxDurationTimer) {
      clearTimeout(session.maxDurationTimer);
      session.maxDurationTimer = null;
    }
  }

  private recordAttempt(session: Session, attempt: ProviderAttempt): void {
    if (this.session !== session) return;

    const index = session.attempts.findIndex((existing) => existing.role === attempt.role);
    if (index === -1) {
      session.attempts.push(attempt);
    } else {
      session.attempts[index] = attempt;
    }
    this.emit('attempt', { sessionId: session.id, attempt });
  }

  private emit<K extends OrchestratorEventName>(event: K, payload: OrchestratorEvents[K]): void {
    try {
      this.emitter.emit(event, payload);
    } catch (error) {
      logger.error(`Listener for ${event} threw:`, error);
    }
  }
}
