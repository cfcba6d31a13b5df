/**
 * TranscriptionOrchestrator Tests
 *
 * Drives the session state machine with in-process capture, provider and
 * sink fakes:
 * - Primary success, fallback after a transient failure, fatal failures
 * - Cancel in every cancellable state, late results after cancel
 * - Empty audio, maximum capture duration, capture and delivery failures
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { ProviderAttempt, SessionOutcome, SessionState } from '../../src/shared/types';
import { TranscriptionOrchestrator, type OrchestratorEvents, type SessionLimits } from '../../src/main/TranscriptionOrchestrator';
import { TranscriptionError } from '../../src/main/transcription/errors';
import type { RegistrySnapshot } from '../../src/main/transcription/types';
import { CaptureError } from '../../src/main/audio/AudioCapture';
import { DeliveryError } from '../../src/main/output/ClipboardService';
import {
  FakeCapture,
  FakeProviderClient,
  FakeSink,
  createAudio,
  deferred,
  flushPromises,
  makeSnapshot,
  waitForState,
} from '../helpers/fakes';

describe('TranscriptionOrchestrator', () => {
  let capture: FakeCapture;
  let sink: FakeSink;
  let groq: FakeProviderClient;
  let deepgram: FakeProviderClient;
  let limits: SessionLimits;
  let snapshotFactory: () => RegistrySnapshot;
  let snapshotCount: number;
  let orchestrator: TranscriptionOrchestrator;

  let states: SessionState[];
  let outcomes: SessionOutcome[];
  let fallbacks: Array<OrchestratorEvents['fallbackUsed']>;
  let attempts: ProviderAttempt[];

  beforeEach(() => {
    capture = new FakeCapture();
    sink = new FakeSink();
    groq = new FakeProviderClient('groq');
    deepgram = new FakeProviderClient('deepgram');
    limits = { providerTimeoutMs: 1000, minAudioDurationMs: 500, maxCaptureDurationMs: 60_000 };
    snapshotFactory = () => makeSnapshot(groq, deepgram);
    snapshotCount = 0;

    orchestrator = new TranscriptionOrchestrator({
      capture,
      sink,
      registry: {
        snapshot: () => {
          snapshotCount++;
          return snapshotFactory();
        },
      },
      limits: () => ({ ...limits }),
    });

    states = [];
    outcomes = [];
    fallbacks = [];
    attempts = [];
    orchestrator.on('stateChange', ({ newState }) => states.push(newState));
    orchestrator.on('sessionEnded', ({ outcome }) => outcomes.push(outcome));
    orchestrator.on('fallbackUsed', (payload) => fallbacks.push(payload));
    orchestrator.on('attempt', ({ attempt }) => attempts.push(attempt));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  async function runToggleSession(): Promise<void> {
    expect(orchestrator.activate('toggle')).toBe(true);
    expect(orchestrator.stopSignal('toggle')).toBe(true);
    await orchestrator.whenIdle();
  }

  // ===========================================================================
  // Happy paths
  // ===========================================================================

  describe('primary success', () => {
    it('captures, transcribes and delivers through the primary', async () => {
      groq.respondWith('hello world');

      await runToggleSession();

      expect(states).toEqual(['capturing', 'awaiting-primary', 'delivering', 'idle']);
      expect(sink.delivered).toEqual(['hello world']);
      expect(outcomes).toEqual([{ status: 'delivered', text: 'hello world', providerId: 'groq', pasted: false }]);
      expect(capture.stopped).toHaveLength(1);
      expect(capture.discarded).toHaveLength(0);
      expect(deepgram.calls).toHaveLength(0);
      expect(orchestrator.getState()).toBe('idle');
      expect(orchestrator.isBusy()).toBe(false);
      expect(orchestrator.getSession()).toBeNull();
    });

    it('emits the delivered event with the text and provider', async () => {
      groq.respondWith('event text');
      const delivered: Array<OrchestratorEvents['delivered']> = [];
      orchestrator.on('delivered', (payload) => delivered.push(payload));

      await runToggleSession();

      expect(delivered).toHaveLength(1);
      expect(delivered[0].text).toBe('event text');
      expect(delivered[0].providerId).toBe('groq');
    });

    it('reports whether the sink pasted the text', async () => {
      groq.respondWith('pasted text');
      sink.pasted = true;

      await runToggleSession();

      expect(outcomes).toEqual([{ status: 'delivered', text: 'pasted text', providerId: 'groq', pasted: true }]);
    });

    it('supports hold mode through dispatch', async () => {
      groq.respondWith('held');

      expect(orchestrator.dispatch({ type: 'activate', mode: 'hold' })).toBe(true);
      expect(orchestrator.dispatch({ type: 'stop', mode: 'hold' })).toBe(true);
      await orchestrator.whenIdle();

      expect(sink.delivered).toEqual(['held']);
    });

    it('keeps running when a listener throws', async () => {
      groq.respondWith('still delivered');
      orchestrator.on('stateChange', () => {
        throw new Error('listener bug');
      });

      await runToggleSession();

      expect(sink.delivered).toEqual(['still delivered']);
      expect(states).toEqual(['capturing', 'awaiting-primary', 'delivering', 'idle']);
    });
  });

  describe('fallback', () => {
    it('moves to the fallback after a transient primary failure', async () => {
      groq.failWith(new TranscriptionError('ServerError', 'groq', 'API error (503): unavailable', { statusCode: 503 }));
      deepgram.respondWith('from fallback');

      await runToggleSession();

      expect(states).toEqual(['capturing', 'awaiting-primary', 'awaiting-fallback', 'delivering', 'idle']);
      expect(sink.delivered).toEqual(['from fallback']);
      expect(outcomes).toEqual([{ status: 'delivered', text: 'from fallback', providerId: 'deepgram', pasted: false }]);
      expect(fallbacks).toHaveLength(1);
      expect(fallbacks[0]).toMatchObject({ primary: 'groq', fallback: 'deepgram', reason: 'ServerError' });
      expect(attempts.map((attempt) => `${attempt.role}:${attempt.outcome.status}`)).toEqual([
        'primary:pending',
        'primary:transient-failure',
        'fallback:pending',
        'fallback:success',
      ]);
    });

    it('falls back when the primary does not answer in time', async () => {
      limits.providerTimeoutMs = 20;
      groq.hangUntilAborted();
      deepgram.respondWith('after timeout');

      await runToggleSession();

      expect(fallbacks[0]).toMatchObject({ primary: 'groq', fallback: 'deepgram', reason: 'Timeout' });
      expect(groq.calls[0].signal?.aborted).toBe(true);
      expect(sink.delivered).toEqual(['after timeout']);
    });

    it('does not use the fallback after a fatal primary failure', async () => {
      groq.failWith(new TranscriptionError('InvalidRequest', 'groq', 'API error (400): bad model', { statusCode: 400 }));
      deepgram.respondWith('unused');

      await runToggleSession();

      expect(states).toEqual(['capturing', 'awaiting-primary', 'failed', 'idle']);
      expect(deepgram.calls).toHaveLength(0);
      expect(sink.delivered).toEqual([]);
      expect(outcomes).toEqual([
        {
          status: 'failed',
          error: { kind: 'InvalidRequest', message: 'API error (400): bad model', providerId: 'groq', statusCode: 400 },
          message: 'Groq rejected the request (400). Please check the model and language settings.',
        },
      ]);
    });

    it('does not use the fallback when the primary rejects its key', async () => {
      groq.failWith(
        new TranscriptionError('MissingCredential', 'groq', 'API error (401): invalid api key', { statusCode: 401 })
      );
      deepgram.respondWith('unused');

      await runToggleSession();

      expect(states).toEqual(['capturing', 'awaiting-primary', 'failed', 'idle']);
      expect(deepgram.calls).toHaveLength(0);
      expect(fallbacks).toEqual([]);
      expect(sink.delivered).toEqual([]);
      const outcome = outcomes[0];
      if (outcome.status !== 'failed') throw new Error('expected failure');
      expect(outcome.error.kind).toBe('MissingCredential');
      expect(outcome.message).toBe('Groq rejected the API key (401). Please check your settings.');
    });

    it('fails with Timeout when a lone primary never answers', async () => {
      limits.providerTimeoutMs = 20;
      snapshotFactory = () => makeSnapshot(groq);
      // Never settles and ignores the abort signal
      groq.respondLater();

      await runToggleSession();

      expect(states).toEqual(['capturing', 'awaiting-primary', 'failed', 'idle']);
      expect(sink.delivered).toEqual([]);
      expect(groq.calls[0].signal?.aborted).toBe(true);
      const outcome = outcomes[0];
      if (outcome.status !== 'failed') throw new Error('expected failure');
      expect(outcome.error.kind).toBe('Timeout');
      expect(outcome.error.providerId).toBe('groq');
      expect(outcome.message).toBe('Groq took too long to respond. Please try again.');
    });

    it('reports the fallback error when both providers fail', async () => {
      groq.failWith(new TranscriptionError('NetworkError', 'groq', 'fetch failed'));
      deepgram.failWith(new TranscriptionError('RateLimited', 'deepgram', 'API error (429): slow down', { statusCode: 429 }));

      await runToggleSession();

      expect(states).toEqual(['capturing', 'awaiting-primary', 'awaiting-fallback', 'failed', 'idle']);
      expect(outcomes).toHaveLength(1);
      const outcome = outcomes[0];
      expect(outcome.status).toBe('failed');
      if (outcome.status !== 'failed') return;
      expect(outcome.error.providerId).toBe('deepgram');
      expect(outcome.message).toBe('Deepgram is rate limiting requests. Please try again shortly.');
    });

    it('fails with a credential message when no provider is configured', async () => {
      snapshotFactory = () => makeSnapshot(null);

      await runToggleSession();

      expect(outcomes).toHaveLength(1);
      const outcome = outcomes[0];
      if (outcome.status !== 'failed') throw new Error('expected failure');
      expect(outcome.error.kind).toBe('MissingCredential');
      expect(outcome.message).toBe('Groq API key not configured. Please check your settings.');
    });
  });

  // ===========================================================================
  // Cancellation
  // ===========================================================================

  describe('cancel', () => {
    it('discards the capture when cancelled while capturing', async () => {
      orchestrator.activate('toggle');
      await flushPromises();

      expect(orchestrator.cancel()).toBe(true);
      await orchestrator.whenIdle();

      expect(states).toEqual(['capturing', 'cancelled', 'idle']);
      expect(outcomes).toEqual([{ status: 'cancelled' }]);
      expect(capture.discarded).toEqual(capture.started);
      expect(capture.stopped).toHaveLength(0);
      expect(groq.calls).toHaveLength(0);
    });

    it('releases a capture that comes up after the cancel', async () => {
      const gate = deferred<void>();
      capture.startGate = gate;

      orchestrator.activate('toggle');
      orchestrator.cancel();
      await orchestrator.whenIdle();

      expect(orchestrator.getState()).toBe('idle');
      expect(capture.started).toHaveLength(0);

      gate.resolve();
      await flushPromises();

      expect(capture.started).toHaveLength(1);
      expect(capture.discarded).toEqual(capture.started);
    });

    it('drops a primary result that arrives after the cancel', async () => {
      const pending = groq.respondLater();

      orchestrator.activate('toggle');
      orchestrator.stopSignal('toggle');
      await groq.waitForCall();
      expect(orchestrator.getState()).toBe('awaiting-primary');

      expect(orchestrator.cancel()).toBe(true);
      pending.resolve('late text');
      await orchestrator.whenIdle();
      await flushPromises();

      expect(states).toEqual(['capturing', 'awaiting-primary', 'cancelled', 'idle']);
      expect(outcomes).toEqual([{ status: 'cancelled' }]);
      expect(sink.delivered).toEqual([]);
      expect(groq.calls[0].signal?.aborted).toBe(true);
    });

    it('cancels while waiting on the fallback', async () => {
      groq.failWith(new TranscriptionError('ServerError', 'groq', 'API error (500): oops', { statusCode: 500 }));
      const pending = deepgram.respondLater();

      orchestrator.activate('toggle');
      orchestrator.stopSignal('toggle');
      await deepgram.waitForCall();
      expect(orchestrator.getState()).toBe('awaiting-fallback');

      orchestrator.cancel();
      pending.resolve('late fallback text');
      await orchestrator.whenIdle();

      expect(states).toEqual(['capturing', 'awaiting-primary', 'awaiting-fallback', 'cancelled', 'idle']);
      expect(sink.delivered).toEqual([]);
      expect(outcomes).toEqual([{ status: 'cancelled' }]);
    });

    it('ignores cancel once delivery has started', async () => {
      groq.respondWith('on its way');
      const gate = deferred<void>();
      sink.gate = gate;
      const delivering = waitForState(orchestrator, 'delivering');

      orchestrator.activate('toggle');
      orchestrator.stopSignal('toggle');
      await delivering;

      expect(orchestrator.cancel()).toBe(false);
      gate.resolve();
      await orchestrator.whenIdle();

      expect(sink.delivered).toEqual(['on its way']);
      expect(outcomes).toEqual([{ status: 'delivered', text: 'on its way', providerId: 'groq', pasted: false }]);
    });

    it('keeps a late result from a cancelled session out of the next one', async () => {
      const first = groq.respondLater();
      groq.respondWith('second session');

      orchestrator.activate('toggle');
      orchestrator.stopSignal('toggle');
      await groq.waitForCall();
      orchestrator.cancel();
      await orchestrator.whenIdle();

      await runToggleSession();
      first.resolve('first session');
      await flushPromises();

      expect(sink.delivered).toEqual(['second session']);
      expect(outcomes).toEqual([
        { status: 'cancelled' },
        { status: 'delivered', text: 'second session', providerId: 'groq', pasted: false },
      ]);
    });

    it('cleans up the live session on destroy', async () => {
      orchestrator.activate('toggle');
      await flushPromises();

      await orchestrator.destroy();

      expect(orchestrator.getState()).toBe('idle');
      expect(capture.discarded).toHaveLength(1);
    });
  });

  // ===========================================================================
  // Event filtering
  // ===========================================================================

  describe('event filtering', () => {
    it('ignores stop and cancel while idle', () => {
      expect(orchestrator.stopSignal('toggle')).toBe(false);
      expect(orchestrator.cancel()).toBe(false);
      expect(states).toEqual([]);
    });

    it('rejects a second activation while a session is live', async () => {
      groq.respondWith('only one');

      expect(orchestrator.activate('toggle')).toBe(true);
      expect(orchestrator.activate('hold')).toBe(false);
      expect(orchestrator.getSession()?.activationMode).toBe('toggle');

      orchestrator.stopSignal('toggle');
      await orchestrator.whenIdle();

      expect(outcomes).toHaveLength(1);
      expect(capture.started).toHaveLength(1);
    });

    it('only accepts a stop for the mode the session started in, once', async () => {
      groq.respondWith('stopped');

      orchestrator.activate('toggle');
      expect(orchestrator.stopSignal('hold')).toBe(false);
      expect(orchestrator.getState()).toBe('capturing');
      expect(orchestrator.stopSignal('toggle')).toBe(true);
      expect(orchestrator.stopSignal('toggle')).toBe(false);
      await orchestrator.whenIdle();

      expect(sink.delivered).toEqual(['stopped']);
    });

    it('exposes a snapshot of the live session', async () => {
      orchestrator.activate('hold');

      const snapshot = orchestrator.getSession();
      expect(snapshot).toMatchObject({
        state: 'capturing',
        activationMode: 'hold',
        attempts: [],
        text: null,
        error: null,
        audioDurationMs: null,
      });
      expect(typeof snapshot?.id).toBe('string');

      orchestrator.cancel();
      await orchestrator.whenIdle();
      expect(orchestrator.getSession()).toBeNull();
    });
  });

  // ===========================================================================
  // Limits
  // ===========================================================================

  describe('limits', () => {
    it('fails audio shorter than the minimum without calling a provider', async () => {
      capture.audio = createAudio(200);

      await runToggleSession();

      expect(states).toEqual(['capturing', 'awaiting-primary', 'failed', 'idle']);
      expect(groq.calls).toHaveLength(0);
      expect(outcomes).toEqual([
        {
          status: 'failed',
          error: { kind: 'EmptyAudio', message: 'Recording too short (200ms, minimum 500ms)' },
          message: 'Recording too short. Please try again.',
        },
      ]);
    });

    it('fails zero-byte audio', async () => {
      capture.audio = { data: Buffer.alloc(0), mimeType: 'audio/wav', fileName: 'recording.wav', durationMs: 0 };

      await runToggleSession();

      const outcome = outcomes[0];
      if (outcome.status !== 'failed') throw new Error('expected failure');
      expect(outcome.error.message).toBe('Recording too short (0ms, minimum 500ms)');
    });

    it('stops capture automatically at the maximum duration', async () => {
      vi.useFakeTimers();
      groq.respondWith('long dictation');

      orchestrator.activate('toggle');
      await vi.advanceTimersByTimeAsync(59_999);
      expect(orchestrator.getState()).toBe('capturing');

      await vi.advanceTimersByTimeAsync(1);
      await orchestrator.whenIdle();

      expect(capture.stopped).toHaveLength(1);
      expect(sink.delivered).toEqual(['long dictation']);
    });

    it('reads limits and providers fresh for every session', async () => {
      groq.respondWith('first');

      await runToggleSession();
      limits.minAudioDurationMs = 3000;
      await runToggleSession();

      expect(snapshotCount).toBe(1);
      expect(outcomes[0]).toEqual({ status: 'delivered', text: 'first', providerId: 'groq', pasted: false });
      const second = outcomes[1];
      if (second.status !== 'failed') throw new Error('expected failure');
      expect(second.error.message).toBe('Recording too short (2000ms, minimum 3000ms)');
    });
  });

  // ===========================================================================
  // Capture and delivery failures
  // ===========================================================================

  describe('failures', () => {
    it('fails when capture cannot start', async () => {
      capture.startError = new CaptureError('ffmpeg not found. Install ffmpeg to record audio.');

      orchestrator.activate('toggle');
      await orchestrator.whenIdle();

      expect(states).toEqual(['capturing', 'failed', 'idle']);
      expect(outcomes).toEqual([
        {
          status: 'failed',
          error: { kind: 'CaptureError', message: 'ffmpeg not found. Install ffmpeg to record audio.' },
          message: 'Microphone error: ffmpeg not found. Install ffmpeg to record audio.',
        },
      ]);
    });

    it('fails when the captured audio cannot be read', async () => {
      capture.stopError = new CaptureError('Audio file not readable: missing');

      await runToggleSession();

      expect(states).toEqual(['capturing', 'awaiting-primary', 'failed', 'idle']);
      const outcome = outcomes[0];
      if (outcome.status !== 'failed') throw new Error('expected failure');
      expect(outcome.error.kind).toBe('CaptureError');
    });

    it('reports a delivery failure and returns to idle', async () => {
      groq.respondWith('undeliverable');
      sink.error = new DeliveryError('Failed to copy to clipboard (xclip): not found');

      await runToggleSession();

      expect(states).toEqual(['capturing', 'awaiting-primary', 'delivering', 'idle']);
      expect(outcomes).toEqual([
        {
          status: 'failed',
          error: { kind: 'DeliveryError', message: 'Failed to copy to clipboard (xclip): not found' },
          message: 'Could not deliver the transcription: Failed to copy to clipboard (xclip): not found',
        },
      ]);
    });
  });
});
