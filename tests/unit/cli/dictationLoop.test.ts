/**
 * DictationLoop Tests
 *
 * Key presses on a fake terminal drive a real orchestrator with fake
 * capture, providers and sink.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { SessionOutcome, SessionState } from '../../../src/shared/types';
import { DictationLoop } from '../../../src/cli/DictationLoop';
import { TranscriptionOrchestrator } from '../../../src/main/TranscriptionOrchestrator';
import { TranscriptionError } from '../../../src/main/transcription/errors';
import {
  FakeCapture,
  FakeKeyInput,
  FakeProviderClient,
  FakeSink,
  flushPromises,
  makeSnapshot,
} from '../../helpers/fakes';

describe('DictationLoop', () => {
  let input: FakeKeyInput;
  let capture: FakeCapture;
  let sink: FakeSink;
  let groq: FakeProviderClient;
  let deepgram: FakeProviderClient;
  let orchestrator: TranscriptionOrchestrator;
  let loop: DictationLoop;

  let logs: string[];
  let states: SessionState[];
  let fallbacks: string[];
  let outcomes: SessionOutcome[];

  beforeEach(() => {
    input = new FakeKeyInput();
    capture = new FakeCapture();
    sink = new FakeSink();
    groq = new FakeProviderClient('groq');
    deepgram = new FakeProviderClient('deepgram');
    orchestrator = new TranscriptionOrchestrator({
      capture,
      sink,
      registry: { snapshot: () => makeSnapshot(groq, deepgram) },
    });

    logs = [];
    states = [];
    fallbacks = [];
    outcomes = [];
    loop = new DictationLoop(
      orchestrator,
      { input, getMode: () => 'toggle' },
      {
        onLog: (message) => logs.push(message),
        onStateChange: (state) => states.push(state),
        onFallback: (primary, fallback, reason) => fallbacks.push(`${primary}->${fallback} (${reason})`),
        onSessionEnded: (outcome) => outcomes.push(outcome),
      }
    );
  });

  it('runs a session per Space press pair and exits on Ctrl+C', async () => {
    groq.respondWith('first note');
    const running = loop.start();

    input.type(' ');
    input.type(' ');
    await orchestrator.whenIdle();
    input.type('\u0003');
    await running;

    expect(sink.delivered).toEqual(['first note']);
    expect(states).toEqual(['capturing', 'awaiting-primary', 'delivering', 'idle']);
    expect(outcomes).toEqual([{ status: 'delivered', text: 'first note', providerId: 'groq', pasted: false }]);
    expect(input.rawModes).toEqual([true, false]);
    expect(logs).toEqual([]);
  });

  it('reports a fallback', async () => {
    groq.failWith(new TranscriptionError('RateLimited', 'groq', 'API error (429): slow down', { statusCode: 429 }));
    deepgram.respondWith('from deepgram');
    const running = loop.start();

    input.type(' ');
    input.type(' ');
    await orchestrator.whenIdle();
    await loop.stop();
    await running;

    expect(fallbacks).toEqual(['groq->deepgram (RateLimited)']);
    expect(sink.delivered).toEqual(['from deepgram']);
  });

  it('cancels on Esc', async () => {
    const running = loop.start();

    input.type(' ');
    await flushPromises();
    input.type('\u001b');
    await orchestrator.whenIdle();
    await loop.stop();
    await running;

    expect(outcomes).toEqual([{ status: 'cancelled' }]);
    expect(capture.discarded).toHaveLength(1);
  });

  it('cancels the live session when stopped mid-capture', async () => {
    const running = loop.start();

    input.type(' ');
    await flushPromises();
    input.type('\u0003');
    await running;

    expect(logs).toEqual(['Cancelling the active session...']);
    expect(outcomes).toEqual([{ status: 'cancelled' }]);
    expect(orchestrator.getState()).toBe('idle');
  });

  it('stops forwarding events once stopped', async () => {
    const running = loop.start();
    await loop.stop();
    await running;

    orchestrator.activate('toggle');
    orchestrator.cancel();
    await orchestrator.whenIdle();

    expect(states).toEqual([]);
    expect(outcomes).toEqual([]);
  });
});
