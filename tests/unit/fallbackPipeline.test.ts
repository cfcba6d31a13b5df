/**
 * FallbackPipeline Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { ProviderAttempt } from '../../src/shared/types';
import { FallbackPipeline } from '../../src/main/transcription/FallbackPipeline';
import { TranscriptionError } from '../../src/main/transcription/errors';
import { CancellationToken, CancelledError } from '../../src/main/cancellation/CancellationToken';
import { FakeProviderClient, createAudio, makeSnapshot } from '../helpers/fakes';

describe('FallbackPipeline', () => {
  let pipeline: FallbackPipeline;
  let token: CancellationToken;
  let groq: FakeProviderClient;
  let deepgram: FakeProviderClient;
  const audio = createAudio(1500);

  beforeEach(() => {
    pipeline = new FallbackPipeline({ now: () => 1000 });
    token = new CancellationToken();
    groq = new FakeProviderClient('groq');
    deepgram = new FakeProviderClient('deepgram');
  });

  it('returns the primary result without touching the fallback', async () => {
    groq.respondWith('hello world');

    const result = await pipeline.run({ snapshot: makeSnapshot(groq, deepgram), audio, token, timeoutMs: 1000 });

    expect(result.status).toBe('success');
    if (result.status !== 'success') return;
    expect(result.text).toBe('hello world');
    expect(result.entry.providerId).toBe('groq');
    expect(result.attempts).toEqual([
      {
        role: 'primary',
        providerId: 'groq',
        outcome: { status: 'success', text: 'hello world' },
        startedAt: 1000,
        finishedAt: 1000,
      },
    ]);
    expect(deepgram.calls).toHaveLength(0);
  });

  it('passes model, language and an abort signal to the client', async () => {
    groq.respondWith('ok');

    await pipeline.run({ snapshot: makeSnapshot(groq), audio, token, timeoutMs: 1000 });

    expect(groq.calls).toHaveLength(1);
    expect(groq.calls[0].model).toBe('test-model');
    expect(groq.calls[0].language).toBe('auto');
    expect(groq.calls[0].signal).toBeInstanceOf(AbortSignal);
  });

  it('fails with MissingCredential when no primary is usable', async () => {
    const result = await pipeline.run({ snapshot: makeSnapshot(null), audio, token, timeoutMs: 1000 });

    expect(result.status).toBe('failed');
    if (result.status !== 'failed') return;
    expect(result.error.kind).toBe('MissingCredential');
    expect(result.error.providerId).toBe('groq');
    expect(result.error.message).toBe('Groq API key not configured');
    expect(result.attempts).toEqual([]);
  });

  it('falls back after a transient primary failure', async () => {
    groq.failWith(new TranscriptionError('ServerError', 'groq', 'API error (503): unavailable', { statusCode: 503 }));
    deepgram.respondWith('from fallback');
    const fallbacks: string[] = [];
    const seen: ProviderAttempt[] = [];

    const result = await pipeline.run({
      snapshot: makeSnapshot(groq, deepgram),
      audio,
      token,
      timeoutMs: 1000,
      hooks: {
        onFallback: (primaryError, fallback) => fallbacks.push(`${primaryError.kind}->${fallback.providerId}`),
        onAttempt: (attempt) => seen.push(attempt),
      },
    });

    expect(result.status).toBe('success');
    if (result.status !== 'success') return;
    expect(result.text).toBe('from fallback');
    expect(result.entry.providerId).toBe('deepgram');

    expect(fallbacks).toEqual(['ServerError->deepgram']);

    expect(seen.map((attempt) => `${attempt.providerId}:${attempt.outcome.status}`)).toEqual([
      'groq:pending',
      'groq:transient-failure',
      'deepgram:pending',
      'deepgram:success',
    ]);
  });

  it('treats fetch failures as transient network errors', async () => {
    groq.failWith(new TypeError('fetch failed'));
    deepgram.respondWith('recovered');

    const result = await pipeline.run({ snapshot: makeSnapshot(groq, deepgram), audio, token, timeoutMs: 1000 });

    expect(result.status).toBe('success');
    expect(result.attempts[0].outcome).toEqual({
      status: 'transient-failure',
      kind: 'NetworkError',
      message: 'fetch failed',
    });
  });

  it('falls back after a refused connection whose message names a port', async () => {
    groq.failWith(
      new Error('request to https://api.groq.com/openai/v1/audio/transcriptions failed, reason: connect ECONNREFUSED 10.0.0.7:443')
    );
    deepgram.respondWith('after refusal');

    const result = await pipeline.run({ snapshot: makeSnapshot(groq, deepgram), audio, token, timeoutMs: 1000 });

    expect(result.status).toBe('success');
    if (result.status !== 'success') return;
    expect(result.text).toBe('after refusal');
    expect(result.attempts[0].outcome).toMatchObject({ status: 'transient-failure', kind: 'NetworkError' });
    expect(deepgram.calls).toHaveLength(1);
  });

  it('does not fall back after a rejected key', async () => {
    groq.failWith(
      new TranscriptionError('MissingCredential', 'groq', 'API error (401): invalid api key', { statusCode: 401 })
    );
    deepgram.respondWith('never used');

    const result = await pipeline.run({ snapshot: makeSnapshot(groq, deepgram), audio, token, timeoutMs: 1000 });

    expect(result.status).toBe('failed');
    if (result.status !== 'failed') return;
    expect(result.error.kind).toBe('MissingCredential');
    expect(result.error.statusCode).toBe(401);
    expect(result.attempts.map((attempt) => attempt.outcome.status)).toEqual(['fatal-failure']);
    expect(deepgram.calls).toHaveLength(0);
  });

  it('does not fall back after a fatal primary failure', async () => {
    groq.failWith(new TranscriptionError('EmptyTranscription', 'groq', 'Transcription returned empty text'));
    deepgram.respondWith('never used');

    const result = await pipeline.run({ snapshot: makeSnapshot(groq, deepgram), audio, token, timeoutMs: 1000 });

    expect(result.status).toBe('failed');
    if (result.status !== 'failed') return;
    expect(result.error.kind).toBe('EmptyTranscription');
    expect(result.attempts).toHaveLength(1);
    expect(result.attempts[0].outcome.status).toBe('fatal-failure');
    expect(deepgram.calls).toHaveLength(0);
  });

  it('returns the primary error when there is no fallback', async () => {
    groq.failWith(new TranscriptionError('RateLimited', 'groq', 'API error (429): slow down', { statusCode: 429 }));

    const result = await pipeline.run({ snapshot: makeSnapshot(groq), audio, token, timeoutMs: 1000 });

    expect(result.status).toBe('failed');
    if (result.status !== 'failed') return;
    expect(result.error.kind).toBe('RateLimited');
    expect(result.error.statusCode).toBe(429);
  });

  it('returns the fallback error when both providers fail, with no third attempt', async () => {
    groq.failWith(new TranscriptionError('NetworkError', 'groq', 'fetch failed'));
    deepgram.failWith(new TranscriptionError('ServerError', 'deepgram', 'API error (500): oops', { statusCode: 500 }));

    const result = await pipeline.run({ snapshot: makeSnapshot(groq, deepgram), audio, token, timeoutMs: 1000 });

    expect(result.status).toBe('failed');
    if (result.status !== 'failed') return;
    expect(result.error.providerId).toBe('deepgram');
    expect(result.error.kind).toBe('ServerError');
    expect(result.attempts.map((attempt) => attempt.role)).toEqual(['primary', 'fallback']);
    expect(groq.calls).toHaveLength(1);
    expect(deepgram.calls).toHaveLength(1);
  });

  it('turns an unanswered request into a Timeout and aborts it', async () => {
    groq.hangUntilAborted();
    deepgram.respondWith('fallback text');

    const result = await pipeline.run({ snapshot: makeSnapshot(groq, deepgram), audio, token, timeoutMs: 20 });

    expect(result.status).toBe('success');
    expect(result.attempts[0].outcome).toEqual({
      status: 'transient-failure',
      kind: 'Timeout',
      message: 'Groq did not respond in time',
    });
    expect(groq.calls[0].signal?.aborted).toBe(true);
  });

  it('propagates session cancellation instead of reporting an outcome', async () => {
    const pending = groq.respondLater();
    const onFallback = vi.fn();

    const running = pipeline.run({
      snapshot: makeSnapshot(groq, deepgram),
      audio,
      token,
      timeoutMs: 1000,
      hooks: { onFallback },
    });
    await groq.waitForCall();
    token.cancel('user');
    pending.reject(new TranscriptionError('ServerError', 'groq', 'API error (500): late'));

    await expect(running).rejects.toBeInstanceOf(CancelledError);
    expect(onFallback).not.toHaveBeenCalled();
    expect(deepgram.calls).toHaveLength(0);
  });
});
