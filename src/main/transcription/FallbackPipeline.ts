/**
 * FallbackPipeline - primary then (at most) one fallback
 *
 * Each attempt runs under its own timeout. A timeout, rate limit, server
 * or network error on the primary moves on to the fallback; anything else
 * ends the pipeline. There is no third attempt, so the worst case is two
 * timeout windows.
 *
 * Session cancellation is not an outcome here: a CancelledError from the
 * session token propagates to the caller untouched.
 */

import type { ProviderAttempt, ProviderRole } from '../../shared/types';
import { type CancellationToken, TimeoutError, isCancelledError, withTimeout } from '../cancellation/CancellationToken';
import { TranscriptionError, normalizeProviderError } from './errors';
import { getProviderName } from './providerCatalog';
import type { CapturedAudio, ProviderEntry, RegistrySnapshot } from './types';
import { createLogger } from '../logger';

const logger = createLogger('FallbackPipeline');

export interface PipelineHooks {
  /** Called when an attempt starts and again when it settles */
  onAttempt?: (attempt: ProviderAttempt) => void;
  /** Called after a transient primary failure, before the fallback starts */
  onFallback?: (primaryError: TranscriptionError, fallback: ProviderEntry) => void;
}

export interface PipelineRequest {
  snapshot: RegistrySnapshot;
  audio: CapturedAudio;
  token: CancellationToken;
  timeoutMs: number;
  hooks?: PipelineHooks;
}

export type PipelineResult =
  | { status: 'success'; text: string; entry: ProviderEntry; attempts: ProviderAttempt[] }
  | { status: 'failed'; error: TranscriptionError; attempts: ProviderAttempt[] };

type AttemptResult = { ok: true; text: string } | { ok: false; error: TranscriptionError };

export class FallbackPipeline {
  private readonly now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
  }

  async run(request: PipelineRequest): Promise<PipelineResult> {
    const { snapshot, token, hooks } = request;
    const attempts: ProviderAttempt[] = [];

    if (!snapshot.primary) {
      const providerId = snapshot.requested.primary;
      return {
        status: 'failed',
        error: new TranscriptionError(
          'MissingCredential',
          providerId,
          `${getProviderName(providerId)} API key not configured`
        ),
        attempts,
      };
    }

    const primary = snapshot.primary;
    const primaryResult = await this.attempt(primary, request, attempts);
    if (primaryResult.ok) {
      return { status: 'success', text: primaryResult.text, entry: primary, attempts };
    }

    const primaryError = primaryResult.error;
    const fallback = snapshot.fallback;

    if (!primaryError.isTransient || !fallback) {
      return { status: 'failed', error: primaryError, attempts };
    }

    logger.warn(
      `Primary ${primary.providerId} failed (${primaryError.kind}: ${primaryError.message}), trying fallback ${fallback.providerId}`
    );
    token.throwIfCancelled();
    hooks?.onFallback?.(primaryError, fallback);

    const fallbackResult = await this.attempt(fallback, request, attempts);
    if (fallbackResult.ok) {
      return { status: 'success', text: fallbackResult.text, entry: fallback, attempts };
    }

    logger.error(`Fallback ${fallback.providerId} also failed: ${fallbackResult.error.message}`);
    return { status: 'failed', error: fallbackResult.error, attempts };
  }

  private async attempt(
    entry: ProviderEntry,
    request: PipelineRequest,
    attempts: ProviderAttempt[]
  ): Promise<AttemptResult> {
    const { audio, token, timeoutMs, hooks } = request;
    const role: ProviderRole = entry.role;

    const attempt: ProviderAttempt = {
      role,
      providerId: entry.providerId,
      outcome: { status: 'pending' },
      startedAt: this.now(),
      finishedAt: null,
    };
    attempts.push(attempt);
    hooks?.onAttempt?.({ ...attempt });

    let result: AttemptResult;
    try {
      const text = await withTimeout(
        token,
        timeoutMs,
        (attemptToken) =>
          entry.client.transcribe(audio, {
            model: entry.config.model,
            language: entry.config.language,
            signal: attemptToken.signal,
          }),
        `${entry.providerId} transcription`
      );
      token.throwIfCancelled();
      attempt.outcome = { status: 'success', text };
      result = { ok: true, text };
    } catch (error) {
      if (isCancelledError(error)) {
        throw error;
      }
      // A failure that lands after the session was cancelled is not reported
      token.throwIfCancelled();

      const classified =
        error instanceof TimeoutError
          ? new TranscriptionError('Timeout', entry.providerId, `${getProviderName(entry.providerId)} did not respond in time`, {
              cause: error,
            })
          : normalizeProviderError(entry.providerId, error);

      attempt.outcome = {
        status: classified.isTransient ? 'transient-failure' : 'fatal-failure',
        kind: classified.kind,
        message: classified.message,
      };
      result = { ok: false, error: classified };
    }

    attempt.finishedAt = this.now();
    hooks?.onAttempt?.({ ...attempt });
    return result;
  }
}
