/**
 * Classified transcription errors.
 *
 * Provider clients translate every transport, HTTP or payload problem into
 * a TranscriptionError before it leaves the client. The orchestrator only
 * ever looks at `kind` and `isTransient`.
 */

import type { ProviderErrorKind, ProviderId } from '../../shared/types';

const TRANSIENT_KINDS: ReadonlySet<ProviderErrorKind> = new Set<ProviderErrorKind>([
  'RateLimited',
  'ServerError',
  'NetworkError',
  'Timeout',
]);

export function isTransientKind(kind: ProviderErrorKind): boolean {
  return TRANSIENT_KINDS.has(kind);
}

export class TranscriptionError extends Error {
  public readonly kind: ProviderErrorKind;
  public readonly providerId: ProviderId;
  public readonly statusCode?: number;

  constructor(
    kind: ProviderErrorKind,
    providerId: ProviderId,
    message: string,
    options: { statusCode?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'TranscriptionError';
    this.kind = kind;
    this.providerId = providerId;
    this.statusCode = options.statusCode;
  }

  /**
   * True for errors where retrying with a different provider is worthwhile.
   */
  get isTransient(): boolean {
    return isTransientKind(this.kind);
  }
}

export function isTranscriptionError(error: unknown): error is TranscriptionError {
  return error instanceof TranscriptionError;
}

/**
 * Map an HTTP status code to an error kind.
 * 408 and 5xx are server-side and transient; 429 is rate limiting;
 * 401/403 mean the key is missing or rejected; other 4xx are malformed requests.
 */
export function classifyHttpStatus(statusCode: number): ProviderErrorKind {
  if (statusCode === 429) return 'RateLimited';
  if (statusCode === 408 || statusCode >= 500) return 'ServerError';
  if (statusCode === 401 || statusCode === 403) return 'MissingCredential';
  return 'InvalidRequest';
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null) {
    if ('message' in error && typeof error.message === 'string' && error.message.trim().length > 0) {
      return error.message;
    }
    try {
      return JSON.stringify(error);
    } catch {
      return String(error);
    }
  }
  return String(error);
}

function isHttpErrorStatus(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 400 && value <= 599;
}

function statusCodeOf(error: unknown): number | null {
  if (typeof error !== 'object' || error === null) return null;
  if ('status' in error && isHttpErrorStatus(error.status)) return error.status;
  if ('statusCode' in error && isHttpErrorStatus(error.statusCode)) return error.statusCode;
  return null;
}

/**
 * Only an explicitly labelled status counts ("status 503", "(429)"); ports
 * and addresses in connection errors must stay network errors.
 */
function statusCodeInMessage(normalized: string): number | null {
  const match = normalized.match(/\bstatus(?: code)?:?\s*([45]\d\d)\b|\(([45]\d\d)\)/);
  if (!match) return null;
  return parseInt(match[1] ?? match[2], 10);
}

/**
 * Best-effort classification of an arbitrary thrown value (fetch failure,
 * SDK error object, abort) into a TranscriptionError.
 */
export function normalizeProviderError(providerId: ProviderId, error: unknown): TranscriptionError {
  if (error instanceof TranscriptionError) {
    return error;
  }

  const message = formatErrorMessage(error);
  const normalized = message.toLowerCase();

  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return new TranscriptionError('Timeout', providerId, message, { cause: error });
  }

  const statusCode = statusCodeOf(error) ?? statusCodeInMessage(normalized);
  if (statusCode !== null) {
    return new TranscriptionError(classifyHttpStatus(statusCode), providerId, message, {
      statusCode,
      cause: error,
    });
  }

  if (
    normalized.includes('unauthorized') ||
    normalized.includes('invalid api key') ||
    normalized.includes('authentication')
  ) {
    return new TranscriptionError('MissingCredential', providerId, message, { cause: error });
  }

  if (normalized.includes('rate limit') || normalized.includes('too many')) {
    return new TranscriptionError('RateLimited', providerId, message, { cause: error });
  }

  if (normalized.includes('timed out') || normalized.includes('timeout')) {
    return new TranscriptionError('Timeout', providerId, message, { cause: error });
  }

  // fetch() rejects with TypeError for DNS, refused connections and resets
  return new TranscriptionError('NetworkError', providerId, message, { cause: error });
}
