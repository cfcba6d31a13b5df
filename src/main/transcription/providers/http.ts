/**
 * Multipart upload helper shared by the HTTP-only provider clients.
 *
 * Turns every failure into a TranscriptionError: non-2xx statuses are
 * classified by code, bodies that are not JSON are InvalidResponse, and
 * anything fetch() throws is a network error or an abort.
 */

import type { ProviderId } from '../../../shared/types';
import type { CapturedAudio } from '../types';
import { TranscriptionError, classifyHttpStatus, normalizeProviderError } from '../errors';
import { createLogger } from '../../logger';

const logger = createLogger('ProviderHttp');

/** Longest slice of an error body kept in messages */
const MAX_ERROR_BODY_CHARS = 300;

export interface MultipartRequest {
  providerId: ProviderId;
  url: string;
  headers: Record<string, string>;
  audio: CapturedAudio;
  fields: Record<string, string | undefined>;
  signal?: AbortSignal;
}

export function buildAudioForm(audio: CapturedAudio, fields: Record<string, string | undefined>): FormData {
  const form = new FormData();
  form.append('file', new Blob([audio.data], { type: audio.mimeType }), audio.fileName);

  for (const [name, value] of Object.entries(fields)) {
    if (value !== undefined) {
      form.append(name, value);
    }
  }

  return form;
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function truncate(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > MAX_ERROR_BODY_CHARS ? `${trimmed.slice(0, MAX_ERROR_BODY_CHARS)}…` : trimmed;
}

/**
 * POST the audio as multipart/form-data and return the parsed JSON body.
 */
export async function postMultipart(request: MultipartRequest): Promise<unknown> {
  const { providerId, url, headers, audio, fields, signal } = request;

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers,
      body: buildAudioForm(audio, fields),
      signal,
    });
  } catch (error) {
    throw normalizeProviderError(providerId, error);
  }

  let body: string;
  try {
    body = await response.text();
  } catch (error) {
    throw normalizeProviderError(providerId, error);
  }

  if (!response.ok) {
    logger.warn(`${providerId} returned HTTP ${response.status}`);
    throw new TranscriptionError(
      classifyHttpStatus(response.status),
      providerId,
      `API error (${response.status}): ${truncate(body) || response.statusText}`,
      { statusCode: response.status }
    );
  }

  try {
    return JSON.parse(body);
  } catch (error) {
    throw new TranscriptionError('InvalidResponse', providerId, 'Invalid response from server', {
      statusCode: response.status,
      cause: error,
    });
  }
}

/**
 * Read a string property from a parsed JSON body, or throw InvalidResponse.
 */
export function readStringField(providerId: ProviderId, body: unknown, field: string): string {
  if (isJsonObject(body)) {
    const value = body[field];
    if (typeof value === 'string') {
      return value;
    }
  }
  throw new TranscriptionError('InvalidResponse', providerId, `Failed to parse response: missing "${field}"`);
}

/**
 * Shared empty-result check. A whitespace-only transcript is fatal for the
 * attempt: another provider would hear the same silence.
 */
export function requireText(providerId: ProviderId, text: string): string {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new TranscriptionError('EmptyTranscription', providerId, 'Transcription returned empty text');
  }
  return trimmed;
}
