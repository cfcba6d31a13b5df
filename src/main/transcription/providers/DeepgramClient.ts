/**
 * DeepgramClient - Prerecorded transcription via the Deepgram SDK
 *
 * Uses the listen.prerecorded API with the whole utterance in memory.
 * The SDK does not accept an AbortSignal, so a cancelled or timed-out
 * request runs to completion in the background and its result is dropped
 * by the caller.
 */

import { createClient } from '@deepgram/sdk';
import type { DeepgramClient as DeepgramSdkClient } from '@deepgram/sdk';
import type { CapturedAudio, ProviderClient, TranscribeOptions } from '../types';
import { TranscriptionError, classifyHttpStatus, formatErrorMessage, normalizeProviderError } from '../errors';
import { AUTO_LANGUAGE, PROVIDER_CATALOG } from '../providerCatalog';
import { createLogger } from '../../logger';
import { isJsonObject, requireText } from './http';
import type { ApiKeyClientOptions } from './GroqClient';

const logger = createLogger('DeepgramClient');

export interface DeepgramClientOptions extends Omit<ApiKeyClientOptions, 'baseUrl'> {
  createSdkClient?: (apiKey: string) => DeepgramSdkClient;
}

/**
 * Pull the first alternative's transcript out of a prerecorded response.
 */
function extractTranscript(result: unknown): string | null {
  if (!isJsonObject(result) || !isJsonObject(result.results)) return null;

  const channels = result.results.channels;
  if (!Array.isArray(channels) || channels.length === 0) return null;

  const channel: unknown = channels[0];
  if (!isJsonObject(channel) || !Array.isArray(channel.alternatives) || channel.alternatives.length === 0) {
    return null;
  }

  const alternative: unknown = channel.alternatives[0];
  if (!isJsonObject(alternative) || typeof alternative.transcript !== 'string') {
    return null;
  }
  return alternative.transcript;
}

/**
 * SDK errors for HTTP failures carry the status on the error object.
 */
function classifySdkError(error: unknown): TranscriptionError {
  if (isJsonObject(error) && typeof error.status === 'number') {
    const status = error.status;
    return new TranscriptionError(
      classifyHttpStatus(status),
      'deepgram',
      `API error (${status}): ${formatErrorMessage(error)}`,
      { statusCode: status, cause: error }
    );
  }
  return normalizeProviderError('deepgram', error);
}

export class DeepgramClient implements ProviderClient {
  readonly id = 'deepgram' as const;
  readonly displayName = PROVIDER_CATALOG.deepgram.displayName;

  private readonly getApiKey: () => string | null;
  private readonly createSdkClient: (apiKey: string) => DeepgramSdkClient;
  private sdkClient: DeepgramSdkClient | null = null;
  private sdkClientKey: string | null = null;

  constructor(options: DeepgramClientOptions) {
    this.getApiKey = options.getApiKey;
    this.createSdkClient = options.createSdkClient ?? ((apiKey) => createClient(apiKey));
  }

  isConfigured(): boolean {
    return this.getApiKey() !== null;
  }

  async transcribe(audio: CapturedAudio, options: TranscribeOptions): Promise<string> {
    const apiKey = this.getApiKey();
    if (!apiKey) {
      throw new TranscriptionError('MissingCredential', this.id, 'Deepgram API key not configured');
    }

    const autoDetect = options.language === AUTO_LANGUAGE;
    logger.info(
      `STT request: model=${options.model} language=${autoDetect ? 'auto' : options.language} bytes=${audio.data.byteLength}`
    );

    const response = await this.getSdkClient(apiKey)
      .listen.prerecorded.transcribeFile(audio.data, {
        model: options.model,
        ...(autoDetect ? { detect_language: true } : { language: options.language }),
        smart_format: true,
        punctuate: true,
      })
      .catch((error: unknown) => {
        throw classifySdkError(error);
      });

    if (response.error) {
      throw classifySdkError(response.error);
    }

    const transcript = extractTranscript(response.result);
    if (transcript === null) {
      throw new TranscriptionError('InvalidResponse', this.id, 'Invalid response from server');
    }
    return requireText(this.id, transcript);
  }

  /**
   * Reuse the SDK client while the key stays the same.
   */
  private getSdkClient(apiKey: string): DeepgramSdkClient {
    if (!this.sdkClient || this.sdkClientKey !== apiKey) {
      this.sdkClient = this.createSdkClient(apiKey);
      this.sdkClientKey = apiKey;
    }
    return this.sdkClient;
  }
}
