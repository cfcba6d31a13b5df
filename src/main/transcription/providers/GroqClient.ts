/**
 * GroqClient - Whisper transcription through Groq's OpenAI-compatible API
 */

import type { CapturedAudio, ProviderClient, TranscribeOptions } from '../types';
import { TranscriptionError } from '../errors';
import { AUTO_LANGUAGE, PROVIDER_CATALOG } from '../providerCatalog';
import { createLogger } from '../../logger';
import { postMultipart, readStringField, requireText } from './http';

const logger = createLogger('GroqClient');

export const GROQ_TRANSCRIPTIONS_URL = 'https://api.groq.com/openai/v1/audio/transcriptions';

export interface ApiKeyClientOptions {
  /** Read on every call so key changes apply to the next session */
  getApiKey: () => string | null;
  baseUrl?: string;
}

export class GroqClient implements ProviderClient {
  readonly id = 'groq' as const;
  readonly displayName = PROVIDER_CATALOG.groq.displayName;

  private readonly getApiKey: () => string | null;
  private readonly url: string;

  constructor(options: ApiKeyClientOptions) {
    this.getApiKey = options.getApiKey;
    this.url = options.baseUrl ?? GROQ_TRANSCRIPTIONS_URL;
  }

  isConfigured(): boolean {
    return this.getApiKey() !== null;
  }

  async transcribe(audio: CapturedAudio, options: TranscribeOptions): Promise<string> {
    const apiKey = this.getApiKey();
    if (!apiKey) {
      throw new TranscriptionError('MissingCredential', this.id, 'Groq API key not configured');
    }

    logger.info(`STT request: model=${options.model} file=${audio.fileName} bytes=${audio.data.byteLength}`);

    const body = await postMultipart({
      providerId: this.id,
      url: this.url,
      headers: { Authorization: `Bearer ${apiKey}` },
      audio,
      fields: {
        model: options.model,
        language: options.language === AUTO_LANGUAGE ? undefined : options.language,
        response_format: 'json',
      },
      signal: options.signal,
    });

    return requireText(this.id, readStringField(this.id, body, 'text'));
  }
}
