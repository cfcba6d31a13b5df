/**
 * ElevenLabsClient - Scribe speech-to-text
 */

import type { CapturedAudio, ProviderClient, TranscribeOptions } from '../types';
import { TranscriptionError } from '../errors';
import { AUTO_LANGUAGE, PROVIDER_CATALOG } from '../providerCatalog';
import { createLogger } from '../../logger';
import { isJsonObject, postMultipart, requireText } from './http';
import type { ApiKeyClientOptions } from './GroqClient';

const logger = createLogger('ElevenLabsClient');

export const ELEVENLABS_STT_URL = 'https://api.elevenlabs.io/v1/speech-to-text';

/**
 * Scribe returns `text` plus per-word timings; older responses only carry
 * the words, so fall back to joining them.
 */
function extractText(body: unknown): string | null {
  if (!isJsonObject(body)) return null;

  if (typeof body.text === 'string') {
    return body.text;
  }

  if (Array.isArray(body.words)) {
    const words: string[] = [];
    for (const word of body.words) {
      if (isJsonObject(word) && typeof word.text === 'string') {
        words.push(word.text);
      }
    }
    return words.join(' ');
  }

  return null;
}

export class ElevenLabsClient implements ProviderClient {
  readonly id = 'elevenlabs' as const;
  readonly displayName = PROVIDER_CATALOG.elevenlabs.displayName;

  private readonly getApiKey: () => string | null;
  private readonly url: string;

  constructor(options: ApiKeyClientOptions) {
    this.getApiKey = options.getApiKey;
    this.url = options.baseUrl ?? ELEVENLABS_STT_URL;
  }

  isConfigured(): boolean {
    return this.getApiKey() !== null;
  }

  async transcribe(audio: CapturedAudio, options: TranscribeOptions): Promise<string> {
    const apiKey = this.getApiKey();
    if (!apiKey) {
      throw new TranscriptionError('MissingCredential', this.id, 'ElevenLabs API key not configured');
    }

    const autoDetect = options.language === AUTO_LANGUAGE;
    logger.info(
      `STT request: model=${options.model} language=${autoDetect ? 'auto' : options.language} bytes=${audio.data.byteLength}`
    );

    const body = await postMultipart({
      providerId: this.id,
      url: this.url,
      headers: { 'xi-api-key': apiKey, Accept: 'application/json' },
      audio,
      fields: {
        model_id: options.model,
        language_code: autoDetect ? undefined : options.language,
        tag_audio_events: 'false',
      },
      signal: options.signal,
    });

    const text = extractText(body);
    if (text === null) {
      throw new TranscriptionError('InvalidResponse', this.id, 'Failed to parse response: missing "text"');
    }
    return requireText(this.id, text);
  }
}
