/**
 * SarvamClient - Saaras speech-to-text for Indian languages
 */

import type { CapturedAudio, ProviderClient, TranscribeOptions } from '../types';
import { TranscriptionError } from '../errors';
import { AUTO_LANGUAGE, PROVIDER_CATALOG } from '../providerCatalog';
import { createLogger } from '../../logger';
import { postMultipart, readStringField, requireText } from './http';
import type { ApiKeyClientOptions } from './GroqClient';

const logger = createLogger('SarvamClient');

export const SARVAM_STT_URL = 'https://api.sarvam.ai/speech-to-text';

/** Sarvam's own spelling of "detect the language" */
const SARVAM_AUTO_LANGUAGE = 'unknown';

export class SarvamClient implements ProviderClient {
  readonly id = 'sarvam' as const;
  readonly displayName = PROVIDER_CATALOG.sarvam.displayName;

  private readonly getApiKey: () => string | null;
  private readonly url: string;

  constructor(options: ApiKeyClientOptions) {
    this.getApiKey = options.getApiKey;
    this.url = options.baseUrl ?? SARVAM_STT_URL;
  }

  isConfigured(): boolean {
    return this.getApiKey() !== null;
  }

  async transcribe(audio: CapturedAudio, options: TranscribeOptions): Promise<string> {
    const apiKey = this.getApiKey();
    if (!apiKey) {
      throw new TranscriptionError('MissingCredential', this.id, 'Sarvam API key not configured');
    }

    const language = options.language === AUTO_LANGUAGE ? SARVAM_AUTO_LANGUAGE : options.language;
    logger.info(`STT request: model=${options.model} language=${language} bytes=${audio.data.byteLength}`);

    const body = await postMultipart({
      providerId: this.id,
      url: this.url,
      headers: { 'api-subscription-key': apiKey },
      audio,
      fields: {
        model: options.model,
        language_code: language,
      },
      signal: options.signal,
    });

    return requireText(this.id, readStringField(this.id, body, 'transcript'));
  }
}
