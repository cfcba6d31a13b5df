/**
 * Provider client construction.
 */

import type { ProviderId } from '../../../shared/types';
import type { ProviderClient } from '../types';
import { GroqClient } from './GroqClient';
import { DeepgramClient } from './DeepgramClient';
import { ElevenLabsClient } from './ElevenLabsClient';
import { SarvamClient } from './SarvamClient';

export { GroqClient, GROQ_TRANSCRIPTIONS_URL } from './GroqClient';
export type { ApiKeyClientOptions } from './GroqClient';
export { DeepgramClient } from './DeepgramClient';
export type { DeepgramClientOptions } from './DeepgramClient';
export { ElevenLabsClient, ELEVENLABS_STT_URL } from './ElevenLabsClient';
export { SarvamClient, SARVAM_STT_URL } from './SarvamClient';

/**
 * Create one client per provider, each reading its key through `getApiKey`.
 */
export function createProviderClients(
  getApiKey: (providerId: ProviderId) => string | null
): Record<ProviderId, ProviderClient> {
  return {
    groq: new GroqClient({ getApiKey: () => getApiKey('groq') }),
    deepgram: new DeepgramClient({ getApiKey: () => getApiKey('deepgram') }),
    elevenlabs: new ElevenLabsClient({ getApiKey: () => getApiKey('elevenlabs') }),
    sarvam: new SarvamClient({ getApiKey: () => getApiKey('sarvam') }),
  };
}
