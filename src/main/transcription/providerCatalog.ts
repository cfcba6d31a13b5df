/**
 * Static facts about each supported provider: display names, default
 * model, and the environment variable holding its API key.
 */

import type { ProviderId } from '../../shared/types';
import type { ProviderDefaults } from './types';

export const AUTO_LANGUAGE = 'auto';

export const PROVIDER_CATALOG: Record<ProviderId, ProviderDefaults> = {
  groq: {
    name: 'Groq',
    displayName: 'Groq (Whisper)',
    defaultModel: 'whisper-large-v3',
    credentialEnvVar: 'GROQ_API_KEY',
  },
  deepgram: {
    name: 'Deepgram',
    displayName: 'Deepgram',
    defaultModel: 'nova-3',
    credentialEnvVar: 'DEEPGRAM_API_KEY',
  },
  elevenlabs: {
    name: 'ElevenLabs',
    displayName: 'ElevenLabs',
    defaultModel: 'scribe_v2',
    credentialEnvVar: 'ELEVENLABS_API_KEY',
  },
  sarvam: {
    name: 'Sarvam',
    displayName: 'Sarvam AI',
    defaultModel: 'saaras:v3',
    credentialEnvVar: 'SARVAM_API_KEY',
  },
};

export function getProviderName(providerId: ProviderId): string {
  return PROVIDER_CATALOG[providerId].name;
}
