/**
 * ProviderRegistry - primary/fallback selection
 *
 * Pure lookup over the current settings and the provider clients. A new
 * snapshot is taken for every session, so changing the selected provider,
 * its model or its API key applies to the next utterance without a restart.
 *
 * Rules:
 * - an unconfigured provider is treated as absent
 * - an unconfigured primary is replaced by a configured fallback (promotion)
 * - a fallback equal to the primary is ignored
 */

import { PROVIDER_IDS } from '../../shared/types';
import type { ProviderId, ProviderRole } from '../../shared/types';
import type { ISettingsManager } from '../settings';
import type { ProviderClient, ProviderEntry, ProviderStatus, RegistrySnapshot } from './types';
import { PROVIDER_CATALOG } from './providerCatalog';
import { createLogger } from '../logger';

const logger = createLogger('ProviderRegistry');

export type RegistrySettings = Pick<ISettingsManager, 'get' | 'getProviderSettings'>;

export class ProviderRegistry {
  private readonly settings: RegistrySettings;
  private readonly clients: Record<ProviderId, ProviderClient>;

  constructor(settings: RegistrySettings, clients: Record<ProviderId, ProviderClient>) {
    this.settings = settings;
    this.clients = clients;
  }

  /**
   * Resolve the providers for one session.
   */
  snapshot(): RegistrySnapshot {
    const primaryId = this.settings.get('primaryProvider');
    const configuredFallback = this.settings.get('fallbackProvider');
    const fallbackId = configuredFallback === primaryId ? null : configuredFallback;
    const requested = { primary: primaryId, fallback: fallbackId };

    const primary = this.entry(primaryId, 'primary');
    const fallback = fallbackId ? this.entry(fallbackId, 'fallback') : null;
    const usableFallback = fallback?.isConfigured ? fallback : null;

    if (primary.isConfigured) {
      return { primary, fallback: usableFallback, promoted: false, requested };
    }

    if (usableFallback) {
      logger.info(`Primary ${primaryId} not configured, promoting ${usableFallback.providerId}`);
      return {
        primary: { ...usableFallback, role: 'primary' },
        fallback: null,
        promoted: true,
        requested,
      };
    }

    logger.warn(`No configured provider (primary=${primaryId}, fallback=${fallbackId ?? 'none'})`);
    return { primary: null, fallback: null, promoted: false, requested };
  }

  /**
   * Configuration status of every known provider, for `voxrelay providers`
   * and `voxrelay doctor`.
   */
  getStatuses(): ProviderStatus[] {
    return PROVIDER_IDS.map((providerId) => {
      const configured = this.clients[providerId].isConfigured();
      return {
        providerId,
        displayName: PROVIDER_CATALOG[providerId].displayName,
        configured,
        reason: configured ? undefined : `${PROVIDER_CATALOG[providerId].credentialEnvVar} not set`,
      };
    });
  }

  private entry(providerId: ProviderId, role: ProviderRole): ProviderEntry {
    const client = this.clients[providerId];
    return {
      role,
      providerId,
      client,
      isConfigured: client.isConfigured(),
      config: this.settings.getProviderSettings(providerId),
    };
  }
}
