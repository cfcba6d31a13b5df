/**
 * SettingsManager - Persistent settings storage for voxrelay
 *
 * Handles:
 * - JSON settings file under the voxrelay home directory, stored through conf
 *   and validated with zod
 * - Defaults for missing keys; an unreadable or invalid file falls back to defaults
 * - API keys resolved from environment variables (never written to disk)
 * - Change event emission so the next session picks up new values
 */

import { join, parse } from 'path';
import Conf from 'conf';
import { z } from 'zod';
import { createLogger, getVoxrelayHome } from '../logger';
import { AUTO_LANGUAGE, PROVIDER_CATALOG } from '../transcription/providerCatalog';
import type { ProviderId } from '../../shared/types';

const logger = createLogger('SettingsManager');

// ============================================================================
// Schema
// ============================================================================

const ProviderIdSchema = z.enum(['groq', 'deepgram', 'elevenlabs', 'sarvam']);

const ProviderSettingsSchema = z.object({
  model: z.string().min(1),
  language: z.string().min(1),
});

export const SettingsSchema = z.object({
  primaryProvider: ProviderIdSchema,
  fallbackProvider: ProviderIdSchema.nullable(),
  providerTimeoutMs: z.number().int().min(1_000).max(120_000),
  minAudioDurationMs: z.number().int().min(0).max(10_000),
  maxCaptureDurationMs: z.number().int().min(5_000).max(30 * 60_000),
  activationMode: z.enum(['toggle', 'hold']),
  autoPaste: z.boolean(),
  audioDevice: z.string().min(1),
  providers: z.object({
    groq: ProviderSettingsSchema,
    deepgram: ProviderSettingsSchema,
    elevenlabs: ProviderSettingsSchema,
    sarvam: ProviderSettingsSchema,
  }),
});

export type AppSettings = z.infer<typeof SettingsSchema>;
export type ProviderSettings = z.infer<typeof ProviderSettingsSchema>;

type SettingsChangeCallback = (key: string, newValue: unknown, oldValue: unknown) => void;

export interface ISettingsManager {
  get<K extends keyof AppSettings>(key: K): AppSettings[K];
  set<K extends keyof AppSettings>(key: K, value: AppSettings[K]): void;
  getAll(): AppSettings;
  reset(): void;
  getProviderSettings(providerId: ProviderId): ProviderSettings;
  getApiKey(providerId: ProviderId): string | null;
  hasApiKey(providerId: ProviderId): boolean;
  onChange(callback: SettingsChangeCallback): () => void;
}

// ============================================================================
// Constants
// ============================================================================

export const SETTINGS_FILE_NAME = 'settings.json';

export const DEFAULT_SETTINGS: AppSettings = {
  primaryProvider: 'groq',
  fallbackProvider: null,
  providerTimeoutMs: 20_000,
  minAudioDurationMs: 500,
  maxCaptureDurationMs: 5 * 60_000,
  activationMode: 'toggle',
  autoPaste: true,
  audioDevice: 'default',
  providers: {
    groq: { model: PROVIDER_CATALOG.groq.defaultModel, language: AUTO_LANGUAGE },
    deepgram: { model: PROVIDER_CATALOG.deepgram.defaultModel, language: AUTO_LANGUAGE },
    elevenlabs: { model: PROVIDER_CATALOG.elevenlabs.defaultModel, language: AUTO_LANGUAGE },
    sarvam: { model: PROVIDER_CATALOG.sarvam.defaultModel, language: AUTO_LANGUAGE },
  },
};

export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SettingsError';
  }
}

// ============================================================================
// Helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cloneSettings(settings: AppSettings): AppSettings {
  return SettingsSchema.parse(JSON.parse(JSON.stringify(settings)));
}

/**
 * Overlay a raw settings object onto the defaults, one level deep for the
 * per-provider block.
 */
function mergeWithDefaults(raw: Record<string, unknown>): Record<string, unknown> {
  const rawProviders = isRecord(raw.providers) ? raw.providers : {};
  const providers: Record<string, unknown> = {};

  for (const [id, defaults] of Object.entries(DEFAULT_SETTINGS.providers)) {
    const override = rawProviders[id];
    providers[id] = isRecord(override) ? { ...defaults, ...override } : { ...defaults };
  }

  return { ...DEFAULT_SETTINGS, ...raw, providers };
}

/**
 * Validate a raw settings object the way a settings file is loaded:
 * missing keys take their defaults.
 */
export function validateSettings(raw: unknown): ReturnType<typeof SettingsSchema.safeParse> {
  return SettingsSchema.safeParse(isRecord(raw) ? mergeWithDefaults(raw) : raw);
}

/**
 * Parse a CLI string into the JSON value it most plausibly means.
 * "null", booleans and numbers are converted; everything else stays a string.
 */
export function parseSettingValue(raw: string): unknown {
  const trimmed = raw.trim();
  if (trimmed === 'null' || trimmed === 'none') return null;
  if (trimmed === 'true') return true;
  if (trimmed === 'false') return false;
  if (/^-?\d+(\.\d+)?$/.test(trimmed)) return Number(trimmed);
  return trimmed;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

// ============================================================================
// Implementation
// ============================================================================

export interface SettingsManagerOptions {
  /** Absolute path of the settings file (default: <home>/settings.json) */
  filePath?: string;
  /** Environment used for API key lookup (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Keep settings in memory only */
  persist?: boolean;
}

type RawStore = Conf<Record<string, unknown>>;

/**
 * Open the conf store behind a settings file. A file that is not JSON is
 * reported and then read as empty, so the first `set` replaces it.
 */
function openStore(filePath: string): RawStore {
  const { dir, name, ext } = parse(filePath);
  const storeOptions = { cwd: dir, configName: name, fileExtension: ext.replace(/^\./, '') };

  try {
    return new Conf<Record<string, unknown>>(storeOptions);
  } catch (error) {
    logger.warn(`Could not read ${filePath}, using defaults:`, error);
    return new Conf<Record<string, unknown>>({ ...storeOptions, clearInvalidConfig: true });
  }
}

export class SettingsManager implements ISettingsManager {
  private settings: AppSettings;
  private readonly filePath: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly store: RawStore | null;
  private changeCallbacks: Set<SettingsChangeCallback> = new Set();

  constructor(options: SettingsManagerOptions = {}) {
    this.filePath = options.filePath ?? join(getVoxrelayHome(), SETTINGS_FILE_NAME);
    this.env = options.env ?? process.env;
    this.store = (options.persist ?? true) ? openStore(this.filePath) : null;
    this.settings = this.store ? this.load(this.store) : cloneSettings(DEFAULT_SETTINGS);
  }

  getFilePath(): string {
    return this.filePath;
  }

  // --------------------------------------------------------------------------
  // Core Methods
  // --------------------------------------------------------------------------

  get<K extends keyof AppSettings>(key: K): AppSettings[K] {
    return this.settings[key];
  }

  /**
   * Set a single setting. Throws SettingsError if the resulting settings
   * would not validate.
   */
  set<K extends keyof AppSettings>(key: K, value: AppSettings[K]): void {
    const oldValue = this.settings[key];
    const candidate: unknown = { ...this.settings, [key]: value };
    this.apply(candidate, key, value, oldValue);
  }

  /**
   * Set a value addressed by a dotted path (e.g. `providers.groq.model`)
   * from its string form. Used by `voxrelay config set`.
   */
  setByPath(path: string, rawValue: string): void {
    const segments = path.split('.').filter((segment) => segment.length > 0);
    if (segments.length === 0) {
      throw new SettingsError('Setting key must not be empty');
    }

    const candidate: unknown = JSON.parse(JSON.stringify(this.settings));
    let cursor: unknown = candidate;
    for (const segment of segments.slice(0, -1)) {
      if (!isRecord(cursor) || !(segment in cursor)) {
        throw new SettingsError(`Unknown setting: ${path}`);
      }
      cursor = cursor[segment];
    }

    const leaf = segments[segments.length - 1];
    if (!isRecord(cursor) || !(leaf in cursor)) {
      throw new SettingsError(`Unknown setting: ${path}`);
    }

    const oldValue = cursor[leaf];
    const newValue = parseSettingValue(rawValue);
    cursor[leaf] = newValue;
    this.apply(candidate, path, newValue, oldValue);
  }

  /**
   * Read a value addressed by a dotted path. Returns undefined for unknown keys.
   */
  getByPath(path: string): unknown {
    let cursor: unknown = this.settings;
    for (const segment of path.split('.')) {
      if (!isRecord(cursor) || !(segment in cursor)) {
        return undefined;
      }
      cursor = cursor[segment];
    }
    return cursor;
  }

  getAll(): AppSettings {
    return cloneSettings(this.settings);
  }

  reset(): void {
    const oldSettings = this.settings;
    this.settings = cloneSettings(DEFAULT_SETTINGS);
    this.save();

    for (const key of SettingsSchema.keyof().options) {
      if (JSON.stringify(oldSettings[key]) !== JSON.stringify(this.settings[key])) {
        this.emitChange(key, this.settings[key], oldSettings[key]);
      }
    }

    logger.info('Reset to defaults');
  }

  getProviderSettings(providerId: ProviderId): ProviderSettings {
    return { ...this.settings.providers[providerId] };
  }

  // --------------------------------------------------------------------------
  // Credentials
  // --------------------------------------------------------------------------

  /**
   * API keys come from the environment only. Empty values count as absent.
   */
  getApiKey(providerId: ProviderId): string | null {
    const value = this.env[PROVIDER_CATALOG[providerId].credentialEnvVar];
    if (!value) return null;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }

  hasApiKey(providerId: ProviderId): boolean {
    return this.getApiKey(providerId) !== null;
  }

  // --------------------------------------------------------------------------
  // Events
  // --------------------------------------------------------------------------

  onChange(callback: SettingsChangeCallback): () => void {
    this.changeCallbacks.add(callback);
    return () => {
      this.changeCallbacks.delete(callback);
    };
  }

  private emitChange(key: string, newValue: unknown, oldValue: unknown): void {
    for (const callback of this.changeCallbacks) {
      try {
        callback(key, newValue, oldValue);
      } catch (error) {
        logger.error('Error in change callback:', error);
      }
    }
  }

  // --------------------------------------------------------------------------
  // Persistence
  // --------------------------------------------------------------------------

  private apply(candidate: unknown, key: string, newValue: unknown, oldValue: unknown): void {
    const result = SettingsSchema.safeParse(candidate);
    if (!result.success) {
      throw new SettingsError(`Invalid value for ${key}: ${formatIssues(result.error)}`);
    }

    this.settings = result.data;
    this.save();
    this.emitChange(key, newValue, oldValue);
    logger.info(`Set ${key}:`, newValue);
  }

  private load(store: RawStore): AppSettings {
    const result = validateSettings({ ...store.store });
    if (!result.success) {
      logger.warn(`Invalid settings in ${this.filePath} (${formatIssues(result.error)}), using defaults`);
      return cloneSettings(DEFAULT_SETTINGS);
    }

    return result.data;
  }

  private save(): void {
    if (this.store) {
      this.store.store = this.settings;
    }
  }
}

// ============================================================================
// Singleton Access
// ============================================================================

let instance: SettingsManager | null = null;

export function getSettingsManager(): SettingsManager {
  if (!instance) {
    instance = new SettingsManager();
  }
  return instance;
}

export function createSettingsManager(options: SettingsManagerOptions = {}): SettingsManager {
  return new SettingsManager(options);
}
