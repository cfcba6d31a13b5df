/**
 * Settings Module
 *
 * Exports the SettingsManager for persistent settings storage and
 * environment-backed API key lookup.
 */

export {
  SettingsManager,
  SettingsError,
  SettingsSchema,
  getSettingsManager,
  createSettingsManager,
  parseSettingValue,
  validateSettings,
  DEFAULT_SETTINGS,
  SETTINGS_FILE_NAME,
} from './SettingsManager';

export type {
  AppSettings,
  ProviderSettings,
  ISettingsManager,
  SettingsManagerOptions,
} from './SettingsManager';
