/**
 * doctor.ts - Environment health check for the voxrelay CLI
 *
 * Checks that all required and optional dependencies are available:
 * - Node.js version compatibility
 * - ffmpeg (required for microphone capture)
 * - Clipboard tool (required for delivery)
 * - Paste tool (optional, for auto-paste)
 * - Settings file validity
 * - Provider API keys (at least one of primary/fallback must be set)
 */

import { existsSync, readFileSync } from 'fs';
import type { ProviderId } from '../shared/types';
import { PROVIDER_IDS } from '../shared/types';
import { validateSettings, type ISettingsManager } from '../main/settings';
import { PROVIDER_CATALOG } from '../main/transcription/providerCatalog';
import { clipboardCommand, pasteCommand } from '../main/output/ClipboardService';
import { commandExists, execQuiet } from '../main/platform/childProcess';

// ============================================================================
// Types
// ============================================================================

export interface DoctorCheck {
  name: string;
  status: 'pass' | 'fail' | 'warn';
  message: string;
  hint?: string;
}

export interface DoctorResult {
  checks: DoctorCheck[];
  passed: number;
  warned: number;
  failed: number;
}

export interface DoctorOptions {
  settings: Pick<ISettingsManager, 'get' | 'hasApiKey'> & { getFilePath(): string };
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  nodeVersion?: string;
}

const MIN_NODE_MAJOR = 20;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Parse a semver string into [major, minor, patch].
 */
function parseSemver(version: string): [number, number, number] | null {
  const match = version.match(/(\d+)\.(\d+)\.(\d+)/);
  if (!match) return null;
  return [parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10)];
}

function installHint(platform: NodeJS.Platform, packageName: string): string {
  if (platform === 'darwin') return `brew install ${packageName}`;
  if (platform === 'win32') return `winget install ${packageName}`;
  return `apt install ${packageName} (or your package manager)`;
}

// ============================================================================
// Check functions
// ============================================================================

export function checkNodeVersion(version: string): DoctorCheck {
  const parsed = parseSemver(version);

  if (!parsed) {
    return {
      name: 'Node.js',
      status: 'warn',
      message: `Unknown version: ${version}`,
      hint: `voxrelay requires Node.js >= ${MIN_NODE_MAJOR}.0.0`,
    };
  }

  if (parsed[0] >= MIN_NODE_MAJOR) {
    return { name: 'Node.js', status: 'pass', message: `${version} (>= ${MIN_NODE_MAJOR}.0.0)` };
  }

  return {
    name: 'Node.js',
    status: 'fail',
    message: `${version} is too old`,
    hint: `voxrelay requires Node.js >= ${MIN_NODE_MAJOR}.0.0. Upgrade at https://nodejs.org`,
  };
}

async function checkFfmpeg(platform: NodeJS.Platform): Promise<DoctorCheck> {
  const stdout = await execQuiet('ffmpeg', ['-version']);

  if (stdout === null) {
    return {
      name: 'ffmpeg',
      status: 'fail',
      message: 'Not found on PATH',
      hint: `Install via: ${installHint(platform, 'ffmpeg')}`,
    };
  }

  // Extract version from first line, e.g. "ffmpeg version 6.1.1 ..."
  const versionMatch = stdout.match(/ffmpeg version (\S+)/);
  const version = versionMatch ? versionMatch[1] : 'unknown';

  return { name: 'ffmpeg', status: 'pass', message: `Installed (${version})` };
}

async function checkClipboardTool(platform: NodeJS.Platform, env: NodeJS.ProcessEnv): Promise<DoctorCheck> {
  const { command } = clipboardCommand(platform, env);
  if (await commandExists(command, platform)) {
    return { name: 'Clipboard', status: 'pass', message: `${command} available` };
  }
  return {
    name: 'Clipboard',
    status: 'fail',
    message: `${command} not found on PATH`,
    hint: `Install via: ${installHint(platform, command)}`,
  };
}

async function checkPasteTool(
  platform: NodeJS.Platform,
  env: NodeJS.ProcessEnv,
  autoPaste: boolean
): Promise<DoctorCheck> {
  const { command } = pasteCommand(platform, env);
  if (!autoPaste) {
    return { name: 'Auto-paste', status: 'pass', message: 'Disabled (autoPaste=false)' };
  }
  if (await commandExists(command, platform)) {
    return {
      name: 'Auto-paste',
      status: 'pass',
      message: `${command} available`,
      hint: platform === 'darwin' ? 'The terminal needs Accessibility permission to send keystrokes' : undefined,
    };
  }
  return {
    name: 'Auto-paste',
    status: 'warn',
    message: `${command} not found on PATH`,
    hint: `Text will only be copied. Install via: ${installHint(platform, command)}, or run \`voxrelay config set autoPaste false\``,
  };
}

export function checkSettingsFile(filePath: string): DoctorCheck {
  if (!existsSync(filePath)) {
    return { name: 'Settings', status: 'pass', message: `Using defaults (${filePath} not created yet)` };
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf8'));
    const result = validateSettings(parsed);
    if (result.success) {
      return { name: 'Settings', status: 'pass', message: filePath };
    }
    return {
      name: 'Settings',
      status: 'warn',
      message: `Invalid settings in ${filePath}; defaults are used`,
      hint: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('\n'),
    };
  } catch (error) {
    return {
      name: 'Settings',
      status: 'warn',
      message: `Unreadable settings file ${filePath}; defaults are used`,
      hint: error instanceof Error ? error.message : String(error),
    };
  }
}

export function checkProviderKeys(settings: DoctorOptions['settings']): DoctorCheck[] {
  const primary = settings.get('primaryProvider');
  const fallback = settings.get('fallbackProvider');

  const providerChecks = PROVIDER_IDS.map((providerId: ProviderId): DoctorCheck => {
    const { displayName, credentialEnvVar } = PROVIDER_CATALOG[providerId];
    const role = providerId === primary ? ' (primary)' : providerId === fallback ? ' (fallback)' : '';

    if (settings.hasApiKey(providerId)) {
      return { name: `${displayName}${role}`, status: 'pass', message: `${credentialEnvVar} is set` };
    }
    return {
      name: `${displayName}${role}`,
      status: 'warn',
      message: `${credentialEnvVar} not set`,
      hint: role ? `Set ${credentialEnvVar} to use ${displayName}` : undefined,
    };
  });

  const usable = settings.hasApiKey(primary) || (fallback !== null && settings.hasApiKey(fallback));
  const summary: DoctorCheck = usable
    ? { name: 'Transcription', status: 'pass', message: 'At least one selected provider is configured' }
    : {
        name: 'Transcription',
        status: 'fail',
        message: 'Neither the primary nor the fallback provider has an API key',
        hint: `Set ${PROVIDER_CATALOG[primary].credentialEnvVar}, or choose another provider with \`voxrelay config set primaryProvider <id>\``,
      };

  return [...providerChecks, summary];
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Run all doctor checks and return the result.
 */
export async function runDoctorChecks(options: DoctorOptions): Promise<DoctorResult> {
  const platform = options.platform ?? process.platform;
  const env = options.env ?? process.env;

  const toolChecks = await Promise.all([
    checkFfmpeg(platform),
    checkClipboardTool(platform, env),
    checkPasteTool(platform, env, options.settings.get('autoPaste')),
  ]);

  const checks = [
    checkNodeVersion(options.nodeVersion ?? process.version),
    ...toolChecks,
    checkSettingsFile(options.settings.getFilePath()),
    ...checkProviderKeys(options.settings),
  ];

  const passed = checks.filter((c) => c.status === 'pass').length;
  const warned = checks.filter((c) => c.status === 'warn').length;
  const failed = checks.filter((c) => c.status === 'fail').length;

  return { checks, passed, warned, failed };
}
