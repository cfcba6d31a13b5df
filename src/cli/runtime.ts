/**
 * runtime.ts - Wiring and one-shot operations behind the voxrelay CLI
 *
 * Builds the settings → provider clients → registry → orchestrator graph
 * for `dictate`, and runs a single file through the fallback pipeline for
 * `transcribe`.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { basename } from 'path';
import type { ProviderAttempt, ProviderId } from '../shared/types';
import { getSettingsManager, type SettingsManager } from '../main/settings';
import {
  FallbackPipeline,
  ProviderRegistry,
  createProviderClients,
  type CapturedAudio,
  type ProviderClient,
  type ProviderStatus,
} from '../main/transcription';
import { FfmpegAudioCapture, mimeTypeFromFileName, wavDurationMs, type AudioCapture } from '../main/audio';
import { ClipboardService, type OutputSink } from '../main/output';
import { CancellationToken } from '../main/cancellation/CancellationToken';
import { TranscriptionOrchestrator } from '../main/TranscriptionOrchestrator';
import { errorHandler } from '../main/ErrorHandler';

// ============================================================================
// Exit codes
// ============================================================================

export const EXIT_SUCCESS = 0;
export const EXIT_USER_ERROR = 1;
export const EXIT_SYSTEM_ERROR = 2;
export const EXIT_SIGINT = 130;

export class CLIError extends Error {
  public readonly severity: 'user' | 'system';

  constructor(message: string, severity: 'user' | 'system') {
    super(message);
    this.name = 'CLIError';
    this.severity = severity;
  }
}

export function exitCodeFor(error: unknown): number {
  return error instanceof CLIError && error.severity === 'user' ? EXIT_USER_ERROR : EXIT_SYSTEM_ERROR;
}

// ============================================================================
// Interrupts
// ============================================================================

/** Whatever must be torn down before the process exits on a signal. */
export interface ActiveOperation {
  abort(): Promise<void>;
}

export interface InterruptHandlerOptions {
  getActive: () => ActiveOperation | null;
  exit: (code: number) => void;
  onInterrupt?: () => void;
}

/**
 * Handler for SIGINT, SIGTERM and SIGHUP. Aborts the active operation and
 * waits for its cleanup (capture discard, temp file removal) before exiting
 * with 130. A second signal during cleanup exits at once.
 */
export function createInterruptHandler(options: InterruptHandlerOptions): () => Promise<void> {
  let interrupted = false;

  return async () => {
    if (interrupted) {
      options.exit(EXIT_SIGINT);
      return;
    }
    interrupted = true;
    options.onInterrupt?.();

    const active = options.getActive();
    if (active) {
      try {
        await active.abort();
      } catch (error) {
        errorHandler.log('error', 'Cleanup after interrupt failed', {
          component: 'CLI',
          operation: 'interrupt',
          data: { error: error instanceof Error ? error.message : String(error) },
        });
      }
    }
    options.exit(EXIT_SIGINT);
  };
}

// ============================================================================
// Runtime graph
// ============================================================================

export interface Runtime {
  settings: SettingsManager;
  registry: ProviderRegistry;
  capture: AudioCapture;
  sink: OutputSink;
  orchestrator: TranscriptionOrchestrator;
}

export interface RuntimeOptions {
  settings?: SettingsManager;
  clients?: Record<ProviderId, ProviderClient>;
  capture?: AudioCapture;
  sink?: OutputSink;
  /** Overrides the autoPaste setting for this run (--no-paste) */
  paste?: boolean;
}

export function createRuntime(options: RuntimeOptions = {}): Runtime {
  const settings = options.settings ?? getSettingsManager();
  const clients = options.clients ?? createProviderClients((providerId) => settings.getApiKey(providerId));
  const registry = new ProviderRegistry(settings, clients);

  const capture =
    options.capture ?? new FfmpegAudioCapture({ getDevice: () => settings.get('audioDevice') });
  const sink =
    options.sink ??
    new ClipboardService({ autoPaste: () => options.paste !== false && settings.get('autoPaste') });

  const orchestrator = new TranscriptionOrchestrator({
    capture,
    registry,
    sink,
    limits: () => ({
      providerTimeoutMs: settings.get('providerTimeoutMs'),
      minAudioDurationMs: settings.get('minAudioDurationMs'),
      maxCaptureDurationMs: settings.get('maxCaptureDurationMs'),
    }),
  });

  return { settings, registry, capture, sink, orchestrator };
}

// ============================================================================
// transcribe <file>
// ============================================================================

export interface FileTranscription {
  text: string;
  providerId: ProviderId;
  attempts: ProviderAttempt[];
}

/**
 * Read an audio file into memory as a capture would hand it over.
 */
export async function loadAudioFile(filePath: string): Promise<CapturedAudio> {
  if (!existsSync(filePath)) {
    throw new CLIError(`Audio file not found: ${filePath}`, 'user');
  }

  const data = await readFile(filePath);
  if (data.byteLength === 0) {
    throw new CLIError(`Audio file is empty: ${filePath}`, 'user');
  }

  return {
    data,
    mimeType: mimeTypeFromFileName(filePath),
    fileName: basename(filePath),
    durationMs: wavDurationMs(data),
  };
}

/**
 * Run one audio file through primary → fallback. The token lets SIGINT
 * abandon the request.
 */
export async function transcribeFile(
  filePath: string,
  deps: { registry: ProviderRegistry; settings: SettingsManager; token?: CancellationToken; pipeline?: FallbackPipeline }
): Promise<FileTranscription> {
  const audio = await loadAudioFile(filePath);
  const pipeline = deps.pipeline ?? new FallbackPipeline();

  const result = await pipeline.run({
    snapshot: deps.registry.snapshot(),
    audio,
    token: deps.token ?? new CancellationToken(),
    timeoutMs: deps.settings.get('providerTimeoutMs'),
  });

  if (result.status === 'failed') {
    const failure = errorHandler.toFailure(result.error, result.error.kind);
    const severity = failure.kind === 'MissingCredential' || failure.kind === 'InvalidRequest' ? 'user' : 'system';
    throw new CLIError(errorHandler.userMessage(failure), severity);
  }

  return { text: result.text, providerId: result.entry.providerId, attempts: result.attempts };
}

// ============================================================================
// providers
// ============================================================================

export interface ProviderReport {
  primary: string;
  fallback: string;
  promoted: boolean;
  statuses: ProviderStatus[];
}

/**
 * Summarize the registry the way the next session would see it.
 */
export function describeProviders(registry: ProviderRegistry): ProviderReport {
  const snapshot = registry.snapshot();

  const primary = snapshot.primary
    ? `${snapshot.primary.providerId} (${snapshot.primary.config.model}, language ${snapshot.primary.config.language})`
    : `${snapshot.requested.primary} (not configured)`;

  let fallback = 'none';
  if (snapshot.fallback) {
    fallback = `${snapshot.fallback.providerId} (${snapshot.fallback.config.model}, language ${snapshot.fallback.config.language})`;
  } else if (snapshot.requested.fallback && !snapshot.promoted) {
    fallback = `${snapshot.requested.fallback} (not configured)`;
  }

  return { primary, fallback, promoted: snapshot.promoted, statuses: registry.getStatuses() };
}
