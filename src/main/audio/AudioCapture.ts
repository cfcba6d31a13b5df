/**
 * AudioCapture - microphone capture behind opaque handles
 *
 * The orchestrator only sees `start() -> handle`, `stop(handle) -> audio`
 * and `discard(handle)`. The ffmpeg implementation records 16kHz mono
 * PCM WAV into a temp file; the file is read into memory and deleted
 * before `stop` returns, and deleted unread by `discard`.
 *
 * Input format per platform:
 * - macOS: avfoundation (":default" or ":<index>")
 * - Linux: pulse ("default" or a source name)
 * - Windows: dshow ("audio=<device name>")
 */

import { execFile as execFileCb, type ChildProcess } from 'child_process';
import { randomUUID } from 'crypto';
import { readFile, unlink } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { CapturedAudio } from '../transcription/types';
import { SAFE_CHILD_ENV } from '../platform/childProcess';
import { WAV_MIME_TYPE, readWavInfo } from './audioUtils';
import { createLogger } from '../logger';

const logger = createLogger('AudioCapture');

// =============================================================================
// Capability
// =============================================================================

/**
 * Opaque to callers; only the capture that issued it can use it.
 */
export interface CaptureHandle {
  readonly id: string;
  readonly startedAt: number;
}

export interface AudioCapture {
  start(): Promise<CaptureHandle>;
  /** Stop recording and return the audio; temp storage is gone on return */
  stop(handle: CaptureHandle): Promise<CapturedAudio>;
  /** Stop recording and drop the audio */
  discard(handle: CaptureHandle): Promise<void>;
}

export class CaptureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CaptureError';
  }
}

export function isCaptureError(error: unknown): error is CaptureError {
  return error instanceof CaptureError;
}

// =============================================================================
// ffmpeg implementation
// =============================================================================

export interface FfmpegAudioCaptureOptions {
  /** Read on every start so a settings change applies to the next session */
  getDevice?: () => string;
  ffmpegPath?: string;
  tempDir?: string;
  platform?: NodeJS.Platform;
  /** Grace period for ffmpeg to finalize the WAV header after SIGINT */
  stopTimeoutMs?: number;
}

interface ActiveRecording {
  handle: CaptureHandle;
  child: ChildProcess;
  outputPath: string;
  exited: Promise<void>;
  failure: Error | null;
}

/**
 * ffmpeg input arguments for the current platform.
 */
export function buildInputArgs(platform: NodeJS.Platform, device: string): string[] {
  switch (platform) {
    case 'darwin':
      return ['-f', 'avfoundation', '-i', `:${device}`];
    case 'win32':
      return ['-f', 'dshow', '-i', device.startsWith('audio=') ? device : `audio=${device}`];
    default:
      return ['-f', 'pulse', '-i', device];
  }
}

export class FfmpegAudioCapture implements AudioCapture {
  private readonly getDevice: () => string;
  private readonly ffmpegPath: string;
  private readonly tempDir: string;
  private readonly platform: NodeJS.Platform;
  private readonly stopTimeoutMs: number;
  private recordings = new Map<string, ActiveRecording>();

  constructor(options: FfmpegAudioCaptureOptions = {}) {
    this.getDevice = options.getDevice ?? (() => 'default');
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.tempDir = options.tempDir ?? tmpdir();
    this.platform = options.platform ?? process.platform;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 5_000;
  }

  async start(): Promise<CaptureHandle> {
    const handle: CaptureHandle = { id: randomUUID(), startedAt: Date.now() };
    const outputPath = join(this.tempDir, `voxrelay-${handle.id}.wav`);
    const device = this.getDevice();

    const args = [
      '-hide_banner',
      '-loglevel', 'error',
      ...buildInputArgs(this.platform, device),
      '-ar', '16000',
      '-ac', '1',
      '-acodec', 'pcm_s16le',
      '-y',
      outputPath,
    ];

    logger.info(`Starting capture: device=${device}, output=${outputPath}`);

    let markExited: () => void = () => undefined;
    const exited = new Promise<void>((resolve) => {
      markExited = resolve;
    });

    const child = execFileCb(this.ffmpegPath, args, { env: SAFE_CHILD_ENV }, (error) => {
      if (error && !error.killed) {
        recording.failure = error;
        logger.warn(`ffmpeg exited with error: ${error.message}`);
      }
      markExited();
    });
    const recording: ActiveRecording = { handle, child, outputPath, exited, failure: null };

    await this.waitForSpawn(recording);
    this.recordings.set(handle.id, recording);
    return handle;
  }

  async stop(handle: CaptureHandle): Promise<CapturedAudio> {
    const recording = this.take(handle);
    await this.terminate(recording);

    try {
      const data = await readFile(recording.outputPath);
      const info = readWavInfo(data);
      logger.info(`Capture stopped: ${data.byteLength} bytes, ${info?.durationMs ?? 0}ms`);

      if (data.byteLength === 0 && recording.failure) {
        throw new CaptureError(`Audio recording failed: ${recording.failure.message}`, {
          cause: recording.failure,
        });
      }

      return {
        data,
        mimeType: WAV_MIME_TYPE,
        fileName: 'recording.wav',
        durationMs: info?.durationMs ?? 0,
      };
    } catch (error) {
      if (isCaptureError(error)) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new CaptureError(`Audio file not readable: ${message}`, { cause: error });
    } finally {
      await this.removeTempFile(recording.outputPath);
    }
  }

  async discard(handle: CaptureHandle): Promise<void> {
    const recording = this.recordings.get(handle.id);
    if (!recording) return;

    this.recordings.delete(handle.id);
    await this.terminate(recording);
    await this.removeTempFile(recording.outputPath);
    logger.info('Capture discarded');
  }

  /**
   * Number of recordings still running (for shutdown and tests).
   */
  get activeCount(): number {
    return this.recordings.size;
  }

  private take(handle: CaptureHandle): ActiveRecording {
    const recording = this.recordings.get(handle.id);
    if (!recording) {
      throw new CaptureError(`Unknown or already released capture handle: ${handle.id}`);
    }
    this.recordings.delete(handle.id);
    return recording;
  }

  /**
   * Resolve once ffmpeg has been spawned; reject with CaptureError when the
   * binary is missing or dies before we get a handle back.
   */
  private waitForSpawn(recording: ActiveRecording): Promise<void> {
    const { child } = recording;
    return new Promise<void>((resolve, reject) => {
      const onSpawn = () => {
        child.off('error', onError);
        resolve();
      };
      const onError = (error: Error) => {
        child.off('spawn', onSpawn);
        const missing = 'code' in error && error.code === 'ENOENT';
        reject(
          new CaptureError(
            missing
              ? 'ffmpeg not found. Install ffmpeg to record audio.'
              : `Audio recording failed: ${error.message}`,
            { cause: error }
          )
        );
      };
      child.once('spawn', onSpawn);
      child.once('error', onError);
    });
  }

  /**
   * Send SIGINT so ffmpeg finalizes the WAV header, then force-kill after
   * the grace period.
   */
  private async terminate(recording: ActiveRecording): Promise<void> {
    const { child } = recording;
    if (child.exitCode !== null) return;

    const forceKill = setTimeout(() => {
      logger.warn(`Force-killing ffmpeg (${this.stopTimeoutMs}ms timeout exceeded)`);
      child.kill('SIGKILL');
    }, this.stopTimeoutMs);

    child.kill('SIGINT');
    try {
      await recording.exited;
    } finally {
      clearTimeout(forceKill);
    }
  }

  private async removeTempFile(path: string): Promise<void> {
    try {
      await unlink(path);
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        logger.warn(`Failed to delete temp audio ${path}:`, error);
      }
    }
  }
}
