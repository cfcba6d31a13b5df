/**
 * TerminalActivationSource - key presses on a raw-mode TTY as activation events
 *
 * Bindings:
 * - Space: activate / stop (toggle mode), hold to record (hold mode)
 * - Esc: cancel
 * - Ctrl+C: quit
 *
 * A terminal never reports key releases. In hold mode the key's auto-repeat
 * stands in for "still held": once no repeat has arrived for
 * `holdReleaseMs` the key counts as released and a hold StopSignal is sent.
 * The window has to cover the keyboard's initial repeat delay (typically
 * 250-660ms).
 */

import { EventEmitter } from 'events';
import type { ActivationEvent, ActivationMode } from '../../shared/types';
import { createLogger } from '../logger';

const logger = createLogger('Activation');

export const KEY_SPACE = ' ';
export const KEY_ESCAPE = '\u001b';
export const KEY_CTRL_C = '\u0003';

export const DEFAULT_HOLD_RELEASE_MS = 800;

/**
 * The subset of a TTY read stream the source needs.
 */
export interface KeyInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  on(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
  off(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

export interface TerminalActivationSourceOptions {
  input: KeyInput;
  /** Read on every press so a mode change applies to the next session */
  getMode: () => ActivationMode;
  /** Whether a session is currently capturing (decides activate vs stop) */
  isCapturing: () => boolean;
  holdReleaseMs?: number;
}

export class TerminalActivationSource {
  private readonly input: KeyInput;
  private readonly getMode: () => ActivationMode;
  private readonly isCapturing: () => boolean;
  private readonly holdReleaseMs: number;
  private readonly emitter = new EventEmitter();

  private listening = false;
  private holdTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly onData = (chunk: string | Buffer): void => {
    const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
    for (const key of splitKeys(text)) {
      this.handleKey(key);
    }
  };

  constructor(options: TerminalActivationSourceOptions) {
    this.input = options.input;
    this.getMode = options.getMode;
    this.isCapturing = options.isCapturing;
    this.holdReleaseMs = options.holdReleaseMs ?? DEFAULT_HOLD_RELEASE_MS;
  }

  /**
   * Put the terminal in raw mode and start listening.
   */
  start(): void {
    if (this.listening) return;
    this.listening = true;

    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(true);
    } else {
      logger.warn('Input is not a TTY; key releases and Esc may not be detected');
    }
    this.input.setEncoding('utf8');
    this.input.on('data', this.onData);
    this.input.resume();
  }

  /**
   * Restore the terminal and stop listening.
   */
  stop(): void {
    if (!this.listening) return;
    this.listening = false;

    this.clearHoldTimer();
    this.input.off('data', this.onData);
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(false);
    }
    this.input.pause();
  }

  onEvent(callback: (event: ActivationEvent) => void): () => void {
    this.emitter.on('event', callback);
    return () => {
      this.emitter.off('event', callback);
    };
  }

  onQuit(callback: () => void): () => void {
    this.emitter.on('quit', callback);
    return () => {
      this.emitter.off('quit', callback);
    };
  }

  /**
   * Interpret one key press.
   */
  handleKey(key: string): void {
    switch (key) {
      case KEY_CTRL_C:
        this.clearHoldTimer();
        this.emitter.emit('quit');
        return;
      case KEY_ESCAPE:
        this.clearHoldTimer();
        this.emitEvent({ type: 'cancel' });
        return;
      case KEY_SPACE:
        if (this.getMode() === 'hold') {
          this.handleHoldPress();
        } else {
          this.emitEvent(this.isCapturing() ? { type: 'stop', mode: 'toggle' } : { type: 'activate', mode: 'toggle' });
        }
        return;
      default:
        logger.debug(`Unbound key: ${JSON.stringify(key)}`);
    }
  }

  private handleHoldPress(): void {
    if (this.holdTimer) {
      // Auto-repeat while held
      this.armHoldTimer();
      return;
    }

    if (this.isCapturing()) {
      // A stray press while a toggle-started session is recording
      return;
    }

    this.emitEvent({ type: 'activate', mode: 'hold' });
    this.armHoldTimer();
  }

  private armHoldTimer(): void {
    this.clearHoldTimer();
    this.holdTimer = setTimeout(() => {
      this.holdTimer = null;
      this.emitEvent({ type: 'stop', mode: 'hold' });
    }, this.holdReleaseMs);
  }

  private clearHoldTimer(): void {
    if (this.holdTimer) {
      clearTimeout(this.holdTimer);
      this.holdTimer = null;
    }
  }

  private emitEvent(event: ActivationEvent): void {
    logger.debug(`Activation event: ${event.type}${'mode' in event ? ` (${event.mode})` : ''}`);
    this.emitter.emit('event', event);
  }
}

/**
 * Split a raw-mode data chunk into keys. Escape sequences (arrows, function
 * keys) stay whole so they do not read as a bare Esc.
 */
export function splitKeys(chunk: string): string[] {
  const keys: string[] = [];
  let index = 0;

  while (index < chunk.length) {
    const char = chunk[index];
    if (char === KEY_ESCAPE && index + 1 < chunk.length && (chunk[index + 1] === '[' || chunk[index + 1] === 'O')) {
      let end = index + 2;
      while (end < chunk.length && !/[A-Za-z~]/.test(chunk[end])) {
        end++;
      }
      keys.push(chunk.slice(index, Math.min(end + 1, chunk.length)));
      index = end + 1;
      continue;
    }
    keys.push(char);
    index++;
  }

  return keys;
}
