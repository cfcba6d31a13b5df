/**
 * DictationLoop.ts - Interactive session loop for `voxrelay dictate`
 *
 * Connects a TerminalActivationSource to the orchestrator and reports
 * session progress through callbacks. Runs until the user quits.
 */

import type { ActivationMode, SessionOutcome, SessionState } from '../shared/types';
import type { TranscriptionOrchestrator } from '../main/TranscriptionOrchestrator';
import { TerminalActivationSource, type KeyInput } from '../main/activation/TerminalActivationSource';

// ============================================================================
// Types
// ============================================================================

export interface DictationLoopOptions {
  input: KeyInput;
  getMode: () => ActivationMode;
  holdReleaseMs?: number;
}

export interface DictationLoopCallbacks {
  onLog: (message: string) => void;
  onStateChange: (state: SessionState) => void;
  onFallback: (primary: string, fallback: string, reason: string) => void;
  onSessionEnded: (outcome: SessionOutcome) => void;
}

// ============================================================================
// DictationLoop Class
// ============================================================================

export class DictationLoop {
  private readonly orchestrator: TranscriptionOrchestrator;
  private readonly source: TerminalActivationSource;
  private readonly callbacks: DictationLoopCallbacks;
  private cleanupFunctions: Array<() => void> = [];
  private stopped = false;
  private stopResolve: (() => void) | null = null;

  constructor(orchestrator: TranscriptionOrchestrator, options: DictationLoopOptions, callbacks: DictationLoopCallbacks) {
    this.orchestrator = orchestrator;
    this.callbacks = callbacks;
    this.source = new TerminalActivationSource({
      input: options.input,
      getMode: options.getMode,
      isCapturing: () => orchestrator.getState() === 'capturing',
      holdReleaseMs: options.holdReleaseMs,
    });
  }

  /**
   * Start listening. Resolves when the loop is stopped (Ctrl+C or stop()).
   */
  async start(): Promise<void> {
    const orchestrator = this.orchestrator;

    this.cleanupFunctions.push(
      this.source.onEvent((event) => {
        orchestrator.dispatch(event);
      }),
      this.source.onQuit(() => {
        void this.stop();
      }),
      orchestrator.on('stateChange', ({ newState }) => this.callbacks.onStateChange(newState)),
      orchestrator.on('fallbackUsed', ({ primary, fallback, reason }) =>
        this.callbacks.onFallback(primary, fallback, reason)
      ),
      orchestrator.on('sessionEnded', ({ outcome }) => this.callbacks.onSessionEnded(outcome))
    );

    this.source.start();

    return new Promise<void>((resolvePromise) => {
      if (this.stopped) {
        resolvePromise();
        return;
      }
      this.stopResolve = resolvePromise;
    });
  }

  /**
   * Stop listening, cancel any live session and wait for its cleanup.
   */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    this.source.stop();
    if (this.orchestrator.isBusy()) {
      this.callbacks.onLog('Cancelling the active session...');
      this.orchestrator.cancel();
    }
    await this.orchestrator.whenIdle();

    for (const cleanup of this.cleanupFunctions) {
      cleanup();
    }
    this.cleanupFunctions = [];

    this.stopResolve?.();
    this.stopResolve = null;
  }
}
