/**
 * ClipboardService - Clipboard copy with optional auto-paste
 *
 * The text always goes to the system clipboard; that step is the delivery.
 * When auto-paste is on, a paste keystroke is sent to the focused
 * application 250ms later (time for focus to settle back from the
 * terminal). A failed paste is logged and leaves the text on the clipboard.
 *
 * Platform tools:
 * - macOS: pbcopy / osascript
 * - Linux: wl-copy or xclip / wtype or xdotool
 * - Windows: clip / powershell SendKeys
 */

import { runCommand } from '../platform/childProcess';
import { createLogger } from '../logger';

const logger = createLogger('Clipboard');

// =============================================================================
// Types
// =============================================================================

/**
 * Where finished text goes. Called at most once per session.
 */
export interface OutputSink {
  deliver(text: string): Promise<DeliveryReceipt>;
}

export interface DeliveryReceipt {
  /** True only when a paste keystroke was actually sent */
  pasted: boolean;
}

export class DeliveryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeliveryError';
  }
}

export function isDeliveryError(error: unknown): error is DeliveryError {
  return error instanceof DeliveryError;
}

export interface ClipboardServiceOptions {
  /** Read on every delivery so a settings change applies immediately */
  autoPaste?: () => boolean;
  pasteDelayMs?: number;
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
}

interface ToolCommand {
  command: string;
  args: string[];
}

export const PASTE_DELAY_MS = 250;

// =============================================================================
// Platform commands
// =============================================================================

export function clipboardCommand(platform: NodeJS.Platform, env: NodeJS.ProcessEnv): ToolCommand {
  switch (platform) {
    case 'darwin':
      return { command: 'pbcopy', args: [] };
    case 'win32':
      return { command: 'clip', args: [] };
    default:
      return env.WAYLAND_DISPLAY
        ? { command: 'wl-copy', args: [] }
        : { command: 'xclip', args: ['-selection', 'clipboard'] };
  }
}

export function pasteCommand(platform: NodeJS.Platform, env: NodeJS.ProcessEnv): ToolCommand {
  switch (platform) {
    case 'darwin':
      return {
        command: 'osascript',
        args: ['-e', 'tell application "System Events" to keystroke "v" using command down'],
      };
    case 'win32':
      return {
        command: 'powershell',
        args: ['-NoProfile', '-Command', "(New-Object -ComObject WScript.Shell).SendKeys('^v')"],
      };
    default:
      return env.WAYLAND_DISPLAY
        ? { command: 'wtype', args: ['-M', 'ctrl', 'v', '-m', 'ctrl'] }
        : { command: 'xdotool', args: ['key', '--clearmodifiers', 'ctrl+v'] };
  }
}

// =============================================================================
// ClipboardService Implementation
// =============================================================================

export class ClipboardService implements OutputSink {
  private readonly autoPaste: () => boolean;
  private readonly pasteDelayMs: number;
  private readonly platform: NodeJS.Platform;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ClipboardServiceOptions = {}) {
    this.autoPaste = options.autoPaste ?? (() => true);
    this.pasteDelayMs = options.pasteDelayMs ?? PASTE_DELAY_MS;
    this.platform = options.platform ?? process.platform;
    this.env = options.env ?? process.env;
  }

  async deliver(text: string): Promise<DeliveryReceipt> {
    await this.copy(text);

    if (!this.autoPaste()) {
      return { pasted: false };
    }

    await new Promise<void>((resolve) => setTimeout(resolve, this.pasteDelayMs));
    return { pasted: await this.paste() };
  }

  /**
   * Copy content to system clipboard
   */
  async copy(content: string): Promise<void> {
    const { command, args } = clipboardCommand(this.platform, this.env);
    try {
      await runCommand(command, args, { input: content, timeoutMs: 5_000 });
      logger.info(`Copied ${content.length} characters`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DeliveryError(`Failed to copy to clipboard (${command}): ${message}`, { cause: error });
    }
  }

  /**
   * Send the paste keystroke. Returns false when the keystroke could not
   * be sent (missing tool or accessibility permission).
   */
  async paste(): Promise<boolean> {
    const { command, args } = pasteCommand(this.platform, this.env);
    try {
      await runCommand(command, args, { timeoutMs: 5_000 });
      logger.info('Paste keystroke sent');
      return true;
    } catch (error) {
      logger.warn(`Auto-paste failed (${command}), text left on clipboard:`, error);
      return false;
    }
  }
}
