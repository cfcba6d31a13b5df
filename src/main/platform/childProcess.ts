/**
 * Child process helpers for the platform tools voxrelay shells out to
 * (ffmpeg, pbcopy/xclip/wl-copy/clip, osascript/xdotool/powershell).
 */

import { execFile as execFileCb } from 'child_process';

// Minimal environment for child processes, no env variable leakage
// (DISPLAY and WAYLAND_DISPLAY are needed by the Linux clipboard tools)
export const SAFE_CHILD_ENV = {
  PATH: process.env.PATH,
  HOME: process.env.HOME || process.env.USERPROFILE,
  USERPROFILE: process.env.USERPROFILE,
  LANG: process.env.LANG,
  TMPDIR: process.env.TMPDIR || process.env.TEMP,
  TEMP: process.env.TEMP,
  DISPLAY: process.env.DISPLAY,
  WAYLAND_DISPLAY: process.env.WAYLAND_DISPLAY,
  XDG_RUNTIME_DIR: process.env.XDG_RUNTIME_DIR,
};

export interface RunCommandOptions {
  /** Written to the child's stdin, which is then closed */
  input?: string;
  timeoutMs?: number;
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

/**
 * Run a command to completion and collect its output.
 * Rejects with the execFile error when the command fails or is missing.
 */
export function runCommand(
  command: string,
  args: string[],
  options: RunCommandOptions = {}
): Promise<CommandOutput> {
  return new Promise((resolve, reject) => {
    const child = execFileCb(
      command,
      args,
      { env: SAFE_CHILD_ENV, timeout: options.timeoutMs ?? 10_000 },
      (error, stdout, stderr) => {
        if (error) {
          reject(error);
          return;
        }
        resolve({ stdout: stdout?.toString() ?? '', stderr: stderr?.toString() ?? '' });
      }
    );

    if (options.input !== undefined) {
      child.stdin?.end(options.input);
    }
  });
}

/**
 * Run a command and return trimmed stdout, or null on any failure.
 */
export async function execQuiet(command: string, args: string[], timeoutMs = 5_000): Promise<string | null> {
  try {
    const { stdout } = await runCommand(command, args, { timeoutMs });
    return stdout.trim();
  } catch {
    return null;
  }
}

/**
 * True when `command` is on PATH. Uses `which` / `where` so tools that
 * read stdin (pbcopy, clip) are never started.
 */
export async function commandExists(command: string, platform: NodeJS.Platform = process.platform): Promise<boolean> {
  const locator = platform === 'win32' ? 'where' : 'which';
  const located = await execQuiet(locator, [command]);
  return located !== null && located.length > 0;
}
