/**
 * voxrelay CLI - Voice dictation to the clipboard from the terminal
 *
 * Usage:
 *   voxrelay dictate [--mode toggle|hold] [--no-paste]
 *   voxrelay transcribe <audio-file>
 *   voxrelay providers
 *   voxrelay config get [key] | config set <key> <value> | config reset
 *   voxrelay doctor
 *
 * `dictate` runs the interactive loop:
 *   1. Space starts capture (toggle) or is held while speaking (hold)
 *   2. Audio goes to the primary provider, then the fallback on a transient failure
 *   3. The text is copied to the clipboard and optionally pasted
 *   Esc cancels at any point before delivery; Ctrl+C quits.
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { Command, Option } from 'commander';
import { ACTIVATION_MODES, type ActivationMode, type SessionOutcome, type SessionState } from '../shared/types';
import { configureLogging } from '../main/logger';
import { getSettingsManager, SettingsError } from '../main/settings';
import { CancellationToken, isCancelledError } from '../main/cancellation/CancellationToken';
import { getProviderName } from '../main/transcription';
import {
  CLIError,
  EXIT_SIGINT,
  EXIT_SUCCESS,
  EXIT_SYSTEM_ERROR,
  EXIT_USER_ERROR,
  createInterruptHandler,
  createRuntime,
  describeProviders,
  exitCodeFor,
  transcribeFile,
  type ActiveOperation,
} from './runtime';
import { DictationLoop } from './DictationLoop';
import { runDoctorChecks } from './doctor';

function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf8'));
    if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
      return raw.version;
    }
  } catch {
    // Fall through to the dev marker
  }
  return '0.0.0-dev';
}

const VERSION = readVersion();

// ============================================================================
// Console output helpers
// ============================================================================

const SYMBOLS = {
  check: '✔',    // checkmark
  cross: '✘',    // cross
  arrow: '→',    // right arrow
  bullet: '•',   // bullet
  warn: '⚠',     // warning sign
  line: '─',     // horizontal line
} as const;

function banner(): void {
  console.log();
  console.log(`  voxrelay v${VERSION} ${SYMBOLS.bullet} Dictation`);
  console.log(`  ${SYMBOLS.line.repeat(40)}`);
  console.log();
}

function step(message: string): void {
  console.log(`  ${SYMBOLS.arrow} ${message}`);
}

function success(message: string): void {
  console.log(`  ${SYMBOLS.check} ${message}`);
}

function fail(message: string): void {
  console.log(`  ${SYMBOLS.cross} ${message}`);
}

function warn(message: string): void {
  console.log(`  ${SYMBOLS.warn} ${message}`);
}

function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value, null, 2);
}

// ============================================================================
// Signal handling
// ============================================================================

let activeOperation: ActiveOperation | null = null;

function setupSignalHandlers(): void {
  const handler = createInterruptHandler({
    getActive: () => activeOperation,
    exit: (code) => process.exit(code),
    onInterrupt: () => console.log('\n  Interrupted, cleaning up...'),
  });

  for (const signal of ['SIGINT', 'SIGTERM', 'SIGHUP'] as const) {
    process.on(signal, () => {
      void handler();
    });
  }
}

setupSignalHandlers();

// ============================================================================
// CLI definition
// ============================================================================

const program = new Command();

program
  .name('voxrelay')
  .description('Speak, transcribe with a cloud provider, and paste the text where you are typing')
  .version(VERSION, '-v, --version')
  .showHelpAfterError('(use --help for available options)');

program.hook('preAction', (_program, actionCommand) => {
  configureLogging({ verbose: actionCommand.opts().verbose === true });
});

// ============================================================================
// dictate command
// ============================================================================

function describeState(state: SessionState, mode: ActivationMode): string | null {
  switch (state) {
    case 'capturing':
      return mode === 'hold'
        ? 'Recording... release space to stop, Esc to cancel'
        : 'Recording... press space to stop, Esc to cancel';
    case 'awaiting-primary':
      return 'Transcribing...';
    case 'delivering':
      return 'Delivering...';
    default:
      return null;
  }
}

function reportOutcome(outcome: SessionOutcome): void {
  switch (outcome.status) {
    case 'delivered':
      success(`${outcome.pasted ? 'Copied and pasted' : 'Copied'} (${getProviderName(outcome.providerId)}): ${outcome.text}`);
      break;
    case 'cancelled':
      step('Cancelled');
      break;
    case 'failed':
      fail(outcome.message);
      break;
  }
  console.log();
}

program
  .command('dictate')
  .description('Start the interactive dictation loop')
  .addOption(new Option('--mode <mode>', 'Activation mode').choices([...ACTIVATION_MODES]))
  .option('--no-paste', 'Copy to the clipboard without pasting')
  .option('--verbose', 'Verbose output', false)
  .action(async (options: { mode?: ActivationMode; paste: boolean; verbose: boolean }) => {
    banner();

    const runtime = createRuntime({ paste: options.paste });
    const { settings, orchestrator } = runtime;
    const getMode = (): ActivationMode => options.mode ?? settings.get('activationMode');

    const report = describeProviders(runtime.registry);
    step(`Primary:  ${report.primary}`);
    step(`Fallback: ${report.fallback}`);
    if (report.promoted) {
      warn(`${settings.get('primaryProvider')} has no API key; using the fallback as primary`);
    }
    if (!runtime.registry.snapshot().primary) {
      fail('No provider is configured. Run `voxrelay doctor` for details.');
      process.exit(EXIT_USER_ERROR);
    }
    console.log();
    step(
      getMode() === 'hold'
        ? 'Hold space to record, Esc to cancel, Ctrl+C to quit'
        : 'Press space to start/stop recording, Esc to cancel, Ctrl+C to quit'
    );
    console.log();

    const loop = new DictationLoop(
      orchestrator,
      { input: process.stdin, getMode },
      {
        onLog: step,
        onStateChange: (state) => {
          const message = describeState(state, getMode());
          if (message) step(message);
        },
        onFallback: (primary, fallback, reason) => {
          warn(`${primary} failed (${reason}), trying ${fallback}`);
        },
        onSessionEnded: reportOutcome,
      }
    );
    activeOperation = { abort: () => loop.stop() };

    try {
      await loop.start();
      success('Bye.');
      process.exit(EXIT_SUCCESS);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      fail(`Dictation error: ${message}`);
      process.exit(EXIT_SYSTEM_ERROR);
    } finally {
      activeOperation = null;
    }
  });

// ============================================================================
// transcribe command
// ============================================================================

program
  .command('transcribe')
  .description('Transcribe an existing audio file and print the text')
  .argument('<audio-file>', 'Path to the audio file (wav, mp3, m4a, ogg, webm, flac)')
  .option('--verbose', 'Verbose output', false)
  .action(async (audioFile: string, options: { verbose: boolean }) => {
    const runtime = createRuntime();
    const token = new CancellationToken();
    activeOperation = {
      abort: async () => {
        token.cancel('interrupted');
      },
    };

    try {
      const result = await transcribeFile(resolve(audioFile), {
        registry: runtime.registry,
        settings: runtime.settings,
        token,
      });

      if (options.verbose) {
        for (const attempt of result.attempts) {
          console.error(`  ${SYMBOLS.bullet} ${attempt.role} ${attempt.providerId}: ${attempt.outcome.status}`);
        }
      }
      console.log(result.text);
      process.exit(EXIT_SUCCESS);
    } catch (error) {
      if (isCancelledError(error)) {
        process.exit(EXIT_SIGINT);
      }
      const message = error instanceof Error ? error.message : String(error);
      fail(`Transcription failed: ${message}`);
      process.exit(exitCodeFor(error));
    } finally {
      activeOperation = null;
    }
  });

// ============================================================================
// providers command
// ============================================================================

program
  .command('providers')
  .description('Show the provider selection the next session will use')
  .action(() => {
    banner();
    const runtime = createRuntime();
    const report = describeProviders(runtime.registry);

    step(`Primary:  ${report.primary}`);
    step(`Fallback: ${report.fallback}`);
    if (report.promoted) {
      warn('Primary has no API key; the fallback is promoted to primary');
    }
    console.log();

    for (const status of report.statuses) {
      if (status.configured) {
        success(`${status.displayName} (${status.providerId})`);
      } else {
        fail(`${status.displayName} (${status.providerId}) ${SYMBOLS.arrow} ${status.reason ?? 'not configured'}`);
      }
    }
    console.log();
  });

// ============================================================================
// config command group
// ============================================================================

const config = program.command('config').description('Read and change settings');

config
  .command('get')
  .description('Print one setting, or all of them')
  .argument('[key]', 'Dotted setting key, e.g. providers.groq.model')
  .action((key?: string) => {
    const settings = getSettingsManager();
    if (!key) {
      console.log(formatValue(settings.getAll()));
      return;
    }

    const value = settings.getByPath(key);
    if (value === undefined) {
      fail(`Unknown setting: ${key}`);
      process.exit(EXIT_USER_ERROR);
    }
    console.log(formatValue(value));
  });

config
  .command('set')
  .description('Change a setting')
  .argument('<key>', 'Dotted setting key, e.g. fallbackProvider')
  .argument('<value>', 'New value (null clears the fallback provider)')
  .action((key: string, value: string) => {
    const settings = getSettingsManager();
    try {
      settings.setByPath(key, value);
      success(`${key} = ${formatValue(settings.getByPath(key))}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      fail(message);
      process.exit(error instanceof SettingsError ? EXIT_USER_ERROR : EXIT_SYSTEM_ERROR);
    }
  });

config
  .command('reset')
  .description('Restore all settings to their defaults')
  .action(() => {
    getSettingsManager().reset();
    success('Settings reset to defaults');
  });

config
  .command('path')
  .description('Print the settings file location')
  .action(() => {
    console.log(getSettingsManager().getFilePath());
  });

// ============================================================================
// doctor command
// ============================================================================

program
  .command('doctor')
  .description('Check the environment: Node.js, ffmpeg, clipboard tools and provider keys')
  .action(async () => {
    banner();
    const result = await runDoctorChecks({ settings: getSettingsManager() });

    for (const check of result.checks) {
      const line = `${check.name}: ${check.message}`;
      if (check.status === 'pass') success(line);
      else if (check.status === 'warn') warn(line);
      else fail(line);

      if (check.hint && check.status !== 'pass') {
        for (const hintLine of check.hint.split('\n')) {
          console.log(`      ${hintLine}`);
        }
      }
    }

    console.log();
    console.log(`  ${result.passed} passed, ${result.warned} warnings, ${result.failed} failed`);
    console.log();
    process.exit(result.failed > 0 ? EXIT_USER_ERROR : EXIT_SUCCESS);
  });

// Show help if no command provided
if (process.argv.length <= 2) {
  banner();
  program.outputHelp();
  process.exit(EXIT_SUCCESS);
}

program.parseAsync().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  fail(message);
  process.exit(error instanceof CLIError ? exitCodeFor(error) : EXIT_SYSTEM_ERROR);
});
