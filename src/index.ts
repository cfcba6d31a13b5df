/**
 * voxrelay library entry point
 *
 * Embedders build their own activation source and output sink and drive a
 * TranscriptionOrchestrator; the CLI in src/cli is one such embedder.
 */

export * from './shared/types';

export {
  TranscriptionOrchestrator,
  type OrchestratorDependencies,
  type OrchestratorEvents,
  type OrchestratorEventName,
  type SessionLimits,
} from './main/TranscriptionOrchestrator';
export { ErrorHandler, errorHandler, type ErrorCategory, type ErrorContext } from './main/ErrorHandler';

export {
  CancellationToken,
  CancelledError,
  TimeoutError,
  isCancelledError,
  withTimeout,
} from './main/cancellation/CancellationToken';

export * from './main/transcription';
export * from './main/audio';
export * from './main/output';
export * from './main/settings';

export {
  TerminalActivationSource,
  splitKeys,
  DEFAULT_HOLD_RELEASE_MS,
  type KeyInput,
  type TerminalActivationSourceOptions,
} from './main/activation/TerminalActivationSource';

export { configureLogging, createLogger, getVoxrelayHome, type ScopedLogger } from './main/logger';
