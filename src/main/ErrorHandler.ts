/**
 * ErrorHandler - Centralized error management for voxrelay
 *
 * Provides:
 * - Conversion of thrown errors into TranscriptionFailure records
 * - Categorized logging with component/operation context
 * - One human-readable message per failed session
 */

import type { FailureKind, TranscriptionFailure } from '../shared/types';
import { isTranscriptionError } from './transcription/errors';
import { getProviderName } from './transcription/providerCatalog';
import { isCaptureError } from './audio/AudioCapture';
import { isDeliveryError } from './output/ClipboardService';
import { createLogger, type LogLevel, type ScopedLogger } from './logger';

// ============================================================================
// Types
// ============================================================================

export interface ErrorContext {
  component: string;
  operation: string;
  data?: Record<string, unknown>;
}

export type ErrorCategory = 'api_key' | 'network' | 'capture' | 'transcription' | 'delivery' | 'unknown';

// ============================================================================
// ErrorHandler Class
// ============================================================================

export class ErrorHandler {
  private loggers = new Map<string, ScopedLogger>();

  /**
   * Turn anything thrown during a session into a failure record.
   * Errors that carry no classification of their own get `fallbackKind`.
   */
  toFailure(error: unknown, fallbackKind: FailureKind): TranscriptionFailure {
    if (isTranscriptionError(error)) {
      return {
        kind: error.kind,
        message: error.message,
        providerId: error.providerId,
        statusCode: error.statusCode,
      };
    }
    if (isCaptureError(error)) {
      return { kind: 'CaptureError', message: error.message };
    }
    if (isDeliveryError(error)) {
      return { kind: 'DeliveryError', message: error.message };
    }
    return { kind: fallbackKind, message: error instanceof Error ? error.message : String(error) };
  }

  /**
   * The single message shown to the user for a failed session.
   */
  userMessage(failure: TranscriptionFailure): string {
    const provider = failure.providerId ? getProviderName(failure.providerId) : 'Provider';
    const status = failure.statusCode;

    switch (failure.kind) {
      case 'MissingCredential':
        return status
          ? `${provider} rejected the API key (${status}). Please check your settings.`
          : `${provider} API key not configured. Please check your settings.`;
      case 'InvalidRequest':
        return `${provider} rejected the request${status ? ` (${status})` : ''}. Please check the model and language settings.`;
      case 'InvalidResponse':
        return 'Invalid response from server. Please try again.';
      case 'RateLimited':
        return `${provider} is rate limiting requests. Please try again shortly.`;
      case 'ServerError':
        return `Server error${status ? ` (${status})` : ''} from ${provider}. Please try again.`;
      case 'NetworkError':
        return 'Network error. Please check your connection.';
      case 'Timeout':
        return `${provider} took too long to respond. Please try again.`;
      case 'EmptyTranscription':
        return 'No speech detected. Please try again.';
      case 'EmptyAudio':
        return 'Recording too short. Please try again.';
      case 'CaptureError':
        return `Microphone error: ${failure.message}`;
      case 'DeliveryError':
        return `Could not deliver the transcription: ${failure.message}`;
    }
  }

  categorize(kind: FailureKind): ErrorCategory {
    switch (kind) {
      case 'MissingCredential':
        return 'api_key';
      case 'NetworkError':
      case 'Timeout':
      case 'RateLimited':
      case 'ServerError':
        return 'network';
      case 'CaptureError':
      case 'EmptyAudio':
        return 'capture';
      case 'InvalidRequest':
      case 'InvalidResponse':
      case 'EmptyTranscription':
        return 'transcription';
      case 'DeliveryError':
        return 'delivery';
      default:
        return 'unknown';
    }
  }

  /**
   * Log a session failure with its category and return the user message.
   */
  handleFailure(failure: TranscriptionFailure, context: ErrorContext): string {
    const message = this.userMessage(failure);
    this.log('error', `${failure.kind}: ${failure.message}`, {
      ...context,
      data: {
        ...context.data,
        category: this.categorize(failure.kind),
        providerId: failure.providerId,
        statusCode: failure.statusCode,
      },
    });
    return message;
  }

  log(level: LogLevel, message: string, context?: ErrorContext): void {
    const logger = this.getLogger(context?.component ?? 'ErrorHandler');
    const prefix = context?.operation ? `${context.operation}: ` : '';
    if (context?.data) {
      logger[level](`${prefix}${message}`, context.data);
    } else {
      logger[level](`${prefix}${message}`);
    }
  }

  private getLogger(component: string): ScopedLogger {
    let logger = this.loggers.get(component);
    if (!logger) {
      logger = createLogger(component);
      this.loggers.set(component, logger);
    }
    return logger;
  }
}

export const errorHandler = new ErrorHandler();
export default errorHandler;
