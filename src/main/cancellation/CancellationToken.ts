/**
 * CancellationToken - cooperative cancellation for one session
 *
 * A single-writer flag that is set at most once. Every suspension point in
 * the orchestrator races its promise against the token so a cancel always
 * wins over a late completion. The token also owns an AbortController so
 * transports that understand AbortSignal can stop early.
 */

export class CancelledError extends Error {
  public readonly reason: string;

  constructor(reason: string = 'cancelled') {
    super(`Operation cancelled: ${reason}`);
    this.name = 'CancelledError';
    this.reason = reason;
  }
}

export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}

type CancelListener = (reason: string) => void;

export class CancellationToken {
  private controller = new AbortController();
  private listeners: CancelListener[] = [];
  private cancelReason: string | null = null;

  /**
   * Signal cancellation. Only the first call has any effect.
   */
  cancel(reason: string = 'cancelled'): boolean {
    if (this.cancelReason !== null) {
      return false;
    }

    this.cancelReason = reason;
    this.controller.abort(new CancelledError(reason));

    const listeners = this.listeners;
    this.listeners = [];
    for (const listener of listeners) {
      listener(reason);
    }
    return true;
  }

  get isCancelled(): boolean {
    return this.cancelReason !== null;
  }

  get reason(): string | null {
    return this.cancelReason;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Throw CancelledError if the token has fired. Called right after each
   * suspension point resumes.
   */
  throwIfCancelled(): void {
    if (this.cancelReason !== null) {
      throw new CancelledError(this.cancelReason);
    }
  }

  /**
   * Register a listener; fires immediately if already cancelled.
   * Returns an unsubscribe function.
   */
  onCancel(listener: CancelListener): () => void {
    if (this.cancelReason !== null) {
      listener(this.cancelReason);
      return () => {};
    }

    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  /**
   * Create a token that fires when this one does but can also be cancelled
   * on its own (e.g. by a per-attempt timeout) without affecting the parent.
   */
  child(): CancellationToken {
    const child = new CancellationToken();
    const unsubscribe = this.onCancel((reason) => child.cancel(reason));
    child.onCancel(() => unsubscribe());
    return child;
  }

  /**
   * Race a promise against this token. Rejects with CancelledError as soon
   * as the token fires; the promise's later settlement is ignored.
   */
  race<T>(promise: Promise<T>): Promise<T> {
    if (this.cancelReason !== null) {
      // Swallow the abandoned promise's eventual rejection
      promise.catch(() => undefined);
      return Promise.reject(new CancelledError(this.cancelReason));
    }

    return new Promise<T>((resolve, reject) => {
      const unsubscribe = this.onCancel((reason) => {
        reject(new CancelledError(reason));
      });

      promise.then(
        (value) => {
          unsubscribe();
          resolve(value);
        },
        (error: unknown) => {
          unsubscribe();
          reject(error);
        }
      );
    });
  }
}

export class TimeoutError extends Error {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, operationName: string = 'operation') {
    super(`${operationName} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Run an operation under a timer-driven child token. When the timer fires
 * the child token is cancelled (aborting the operation's signal) and the
 * returned promise rejects with TimeoutError. A parent cancel still rejects
 * with CancelledError, so the two outcomes stay distinguishable.
 */
export async function withTimeout<T>(
  parent: CancellationToken,
  timeoutMs: number,
  operation: (token: CancellationToken) => Promise<T>,
  operationName: string = 'operation'
): Promise<T> {
  const token = parent.child();
  let timeoutHandle: ReturnType<typeof setTimeout> | null = null;
  let timedOut = false;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      timedOut = true;
      reject(new TimeoutError(timeoutMs, operationName));
      token.cancel('timeout');
    }, timeoutMs);
  });

  try {
    return await parent.race(Promise.race([operation(token), timeoutPromise]));
  } catch (error) {
    // An operation that rejects on abort must still read as a timeout
    if (timedOut && !parent.isCancelled) {
      throw new TimeoutError(timeoutMs, operationName);
    }
    throw error;
  } finally {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
    // Release the operation's transport once the attempt is settled
    token.cancel('settled');
  }
}
