/**
 * Cooperative Cancellation
 *
 * The cancellation context handed to every player's `play`:
 * - CancellationToken: read side, checked by players at safe checkpoints
 * - CancellationTokenSource: write side, held by whoever drives the stage
 * - CancelledError: thrown by `throwIfCancelled()`
 *
 * A stage never force-stops a player. Cancelling only flips the token;
 * each player decides how promptly it returns.
 *
 * @module @troupe/stage/cancellation
 */

import { EventEmitter } from 'node:events';

// =============================================================================
// Cancellation Token
// =============================================================================

export interface CancellationReason {
  /** What initiated cancellation */
  initiator: 'user' | 'system' | 'timeout' | 'parent';
  /** Human-readable reason */
  reason: string;
  /** When cancellation was requested */
  requestedAt: Date;
  /** Additional context */
  context?: Record<string, unknown>;
}

const requestCancel = Symbol('requestCancel');

/**
 * Read-only view of a cancellation request
 *
 * Tokens are cancelled through their {@link CancellationTokenSource}; a
 * player holding a token can observe cancellation but cannot trigger it for
 * its siblings.
 *
 * @example
 * ```typescript
 * const worker = simplePlayer(async (ctx) => {
 *   for (const item of items) {
 *     ctx.throwIfCancelled();
 *     await process(item, { signal: ctx.signal });
 *   }
 * });
 * ```
 */
export class CancellationToken {
  private _reason: CancellationReason | undefined;
  private readonly emitter = new EventEmitter();
  private readonly controller = new AbortController();

  constructor() {
    // One listener per player is normal for a wide stage
    this.emitter.setMaxListeners(0);
  }

  /**
   * A token that is never cancelled
   */
  static none(): CancellationToken {
    return new CancellationToken();
  }

  /**
   * A token cancelled when the given AbortSignal aborts
   */
  static fromSignal(signal: AbortSignal): CancellationToken {
    const token = new CancellationToken();
    const abort = (): void => {
      token[requestCancel]({
        initiator: 'system',
        reason: describeAbortReason(signal.reason),
        requestedAt: new Date(),
      });
    };
    if (signal.aborted) {
      abort();
    } else {
      signal.addEventListener('abort', abort, { once: true });
    }
    return token;
  }

  get isCancelled(): boolean {
    return this._reason !== undefined;
  }

  get reason(): CancellationReason | undefined {
    return this._reason;
  }

  /**
   * AbortSignal mirroring this token, for APIs such as fetch or timers
   */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Register a callback for cancellation. Runs immediately when the token
   * is already cancelled.
   *
   * @returns Function that removes the callback
   */
  onCancelled(callback: (reason: CancellationReason) => void): () => void {
    if (this._reason) {
      callback(this._reason);
      return () => undefined;
    }
    this.emitter.once('cancelled', callback);
    return () => {
      this.emitter.off('cancelled', callback);
    };
  }

  /**
   * Throw CancelledError if cancellation has been requested
   */
  throwIfCancelled(): void {
    if (this._reason) {
      throw new CancelledError(this._reason);
    }
  }

  /**
   * Promise that resolves when cancelled, for racing against work
   */
  whenCancelled(): Promise<CancellationReason> {
    return new Promise((resolve) => {
      this.onCancelled(resolve);
    });
  }

  /**
   * Create a linked source whose token is cancelled together with this one.
   * Dispose it when done so this token stops tracking it.
   */
  createChild(): CancellationTokenSource {
    return new CancellationTokenSource(this);
  }

  /** @internal */
  [requestCancel](reason: CancellationReason): boolean {
    if (this._reason) {
      return false;
    }
    this._reason = reason;
    this.controller.abort(new CancelledError(reason));
    this.emitter.emit('cancelled', reason);
    return true;
  }
}

// =============================================================================
// Cancelled Error
// =============================================================================

/**
 * Error thrown when an operation observes cancellation
 */
export class CancelledError extends Error {
  readonly name = 'CancelledError';
  readonly isCancellation = true;

  constructor(public readonly reason: CancellationReason) {
    super(`Operation cancelled: ${reason.reason}`);
  }
}

export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError ||
    (error instanceof Error && 'isCancellation' in error && error.isCancellation === true);
}

// =============================================================================
// Cancellation Token Source
// =============================================================================

/**
 * Owner of a cancellation token
 *
 * @example
 * ```typescript
 * const source = new CancellationTokenSource();
 * source.cancelAfter(30_000);
 * await stage.play(source.token);
 * ```
 */
export class CancellationTokenSource {
  readonly token: CancellationToken;
  private _isDisposed = false;
  private deadline: NodeJS.Timeout | undefined;
  private readonly unlink: () => void;

  /**
   * @param parent - Optional token whose cancellation also cancels this source
   */
  constructor(parent?: CancellationToken) {
    this.token = new CancellationToken();
    this.unlink = parent
      ? parent.onCancelled((reason) => {
          this.token[requestCancel]({ ...reason, initiator: 'parent' });
        })
      : () => undefined;
    // Cancelled by any route: the parent link is no longer needed
    this.token.onCancelled(() => this.unlink());
  }

  get isCancelled(): boolean {
    return this.token.isCancelled;
  }

  /**
   * Request cancellation. A second request keeps the first reason.
   *
   * @throws Error if the source has been disposed
   */
  cancel(reason?: Partial<CancellationReason>): void {
    if (this._isDisposed) {
      throw new Error('CancellationTokenSource has been disposed');
    }
    this.clearDeadline();
    this.token[requestCancel]({
      initiator: reason?.initiator ?? 'user',
      reason: reason?.reason ?? 'Cancellation requested',
      requestedAt: reason?.requestedAt ?? new Date(),
      context: reason?.context,
    });
  }

  /**
   * Cancel with a 'timeout' reason once `ms` milliseconds have elapsed.
   * A later call replaces the earlier deadline.
   */
  cancelAfter(ms: number): void {
    if (this._isDisposed) {
      throw new Error('CancellationTokenSource has been disposed');
    }
    if (!Number.isFinite(ms) || ms < 0) {
      throw new RangeError(`Invalid deadline: ${ms}ms`);
    }
    this.clearDeadline();
    this.deadline = setTimeout(() => {
      this.deadline = undefined;
      this.token[requestCancel]({
        initiator: 'timeout',
        reason: `Deadline of ${ms}ms exceeded`,
        requestedAt: new Date(),
      });
    }, ms);
    this.deadline.unref();
  }

  /**
   * Release the deadline timer and parent link. The token keeps its state.
   */
  dispose(): void {
    this._isDisposed = true;
    this.clearDeadline();
    this.unlink();
  }

  private clearDeadline(): void {
    if (this.deadline) {
      clearTimeout(this.deadline);
      this.deadline = undefined;
    }
  }
}

// =============================================================================
// Process Signals
// =============================================================================

/**
 * Cancel `source` when the process receives one of `signals`, for graceful
 * shutdown of a playing stage.
 *
 * @returns Function that removes the signal handlers
 */
export function cancelOnSignals(
  source: CancellationTokenSource,
  signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']
): () => void {
  const handler = (signal: NodeJS.Signals): void => {
    if (!source.isCancelled) {
      source.cancel({
        initiator: 'system',
        reason: `Received ${signal}`,
        context: { signal },
      });
    }
  };
  for (const signal of signals) {
    process.on(signal, handler);
  }
  return () => {
    for (const signal of signals) {
      process.off(signal, handler);
    }
  };
}

function describeAbortReason(reason: unknown): string {
  if (reason instanceof Error) return reason.message;
  if (typeof reason === 'string' && reason.length > 0) return reason;
  return 'Signal aborted';
}
