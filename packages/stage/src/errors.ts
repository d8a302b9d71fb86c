/**
 * Stage Errors
 *
 * Two recoverable error kinds travel as promise rejections:
 * - SetupError: the first player whose setup failed (stage already rolled back)
 * - PlayError: every player that failed during play (stage already drained)
 *
 * Programming faults (calling a lifecycle method out of order) are thrown
 * synchronously as StageFault subclasses and are never aggregated.
 *
 * @module @troupe/stage/errors
 */

import type { StageState } from './types.js';

/**
 * Normalize a thrown value to an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  if (typeof value === 'string') {
    return new Error(value);
  }
  return new Error(`Non-error value thrown: ${String(value)}`);
}

// =============================================================================
// Recoverable Errors
// =============================================================================

/**
 * Rejection of `Stage.setup()`
 */
export class SetupError extends Error {
  readonly name = 'SetupError';
  readonly isSetupError = true;
  declare readonly cause: Error;

  constructor(
    /** Name the failing player was registered under */
    public readonly player: string,
    cause: Error
  ) {
    super(`Player "${player}" failed to set up: ${cause.message}`, { cause });
  }
}

/**
 * Rejection of `Stage.play()`
 *
 * `players` has exactly one entry per failing player; a player that is
 * absent from it succeeded.
 */
export class PlayError extends Error {
  readonly name = 'PlayError';
  readonly isPlayError = true;

  constructor(public readonly players: ReadonlyMap<string, Error>) {
    super(
      `${players.size} player(s) failed: ` +
        [...players].map(([name, err]) => `|${name}: ${err.message}|`).join(' ')
    );
  }

  failedPlayers(): string[] {
    return [...this.players.keys()];
  }
}

export function isSetupError(error: unknown): error is SetupError {
  return error instanceof SetupError;
}

export function isPlayError(error: unknown): error is PlayError {
  return error instanceof PlayError;
}

// =============================================================================
// Faults
// =============================================================================

/**
 * Base class for lifecycle contract violations by the caller
 */
export abstract class StageFault extends Error {
  readonly isStageFault = true;

  constructor(
    public readonly stage: string,
    public readonly state: StageState,
    message: string
  ) {
    super(message);
  }
}

/**
 * Thrown by `play()` when the stage has not been successfully set up
 */
export class StageNotReadyError extends StageFault {
  readonly name = 'StageNotReadyError';

  constructor(stage: string, state: StageState) {
    super(stage, state, `Stage "${stage}" cannot play in state "${state}": setup has not succeeded`);
  }
}

/**
 * Thrown when `add()` or `setup()` is called after setup has begun, or
 * `clean()` while setup is still running
 */
export class StageStateError extends StageFault {
  readonly name = 'StageStateError';

  constructor(
    stage: string,
    public readonly operation: 'add' | 'setup' | 'clean',
    state: StageState
  ) {
    super(stage, state, `Stage "${stage}" does not accept ${operation}() in state "${state}"`);
  }
}

export function isStageFault(error: unknown): error is StageFault {
  return error instanceof StageFault;
}
