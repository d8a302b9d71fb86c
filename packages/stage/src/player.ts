/**
 * Player Capability
 *
 * A player is a unit of concurrent work with a three-phase lifecycle:
 *
 *   setup -> play -> clean
 *
 * or, when a sibling fails to set up, just setup -> clean.
 *
 * `play` is only ever called after `setup` completed without error.
 *
 * @module @troupe/stage/player
 */

import type { CancellationToken } from './cancellation.js';

/**
 * The contract every unit of work satisfies
 */
export interface Player {
  /**
   * Acquire resources. Throw (or reject) to signal failure.
   */
  setup(): void | Promise<void>;

  /**
   * Do the work. Resolve on success, reject on failure. Cancellation is
   * cooperative: honor `ctx` promptly, nothing will preempt you.
   */
  play(ctx: CancellationToken): Promise<void>;

  /**
   * Release resources. Must be safe to call when setup failed or never ran.
   * Failures here are logged and never reported to the caller.
   */
  clean(): void | Promise<void>;
}

/**
 * Bare unit of work, usable wherever a Player is accepted via SimplePlayer
 */
export type PlayFunction = (ctx: CancellationToken) => Promise<void>;

/**
 * Adapts a PlayFunction to the Player contract: setup always succeeds,
 * clean does nothing, play forwards to the function.
 */
export class SimplePlayer implements Player {
  constructor(private readonly run: PlayFunction) {}

  setup(): void {
    // nothing to acquire
  }

  play(ctx: CancellationToken): Promise<void> {
    return this.run(ctx);
  }

  clean(): void {
    // nothing to release
  }
}

export function simplePlayer(run: PlayFunction): SimplePlayer {
  return new SimplePlayer(run);
}

export function isPlayer(value: unknown): value is Player {
  return (
    typeof value === 'object' &&
    value !== null &&
    'setup' in value &&
    typeof value.setup === 'function' &&
    'play' in value &&
    typeof value.play === 'function' &&
    'clean' in value &&
    typeof value.clean === 'function'
  );
}

/**
 * Normalize a Player or PlayFunction to a Player
 */
export function toPlayer(player: Player | PlayFunction): Player {
  return typeof player === 'function' ? new SimplePlayer(player) : player;
}
