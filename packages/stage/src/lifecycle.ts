/**
 * Lifecycle Driver
 *
 * Runs any player through its whole lifecycle in the order the contract
 * requires of callers: setup once, play, then clean whatever play's outcome.
 *
 * @module @troupe/stage/lifecycle
 */

import { CancellationToken } from './cancellation.js';
import type { Player } from './player.js';

/**
 * Set up, play, and clean a player.
 *
 * If setup fails its error is rethrown and clean is not called: a Stage has
 * already rolled itself back by then, and the contract never asks a player
 * to release what it failed to acquire. Otherwise clean always runs, and
 * play's rejection (if any) is rethrown after it.
 */
export async function perform(
  player: Player,
  ctx: CancellationToken = CancellationToken.none()
): Promise<void> {
  await player.setup();
  try {
    await player.play(ctx);
  } finally {
    await player.clean();
  }
}
