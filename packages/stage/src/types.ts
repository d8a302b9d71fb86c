/**
 * Stage Types
 *
 * @module @troupe/stage/types
 */

import { z } from 'zod';
import { Logger, RollbackModeSchema } from '@troupe/core';

/**
 * Lifecycle state of a stage
 */
export type StageState =
  | 'created'     // Accepting players, setup not yet called
  | 'setting-up'  // Setup in progress
  | 'ready'       // Every player set up; play allowed
  | 'failed'      // A player failed setup; already rolled back
  | 'cleaned';    // Clean has run; terminal

/**
 * Stage construction options
 */
export const StageOptionsSchema = z.object({
  /** Name used in log lines and fault messages */
  name: z.string().min(1).default('stage'),
  /** Rollback strategy after a failed setup (defaults to TROUPE_ROLLBACK_MODE) */
  rollback: RollbackModeSchema.optional(),
  /** Logger for lifecycle events (defaults to the shared logger) */
  logger: z.instanceof(Logger).optional(),
});

export type StageOptions = z.input<typeof StageOptionsSchema>;

/**
 * Result of one player's play, collected behind the completion barrier
 */
export interface PlayerOutcome {
  name: string;
  error?: Error;
  durationMs: number;
}
