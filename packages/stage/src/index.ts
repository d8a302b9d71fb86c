/**
 * troupe - Stage
 *
 * Lifecycle composition for concurrent workers:
 *
 * - Player contract (setup / play / clean) and the SimplePlayer adapter
 * - Stage: a composite player with rollback on setup failure, concurrent
 *   play with a completion barrier, and aggregated errors
 * - Cooperative cancellation tokens
 *
 * @module @troupe/stage
 */

export {
  type Player,
  type PlayFunction,
  SimplePlayer,
  simplePlayer,
  isPlayer,
  toPlayer,
} from './player.js';

export {
  type CancellationReason,
  CancellationToken,
  CancellationTokenSource,
  CancelledError,
  isCancelledError,
  cancelOnSignals,
} from './cancellation.js';

export {
  SetupError,
  PlayError,
  StageFault,
  StageNotReadyError,
  StageStateError,
  isSetupError,
  isPlayError,
  isStageFault,
  toError,
} from './errors.js';

export {
  type StageState,
  type StageOptions,
  type PlayerOutcome,
  StageOptionsSchema,
} from './types.js';

export { Stage } from './stage.js';
export { perform } from './lifecycle.js';
