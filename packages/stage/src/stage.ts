/**
 * Stage
 *
 * A named group of players that is set up, played, and cleaned together.
 * A Stage is itself a Player, so stages nest to any depth.
 *
 * - setup: sequential, registration order, all-or-nothing with rollback
 * - play: one concurrent task per player, completion barrier, errors aggregated
 * - clean: one concurrent task per player, completion barrier, errors logged
 *
 * Registration (`add`) is not synchronized; callers must finish adding
 * players before calling `setup`.
 *
 * @module @troupe/stage/stage
 */

import {
  deriveContext,
  getLogger,
  loadRollbackMode,
  runWithContextAsync,
  type Logger,
  type RollbackMode,
  type TelemetryContext,
} from '@troupe/core';
import { CancellationToken } from './cancellation.js';
import {
  PlayError,
  SetupError,
  StageNotReadyError,
  StageStateError,
  isStageFault,
  toError,
} from './errors.js';
import { toPlayer, type Player, type PlayFunction } from './player.js';
import {
  StageOptionsSchema,
  type PlayerOutcome,
  type StageOptions,
  type StageState,
} from './types.js';

type Phase = 'setup' | 'play' | 'clean';

/**
 * Composite player
 *
 * @example
 * ```typescript
 * const stage = new Stage({ name: 'ingest' })
 *   .add('http', httpServer)
 *   .add('flusher', async (ctx) => flushUntil(ctx));
 *
 * await stage.setup();
 * const source = new CancellationTokenSource();
 * const stop = cancelOnSignals(source);
 * try {
 *   await stage.play(source.token);
 * } finally {
 *   stop();
 *   await stage.clean();
 * }
 * ```
 */
export class Stage implements Player {
  readonly name: string;
  private readonly players = new Map<string, Player>();
  private readonly rollbackMode: RollbackMode;
  private readonly logger: Logger;
  private _state: StageState = 'created';

  constructor(options: StageOptions = {}) {
    const parsed = StageOptionsSchema.parse(options);
    this.name = parsed.name;
    this.rollbackMode = parsed.rollback ?? loadRollbackMode();
    this.logger = parsed.logger ?? getLogger();
  }

  // ===========================================================================
  // Inspection
  // ===========================================================================

  get state(): StageState {
    return this._state;
  }

  /**
   * True iff every player was set up successfully and the stage has not
   * been cleaned since
   */
  get isReady(): boolean {
    return this._state === 'ready';
  }

  get size(): number {
    return this.players.size;
  }

  has(name: string): boolean {
    return this.players.has(name);
  }

  get(name: string): Player | undefined {
    return this.players.get(name);
  }

  /**
   * Registered names, in registration order
   */
  names(): string[] {
    return [...this.players.keys()];
  }

  // ===========================================================================
  // Registration
  // ===========================================================================

  /**
   * Register a player. A name that is already registered is overwritten and
   * keeps its original position in the setup order.
   *
   * @throws StageStateError once setup has been called
   */
  add(name: string, player: Player | PlayFunction): this {
    if (this._state !== 'created') {
      throw new StageStateError(this.name, 'add', this._state);
    }
    this.players.set(name, toPlayer(player));
    return this;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Set up every player, one at a time in registration order.
   *
   * On the first failure the remaining players are skipped, the players
   * already set up are cleaned, and the returned promise rejects with a
   * SetupError naming the failing player. The failing player itself is
   * not cleaned.
   *
   * @throws StageStateError (synchronously) if setup was already called
   */
  setup(): Promise<void> {
    if (this._state !== 'created') {
      throw new StageStateError(this.name, 'setup', this._state);
    }
    this._state = 'setting-up';
    return runWithContextAsync(this.phaseContext('setup'), () => this.setupAll());
  }

  /**
   * Play every player concurrently with the same cancellation token and
   * wait for all of them, however long the slowest takes.
   *
   * Rejects with a PlayError holding one entry per failing player.
   * Cancelling `ctx` does not stop any player; each must honor it.
   *
   * @throws StageNotReadyError (synchronously) unless setup succeeded
   */
  play(ctx: CancellationToken = CancellationToken.none()): Promise<void> {
    if (this._state !== 'ready') {
      throw new StageNotReadyError(this.name, this._state);
    }
    return runWithContextAsync(this.phaseContext('play'), () => this.playAll(ctx));
  }

  /**
   * Clean every player concurrently and wait for all of them. Never
   * rejects: a player's clean failure is logged and dropped.
   *
   * @throws StageStateError (synchronously) while setup is still running
   */
  clean(): Promise<void> {
    if (this._state === 'setting-up') {
      throw new StageStateError(this.name, 'clean', this._state);
    }
    return runWithContextAsync(this.phaseContext('clean'), () => this.cleanAll());
  }

  // ===========================================================================
  // Phases
  // ===========================================================================

  private async setupAll(): Promise<void> {
    const startedAt = Date.now();
    const succeeded: Array<[string, Player]> = [];
    this.logger.phaseStart('setup', { players: this.players.size });

    for (const [name, player] of this.players) {
      try {
        await runWithContextAsync(this.playerContext(name, 'setup'), async () => player.setup());
      } catch (err) {
        const cause = toError(err);
        this.logger.error('Player setup failed', cause, {
          eventName: 'player.setup.failure',
          player: name,
        });

        await this.rollback(succeeded);
        this._state = 'failed';
        this.logger.phaseEnd('setup', false, Date.now() - startedAt, {
          faultyPlayer: name,
          rolledBack: succeeded.map(([n]) => n),
        });
        throw new SetupError(name, cause);
      }
      succeeded.push([name, player]);
    }

    this._state = 'ready';
    this.logger.phaseEnd('setup', true, Date.now() - startedAt, { players: succeeded.length });
  }

  private async playAll(ctx: CancellationToken): Promise<void> {
    const startedAt = Date.now();
    this.logger.phaseStart('play', { players: this.players.size, cancelled: ctx.isCancelled });

    const outcomes = await Promise.all(
      [...this.players].map(([name, player]) => this.playOne(name, player, ctx))
    );

    const failures = new Map<string, Error>();
    for (const outcome of outcomes) {
      if (outcome.error) {
        failures.set(outcome.name, outcome.error);
      }
    }

    this.logger.phaseEnd('play', failures.size === 0, Date.now() - startedAt, {
      players: outcomes.length,
      failedPlayers: [...failures.keys()],
      cancelled: ctx.isCancelled,
    });

    // A nested stage used out of order is a caller bug, not a player failure
    for (const error of failures.values()) {
      if (isStageFault(error)) {
        throw error;
      }
    }

    if (failures.size > 0) {
      throw new PlayError(failures);
    }
  }

  private async playOne(name: string, player: Player, ctx: CancellationToken): Promise<PlayerOutcome> {
    const startedAt = Date.now();
    try {
      await runWithContextAsync(this.playerContext(name, 'play'), async () => player.play(ctx));
      const outcome: PlayerOutcome = { name, durationMs: Date.now() - startedAt };
      this.logger.debug('Player play completed', {
        eventName: 'player.play.success',
        player: name,
        durationMs: outcome.durationMs,
      });
      return outcome;
    } catch (err) {
      const outcome: PlayerOutcome = { name, error: toError(err), durationMs: Date.now() - startedAt };
      this.logger.error('Player play failed', outcome.error, {
        eventName: 'player.play.failure',
        player: name,
        durationMs: outcome.durationMs,
        cancelled: ctx.isCancelled,
      });
      return outcome;
    }
  }

  private async cleanAll(): Promise<void> {
    const startedAt = Date.now();
    this.logger.phaseStart('clean', { players: this.players.size, from: this._state });

    await this.cleanConcurrently([...this.players]);

    this._state = 'cleaned';
    this.logger.phaseEnd('clean', true, Date.now() - startedAt, { players: this.players.size });
  }

  /**
   * Release players that were set up before a sibling failed
   */
  private async rollback(succeeded: Array<[string, Player]>): Promise<void> {
    if (succeeded.length === 0) {
      return;
    }
    this.logger.warn('Rolling back players after setup failure', {
      eventName: 'stage.rollback',
      mode: this.rollbackMode,
      players: succeeded.map(([name]) => name),
    });

    if (this.rollbackMode === 'concurrent') {
      await this.cleanConcurrently(succeeded);
      return;
    }
    // Last set up, first cleaned
    for (const [name, player] of [...succeeded].reverse()) {
      await this.cleanOne(name, player);
    }
  }

  private async cleanConcurrently(entries: Array<[string, Player]>): Promise<void> {
    await Promise.all(entries.map(([name, player]) => this.cleanOne(name, player)));
  }

  private async cleanOne(name: string, player: Player): Promise<void> {
    try {
      await runWithContextAsync(this.playerContext(name, 'clean'), async () => player.clean());
    } catch (err) {
      this.logger.warn('Player clean failed', {
        eventName: 'player.clean.failure',
        player: name,
        error: toError(err).message,
      });
    }
  }

  // ===========================================================================
  // Telemetry
  // ===========================================================================

  private phaseContext(phase: Phase): TelemetryContext {
    return deriveContext('stage', { stage: this.name, player: undefined, phase });
  }

  private playerContext(player: string, phase: Phase): TelemetryContext {
    return deriveContext('player', { stage: this.name, player, phase });
  }
}
