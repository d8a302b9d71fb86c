/**
 * Test doubles for stage tests
 */

import { createLogger, type Logger } from '@troupe/core';
import type { CancellationToken } from '../cancellation.js';
import type { Player } from '../player.js';

export interface FakeBehavior {
  setupError?: unknown;
  playError?: unknown;
  cleanError?: unknown;
  /** Delay before play settles */
  playDelayMs?: number;
  /** Delay before clean settles */
  cleanDelayMs?: number;
  /** Custom play body, run before playError is thrown */
  onPlay?: (ctx: CancellationToken) => Promise<void>;
}

/**
 * Player that records every lifecycle call in a shared journal
 */
export class FakePlayer implements Player {
  setupCalls = 0;
  playCalls = 0;
  cleanCalls = 0;
  finishedPlaying = false;
  finishedCleaning = false;
  receivedTokens: CancellationToken[] = [];

  constructor(
    readonly label: string,
    private readonly journal: string[],
    private readonly behavior: FakeBehavior = {}
  ) {}

  async setup(): Promise<void> {
    this.setupCalls++;
    this.journal.push(`setup:${this.label}`);
    if (this.behavior.setupError !== undefined) {
      throw this.behavior.setupError;
    }
  }

  async play(ctx: CancellationToken): Promise<void> {
    this.playCalls++;
    this.receivedTokens.push(ctx);
    this.journal.push(`play:${this.label}`);
    if (this.behavior.playDelayMs !== undefined) {
      await delay(this.behavior.playDelayMs);
    }
    if (this.behavior.onPlay) {
      await this.behavior.onPlay(ctx);
    }
    this.finishedPlaying = true;
    this.journal.push(`played:${this.label}`);
    if (this.behavior.playError !== undefined) {
      throw this.behavior.playError;
    }
  }

  async clean(): Promise<void> {
    this.cleanCalls++;
    this.journal.push(`clean:${this.label}`);
    if (this.behavior.cleanDelayMs !== undefined) {
      await delay(this.behavior.cleanDelayMs);
    }
    this.finishedCleaning = true;
    this.journal.push(`cleaned:${this.label}`);
    if (this.behavior.cleanError !== undefined) {
      throw this.behavior.cleanError;
    }
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Resolves once `count` parties have arrived. Only concurrent callers can
 * all get through; sequential ones would wait forever.
 */
export function createBarrier(count: number): () => Promise<void> {
  let arrived = 0;
  let release: () => void = () => undefined;
  const open = new Promise<void>((resolve) => {
    release = resolve;
  });
  return () => {
    arrived++;
    if (arrived === count) {
      release();
    }
    return open;
  };
}

export function silentLogger(): Logger {
  return createLogger('stage-test', { minSeverity: 'CRITICAL', prettyPrint: false });
}
