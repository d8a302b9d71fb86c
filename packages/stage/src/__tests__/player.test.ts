/**
 * Tests for the player contract helpers
 *
 * @module @troupe/stage/__tests__/player
 */

import { describe, it, expect, vi } from 'vitest';
import { SimplePlayer, isPlayer, simplePlayer, toPlayer } from '../player.js';
import { CancellationToken } from '../cancellation.js';
import { FakePlayer } from './helpers.js';

describe('SimplePlayer', () => {
  it('should set up and clean without doing anything', () => {
    const run = vi.fn(async () => undefined);
    const player = new SimplePlayer(run);

    expect(player.setup()).toBeUndefined();
    expect(player.clean()).toBeUndefined();
    expect(run).not.toHaveBeenCalled();
  });

  it('should forward play to the wrapped function with the token', async () => {
    const run = vi.fn(async () => undefined);
    const player = simplePlayer(run);
    const token = CancellationToken.none();

    await player.play(token);

    expect(run).toHaveBeenCalledTimes(1);
    expect(run).toHaveBeenCalledWith(token);
  });

  it('should return the wrapped function outcome unchanged', async () => {
    const failure = new Error('worker crashed');
    const player = simplePlayer(async () => {
      throw failure;
    });

    await expect(player.play(CancellationToken.none())).rejects.toBe(failure);
  });

  it('should be playable more than once', async () => {
    const run = vi.fn(async () => undefined);
    const player = simplePlayer(run);

    await player.play(CancellationToken.none());
    await player.play(CancellationToken.none());

    expect(run).toHaveBeenCalledTimes(2);
  });
});

describe('isPlayer', () => {
  it('should accept objects with setup, play and clean methods', () => {
    expect(isPlayer(new FakePlayer('a', []))).toBe(true);
    expect(isPlayer(simplePlayer(async () => undefined))).toBe(true);
    expect(isPlayer({ setup: () => undefined, play: async () => undefined, clean: () => undefined })).toBe(true);
  });

  it('should reject anything else', () => {
    expect(isPlayer(null)).toBe(false);
    expect(isPlayer(async () => undefined)).toBe(false);
    expect(isPlayer({ setup: () => undefined, play: async () => undefined })).toBe(false);
    expect(isPlayer({ setup: 1, play: 2, clean: 3 })).toBe(false);
  });
});

describe('toPlayer', () => {
  it('should return players as they are', () => {
    const player = new FakePlayer('a', []);
    expect(toPlayer(player)).toBe(player);
  });

  it('should wrap functions in a SimplePlayer', () => {
    expect(toPlayer(async () => undefined)).toBeInstanceOf(SimplePlayer);
  });
});
