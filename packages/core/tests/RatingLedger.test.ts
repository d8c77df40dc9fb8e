import {
  createTestCore,
  localManifest,
  publishGame,
  registerPlayers,
  type TestCore,
} from '@playhub/testing';
import { beforeEach, describe, expect, it } from 'vitest';
import { GameNotFoundError, InvalidScoreError, NotEligibleError } from '../src/index.js';

describe('PlayTracker', () => {
  let test: TestCore;

  beforeEach(() => {
    let tick = 0;
    test = createTestCore({ clock: () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++)) });
  });

  it('should create a record on the first start and count later ones', async () => {
    const first = await test.core.tracker.markStarted('alice', 'snake');
    const second = await test.core.tracker.markStarted('alice', 'snake');

    expect(first.plays).toBe(1);
    expect(second).toMatchObject({ hasStarted: true, plays: 2 });
    expect(second.firstStartedAt).toEqual(first.firstStartedAt);
    expect(second.lastStartedAt.getTime()).toBeGreaterThan(first.lastStartedAt.getTime());
  });

  it('should count concurrent starts without losing any', async () => {
    await Promise.all([
      test.core.tracker.markStarted('alice', 'snake'),
      test.core.tracker.markStarted('alice', 'snake'),
      test.core.tracker.markStarted('alice', 'snake'),
    ]);

    expect(test.core.tracker.record('alice', 'snake')?.plays).toBe(3);
  });

  it('should list a player records per game', async () => {
    await test.core.tracker.markStarted('alice', 'snake');
    await test.core.tracker.markStarted('alice', 'pong');
    await test.core.tracker.markStarted('bob', 'pong');

    expect(test.core.tracker.recordsForPlayer('alice').map((r) => r.gameId)).toEqual([
      'snake',
      'pong',
    ]);
    expect(test.core.tracker.isEligible('bob', 'snake')).toBe(false);
  });
});

describe('RatingLedger', () => {
  let test: TestCore;

  beforeEach(async () => {
    test = createTestCore();
    await registerPlayers(test.core, 'alice', 'bob', 'carol');
    await publishGame(test, { name: 'Snake', label: 'v1', manifest: localManifest(1, 3) });
  });

  async function play(...players: string[]): Promise<void> {
    for (const player of players) {
      await test.core.tracker.markStarted(player, 'snake');
    }
  }

  describe('submitRating', () => {
    it('should store a rating from an eligible player', async () => {
      await play('alice');

      const rating = await test.core.ratings.submitRating('alice', 'snake', 4, 'fun');

      expect(rating).toMatchObject({
        playerId: 'alice',
        gameId: 'snake',
        score: 4,
        comment: 'fun',
      });
      expect(test.core.ratings.ratingOf('alice', 'snake')?.score).toBe(4);
    });

    it('should reject players who never started the game', async () => {
      await expect(test.core.ratings.submitRating('bob', 'snake', 5, '')).rejects.toThrow(
        NotEligibleError
      );
      expect(test.core.ratings.ratingsFor('snake')).toEqual([]);
    });

    it('should reject scores outside 1 to 5 or not whole', async () => {
      await play('alice');

      for (const score of [0, 6, 3.5, Number.NaN]) {
        await expect(test.core.ratings.submitRating('alice', 'snake', score, '')).rejects.toThrow(
          InvalidScoreError
        );
      }
    });

    it('should check the score before eligibility', async () => {
      await expect(test.core.ratings.submitRating('bob', 'snake', 9, '')).rejects.toThrow(
        'Score 9 is not an integer between 1 and 5'
      );
    });

    it('should reject unknown games', async () => {
      await expect(test.core.ratings.submitRating('alice', 'tetris', 3, '')).rejects.toThrow(
        GameNotFoundError
      );
    });

    it('should replace an earlier rating by the same player', async () => {
      await play('alice');

      await test.core.ratings.submitRating('alice', 'snake', 2, 'meh');
      await test.core.ratings.submitRating('alice', 'snake', 5, 'grew on me');

      expect(test.core.ratings.ratingsFor('snake')).toHaveLength(1);
      expect(test.core.ratings.aggregate('snake')).toEqual({ count: 1, mean: 5 });
    });

    it('should keep eligibility after the game is delisted', async () => {
      await play('alice');
      await test.core.catalog.delist('snake', 'dev');

      await expect(test.core.ratings.submitRating('alice', 'snake', 3, '')).resolves.toMatchObject({
        score: 3,
      });
    });

    it('should honour configured score bounds', async () => {
      const wide = createTestCore({ ratings: { minScore: 0, maxScore: 10 } });
      await publishGame(wide, { name: 'Snake', label: 'v1', manifest: localManifest(1, 1) });
      await wide.core.tracker.markStarted('alice', 'snake');

      await expect(
        wide.core.ratings.submitRating('alice', 'snake', 10, '')
      ).resolves.toMatchObject({
        score: 10,
      });
      await expect(wide.core.ratings.submitRating('alice', 'snake', 11, '')).rejects.toThrow(
        'Score 11 is not an integer between 0 and 10'
      );
    });
  });

  describe('aggregate', () => {
    it('should report no mean without ratings', () => {
      expect(test.core.ratings.aggregate('snake')).toEqual({ count: 0, mean: null });
    });

    it('should round the mean to two decimals', async () => {
      await play('alice', 'bob', 'carol');
      await test.core.ratings.submitRating('alice', 'snake', 5, '');
      await test.core.ratings.submitRating('bob', 'snake', 4, '');
      await test.core.ratings.submitRating('carol', 'snake', 4, '');

      expect(test.core.ratings.aggregate('snake')).toEqual({ count: 3, mean: 4.33 });
    });
  });
});
