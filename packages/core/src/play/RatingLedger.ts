import type { CatalogStore } from '../catalog/CatalogStore.js';
import { InvalidScoreError, NotEligibleError } from '../errors.js';
import type { RatingRepository } from '../stores/interfaces.js';
import {
  type Clock,
  type GameId,
  type PlayerId,
  type Rating,
  type RatingAggregate,
  systemClock,
} from '../types.js';
import { KeyedMutex } from '../utils/KeyedMutex.js';
import { logger } from '../utils/logger.js';
import type { PlayTracker } from './PlayTracker.js';

export interface ScoreBounds {
  minScore: number;
  maxScore: number;
}

export const DEFAULT_SCORE_BOUNDS: ScoreBounds = {
  minScore: 1,
  maxScore: 5,
};

/**
 * One rating per (player, game), last write wins. Only players the tracker
 * reports as eligible may rate.
 */
export class RatingLedger {
  private readonly locks = new KeyedMutex();
  private readonly bounds: ScoreBounds;

  constructor(
    private readonly ratings: RatingRepository,
    private readonly tracker: PlayTracker,
    private readonly catalog: CatalogStore,
    bounds: Partial<ScoreBounds> = {},
    private readonly clock: Clock = systemClock
  ) {
    this.bounds = { ...DEFAULT_SCORE_BOUNDS, ...bounds };
  }

  /**
   * @throws {InvalidScoreError} if the score is not an integer within bounds
   * @throws {GameNotFoundError}
   * @throws {NotEligibleError} if the player never started the game
   */
  submitRating(
    playerId: PlayerId,
    gameId: GameId,
    score: number,
    comment: string
  ): Promise<Rating> {
    const { minScore, maxScore } = this.bounds;
    if (!Number.isInteger(score) || score < minScore || score > maxScore) {
      return Promise.reject(new InvalidScoreError(gameId, score, minScore, maxScore));
    }

    return this.locks.runExclusive(`${playerId}::${gameId}`, () => {
      this.catalog.getGame(gameId);
      if (!this.tracker.isEligible(playerId, gameId)) {
        throw new NotEligibleError(gameId, playerId);
      }
      const rating: Rating = { playerId, gameId, score, comment, submittedAt: this.clock() };
      this.ratings.save(rating);
      logger.info('Rating submitted', { gameId, playerId, score });
      return rating;
    });
  }

  /**
   * Computed on read.
   */
  aggregate(gameId: GameId): RatingAggregate {
    const ratings = this.ratings.listByGame(gameId);
    if (ratings.length === 0) {
      return { count: 0, mean: null };
    }
    const total = ratings.reduce((sum, r) => sum + r.score, 0);
    return { count: ratings.length, mean: Math.round((total / ratings.length) * 100) / 100 };
  }

  ratingsFor(gameId: GameId): Rating[] {
    return this.ratings.listByGame(gameId);
  }

  ratingOf(playerId: PlayerId, gameId: GameId): Rating | undefined {
    return this.ratings.get(playerId, gameId);
  }
}
