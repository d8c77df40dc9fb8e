import type { PlayRecordRepository } from '../stores/interfaces.js';
import { type Clock, type GameId, type PlayerId, type PlayRecord, systemClock } from '../types.js';
import { KeyedMutex } from '../utils/KeyedMutex.js';

/**
 * Records which players have started which games.
 *
 * Monotonic: records are only ever created or incremented, never cleared,
 * including when a game is delisted or a version disappears. Only the
 * launcher calls {@link markStarted}.
 */
export class PlayTracker {
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly records: PlayRecordRepository,
    private readonly clock: Clock = systemClock
  ) {}

  markStarted(playerId: PlayerId, gameId: GameId): Promise<PlayRecord> {
    return this.locks.runExclusive(`${playerId}::${gameId}`, () => {
      const now = this.clock();
      const existing = this.records.get(playerId, gameId);
      const record: PlayRecord = existing
        ? { ...existing, plays: existing.plays + 1, lastStartedAt: now }
        : { playerId, gameId, hasStarted: true, plays: 1, firstStartedAt: now, lastStartedAt: now };
      this.records.save(record);
      return record;
    });
  }

  isEligible(playerId: PlayerId, gameId: GameId): boolean {
    return this.records.get(playerId, gameId)?.hasStarted === true;
  }

  record(playerId: PlayerId, gameId: GameId): PlayRecord | undefined {
    return this.records.get(playerId, gameId);
  }

  recordsForPlayer(playerId: PlayerId): PlayRecord[] {
    return this.records.listByPlayer(playerId);
  }
}
