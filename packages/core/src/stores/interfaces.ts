/**
 * @fileoverview Storage seams of the core.
 *
 * Components receive their store at construction instead of sharing module
 * state. Stores hold immutable records; components replace a record to
 * change it, while holding the lock for that entity.
 */

import type {
  AccountRole,
  Game,
  GameId,
  PlayerId,
  PlayRecord,
  Rating,
  Room,
  RoomId,
} from '../types.js';

export interface AccountRecord {
  readonly role: AccountRole;
  readonly id: string;
  readonly registeredAt: Date;
}

export interface AccountRepository {
  get(role: AccountRole, id: string): AccountRecord | undefined;
  save(account: AccountRecord): void;
  list(role: AccountRole): AccountRecord[];
}

export interface GameRepository {
  get(gameId: GameId): Game | undefined;
  save(game: Game): void;
  /** Creation order */
  list(): Game[];
}

export interface RoomRepository {
  /** Next room id; ids are never reused */
  nextId(): RoomId;
  get(roomId: RoomId): Room | undefined;
  save(room: Room): void;
  delete(roomId: RoomId): boolean;
  /** Creation order */
  list(): Room[];
}

export interface PlayRecordRepository {
  get(playerId: PlayerId, gameId: GameId): PlayRecord | undefined;
  save(record: PlayRecord): void;
  listByPlayer(playerId: PlayerId): PlayRecord[];
}

export interface RatingRepository {
  get(playerId: PlayerId, gameId: GameId): Rating | undefined;
  save(rating: Rating): void;
  listByGame(gameId: GameId): Rating[];
}

export interface CoreStores {
  readonly accounts: AccountRepository;
  readonly games: GameRepository;
  readonly rooms: RoomRepository;
  readonly playRecords: PlayRecordRepository;
  readonly ratings: RatingRepository;
}
