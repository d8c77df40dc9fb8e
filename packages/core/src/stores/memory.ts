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
import type {
  AccountRecord,
  AccountRepository,
  CoreStores,
  GameRepository,
  PlayRecordRepository,
  RatingRepository,
  RoomRepository,
} from './interfaces.js';

function pairKey(playerId: PlayerId, gameId: GameId): string {
  return `${playerId}::${gameId}`;
}

/** Called after every write; the file-backed stores persist from here */
export type ChangeListener = () => void;

const ignoreChange: ChangeListener = () => {};

/**
 * In-memory account store.
 */
export class InMemoryAccountRepository implements AccountRepository {
  private readonly accounts = new Map<string, AccountRecord>();

  constructor(
    initial: Iterable<AccountRecord> = [],
    private readonly onChange: ChangeListener = ignoreChange
  ) {
    for (const account of initial) {
      this.accounts.set(`${account.role}:${account.id}`, account);
    }
  }

  get(role: AccountRole, id: string): AccountRecord | undefined {
    return this.accounts.get(`${role}:${id}`);
  }

  save(account: AccountRecord): void {
    this.accounts.set(`${account.role}:${account.id}`, account);
    this.onChange();
  }

  list(role: AccountRole): AccountRecord[] {
    return Array.from(this.accounts.values()).filter((a) => a.role === role);
  }

  all(): AccountRecord[] {
    return Array.from(this.accounts.values());
  }
}

/**
 * In-memory game catalog.
 */
export class InMemoryGameRepository implements GameRepository {
  private readonly games = new Map<GameId, Game>();

  constructor(
    initial: Iterable<Game> = [],
    private readonly onChange: ChangeListener = ignoreChange
  ) {
    for (const game of initial) {
      this.games.set(game.id, game);
    }
  }

  get(gameId: GameId): Game | undefined {
    return this.games.get(gameId);
  }

  save(game: Game): void {
    this.games.set(game.id, game);
    this.onChange();
  }

  list(): Game[] {
    return Array.from(this.games.values());
  }
}

/**
 * In-memory room store with a monotonically increasing id counter. Only the
 * counter is reported as a change: rooms do not outlive their process.
 */
export class InMemoryRoomRepository implements RoomRepository {
  private readonly rooms = new Map<RoomId, Room>();
  private counter: number;

  constructor(lastId = 0, private readonly onChange: ChangeListener = ignoreChange) {
    this.counter = lastId;
  }

  /** Highest id handed out so far */
  get lastId(): number {
    return this.counter;
  }

  nextId(): RoomId {
    this.counter++;
    this.onChange();
    return String(this.counter);
  }

  get(roomId: RoomId): Room | undefined {
    return this.rooms.get(roomId);
  }

  save(room: Room): void {
    this.rooms.set(room.id, room);
  }

  delete(roomId: RoomId): boolean {
    return this.rooms.delete(roomId);
  }

  list(): Room[] {
    return Array.from(this.rooms.values());
  }
}

export class InMemoryPlayRecordRepository implements PlayRecordRepository {
  private readonly records = new Map<string, PlayRecord>();

  constructor(
    initial: Iterable<PlayRecord> = [],
    private readonly onChange: ChangeListener = ignoreChange
  ) {
    for (const record of initial) {
      this.records.set(pairKey(record.playerId, record.gameId), record);
    }
  }

  get(playerId: PlayerId, gameId: GameId): PlayRecord | undefined {
    return this.records.get(pairKey(playerId, gameId));
  }

  save(record: PlayRecord): void {
    this.records.set(pairKey(record.playerId, record.gameId), record);
    this.onChange();
  }

  listByPlayer(playerId: PlayerId): PlayRecord[] {
    return Array.from(this.records.values()).filter((r) => r.playerId === playerId);
  }

  all(): PlayRecord[] {
    return Array.from(this.records.values());
  }
}

export class InMemoryRatingRepository implements RatingRepository {
  private readonly ratings = new Map<string, Rating>();

  constructor(
    initial: Iterable<Rating> = [],
    private readonly onChange: ChangeListener = ignoreChange
  ) {
    for (const rating of initial) {
      this.ratings.set(pairKey(rating.playerId, rating.gameId), rating);
    }
  }

  get(playerId: PlayerId, gameId: GameId): Rating | undefined {
    return this.ratings.get(pairKey(playerId, gameId));
  }

  save(rating: Rating): void {
    this.ratings.set(pairKey(rating.playerId, rating.gameId), rating);
    this.onChange();
  }

  listByGame(gameId: GameId): Rating[] {
    return Array.from(this.ratings.values()).filter((r) => r.gameId === gameId);
  }

  all(): Rating[] {
    return Array.from(this.ratings.values());
  }
}

export function createMemoryStores(): CoreStores {
  return {
    accounts: new InMemoryAccountRepository(),
    games: new InMemoryGameRepository(),
    rooms: new InMemoryRoomRepository(),
    playRecords: new InMemoryPlayRecordRepository(),
    ratings: new InMemoryRatingRepository(),
  };
}
