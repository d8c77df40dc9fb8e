/**
 * @fileoverview Stores persisted to a single JSON data file.
 *
 * The in-memory repositories hold the working set; every write rewrites the
 * file. Accounts, the catalog, play records and ratings are kept. Rooms are
 * not: their game servers and rosters end with the process, so only the room
 * id counter is saved and ids are never reused.
 */

import { z } from 'zod';
import { GameManifestSchema } from '../manifest.js';
import type { Game, PlayRecord, Rating } from '../types.js';
import { logger } from '../utils/logger.js';
import type { AccountRecord, CoreStores } from './interfaces.js';
import { readJsonFile, writeJsonFile } from './jsonFile.js';
import {
  InMemoryAccountRepository,
  InMemoryGameRepository,
  InMemoryPlayRecordRepository,
  InMemoryRatingRepository,
  InMemoryRoomRepository,
} from './memory.js';

const timestamp = z.coerce.date();

const AccountSchema = z.object({
  role: z.enum(['developer', 'player']),
  id: z.string(),
  registeredAt: timestamp,
});

const VersionSchema = z.object({
  id: z.string(),
  gameId: z.string(),
  label: z.string(),
  blobId: z.string(),
  manifest: GameManifestSchema,
  uploadedAt: timestamp,
  notes: z.string(),
});

const GameSchema = z.object({
  id: z.string(),
  developerId: z.string(),
  name: z.string(),
  description: z.string(),
  gameType: z.string(),
  listing: z.enum(['listed', 'delisted']),
  versions: z.array(VersionSchema),
  createdAt: timestamp,
  delistedAt: timestamp.optional(),
});

const PlayRecordSchema = z.object({
  playerId: z.string(),
  gameId: z.string(),
  hasStarted: z.literal(true),
  plays: z.number().int().positive(),
  firstStartedAt: timestamp,
  lastStartedAt: timestamp,
});

const RatingSchema = z.object({
  playerId: z.string(),
  gameId: z.string(),
  score: z.number(),
  comment: z.string(),
  submittedAt: timestamp,
});

const DataFileSchema = z.object({
  format: z.literal(1),
  lastRoomId: z.number().int().min(0),
  accounts: z.array(AccountSchema),
  games: z.array(GameSchema),
  playRecords: z.array(PlayRecordSchema),
  ratings: z.array(RatingSchema),
});

interface DataFile {
  readonly format: 1;
  readonly lastRoomId: number;
  readonly accounts: readonly AccountRecord[];
  readonly games: readonly Game[];
  readonly playRecords: readonly PlayRecord[];
  readonly ratings: readonly Rating[];
}

/**
 * Core stores backed by one JSON file, loaded on construction and written
 * synchronously on every change.
 *
 * @example
 * const stores = new JsonFileStores('data/playhub.json');
 * const core = createCore({ blobs, processes, stores });
 */
export class JsonFileStores implements CoreStores {
  readonly accounts: InMemoryAccountRepository;
  readonly games: InMemoryGameRepository;
  readonly rooms: InMemoryRoomRepository;
  readonly playRecords: InMemoryPlayRecordRepository;
  readonly ratings: InMemoryRatingRepository;

  /**
   * @throws {Error} if the file exists but is not a valid data file
   */
  constructor(private readonly path: string) {
    const saved = readJsonFile(path, DataFileSchema);
    const persist = (): void => this.flush();

    this.accounts = new InMemoryAccountRepository(saved?.accounts, persist);
    this.games = new InMemoryGameRepository(saved?.games, persist);
    this.rooms = new InMemoryRoomRepository(saved?.lastRoomId, persist);
    this.playRecords = new InMemoryPlayRecordRepository(saved?.playRecords, persist);
    this.ratings = new InMemoryRatingRepository(saved?.ratings, persist);

    if (saved) {
      logger.info('Data file loaded', {
        path,
        accounts: saved.accounts.length,
        games: saved.games.length,
      });
    }
  }

  /** Write the current state to the data file. */
  flush(): void {
    const data: DataFile = {
      format: 1,
      lastRoomId: this.rooms.lastId,
      accounts: this.accounts.all(),
      games: this.games.list(),
      playRecords: this.playRecords.all(),
      ratings: this.ratings.all(),
    };
    writeJsonFile(this.path, data);
  }
}
