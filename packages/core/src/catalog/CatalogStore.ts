/**
 * @fileoverview Catalog of games and their append-only version history.
 *
 * Listing queries hide delisted games; direct lookups by id do not, so
 * rooms and downloads already bound to a version keep working after a
 * developer removes a game.
 */

import type { AccountDirectory } from '../accounts/AccountDirectory.js';
import {
  DuplicateGameError,
  DuplicateVersionError,
  GameDelistedError,
  GameNotFoundError,
  NotAuthorizedError,
  NotOwnerError,
  VersionNotFoundError,
} from '../errors.js';
import { parseManifest } from '../manifest.js';
import type { GameRepository } from '../stores/interfaces.js';
import {
  type BlobId,
  type Clock,
  type DeveloperId,
  type Game,
  type GameId,
  type GameMetadata,
  type Version,
  systemClock,
} from '../types.js';
import { KeyedMutex } from '../utils/KeyedMutex.js';
import { logger } from '../utils/logger.js';

/**
 * Derive a game id from its display name.
 * @example slugifyGameName('Dice Duel!') === 'dice-duel'
 */
export function slugifyGameName(name: string): GameId {
  const slug = name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'game';
}

export function versionIdOf(gameId: GameId, label: string): string {
  return `${gameId}@${label}`;
}

export interface NewVersion {
  readonly label: string;
  readonly blobId: BlobId;
  /** Raw manifest, validated here */
  readonly manifest: unknown;
  readonly notes?: string;
}

export class CatalogStore {
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly games: GameRepository,
    private readonly accounts: AccountDirectory,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Create a game, optionally together with its first version. The game is
   * saved once, so a rejected first version leaves no game behind. Its id
   * is the slug of its name.
   * @throws {NotAuthorizedError} if the developer is unknown
   * @throws {DuplicateGameError} if the id is taken
   * @throws {InvalidManifestError} if the first version's manifest is malformed
   */
  createGame(
    developerId: DeveloperId,
    metadata: GameMetadata,
    firstVersion?: NewVersion
  ): Promise<Game> {
    const gameId = slugifyGameName(metadata.name);
    return this.locks.runExclusive(gameId, () => {
      if (!this.accounts.has('developer', developerId)) {
        throw new NotAuthorizedError(developerId, `Unknown developer: ${developerId}`);
      }
      if (this.games.get(gameId)) {
        throw new DuplicateGameError(gameId);
      }
      const game: Game = {
        id: gameId,
        developerId,
        name: metadata.name,
        description: metadata.description,
        gameType: metadata.gameType,
        listing: 'listed',
        versions: firstVersion ? [this.buildVersion(gameId, firstVersion)] : [],
        createdAt: this.clock(),
      };
      this.games.save(game);
      logger.info('Game created', { gameId, developerId, version: firstVersion?.label });
      return game;
    });
  }

  /**
   * Append a version to a game.
   * @throws {GameNotFoundError}
   * @throws {NotOwnerError} if the developer does not own the game
   * @throws {GameDelistedError} if the game was delisted
   * @throws {InvalidManifestError} if the manifest is malformed
   * @throws {DuplicateVersionError} if the label already exists
   */
  addVersion(gameId: GameId, developerId: DeveloperId, version: NewVersion): Promise<Version> {
    return this.locks.runExclusive(gameId, () => {
      const game = this.requireOwned(gameId, developerId);
      if (game.listing === 'delisted') {
        throw new GameDelistedError(gameId);
      }
      const created = this.buildVersion(gameId, version);
      if (game.versions.some((v) => v.label === version.label)) {
        throw new DuplicateVersionError(gameId, version.label);
      }
      this.games.save({ ...game, versions: [...game.versions, created] });
      logger.info('Version added', { gameId, version: version.label });
      return created;
    });
  }

  /**
   * Hide a game from listings. Idempotent; versions are kept.
   * @throws {GameNotFoundError}
   * @throws {NotOwnerError}
   */
  delist(gameId: GameId, developerId: DeveloperId): Promise<Game> {
    return this.locks.runExclusive(gameId, () => {
      const game = this.requireOwned(gameId, developerId);
      if (game.listing === 'delisted') {
        return game;
      }
      const delisted: Game = { ...game, listing: 'delisted', delistedAt: this.clock() };
      this.games.save(delisted);
      logger.info('Game delisted', { gameId, developerId });
      return delisted;
    });
  }

  /**
   * Look up a game by id, including delisted games.
   * @throws {GameNotFoundError}
   */
  getGame(gameId: GameId): Game {
    const game = this.games.get(gameId);
    if (!game) {
      throw new GameNotFoundError(gameId);
    }
    return game;
  }

  tryGetGame(gameId: GameId): Game | undefined {
    return this.games.get(gameId);
  }

  /**
   * The most recently appended version.
   * @throws {GameNotFoundError}
   * @throws {VersionNotFoundError} if the game has no versions yet
   */
  latestVersion(gameId: GameId): Version {
    const game = this.getGame(gameId);
    const latest = game.versions.at(-1);
    if (!latest) {
      throw new VersionNotFoundError(gameId, undefined);
    }
    return latest;
  }

  findVersion(gameId: GameId, label: string): Version | undefined {
    return this.games.get(gameId)?.versions.find((v) => v.label === label);
  }

  /**
   * Listed games, in creation order.
   */
  listGames(): Game[] {
    return this.games.list().filter((g) => g.listing === 'listed');
  }

  /**
   * All games of a developer, delisted ones included.
   */
  listByDeveloper(developerId: DeveloperId): Game[] {
    return this.games.list().filter((g) => g.developerId === developerId);
  }

  private buildVersion(gameId: GameId, version: NewVersion): Version {
    const versionId = versionIdOf(gameId, version.label);
    return {
      id: versionId,
      gameId,
      label: version.label,
      blobId: version.blobId,
      manifest: parseManifest(version.manifest, versionId),
      uploadedAt: this.clock(),
      notes: version.notes ?? '',
    };
  }

  private requireOwned(gameId: GameId, developerId: DeveloperId): Game {
    const game = this.getGame(gameId);
    if (game.developerId !== developerId) {
      throw new NotOwnerError(gameId, developerId);
    }
    return game;
  }
}
