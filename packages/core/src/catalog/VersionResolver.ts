import { VersionNotFoundError } from '../errors.js';
import type { GameId, Version } from '../types.js';
import type { CatalogStore } from './CatalogStore.js';

/**
 * Resolves a game id and an optional label to a concrete version.
 *
 * Without a label the resolver returns the version appended last, not the
 * "highest" label: labels are developer-supplied and need not sort.
 */
export class VersionResolver {
  constructor(private readonly catalog: CatalogStore) {}

  /**
   * @throws {GameNotFoundError} if the game id is unknown
   * @throws {VersionNotFoundError} if the label does not exist
   */
  resolve(gameId: GameId, requestedLabel?: string): Version {
    if (requestedLabel === undefined) {
      return this.catalog.latestVersion(gameId);
    }
    const game = this.catalog.getGame(gameId);
    const version = game.versions.find((v) => v.label === requestedLabel);
    if (!version) {
      throw new VersionNotFoundError(gameId, requestedLabel);
    }
    return version;
  }
}
