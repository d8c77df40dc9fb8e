/**
 * @fileoverview Domain types shared by the PlayHub core components.
 */

import type { GameManifest } from './manifest.js';

export type DeveloperId = string;
export type PlayerId = string;
export type GameId = string;
export type RoomId = string;

/**
 * Version identifier, `<gameId>@<label>`.
 */
export type VersionId = string;

/**
 * Opaque reference to a package blob held by the blob store.
 */
export type BlobId = string;

export type AccountRole = 'developer' | 'player';

export type ListingState = 'listed' | 'delisted';

export interface GameMetadata {
  /** Display name; the game id is derived from it */
  readonly name: string;
  readonly description: string;
  /** Free-form category, e.g. 'cli' or 'gui' */
  readonly gameType: string;
}

/**
 * An immutable, labeled release of a game.
 */
export interface Version {
  readonly id: VersionId;
  readonly gameId: GameId;
  /** Developer-supplied label; never assumed to be monotonic */
  readonly label: string;
  readonly blobId: BlobId;
  readonly manifest: GameManifest;
  readonly uploadedAt: Date;
  readonly notes: string;
}

export interface Game extends GameMetadata {
  readonly id: GameId;
  readonly developerId: DeveloperId;
  readonly listing: ListingState;
  /** Append order; the last entry is the latest version */
  readonly versions: readonly Version[];
  readonly createdAt: Date;
  readonly delistedAt?: Date | undefined;
}

export type RoomState = 'waiting' | 'running' | 'closed';

export interface ConnectionInfo {
  readonly host: string;
  readonly port: number;
}

export interface Room {
  readonly id: RoomId;
  readonly gameId: GameId;
  /** Label of the version bound at creation */
  readonly version: string;
  readonly versionId: VersionId;
  readonly manifest: GameManifest;
  readonly hostId: PlayerId;
  /** Join order */
  readonly roster: readonly PlayerId[];
  readonly state: RoomState;
  readonly connection: ConnectionInfo | null;
  readonly createdAt: Date;
  readonly startedAt?: Date | undefined;
  readonly closedAt?: Date | undefined;
  readonly closedReason?: string | undefined;
}

export interface PlayRecord {
  readonly playerId: PlayerId;
  readonly gameId: GameId;
  readonly hasStarted: true;
  /** Number of successful launches that included the player */
  readonly plays: number;
  readonly firstStartedAt: Date;
  readonly lastStartedAt: Date;
}

export interface Rating {
  readonly playerId: PlayerId;
  readonly gameId: GameId;
  readonly score: number;
  readonly comment: string;
  readonly submittedAt: Date;
}

export interface RatingAggregate {
  readonly count: number;
  /** Rounded to two decimals; null when there are no ratings */
  readonly mean: number | null;
}

/**
 * Returned by a successful launch. The caller runs `entryPoint` locally
 * and connects to `connection` when the game has a shared server.
 */
export interface LaunchResult {
  readonly roomId: RoomId;
  readonly gameId: GameId;
  readonly version: string;
  readonly entryPoint: string;
  readonly connection: ConnectionInfo | null;
  readonly players: readonly PlayerId[];
}

/**
 * Who asked for a room to close: its host, or the launcher after the
 * game server process exited.
 */
export type CloseRequester =
  | { readonly kind: 'player'; readonly playerId: PlayerId }
  | { readonly kind: 'system'; readonly reason: string };

/**
 * Injectable clock.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
