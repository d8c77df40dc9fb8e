/**
 * @fileoverview Room lifecycle.
 *
 * A room binds one game version, fixed when the room is created, and an
 * ordered roster of players. State machine:
 *
 *   waiting --start--> running --(process exit | close)--> closed
 *
 * Nothing leaves `closed`. Every operation on a room runs under that
 * room's lock; operations on different rooms never wait for each other.
 */

import type { AccountDirectory } from '../accounts/AccountDirectory.js';
import type { CatalogStore } from '../catalog/CatalogStore.js';
import type { VersionResolver } from '../catalog/VersionResolver.js';
import {
  AlreadyJoinedError,
  GameDelistedError,
  GameNotPlayableError,
  NotAuthorizedError,
  RoomClosedError,
  RoomFullError,
  RoomLimitReachedError,
  RoomNotFoundError,
  RoomNotWaitingError,
} from '../errors.js';
import { GameManifestSchema } from '../manifest.js';
import type { RoomRepository } from '../stores/interfaces.js';
import {
  type Clock,
  type CloseRequester,
  type ConnectionInfo,
  type GameId,
  type PlayerId,
  type Room,
  type RoomId,
  systemClock,
} from '../types.js';
import { KeyedMutex } from '../utils/KeyedMutex.js';
import { logger } from '../utils/logger.js';

export interface RoomRegistryConfig {
  /** Maximum number of rooms that are not closed; 0 means unlimited */
  maxRooms: number;
  /** How long a closed room stays inspectable before {@link RoomRegistry.reap} drops it */
  closedGraceMs: number;
}

export const DEFAULT_ROOM_REGISTRY_CONFIG: RoomRegistryConfig = {
  maxRooms: 0,
  closedGraceMs: 30_000,
};

/**
 * Exclusive access to one room, valid only while the task passed to
 * {@link RoomRegistry.withRoom} runs.
 */
export interface RoomHandle {
  /** The room as it was when the lock was acquired */
  readonly room: Room;
  /** Transition waiting → running and record the connection info */
  markRunning(connection: ConnectionInfo | null): Room;
}

export type RoomClosedListener = (room: Room) => void;

export interface RoomRegistryDeps {
  readonly rooms: RoomRepository;
  readonly catalog: CatalogStore;
  readonly resolver: VersionResolver;
  readonly accounts: AccountDirectory;
}

export class RoomRegistry {
  private readonly locks = new KeyedMutex();
  private readonly closedListeners: RoomClosedListener[] = [];
  private readonly config: RoomRegistryConfig;
  private readonly rooms: RoomRepository;

  constructor(
    private readonly deps: RoomRegistryDeps,
    config: Partial<RoomRegistryConfig> = {},
    private readonly clock: Clock = systemClock
  ) {
    this.rooms = deps.rooms;
    this.config = { ...DEFAULT_ROOM_REGISTRY_CONFIG, ...config };
  }

  /**
   * Register a listener invoked after a room closes.
   */
  onRoomClosed(listener: RoomClosedListener): void {
    this.closedListeners.push(listener);
  }

  /**
   * Create a waiting room hosted by `hostId`, bound to the resolved version.
   * @throws {GameNotFoundError | VersionNotFoundError} from version resolution
   * @throws {GameDelistedError} if the game no longer accepts new rooms
   * @throws {GameNotPlayableError} if the version's manifest is unusable
   * @throws {RoomLimitReachedError} if the open-room limit is reached
   * @throws {NotAuthorizedError} if the host is not a known player
   */
  async createRoom(hostId: PlayerId, gameId: GameId, requestedLabel?: string): Promise<Room> {
    this.requirePlayer(hostId);
    const version = this.deps.resolver.resolve(gameId, requestedLabel);
    if (this.deps.catalog.getGame(gameId).listing === 'delisted') {
      throw new GameDelistedError(gameId);
    }
    const manifest = GameManifestSchema.safeParse(version.manifest);
    if (!manifest.success) {
      throw new GameNotPlayableError(version.id, 'manifest has no usable entry point');
    }
    if (this.config.maxRooms > 0 && this.listRooms().length >= this.config.maxRooms) {
      throw new RoomLimitReachedError(gameId, this.config.maxRooms);
    }

    // No await above: the limit check and the save below cannot interleave
    // with another createRoom, and nobody else can know the fresh id yet.
    const room: Room = {
      id: this.rooms.nextId(),
      gameId,
      version: version.label,
      versionId: version.id,
      manifest: manifest.data,
      hostId,
      roster: [hostId],
      state: 'waiting',
      connection: null,
      createdAt: this.clock(),
    };
    this.rooms.save(room);
    logger.info('Room created', { roomId: room.id, gameId, version: version.label, hostId });
    return room;
  }

  /**
   * Add a player to a waiting room.
   * @throws {RoomNotFoundError}
   * @throws {RoomClosedError} if the room is not waiting
   * @throws {AlreadyJoinedError} if the player is in the roster
   * @throws {RoomFullError} if the roster is at max_players
   */
  joinRoom(roomId: RoomId, playerId: PlayerId): Promise<Room> {
    return this.locks.runExclusive(roomId, () => {
      const room = this.getRoom(roomId);
      this.requirePlayer(playerId);
      if (room.state !== 'waiting') {
        throw new RoomClosedError(roomId);
      }
      if (room.roster.includes(playerId)) {
        throw new AlreadyJoinedError(roomId, playerId);
      }
      if (room.roster.length >= room.manifest.max_players) {
        throw new RoomFullError(roomId, room.manifest.max_players);
      }
      const joined: Room = { ...room, roster: [...room.roster, playerId] };
      this.rooms.save(joined);
      logger.info('Player joined room', { roomId, playerId, players: joined.roster.length });
      return joined;
    });
  }

  /**
   * Remove a player from the roster. No-op when the player is absent or the
   * room is closed. The host keeps its role even after leaving; a waiting
   * room whose last player leaves is closed.
   * @throws {RoomNotFoundError}
   */
  leaveRoom(roomId: RoomId, playerId: PlayerId): Promise<Room> {
    return this.locks.runExclusive(roomId, () => {
      const room = this.getRoom(roomId);
      if (room.state === 'closed' || !room.roster.includes(playerId)) {
        return room;
      }
      const left: Room = { ...room, roster: room.roster.filter((p) => p !== playerId) };
      logger.info('Player left room', { roomId, playerId, players: left.roster.length });
      if (left.state === 'waiting' && left.roster.length === 0) {
        return this.closeLocked(left, 'all players left');
      }
      this.rooms.save(left);
      return left;
    });
  }

  /**
   * Close a room. Only the host may close it, unless the launcher reports
   * that the game server exited. Idempotent.
   * @throws {RoomNotFoundError}
   * @throws {NotAuthorizedError} if a player other than the host asks
   */
  closeRoom(roomId: RoomId, requester: CloseRequester): Promise<Room> {
    return this.locks.runExclusive(roomId, () => {
      const room = this.getRoom(roomId);
      if (requester.kind === 'player' && requester.playerId !== room.hostId) {
        throw new NotAuthorizedError(roomId, `Only the host can close room ${roomId}`);
      }
      if (room.state === 'closed') {
        return room;
      }
      const reason =
        requester.kind === 'player' ? `closed by host ${requester.playerId}` : requester.reason;
      return this.closeLocked(room, reason);
    });
  }

  /**
   * Run `task` while holding the room's lock. Used by the launcher so that
   * no join, leave, close or second start interleaves with a launch.
   * @throws {RoomNotFoundError}
   */
  withRoom<T>(roomId: RoomId, task: (handle: RoomHandle) => Promise<T>): Promise<T> {
    return this.locks.runExclusive(roomId, async () => {
      const room = this.getRoom(roomId);
      let active = true;
      const handle: RoomHandle = {
        room,
        markRunning: (connection) => {
          if (!active) {
            throw new Error(`Room handle for ${roomId} used after its lock was released`);
          }
          const current = this.getRoom(roomId);
          if (current.state !== 'waiting') {
            throw new RoomNotWaitingError(roomId, current.state);
          }
          const running: Room = {
            ...current,
            state: 'running',
            connection,
            startedAt: this.clock(),
          };
          this.rooms.save(running);
          return running;
        },
      };
      try {
        return await task(handle);
      } finally {
        active = false;
      }
    });
  }

  /**
   * @throws {RoomNotFoundError}
   */
  getRoom(roomId: RoomId): Room {
    const room = this.rooms.get(roomId);
    if (!room) {
      throw new RoomNotFoundError(roomId);
    }
    return room;
  }

  /**
   * Rooms that are not closed, in creation order.
   */
  listRooms(): Room[] {
    return this.rooms.list().filter((r) => r.state !== 'closed');
  }

  roomsForGame(gameId: GameId): Room[] {
    return this.listRooms().filter((r) => r.gameId === gameId);
  }

  /**
   * Drop closed rooms whose grace period has expired.
   * @returns Number of rooms removed
   */
  reap(now: Date = this.clock()): number {
    const cutoff = now.getTime() - this.config.closedGraceMs;
    let reaped = 0;

    for (const room of this.rooms.list()) {
      if (
        room.state === 'closed' &&
        room.closedAt !== undefined &&
        room.closedAt.getTime() <= cutoff &&
        !this.locks.isLocked(room.id)
      ) {
        this.rooms.delete(room.id);
        reaped++;
      }
    }

    if (reaped > 0) {
      logger.debug('Reaped closed rooms', { count: reaped });
    }
    return reaped;
  }

  private closeLocked(room: Room, reason: string): Room {
    const closed: Room = {
      ...room,
      state: 'closed',
      closedAt: this.clock(),
      closedReason: reason,
    };
    this.rooms.save(closed);
    logger.info('Room closed', { roomId: room.id, reason });
    for (const listener of this.closedListeners) {
      try {
        listener(closed);
      } catch (err) {
        logger.error('Room closed listener failed', {
          roomId: room.id,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
    return closed;
  }

  private requirePlayer(playerId: PlayerId): void {
    if (!this.deps.accounts.has('player', playerId)) {
      throw new NotAuthorizedError(playerId, `Unknown player: ${playerId}`);
    }
  }
}
