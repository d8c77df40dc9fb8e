/**
 * @fileoverview Launches rooms.
 *
 * A launch validates the room, optionally brings up the game's own server
 * process, moves the room to running and grants every rostered player
 * eligibility to rate the game, in that order and as one unit under the
 * room's lock. A launch that fails leaves the room waiting and grants
 * nothing.
 */

import { join } from 'node:path';
import type { CatalogStore } from '../catalog/CatalogStore.js';
import {
  InsufficientPlayersError,
  LaunchFailedError,
  NotAuthorizedError,
  RoomNotWaitingError,
} from '../errors.js';
import type { PlayTracker } from '../play/PlayTracker.js';
import type { RoomRegistry } from '../rooms/RoomRegistry.js';
import type { ConnectionInfo, LaunchResult, PlayerId, Room, RoomId } from '../types.js';
import { logger } from '../utils/logger.js';
import type { BlobStore, ProcessHandle, ProcessHost } from './collaborators.js';

export interface SessionLauncherConfig {
  /** Parent directory of the per-room working directories */
  runtimeRoot: string;
  /** Address players use to reach spawned game servers */
  publicHost: string;
}

export interface SessionLauncherDeps {
  readonly registry: RoomRegistry;
  readonly catalog: CatalogStore;
  readonly tracker: PlayTracker;
  readonly blobs: BlobStore;
  readonly processes: ProcessHost;
}

interface RunningServer {
  readonly handle: ProcessHandle;
  readonly port: number;
  readonly workDir: string;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class SessionLauncher {
  private readonly servers = new Map<RoomId, RunningServer>();

  constructor(
    private readonly deps: SessionLauncherDeps,
    private readonly config: SessionLauncherConfig
  ) {
    deps.registry.onRoomClosed((room) => {
      this.stopServer(room.id).catch((err: unknown) => {
        logger.error('Failed to stop game server', { roomId: room.id, error: errorMessage(err) });
      });
    });
  }

  /**
   * Start a waiting room.
   * @throws {RoomNotFoundError}
   * @throws {NotAuthorizedError} if the requester is not in the roster
   * @throws {RoomNotWaitingError} if the room already started or closed
   * @throws {InsufficientPlayersError} if the roster is below min_players
   * @throws {LaunchFailedError} if the game server could not be brought up
   */
  start(roomId: RoomId, requesterId: PlayerId): Promise<LaunchResult> {
    return this.deps.registry.withRoom(roomId, async ({ room, markRunning }) => {
      if (!room.roster.includes(requesterId)) {
        throw new NotAuthorizedError(roomId, `Player ${requesterId} is not in room ${roomId}`);
      }
      if (room.state !== 'waiting') {
        throw new RoomNotWaitingError(roomId, room.state);
      }
      if (room.roster.length < room.manifest.min_players) {
        throw new InsufficientPlayersError(roomId, room.roster.length, room.manifest.min_players);
      }

      logger.info('Launching room', { roomId, gameId: room.gameId, version: room.version });

      let server: RunningServer | null = null;
      let connection: ConnectionInfo | null = null;
      if (room.manifest.server_entry !== undefined) {
        server = await this.spawnServer(room, room.manifest.server_entry);
        connection = { host: this.config.publicHost, port: server.port };
      }

      const running = markRunning(connection);
      if (server) {
        this.servers.set(roomId, server);
        server.handle.onExit((code) => {
          this.handleExit(roomId, code).catch((err: unknown) => {
            logger.error('Failed to close room after game server exit', {
              roomId,
              error: errorMessage(err),
            });
          });
        });
      }

      await Promise.all(
        running.roster.map((playerId) => this.deps.tracker.markStarted(playerId, running.gameId))
      );

      logger.info('Room launched', {
        roomId,
        players: running.roster.length,
        port: connection?.port ?? null,
      });

      return {
        roomId,
        gameId: running.gameId,
        version: running.version,
        entryPoint: running.manifest.entry,
        connection,
        players: running.roster,
      };
    });
  }

  /**
   * Connection info of a running room, or null for local-only games.
   * @throws {RoomNotFoundError}
   */
  connectionFor(roomId: RoomId): ConnectionInfo | null {
    return this.deps.registry.getRoom(roomId).connection;
  }

  hasServer(roomId: RoomId): boolean {
    return this.servers.has(roomId);
  }

  /**
   * Stop every game server this launcher started.
   */
  async shutdown(): Promise<void> {
    await Promise.all(Array.from(this.servers.keys()).map((roomId) => this.stopServer(roomId)));
  }

  private async spawnServer(room: Room, serverEntry: string): Promise<RunningServer> {
    const workDir = join(this.config.runtimeRoot, `room-${room.id}`);
    try {
      const version = this.deps.catalog.findVersion(room.gameId, room.version);
      if (!version) {
        throw new Error(`package for ${room.versionId} is missing`);
      }
      const port = await this.deps.processes.freePort();
      const bytes = await this.deps.blobs.fetch(version.blobId);
      await this.deps.blobs.unpack(bytes, workDir);
      const handle = await this.deps.processes.spawn({
        executable: join(workDir, serverEntry),
        args: ['--room', room.id, '--port', String(port)],
        cwd: workDir,
        readyPort: port,
      });
      logger.info('Game server started', { roomId: room.id, pid: handle.pid ?? null, port });
      return { handle, port, workDir };
    } catch (err) {
      logger.warn('Launch failed, room stays waiting', {
        roomId: room.id,
        error: errorMessage(err),
      });
      await this.discard(workDir);
      throw new LaunchFailedError(room.id, err);
    }
  }

  private async handleExit(roomId: RoomId, code: number | null): Promise<void> {
    const server = this.servers.get(roomId);
    if (!server) {
      return;
    }
    this.servers.delete(roomId);
    logger.info('Game server exited', { roomId, code });
    await this.discard(server.workDir);
    await this.deps.registry.closeRoom(roomId, {
      kind: 'system',
      reason: `game server exited with code ${code ?? 'null'}`,
    });
  }

  private async stopServer(roomId: RoomId): Promise<void> {
    const server = this.servers.get(roomId);
    if (!server) {
      return;
    }
    this.servers.delete(roomId);
    server.handle.kill();
    await this.discard(server.workDir);
  }

  private async discard(workDir: string): Promise<void> {
    try {
      await this.deps.blobs.discard(workDir);
    } catch (err) {
      logger.warn('Failed to remove working directory', { workDir, error: errorMessage(err) });
    }
  }
}
