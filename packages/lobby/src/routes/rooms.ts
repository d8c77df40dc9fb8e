import type { PlayHubCore, RoomId } from '@playhub/core';
import { type Request, type Response, Router } from 'express';
import { requirePrincipal } from '../middleware/auth.js';
import { parseRequest, sendError } from '../middleware/errors.js';
import type { AuthService } from '../services/AuthService.js';
import { CreateRoomSchema } from '../types.js';
import { roomView } from '../views.js';

export interface RoomRouterDeps {
  readonly core: PlayHubCore;
  readonly auth: AuthService;
}

function roomIdOf(req: Request): RoomId {
  const { roomId } = req.params;
  return roomId ?? '';
}

export function createRoomRouter({ core, auth }: RoomRouterDeps): Router {
  const router = Router();

  /**
   * GET /api/rooms - Rooms that are waiting or running
   */
  router.get('/', (_req: Request, res: Response) => {
    res.json({ rooms: core.rooms.listRooms().map(roomView) });
  });

  /**
   * POST /api/rooms - Create a room for a game, hosted by the caller
   */
  router.post('/', async (req: Request, res: Response) => {
    try {
      const player = requirePrincipal(auth, req, 'player');
      const { gameId, version } = parseRequest(CreateRoomSchema, req.body);

      const room = await core.rooms.createRoom(player.id, gameId, version);

      res.status(201).json(roomView(room));
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * GET /api/rooms/:roomId - Room status; closed rooms stay visible until reaped
   */
  router.get('/:roomId', (req: Request, res: Response) => {
    try {
      res.json(roomView(core.rooms.getRoom(roomIdOf(req))));
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /api/rooms/:roomId/join
   */
  router.post('/:roomId/join', async (req: Request, res: Response) => {
    try {
      const player = requirePrincipal(auth, req, 'player');
      const room = await core.rooms.joinRoom(roomIdOf(req), player.id);
      res.json(roomView(room));
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /api/rooms/:roomId/leave
   */
  router.post('/:roomId/leave', async (req: Request, res: Response) => {
    try {
      const player = requirePrincipal(auth, req, 'player');
      const room = await core.rooms.leaveRoom(roomIdOf(req), player.id);
      res.json(roomView(room));
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /api/rooms/:roomId/start - Launch the game for everyone in the room
   */
  router.post('/:roomId/start', async (req: Request, res: Response) => {
    try {
      const player = requirePrincipal(auth, req, 'player');
      const result = await core.launcher.start(roomIdOf(req), player.id);
      res.json(result);
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /api/rooms/:roomId/close - Host only
   */
  router.post('/:roomId/close', async (req: Request, res: Response) => {
    try {
      const player = requirePrincipal(auth, req, 'player');
      const room = await core.rooms.closeRoom(roomIdOf(req), {
        kind: 'player',
        playerId: player.id,
      });
      res.json(roomView(room));
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
