import type { PlayHubCore } from '@playhub/core';
import { type Request, type Response, Router } from 'express';
import { requirePrincipal } from '../middleware/auth.js';
import { sendError } from '../middleware/errors.js';
import type { AuthService } from '../services/AuthService.js';
import type { PlayerView, ProfileView } from '../types.js';
import { playsOf } from '../views.js';

export interface PlayerRouterDeps {
  readonly core: PlayHubCore;
  readonly auth: AuthService;
}

export function createPlayerRouter({ core, auth }: PlayerRouterDeps): Router {
  const router = Router();

  /**
   * GET /api/players - Registered players and whether they are online
   */
  router.get('/', (_req: Request, res: Response) => {
    const players: PlayerView[] = core.accounts.list('player').map((account) => ({
      id: account.id,
      online: auth.isOnline('player', account.id),
    }));
    res.json({ players });
  });

  /**
   * GET /api/players/me - The caller's profile and play history
   */
  router.get('/me', (req: Request, res: Response) => {
    try {
      const player = requirePrincipal(auth, req, 'player');
      const profile: ProfileView = {
        id: player.id,
        online: true,
        plays: playsOf(core, player.id),
      };
      res.json(profile);
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
