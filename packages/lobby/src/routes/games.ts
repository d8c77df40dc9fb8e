import {
  DuplicateGameError,
  type GameId,
  logger,
  type NewVersion,
  NotOwnerError,
  type PlayHubCore,
  parseManifest,
  slugifyGameName,
  versionIdOf,
} from '@playhub/core';
import { type Request, type Response, Router } from 'express';
import { requirePrincipal } from '../middleware/auth.js';
import { parseRequest, sendError } from '../middleware/errors.js';
import type { AuthService } from '../services/AuthService.js';
import { type FileBlobStore, normalizePackageFiles } from '../services/FileBlobStore.js';
import {
  CreateGameSchema,
  type DownloadResponse,
  SubmitRatingSchema,
  type VersionUpload,
  VersionUploadSchema,
} from '../types.js';
import { gameDetail, gameSummary, ratingView } from '../views.js';

export interface GameRouterDeps {
  readonly core: PlayHubCore;
  readonly auth: AuthService;
  readonly blobs: FileBlobStore;
}

function gameIdOf(req: Request): GameId {
  const { gameId } = req.params;
  return gameId ?? '';
}

export function createGameRouter({ core, auth, blobs }: GameRouterDeps): Router {
  const router = Router();

  /**
   * Store the package, then let `record` enter it in the catalog. A version
   * the catalog rejects leaves no package behind.
   */
  async function storePackage<T>(
    gameId: GameId,
    upload: VersionUpload,
    record: (version: NewVersion) => Promise<T>
  ): Promise<T> {
    const versionId = versionIdOf(gameId, upload.label);
    const manifest = parseManifest(upload.manifest, versionId);
    const files = normalizePackageFiles(upload.files, manifest, versionId);

    const blobId = await blobs.put(gameId, upload.label, files);
    try {
      return await record({ label: upload.label, blobId, manifest, notes: upload.notes });
    } catch (err) {
      await blobs.remove(blobId);
      throw err;
    }
  }

  /**
   * GET /api/games - Listed games with their latest version and rating
   */
  router.get('/', (_req: Request, res: Response) => {
    res.json({ games: core.catalog.listGames().map((game) => gameSummary(core, game)) });
  });

  /**
   * GET /api/games/mine - The calling developer's games, delisted included
   */
  router.get('/mine', (req: Request, res: Response) => {
    try {
      const developer = requirePrincipal(auth, req, 'developer');
      const games = core.catalog.listByDeveloper(developer.id);
      res.json({ games: games.map((game) => gameSummary(core, game)) });
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /api/games - Create a game with its first version
   */
  router.post('/', async (req: Request, res: Response) => {
    try {
      const developer = requirePrincipal(auth, req, 'developer');
      const body = parseRequest(CreateGameSchema, req.body);

      // The game only comes into existence together with its stored package
      const gameId = slugifyGameName(body.name);
      if (core.catalog.tryGetGame(gameId)) {
        throw new DuplicateGameError(gameId);
      }
      const game = await storePackage(gameId, body.version, (version) =>
        core.catalog.createGame(
          developer.id,
          { name: body.name, description: body.description, gameType: body.gameType },
          version
        )
      );

      res.status(201).json(gameDetail(core, game));
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * GET /api/games/:gameId - Versions, ratings and open rooms of one game
   */
  router.get('/:gameId', (req: Request, res: Response) => {
    try {
      const game = core.catalog.getGame(gameIdOf(req));
      res.json(gameDetail(core, game));
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /api/games/:gameId/versions - Upload a new version
   */
  router.post('/:gameId/versions', async (req: Request, res: Response) => {
    try {
      const developer = requirePrincipal(auth, req, 'developer');
      const game = core.catalog.getGame(gameIdOf(req));
      if (game.developerId !== developer.id) {
        throw new NotOwnerError(game.id, developer.id);
      }
      const upload = parseRequest(VersionUploadSchema, req.body);

      const version = await storePackage(game.id, upload, (newVersion) =>
        core.catalog.addVersion(game.id, developer.id, newVersion)
      );

      logger.info('Version uploaded', { gameId: game.id, label: version.label });
      res.status(201).json(gameDetail(core, core.catalog.getGame(game.id)));
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * DELETE /api/games/:gameId - Delist a game; rooms already open keep running
   */
  router.delete('/:gameId', async (req: Request, res: Response) => {
    try {
      const developer = requirePrincipal(auth, req, 'developer');
      const game = await core.catalog.delist(gameIdOf(req), developer.id);
      res.json(gameDetail(core, game));
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * GET /api/games/:gameId/download?version= - Package of a version, the
   * latest when none is given
   */
  router.get('/:gameId/download', async (req: Request, res: Response) => {
    try {
      // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
      const requested = req.query['version'];
      const label = typeof requested === 'string' && requested.length > 0 ? requested : undefined;
      const version = core.resolver.resolve(gameIdOf(req), label);

      const bundle = await blobs.readBundle(version.blobId);

      const response: DownloadResponse = {
        gameId: version.gameId,
        version: version.label,
        manifest: version.manifest,
        files: bundle.files,
      };
      res.json(response);
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * GET /api/games/:gameId/ratings - Ratings and their aggregate
   */
  router.get('/:gameId/ratings', (req: Request, res: Response) => {
    try {
      const game = core.catalog.getGame(gameIdOf(req));
      res.json({
        gameId: game.id,
        aggregate: core.ratings.aggregate(game.id),
        ratings: core.ratings.ratingsFor(game.id).map(ratingView),
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /api/games/:gameId/ratings - Rate a game the caller has played
   */
  router.post('/:gameId/ratings', async (req: Request, res: Response) => {
    try {
      const player = requirePrincipal(auth, req, 'player');
      const { score, comment } = parseRequest(SubmitRatingSchema, req.body);

      const rating = await core.ratings.submitRating(player.id, gameIdOf(req), score, comment);

      res.status(201).json({
        rating: ratingView(rating),
        aggregate: core.ratings.aggregate(rating.gameId),
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
