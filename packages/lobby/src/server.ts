import type { PlayHubCore } from '@playhub/core';
import express, { type ErrorRequestHandler, type Express } from 'express';
import { InvalidRequestError } from './errors.js';
import { sendError } from './middleware/errors.js';
import { createAccountRouter } from './routes/accounts.js';
import { createGameRouter } from './routes/games.js';
import { createPlayerRouter } from './routes/players.js';
import { createRoomRouter } from './routes/rooms.js';
import type { AuthService } from './services/AuthService.js';
import type { FileBlobStore } from './services/FileBlobStore.js';

export interface LobbyDeps {
  readonly core: PlayHubCore;
  readonly auth: AuthService;
  readonly blobs: FileBlobStore;
}

/** Packages travel base64-encoded inside JSON bodies */
const BODY_LIMIT = '25mb';

function isClientError(err: unknown): err is Error & { status: number } {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}

/**
 * Last-resort handler for errors raised outside the routers, such as
 * unparsable JSON bodies.
 */
const handleError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  sendError(res, isClientError(err) ? new InvalidRequestError(err.message) : err);
};

export function createServer(deps: LobbyDeps): Express {
  const app = express();

  // Middleware
  app.use(express.json({ limit: BODY_LIMIT }));

  // API routes
  app.use('/api/accounts', createAccountRouter(deps.auth));
  app.use('/api/players', createPlayerRouter(deps));
  app.use('/api/games', createGameRouter(deps));
  app.use('/api/rooms', createRoomRouter(deps));

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use(handleError);

  return app;
}
