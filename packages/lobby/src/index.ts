import { createCore, JsonFileStores, logger } from '@playhub/core';
import { loadLobbyConfig } from './config/lobbyConfig.js';
import { createServer } from './server.js';
import { AuthService } from './services/AuthService.js';
import { JsonFileCredentialRepository } from './services/CredentialStore.js';
import { FileBlobStore } from './services/FileBlobStore.js';
import { NodeProcessHost } from './services/NodeProcessHost.js';

const config = loadLobbyConfig();

logger.info('Starting lobby server...');

const { dataFile, credentialsFile } = config.storage;
if (!dataFile || !credentialsFile) {
  logger.warn('Data files not configured, some state is kept in memory only');
}

const blobs = new FileBlobStore(config.storage.blobRoot);
const core = createCore({
  blobs,
  stores: dataFile ? new JsonFileStores(dataFile) : undefined,
  processes: new NodeProcessHost({
    command: config.gameServer.command ?? process.execPath,
    bindHost: config.gameServer.bindHost,
    readyTimeoutMs: config.gameServer.readyTimeoutMs,
  }),
  launcher: {
    runtimeRoot: config.storage.runtimeRoot,
    publicHost: config.gameServer.publicHost,
  },
  rooms: {
    maxRooms: config.rooms.maxRooms,
    closedGraceMs: config.rooms.closedGraceSeconds * 1000,
  },
  ratings: config.ratings,
});
const auth = new AuthService(
  {
    accounts: core.accounts,
    credentials: credentialsFile ? new JsonFileCredentialRepository(credentialsFile) : undefined,
  },
  config.auth
);

const app = createServer({ core, auth, blobs });

const httpServer = app.listen(config.server.port, config.server.host, () => {
  logger.info('Lobby server listening', { host: config.server.host, port: config.server.port });
});

const reaper = setInterval(() => {
  core.rooms.reap();
  auth.pruneExpired();
}, config.rooms.reapIntervalMs);
reaper.unref();

// Graceful shutdown
function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down...`);
  clearInterval(reaper);
  httpServer.close();
  core.launcher
    .shutdown()
    .catch((err: unknown) => {
      logger.error('Failed to stop game servers', {
        error: err instanceof Error ? err.message : String(err),
      });
    })
    .finally(() => process.exit(0));
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
