import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { clearConfigCache, loadLobbyConfig } from '../src/config/lobbyConfig.js';

const MINIMAL = `
gameServer:
  publicHost: games.test.local
storage:
  blobRoot: /srv/playhub/packages
  runtimeRoot: /srv/playhub/runtime
`;

describe('loadLobbyConfig', () => {
  let dir: string;
  let savedEnv: { configPath: string | undefined; port: string | undefined };

  async function useConfig(contents: string): Promise<string> {
    const path = join(dir, 'lobby.yaml');
    await writeFile(path, contents);
    // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
    process.env['CONFIG_PATH'] = path;
    return path;
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'playhub-config-'));
    savedEnv = {
      // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
      configPath: process.env['CONFIG_PATH'],
      // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
      port: process.env['PORT'],
    };
    // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
    delete process.env['PORT'];
    clearConfigCache();
  });

  afterEach(async () => {
    for (const [key, value] of [
      ['CONFIG_PATH', savedEnv.configPath],
      ['PORT', savedEnv.port],
    ] as const) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    clearConfigCache();
    await rm(dir, { recursive: true, force: true });
  });

  it('should fill in defaults for omitted sections', async () => {
    await useConfig(MINIMAL);

    const config = loadLobbyConfig();

    expect(config.server).toEqual({ host: '0.0.0.0', port: 3002 });
    expect(config.gameServer).toEqual({
      bindHost: '127.0.0.1',
      publicHost: 'games.test.local',
      readyTimeoutMs: 3000,
    });
    expect(config.rooms).toEqual({ maxRooms: 0, closedGraceSeconds: 30, reapIntervalMs: 5000 });
    expect(config.auth).toEqual({
      sessionTimeoutSeconds: 3600,
      onlineTimeoutSeconds: 20,
      loginLockSeconds: 30,
    });
    expect(config.ratings).toEqual({ minScore: 1, maxScore: 5 });
  });

  it('should read explicit values', async () => {
    await useConfig(`${MINIMAL}
server:
  port: 8080
rooms:
  maxRooms: 12
ratings:
  minScore: 0
  maxScore: 10
`);

    const config = loadLobbyConfig();

    expect(config.server.port).toBe(8080);
    expect(config.rooms.maxRooms).toBe(12);
    expect(config.ratings).toEqual({ minScore: 0, maxScore: 10 });
  });

  it('should read data file locations only when configured', async () => {
    await useConfig(MINIMAL);
    expect(loadLobbyConfig().storage.dataFile).toBeUndefined();
    expect(loadLobbyConfig().storage.credentialsFile).toBeUndefined();

    clearConfigCache();
    await useConfig(`${MINIMAL}  dataFile: /srv/playhub/playhub.json
  credentialsFile: /srv/playhub/credentials.json
`);

    expect(loadLobbyConfig().storage).toEqual({
      blobRoot: '/srv/playhub/packages',
      runtimeRoot: '/srv/playhub/runtime',
      dataFile: '/srv/playhub/playhub.json',
      credentialsFile: '/srv/playhub/credentials.json',
    });
  });

  it('should let PORT override the configured port', async () => {
    await useConfig(MINIMAL);
    // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
    process.env['PORT'] = '4100';

    expect(loadLobbyConfig().server.port).toBe(4100);
  });

  it('should ignore a PORT that is not a port number', async () => {
    await useConfig(MINIMAL);
    // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
    process.env['PORT'] = 'http';

    expect(loadLobbyConfig().server.port).toBe(3002);
  });

  it('should name the file when validation fails', async () => {
    const path = await useConfig('storage:\n  blobRoot: /srv/packages\n');

    expect(() => loadLobbyConfig()).toThrow(`Invalid lobby configuration in ${path}`);
  });

  it('should reject inverted rating bounds', async () => {
    await useConfig(`${MINIMAL}
ratings:
  minScore: 5
  maxScore: 1
`);

    expect(() => loadLobbyConfig()).toThrow('minScore must not exceed maxScore');
  });

  it('should cache the loaded config until the cache is cleared', async () => {
    await useConfig(MINIMAL);
    const first = loadLobbyConfig();

    await useConfig(`${MINIMAL}
server:
  port: 9000
`);

    expect(loadLobbyConfig()).toBe(first);
    clearConfigCache();
    expect(loadLobbyConfig().server.port).toBe(9000);
  });
});
