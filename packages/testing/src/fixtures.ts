import {
  type CoreOptions,
  createCore,
  type Game,
  type GameManifest,
  type PlayHubCore,
  type Version,
} from '@playhub/core';
import { createMockBlobStore, type MockBlobStore } from './mockBlobStore.js';
import { createMockProcessHost, type MockProcessHost } from './mockProcessHost.js';

export interface TestCore {
  readonly core: PlayHubCore;
  readonly blobs: MockBlobStore;
  readonly processes: MockProcessHost;
}

export const TEST_RUNTIME_ROOT = '/tmp/playhub-test/runtime';
export const TEST_PUBLIC_HOST = 'games.test.local';

/**
 * Core wired to in-memory stores and mock collaborators.
 */
export function createTestCore(
  options: Partial<Omit<CoreOptions, 'blobs' | 'processes'>> = {}
): TestCore {
  const blobs = createMockBlobStore();
  const processes = createMockProcessHost();
  const core = createCore({
    ...options,
    blobs,
    processes,
    launcher: options.launcher ?? { runtimeRoot: TEST_RUNTIME_ROOT, publicHost: TEST_PUBLIC_HOST },
  });
  return { core, blobs, processes };
}

export function localManifest(minPlayers: number, maxPlayers: number): GameManifest {
  return { entry: 'main.js', min_players: minPlayers, max_players: maxPlayers };
}

export function serverManifest(minPlayers: number, maxPlayers: number): GameManifest {
  return { ...localManifest(minPlayers, maxPlayers), server_entry: 'server.js' };
}

/**
 * Register players that do not exist yet.
 */
export async function registerPlayers(core: PlayHubCore, ...playerIds: string[]): Promise<void> {
  for (const id of playerIds) {
    if (!core.accounts.has('player', id)) {
      await core.accounts.register('player', id);
    }
  }
}

export interface PublishOptions {
  readonly developer?: string;
  readonly name: string;
  readonly label: string;
  readonly manifest: GameManifest;
}

/**
 * Register the developer if needed, create the game and add its first
 * version with a placeholder blob.
 */
export async function publishGame(
  test: TestCore,
  options: PublishOptions
): Promise<{ game: Game; version: Version }> {
  const developer = options.developer ?? 'dev';
  if (!test.core.accounts.has('developer', developer)) {
    await test.core.accounts.register('developer', developer);
  }
  const game = await test.core.catalog.createGame(developer, {
    name: options.name,
    description: `${options.name} for tests`,
    gameType: 'cli',
  });
  const version = await addTestVersion(test, game.id, options.label, options.manifest, developer);
  return { game: test.core.catalog.getGame(game.id), version };
}

export async function addTestVersion(
  test: TestCore,
  gameId: string,
  label: string,
  manifest: GameManifest,
  developer = 'dev'
): Promise<Version> {
  const blobId = `${gameId}/${label}`;
  test.blobs.put(blobId, new TextEncoder().encode(`${gameId}@${label}`));
  return test.core.catalog.addVersion(gameId, developer, { label, blobId, manifest });
}
