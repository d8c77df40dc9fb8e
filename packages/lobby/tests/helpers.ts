import { mkdtemp, rm } from 'node:fs/promises';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  type AccountRole,
  createCore,
  type GameManifest,
  JsonFileStores,
  type PlayHubCore,
} from '@playhub/core';
import { createMockProcessHost, type MockProcessHost } from '@playhub/testing';
import { createServer } from '../src/server.js';
import { type AuthConfig, AuthService } from '../src/services/AuthService.js';
import { JsonFileCredentialRepository } from '../src/services/CredentialStore.js';
import { FileBlobStore, type PackageFiles } from '../src/services/FileBlobStore.js';

export const PUBLIC_HOST = 'games.test.local';

export interface TestResponse {
  status: number;
  // biome-ignore lint/suspicious/noExplicitAny: JSON bodies are asserted field by field
  data: any;
}

export interface TestLobby {
  readonly core: PlayHubCore;
  readonly auth: AuthService;
  readonly blobs: FileBlobStore;
  readonly processes: MockProcessHost;
  readonly dataDir: string;
  request(method: string, path: string, body?: object, token?: string): Promise<TestResponse>;
  /** Send a raw body, for malformed JSON */
  requestRaw(method: string, path: string, body: string): Promise<TestResponse>;
  close(): Promise<void>;
}

export interface TestLobbyOptions {
  auth?: Partial<AuthConfig>;
  /** Reuse a data directory; it is then left in place on close */
  dataDir?: string;
  /** Keep state in data files under the data directory */
  persist?: boolean;
}

/**
 * Start the lobby on an ephemeral port with packages in a temporary
 * directory and a process host that never starts processes.
 */
export async function startTestLobby(options: TestLobbyOptions = {}): Promise<TestLobby> {
  const dataDir = options.dataDir ?? (await mkdtemp(join(tmpdir(), 'playhub-lobby-')));
  const blobs = new FileBlobStore(join(dataDir, 'packages'));
  const processes = createMockProcessHost();
  const core = createCore({
    blobs,
    processes,
    launcher: { runtimeRoot: join(dataDir, 'runtime'), publicHost: PUBLIC_HOST },
    stores: options.persist ? new JsonFileStores(join(dataDir, 'playhub.json')) : undefined,
  });
  const auth = new AuthService(
    {
      accounts: core.accounts,
      credentials: options.persist
        ? new JsonFileCredentialRepository(join(dataDir, 'credentials.json'))
        : undefined,
    },
    options.auth
  );
  const app = createServer({ core, auth, blobs });

  const server: Server = await new Promise((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const { port } = server.address() as AddressInfo;
  const baseUrl = `http://127.0.0.1:${port}`;

  async function send(method: string, path: string, init: RequestInit): Promise<TestResponse> {
    const response = await fetch(`${baseUrl}${path}`, { ...init, method });
    const data = await response.json().catch(() => ({}));
    return { status: response.status, data };
  }

  return {
    core,
    auth,
    blobs,
    processes,
    dataDir,
    request(method, path, body, token) {
      const headers: Record<string, string> = { 'Content-Type': 'application/json' };
      if (token) {
        // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
        headers['Authorization'] = `Bearer ${token}`;
      }
      return send(method, path, {
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    },
    requestRaw(method, path, body) {
      return send(method, path, { headers: { 'Content-Type': 'application/json' }, body });
    },
    async close() {
      server.closeAllConnections();
      await new Promise<void>((resolve) => server.close(() => resolve()));
      await core.launcher.shutdown();
      if (options.dataDir === undefined) {
        await rm(dataDir, { recursive: true, force: true });
      }
    },
  };
}

/**
 * Register an account through the API and log it in.
 * @returns The bearer token
 */
export async function signIn(lobby: TestLobby, role: AccountRole, id: string): Promise<string> {
  const credentials = { id, password: 'test-secret' };
  const registered = await lobby.request('POST', `/api/accounts/${role}/register`, credentials);
  if (registered.status !== 201) {
    throw new Error(`register ${id} failed: ${JSON.stringify(registered.data)}`);
  }
  const { data } = await lobby.request('POST', `/api/accounts/${role}/login`, credentials);
  return data.token;
}

export function base64(text: string): string {
  return Buffer.from(text, 'utf8').toString('base64');
}

/**
 * Package files containing every entry point of `manifest`.
 */
export function packageFor(manifest: GameManifest): PackageFiles {
  const files: PackageFiles = { [manifest.entry]: base64(`// ${manifest.entry}\n`) };
  if (manifest.server_entry !== undefined) {
    files[manifest.server_entry] = base64(`// ${manifest.server_entry}\n`);
  }
  return files;
}

export function upload(label: string, manifest: GameManifest): object {
  return { label, notes: `release ${label}`, manifest, files: packageFor(manifest) };
}

/**
 * Create a game with one version through the API.
 */
export async function publish(
  lobby: TestLobby,
  developerToken: string,
  name: string,
  manifest: GameManifest,
  label = '1.0'
): Promise<TestResponse> {
  return lobby.request(
    'POST',
    '/api/games',
    { name, description: `${name} test game`, gameType: 'cli', version: upload(label, manifest) },
    developerToken
  );
}
