import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PUBLIC_HOST, publish, signIn, startTestLobby, type TestLobby } from './helpers.js';

describe('Rooms routes', () => {
  let lobby: TestLobby;
  let alice: string;
  let bob: string;

  beforeEach(async () => {
    lobby = await startTestLobby();
    const studio = await signIn(lobby, 'developer', 'studio');
    await publish(lobby, studio, 'Arena', {
      entry: 'main.js',
      server_entry: 'server.js',
      min_players: 2,
      max_players: 2,
    });
    alice = await signIn(lobby, 'player', 'alice');
    bob = await signIn(lobby, 'player', 'bob');
  });

  afterEach(async () => {
    await lobby.close();
  });

  async function openRoom(): Promise<string> {
    const { data } = await lobby.request('POST', '/api/rooms', { gameId: 'arena' }, alice);
    return data.id;
  }

  describe('POST /api/rooms', () => {
    it('should create a waiting room hosted by the caller', async () => {
      const { status, data } = await lobby.request(
        'POST',
        '/api/rooms',
        { gameId: 'arena' },
        alice
      );

      expect(status).toBe(201);
      expect(data).toMatchObject({
        id: '1',
        gameId: 'arena',
        version: '1.0',
        hostId: 'alice',
        players: ['alice'],
        minPlayers: 2,
        maxPlayers: 2,
        state: 'waiting',
        connection: null,
        startedAt: null,
        closedAt: null,
        closedReason: null,
      });
    });

    it('should require a player session', async () => {
      const anonymous = await lobby.request('POST', '/api/rooms', { gameId: 'arena' });

      expect(anonymous.status).toBe(401);
    });

    it('should answer 404 for an unknown version', async () => {
      const { status, data } = await lobby.request(
        'POST',
        '/api/rooms',
        { gameId: 'arena', version: '7.0' },
        alice
      );

      expect(status).toBe(404);
      expect(data.error.kind).toBe('VersionNotFound');
    });

    it('should show open rooms in the listing and on the game', async () => {
      await openRoom();

      const rooms = await lobby.request('GET', '/api/rooms');
      const game = await lobby.request('GET', '/api/games/arena');

      expect(rooms.data.rooms.map((r: { id: string }) => r.id)).toEqual(['1']);
      expect(game.data.rooms.map((r: { id: string }) => r.id)).toEqual(['1']);
    });
  });

  describe('joining and leaving', () => {
    it('should add the player to the roster', async () => {
      const roomId = await openRoom();

      const { status, data } = await lobby.request(
        'POST',
        `/api/rooms/${roomId}/join`,
        undefined,
        bob
      );

      expect(status).toBe(200);
      expect(data.players).toEqual(['alice', 'bob']);
    });

    it('should refuse players once the room is full', async () => {
      const roomId = await openRoom();
      const carol = await signIn(lobby, 'player', 'carol');
      await lobby.request('POST', `/api/rooms/${roomId}/join`, undefined, bob);

      const { status, data } = await lobby.request(
        'POST',
        `/api/rooms/${roomId}/join`,
        undefined,
        carol
      );

      expect(status).toBe(409);
      expect(data.error).toEqual({
        kind: 'RoomFull',
        entityId: roomId,
        message: `Room ${roomId} is full (2 players)`,
      });
    });

    it('should refuse a second join by the same player', async () => {
      const roomId = await openRoom();

      const { status, data } = await lobby.request(
        'POST',
        `/api/rooms/${roomId}/join`,
        undefined,
        alice
      );

      expect(status).toBe(409);
      expect(data.error.kind).toBe('AlreadyJoined');
    });

    it('should close a waiting room when its last player leaves', async () => {
      const roomId = await openRoom();

      const { data } = await lobby.request('POST', `/api/rooms/${roomId}/leave`, undefined, alice);

      expect(data.state).toBe('closed');
      expect(data.closedReason).toBe('all players left');
      expect((await lobby.request('GET', '/api/rooms')).data.rooms).toEqual([]);
    });
  });

  describe('POST /api/rooms/:roomId/start', () => {
    it('should launch the game server and return its connection', async () => {
      const roomId = await openRoom();
      await lobby.request('POST', `/api/rooms/${roomId}/join`, undefined, bob);

      const { status, data } = await lobby.request(
        'POST',
        `/api/rooms/${roomId}/start`,
        undefined,
        bob
      );

      expect(status).toBe(200);
      expect(data).toEqual({
        roomId,
        gameId: 'arena',
        version: '1.0',
        entryPoint: 'main.js',
        connection: { host: PUBLIC_HOST, port: 41000 },
        players: ['alice', 'bob'],
      });
      expect(lobby.processes.requests[0]?.args).toEqual(['--room', roomId, '--port', '41000']);
    });

    it('should unpack the package into the room working directory', async () => {
      const roomId = await openRoom();
      await lobby.request('POST', `/api/rooms/${roomId}/join`, undefined, bob);

      await lobby.request('POST', `/api/rooms/${roomId}/start`, undefined, alice);

      const workDir = join(lobby.dataDir, 'runtime', `room-${roomId}`);
      expect(lobby.processes.requests[0]?.cwd).toBe(workDir);
      expect(await readFile(join(workDir, 'server.js'), 'utf8')).toBe('// server.js\n');
    });

    it('should make every player eligible to rate', async () => {
      const roomId = await openRoom();
      await lobby.request('POST', `/api/rooms/${roomId}/join`, undefined, bob);
      await lobby.request('POST', `/api/rooms/${roomId}/start`, undefined, alice);

      const rated = await lobby.request(
        'POST',
        '/api/games/arena/ratings',
        { score: 5 },
        bob
      );
      const profile = await lobby.request('GET', '/api/players/me', undefined, bob);

      expect(rated.status).toBe(201);
      expect(profile.data.plays.map((p: { gameId: string }) => p.gameId)).toEqual(['arena']);
    });

    it('should refuse to start below the minimum player count', async () => {
      const roomId = await openRoom();

      const { status, data } = await lobby.request(
        'POST',
        `/api/rooms/${roomId}/start`,
        undefined,
        alice
      );

      expect(status).toBe(409);
      expect(data.error.kind).toBe('InsufficientPlayers');
      expect(lobby.processes.requests).toHaveLength(0);
    });

    it('should refuse players outside the roster', async () => {
      const roomId = await openRoom();

      const { status, data } = await lobby.request(
        'POST',
        `/api/rooms/${roomId}/start`,
        undefined,
        bob
      );

      expect(status).toBe(403);
      expect(data.error.kind).toBe('NotAuthorized');
    });

    it('should report a failed launch and leave the room waiting', async () => {
      const roomId = await openRoom();
      await lobby.request('POST', `/api/rooms/${roomId}/join`, undefined, bob);
      lobby.processes.failNextSpawn(new Error('exec format error'));

      const { status, data } = await lobby.request(
        'POST',
        `/api/rooms/${roomId}/start`,
        undefined,
        alice
      );
      const room = await lobby.request('GET', `/api/rooms/${roomId}`);

      expect(status).toBe(503);
      expect(data.error.kind).toBe('LaunchFailed');
      expect(room.data.state).toBe('waiting');
    });
  });

  describe('POST /api/rooms/:roomId/close', () => {
    it('should only let the host close the room', async () => {
      const roomId = await openRoom();
      await lobby.request('POST', `/api/rooms/${roomId}/join`, undefined, bob);

      const byGuest = await lobby.request('POST', `/api/rooms/${roomId}/close`, undefined, bob);
      const byHost = await lobby.request('POST', `/api/rooms/${roomId}/close`, undefined, alice);

      expect(byGuest.status).toBe(403);
      expect(byHost.status).toBe(200);
      expect(byHost.data.state).toBe('closed');
      expect(byHost.data.closedReason).toBe('closed by host alice');
    });

    it('should stop the game server of a running room', async () => {
      const roomId = await openRoom();
      await lobby.request('POST', `/api/rooms/${roomId}/join`, undefined, bob);
      await lobby.request('POST', `/api/rooms/${roomId}/start`, undefined, alice);

      await lobby.request('POST', `/api/rooms/${roomId}/close`, undefined, alice);

      expect(lobby.processes.handleForRoom(roomId)?.killed).toBe(true);
    });
  });

  describe('GET /api/rooms/:roomId', () => {
    it('should answer 404 for unknown rooms', async () => {
      const { status, data } = await lobby.request('GET', '/api/rooms/99');

      expect(status).toBe(404);
      expect(data.error).toEqual({
        kind: 'RoomNotFound',
        entityId: '99',
        message: 'Room not found: 99',
      });
    });
  });

  describe('malformed requests', () => {
    it('should answer 400 for unparsable JSON', async () => {
      const { status, data } = await lobby.requestRaw('POST', '/api/rooms', '{"gameId":');

      expect(status).toBe(400);
      expect(data.error.kind).toBe('InvalidRequest');
    });

    it('should answer 400 for a missing game id', async () => {
      const { status, data } = await lobby.request('POST', '/api/rooms', {}, alice);

      expect(status).toBe(400);
      expect(data.error.kind).toBe('InvalidRequest');
    });
  });
});
