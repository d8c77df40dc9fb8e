/**
 * @fileoverview Error taxonomy of the PlayHub core.
 *
 * Every error carries its kind and the id of the entity involved so that
 * clients can render a specific message. Categories:
 * - not_found: the referenced entity does not exist
 * - authorization: the caller may not perform the operation
 * - precondition: the entity is in the wrong state; retry after it changes
 * - resource: an external resource failed (spawn, unpack, storage)
 */

export type ErrorCategory = 'not_found' | 'authorization' | 'precondition' | 'resource';

export type ErrorKind =
  | 'GameNotFound'
  | 'VersionNotFound'
  | 'RoomNotFound'
  | 'NotOwner'
  | 'NotAuthorized'
  | 'RoomFull'
  | 'RoomClosed'
  | 'RoomNotWaiting'
  | 'InsufficientPlayers'
  | 'AlreadyJoined'
  | 'DuplicateVersion'
  | 'NotEligible'
  | 'InvalidScore'
  | 'GameNotPlayable'
  | 'GameDelisted'
  | 'DuplicateGame'
  | 'DuplicateAccount'
  | 'InvalidManifest'
  | 'RoomLimitReached'
  | 'LaunchFailed'
  | 'UploadFailed';

/**
 * Base class for all domain errors.
 */
export class PlayHubError extends Error {
  readonly kind: ErrorKind;
  readonly category: ErrorCategory;
  /** Id of the game, version, room or account the error is about */
  readonly entityId: string;

  constructor(
    kind: ErrorKind,
    category: ErrorCategory,
    entityId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = `${kind}Error`;
    this.kind = kind;
    this.category = category;
    this.entityId = entityId;
  }
}

export function isPlayHubError(err: unknown): err is PlayHubError {
  return err instanceof PlayHubError;
}

// ============ Not found ============

export class GameNotFoundError extends PlayHubError {
  constructor(gameId: string) {
    super('GameNotFound', 'not_found', gameId, `Game not found: ${gameId}`);
  }
}

export class VersionNotFoundError extends PlayHubError {
  constructor(gameId: string, label: string | undefined) {
    const versionId = label === undefined ? gameId : `${gameId}@${label}`;
    super(
      'VersionNotFound',
      'not_found',
      versionId,
      label === undefined
        ? `Game ${gameId} has no versions`
        : `Version ${label} of game ${gameId} not found`
    );
  }
}

export class RoomNotFoundError extends PlayHubError {
  constructor(roomId: string) {
    super('RoomNotFound', 'not_found', roomId, `Room not found: ${roomId}`);
  }
}

// ============ Authorization ============

export class NotOwnerError extends PlayHubError {
  constructor(gameId: string, developerId: string) {
    super(
      'NotOwner',
      'authorization',
      gameId,
      `Developer ${developerId} does not own game ${gameId}`
    );
  }
}

export class NotAuthorizedError extends PlayHubError {
  constructor(entityId: string, message: string) {
    super('NotAuthorized', 'authorization', entityId, message);
  }
}

// ============ Preconditions ============

export class RoomFullError extends PlayHubError {
  constructor(roomId: string, maxPlayers: number) {
    super('RoomFull', 'precondition', roomId, `Room ${roomId} is full (${maxPlayers} players)`);
  }
}

export class RoomClosedError extends PlayHubError {
  constructor(roomId: string) {
    super('RoomClosed', 'precondition', roomId, `Room ${roomId} is no longer accepting players`);
  }
}

export class RoomNotWaitingError extends PlayHubError {
  constructor(roomId: string, state: string) {
    super('RoomNotWaiting', 'precondition', roomId, `Room ${roomId} cannot start while ${state}`);
  }
}

export class InsufficientPlayersError extends PlayHubError {
  constructor(roomId: string, present: number, required: number) {
    super(
      'InsufficientPlayers',
      'precondition',
      roomId,
      `Room ${roomId} has ${present} player(s), needs at least ${required}`
    );
  }
}

export class AlreadyJoinedError extends PlayHubError {
  constructor(roomId: string, playerId: string) {
    super(
      'AlreadyJoined',
      'precondition',
      roomId,
      `Player ${playerId} already joined room ${roomId}`
    );
  }
}

export class DuplicateVersionError extends PlayHubError {
  constructor(gameId: string, label: string) {
    super(
      'DuplicateVersion',
      'precondition',
      `${gameId}@${label}`,
      `Version ${label} already exists for game ${gameId}`
    );
  }
}

export class NotEligibleError extends PlayHubError {
  constructor(gameId: string, playerId: string) {
    super(
      'NotEligible',
      'precondition',
      gameId,
      `Player ${playerId} must play ${gameId} before rating it`
    );
  }
}

export class InvalidScoreError extends PlayHubError {
  constructor(gameId: string, score: number, min: number, max: number) {
    super(
      'InvalidScore',
      'precondition',
      gameId,
      `Score ${score} is not an integer between ${min} and ${max}`
    );
  }
}

export class GameNotPlayableError extends PlayHubError {
  constructor(versionId: string, reason: string) {
    super(
      'GameNotPlayable',
      'precondition',
      versionId,
      `Version ${versionId} is not playable: ${reason}`
    );
  }
}

export class GameDelistedError extends PlayHubError {
  constructor(gameId: string) {
    super('GameDelisted', 'precondition', gameId, `Game ${gameId} has been delisted`);
  }
}

export class DuplicateGameError extends PlayHubError {
  constructor(gameId: string) {
    super('DuplicateGame', 'precondition', gameId, `A game with id ${gameId} already exists`);
  }
}

export class DuplicateAccountError extends PlayHubError {
  constructor(role: string, accountId: string) {
    super('DuplicateAccount', 'precondition', accountId, `The ${role} name ${accountId} is taken`);
  }
}

export class InvalidManifestError extends PlayHubError {
  constructor(entityId: string, message: string) {
    super('InvalidManifest', 'precondition', entityId, `Invalid manifest: ${message}`);
  }
}

export class RoomLimitReachedError extends PlayHubError {
  constructor(gameId: string, maxRooms: number) {
    super(
      'RoomLimitReached',
      'precondition',
      gameId,
      `The server already hosts ${maxRooms} open rooms; join an existing one`
    );
  }
}

// ============ Resources ============

export class LaunchFailedError extends PlayHubError {
  constructor(roomId: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('LaunchFailed', 'resource', roomId, `Failed to launch room ${roomId}: ${detail}`, {
      cause,
    });
  }
}

export class UploadFailedError extends PlayHubError {
  constructor(versionId: string, detail: string, cause?: unknown) {
    super('UploadFailed', 'resource', versionId, `Upload of ${versionId} failed: ${detail}`, {
      cause,
    });
  }
}
