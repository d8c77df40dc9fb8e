/**
 * @fileoverview Errors raised by the lobby itself, outside the core taxonomy.
 */

export type LobbyErrorKind = 'Unauthenticated' | 'AlreadyLoggedIn' | 'InvalidRequest';

export class LobbyError extends Error {
  readonly kind: LobbyErrorKind;
  readonly entityId: string;
  /** HTTP status the error handler answers with */
  readonly status: number;

  constructor(kind: LobbyErrorKind, status: number, entityId: string, message: string) {
    super(message);
    this.name = `${kind}Error`;
    this.kind = kind;
    this.status = status;
    this.entityId = entityId;
  }
}

export class UnauthenticatedError extends LobbyError {
  constructor(message = 'Missing or expired session token') {
    super('Unauthenticated', 401, '', message);
  }
}

export class AlreadyLoggedInError extends LobbyError {
  constructor(accountId: string) {
    super(
      'AlreadyLoggedIn',
      409,
      accountId,
      `${accountId} is already logged in; log out first or wait for that session to expire`
    );
  }
}

export class InvalidRequestError extends LobbyError {
  constructor(message: string, entityId = '') {
    super('InvalidRequest', 400, entityId, message);
  }
}
