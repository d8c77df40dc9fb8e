import { type AccountRole, NotAuthorizedError } from '@playhub/core';
import type { Request } from 'express';
import { UnauthenticatedError } from '../errors.js';
import type { AuthService, Principal } from '../services/AuthService.js';

export function bearerToken(req: Request): string | null {
  const header = req.get('authorization');
  if (!header?.startsWith('Bearer ')) {
    return null;
  }
  const token = header.slice('Bearer '.length).trim();
  return token.length > 0 ? token : null;
}

/**
 * Identity carried by a request.
 * @throws {UnauthenticatedError} without a valid session token
 * @throws {NotAuthorizedError} if the session belongs to another role
 */
export function requirePrincipal(auth: AuthService, req: Request, role?: AccountRole): Principal {
  const token = bearerToken(req);
  if (token === null) {
    throw new UnauthenticatedError();
  }
  const principal = auth.authenticate(token);
  if (role !== undefined && principal.role !== role) {
    throw new NotAuthorizedError(principal.id, `Only a ${role} can do this`);
  }
  return principal;
}
