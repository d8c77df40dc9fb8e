import { type ErrorCategory, type ErrorKind, isPlayHubError, logger } from '@playhub/core';
import type { Response } from 'express';
import type { z } from 'zod';
import { InvalidRequestError, LobbyError } from '../errors.js';
import type { ErrorResponse } from '../types.js';

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  not_found: 404,
  authorization: 403,
  precondition: 409,
  resource: 503,
};

/** Precondition kinds caused by the request content rather than entity state */
const BAD_REQUEST_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'InvalidScore',
  'InvalidManifest',
]);

/**
 * HTTP status for an error thrown by the core or the lobby.
 */
export function statusFor(err: unknown): number {
  if (err instanceof LobbyError) {
    return err.status;
  }
  if (isPlayHubError(err)) {
    return BAD_REQUEST_KINDS.has(err.kind) ? 400 : STATUS_BY_CATEGORY[err.category];
  }
  return 500;
}

/**
 * Answer a failed request. Unexpected errors are logged and reported
 * without details.
 */
export function sendError(res: Response, err: unknown): void {
  const status = statusFor(err);
  let body: ErrorResponse;

  if (err instanceof LobbyError || isPlayHubError(err)) {
    body = { error: { kind: err.kind, entityId: err.entityId, message: err.message } };
  } else {
    logger.error('Unhandled request error', {
      error: err instanceof Error ? (err.stack ?? err.message) : String(err),
    });
    body = { error: { kind: 'Internal', entityId: '', message: 'Internal server error' } };
  }

  res.status(status).json(body);
}

/**
 * Validate a request body or parameter.
 * @throws {InvalidRequestError} listing every failed field
 */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
      .join('; ');
    throw new InvalidRequestError(`Invalid request: ${detail}`);
  }
  return result.data;
}
