import { type Request, type Response, Router } from 'express';
import { UnauthenticatedError } from '../errors.js';
import { bearerToken } from '../middleware/auth.js';
import { parseRequest, sendError } from '../middleware/errors.js';
import type { AuthService } from '../services/AuthService.js';
import { CredentialsSchema, type LoginResponse, RoleParamsSchema } from '../types.js';

export function createAccountRouter(auth: AuthService): Router {
  const router = Router();

  /**
   * POST /api/accounts/logout - End the caller's session
   */
  router.post('/logout', (req: Request, res: Response) => {
    try {
      const token = bearerToken(req);
      if (token === null) {
        throw new UnauthenticatedError();
      }
      auth.logout(token);
      res.json({ message: 'Logged out' });
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /api/accounts/:role/register - Create a developer or player account
   */
  router.post('/:role/register', async (req: Request, res: Response) => {
    try {
      const { role } = parseRequest(RoleParamsSchema, req.params);
      const { id, password } = parseRequest(CredentialsSchema, req.body);

      const account = await auth.register(role, id, password);

      res.status(201).json({ role: account.role, id: account.id });
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /api/accounts/:role/login - Exchange credentials for a bearer token
   */
  router.post('/:role/login', async (req: Request, res: Response) => {
    try {
      const { role } = parseRequest(RoleParamsSchema, req.params);
      const { id, password } = parseRequest(CredentialsSchema, req.body);

      const principal = await auth.login(role, id, password);

      const response: LoginResponse = { token: principal.token, role, id };
      res.json(response);
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
