import { Router, type RequestHandler } from 'express';

import { runWithSpan } from '@observatory/shared';

import type { AuthService } from '../application/services/authService';
import type { UserService } from '../application/services/userService';
import { loginBodySchema, refreshBodySchema, registerBodySchema } from '../dtos';

export interface AuthControllerDependencies {
  authService: AuthService;
  userService: UserService;
  /** Applied to login and registration. */
  attemptLimit: RequestHandler;
}

export function createAuthController({ authService, userService, attemptLimit }: AuthControllerDependencies): Router {
  const router = Router();

  router.post('/register', attemptLimit, async (req, res, next) => {
    try {
      await runWithSpan('Controller:POST /auth/register', async () => {
        const body = registerBodySchema.parse(req.body);
        const user = await userService.register(body);
        res.status(201).json(authService.issueTokens(user));
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/login', attemptLimit, async (req, res, next) => {
    try {
      await runWithSpan('Controller:POST /auth/login', async () => {
        const body = loginBodySchema.parse(req.body);
        const tokens = await authService.login(body.email, body.password);
        res.status(200).json(tokens);
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/refresh', async (req, res, next) => {
    try {
      await runWithSpan('Controller:POST /auth/refresh', async () => {
        const body = refreshBodySchema.parse(req.body);
        const tokens = await authService.refresh(body.refreshToken);
        res.status(200).json(tokens);
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
