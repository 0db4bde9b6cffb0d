import { Router } from 'express';

import { runWithSpan } from '@observatory/shared';

import type { SlotCatalog } from '../application/services/slotCatalog';
import type { UserService } from '../application/services/userService';
import { changePasswordBodySchema } from '../dtos';
import { currentUser, type AuthMiddleware } from '../infrastructure/http/authMiddleware';

export interface MeControllerDependencies {
  catalog: SlotCatalog;
  userService: UserService;
  auth: AuthMiddleware;
}

export function createMeController({ catalog, userService, auth }: MeControllerDependencies): Router {
  const router = Router();

  router.use(auth.authenticate);

  router.get('/bookings', async (_req, res, next) => {
    try {
      await runWithSpan('Controller:GET /me/bookings', async () => {
        const bookings = await catalog.listUserBookings(currentUser(res).id);
        res.status(200).json(bookings);
      });
    } catch (error) {
      next(error);
    }
  });

  router.put('/password', async (req, res, next) => {
    try {
      await runWithSpan('Controller:PUT /me/password', async () => {
        const body = changePasswordBodySchema.parse(req.body);
        await userService.changePassword(currentUser(res).id, body);
        res.status(200).json({ code: 'password_changed', message: 'Password changed successfully.' });
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
