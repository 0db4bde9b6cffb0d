import { Router } from 'express';

import { runWithSpan } from '@observatory/shared';

import type { AdminUserService } from '../application/services/adminUserService';
import type { ConfigurationStore } from '../application/services/configurationService';
import type { SlotCatalog } from '../application/services/slotCatalog';
import type { SlotScheduler } from '../application/services/slotScheduler';
import { SLOT_MESSAGES } from '../application/services/slotScheduler';
import { isSuperAdmin, type UserRecord } from '../domain/user';
import {
  blockUserBodySchema,
  changeRoleBodySchema,
  confirmSlotRequestSchema,
  slotParamsSchema,
  updateConfigurationBodySchema,
  userParamsSchema,
  type UserResource
} from '../dtos';
import { currentUser, type AuthMiddleware } from '../infrastructure/http/authMiddleware';
import { sendResult } from '../infrastructure/http/resultStatus';
import type { WeatherRefresher } from '../modules/weather/application/weatherProvider';

export interface AdminControllerDependencies {
  configuration: ConfigurationStore;
  scheduler: SlotScheduler;
  catalog: SlotCatalog;
  users: AdminUserService;
  auth: AuthMiddleware;
  /** Absent when forecasts are disabled. */
  weather?: WeatherRefresher;
}

export function toUserResource(user: UserRecord): UserResource {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
    role: user.role,
    superAdmin: isSuperAdmin(user),
    blocked: user.blocked,
    createdAt: user.createdAt.toISOString()
  };
}

export function createAdminController({
  configuration,
  scheduler,
  catalog,
  users,
  auth,
  weather
}: AdminControllerDependencies): Router {
  const router = Router();

  router.use(...auth.requireRole('admin'));

  router.get('/configuration', async (_req, res, next) => {
    try {
      await runWithSpan('Controller:GET /admin/configuration', async () => {
        res.status(200).json(await configuration.getConfiguration());
      });
    } catch (error) {
      next(error);
    }
  });

  router.put('/configuration', async (req, res, next) => {
    try {
      await runWithSpan('Controller:PUT /admin/configuration', async () => {
        const body = updateConfigurationBodySchema.parse(req.body);
        res.status(200).json(await configuration.updateConfiguration(body));
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/slots', async (_req, res, next) => {
    try {
      await runWithSpan('Controller:GET /admin/slots', async () => {
        res.status(200).json(await catalog.listCalendar());
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/slots', async (req, res, next) => {
    try {
      await runWithSpan('Controller:POST /admin/slots', async () => {
        const body = confirmSlotRequestSchema.parse(req.body);
        const result = await scheduler.confirmSlot(body);
        sendResult(
          res,
          result,
          result.ok ? { slot: result.slot.toDTO() } : { conflictingSlotId: result.conflictingSlotId }
        );
      });
    } catch (error) {
      next(error);
    }
  });

  router.put('/slots/:slotId', async (req, res, next) => {
    try {
      await runWithSpan('Controller:PUT /admin/slots/:slotId', async () => {
        const { slotId } = slotParamsSchema.parse(req.params);
        const body = confirmSlotRequestSchema.parse(req.body);
        const result = await scheduler.confirmSlot(body, slotId);
        sendResult(
          res,
          result,
          result.ok ? { slot: result.slot.toDTO() } : { conflictingSlotId: result.conflictingSlotId }
        );
      });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/slots/:slotId', async (req, res, next) => {
    try {
      await runWithSpan('Controller:DELETE /admin/slots/:slotId', async () => {
        const { slotId } = slotParamsSchema.parse(req.params);
        sendResult(res, await scheduler.deleteSlot(slotId));
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/weather/refresh', async (_req, res, next) => {
    try {
      await runWithSpan('Controller:POST /admin/weather/refresh', async () => {
        if (!weather) {
          sendResult(res, { code: 'weather_unavailable', message: SLOT_MESSAGES.weather_unavailable });
          return;
        }
        const { updated } = await weather.refreshAllUpcoming();
        res.status(200).json({ code: 'weather_refreshed', message: 'Weather data updated.', updated });
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/users', async (_req, res, next) => {
    try {
      await runWithSpan('Controller:GET /admin/users', async () => {
        res.status(200).json((await users.listUsers()).map(toUserResource));
      });
    } catch (error) {
      next(error);
    }
  });

  router.put('/users/:userId/role', async (req, res, next) => {
    try {
      await runWithSpan('Controller:PUT /admin/users/:userId/role', async () => {
        const { userId } = userParamsSchema.parse(req.params);
        const { role } = changeRoleBodySchema.parse(req.body);
        res.status(200).json(toUserResource(await users.changeRole(userId, role)));
      });
    } catch (error) {
      next(error);
    }
  });

  router.put('/users/:userId/block', async (req, res, next) => {
    try {
      await runWithSpan('Controller:PUT /admin/users/:userId/block', async () => {
        const { userId } = userParamsSchema.parse(req.params);
        const { blocked } = blockUserBodySchema.parse(req.body);
        res.status(200).json(toUserResource(await users.setBlocked(userId, blocked)));
      });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/users/:userId', ...auth.requireSuperAdmin(), async (req, res, next) => {
    try {
      await runWithSpan('Controller:DELETE /admin/users/:userId', async () => {
        const { userId } = userParamsSchema.parse(req.params);
        await users.deleteUser(currentUser(res), userId);
        res.status(204).send();
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/bookings', async (_req, res, next) => {
    try {
      await runWithSpan('Controller:GET /admin/bookings', async () => {
        res.status(200).json(await catalog.listBookings());
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
