import { Router } from 'express';

import { logger, runWithSpan } from '@observatory/shared';

import type { BookingLedger } from '../application/services/bookingLedger';
import type { SlotCatalog } from '../application/services/slotCatalog';
import { slotParamsSchema } from '../dtos';
import { currentUser, type AuthMiddleware } from '../infrastructure/http/authMiddleware';
import { sendResult } from '../infrastructure/http/resultStatus';

export interface SlotControllerDependencies {
  catalog: SlotCatalog;
  ledger: BookingLedger;
  auth: AuthMiddleware;
}

export function createSlotController({ catalog, ledger, auth }: SlotControllerDependencies): Router {
  const router = Router();

  router.get('/slots', auth.authenticate, async (_req, res, next) => {
    try {
      await runWithSpan('Controller:GET /slots', async () => {
        const user = currentUser(res);
        const slots = await catalog.listUpcoming(user.id);
        res.status(200).json(slots);
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/slots/:slotId/booking', auth.authenticate, async (req, res, next) => {
    try {
      await runWithSpan('Controller:POST /slots/:slotId/booking', async () => {
        const { slotId } = slotParamsSchema.parse(req.params);
        const user = currentUser(res);

        const requestLogger = res.locals.logger ?? logger.withContext({ userId: user.id });
        requestLogger.info({ slotId }, 'Booking slot');

        sendResult(res, await ledger.book(user.id, slotId));
      });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/slots/:slotId/booking', auth.authenticate, async (req, res, next) => {
    try {
      await runWithSpan('Controller:DELETE /slots/:slotId/booking', async () => {
        const { slotId } = slotParamsSchema.parse(req.params);
        const user = currentUser(res);

        const requestLogger = res.locals.logger ?? logger.withContext({ userId: user.id });
        requestLogger.info({ slotId }, 'Cancelling booking');

        sendResult(res, await ledger.cancel(user.id, slotId));
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
