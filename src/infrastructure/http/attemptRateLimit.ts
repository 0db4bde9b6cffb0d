import type { NextFunction, Request, RequestHandler, Response } from 'express';
import rateLimit from 'express-rate-limit';
import { z } from 'zod';

import { TooManyRequestsError, logger } from '@observatory/shared';

import { normalizeEmail } from '../../domain/user';

export const TOO_MANY_ATTEMPTS_MESSAGE = 'Too many attempts. Please try again later.';

export interface AttemptRateLimitOptions {
  windowMs: number;
  limit: number;
}

const emailBodySchema = z.object({ email: z.string().min(1) });

/** Login and registration attempts are counted per normalised email; bodies without one fall back to the client address. */
const attemptKey = (req: Request): string => {
  const body = emailBodySchema.safeParse(req.body);
  if (body.success) {
    return `email:${normalizeEmail(body.data.email)}`;
  }
  return `ip:${req.ip ?? 'unknown'}`;
};

export function createAttemptRateLimit({ windowMs, limit }: AttemptRateLimitOptions): RequestHandler {
  return rateLimit({
    windowMs,
    limit,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: attemptKey,
    handler: (req: Request, _res: Response, next: NextFunction) => {
      logger.warn({ key: attemptKey(req), path: req.path }, 'Attempt limit exceeded');
      next(new TooManyRequestsError(TOO_MANY_ATTEMPTS_MESSAGE));
    }
  });
}
