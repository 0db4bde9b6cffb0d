import type { AuthenticatedUser } from '../application/services/authService';
import type { SharedLogger } from '@observatory/shared';

declare global {
  namespace Express {
    // eslint-disable-next-line @typescript-eslint/consistent-type-definitions
    interface Locals {
      authUser?: AuthenticatedUser;
      logger?: SharedLogger;
      logContext?: {
        traceId?: string;
        userId?: number;
        actorRole?: string;
      };
    }
  }
}

export {};
