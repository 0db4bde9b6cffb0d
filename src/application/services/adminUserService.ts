import { randomBytes } from 'node:crypto';

import { ForbiddenError, NotFoundError, ValidationError, logger, type Mutex } from '@observatory/shared';

import {
  isSuperAdmin,
  normalizeEmail,
  type UserRecord,
  type UserRole
} from '../../domain/user';
import { hashPassword } from '../../infrastructure/security/password';
import type { UnitOfWork, UnitOfWorkFactory } from '../../repository/interfaces';

export interface SuperAdminSeed {
  email: string;
  /** A random password is generated and logged once when absent. */
  password?: string;
}

export type BootstrapOutcome =
  | { created: false; user: UserRecord }
  | { created: true; user: UserRecord; generatedPassword?: string };

export interface AdminUserServiceDependencies {
  unitOfWork: UnitOfWorkFactory;
  adminLock: Mutex;
}

export const SUPERADMIN_NAME = 'Superadmin';

export class AdminUserService {
  constructor(private readonly deps: AdminUserServiceDependencies) {}

  listUsers(): Promise<UserRecord[]> {
    return this.deps.unitOfWork.withTransaction((uow) => uow.users.list());
  }

  /** Creates the superadmin account unless one already exists. */
  async bootstrapSuperAdmin(seed: SuperAdminSeed): Promise<BootstrapOutcome> {
    const password = seed.password ?? randomBytes(16).toString('base64url');
    const generatedPassword = seed.password ? undefined : password;
    const passwordHash = await hashPassword(password);

    const outcome = await this.deps.adminLock.runExclusive(() =>
      this.deps.unitOfWork.withTransaction(async (uow): Promise<BootstrapOutcome> => {
        const existing = await uow.users.findSuperAdmin();
        if (existing) {
          return { created: false, user: existing };
        }

        const user = await uow.users.insert({
          name: SUPERADMIN_NAME,
          email: normalizeEmail(seed.email),
          passwordHash,
          role: 'admin',
          adminRank: 'super'
        });
        return { created: true, user, generatedPassword };
      })
    );

    if (outcome.created) {
      logger.info({ email: outcome.user.email }, 'Default superadmin created');
      if (outcome.generatedPassword) {
        logger.warn(
          { email: outcome.user.email, password: outcome.generatedPassword },
          'Generated superadmin password; set DEFAULT_ADMIN_PASSWORD to choose one'
        );
      }
    }
    return outcome;
  }

  async changeRole(userId: number, role: UserRole): Promise<UserRecord> {
    return this.mutate(userId, async (uow, user) => {
      if (isSuperAdmin(user)) {
        throw new ValidationError('Cannot change role for superadmin');
      }
      await uow.users.updateRole(userId, role, null);
      logger.info({ userId, role }, 'User role updated');
      return { ...user, role, adminRank: null };
    });
  }

  /** `toggle` flips the stored state. */
  async setBlocked(userId: number, block: boolean | 'toggle'): Promise<UserRecord> {
    return this.mutate(userId, async (uow, user) => {
      if (user.role === 'admin') {
        throw new ValidationError('Cannot block admin');
      }
      const blocked = block === 'toggle' ? !user.blocked : block;
      await uow.users.setBlocked(userId, blocked);
      logger.info({ userId, blocked }, blocked ? 'User blocked' : 'User unblocked');
      return { ...user, blocked };
    });
  }

  /** Only a superadmin may delete accounts; bookings go with the user. */
  async deleteUser(caller: { superAdmin: boolean }, userId: number): Promise<void> {
    if (!caller.superAdmin) {
      throw new ForbiddenError('Only superadmin can delete user accounts.');
    }

    await this.mutate(userId, async (uow, user) => {
      if (isSuperAdmin(user)) {
        throw new ValidationError('Cannot delete superadmin account.');
      }
      await uow.users.delete(userId);
      logger.info({ userId }, 'User deleted');
      return user;
    });
  }

  private mutate(
    userId: number,
    change: (uow: UnitOfWork, user: UserRecord) => Promise<UserRecord>
  ): Promise<UserRecord> {
    return this.deps.adminLock.runExclusive(() =>
      this.deps.unitOfWork.withTransaction(async (uow) => {
        const user = await uow.users.findById(userId);
        if (!user) {
          throw new NotFoundError('User not found.');
        }
        return change(uow, user);
      })
    );
  }
}
