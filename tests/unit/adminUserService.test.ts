import { beforeEach, describe, expect, it } from 'vitest';

import { ForbiddenError, Mutex, NotFoundError, ValidationError } from '@observatory/shared';

import { AdminUserService, SUPERADMIN_NAME } from '../../src/application/services/adminUserService';
import { verifyPassword } from '../../src/infrastructure/security/password';
import { MemoryDatabase } from '../../src/repository/memory/MemoryDatabase';
import { seedUser } from '../setup/fixtures';

describe('AdminUserService', () => {
  let db: MemoryDatabase;
  let service: AdminUserService;

  beforeEach(() => {
    db = new MemoryDatabase();
    service = new AdminUserService({ unitOfWork: db, adminLock: new Mutex() });
  });

  describe('bootstrapSuperAdmin', () => {
    it('creates the superadmin once', async () => {
      const first = await service.bootstrapSuperAdmin({ email: 'Root@Example.com', password: 'Admin-pass1' });
      const second = await service.bootstrapSuperAdmin({ email: 'other@example.com', password: 'Admin-pass1' });

      expect(first.created).toBe(true);
      expect(first.user).toMatchObject({
        name: SUPERADMIN_NAME,
        email: 'root@example.com',
        role: 'admin',
        adminRank: 'super'
      });
      expect(second).toEqual({ created: false, user: first.user });
      await expect(verifyPassword('Admin-pass1', first.user.passwordHash)).resolves.toBe(true);
    });

    it('generates a password when none is configured', async () => {
      const outcome = await service.bootstrapSuperAdmin({ email: 'root@example.com' });

      if (!outcome.created || !outcome.generatedPassword) {
        throw new Error('expected a generated password');
      }
      await expect(verifyPassword(outcome.generatedPassword, outcome.user.passwordHash)).resolves.toBe(true);
    });
  });

  describe('changeRole', () => {
    it('promotes a user to admin', async () => {
      const user = await seedUser(db);

      const updated = await service.changeRole(user.id, 'admin');

      expect(updated).toMatchObject({ id: user.id, role: 'admin', adminRank: null });
      const stored = await db.withTransaction((uow) => uow.users.findById(user.id));
      expect(stored?.role).toBe('admin');
    });

    it('refuses to change the superadmin', async () => {
      const root = await seedUser(db, { role: 'admin', superAdmin: true });

      const attempt = service.changeRole(root.id, 'user');

      await expect(attempt).rejects.toBeInstanceOf(ValidationError);
      await expect(attempt).rejects.toThrow('Cannot change role for superadmin');
    });

    it('reports an unknown user', async () => {
      await expect(service.changeRole(404, 'admin')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('setBlocked', () => {
    it('blocks, toggles and unblocks a user', async () => {
      const user = await seedUser(db);

      expect((await service.setBlocked(user.id, true)).blocked).toBe(true);
      expect((await service.setBlocked(user.id, 'toggle')).blocked).toBe(false);
      expect((await service.setBlocked(user.id, 'toggle')).blocked).toBe(true);
      expect((await service.setBlocked(user.id, false)).blocked).toBe(false);
    });

    it('never blocks an admin', async () => {
      const admin = await seedUser(db, { role: 'admin' });

      await expect(service.setBlocked(admin.id, true)).rejects.toThrow('Cannot block admin');
    });
  });

  describe('deleteUser', () => {
    it('lets only the superadmin delete accounts', async () => {
      const user = await seedUser(db);

      const attempt = service.deleteUser({ superAdmin: false }, user.id);

      await expect(attempt).rejects.toBeInstanceOf(ForbiddenError);
      await expect(attempt).rejects.toThrow('Only superadmin can delete user accounts.');
    });

    it('removes the account', async () => {
      const user = await seedUser(db);

      await service.deleteUser({ superAdmin: true }, user.id);

      const users = await service.listUsers();
      expect(users.map((entry) => entry.id)).not.toContain(user.id);
    });

    it('keeps the superadmin account', async () => {
      const root = await seedUser(db, { role: 'admin', superAdmin: true });

      await expect(service.deleteUser({ superAdmin: true }, root.id)).rejects.toThrow(
        'Cannot delete superadmin account.'
      );
    });
  });
});
