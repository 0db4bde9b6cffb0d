import { beforeEach, describe, expect, it } from 'vitest';

import { ConflictError, ValidationError } from '@observatory/shared';

import { EMAIL_TAKEN_MESSAGE, UserService } from '../../src/application/services/userService';
import { PASSWORD_RULE_MESSAGE } from '../../src/domain/user';
import { verifyPassword } from '../../src/infrastructure/security/password';
import { MemoryDatabase } from '../../src/repository/memory/MemoryDatabase';

describe('UserService', () => {
  let db: MemoryDatabase;
  let service: UserService;

  beforeEach(() => {
    db = new MemoryDatabase();
    service = new UserService({ unitOfWork: db });
  });

  describe('register', () => {
    it('stores a normalised email and a hashed password', async () => {
      const user = await service.register({ name: '  Vera  ', email: ' Vera@Example.COM ', password: 'Stargaze1' });

      expect(user).toMatchObject({ name: 'Vera', email: 'vera@example.com', role: 'user', adminRank: null, blocked: false });
      expect(user.passwordHash).not.toBe('Stargaze1');
      await expect(verifyPassword('Stargaze1', user.passwordHash)).resolves.toBe(true);
    });

    it('rejects an email that is already registered, whatever its case', async () => {
      await service.register({ name: 'Vera', email: 'vera@example.com', password: 'Stargaze1' });

      const attempt = service.register({ name: 'Other', email: 'VERA@example.com', password: 'Stargaze1' });

      await expect(attempt).rejects.toBeInstanceOf(ConflictError);
      await expect(attempt).rejects.toThrow(EMAIL_TAKEN_MESSAGE);
    });

    it.each([
      [{ name: '   ', email: 'a@example.com', password: 'Stargaze1' }, 'Name must be between 1 and 50 characters.'],
      [{ name: 'x'.repeat(51), email: 'a@example.com', password: 'Stargaze1' }, 'Name must be between 1 and 50 characters.'],
      [{ name: 'Ann', email: 'not-an-email', password: 'Stargaze1' }, 'Invalid email format.'],
      [{ name: 'Ann', email: 'a@example.com', password: 'stargaze1' }, PASSWORD_RULE_MESSAGE],
      [{ name: 'Ann', email: 'a@example.com', password: 'Short1' }, PASSWORD_RULE_MESSAGE]
    ])('validates %o', async (input, message) => {
      const attempt = service.register(input);

      await expect(attempt).rejects.toBeInstanceOf(ValidationError);
      await expect(attempt).rejects.toThrow(message);
    });

  });

  describe('changePassword', () => {
    it('replaces the hash when the current password matches', async () => {
      const user = await service.register({ name: 'Vera', email: 'vera@example.com', password: 'Stargaze1' });

      await service.changePassword(user.id, { currentPassword: 'Stargaze1', newPassword: 'Nebula22' });

      const stored = await db.withTransaction((uow) => uow.users.findById(user.id));
      await expect(verifyPassword('Nebula22', stored?.passwordHash ?? '')).resolves.toBe(true);
    });

    it('rejects a wrong current password, a reused one and a weak one', async () => {
      const user = await service.register({ name: 'Vera', email: 'vera@example.com', password: 'Stargaze1' });

      await expect(
        service.changePassword(user.id, { currentPassword: 'Wrong-pass1', newPassword: 'Nebula22' })
      ).rejects.toThrow('Current password is incorrect.');
      await expect(
        service.changePassword(user.id, { currentPassword: 'Stargaze1', newPassword: 'Stargaze1' })
      ).rejects.toThrow('New password must be different from the current password.');
      await expect(
        service.changePassword(user.id, { currentPassword: 'Stargaze1', newPassword: 'nebula' })
      ).rejects.toThrow(PASSWORD_RULE_MESSAGE);
    });

    it('reports an unknown user', async () => {
      await expect(
        service.changePassword(999, { currentPassword: 'Stargaze1', newPassword: 'Nebula22' })
      ).rejects.toThrow('User not found.');
    });
  });
});
