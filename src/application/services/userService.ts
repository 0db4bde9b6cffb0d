import {
  ConflictError,
  NotFoundError,
  ValidationError,
  isUniqueViolation,
  logger
} from '@observatory/shared';

import {
  NAME_MAX_LENGTH,
  PASSWORD_RULE_MESSAGE,
  isEmailValid,
  isPasswordStrong,
  normalizeEmail,
  type UserRecord
} from '../../domain/user';
import { hashPassword, verifyPassword } from '../../infrastructure/security/password';
import type { UnitOfWorkFactory } from '../../repository/interfaces';

export interface RegistrationInput {
  name: string;
  email: string;
  password: string;
}

export interface PasswordChange {
  currentPassword: string;
  newPassword: string;
}

export interface UserServiceDependencies {
  unitOfWork: UnitOfWorkFactory;
}

export const EMAIL_TAKEN_MESSAGE = 'Email already registered.';

export class UserService {
  constructor(private readonly deps: UserServiceDependencies) {}

  async register(input: RegistrationInput): Promise<UserRecord> {
    const name = input.name.trim();
    const email = normalizeEmail(input.email);

    if (name.length === 0 || name.length > NAME_MAX_LENGTH) {
      throw new ValidationError(`Name must be between 1 and ${NAME_MAX_LENGTH} characters.`);
    }
    if (!isEmailValid(email)) {
      throw new ValidationError('Invalid email format.');
    }
    if (!isPasswordStrong(input.password)) {
      throw new ValidationError(PASSWORD_RULE_MESSAGE);
    }

    const passwordHash = await hashPassword(input.password);

    try {
      const user = await this.deps.unitOfWork.withTransaction(async (uow) => {
        if (await uow.users.findByEmail(email)) {
          throw new ConflictError(EMAIL_TAKEN_MESSAGE);
        }
        return uow.users.insert({ name, email, passwordHash, role: 'user', adminRank: null });
      });
      logger.info({ userId: user.id }, 'User registered');
      return user;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(EMAIL_TAKEN_MESSAGE);
      }
      throw error;
    }
  }

  async changePassword(userId: number, change: PasswordChange): Promise<void> {
    const user = await this.deps.unitOfWork.withTransaction((uow) => uow.users.findById(userId));
    if (!user) {
      throw new NotFoundError('User not found.');
    }

    if (!(await verifyPassword(change.currentPassword, user.passwordHash))) {
      throw new ValidationError('Current password is incorrect.');
    }
    if (change.newPassword === change.currentPassword) {
      throw new ValidationError('New password must be different from the current password.');
    }
    if (!isPasswordStrong(change.newPassword)) {
      throw new ValidationError(PASSWORD_RULE_MESSAGE);
    }

    const passwordHash = await hashPassword(change.newPassword);
    await this.deps.unitOfWork.withTransaction((uow) => uow.users.updatePassword(userId, passwordHash));
    logger.info({ userId }, 'Password changed');
  }
}
