import { randomUUID } from 'node:crypto';

import {
  ForbiddenError,
  UnauthorizedError,
  config,
  logger
} from '@observatory/shared';

import { isSuperAdmin, normalizeEmail, type UserRecord, type UserRole } from '../../domain/user';
import { signJwt, verifyJwt, type JwtPayload, type TokenType } from '../../infrastructure/security/jwt';
import { verifyPassword } from '../../infrastructure/security/password';
import type { UnitOfWorkFactory } from '../../repository/interfaces';

export interface AuthenticatedUser {
  id: number;
  name: string;
  email: string;
  role: UserRole;
  superAdmin: boolean;
}

export interface AuthTokens {
  accessToken: string;
  refreshToken: string;
  user: AuthenticatedUser;
}

export interface AuthServiceDependencies {
  unitOfWork: UnitOfWorkFactory;
}

export const BLOCKED_ACCOUNT_MESSAGE = 'Your account is blocked.';

export function toAuthenticatedUser(user: UserRecord): AuthenticatedUser {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
    role: user.role,
    superAdmin: isSuperAdmin(user)
  };
}

export function isUserRole(role: string): role is UserRole {
  return role === 'user' || role === 'admin';
}

export class AuthService {
  constructor(private readonly deps: AuthServiceDependencies) {}

  async login(email: string, password: string): Promise<AuthTokens> {
    const normalizedEmail = normalizeEmail(email);
    const user = await this.deps.unitOfWork.withTransaction((uow) => uow.users.findByEmail(normalizedEmail));
    if (!user || !(await verifyPassword(password, user.passwordHash))) {
      throw new UnauthorizedError('Invalid email or password.');
    }

    if (user.blocked) {
      logger.warn({ userId: user.id }, 'Blocked user attempted to log in');
      throw new ForbiddenError(BLOCKED_ACCOUNT_MESSAGE);
    }

    logger.info({ userId: user.id }, 'User logged in');
    return this.generateTokens(user);
  }

  async refresh(refreshToken: string): Promise<AuthTokens> {
    const payload = this.verifyToken(refreshToken, 'refresh');
    const user = await this.deps.unitOfWork.withTransaction((uow) =>
      uow.users.findById(subjectToUserId(payload.sub))
    );
    if (!user) {
      throw new UnauthorizedError('User not found');
    }
    if (user.blocked) {
      throw new ForbiddenError(BLOCKED_ACCOUNT_MESSAGE);
    }

    return this.generateTokens(user);
  }

  issueTokens(user: UserRecord): AuthTokens {
    return this.generateTokens(user);
  }

  /**
   * Resolves the caller from the token alone. Role changes and blocks take
   * effect for routes once the token is refreshed; the ledger re-reads the
   * user on every booking.
   */
  verifyAccessToken(token: string): AuthenticatedUser {
    const payload = this.verifyToken(token, 'access');
    if (!payload.role || !isUserRole(payload.role)) {
      throw new UnauthorizedError('Invalid token role');
    }

    return {
      id: subjectToUserId(payload.sub),
      name: payload.name ?? '',
      email: payload.email ?? '',
      role: payload.role,
      superAdmin: payload.adminRank === 'super'
    };
  }

  private generateTokens(user: UserRecord): AuthTokens {
    const claims = {
      name: user.name,
      email: user.email,
      role: user.role,
      adminRank: user.adminRank
    };

    const accessToken = signJwt(config.JWT_SECRET, {
      expiresInSeconds: config.JWT_ACCESS_TTL_SECONDS,
      subject: String(user.id),
      type: 'access',
      additionalClaims: { ...claims, jti: randomUUID() }
    });

    const refreshToken = signJwt(config.JWT_SECRET, {
      expiresInSeconds: config.JWT_REFRESH_TTL_SECONDS,
      subject: String(user.id),
      type: 'refresh',
      additionalClaims: { ...claims, jti: randomUUID() }
    });

    return { accessToken, refreshToken, user: toAuthenticatedUser(user) };
  }

  private verifyToken(token: string, expectedType: TokenType): JwtPayload {
    let payload: JwtPayload;
    try {
      payload = verifyJwt(token, config.JWT_SECRET);
    } catch (error) {
      logger.debug({ error }, 'Rejected token');
      throw new UnauthorizedError('Invalid token');
    }

    if (payload.type !== expectedType) {
      throw new UnauthorizedError('Invalid token type');
    }
    return payload;
  }
}

function subjectToUserId(subject: string): number {
  const id = Number(subject);
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new UnauthorizedError('Invalid token subject');
  }
  return id;
}
