import type { Queryable } from '@observatory/shared';

import {
  userFromRow,
  type AdminRank,
  type NewUser,
  type UserDatabaseRow,
  type UserRecord,
  type UserRole
} from '../../domain/user';
import type { UserRepository } from '../interfaces';

const USER_COLUMNS = 'id, name, email, password_hash, role, admin_rank, blocked, created_at';

export class PostgresUserRepository implements UserRepository {
  constructor(private readonly db: Queryable) {}

  async insert(user: NewUser): Promise<UserRecord> {
    const result = await this.db.query<UserDatabaseRow>(
      `INSERT INTO users (name, email, password_hash, role, admin_rank)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${USER_COLUMNS}`,
      [user.name, user.email, user.passwordHash, user.role, user.adminRank]
    );
    return userFromRow(result.rows[0]);
  }

  async findById(id: number): Promise<UserRecord | null> {
    const result = await this.db.query<UserDatabaseRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id]
    );
    return result.rows[0] ? userFromRow(result.rows[0]) : null;
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const result = await this.db.query<UserDatabaseRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE lower(email) = lower($1)`,
      [email]
    );
    return result.rows[0] ? userFromRow(result.rows[0]) : null;
  }

  async findSuperAdmin(): Promise<UserRecord | null> {
    const result = await this.db.query<UserDatabaseRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE admin_rank = 'super' ORDER BY id LIMIT 1`
    );
    return result.rows[0] ? userFromRow(result.rows[0]) : null;
  }

  async list(): Promise<UserRecord[]> {
    const result = await this.db.query<UserDatabaseRow>(
      `SELECT ${USER_COLUMNS} FROM users ORDER BY id ASC`
    );
    return result.rows.map(userFromRow);
  }

  async updatePassword(id: number, passwordHash: string): Promise<void> {
    await this.db.query('UPDATE users SET password_hash = $2 WHERE id = $1', [id, passwordHash]);
  }

  async updateRole(id: number, role: UserRole, adminRank: AdminRank | null): Promise<void> {
    await this.db.query('UPDATE users SET role = $2, admin_rank = $3 WHERE id = $1', [
      id,
      role,
      adminRank
    ]);
  }

  async setBlocked(id: number, blocked: boolean): Promise<void> {
    await this.db.query('UPDATE users SET blocked = $2 WHERE id = $1', [id, blocked]);
  }

  async delete(id: number): Promise<void> {
    await this.db.query('DELETE FROM users WHERE id = $1', [id]);
  }
}
