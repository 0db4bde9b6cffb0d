export type UserRole = 'user' | 'admin';
export type AdminRank = 'super';

export interface UserRecord {
  id: number;
  name: string;
  email: string;
  passwordHash: string;
  role: UserRole;
  adminRank: AdminRank | null;
  blocked: boolean;
  createdAt: Date;
}

export interface NewUser {
  name: string;
  email: string;
  passwordHash: string;
  role: UserRole;
  adminRank: AdminRank | null;
}

export interface UserDatabaseRow {
  id: number;
  name: string;
  email: string;
  password_hash: string;
  role: UserRole;
  admin_rank: AdminRank | null;
  blocked: boolean;
  created_at: Date;
}

export function userFromRow(row: UserDatabaseRow): UserRecord {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    passwordHash: row.password_hash,
    role: row.role,
    adminRank: row.admin_rank,
    blocked: row.blocked,
    createdAt: new Date(row.created_at)
  };
}

export function isSuperAdmin(user: Pick<UserRecord, 'adminRank'>): boolean {
  return user.adminRank === 'super';
}

export const NAME_MAX_LENGTH = 50;
export const EMAIL_PATTERN = /^[\w\-.]+@([\w-]+\.)+[\w-]{2,}$/;
const PASSWORD_PATTERN = /^(?=.*[a-z])(?=.*[A-Z])(?=.*\d).{8,30}$/;

export const PASSWORD_RULE_MESSAGE =
  'Password must be at least 8 characters long, contain uppercase, lowercase letters and at least one number.';

export function isEmailValid(email: string): boolean {
  return EMAIL_PATTERN.test(email);
}

/** 8 to 30 characters with an upper-case letter, a lower-case letter and a digit. */
export function isPasswordStrong(password: string): boolean {
  return PASSWORD_PATTERN.test(password);
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}
