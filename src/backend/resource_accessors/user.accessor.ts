import { randomUUID } from 'node:crypto';
import { getDatabase, type SqliteDatabase } from '@/backend/db';
import { isUserRole, type UserRole } from '@/shared/core';

export interface UserRecord {
  id: string;
  role: UserRole;
  firstName: string;
  lastName: string;
  profilePicture: string | null;
  isBanned: boolean;
  createdAt: Date;
}

export interface CreateUserInput {
  id?: string;
  role: UserRole;
  firstName: string;
  lastName: string;
  profilePicture?: string | null;
  isBanned?: boolean;
}

interface UserRow {
  id: string;
  role: string;
  first_name: string;
  last_name: string;
  profile_picture: string | null;
  is_banned: number;
  created_at: string;
}

export function toUserRole(value: string): UserRole {
  if (!isUserRole(value)) {
    throw new Error(`Unknown user role in storage: ${value}`);
  }
  return value;
}

function toUserRecord(row: UserRow): UserRecord {
  return {
    id: row.id,
    role: toUserRole(row.role),
    firstName: row.first_name,
    lastName: row.last_name,
    profilePicture: row.profile_picture,
    isBanned: row.is_banned === 1,
    createdAt: new Date(row.created_at),
  };
}

/**
 * Read side of the user profiles owned by the profile module. `create` and
 * `setBanned` exist for seeding and moderation tooling.
 */
export interface UserAccessor {
  findById(id: string): Promise<UserRecord | null>;
  create(input: CreateUserInput): Promise<UserRecord>;
  setBanned(id: string, isBanned: boolean): Promise<void>;
}

export class SqliteUserAccessor implements UserAccessor {
  constructor(private readonly getDb: () => SqliteDatabase = getDatabase) {}

  async findById(id: string): Promise<UserRecord | null> {
    const row = this.getDb()
      .prepare<[string], UserRow>('SELECT * FROM users WHERE id = ?')
      .get(id);
    return row ? toUserRecord(row) : null;
  }

  async create(input: CreateUserInput): Promise<UserRecord> {
    const record: UserRecord = {
      id: input.id ?? randomUUID(),
      role: input.role,
      firstName: input.firstName,
      lastName: input.lastName,
      profilePicture: input.profilePicture ?? null,
      isBanned: input.isBanned ?? false,
      createdAt: new Date(),
    };
    this.getDb()
      .prepare(
        `INSERT INTO users (id, role, first_name, last_name, profile_picture, is_banned, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        record.id,
        record.role,
        record.firstName,
        record.lastName,
        record.profilePicture,
        record.isBanned ? 1 : 0,
        record.createdAt.toISOString()
      );
    return record;
  }

  async setBanned(id: string, isBanned: boolean): Promise<void> {
    this.getDb()
      .prepare('UPDATE users SET is_banned = ? WHERE id = ?')
      .run(isBanned ? 1 : 0, id);
  }
}

export const userAccessor: UserAccessor = new SqliteUserAccessor();
