import type { Knex } from 'knex';
import { DEFAULT_ROLE_ID, type NewUser, type User } from '@gatehouse/shared';

export interface UserStore {
  findById(id: number): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  existsByUsernameOrEmail(username: string, email: string): Promise<boolean>;
  /** Throws {@link DuplicateUserError} when the username or email is already taken. */
  create(user: NewUser): Promise<User>;
}

export class DuplicateUserError extends Error {
  constructor(message: string = 'User already exists') {
    super(message);
    this.name = 'DuplicateUserError';
  }
}

interface UserRow {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  full_name: string;
  is_active: boolean | number;
  role_id: number;
  created_at: Date | string;
  updated_at: Date | string | null;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    fullName: row.full_name,
    isActive: Boolean(row.is_active),
    roleId: row.role_id,
    createdAt: new Date(row.created_at),
    updatedAt: row.updated_at === null ? null : new Date(row.updated_at),
  };
}

function isDuplicateEntry(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ER_DUP_ENTRY';
}

export class MySQLUserStore implements UserStore {
  constructor(private db: Knex) {}

  async findById(id: number): Promise<User | null> {
    const row = await this.db<UserRow>('users').where('id', id).first();
    return row ? toUser(row) : null;
  }

  async findByUsername(username: string): Promise<User | null> {
    const row = await this.db<UserRow>('users').where('username', username).first();
    return row ? toUser(row) : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const row = await this.db<UserRow>('users').where('email', email).first();
    return row ? toUser(row) : null;
  }

  async existsByUsernameOrEmail(username: string, email: string): Promise<boolean> {
    const row = await this.db<UserRow>('users')
      .select('id')
      .where('username', username)
      .orWhere('email', email)
      .first();
    return row !== undefined;
  }

  async create(user: NewUser): Promise<User> {
    const createdAt = new Date();
    let insertedId: number | undefined;

    try {
      [insertedId] = await this.db<UserRow>('users').insert({
        username: user.username,
        email: user.email,
        password_hash: user.passwordHash,
        full_name: user.fullName,
        is_active: true,
        role_id: user.roleId ?? DEFAULT_ROLE_ID,
        created_at: createdAt,
        updated_at: null,
      });
    } catch (error) {
      if (isDuplicateEntry(error)) {
        throw new DuplicateUserError();
      }
      throw error;
    }

    if (insertedId === undefined) {
      throw new Error('Insert into users returned no id');
    }

    const created = await this.findById(insertedId);
    if (!created) {
      throw new Error(`User ${insertedId} not found after insert`);
    }
    return created;
  }
}
