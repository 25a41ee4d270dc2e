import { DEFAULT_ROLE_ID, type NewUser, type Permission, type Role, type User } from '@gatehouse/shared';
import { DuplicateUserError, type UserStore } from '../../packages/core/src/database/user-store.js';
import type { RoleStore } from '../../packages/core/src/database/role-store.js';
import { SEED_PERMISSIONS, SEED_ROLES } from '../../packages/core/src/database/migrations/002_seed_reference_data.js';
import { loadConfig, type AppConfig } from '../../packages/core/src/config.js';

export const TEST_KEY = 'test-secret-signing-key-0123456789abcdef';
export const TEST_ISSUER = 'gatehouse-test';
export const TEST_AUDIENCE = 'gatehouse-test-clients';

export function createTestConfig(overrides: Record<string, string | undefined> = {}): AppConfig {
  return loadConfig({
    JWT_KEY: TEST_KEY,
    JWT_ISSUER: TEST_ISSUER,
    JWT_AUDIENCE: TEST_AUDIENCE,
    BCRYPT_ROUNDS: '4',
    LOG_LEVEL: 'fatal',
    ...overrides,
  });
}

/** Mirrors the unique indexes on username and email. */
export class InMemoryUserStore implements UserStore {
  private users: User[] = [];
  private nextId = 1;

  async findById(id: number): Promise<User | null> {
    return this.users.find(u => u.id === id) ?? null;
  }

  async findByUsername(username: string): Promise<User | null> {
    return this.users.find(u => u.username === username) ?? null;
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.users.find(u => u.email === email) ?? null;
  }

  async existsByUsernameOrEmail(username: string, email: string): Promise<boolean> {
    return this.users.some(u => u.username === username || u.email === email);
  }

  async create(user: NewUser): Promise<User> {
    if (this.users.some(u => u.username === user.username || u.email === user.email)) {
      throw new DuplicateUserError();
    }
    const created: User = {
      id: this.nextId++,
      username: user.username,
      email: user.email,
      passwordHash: user.passwordHash,
      fullName: user.fullName,
      isActive: true,
      roleId: user.roleId ?? DEFAULT_ROLE_ID,
      createdAt: new Date(),
      updatedAt: null,
    };
    this.users.push(created);
    return created;
  }

  remove(id: number): void {
    this.users = this.users.filter(u => u.id !== id);
  }

  all(): User[] {
    return [...this.users];
  }
}

export class InMemoryRoleStore implements RoleStore {
  private readonly roles: Role[] = SEED_ROLES.map(r => ({
    id: r.id,
    name: r.name,
    description: r.description,
    createdAt: r.created_at,
  }));

  private readonly permissions: Permission[] = SEED_PERMISSIONS.map(p => ({
    id: p.id,
    roleId: p.role_id,
    name: p.name,
    description: p.description,
    createdAt: p.created_at,
  }));

  async listRoles(): Promise<Role[]> {
    return [...this.roles];
  }

  async getRole(id: number): Promise<Role | null> {
    return this.roles.find(r => r.id === id) ?? null;
  }

  async listPermissions(roleId?: number): Promise<Permission[]> {
    return roleId === undefined ? [...this.permissions] : this.permissions.filter(p => p.roleId === roleId);
  }
}
