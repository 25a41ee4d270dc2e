import { describe, it, expect, beforeEach } from 'vitest';
import jwt from 'jsonwebtoken';
import { RoleId, type NewUser, type User } from '@gatehouse/shared';
import { JWTAuth } from '../packages/security/src/jwt-auth.js';
import { AuthService, toUserResponse } from '../packages/core/src/auth/auth-service.js';
import { DuplicateUserError } from '../packages/core/src/database/user-store.js';
import {
  validateLoginRequest,
  validateRegisterRequest,
} from '../packages/core/src/auth/request-validation.js';
import {
  InMemoryRoleStore,
  InMemoryUserStore,
  TEST_AUDIENCE,
  TEST_ISSUER,
  TEST_KEY,
} from './helpers/in-memory-stores.js';

const NOW = Date.UTC(2026, 0, 1);

const alice = {
  username: 'alice',
  fullName: 'Alice Example',
  email: 'alice@x.com',
  password: 'secret1',
};

function createService(key: string | undefined = TEST_KEY) {
  const users = new InMemoryUserStore();
  const roles = new InMemoryRoleStore();
  const auth = new JWTAuth({
    key,
    issuer: TEST_ISSUER,
    audience: TEST_AUDIENCE,
    bcryptRounds: 4,
    now: () => NOW,
  });
  return { users, roles, auth, service: new AuthService({ users, roles, auth }) };
}

// ═══════════════════════════════════════════════════════════════
// 1. REGISTRATION
// ═══════════════════════════════════════════════════════════════
describe('AuthService.register', () => {
  let ctx: ReturnType<typeof createService>;

  beforeEach(() => {
    ctx = createService();
  });

  it('should create a guest user with a hashed password', async () => {
    const result = await ctx.service.register(alice);
    expect(result._unsafeUnwrap()).toEqual({ id: 1, username: 'alice' });

    const stored = await ctx.users.findByUsername('alice');
    expect(stored?.roleId).toBe(RoleId.GUEST);
    expect(stored?.isActive).toBe(true);
    expect(stored?.passwordHash).not.toBe('secret1');
    expect(await ctx.auth.verifyPassword('secret1', stored?.passwordHash ?? '')).toBe(true);
  });

  it('should reject a taken username', async () => {
    await ctx.service.register(alice);
    const error = (await ctx.service.register({ ...alice, email: 'other@x.com' }))._unsafeUnwrapErr();
    expect(error.kind).toBe('Conflict');
    expect(error.message).toBe('User already exists.');
    expect(ctx.users.all()).toHaveLength(1);
  });

  it('should reject a taken email', async () => {
    await ctx.service.register(alice);
    const error = (await ctx.service.register({ ...alice, username: 'alice2' }))._unsafeUnwrapErr();
    expect(error.kind).toBe('Conflict');
  });

  it('should map a unique-index violation during insert to a conflict', async () => {
    class RacingUserStore extends InMemoryUserStore {
      override async existsByUsernameOrEmail(): Promise<boolean> {
        return false;
      }
      override async create(_user: NewUser): Promise<User> {
        throw new DuplicateUserError();
      }
    }
    const users = new RacingUserStore();
    const service = new AuthService({ users, roles: ctx.roles, auth: ctx.auth });

    const error = (await service.register(alice))._unsafeUnwrapErr();
    expect(error.kind).toBe('Conflict');
  });

  it('should propagate unexpected store failures', async () => {
    class BrokenUserStore extends InMemoryUserStore {
      override async create(_user: NewUser): Promise<User> {
        throw new Error('connection lost');
      }
    }
    const service = new AuthService({ users: new BrokenUserStore(), roles: ctx.roles, auth: ctx.auth });
    await expect(service.register(alice)).rejects.toThrow('connection lost');
  });
});

// ═══════════════════════════════════════════════════════════════
// 2. LOGIN
// ═══════════════════════════════════════════════════════════════
describe('AuthService.login', () => {
  let ctx: ReturnType<typeof createService>;

  beforeEach(async () => {
    ctx = createService();
    await ctx.service.register(alice);
  });

  it('should log in by email', async () => {
    const result = (await ctx.service.login({ usernameOrEmail: 'alice@x.com', password: 'secret1' }))._unsafeUnwrap();
    expect(result.username).toBe('alice');
    expect(result.email).toBe('alice@x.com');
    expect(result.token.split('.')).toHaveLength(3);
    expect(result.expiresAt.getTime()).toBe(NOW + 3_600_000);
  });

  it('should log in by username', async () => {
    const result = (await ctx.service.login({ usernameOrEmail: 'alice', password: 'secret1' }))._unsafeUnwrap();
    expect(result.email).toBe('alice@x.com');
  });

  it('should issue a token carrying the user id and name', async () => {
    const { token } = (await ctx.service.login({ usernameOrEmail: 'alice', password: 'secret1' }))._unsafeUnwrap();
    const payload = jwt.verify(token, TEST_KEY, { ignoreExpiration: true });
    expect(payload).toMatchObject({
      unique_name: 'alice',
      nameid: '1',
      sub: 'alice',
      iss: TEST_ISSUER,
      aud: TEST_AUDIENCE,
      exp: NOW / 1000 + 3600,
    });
  });

  it('should reject a wrong password', async () => {
    const error = (await ctx.service.login({ usernameOrEmail: 'alice@x.com', password: 'wrong-pass' }))._unsafeUnwrapErr();
    expect(error.kind).toBe('Unauthorized');
    expect(error.message).toBe('Invalid credentials.');
  });

  it('should reject an unknown user with the same error', async () => {
    const byName = (await ctx.service.login({ usernameOrEmail: 'bob', password: 'secret1' }))._unsafeUnwrapErr();
    const byEmail = (await ctx.service.login({ usernameOrEmail: 'bob@x.com', password: 'secret1' }))._unsafeUnwrapErr();
    expect(byName.message).toBe('Invalid credentials.');
    expect(byEmail.message).toBe('Invalid credentials.');
  });

  it('should not look up an email-shaped identifier by username', async () => {
    const { service } = ctx;
    await service.register({ ...alice, username: 'odd@name', email: 'odd@x.com' });
    const error = (await service.login({ usernameOrEmail: 'odd@name', password: 'secret1' }))._unsafeUnwrapErr();
    expect(error.kind).toBe('Unauthorized');
  });

  it('should report a missing signing key as a server error', async () => {
    const noKey = createService(undefined);
    await noKey.service.register(alice);
    const error = (await noKey.service.login({ usernameOrEmail: 'alice', password: 'secret1' }))._unsafeUnwrapErr();
    expect(error.kind).toBe('ServerMisconfigured');
    expect(error.message).toBe('JWT configuration is missing');
  });
});

// ═══════════════════════════════════════════════════════════════
// 3. PROFILE
// ═══════════════════════════════════════════════════════════════
describe('AuthService.getProfile', () => {
  it('should return the public projection with role and permissions', async () => {
    const { service } = createService();
    await service.register(alice);

    const profile = (await service.getProfile(1))._unsafeUnwrap();
    expect(profile).toMatchObject({
      id: 1,
      username: 'alice',
      fullName: 'Alice Example',
      email: 'alice@x.com',
      roleId: 2,
      isActive: true,
      role: 'Guest',
      permissions: [],
    });
    expect(profile).not.toHaveProperty('passwordHash');
  });

  it('should list admin permissions', async () => {
    const { users, service } = createService();
    const admin = await users.create({
      username: 'root',
      email: 'root@x.com',
      fullName: 'Root',
      passwordHash: 'unused',
      roleId: RoleId.ADMIN,
    });

    const profile = (await service.getProfile(admin.id))._unsafeUnwrap();
    expect(profile.role).toBe('Admin');
    expect(profile.permissions).toEqual(['Manage Users', 'Manage Roles']);
  });

  it('should report an unknown user', async () => {
    const { service } = createService();
    const error = (await service.getProfile(404))._unsafeUnwrapErr();
    expect(error.kind).toBe('NotFound');
    expect(error.message).toBe('User not found.');
  });

  it('should strip the hash in toUserResponse', () => {
    const user: User = {
      id: 3,
      username: 'carol',
      email: 'carol@x.com',
      passwordHash: 'hash',
      fullName: 'Carol',
      isActive: false,
      roleId: RoleId.USER,
      createdAt: new Date(NOW),
      updatedAt: null,
    };
    expect(toUserResponse(user)).toEqual({
      id: 3,
      fullName: 'Carol',
      username: 'carol',
      email: 'carol@x.com',
      roleId: 1,
      isActive: false,
      createdAt: new Date(NOW),
    });
  });
});

// ═══════════════════════════════════════════════════════════════
// 4. REQUEST VALIDATION
// ═══════════════════════════════════════════════════════════════
describe('Request validation', () => {
  it('should accept and trim a valid registration', () => {
    const result = validateRegisterRequest({ ...alice, username: '  alice ', email: ' alice@x.com' });
    expect(result._unsafeUnwrap()).toEqual(alice);
  });

  it('should report every missing field', () => {
    const error = validateRegisterRequest({})._unsafeUnwrapErr();
    expect(error.message).toBe('Validation failed');
    expect(error.details).toEqual([
      'username is required',
      'fullName is required',
      'email is required',
      'password is required',
    ]);
  });

  it('should enforce lengths and email syntax', () => {
    const error = validateRegisterRequest({
      username: 'u'.repeat(51),
      fullName: 'f'.repeat(101),
      email: 'not-an-email',
      password: '12345',
    })._unsafeUnwrapErr();
    expect(error.details).toEqual([
      'username must be at most 50 characters',
      'fullName must be at most 100 characters',
      'email must be a valid email address',
      'password must be at least 6 characters',
    ]);
  });

  it('should accept boundary lengths', () => {
    const result = validateRegisterRequest({
      username: 'u'.repeat(50),
      fullName: 'f'.repeat(100),
      email: 'a@b.co',
      password: '123456',
    });
    expect(result.isOk()).toBe(true);
  });

  it('should reject a non-object body', () => {
    expect(validateRegisterRequest('alice')._unsafeUnwrapErr().details).toEqual(['Request body must be a JSON object']);
    expect(validateLoginRequest(null)._unsafeUnwrapErr().details).toEqual(['Request body must be a JSON object']);
  });

  it('should require both login fields', () => {
    expect(validateLoginRequest({ usernameOrEmail: 'alice' })._unsafeUnwrapErr().details).toEqual(['password is required']);
    expect(validateLoginRequest({ usernameOrEmail: 'alice', password: 'secret1' })._unsafeUnwrap()).toEqual({
      usernameOrEmail: 'alice',
      password: 'secret1',
    });
  });
});
