import { ok, err, type Result } from 'neverthrow';
import {
  createLogger,
  DEFAULT_ROLE_ID,
  type LoginRequest,
  type RegisterRequest,
  type User,
  type UserProfile,
  type UserResponse,
} from '@gatehouse/shared';
import { AuthError, type JWTAuth } from '@gatehouse/security';
import { DuplicateUserError, type UserStore } from '../database/user-store.js';
import type { RoleStore } from '../database/role-store.js';

const logger = createLogger('Core:AuthService');

export type AuthServiceErrorKind = 'Conflict' | 'Unauthorized' | 'NotFound' | 'ServerMisconfigured';

export class AuthServiceError extends Error {
  public readonly kind: AuthServiceErrorKind;

  constructor(kind: AuthServiceErrorKind, message: string) {
    super(message);
    this.name = 'AuthServiceError';
    this.kind = kind;
  }
}

export interface RegisteredUser {
  id: number;
  username: string;
}

export interface LoginResult {
  token: string;
  username: string;
  email: string;
  expiresAt: Date;
}

export interface AuthServiceDeps {
  users: UserStore;
  roles: RoleStore;
  auth: JWTAuth;
}

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    fullName: user.fullName,
    username: user.username,
    email: user.email,
    roleId: user.roleId,
    isActive: user.isActive,
    createdAt: user.createdAt,
  };
}

const conflict = (): AuthServiceError => new AuthServiceError('Conflict', 'User already exists.');
const invalidCredentials = (): AuthServiceError => new AuthServiceError('Unauthorized', 'Invalid credentials.');

export class AuthService {
  private readonly users: UserStore;
  private readonly roles: RoleStore;
  private readonly auth: JWTAuth;

  constructor(deps: AuthServiceDeps) {
    this.users = deps.users;
    this.roles = deps.roles;
    this.auth = deps.auth;
  }

  async register(request: RegisterRequest): Promise<Result<RegisteredUser, AuthServiceError>> {
    if (await this.users.existsByUsernameOrEmail(request.username, request.email)) {
      logger.info('Registration rejected: user exists', { username: request.username });
      return err(conflict());
    }

    const passwordHash = await this.auth.hashPassword(request.password);

    try {
      const user = await this.users.create({
        username: request.username,
        fullName: request.fullName,
        email: request.email,
        passwordHash,
        roleId: DEFAULT_ROLE_ID,
      });
      logger.info('User registered', { userId: user.id, username: user.username });
      return ok({ id: user.id, username: user.username });
    } catch (error) {
      // A concurrent registration can still win the unique index.
      if (error instanceof DuplicateUserError) {
        return err(conflict());
      }
      throw error;
    }
  }

  async login(request: LoginRequest): Promise<Result<LoginResult, AuthServiceError>> {
    const identifier = request.usernameOrEmail;
    const user = identifier.includes('@')
      ? await this.users.findByEmail(identifier)
      : await this.users.findByUsername(identifier);

    if (!user || !(await this.auth.verifyPassword(request.password, user.passwordHash))) {
      logger.warn('Login failed', { identifier });
      return err(invalidCredentials());
    }

    try {
      const issued = this.auth.issueToken({ id: user.id, username: user.username });
      logger.info('Login succeeded', { userId: user.id });
      return ok({
        token: issued.token,
        username: user.username,
        email: user.email,
        expiresAt: issued.expiresAt,
      });
    } catch (error) {
      if (error instanceof AuthError && error.code === 'SERVER_MISCONFIGURED') {
        logger.error('Cannot issue token', error);
        return err(new AuthServiceError('ServerMisconfigured', error.message));
      }
      throw error;
    }
  }

  async getProfile(userId: number): Promise<Result<UserProfile, AuthServiceError>> {
    const user = await this.users.findById(userId);
    if (!user) {
      return err(new AuthServiceError('NotFound', 'User not found.'));
    }

    const [role, permissions] = await Promise.all([
      this.roles.getRole(user.roleId),
      this.roles.listPermissions(user.roleId),
    ]);

    return ok({
      ...toUserResponse(user),
      role: role?.name ?? null,
      permissions: permissions.map(p => p.name),
    });
  }
}
