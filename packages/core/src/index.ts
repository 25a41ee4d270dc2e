export { loadConfig } from './config.js';
export type { AppConfig, DatabaseConfig, JwtConfig } from './config.js';
export {
  initDatabase,
  getDatabase,
  runMigrations,
  closeDatabase,
  buildKnexConfig,
  MIGRATIONS,
} from './database/connection.js';
export type { Migration } from './database/connection.js';
export { MySQLUserStore, DuplicateUserError } from './database/user-store.js';
export type { UserStore } from './database/user-store.js';
export { MySQLRoleStore } from './database/role-store.js';
export type { RoleStore } from './database/role-store.js';
export { AuthService, AuthServiceError, toUserResponse } from './auth/auth-service.js';
export type { AuthServiceErrorKind, AuthServiceDeps, LoginResult, RegisteredUser } from './auth/auth-service.js';
export { validateRegisterRequest, validateLoginRequest, RequestValidationError } from './auth/request-validation.js';
export { Gateway, createGateway } from './gateway/server.js';
export type { GatewayOptions } from './gateway/server.js';
export { createOpenAPISpec } from './gateway/openapi.js';
export type { OpenAPISpec } from './gateway/openapi.js';
