export const APP_NAME = 'Gatehouse';
export const APP_VERSION = '0.1.0';
export const APP_DESCRIPTION = 'Boilerplate REST API with JWT authentication';

export const DEFAULT_GATEWAY_HOST = '127.0.0.1';
export const DEFAULT_GATEWAY_PORT = 5080;

export const JWT_DEFAULT_EXPIRES_IN_SECONDS = 60 * 60; // 1 hour
export const JWT_ALGORITHM = 'HS256';
export const BCRYPT_DEFAULT_ROUNDS = 12;
export const BCRYPT_MIN_ROUNDS = 4;
export const BCRYPT_MAX_ROUNDS = 31;

export const USERNAME_MAX_LENGTH = 50;
export const FULL_NAME_MAX_LENGTH = 100;
export const EMAIL_MAX_LENGTH = 255;
export const PASSWORD_MIN_LENGTH = 6;
export const ROLE_NAME_MAX_LENGTH = 50;
export const PERMISSION_NAME_MAX_LENGTH = 100;

export const MIGRATIONS_TABLE = 'gatehouse_migrations';

export const DEFAULT_EXCLUDED_PATHS = [
  '/api/auth/login',
  '/api/auth/register',
  '/swagger',
  '/swagger/v1/swagger.json',
  '/swagger/index.html',
  '/_framework',
  '/_vs',
  '/health',
] as const;
