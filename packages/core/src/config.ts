import {
  isLogLevel,
  BCRYPT_DEFAULT_ROUNDS,
  BCRYPT_MAX_ROUNDS,
  BCRYPT_MIN_ROUNDS,
  DEFAULT_EXCLUDED_PATHS,
  DEFAULT_GATEWAY_HOST,
  DEFAULT_GATEWAY_PORT,
  JWT_DEFAULT_EXPIRES_IN_SECONDS,
  type LogLevel,
} from '@gatehouse/shared';

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}

export interface JwtConfig {
  key: string | undefined;
  issuer: string | undefined;
  audience: string | undefined;
  expiresInSeconds: number;
}

export interface AppConfig {
  host: string;
  port: number;
  corsOrigins: string[];
  swaggerEnabled: boolean;
  logLevel: LogLevel;
  excludedPaths: string[];
  bcryptRounds: number;
  jwt: JwtConfig;
  database: DatabaseConfig;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readInt(env: Env, name: string, fallback: number): number {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  return Number.isInteger(parsed) ? parsed : fallback;
}

function readIntInRange(env: Env, name: string, fallback: number, min: number, max: number): number {
  const value = readInt(env, name, fallback);
  return value >= min && value <= max ? value : fallback;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = readString(env, name)?.toLowerCase();
  if (raw === undefined) return fallback;
  return raw === 'true' || raw === '1' || raw === 'yes';
}

function readList(env: Env, name: string): string[] {
  const raw = readString(env, name);
  if (!raw) return [];
  return raw.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

/**
 * Builds the application configuration from environment variables.
 * Values are read once; the result is treated as immutable.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const logLevel = readString(env, 'LOG_LEVEL');

  return {
    host: readString(env, 'GATEWAY_HOST') ?? DEFAULT_GATEWAY_HOST,
    port: readInt(env, 'GATEWAY_PORT', DEFAULT_GATEWAY_PORT),
    corsOrigins: readList(env, 'CORS_ORIGINS'),
    swaggerEnabled: readBoolean(env, 'SWAGGER_ENABLED', true),
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
    excludedPaths: [...DEFAULT_EXCLUDED_PATHS, ...readList(env, 'AUTH_EXCLUDED_PATHS')],
    bcryptRounds: readIntInRange(env, 'BCRYPT_ROUNDS', BCRYPT_DEFAULT_ROUNDS, BCRYPT_MIN_ROUNDS, BCRYPT_MAX_ROUNDS),
    jwt: {
      key: readString(env, 'JWT_KEY'),
      issuer: readString(env, 'JWT_ISSUER'),
      audience: readString(env, 'JWT_AUDIENCE'),
      expiresInSeconds: readIntInRange(env, 'JWT_EXPIRES_IN_SECONDS', JWT_DEFAULT_EXPIRES_IN_SECONDS, 1, Number.MAX_SAFE_INTEGER),
    },
    database: {
      host: readString(env, 'MYSQL_HOST') ?? '127.0.0.1',
      port: readInt(env, 'MYSQL_PORT', 3306),
      user: readString(env, 'MYSQL_USER') ?? 'root',
      password: env['MYSQL_PASSWORD'] ?? '',
      database: readString(env, 'MYSQL_DATABASE') ?? 'gatehouse',
    },
  };
}
