import jwt, { type SignOptions } from 'jsonwebtoken';
import bcrypt from 'bcryptjs';
import {
  createLogger,
  generateTokenId,
  isNonEmptyString,
  BCRYPT_DEFAULT_ROUNDS,
  JWT_ALGORITHM,
  JWT_DEFAULT_EXPIRES_IN_SECONDS,
} from '@gatehouse/shared';
import type { JwtSettings, TokenClaims } from '@gatehouse/shared';

const logger = createLogger('Security:JWTAuth');

export interface JWTAuthOptions extends JwtSettings {
  bcryptRounds?: number;
  now?: () => number;
}

export interface TokenSubject {
  id: number | string;
  username: string;
}

export interface IssuedToken {
  token: string;
  jti: string;
  issuedAt: Date;
  expiresAt: Date;
}

export class JWTAuth {
  private readonly key: string | undefined;
  private readonly issuer: string | undefined;
  private readonly audience: string | undefined;
  private readonly expiresIn: number;
  private readonly bcryptRounds: number;
  private readonly now: () => number;

  constructor(options: JWTAuthOptions) {
    this.key = isNonEmptyString(options.key) ? options.key : undefined;
    this.issuer = isNonEmptyString(options.issuer) ? options.issuer : undefined;
    this.audience = isNonEmptyString(options.audience) ? options.audience : undefined;
    this.expiresIn = options.expiresInSeconds ?? JWT_DEFAULT_EXPIRES_IN_SECONDS;
    this.bcryptRounds = options.bcryptRounds ?? BCRYPT_DEFAULT_ROUNDS;
    this.now = options.now ?? Date.now;

    if (!this.isConfigured()) {
      logger.warn('JWT key, issuer or audience is not configured; tokens cannot be issued');
    } else {
      logger.info('JWT auth initialized', { expiresIn: this.expiresIn });
    }
  }

  /** True when key, issuer and audience are all set. */
  isConfigured(): boolean {
    return this.key !== undefined && this.issuer !== undefined && this.audience !== undefined;
  }

  /**
   * Signs a fresh token for the user. Every call generates a new `jti`.
   * Throws {@link AuthError} when key, issuer or audience is missing.
   */
  issueToken(subject: TokenSubject): IssuedToken {
    const { key, issuer, audience } = this;
    if (!key || !issuer || !audience) {
      throw new AuthError('JWT configuration is missing', 'SERVER_MISCONFIGURED');
    }

    const jti = generateTokenId();
    const iat = Math.floor(this.now() / 1000);
    const exp = iat + this.expiresIn;

    const claims: TokenClaims = {
      unique_name: subject.username,
      nameid: String(subject.id),
      sub: subject.username,
      jti,
      iat,
      exp,
    };

    const signOptions: SignOptions = { algorithm: JWT_ALGORITHM, issuer, audience };
    const token = jwt.sign(claims, key, signOptions);

    logger.debug('Token issued', { userId: claims.nameid, jti });

    return {
      token,
      jti,
      issuedAt: new Date(iat * 1000),
      expiresAt: new Date(exp * 1000),
    };
  }

  async hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, this.bcryptRounds);
  }

  async verifyPassword(password: string, hash: string): Promise<boolean> {
    return bcrypt.compare(password, hash);
  }
}

export class AuthError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'AuthError';
    this.code = code;
  }
}

export function createJWTAuth(options: JWTAuthOptions): JWTAuth {
  return new JWTAuth(options);
}
