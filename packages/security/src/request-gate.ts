import jwt, { type Jwt } from 'jsonwebtoken';
import { ok, err, type Result } from 'neverthrow';
import { createLogger, isNonEmptyString, isPlainObject, truncate, JWT_ALGORITHM } from '@gatehouse/shared';
import type { DecodedToken, Principal, RequestIdentity, TokenClaims } from '@gatehouse/shared';
import { ExcludedPaths } from './excluded-paths.js';
import { GateError } from './gate-errors.js';

const logger = createLogger('Security:RequestGate');

const BEARER_PREFIX = 'bearer ';

export interface GateOptions {
  excludedPaths: ExcludedPaths;
  signingKey?: string;
  issuer?: string;
  audience?: string;
  now?: () => number;
}

export interface GateRequest {
  path: string;
  authorization: string | undefined;
}

export type GateOutcome =
  | { kind: 'bypass' }
  | { kind: 'authenticated'; identity: RequestIdentity };

export interface TokenValidationSettings {
  signingKey: string;
  issuer: string;
  audience: string;
}

const SIGNATURE_FAILURES = new Set(['invalid signature', 'jwt signature is required']);

/**
 * Strips an optional case-insensitive `Bearer ` scheme. Values without the
 * scheme are taken as the raw token.
 */
export function extractToken(header: string): Result<string, GateError> {
  if (header.length === 0) {
    return err(new GateError('EmptyToken', { message: 'Authorization header is empty' }));
  }

  const value = header.trimStart();
  const hasScheme = value.slice(0, BEARER_PREFIX.length).toLowerCase() === BEARER_PREFIX;
  const token = hasScheme ? value.slice(BEARER_PREFIX.length).trim() : value.trim();

  if (!hasScheme) {
    logger.debug('Authorization header has no Bearer scheme, using raw value as token');
  }

  if (token.length === 0) {
    return err(new GateError('EmptyToken'));
  }
  return ok(token);
}

/** Splits and decodes the token without checking its signature. */
export function decodeToken(token: string): Result<DecodedToken, GateError> {
  const segments = token.split('.');
  if (segments.length !== 3) {
    logger.debug('Token has wrong segment count', { segments: segments.length });
    return err(new GateError('MalformedToken'));
  }

  let decoded: Jwt | null;
  try {
    decoded = jwt.decode(token, { complete: true });
  } catch (error) {
    // A `typ: JWT` header makes the decoder JSON-parse the payload
    logger.debug('Token payload is not JSON', { error: error instanceof Error ? error.message : String(error) });
    decoded = null;
  }
  if (!decoded || !isPlainObject(decoded.payload)) {
    return err(new GateError('MalformedToken', { message: 'Invalid JWT token format' }));
  }

  return ok({
    header: {
      alg: decoded.header.alg,
      typ: decoded.header.typ,
      kid: decoded.header.kid,
    },
    payload: decoded.payload,
    signature: decoded.signature,
  });
}

function audienceMatches(aud: TokenClaims['aud'], expected: string): boolean {
  if (Array.isArray(aud)) return aud.includes(expected);
  return aud === expected;
}

function checkClaims(
  claims: TokenClaims,
  settings: TokenValidationSettings,
  nowMs: number,
): Result<TokenClaims, GateError> {
  if (claims.iss !== settings.issuer) {
    return err(new GateError('InvalidIssuer'));
  }

  if (!audienceMatches(claims.aud, settings.audience)) {
    return err(new GateError('InvalidAudience'));
  }

  if (claims.exp === undefined) {
    return err(new GateError('InvalidToken', { detail: 'jwt expiration is required' }));
  }
  if (typeof claims.exp !== 'number') {
    return err(new GateError('InvalidToken', { detail: 'invalid exp value' }));
  }
  // No clock skew: a token valid until T is already expired at T.
  if (nowMs >= claims.exp * 1000) {
    return err(new GateError('TokenExpired'));
  }

  if (claims.nbf !== undefined) {
    if (typeof claims.nbf !== 'number') {
      return err(new GateError('InvalidToken', { detail: 'invalid nbf value' }));
    }
    if (nowMs < claims.nbf * 1000) {
      return err(new GateError('InvalidToken', { detail: 'jwt not active' }));
    }
  }

  return ok(claims);
}

function verifySignature(token: string, signingKey: string): Result<void, GateError> {
  try {
    // Claims are checked separately so each failure maps to its own kind.
    jwt.verify(token, signingKey, {
      algorithms: [JWT_ALGORITHM],
      ignoreExpiration: true,
      ignoreNotBefore: true,
    });
    return ok(undefined);
  } catch (error) {
    if (error instanceof jwt.JsonWebTokenError) {
      if (SIGNATURE_FAILURES.has(error.message)) {
        return err(new GateError('InvalidSignature'));
      }
      return err(new GateError('InvalidToken', { detail: error.message }));
    }
    const detail = error instanceof Error ? error.message : String(error);
    return err(new GateError('ValidationFailed', { detail }));
  }
}

function claimAsString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function buildIdentity(decoded: DecodedToken): RequestIdentity {
  const claims = Object.freeze({ ...decoded.payload });
  const userId = claimAsString(claims.nameid);
  const username = claimAsString(claims.sub);

  const principal: Principal = Object.freeze({
    name: claimAsString(claims.unique_name) ?? username,
    nameIdentifier: userId,
    claims,
  });

  return Object.freeze({
    userId,
    username,
    principal,
    token: Object.freeze({ ...decoded, payload: claims }),
  });
}

/**
 * Structural then semantic validation of a token. Semantic checks run in a
 * fixed order: signature, issuer, audience, expiry, then anything else.
 */
export function validateToken(
  token: string,
  settings: TokenValidationSettings,
  nowMs: number,
): Result<RequestIdentity, GateError> {
  return decodeToken(token).andThen(decoded => {
    try {
      return verifySignature(token, settings.signingKey)
        .andThen(() => checkClaims(decoded.payload, settings, nowMs))
        .map(() => buildIdentity(decoded));
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      return err(new GateError('ValidationFailed', { detail }));
    }
  });
}

/**
 * Decides per request whether a token is required and, if so, validates it.
 * Holds only immutable configuration; nothing is kept between requests.
 */
export class RequestGate {
  private readonly excludedPaths: ExcludedPaths;
  private readonly signingKey: string | undefined;
  private readonly issuer: string | undefined;
  private readonly audience: string | undefined;
  private readonly now: () => number;

  constructor(options: GateOptions) {
    this.excludedPaths = options.excludedPaths;
    this.signingKey = isNonEmptyString(options.signingKey) ? options.signingKey : undefined;
    this.issuer = isNonEmptyString(options.issuer) ? options.issuer : undefined;
    this.audience = isNonEmptyString(options.audience) ? options.audience : undefined;
    this.now = options.now ?? Date.now;

    const missing = [
      this.signingKey ? null : 'signing key',
      this.issuer ? null : 'issuer',
      this.audience ? null : 'audience',
    ].filter((name): name is string => name !== null);
    if (missing.length > 0) {
      logger.error('JWT settings are incomplete; gated requests will fail with 500', { missing });
    }
  }

  isExcluded(path: string): boolean {
    return this.excludedPaths.matches(path);
  }

  inspect(request: GateRequest): Result<GateOutcome, GateError> {
    if (this.excludedPaths.matches(request.path)) {
      logger.debug('Path excluded from token validation', { path: request.path });
      const bypass: GateOutcome = { kind: 'bypass' };
      return ok(bypass);
    }

    const result = this.authenticateSafely(request.authorization);

    if (result.isErr()) {
      const rejection = result.error;
      const data = { kind: rejection.kind, path: request.path, detail: rejection.detail };
      if (rejection.status === 500) {
        logger.error('Request rejected', data);
      } else {
        logger.warn('Request rejected', data);
      }
    } else {
      logger.debug('Token validated', { path: request.path, userId: result.value.userId });
    }

    return result.map((identity): GateOutcome => ({ kind: 'authenticated', identity }));
  }

  private authenticateSafely(authorization: string | undefined): Result<RequestIdentity, GateError> {
    try {
      return this.authenticate(authorization);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      return err(new GateError('ValidationFailed', { detail }));
    }
  }

  private authenticate(authorization: string | undefined): Result<RequestIdentity, GateError> {
    const { signingKey, issuer, audience } = this;
    if (!signingKey || !issuer || !audience) {
      return err(new GateError('ServerMisconfigured'));
    }

    if (authorization === undefined) {
      return err(new GateError('MissingAuthHeader'));
    }

    return extractToken(authorization).andThen(token => {
      logger.debug('Validating token', { preview: truncate(token, 20) });
      return validateToken(
        token,
        { signingKey, issuer, audience },
        this.now(),
      );
    });
  }
}

export function createRequestGate(options: GateOptions): RequestGate {
  return new RequestGate(options);
}
