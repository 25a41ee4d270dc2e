export type GateErrorKind =
  | 'MissingAuthHeader'
  | 'EmptyToken'
  | 'MalformedToken'
  | 'InvalidSignature'
  | 'InvalidIssuer'
  | 'InvalidAudience'
  | 'TokenExpired'
  | 'InvalidToken'
  | 'ValidationFailed'
  | 'ServerMisconfigured';

export interface JwtSettings {
  key?: string;
  issuer?: string;
  audience?: string;
  expiresInSeconds?: number;
}

/**
 * Claims carried by tokens this API issues. Short claim names follow the
 * JWT conventions used by most identity stacks (`nameid`, `unique_name`).
 */
export interface TokenClaims {
  unique_name?: string;
  nameid?: string;
  sub?: string;
  jti?: string;
  iss?: string;
  aud?: string | string[];
  exp?: number;
  iat?: number;
  nbf?: number;
  [claim: string]: unknown;
}

export interface DecodedToken {
  header: { alg: string; typ?: string; kid?: string };
  payload: TokenClaims;
  signature: string;
}

export interface Principal {
  name?: string;
  nameIdentifier?: string;
  claims: Readonly<TokenClaims>;
}

export interface RequestIdentity {
  userId?: string;
  username?: string;
  principal: Principal;
  token: DecodedToken;
}
