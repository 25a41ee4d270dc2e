import type { GateErrorKind } from '@gatehouse/shared';

export type GateErrorStatus = 401 | 500;

const GATE_ERROR_MESSAGES: Record<GateErrorKind, string> = {
  MissingAuthHeader: 'Authorization header is required',
  EmptyToken: 'JWT token is empty',
  MalformedToken: 'JWT token is malformed. Token must be in format: header.payload.signature',
  InvalidSignature: 'Invalid JWT token signature',
  InvalidIssuer: 'Invalid JWT token issuer',
  InvalidAudience: 'Invalid JWT token audience',
  TokenExpired: 'JWT token has expired',
  InvalidToken: 'Invalid JWT token',
  ValidationFailed: 'Token validation failed',
  ServerMisconfigured: 'JWT configuration is missing',
};

function buildMessage(kind: GateErrorKind, detail?: string): string {
  const base = GATE_ERROR_MESSAGES[kind];
  if (detail && (kind === 'InvalidToken' || kind === 'ValidationFailed')) {
    return `${base}: ${detail}`;
  }
  return base;
}

export interface GateErrorBody {
  error: string;
  kind: GateErrorKind;
}

/** Rejection produced by the request gate. Carries the HTTP status to answer with. */
export class GateError extends Error {
  public readonly kind: GateErrorKind;
  public readonly status: GateErrorStatus;
  public readonly detail: string | undefined;

  constructor(kind: GateErrorKind, options: { detail?: string; message?: string } = {}) {
    super(options.message ?? buildMessage(kind, options.detail));
    this.name = 'GateError';
    this.kind = kind;
    this.status = kind === 'ServerMisconfigured' ? 500 : 401;
    this.detail = options.detail;
  }

  toBody(): GateErrorBody {
    return { error: this.message, kind: this.kind };
  }
}
