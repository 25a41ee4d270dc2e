export { JWTAuth, AuthError, createJWTAuth } from './jwt-auth.js';
export type { JWTAuthOptions, TokenSubject, IssuedToken } from './jwt-auth.js';
export { ExcludedPaths } from './excluded-paths.js';
export { GateError } from './gate-errors.js';
export type { GateErrorBody, GateErrorStatus } from './gate-errors.js';
export {
  RequestGate,
  createRequestGate,
  extractToken,
  decodeToken,
  validateToken,
} from './request-gate.js';
export type { GateOptions, GateRequest, GateOutcome, TokenValidationSettings } from './request-gate.js';
