import { randomBytes, randomUUID } from 'node:crypto';

/** Fresh identifier for a token's `jti` claim. */
export function generateTokenId(): string {
  return randomUUID();
}

export function generateSecret(length: number = 64): string {
  return randomBytes(length).toString('base64url');
}
