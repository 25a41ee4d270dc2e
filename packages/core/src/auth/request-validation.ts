import { ok, err, type Result } from 'neverthrow';
import {
  isNonEmptyString,
  isPlainObject,
  isValidEmail,
  EMAIL_MAX_LENGTH,
  FULL_NAME_MAX_LENGTH,
  PASSWORD_MIN_LENGTH,
  USERNAME_MAX_LENGTH,
  type LoginRequest,
  type RegisterRequest,
} from '@gatehouse/shared';

export class RequestValidationError extends Error {
  public readonly details: string[];

  constructor(details: string[]) {
    super('Validation failed');
    this.name = 'RequestValidationError';
    this.details = details;
  }
}

function requiredString(
  body: Record<string, unknown>,
  field: string,
  details: string[],
): string {
  const value = body[field];
  if (!isNonEmptyString(value)) {
    details.push(`${field} is required`);
    return '';
  }
  return value;
}

export function validateRegisterRequest(body: unknown): Result<RegisterRequest, RequestValidationError> {
  if (!isPlainObject(body)) {
    return err(new RequestValidationError(['Request body must be a JSON object']));
  }

  const details: string[] = [];
  const username = requiredString(body, 'username', details).trim();
  const fullName = requiredString(body, 'fullName', details).trim();
  const email = requiredString(body, 'email', details).trim();
  const password = requiredString(body, 'password', details);

  if (username.length > USERNAME_MAX_LENGTH) {
    details.push(`username must be at most ${USERNAME_MAX_LENGTH} characters`);
  }
  if (fullName.length > FULL_NAME_MAX_LENGTH) {
    details.push(`fullName must be at most ${FULL_NAME_MAX_LENGTH} characters`);
  }
  if (email && (!isValidEmail(email) || email.length > EMAIL_MAX_LENGTH)) {
    details.push('email must be a valid email address');
  }
  if (password && password.length < PASSWORD_MIN_LENGTH) {
    details.push(`password must be at least ${PASSWORD_MIN_LENGTH} characters`);
  }

  if (details.length > 0) {
    return err(new RequestValidationError(details));
  }
  return ok({ username, fullName, email, password });
}

export function validateLoginRequest(body: unknown): Result<LoginRequest, RequestValidationError> {
  if (!isPlainObject(body)) {
    return err(new RequestValidationError(['Request body must be a JSON object']));
  }

  const details: string[] = [];
  const usernameOrEmail = requiredString(body, 'usernameOrEmail', details).trim();
  const password = requiredString(body, 'password', details);

  if (details.length > 0) {
    return err(new RequestValidationError(details));
  }
  return ok({ usernameOrEmail, password });
}
