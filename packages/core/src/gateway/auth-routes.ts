import type { FastifyInstance, FastifyReply } from 'fastify';
import type { AuthResponse } from '@gatehouse/shared';
import type { AuthService, AuthServiceError } from '../auth/auth-service.js';
import { validateLoginRequest, validateRegisterRequest, type RequestValidationError } from '../auth/request-validation.js';

export interface AuthRouteDeps {
  authService: AuthService;
}

export function sendValidationError(reply: FastifyReply, error: RequestValidationError): FastifyReply {
  return reply.status(400).send({ error: error.message, details: error.details });
}

export function sendServiceError(reply: FastifyReply, error: AuthServiceError): FastifyReply {
  switch (error.kind) {
    case 'Conflict':
      return reply.status(400).send({ error: error.message, kind: error.kind });
    case 'Unauthorized':
      return reply.status(401).send({ error: error.message, kind: error.kind });
    case 'NotFound':
      return reply.status(404).send({ error: error.message, kind: error.kind });
    case 'ServerMisconfigured':
      return reply.status(500).send({ error: error.message, kind: error.kind });
  }
}

export function registerAuthRoutes(app: FastifyInstance, deps: AuthRouteDeps): void {
  const { authService } = deps;

  app.post<{ Body: unknown }>('/api/auth/register', async (request, reply) => {
    const validated = validateRegisterRequest(request.body);
    if (validated.isErr()) return sendValidationError(reply, validated.error);

    const result = await authService.register(validated.value);
    if (result.isErr()) return sendServiceError(reply, result.error);

    return { message: 'User registered successfully.' };
  });

  app.post<{ Body: unknown }>('/api/auth/login', async (request, reply) => {
    const validated = validateLoginRequest(request.body);
    if (validated.isErr()) return sendValidationError(reply, validated.error);

    const result = await authService.login(validated.value);
    if (result.isErr()) return sendServiceError(reply, result.error);

    const body: AuthResponse = {
      token: result.value.token,
      username: result.value.username,
      email: result.value.email,
    };
    return body;
  });
}
