import type { FastifyInstance } from 'fastify';
import type { RoleWithPermissions } from '@gatehouse/shared';
import type { AuthService } from '../auth/auth-service.js';
import type { RoleStore } from '../database/role-store.js';
import { sendServiceError } from './auth-routes.js';

export interface UserRouteDeps {
  authService: AuthService;
  roles: RoleStore;
}

export function registerUserRoutes(app: FastifyInstance, deps: UserRouteDeps): void {
  const { authService, roles } = deps;

  app.get('/api/users/me', async (request, reply) => {
    const userId = Number(request.identity?.userId);
    if (!Number.isInteger(userId)) {
      return reply.status(401).send({ error: 'Token does not identify a user' });
    }

    const result = await authService.getProfile(userId);
    if (result.isErr()) return sendServiceError(reply, result.error);
    return result.value;
  });

  app.get('/api/roles', async () => {
    const [allRoles, permissions] = await Promise.all([roles.listRoles(), roles.listPermissions()]);

    const result: RoleWithPermissions[] = allRoles.map(role => ({
      ...role,
      permissions: permissions.filter(p => p.roleId === role.id),
    }));
    return { roles: result };
  });
}
