import Fastify, { type FastifyError, type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import {
  createLogger,
  APP_NAME,
  APP_VERSION,
} from '@gatehouse/shared';
import {
  createJWTAuth,
  createRequestGate,
  ExcludedPaths,
  type JWTAuth,
  type RequestGate,
} from '@gatehouse/security';
import type { AppConfig } from '../config.js';
import { AuthService } from '../auth/auth-service.js';
import type { UserStore } from '../database/user-store.js';
import type { RoleStore } from '../database/role-store.js';
import { registerRequestGate } from './request-gate-hook.js';
import { registerAuthRoutes } from './auth-routes.js';
import { registerUserRoutes } from './user-routes.js';
import { registerSwaggerRoutes } from './swagger-routes.js';

const logger = createLogger('Core:Gateway');

export interface GatewayOptions {
  config: AppConfig;
  users: UserStore;
  roles: RoleStore;
  /** Clock used for token issuance and expiry checks. */
  now?: () => number;
}

export class Gateway {
  private app: FastifyInstance;
  private startedAt: number = 0;
  private initialized = false;
  private readonly config: AppConfig;

  public readonly auth: JWTAuth;
  public readonly gate: RequestGate;
  public readonly authService: AuthService;
  private readonly roles: RoleStore;

  constructor(options: GatewayOptions) {
    this.config = options.config;
    this.roles = options.roles;

    this.app = Fastify({
      logger: false,
      trustProxy: false,
    });

    this.auth = createJWTAuth({
      ...options.config.jwt,
      bcryptRounds: options.config.bcryptRounds,
      now: options.now,
    });
    this.gate = createRequestGate({
      excludedPaths: new ExcludedPaths(options.config.excludedPaths),
      signingKey: options.config.jwt.key,
      issuer: options.config.jwt.issuer,
      audience: options.config.jwt.audience,
      now: options.now,
    });
    this.authService = new AuthService({
      users: options.users,
      roles: options.roles,
      auth: this.auth,
    });
  }

  /** Registers plugins, the request gate and all routes. Safe to call more than once. */
  async initialize(): Promise<FastifyInstance> {
    if (this.initialized) return this.app;
    this.initialized = true;

    if (this.config.corsOrigins.length > 0) {
      await this.app.register(cors, {
        origin: this.config.corsOrigins,
        methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization'],
      });
      logger.info('CORS enabled', { origins: this.config.corsOrigins });
    }

    registerRequestGate(this.app, this.gate);
    this.registerErrorHandlers();
    this.registerHealthRoutes();
    registerAuthRoutes(this.app, { authService: this.authService });
    registerUserRoutes(this.app, { authService: this.authService, roles: this.roles });

    if (this.config.swaggerEnabled) {
      registerSwaggerRoutes(this.app);
    }

    await this.app.ready();
    logger.info('Gateway initialized', { excludedPaths: this.config.excludedPaths.length });
    return this.app;
  }

  private registerErrorHandlers(): void {
    this.app.setNotFoundHandler(async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(404).send({ error: 'Not found' });
    });

    this.app.setErrorHandler(async (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
      const status = error.statusCode ?? 500;
      if (status < 500) {
        return reply.status(status).send({ error: error.message });
      }
      logger.error('Unhandled request error', error, { method: request.method, url: request.url });
      return reply.status(500).send({ error: 'Internal server error' });
    });
  }

  private registerHealthRoutes(): void {
    this.app.get('/health', async () => ({
      status: 'healthy',
      uptime: this.startedAt > 0 ? Date.now() - this.startedAt : 0,
      version: APP_VERSION,
    }));
  }

  getApp(): FastifyInstance {
    return this.app;
  }

  async start(): Promise<string> {
    await this.initialize();
    this.startedAt = Date.now();

    const address = await this.app.listen({ host: this.config.host, port: this.config.port });
    logger.info(`${APP_NAME} Gateway running at ${address}`);
    if (this.config.swaggerEnabled) {
      logger.info(`API docs at ${address}/swagger`);
    }
    return address;
  }

  async stop(): Promise<void> {
    logger.info('Shutting down Gateway...');
    await this.app.close();
    logger.info('Gateway stopped');
  }
}

export function createGateway(options: GatewayOptions): Gateway {
  return new Gateway(options);
}
