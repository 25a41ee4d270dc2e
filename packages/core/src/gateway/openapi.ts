import { APP_NAME, APP_VERSION, APP_DESCRIPTION } from '@gatehouse/shared';

export interface OpenAPISpec {
  readonly openapi: string;
  readonly info: {
    readonly title: string;
    readonly version: string;
    readonly description: string;
  };
  readonly paths: Record<string, unknown>;
  readonly components: Record<string, unknown>;
  readonly security: ReadonlyArray<Record<string, string[]>>;
}

const errorResponse = (description: string) => ({
  description,
  content: {
    'application/json': {
      schema: { $ref: '#/components/schemas/Error' },
    },
  },
});

const gatedResponses = {
  '401': errorResponse('Missing, malformed, expired or otherwise invalid token'),
  '500': errorResponse('Server signing key is not configured'),
};

export function createOpenAPISpec(): OpenAPISpec {
  return {
    openapi: '3.0.3',
    info: {
      title: `${APP_NAME} API`,
      version: APP_VERSION,
      description: `${APP_DESCRIPTION}. Every route except login, register, health and the documentation requires a bearer token.`,
    },
    security: [{ bearerAuth: [] }],
    paths: {
      '/api/auth/register': {
        post: {
          summary: 'Register a new user',
          operationId: 'register',
          tags: ['Auth'],
          security: [],
          requestBody: {
            required: true,
            content: {
              'application/json': {
                schema: { $ref: '#/components/schemas/RegisterRequest' },
              },
            },
          },
          responses: {
            '200': {
              description: 'User registered',
              content: {
                'application/json': {
                  schema: {
                    type: 'object',
                    properties: { message: { type: 'string' } },
                  },
                },
              },
            },
            '400': errorResponse('Validation failed or user already exists'),
          },
        },
      },
      '/api/auth/login': {
        post: {
          summary: 'Log in with username or email',
          operationId: 'login',
          tags: ['Auth'],
          security: [],
          requestBody: {
            required: true,
            content: {
              'application/json': {
                schema: { $ref: '#/components/schemas/LoginRequest' },
              },
            },
          },
          responses: {
            '200': {
              description: 'Signed token and basic user info',
              content: {
                'application/json': {
                  schema: { $ref: '#/components/schemas/AuthResponse' },
                },
              },
            },
            '400': errorResponse('Validation failed'),
            '401': errorResponse('Invalid credentials'),
          },
        },
      },
      '/api/users/me': {
        get: {
          summary: 'Profile of the authenticated user',
          operationId: 'getCurrentUser',
          tags: ['Users'],
          responses: {
            '200': {
              description: 'User profile with role and permissions',
              content: {
                'application/json': {
                  schema: { $ref: '#/components/schemas/UserProfile' },
                },
              },
            },
            '404': errorResponse('The token refers to a user that no longer exists'),
            ...gatedResponses,
          },
        },
      },
      '/api/roles': {
        get: {
          summary: 'List roles with their permissions',
          operationId: 'listRoles',
          tags: ['Roles'],
          responses: {
            '200': {
              description: 'Roles',
              content: {
                'application/json': {
                  schema: {
                    type: 'object',
                    properties: {
                      roles: { type: 'array', items: { $ref: '#/components/schemas/Role' } },
                    },
                  },
                },
              },
            },
            ...gatedResponses,
          },
        },
      },
      '/health': {
        get: {
          summary: 'Liveness probe',
          operationId: 'health',
          tags: ['System'],
          security: [],
          responses: { '200': { description: 'Service is up' } },
        },
      },
    },
    components: {
      securitySchemes: {
        bearerAuth: {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
          description: 'JWT from /api/auth/login. Paste the token only; the Bearer prefix is added for you.',
        },
      },
      schemas: {
        Error: {
          type: 'object',
          required: ['error'],
          properties: {
            error: { type: 'string' },
            kind: { type: 'string' },
            details: { type: 'array', items: { type: 'string' } },
          },
        },
        RegisterRequest: {
          type: 'object',
          required: ['username', 'fullName', 'email', 'password'],
          properties: {
            username: { type: 'string', maxLength: 50 },
            fullName: { type: 'string', maxLength: 100 },
            email: { type: 'string', format: 'email' },
            password: { type: 'string', minLength: 6 },
          },
        },
        LoginRequest: {
          type: 'object',
          required: ['usernameOrEmail', 'password'],
          properties: {
            usernameOrEmail: { type: 'string' },
            password: { type: 'string' },
          },
        },
        AuthResponse: {
          type: 'object',
          properties: {
            token: { type: 'string' },
            username: { type: 'string' },
            email: { type: 'string' },
          },
        },
        UserProfile: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            fullName: { type: 'string' },
            username: { type: 'string' },
            email: { type: 'string' },
            roleId: { type: 'integer' },
            isActive: { type: 'boolean' },
            createdAt: { type: 'string', format: 'date-time' },
            role: { type: 'string', nullable: true },
            permissions: { type: 'array', items: { type: 'string' } },
          },
        },
        Role: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            name: { type: 'string' },
            description: { type: 'string', nullable: true },
            createdAt: { type: 'string', format: 'date-time' },
            permissions: {
              type: 'array',
              items: {
                type: 'object',
                properties: {
                  id: { type: 'integer' },
                  name: { type: 'string' },
                  description: { type: 'string', nullable: true },
                },
              },
            },
          },
        },
      },
    },
  };
}
