import type { FastifyInstance } from 'fastify';
import { APP_NAME } from '@gatehouse/shared';
import { createOpenAPISpec } from './openapi.js';

export const SWAGGER_JSON_PATH = '/swagger/v1/swagger.json';

export function renderSwaggerUi(specUrl: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <title>${APP_NAME} API</title>
  <link rel="stylesheet" href="https://unpkg.com/swagger-ui-dist@5/swagger-ui.css" />
</head>
<body>
  <div id="swagger-ui"></div>
  <script src="https://unpkg.com/swagger-ui-dist@5/swagger-ui-bundle.js"></script>
  <script>
    window.ui = SwaggerUIBundle({ url: '${specUrl}', dom_id: '#swagger-ui' });
  </script>
</body>
</html>`;
}

export function registerSwaggerRoutes(app: FastifyInstance): void {
  const spec = createOpenAPISpec();
  const page = renderSwaggerUi(SWAGGER_JSON_PATH);

  app.get(SWAGGER_JSON_PATH, async () => spec);

  for (const path of ['/swagger', '/swagger/', '/swagger/index.html']) {
    app.get(path, async (_request, reply) => {
      reply.type('text/html; charset=utf-8');
      return page;
    });
  }
}
