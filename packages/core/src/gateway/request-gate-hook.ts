import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { RequestIdentity } from '@gatehouse/shared';
import type { RequestGate } from '@gatehouse/security';

declare module 'fastify' {
  interface FastifyRequest {
    /** Set by the request gate for authenticated requests; null on excluded paths. */
    identity: RequestIdentity | null;
  }
}

export function requestPath(url: string): string {
  const queryStart = url.indexOf('?');
  return queryStart === -1 ? url : url.slice(0, queryStart);
}

/** Runs the gate on every request before routing. */
export function registerRequestGate(app: FastifyInstance, gate: RequestGate): void {
  app.decorateRequest('identity', null);

  app.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
    const result = gate.inspect({
      path: requestPath(request.url),
      authorization: request.headers.authorization,
    });

    if (result.isErr()) {
      const rejection = result.error;
      return reply.status(rejection.status).send(rejection.toBody());
    }

    if (result.value.kind === 'authenticated') {
      request.identity = result.value.identity;
    }
  });
}
