import Fastify, { type FastifyInstance } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import type { Container } from '../infra/container.js';
import type { Runner } from '../modules/runner/runner.service.js';
import { healthRoutes } from './routes/health.js';
import { positionRoutes } from './routes/positions.js';
import { historyRoutes } from './routes/history.js';

export interface ServerDeps {
  container: Container;
  runner: Pick<Runner, 'getStatus'>;
}

export async function createServer(deps: ServerDeps): Promise<FastifyInstance> {
  const { container, runner } = deps;
  const logger = container.logger.child({ module: 'api' });

  const app = Fastify({
    logger: false, // requests are logged through the hooks below
    requestTimeout: 30_000,
  });

  await app.register(rateLimit, {
    max: 100,
    timeWindow: '1 minute',
  });

  app.addHook('onRequest', async (request) => {
    logger.debug({ method: request.method, url: request.url }, 'Incoming request');
  });

  app.addHook('onResponse', async (request, reply) => {
    logger.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed',
    );
  });

  app.setErrorHandler((error: Error & { statusCode?: number }, _request, reply) => {
    logger.error({ err: error }, 'Unhandled route error');
    const statusCode = error.statusCode ?? 500;
    return reply.status(statusCode).send({
      error: error.message,
      statusCode,
    });
  });

  await healthRoutes(app, container, runner);
  await positionRoutes(app, container);
  await historyRoutes(app, container);

  return app;
}
