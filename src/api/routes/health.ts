import type { FastifyInstance } from 'fastify';
import type { Container } from '../../infra/container.js';
import type { Runner } from '../../modules/runner/runner.service.js';

export async function healthRoutes(
  app: FastifyInstance,
  container: Container,
  runner: Pick<Runner, 'getStatus'>,
): Promise<void> {
  app.get('/health', async (_request, reply) => {
    const status = runner.getStatus();
    try {
      await container.store.ping();

      return reply.send({
        status: status.consecutiveFailures > 0 ? 'degraded' : 'healthy',
        timestamp: new Date().toISOString(),
        contract: container.config.contractAddress,
        checks: { database: 'ok' },
        runner: status,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Unknown error';
      container.logger.error({ err }, 'Health check failed');
      return reply.status(503).send({
        status: 'unhealthy',
        timestamp: new Date().toISOString(),
        error: message,
        runner: status,
      });
    }
  });
}
