import type { FastifyInstance } from 'fastify';
import type { Container } from '../../infra/container.js';
import { formatAddress } from '../../modules/address/address.js';
import { historyQuerySchema, toHistoryResponse } from '../schemas.js';

export async function historyRoutes(app: FastifyInstance, container: Container): Promise<void> {
  app.get('/history', async (request, reply) => {
    const query = historyQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send({
        error: 'Validation failed',
        details: query.error.format(),
      });
    }

    let token: string | undefined;
    if (query.data.token !== undefined) {
      const tokenKey = formatAddress(query.data.token, container.config.scaling.addressEncoding);
      if (!tokenKey.ok) {
        return reply.status(400).send({ error: tokenKey.error.message });
      }
      token = tokenKey.value;
    }

    const records = await container.store.listHistory({ token, limit: query.data.limit });
    return reply.send(records.map(toHistoryResponse));
  });
}
