import type { FastifyInstance } from 'fastify';
import type { Container } from '../../infra/container.js';
import { formatAddress } from '../../modules/address/address.js';
import { toPositionResponse, tokenParamsSchema } from '../schemas.js';

export async function positionRoutes(app: FastifyInstance, container: Container): Promise<void> {
  const { store, config } = container;

  app.get('/positions', async (_request, reply) => {
    const positions = await store.listPositions();
    return reply.send(positions.map(toPositionResponse));
  });

  app.get('/positions/:token', async (request, reply) => {
    const params = tokenParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({
        error: 'Validation failed',
        details: params.error.format(),
      });
    }

    const tokenKey = formatAddress(params.data.token, config.scaling.addressEncoding);
    if (!tokenKey.ok) {
      return reply.status(400).send({ error: tokenKey.error.message });
    }

    const position = await store.getPosition(tokenKey.value);
    if (!position) {
      return reply.status(404).send({ error: 'No open position for token' });
    }

    return reply.send(toPositionResponse(position));
  });
}
