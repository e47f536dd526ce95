import type { FastifyInstance } from 'fastify';

import { searchParts } from '../../../shared/transfers/labels.js';
import type { ReferenceData } from '../../../shared/transfers/types.js';

export interface ReferenceRoutesOptions {
  reference: ReferenceData;
}

type PartsQuerystring = {
  q?: string;
  limit?: string;
};

export default async function referenceRoutes(server: FastifyInstance, options: ReferenceRoutesOptions) {
  const { reference } = options;

  server.get('/locations', async (_request, reply) =>
    reply.send({ items: [...reference.locations], count: reference.locations.length }),
  );

  server.get<{ Querystring: PartsQuerystring }>('/parts', async (request, reply) => {
    const limit = request.query.limit ? Number.parseInt(request.query.limit, 10) : undefined;
    const items = searchParts(reference.parts, request.query.q, limit);
    return reply.send({ items: items.map((item) => ({ ...item })), count: items.length });
  });
}
