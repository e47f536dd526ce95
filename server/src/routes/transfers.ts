import type { FastifyInstance } from 'fastify';

import { readRecentTransfers } from '../stores/transferLogStore.js';
import { RECENT_TRANSFERS_LIMIT } from '../../../shared/transfers/types.js';

export interface TransfersRoutesOptions {
  transfersFile: string;
}

const MAX_RECENT_LIMIT = 100;

export default async function transfersRoutes(server: FastifyInstance, options: TransfersRoutesOptions) {
  server.get<{ Querystring: { limit?: string } }>('/recent', async (request, reply) => {
    const limit = request.query.limit ? Number.parseInt(request.query.limit, 10) : RECENT_TRANSFERS_LIMIT;
    const safeLimit = Number.isFinite(limit) && limit > 0 ? Math.min(limit, MAX_RECENT_LIMIT) : RECENT_TRANSFERS_LIMIT;

    const { items, total } = readRecentTransfers(options.transfersFile, safeLimit);
    return reply.send({ items, count: items.length, total });
  });
}
