import { type FastifyInstance } from 'fastify';

import type { ReferenceData } from '../../../shared/transfers/types.js';

export default async function healthRoutes(fastify: FastifyInstance, options: { reference: ReferenceData }) {
  fastify.get('/', async () => ({
    status: 'ok',
    locations: options.reference.locations.length,
    parts: options.reference.parts.length,
  }));
}
