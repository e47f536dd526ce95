import fs from 'node:fs';
import Fastify from 'fastify';
import cors from '@fastify/cors';

import healthRoutes from './routes/health.js';
import referenceRoutes from './routes/reference.js';
import transferFormRoutes from './routes/transferForm.js';
import transfersRoutes from './routes/transfers.js';
import { readConfig, type TransferTrackerConfig } from './config.js';
import { loadReferenceData } from './stores/referenceDataStore.js';
import { createFormState } from '../../shared/transfers/formState.js';
import type { ReferenceData, TransferFormState } from '../../shared/transfers/types.js';

export interface TransferTrackerContext {
  config: TransferTrackerConfig;
  reference: ReferenceData;
  form: TransferFormState;
  clock: () => Date;
}

declare module 'fastify' {
  interface FastifyInstance {
    transferConfig: TransferTrackerConfig;
  }
}

export interface BuildServerOptions {
  config?: TransferTrackerConfig;
  logger?: boolean;
  logStream?: { write(line: string): void };
  clock?: () => Date;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const server = Fastify({
    logger:
      options.logger === false
        ? false
        : { level: options.config?.logLevel ?? 'info', ...(options.logStream ? { stream: options.logStream } : {}) },
  });

  let config: TransferTrackerConfig;
  let reference: ReferenceData;
  try {
    config = options.config ?? readConfig();
    server.log.level = config.logLevel;
    fs.mkdirSync(config.dataDir, { recursive: true });
    reference = loadReferenceData(config, server.log);
  } catch (error) {
    // No reference data, no form: refuse to start.
    server.log.error(error, 'Stock transfer tracker failed to start');
    await server.close();
    throw error;
  }

  server.decorate('transferConfig', config);

  const context: TransferTrackerContext = {
    config,
    reference,
    form: createFormState(reference),
    clock: options.clock ?? (() => new Date()),
  };

  await server.register(cors, { origin: true });

  await server.register(healthRoutes, { prefix: '/api/health', reference });
  await server.register(referenceRoutes, { prefix: '/api/reference', reference });
  await server.register(transferFormRoutes, { prefix: '/api/transfer-form', context });
  await server.register(transfersRoutes, { prefix: '/api/transfers', transfersFile: config.transfersFile });

  return server;
}
