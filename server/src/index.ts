import 'dotenv/config';

import { buildServer } from './app.js';

// buildServer logs its own start-up failures.
const server = await buildServer().catch(() => process.exit(1));
const { port } = server.transferConfig;

try {
  await server.listen({ port, host: '0.0.0.0' });
  server.log.info(`Server listening on port ${port}`);
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
