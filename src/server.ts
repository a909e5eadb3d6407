// src/server.ts
// Process entry point: opens the database, builds the app and listens.

import { config } from './config';
import { buildApp } from './app';
import { createAdapter } from './db';
import { createLogger } from './observability';

const log = createLogger('startup');

async function main() {
  const db = createAdapter();
  const app = await buildApp({ db });

  log.info(
    {
      cwd: process.cwd(),
      dbFile: config.database.path,
      node: process.version,
      aiProvider: config.ai.provider,
      inference: config.extraction.inferenceEnabled,
    },
    'Blankfill API boot'
  );

  const shutdown = async (signal: string) => {
    log.info({ signal }, 'shutting down');
    try {
      await app.close();
      await db.close();
      process.exit(0);
    } catch (err) {
      log.error({ err }, 'shutdown failed');
      process.exit(1);
    }
  };
  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  await app.listen({ port: config.port, host: '0.0.0.0' });
  log.info({ port: config.port }, 'API listening');
}

main().catch((err) => {
  log.fatal({ err }, 'Server startup failed');
  process.exit(1);
});
