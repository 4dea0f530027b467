// This is the process entrypoint that loads configuration, starts the HTTP server and handles graceful shutdown.

import { loadServerConfig, type ServerConfig } from './config/env.js';
import { createServer } from './server.js';
import { normalizeError } from './utils/errors.js';
import { createBootstrapLogger, errorForLog } from './utils/logger.js';

// Configuration failures are logged and end the process before anything listens.
function readConfig(): ServerConfig {
  try {
    return loadServerConfig();
  } catch (error) {
    const appError = normalizeError(error);
    createBootstrapLogger().fatal(
      {
        event: 'config_invalid',
        details: appError.details,
        error: errorForLog(error)
      },
      'config_invalid'
    );
    process.exit(1);
  }
}

const config = readConfig();
const { host, port } = config;
const { app } = createServer(config);

async function shutdown(signal: string): Promise<void> {
  app.log.info({ signal }, 'shutdown_started');
  await app.close();
  app.log.info({ signal }, 'shutdown_completed');
  process.exit(0);
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

app
  .listen({ host, port })
  .then(() => {
    app.log.info({ host, port }, 'server_started');
  })
  .catch((error: unknown) => {
    app.log.error({ error: errorForLog(error) }, 'server_start_failed');
    process.exit(1);
  });
