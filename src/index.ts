// This is the process entrypoint that starts the HTTP server and handles graceful shutdown.

import { loadConfig } from './config/config.js';
import { createServer } from './server.js';

const config = loadConfig();
const { app } = createServer(config);

// This helper performs graceful shutdown so sessions and the catalog store are closed in order.
async function shutdown(signal: string): Promise<void> {
  app.log.info({ signal }, 'shutdown_started');

  try {
    await app.close();
  } catch (error) {
    app.log.error({ signal, message: error instanceof Error ? error.message : String(error) }, 'shutdown_failed');
    process.exit(1);
  }

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
  .listen({ host: config.host, port: config.port })
  .then(() => {
    app.log.info({ host: config.host, port: config.port, sessionMode: config.sessionMode }, 'server_started');
  })
  .catch((error: unknown) => {
    app.log.error(
      { message: error instanceof Error ? error.message : String(error), stack: error instanceof Error ? error.stack : undefined },
      'server_start_failed'
    );
    process.exit(1);
  });
