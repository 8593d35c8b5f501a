import { ConfigError, loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { createServer } from './server.js';

async function start() {
  const config = loadConfig();
  const logger = createLogger(config);
  const app = await createServer(config, { logger });

  await app.listen({ port: config.port, host: config.host });
  app.log.info({ port: config.port, dataDir: config.dataDir, maxConcurrentJobs: config.maxConcurrentJobs }, 'Render engine started');

  // Graceful shutdown: onClose cancels running encodes
  const signals = ['SIGINT', 'SIGTERM'] as const;
  for (const signal of signals) {
    process.once(signal, () => {
      app.log.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (error: unknown) => {
          app.log.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        }
      );
    });
  }
}

start().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error('Failed to start server:', error);
  }
  process.exit(1);
});
