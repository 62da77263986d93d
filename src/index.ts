import { loadConfig } from './config/index.js';
import { initSentry } from './instrument.js';
import { createServer } from './server.js';

async function main(): Promise<void> {
  // Fails fast if the config file is missing or invalid
  const config = loadConfig();

  initSentry(config.sentry, config.env);

  const server = await createServer({ config });

  try {
    const address = await server.listen({
      host: config.server.host,
      port: config.server.port,
    });
    server.log.info(`Server listening at ${address}`);
  } catch (err) {
    server.log.error(err, 'Failed to start server');
    process.exit(1);
  }

  const shutdown = async (signal: string) => {
    server.log.info(`Received ${signal}, shutting down...`);
    await server.close();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      console.error('Shutdown failed:', err);
      process.exit(1);
    });
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
