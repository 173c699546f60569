import { buildApp } from './app.js';
import { loadConfig } from './infrastructure/index.js';

/**
 * Bootstrap the webhook server.
 *
 * Order:
 * 1) Config (fails fast on invalid env)
 * 2) App assembly: store + routes
 * 3) Shutdown hooks
 * 4) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const fastify = await buildApp({ config });

  const shutdown = (signal: string): void => {
    fastify.log.info({ signal }, 'Shutting down');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await fastify.listen({
    host: config.host,
    port: config.port,
  });
}

main().catch((err: unknown) => {
  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);
});
