import { buildApp } from './app';
import { createDatabase } from './db/client';
import { env } from './env';
import { RedisCache } from './lib/cache';

async function start() {
  const database = createDatabase(env.DATABASE_URL);
  const cache = new RedisCache(env.REDIS_URL);
  const app = await buildApp({ database, cache });

  app.addHook('onClose', async () => {
    await cache.disconnect();
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, 'shutting down auth service');
      app.close().catch((error: unknown) => {
        app.log.error(error, 'failed to shut down cleanly');
        process.exitCode = 1;
      });
    });
  }

  try {
    await cache.connect();
    await app.listen({ port: env.PORT, host: env.HOST });
    app.log.info(`auth service listening on port ${env.PORT}`);
  } catch (error) {
    app.log.error(error, 'failed to start auth service');
    process.exitCode = 1;
    await app.close();
  }
}

void start();
