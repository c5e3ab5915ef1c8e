import pino from 'pino';

import { createDatabase } from '../db/client';
import { env } from '../env';
import { DrizzleApiKeyRepository } from '../repositories/drizzle-api-key-repository';
import { DrizzleAuthRepository } from '../repositories/drizzle-auth-repository';
import { ApiKeyService } from '../services/api-key-service';

/** Deactivates API keys past their expiry. Meant for an external scheduler such as cron. */
async function run() {
  const logger = pino({ level: env.LOG_LEVEL });
  const { pool, db } = createDatabase(env.DATABASE_URL);

  try {
    const service = new ApiKeyService({
      apiKeys: new DrizzleApiKeyRepository(db),
      repository: new DrizzleAuthRepository(db),
    });
    const deactivated = await service.cleanupExpired();
    logger.info({ deactivated }, 'expired api keys deactivated');
  } catch (error) {
    logger.error({ err: error }, 'api key cleanup failed');
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

void run();
