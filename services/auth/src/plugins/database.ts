import fp from 'fastify-plugin';
import type { FastifyPluginAsync } from 'fastify';

import { createDatabase, type DatabaseHandle } from '../db/client';

export interface DatabasePluginOptions {
  /** Skipped when every repository is injected. */
  connectionString?: string;
  handle?: DatabaseHandle;
}

const databasePlugin: FastifyPluginAsync<DatabasePluginOptions> = async (fastify, opts) => {
  const handle =
    opts.handle ?? (opts.connectionString ? createDatabase(opts.connectionString) : null);

  fastify.decorate('db', handle ? handle.db : null);

  if (handle) {
    fastify.addHook('onClose', async () => {
      await handle.pool.end();
    });
  }
};

export default fp(databasePlugin, { name: 'database-plugin' });
