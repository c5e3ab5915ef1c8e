import fastify, { type FastifyServerOptions } from 'fastify';
import sensible from '@fastify/sensible';
import cookie from '@fastify/cookie';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';

import type { DatabaseHandle } from './db/client';
import { env as defaultEnv, type Env } from './env';
import { ServiceError } from './errors';
import { RedisCache, type EphemeralCache } from './lib/cache';
import { TokenCodec } from './lib/token-codec';
import authzPlugin from './plugins/authz';
import databasePlugin from './plugins/database';
import validationPlugin from './plugins/validation';
import type { ApiKeyRepository } from './repositories/api-key-repository';
import type { AuthRepository } from './repositories/auth-repository';
import { DrizzleApiKeyRepository } from './repositories/drizzle-api-key-repository';
import { DrizzleAuthRepository } from './repositories/drizzle-auth-repository';
import { apiKeyRoutes } from './routes/api-key-routes';
import { authRoutes } from './routes/auth-routes';
import { healthRoutes } from './routes/health-routes';
import { sessionRoutes } from './routes/session-routes';
import { totpRoutes } from './routes/totp-routes';
import { ApiKeyService } from './services/api-key-service';
import { AuthService } from './services/auth-service';
import { HttpKeycloakClient, type KeycloakClient } from './services/keycloak-client';
import { OAuthStateGuard } from './services/oauth-state-guard';
import { HttpOAuthProviderClient, type OAuthProviderClient } from './services/oauth-provider-client';
import { SessionService } from './services/session-service';
import { TotpService } from './services/totp-service';

const API_PREFIX = '/api/v1';

export interface BuildAppOptions {
  env?: Env;
  database?: DatabaseHandle;
  repository?: AuthRepository;
  apiKeyRepository?: ApiKeyRepository;
  cache?: EphemeralCache;
  providerClient?: OAuthProviderClient;
  keycloakClient?: KeycloakClient;
  logger?: FastifyServerOptions['logger'];
}

export async function buildApp(options: BuildAppOptions = {}) {
  const resolvedEnv = options.env ?? defaultEnv;

  const app = fastify({
    logger: options.logger ?? { level: resolvedEnv.LOG_LEVEL },
  });

  await app.register(sensible);
  await app.register(cookie);
  await app.register(cors, {
    origin: true,
    credentials: true,
  });
  await app.register(helmet);
  await app.register(rateLimit, {
    max: resolvedEnv.RATE_LIMIT_MAX,
    timeWindow: `${resolvedEnv.RATE_LIMIT_WINDOW_MINUTES} minutes`,
  });

  const needsDatabase = !options.repository || !options.apiKeyRepository;
  await app.register(databasePlugin, {
    handle: options.database,
    connectionString: needsDatabase ? resolvedEnv.DATABASE_URL : undefined,
  });

  const repository = options.repository ?? new DrizzleAuthRepository(requireDatabase(app.db));
  const apiKeyRepository =
    options.apiKeyRepository ?? new DrizzleApiKeyRepository(requireDatabase(app.db));
  const cache = options.cache ?? new RedisCache(resolvedEnv.REDIS_URL);
  const tokenCodec = new TokenCodec(resolvedEnv.JWT_SECRET);

  const sessionService = new SessionService(repository);
  const totpService = new TotpService({ repository, env: resolvedEnv });
  const apiKeyService = new ApiKeyService({ apiKeys: apiKeyRepository, repository });
  const authService = new AuthService({
    repository,
    env: resolvedEnv,
    logger: app.log,
    tokens: tokenCodec,
    sessions: sessionService,
    totp: totpService,
    stateGuard: new OAuthStateGuard({ cache, ttlSeconds: resolvedEnv.OAUTH_STATE_TTL_SECONDS }),
    providerClient: options.providerClient ?? new HttpOAuthProviderClient(resolvedEnv),
    keycloakClient: options.keycloakClient ?? new HttpKeycloakClient(resolvedEnv),
  });

  app.decorate('tokenCodec', tokenCodec);
  app.decorate('authService', authService);
  app.decorate('totpService', totpService);
  app.decorate('apiKeyService', apiKeyService);
  app.decorate('sessionService', sessionService);

  // must precede route registration: encapsulated plugins copy the handler when registered
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ServiceError) {
      request.log.info({ code: error.code, status: error.status }, 'Handled service error');
      return reply.code(error.status).send({
        error: {
          code: error.code,
          message: error.message,
          details: error.details ?? null,
        },
        correlationId: request.id,
      });
    }

    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.code(error.statusCode).send({
        error: {
          code: error.code ?? 'BAD_REQUEST',
          message: error.message,
          details: null,
        },
        correlationId: request.id,
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send({
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: 'An unexpected error occurred.',
        details: null,
      },
      correlationId: request.id,
    });
  });

  await app.register(validationPlugin);
  await app.register(authzPlugin);
  await app.register(healthRoutes);
  await app.register(authRoutes, { prefix: API_PREFIX, env: resolvedEnv });
  await app.register(totpRoutes, { prefix: API_PREFIX });
  await app.register(apiKeyRoutes, { prefix: API_PREFIX });
  await app.register(sessionRoutes, { prefix: API_PREFIX });

  return app;
}

function requireDatabase<T>(db: T | null): T {
  if (!db) {
    throw new Error('DATABASE_URL must be set when repositories are not injected');
  }
  return db;
}
