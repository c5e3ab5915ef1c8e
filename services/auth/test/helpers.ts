import { vi } from 'vitest';

import type { Env } from '../src/env';
import { MemoryCache } from '../src/lib/cache';
import { TokenCodec } from '../src/lib/token-codec';
import { ApiKeyService } from '../src/services/api-key-service';
import { AuthService } from '../src/services/auth-service';
import { OAuthStateGuard } from '../src/services/oauth-state-guard';
import { SessionService } from '../src/services/session-service';
import { TotpService } from '../src/services/totp-service';
import { FakeKeycloakClient } from './fake-keycloak-client';
import { FakeOAuthProviderClient } from './fake-oauth-provider-client';
import { InMemoryApiKeyRepository } from './in-memory-api-key-repository';
import { InMemoryAuthRepository } from './in-memory-auth-repository';

export const TEST_PASSWORD = 'Sup3rSecurePass!';

export function createTestEnv(overrides: Partial<Env> = {}): Env {
  return {
    NODE_ENV: 'test',
    PORT: 4001,
    HOST: '127.0.0.1',
    LOG_LEVEL: 'silent',
    DATABASE_URL: 'postgres://localhost:5432/auth_test',
    REDIS_URL: 'redis://localhost:6379/1',
    JWT_SECRET: 'test-secret-test-secret-test-secret',
    ACCESS_TOKEN_TTL_SECONDS: 900,
    REFRESH_TOKEN_TTL_SECONDS: 60 * 60 * 24 * 7,
    MFA_TOKEN_TTL_SECONDS: 300,
    OAUTH_STATE_TTL_SECONDS: 600,
    MAX_LOGIN_ATTEMPTS: 5,
    LOCKOUT_DURATION_MINUTES: 15,
    TOTP_ENCRYPTION_KEY: 'AAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA=',
    TOTP_ISSUER: 'SaaS Platform Test',
    COOKIE_DOMAIN: undefined,
    COOKIE_SECURE: false,
    RATE_LIMIT_MAX: 1000,
    RATE_LIMIT_WINDOW_MINUTES: 1,
    ...overrides,
  };
}

export function createTestLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function createAuthHarness(overrides: Partial<Env> = {}) {
  const env = createTestEnv(overrides);
  const repository = new InMemoryAuthRepository();
  const apiKeyRepository = new InMemoryApiKeyRepository();
  const cache = new MemoryCache();
  const providerClient = new FakeOAuthProviderClient();
  const keycloakClient = new FakeKeycloakClient();
  const logger = createTestLogger();
  const tokens = new TokenCodec(env.JWT_SECRET);
  const sessions = new SessionService(repository);
  const totp = new TotpService({ repository, env });
  const stateGuard = new OAuthStateGuard({ cache, ttlSeconds: env.OAUTH_STATE_TTL_SECONDS });
  const apiKeys = new ApiKeyService({ apiKeys: apiKeyRepository, repository });

  const service = new AuthService({
    repository,
    env,
    logger,
    tokens,
    sessions,
    totp,
    stateGuard,
    providerClient,
    keycloakClient,
  });

  return {
    service,
    env,
    repository,
    apiKeyRepository,
    cache,
    providerClient,
    keycloakClient,
    logger,
    tokens,
    sessions,
    totp,
    stateGuard,
    apiKeys,
  };
}

export async function registerUser(
  harness: ReturnType<typeof createAuthHarness>,
  email = 'casey@example.com',
) {
  return harness.service.register(
    { email, password: TEST_PASSWORD, fullName: 'Casey Patel' },
    { ipAddress: '127.0.0.1', userAgent: 'vitest' },
  );
}
