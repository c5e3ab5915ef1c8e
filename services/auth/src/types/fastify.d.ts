import type { FastifyRequest, RouteHandlerMethod } from 'fastify';

import type { Database } from '../db/client';
import type { AuthUser } from '../domain/models';
import type { TokenCodec } from '../lib/token-codec';
import type { ValidationHandler, ValidationSchemas } from '../plugins/validation';
import type { ApiKeyService } from '../services/api-key-service';
import type { AuthService } from '../services/auth-service';
import type { SessionService } from '../services/session-service';
import type { TotpService } from '../services/totp-service';

declare module 'fastify' {
  interface FastifyInstance {
    db: Database | null;
    tokenCodec: TokenCodec;
    authService: AuthService;
    totpService: TotpService;
    apiKeyService: ApiKeyService;
    sessionService: SessionService;
    withValidation<T extends ValidationSchemas>(
      schemas: T,
      handler: ValidationHandler<T>,
    ): RouteHandlerMethod;
    authenticate(request: FastifyRequest): Promise<AuthUser>;
  }

  interface FastifyRequest {
    authUser: AuthUser | null;
    sessionId: string | null;
    validated: Record<string, unknown>;
  }
}
