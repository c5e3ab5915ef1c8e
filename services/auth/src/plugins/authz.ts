import fp from 'fastify-plugin';
import type { FastifyPluginAsync, FastifyRequest } from 'fastify';

import type { AuthUser } from '../domain/models';
import { unauthorized } from '../errors';

export const ACCESS_TOKEN_COOKIE = 'sp_access';
export const API_KEY_HEADER = 'x-api-key';

function extractBearerToken(request: FastifyRequest) {
  const header = request.headers.authorization;
  if (typeof header === 'string') {
    const match = /^Bearer\s+(.+)$/i.exec(header);
    if (match) {
      return match[1].trim();
    }
  }

  const cookieToken = request.cookies[ACCESS_TOKEN_COOKIE];
  return typeof cookieToken === 'string' && cookieToken.length > 0 ? cookieToken : null;
}

function extractApiKey(request: FastifyRequest) {
  const header = request.headers[API_KEY_HEADER];
  return typeof header === 'string' && header.length > 0 ? header : null;
}

/**
 * Resolves the caller from an access token (header or cookie) or an
 * `X-API-Key` header. Only tokens issued for the `access` purpose pass; an
 * MFA challenge or refresh token is rejected like any other bad token.
 */
const authzPlugin: FastifyPluginAsync = async (fastify) => {
  fastify.decorateRequest('authUser', null);
  fastify.decorateRequest('sessionId', null);

  fastify.decorate('authenticate', async function authenticate(request: FastifyRequest) {
    const apiKey = extractApiKey(request);
    if (apiKey) {
      const user = await fastify.apiKeyService.getUserFromApiKey(apiKey, {
        ipAddress: request.ip,
        userAgent: request.headers['user-agent'] ?? null,
      });
      if (!user) {
        throw unauthorized('AUTH_INVALID_API_KEY', 'Invalid or expired API key.');
      }
      request.authUser = user;
      return user;
    }

    const token = extractBearerToken(request);
    if (!token) {
      throw unauthorized('AUTH_UNAUTHORIZED', 'Authentication required.');
    }

    const verified = fastify.tokenCodec.verify(token, 'access');
    if (!verified.ok) {
      request.log.info({ reason: verified.error }, 'access token rejected');
      throw unauthorized('AUTH_UNAUTHORIZED', 'Authentication required.');
    }

    const user = await fastify.authService.getUserById(verified.value.subject);
    if (!user || !user.isActive) {
      throw unauthorized('AUTH_UNAUTHORIZED', 'Authentication required.');
    }

    const { sid } = verified.value.claims;
    request.authUser = user;
    request.sessionId = typeof sid === 'string' ? sid : null;
    return user;
  });
};

export default fp(authzPlugin, { name: 'authz-plugin' });
