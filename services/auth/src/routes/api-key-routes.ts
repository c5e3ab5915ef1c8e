import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';

import { toServiceError } from '../domain/failures';
import type { ApiKeySummary } from '../services/api-key-service';
import { buildContext, requireUser } from './http';

const CreateApiKeySchema = z
  .object({
    name: z.string().min(1).max(255),
    expires_in_days: z.number().int().min(1).max(3650).optional(),
  })
  .strict();

const ListQuerySchema = z.object({
  include_inactive: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
});

const KeyParamsSchema = z.object({ id: z.string().uuid() });

const notFound = () => toServiceError({ kind: 'not_found', resource: 'api_key' });

function serializeApiKey(key: ApiKeySummary) {
  return {
    id: key.id,
    name: key.name,
    prefix: key.prefix,
    is_active: key.isActive,
    last_used_at: key.lastUsedAt ? key.lastUsedAt.toISOString() : null,
    expires_at: key.expiresAt ? key.expiresAt.toISOString() : null,
    created_at: key.createdAt.toISOString(),
  };
}

export const apiKeyRoutes: FastifyPluginAsync = async (fastify) => {
  const authenticated = { preHandler: [fastify.authenticate] };

  fastify.post(
    '/api-keys',
    authenticated,
    fastify.withValidation({ body: CreateApiKeySchema }, async (request, reply) => {
      const { body } = request.validated;
      const created = await fastify.apiKeyService.create(
        requireUser(request).id,
        body.name,
        body.expires_in_days ?? null,
        buildContext(request),
      );

      return reply.code(201).send({ ...serializeApiKey(created.apiKey), key: created.rawKey });
    }),
  );

  fastify.get(
    '/api-keys',
    authenticated,
    fastify.withValidation({ query: ListQuerySchema }, async (request) => {
      const keys = await fastify.apiKeyService.list(
        requireUser(request).id,
        request.validated.query.include_inactive,
      );
      return keys.map(serializeApiKey);
    }),
  );

  fastify.get(
    '/api-keys/:id',
    authenticated,
    fastify.withValidation({ params: KeyParamsSchema }, async (request) => {
      const key = await fastify.apiKeyService.get(
        request.validated.params.id,
        requireUser(request).id,
      );
      if (!key) {
        throw notFound();
      }
      return serializeApiKey(key);
    }),
  );

  fastify.delete(
    '/api-keys/:id',
    authenticated,
    fastify.withValidation({ params: KeyParamsSchema }, async (request, reply) => {
      const revoked = await fastify.apiKeyService.revoke(
        request.validated.params.id,
        requireUser(request).id,
        buildContext(request),
      );
      if (!revoked) {
        throw notFound();
      }
      return reply.code(204).send();
    }),
  );

  fastify.delete(
    '/api-keys/:id/permanent',
    authenticated,
    fastify.withValidation({ params: KeyParamsSchema }, async (request, reply) => {
      const deleted = await fastify.apiKeyService.delete(
        request.validated.params.id,
        requireUser(request).id,
        buildContext(request),
      );
      if (!deleted) {
        throw notFound();
      }
      return reply.code(204).send();
    }),
  );
};
