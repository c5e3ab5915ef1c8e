import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';

import { toServiceError } from '../domain/failures';
import { requireUser } from './http';

const SessionParamsSchema = z.object({ id: z.string().uuid() });

const RevokeAllQuerySchema = z.object({
  keep_current: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
});

export const sessionRoutes: FastifyPluginAsync = async (fastify) => {
  const authenticated = { preHandler: [fastify.authenticate] };

  fastify.get('/sessions', authenticated, async (request) => {
    const sessions = await fastify.sessionService.listSessions(requireUser(request).id);
    return sessions.map((session) => ({
      id: session.id,
      ip_address: session.ipAddress,
      user_agent: session.userAgent,
      device_type: session.deviceType,
      is_current: session.id === request.sessionId,
      last_activity_at: session.lastActivityAt.toISOString(),
      expires_at: session.expiresAt.toISOString(),
      created_at: session.createdAt.toISOString(),
    }));
  });

  fastify.get('/sessions/stats', authenticated, async (request) =>
    fastify.sessionService.getSessionStats(requireUser(request).id),
  );

  fastify.delete(
    '/sessions/all',
    authenticated,
    fastify.withValidation({ query: RevokeAllQuerySchema }, async (request, reply) => {
      const keep = request.validated.query.keep_current ? request.sessionId : null;
      await fastify.sessionService.revokeAllSessions(requireUser(request).id, keep ?? undefined);
      return reply.code(204).send();
    }),
  );

  fastify.delete(
    '/sessions/:id',
    authenticated,
    fastify.withValidation({ params: SessionParamsSchema }, async (request, reply) => {
      const revoked = await fastify.sessionService.revokeSession(
        request.validated.params.id,
        requireUser(request).id,
      );
      if (!revoked) {
        throw toServiceError({ kind: 'not_found', resource: 'session' });
      }
      return reply.code(204).send();
    }),
  );
};
