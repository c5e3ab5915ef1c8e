import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';

import { toServiceError } from '../domain/failures';
import { unauthorized } from '../errors';
import { buildContext, requireUser } from './http';

const SetupSchema = z
  .object({
    device_name: z.string().min(1).max(255).optional(),
  })
  .strict();

const CodeSchema = z
  .object({
    totp_code: z.string().min(6).max(16),
  })
  .strict();

const PasswordSchema = z
  .object({
    password: z.string().min(1).max(128),
  })
  .strict();

export const totpRoutes: FastifyPluginAsync = async (fastify) => {
  const authenticated = { preHandler: [fastify.authenticate] };

  fastify.get('/totp/status', authenticated, async (request) => {
    const status = await fastify.totpService.status(requireUser(request).id);
    return {
      enabled: status.enabled,
      device_name: status.deviceName,
      enabled_at: status.enabledAt ? status.enabledAt.toISOString() : null,
      backup_codes_remaining: status.backupCodesRemaining,
    };
  });

  fastify.post(
    '/totp/setup',
    authenticated,
    fastify.withValidation({ body: SetupSchema }, async (request, reply) => {
      const result = await fastify.totpService.setup(
        requireUser(request),
        request.validated.body.device_name ?? null,
        buildContext(request),
      );

      if (!result.ok) {
        throw toServiceError(result.error);
      }

      return reply.send({
        secret: result.value.secret,
        provisioning_uri: result.value.provisioningUri,
        qr_code: result.value.qrCode,
        backup_codes: result.value.backupCodes,
      });
    }),
  );

  fastify.post(
    '/totp/enable',
    authenticated,
    fastify.withValidation({ body: CodeSchema }, async (request, reply) => {
      const result = await fastify.totpService.enable(
        requireUser(request),
        request.validated.body.totp_code,
        buildContext(request),
      );

      if (!result.ok) {
        throw toServiceError(result.error);
      }

      return reply.send({
        enabled: true,
        enabled_at: result.value.enabledAt.toISOString(),
        message: 'TOTP enabled successfully',
      });
    }),
  );

  fastify.post(
    '/totp/verify',
    authenticated,
    fastify.withValidation({ body: CodeSchema }, async (request, reply) => {
      const valid = await fastify.totpService.check(
        requireUser(request).id,
        request.validated.body.totp_code,
        buildContext(request),
      );

      if (!valid) {
        throw unauthorized('AUTH_MFA_CODE_INVALID', 'Invalid TOTP code');
      }

      return reply.send({ valid: true });
    }),
  );

  fastify.post(
    '/totp/disable',
    authenticated,
    fastify.withValidation({ body: PasswordSchema }, async (request, reply) => {
      const result = await fastify.totpService.disable(
        requireUser(request),
        request.validated.body.password,
        buildContext(request),
      );

      if (!result.ok) {
        throw toServiceError(result.error);
      }

      return reply.send({ enabled: false, message: 'TOTP disabled successfully' });
    }),
  );

  fastify.post(
    '/totp/backup-codes',
    authenticated,
    fastify.withValidation({ body: PasswordSchema }, async (request, reply) => {
      const result = await fastify.totpService.regenerateBackupCodes(
        requireUser(request),
        request.validated.body.password,
        buildContext(request),
      );

      if (!result.ok) {
        throw toServiceError(result.error);
      }

      return reply.send({ backup_codes: result.value });
    }),
  );
};
