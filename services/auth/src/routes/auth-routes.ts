import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';

import { toServiceError } from '../domain/failures';
import type { Env } from '../env';
import { unauthorized } from '../errors';
import {
  REFRESH_TOKEN_COOKIE,
  buildContext,
  clearAuthCookies,
  requireUser,
  serializeTokens,
  serializeUser,
  setAuthCookies,
} from './http';

const passwordSchema = z
  .string()
  .min(12, 'Password must be at least 12 characters')
  .max(128, 'Password must be at most 128 characters')
  .regex(/[A-Z]/, 'Password must include an uppercase letter')
  .regex(/[a-z]/, 'Password must include a lowercase letter')
  .regex(/[0-9]/, 'Password must include a digit')
  .regex(/[^A-Za-z0-9]/, 'Password must include a symbol');

const RegisterSchema = z
  .object({
    email: z.string().trim().email().max(254),
    password: passwordSchema,
    full_name: z.string().min(1).max(255).optional(),
  })
  .strict();

const LoginSchema = z
  .object({
    email: z.string().trim().email().max(254),
    password: z.string().min(1).max(128),
  })
  .strict();

const MfaLoginSchema = z
  .object({
    mfa_token: z.string().min(1),
    totp_code: z.string().min(6).max(16),
  })
  .strict();

const RefreshSchema = z
  .object({
    refresh_token: z.string().min(1).optional(),
  })
  .strict();

const OAuthParamsSchema = z.object({ provider: z.string().min(1).max(32) });

const OAuthCallbackSchema = z
  .object({
    code: z.string().min(1),
    state: z.string().min(1),
  })
  .strict();

const KeycloakCallbackSchema = z
  .object({
    access_token: z.string().min(1),
  })
  .strict();

export interface AuthRoutesOptions {
  env: Env;
}

export const authRoutes: FastifyPluginAsync<AuthRoutesOptions> = async (fastify, opts) => {
  const { env } = opts;
  const authenticated = { preHandler: [fastify.authenticate] };

  fastify.post(
    '/auth/register',
    fastify.withValidation({ body: RegisterSchema }, async (request, reply) => {
      const { body } = request.validated;
      const user = await fastify.authService.register(
        { email: body.email, password: body.password, fullName: body.full_name },
        buildContext(request),
      );
      return reply.code(201).send(serializeUser(user));
    }),
  );

  fastify.post(
    '/auth/login',
    fastify.withValidation({ body: LoginSchema }, async (request, reply) => {
      const result = await fastify.authService.login(request.validated.body, buildContext(request));

      switch (result.type) {
        case 'rejected':
          throw toServiceError(result.failure);
        case 'mfa_required':
          return reply.send({
            mfa_required: true,
            mfa_token: result.mfaToken,
            message: result.message,
          });
        case 'authenticated':
          setAuthCookies(reply, env, result.tokens);
          return reply.send(serializeTokens(result.tokens));
      }
    }),
  );

  fastify.post(
    '/auth/login/mfa',
    fastify.withValidation({ body: MfaLoginSchema }, async (request, reply) => {
      const { body } = request.validated;
      const result = await fastify.authService.completeMfaLogin(
        { mfaToken: body.mfa_token, code: body.totp_code },
        buildContext(request),
      );

      if (result.type === 'rejected') {
        throw toServiceError(result.failure);
      }

      setAuthCookies(reply, env, result.tokens);
      return reply.send(serializeTokens(result.tokens));
    }),
  );

  fastify.post(
    '/auth/refresh',
    fastify.withValidation({ body: RefreshSchema }, async (request, reply) => {
      const refreshToken =
        request.validated.body.refresh_token ?? request.cookies[REFRESH_TOKEN_COOKIE];

      if (!refreshToken) {
        throw unauthorized('AUTH_INVALID_REFRESH_TOKEN', 'Invalid refresh token');
      }

      const result = await fastify.authService.refreshSession(refreshToken, buildContext(request));
      if (!result.ok) {
        clearAuthCookies(reply, env);
        throw toServiceError(result.error);
      }

      setAuthCookies(reply, env, result.value.tokens);
      return reply.send(serializeTokens(result.value.tokens));
    }),
  );

  fastify.post(
    '/auth/logout',
    fastify.withValidation({ body: RefreshSchema }, async (request, reply) => {
      const refreshToken =
        request.validated.body.refresh_token ?? request.cookies[REFRESH_TOKEN_COOKIE];

      if (refreshToken) {
        await fastify.authService.logout(refreshToken, buildContext(request));
      }

      clearAuthCookies(reply, env);
      return reply.code(204).send();
    }),
  );

  fastify.get('/auth/me', authenticated, async (request) => serializeUser(requireUser(request)));

  fastify.get(
    '/auth/oauth/:provider/authorize',
    fastify.withValidation({ params: OAuthParamsSchema }, async (request, reply) => {
      const authorization = await fastify.authService.beginOAuth(request.validated.params.provider);
      return reply.send({
        authorization_url: authorization.authorizationUrl,
        state: authorization.state,
      });
    }),
  );

  fastify.post(
    '/auth/oauth/:provider/callback',
    fastify.withValidation(
      { params: OAuthParamsSchema, body: OAuthCallbackSchema },
      async (request, reply) => {
        const result = await fastify.authService.completeOAuth(
          request.validated.params.provider,
          request.validated.body,
          buildContext(request),
        );

        if (!result.ok) {
          throw toServiceError(result.error);
        }

        setAuthCookies(reply, env, result.value.tokens);
        return reply.send(serializeTokens(result.value.tokens));
      },
    ),
  );

  fastify.post(
    '/auth/keycloak/callback',
    fastify.withValidation({ body: KeycloakCallbackSchema }, async (request, reply) => {
      const result = await fastify.authService.completeKeycloak(
        request.validated.body.access_token,
        buildContext(request),
      );

      if (!result.ok) {
        throw toServiceError(result.error);
      }

      setAuthCookies(reply, env, result.value.tokens);
      return reply.send(serializeTokens(result.value.tokens));
    }),
  );
};
