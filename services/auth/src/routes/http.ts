import type { FastifyReply, FastifyRequest } from 'fastify';

import type { AuthTokens, AuthUser, RequestContext } from '../domain/models';
import type { Env } from '../env';
import { ACCESS_TOKEN_COOKIE } from '../plugins/authz';

export const REFRESH_TOKEN_COOKIE = 'sp_refresh';

type CookieEnv = Pick<Env, 'COOKIE_SECURE' | 'COOKIE_DOMAIN'>;

export function buildContext(request: FastifyRequest): RequestContext {
  return {
    ipAddress: request.ip ?? null,
    userAgent: request.headers['user-agent'] ?? null,
  };
}

/** Set by `fastify.authenticate` in the preHandler of every protected route. */
export function requireUser(request: FastifyRequest): AuthUser {
  if (!request.authUser) {
    throw new Error('authenticate preHandler did not run for this route');
  }
  return request.authUser;
}

export function serializeUser(user: AuthUser) {
  return {
    id: user.id,
    email: user.email,
    full_name: user.fullName,
    is_active: user.isActive,
    is_verified: user.isVerified,
    last_login_at: user.lastLoginAt ? user.lastLoginAt.toISOString() : null,
    created_at: user.createdAt.toISOString(),
  };
}

export function serializeTokens(tokens: AuthTokens) {
  return {
    access_token: tokens.accessToken,
    refresh_token: tokens.refreshToken,
    token_type: 'bearer' as const,
    expires_in: Math.max(0, Math.floor((tokens.accessTokenExpiresAt.getTime() - Date.now()) / 1000)),
  };
}

function secondsUntil(date: Date) {
  return Math.max(1, Math.floor((date.getTime() - Date.now()) / 1000));
}

function cookieOptions(env: CookieEnv, maxAge: number) {
  return {
    httpOnly: true,
    sameSite: 'lax' as const,
    secure: env.COOKIE_SECURE,
    domain: env.COOKIE_DOMAIN,
    path: '/',
    maxAge,
  };
}

export function setAuthCookies(reply: FastifyReply, env: CookieEnv, tokens: AuthTokens) {
  reply.setCookie(
    ACCESS_TOKEN_COOKIE,
    tokens.accessToken,
    cookieOptions(env, secondsUntil(tokens.accessTokenExpiresAt)),
  );
  reply.setCookie(
    REFRESH_TOKEN_COOKIE,
    tokens.refreshToken,
    cookieOptions(env, secondsUntil(tokens.refreshTokenExpiresAt)),
  );
}

export function clearAuthCookies(reply: FastifyReply, env: CookieEnv) {
  reply.setCookie(ACCESS_TOKEN_COOKIE, '', cookieOptions(env, 0));
  reply.setCookie(REFRESH_TOKEN_COOKIE, '', cookieOptions(env, 0));
}
