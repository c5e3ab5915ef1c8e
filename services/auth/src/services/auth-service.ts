import crypto from 'node:crypto';

import { fail, ok, type AuthFailure, type Result } from '../domain/failures';
import type {
  AuthTokens,
  AuthUser,
  AuthUserWithSecrets,
  IdentityProvider,
  OAuthProvider,
  RequestContext,
  ServiceLogger,
} from '../domain/models';
import type { Env } from '../env';
import { badRequest, conflict, unauthorized, type ServiceError } from '../errors';
import { hashSecret, verifySecret } from '../lib/passwords';
import type { TokenCodec } from '../lib/token-codec';
import type { AuthRepository } from '../repositories/auth-repository';
import { KeycloakError, type KeycloakClient } from './keycloak-client';
import type { OAuthStateGuard } from './oauth-state-guard';
import { OAuthProviderError, type OAuthProviderClient } from './oauth-provider-client';
import type { SessionService } from './session-service';
import type { TotpService } from './totp-service';

export const MFA_REQUIRED_MESSAGE = 'MFA verification required. Please provide your TOTP code.';

export interface RegisterInput {
  email: string;
  password: string;
  fullName?: string | null;
}

export interface LoginInput {
  email: string;
  password: string;
}

export interface MfaLoginInput {
  mfaToken: string;
  code: string;
}

export interface OAuthCallbackInput {
  code: string;
  state: string;
}

export interface EstablishedSession {
  user: AuthUser;
  tokens: AuthTokens;
  sessionId: string;
}

export interface AuthenticatedResult extends EstablishedSession {
  type: 'authenticated';
}

export interface MfaRequiredResult {
  type: 'mfa_required';
  mfaToken: string;
  expiresAt: Date;
  message: string;
}

export interface RejectedResult {
  type: 'rejected';
  failure: AuthFailure;
}

export type LoginResult = AuthenticatedResult | MfaRequiredResult | RejectedResult;

export type MfaLoginResult = AuthenticatedResult | RejectedResult;

export interface OAuthAuthorization {
  provider: OAuthProvider;
  authorizationUrl: string;
  state: string;
}

export interface AuthServiceDependencies {
  repository: AuthRepository;
  env: Env;
  logger: ServiceLogger;
  tokens: TokenCodec;
  sessions: SessionService;
  totp: TotpService;
  stateGuard: OAuthStateGuard;
  providerClient: OAuthProviderClient;
  keycloakClient: KeycloakClient;
}

interface RejectionAudit {
  action: string;
  user?: AuthUser | null;
  email?: string;
  metadata?: Record<string, unknown>;
}

function stripPassword(record: AuthUserWithSecrets): AuthUser {
  const { passwordHash: _passwordHash, ...user } = record;
  return user;
}

function describeFailure(failure: AuthFailure): Record<string, unknown> {
  switch (failure.kind) {
    case 'invalid_credentials':
      return { kind: failure.kind, reason: failure.reason };
    case 'account_locked':
      return { kind: failure.kind, lockedUntil: failure.lockedUntil.toISOString() };
    case 'invalid_or_expired_challenge':
      return { kind: failure.kind, challenge: failure.challenge };
    case 'provider_mismatch':
      return { kind: failure.kind, expected: failure.expected, received: failure.received };
    case 'not_found':
      return { kind: failure.kind, resource: failure.resource };
    default:
      return { kind: failure.kind };
  }
}

/**
 * Drives login from password check through the optional MFA challenge to an
 * established session, and the OAuth authorization-code flow alongside it.
 * Credential failures come back as tagged results; each one is audited and
 * logged exactly once, here.
 */
export class AuthService {
  private readonly repository: AuthRepository;

  private readonly env: Env;

  private readonly logger: ServiceLogger;

  private readonly tokens: TokenCodec;

  private readonly sessions: SessionService;

  private readonly totp: TotpService;

  private readonly stateGuard: OAuthStateGuard;

  private readonly providerClient: OAuthProviderClient;

  private readonly keycloakClient: KeycloakClient;

  constructor(dependencies: AuthServiceDependencies) {
    this.repository = dependencies.repository;
    this.env = dependencies.env;
    this.logger = dependencies.logger;
    this.tokens = dependencies.tokens;
    this.sessions = dependencies.sessions;
    this.totp = dependencies.totp;
    this.stateGuard = dependencies.stateGuard;
    this.providerClient = dependencies.providerClient;
    this.keycloakClient = dependencies.keycloakClient;
  }

  async register(input: RegisterInput, context: RequestContext): Promise<AuthUser> {
    const email = this.normalizeEmail(input.email);
    const existing = await this.repository.findUserByEmail(email);

    if (existing) {
      throw conflict('AUTH_EMAIL_EXISTS', 'An account already exists for this email.');
    }

    const user = await this.repository.createUser({
      email,
      passwordHash: await hashSecret(input.password),
      fullName: this.normalizeOptionalString(input.fullName),
    });

    await this.repository.createAuditEvent({
      action: 'auth.register',
      actor: user.id,
      userId: user.id,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
    });
    this.logger.info({ userId: user.id }, 'user registered');

    return user;
  }

  async login(input: LoginInput, context: RequestContext): Promise<LoginResult> {
    const email = this.normalizeEmail(input.email);
    const record = await this.repository.findUserByEmail(email);
    const audit = { action: 'auth.login.failed', email };

    if (!record) {
      return this.reject(
        { kind: 'invalid_credentials', reason: 'user_not_found' },
        audit,
        context,
      );
    }

    const user = stripPassword(record);
    const now = new Date();

    if (!user.isActive) {
      return this.reject(
        { kind: 'invalid_credentials', reason: 'user_inactive' },
        { ...audit, user },
        context,
      );
    }

    if (this.isLocked(user, now) && user.lockedUntil) {
      return this.reject(
        { kind: 'account_locked', lockedUntil: user.lockedUntil },
        { ...audit, user },
        context,
      );
    }

    if (!record.passwordHash) {
      return this.reject(
        { kind: 'invalid_credentials', reason: 'password_not_set' },
        { ...audit, user },
        context,
      );
    }

    if (!(await verifySecret(record.passwordHash, input.password))) {
      const lockedUntil = await this.registerFailedAttempt(user, now);
      const failure: AuthFailure = lockedUntil
        ? { kind: 'account_locked', lockedUntil }
        : { kind: 'invalid_credentials', reason: 'password_mismatch' };
      return this.reject(failure, { ...audit, user }, context);
    }

    if (await this.totp.isEnabled(user.id)) {
      const challenge = this.tokens.issue(user.id, 'mfa', this.env.MFA_TOKEN_TTL_SECONDS);

      await this.repository.createAuditEvent({
        action: 'auth.login.mfa_challenge',
        actor: user.id,
        userId: user.id,
        ipAddress: context.ipAddress,
        userAgent: context.userAgent,
      });

      return {
        type: 'mfa_required',
        mfaToken: challenge.token,
        expiresAt: challenge.expiresAt,
        message: MFA_REQUIRED_MESSAGE,
      };
    }

    const session = await this.establishSession(user, context, now, 'password');
    return { type: 'authenticated', ...session };
  }

  async completeMfaLogin(input: MfaLoginInput, context: RequestContext): Promise<MfaLoginResult> {
    const audit = { action: 'auth.login.mfa_failed' };
    const verified = this.tokens.verify(input.mfaToken, 'mfa');

    if (!verified.ok) {
      return this.reject(
        { kind: 'invalid_or_expired_challenge', challenge: 'mfa' },
        { ...audit, metadata: { token: verified.error } },
        context,
      );
    }

    const record = await this.repository.findUserById(verified.value.subject);
    const now = new Date();

    if (!record || !record.isActive) {
      return this.reject(
        { kind: 'invalid_or_expired_challenge', challenge: 'mfa' },
        { ...audit, user: record ? stripPassword(record) : null },
        context,
      );
    }

    const user = stripPassword(record);

    if (this.isLocked(user, now) && user.lockedUntil) {
      return this.reject(
        { kind: 'account_locked', lockedUntil: user.lockedUntil },
        { ...audit, user },
        context,
      );
    }

    if (!(await this.totp.verify(user.id, input.code, context))) {
      return this.reject({ kind: 'invalid_mfa_code' }, { ...audit, user }, context);
    }

    const session = await this.establishSession(user, context, now, 'mfa');
    return { type: 'authenticated', ...session };
  }

  /** Rotates the refresh token of a live session and issues a fresh access token. */
  async refreshSession(
    refreshToken: string,
    context: RequestContext,
  ): Promise<Result<EstablishedSession>> {
    const failure: AuthFailure = { kind: 'invalid_or_expired_challenge', challenge: 'refresh' };
    const audit = { action: 'auth.refresh.failed' };
    const verified = this.tokens.verify(refreshToken, 'refresh');

    if (!verified.ok) {
      return this.rejectResult(failure, { ...audit, metadata: { token: verified.error } }, context);
    }

    const { subject, claims } = verified.value;
    const sessionId = typeof claims.sid === 'string' ? claims.sid : null;
    const session = sessionId ? await this.sessions.findActiveSession(sessionId, refreshToken) : null;

    if (!session || session.userId !== subject) {
      return this.rejectResult(
        failure,
        { ...audit, metadata: { reason: 'session_inactive', sessionId } },
        context,
      );
    }

    const record = await this.repository.findUserById(subject);
    const now = new Date();

    if (!record || !record.isActive || this.isLocked(record, now)) {
      return this.rejectResult(
        failure,
        {
          ...audit,
          user: record ? stripPassword(record) : null,
          metadata: { reason: 'user_unavailable' },
        },
        context,
      );
    }

    const user = stripPassword(record);
    const tokens = this.mintTokens(user, session.id);
    const rotated = await this.sessions.rotateSessionToken(
      session.id,
      refreshToken,
      tokens.refreshToken,
      tokens.refreshTokenExpiresAt,
    );

    if (!rotated) {
      return this.rejectResult(
        failure,
        { ...audit, user, metadata: { reason: 'rotation_conflict', sessionId: session.id } },
        context,
      );
    }

    await this.repository.createAuditEvent({
      action: 'auth.refresh',
      actor: user.id,
      userId: user.id,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
      metadata: { sessionId: session.id },
    });

    return ok({ user, tokens, sessionId: session.id });
  }

  /** Revokes the session behind a refresh token. Unknown or invalid tokens are ignored. */
  async logout(refreshToken: string, context: RequestContext): Promise<void> {
    const verified = this.tokens.verify(refreshToken, 'refresh');
    if (!verified.ok) {
      return;
    }

    const { subject, claims } = verified.value;
    if (typeof claims.sid !== 'string') {
      return;
    }

    const revoked = await this.sessions.revokeSession(claims.sid, subject);
    if (revoked) {
      await this.repository.createAuditEvent({
        action: 'auth.logout',
        actor: subject,
        userId: subject,
        ipAddress: context.ipAddress,
        userAgent: context.userAgent,
        metadata: { sessionId: claims.sid },
      });
    }
  }

  async getUserById(id: string): Promise<AuthUser | null> {
    const record = await this.repository.findUserById(id);
    return record ? stripPassword(record) : null;
  }

  resolveProvider(name: string): OAuthProvider {
    const provider = this.providerClient.supportedProviders().find((entry) => entry === name);
    if (!provider) {
      throw badRequest('OAUTH_PROVIDER_UNSUPPORTED', `Unsupported OAuth provider: ${name}`);
    }
    return provider;
  }

  async beginOAuth(providerName: string): Promise<OAuthAuthorization> {
    const provider = this.resolveProvider(providerName);
    const state = await this.stateGuard.issue(provider);

    return {
      provider,
      state,
      authorizationUrl: this.providerClient.buildAuthorizationUrl(provider, state),
    };
  }

  /**
   * The state is consumed before the code is exchanged, so a forged or replayed
   * callback never reaches the provider.
   */
  async completeOAuth(
    providerName: string,
    input: OAuthCallbackInput,
    context: RequestContext,
  ): Promise<Result<EstablishedSession>> {
    const provider = this.resolveProvider(providerName);
    const consumed = await this.stateGuard.consume(provider, input.state);

    if (!consumed.ok) {
      return this.rejectResult(
        consumed.error,
        { action: 'auth.oauth.rejected', metadata: { provider } },
        context,
      );
    }

    const profile = await this.fetchOAuthProfile(provider, input.code, context);
    const user = await this.findOrCreateLinkedUser(
      provider,
      profile.providerUserId,
      profile.email,
      profile.name,
    );

    return this.completeExternalSignIn(user, provider, 'auth.oauth.rejected', context);
  }

  /**
   * Signs in with an access token Keycloak issued to the client directly. The
   * identity comes from the realm's userinfo endpoint and is linked like an
   * OAuth account.
   */
  async completeKeycloak(
    accessToken: string,
    context: RequestContext,
  ): Promise<Result<EstablishedSession>> {
    let reason: string;
    try {
      const profile = await this.keycloakClient.fetchUserInfo(accessToken);
      if (profile.email) {
        const user = await this.findOrCreateLinkedUser(
          'keycloak',
          profile.subject,
          profile.email,
          profile.name,
        );
        return await this.completeExternalSignIn(
          user,
          'keycloak',
          'auth.keycloak.rejected',
          context,
        );
      }
      reason = 'userinfo returned no email address';
    } catch (error) {
      if (!(error instanceof KeycloakError)) {
        throw error;
      }
      reason = error.reason;
    }

    return this.failExternalSignIn(
      'keycloak',
      reason,
      unauthorized('KEYCLOAK_AUTHENTICATION_FAILED', 'Keycloak authentication failed'),
      context,
    );
  }

  private async completeExternalSignIn(
    user: AuthUser,
    provider: IdentityProvider,
    action: string,
    context: RequestContext,
  ): Promise<Result<EstablishedSession>> {
    const now = new Date();

    if (!user.isActive) {
      return this.rejectResult(
        { kind: 'invalid_credentials', reason: 'user_inactive' },
        { action, user, metadata: { provider } },
        context,
      );
    }

    if (this.isLocked(user, now) && user.lockedUntil) {
      return this.rejectResult(
        { kind: 'account_locked', lockedUntil: user.lockedUntil },
        { action, user, metadata: { provider } },
        context,
      );
    }

    return ok(await this.establishSession(user, context, now, provider));
  }

  private async fetchOAuthProfile(provider: OAuthProvider, code: string, context: RequestContext) {
    let reason: string;
    try {
      const accessToken = await this.providerClient.exchangeCode(provider, code);
      const profile = await this.providerClient.fetchProfile(provider, accessToken);
      if (profile.email) {
        return { ...profile, email: profile.email };
      }
      reason = 'provider returned no email address';
    } catch (error) {
      reason = error instanceof OAuthProviderError ? error.reason : 'unexpected provider error';
      if (!(error instanceof OAuthProviderError)) {
        this.logger.error({ err: error, provider }, 'oauth provider call threw');
      }
    }

    return this.failExternalSignIn(
      provider,
      reason,
      unauthorized('OAUTH_AUTHENTICATION_FAILED', 'OAuth authentication failed'),
      context,
    );
  }

  private async failExternalSignIn(
    provider: IdentityProvider,
    reason: string,
    error: ServiceError,
    context: RequestContext,
  ): Promise<never> {
    const action = provider === 'keycloak' ? 'auth.keycloak.failed' : 'auth.oauth.failed';

    await this.repository.createAuditEvent({
      action,
      actor: 'anonymous',
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
      metadata: { provider, reason },
    });
    this.logger.warn({ provider, reason }, `${provider} authentication failed`);

    throw error;
  }

  private async findOrCreateLinkedUser(
    provider: IdentityProvider,
    providerUserId: string,
    email: string,
    name: string | null,
  ): Promise<AuthUser> {
    const linked = await this.repository.findOAuthAccount(provider, providerUserId);
    if (linked) {
      const record = await this.repository.findUserById(linked.userId);
      if (record) {
        return stripPassword(record);
      }
    }

    const normalizedEmail = this.normalizeEmail(email);
    const existing = await this.repository.findUserByEmail(normalizedEmail);
    const user = existing
      ? stripPassword(existing)
      : await this.repository.createUser({
          email: normalizedEmail,
          passwordHash: null,
          fullName: this.normalizeOptionalString(name),
          isVerified: true,
        });

    if (!linked) {
      await this.repository.linkOAuthAccount({ userId: user.id, provider, providerUserId });
    }

    return user;
  }

  private async establishSession(
    user: AuthUser,
    context: RequestContext,
    now: Date,
    method: string,
  ): Promise<EstablishedSession> {
    await this.repository.recordSuccessfulLogin(user.id, now);

    const sessionId = crypto.randomUUID();
    const tokens = this.mintTokens(user, sessionId);
    await this.sessions.createSession(
      {
        sessionId,
        userId: user.id,
        refreshToken: tokens.refreshToken,
        expiresAt: tokens.refreshTokenExpiresAt,
      },
      context,
    );

    await this.repository.createAuditEvent({
      action: 'auth.login',
      actor: user.id,
      userId: user.id,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
      metadata: { method, sessionId },
    });
    this.logger.info({ userId: user.id, method }, 'login succeeded');

    return {
      user: { ...user, failedLoginAttempts: 0, lockedUntil: null, lastLoginAt: now },
      tokens,
      sessionId,
    };
  }

  private mintTokens(user: AuthUser, sessionId: string): AuthTokens {
    const refresh = this.tokens.issue(user.id, 'refresh', this.env.REFRESH_TOKEN_TTL_SECONDS, {
      sid: sessionId,
    });
    const access = this.tokens.issue(user.id, 'access', this.env.ACCESS_TOKEN_TTL_SECONDS, {
      email: user.email,
      sid: sessionId,
    });

    return {
      accessToken: access.token,
      accessTokenExpiresAt: access.expiresAt,
      refreshToken: refresh.token,
      refreshTokenExpiresAt: refresh.expiresAt,
    };
  }

  /** Counts a failed attempt. Resolves the lock expiry when this attempt crossed the threshold. */
  private async registerFailedAttempt(user: AuthUser, now: Date): Promise<Date | null> {
    const lockExpired = user.lockedUntil !== null && user.lockedUntil.getTime() <= now.getTime();
    const attempts = (lockExpired ? 0 : user.failedLoginAttempts) + 1;
    const lockedUntil =
      attempts >= this.env.MAX_LOGIN_ATTEMPTS
        ? new Date(now.getTime() + this.env.LOCKOUT_DURATION_MINUTES * 60 * 1000)
        : null;

    await this.repository.updateLockout(user.id, { failedLoginAttempts: attempts, lockedUntil });
    return lockedUntil;
  }

  private isLocked(user: Pick<AuthUser, 'lockedUntil'>, now: Date) {
    return user.lockedUntil !== null && user.lockedUntil.getTime() > now.getTime();
  }

  private async reject(
    failure: AuthFailure,
    audit: RejectionAudit,
    context: RequestContext,
  ): Promise<RejectedResult> {
    const details = describeFailure(failure);
    const userId = audit.user?.id ?? null;

    await this.repository.createAuditEvent({
      action: audit.action,
      actor: userId ?? 'anonymous',
      userId,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
      metadata: { ...audit.metadata, ...details, email: audit.email },
    });

    if (failure.kind === 'provider_mismatch') {
      this.logger.warn(
        { ...details, ...audit.metadata, security: true, ipAddress: context.ipAddress },
        'oauth provider mismatch, possible CSRF attempt',
      );
    } else {
      this.logger.info({ ...details, ...audit.metadata, userId }, audit.action);
    }

    return { type: 'rejected', failure };
  }

  private async rejectResult(
    failure: AuthFailure,
    audit: RejectionAudit,
    context: RequestContext,
  ): Promise<Result<never>> {
    await this.reject(failure, audit, context);
    return fail(failure);
  }

  private normalizeEmail(email: string) {
    return email.trim().toLowerCase();
  }

  private normalizeOptionalString(value: string | null | undefined) {
    if (value === undefined || value === null) {
      return null;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
}
