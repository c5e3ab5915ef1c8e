import type { FastifyBaseLogger } from 'fastify';

export type OAuthProvider = 'google' | 'github' | 'microsoft';
/** Providers an account can be linked to: the OAuth redirect providers plus Keycloak. */
export type IdentityProvider = OAuthProvider | 'keycloak';
export type DeviceType = 'mobile' | 'tablet' | 'desktop';

export interface AuthUser {
  id: string;
  email: string;
  fullName: string | null;
  isActive: boolean;
  isVerified: boolean;
  isSuperuser: boolean;
  failedLoginAttempts: number;
  lockedUntil: Date | null;
  lastLoginAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface AuthUserWithSecrets extends AuthUser {
  /** Null for accounts created through an OAuth provider. */
  passwordHash: string | null;
}

export interface TotpConfiguration {
  id: string;
  userId: string;
  secretEncrypted: string;
  backupCodeHashes: string[];
  isEnabled: boolean;
  deviceName: string | null;
  enabledAt: Date | null;
  lastUsedAt: Date | null;
  createdAt: Date;
}

export interface ApiKeyRecord {
  id: string;
  userId: string;
  name: string;
  keyHash: string;
  prefix: string;
  isActive: boolean;
  lastUsedAt: Date | null;
  expiresAt: Date | null;
  createdAt: Date;
}

export interface SessionRecord {
  id: string;
  userId: string;
  tokenHash: string;
  ipAddress: string | null;
  userAgent: string | null;
  deviceType: DeviceType | null;
  isActive: boolean;
  revokedAt: Date | null;
  lastActivityAt: Date;
  expiresAt: Date;
  createdAt: Date;
}

export interface OAuthAccountRecord {
  id: string;
  userId: string;
  provider: IdentityProvider;
  providerUserId: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface AuditEventInput {
  action: string;
  actor: string;
  userId?: string | null;
  ipAddress?: string | null;
  userAgent?: string | null;
  metadata?: Record<string, unknown> | null;
}

export interface RequestContext {
  ipAddress?: string | null;
  userAgent?: string | null;
}

export interface AuthTokens {
  accessToken: string;
  accessTokenExpiresAt: Date;
  refreshToken: string;
  refreshTokenExpiresAt: Date;
}

/** The slice of Fastify's pino logger the services write to. */
export type ServiceLogger = Pick<FastifyBaseLogger, 'info' | 'warn' | 'error'>;
