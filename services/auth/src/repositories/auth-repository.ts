import type {
  AuditEventInput,
  AuthUser,
  AuthUserWithSecrets,
  DeviceType,
  IdentityProvider,
  OAuthAccountRecord,
  SessionRecord,
  TotpConfiguration,
} from '../domain/models';

export interface CreateUserInput {
  email: string;
  passwordHash: string | null;
  fullName?: string | null;
  isVerified?: boolean;
}

export interface LockoutUpdate {
  failedLoginAttempts: number;
  lockedUntil: Date | null;
}

export interface SaveTotpInput {
  userId: string;
  secretEncrypted: string;
  backupCodeHashes: string[];
  isEnabled: boolean;
  deviceName?: string | null;
  enabledAt?: Date | null;
}

export interface UpdateTotpInput {
  isEnabled?: boolean;
  enabledAt?: Date | null;
  backupCodeHashes?: string[];
  lastUsedAt?: Date | null;
}

export interface CreateSessionInput {
  id: string;
  userId: string;
  tokenHash: string;
  ipAddress?: string | null;
  userAgent?: string | null;
  deviceType?: DeviceType | null;
  expiresAt: Date;
}

export interface LinkOAuthAccountInput {
  userId: string;
  provider: IdentityProvider;
  providerUserId: string;
}

/**
 * Credential store: users, lockout counters, TOTP material, sessions and
 * OAuth links. Each method is a single commit.
 */
export interface AuthRepository {
  createUser(input: CreateUserInput): Promise<AuthUser>;
  findUserByEmail(email: string): Promise<AuthUserWithSecrets | null>;
  findUserById(id: string): Promise<AuthUserWithSecrets | null>;
  updateLockout(userId: string, update: LockoutUpdate): Promise<void>;
  recordSuccessfulLogin(userId: string, when: Date): Promise<void>;

  getTotpConfiguration(userId: string): Promise<TotpConfiguration | null>;
  saveTotpConfiguration(input: SaveTotpInput): Promise<TotpConfiguration>;
  updateTotpConfiguration(userId: string, input: UpdateTotpInput): Promise<TotpConfiguration>;
  /**
   * Removes `codeHash` from the remaining backup codes. Resolves false when the
   * hash was already gone, so two concurrent uses of one code cannot both win.
   */
  removeBackupCode(userId: string, codeHash: string, usedAt: Date): Promise<boolean>;
  deleteTotpConfiguration(userId: string): Promise<void>;

  createSession(input: CreateSessionInput): Promise<SessionRecord>;
  findSessionById(id: string): Promise<SessionRecord | null>;
  listSessions(userId: string): Promise<SessionRecord[]>;
  /** Counts every session the user ever opened, revoked and expired ones included. */
  countSessions(userId: string): Promise<number>;
  /**
   * Swaps the stored refresh-token digest only while it still equals
   * `previousHash` and the session is active. Resolves false when another
   * rotation got there first.
   */
  rotateSessionToken(
    id: string,
    previousHash: string,
    nextHash: string,
    expiresAt: Date,
    when: Date,
  ): Promise<boolean>;
  revokeSession(id: string, when: Date): Promise<void>;
  revokeSessionsForUser(userId: string, when: Date, exceptSessionId?: string): Promise<number>;

  findOAuthAccount(
    provider: IdentityProvider,
    providerUserId: string,
  ): Promise<OAuthAccountRecord | null>;
  linkOAuthAccount(input: LinkOAuthAccountInput): Promise<OAuthAccountRecord>;

  createAuditEvent(event: AuditEventInput): Promise<void>;
}
