import { randomUUID } from 'node:crypto';

import type {
  AuthRepository,
  CreateSessionInput,
  CreateUserInput,
  LinkOAuthAccountInput,
  LockoutUpdate,
  SaveTotpInput,
  UpdateTotpInput,
} from '../src/repositories/auth-repository';
import type {
  AuditEventInput,
  AuthUser,
  AuthUserWithSecrets,
  IdentityProvider,
  OAuthAccountRecord,
  SessionRecord,
  TotpConfiguration,
} from '../src/domain/models';

export class InMemoryAuthRepository implements AuthRepository {
  readonly auditEvents: AuditEventInput[] = [];

  private users = new Map<string, AuthUserWithSecrets>();

  private totp = new Map<string, TotpConfiguration>();

  private sessions = new Map<string, SessionRecord>();

  private oauthAccounts: OAuthAccountRecord[] = [];

  async createUser(input: CreateUserInput): Promise<AuthUser> {
    const now = new Date();
    const user: AuthUserWithSecrets = {
      id: randomUUID(),
      email: input.email,
      fullName: input.fullName ?? null,
      isActive: true,
      isVerified: input.isVerified ?? false,
      isSuperuser: false,
      failedLoginAttempts: 0,
      lockedUntil: null,
      lastLoginAt: null,
      createdAt: now,
      updatedAt: now,
      passwordHash: input.passwordHash,
    };

    this.users.set(user.id, user);
    const { passwordHash: _passwordHash, ...publicUser } = user;
    return { ...publicUser };
  }

  async findUserByEmail(email: string): Promise<AuthUserWithSecrets | null> {
    for (const user of this.users.values()) {
      if (user.email === email) {
        return { ...user };
      }
    }
    return null;
  }

  async findUserById(id: string): Promise<AuthUserWithSecrets | null> {
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }

  async updateLockout(userId: string, update: LockoutUpdate): Promise<void> {
    this.patchUser(userId, update);
  }

  async recordSuccessfulLogin(userId: string, when: Date): Promise<void> {
    this.patchUser(userId, { failedLoginAttempts: 0, lockedUntil: null, lastLoginAt: when });
  }

  /** Test-only: flips account flags that have no service operation. */
  patchUser(userId: string, patch: Partial<AuthUserWithSecrets>) {
    const user = this.users.get(userId);
    if (!user) {
      throw new Error(`Unknown user ${userId}`);
    }
    this.users.set(userId, { ...user, ...patch, updatedAt: new Date() });
  }

  async getTotpConfiguration(userId: string): Promise<TotpConfiguration | null> {
    const config = this.totp.get(userId);
    return config ? { ...config, backupCodeHashes: [...config.backupCodeHashes] } : null;
  }

  async saveTotpConfiguration(input: SaveTotpInput): Promise<TotpConfiguration> {
    const config: TotpConfiguration = {
      id: this.totp.get(input.userId)?.id ?? randomUUID(),
      userId: input.userId,
      secretEncrypted: input.secretEncrypted,
      backupCodeHashes: [...input.backupCodeHashes],
      isEnabled: input.isEnabled,
      deviceName: input.deviceName ?? null,
      enabledAt: input.enabledAt ?? null,
      lastUsedAt: null,
      createdAt: new Date(),
    };
    this.totp.set(input.userId, config);
    return { ...config };
  }

  async updateTotpConfiguration(
    userId: string,
    input: UpdateTotpInput,
  ): Promise<TotpConfiguration> {
    const config = this.totp.get(userId);
    if (!config) {
      throw new Error(`TOTP configuration missing for user ${userId}`);
    }
    const updated: TotpConfiguration = {
      ...config,
      isEnabled: input.isEnabled ?? config.isEnabled,
      enabledAt: input.enabledAt !== undefined ? input.enabledAt : config.enabledAt,
      backupCodeHashes: input.backupCodeHashes
        ? [...input.backupCodeHashes]
        : config.backupCodeHashes,
      lastUsedAt: input.lastUsedAt !== undefined ? input.lastUsedAt : config.lastUsedAt,
    };
    this.totp.set(userId, updated);
    return { ...updated };
  }

  async removeBackupCode(userId: string, codeHash: string, usedAt: Date): Promise<boolean> {
    const config = this.totp.get(userId);
    if (!config || !config.backupCodeHashes.includes(codeHash)) {
      return false;
    }
    this.totp.set(userId, {
      ...config,
      backupCodeHashes: config.backupCodeHashes.filter((hash) => hash !== codeHash),
      lastUsedAt: usedAt,
    });
    return true;
  }

  async deleteTotpConfiguration(userId: string): Promise<void> {
    this.totp.delete(userId);
  }

  async createSession(input: CreateSessionInput): Promise<SessionRecord> {
    const now = new Date();
    const session: SessionRecord = {
      id: input.id,
      userId: input.userId,
      tokenHash: input.tokenHash,
      ipAddress: input.ipAddress ?? null,
      userAgent: input.userAgent ?? null,
      deviceType: input.deviceType ?? null,
      isActive: true,
      revokedAt: null,
      lastActivityAt: now,
      expiresAt: input.expiresAt,
      createdAt: now,
    };
    this.sessions.set(session.id, session);
    return { ...session };
  }

  async findSessionById(id: string): Promise<SessionRecord | null> {
    const session = this.sessions.get(id);
    return session ? { ...session } : null;
  }

  async listSessions(userId: string): Promise<SessionRecord[]> {
    return [...this.sessions.values()]
      .filter((session) => session.userId === userId && session.isActive)
      .map((session) => ({ ...session }));
  }

  async countSessions(userId: string): Promise<number> {
    return [...this.sessions.values()].filter((session) => session.userId === userId).length;
  }

  async rotateSessionToken(
    id: string,
    previousHash: string,
    nextHash: string,
    expiresAt: Date,
    when: Date,
  ): Promise<boolean> {
    const session = this.sessions.get(id);
    if (!session || !session.isActive || session.tokenHash !== previousHash) {
      return false;
    }
    this.sessions.set(id, { ...session, tokenHash: nextHash, expiresAt, lastActivityAt: when });
    return true;
  }

  async revokeSession(id: string, when: Date): Promise<void> {
    const session = this.sessions.get(id);
    if (session) {
      this.sessions.set(id, { ...session, isActive: false, revokedAt: when });
    }
  }

  async revokeSessionsForUser(
    userId: string,
    when: Date,
    exceptSessionId?: string,
  ): Promise<number> {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (session.userId === userId && session.isActive && session.id !== exceptSessionId) {
        this.sessions.set(session.id, { ...session, isActive: false, revokedAt: when });
        count += 1;
      }
    }
    return count;
  }

  async findOAuthAccount(
    provider: IdentityProvider,
    providerUserId: string,
  ): Promise<OAuthAccountRecord | null> {
    const account = this.oauthAccounts.find(
      (entry) => entry.provider === provider && entry.providerUserId === providerUserId,
    );
    return account ? { ...account } : null;
  }

  async linkOAuthAccount(input: LinkOAuthAccountInput): Promise<OAuthAccountRecord> {
    const now = new Date();
    const account: OAuthAccountRecord = { id: randomUUID(), ...input, createdAt: now, updatedAt: now };
    this.oauthAccounts.push(account);
    return { ...account };
  }

  async createAuditEvent(event: AuditEventInput): Promise<void> {
    this.auditEvents.push(event);
  }

  auditActions() {
    return this.auditEvents.map((event) => event.action);
  }
}
