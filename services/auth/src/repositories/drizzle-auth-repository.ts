import { and, count, desc, eq, ne, sql } from 'drizzle-orm';

import type { Database } from '../db/client';
import { auditEvents, oauthAccounts, totpSecrets, userSessions, users } from '../db/schema';
import type {
  AuditEventInput,
  AuthUser,
  AuthUserWithSecrets,
  IdentityProvider,
  OAuthAccountRecord,
  SessionRecord,
  TotpConfiguration,
} from '../domain/models';
import type {
  AuthRepository,
  CreateSessionInput,
  CreateUserInput,
  LinkOAuthAccountInput,
  LockoutUpdate,
  SaveTotpInput,
  UpdateTotpInput,
} from './auth-repository';

type UserRow = typeof users.$inferSelect;
type TotpRow = typeof totpSecrets.$inferSelect;
type SessionRow = typeof userSessions.$inferSelect;
type OAuthAccountRow = typeof oauthAccounts.$inferSelect;

function mapUser(row: UserRow): AuthUser {
  return {
    id: row.id,
    email: row.email,
    fullName: row.fullName,
    isActive: row.isActive,
    isVerified: row.isVerified,
    isSuperuser: row.isSuperuser,
    failedLoginAttempts: row.failedLoginAttempts,
    lockedUntil: row.lockedUntil,
    lastLoginAt: row.lastLoginAt,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function mapUserWithSecrets(row: UserRow): AuthUserWithSecrets {
  return { ...mapUser(row), passwordHash: row.passwordHash };
}

function mapTotp(row: TotpRow): TotpConfiguration {
  return {
    id: row.id,
    userId: row.userId,
    secretEncrypted: row.secretEncrypted,
    backupCodeHashes: row.backupCodeHashes,
    isEnabled: row.isEnabled,
    deviceName: row.deviceName,
    enabledAt: row.enabledAt,
    lastUsedAt: row.lastUsedAt,
    createdAt: row.createdAt,
  };
}

function mapSession(row: SessionRow): SessionRecord {
  return {
    id: row.id,
    userId: row.userId,
    tokenHash: row.tokenHash,
    ipAddress: row.ipAddress,
    userAgent: row.userAgent,
    deviceType: row.deviceType,
    isActive: row.isActive,
    revokedAt: row.revokedAt,
    lastActivityAt: row.lastActivityAt,
    expiresAt: row.expiresAt,
    createdAt: row.createdAt,
  };
}

function mapOAuthAccount(row: OAuthAccountRow): OAuthAccountRecord {
  return {
    id: row.id,
    userId: row.userId,
    provider: row.provider,
    providerUserId: row.providerUserId,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export class DrizzleAuthRepository implements AuthRepository {
  constructor(private readonly db: Database) {}

  async createUser(input: CreateUserInput): Promise<AuthUser> {
    const [row] = await this.db
      .insert(users)
      .values({
        email: input.email,
        passwordHash: input.passwordHash,
        fullName: input.fullName ?? null,
        isVerified: input.isVerified ?? false,
      })
      .returning();

    return mapUser(row);
  }

  async findUserByEmail(email: string): Promise<AuthUserWithSecrets | null> {
    const [row] = await this.db.select().from(users).where(eq(users.email, email)).limit(1);
    return row ? mapUserWithSecrets(row) : null;
  }

  async findUserById(id: string): Promise<AuthUserWithSecrets | null> {
    const [row] = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
    return row ? mapUserWithSecrets(row) : null;
  }

  async updateLockout(userId: string, update: LockoutUpdate): Promise<void> {
    await this.db
      .update(users)
      .set({
        failedLoginAttempts: update.failedLoginAttempts,
        lockedUntil: update.lockedUntil,
        updatedAt: new Date(),
      })
      .where(eq(users.id, userId));
  }

  async recordSuccessfulLogin(userId: string, when: Date): Promise<void> {
    await this.db
      .update(users)
      .set({ failedLoginAttempts: 0, lockedUntil: null, lastLoginAt: when, updatedAt: when })
      .where(eq(users.id, userId));
  }

  async getTotpConfiguration(userId: string): Promise<TotpConfiguration | null> {
    const [row] = await this.db
      .select()
      .from(totpSecrets)
      .where(eq(totpSecrets.userId, userId))
      .limit(1);
    return row ? mapTotp(row) : null;
  }

  async saveTotpConfiguration(input: SaveTotpInput): Promise<TotpConfiguration> {
    const values = {
      secretEncrypted: input.secretEncrypted,
      backupCodeHashes: input.backupCodeHashes,
      isEnabled: input.isEnabled,
      deviceName: input.deviceName ?? null,
      enabledAt: input.enabledAt ?? null,
      lastUsedAt: null,
    };

    const [row] = await this.db
      .insert(totpSecrets)
      .values({ userId: input.userId, ...values })
      .onConflictDoUpdate({ target: totpSecrets.userId, set: values })
      .returning();

    return mapTotp(row);
  }

  async updateTotpConfiguration(
    userId: string,
    input: UpdateTotpInput,
  ): Promise<TotpConfiguration> {
    const [row] = await this.db
      .update(totpSecrets)
      .set(input)
      .where(eq(totpSecrets.userId, userId))
      .returning();

    if (!row) {
      throw new Error(`TOTP configuration missing for user ${userId}`);
    }

    return mapTotp(row);
  }

  async removeBackupCode(userId: string, codeHash: string, usedAt: Date): Promise<boolean> {
    const rows = await this.db
      .update(totpSecrets)
      .set({
        backupCodeHashes: sql`array_remove(${totpSecrets.backupCodeHashes}, ${codeHash})`,
        lastUsedAt: usedAt,
      })
      .where(
        and(
          eq(totpSecrets.userId, userId),
          sql`${codeHash} = any(${totpSecrets.backupCodeHashes})`,
        ),
      )
      .returning({ id: totpSecrets.id });

    return rows.length > 0;
  }

  async deleteTotpConfiguration(userId: string): Promise<void> {
    await this.db.delete(totpSecrets).where(eq(totpSecrets.userId, userId));
  }

  async createSession(input: CreateSessionInput): Promise<SessionRecord> {
    const [row] = await this.db
      .insert(userSessions)
      .values({
        id: input.id,
        userId: input.userId,
        tokenHash: input.tokenHash,
        ipAddress: input.ipAddress ?? null,
        userAgent: input.userAgent ?? null,
        deviceType: input.deviceType ?? null,
        expiresAt: input.expiresAt,
      })
      .returning();

    return mapSession(row);
  }

  async findSessionById(id: string): Promise<SessionRecord | null> {
    const [row] = await this.db
      .select()
      .from(userSessions)
      .where(eq(userSessions.id, id))
      .limit(1);
    return row ? mapSession(row) : null;
  }

  async listSessions(userId: string): Promise<SessionRecord[]> {
    const rows = await this.db
      .select()
      .from(userSessions)
      .where(and(eq(userSessions.userId, userId), eq(userSessions.isActive, true)))
      .orderBy(desc(userSessions.lastActivityAt));
    return rows.map(mapSession);
  }

  async countSessions(userId: string): Promise<number> {
    const [row] = await this.db
      .select({ total: count() })
      .from(userSessions)
      .where(eq(userSessions.userId, userId));
    return row?.total ?? 0;
  }

  async rotateSessionToken(
    id: string,
    previousHash: string,
    nextHash: string,
    expiresAt: Date,
    when: Date,
  ): Promise<boolean> {
    const rows = await this.db
      .update(userSessions)
      .set({ tokenHash: nextHash, expiresAt, lastActivityAt: when })
      .where(
        and(
          eq(userSessions.id, id),
          eq(userSessions.tokenHash, previousHash),
          eq(userSessions.isActive, true),
        ),
      )
      .returning({ id: userSessions.id });

    return rows.length > 0;
  }

  async revokeSession(id: string, when: Date): Promise<void> {
    await this.db
      .update(userSessions)
      .set({ isActive: false, revokedAt: when })
      .where(eq(userSessions.id, id));
  }

  async revokeSessionsForUser(
    userId: string,
    when: Date,
    exceptSessionId?: string,
  ): Promise<number> {
    const rows = await this.db
      .update(userSessions)
      .set({ isActive: false, revokedAt: when })
      .where(
        and(
          eq(userSessions.userId, userId),
          eq(userSessions.isActive, true),
          exceptSessionId ? ne(userSessions.id, exceptSessionId) : undefined,
        ),
      )
      .returning({ id: userSessions.id });

    return rows.length;
  }

  async findOAuthAccount(
    provider: IdentityProvider,
    providerUserId: string,
  ): Promise<OAuthAccountRecord | null> {
    const [row] = await this.db
      .select()
      .from(oauthAccounts)
      .where(
        and(eq(oauthAccounts.provider, provider), eq(oauthAccounts.providerUserId, providerUserId)),
      )
      .limit(1);
    return row ? mapOAuthAccount(row) : null;
  }

  async linkOAuthAccount(input: LinkOAuthAccountInput): Promise<OAuthAccountRecord> {
    const [row] = await this.db
      .insert(oauthAccounts)
      .values({
        userId: input.userId,
        provider: input.provider,
        providerUserId: input.providerUserId,
      })
      .returning();

    return mapOAuthAccount(row);
  }

  async createAuditEvent(event: AuditEventInput): Promise<void> {
    await this.db.insert(auditEvents).values({
      action: event.action,
      actor: event.actor,
      userId: event.userId ?? null,
      ipAddress: event.ipAddress ?? null,
      userAgent: event.userAgent ?? null,
      metadata: event.metadata ?? null,
    });
  }
}
