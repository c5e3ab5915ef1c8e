import { and, desc, eq, isNotNull, lt } from 'drizzle-orm';

import type { Database } from '../db/client';
import { apiKeys } from '../db/schema';
import type { ApiKeyRecord } from '../domain/models';
import type { ApiKeyRepository, CreateApiKeyInput } from './api-key-repository';

function mapApiKey(row: typeof apiKeys.$inferSelect): ApiKeyRecord {
  return {
    id: row.id,
    userId: row.userId,
    name: row.name,
    keyHash: row.keyHash,
    prefix: row.prefix,
    isActive: row.isActive,
    lastUsedAt: row.lastUsedAt,
    expiresAt: row.expiresAt,
    createdAt: row.createdAt,
  };
}

export class DrizzleApiKeyRepository implements ApiKeyRepository {
  constructor(private readonly db: Database) {}

  async create(input: CreateApiKeyInput): Promise<ApiKeyRecord> {
    const [row] = await this.db.insert(apiKeys).values(input).returning();
    return mapApiKey(row);
  }

  async findActiveByPrefix(prefix: string): Promise<ApiKeyRecord[]> {
    const rows = await this.db
      .select()
      .from(apiKeys)
      .where(and(eq(apiKeys.prefix, prefix), eq(apiKeys.isActive, true)));
    return rows.map(mapApiKey);
  }

  async findOwned(id: string, userId: string): Promise<ApiKeyRecord | null> {
    const [row] = await this.db
      .select()
      .from(apiKeys)
      .where(and(eq(apiKeys.id, id), eq(apiKeys.userId, userId)))
      .limit(1);
    return row ? mapApiKey(row) : null;
  }

  async listForUser(userId: string, includeInactive: boolean): Promise<ApiKeyRecord[]> {
    const rows = await this.db
      .select()
      .from(apiKeys)
      .where(
        and(eq(apiKeys.userId, userId), includeInactive ? undefined : eq(apiKeys.isActive, true)),
      )
      .orderBy(desc(apiKeys.createdAt));
    return rows.map(mapApiKey);
  }

  async markUsed(id: string, when: Date): Promise<void> {
    await this.db.update(apiKeys).set({ lastUsedAt: when }).where(eq(apiKeys.id, id));
  }

  async deactivate(id: string): Promise<void> {
    await this.db.update(apiKeys).set({ isActive: false }).where(eq(apiKeys.id, id));
  }

  async delete(id: string): Promise<void> {
    await this.db.delete(apiKeys).where(eq(apiKeys.id, id));
  }

  async deactivateExpired(now: Date): Promise<number> {
    const rows = await this.db
      .update(apiKeys)
      .set({ isActive: false })
      .where(
        and(eq(apiKeys.isActive, true), isNotNull(apiKeys.expiresAt), lt(apiKeys.expiresAt, now)),
      )
      .returning({ id: apiKeys.id });
    return rows.length;
  }
}
