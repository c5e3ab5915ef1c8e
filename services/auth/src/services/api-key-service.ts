import crypto from 'node:crypto';

import type { ApiKeyRecord, AuthUser, RequestContext } from '../domain/models';
import { hashSecret, verifySecret } from '../lib/passwords';
import type { ApiKeyRepository } from '../repositories/api-key-repository';
import type { AuthRepository } from '../repositories/auth-repository';

const RAW_KEY_BYTES = 32;
export const API_KEY_PREFIX_LENGTH = 8;

/** Key metadata safe to return to clients: no hash, no raw secret. */
export type ApiKeySummary = Omit<ApiKeyRecord, 'keyHash'>;

export interface CreatedApiKey {
  apiKey: ApiKeySummary;
  /** Only ever returned here. */
  rawKey: string;
}

export interface ApiKeyServiceDependencies {
  apiKeys: ApiKeyRepository;
  repository: AuthRepository;
}

export function toApiKeySummary(record: ApiKeyRecord): ApiKeySummary {
  const { keyHash: _keyHash, ...summary } = record;
  return summary;
}

export class ApiKeyService {
  private readonly apiKeys: ApiKeyRepository;

  private readonly repository: AuthRepository;

  constructor(dependencies: ApiKeyServiceDependencies) {
    this.apiKeys = dependencies.apiKeys;
    this.repository = dependencies.repository;
  }

  async create(
    userId: string,
    name: string,
    expiresInDays: number | null,
    context: RequestContext = {},
  ): Promise<CreatedApiKey> {
    const rawKey = crypto.randomBytes(RAW_KEY_BYTES).toString('base64url');
    const expiresAt =
      expiresInDays === null ? null : new Date(Date.now() + expiresInDays * 24 * 60 * 60 * 1000);

    const record = await this.apiKeys.create({
      userId,
      name,
      keyHash: await hashSecret(rawKey),
      prefix: rawKey.slice(0, API_KEY_PREFIX_LENGTH),
      expiresAt,
    });

    await this.repository.createAuditEvent({
      action: 'api_key.created',
      actor: userId,
      userId,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
      metadata: { apiKeyId: record.id, name, expiresAt: expiresAt?.toISOString() ?? null },
    });

    return { apiKey: toApiKeySummary(record), rawKey };
  }

  /**
   * Resolves a raw key to its record. Inactive, expired and unknown keys all
   * resolve to null.
   */
  async verify(rawKey: string): Promise<ApiKeyRecord | null> {
    if (rawKey.length < API_KEY_PREFIX_LENGTH) {
      return null;
    }

    const candidates = await this.apiKeys.findActiveByPrefix(rawKey.slice(0, API_KEY_PREFIX_LENGTH));
    const now = new Date();

    for (const candidate of candidates) {
      if (!(await verifySecret(candidate.keyHash, rawKey))) {
        continue;
      }

      if (candidate.expiresAt && candidate.expiresAt.getTime() <= now.getTime()) {
        return null;
      }

      await this.apiKeys.markUsed(candidate.id, now);
      return { ...candidate, lastUsedAt: now };
    }

    return null;
  }

  /** Resolves the key's owner. Every refusal is audited under the key's prefix. */
  async getUserFromApiKey(rawKey: string, context: RequestContext = {}): Promise<AuthUser | null> {
    const record = await this.verify(rawKey);
    if (!record) {
      await this.recordRejection(rawKey, null, 'invalid_or_expired', context);
      return null;
    }

    const user = await this.repository.findUserById(record.userId);
    if (!user || !user.isActive) {
      await this.recordRejection(rawKey, record.userId, 'owner_unavailable', context);
      return null;
    }

    const { passwordHash: _passwordHash, ...rest } = user;
    return rest;
  }

  async list(userId: string, includeInactive = false): Promise<ApiKeySummary[]> {
    const records = await this.apiKeys.listForUser(userId, includeInactive);
    return records.map(toApiKeySummary);
  }

  async get(keyId: string, userId: string): Promise<ApiKeySummary | null> {
    const record = await this.apiKeys.findOwned(keyId, userId);
    return record ? toApiKeySummary(record) : null;
  }

  async revoke(keyId: string, userId: string, context: RequestContext = {}): Promise<boolean> {
    const record = await this.apiKeys.findOwned(keyId, userId);
    if (!record) {
      return false;
    }

    if (record.isActive) {
      await this.apiKeys.deactivate(record.id);
      await this.repository.createAuditEvent({
        action: 'api_key.revoked',
        actor: userId,
        userId,
        ipAddress: context.ipAddress,
        userAgent: context.userAgent,
        metadata: { apiKeyId: record.id },
      });
    }

    return true;
  }

  async delete(keyId: string, userId: string, context: RequestContext = {}): Promise<boolean> {
    const record = await this.apiKeys.findOwned(keyId, userId);
    if (!record) {
      return false;
    }

    await this.apiKeys.delete(record.id);
    await this.repository.createAuditEvent({
      action: 'api_key.deleted',
      actor: userId,
      userId,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
      metadata: { apiKeyId: record.id },
    });

    return true;
  }

  async cleanupExpired(): Promise<number> {
    return this.apiKeys.deactivateExpired(new Date());
  }

  private async recordRejection(
    rawKey: string,
    userId: string | null,
    reason: string,
    context: RequestContext,
  ) {
    await this.repository.createAuditEvent({
      action: 'api_key.rejected',
      actor: userId ?? 'anonymous',
      userId,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
      metadata: { prefix: rawKey.slice(0, API_KEY_PREFIX_LENGTH), reason },
    });
  }
}
