import type { ApiKeyRecord } from '../domain/models';

export interface CreateApiKeyInput {
  userId: string;
  name: string;
  keyHash: string;
  prefix: string;
  expiresAt: Date | null;
}

export interface ApiKeyRepository {
  create(input: CreateApiKeyInput): Promise<ApiKeyRecord>;
  findActiveByPrefix(prefix: string): Promise<ApiKeyRecord[]>;
  findOwned(id: string, userId: string): Promise<ApiKeyRecord | null>;
  listForUser(userId: string, includeInactive: boolean): Promise<ApiKeyRecord[]>;
  markUsed(id: string, when: Date): Promise<void>;
  deactivate(id: string): Promise<void>;
  delete(id: string): Promise<void>;
  deactivateExpired(now: Date): Promise<number>;
}
