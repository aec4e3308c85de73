import { randomUUID } from 'node:crypto';

import type {
  ApiKeyAuthRecord,
  ApiKeyRecord,
  ApiKeyRepository,
  CreateApiKeyInput,
  DeleteApiKeyInput,
  RenameApiKeyInput
} from './api-key-repository.js';

interface ApiKeyInternalRecord extends ApiKeyAuthRecord {
  sequence: number;
}

function cloneApiKey(record: ApiKeyInternalRecord): ApiKeyRecord {
  return {
    id: record.id,
    userId: record.userId,
    publicKey: record.publicKey,
    name: record.name,
    createdAt: new Date(record.createdAt),
    updatedAt: new Date(record.updatedAt)
  };
}

export class InMemoryApiKeyRepository implements ApiKeyRepository {
  private readonly apiKeysById = new Map<string, ApiKeyInternalRecord>();

  private readonly apiKeyIdsByPublicKey = new Map<string, string>();

  private sequence = 0;

  public createApiKey(input: CreateApiKeyInput): Promise<ApiKeyRecord> {
    if (this.apiKeyIdsByPublicKey.has(input.publicKey)) {
      return Promise.reject(new Error('API key public id already exists.'));
    }

    this.sequence += 1;
    const now = new Date();
    const record: ApiKeyInternalRecord = {
      id: randomUUID(),
      userId: input.userId,
      publicKey: input.publicKey,
      hashedKey: input.hashedKey,
      name: input.name,
      createdAt: now,
      updatedAt: now,
      sequence: this.sequence
    };

    this.apiKeysById.set(record.id, record);
    this.apiKeyIdsByPublicKey.set(record.publicKey, record.id);
    return Promise.resolve(cloneApiKey(record));
  }

  public findApiKeyByPublicKey(publicKey: string): Promise<ApiKeyAuthRecord | null> {
    const apiKeyId = this.apiKeyIdsByPublicKey.get(publicKey);
    const record = apiKeyId === undefined ? undefined : this.apiKeysById.get(apiKeyId);
    if (record === undefined) {
      return Promise.resolve(null);
    }

    return Promise.resolve({
      ...cloneApiKey(record),
      hashedKey: record.hashedKey
    });
  }

  public listApiKeys(userId: string): Promise<ApiKeyRecord[]> {
    const records = Array.from(this.apiKeysById.values())
      .filter((record) => record.userId === userId)
      .sort((left, right) => right.createdAt.getTime() - left.createdAt.getTime() || right.sequence - left.sequence)
      .map(cloneApiKey);

    return Promise.resolve(records);
  }

  public renameApiKey(input: RenameApiKeyInput): Promise<boolean> {
    const record = this.apiKeysById.get(input.apiKeyId);
    if (record === undefined || record.userId !== input.userId) {
      return Promise.resolve(false);
    }

    record.name = input.name;
    record.updatedAt = new Date();
    return Promise.resolve(true);
  }

  public deleteApiKey(input: DeleteApiKeyInput): Promise<boolean> {
    const record = this.apiKeysById.get(input.apiKeyId);
    if (record === undefined || record.userId !== input.userId) {
      return Promise.resolve(false);
    }

    this.apiKeysById.delete(record.id);
    this.apiKeyIdsByPublicKey.delete(record.publicKey);
    return Promise.resolve(true);
  }
}
