import { z } from 'zod';

import type { CredentialCipher } from '../crypto/credential-cipher.js';
import { accountInactive, apiKeyInvalid, apiKeyInvalidFormat } from '../errors/auth-errors.js';
import type { Logger } from '../logging/logger.js';
import type { ApiKeyRecord, ApiKeyRepository } from '../repositories/api-key-repository.js';
import type { AuthUser, UserRepository } from '../repositories/user-repository.js';

const API_KEY_SEPARATOR = '.';

const apiKeyIdSchema = z.string().uuid();

export interface CreateApiKeyResult {
  /** Composite `publicKey.rawKey`; only ever returned here. */
  apiKey: string;
  keyId: string;
  publicKey: string;
  name: string;
}

export interface ApiKeySummary {
  keyId: string;
  publicKey: string;
  name: string;
  createdAt: Date;
  updatedAt: Date;
}

function toSummary(record: ApiKeyRecord): ApiKeySummary {
  return {
    keyId: record.id,
    publicKey: record.publicKey,
    name: record.name,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt
  };
}

function splitApiKey(apiKey: string): { publicKey: string; rawKey: string } | null {
  const separator = apiKey.indexOf(API_KEY_SEPARATOR);
  if (separator <= 0 || separator === apiKey.length - 1) {
    return null;
  }

  return {
    publicKey: apiKey.slice(0, separator),
    rawKey: apiKey.slice(separator + 1)
  };
}

export class ApiKeyService {
  public constructor(
    private readonly apiKeyRepository: ApiKeyRepository,
    private readonly userRepository: UserRepository,
    private readonly cipher: CredentialCipher,
    private readonly logger: Logger
  ) {}

  public async issue(userId: string, name?: string): Promise<CreateApiKeyResult> {
    const { publicKey, rawKey } = this.cipher.generateApiKey();
    const hashedKey = await this.cipher.hashApiKey(rawKey);
    const normalizedName = name?.trim() ?? '';

    const record = await this.apiKeyRepository.createApiKey({
      userId,
      publicKey,
      hashedKey,
      name: normalizedName
    });

    this.logger.info({ userId, keyId: record.id, publicKey }, 'api_key_created');

    return {
      apiKey: `${publicKey}${API_KEY_SEPARATOR}${rawKey}`,
      keyId: record.id,
      publicKey,
      name: normalizedName
    };
  }

  public async verify(apiKey: string): Promise<AuthUser> {
    const parts = splitApiKey(apiKey);
    if (parts === null) {
      throw apiKeyInvalidFormat();
    }

    const record = await this.apiKeyRepository.findApiKeyByPublicKey(parts.publicKey);
    if (record === null) {
      throw apiKeyInvalid();
    }

    const matches = await this.cipher.verifyApiKey(parts.rawKey, record.hashedKey);
    if (!matches) {
      throw apiKeyInvalid();
    }

    const user = await this.userRepository.findUserById(record.userId);
    if (user === null) {
      throw apiKeyInvalid();
    }

    if (!user.isActive) {
      throw accountInactive();
    }

    return user;
  }

  public async list(userId: string): Promise<ApiKeySummary[]> {
    const records = await this.apiKeyRepository.listApiKeys(userId);
    return records.map(toSummary);
  }

  public async rename(userId: string, keyId: string, newName: string): Promise<boolean> {
    if (!apiKeyIdSchema.safeParse(keyId).success) {
      return false;
    }

    return this.apiKeyRepository.renameApiKey({
      userId,
      apiKeyId: keyId,
      name: newName.trim()
    });
  }

  public async delete(userId: string, keyId: string): Promise<boolean> {
    if (!apiKeyIdSchema.safeParse(keyId).success) {
      return false;
    }

    const deleted = await this.apiKeyRepository.deleteApiKey({ userId, apiKeyId: keyId });
    if (deleted) {
      this.logger.info({ userId, keyId }, 'api_key_deleted');
    }

    return deleted;
  }
}
