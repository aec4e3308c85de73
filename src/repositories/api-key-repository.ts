export interface ApiKeyRecord {
  id: string;
  userId: string;
  publicKey: string;
  name: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface ApiKeyAuthRecord extends ApiKeyRecord {
  hashedKey: string;
}

export interface CreateApiKeyInput {
  userId: string;
  publicKey: string;
  hashedKey: string;
  name: string;
}

export interface RenameApiKeyInput {
  userId: string;
  apiKeyId: string;
  name: string;
}

export interface DeleteApiKeyInput {
  userId: string;
  apiKeyId: string;
}

/**
 * Rename and delete only match keys owned by `userId`; a key that exists but
 * belongs to another user yields `false` exactly like a missing key.
 */
export interface ApiKeyRepository {
  createApiKey(input: CreateApiKeyInput): Promise<ApiKeyRecord>;
  findApiKeyByPublicKey(publicKey: string): Promise<ApiKeyAuthRecord | null>;
  listApiKeys(userId: string): Promise<ApiKeyRecord[]>;
  renameApiKey(input: RenameApiKeyInput): Promise<boolean>;
  deleteApiKey(input: DeleteApiKeyInput): Promise<boolean>;
}
