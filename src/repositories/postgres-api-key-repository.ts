import { randomUUID } from 'node:crypto';

import type { Pool } from 'pg';

import type {
  ApiKeyAuthRecord,
  ApiKeyRecord,
  ApiKeyRepository,
  CreateApiKeyInput,
  DeleteApiKeyInput,
  RenameApiKeyInput
} from './api-key-repository.js';
import { getSingleRow } from './postgres-helpers.js';

interface ApiKeyRow {
  id: string;
  user_id: string;
  public_key: string;
  hashed_key: string;
  name: string;
  created_at: Date;
  updated_at: Date;
}

function mapApiKey(row: ApiKeyRow): ApiKeyRecord {
  return {
    id: row.id,
    userId: row.user_id,
    publicKey: row.public_key,
    name: row.name,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

function mapApiKeyAuth(row: ApiKeyRow): ApiKeyAuthRecord {
  return {
    ...mapApiKey(row),
    hashedKey: row.hashed_key
  };
}

export class PostgresApiKeyRepository implements ApiKeyRepository {
  public constructor(private readonly pool: Pool) {}

  public async createApiKey(input: CreateApiKeyInput): Promise<ApiKeyRecord> {
    const result = await this.pool.query<ApiKeyRow>(
      `
      INSERT INTO api_keys (
        id,
        user_id,
        public_key,
        hashed_key,
        name,
        created_at,
        updated_at
      )
      VALUES ($1, $2, $3, $4, $5, NOW(), NOW())
      RETURNING *
      `,
      [randomUUID(), input.userId, input.publicKey, input.hashedKey, input.name]
    );

    const row = getSingleRow(result.rows);
    if (row === null) {
      throw new Error('Failed to create API key row.');
    }

    return mapApiKey(row);
  }

  public async findApiKeyByPublicKey(publicKey: string): Promise<ApiKeyAuthRecord | null> {
    const result = await this.pool.query<ApiKeyRow>(
      `
      SELECT *
      FROM api_keys
      WHERE public_key = $1
      LIMIT 1
      `,
      [publicKey]
    );

    const row = getSingleRow(result.rows);
    return row === null ? null : mapApiKeyAuth(row);
  }

  public async listApiKeys(userId: string): Promise<ApiKeyRecord[]> {
    const result = await this.pool.query<ApiKeyRow>(
      `
      SELECT *
      FROM api_keys
      WHERE user_id = $1
      ORDER BY created_at DESC, id DESC
      `,
      [userId]
    );

    return result.rows.map(mapApiKey);
  }

  public async renameApiKey(input: RenameApiKeyInput): Promise<boolean> {
    const result = await this.pool.query(
      `
      UPDATE api_keys
      SET name = $3,
          updated_at = NOW()
      WHERE id = $1
        AND user_id = $2
      `,
      [input.apiKeyId, input.userId, input.name]
    );

    return (result.rowCount ?? 0) > 0;
  }

  public async deleteApiKey(input: DeleteApiKeyInput): Promise<boolean> {
    const result = await this.pool.query(
      `
      DELETE FROM api_keys
      WHERE id = $1
        AND user_id = $2
      `,
      [input.apiKeyId, input.userId]
    );

    return (result.rowCount ?? 0) > 0;
  }
}
