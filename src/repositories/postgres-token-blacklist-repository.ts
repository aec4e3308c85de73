import type { Pool } from 'pg';

import type { TokenBlacklistRepository } from './token-blacklist-repository.js';

export class PostgresTokenBlacklistRepository implements TokenBlacklistRepository {
  public constructor(private readonly pool: Pool) {}

  public async isTokenBlacklisted(token: string): Promise<boolean> {
    const result = await this.pool.query(
      `
      SELECT 1
      FROM blacklisted_tokens
      WHERE token = $1
      LIMIT 1
      `,
      [token]
    );

    return result.rows.length > 0;
  }

  public async blacklistToken(token: string, expiresAt: Date): Promise<boolean> {
    const result = await this.pool.query(
      `
      INSERT INTO blacklisted_tokens (token, expires_at, created_at)
      VALUES ($1, $2, NOW())
      ON CONFLICT (token) DO NOTHING
      RETURNING token
      `,
      [token, expiresAt]
    );

    return (result.rowCount ?? 0) > 0;
  }

  public async cleanExpiredBlacklistedTokens(now: Date): Promise<number> {
    const result = await this.pool.query(
      `
      DELETE FROM blacklisted_tokens
      WHERE expires_at < $1
      `,
      [now]
    );

    return result.rowCount ?? 0;
  }
}
