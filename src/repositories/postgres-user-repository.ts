import { randomUUID } from 'node:crypto';

import { DatabaseError, type Pool } from 'pg';

import { emailInUse } from '../errors/auth-errors.js';
import { getSingleRow } from './postgres-helpers.js';
import type { AuthUser, CreateUserInput, UserRepository } from './user-repository.js';

const UNIQUE_VIOLATION = '23505';

interface UserRow {
  id: string;
  email: string;
  hashed_password: string | null;
  name: string | null;
  is_active: boolean;
  is_verified: boolean;
  is_superuser: boolean;
  verification_code_expiry: Date | null;
  created_at: Date;
  updated_at: Date;
}

interface UserIdRow {
  id: string;
}

const USER_COLUMNS = `
  id,
  email,
  hashed_password,
  name,
  is_active,
  is_verified,
  is_superuser,
  verification_code_expiry,
  created_at,
  updated_at
`;

function mapUser(row: UserRow): AuthUser {
  return {
    id: row.id,
    email: row.email,
    hashedPassword: row.hashed_password,
    name: row.name,
    isActive: row.is_active,
    isVerified: row.is_verified,
    isSuperuser: row.is_superuser,
    verificationCodeExpiry: row.verification_code_expiry,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

export class PostgresUserRepository implements UserRepository {
  public constructor(private readonly pool: Pool) {}

  public async createUser(input: CreateUserInput): Promise<AuthUser> {
    const normalizedEmail = input.email.trim().toLowerCase();
    const now = new Date();

    try {
      const result = await this.pool.query<UserRow>(
        `
        INSERT INTO users (
          id,
          email,
          hashed_password,
          name,
          is_active,
          is_verified,
          is_superuser,
          created_at,
          updated_at
        )
        VALUES ($1, $2, $3, $4, TRUE, FALSE, $5, $6, $6)
        RETURNING ${USER_COLUMNS}
        `,
        [randomUUID(), normalizedEmail, input.hashedPassword, input.name ?? null, input.isSuperuser ?? false, now]
      );

      const row = getSingleRow(result.rows);
      if (row === null) {
        throw new Error('Failed to create user row.');
      }

      return mapUser(row);
    } catch (error) {
      if (error instanceof DatabaseError && error.code === UNIQUE_VIOLATION) {
        throw emailInUse();
      }

      throw error;
    }
  }

  public async findUserById(userId: string): Promise<AuthUser | null> {
    const result = await this.pool.query<UserRow>(
      `
      SELECT ${USER_COLUMNS}
      FROM users
      WHERE id = $1
      LIMIT 1
      `,
      [userId]
    );

    const row = getSingleRow(result.rows);
    return row === null ? null : mapUser(row);
  }

  public async findUserByEmail(email: string): Promise<AuthUser | null> {
    const result = await this.pool.query<UserRow>(
      `
      SELECT ${USER_COLUMNS}
      FROM users
      WHERE email = $1
      LIMIT 1
      `,
      [email.trim().toLowerCase()]
    );

    const row = getSingleRow(result.rows);
    return row === null ? null : mapUser(row);
  }

  public async markUserVerified(userId: string): Promise<void> {
    await this.pool.query(
      `
      UPDATE users
      SET is_verified = TRUE,
          updated_at = NOW()
      WHERE id = $1
      `,
      [userId]
    );
  }

  public async markUserSuperuser(userId: string): Promise<void> {
    await this.pool.query(
      `
      UPDATE users
      SET is_superuser = TRUE,
          updated_at = NOW()
      WHERE id = $1
      `,
      [userId]
    );
  }

  public async setUserActive(userId: string, isActive: boolean): Promise<void> {
    await this.pool.query(
      `
      UPDATE users
      SET is_active = $2,
          updated_at = NOW()
      WHERE id = $1
      `,
      [userId, isActive]
    );
  }

  public async updateUserPassword(userId: string, hashedPassword: string, updatedAt: Date): Promise<void> {
    await this.pool.query(
      `
      UPDATE users
      SET hashed_password = $2,
          updated_at = $3
      WHERE id = $1
      `,
      [userId, hashedPassword, updatedAt]
    );
  }

  public async storeVerificationCode(userId: string, verificationCode: string, expiresAt: Date): Promise<void> {
    await this.pool.query(
      `
      UPDATE users
      SET verification_code = $2,
          verification_code_expiry = $3,
          updated_at = NOW()
      WHERE id = $1
      `,
      [userId, verificationCode, expiresAt]
    );
  }

  public async findUserIdByVerificationCode(verificationCode: string, now: Date): Promise<string | null> {
    const result = await this.pool.query<UserIdRow>(
      `
      SELECT id
      FROM users
      WHERE verification_code = $1
        AND verification_code_expiry >= $2
      LIMIT 1
      `,
      [verificationCode, now]
    );

    return getSingleRow(result.rows)?.id ?? null;
  }

  public async removeVerificationCode(userId: string): Promise<void> {
    await this.pool.query(
      `
      UPDATE users
      SET verification_code = NULL,
          verification_code_expiry = NULL,
          updated_at = NOW()
      WHERE id = $1
      `,
      [userId]
    );
  }

  public async storeResetToken(userId: string, tokenHash: string, expiresAt: Date): Promise<void> {
    await this.pool.query(
      `
      UPDATE users
      SET reset_token_hash = $2,
          reset_token_expiry = $3,
          updated_at = NOW()
      WHERE id = $1
      `,
      [userId, tokenHash, expiresAt]
    );
  }

  public async findUserIdByResetToken(tokenHash: string, now: Date): Promise<string | null> {
    const result = await this.pool.query<UserIdRow>(
      `
      SELECT id
      FROM users
      WHERE reset_token_hash = $1
        AND reset_token_expiry >= $2
      LIMIT 1
      `,
      [tokenHash, now]
    );

    return getSingleRow(result.rows)?.id ?? null;
  }

  public async removeResetToken(userId: string): Promise<void> {
    await this.pool.query(
      `
      UPDATE users
      SET reset_token_hash = NULL,
          reset_token_expiry = NULL,
          updated_at = NOW()
      WHERE id = $1
      `,
      [userId]
    );
  }
}
