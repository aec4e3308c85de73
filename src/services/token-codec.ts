import type { CredentialCipher, TokenPayload, TokenType } from '../crypto/credential-cipher.js';
import { tokenExpired, tokenInvalid, tokenMalformedClaims } from '../errors/auth-errors.js';

export const DEFAULT_ACCESS_TOKEN_LIFETIME_MINUTES = 3600;
export const DEFAULT_REFRESH_TOKEN_LIFETIME_DAYS = 7;

export interface TokenClaims {
  email: string;
  tokenType: TokenType;
  expiresAt: Date;
}

export interface EncodedToken {
  token: string;
  expiresAt: Date;
}

export interface TokenCodecConfig {
  accessTokenLifetimeMinutes: number;
  refreshTokenLifetimeDays: number;
  clock?: () => Date;
}

function isTokenType(value: unknown): value is TokenType {
  return value === 'access' || value === 'refresh';
}

function readClaims(payload: TokenPayload): TokenClaims | null {
  const { sub, token_type: tokenType, exp } = payload;
  if (typeof sub !== 'string' || sub.length === 0) {
    return null;
  }

  if (!isTokenType(tokenType)) {
    return null;
  }

  if (typeof exp !== 'number' || !Number.isFinite(exp)) {
    return null;
  }

  return {
    email: sub,
    tokenType,
    expiresAt: new Date(exp * 1_000)
  };
}

/**
 * Builds and parses signed, expiring token payloads. Knows nothing about
 * revocation. Expiry is compared against this codec's own clock even when the
 * cipher enforces `exp` as well.
 */
export class TokenCodec {
  private readonly clock: () => Date;

  public constructor(
    private readonly cipher: CredentialCipher,
    private readonly config: TokenCodecConfig
  ) {
    this.clock = config.clock ?? (() => new Date());
  }

  public now(): Date {
    return this.clock();
  }

  public lifetimeMs(tokenType: TokenType): number {
    return tokenType === 'access'
      ? this.config.accessTokenLifetimeMinutes * 60_000
      : this.config.refreshTokenLifetimeDays * 86_400_000;
  }

  public longestLifetimeMs(): number {
    return Math.max(this.lifetimeMs('access'), this.lifetimeMs('refresh'));
  }

  public async encode(email: string, tokenType: TokenType): Promise<EncodedToken> {
    const expiresAt = new Date(this.clock().getTime() + this.lifetimeMs(tokenType));
    const token = await this.cipher.signToken({ sub: email, token_type: tokenType }, expiresAt);
    return { token, expiresAt };
  }

  public async decode(token: string): Promise<TokenClaims> {
    const payload = await this.cipher.verifyToken(token);
    if (payload === null) {
      throw tokenInvalid();
    }

    const claims = readClaims(payload);
    if (claims === null) {
      throw tokenMalformedClaims();
    }

    if (claims.expiresAt.getTime() < this.clock().getTime()) {
      throw tokenExpired();
    }

    return claims;
  }

  /**
   * Expiry of a token whose signature checks out, or `null`. Used to date
   * blacklist entries; never used to accept a token.
   */
  public async peekExpiry(token: string): Promise<Date | null> {
    const payload = await this.cipher.verifyToken(token);
    if (payload === null) {
      return null;
    }

    return readClaims(payload)?.expiresAt ?? null;
  }
}
