export interface BlacklistEntry {
  token: string;
  expiresAt: Date;
  createdAt: Date;
}

/**
 * Append-only set of revoked token strings. Entries are only ever removed by
 * the cleanup sweep, once the token's own expiry has passed.
 */
export interface TokenBlacklistRepository {
  isTokenBlacklisted(token: string): Promise<boolean>;
  /** Resolves `true` only for the call that inserted the entry. */
  blacklistToken(token: string, expiresAt: Date): Promise<boolean>;
  cleanExpiredBlacklistedTokens(now: Date): Promise<number>;
}
