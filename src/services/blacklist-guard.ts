import type { TokenBlacklistRepository } from '../repositories/token-blacklist-repository.js';

export class BlacklistGuard {
  public constructor(private readonly repository: TokenBlacklistRepository) {}

  public async isRevoked(token: string): Promise<boolean> {
    return this.repository.isTokenBlacklisted(token);
  }

  /** `false` when the token was already revoked. */
  public async record(token: string, expiresAt: Date): Promise<boolean> {
    return this.repository.blacklistToken(token, expiresAt);
  }

  public async purgeExpired(now: Date): Promise<number> {
    return this.repository.cleanExpiredBlacklistedTokens(now);
  }
}
