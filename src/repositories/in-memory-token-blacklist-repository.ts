import type { BlacklistEntry, TokenBlacklistRepository } from './token-blacklist-repository.js';

export class InMemoryTokenBlacklistRepository implements TokenBlacklistRepository {
  private readonly entriesByToken = new Map<string, BlacklistEntry>();

  public isTokenBlacklisted(token: string): Promise<boolean> {
    return Promise.resolve(this.entriesByToken.has(token));
  }

  public blacklistToken(token: string, expiresAt: Date): Promise<boolean> {
    if (this.entriesByToken.has(token)) {
      return Promise.resolve(false);
    }

    this.entriesByToken.set(token, {
      token,
      expiresAt: new Date(expiresAt),
      createdAt: new Date()
    });
    return Promise.resolve(true);
  }

  public cleanExpiredBlacklistedTokens(now: Date): Promise<number> {
    let removed = 0;
    for (const [token, entry] of this.entriesByToken.entries()) {
      if (entry.expiresAt.getTime() < now.getTime()) {
        this.entriesByToken.delete(token);
        removed += 1;
      }
    }

    return Promise.resolve(removed);
  }

  public size(): number {
    return this.entriesByToken.size;
  }
}
