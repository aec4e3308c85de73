import type { TokenType } from '../crypto/credential-cipher.js';
import { tokenRevoked, tokenWrongType } from '../errors/auth-errors.js';
import type { Logger } from '../logging/logger.js';
import { recordTokenIssued, recordTokenRevoked } from '../telemetry/metrics.js';
import type { BlacklistGuard } from './blacklist-guard.js';
import type { TokenClaims, TokenCodec } from './token-codec.js';

export interface Token {
  token: string;
  tokenType: TokenType;
}

export interface TokenPair {
  accessToken: Token;
  refreshToken: Token;
}

export type RevocationReason = 'logout' | 'rotation' | 'revoke';

export class TokenService {
  public constructor(
    private readonly codec: TokenCodec,
    private readonly blacklist: BlacklistGuard,
    private readonly logger: Logger
  ) {}

  public async issueAccessToken(subjectEmail: string): Promise<string> {
    return this.issue(subjectEmail, 'access');
  }

  public async issueRefreshToken(subjectEmail: string): Promise<string> {
    return this.issue(subjectEmail, 'refresh');
  }

  public async issueTokenPair(subjectEmail: string): Promise<TokenPair> {
    const accessToken = await this.issueAccessToken(subjectEmail);
    const refreshToken = await this.issueRefreshToken(subjectEmail);

    return {
      accessToken: { token: accessToken, tokenType: 'access' },
      refreshToken: { token: refreshToken, tokenType: 'refresh' }
    };
  }

  public async verify(token: string): Promise<TokenClaims> {
    if (await this.blacklist.isRevoked(token)) {
      throw tokenRevoked();
    }

    return this.codec.decode(token);
  }

  /**
   * Exchanges a refresh token for a new pair. The presented token is
   * blacklisted before the new pair is minted; if that write fails, or another
   * call blacklisted it first, no pair is returned.
   */
  public async refresh(refreshToken: string): Promise<TokenPair> {
    const claims = await this.verify(refreshToken);
    if (claims.tokenType !== 'refresh') {
      throw tokenWrongType('refresh');
    }

    const claimed = await this.blacklist.record(refreshToken, claims.expiresAt);
    if (!claimed) {
      throw tokenRevoked();
    }

    recordTokenRevoked('rotation');

    return this.issueTokenPair(claims.email);
  }

  public async revoke(token: string, reason: RevocationReason = 'revoke'): Promise<void> {
    const expiresAt = await this.codec.peekExpiry(token)
      ?? new Date(this.codec.now().getTime() + this.codec.longestLifetimeMs());

    await this.blacklist.record(token, expiresAt);
    recordTokenRevoked(reason);
    this.logger.debug({ reason, expiresAt: expiresAt.toISOString() }, 'token_revoked');
  }

  public async purgeExpiredRevocations(): Promise<number> {
    return this.blacklist.purgeExpired(this.codec.now());
  }

  private async issue(subjectEmail: string, tokenType: TokenType): Promise<string> {
    const { token } = await this.codec.encode(subjectEmail, tokenType);
    recordTokenIssued(tokenType);
    return token;
  }
}
