export type TokenType = 'access' | 'refresh';

/**
 * Payload handed to the cipher for signing. `sub` is the subject email.
 */
export interface TokenClaimsInput {
  sub: string;
  token_type: TokenType;
}

/**
 * Decoded payload as returned by the cipher. Fields are loosely typed on
 * purpose: the token service validates them before trusting any value.
 */
export type TokenPayload = Record<string, unknown>;

export interface GeneratedApiKey {
  publicKey: string;
  rawKey: string;
}

/**
 * Signing, hashing and secret generation. Implementations must not throw on
 * an untrusted token; they return `null` instead.
 */
export interface CredentialCipher {
  signToken(claims: TokenClaimsInput, expiry: Date): Promise<string>;
  verifyToken(token: string): Promise<TokenPayload | null>;
  hashPassword(password: string): Promise<string>;
  verifyPassword(password: string, hashedPassword: string): Promise<boolean>;
  generateApiKey(): GeneratedApiKey;
  hashApiKey(rawKey: string): Promise<string>;
  verifyApiKey(rawKey: string, hashedKey: string): Promise<boolean>;
  generateOneTimeCode(): string;
}
