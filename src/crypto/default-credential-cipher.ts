import argon2 from 'argon2';
import { errors, jwtVerify, SignJWT } from 'jose';
import { Buffer } from 'node:buffer';
import { createHash, randomBytes, randomUUID, timingSafeEqual } from 'node:crypto';

import type { CredentialCipher, GeneratedApiKey, TokenClaimsInput, TokenPayload } from './credential-cipher.js';

const API_KEY_PUBLIC_PREFIX = 'pk_';

export interface DefaultCredentialCipherConfig {
  tokenSecret: string;
  issuer: string;
}

function sha256(value: string): string {
  return createHash('sha256').update(value).digest('hex');
}

/**
 * argon2id for passwords, HS256 JWTs for tokens, sha256 for API key secrets.
 * Every signed token carries a random `jti`, so two tokens minted for the same
 * subject within the same second are still distinct strings.
 */
export class DefaultCredentialCipher implements CredentialCipher {
  private readonly secret: Uint8Array;

  public constructor(private readonly config: DefaultCredentialCipherConfig) {
    this.secret = new TextEncoder().encode(config.tokenSecret);
  }

  public async signToken(claims: TokenClaimsInput, expiry: Date): Promise<string> {
    return new SignJWT({ token_type: claims.token_type })
      .setProtectedHeader({ alg: 'HS256', typ: 'JWT' })
      .setSubject(claims.sub)
      .setIssuer(this.config.issuer)
      .setIssuedAt()
      .setJti(randomUUID())
      .setExpirationTime(Math.floor(expiry.getTime() / 1_000))
      .sign(this.secret);
  }

  public async verifyToken(token: string): Promise<TokenPayload | null> {
    try {
      const { payload } = await jwtVerify(token, this.secret, {
        issuer: this.config.issuer,
        algorithms: ['HS256']
      });
      return { ...payload };
    } catch (error) {
      if (error instanceof errors.JOSEError) {
        return null;
      }

      throw error;
    }
  }

  public async hashPassword(password: string): Promise<string> {
    return argon2.hash(password, {
      type: argon2.argon2id,
      memoryCost: 19_456,
      timeCost: 2,
      parallelism: 1
    });
  }

  public async verifyPassword(password: string, hashedPassword: string): Promise<boolean> {
    return argon2.verify(hashedPassword, password);
  }

  public generateApiKey(): GeneratedApiKey {
    return {
      publicKey: `${API_KEY_PUBLIC_PREFIX}${randomBytes(12).toString('hex')}`,
      rawKey: randomBytes(32).toString('base64url')
    };
  }

  public hashApiKey(rawKey: string): Promise<string> {
    return Promise.resolve(sha256(rawKey));
  }

  public verifyApiKey(rawKey: string, hashedKey: string): Promise<boolean> {
    const presented = Buffer.from(sha256(rawKey), 'utf8');
    const stored = Buffer.from(hashedKey, 'utf8');
    if (presented.length !== stored.length) {
      return Promise.resolve(false);
    }

    return Promise.resolve(timingSafeEqual(presented, stored));
  }

  public generateOneTimeCode(): string {
    return randomBytes(16).toString('hex');
  }
}
