import { describe, expect, it, vi } from 'vitest';

import { createSilentLogger } from '../../src/logging/logger.js';
import type { AuthUser } from '../../src/repositories/user-repository.js';
import {
  CredentialResolverChain,
  getActiveUser,
  stripBearerPrefix,
  type CredentialResolver
} from '../../src/services/credential-resolver.js';
import { FakeCredentialCipher } from '../helpers/fake-credential-cipher.js';
import { createTestRuntime } from '../helpers/create-test-runtime.js';

function buildUser(overrides: Partial<AuthUser> = {}): AuthUser {
  const now = new Date('2026-01-01T00:00:00.000Z');
  return {
    id: 'user-1',
    email: 'a@x.com',
    hashedPassword: 'hashed:pw',
    name: null,
    isActive: true,
    isVerified: true,
    isSuperuser: false,
    verificationCodeExpiry: null,
    createdAt: now,
    updatedAt: now,
    ...overrides
  };
}

async function seededRuntime() {
  const runtime = createTestRuntime({ cipher: new FakeCredentialCipher() });
  const user = await runtime.userRepository.createUser({ email: 'a@x.com', hashedPassword: 'hashed:pw' });
  return { runtime, user };
}

describe('stripBearerPrefix', () => {
  it('removes a leading bearer scheme only', () => {
    expect(stripBearerPrefix('Bearer abc.def')).toBe('abc.def');
    expect(stripBearerPrefix('abc.def')).toBe('abc.def');
    expect(stripBearerPrefix('bearer abc.def')).toBe('bearer abc.def');
  });
});

describe('CredentialResolverChain', () => {
  it('resolves access tokens through the token resolver', async () => {
    const { runtime, user } = await seededRuntime();
    const token = await runtime.tokenService.issueAccessToken('a@x.com');

    const principal = await runtime.credentialResolver.authenticate(token);

    expect(principal.kind).toBe('token');
    expect(principal.user.id).toBe(user.id);
  });

  it('accepts access tokens behind a bearer prefix', async () => {
    const { runtime, user } = await seededRuntime();
    const token = await runtime.tokenService.issueAccessToken('a@x.com');

    await expect(runtime.credentialResolver.authenticate(`Bearer ${token}`)).resolves.toMatchObject({
      kind: 'token',
      user: { id: user.id }
    });
  });

  it('hands every resolver the credential without its bearer prefix', async () => {
    const first: CredentialResolver = { kind: 'token', resolve: vi.fn().mockRejectedValue(new Error('nope')) };
    const second: CredentialResolver = { kind: 'api_key', resolve: vi.fn().mockResolvedValue(buildUser()) };
    const chain = new CredentialResolverChain([first, second], createSilentLogger());

    await chain.authenticate('Bearer pk_test1.secret1');

    expect(first.resolve).toHaveBeenCalledWith('pk_test1.secret1');
    expect(second.resolve).toHaveBeenCalledWith('pk_test1.secret1');
  });

  it('falls back to API keys with or without a bearer prefix', async () => {
    const { runtime, user } = await seededRuntime();
    const { apiKey } = await runtime.apiKeyService.issue(user.id, 'ci');

    await expect(runtime.credentialResolver.authenticate(apiKey)).resolves.toMatchObject({
      kind: 'api_key',
      user: { id: user.id }
    });
    await expect(runtime.credentialResolver.authenticate(`Bearer ${apiKey}`)).resolves.toMatchObject({
      kind: 'api_key',
      user: { id: user.id }
    });
  });

  it('folds every failure into invalid credentials', async () => {
    const { runtime, user } = await seededRuntime();
    const revoked = await runtime.tokenService.issueAccessToken('a@x.com');
    await runtime.tokenService.revoke(revoked);
    const orphaned = await runtime.tokenService.issueAccessToken('ghost@example.com');
    const { apiKey } = await runtime.apiKeyService.issue(user.id, 'ci');
    await runtime.userRepository.setUserActive(user.id, false);

    for (const credential of ['', 'Bearer ', 'garbage', 'pk_unknown.secret', revoked, orphaned, apiKey]) {
      await expect(runtime.credentialResolver.authenticate(credential)).rejects.toMatchObject({
        code: 'AUTH_INVALID_CREDENTIALS',
        statusCode: 401,
        message: 'Invalid authentication credentials.'
      });
    }
  });

  it('folds unexpected faults into invalid credentials and logs them', async () => {
    const logger = createSilentLogger();
    const errorSpy = vi.spyOn(logger, 'error');
    const failing: CredentialResolver = {
      kind: 'token',
      resolve: vi.fn().mockRejectedValue(new Error('connection reset'))
    };
    const chain = new CredentialResolverChain([failing], logger);

    await expect(chain.authenticate('anything')).rejects.toMatchObject({ code: 'AUTH_INVALID_CREDENTIALS' });
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('stops at the first resolver that succeeds', async () => {
    const user = buildUser();
    const first: CredentialResolver = { kind: 'token', resolve: vi.fn().mockResolvedValue(user) };
    const second: CredentialResolver = { kind: 'api_key', resolve: vi.fn().mockResolvedValue(user) };
    const chain = new CredentialResolverChain([first, second], createSilentLogger());

    await expect(chain.resolveUser('anything')).resolves.toBe(user);
    expect(second.resolve).not.toHaveBeenCalled();
  });

  it('resolveActiveUser rejects deactivated accounts', async () => {
    const inactive = buildUser({ isActive: false });
    const resolver: CredentialResolver = { kind: 'token', resolve: vi.fn().mockResolvedValue(inactive) };
    const chain = new CredentialResolverChain([resolver], createSilentLogger());

    await expect(chain.resolveActiveUser('anything')).rejects.toMatchObject({
      code: 'AUTH_ACCOUNT_INACTIVE',
      statusCode: 400
    });
  });
});

describe('getActiveUser', () => {
  it('passes active users through unchanged', () => {
    const user = buildUser();
    expect(getActiveUser(user)).toBe(user);
  });

  it('rejects inactive users', () => {
    expect(() => getActiveUser(buildUser({ isActive: false }))).toThrow('User account is inactive.');
  });
});
