import { describe, expect, it, vi } from 'vitest';

import { ACCOUNT_MESSAGES, emailContextFor, USED_VERIFICATION_CODE } from '../../src/services/account-service.js';
import { createTestRuntime } from '../helpers/create-test-runtime.js';
import { FakeCredentialCipher } from '../helpers/fake-credential-cipher.js';
import { createTestClock } from '../helpers/test-clock.js';

const HOUR_MS = 3_600_000;

function createAccounts(options: { requireEmailVerification?: boolean; admin?: boolean } = {}) {
  const clock = createTestClock();
  const runtime = createTestRuntime({
    cipher: new FakeCredentialCipher(),
    clock: clock.now,
    envOverrides: {
      AUTH_REQUIRE_EMAIL_VERIFICATION: options.requireEmailVerification ?? false,
      AUTH_VERIFICATION_CODE_TTL_HOURS: 24,
      AUTH_RESET_TOKEN_TTL_MINUTES: 60,
      ...(options.admin === true
        ? { ADMIN_EMAIL: 'admin@example.com', ADMIN_PASSWORD: 'test-admin-password' }
        : {})
    }
  });

  return { clock, runtime, accounts: runtime.accountService };
}

describe('emailContextFor', () => {
  it('uses the first word of the name, falling back to the email local part', () => {
    expect(emailContextFor({ email: 'ada@example.com', name: 'Ada Lovelace' })).toEqual({ firstName: 'Ada' });
    expect(emailContextFor({ email: 'ben@example.com', name: null })).toEqual({ firstName: 'ben' });
    expect(emailContextFor({ email: 'cy@example.com', name: '   ' })).toEqual({ firstName: 'cy' });
  });
});

describe('AccountService.register', () => {
  it('verifies immediately and stores the used-code sentinel when verification is off', async () => {
    const { accounts, runtime } = createAccounts();

    const user = await accounts.register('A@X.com', 'pw1');

    expect(user.email).toBe('a@x.com');
    expect(user.isVerified).toBe(true);
    expect(user.verificationCodeExpiry).toEqual(new Date('2026-06-02T12:00:00.000Z'));
    await expect(runtime.userRepository.findUserById(user.id)).resolves.toMatchObject({ isVerified: true });
    expect(runtime.notifier.sent).toEqual([]);
  });

  it('never accepts the used-code sentinel as a verification code', async () => {
    const { accounts } = createAccounts();
    await accounts.register('a@x.com', 'pw1');

    await expect(accounts.verifyEmail('a@x.com', USED_VERIFICATION_CODE)).rejects.toMatchObject({
      code: 'AUTH_VERIFICATION_CODE_INVALID',
      statusCode: 400
    });
  });

  it('creates a default collection with a graph and membership', async () => {
    const { accounts, runtime } = createAccounts();

    const user = await accounts.register('a@x.com', 'pw1');

    const collections = await runtime.collectionRepository.listCollectionsForUser(user.id);
    expect(collections).toHaveLength(1);
    expect(collections[0]).toMatchObject({
      ownerId: user.id,
      name: 'Default',
      description: 'Your default collection.'
    });

    const graphs = runtime.collectionRepository.listGraphsForCollection(collections[0]?.id ?? '');
    expect(graphs.map((graph) => graph.name)).toEqual(['Default']);
  });

  it('rejects a second account for the same email in any case', async () => {
    const { accounts } = createAccounts();
    await accounts.register('a@x.com', 'pw1');

    await expect(accounts.register(' A@X.COM ', 'pw2')).rejects.toMatchObject({
      code: 'AUTH_EMAIL_IN_USE',
      statusCode: 409
    });
  });

  it('sends a verification code when verification is required', async () => {
    const { accounts, runtime } = createAccounts({ requireEmailVerification: true });

    const user = await accounts.register('ada@example.com', 'pw1', { name: 'Ada Lovelace' });

    expect(user.isVerified).toBe(false);
    expect(user.verificationCodeExpiry).toEqual(new Date('2026-01-02T00:00:00.000Z'));
    expect(runtime.notifier.sent).toEqual([
      { kind: 'verification', email: 'ada@example.com', code: 'code-1', context: { firstName: 'Ada' } }
    ]);
  });
});

describe('AccountService.verifyEmail', () => {
  it('unlocks login once the emailed code is confirmed', async () => {
    const { accounts, runtime } = createAccounts({ requireEmailVerification: true });
    await accounts.register('a@x.com', 'pw1');

    await expect(accounts.login('a@x.com', 'pw1')).rejects.toMatchObject({
      code: 'AUTH_EMAIL_NOT_VERIFIED',
      statusCode: 401
    });

    const code = runtime.notifier.lastCodeFor('a@x.com', 'verification');
    await expect(accounts.verifyEmail('a@x.com', code)).resolves.toEqual({ message: ACCOUNT_MESSAGES.emailVerified });

    const pair = await accounts.login('a@x.com', 'pw1');
    expect(pair.accessToken.tokenType).toBe('access');
  });

  it('accepts each code once', async () => {
    const { accounts, runtime } = createAccounts({ requireEmailVerification: true });
    await accounts.register('a@x.com', 'pw1');
    const code = runtime.notifier.lastCodeFor('a@x.com', 'verification');

    await accounts.verifyEmail('a@x.com', code);

    await expect(accounts.verifyEmail('a@x.com', code)).rejects.toMatchObject({
      code: 'AUTH_VERIFICATION_CODE_INVALID'
    });
  });

  it('rejects codes presented for a different email', async () => {
    const { accounts, runtime } = createAccounts({ requireEmailVerification: true });
    await accounts.register('a@x.com', 'pw1');
    await accounts.register('b@x.com', 'pw1');
    const code = runtime.notifier.lastCodeFor('a@x.com', 'verification');

    await expect(accounts.verifyEmail('b@x.com', code)).rejects.toMatchObject({
      code: 'AUTH_VERIFICATION_CODE_INVALID'
    });
  });

  it('rejects expired codes', async () => {
    const { accounts, clock, runtime } = createAccounts({ requireEmailVerification: true });
    await accounts.register('a@x.com', 'pw1');
    const code = runtime.notifier.lastCodeFor('a@x.com', 'verification');

    clock.advance(25 * HOUR_MS);

    await expect(accounts.verifyEmail('a@x.com', code)).rejects.toMatchObject({
      code: 'AUTH_VERIFICATION_CODE_INVALID'
    });
  });
});

describe('AccountService.resendVerificationEmail', () => {
  it('replaces the previous code', async () => {
    const { accounts, runtime } = createAccounts({ requireEmailVerification: true });
    await accounts.register('a@x.com', 'pw1');
    const firstCode = runtime.notifier.lastCodeFor('a@x.com', 'verification');

    await expect(accounts.resendVerificationEmail('a@x.com')).resolves.toEqual({
      message: ACCOUNT_MESSAGES.verificationSent
    });
    const secondCode = runtime.notifier.lastCodeFor('a@x.com', 'verification');

    expect(secondCode).not.toBe(firstCode);
    await expect(accounts.verifyEmail('a@x.com', firstCode)).rejects.toMatchObject({
      code: 'AUTH_VERIFICATION_CODE_INVALID'
    });
    await expect(accounts.verifyEmail('a@x.com', secondCode)).resolves.toEqual({
      message: ACCOUNT_MESSAGES.emailVerified
    });
  });

  it('answers the same way for unknown and already verified accounts without sending mail', async () => {
    const { accounts, runtime } = createAccounts();
    await accounts.register('a@x.com', 'pw1');

    await expect(accounts.resendVerificationEmail('a@x.com')).resolves.toEqual({
      message: ACCOUNT_MESSAGES.verificationSent
    });
    await expect(accounts.resendVerificationEmail('nobody@x.com')).resolves.toEqual({
      message: ACCOUNT_MESSAGES.verificationSent
    });
    expect(runtime.notifier.sent).toEqual([]);
  });
});

describe('AccountService.login', () => {
  it('gives the same error for an unknown email and a wrong password', async () => {
    const { accounts } = createAccounts();
    await accounts.register('a@x.com', 'pw1');

    await expect(accounts.login('nobody@x.com', 'pw1')).rejects.toMatchObject({
      code: 'AUTH_INVALID_CREDENTIALS',
      message: 'Invalid authentication credentials.'
    });
    await expect(accounts.login('a@x.com', 'nope')).rejects.toMatchObject({
      code: 'AUTH_INVALID_CREDENTIALS',
      message: 'Invalid authentication credentials.'
    });
  });

  it('verifies a password against a stand-in hash for unknown emails', async () => {
    const cipher = new FakeCredentialCipher();
    const runtime = createTestRuntime({ cipher });
    await runtime.accountService.register('a@x.com', 'pw1');
    const verifySpy = vi.spyOn(cipher, 'verifyPassword');

    await expect(runtime.accountService.login('nobody@x.com', 'pw1')).rejects.toMatchObject({
      code: 'AUTH_INVALID_CREDENTIALS'
    });

    expect(verifySpy).toHaveBeenCalledTimes(1);
    expect(verifySpy).toHaveBeenCalledWith('pw1', 'hashed:code-1');
  });

  it('issues tokens whose subject is the normalized email', async () => {
    const { accounts, runtime } = createAccounts();
    await accounts.register('a@x.com', 'pw1');

    const pair = await accounts.login('A@X.com', 'pw1');

    await expect(runtime.tokenService.verify(pair.accessToken.token)).resolves.toMatchObject({
      email: 'a@x.com',
      tokenType: 'access'
    });
    await expect(runtime.tokenService.verify(pair.refreshToken.token)).resolves.toMatchObject({
      email: 'a@x.com',
      tokenType: 'refresh'
    });
  });

  it('reports a missing stored hash as a server fault', async () => {
    const { accounts, runtime } = createAccounts();
    await runtime.userRepository.createUser({ email: 'a@x.com', hashedPassword: '' });

    await expect(accounts.login('a@x.com', 'pw1')).rejects.toMatchObject({
      code: 'AUTH_PASSWORD_HASH_INVALID',
      statusCode: 500,
      details: { reason: 'missing' }
    });
  });

  it('reports an unverifiable stored hash as a server fault', async () => {
    const { accounts, runtime } = createAccounts();
    await runtime.userRepository.createUser({ email: 'a@x.com', hashedPassword: 'garbage-hash' });

    await expect(accounts.login('a@x.com', 'pw1')).rejects.toMatchObject({
      code: 'AUTH_PASSWORD_HASH_INVALID',
      details: { reason: 'unverifiable' }
    });
  });
});

describe('AccountService.changePassword', () => {
  it('keeps the old password when the current one is wrong', async () => {
    const { accounts } = createAccounts();
    const user = await accounts.register('a@x.com', 'pw1');

    await expect(accounts.changePassword(user, 'wrong', 'pw2')).rejects.toMatchObject({
      code: 'AUTH_WRONG_PASSWORD',
      statusCode: 400
    });

    await expect(accounts.login('a@x.com', 'pw1')).resolves.toBeDefined();
  });

  it('replaces the password', async () => {
    const { accounts } = createAccounts();
    const user = await accounts.register('a@x.com', 'pw1');

    await expect(accounts.changePassword(user, 'pw1', 'pw2')).resolves.toEqual({
      message: ACCOUNT_MESSAGES.passwordChanged
    });

    await expect(accounts.login('a@x.com', 'pw2')).resolves.toBeDefined();
    await expect(accounts.login('a@x.com', 'pw1')).rejects.toMatchObject({ code: 'AUTH_INVALID_CREDENTIALS' });
  });

  it('treats an unverifiable stored hash as a server fault', async () => {
    const { accounts, runtime } = createAccounts();
    const user = await runtime.userRepository.createUser({ email: 'a@x.com', hashedPassword: 'garbage-hash' });

    await expect(accounts.changePassword(user, 'pw1', 'pw2')).rejects.toMatchObject({
      code: 'AUTH_PASSWORD_HASH_INVALID'
    });
  });
});

describe('AccountService password reset', () => {
  it('answers identically for known and unknown emails and mails only the known one', async () => {
    const { accounts, runtime } = createAccounts();
    await accounts.register('a@x.com', 'pw1');

    const known = await accounts.requestPasswordReset('a@x.com');
    const unknown = await accounts.requestPasswordReset('nobody@x.com');

    expect(known).toEqual({ message: ACCOUNT_MESSAGES.passwordResetRequested });
    expect(unknown).toEqual(known);
    expect(runtime.notifier.sent.map((message) => message.email)).toEqual(['a@x.com']);
  });

  it('propagates storage failures instead of reporting success', async () => {
    const { accounts, runtime } = createAccounts();
    await accounts.register('a@x.com', 'pw1');
    vi.spyOn(runtime.userRepository, 'storeResetToken').mockRejectedValueOnce(new Error('store unavailable'));

    await expect(accounts.requestPasswordReset('a@x.com')).rejects.toThrow('store unavailable');
    expect(runtime.notifier.sent).toEqual([]);
  });

  it('sets the new password with a single-use token', async () => {
    const { accounts, runtime } = createAccounts();
    await accounts.register('a@x.com', 'pw1');
    await accounts.requestPasswordReset('a@x.com');
    const token = runtime.notifier.lastCodeFor('a@x.com', 'password_reset');

    await expect(accounts.confirmPasswordReset(token, 'pw2')).resolves.toEqual({
      message: ACCOUNT_MESSAGES.passwordReset
    });
    await expect(accounts.login('a@x.com', 'pw2')).resolves.toBeDefined();

    await expect(accounts.confirmPasswordReset(token, 'pw3')).rejects.toMatchObject({
      code: 'AUTH_RESET_TOKEN_INVALID',
      statusCode: 400
    });
  });

  it('rejects expired and superseded tokens', async () => {
    const { accounts, clock, runtime } = createAccounts();
    await accounts.register('a@x.com', 'pw1');
    await accounts.requestPasswordReset('a@x.com');
    const superseded = runtime.notifier.lastCodeFor('a@x.com', 'password_reset');
    await accounts.requestPasswordReset('a@x.com');
    const current = runtime.notifier.lastCodeFor('a@x.com', 'password_reset');

    await expect(accounts.confirmPasswordReset(superseded, 'pw2')).rejects.toMatchObject({
      code: 'AUTH_RESET_TOKEN_INVALID'
    });

    clock.advance(61 * 60_000);

    await expect(accounts.confirmPasswordReset(current, 'pw2')).rejects.toMatchObject({
      code: 'AUTH_RESET_TOKEN_INVALID'
    });
  });
});

describe('AccountService sessions', () => {
  it('rotates refresh tokens', async () => {
    const { accounts } = createAccounts();
    await accounts.register('a@x.com', 'pw1');
    const pair = await accounts.login('a@x.com', 'pw1');

    const rotated = await accounts.refreshAccessToken(pair.refreshToken.token);

    expect(rotated.refreshToken.token).not.toBe(pair.refreshToken.token);
    await expect(accounts.refreshAccessToken(pair.refreshToken.token)).rejects.toMatchObject({
      code: 'AUTH_TOKEN_REVOKED'
    });
  });

  it('revokes the presented token on logout and purges it after expiry', async () => {
    const { accounts, clock, runtime } = createAccounts();
    await accounts.register('a@x.com', 'pw1');
    const pair = await accounts.login('a@x.com', 'pw1');

    await expect(accounts.logout(pair.accessToken.token)).resolves.toEqual({ message: ACCOUNT_MESSAGES.loggedOut });
    await expect(accounts.logout(pair.accessToken.token)).resolves.toEqual({ message: ACCOUNT_MESSAGES.loggedOut });
    await expect(runtime.tokenService.verify(pair.accessToken.token)).rejects.toMatchObject({
      code: 'AUTH_TOKEN_REVOKED'
    });

    await expect(accounts.cleanExpiredBlacklistedTokens()).resolves.toBe(0);
    clock.advance(61 * HOUR_MS);
    await expect(accounts.cleanExpiredBlacklistedTokens()).resolves.toBe(1);
    expect(runtime.tokenBlacklistRepository.size()).toBe(0);
  });
});

describe('AccountService.initialize', () => {
  it('does nothing without admin credentials', async () => {
    const { accounts } = createAccounts();

    await expect(accounts.initialize()).resolves.toBeNull();
  });

  it('seeds a verified superuser once', async () => {
    const { accounts, runtime } = createAccounts({ requireEmailVerification: true, admin: true });

    const admin = await accounts.initialize();
    const again = await accounts.initialize();

    expect(admin).toMatchObject({ email: 'admin@example.com', isSuperuser: true, isVerified: true });
    expect(again?.id).toBe(admin?.id);
    expect(runtime.notifier.sent).toEqual([]);
    await expect(accounts.login('admin@example.com', 'test-admin-password')).resolves.toBeDefined();
  });
});
