import { createHash } from 'node:crypto';

import type { CredentialCipher } from '../crypto/credential-cipher.js';
import {
  AUTH_ERROR_CODES,
  emailInUse,
  emailNotVerified,
  hasAuthErrorCode,
  invalidCredentials,
  passwordHashInvalid,
  resetTokenInvalid,
  verificationCodeInvalid,
  wrongPassword
} from '../errors/auth-errors.js';
import type { Logger } from '../logging/logger.js';
import type { EmailContext, Notifier } from '../notifications/notifier.js';
import type { CollectionRepository } from '../repositories/collection-repository.js';
import type { AuthUser, UserRepository } from '../repositories/user-repository.js';
import { recordBlacklistPurged, recordLoginAttempt } from '../telemetry/metrics.js';
import type { TokenPair, TokenService } from './token-service.js';

/** Stored in place of a real code when verification is disabled; never accepted by `verifyEmail`. */
export const USED_VERIFICATION_CODE = '-1';

const VERIFIED_SENTINEL_TTL_HOURS = 366 * 10;

export const ACCOUNT_MESSAGES = {
  emailVerified: 'Email verified successfully',
  verificationSent: 'If the account exists and is unverified, a verification email has been sent',
  passwordChanged: 'Password changed successfully',
  passwordResetRequested: 'If the email exists, a reset link has been sent',
  passwordReset: 'Password reset successfully',
  loggedOut: 'Logged out successfully'
} as const;

export interface MessageResponse {
  message: string;
}

export interface DefaultCollectionSettings {
  name: string;
  description: string | null;
}

export interface AccountServiceConfig {
  requireEmailVerification: boolean;
  verificationCodeTtlHours: number;
  resetTokenTtlMinutes: number;
  adminEmail?: string;
  adminPassword?: string;
  defaultCollection?: DefaultCollectionSettings;
  clock?: () => Date;
}

export interface RegisterOptions {
  name?: string | null;
  isSuperuser?: boolean;
  /** Marks the account verified even when verification is required. */
  skipEmailVerification?: boolean;
}

const DEFAULT_COLLECTION: DefaultCollectionSettings = {
  name: 'Default',
  description: 'Your default collection.'
};

function hashResetToken(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}

function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function emailContextFor(user: Pick<AuthUser, 'email' | 'name'>): EmailContext {
  const firstName = user.name?.trim().split(' ')[0];
  return {
    firstName: firstName !== undefined && firstName.length > 0 ? firstName : user.email.split('@')[0] ?? user.email
  };
}

export class AccountService {
  private readonly clock: () => Date;

  private dummyPasswordHash: Promise<string> | null = null;

  public constructor(
    private readonly userRepository: UserRepository,
    private readonly collectionRepository: CollectionRepository,
    private readonly tokenService: TokenService,
    private readonly cipher: CredentialCipher,
    private readonly notifier: Notifier,
    private readonly logger: Logger,
    private readonly config: AccountServiceConfig
  ) {
    this.clock = config.clock ?? (() => new Date());
  }

  /**
   * Seeds the configured admin account. An account that already exists under
   * that email is left untouched.
   */
  public async initialize(): Promise<AuthUser | null> {
    const { adminEmail, adminPassword } = this.config;
    if (adminEmail === undefined || adminPassword === undefined) {
      this.logger.debug('admin_bootstrap_skipped');
      return null;
    }

    const existing = await this.userRepository.findUserByEmail(adminEmail);
    if (existing !== null) {
      this.logger.info({ userId: existing.id }, 'admin_already_exists');
      return existing;
    }

    try {
      const admin = await this.register(adminEmail, adminPassword, {
        isSuperuser: true,
        skipEmailVerification: true
      });
      await this.userRepository.markUserSuperuser(admin.id);
      this.logger.info({ userId: admin.id }, 'admin_bootstrapped');
      return admin;
    } catch (error) {
      if (hasAuthErrorCode(error, AUTH_ERROR_CODES.emailInUse)) {
        this.logger.info('admin_already_exists');
        return this.userRepository.findUserByEmail(adminEmail);
      }

      throw error;
    }
  }

  public async register(email: string, password: string, options: RegisterOptions = {}): Promise<AuthUser> {
    const normalizedEmail = normalizeEmail(email);
    const existing = await this.userRepository.findUserByEmail(normalizedEmail);
    if (existing !== null) {
      throw emailInUse();
    }

    const hashedPassword = await this.cipher.hashPassword(password);
    const user = await this.userRepository.createUser({
      email: normalizedEmail,
      hashedPassword,
      name: options.name ?? null,
      isSuperuser: options.isSuperuser ?? false
    });

    await this.createDefaultCollection(user.id);

    const now = this.clock();
    if (this.config.requireEmailVerification && options.skipEmailVerification !== true) {
      const verificationCode = this.cipher.generateOneTimeCode();
      const expiresAt = new Date(now.getTime() + this.config.verificationCodeTtlHours * 3_600_000);
      await this.userRepository.storeVerificationCode(user.id, verificationCode, expiresAt);
      await this.notifier.sendVerificationEmail(user.email, verificationCode, emailContextFor(user));

      this.logger.info({ userId: user.id }, 'account_registered_pending_verification');
      return { ...user, verificationCodeExpiry: expiresAt };
    }

    const expiresAt = new Date(now.getTime() + VERIFIED_SENTINEL_TTL_HOURS * 3_600_000);
    await this.userRepository.storeVerificationCode(user.id, USED_VERIFICATION_CODE, expiresAt);
    await this.userRepository.markUserVerified(user.id);

    this.logger.info({ userId: user.id }, 'account_registered');
    return { ...user, isVerified: true, verificationCodeExpiry: expiresAt };
  }

  public async verifyEmail(email: string, verificationCode: string): Promise<MessageResponse> {
    if (verificationCode === USED_VERIFICATION_CODE) {
      throw verificationCodeInvalid();
    }

    const userId = await this.userRepository.findUserIdByVerificationCode(verificationCode, this.clock());
    if (userId === null) {
      throw verificationCodeInvalid();
    }

    const user = await this.userRepository.findUserById(userId);
    if (user === null || user.email !== normalizeEmail(email)) {
      throw verificationCodeInvalid();
    }

    await this.userRepository.markUserVerified(user.id);
    await this.userRepository.removeVerificationCode(user.id);

    this.logger.info({ userId: user.id }, 'email_verified');
    return { message: ACCOUNT_MESSAGES.emailVerified };
  }

  public async resendVerificationEmail(email: string): Promise<MessageResponse> {
    const user = await this.userRepository.findUserByEmail(email);
    if (user === null || user.isVerified) {
      return { message: ACCOUNT_MESSAGES.verificationSent };
    }

    const verificationCode = this.cipher.generateOneTimeCode();
    const expiresAt = new Date(this.clock().getTime() + this.config.verificationCodeTtlHours * 3_600_000);
    await this.userRepository.storeVerificationCode(user.id, verificationCode, expiresAt);
    await this.notifier.sendVerificationEmail(user.email, verificationCode, emailContextFor(user));

    return { message: ACCOUNT_MESSAGES.verificationSent };
  }

  public async login(email: string, password: string): Promise<TokenPair> {
    const user = await this.userRepository.findUserByEmail(email);
    if (user === null) {
      // Same hashing cost as a wrong password for an existing account.
      await this.cipher.verifyPassword(password, await this.getDummyPasswordHash());
      recordLoginAttempt('invalid_credentials');
      throw invalidCredentials();
    }

    const passwordVerified = await this.checkPassword(user, password);
    if (!passwordVerified) {
      recordLoginAttempt('invalid_credentials');
      this.logger.warn({ userId: user.id }, 'login_invalid_password');
      throw invalidCredentials();
    }

    if (!user.isVerified && this.config.requireEmailVerification) {
      recordLoginAttempt('email_not_verified');
      this.logger.warn({ userId: user.id }, 'login_email_not_verified');
      throw emailNotVerified();
    }

    recordLoginAttempt('success');
    return this.tokenService.issueTokenPair(user.email);
  }

  public async refreshAccessToken(refreshToken: string): Promise<TokenPair> {
    return this.tokenService.refresh(refreshToken);
  }

  public async changePassword(user: AuthUser, currentPassword: string, newPassword: string): Promise<MessageResponse> {
    const passwordVerified = await this.checkPassword(user, currentPassword);
    if (!passwordVerified) {
      throw wrongPassword();
    }

    const hashedPassword = await this.cipher.hashPassword(newPassword);
    await this.userRepository.updateUserPassword(user.id, hashedPassword, this.clock());

    this.logger.info({ userId: user.id }, 'password_changed');
    return { message: ACCOUNT_MESSAGES.passwordChanged };
  }

  /**
   * Same response whether or not the account exists. Only a missing user is
   * absorbed; store and delivery failures propagate.
   */
  public async requestPasswordReset(email: string): Promise<MessageResponse> {
    const user = await this.userRepository.findUserByEmail(email);
    if (user === null) {
      return { message: ACCOUNT_MESSAGES.passwordResetRequested };
    }

    const resetToken = this.cipher.generateOneTimeCode();
    const expiresAt = new Date(this.clock().getTime() + this.config.resetTokenTtlMinutes * 60_000);
    await this.userRepository.storeResetToken(user.id, hashResetToken(resetToken), expiresAt);
    await this.notifier.sendPasswordResetEmail(user.email, resetToken, emailContextFor(user));

    return { message: ACCOUNT_MESSAGES.passwordResetRequested };
  }

  public async confirmPasswordReset(resetToken: string, newPassword: string): Promise<MessageResponse> {
    const userId = await this.userRepository.findUserIdByResetToken(hashResetToken(resetToken), this.clock());
    if (userId === null) {
      throw resetTokenInvalid();
    }

    const hashedPassword = await this.cipher.hashPassword(newPassword);
    await this.userRepository.updateUserPassword(userId, hashedPassword, this.clock());
    await this.userRepository.removeResetToken(userId);

    this.logger.info({ userId }, 'password_reset_completed');
    return { message: ACCOUNT_MESSAGES.passwordReset };
  }

  public async logout(token: string): Promise<MessageResponse> {
    await this.tokenService.revoke(token, 'logout');
    return { message: ACCOUNT_MESSAGES.loggedOut };
  }

  public async cleanExpiredBlacklistedTokens(): Promise<number> {
    const purged = await this.tokenService.purgeExpiredRevocations();
    recordBlacklistPurged(purged);
    this.logger.info({ purged }, 'blacklist_cleaned');
    return purged;
  }

  private async createDefaultCollection(userId: string): Promise<void> {
    const settings = this.config.defaultCollection ?? DEFAULT_COLLECTION;
    const collection = await this.collectionRepository.createCollection({
      ownerId: userId,
      name: settings.name,
      description: settings.description
    });

    await this.collectionRepository.createGraph({
      collectionId: collection.id,
      name: collection.name,
      description: collection.description
    });

    await this.collectionRepository.addUserToCollection(userId, collection.id);
  }

  private async getDummyPasswordHash(): Promise<string> {
    if (this.dummyPasswordHash === null) {
      this.dummyPasswordHash = this.cipher.hashPassword(this.cipher.generateOneTimeCode());
    }

    return this.dummyPasswordHash;
  }

  private async checkPassword(user: AuthUser, password: string): Promise<boolean> {
    if (user.hashedPassword === null || user.hashedPassword.length === 0) {
      this.logger.error({ userId: user.id }, 'password_hash_missing');
      throw passwordHashInvalid('missing');
    }

    try {
      return await this.cipher.verifyPassword(password, user.hashedPassword);
    } catch (error) {
      this.logger.error({ userId: user.id, err: error }, 'password_verification_failed');
      throw passwordHashInvalid('unverifiable');
    }
  }
}
