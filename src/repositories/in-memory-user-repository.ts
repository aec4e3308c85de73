import { randomUUID } from 'node:crypto';

import { emailInUse } from '../errors/auth-errors.js';
import type { AuthUser, CreateUserInput, UserRepository } from './user-repository.js';

interface PendingSecret {
  value: string;
  expiresAt: Date;
}

interface UserInternalRecord extends AuthUser {
  verificationCode: PendingSecret | null;
  resetToken: PendingSecret | null;
}

function cloneUser(user: UserInternalRecord): AuthUser {
  return {
    id: user.id,
    email: user.email,
    hashedPassword: user.hashedPassword,
    name: user.name,
    isActive: user.isActive,
    isVerified: user.isVerified,
    isSuperuser: user.isSuperuser,
    verificationCodeExpiry: user.verificationCodeExpiry === null ? null : new Date(user.verificationCodeExpiry),
    createdAt: new Date(user.createdAt),
    updatedAt: new Date(user.updatedAt)
  };
}

function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export class InMemoryUserRepository implements UserRepository {
  private readonly usersById = new Map<string, UserInternalRecord>();

  private readonly userIdsByEmail = new Map<string, string>();

  public createUser(input: CreateUserInput): Promise<AuthUser> {
    const normalizedEmail = normalizeEmail(input.email);
    if (this.userIdsByEmail.has(normalizedEmail)) {
      return Promise.reject(emailInUse());
    }

    const now = new Date();
    const user: UserInternalRecord = {
      id: randomUUID(),
      email: normalizedEmail,
      hashedPassword: input.hashedPassword,
      name: input.name ?? null,
      isActive: true,
      isVerified: false,
      isSuperuser: input.isSuperuser ?? false,
      verificationCodeExpiry: null,
      createdAt: now,
      updatedAt: now,
      verificationCode: null,
      resetToken: null
    };

    this.usersById.set(user.id, user);
    this.userIdsByEmail.set(user.email, user.id);

    return Promise.resolve(cloneUser(user));
  }

  public findUserById(userId: string): Promise<AuthUser | null> {
    const user = this.usersById.get(userId);
    return Promise.resolve(user === undefined ? null : cloneUser(user));
  }

  public findUserByEmail(email: string): Promise<AuthUser | null> {
    const userId = this.userIdsByEmail.get(normalizeEmail(email));
    if (userId === undefined) {
      return Promise.resolve(null);
    }

    const user = this.usersById.get(userId);
    return Promise.resolve(user === undefined ? null : cloneUser(user));
  }

  public markUserVerified(userId: string): Promise<void> {
    this.update(userId, (user) => {
      user.isVerified = true;
    });
    return Promise.resolve();
  }

  public markUserSuperuser(userId: string): Promise<void> {
    this.update(userId, (user) => {
      user.isSuperuser = true;
    });
    return Promise.resolve();
  }

  public setUserActive(userId: string, isActive: boolean): Promise<void> {
    this.update(userId, (user) => {
      user.isActive = isActive;
    });
    return Promise.resolve();
  }

  public updateUserPassword(userId: string, hashedPassword: string, updatedAt: Date): Promise<void> {
    const user = this.usersById.get(userId);
    if (user === undefined) {
      return Promise.resolve();
    }

    user.hashedPassword = hashedPassword;
    user.updatedAt = new Date(updatedAt);
    return Promise.resolve();
  }

  public storeVerificationCode(userId: string, verificationCode: string, expiresAt: Date): Promise<void> {
    this.update(userId, (user) => {
      user.verificationCode = { value: verificationCode, expiresAt: new Date(expiresAt) };
      user.verificationCodeExpiry = new Date(expiresAt);
    });
    return Promise.resolve();
  }

  public findUserIdByVerificationCode(verificationCode: string, now: Date): Promise<string | null> {
    return Promise.resolve(this.findUserIdBySecret(verificationCode, now, (user) => user.verificationCode));
  }

  public removeVerificationCode(userId: string): Promise<void> {
    this.update(userId, (user) => {
      user.verificationCode = null;
      user.verificationCodeExpiry = null;
    });
    return Promise.resolve();
  }

  public storeResetToken(userId: string, tokenHash: string, expiresAt: Date): Promise<void> {
    this.update(userId, (user) => {
      user.resetToken = { value: tokenHash, expiresAt: new Date(expiresAt) };
    });
    return Promise.resolve();
  }

  public findUserIdByResetToken(tokenHash: string, now: Date): Promise<string | null> {
    return Promise.resolve(this.findUserIdBySecret(tokenHash, now, (user) => user.resetToken));
  }

  public removeResetToken(userId: string): Promise<void> {
    this.update(userId, (user) => {
      user.resetToken = null;
    });
    return Promise.resolve();
  }

  private update(userId: string, mutate: (user: UserInternalRecord) => void): void {
    const user = this.usersById.get(userId);
    if (user === undefined) {
      return;
    }

    mutate(user);
    user.updatedAt = new Date();
  }

  private findUserIdBySecret(
    value: string,
    now: Date,
    select: (user: UserInternalRecord) => PendingSecret | null
  ): string | null {
    for (const user of this.usersById.values()) {
      const secret = select(user);
      if (secret !== null && secret.value === value && secret.expiresAt.getTime() >= now.getTime()) {
        return user.id;
      }
    }

    return null;
  }
}
