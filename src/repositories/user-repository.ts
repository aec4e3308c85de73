export interface AuthUser {
  id: string;
  email: string;
  hashedPassword: string | null;
  name: string | null;
  isActive: boolean;
  isVerified: boolean;
  isSuperuser: boolean;
  verificationCodeExpiry: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateUserInput {
  email: string;
  hashedPassword: string;
  name?: string | null;
  isSuperuser?: boolean;
}

/**
 * Users plus the per-user verification code and password reset token. Each
 * user holds at most one of each; storing a new one replaces the previous.
 *
 * `createUser` rejects with an `AUTH_EMAIL_IN_USE` AppError when the
 * normalized email is taken. Lookups return `null` for a missing user.
 */
export interface UserRepository {
  createUser(input: CreateUserInput): Promise<AuthUser>;
  findUserById(userId: string): Promise<AuthUser | null>;
  findUserByEmail(email: string): Promise<AuthUser | null>;
  markUserVerified(userId: string): Promise<void>;
  markUserSuperuser(userId: string): Promise<void>;
  setUserActive(userId: string, isActive: boolean): Promise<void>;
  updateUserPassword(userId: string, hashedPassword: string, updatedAt: Date): Promise<void>;
  storeVerificationCode(userId: string, verificationCode: string, expiresAt: Date): Promise<void>;
  findUserIdByVerificationCode(verificationCode: string, now: Date): Promise<string | null>;
  removeVerificationCode(userId: string): Promise<void>;
  storeResetToken(userId: string, tokenHash: string, expiresAt: Date): Promise<void>;
  findUserIdByResetToken(tokenHash: string, now: Date): Promise<string | null>;
  removeResetToken(userId: string): Promise<void>;
}
