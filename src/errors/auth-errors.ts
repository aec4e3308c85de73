import { AppError } from './app-error.js';

export const AUTH_ERROR_CODES = {
  invalidCredentials: 'AUTH_INVALID_CREDENTIALS',
  tokenRevoked: 'AUTH_TOKEN_REVOKED',
  tokenInvalid: 'AUTH_TOKEN_INVALID',
  tokenExpired: 'AUTH_TOKEN_EXPIRED',
  tokenMalformedClaims: 'AUTH_TOKEN_MALFORMED_CLAIMS',
  tokenWrongType: 'AUTH_TOKEN_WRONG_TYPE',
  apiKeyInvalidFormat: 'AUTH_API_KEY_INVALID_FORMAT',
  apiKeyInvalid: 'AUTH_API_KEY_INVALID',
  accountInactive: 'AUTH_ACCOUNT_INACTIVE',
  emailNotVerified: 'AUTH_EMAIL_NOT_VERIFIED',
  verificationCodeInvalid: 'AUTH_VERIFICATION_CODE_INVALID',
  resetTokenInvalid: 'AUTH_RESET_TOKEN_INVALID',
  wrongPassword: 'AUTH_WRONG_PASSWORD',
  emailInUse: 'AUTH_EMAIL_IN_USE',
  passwordHashInvalid: 'AUTH_PASSWORD_HASH_INVALID'
} as const;

export type AuthErrorCode = (typeof AUTH_ERROR_CODES)[keyof typeof AUTH_ERROR_CODES];

export function hasAuthErrorCode(error: unknown, code: AuthErrorCode): boolean {
  return error instanceof AppError && error.code === code;
}

export function invalidCredentials(): AppError {
  return new AppError(401, AUTH_ERROR_CODES.invalidCredentials, 'Invalid authentication credentials.');
}

export function tokenRevoked(): AppError {
  return new AppError(401, AUTH_ERROR_CODES.tokenRevoked, 'Token has been invalidated.');
}

export function tokenInvalid(): AppError {
  return new AppError(401, AUTH_ERROR_CODES.tokenInvalid, 'Invalid or expired token.');
}

export function tokenExpired(): AppError {
  return new AppError(401, AUTH_ERROR_CODES.tokenExpired, 'Token has expired.');
}

export function tokenMalformedClaims(): AppError {
  return new AppError(401, AUTH_ERROR_CODES.tokenMalformedClaims, 'Invalid token claims.');
}

export function tokenWrongType(expected: string): AppError {
  return new AppError(401, AUTH_ERROR_CODES.tokenWrongType, `Expected a ${expected} token.`);
}

export function apiKeyInvalidFormat(): AppError {
  return new AppError(401, AUTH_ERROR_CODES.apiKeyInvalidFormat, 'Invalid API key format.');
}

export function apiKeyInvalid(): AppError {
  return new AppError(401, AUTH_ERROR_CODES.apiKeyInvalid, 'Invalid API key.');
}

export function accountInactive(statusCode = 401): AppError {
  return new AppError(statusCode, AUTH_ERROR_CODES.accountInactive, 'User account is inactive.');
}

export function emailNotVerified(): AppError {
  return new AppError(401, AUTH_ERROR_CODES.emailNotVerified, 'Email not verified.');
}

export function verificationCodeInvalid(): AppError {
  return new AppError(400, AUTH_ERROR_CODES.verificationCodeInvalid, 'Invalid or expired verification code.');
}

export function resetTokenInvalid(): AppError {
  return new AppError(400, AUTH_ERROR_CODES.resetTokenInvalid, 'Invalid or expired reset token.');
}

export function wrongPassword(): AppError {
  return new AppError(400, AUTH_ERROR_CODES.wrongPassword, 'Incorrect current password.');
}

export function emailInUse(): AppError {
  return new AppError(409, AUTH_ERROR_CODES.emailInUse, 'An account with this email already exists.');
}

export function passwordHashInvalid(reason: string): AppError {
  return new AppError(500, AUTH_ERROR_CODES.passwordHashInvalid, 'Stored password hash is invalid.', { reason });
}
