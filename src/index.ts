export { getEnv, type Env } from './config/env.js';
export type {
  CredentialCipher,
  GeneratedApiKey,
  TokenClaimsInput,
  TokenPayload,
  TokenType
} from './crypto/credential-cipher.js';
export { DefaultCredentialCipher, type DefaultCredentialCipherConfig } from './crypto/default-credential-cipher.js';
export { AppError, isAppError } from './errors/app-error.js';
export { AUTH_ERROR_CODES, hasAuthErrorCode, type AuthErrorCode } from './errors/auth-errors.js';
export { describeError, type ErrorBody } from './errors/describe-error.js';
export { createLogger, createSilentLogger, type Logger, type LogLevel } from './logging/logger.js';
export { LoggingNotifier, type EmailTemplates } from './notifications/logging-notifier.js';
export type { EmailContext, Notifier } from './notifications/notifier.js';
export type { ApiKeyAuthRecord, ApiKeyRecord, ApiKeyRepository } from './repositories/api-key-repository.js';
export type { Collection, CollectionRepository, Graph } from './repositories/collection-repository.js';
export { InMemoryApiKeyRepository } from './repositories/in-memory-api-key-repository.js';
export { InMemoryCollectionRepository } from './repositories/in-memory-collection-repository.js';
export { InMemoryTokenBlacklistRepository } from './repositories/in-memory-token-blacklist-repository.js';
export { InMemoryUserRepository } from './repositories/in-memory-user-repository.js';
export { PostgresApiKeyRepository } from './repositories/postgres-api-key-repository.js';
export { PostgresCollectionRepository } from './repositories/postgres-collection-repository.js';
export { PostgresTokenBlacklistRepository } from './repositories/postgres-token-blacklist-repository.js';
export { PostgresUserRepository } from './repositories/postgres-user-repository.js';
export type { BlacklistEntry, TokenBlacklistRepository } from './repositories/token-blacklist-repository.js';
export type { AuthUser, CreateUserInput, UserRepository } from './repositories/user-repository.js';
export { createAuthRuntime, type AuthRuntime, type CreateAuthRuntimeOptions } from './runtime.js';
export {
  ACCOUNT_MESSAGES,
  AccountService,
  USED_VERIFICATION_CODE,
  type AccountServiceConfig,
  type MessageResponse,
  type RegisterOptions
} from './services/account-service.js';
export { ApiKeyService, type ApiKeySummary, type CreateApiKeyResult } from './services/api-key-service.js';
export { BlacklistGuard } from './services/blacklist-guard.js';
export {
  ApiKeyCredentialResolver,
  CredentialResolverChain,
  getActiveUser,
  stripBearerPrefix,
  TokenCredentialResolver,
  type AuthenticatedPrincipal,
  type CredentialKind,
  type CredentialResolver
} from './services/credential-resolver.js';
export {
  DEFAULT_ACCESS_TOKEN_LIFETIME_MINUTES,
  DEFAULT_REFRESH_TOKEN_LIFETIME_DAYS,
  TokenCodec,
  type TokenClaims,
  type TokenCodecConfig
} from './services/token-codec.js';
export { TokenService, type RevocationReason, type Token, type TokenPair } from './services/token-service.js';
