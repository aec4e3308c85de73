import { Pool } from 'pg';

import { getEnv, type Env } from './config/env.js';
import type { CredentialCipher } from './crypto/credential-cipher.js';
import { DefaultCredentialCipher } from './crypto/default-credential-cipher.js';
import { createLogger, type Logger } from './logging/logger.js';
import { LoggingNotifier } from './notifications/logging-notifier.js';
import type { Notifier } from './notifications/notifier.js';
import type { ApiKeyRepository } from './repositories/api-key-repository.js';
import type { CollectionRepository } from './repositories/collection-repository.js';
import { InMemoryApiKeyRepository } from './repositories/in-memory-api-key-repository.js';
import { InMemoryCollectionRepository } from './repositories/in-memory-collection-repository.js';
import { InMemoryTokenBlacklistRepository } from './repositories/in-memory-token-blacklist-repository.js';
import { InMemoryUserRepository } from './repositories/in-memory-user-repository.js';
import { PostgresApiKeyRepository } from './repositories/postgres-api-key-repository.js';
import { PostgresCollectionRepository } from './repositories/postgres-collection-repository.js';
import { PostgresTokenBlacklistRepository } from './repositories/postgres-token-blacklist-repository.js';
import { PostgresUserRepository } from './repositories/postgres-user-repository.js';
import type { TokenBlacklistRepository } from './repositories/token-blacklist-repository.js';
import type { UserRepository } from './repositories/user-repository.js';
import { AccountService } from './services/account-service.js';
import { ApiKeyService } from './services/api-key-service.js';
import { BlacklistGuard } from './services/blacklist-guard.js';
import {
  ApiKeyCredentialResolver,
  CredentialResolverChain,
  TokenCredentialResolver
} from './services/credential-resolver.js';
import { TokenCodec } from './services/token-codec.js';
import { TokenService } from './services/token-service.js';

export interface CreateAuthRuntimeOptions {
  envOverrides?: Partial<Record<keyof Env, unknown>>;
  userRepository?: UserRepository;
  collectionRepository?: CollectionRepository;
  apiKeyRepository?: ApiKeyRepository;
  tokenBlacklistRepository?: TokenBlacklistRepository;
  cipher?: CredentialCipher;
  notifier?: Notifier;
  logger?: Logger;
  clock?: () => Date;
}

export interface AuthRuntime {
  env: Env;
  logger: Logger;
  userRepository: UserRepository;
  collectionRepository: CollectionRepository;
  apiKeyRepository: ApiKeyRepository;
  tokenBlacklistRepository: TokenBlacklistRepository;
  tokenService: TokenService;
  apiKeyService: ApiKeyService;
  credentialResolver: CredentialResolverChain;
  accountService: AccountService;
  initialize(): Promise<void>;
  close(): Promise<void>;
}

export function createAuthRuntime(options: CreateAuthRuntimeOptions = {}): AuthRuntime {
  const env = getEnv(options.envOverrides);
  const logger = options.logger ?? createLogger({ name: 'credential-lifecycle', level: env.LOG_LEVEL });

  let pgPool: Pool | null = null;
  const getPool = (): Pool => {
    if (pgPool !== null) {
      return pgPool;
    }

    if (typeof env.DATABASE_URL !== 'string' || env.DATABASE_URL.length === 0) {
      throw new Error('DATABASE_URL is not configured.');
    }

    pgPool = new Pool({ connectionString: env.DATABASE_URL });
    return pgPool;
  };
  const usePostgres = typeof env.DATABASE_URL === 'string' && env.DATABASE_URL.length > 0;

  const userRepository = options.userRepository
    ?? (usePostgres ? new PostgresUserRepository(getPool()) : new InMemoryUserRepository());
  const collectionRepository = options.collectionRepository
    ?? (usePostgres ? new PostgresCollectionRepository(getPool()) : new InMemoryCollectionRepository());
  const apiKeyRepository = options.apiKeyRepository
    ?? (usePostgres ? new PostgresApiKeyRepository(getPool()) : new InMemoryApiKeyRepository());
  const tokenBlacklistRepository = options.tokenBlacklistRepository
    ?? (usePostgres ? new PostgresTokenBlacklistRepository(getPool()) : new InMemoryTokenBlacklistRepository());

  const cipher = options.cipher ?? new DefaultCredentialCipher({
    tokenSecret: env.AUTH_TOKEN_SECRET,
    issuer: env.AUTH_TOKEN_ISSUER
  });
  const notifier = options.notifier ?? new LoggingNotifier(logger.child({ component: 'notifier' }));

  const tokenCodec = new TokenCodec(cipher, {
    accessTokenLifetimeMinutes: env.AUTH_ACCESS_TOKEN_LIFETIME_MINUTES,
    refreshTokenLifetimeDays: env.AUTH_REFRESH_TOKEN_LIFETIME_DAYS,
    clock: options.clock
  });
  const tokenService = new TokenService(
    tokenCodec,
    new BlacklistGuard(tokenBlacklistRepository),
    logger.child({ component: 'token-service' })
  );
  const apiKeyService = new ApiKeyService(
    apiKeyRepository,
    userRepository,
    cipher,
    logger.child({ component: 'api-key-service' })
  );
  const credentialResolver = new CredentialResolverChain(
    [
      new TokenCredentialResolver(tokenService, userRepository),
      new ApiKeyCredentialResolver(apiKeyService)
    ],
    logger.child({ component: 'credential-resolver' })
  );
  const accountService = new AccountService(
    userRepository,
    collectionRepository,
    tokenService,
    cipher,
    notifier,
    logger.child({ component: 'account-service' }),
    {
      requireEmailVerification: env.AUTH_REQUIRE_EMAIL_VERIFICATION,
      verificationCodeTtlHours: env.AUTH_VERIFICATION_CODE_TTL_HOURS,
      resetTokenTtlMinutes: env.AUTH_RESET_TOKEN_TTL_MINUTES,
      adminEmail: env.ADMIN_EMAIL,
      adminPassword: env.ADMIN_PASSWORD,
      clock: options.clock
    }
  );

  return {
    env,
    logger,
    userRepository,
    collectionRepository,
    apiKeyRepository,
    tokenBlacklistRepository,
    tokenService,
    apiKeyService,
    credentialResolver,
    accountService,
    async initialize() {
      await accountService.initialize();
    },
    async close() {
      if (pgPool !== null) {
        await pgPool.end();
        pgPool = null;
      }
    }
  };
}
