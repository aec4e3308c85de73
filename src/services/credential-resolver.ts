import { AppError } from '../errors/app-error.js';
import { accountInactive, invalidCredentials } from '../errors/auth-errors.js';
import type { Logger } from '../logging/logger.js';
import type { AuthUser, UserRepository } from '../repositories/user-repository.js';
import { recordCredentialResolution } from '../telemetry/metrics.js';
import type { ApiKeyService } from './api-key-service.js';
import type { TokenService } from './token-service.js';

const BEARER_PREFIX = 'Bearer ';

export type CredentialKind = 'token' | 'api_key';

export interface AuthenticatedPrincipal {
  user: AuthUser;
  kind: CredentialKind;
}

/**
 * One way of turning a bearer string into a user. Resolvers throw on any
 * failure; the chain decides what the caller gets to see.
 */
export interface CredentialResolver {
  readonly kind: CredentialKind;
  resolve(credential: string): Promise<AuthUser>;
}

export function stripBearerPrefix(credential: string): string {
  return credential.startsWith(BEARER_PREFIX) ? credential.slice(BEARER_PREFIX.length) : credential;
}

export class TokenCredentialResolver implements CredentialResolver {
  public readonly kind = 'token';

  public constructor(
    private readonly tokenService: TokenService,
    private readonly userRepository: UserRepository
  ) {}

  public async resolve(credential: string): Promise<AuthUser> {
    const claims = await this.tokenService.verify(credential);
    const user = await this.userRepository.findUserByEmail(claims.email);
    if (user === null) {
      throw invalidCredentials();
    }

    return user;
  }
}

export class ApiKeyCredentialResolver implements CredentialResolver {
  public readonly kind = 'api_key';

  public constructor(private readonly apiKeyService: ApiKeyService) {}

  public async resolve(credential: string): Promise<AuthUser> {
    return this.apiKeyService.verify(credential);
  }
}

/**
 * Strips a leading `Bearer ` scheme, then tries each resolver in order and
 * returns the first user found. Every failure, whichever resolver produced
 * it, surfaces as `AUTH_INVALID_CREDENTIALS`. Faults other than AppError are logged before
 * being folded in.
 */
export class CredentialResolverChain {
  public constructor(
    private readonly resolvers: readonly CredentialResolver[],
    private readonly logger: Logger
  ) {}

  public async authenticate(credential: string): Promise<AuthenticatedPrincipal> {
    const presented = stripBearerPrefix(credential);

    for (const resolver of this.resolvers) {
      try {
        const user = await resolver.resolve(presented);
        recordCredentialResolution(resolver.kind, 'success');
        return { user, kind: resolver.kind };
      } catch (error) {
        if (error instanceof AppError) {
          this.logger.debug({ kind: resolver.kind, reason: error.code }, 'credential_resolver_rejected');
        } else {
          this.logger.error({ kind: resolver.kind, err: error }, 'credential_resolver_failed');
        }
      }
    }

    recordCredentialResolution('none', 'failure');
    throw invalidCredentials();
  }

  public async resolveUser(credential: string): Promise<AuthUser> {
    const principal = await this.authenticate(credential);
    return principal.user;
  }

  public async resolveActiveUser(credential: string): Promise<AuthUser> {
    return getActiveUser(await this.resolveUser(credential));
  }
}

export function getActiveUser(user: AuthUser): AuthUser {
  if (!user.isActive) {
    throw accountInactive(400);
  }

  return user;
}
