import { metrics } from '@opentelemetry/api';

const meter = metrics.getMeter('credential-lifecycle');

const tokenIssuedCount = meter.createCounter('auth.token.issued', {
  description: 'Count of access and refresh tokens issued'
});

const tokenRevokedCount = meter.createCounter('auth.token.revoked', {
  description: 'Count of tokens added to the blacklist'
});

const credentialResolutionCount = meter.createCounter('auth.credential.resolutions', {
  description: 'Count of bearer credential resolutions by outcome'
});

const loginAttemptCount = meter.createCounter('auth.login.attempts', {
  description: 'Count of password logins by outcome'
});

const blacklistPurgedCount = meter.createCounter('auth.blacklist.purged', {
  description: 'Count of expired blacklist entries removed'
});

export function recordTokenIssued(tokenType: string): void {
  tokenIssuedCount.add(1, { token_type: tokenType });
}

export function recordTokenRevoked(reason: 'logout' | 'rotation' | 'revoke'): void {
  tokenRevokedCount.add(1, { reason });
}

export function recordCredentialResolution(mode: string, outcome: 'success' | 'failure'): void {
  credentialResolutionCount.add(1, { mode, outcome });
}

export function recordLoginAttempt(outcome: string): void {
  loginAttemptCount.add(1, { outcome });
}

export function recordBlacklistPurged(count: number): void {
  blacklistPurgedCount.add(count);
}
