import { ServiceError, badRequest, locked, notFound, unauthorized } from '../errors';

export type InvalidCredentialReason =
  | 'user_not_found'
  | 'user_inactive'
  | 'password_not_set'
  | 'password_mismatch';

export type ChallengeKind = 'mfa' | 'oauth_state' | 'refresh';

export type ResourceKind = 'api_key' | 'session' | 'user';

export type AuthFailure =
  | { kind: 'invalid_credentials'; reason: InvalidCredentialReason }
  | { kind: 'account_locked'; lockedUntil: Date }
  | { kind: 'invalid_or_expired_challenge'; challenge: ChallengeKind }
  | { kind: 'provider_mismatch'; expected: string; received: string }
  | { kind: 'invalid_mfa_code' }
  | { kind: 'not_found'; resource: ResourceKind }
  | { kind: 'already_enabled' }
  | { kind: 'not_enabled' };

export type AuthFailureKind = AuthFailure['kind'];

export type Result<T, E = AuthFailure> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

const NOT_FOUND_CODES: Record<ResourceKind, [string, string]> = {
  api_key: ['API_KEY_NOT_FOUND', 'API key not found'],
  session: ['SESSION_NOT_FOUND', 'Session not found'],
  user: ['USER_NOT_FOUND', 'User not found'],
};

/**
 * Collapses a failure into the client-facing error. Internal detail such as
 * which credential check failed is dropped here; only lockout and provider
 * mismatch keep a specific message.
 */
export function toServiceError(failure: AuthFailure): ServiceError {
  switch (failure.kind) {
    case 'invalid_credentials':
      return unauthorized('AUTH_INVALID_CREDENTIALS', 'Incorrect email or password');
    case 'account_locked':
      return locked(
        'AUTH_ACCOUNT_LOCKED',
        'Account is temporarily locked due to too many failed login attempts',
        { lockedUntil: failure.lockedUntil.toISOString() },
      );
    case 'invalid_or_expired_challenge':
      if (failure.challenge === 'oauth_state') {
        return badRequest('OAUTH_STATE_INVALID', 'Invalid or expired state parameter');
      }
      if (failure.challenge === 'refresh') {
        return unauthorized('AUTH_INVALID_REFRESH_TOKEN', 'Invalid refresh token');
      }
      return unauthorized('AUTH_CHALLENGE_INVALID', 'Invalid MFA token or code');
    case 'provider_mismatch':
      return badRequest('OAUTH_PROVIDER_MISMATCH', 'Provider mismatch, possible CSRF attack');
    case 'invalid_mfa_code':
      return unauthorized('AUTH_MFA_CODE_INVALID', 'Invalid MFA token or code');
    case 'not_found': {
      const [code, message] = NOT_FOUND_CODES[failure.resource];
      return notFound(code, message);
    }
    case 'already_enabled':
      return badRequest('TOTP_ALREADY_ENABLED', 'TOTP already enabled for this user');
    case 'not_enabled':
      return badRequest('TOTP_NOT_ENABLED', 'TOTP not enabled for this user');
  }
}
