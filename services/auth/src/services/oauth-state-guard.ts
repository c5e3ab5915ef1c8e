import crypto from 'node:crypto';

import { fail, ok, type AuthFailure, type Result } from '../domain/failures';
import type { OAuthProvider } from '../domain/models';
import type { EphemeralCache } from '../lib/cache';

const KEY_PREFIX = 'oauth_state:';
const STATE_BYTES = 32;

export type StateRejection = Extract<
  AuthFailure,
  { kind: 'invalid_or_expired_challenge' } | { kind: 'provider_mismatch' }
>;

export interface OAuthStateGuardOptions {
  cache: EphemeralCache;
  ttlSeconds: number;
}

/**
 * Single-use CSRF state for the authorization-code flow. A state is bound to
 * the provider it was issued for and is gone after the first consume attempt,
 * whether or not the provider matched.
 */
export class OAuthStateGuard {
  private readonly cache: EphemeralCache;

  private readonly ttlSeconds: number;

  constructor(options: OAuthStateGuardOptions) {
    this.cache = options.cache;
    this.ttlSeconds = options.ttlSeconds;
  }

  async issue(provider: OAuthProvider): Promise<string> {
    const state = crypto.randomBytes(STATE_BYTES).toString('base64url');
    await this.cache.set(KEY_PREFIX + state, provider, this.ttlSeconds);
    return state;
  }

  async consume(provider: OAuthProvider, state: string): Promise<Result<true, StateRejection>> {
    const stored = await this.cache.take(KEY_PREFIX + state);

    if (stored === null) {
      return fail({ kind: 'invalid_or_expired_challenge', challenge: 'oauth_state' });
    }

    if (stored !== provider) {
      return fail({ kind: 'provider_mismatch', expected: stored, received: provider });
    }

    return ok(true);
  }
}
