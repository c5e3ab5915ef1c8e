import { afterEach, describe, expect, it, vi } from 'vitest';

import { MemoryCache } from '../src/lib/cache';
import { OAuthStateGuard } from '../src/services/oauth-state-guard';

function createGuard() {
  const cache = new MemoryCache();
  return { cache, guard: new OAuthStateGuard({ cache, ttlSeconds: 600 }) };
}

describe('OAuthStateGuard', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('stores the provider under an oauth_state key', async () => {
    const { cache, guard } = createGuard();

    const state = await guard.issue('google');

    expect(state).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(await cache.get(`oauth_state:${state}`)).toBe('google');
  });

  it('accepts a state once for the provider it was issued for', async () => {
    const { guard } = createGuard();
    const state = await guard.issue('google');

    expect(await guard.consume('google', state)).toEqual({ ok: true, value: true });
    expect(await guard.consume('google', state)).toEqual({
      ok: false,
      error: { kind: 'invalid_or_expired_challenge', challenge: 'oauth_state' },
    });
  });

  it('reports a provider mismatch and still invalidates the state', async () => {
    const { cache, guard } = createGuard();
    const state = await guard.issue('google');

    expect(await guard.consume('github', state)).toEqual({
      ok: false,
      error: { kind: 'provider_mismatch', expected: 'google', received: 'github' },
    });
    expect(await cache.get(`oauth_state:${state}`)).toBeNull();
    expect(await guard.consume('google', state)).toEqual({
      ok: false,
      error: { kind: 'invalid_or_expired_challenge', challenge: 'oauth_state' },
    });
  });

  it('rejects unknown states', async () => {
    const { guard } = createGuard();

    const result = await guard.consume('google', 'never-issued');

    expect(result.ok).toBe(false);
  });

  it('expires states after the configured ttl', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const { guard } = createGuard();
    const state = await guard.issue('microsoft');

    vi.setSystemTime(new Date('2026-01-01T00:10:00Z'));

    expect(await guard.consume('microsoft', state)).toEqual({
      ok: false,
      error: { kind: 'invalid_or_expired_challenge', challenge: 'oauth_state' },
    });
  });
});
