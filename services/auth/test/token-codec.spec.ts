import jwt from 'jsonwebtoken';
import { describe, expect, it } from 'vitest';

import { TokenCodec } from '../src/lib/token-codec';

const SECRET = 'test-secret-test-secret-test-secret';

describe('TokenCodec', () => {
  const codec = new TokenCodec(SECRET);

  it('round trips subject, purpose and scalar claims', () => {
    const issued = codec.issue('user-1', 'refresh', 60, { sid: 'session-1' });
    const verified = codec.verify(issued.token, 'refresh');

    expect(verified.ok).toBe(true);
    if (!verified.ok) return;

    expect(verified.value.subject).toBe('user-1');
    expect(verified.value.purpose).toBe('refresh');
    expect(verified.value.tokenId).toBe(issued.tokenId);
    expect(verified.value.claims.sid).toBe('session-1');
  });

  it('refuses a token presented for another purpose', () => {
    const mfaToken = codec.issue('user-1', 'mfa', 60).token;

    expect(codec.verify(mfaToken, 'access')).toEqual({ ok: false, error: 'wrong_purpose' });
    expect(codec.verify(mfaToken, 'mfa').ok).toBe(true);
  });

  it('reports expired tokens', () => {
    const expired = jwt.sign({ type: 'access', exp: Math.floor(Date.now() / 1000) - 10 }, SECRET, {
      algorithm: 'HS256',
      subject: 'user-1',
      jwtid: 'token-1',
      issuer: 'saas-platform-auth',
      audience: 'saas-platform-api',
    });

    expect(codec.verify(expired, 'access')).toEqual({ ok: false, error: 'expired' });
  });

  it('reports tokens signed with another secret', () => {
    const foreign = new TokenCodec('another-secret-another-secret-0000').issue('user-1', 'access', 60);
    expect(codec.verify(foreign.token, 'access')).toEqual({ ok: false, error: 'bad_signature' });
  });

  it('reports garbage as malformed', () => {
    expect(codec.verify('not-a-token', 'access')).toEqual({ ok: false, error: 'malformed' });
  });
});
