import { describe, expect, it } from 'vitest';

import { SessionService, detectDeviceType } from '../src/services/session-service';
import { InMemoryAuthRepository } from './in-memory-auth-repository';

const IPHONE =
  'Mozilla/5.0 (iPhone; CPU iPhone OS 17_0 like Mac OS X) AppleWebKit/605.1.15 Mobile/15E148';
const IPAD = 'Mozilla/5.0 (iPad; CPU OS 17_0 like Mac OS X) AppleWebKit/605.1.15 Mobile/15E148';
const ANDROID_TABLET = 'Mozilla/5.0 (Linux; Android 14; SM-X710) AppleWebKit/537.36 Safari/537.36';
const DESKTOP = 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 Chrome/126.0 Safari/537.36';

function inOneHour() {
  return new Date(Date.now() + 60 * 60 * 1000);
}

describe('detectDeviceType', () => {
  it('classifies common user agents', () => {
    expect(detectDeviceType(IPHONE)).toBe('mobile');
    expect(detectDeviceType(IPAD)).toBe('tablet');
    expect(detectDeviceType(ANDROID_TABLET)).toBe('tablet');
    expect(detectDeviceType(DESKTOP)).toBe('desktop');
    expect(detectDeviceType(null)).toBeNull();
  });
});

describe('SessionService', () => {
  it('stores a digest of the refresh token, never the token', async () => {
    const repository = new InMemoryAuthRepository();
    const sessions = new SessionService(repository);

    const session = await sessions.createSession(
      { sessionId: 'session-1', userId: 'user-1', refreshToken: 'refresh-a', expiresAt: inOneHour() },
      { ipAddress: '10.0.0.1', userAgent: IPHONE },
    );

    expect(session.tokenHash).toMatch(/^[0-9a-f]{64}$/);
    expect(session.tokenHash).not.toContain('refresh-a');
    expect(session.deviceType).toBe('mobile');
  });

  it('matches only the most recently issued refresh token', async () => {
    const sessions = new SessionService(new InMemoryAuthRepository());
    await sessions.createSession(
      { sessionId: 'session-1', userId: 'user-1', refreshToken: 'refresh-a', expiresAt: inOneHour() },
      {},
    );

    const rotated = await sessions.rotateSessionToken(
      'session-1',
      'refresh-a',
      'refresh-b',
      inOneHour(),
    );

    expect(rotated).toBe(true);
    expect(await sessions.findActiveSession('session-1', 'refresh-a')).toBeNull();
    expect((await sessions.findActiveSession('session-1', 'refresh-b'))?.id).toBe('session-1');
  });

  it('refuses to rotate from a token that was already replaced', async () => {
    const sessions = new SessionService(new InMemoryAuthRepository());
    await sessions.createSession(
      { sessionId: 'session-1', userId: 'user-1', refreshToken: 'refresh-a', expiresAt: inOneHour() },
      {},
    );

    await sessions.rotateSessionToken('session-1', 'refresh-a', 'refresh-b', inOneHour());
    const second = await sessions.rotateSessionToken(
      'session-1',
      'refresh-a',
      'refresh-c',
      inOneHour(),
    );

    expect(second).toBe(false);
    expect((await sessions.findActiveSession('session-1', 'refresh-b'))?.id).toBe('session-1');
    expect(await sessions.findActiveSession('session-1', 'refresh-c')).toBeNull();
  });

  it('refuses to rotate a revoked session', async () => {
    const sessions = new SessionService(new InMemoryAuthRepository());
    await sessions.createSession(
      { sessionId: 'session-1', userId: 'user-1', refreshToken: 'refresh-a', expiresAt: inOneHour() },
      {},
    );
    await sessions.revokeSession('session-1', 'user-1');

    const rotated = await sessions.rotateSessionToken(
      'session-1',
      'refresh-a',
      'refresh-b',
      inOneHour(),
    );
    expect(rotated).toBe(false);
  });

  it('treats expired sessions as inactive', async () => {
    const sessions = new SessionService(new InMemoryAuthRepository());
    await sessions.createSession(
      {
        sessionId: 'session-1',
        userId: 'user-1',
        refreshToken: 'refresh-a',
        expiresAt: new Date(Date.now() - 1000),
      },
      {},
    );

    expect(await sessions.findActiveSession('session-1')).toBeNull();
    expect(await sessions.listSessions('user-1')).toEqual([]);
  });

  it('revokes only sessions the caller owns', async () => {
    const sessions = new SessionService(new InMemoryAuthRepository());
    await sessions.createSession(
      { sessionId: 'session-1', userId: 'user-1', refreshToken: 'refresh-a', expiresAt: inOneHour() },
      {},
    );

    expect(await sessions.revokeSession('session-1', 'user-2')).toBe(false);
    expect(await sessions.findActiveSession('session-1')).not.toBeNull();

    expect(await sessions.revokeSession('session-1', 'user-1')).toBe(true);
    expect(await sessions.findActiveSession('session-1')).toBeNull();
  });

  it('revokes every other session of a user', async () => {
    const sessions = new SessionService(new InMemoryAuthRepository());
    for (const id of ['session-1', 'session-2', 'session-3']) {
      await sessions.createSession(
        { sessionId: id, userId: 'user-1', refreshToken: `refresh-${id}`, expiresAt: inOneHour() },
        {},
      );
    }

    expect(await sessions.revokeAllSessions('user-1', 'session-2')).toBe(2);
    expect((await sessions.listSessions('user-1')).map((session) => session.id)).toEqual([
      'session-2',
    ]);
  });

  it('summarises total, active and distinct-device counts', async () => {
    const sessions = new SessionService(new InMemoryAuthRepository());
    const open = [
      { id: 'session-1', userAgent: IPHONE },
      { id: 'session-2', userAgent: DESKTOP },
      { id: 'session-3', userAgent: DESKTOP },
      { id: 'session-4', userAgent: IPAD },
    ];
    for (const { id, userAgent } of open) {
      await sessions.createSession(
        { sessionId: id, userId: 'user-1', refreshToken: `refresh-${id}`, expiresAt: inOneHour() },
        { userAgent },
      );
    }
    await sessions.createSession(
      { sessionId: 'session-5', userId: 'user-2', refreshToken: 'refresh-5', expiresAt: inOneHour() },
      { userAgent: DESKTOP },
    );
    await sessions.revokeSession('session-4', 'user-1');

    expect(await sessions.getSessionStats('user-1')).toEqual({ total: 4, active: 3, devices: 2 });
  });
});
