import crypto from 'node:crypto';

import type { DeviceType, RequestContext, SessionRecord } from '../domain/models';
import type { AuthRepository } from '../repositories/auth-repository';

const TABLET_PATTERN = /ipad|tablet|kindle|silk|playbook|android(?!.*mobile)/i;
const MOBILE_PATTERN = /mobi|iphone|ipod|android|blackberry|opera mini|windows phone/i;

export function detectDeviceType(userAgent: string | null | undefined): DeviceType | null {
  if (!userAgent) {
    return null;
  }
  if (TABLET_PATTERN.test(userAgent)) {
    return 'tablet';
  }
  if (MOBILE_PATTERN.test(userAgent)) {
    return 'mobile';
  }
  return 'desktop';
}

export function hashRefreshToken(token: string) {
  return crypto.createHash('sha256').update(token).digest('hex');
}

function hashesMatch(left: string, right: string) {
  const a = Buffer.from(left, 'hex');
  const b = Buffer.from(right, 'hex');
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

export interface CreateSessionParams {
  sessionId: string;
  userId: string;
  refreshToken: string;
  expiresAt: Date;
}

export interface SessionStats {
  total: number;
  active: number;
  devices: number;
}

/**
 * Device sessions backing refresh tokens. Only a SHA-256 digest of the current
 * refresh token is stored; rotating the token replaces the digest.
 */
export class SessionService {
  constructor(private readonly repository: AuthRepository) {}

  async createSession(params: CreateSessionParams, context: RequestContext) {
    return this.repository.createSession({
      id: params.sessionId,
      userId: params.userId,
      tokenHash: hashRefreshToken(params.refreshToken),
      ipAddress: context.ipAddress ?? null,
      userAgent: context.userAgent ?? null,
      deviceType: detectDeviceType(context.userAgent),
      expiresAt: params.expiresAt,
    });
  }

  /**
   * Resolves the session only while it is active and unexpired. When a refresh
   * token is given it must be the one most recently issued for the session.
   */
  async findActiveSession(sessionId: string, refreshToken?: string): Promise<SessionRecord | null> {
    const session = await this.repository.findSessionById(sessionId);

    if (!session || !session.isActive || session.revokedAt) {
      return null;
    }

    if (session.expiresAt.getTime() <= Date.now()) {
      return null;
    }

    if (refreshToken !== undefined && !hashesMatch(session.tokenHash, hashRefreshToken(refreshToken))) {
      return null;
    }

    return session;
  }

  /** Resolves false when `previousToken` is no longer the session's current token. */
  async rotateSessionToken(
    sessionId: string,
    previousToken: string,
    nextToken: string,
    expiresAt: Date,
  ): Promise<boolean> {
    return this.repository.rotateSessionToken(
      sessionId,
      hashRefreshToken(previousToken),
      hashRefreshToken(nextToken),
      expiresAt,
      new Date(),
    );
  }

  async listSessions(userId: string) {
    const now = Date.now();
    const sessions = await this.repository.listSessions(userId);
    return sessions.filter((session) => session.isActive && session.expiresAt.getTime() > now);
  }

  async getSessionStats(userId: string): Promise<SessionStats> {
    const [total, active] = await Promise.all([
      this.repository.countSessions(userId),
      this.listSessions(userId),
    ]);
    const devices = new Set(
      active.flatMap((session) => (session.deviceType ? [session.deviceType] : [])),
    );

    return { total, active: active.length, devices: devices.size };
  }

  async revokeSession(sessionId: string, userId: string): Promise<boolean> {
    const session = await this.repository.findSessionById(sessionId);

    if (!session || session.userId !== userId) {
      return false;
    }

    if (session.isActive) {
      await this.repository.revokeSession(sessionId, new Date());
    }

    return true;
  }

  async revokeAllSessions(userId: string, exceptSessionId?: string) {
    return this.repository.revokeSessionsForUser(userId, new Date(), exceptSessionId);
  }
}
