import crypto from 'node:crypto';
import jwt from 'jsonwebtoken';

import { fail, ok, type Result } from '../domain/failures';

const TOKEN_ISSUER = 'saas-platform-auth';
const TOKEN_AUDIENCE = 'saas-platform-api';
const ALGORITHM = 'HS256';

export type TokenPurpose = 'access' | 'refresh' | 'mfa';

const PURPOSES: readonly TokenPurpose[] = ['access', 'refresh', 'mfa'];

export type TokenClaims = Record<string, string | number | boolean | null>;

export interface VerifiedToken {
  subject: string;
  purpose: TokenPurpose;
  tokenId: string;
  issuedAt: Date;
  expiresAt: Date;
  claims: TokenClaims;
}

export type VerificationError = 'malformed' | 'expired' | 'bad_signature' | 'wrong_purpose';

export interface IssuedToken {
  token: string;
  tokenId: string;
  expiresAt: Date;
}

/**
 * Signs short-lived bearer tokens. Every token carries a `type` claim naming its
 * purpose, and verification fails unless the caller asks for that same purpose,
 * so an MFA challenge can never pass as an access token.
 */
export class TokenCodec {
  constructor(private readonly secret: string) {}

  issue(
    subject: string,
    purpose: TokenPurpose,
    ttlSeconds: number,
    claims: TokenClaims = {},
  ): IssuedToken {
    const tokenId = crypto.randomUUID();
    const nowSeconds = Math.floor(Date.now() / 1000);

    const token = jwt.sign({ ...claims, type: purpose }, this.secret, {
      algorithm: ALGORITHM,
      subject,
      jwtid: tokenId,
      issuer: TOKEN_ISSUER,
      audience: TOKEN_AUDIENCE,
      expiresIn: ttlSeconds,
    });

    return { token, tokenId, expiresAt: new Date((nowSeconds + ttlSeconds) * 1000) };
  }

  verify(token: string, expectedPurpose: TokenPurpose): Result<VerifiedToken, VerificationError> {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret, {
        algorithms: [ALGORITHM],
        issuer: TOKEN_ISSUER,
        audience: TOKEN_AUDIENCE,
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        return fail('expired');
      }
      if (error instanceof jwt.JsonWebTokenError && error.message === 'invalid signature') {
        return fail('bad_signature');
      }
      return fail('malformed');
    }

    if (typeof decoded === 'string') {
      return fail('malformed');
    }

    const { sub, type, jti, iat, exp, ...rest } = decoded;
    if (!sub || !jti || iat === undefined || exp === undefined || !isPurpose(type)) {
      return fail('malformed');
    }

    if (type !== expectedPurpose) {
      return fail('wrong_purpose');
    }

    return ok({
      subject: sub,
      purpose: type,
      tokenId: jti,
      issuedAt: new Date(iat * 1000),
      expiresAt: new Date(exp * 1000),
      claims: pickScalarClaims(rest),
    });
  }
}

function isPurpose(value: unknown): value is TokenPurpose {
  return typeof value === 'string' && PURPOSES.some((purpose) => purpose === value);
}

function pickScalarClaims(payload: Record<string, unknown>): TokenClaims {
  const claims: TokenClaims = {};
  for (const [key, value] of Object.entries(payload)) {
    if (
      value === null ||
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean'
    ) {
      claims[key] = value;
    }
  }
  return claims;
}
