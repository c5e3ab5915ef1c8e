import { z } from 'zod';

import type { Env } from '../env';

export interface KeycloakProfile {
  subject: string;
  email: string | null;
  name: string | null;
}

export class KeycloakError extends Error {
  constructor(readonly reason: string) {
    super(`Keycloak request failed: ${reason}`);
    this.name = 'KeycloakError';
  }
}

/** Resolves a Keycloak access token to the identity behind it. */
export interface KeycloakClient {
  fetchUserInfo(accessToken: string): Promise<KeycloakProfile>;
}

const userInfoSchema = z.object({
  sub: z.string().min(1),
  email: z.string().nullish(),
  name: z.string().nullish(),
  preferred_username: z.string().nullish(),
});

type FetchLike = typeof fetch;

export class HttpKeycloakClient implements KeycloakClient {
  private readonly userInfoUrl: string | null;

  constructor(
    env: Pick<Env, 'KEYCLOAK_SERVER_URL' | 'KEYCLOAK_REALM'>,
    private readonly fetchImpl: FetchLike = fetch,
  ) {
    const server = env.KEYCLOAK_SERVER_URL?.replace(/\/+$/, '');
    this.userInfoUrl =
      server && env.KEYCLOAK_REALM
        ? `${server}/realms/${encodeURIComponent(env.KEYCLOAK_REALM)}/protocol/openid-connect/userinfo`
        : null;
  }

  async fetchUserInfo(accessToken: string): Promise<KeycloakProfile> {
    if (!this.userInfoUrl) {
      throw new KeycloakError('keycloak is not configured');
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.userInfoUrl, {
        headers: { Authorization: `Bearer ${accessToken}`, Accept: 'application/json' },
      });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new KeycloakError(`userinfo request failed: ${detail}`);
    }

    if (!response.ok) {
      throw new KeycloakError(`userinfo returned ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new KeycloakError('userinfo body was not valid JSON');
    }

    const parsed = userInfoSchema.safeParse(body);
    if (!parsed.success) {
      throw new KeycloakError('unexpected userinfo payload');
    }

    return {
      subject: parsed.data.sub,
      email: parsed.data.email ?? null,
      name: parsed.data.name ?? parsed.data.preferred_username ?? null,
    };
  }
}
