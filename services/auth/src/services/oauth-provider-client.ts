import { z } from 'zod';

import type { OAuthProvider } from '../domain/models';
import type { Env } from '../env';

export interface OAuthProfile {
  providerUserId: string;
  email: string | null;
  name: string | null;
}

/** Raised when a provider rejects the code or returns an unusable response. */
export class OAuthProviderError extends Error {
  constructor(
    readonly provider: OAuthProvider,
    readonly reason: string,
  ) {
    super(`${provider} OAuth request failed: ${reason}`);
    this.name = 'OAuthProviderError';
  }
}

export interface OAuthProviderClient {
  /** Providers with credentials configured. Anything else is unsupported. */
  supportedProviders(): OAuthProvider[];
  buildAuthorizationUrl(provider: OAuthProvider, state: string): string;
  exchangeCode(provider: OAuthProvider, code: string): Promise<string>;
  fetchProfile(provider: OAuthProvider, accessToken: string): Promise<OAuthProfile>;
}

interface ProviderEndpoints {
  authorizeUrl: string;
  tokenUrl: string;
  userInfoUrl: string;
  scope: string;
}

const ENDPOINTS: Record<OAuthProvider, ProviderEndpoints> = {
  google: {
    authorizeUrl: 'https://accounts.google.com/o/oauth2/v2/auth',
    tokenUrl: 'https://oauth2.googleapis.com/token',
    userInfoUrl: 'https://www.googleapis.com/oauth2/v2/userinfo',
    scope: 'openid email profile',
  },
  github: {
    authorizeUrl: 'https://github.com/login/oauth/authorize',
    tokenUrl: 'https://github.com/login/oauth/access_token',
    userInfoUrl: 'https://api.github.com/user',
    scope: 'read:user user:email',
  },
  microsoft: {
    authorizeUrl: 'https://login.microsoftonline.com/common/oauth2/v2.0/authorize',
    tokenUrl: 'https://login.microsoftonline.com/common/oauth2/v2.0/token',
    userInfoUrl: 'https://graph.microsoft.com/v1.0/me',
    scope: 'openid email profile User.Read',
  },
};

const GITHUB_EMAILS_URL = 'https://api.github.com/user/emails';

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
});

const googleProfileSchema = z.object({
  id: z.string(),
  email: z.string().nullish(),
  name: z.string().nullish(),
});

const githubProfileSchema = z.object({
  id: z.union([z.number(), z.string()]),
  email: z.string().nullish(),
  name: z.string().nullish(),
});

const githubEmailsSchema = z.array(
  z.object({
    email: z.string(),
    primary: z.boolean().optional(),
    verified: z.boolean().optional(),
  }),
);

const microsoftProfileSchema = z.object({
  id: z.string(),
  userPrincipalName: z.string().nullish(),
  displayName: z.string().nullish(),
});

interface ProviderCredentials {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

type FetchLike = typeof fetch;

function credentialsFromEnv(env: Env): Partial<Record<OAuthProvider, ProviderCredentials>> {
  const result: Partial<Record<OAuthProvider, ProviderCredentials>> = {};
  const entries: [OAuthProvider, string | undefined, string | undefined, string | undefined][] = [
    ['google', env.GOOGLE_CLIENT_ID, env.GOOGLE_CLIENT_SECRET, env.GOOGLE_REDIRECT_URI],
    ['github', env.GITHUB_CLIENT_ID, env.GITHUB_CLIENT_SECRET, env.GITHUB_REDIRECT_URI],
    ['microsoft', env.MICROSOFT_CLIENT_ID, env.MICROSOFT_CLIENT_SECRET, env.MICROSOFT_REDIRECT_URI],
  ];

  for (const [provider, clientId, clientSecret, redirectUri] of entries) {
    if (clientId && clientSecret && redirectUri) {
      result[provider] = { clientId, clientSecret, redirectUri };
    }
  }

  return result;
}

export class HttpOAuthProviderClient implements OAuthProviderClient {
  private readonly credentials: Partial<Record<OAuthProvider, ProviderCredentials>>;

  constructor(
    env: Env,
    private readonly fetchImpl: FetchLike = fetch,
  ) {
    this.credentials = credentialsFromEnv(env);
  }

  supportedProviders(): OAuthProvider[] {
    const providers: OAuthProvider[] = ['google', 'github', 'microsoft'];
    return providers.filter((provider) => this.credentials[provider] !== undefined);
  }

  buildAuthorizationUrl(provider: OAuthProvider, state: string) {
    const credentials = this.requireCredentials(provider);
    const endpoints = ENDPOINTS[provider];
    const params = new URLSearchParams({
      client_id: credentials.clientId,
      redirect_uri: credentials.redirectUri,
      response_type: 'code',
      scope: endpoints.scope,
      state,
    });
    return `${endpoints.authorizeUrl}?${params.toString()}`;
  }

  async exchangeCode(provider: OAuthProvider, code: string) {
    const credentials = this.requireCredentials(provider);
    const response = await this.send(provider, ENDPOINTS[provider].tokenUrl, {
      method: 'POST',
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: new URLSearchParams({
        grant_type: 'authorization_code',
        code,
        client_id: credentials.clientId,
        client_secret: credentials.clientSecret,
        redirect_uri: credentials.redirectUri,
      }).toString(),
    });

    if (!response.ok) {
      throw new OAuthProviderError(provider, `token endpoint returned ${response.status}`);
    }

    const contentType = response.headers.get('content-type') ?? '';
    const payload = contentType.includes('application/json')
      ? await this.readJson(provider, response)
      : Object.fromEntries(new URLSearchParams(await response.text()));

    const parsed = tokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new OAuthProviderError(provider, 'token response did not include an access token');
    }

    return parsed.data.access_token;
  }

  async fetchProfile(provider: OAuthProvider, accessToken: string): Promise<OAuthProfile> {
    const body = await this.getJson(provider, ENDPOINTS[provider].userInfoUrl, accessToken);

    switch (provider) {
      case 'google': {
        const profile = this.parse(provider, googleProfileSchema, body);
        return { providerUserId: profile.id, email: profile.email ?? null, name: profile.name ?? null };
      }
      case 'github': {
        const profile = this.parse(provider, githubProfileSchema, body);
        const email = profile.email ?? (await this.fetchGithubEmail(accessToken));
        return { providerUserId: String(profile.id), email, name: profile.name ?? null };
      }
      case 'microsoft': {
        const profile = this.parse(provider, microsoftProfileSchema, body);
        return {
          providerUserId: profile.id,
          email: profile.userPrincipalName ?? null,
          name: profile.displayName ?? null,
        };
      }
    }
  }

  private async fetchGithubEmail(accessToken: string) {
    const body = await this.getJson('github', GITHUB_EMAILS_URL, accessToken);
    const emails = this.parse('github', githubEmailsSchema, body);
    const primary = emails.find((entry) => entry.primary && entry.verified);
    const verified = emails.find((entry) => entry.verified);
    return primary?.email ?? verified?.email ?? null;
  }

  private async getJson(provider: OAuthProvider, url: string, accessToken: string) {
    const response = await this.send(provider, url, {
      headers: { Authorization: `Bearer ${accessToken}`, Accept: 'application/json' },
    });

    if (!response.ok) {
      throw new OAuthProviderError(provider, `${url} returned ${response.status}`);
    }

    return this.readJson(provider, response);
  }

  private async send(provider: OAuthProvider, url: string, init: RequestInit) {
    try {
      return await this.fetchImpl(url, init);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new OAuthProviderError(provider, `request to ${url} failed: ${detail}`);
    }
  }

  private async readJson(provider: OAuthProvider, response: Response): Promise<unknown> {
    try {
      const body: unknown = await response.json();
      return body;
    } catch {
      throw new OAuthProviderError(provider, 'response body was not valid JSON');
    }
  }

  private parse<T>(provider: OAuthProvider, schema: z.ZodType<T>, body: unknown): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new OAuthProviderError(provider, 'unexpected profile payload');
    }
    return parsed.data;
  }

  private requireCredentials(provider: OAuthProvider) {
    const credentials = this.credentials[provider];
    if (!credentials) {
      throw new OAuthProviderError(provider, 'provider is not configured');
    }
    return credentials;
  }
}
