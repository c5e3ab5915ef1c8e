import type { OAuthProvider } from '../src/domain/models';
import {
  OAuthProviderError,
  type OAuthProfile,
  type OAuthProviderClient,
} from '../src/services/oauth-provider-client';

export const FAILING_CODE = 'rejected-code';

export class FakeOAuthProviderClient implements OAuthProviderClient {
  readonly exchangedCodes: { provider: OAuthProvider; code: string }[] = [];

  private profiles = new Map<OAuthProvider, OAuthProfile>([
    ['google', { providerUserId: 'google-100', email: 'Oauth.User@Example.com', name: 'OAuth User' }],
    ['github', { providerUserId: '4200', email: 'octo@example.com', name: null }],
    ['microsoft', { providerUserId: 'ms-7', email: 'ms.user@example.com', name: 'MS User' }],
  ]);

  supportedProviders(): OAuthProvider[] {
    return ['google', 'github', 'microsoft'];
  }

  buildAuthorizationUrl(provider: OAuthProvider, state: string) {
    return `https://${provider}.example.test/authorize?state=${encodeURIComponent(state)}`;
  }

  async exchangeCode(provider: OAuthProvider, code: string) {
    this.exchangedCodes.push({ provider, code });
    if (code === FAILING_CODE) {
      throw new OAuthProviderError(provider, 'token endpoint returned 400');
    }
    return `access-${provider}-${code}`;
  }

  async fetchProfile(provider: OAuthProvider): Promise<OAuthProfile> {
    const profile = this.profiles.get(provider);
    if (!profile) {
      throw new OAuthProviderError(provider, 'no profile');
    }
    return { ...profile };
  }

  setProfile(provider: OAuthProvider, profile: OAuthProfile) {
    this.profiles.set(provider, profile);
  }
}
