import { KeycloakError, type KeycloakClient, type KeycloakProfile } from '../src/services/keycloak-client';

export const KEYCLOAK_TOKEN = 'keycloak-access-token';

/** Knows one access token; everything else is rejected the way the realm would. */
export class FakeKeycloakClient implements KeycloakClient {
  private profile: KeycloakProfile = {
    subject: 'kc-1f2e3d',
    email: 'Realm.User@Example.com',
    name: 'Realm User',
  };

  async fetchUserInfo(accessToken: string): Promise<KeycloakProfile> {
    if (accessToken !== KEYCLOAK_TOKEN) {
      throw new KeycloakError('userinfo returned 401');
    }
    return { ...this.profile };
  }

  setProfile(profile: KeycloakProfile) {
    this.profile = profile;
  }
}
