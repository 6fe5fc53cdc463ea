/**
 * HTTP implementation of the federation client.
 * Each method is exactly one upstream request; see stages/ for the shapes.
 */

import { DEFAULT_FEDERATION_ENDPOINTS, type FederationEndpoints } from '../../../config/federation.config.js';
import { buildRedirectUri } from '../authorize-url.js';
import { FederationHttp } from './federation-http.js';
import type {
  AccountProfile,
  FederatedUserToken,
  FederationClient,
  ProviderTokens,
  SecurityTokenServiceToken,
  ServiceAccessToken,
  StageCallOptions
} from './federation.types.js';
import { buildCodeExchangeRequest } from './stages/code-exchange.stage.js';
import { buildUserTokenRequest } from './stages/user-token.stage.js';
import { buildStsTokenRequest } from './stages/sts-token.stage.js';
import { buildServiceTokenRequest } from './stages/service-token.stage.js';
import { buildProfileRequest } from './stages/profile.stage.js';

export interface HttpFederationClientConfig {
  clientId: string;
  clientSecret: string;
  publicUrl: string;
  timeoutMs: number;
  endpoints?: Partial<FederationEndpoints>;
}

export class HttpFederationClient implements FederationClient {
  private readonly http: FederationHttp;
  private readonly endpoints: FederationEndpoints;

  constructor(private readonly config: HttpFederationClientConfig) {
    this.http = new FederationHttp(config.timeoutMs);
    this.endpoints = { ...DEFAULT_FEDERATION_ENDPOINTS, ...config.endpoints };
  }

  exchangeCode(code: string, options?: StageCallOptions): Promise<ProviderTokens> {
    return this.http.request(buildCodeExchangeRequest({
      tokenEndpoint: this.endpoints.token,
      clientId: this.config.clientId,
      clientSecret: this.config.clientSecret,
      redirectUri: buildRedirectUri(this.config.publicUrl),
      code,
    }), options);
  }

  fetchUserToken(providerAccessToken: string, options?: StageCallOptions): Promise<FederatedUserToken> {
    return this.http.request(buildUserTokenRequest(this.endpoints.userAuthenticate, providerAccessToken), options);
  }

  fetchStsToken(userToken: FederatedUserToken, options?: StageCallOptions): Promise<SecurityTokenServiceToken> {
    return this.http.request(buildStsTokenRequest(this.endpoints.stsAuthorize, userToken), options);
  }

  fetchServiceToken(stsToken: SecurityTokenServiceToken, options?: StageCallOptions): Promise<ServiceAccessToken> {
    return this.http.request(buildServiceTokenRequest(this.endpoints.serviceLogin, stsToken), options);
  }

  fetchProfile(serviceToken: ServiceAccessToken, options?: StageCallOptions): Promise<AccountProfile> {
    return this.http.request(buildProfileRequest(this.endpoints.profile, serviceToken), options);
  }
}
