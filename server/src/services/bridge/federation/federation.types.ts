/**
 * Federation Pipeline Types
 *
 * Values threaded through stages A -> E. None of them are logged or
 * persisted; only the final AccountProfile may be stored.
 */

import type { StageName } from '../bridge.errors.js';

export interface ProviderTokens {
  accessToken: string;
  refreshToken: string;
  /** Seconds */
  expiresIn: number;
}

export interface FederatedUserToken {
  token: string;
  userHash: string;
}

export interface SecurityTokenServiceToken {
  token: string;
  userHash: string;
}

export interface ServiceAccessToken {
  token: string;
  /** Seconds */
  expiresIn: number;
}

export interface AccountProfile {
  id: string;
  name: string;
}

/**
 * Credential handed to the launcher alongside the profile
 */
export interface LauncherCredential {
  accessToken: string;
  expiresIn: number;
  refreshToken: string;
}

export interface StageCallOptions {
  /** Aborts the in-flight request when the stage times out */
  signal?: AbortSignal;
}

/**
 * One method per federation stage; each is a single request/response.
 * Implementations throw StageError subclasses only.
 */
export interface FederationClient {
  exchangeCode(code: string, options?: StageCallOptions): Promise<ProviderTokens>;
  fetchUserToken(providerAccessToken: string, options?: StageCallOptions): Promise<FederatedUserToken>;
  fetchStsToken(userToken: FederatedUserToken, options?: StageCallOptions): Promise<SecurityTokenServiceToken>;
  fetchServiceToken(stsToken: SecurityTokenServiceToken, options?: StageCallOptions): Promise<ServiceAccessToken>;
  fetchProfile(serviceToken: ServiceAccessToken, options?: StageCallOptions): Promise<AccountProfile>;
}

/**
 * An ordered pipeline step: a pure function of the previous output and the client
 */
export interface StageDescriptor<I, O> {
  name: StageName;
  run(input: I, client: FederationClient, options: StageCallOptions): Promise<O>;
}
