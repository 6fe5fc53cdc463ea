/**
 * Identity federation endpoints and fixed protocol values.
 * The chain: Microsoft account OAuth -> Xbox Live user token -> XSTS token
 * -> game services launcher token -> game profile.
 */

export interface FederationEndpoints {
  authorize: string;
  token: string;
  userAuthenticate: string;
  stsAuthorize: string;
  serviceLogin: string;
  profile: string;
}

export const DEFAULT_FEDERATION_ENDPOINTS: FederationEndpoints = {
  authorize: 'https://login.live.com/oauth20_authorize.srf',
  token: 'https://login.live.com/oauth20_token.srf',
  userAuthenticate: 'https://user.auth.xboxlive.com/user/authenticate',
  stsAuthorize: 'https://xsts.auth.xboxlive.com/xsts/authorize',
  serviceLogin: 'https://api.minecraftservices.com/launcher/login',
  profile: 'https://api.minecraftservices.com/minecraft/profile',
};

/** Scopes required for the federation chain (sign-in + refresh token). */
export const FEDERATION_SCOPES = ['XboxLive.signin', 'offline_access'] as const;

/** Path of this server's OAuth redirect target, appended to the public URL. */
export const CALLBACK_PATH = '/bridge/callback';

/** Path of the init endpoint handed to launchers. */
export const INIT_PATH = '/bridge/init';

export const USER_TOKEN_SITE_NAME = 'user.auth.xboxlive.com';
export const USER_TOKEN_RELYING_PARTY = 'http://auth.xboxlive.com';
export const STS_RELYING_PARTY = 'rp://api.minecraftservices.com/';
export const STS_SANDBOX_ID = 'RETAIL';
export const SERVICE_LOGIN_PLATFORM = 'PC_LAUNCHER';
