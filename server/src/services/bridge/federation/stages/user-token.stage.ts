/**
 * Stage B - Federated user token
 * Provider access token -> Xbox Live user token + user hash
 */

import { z } from 'zod';
import { USER_TOKEN_RELYING_PARTY, USER_TOKEN_SITE_NAME } from '../../../../config/federation.config.js';
import { ProviderRejectedError } from '../../bridge.errors.js';
import type { FederationRequest } from '../federation-http.js';
import type { FederatedUserToken } from '../federation.types.js';

/** Shared by the user token and XSTS endpoints */
export const XboxTokenResponseSchema = z.object({
  Token: z.string().min(1),
  DisplayClaims: z.object({
    xui: z.array(z.object({ uhs: z.string().min(1) })).min(1),
  }),
});

export type XboxTokenResponse = z.infer<typeof XboxTokenResponseSchema>;

export function toUserToken(raw: XboxTokenResponse): FederatedUserToken {
  return { token: raw.Token, userHash: raw.DisplayClaims.xui[0].uhs };
}

export function buildUserTokenRequest(
  endpoint: string,
  providerAccessToken: string
): FederationRequest<FederatedUserToken> {
  return {
    stage: 'user_token',
    url: endpoint,
    init: {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      body: JSON.stringify({
        Properties: {
          AuthMethod: 'RPS',
          SiteName: USER_TOKEN_SITE_NAME,
          RpsTicket: `d=${providerAccessToken}`,
        },
        RelyingParty: USER_TOKEN_RELYING_PARTY,
        TokenType: 'JWT',
      }),
    },
    schema: XboxTokenResponseSchema.transform(toUserToken),
    classifyRejection: (status) => new ProviderRejectedError(
      'no_federated_identity',
      'This Microsoft account could not be signed in to Xbox Live.',
      status
    ),
  };
}
