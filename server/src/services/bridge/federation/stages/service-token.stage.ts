/**
 * Stage D - Service access token
 * XSTS token + user hash -> game services bearer token
 */

import { z } from 'zod';
import { SERVICE_LOGIN_PLATFORM } from '../../../../config/federation.config.js';
import { ProviderRejectedError } from '../../bridge.errors.js';
import type { FederationRequest } from '../federation-http.js';
import type { SecurityTokenServiceToken, ServiceAccessToken } from '../federation.types.js';

const ServiceLoginResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().int().nonnegative(),
});

export function buildServiceTokenRequest(
  endpoint: string,
  stsToken: SecurityTokenServiceToken
): FederationRequest<ServiceAccessToken> {
  return {
    stage: 'service_token',
    url: endpoint,
    init: {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      body: JSON.stringify({
        xtoken: `XBL3.0 x=${stsToken.userHash};${stsToken.token}`,
        platform: SERVICE_LOGIN_PLATFORM,
      }),
    },
    schema: ServiceLoginResponseSchema.transform((raw): ServiceAccessToken => ({
      token: raw.access_token,
      expiresIn: raw.expires_in,
    })),
    classifyRejection: (status) => new ProviderRejectedError(
      'service_rejected',
      'The game services refused the sign-in.',
      status
    ),
  };
}
