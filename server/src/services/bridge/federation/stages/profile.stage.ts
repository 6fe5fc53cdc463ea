/**
 * Stage E - Profile / entitlement fetch
 * Service access token -> account profile
 *
 * A 404 means the account does not own the game: an expected outcome,
 * reported as `missing_entitlement`, never as a transport failure.
 */

import { z } from 'zod';
import { ProviderRejectedError } from '../../bridge.errors.js';
import type { FederationRequest } from '../federation-http.js';
import type { AccountProfile, ServiceAccessToken } from '../federation.types.js';

const ProfileResponseSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
});

export function classifyProfileRejection(status: number): ProviderRejectedError {
  if (status === 404) {
    return new ProviderRejectedError(
      'missing_entitlement',
      'No game profile for this account. Make sure you own the game and have set a username through the official launcher.',
      status
    );
  }
  return new ProviderRejectedError('service_rejected', 'The game services refused the profile request.', status);
}

export function buildProfileRequest(
  endpoint: string,
  serviceToken: ServiceAccessToken
): FederationRequest<AccountProfile> {
  return {
    stage: 'profile',
    url: endpoint,
    init: {
      method: 'GET',
      headers: {
        Authorization: `Bearer ${serviceToken.token}`,
        Accept: 'application/json',
      },
    },
    schema: ProfileResponseSchema.transform((raw): AccountProfile => ({ id: raw.id, name: raw.name })),
    classifyRejection: classifyProfileRejection,
  };
}
