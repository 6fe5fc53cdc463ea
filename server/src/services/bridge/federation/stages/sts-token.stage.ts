/**
 * Stage C - Security token service exchange
 * Federated user token -> XSTS token scoped to the game services
 */

import { z } from 'zod';
import { STS_RELYING_PARTY, STS_SANDBOX_ID } from '../../../../config/federation.config.js';
import { ProviderRejectedError, type RejectionCode } from '../../bridge.errors.js';
import type { FederationRequest } from '../federation-http.js';
import type { FederatedUserToken, SecurityTokenServiceToken } from '../federation.types.js';
import { XboxTokenResponseSchema, toUserToken } from './user-token.stage.js';

const XstsErrorSchema = z.object({
  XErr: z.coerce.number(),
  Message: z.string().optional(),
});

const XERR_REJECTIONS = new Map<number, { code: RejectionCode; message: string }>([
  [2148916233, { code: 'no_federated_identity', message: 'This Microsoft account has no Xbox profile. Create one, then sign in again.' }],
  [2148916235, { code: 'region_unavailable', message: 'Xbox Live is not available in this account\'s country or region.' }],
  [2148916236, { code: 'age_verification_required', message: 'This account needs adult verification before it can sign in.' }],
  [2148916237, { code: 'age_verification_required', message: 'This account needs adult verification before it can sign in.' }],
  [2148916238, { code: 'child_account', message: 'This is a child account. An adult must add it to a family before it can sign in.' }],
]);

export function classifyStsRejection(status: number, body: unknown): ProviderRejectedError {
  const parsed = XstsErrorSchema.safeParse(body);
  const known = parsed.success ? XERR_REJECTIONS.get(parsed.data.XErr) : undefined;
  if (known) {
    return new ProviderRejectedError(known.code, known.message, status);
  }
  return new ProviderRejectedError(
    'insufficient_entitlement',
    'The security token service refused to authorize this account.',
    status
  );
}

export function buildStsTokenRequest(
  endpoint: string,
  userToken: FederatedUserToken
): FederationRequest<SecurityTokenServiceToken> {
  return {
    stage: 'sts_token',
    url: endpoint,
    init: {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      body: JSON.stringify({
        Properties: {
          SandboxId: STS_SANDBOX_ID,
          UserTokens: [userToken.token],
        },
        RelyingParty: STS_RELYING_PARTY,
        TokenType: 'JWT',
      }),
    },
    schema: XboxTokenResponseSchema.transform(toUserToken),
    classifyRejection: classifyStsRejection,
  };
}
