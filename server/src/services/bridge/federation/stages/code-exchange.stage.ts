/**
 * Stage A - Code exchange
 * Authorization code -> provider OAuth tokens
 */

import { z } from 'zod';
import { ProviderRejectedError } from '../../bridge.errors.js';
import type { FederationRequest } from '../federation-http.js';
import type { ProviderTokens } from '../federation.types.js';

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  expires_in: z.number().int().nonnegative(),
  token_type: z.string().optional(),
});

const OAuthErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

export interface CodeExchangeParams {
  tokenEndpoint: string;
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  code: string;
}

export function classifyCodeExchangeRejection(status: number, body: unknown): ProviderRejectedError {
  const parsed = OAuthErrorSchema.safeParse(body);
  if (parsed.success && parsed.data.error === 'invalid_grant') {
    return new ProviderRejectedError(
      'invalid_grant',
      'The sign-in code was rejected. It may have expired or already been used; please try again.',
      status
    );
  }
  const detail = parsed.success ? parsed.data.error : `HTTP ${status}`;
  return new ProviderRejectedError('provider_rejected', `The identity provider rejected the sign-in (${detail}).`, status);
}

export function buildCodeExchangeRequest(params: CodeExchangeParams): FederationRequest<ProviderTokens> {
  const form = new URLSearchParams({
    client_id: params.clientId,
    client_secret: params.clientSecret,
    code: params.code,
    grant_type: 'authorization_code',
    redirect_uri: params.redirectUri,
  });

  return {
    stage: 'code_exchange',
    url: params.tokenEndpoint,
    init: {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json',
      },
      body: form.toString(),
    },
    schema: TokenResponseSchema.transform((raw): ProviderTokens => ({
      accessToken: raw.access_token,
      refreshToken: raw.refresh_token,
      expiresIn: raw.expires_in,
    })),
    classifyRejection: classifyCodeExchangeRejection,
  };
}
