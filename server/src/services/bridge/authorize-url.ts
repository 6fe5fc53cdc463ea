/**
 * Authorize URL Builder (init stage)
 *
 * Pure construction, no network call. The correlation id travels through the
 * identity provider as the OAuth `state` parameter and comes back on the
 * callback.
 */

import {
  CALLBACK_PATH,
  DEFAULT_FEDERATION_ENDPOINTS,
  FEDERATION_SCOPES,
  INIT_PATH
} from '../../config/federation.config.js';
import { assertCorrelationId } from './correlation-id.js';
import { ConfigurationError } from './bridge.errors.js';

export interface AuthorizeUrlConfig {
  /** This server's public base URL, without trailing slash */
  publicUrl: string;
  clientId: string;
  /** Identity provider authorize endpoint */
  authorizeEndpoint?: string;
}

export function buildRedirectUri(publicUrl: string): string {
  return `${publicUrl.replace(/\/+$/, '')}${CALLBACK_PATH}`;
}

/**
 * URL handed to the launcher: opening it in a browser starts the login
 */
export function buildInitUrl(publicUrl: string, correlationId: string): string {
  return `${publicUrl.replace(/\/+$/, '')}${INIT_PATH}?${new URLSearchParams({ id: correlationId }).toString()}`;
}

/**
 * @throws InvalidCorrelationIdError for a malformed id
 * @throws ConfigurationError when client id or public URL is missing
 */
export function buildAuthorizeUrl(correlationId: string, config: AuthorizeUrlConfig): string {
  const state = assertCorrelationId(correlationId);

  const missing: string[] = [];
  if (!config.clientId.trim()) missing.push('BRIDGE_CLIENT_ID');
  if (!config.publicUrl.trim()) missing.push('BRIDGE_PUBLIC_URL');
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing bridge configuration: ${missing.join(', ')}`, missing);
  }

  const params = new URLSearchParams({
    client_id: config.clientId,
    response_type: 'code',
    redirect_uri: buildRedirectUri(config.publicUrl),
    scope: FEDERATION_SCOPES.join(' '),
    state,
    prompt: 'select_account',
  });

  const endpoint = config.authorizeEndpoint ?? DEFAULT_FEDERATION_ENDPOINTS.authorize;
  return `${endpoint}?${params.toString()}`;
}
