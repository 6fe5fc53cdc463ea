/**
 * Callback Orchestrator
 *
 * Triggered by the identity provider's redirect. Runs the federation
 * pipeline, then pushes exactly one terminal message (success or
 * stage-attributed error) to the launcher socket that owns the state.
 *
 * Lifecycle of one id: Registered -> (pipeline running) ->
 * DeliveredSuccess | DeliveredError | Evicted. Every terminal state removes
 * the registry entry.
 *
 * A missing socket (client gone, session expired, callback raced ahead of
 * registration) is logged, never shown to the browser and never retried.
 * The account link is written on pipeline success, whatever happens to
 * delivery afterwards.
 */

import { logger } from '../../lib/logger/structured-logger.js';
import type { ConnectionRegistry } from '../../infra/websocket/connection-registry.js';
import type { DeliverOutcome } from '../../infra/websocket/websocket.types.js';
import { hashCorrelationId } from '../../utils/security.utils.js';
import type { AccountLinkStore } from './account-link.store.js';
import { renderConfirmationPage, renderErrorPage, type BridgePage } from './bridge-pages.js';
import type { BridgeErrorCode, StageName } from './bridge.errors.js';
import { isValidCorrelationId } from './correlation-id.js';
import { runFederationPipeline } from './federation/federation.pipeline.js';
import type { AccountProfile, FederationClient, LauncherCredential } from './federation/federation.types.js';

export type DeliveredErrorCode = BridgeErrorCode | 'provider_denied' | 'missing_code' | 'internal_error';

export interface LoginSuccessPayload {
  type: 'login_success';
  token: string;
  expires_in: number;
  refresh_token: string;
  profile: AccountProfile;
}

export interface LoginErrorPayload {
  error: DeliveredErrorCode;
  message: string;
  stage: StageName | null;
}

export interface CallbackParams {
  code?: string;
  state?: string;
  /** `error` query parameter set by the provider (e.g. consent denied) */
  providerError?: string;
  providerErrorDescription?: string;
}

export type CallbackOutcome =
  | 'delivered_success'
  | 'delivered_error'
  | 'not_found'
  | 'duplicate'
  | 'invalid_state';

export interface CallbackResult {
  outcome: CallbackOutcome;
  page: BridgePage;
}

export interface CallbackOrchestratorDeps {
  registry: ConnectionRegistry;
  federationClient: FederationClient;
  accountLinks: AccountLinkStore;
  stageTimeoutMs: number;
}

export function buildSuccessPayload(profile: AccountProfile, credential: LauncherCredential): string {
  const payload: LoginSuccessPayload = {
    type: 'login_success',
    token: credential.accessToken,
    expires_in: credential.expiresIn,
    refresh_token: credential.refreshToken,
    profile: { id: profile.id, name: profile.name },
  };
  return JSON.stringify(payload);
}

export function buildErrorPayload(error: DeliveredErrorCode, message: string, stage: StageName | null): string {
  const payload: LoginErrorPayload = { error, message, stage };
  return JSON.stringify(payload);
}

const INVALID_STATE_MESSAGE = 'This sign-in link is invalid. Start again from your launcher.';
const INTERNAL_ERROR_MESSAGE = 'Sign-in could not be completed because of a server error. Please try again.';

export class CallbackOrchestrator {
  constructor(private readonly deps: CallbackOrchestratorDeps) {}

  async handleCallback(params: CallbackParams): Promise<CallbackResult> {
    const { state } = params;

    if (!isValidCorrelationId(state)) {
      logger.warn({ event: 'bridge_callback_invalid_state' }, '[Bridge] Callback with malformed state');
      return { outcome: 'invalid_state', page: renderErrorPage(400, INVALID_STATE_MESSAGE) };
    }

    const idHash = hashCorrelationId(state);

    if (this.deps.registry.claim(state) === 'already_claimed') {
      logger.warn({ idHash, event: 'bridge_callback_duplicate' }, '[Bridge] Duplicate callback ignored');
      return { outcome: 'duplicate', page: renderConfirmationPage() };
    }

    if (params.providerError) {
      logger.info({
        idHash,
        providerError: params.providerError,
        event: 'bridge_callback_provider_error'
      }, '[Bridge] Provider reported an authorization error');
      const payload = buildErrorPayload(
        'provider_denied',
        params.providerErrorDescription || 'Sign-in was cancelled or denied.',
        null
      );
      return this.finish(state, idHash, payload, 'delivered_error');
    }

    if (!params.code) {
      const payload = buildErrorPayload('missing_code', 'The identity provider did not return a sign-in code.', null);
      return this.finish(state, idHash, payload, 'delivered_error');
    }

    try {
      const result = await runFederationPipeline(params.code, this.deps.federationClient, {
        stageTimeoutMs: this.deps.stageTimeoutMs,
        idHash,
      });

      if (!result.ok) {
        const { error } = result;
        const payload = buildErrorPayload(error.code, error.cause.message, error.stage);
        return this.finish(state, idHash, payload, 'delivered_error');
      }

      // Durable side effect: committed on pipeline success, before delivery
      await this.deps.accountLinks.recordLogin(result.profile);

      logger.info({ idHash, event: 'bridge_login_succeeded' }, '[Bridge] Federated login succeeded');
      return this.finish(state, idHash, buildSuccessPayload(result.profile, result.credential), 'delivered_success');
    } catch (err) {
      logger.error({
        idHash,
        error: err instanceof Error ? err.message : String(err),
        event: 'bridge_callback_failed'
      }, '[Bridge] Callback failed unexpectedly');

      this.deliver(state, idHash, buildErrorPayload('internal_error', INTERNAL_ERROR_MESSAGE, null));
      return { outcome: 'delivered_error', page: renderErrorPage(500, INTERNAL_ERROR_MESSAGE) };
    }
  }

  private finish(
    state: string,
    idHash: string,
    payload: string,
    outcome: 'delivered_success' | 'delivered_error'
  ): CallbackResult {
    const delivery = this.deliver(state, idHash, payload);
    return {
      outcome: delivery === 'delivered' ? outcome : 'not_found',
      page: renderConfirmationPage(),
    };
  }

  private deliver(state: string, idHash: string, payload: string): DeliverOutcome {
    const delivery = this.deps.registry.deliverTerminal(state, payload);

    if (delivery === 'not_found') {
      logger.info({ idHash, event: 'bridge_delivery_not_found' }, '[Bridge] No live connection for login result');
    } else {
      logger.debug({ idHash, event: 'bridge_delivered' }, '[Bridge] Login result delivered');
    }
    return delivery;
  }
}
