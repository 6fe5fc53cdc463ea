/**
 * Login Bridge Controller
 *
 * Endpoints:
 * - GET /bridge/init?id=<id>             - Redirect the browser to the identity provider
 * - GET /bridge/callback?code=&state=    - Provider redirect target; runs the federation pipeline
 *
 * The browser only ever sees generic HTML pages. Login results travel over
 * the launcher's socket.
 */

import { Router, type Request, type Response } from 'express';
import { CALLBACK_PATH, INIT_PATH } from '../../config/federation.config.js';
import { buildAuthorizeUrl, type AuthorizeUrlConfig } from '../../services/bridge/authorize-url.js';
import { ConfigurationError, InvalidCorrelationIdError } from '../../services/bridge/bridge.errors.js';
import { renderErrorPage, type BridgePage } from '../../services/bridge/bridge-pages.js';
import type { CallbackOrchestrator } from '../../services/bridge/callback.orchestrator.js';
import { hashCorrelationId } from '../../utils/security.utils.js';

export interface BridgeRouterDeps {
  orchestrator: CallbackOrchestrator;
  authorize: AuthorizeUrlConfig;
}

/**
 * Single-valued query parameter; repeated or nested values are rejected
 */
function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function sendPage(res: Response, page: BridgePage): void {
  res.status(page.status).type('html').send(page.html);
}

const GENERIC_ERROR_MESSAGE = 'Sign-in could not be started. Please try again from your launcher.';

export function createBridgeRouter(deps: BridgeRouterDeps): Router {
  const router = Router();

  /**
   * GET /bridge/init
   * 307 to the provider's authorize URL; the body repeats the URL for
   * clients that do not follow redirects.
   */
  router.get(INIT_PATH, (req: Request, res: Response) => {
    const id = queryString(req.query.id);

    try {
      const url = buildAuthorizeUrl(id ?? '', deps.authorize);

      req.log.info({ idHash: hashCorrelationId(id), event: 'bridge_init_redirect' }, '[Bridge] Redirecting to identity provider');
      res.status(307).location(url).json({ url });
    } catch (err) {
      if (err instanceof InvalidCorrelationIdError) {
        req.log.warn({ event: 'bridge_init_invalid_id' }, '[Bridge] Init with malformed id');
        sendPage(res, renderErrorPage(400, 'This sign-in link is invalid. Start again from your launcher.'));
        return;
      }

      req.log.error({
        error: err instanceof Error ? err.message : String(err),
        keys: err instanceof ConfigurationError ? err.keys : undefined,
        event: 'bridge_init_failed'
      }, '[Bridge] Init failed');
      sendPage(res, renderErrorPage(500, GENERIC_ERROR_MESSAGE));
    }
  });

  /**
   * GET /bridge/callback
   */
  router.get(CALLBACK_PATH, async (req: Request, res: Response) => {
    try {
      const result = await deps.orchestrator.handleCallback({
        code: queryString(req.query.code),
        state: queryString(req.query.state),
        providerError: queryString(req.query.error),
        providerErrorDescription: queryString(req.query.error_description),
      });

      req.log.info({ outcome: result.outcome, event: 'bridge_callback_handled' }, '[Bridge] Callback handled');
      sendPage(res, result.page);
    } catch (err) {
      req.log.error({
        error: err instanceof Error ? err.message : String(err),
        event: 'bridge_callback_error'
      }, '[Bridge] Callback handler error');
      sendPage(res, renderErrorPage(500, 'Sign-in could not be completed. Please try again.'));
    }
  });

  return router;
}
