/**
 * Fetch with Timeout Utility
 *
 * Wraps native fetch with an AbortController so an upstream call, body
 * included, can never hang a callback. Cleanup via clearTimeout in finally.
 */

import { logger } from '../lib/logger/structured-logger.js';

export type FetchErrorKind = 'TIMEOUT' | 'ABORT' | 'NETWORK_ERROR';

export interface FetchWithTimeoutConfig {
  timeoutMs: number;
  stage?: string;
  provider?: string;
  /** Optional caller-scoped abort signal; when aborted, the fetch is cancelled. */
  signal?: AbortSignal;
}

export class FetchFailedError extends Error {
  constructor(
    message: string,
    public readonly errorKind: FetchErrorKind,
    public readonly host: string,
    public readonly stage: string
  ) {
    super(message);
    this.name = 'FetchFailedError';
  }
}

export interface FetchedText {
  status: number;
  text: string;
}

/**
 * Fetch and read the body as text under one timeout.
 * The timer and the caller's abort signal stay armed until the body has been
 * read, so a stalled body is cancelled the same way as stalled headers.
 *
 * @throws FetchFailedError on timeout, abort or network failure (never on HTTP status)
 */
export async function fetchTextWithTimeout(
  url: string,
  options: RequestInit,
  config: FetchWithTimeoutConfig
): Promise<FetchedText> {
  const controller = new AbortController();
  const host = new URL(url).host;
  const stage = config.stage || 'unknown';
  const startTime = Date.now();
  let timedOut = false;

  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, config.timeoutMs);

  const onCallerAbort = () => controller.abort();
  if (config.signal?.aborted) {
    controller.abort();
  }
  config.signal?.addEventListener('abort', onCallerAbort, { once: true });

  try {
    const response = await fetch(url, { ...options, signal: controller.signal });
    const text = await response.text();
    return { status: response.status, text };
  } catch (err) {
    const errorKind: FetchErrorKind = timedOut
      ? 'TIMEOUT'
      : controller.signal.aborted ? 'ABORT' : 'NETWORK_ERROR';

    logger.warn({
      event: 'upstream_fetch_failed',
      provider: config.provider || 'unknown',
      stage,
      host,
      errorKind,
      durationMs: Date.now() - startTime,
      error: err instanceof Error ? err.message : String(err)
    }, '[FETCH] Upstream request failed');

    const message = errorKind === 'TIMEOUT'
      ? `Request to ${host} timed out after ${config.timeoutMs}ms`
      : `Request to ${host} failed (${errorKind})`;
    throw new FetchFailedError(message, errorKind, host, stage);
  } finally {
    clearTimeout(timeoutId);
    config.signal?.removeEventListener('abort', onCallerAbort);
  }
}
