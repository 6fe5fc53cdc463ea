/**
 * WebSocket Close Codes and Reasons
 * Centralized taxonomy for all login socket disconnections
 *
 * Standard WebSocket close codes:
 * - 1000: Normal closure
 * - 1001: Going away (server shutdown, heartbeat timeout)
 * - 1008: Policy violation
 * - 1011: Unexpected condition (errors)
 */

import type { WebSocket } from 'ws';
import { logger } from '../../lib/logger/structured-logger.js';

/**
 * Close Source Taxonomy
 * Tags every close with its originating cause
 */
export enum CloseSource {
  LOGIN_COMPLETE = 'LOGIN_COMPLETE',       // Terminal result delivered
  SESSION_EXPIRED = 'SESSION_EXPIRED',     // Evicted by the expiry sweeper
  HEARTBEAT_TIMEOUT = 'HEARTBEAT_TIMEOUT', // Missed pong
  SERVER_SHUTDOWN = 'SERVER_SHUTDOWN',     // Graceful server shutdown
  POLICY = 'POLICY',                       // Registration refused
  ERROR = 'ERROR',                         // Unexpected error condition
}

export interface WSCloseOptions {
  code: number;
  reason: string;
  closeSource: CloseSource;
  clientId?: string;
}

/**
 * Get close code and reason for a closeSource
 */
export function getCloseParams(closeSource: CloseSource, reason?: string): Pick<WSCloseOptions, 'code' | 'reason'> {
  switch (closeSource) {
    case CloseSource.LOGIN_COMPLETE:
      return { code: 1000, reason: reason || 'LOGIN_COMPLETE' };
    case CloseSource.SESSION_EXPIRED:
      return { code: 1000, reason: reason || 'SESSION_EXPIRED' };
    case CloseSource.HEARTBEAT_TIMEOUT:
      return { code: 1001, reason: reason || 'HEARTBEAT_TIMEOUT' };
    case CloseSource.SERVER_SHUTDOWN:
      return { code: 1001, reason: reason || 'SERVER_SHUTDOWN' };
    case CloseSource.POLICY:
      return { code: 1008, reason: reason || 'POLICY_VIOLATION' };
    case CloseSource.ERROR:
      return { code: 1011, reason: reason || 'UNEXPECTED_ERROR' };
  }
}

/**
 * Centralized WebSocket close helper
 * All closes carry a non-empty reason
 */
export function wsClose(ws: WebSocket, options: WSCloseOptions): void {
  const { code, reason, closeSource, clientId } = options;
  const finalReason = reason.trim() || 'UNKNOWN';

  if (ws.readyState === ws.CLOSING || ws.readyState === ws.CLOSED) {
    return;
  }

  try {
    ws.close(code, finalReason);
  } catch (err) {
    logger.warn({
      clientId,
      closeCode: code,
      closeSource,
      error: err instanceof Error ? err.message : String(err),
      event: 'ws_close_failed'
    }, '[WS] Close failed');
  }
}
