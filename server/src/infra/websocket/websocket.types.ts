/**
 * Login Socket Types
 * Core type definitions for the login bridge WebSocket infrastructure
 */

/**
 * Opaque, URL-safe capability token correlating a launcher socket
 * with a pending federated login.
 */
export type CorrelationId = string;

/**
 * The only two message kinds ever pushed to a launcher connection
 */
export type WebSocketMessage =
  | { kind: 'text'; payload: string }
  | { kind: 'close'; code?: number; reason?: string };

export function textMessage(payload: string): WebSocketMessage {
  return { kind: 'text', payload };
}

export function closeMessage(code?: number, reason?: string): WebSocketMessage {
  return { kind: 'close', code, reason };
}

/**
 * Sender half of a launcher connection.
 * `send` never blocks: it returns false when the channel is closed or full.
 */
export interface OutboundChannel {
  send(message: WebSocketMessage): boolean;
  readonly isOpen: boolean;
}

/**
 * Registry entry, owned exclusively by the ConnectionRegistry
 */
export interface ConnectionEntry {
  id: CorrelationId;
  sender: OutboundChannel;
  createdAt: number;
  /** Set once a callback has taken ownership of this login attempt */
  claimed: boolean;
}

export type RegisterOutcome = 'registered' | 'already_registered';
export type DeliverOutcome = 'delivered' | 'not_found';
export type ClaimOutcome = 'claimed' | 'already_claimed' | 'not_found';
