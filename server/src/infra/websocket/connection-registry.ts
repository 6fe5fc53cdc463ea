/**
 * Connection Registry
 * Correlates an opaque login session id with the live launcher socket
 * waiting for its result.
 *
 * The only shared mutable state of the login bridge. Every method runs to
 * completion synchronously on the event loop, so each operation is atomic
 * for its id: no caller can observe a half-inserted or half-removed entry.
 * Terminal deliveries remove the entry before sending, so a second delivery
 * to the same id always sees `not_found`.
 */

import { logger } from '../../lib/logger/structured-logger.js';
import { hashCorrelationId } from '../../utils/security.utils.js';
import {
  closeMessage,
  textMessage,
  type ClaimOutcome,
  type ConnectionEntry,
  type CorrelationId,
  type DeliverOutcome,
  type OutboundChannel,
  type RegisterOutcome,
  type WebSocketMessage
} from './websocket.types.js';
import { CloseSource } from './ws-close-reasons.js';

export interface ConnectionRegistryOptions {
  /** Clock source, injectable for tests */
  now?: () => number;
}

export class ConnectionRegistry {
  private readonly entries = new Map<CorrelationId, ConnectionEntry>();
  private readonly now: () => number;

  constructor(options: ConnectionRegistryOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Insert a new entry. Never overwrites: a second registration under an
   * in-flight id would silently steal its delivery.
   */
  register(id: CorrelationId, sender: OutboundChannel): RegisterOutcome {
    if (this.entries.has(id)) {
      logger.warn({
        idHash: hashCorrelationId(id),
        event: 'bridge_register_rejected'
      }, '[Registry] Id already registered');
      return 'already_registered';
    }

    this.entries.set(id, { id, sender, createdAt: this.now(), claimed: false });
    logger.debug({
      idHash: hashCorrelationId(id),
      size: this.entries.size,
      event: 'bridge_registered'
    }, '[Registry] Connection registered');
    return 'registered';
  }

  /**
   * Send one message to the id's channel. A close message is terminal and
   * retires the entry. A closed or full channel counts as not found.
   */
  deliver(id: CorrelationId, message: WebSocketMessage): DeliverOutcome {
    const entry = this.entries.get(id);
    if (!entry) {
      return 'not_found';
    }

    if (message.kind === 'close') {
      this.entries.delete(id);
      return entry.sender.send(message) ? 'delivered' : 'not_found';
    }

    if (!entry.sender.send(message)) {
      // Dead or full channel: nothing can ever be delivered to this id again
      this.drop(id, entry);
      return 'not_found';
    }
    return 'delivered';
  }

  /**
   * Exactly-once terminal delivery: retire the entry, then send the payload
   * followed by close.
   */
  deliverTerminal(id: CorrelationId, payload: string): DeliverOutcome {
    const entry = this.entries.get(id);
    if (!entry) {
      return 'not_found';
    }

    this.entries.delete(id);

    if (!entry.sender.send(textMessage(payload))) {
      this.drop(id, entry);
      return 'not_found';
    }
    entry.sender.send(closeMessage());
    return 'delivered';
  }

  /**
   * Mark an entry as owned by a running callback.
   * The first claim wins; later claims for the same id see `already_claimed`.
   */
  claim(id: CorrelationId): ClaimOutcome {
    const entry = this.entries.get(id);
    if (!entry) {
      return 'not_found';
    }
    if (entry.claimed) {
      return 'already_claimed';
    }
    entry.claimed = true;
    return 'claimed';
  }

  /**
   * Drop the entry of a connection observed closed.
   * Only the sender that registered the id may release it.
   */
  release(id: CorrelationId, sender: OutboundChannel): boolean {
    const entry = this.entries.get(id);
    if (!entry || entry.sender !== sender) {
      return false;
    }
    this.entries.delete(id);
    logger.debug({
      idHash: hashCorrelationId(id),
      claimed: entry.claimed,
      event: 'bridge_released'
    }, '[Registry] Connection released');
    return true;
  }

  /**
   * Evict every entry created before `now - olderThanMs`.
   * Evicted connections that are still alive are told to close.
   */
  sweep(olderThanMs: number): number {
    const cutoff = this.now() - olderThanMs;
    let evicted = 0;

    for (const [id, entry] of this.entries) {
      if (entry.createdAt < cutoff) {
        this.entries.delete(id);
        entry.sender.send(closeMessage(1000, CloseSource.SESSION_EXPIRED));
        evicted++;
      }
    }

    return evicted;
  }

  /**
   * Forget an entry whose channel refused a message and tell the connection
   * to close, so it does not outlive its entry.
   */
  private drop(id: CorrelationId, entry: ConnectionEntry): void {
    this.entries.delete(id);
    entry.sender.send(closeMessage(1011, CloseSource.ERROR));
    logger.warn({
      idHash: hashCorrelationId(id),
      event: 'bridge_channel_dropped'
    }, '[Registry] Channel refused message - connection closed');
  }

  has(id: CorrelationId): boolean {
    return this.entries.has(id);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Close and forget every entry (server shutdown)
   */
  closeAll(reason: CloseSource): number {
    const count = this.entries.size;
    for (const entry of this.entries.values()) {
      entry.sender.send(closeMessage(1001, reason));
    }
    this.entries.clear();
    return count;
  }
}
