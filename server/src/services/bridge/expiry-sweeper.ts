/**
 * Expiry Sweeper
 * Periodically evicts registry entries older than the session TTL so that
 * abandoned logins cannot accumulate.
 */

import { logger } from '../../lib/logger/structured-logger.js';
import type { ConnectionRegistry } from '../../infra/websocket/connection-registry.js';

export interface ExpirySweeperConfig {
  /** Entries older than this are evicted */
  ttlMs: number;
  intervalMs: number;
}

export class ExpirySweeper {
  private interval: NodeJS.Timeout | undefined;

  constructor(
    private readonly registry: ConnectionRegistry,
    private readonly config: ExpirySweeperConfig
  ) {}

  start(): void {
    if (this.interval) {
      return;
    }

    this.interval = setInterval(() => {
      this.runOnce();
    }, this.config.intervalMs);

    // Non-blocking
    this.interval.unref();

    logger.info({
      ttlMs: this.config.ttlMs,
      intervalMs: this.config.intervalMs,
      event: 'bridge_sweeper_started'
    }, '[Sweeper] Started');
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = undefined;
    }
  }

  get isRunning(): boolean {
    return this.interval !== undefined;
  }

  runOnce(): number {
    const evicted = this.registry.sweep(this.config.ttlMs);

    if (evicted > 0) {
      logger.info({
        evicted,
        remaining: this.registry.size,
        event: 'bridge_sweep_evicted'
      }, '[Sweeper] Expired login sessions evicted');
    }
    return evicted;
  }
}
