/**
 * Login Socket Server
 * Accepts launcher connections, registers each under a fresh correlation id
 * and tells the launcher which URL to open in a browser.
 *
 * Connection lifecycle: connect -> register -> session message -> (terminal
 * result | expiry | heartbeat timeout | client close). Whatever ends the
 * connection, its registry entry is released.
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { Server as HTTPServer, IncomingMessage } from 'http';
import crypto from 'crypto';
import { logger } from '../../lib/logger/structured-logger.js';
import { hashCorrelationId } from '../../utils/security.utils.js';
import { generateCorrelationId } from '../../services/bridge/correlation-id.js';
import { buildInitUrl } from '../../services/bridge/authorize-url.js';
import type { ConnectionRegistry } from './connection-registry.js';
import { textMessage, type CorrelationId } from './websocket.types.js';
import { WsOutboundChannel } from './ws-outbound-channel.js';
import { CloseSource, getCloseParams, wsClose } from './ws-close-reasons.js';

export interface LoginSocketServerConfig {
  server: HTTPServer;
  path: string;
  publicUrl: string;
  heartbeatIntervalMs: number;
  /** Id source, injectable for tests */
  generateId?: () => CorrelationId;
}

/**
 * First and only non-terminal message a launcher receives
 */
export interface SessionMessage {
  type: 'session';
  id: CorrelationId;
  url: string;
}

interface ConnectionState {
  clientId: string;
  id: CorrelationId;
  channel: WsOutboundChannel;
  isAlive: boolean;
}

export interface LoginSocketStats {
  connections: number;
  registered: number;
}

export class LoginSocketServer {
  private readonly wss: WebSocketServer;
  private readonly connections = new Map<WebSocket, ConnectionState>();
  private readonly generateId: () => CorrelationId;
  private heartbeatInterval: NodeJS.Timeout | undefined;

  constructor(
    private readonly registry: ConnectionRegistry,
    private readonly config: LoginSocketServerConfig
  ) {
    this.generateId = config.generateId ?? generateCorrelationId;
    this.wss = new WebSocketServer({ server: config.server, path: config.path });
    this.wss.on('connection', (ws, req) => this.handleConnection(ws, req));
    this.startHeartbeat();

    logger.info({ path: config.path, event: 'ws_server_started' }, '[WS] Login socket server listening');
  }

  private handleConnection(ws: WebSocket, req: IncomingMessage): void {
    const clientId = generateClientId();
    const id = this.generateId();
    const channel = new WsOutboundChannel(ws, clientId);
    const idHash = hashCorrelationId(id);

    ws.on('close', (code, reason) => this.handleClose(ws, code, reason));
    ws.on('error', (err) => {
      logger.warn({ clientId, error: err.message, event: 'ws_error' }, '[WS] Socket error');
    });

    if (this.registry.register(id, channel) === 'already_registered') {
      const params = getCloseParams(CloseSource.POLICY, 'ID_COLLISION');
      wsClose(ws, { ...params, closeSource: CloseSource.POLICY, clientId });
      return;
    }

    this.connections.set(ws, { clientId, id, channel, isAlive: true });
    ws.on('pong', () => {
      const state = this.connections.get(ws);
      if (state) {
        state.isAlive = true;
      }
    });

    logger.info({
      clientId,
      idHash,
      ip: req.socket.remoteAddress,
      event: 'ws_login_session_opened'
    }, '[WS] Login session opened');

    const session: SessionMessage = {
      type: 'session',
      id,
      url: buildInitUrl(this.config.publicUrl, id),
    };
    this.registry.deliver(id, textMessage(JSON.stringify(session)));
  }

  private handleClose(ws: WebSocket, code: number, reasonBuffer: Buffer): void {
    const state = this.connections.get(ws);
    if (!state) {
      return;
    }
    this.connections.delete(ws);

    const released = this.registry.release(state.id, state.channel);

    logger.info({
      clientId: state.clientId,
      idHash: hashCorrelationId(state.id),
      closeCode: code,
      reason: reasonBuffer.toString().trim() || 'none',
      released,
      event: 'ws_login_session_closed'
    }, '[WS] Login session closed');
  }

  /**
   * Heartbeat: ping all connections, terminate dead ones
   */
  private startHeartbeat(): void {
    this.heartbeatInterval = setInterval(() => {
      let terminatedCount = 0;

      for (const [ws, state] of this.connections) {
        if (!state.isAlive) {
          this.connections.delete(ws);
          this.registry.release(state.id, state.channel);
          ws.terminate();
          terminatedCount++;

          logger.info({
            clientId: state.clientId,
            closeSource: CloseSource.HEARTBEAT_TIMEOUT,
            event: 'ws_heartbeat_terminated'
          }, '[WS] Terminating unresponsive connection');
          continue;
        }

        state.isAlive = false;
        ws.ping();
      }

      if (terminatedCount > 0) {
        logger.debug({
          terminated: terminatedCount,
          active: this.connections.size
        }, '[WS] Heartbeat terminated dead connections');
      }
    }, this.config.heartbeatIntervalMs);

    // Non-blocking
    this.heartbeatInterval.unref();
  }

  getStats(): LoginSocketStats {
    return {
      connections: this.connections.size,
      registered: this.registry.size,
    };
  }

  /**
   * Close every connection and stop accepting new ones
   */
  shutdown(): Promise<void> {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = undefined;
    }

    const closed = this.registry.closeAll(CloseSource.SERVER_SHUTDOWN);

    // Sockets that lost their entry to a terminal delivery may still be closing
    for (const [ws, state] of this.connections) {
      const params = getCloseParams(CloseSource.SERVER_SHUTDOWN);
      wsClose(ws, { ...params, closeSource: CloseSource.SERVER_SHUTDOWN, clientId: state.clientId });
    }
    this.connections.clear();

    logger.info({ closedConnections: closed, event: 'ws_server_shutdown' }, '[WS] Login socket server shutdown');

    return new Promise((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }
}

function generateClientId(): string {
  return `ws-${Date.now()}-${crypto.randomBytes(3).toString('hex')}`;
}
