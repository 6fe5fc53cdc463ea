/**
 * Adapts a `ws` socket to the registry's OutboundChannel contract
 */

import { WebSocket } from 'ws';
import { logger } from '../../lib/logger/structured-logger.js';
import type { OutboundChannel, WebSocketMessage } from './websocket.types.js';
import { CloseSource, getCloseParams, wsClose } from './ws-close-reasons.js';

/** Above this many unsent bytes the channel is treated as full. */
const MAX_BUFFERED_BYTES = 1024 * 1024;

function isCloseSource(value: string | undefined): value is CloseSource {
  return Object.values(CloseSource).some(source => source === value);
}

export class WsOutboundChannel implements OutboundChannel {
  constructor(
    private readonly ws: WebSocket,
    private readonly clientId: string
  ) {}

  get isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  send(message: WebSocketMessage): boolean {
    if (!this.isOpen) {
      return false;
    }

    if (message.kind === 'close') {
      const closeSource = isCloseSource(message.reason) ? message.reason : CloseSource.LOGIN_COMPLETE;
      const params = getCloseParams(closeSource, message.reason);
      wsClose(this.ws, {
        code: message.code ?? params.code,
        reason: params.reason,
        closeSource,
        clientId: this.clientId
      });
      return true;
    }

    if (this.ws.bufferedAmount > MAX_BUFFERED_BYTES) {
      logger.warn({
        clientId: this.clientId,
        bufferedAmount: this.ws.bufferedAmount,
        event: 'ws_send_backpressure'
      }, '[WS] Send refused - channel full');
      return false;
    }

    this.ws.send(message.payload, (err) => {
      if (err) {
        logger.warn({
          clientId: this.clientId,
          error: err.message,
          event: 'ws_send_failed'
        }, '[WS] Send failed');
      }
    });
    return true;
  }
}
