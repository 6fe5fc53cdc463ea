/**
 * In-process OutboundChannel that records everything sent to it
 */

import type { OutboundChannel, WebSocketMessage } from '../../src/infra/websocket/websocket.types.js';

export class RecordingChannel implements OutboundChannel {
  readonly messages: WebSocketMessage[] = [];
  private open = true;

  /** When set, text is refused as if the channel were full; close still goes through */
  refuseText = false;

  get isOpen(): boolean {
    return this.open;
  }

  send(message: WebSocketMessage): boolean {
    if (!this.open || (this.refuseText && message.kind === 'text')) {
      return false;
    }
    this.messages.push(message);
    if (message.kind === 'close') {
      this.open = false;
    }
    return true;
  }

  /** Simulate the client going away */
  disconnect(): void {
    this.open = false;
  }

  texts(): string[] {
    return this.messages.flatMap(message => (message.kind === 'text' ? [message.payload] : []));
  }

  closes(): number {
    return this.messages.filter(message => message.kind === 'close').length;
  }
}
