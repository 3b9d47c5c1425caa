import WebSocket from 'ws';
import type { Logger } from '../logger';
import { errorMessage } from '../errors';
import { ClientFrame, ServerFrameSchema, WireEnvelope, parseFrame } from './protocol';
import type { Transport, TransportHandlers } from './transport';

export interface WebSocketTransportOptions {
  url: string;
  reconnectDelayMs: number;
  maxReconnectAttempts: number;
}

/**
 * Client side of the bus hub. Reconnects after a fixed delay, at most
 * `maxReconnectAttempts` times per outage. The hub forgets subscriptions
 * with the connection; the bus re-sends them from onConnected.
 */
export class WebSocketTransport implements Transport {
  readonly name = 'websocket';
  private ws: WebSocket | null = null;
  private handlers: TransportHandlers | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private isOpen = false;
  private closing = false;
  private attempts = 0;
  private gaveUp = false;

  constructor(
    private readonly options: WebSocketTransportOptions,
    private readonly logger: Logger,
  ) {}

  async connect(handlers: TransportHandlers): Promise<void> {
    this.handlers = handlers;
    this.closing = false;
    try {
      await this.open();
    } catch (error) {
      this.logger.warn(`Bus hub unreachable (${errorMessage(error)}), retrying in background`);
    }
  }

  private open(): Promise<void> {
    this.logger.info(`📡 Connecting to bus hub: ${this.options.url}`);

    return new Promise((resolve, reject) => {
      const ws = new WebSocket(this.options.url);
      this.ws = ws;

      ws.on('open', () => {
        this.isOpen = true;
        this.attempts = 0;
        this.gaveUp = false;
        this.logger.info('✅ Bus hub connected');
        this.handlers?.onConnected();
        resolve();
      });

      ws.on('message', (data: WebSocket.RawData) => {
        this.handleMessage(data.toString());
      });

      ws.on('error', (error) => {
        this.logger.error(`WebSocket error: ${error.message}`);
        if (!this.isOpen) {
          reject(error);
        }
      });

      ws.on('close', () => {
        const wasOpen = this.isOpen;
        this.isOpen = false;
        if (this.ws === ws) {
          this.ws = null;
        }
        if (wasOpen) {
          this.handlers?.onDisconnected();
        }
        if (!this.closing) {
          this.logger.warn('🔌 Bus hub disconnected, reconnecting...');
          this.scheduleReconnect();
        }
      });
    });
  }

  private handleMessage(data: string): void {
    const frame = parseFrame(ServerFrameSchema, data);
    if (!frame) {
      this.logger.warn('Discarding malformed frame from bus hub');
      return;
    }
    if (frame.op === 'error') {
      this.logger.warn(`Bus hub rejected a frame: ${frame.message}`);
      return;
    }
    this.handlers?.onEnvelope(frame.envelope);
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer || this.closing) return;

    if (this.attempts >= this.options.maxReconnectAttempts) {
      this.gaveUp = true;
      this.logger.error(`Giving up on bus hub after ${this.attempts} reconnect attempts`);
      return;
    }

    this.attempts += 1;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.open().catch((error) => {
        this.logger.debug(`Reconnect attempt ${this.attempts} failed: ${errorMessage(error)}`);
      });
    }, this.options.reconnectDelayMs);
  }

  private sendFrame(frame: ClientFrame): boolean {
    if (!this.ws || !this.isOpen || this.ws.readyState !== WebSocket.OPEN) {
      return false;
    }
    this.ws.send(JSON.stringify(frame));
    return true;
  }

  send(envelope: WireEnvelope): boolean {
    return this.sendFrame({ op: 'publish', envelope });
  }

  subscribe(channels: string[]): void {
    if (channels.length > 0) {
      this.sendFrame({ op: 'subscribe', channels });
    }
  }

  isConnected(): boolean {
    return this.isOpen;
  }

  hasGivenUp(): boolean {
    return this.gaveUp;
  }

  reconnect(): void {
    if (this.isOpen || this.reconnectTimer || this.closing) return;
    this.attempts = 0;
    this.gaveUp = false;
    this.scheduleReconnect();
  }

  async close(): Promise<void> {
    this.closing = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.ws) {
      this.ws.close();
      this.ws = null;
    }
    this.isOpen = false;
  }
}
