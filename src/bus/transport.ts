import type { WireEnvelope } from './protocol';

export interface TransportHandlers {
  onEnvelope(raw: unknown): void;
  onConnected(): void;
  onDisconnected(): void;
}

/**
 * Moves serialized envelopes. Subscriptions and handlers belong to the
 * MessageBus; a transport only learns which channels to request.
 */
export interface Transport {
  readonly name: string;
  connect(handlers: TransportHandlers): Promise<void>;
  /** Returns false when the envelope could not be handed off. */
  send(envelope: WireEnvelope): boolean;
  subscribe(channels: string[]): void;
  isConnected(): boolean;
  /** True once bounded reconnection stopped trying. */
  hasGivenUp(): boolean;
  reconnect(): void;
  close(): Promise<void>;
}

/**
 * In-process loopback. Every envelope is JSON round-tripped so payloads
 * behave exactly as they would across the websocket hub.
 */
export class LocalTransport implements Transport {
  readonly name = 'local';
  private handlers: TransportHandlers | null = null;
  private connected = false;
  readonly subscribeCalls: string[][] = [];

  async connect(handlers: TransportHandlers): Promise<void> {
    this.handlers = handlers;
    this.connected = true;
    handlers.onConnected();
  }

  send(envelope: WireEnvelope): boolean {
    if (!this.connected || !this.handlers) return false;
    this.handlers.onEnvelope(JSON.parse(JSON.stringify(envelope)));
    return true;
  }

  subscribe(channels: string[]): void {
    this.subscribeCalls.push([...channels]);
  }

  isConnected(): boolean {
    return this.connected;
  }

  hasGivenUp(): boolean {
    return false;
  }

  /** Drops the link as a failed socket would. */
  interrupt(): void {
    if (!this.connected) return;
    this.connected = false;
    this.handlers?.onDisconnected();
  }

  reconnect(): void {
    if (this.connected || !this.handlers) return;
    this.connected = true;
    this.handlers.onConnected();
  }

  async close(): Promise<void> {
    this.connected = false;
    this.handlers = null;
  }
}
