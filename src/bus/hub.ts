import WebSocket, { WebSocketServer } from 'ws';
import type { Logger } from '../logger';
import { ClientFrameSchema, ServerFrame, parseFrame } from './protocol';

export interface HubClient {
  send(data: string): void;
  /** ws readyState; OPEN is 1. */
  readonly readyState: number;
}

const OPEN = 1;

/**
 * Relays envelopes between bus processes. Each connection keeps its own
 * channel set; a published envelope is forwarded to every connection
 * subscribed to its channel, the publisher included.
 */
export class BusHub {
  private readonly clients = new Map<HubClient, Set<string>>();
  private wss: WebSocketServer | null = null;

  constructor(private readonly logger: Logger) {}

  listen(port: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({ port });
      this.wss = wss;

      wss.once('listening', () => {
        this.logger.info(`🛰️ Bus hub listening on port ${port}`);
        resolve();
      });
      wss.once('error', reject);

      wss.on('connection', (ws: WebSocket) => {
        this.attach(ws);
        this.logger.info(`Client connected (${this.clients.size} total)`);

        ws.on('message', (data: WebSocket.RawData) => {
          this.route(ws, data.toString());
        });

        ws.on('close', () => {
          this.detach(ws);
          this.logger.info(`Client disconnected (${this.clients.size} total)`);
        });
      });
    });
  }

  attach(client: HubClient): void {
    if (!this.clients.has(client)) {
      this.clients.set(client, new Set());
    }
  }

  detach(client: HubClient): void {
    this.clients.delete(client);
  }

  route(client: HubClient, data: string): void {
    const frame = parseFrame(ClientFrameSchema, data);
    if (!frame) {
      this.reply(client, { op: 'error', message: 'malformed frame' });
      return;
    }

    if (frame.op === 'subscribe') {
      const channels = this.clients.get(client) ?? new Set<string>();
      frame.channels.forEach((channel) => channels.add(channel));
      this.clients.set(client, channels);
      return;
    }

    const message = JSON.stringify({ op: 'message', envelope: frame.envelope } satisfies ServerFrame);
    for (const [target, channels] of this.clients) {
      if (channels.has(frame.envelope.channel) && target.readyState === OPEN) {
        target.send(message);
      }
    }
  }

  async close(): Promise<void> {
    const wss = this.wss;
    this.wss = null;
    this.clients.clear();
    if (!wss) return;
    for (const client of wss.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve) => wss.close(() => resolve()));
  }

  private reply(client: HubClient, frame: ServerFrame): void {
    if (client.readyState === OPEN) {
      client.send(JSON.stringify(frame));
    }
  }
}
