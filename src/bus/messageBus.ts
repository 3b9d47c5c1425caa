import { randomUUID } from 'crypto';
import type { Logger } from '../logger';
import { errorMessage } from '../errors';
import { CHANNEL_SCHEMAS, CHANNELS, Channel, ChannelPayloads, Envelope, Handler } from './channels';
import { WireEnvelope, WireEnvelopeSchema } from './protocol';
import type { Transport } from './transport';

export type Unsubscribe = () => void;

export interface MessageBusOptions {
  /** Envelopes retained per channel. */
  historySize?: number;
  /** Outbound envelopes buffered while the transport is down. */
  maxPending?: number;
}

type HandlerRegistry = { [C in Channel]: Set<Handler<C>> };
type HistoryRegistry = { [C in Channel]: Envelope<C>[] };

/**
 * Fan-out publish/subscribe over a pluggable transport.
 *
 * Handlers live here, not in the transport, so a reconnect only has to
 * re-announce the channel set. Delivery is FIFO per channel: the next
 * envelope on a channel waits until every handler settled the previous one.
 * A throwing handler is logged and never blocks the others.
 */
export class MessageBus {
  private readonly handlers: HandlerRegistry = {
    market_data: new Set(),
    trading_signals: new Set(),
    trade_decisions: new Set(),
    execution_results: new Set(),
    portfolio_updates: new Set(),
    rebalance_suggestions: new Set(),
  };

  private readonly histories: HistoryRegistry = {
    market_data: [],
    trading_signals: [],
    trade_decisions: [],
    execution_results: [],
    portfolio_updates: [],
    rebalance_suggestions: [],
  };

  private readonly queues = new Map<Channel, Promise<void>>();
  private pending: WireEnvelope[] = [];
  private readonly historySize: number;
  private readonly maxPending: number;

  constructor(
    private readonly transport: Transport,
    private readonly logger: Logger,
    options: MessageBusOptions = {},
  ) {
    this.historySize = options.historySize ?? 1000;
    this.maxPending = options.maxPending ?? 1000;
  }

  async connect(): Promise<void> {
    await this.transport.connect({
      onEnvelope: (raw) => this.receive(raw),
      onConnected: () => this.onConnected(),
      onDisconnected: () => this.logger.warn(`Bus transport '${this.transport.name}' disconnected`),
    });
  }

  publish<C extends Channel>(channel: C, payload: ChannelPayloads[C]): void {
    const envelope: WireEnvelope = {
      id: randomUUID(),
      channel,
      timestamp: Date.now(),
      payload,
    };

    if (!this.transport.send(envelope)) {
      this.buffer(envelope);
    }
  }

  subscribe<C extends Channel>(channel: C, handler: Handler<C>): Unsubscribe {
    const handlers = this.handlers[channel];
    const firstForChannel = handlers.size === 0;
    handlers.add(handler);
    if (firstForChannel) {
      this.transport.subscribe([channel]);
    }
    return () => {
      handlers.delete(handler);
    };
  }

  subscriberCount(channel: Channel): number {
    return this.handlers[channel].size;
  }

  history<C extends Channel>(channel: C, limit?: number): Envelope<C>[] {
    const entries = this.histories[channel];
    return limit === undefined ? [...entries] : entries.slice(-limit);
  }

  pendingCount(): number {
    return this.pending.length;
  }

  isConnected(): boolean {
    return this.transport.isConnected();
  }

  /** Restarts bounded reconnection once the transport stopped trying. */
  ensureConnected(): void {
    if (!this.transport.isConnected() && this.transport.hasGivenUp()) {
      this.logger.info('Asking bus transport to reconnect');
      this.transport.reconnect();
    }
  }

  /** Resolves once every channel queue is idle, including work queued meanwhile. */
  async drain(): Promise<void> {
    let observed: Promise<void>[] = [];
    do {
      observed = [...this.queues.values()];
      await Promise.all(observed);
    } while ([...this.queues.values()].some((queue, index) => queue !== observed[index]));
  }

  async close(): Promise<void> {
    await this.transport.close();
    for (const channel of CHANNELS) {
      this.handlers[channel].clear();
    }
  }

  private onConnected(): void {
    const active = CHANNELS.filter((channel) => this.handlers[channel].size > 0);
    this.transport.subscribe(active);

    const backlog = this.pending;
    this.pending = [];
    if (backlog.length > 0) {
      this.logger.info(`Flushing ${backlog.length} buffered envelope(s)`);
    }
    for (const envelope of backlog) {
      if (!this.transport.send(envelope)) {
        this.buffer(envelope);
      }
    }
  }

  private buffer(envelope: WireEnvelope): void {
    this.pending.push(envelope);
    if (this.pending.length > this.maxPending) {
      const dropped = this.pending.shift();
      this.logger.warn(`Outbound buffer full, dropped ${dropped?.channel ?? 'unknown'} envelope ${dropped?.id ?? ''}`);
    }
  }

  private receive(raw: unknown): void {
    const wire = WireEnvelopeSchema.safeParse(raw);
    if (!wire.success) {
      this.logger.warn('Dropping envelope with an invalid shape');
      return;
    }
    this.accept(wire.data.channel, wire.data);
  }

  private accept<C extends Channel>(channel: C, wire: WireEnvelope): void {
    const parsed = CHANNEL_SCHEMAS[channel].safeParse(wire.payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      this.logger.warn(
        `Dropping invalid ${channel} payload: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown issue'}`,
      );
      return;
    }

    const envelope: Envelope<C> = {
      id: wire.id,
      channel,
      timestamp: wire.timestamp,
      payload: parsed.data,
    };

    const history = this.histories[channel];
    history.push(envelope);
    if (history.length > this.historySize) {
      history.splice(0, history.length - this.historySize);
    }

    const previous = this.queues.get(channel) ?? Promise.resolve();
    const next = previous.then(() => this.deliver(channel, envelope));
    this.queues.set(channel, next);
  }

  private async deliver<C extends Channel>(channel: C, envelope: Envelope<C>): Promise<void> {
    const handlers = [...this.handlers[channel]];
    await Promise.all(
      handlers.map(async (handler) => {
        try {
          await handler(envelope.payload, envelope);
        } catch (error) {
          this.logger.error(`Handler on '${channel}' failed: ${errorMessage(error)}`);
        }
      }),
    );
  }
}
