import type { Channel, Handler } from '../bus/channels';
import type { MessageBus, Unsubscribe } from '../bus/messageBus';
import type { Logger } from '../logger';
import { waitForAbort } from '../utils/async';
import type { Agent } from './types';

/**
 * Shared lifecycle for agents that live on the bus: subscriptions are made
 * when `run` starts and released on `stop` or when `run` ends, so a fresh
 * instance after a restart never doubles a handler.
 */
export abstract class BusAgent implements Agent {
  protected readonly logger: Logger;
  private readonly subscriptions: Unsubscribe[] = [];
  private readonly stopped = new AbortController();
  private running = false;

  protected constructor(
    readonly name: string,
    protected readonly bus: MessageBus,
    logger: Logger,
  ) {
    this.logger = logger.child(name);
  }

  /** Registers the agent's bus handlers. */
  protected abstract attach(): void;

  /** Work done while running; the default idles until stopped. */
  protected work(signal: AbortSignal): Promise<void> {
    return waitForAbort(signal);
  }

  protected listen<C extends Channel>(channel: C, handler: Handler<C>): void {
    this.subscriptions.push(this.bus.subscribe(channel, handler));
  }

  protected get stopSignal(): AbortSignal {
    return this.stopped.signal;
  }

  async run(signal: AbortSignal): Promise<void> {
    if (this.stopped.signal.aborted) return;
    const onAbort = (): void => this.stopped.abort();
    signal.addEventListener('abort', onAbort, { once: true });

    this.running = true;
    this.attach();
    this.logger.info('▶️ Running');
    try {
      await this.work(this.stopped.signal);
    } finally {
      signal.removeEventListener('abort', onAbort);
      this.running = false;
      this.release();
    }
  }

  async healthCheck(): Promise<boolean> {
    return this.running && !this.stopped.signal.aborted;
  }

  async stop(): Promise<void> {
    this.stopped.abort();
    this.release();
  }

  private release(): void {
    while (this.subscriptions.length > 0) {
      this.subscriptions.pop()?.();
    }
  }
}
