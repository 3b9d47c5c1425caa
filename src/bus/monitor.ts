import { CHANNELS } from './channels';
import type { Channel, Envelope } from './channels';
import type { MessageBus, Unsubscribe } from './messageBus';

/** A stamped header line, then the payload as indented JSON. */
export function formatEnvelope(envelope: Envelope): string {
  const stamp = new Date(envelope.timestamp).toISOString();
  return `[${stamp}] ${envelope.channel}\n${JSON.stringify(envelope.payload, null, 2)}`;
}

/** Writes every envelope delivered on `channels` until unsubscribed. */
export function tailChannels(
  bus: MessageBus,
  write: (text: string) => void,
  channels: readonly Channel[] = CHANNELS,
): Unsubscribe {
  const subscriptions = channels.map((channel) =>
    bus.subscribe(channel, (_payload, envelope) => write(formatEnvelope(envelope))),
  );
  return () => {
    for (const unsubscribe of subscriptions) unsubscribe();
  };
}
