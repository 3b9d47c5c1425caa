import { z } from 'zod';
import { CHANNELS } from './channels';

/** Envelope as it travels between processes; the payload is validated on receipt. */
export const WireEnvelopeSchema = z.object({
  id: z.string(),
  channel: z.enum(CHANNELS),
  timestamp: z.number(),
  payload: z.unknown(),
});

export type WireEnvelope = z.infer<typeof WireEnvelopeSchema>;

export const ClientFrameSchema = z.discriminatedUnion('op', [
  z.object({ op: z.literal('subscribe'), channels: z.array(z.string()) }),
  z.object({ op: z.literal('publish'), envelope: WireEnvelopeSchema }),
]);

export type ClientFrame = z.infer<typeof ClientFrameSchema>;

export const ServerFrameSchema = z.discriminatedUnion('op', [
  z.object({ op: z.literal('message'), envelope: WireEnvelopeSchema }),
  z.object({ op: z.literal('error'), message: z.string() }),
]);

export type ServerFrame = z.infer<typeof ServerFrameSchema>;

export function parseFrame<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: string): T | null {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch {
    return null;
  }
  const result = schema.safeParse(json);
  return result.success ? result.data : null;
}
