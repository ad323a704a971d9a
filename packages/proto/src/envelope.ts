import { z } from 'zod';

export const EventEnvelopeSchema = z.object({
  eventId: z.string().min(1),
  timestamp: z.string().datetime(),
  type: z.string().min(1),
  payload: z.record(z.unknown()).default({}),
});

export type EventEnvelope = z.infer<typeof EventEnvelopeSchema>;

export function createEnvelope(
  eventId: string,
  type: string,
  payload: Record<string, unknown> = {},
  timestamp: Date = new Date(),
): EventEnvelope {
  return {
    eventId,
    timestamp: timestamp.toISOString(),
    type,
    payload,
  };
}
