import { z } from 'zod';

export const CARE_NOTIFY = 'CARE_NOTIFY' as const;

export const NotifyEventKindSchema = z.enum(['help_requested', 'confirmation_missed', 'escalation_exhausted']);

/** What a delivery channel needs to reach one contact about one episode. */
export const CareNotifyPayload = z.object({
  episodeId: z.string(),
  contactRef: z.string(),
  eventKind: NotifyEventKindSchema,
});

export type CareNotify = z.infer<typeof CareNotifyPayload>;
