import { z } from 'zod';

export const DailyActionRequestSchema = z.object({
  pairingId: z.string().min(1),
});

export const CaregiverActionsRequestSchema = z.object({
  actions: z.array(z.enum(['remind', 'neighbor', 'community'])).max(3),
  note: z.string().max(500).optional(),
});

export type DailyActionRequest = z.infer<typeof DailyActionRequestSchema>;
export type CaregiverActionsRequest = z.infer<typeof CaregiverActionsRequestSchema>;
