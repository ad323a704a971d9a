import { z } from 'zod';

export const EpisodeIdParamsSchema = z.object({
  episodeId: z.string().min(1),
});

export const DebriefIdParamsSchema = z.object({
  debriefId: z.string().min(1),
});

export const ResolveEpisodeRequestSchema = z.discriminatedUnion('outcome', [
  z.object({ outcome: z.literal('contact_reached'), contactRef: z.string().trim().min(1).max(200) }),
  z.object({ outcome: z.literal('dependent_confirmed') }),
]);

export const DebriefRequestSchema = z.object({
  outcome: z.enum(['reached_dependent', 'reached_backup', 'emergency_services', 'false_alarm', 'unresolved']),
  difficulty: z.number().int().min(1).max(5),
  feedback: z.string().max(2000).optional(),
});

export type ResolveEpisodeRequest = z.infer<typeof ResolveEpisodeRequestSchema>;
export type DebriefRequest = z.infer<typeof DebriefRequestSchema>;
