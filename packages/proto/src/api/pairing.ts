import { z } from 'zod';

export const MAX_CONTACTS = 10;

const ContactRefSchema = z.string().trim().min(1).max(200);

export const ContactChainSchema = z.array(ContactRefSchema).max(MAX_CONTACTS, `At most ${MAX_CONTACTS} contacts`);

function isKnownTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

export const TimeZoneSchema = z.string().trim().min(1).refine(isKnownTimeZone, 'Unknown time zone');

export const CreatePairingRequestSchema = z.object({
  dependentRef: z.string().trim().min(1, 'dependentRef is required').max(200),
  communityCode: z.string().trim().min(1).max(64).optional(),
  timeZone: TimeZoneSchema.optional(),
  contactChain: ContactChainSchema.optional(),
});

export const SetContactChainRequestSchema = z.object({
  contactChain: ContactChainSchema,
});

export const RedeemRequestSchema = z
  .object({
    shortCode: z.string().min(1).max(32).optional(),
    linkToken: z.string().min(1).max(128).optional(),
    communityCode: z.string().trim().min(1).max(64).optional(),
  })
  .refine((body) => (body.shortCode === undefined) !== (body.linkToken === undefined), {
    message: 'Provide exactly one of shortCode or linkToken',
  });

export const PairingIdParamsSchema = z.object({
  pairingId: z.string().min(1),
});

export const StatusHistoryQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(90).default(7),
});

export type CreatePairingRequest = z.infer<typeof CreatePairingRequestSchema>;
export type SetContactChainRequest = z.infer<typeof SetContactChainRequestSchema>;
export type RedeemRequest = z.infer<typeof RedeemRequestSchema>;
export type StatusHistoryQuery = z.infer<typeof StatusHistoryQuerySchema>;
