import { z } from 'zod';

export const CARE_AUDIT = 'CARE_AUDIT' as const;

export const CareAuditPayload = z.object({
  actor: z.string(),
  action: z.string(),
  resourceRef: z.string(),
  timestamp: z.string().datetime(),
  metadata: z.record(z.unknown()),
});

export type CareAudit = z.infer<typeof CareAuditPayload>;

/** `pairing:abc` → `pairing`. */
export function resourceTypeOf(resourceRef: string): string {
  const separator = resourceRef.indexOf(':');
  return separator > 0 ? resourceRef.slice(0, separator) : resourceRef;
}
