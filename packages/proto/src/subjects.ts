import { resourceTypeOf } from './events/audit';

export const NatsSubjects = {
  episodeNotify: (episodeId: string) => `care.notify.${episodeId}`,

  audit: (resourceType: string) => `care.audit.${resourceType}`,

  allNotify: 'care.notify.>',

  allAudit: 'care.audit.>',
} as const;

export type AggregateType = 'episode' | 'audit';

/**
 * Notify events fan out per episode so a delivery worker can follow one
 * escalation; audit events fan out per resource type.
 */
export function resolveOutboxSubject(aggregateType: string, aggregateId: string, eventType: string): string {
  if (aggregateType === 'episode') {
    return NatsSubjects.episodeNotify(aggregateId);
  }

  if (aggregateType === 'audit') {
    return NatsSubjects.audit(resourceTypeOf(aggregateId));
  }

  return `${aggregateType}.${aggregateId}.${eventType}`;
}
