import { randomUUID } from 'node:crypto';
import { type PoolClient } from 'pg';
import {
  type AuditEvent,
  type AuditSink,
  type NotificationSink,
  type NotifyIntent,
} from '@careline/domain';
import { CARE_AUDIT, CARE_NOTIFY, type CareAudit, type CareNotify } from '@careline/proto';
import { appendOutboxEvent } from './outbox';

// Both sinks write inside the caller's transaction, so an intent or audit
// record exists exactly when the state change that produced it committed.

export class OutboxNotificationSink implements NotificationSink<PoolClient> {
  constructor(private readonly generateId: () => string = randomUUID) {}

  async notify(client: PoolClient, intent: NotifyIntent): Promise<void> {
    const payload: CareNotify = {
      episodeId: intent.episodeId,
      contactRef: intent.contactRef,
      eventKind: intent.eventKind,
    };
    await appendOutboxEvent(client, this.generateId(), {
      aggregateType: 'episode',
      aggregateId: intent.episodeId,
      eventType: CARE_NOTIFY,
      payload,
    });
  }
}

export class OutboxAuditSink implements AuditSink<PoolClient> {
  constructor(private readonly generateId: () => string = randomUUID) {}

  async record(client: PoolClient, event: AuditEvent): Promise<void> {
    const payload: CareAudit = {
      actor: event.actor,
      action: event.action,
      resourceRef: event.resourceRef,
      timestamp: event.timestamp.toISOString(),
      metadata: event.metadata,
    };
    await appendOutboxEvent(client, this.generateId(), {
      aggregateType: 'audit',
      aggregateId: event.resourceRef,
      eventType: CARE_AUDIT,
      payload,
    });
  }
}
